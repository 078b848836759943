export { Config } from './config.js';
export {
  DEFAULT_ATTEMPTS,
  DEFAULT_NDOTS,
  DEFAULT_TIMEOUT,
  RESOLV_CONF_PATH,
} from './constants.js';
export { ParseError, ParseErrorKind } from './errors.js';
export { parseConfig, parseResolvConf } from './grammar.js';
export {
  parseIp,
  parseIPv4Network,
  parseIPv6Network,
  parseNetwork,
} from './network.js';
export { readResolvConf, type ReadResolvConfOptions } from './read-file.js';

export type {
  ExtraLookup,
  Family,
  Ip,
  IPv4Ip,
  IPv4Network,
  IPv6Ip,
  IPv6Network,
  KnownLookup,
  Lookup,
  Network,
  Result,
} from './types.js';

export { AddressParseError } from '@resolvconf/ip';
