import { Config } from './config.js';
import { Directive, Family, LookupSource } from './constants.js';
import { ParseError } from './errors.js';
import { parseIp, parseNetwork } from './network.js';
import { applyOption, parseOption } from './options.js';
import { tokenize } from './tokenizer.js';
import { err, ok, type Lookup, type Network, type Result } from './types.js';

type DirectiveResult = Result<void, ParseError>;

const done: DirectiveResult = ok(undefined);

/**
 * Parses a resolver configuration (`resolv.conf` format).
 *
 * Lines are processed top to bottom and the first invalid line
 * aborts the parse. Never throws for malformed input.
 *
 * @example
 * const result = parseResolvConf(bytes);
 * if (!result.ok) {
 *   console.error(result.error.message);
 * }
 */
export function parseResolvConf(data: Uint8Array): Result<Config, ParseError> {
  const lines = tokenize(data);

  if (!lines.ok) {
    return lines;
  }

  const config = new Config();

  for (const { line, tokens } of lines.value) {
    const [keyword = '', ...args] = tokens;
    const result = applyDirective(config, keyword, args, line);

    if (!result.ok) {
      return result;
    }
  }

  return ok(config);
}

/**
 * Parses a resolver configuration from bytes or text.
 *
 * Throws a `ParseError` describing the first invalid line.
 *
 * @example
 * const config = parseConfig('nameserver 8.8.8.8\noptions ndots:2');
 * config.nameservers;
 * // [{ type: 'ipv4', ip: '8.8.8.8' }]
 */
export function parseConfig(data: Uint8Array | string): Config {
  const bytes =
    typeof data === 'string' ? new TextEncoder().encode(data) : data;
  const result = parseResolvConf(bytes);

  if (!result.ok) {
    throw result.error;
  }

  return result.value;
}

function applyDirective(
  config: Config,
  keyword: string,
  args: string[],
  line: number
): DirectiveResult {
  switch (keyword) {
    case Directive.NAMESERVER:
      return applyNameserver(config, args, line);
    case Directive.DOMAIN:
      return applyDomain(config, args, line);
    case Directive.SEARCH:
      config.setSearch(args);
      return done;
    case Directive.SORTLIST:
      return applySortlist(config, args, line);
    case Directive.OPTIONS:
      return applyOptions(config, args, line);
    case Directive.LOOKUP:
      config.lookup.push(...args.map(parseLookup));
      return done;
    case Directive.FAMILY:
      return applyFamily(config, args, line);
    default:
      return err(new ParseError('InvalidDirective', line));
  }
}

function applyNameserver(
  config: Config,
  args: string[],
  line: number
): DirectiveResult {
  const [address, ...extra] = args;

  if (address === undefined) {
    return err(new ParseError('InvalidValue', line));
  }

  const ip = parseIp(address);

  if (!ip.ok) {
    return err(new ParseError('InvalidIp', line, ip.error));
  }

  if (extra.length > 0) {
    return err(new ParseError('ExtraData', line));
  }

  config.nameservers.push(ip.value);
  return done;
}

function applyDomain(
  config: Config,
  args: string[],
  line: number
): DirectiveResult {
  const [domain, ...extra] = args;

  if (domain === undefined) {
    return err(new ParseError('InvalidValue', line));
  }

  if (extra.length > 0) {
    return err(new ParseError('ExtraData', line));
  }

  config.setDomain(domain);
  return done;
}

function applySortlist(
  config: Config,
  args: string[],
  line: number
): DirectiveResult {
  const sortlist: Network[] = [];

  for (const arg of args) {
    const network = parseNetwork(arg);

    if (!network.ok) {
      return err(new ParseError('InvalidIp', line, network.error));
    }

    sortlist.push(network.value);
  }

  config.sortlist = sortlist;
  return done;
}

function applyOptions(
  config: Config,
  args: string[],
  line: number
): DirectiveResult {
  for (const arg of args) {
    const setting = parseOption(arg, line);

    if (!setting.ok) {
      return setting;
    }

    applyOption(config, setting.value);
  }

  return done;
}

function parseLookup(word: string): Lookup {
  switch (word) {
    case LookupSource.file:
    case LookupSource.bind:
      return { type: word };
    default:
      return { type: 'extra', name: word };
  }
}

function applyFamily(
  config: Config,
  args: string[],
  line: number
): DirectiveResult {
  for (const arg of args) {
    switch (arg) {
      case Family.inet4:
      case Family.inet6:
        config.family.push(arg);
        break;
      default:
        return err(new ParseError('InvalidValue', line));
    }
  }

  return done;
}
