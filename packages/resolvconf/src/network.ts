import {
  AddressParseError,
  formatIPv6Address,
  hostIPv6Netmask,
  inferIPv4Netmask,
  isUnspecifiedIPv4,
  isValidIPv4Netmask,
  parseIPv4Address,
  parseIPv4Literal,
  parseIPv6Literal,
  parseScopedIPv6Literal,
} from '@resolvconf/ip';
import {
  err,
  ok,
  type Ip,
  type IPv4Network,
  type IPv6Network,
  type Network,
  type Result,
} from './types.js';

/**
 * Runs a literal parser, turning an `AddressParseError` into a result.
 */
function tryParse<T>(parse: () => T): Result<T, AddressParseError> {
  try {
    return ok(parse());
  } catch (error) {
    if (error instanceof AddressParseError) {
      return err(error);
    }
    throw error;
  }
}

function splitMask(value: string): [address: string, mask?: string] {
  const slash = value.indexOf('/');

  if (slash === -1) {
    return [value];
  }

  return [value.slice(0, slash), value.slice(slash + 1)];
}

/**
 * Parses a name server address: an IPv4 literal, or an IPv6 literal
 * with an optional `%<scope>` suffix.
 */
export function parseIp(value: string): Result<Ip, AddressParseError> {
  if (!value.includes(':')) {
    return tryParse<Ip>(() => ({
      type: 'ipv4',
      ip: parseIPv4Address(parseIPv4Literal(value)),
    }));
  }

  return tryParse<Ip>(() => {
    const { address, scope } = parseScopedIPv6Literal(value);
    const ip = formatIPv6Address(address);

    return scope === undefined
      ? { type: 'ipv6', ip }
      : { type: 'ipv6', ip, scope };
  });
}

/**
 * Parses an `ADDRESS[/MASK]` IPv4 sortlist entry.
 *
 * The unspecified address is never accepted. Without an explicit
 * mask one is inferred from the trailing zero octets.
 *
 * @example
 * parseIPv4Network('130.155.0.0');
 * // { ok: true, value: { type: 'ipv4', ip: '130.155.0.0', netmask: '255.255.0.0' } }
 */
export function parseIPv4Network(
  value: string
): Result<IPv4Network, AddressParseError> {
  return tryParse<IPv4Network>(() => {
    const [ipString, maskString] = splitMask(value);
    const ip = parseIPv4Literal(ipString);

    if (isUnspecifiedIPv4(ip)) {
      throw new AddressParseError('ipv4', value, 'unspecified address');
    }

    let netmask: Uint8Array;

    if (maskString === undefined) {
      netmask = inferIPv4Netmask(ip);
    } else {
      netmask = parseIPv4Literal(maskString);

      if (!isValidIPv4Netmask(netmask)) {
        throw new AddressParseError('ipv4', value, 'invalid netmask');
      }
    }

    return {
      type: 'ipv4',
      ip: parseIPv4Address(ip),
      netmask: parseIPv4Address(netmask),
    };
  });
}

/**
 * Parses an `ADDRESS[/MASK]` IPv6 sortlist entry.
 *
 * An explicit mask is taken as is. Without one the entry matches
 * the single host.
 */
export function parseIPv6Network(
  value: string
): Result<IPv6Network, AddressParseError> {
  return tryParse<IPv6Network>(() => {
    const [ipString, maskString] = splitMask(value);
    const ip = parseIPv6Literal(ipString);
    const netmask =
      maskString === undefined
        ? hostIPv6Netmask()
        : parseIPv6Literal(maskString);

    return {
      type: 'ipv6',
      ip: formatIPv6Address(ip),
      netmask: formatIPv6Address(netmask),
    };
  });
}

/**
 * Parses a sortlist entry as an IPv4 network, falling back to IPv6.
 *
 * When both fail, the error of the family the entry looks like
 * is reported.
 */
export function parseNetwork(
  value: string
): Result<Network, AddressParseError> {
  const ipv4 = parseIPv4Network(value);

  if (ipv4.ok) {
    return ipv4;
  }

  const ipv6 = parseIPv6Network(value);

  if (ipv6.ok) {
    return ipv6;
  }

  return value.includes(':') ? ipv6 : ipv4;
}
