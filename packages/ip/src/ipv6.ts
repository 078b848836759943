import { AddressParseError } from './errors.js';
import { parseIPv4Literal } from './ipv4.js';
import { parseHex } from './util.js';

export const IPV6_ADDRESS_LENGTH = 16;

const IPV6_GROUP_COUNT = 8;

export type ScopedIPv6Literal = {
  address: Uint8Array;
  scope?: string;
};

/**
 * Parses a textual IPv6 address into its 16 bytes.
 *
 * Accepts `::` zero compression and a trailing dotted-quad
 * for the low 32 bits.
 *
 * @example
 * parseIPv6Literal('2001:db8::1');
 * parseIPv6Literal('::ffff:192.0.2.1');
 */
export function parseIPv6Literal(ip: string): Uint8Array {
  if (!ip) {
    throw new AddressParseError('ipv6', ip, 'empty address');
  }

  const halves = ip.split('::');

  if (halves.length > 2) {
    throw new AddressParseError('ipv6', ip, 'multiple "::"');
  }

  const [head = '', tail] = halves;
  let groups: number[];

  if (tail === undefined) {
    groups = parseGroups(ip, head, true);

    if (groups.length !== IPV6_GROUP_COUNT) {
      throw new AddressParseError('ipv6', ip, 'expected 8 groups');
    }
  } else {
    const left = parseGroups(ip, head, false);
    const right = parseGroups(ip, tail, true);
    const missingGroups = IPV6_GROUP_COUNT - (left.length + right.length);

    // "::" stands in for at least one group
    if (missingGroups < 1) {
      throw new AddressParseError('ipv6', ip, 'too many groups');
    }

    groups = [...left, ...Array<number>(missingGroups).fill(0), ...right];
  }

  return new Uint8Array(groups.flatMap((group) => [group >> 8, group & 0xff]));
}

/**
 * Parses a textual IPv6 address with an optional `%<scope>` zone suffix.
 *
 * @example
 * parseScopedIPv6Literal('fe80::1%eth0');
 * // { address: Uint8Array [...], scope: 'eth0' }
 */
export function parseScopedIPv6Literal(ip: string): ScopedIPv6Literal {
  const scopeIndex = ip.indexOf('%');

  if (scopeIndex === -1) {
    return { address: parseIPv6Literal(ip) };
  }

  const scope = ip.slice(scopeIndex + 1);

  if (!scope) {
    throw new AddressParseError('ipv6', ip, 'empty scope');
  }

  return {
    address: parseIPv6Literal(ip.slice(0, scopeIndex)),
    scope,
  };
}

function parseGroups(ip: string, part: string, allowIPv4Tail: boolean) {
  if (part === '') {
    return [];
  }

  const parts = part.split(':');
  const groups: number[] = [];

  for (let i = 0; i < parts.length; i++) {
    const group = parts[i] ?? '';

    if (allowIPv4Tail && i === parts.length - 1 && group.includes('.')) {
      const [a = 0, b = 0, c = 0, d = 0] = parseEmbeddedIPv4(ip, group);
      groups.push((a << 8) | b, (c << 8) | d);
      continue;
    }

    groups.push(parseGroup(ip, group));
  }

  return groups;
}

function parseGroup(ip: string, group: string) {
  if (group.length === 0 || group.length > 4) {
    throw new AddressParseError('ipv6', ip, 'invalid group length');
  }

  try {
    return parseHex(group);
  } catch (err) {
    throw new AddressParseError(
      'ipv6',
      ip,
      err instanceof Error ? err.message : String(err)
    );
  }
}

function parseEmbeddedIPv4(ip: string, tail: string) {
  try {
    return parseIPv4Literal(tail);
  } catch (err) {
    if (err instanceof AddressParseError) {
      throw new AddressParseError('ipv6', ip, 'invalid embedded IPv4');
    }
    throw err;
  }
}

/**
 * Parses an IPv6 address Uint8Array into its uncompressed string form.
 *
 * @example
 * parseIPv6Address(bytes);
 * // '2001:0db8:0000:0000:0000:0000:0000:0001'
 */
export function parseIPv6Address(data: Uint8Array) {
  const groups: string[] = [];

  for (let i = 0; i < data.length; i += 2) {
    const group = ((data[i] ?? 0) << 8) | (data[i + 1] ?? 0);
    groups.push(group.toString(16).padStart(4, '0'));
  }

  return groups.join(':');
}

/**
 * Formats an IPv6 address Uint8Array into its canonical
 * compressed string form.
 *
 * @example
 * formatIPv6Address(bytes);
 * // '2001:db8::1'
 */
export function formatIPv6Address(data: Uint8Array) {
  return compressIPv6(parseIPv6Address(data));
}

/**
 * Normalizes an IPv6 literal into its canonical compressed form.
 */
export function normalizeIPv6Address(ip: string) {
  return formatIPv6Address(parseIPv6Literal(ip));
}

/**
 * Compresses an expanded IPv6 address by removing leading zeros
 * and replacing the longest run of zero groups with `::`.
 */
export function compressIPv6(ip: string) {
  // Split into groups and normalize to lowercase
  const groups = ip.toLowerCase().split(':');

  // Remove leading zeros from each group
  const normalizedGroups = groups.map(
    (group) => group.replace(/^0+(?=\w)/, '') // Remove leading zeros, keep single 0
  );

  // Find longest sequence of empty groups
  let longestZeroStart = -1;
  let longestZeroLength = 0;
  let currentZeroStart = -1;
  let currentZeroLength = 0;

  for (let i = 0; i < normalizedGroups.length; i++) {
    if (normalizedGroups[i] === '0' || normalizedGroups[i] === '') {
      if (currentZeroStart === -1) currentZeroStart = i;
      currentZeroLength++;

      if (currentZeroLength > longestZeroLength) {
        longestZeroStart = currentZeroStart;
        longestZeroLength = currentZeroLength;
      }
    } else {
      currentZeroStart = -1;
      currentZeroLength = 0;
    }
  }

  if (longestZeroLength === normalizedGroups.length) {
    return '::';
  }

  // Replace longest zero sequence with :: if it's at least 2 groups long
  if (longestZeroLength >= 2) {
    normalizedGroups.splice(longestZeroStart, longestZeroLength);

    if (longestZeroStart === 0) {
      // Leading zeros - ensure we have two colons at start
      normalizedGroups.unshift('', '');
    } else if (longestZeroStart === normalizedGroups.length) {
      // Trailing zeros - ensure we have two colons at end
      normalizedGroups.push('', '');
    } else {
      // Middle zeros - add empty string for ::
      normalizedGroups.splice(longestZeroStart, 0, '');
    }
  }

  return normalizedGroups.join(':');
}

/**
 * The all-ones 128-bit mask, matching a single host.
 */
export function hostIPv6Netmask() {
  return new Uint8Array(IPV6_ADDRESS_LENGTH).fill(0xff);
}
