import { AddressParseError } from './errors.js';
import { countPrefixLength, generateNetmask, parseUint } from './util.js';

export type IPv4Address = `${number}.${number}.${number}.${number}`;

export const IPV4_ADDRESS_LENGTH = 4;

/**
 * Parses a dotted-quad IPv4 literal into its 4 octets.
 *
 * Only the strict form is accepted: four decimal octets,
 * no leading zeros, no shorthand like `10.1`.
 *
 * @example
 * parseIPv4Literal('192.168.1.10');
 * // Uint8Array [192, 168, 1, 10]
 */
export function parseIPv4Literal(ip: string): Uint8Array {
  const parts = ip.split('.');

  if (parts.length !== IPV4_ADDRESS_LENGTH) {
    throw new AddressParseError('ipv4', ip, 'expected 4 octets');
  }

  return new Uint8Array(parts.map((part) => parseOctet(ip, part)));
}

function parseOctet(ip: string, part: string) {
  if (part.length === 0 || part.length > 3) {
    throw new AddressParseError('ipv4', ip, 'invalid octet length');
  }

  if (part.length > 1 && part.startsWith('0')) {
    throw new AddressParseError('ipv4', ip, 'leading zero in octet');
  }

  const octet = parseDecimal(ip, part);

  if (octet > 255) {
    throw new AddressParseError('ipv4', ip, 'octet out of range');
  }

  return octet;
}

function parseDecimal(ip: string, part: string) {
  try {
    return parseUint(part);
  } catch (err) {
    throw new AddressParseError(
      'ipv4',
      ip,
      err instanceof Error ? err.message : String(err)
    );
  }
}

/**
 * Parses an IPv4 address Uint8Array into a string.
 */
export function parseIPv4Address(data: Uint8Array) {
  return data.join('.') as IPv4Address;
}

/**
 * Normalizes an IPv4 literal by parsing it and formatting
 * the octets back into a dotted quad.
 */
export function normalizeIPv4Address(ip: string) {
  return parseIPv4Address(parseIPv4Literal(ip));
}

/**
 * Whether the address is the unspecified address `0.0.0.0`.
 */
export function isUnspecifiedIPv4(data: Uint8Array) {
  return data.every((byte) => byte === 0);
}

/**
 * Whether the mask is a valid IPv4 netmask: a contiguous run
 * of one bits, starting from the most significant bit, with
 * at least one bit set.
 */
export function isValidIPv4Netmask(mask: Uint8Array) {
  if (mask.length !== IPV4_ADDRESS_LENGTH) {
    return false;
  }

  const prefixLength = countPrefixLength(mask);
  return prefixLength !== undefined && prefixLength > 0;
}

/**
 * Infers a classful-style netmask from the number of trailing
 * zero octets in the address.
 *
 * Works on whole octets, not bits: `128.192.0.0` gives
 * `255.255.0.0`. The first octet is never considered, so the
 * widest inferred mask is `255.0.0.0`.
 */
export function inferIPv4Netmask(data: Uint8Array) {
  let zeroOctets = 0;

  for (let i = IPV4_ADDRESS_LENGTH - 1; i > 0; i--) {
    if (data[i] !== 0) {
      break;
    }
    zeroOctets++;
  }

  return generateNetmask(32 - zeroOctets * 8);
}
