import type { IPv4Address } from '@resolvconf/ip';
import type { Family as FamilyCode, LookupSource } from './constants.js';

export type IPv4Ip = {
  type: 'ipv4';
  ip: IPv4Address;
};

export type IPv6Ip = {
  type: 'ipv6';
  ip: string;

  /**
   * Zone the address is scoped to, e.g. `eth0` in `fe80::1%eth0`.
   */
  scope?: string;
};

export type Ip = IPv4Ip | IPv6Ip;

export type IPv4Network = {
  type: 'ipv4';
  ip: IPv4Address;
  netmask: IPv4Address;
};

export type IPv6Network = {
  type: 'ipv6';
  ip: string;
  netmask: string;
};

export type Network = IPv4Network | IPv6Network;

export type KnownLookup = {
  type: (typeof LookupSource)[keyof typeof LookupSource];
};

export type ExtraLookup = {
  type: 'extra';
  name: string;
};

export type Lookup = KnownLookup | ExtraLookup;

export type Family = (typeof FamilyCode)[keyof typeof FamilyCode];

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
