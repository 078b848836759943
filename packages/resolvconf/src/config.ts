import {
  DEFAULT_ATTEMPTS,
  DEFAULT_NDOTS,
  DEFAULT_TIMEOUT,
} from './constants.js';
import type { OptionTarget } from './options.js';
import type { Family, Ip, Lookup, Network } from './types.js';

const LOCAL_NAMESERVERS: readonly Ip[] = [
  { type: 'ipv4', ip: '127.0.0.1' },
  { type: 'ipv6', ip: '::1' },
];

/**
 * Parsed resolver configuration.
 *
 * `domain` and `search` are mutually exclusive: setting one through
 * `setDomain()` or `setSearch()` clears the other, so the last
 * directive in the file wins.
 */
export class Config implements OptionTarget {
  /**
   * Name servers in the order they appear.
   */
  nameservers: Ip[] = [];

  /**
   * Local domain name.
   */
  domain: string | undefined = undefined;

  /**
   * Search list for host-name lookup.
   */
  search: string[] = [];

  /**
   * Networks used to order the addresses returned by a lookup.
   */
  sortlist: Network[] = [];

  debug = false;

  /**
   * Minimum number of dots in a name before an initial absolute
   * query is made.
   */
  ndots = DEFAULT_NDOTS;

  /**
   * Time to wait for a response from a name server, in seconds.
   */
  timeout = DEFAULT_TIMEOUT;

  /**
   * Number of times to query each name server before giving up.
   */
  attempts = DEFAULT_ATTEMPTS;

  rotate = false;
  noCheckNames = false;
  inet6 = false;
  ip6Bytestring = false;
  ip6Dotint = false;
  edns0 = false;
  singleRequest = false;
  singleRequestReopen = false;
  noReload = false;
  trustAd = false;
  noTldQuery = false;
  useVc = false;

  /**
   * Database lookup order.
   */
  lookup: Lookup[] = [];

  /**
   * Address family preference.
   */
  family: Family[] = [];

  /**
   * Sets the local domain name and clears the search list.
   */
  setDomain(domain: string) {
    this.domain = domain;
    this.search = [];
  }

  /**
   * Replaces the search list and clears the local domain name.
   */
  setSearch(search: string[]) {
    this.search = search;
    this.domain = undefined;
  }

  /**
   * Returns the domains to append to unqualified names: the search
   * list, or the local domain when there is no search list.
   */
  getLastSearchOrDomain(): string[] {
    if (this.search.length > 0) {
      return [...this.search];
    }
    return this.domain === undefined ? [] : [this.domain];
  }

  /**
   * Returns the configured name servers, or the local host when
   * none are configured.
   */
  getNameserversOrLocal(): Ip[] {
    if (this.nameservers.length > 0) {
      return [...this.nameservers];
    }
    return LOCAL_NAMESERVERS.map((nameserver) => ({ ...nameserver }));
  }
}
