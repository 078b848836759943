export const RESOLV_CONF_PATH = '/etc/resolv.conf';

export const DEFAULT_NDOTS = 1;
export const DEFAULT_TIMEOUT = 5; // seconds
export const DEFAULT_ATTEMPTS = 2;

export const MAX_OPTION_VALUE = 0xffffffff;

export const Directive = {
  NAMESERVER: 'nameserver', // Name server address
  DOMAIN: 'domain', // Local domain name
  SEARCH: 'search', // Search list for host-name lookup
  SORTLIST: 'sortlist', // Address sorting preference
  OPTIONS: 'options', // Resolver tuning
  LOOKUP: 'lookup', // Database lookup order (BSD)
  FAMILY: 'family', // Address family preference (BSD)
} as const;

/**
 * `options` keys that switch a flag on, mapped to their `Config` field.
 */
export const FlagOption = {
  debug: 'debug',
  rotate: 'rotate',
  'no-check-names': 'noCheckNames',
  inet6: 'inet6',
  'ip6-bytestring': 'ip6Bytestring',
  'ip6-dotint': 'ip6Dotint',
  edns0: 'edns0',
  'single-request': 'singleRequest',
  'single-request-reopen': 'singleRequestReopen',
  'no-reload': 'noReload',
  'trust-ad': 'trustAd',
  'no-tld-query': 'noTldQuery',
  'use-vc': 'useVc',
} as const;

/**
 * `options` keys that switch a flag off.
 */
export const NegatedFlagOption = {
  'no-ip6-dotint': 'ip6Dotint',
} as const;

/**
 * `options` keys that take an unsigned integer value.
 */
export const NumericOption = {
  ndots: 'ndots',
  timeout: 'timeout',
  attempts: 'attempts',
} as const;

export const LookupSource = {
  file: 'file', // Local hosts file
  bind: 'bind', // Name servers
} as const;

export const Family = {
  inet4: 'inet4',
  inet6: 'inet6',
} as const;
