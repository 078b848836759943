export type AddressFamily = 'ipv4' | 'ipv6';

/**
 * Thrown when a textual address or netmask literal cannot be parsed.
 */
export class AddressParseError extends Error {
  readonly input: string;
  readonly family: AddressFamily;

  constructor(family: AddressFamily, input: string, reason?: string) {
    const label = family === 'ipv4' ? 'IPv4' : 'IPv6';
    super(
      reason
        ? `invalid ${label} address: ${input} (${reason})`
        : `invalid ${label} address: ${input}`
    );
    this.name = 'AddressParseError';
    this.family = family;
    this.input = input;
  }
}
