import { AddressParseError } from '@resolvconf/ip';
import { describe, expect, test } from 'vitest';
import { ParseError, ParseErrorKind } from './errors.js';

describe('ParseError', () => {
  test('carries the kind and line', () => {
    const error = new ParseError(ParseErrorKind.ExtraData, 12);

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ParseError');
    expect(error.kind).toBe('ExtraData');
    expect(error.line).toBe(12);
    expect(error.message).toBe('extra data at the end of line 12');
  });

  test('includes the cause in the message', () => {
    const cause = new AddressParseError('ipv4', '1.2.3', 'expected 4 octets');
    const error = new ParseError(ParseErrorKind.InvalidIp, 0, cause);

    expect(error.cause).toBe(cause);
    expect(error.message).toBe(
      'directive at line 0 contains an invalid ip: invalid IPv4 address: 1.2.3 (expected 4 octets)'
    );
  });

  test('describes every kind', () => {
    const messages = Object.values(ParseErrorKind).map(
      (kind) => new ParseError(kind, 1, new Error('boom')).message
    );

    expect(messages).toEqual([
      'bad unicode at line 1: boom',
      'directive at line 1 is improperly formatted or contains an invalid value',
      'options at line 1 contain an invalid option value',
      'option at line 1 is not recognized',
      'directive at line 1 is not recognized',
      'directive at line 1 contains an invalid ip: boom',
      'extra data at the end of line 1',
    ]);
  });
});
