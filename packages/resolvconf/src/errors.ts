// Intentionally not using enum to avoid need for a transpiler
export const ParseErrorKind = {
  InvalidUtf8: 'InvalidUtf8',
  InvalidValue: 'InvalidValue',
  InvalidOptionValue: 'InvalidOptionValue',
  InvalidOption: 'InvalidOption',
  InvalidDirective: 'InvalidDirective',
  InvalidIp: 'InvalidIp',
  ExtraData: 'ExtraData',
} as const;

export type ParseErrorKind =
  (typeof ParseErrorKind)[keyof typeof ParseErrorKind];

/**
 * Error describing why a resolver configuration could not be parsed.
 *
 * `line` is the 0-based index of the offending line. For `InvalidUtf8`
 * and `InvalidIp` the underlying failure is available as `cause`.
 */
export class ParseError extends Error {
  readonly kind: ParseErrorKind;
  readonly line: number;

  constructor(kind: ParseErrorKind, line: number, cause?: Error) {
    super(formatMessage(kind, line, cause), { cause });
    this.name = 'ParseError';
    this.kind = kind;
    this.line = line;
  }
}

function formatMessage(kind: ParseErrorKind, line: number, cause?: Error) {
  switch (kind) {
    case 'InvalidUtf8':
      return `bad unicode at line ${line}: ${cause?.message}`;
    case 'InvalidValue':
      return `directive at line ${line} is improperly formatted or contains an invalid value`;
    case 'InvalidOptionValue':
      return `options at line ${line} contain an invalid option value`;
    case 'InvalidOption':
      return `option at line ${line} is not recognized`;
    case 'InvalidDirective':
      return `directive at line ${line} is not recognized`;
    case 'InvalidIp':
      return `directive at line ${line} contains an invalid ip: ${cause?.message}`;
    case 'ExtraData':
      return `extra data at the end of line ${line}`;
  }
}
