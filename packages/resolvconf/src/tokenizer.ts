import { ParseError } from './errors.js';
import { err, ok, type Result } from './types.js';

const NEWLINE = 0x0a; // \n
const SPACE = 0x20;
const TAB = 0x09;
const SEMICOLON = 0x3b; // ;
const HASH = 0x23; // #

export type TokenizedLine = {
  /**
   * 0-based index of the line in the input.
   */
  line: number;
  tokens: string[];
};

const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Splits the input into lines on `\n` bytes.
 *
 * Returns subarrays of the original input, without copying.
 */
export function splitLines(data: Uint8Array): Uint8Array[] {
  const lines: Uint8Array[] = [];
  let start = 0;

  for (let i = 0; i < data.length; i++) {
    if (data[i] === NEWLINE) {
      lines.push(data.subarray(start, i));
      start = i + 1;
    }
  }

  lines.push(data.subarray(start));
  return lines;
}

/**
 * Whether the first byte after leading spaces and tabs starts a comment.
 *
 * Works on raw bytes so comments may contain invalid UTF-8.
 */
export function isCommentLine(content: Uint8Array) {
  for (const byte of content) {
    if (byte === SPACE || byte === TAB) {
      continue;
    }
    return byte === SEMICOLON || byte === HASH;
  }
  return false;
}

/**
 * Decodes a line as UTF-8, reporting invalid sequences as `InvalidUtf8`.
 */
export function decodeLine(
  content: Uint8Array,
  line: number
): Result<string, ParseError> {
  try {
    return ok(decoder.decode(content));
  } catch (cause) {
    if (cause instanceof TypeError) {
      return err(new ParseError('InvalidUtf8', line, cause));
    }
    throw cause;
  }
}

/**
 * Drops an inline comment and splits the rest on whitespace.
 */
export function splitTokens(text: string): string[] {
  const commentStart = text.search(/[;#]/);
  const content = commentStart === -1 ? text : text.slice(0, commentStart);

  return content.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Tokenizes the input into non-empty lines of whitespace separated tokens.
 *
 * Stops at the first line that is not valid UTF-8.
 */
export function tokenize(
  data: Uint8Array
): Result<TokenizedLine[], ParseError> {
  const lines: TokenizedLine[] = [];

  for (const [line, content] of splitLines(data).entries()) {
    if (isCommentLine(content)) {
      continue;
    }

    const text = decodeLine(content, line);

    if (!text.ok) {
      return text;
    }

    const tokens = splitTokens(text.value);

    if (tokens.length > 0) {
      lines.push({ line, tokens });
    }
  }

  return ok(lines);
}
