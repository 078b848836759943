import { describe, expect, test } from 'vitest';
import { ParseError } from './errors.js';
import {
  decodeLine,
  isCommentLine,
  splitLines,
  splitTokens,
  tokenize,
} from './tokenizer.js';

const encoder = new TextEncoder();

describe('splitLines', () => {
  test('splits on newlines', () => {
    const lines = splitLines(encoder.encode('a\nbc\n'));
    expect(lines.map((line) => new TextDecoder().decode(line))).toEqual([
      'a',
      'bc',
      '',
    ]);
  });

  test('returns a single line without newlines', () => {
    expect(splitLines(encoder.encode('domain x'))).toHaveLength(1);
    expect(splitLines(new Uint8Array())).toHaveLength(1);
  });

  test('keeps carriage returns in the line', () => {
    const [line] = splitLines(encoder.encode('a\r\nb'));
    expect(line).toEqual(new Uint8Array([0x61, 0x0d]));
  });
});

describe('isCommentLine', () => {
  test('detects comments after spaces and tabs', () => {
    expect(isCommentLine(encoder.encode('# comment'))).toBe(true);
    expect(isCommentLine(encoder.encode('; comment'))).toBe(true);
    expect(isCommentLine(encoder.encode(' \t #'))).toBe(true);
  });

  test('ignores lines starting with a directive', () => {
    expect(isCommentLine(encoder.encode('nameserver 192.0.2.1 # x'))).toBe(
      false
    );
    expect(isCommentLine(encoder.encode('  domain example.com'))).toBe(false);
  });

  test('only skips spaces and tabs', () => {
    expect(isCommentLine(encoder.encode('\r# comment'))).toBe(false);
  });

  test('treats empty lines as non-comments', () => {
    expect(isCommentLine(new Uint8Array())).toBe(false);
    expect(isCommentLine(encoder.encode('   '))).toBe(false);
  });
});

describe('decodeLine', () => {
  test('decodes valid UTF-8', () => {
    expect(decodeLine(encoder.encode('search exämple.com'), 0)).toEqual({
      ok: true,
      value: 'search exämple.com',
    });
  });

  test('reports invalid UTF-8 with the line number', () => {
    const result = decodeLine(new Uint8Array([0x64, 0xff, 0x20]), 3);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ParseError);
      expect(result.error.kind).toBe('InvalidUtf8');
      expect(result.error.line).toBe(3);
      expect(result.error.cause).toBeInstanceOf(TypeError);
    }
  });
});

describe('splitTokens', () => {
  test('splits on runs of whitespace', () => {
    expect(splitTokens('  search\ta   b \r')).toEqual(['search', 'a', 'b']);
  });

  test('drops inline comments', () => {
    expect(splitTokens('nameserver 192.0.2.1 # primary')).toEqual([
      'nameserver',
      '192.0.2.1',
    ]);
    expect(splitTokens('search a;b c')).toEqual(['search', 'a']);
    expect(splitTokens('domain example.com#x')).toEqual([
      'domain',
      'example.com',
    ]);
  });

  test('returns no tokens for blank lines', () => {
    expect(splitTokens('')).toEqual([]);
    expect(splitTokens(' \t ')).toEqual([]);
  });
});

describe('tokenize', () => {
  test('keeps source line numbers', () => {
    const result = tokenize(
      encoder.encode('# header\n\nnameserver 192.0.2.1\n  \ndomain x\n')
    );

    expect(result).toEqual({
      ok: true,
      value: [
        { line: 2, tokens: ['nameserver', '192.0.2.1'] },
        { line: 4, tokens: ['domain', 'x'] },
      ],
    });
  });

  test('skips comment lines with invalid UTF-8', () => {
    const data = new Uint8Array([
      ...encoder.encode('  # '),
      0xff,
      0xfe,
      0x0a,
      ...encoder.encode('search a'),
    ]);

    expect(tokenize(data)).toEqual({
      ok: true,
      value: [{ line: 1, tokens: ['search', 'a'] }],
    });
  });

  test('rejects invalid UTF-8 outside comments', () => {
    const data = new Uint8Array([
      ...encoder.encode('search a\nsearch '),
      0xc3,
      0x28,
    ]);
    const result = tokenize(data);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('InvalidUtf8');
      expect(result.error.line).toBe(1);
    }
  });

  test('rejects invalid UTF-8 in a trailing comment', () => {
    const data = new Uint8Array([...encoder.encode('search a # '), 0xff]);
    const result = tokenize(data);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('InvalidUtf8');
      expect(result.error.line).toBe(0);
    }
  });
});
