/**
 * Parses a string into an unsigned integer.
 *
 * Uses direct character code comparison instead of `parseInt`
 * for stricter validation.
 *
 * `parseInt` is too permissive and allows invalid input like
 * whitespace, signs, and decimals.
 *
 * Throws if invalid characters are encountered.
 */
export function parseUint(str: string): number {
  if (str.length === 0) {
    throw new Error('empty string');
  }

  let value = 0;
  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);

    if (char < 48 || char > 57) {
      // 0-9
      throw new Error('invalid character');
    }

    value = value * 10 + (char - 48);
  }

  return value;
}

/**
 * Parses a hex string into a number.
 *
 * Uses direct character code comparison instead of `parseInt`
 * for stricter validation.
 *
 * `parseInt` is too permissive and allows invalid hex characters
 * to slip through.
 *
 * Throws if invalid hex characters are encountered.
 */
export function parseHex(hex: string): number {
  if (hex.length === 0) {
    throw new Error('empty string');
  }

  let value = 0;
  for (let i = 0; i < hex.length; i++) {
    const char = hex.charCodeAt(i);
    let digit: number;

    if (char >= 48 && char <= 57) {
      // 0-9
      digit = char - 48;
    } else if (char >= 97 && char <= 102) {
      // a-f
      digit = char - 87;
    } else if (char >= 65 && char <= 70) {
      // A-F
      digit = char - 55;
    } else {
      throw new Error('invalid hex character');
    }

    value = value * 16 + digit;
  }

  return value;
}

/**
 * Counts the leading one bits of a big-endian mask.
 *
 * Returns `undefined` if the one bits are not a contiguous
 * left-aligned run.
 */
export function countPrefixLength(mask: Uint8Array): number | undefined {
  let length = 0;
  let seenZero = false;

  for (const byte of mask) {
    for (let bit = 7; bit >= 0; bit--) {
      if (byte & (1 << bit)) {
        if (seenZero) {
          return undefined;
        }
        length++;
      } else {
        seenZero = true;
      }
    }
  }

  return length;
}

/**
 * Generates a big-endian netmask of `byteLength` bytes from a mask size.
 */
export function generateNetmask(maskSize: number, byteLength = 4) {
  const mask = new Uint8Array(byteLength);

  for (let i = 0; i < maskSize; i++) {
    const byteIndex = Math.floor(i / 8);
    const bitIndex = 7 - (i % 8);
    const maskByte = mask[byteIndex];
    if (maskByte === undefined) {
      throw new Error('invalid mask size');
    }
    mask[byteIndex] = maskByte | (1 << bitIndex);
  }

  return mask;
}
