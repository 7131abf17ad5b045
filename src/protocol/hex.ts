/**
 * Hex helpers for logging and test fixtures.
 */

/**
 * Format bytes as lowercase hex without separators (e.g. "d40501").
 */
export function toHex(data: Uint8Array): string {
  let hex = '';
  for (const byte of data) {
    hex += byte.toString(16).padStart(2, '0');
  }
  return hex;
}

/**
 * Parse a hex string into bytes. Whitespace is ignored.
 *
 * @throws {Error} If the string has an odd length or non-hex characters
 */
export function fromHex(hex: string): Uint8Array {
  const clean = hex.replace(/\s+/g, '');
  if (clean.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(clean)) {
    throw new Error(`Invalid hex string: "${hex}"`);
  }

  const bytes = new Uint8Array(clean.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(clean.substring(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}
