// src/utils/utils.ts

const HEX_TABLE = '0123456789abcdef';

/**
 * Concatenates an array of Uint8Arrays into a single Uint8Array.
 * @param arrays - An array of Uint8Arrays to concatenate.
 * @returns A new Uint8Array containing all elements from the input arrays.
 */
export function concatUint8Arrays(arrays: Uint8Array[]): Uint8Array {
  const totalLength: number = arrays.reduce((sum: number, arr: Uint8Array) => sum + arr.length, 0);
  const result: Uint8Array = new Uint8Array(totalLength);
  let offset: number = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Creates a new zero-filled Uint8Array of the specified size.
 */
export function allocUint8Array(size: number): Uint8Array {
  return new Uint8Array(size);
}

/**
 * Converts a Uint8Array to a hex string (lookup table).
 */
export function toHex(uint8arr: Uint8Array): string {
  let hex = '';
  for (const b of uint8arr) {
    hex += (HEX_TABLE[(b >> 4) & 0xf] ?? '') + (HEX_TABLE[b & 0xf] ?? '');
  }
  return hex;
}

/**
 * Encodes a string as 7-bit ASCII.
 * @throws RangeError If the string holds a non-ASCII character
 */
export function encodeAscii(text: string): Uint8Array {
  const bytes = new Uint8Array(text.length);
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code > 0x7f) {
      throw new RangeError(`Non-ASCII character at index ${i}: ${JSON.stringify(text[i])}`);
    }
    bytes[i] = code;
  }
  return bytes;
}

/**
 * Decodes bytes as latin1 text, one character per byte.
 */
export function decodeAscii(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1');
}
