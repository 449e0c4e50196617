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
 * Converts a 16-bit unsigned integer to a Uint8Array in Big Endian format.
 */
export function uint16ToBytesBE(value: number): Uint8Array {
  const buf: Uint8Array = new Uint8Array(2);
  buf[0] = (value >> 8) & 0xff;
  buf[1] = value & 0xff;
  return buf;
}

/**
 * Reads a Big Endian 16-bit unsigned integer. Missing bytes read as zero.
 * @param buf - The Uint8Array to read from.
 * @param offset - Offset of the high byte.
 */
export function bytesToUint16BE(buf: Uint8Array, offset: number = 0): number {
  return ((buf[offset] ?? 0) << 8) | (buf[offset + 1] ?? 0);
}

/**
 * Returns a view of part of the input array (shared buffer).
 */
export function sliceUint8Array(arr: Uint8Array, start: number, end?: number): Uint8Array {
  return arr.subarray(start, end);
}

/**
 * Converts a Uint8Array to a hex string (lookup table).
 * @param uint8arr - The Uint8Array to convert.
 * @returns A hex string representation of the input Uint8Array.
 */
export function toHex(uint8arr: Uint8Array): string {
  let hex = '';
  for (const b of uint8arr) {
    hex += (HEX_TABLE[(b >> 4) & 0xf] ?? '') + (HEX_TABLE[b & 0xf] ?? '');
  }
  return hex;
}
