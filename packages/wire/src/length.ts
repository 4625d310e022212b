/**
 * OpenPGP scalar length codec (RFC 4880 §4.2.2, §5.2.3.1)
 *
 *   first octet < 192          one-octet length
 *   192 <= first octet < 255   two-octet length, 192..8383
 *   first octet == 255         four-octet big-endian length follows
 */

import type { ByteReader } from './reader.js';
import type { ByteWriter } from './writer.js';

export const ONE_OCTET_MAX = 191;
export const TWO_OCTET_MAX = 8383;
const FIVE_OCTET_MARKER = 255;

export function readLength(reader: ByteReader, field: string): number {
  const first = reader.u8(field);
  if (first < 192) {
    return first;
  }
  if (first < FIVE_OCTET_MARKER) {
    const second = reader.u8(field);
    return ((first - 192) << 8) + second + 192;
  }
  return reader.u32(field);
}

/**
 * Write the shortest encoding of `length`.
 */
export function writeLength(writer: ByteWriter, length: number): void {
  if (length <= ONE_OCTET_MAX) {
    writer.u8(length);
  } else if (length <= TWO_OCTET_MAX) {
    const value = length - 192;
    writer.u8((value >>> 8) + 192).u8(value & 0xff);
  } else {
    writer.u8(FIVE_OCTET_MARKER).u32(length);
  }
}
