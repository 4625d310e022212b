/**
 * Four-octet timestamps: seconds since the Unix epoch, UTC
 */

import type { ByteReader } from './reader.js';
import type { ByteWriter } from './writer.js';

export function readTimestamp(reader: ByteReader, field: string): Date {
  return new Date(reader.u32(field) * 1000);
}

export function writeTimestamp(writer: ByteWriter, date: Date): void {
  writer.u32(Math.floor(date.getTime() / 1000));
}
