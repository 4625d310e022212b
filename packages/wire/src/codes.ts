/**
 * Reading fixed-enumeration fields
 */

import { ERROR_CODES, fromCode, type CodeTable } from '@pgpsig/kernel';
import { WireError } from './errors.js';
import type { ByteReader } from './reader.js';

/**
 * Validate a raw octet against a code table.
 * Codes outside the table are fatal, never defaulted.
 */
export function requireCode<T extends CodeTable>(table: T, code: number, field: string): T[keyof T] {
  const known = fromCode(table, code);
  if (known === undefined) {
    throw new WireError(ERROR_CODES.E_UNKNOWN_CODE, field, `${field}: unknown code ${code}`);
  }
  return known;
}

/**
 * Read one octet and validate it against a code table.
 */
export function readCode<T extends CodeTable>(reader: ByteReader, table: T, field: string): T[keyof T] {
  return requireCode(table, reader.u8(field), field);
}
