/**
 * Code table lookups
 *
 * `fromCode` is the validating direction (wire octet to known code);
 * `codeName` is the inverse used for diagnostics.
 */

import {
  EXPERIMENTAL_SUBPACKET_RANGE,
  SUBPACKET_CRITICAL_BIT,
  SUBPACKET_TYPES,
  type KnownSubpacketType,
} from './constants.js';
import type { CodeTable, SubpacketTag } from './types.js';

/**
 * Check whether a raw octet is one of the codes in a table.
 */
export function isCodeOf<T extends CodeTable>(table: T, code: number): code is T[keyof T] {
  return Object.values(table).includes(code);
}

/**
 * Look up a raw octet in a code table.
 * Returns undefined for codes the table does not define.
 */
export function fromCode<T extends CodeTable>(table: T, code: number): T[keyof T] | undefined {
  return isCodeOf(table, code) ? code : undefined;
}

/**
 * Name of a code within its table, e.g. codeName(HASH_ALGORITHMS, 8) === 'SHA256'
 */
export function codeName(table: CodeTable, code: number): string | undefined {
  for (const [name, value] of Object.entries(table)) {
    if (value === code) {
      return name;
    }
  }
  return undefined;
}

/**
 * Wire code of a known subpacket type
 */
export function subpacketCode(type: KnownSubpacketType): number {
  return SUBPACKET_TYPES[type];
}

function isKnownSubpacketType(name: string): name is KnownSubpacketType {
  return Object.prototype.hasOwnProperty.call(SUBPACKET_TYPES, name);
}

/**
 * Classify a subpacket type octet.
 *
 * Bit 7 is the critical flag; the remaining seven bits select the kind.
 * Every octet classifies: codes outside the table fall into the
 * experimental or other catch-all, which keep the raw octet as their code.
 */
export function classifySubpacketTag(tag: number): SubpacketTag {
  const critical = (tag & SUBPACKET_CRITICAL_BIT) !== 0;
  const code = tag & 0x7f;

  const name = codeName(SUBPACKET_TYPES, code);
  if (name !== undefined && isKnownSubpacketType(name)) {
    return { kind: 'known', type: name, code, critical };
  }

  if (code >= EXPERIMENTAL_SUBPACKET_RANGE.min && code <= EXPERIMENTAL_SUBPACKET_RANGE.max) {
    return { kind: 'experimental', code: tag, critical };
  }

  return { kind: 'other', code: tag, critical };
}
