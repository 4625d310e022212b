/**
 * Result shapes for the non-throwing parse entry point.
 */

import { ERROR_CODES, type ErrorCode } from '@pgpsig/kernel';
import { WireError } from '@pgpsig/wire';
import type { Signature } from './types.js';

/**
 * Parse failure with its registry code
 */
export interface SignatureParseFailure {
  code: ErrorCode;
  /** Dotted path of the field that failed, e.g. hashedSubpackets[0].Issuer.keyId */
  field: string;
  message: string;
  /** True only for E_INCOMPLETE: retry once more bytes arrive */
  retriable: boolean;
  /** Missing byte count, for E_INCOMPLETE */
  needed?: number;
}

export type ParseSignatureResult =
  | { ok: true; signature: Signature }
  | { ok: false; error: SignatureParseFailure };

/**
 * Convert a thrown value into a failure record.
 * Anything that is not a WireError is a bug, not bad input, and is rethrown.
 */
export function toParseFailure(err: unknown): SignatureParseFailure {
  if (!(err instanceof WireError)) {
    throw err;
  }
  const failure: SignatureParseFailure = {
    code: err.code,
    field: err.field,
    message: err.message,
    retriable: err.retriable,
  };
  if (err.code === ERROR_CODES.E_INCOMPLETE && err.needed !== undefined) {
    failure.needed = err.needed;
  }
  return failure;
}
