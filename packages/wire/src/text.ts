/**
 * Strict UTF-8 text fields
 */

import { ERROR_CODES } from '@pgpsig/kernel';
import { WireError } from './errors.js';

const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
const encoder = new TextEncoder();

/**
 * Decode UTF-8 text; invalid sequences are malformed input.
 */
export function decodeText(bytes: Uint8Array, field: string): string {
  try {
    return decoder.decode(bytes);
  } catch (err) {
    throw new WireError(ERROR_CODES.E_MALFORMED, field, `${field}: invalid UTF-8 text`, {
      cause: err,
    });
  }
}

export function encodeText(text: string): Uint8Array {
  return encoder.encode(text);
}
