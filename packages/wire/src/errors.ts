/**
 * Typed errors for wire decoding
 *
 * Codes come from the kernel registry. `field` is the dotted path of the
 * value being read when decoding stopped, so callers can tell which
 * header field or subpacket failed without parsing the message.
 */

import { isRetriable, type ErrorCode } from '@pgpsig/kernel';

export interface WireErrorDetails {
  /** Bytes still missing, for E_INCOMPLETE */
  needed?: number;
  cause?: unknown;
}

export class WireError extends Error {
  readonly code: ErrorCode;
  readonly field: string;
  readonly needed?: number;
  readonly retriable: boolean;

  constructor(code: ErrorCode, field: string, message: string, details: WireErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'WireError';
    this.code = code;
    this.field = field;
    this.needed = details.needed;
    this.retriable = isRetriable(code);
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, WireError.prototype);
  }
}

/**
 * Check if a value is a WireError with the given code
 */
export function isWireError(err: unknown, code?: ErrorCode): err is WireError {
  return err instanceof WireError && (code === undefined || err.code === code);
}
