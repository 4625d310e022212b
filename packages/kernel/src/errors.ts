/**
 * Parser Error Codes
 *
 * E_INCOMPLETE is the only retriable failure: the input ended before a
 * declared boundary and more bytes may still arrive. Every other code
 * describes bytes that no amount of further input can fix.
 */

import type { ErrorDefinition } from './types.js';

/**
 * Error code constants
 */
export const ERROR_CODES = {
  E_INCOMPLETE: 'E_INCOMPLETE',
  E_MALFORMED: 'E_MALFORMED',
  E_UNKNOWN_CODE: 'E_UNKNOWN_CODE',
  E_UNSUPPORTED_RECURSION: 'E_UNSUPPORTED_RECURSION',
  E_INVALID_OPTIONS: 'E_INVALID_OPTIONS',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Error definitions map
 */
export const ERRORS: Record<ErrorCode, ErrorDefinition> = {
  E_INCOMPLETE: {
    code: 'E_INCOMPLETE',
    title: 'Incomplete Input',
    description: 'Input ended before a declared length was satisfied; retry with more bytes',
    retriable: true,
    category: 'input',
  },
  E_MALFORMED: {
    code: 'E_MALFORMED',
    title: 'Malformed Input',
    description:
      'Input violates the packet grammar (bad literal, bad length arithmetic, invalid text, short length-bounded field)',
    retriable: false,
    category: 'validation',
  },
  E_UNKNOWN_CODE: {
    code: 'E_UNKNOWN_CODE',
    title: 'Unknown Code',
    description: 'A fixed-enumeration field holds a value outside its known set',
    retriable: false,
    category: 'validation',
  },
  E_UNSUPPORTED_RECURSION: {
    code: 'E_UNSUPPORTED_RECURSION',
    title: 'Nesting Too Deep',
    description: 'Embedded signatures are nested deeper than the configured limit',
    retriable: false,
    category: 'limits',
  },
  E_INVALID_OPTIONS: {
    code: 'E_INVALID_OPTIONS',
    title: 'Invalid Options',
    description: 'Parser options failed validation',
    retriable: false,
    category: 'configuration',
  },
};

function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ERRORS, code);
}

/**
 * Get error definition by code
 */
export function getError(code: string): ErrorDefinition | undefined {
  return isErrorCode(code) ? ERRORS[code] : undefined;
}

/**
 * Check if error is retriable
 */
export function isRetriable(code: string): boolean {
  return getError(code)?.retriable ?? false;
}
