/**
 * Parse options
 */

import { z } from 'zod';
import { ERROR_CODES, LIMITS } from '@pgpsig/kernel';
import { WireError } from '@pgpsig/wire';
import { logger as defaultLogger, type Logger } from './logger.js';

export const ParseOptionsSchema = z
  .object({
    /**
     * The buffer holds the whole packet body. Running out of bytes is then
     * malformed input rather than a request for more.
     */
    complete: z.boolean().default(false),
    /** How deep embedded signatures may nest */
    maxEmbeddedDepth: z
      .number()
      .int()
      .min(0)
      .max(LIMITS.maxEmbeddedDepthCeiling)
      .default(LIMITS.maxEmbeddedDepth),
  })
  .strict();

export type ParseOptions = z.input<typeof ParseOptionsSchema> & {
  /** Destination for parser diagnostics (defaults to the module logger) */
  logger?: Logger;
};

export type ResolvedParseOptions = z.output<typeof ParseOptionsSchema> & {
  logger: Logger;
};

/**
 * Validate options and fill in defaults.
 */
export function resolveParseOptions(options: ParseOptions = {}): ResolvedParseOptions {
  const { logger, ...rest } = options;
  const result = ParseOptionsSchema.safeParse(rest);
  if (!result.success) {
    const path = result.error.issues[0]?.path ?? [];
    throw new WireError(
      ERROR_CODES.E_INVALID_OPTIONS,
      ['options', ...path].join('.'),
      `Invalid parse options: ${result.error.issues.map((i) => i.message).join('; ')}`,
      { cause: result.error }
    );
  }
  return { ...result.data, logger: logger ?? defaultLogger };
}
