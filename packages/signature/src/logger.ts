/**
 * Module logger
 *
 * Level comes from PGPSIG_LOG_LEVEL, then LOG_LEVEL. Callers that want the
 * parser's diagnostics in their own log stream pass a logger in the parse
 * options instead.
 */

import { pino, stdSerializers, type Logger } from 'pino';

export const logger: Logger = pino({
  name: 'pgpsig',
  level: process.env.PGPSIG_LOG_LEVEL || process.env.LOG_LEVEL || 'warn',
  serializers: {
    err: stdSerializers.err,
  },
});

export type { Logger };
