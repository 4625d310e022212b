/**
 * State threaded through one parse: nesting depth and the active options.
 */

import type { Logger } from './logger.js';
import type { ResolvedParseOptions } from './options.js';

export interface ParseContext {
  /** 0 for the outermost signature, +1 per embedded signature */
  readonly depth: number;
  readonly options: ResolvedParseOptions;
  readonly log: Logger;
}

export function rootContext(options: ResolvedParseOptions): ParseContext {
  return { depth: 0, options, log: options.logger.child({ component: 'signature-parser' }) };
}

export function nestedContext(parent: ParseContext): ParseContext {
  const depth = parent.depth + 1;
  return { depth, options: parent.options, log: parent.log.child({ depth }) };
}
