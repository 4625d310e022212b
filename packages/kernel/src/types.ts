/**
 * Kernel Types
 * Shared type definitions for kernel exports
 */

import type { KnownSubpacketType } from './constants.js';

/**
 * Error code definition
 */
export interface ErrorDefinition {
  code: string;
  title: string;
  description: string;
  retriable: boolean;
  category: 'input' | 'validation' | 'limits' | 'configuration';
}

/**
 * A name -> wire code table
 */
export type CodeTable = Readonly<Record<string, number>>;

/**
 * Result of classifying a subpacket type octet
 */
export type SubpacketTag =
  | { kind: 'known'; type: KnownSubpacketType; code: number; critical: boolean }
  /** `code` is the type octet as read, critical bit included */
  | { kind: 'experimental'; code: number; critical: boolean }
  | { kind: 'other'; code: number; critical: boolean };
