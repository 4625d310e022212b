/**
 * @pgpsig/signature
 *
 * OpenPGP Signature packet parsing (RFC 4880 §5.2, rfc4880bis V5).
 * Turns an untrusted packet body into a typed Signature or a WireError
 * naming the field that failed.
 */

// Types
export type {
  Signature,
  Subpacket,
  SubpacketData,
  SubpacketDataOf,
  SubpacketKind,
  SubpacketOf,
  SubpacketArea,
  Notation,
  RevocationKey,
} from './types.js';

// Parser
export { parseSignature, safeParseSignature, parseSubpackets } from './parser.js';
export { SUBPACKET_GRAMMARS } from './subpackets.js';
export { signatureValueArity } from './signature-value.js';

// Options
export { ParseOptionsSchema, resolveParseOptions } from './options.js';
export type { ParseOptions, ResolvedParseOptions } from './options.js';

// Serialization
export { serializeSignature, serializeSubpacket, serializeSubpackets } from './serializer.js';

// Accessors
export {
  findSubpacket,
  findSubpackets,
  signatureCreationTime,
  signatureIssuer,
  signatureIssuerFingerprint,
  signatureExpirationTime,
} from './accessors.js';

// Errors
export { toParseFailure } from './errors.js';
export type { SignatureParseFailure, ParseSignatureResult } from './errors.js';
export { WireError, isWireError } from '@pgpsig/wire';
export { ERROR_CODES, isRetriable } from '@pgpsig/kernel';
export type { ErrorCode } from '@pgpsig/kernel';
