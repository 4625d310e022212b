/**
 * OpenPGP signature kernel
 * Code tables, error registry and limits shared by the wire and signature packages
 *
 * @packageDocumentation
 */

// Export types
export type { ErrorDefinition, CodeTable, SubpacketTag } from './types.js';

// Export constants
export {
  PACKET_VERSIONS,
  SIGNATURE_VERSIONS,
  KEY_VERSIONS,
  SIGNATURE_TYPES,
  PUBLIC_KEY_ALGORITHMS,
  HASH_ALGORITHMS,
  SYMMETRIC_KEY_ALGORITHMS,
  COMPRESSION_ALGORITHMS,
  AEAD_ALGORITHMS,
  REVOCATION_KEY_CLASSES,
  REVOCATION_CODES,
  SUBPACKET_TYPES,
  EXPERIMENTAL_SUBPACKET_RANGE,
  SUBPACKET_CRITICAL_BIT,
  RSA_FAMILY,
  DSA_FAMILY,
  FINGERPRINT_LENGTHS,
  LEGACY_HASHED_LENGTH,
  KEY_ID_LENGTH,
  LIMITS,
} from './constants.js';
export type {
  PacketVersion,
  SignatureVersion,
  KeyVersion,
  SignatureType,
  PublicKeyAlgorithm,
  HashAlgorithm,
  SymmetricKeyAlgorithm,
  CompressionAlgorithm,
  AeadAlgorithm,
  RevocationKeyClass,
  RevocationCode,
  KnownSubpacketType,
} from './constants.js';

// Export lookups
export {
  isCodeOf,
  fromCode,
  codeName,
  subpacketCode,
  classifySubpacketTag,
} from './registries.js';

// Export errors
export { ERROR_CODES, ERRORS, getError, isRetriable } from './errors.js';
export type { ErrorCode } from './errors.js';
