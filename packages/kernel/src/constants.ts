/**
 * OpenPGP Signature Constants
 * Closed code tables from RFC 4880 and draft-ietf-openpgp-rfc4880bis.
 *
 * Each table maps a stable name to its wire code. The matching union type
 * (e.g. `HashAlgorithm`) is the set of codes a parsed value may hold.
 */

/**
 * Outer packet framing the signature body arrived in.
 * Carried through as metadata; embedded signatures are always 'new'.
 */
export const PACKET_VERSIONS = ['old', 'new'] as const;

export type PacketVersion = (typeof PACKET_VERSIONS)[number];

/**
 * Signature body versions
 */
export const SIGNATURE_VERSIONS = {
  V2: 2,
  V3: 3,
  V4: 4,
  V5: 5,
} as const;

export type SignatureVersion = (typeof SIGNATURE_VERSIONS)[keyof typeof SIGNATURE_VERSIONS];

/**
 * Key versions, as referenced by issuer fingerprints
 */
export const KEY_VERSIONS = {
  V2: 2,
  V3: 3,
  V4: 4,
  V5: 5,
} as const;

export type KeyVersion = (typeof KEY_VERSIONS)[keyof typeof KEY_VERSIONS];

/**
 * Signature types (RFC 4880 §5.2.1)
 */
export const SIGNATURE_TYPES = {
  Binary: 0x00,
  Text: 0x01,
  Standalone: 0x02,
  CertGeneric: 0x10,
  CertPersona: 0x11,
  CertCasual: 0x12,
  CertPositive: 0x13,
  SubkeyBinding: 0x18,
  KeyBinding: 0x19,
  Key: 0x1f,
  KeyRevocation: 0x20,
  SubkeyRevocation: 0x28,
  CertRevocation: 0x30,
  Timestamp: 0x40,
  ThirdParty: 0x50,
} as const;

export type SignatureType = (typeof SIGNATURE_TYPES)[keyof typeof SIGNATURE_TYPES];

/**
 * Public-key algorithms (RFC 4880 §9.1), including the private/experimental range
 */
export const PUBLIC_KEY_ALGORITHMS = {
  RSA: 1,
  RSAEncrypt: 2,
  RSASign: 3,
  ElgamalSign: 16,
  DSA: 17,
  ECDH: 18,
  ECDSA: 19,
  Elgamal: 20,
  DiffieHellman: 21,
  EdDSA: 22,
  Private100: 100,
  Private101: 101,
  Private102: 102,
  Private103: 103,
  Private104: 104,
  Private105: 105,
  Private106: 106,
  Private107: 107,
  Private108: 108,
  Private109: 109,
  Private110: 110,
} as const;

export type PublicKeyAlgorithm =
  (typeof PUBLIC_KEY_ALGORITHMS)[keyof typeof PUBLIC_KEY_ALGORITHMS];

/**
 * Hash algorithms (RFC 4880 §9.4)
 */
export const HASH_ALGORITHMS = {
  None: 0,
  MD5: 1,
  SHA1: 2,
  RIPEMD160: 3,
  SHA256: 8,
  SHA384: 9,
  SHA512: 10,
  SHA224: 11,
  SHA3_256: 12,
  SHA3_512: 14,
  Private10: 110,
} as const;

export type HashAlgorithm = (typeof HASH_ALGORITHMS)[keyof typeof HASH_ALGORITHMS];

/**
 * Symmetric-key algorithms (RFC 4880 §9.2)
 */
export const SYMMETRIC_KEY_ALGORITHMS = {
  Plaintext: 0,
  IDEA: 1,
  TripleDES: 2,
  CAST5: 3,
  Blowfish: 4,
  AES128: 7,
  AES192: 8,
  AES256: 9,
  Twofish: 10,
  Camellia128: 11,
  Camellia192: 12,
  Camellia256: 13,
  Private10: 110,
} as const;

export type SymmetricKeyAlgorithm =
  (typeof SYMMETRIC_KEY_ALGORITHMS)[keyof typeof SYMMETRIC_KEY_ALGORITHMS];

/**
 * Compression algorithms (RFC 4880 §9.3)
 */
export const COMPRESSION_ALGORITHMS = {
  Uncompressed: 0,
  ZIP: 1,
  ZLIB: 2,
  BZip2: 3,
  Private10: 110,
} as const;

export type CompressionAlgorithm =
  (typeof COMPRESSION_ALGORITHMS)[keyof typeof COMPRESSION_ALGORITHMS];

/**
 * AEAD algorithms (rfc4880bis §9.6)
 */
export const AEAD_ALGORITHMS = {
  None: 0,
  EAX: 1,
  OCB: 2,
} as const;

export type AeadAlgorithm = (typeof AEAD_ALGORITHMS)[keyof typeof AEAD_ALGORITHMS];

/**
 * Revocation key class octet (RFC 4880 §5.2.3.15).
 * 0x80 must be set; 0x40 marks the relation as sensitive.
 */
export const REVOCATION_KEY_CLASSES = {
  Default: 0x80,
  Sensitive: 0xc0,
} as const;

export type RevocationKeyClass =
  (typeof REVOCATION_KEY_CLASSES)[keyof typeof REVOCATION_KEY_CLASSES];

/**
 * Reason-for-revocation codes (RFC 4880 §5.2.3.23)
 */
export const REVOCATION_CODES = {
  NoReason: 0,
  KeySuperseded: 1,
  KeyCompromised: 2,
  KeyRetired: 3,
  CertUserIdInvalid: 32,
  Private100: 100,
  Private101: 101,
  Private102: 102,
  Private103: 103,
  Private104: 104,
  Private105: 105,
  Private106: 106,
  Private107: 107,
  Private108: 108,
  Private109: 109,
  Private110: 110,
} as const;

export type RevocationCode = (typeof REVOCATION_CODES)[keyof typeof REVOCATION_CODES];

/**
 * Signature subpacket type codes (RFC 4880 §5.2.3.1, rfc4880bis)
 *
 * Codes outside this table are kept verbatim: 100..110 as experimental,
 * everything else as other.
 */
export const SUBPACKET_TYPES = {
  SignatureCreationTime: 2,
  SignatureExpirationTime: 3,
  ExportableCertification: 4,
  TrustSignature: 5,
  RegularExpression: 6,
  Revocable: 7,
  KeyExpirationTime: 9,
  PreferredSymmetricAlgorithms: 11,
  RevocationKey: 12,
  Issuer: 16,
  Notation: 20,
  PreferredHashAlgorithms: 21,
  PreferredCompressionAlgorithms: 22,
  KeyServerPreferences: 23,
  PreferredKeyServer: 24,
  PrimaryUserId: 25,
  PolicyUri: 26,
  KeyFlags: 27,
  SignersUserId: 28,
  RevocationReason: 29,
  Features: 30,
  SignatureTarget: 31,
  EmbeddedSignature: 32,
  IssuerFingerprint: 33,
  PreferredAeadAlgorithms: 34,
} as const;

export type KnownSubpacketType = keyof typeof SUBPACKET_TYPES;

/**
 * Subpacket codes reserved for private or experimental use
 */
export const EXPERIMENTAL_SUBPACKET_RANGE = { min: 100, max: 110 } as const;

/** Bit 7 of the subpacket type octet */
export const SUBPACKET_CRITICAL_BIT = 0x80;

/**
 * Public-key algorithms whose signature value is a single MPI
 */
export const RSA_FAMILY: readonly PublicKeyAlgorithm[] = [
  PUBLIC_KEY_ALGORITHMS.RSA,
  PUBLIC_KEY_ALGORITHMS.RSAEncrypt,
  PUBLIC_KEY_ALGORITHMS.RSASign,
];

/**
 * Public-key algorithms whose signature value is an (r, s) pair of MPIs
 */
export const DSA_FAMILY: readonly PublicKeyAlgorithm[] = [
  PUBLIC_KEY_ALGORITHMS.DSA,
  PUBLIC_KEY_ALGORITHMS.ECDSA,
  PUBLIC_KEY_ALGORITHMS.EdDSA,
];

/**
 * Fingerprint sizes per key version
 */
export const FINGERPRINT_LENGTHS = {
  [KEY_VERSIONS.V4]: 20,
  [KEY_VERSIONS.V5]: 32,
} as const;

/** Length octet of the legacy (V2/V3) hashed material block */
export const LEGACY_HASHED_LENGTH = 5;

export const KEY_ID_LENGTH = 8;

/**
 * Parser limits
 */
export const LIMITS = {
  /** Default nesting allowed for embedded signature subpackets */
  maxEmbeddedDepth: 8,
  /** Highest value accepted for the maxEmbeddedDepth option */
  maxEmbeddedDepthCeiling: 32,
  /** Largest MPI accepted from the wire, in bits */
  maxMpiBits: 16384,
} as const;
