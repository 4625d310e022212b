/**
 * @pgpsig/signature - OpenPGP Signature packet types
 *
 * Parse products are plain immutable values: built once from bytes and
 * owned by the caller.
 */

import type {
  AeadAlgorithm,
  CompressionAlgorithm,
  HashAlgorithm,
  KeyVersion,
  KnownSubpacketType,
  PacketVersion,
  PublicKeyAlgorithm,
  RevocationCode,
  RevocationKeyClass,
  SignatureType,
  SignatureVersion,
  SymmetricKeyAlgorithm,
} from '@pgpsig/kernel';
import type { KeyId, Mpi } from '@pgpsig/wire';

/**
 * A parsed Signature packet body.
 */
export interface Signature {
  /** Framing of the packet this body came from (metadata only) */
  readonly packetVersion: PacketVersion;
  readonly version: SignatureVersion;
  readonly signatureType: SignatureType;
  readonly publicKeyAlgorithm: PublicKeyAlgorithm;
  readonly hashAlgorithm: HashAlgorithm;
  /** Left 16 bits of the signed hash, a quick-reject check */
  readonly signedHashPrefix: readonly [number, number];
  /** The signature value, one or more MPIs depending on the algorithm */
  readonly signatureValue: readonly Mpi[];
  readonly hashedSubpackets: readonly Subpacket[];
  readonly unhashedSubpackets: readonly Subpacket[];
  /**
   * Creation time from the fixed V2/V3 header. Unset for V4/V5, where it
   * lives in a SignatureCreationTime subpacket.
   */
  readonly created?: Date;
  /**
   * Issuer from the fixed V2/V3 header. Unset for V4/V5, where it lives in
   * an Issuer subpacket.
   */
  readonly issuer?: KeyId;
}

export interface Notation {
  /** Top bit of the first flag octet */
  readonly readable: boolean;
  readonly name: string;
  readonly value: string;
}

export interface RevocationKey {
  readonly keyClass: RevocationKeyClass;
  readonly algorithm: PublicKeyAlgorithm;
  /** Version of the key the fingerprint belongs to, from its length */
  readonly keyVersion: KeyVersion;
  readonly fingerprint: Uint8Array;
}

/**
 * Subpacket payloads, one variant per kind.
 */
export type SubpacketData =
  | { readonly type: 'SignatureCreationTime'; readonly created: Date }
  | { readonly type: 'SignatureExpirationTime'; readonly expires: Date }
  | { readonly type: 'ExportableCertification'; readonly exportable: boolean }
  | { readonly type: 'TrustSignature'; readonly depth: number; readonly value: number }
  | { readonly type: 'RegularExpression'; readonly pattern: string }
  | { readonly type: 'Revocable'; readonly revocable: boolean }
  | { readonly type: 'KeyExpirationTime'; readonly expires: Date }
  | {
      readonly type: 'PreferredSymmetricAlgorithms';
      readonly algorithms: readonly SymmetricKeyAlgorithm[];
    }
  | { readonly type: 'RevocationKey'; readonly revocationKey: RevocationKey }
  | { readonly type: 'Issuer'; readonly keyId: KeyId }
  | { readonly type: 'Notation'; readonly notation: Notation }
  | { readonly type: 'PreferredHashAlgorithms'; readonly algorithms: readonly HashAlgorithm[] }
  | {
      readonly type: 'PreferredCompressionAlgorithms';
      readonly algorithms: readonly CompressionAlgorithm[];
    }
  | { readonly type: 'KeyServerPreferences'; readonly flags: Uint8Array }
  | { readonly type: 'PreferredKeyServer'; readonly uri: string }
  | { readonly type: 'PrimaryUserId'; readonly primary: boolean }
  | { readonly type: 'PolicyUri'; readonly uri: string }
  | { readonly type: 'KeyFlags'; readonly flags: Uint8Array }
  | { readonly type: 'SignersUserId'; readonly userId: string }
  | { readonly type: 'RevocationReason'; readonly code: RevocationCode; readonly reason: string }
  | { readonly type: 'Features'; readonly flags: Uint8Array }
  | {
      readonly type: 'SignatureTarget';
      readonly publicKeyAlgorithm: PublicKeyAlgorithm;
      readonly hashAlgorithm: HashAlgorithm;
      readonly hash: Uint8Array;
    }
  | { readonly type: 'EmbeddedSignature'; readonly signature: Signature }
  | {
      readonly type: 'IssuerFingerprint';
      readonly keyVersion: KeyVersion;
      readonly fingerprint: Uint8Array;
    }
  | { readonly type: 'PreferredAeadAlgorithms'; readonly algorithms: readonly AeadAlgorithm[] }
  /** Catch-alls keep the type octet verbatim in `code`, critical bit included */
  | { readonly type: 'Experimental'; readonly code: number; readonly data: Uint8Array }
  | { readonly type: 'Other'; readonly code: number; readonly data: Uint8Array };

/**
 * A parsed subpacket. `critical` is bit 7 of the type octet.
 */
export type Subpacket = SubpacketData & { readonly critical: boolean };

export type SubpacketKind = Subpacket['type'];

/** Payload of one known subpacket kind */
export type SubpacketDataOf<K extends KnownSubpacketType> = Extract<SubpacketData, { type: K }>;

/** Full subpacket of one kind */
export type SubpacketOf<K extends SubpacketKind> = Extract<Subpacket, { type: K }>;

/**
 * Which subpacket area a subpacket was read from
 */
export type SubpacketArea = 'hashed' | 'unhashed';
