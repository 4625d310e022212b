/**
 * Read commonly needed values off a parsed signature.
 *
 * V2/V3 signatures carry creation time and issuer in their fixed header.
 * V4/V5 signatures carry them in subpackets: the creation time must be in
 * the hashed area, the issuer may be in either.
 */

import type { KeyId } from '@pgpsig/wire';
import type { Signature, Subpacket, SubpacketArea, SubpacketKind, SubpacketOf } from './types.js';

function isKind<K extends SubpacketKind>(type: K) {
  return (subpacket: Subpacket): subpacket is SubpacketOf<K> => subpacket.type === type;
}

function areaOf(signature: Signature, area: SubpacketArea): readonly Subpacket[] {
  return area === 'hashed' ? signature.hashedSubpackets : signature.unhashedSubpackets;
}

/**
 * All subpackets of one kind, hashed area first.
 */
export function findSubpackets<K extends SubpacketKind>(
  signature: Signature,
  type: K,
  areas: readonly SubpacketArea[] = ['hashed', 'unhashed']
): SubpacketOf<K>[] {
  return areas.flatMap((area) => areaOf(signature, area).filter(isKind(type)));
}

/**
 * First subpacket of one kind, hashed area first.
 */
export function findSubpacket<K extends SubpacketKind>(
  signature: Signature,
  type: K,
  areas: readonly SubpacketArea[] = ['hashed', 'unhashed']
): SubpacketOf<K> | undefined {
  return findSubpackets(signature, type, areas)[0];
}

export function signatureCreationTime(signature: Signature): Date | undefined {
  return signature.created ?? findSubpacket(signature, 'SignatureCreationTime', ['hashed'])?.created;
}

export function signatureIssuer(signature: Signature): KeyId | undefined {
  return signature.issuer ?? findSubpacket(signature, 'Issuer')?.keyId;
}

export function signatureIssuerFingerprint(signature: Signature): Uint8Array | undefined {
  return findSubpacket(signature, 'IssuerFingerprint')?.fingerprint;
}

/**
 * Absolute expiry: creation time plus the expiration offset.
 * A zero offset means the signature does not expire.
 */
export function signatureExpirationTime(signature: Signature): Date | undefined {
  const created = signatureCreationTime(signature);
  const expiration = findSubpacket(signature, 'SignatureExpirationTime', ['hashed']);
  if (created === undefined || expiration === undefined) {
    return undefined;
  }
  const offset = expiration.expires.getTime();
  return offset === 0 ? undefined : new Date(created.getTime() + offset);
}
