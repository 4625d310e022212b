/**
 * Canonical wire encoding of parsed signatures and subpackets.
 *
 * Lengths use their shortest form and MPIs drop leading zeros, so any
 * canonically encoded input serializes back to the same bytes.
 */

import {
  ERROR_CODES,
  LEGACY_HASHED_LENGTH,
  SUBPACKET_CRITICAL_BIT,
  SUBPACKET_TYPES,
  SIGNATURE_VERSIONS,
} from '@pgpsig/kernel';
import {
  ByteWriter,
  WireError,
  encodeText,
  writeLength,
  writeMpi,
  writeTimestamp,
} from '@pgpsig/wire';
import type { Signature, Subpacket, SubpacketData } from './types.js';

function subpacketTag(subpacket: Subpacket): number {
  if (subpacket.type === 'Experimental' || subpacket.type === 'Other') {
    return subpacket.code;
  }
  const code = SUBPACKET_TYPES[subpacket.type];
  return subpacket.critical ? code | SUBPACKET_CRITICAL_BIT : code;
}

function writeSubpacketBody(writer: ByteWriter, data: SubpacketData): void {
  switch (data.type) {
    case 'SignatureCreationTime':
      writeTimestamp(writer, data.created);
      return;
    case 'SignatureExpirationTime':
    case 'KeyExpirationTime':
      writeTimestamp(writer, data.expires);
      return;
    case 'ExportableCertification':
      writer.u8(data.exportable ? 1 : 0);
      return;
    case 'Revocable':
      writer.u8(data.revocable ? 1 : 0);
      return;
    case 'PrimaryUserId':
      writer.u8(data.primary ? 1 : 0);
      return;
    case 'TrustSignature':
      writer.u8(data.depth).u8(data.value);
      return;
    case 'RegularExpression':
      writer.bytes(encodeText(data.pattern));
      return;
    case 'PreferredKeyServer':
    case 'PolicyUri':
      writer.bytes(encodeText(data.uri));
      return;
    case 'SignersUserId':
      writer.bytes(encodeText(data.userId));
      return;
    case 'PreferredSymmetricAlgorithms':
    case 'PreferredHashAlgorithms':
    case 'PreferredCompressionAlgorithms':
    case 'PreferredAeadAlgorithms':
      writer.bytes(data.algorithms);
      return;
    case 'KeyServerPreferences':
    case 'KeyFlags':
    case 'Features':
      writer.bytes(data.flags);
      return;
    case 'RevocationKey': {
      const { keyClass, algorithm, fingerprint } = data.revocationKey;
      writer.u8(keyClass).u8(algorithm).bytes(fingerprint);
      return;
    }
    case 'Issuer':
      writer.bytes(data.keyId.bytes);
      return;
    case 'Notation': {
      const name = encodeText(data.notation.name);
      const value = encodeText(data.notation.value);
      writer
        .u8(data.notation.readable ? 0x80 : 0)
        .bytes([0, 0, 0])
        .u16(name.length)
        .u16(value.length)
        .bytes(name)
        .bytes(value);
      return;
    }
    case 'RevocationReason':
      writer.u8(data.code).bytes(encodeText(data.reason));
      return;
    case 'SignatureTarget':
      writer.u8(data.publicKeyAlgorithm).u8(data.hashAlgorithm).bytes(data.hash);
      return;
    case 'EmbeddedSignature':
      writer.bytes(serializeSignature(data.signature));
      return;
    case 'IssuerFingerprint':
      writer.u8(data.keyVersion).bytes(data.fingerprint);
      return;
    case 'Experimental':
    case 'Other':
      writer.bytes(data.data);
      return;
    default: {
      const unreachable: never = data;
      throw new Error(`Unhandled subpacket ${JSON.stringify(unreachable)}`);
    }
  }
}

export function serializeSubpacket(subpacket: Subpacket): Uint8Array {
  const body = new ByteWriter();
  writeSubpacketBody(body, subpacket);

  const writer = new ByteWriter();
  writeLength(writer, body.length + 1);
  writer.u8(subpacketTag(subpacket)).bytes(body.finish());
  return writer.finish();
}

export function serializeSubpackets(subpackets: readonly Subpacket[]): Uint8Array {
  const writer = new ByteWriter();
  for (const subpacket of subpackets) {
    writer.bytes(serializeSubpacket(subpacket));
  }
  return writer.finish();
}

function writeSubpacketArea(writer: ByteWriter, subpackets: readonly Subpacket[], field: string): void {
  const area = serializeSubpackets(subpackets);
  if (area.length > 0xffff) {
    throw new WireError(
      ERROR_CODES.E_MALFORMED,
      field,
      `${field}: ${area.length} bytes do not fit a two-octet area length`
    );
  }
  writer.u16(area.length).bytes(area);
}

/**
 * Encode a signature body (the packet body, without framing).
 */
export function serializeSignature(signature: Signature): Uint8Array {
  const writer = new ByteWriter();
  writer.u8(signature.version);

  if (signature.version === SIGNATURE_VERSIONS.V2 || signature.version === SIGNATURE_VERSIONS.V3) {
    const { created, issuer } = signature;
    if (created === undefined || issuer === undefined) {
      throw new WireError(
        ERROR_CODES.E_MALFORMED,
        created === undefined ? 'created' : 'issuer',
        'V2/V3 signatures carry creation time and issuer in the fixed header'
      );
    }
    writer.u8(LEGACY_HASHED_LENGTH).u8(signature.signatureType);
    writeTimestamp(writer, created);
    writer
      .bytes(issuer.bytes)
      .u8(signature.publicKeyAlgorithm)
      .u8(signature.hashAlgorithm);
  } else {
    writer
      .u8(signature.signatureType)
      .u8(signature.publicKeyAlgorithm)
      .u8(signature.hashAlgorithm);
    writeSubpacketArea(writer, signature.hashedSubpackets, 'hashedSubpackets');
    writeSubpacketArea(writer, signature.unhashedSubpackets, 'unhashedSubpackets');
  }

  writer.bytes(signature.signedHashPrefix);
  for (const mpi of signature.signatureValue) {
    writeMpi(writer, mpi);
  }
  return writer.finish();
}
