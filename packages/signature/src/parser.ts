/**
 * Parser for OpenPGP Signature packet bodies (RFC 4880 §5.2).
 *
 * The version octet selects one of two body grammars:
 *   V2/V3  fixed header with creation time and issuer, no subpackets
 *   V4/V5  hashed and unhashed subpacket areas
 * Both end in the truncated hash and the algorithm-keyed signature value.
 */

import {
  ERROR_CODES,
  HASH_ALGORITHMS,
  LEGACY_HASHED_LENGTH,
  PUBLIC_KEY_ALGORITHMS,
  SIGNATURE_TYPES,
  SIGNATURE_VERSIONS,
  fromCode,
  type PacketVersion,
  type SignatureVersion,
} from '@pgpsig/kernel';
import { ByteReader, KeyId, WireError, readCode, readTimestamp } from '@pgpsig/wire';
import { rootContext, type ParseContext } from './context.js';
import { toParseFailure, type ParseSignatureResult } from './errors.js';
import { resolveParseOptions, type ParseOptions } from './options.js';
import { readSignatureValue } from './signature-value.js';
import { readSubpackets } from './subpackets.js';
import type { Signature, Subpacket } from './types.js';

function readVersion(reader: ByteReader): SignatureVersion {
  const octet = reader.u8('version');
  const version = fromCode(SIGNATURE_VERSIONS, octet);
  if (version === undefined) {
    throw new WireError(
      ERROR_CODES.E_MALFORMED,
      'version',
      `version: unsupported signature version ${octet}`
    );
  }
  return version;
}

function readSignedHashPrefix(reader: ByteReader): readonly [number, number] {
  const prefix = reader.take(2, 'signedHashPrefix');
  return [prefix[0], prefix[1]];
}

/**
 * V2/V3 body (RFC 4880 §5.2.2)
 */
function readLegacyBody(
  reader: ByteReader,
  packetVersion: PacketVersion,
  version: SignatureVersion
): Signature {
  // One-octet length of following hashed material. MUST be 5.
  reader.expect([LEGACY_HASHED_LENGTH], 'hashedLength');
  const signatureType = readCode(reader, SIGNATURE_TYPES, 'signatureType');
  const created = readTimestamp(reader, 'created');
  const issuer = KeyId.read(reader, 'issuer');
  const publicKeyAlgorithm = readCode(reader, PUBLIC_KEY_ALGORITHMS, 'publicKeyAlgorithm');
  const hashAlgorithm = readCode(reader, HASH_ALGORITHMS, 'hashAlgorithm');
  const signedHashPrefix = readSignedHashPrefix(reader);
  const signatureValue = readSignatureValue(reader, publicKeyAlgorithm, 'signatureValue');

  return {
    packetVersion,
    version,
    signatureType,
    publicKeyAlgorithm,
    hashAlgorithm,
    signedHashPrefix,
    signatureValue,
    hashedSubpackets: [],
    unhashedSubpackets: [],
    created,
    issuer,
  };
}

function readSubpacketArea(reader: ByteReader, ctx: ParseContext, field: string): Subpacket[] {
  const length = reader.u16(`${field}.length`);
  const area = reader.slice(length, field);
  return readSubpackets(area, ctx, field);
}

/**
 * V4/V5 body (RFC 4880 §5.2.3)
 */
function readModernBody(
  reader: ByteReader,
  packetVersion: PacketVersion,
  version: SignatureVersion,
  ctx: ParseContext
): Signature {
  const signatureType = readCode(reader, SIGNATURE_TYPES, 'signatureType');
  const publicKeyAlgorithm = readCode(reader, PUBLIC_KEY_ALGORITHMS, 'publicKeyAlgorithm');
  const hashAlgorithm = readCode(reader, HASH_ALGORITHMS, 'hashAlgorithm');
  const hashedSubpackets = readSubpacketArea(reader, ctx, 'hashedSubpackets');
  const unhashedSubpackets = readSubpacketArea(reader, ctx, 'unhashedSubpackets');
  const signedHashPrefix = readSignedHashPrefix(reader);
  const signatureValue = readSignatureValue(reader, publicKeyAlgorithm, 'signatureValue');

  return {
    packetVersion,
    version,
    signatureType,
    publicKeyAlgorithm,
    hashAlgorithm,
    signedHashPrefix,
    signatureValue,
    hashedSubpackets,
    unhashedSubpackets,
  };
}

/**
 * Read one signature body from the cursor, leaving any following bytes
 * unread. This is also the re-entry point for embedded signatures.
 */
export function readSignature(
  reader: ByteReader,
  packetVersion: PacketVersion,
  ctx: ParseContext
): Signature {
  const version = readVersion(reader);
  ctx.log.debug({ version, packetVersion }, 'parsing signature');

  switch (version) {
    case SIGNATURE_VERSIONS.V2:
    case SIGNATURE_VERSIONS.V3:
      return readLegacyBody(reader, packetVersion, version);
    case SIGNATURE_VERSIONS.V4:
    case SIGNATURE_VERSIONS.V5:
      return readModernBody(reader, packetVersion, version, ctx);
  }
}

/**
 * Parse a Signature packet body.
 *
 * The input is read as a stream unless `options.complete` is set: running
 * out of bytes throws a WireError with code E_INCOMPLETE and the number of
 * missing bytes, so an incremental caller can retry with more input.
 * Bytes left after the signature value are malformed.
 *
 * @param input - Packet body, framing already stripped
 * @param packetVersion - Framing of the enclosing packet, carried through as metadata
 * @param options - Parse options
 * @returns The parsed signature
 * @throws WireError on any grammar violation
 */
export function parseSignature(
  input: Uint8Array,
  packetVersion: PacketVersion = 'new',
  options?: ParseOptions
): Signature {
  const resolved = resolveParseOptions(options);
  const reader = new ByteReader(input, resolved.complete);
  const signature = readSignature(reader, packetVersion, rootContext(resolved));
  if (!reader.isEmpty()) {
    throw new WireError(
      ERROR_CODES.E_MALFORMED,
      'signatureValue',
      `${reader.remaining} unexpected byte(s) after the signature value`
    );
  }
  return signature;
}

/**
 * Parse a Signature packet body without throwing.
 */
export function safeParseSignature(
  input: Uint8Array,
  packetVersion: PacketVersion = 'new',
  options?: ParseOptions
): ParseSignatureResult {
  try {
    return { ok: true, signature: parseSignature(input, packetVersion, options) };
  } catch (err) {
    return { ok: false, error: toParseFailure(err) };
  }
}

/**
 * Parse a bare subpacket sequence, e.g. one subpacket area.
 *
 * Unless `options.complete` is set, a subpacket that runs past the end of
 * the buffer is reported as E_INCOMPLETE.
 */
export function parseSubpackets(input: Uint8Array, options?: ParseOptions): Subpacket[] {
  const resolved = resolveParseOptions(options);
  const reader = new ByteReader(input, resolved.complete);
  return readSubpackets(reader, rootContext(resolved), 'subpackets');
}
