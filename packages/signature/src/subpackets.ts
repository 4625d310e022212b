/**
 * Signature subpackets (RFC 4880 §5.2.3.1)
 *
 *   subpacket := length(1, 2 or 5 octets) type(1 octet) body(length - 1 octets)
 *
 * The dispatcher slices exactly the declared body and hands it to the
 * grammar for the kind. Each grammar must consume its whole body. Any
 * failure aborts the signature; only unknown type codes are kept as
 * opaque catch-alls.
 */

import {
  AEAD_ALGORITHMS,
  COMPRESSION_ALGORITHMS,
  ERROR_CODES,
  FINGERPRINT_LENGTHS,
  HASH_ALGORITHMS,
  KEY_VERSIONS,
  PUBLIC_KEY_ALGORITHMS,
  REVOCATION_CODES,
  REVOCATION_KEY_CLASSES,
  SYMMETRIC_KEY_ALGORITHMS,
  classifySubpacketTag,
  type CodeTable,
  type KeyVersion,
  type KnownSubpacketType,
} from '@pgpsig/kernel';
import {
  ByteReader,
  KeyId,
  WireError,
  decodeText,
  readCode,
  readLength,
  readTimestamp,
  toHex,
} from '@pgpsig/wire';
import { nestedContext, type ParseContext } from './context.js';
import { readSignature } from './parser.js';
import type { Signature, Subpacket, SubpacketDataOf } from './types.js';

type Grammar<K extends KnownSubpacketType> = (
  body: ByteReader,
  ctx: ParseContext,
  field: string
) => SubpacketDataOf<K>;

function flag(body: ByteReader, field: string): boolean {
  return body.u8(field) === 1;
}

function algorithmList<T extends CodeTable>(
  body: ByteReader,
  table: T,
  field: string
): T[keyof T][] {
  const list: T[keyof T][] = [];
  while (!body.isEmpty()) {
    list.push(readCode(body, table, `${field}[${list.length}]`));
  }
  return list;
}

function fingerprintKeyVersion(length: number, field: string): KeyVersion {
  if (length === FINGERPRINT_LENGTHS[KEY_VERSIONS.V4]) {
    return KEY_VERSIONS.V4;
  }
  if (length === FINGERPRINT_LENGTHS[KEY_VERSIONS.V5]) {
    return KEY_VERSIONS.V5;
  }
  throw new WireError(
    ERROR_CODES.E_MALFORMED,
    field,
    `${field}: fingerprint of ${length} bytes matches no key version`
  );
}

/**
 * Enter a nested signature, one level deeper.
 */
function readEmbeddedSignature(body: ByteReader, ctx: ParseContext, field: string): Signature {
  const { maxEmbeddedDepth } = ctx.options;
  if (ctx.depth >= maxEmbeddedDepth) {
    throw new WireError(
      ERROR_CODES.E_UNSUPPORTED_RECURSION,
      field,
      `${field}: embedded signatures nested deeper than ${maxEmbeddedDepth}`
    );
  }
  return readSignature(body, 'new', nestedContext(ctx));
}

/**
 * One parsing rule per known subpacket kind.
 */
export const SUBPACKET_GRAMMARS: { readonly [K in KnownSubpacketType]: Grammar<K> } = {
  // 5.2.3.4
  SignatureCreationTime: (body, _ctx, field) => ({
    type: 'SignatureCreationTime',
    created: readTimestamp(body, `${field}.created`),
  }),

  // 5.2.3.10
  SignatureExpirationTime: (body, _ctx, field) => ({
    type: 'SignatureExpirationTime',
    expires: readTimestamp(body, `${field}.expires`),
  }),

  // 5.2.3.11
  ExportableCertification: (body, _ctx, field) => ({
    type: 'ExportableCertification',
    exportable: flag(body, `${field}.exportable`),
  }),

  // 5.2.3.13
  TrustSignature: (body, _ctx, field) => ({
    type: 'TrustSignature',
    depth: body.u8(`${field}.depth`),
    value: body.u8(`${field}.value`),
  }),

  // 5.2.3.14
  RegularExpression: (body, _ctx, field) => ({
    type: 'RegularExpression',
    pattern: decodeText(body.rest(), `${field}.pattern`),
  }),

  // 5.2.3.12
  Revocable: (body, _ctx, field) => ({
    type: 'Revocable',
    revocable: flag(body, `${field}.revocable`),
  }),

  // 5.2.3.6
  KeyExpirationTime: (body, _ctx, field) => ({
    type: 'KeyExpirationTime',
    expires: readTimestamp(body, `${field}.expires`),
  }),

  // 5.2.3.7
  PreferredSymmetricAlgorithms: (body, _ctx, field) => ({
    type: 'PreferredSymmetricAlgorithms',
    algorithms: algorithmList(body, SYMMETRIC_KEY_ALGORITHMS, `${field}.algorithms`),
  }),

  // 5.2.3.15
  RevocationKey: (body, _ctx, field) => {
    const keyClass = readCode(body, REVOCATION_KEY_CLASSES, `${field}.class`);
    const algorithm = readCode(body, PUBLIC_KEY_ALGORITHMS, `${field}.algorithm`);
    const fingerprint = body.rest();
    const keyVersion = fingerprintKeyVersion(fingerprint.length, `${field}.fingerprint`);
    return {
      type: 'RevocationKey',
      revocationKey: { keyClass, algorithm, keyVersion, fingerprint },
    };
  },

  // 5.2.3.5
  Issuer: (body, _ctx, field) => ({
    type: 'Issuer',
    keyId: KeyId.read(body, `${field}.keyId`),
  }),

  // 5.2.3.16
  Notation: (body, _ctx, field) => {
    const flags = body.u8(`${field}.flags`);
    // Only the human-readable bit is defined
    if ((flags & 0x7f) !== 0) {
      throw new WireError(
        ERROR_CODES.E_MALFORMED,
        `${field}.flags`,
        `${field}.flags: reserved flag bits 0x${(flags & 0x7f).toString(16).padStart(2, '0')} set`
      );
    }
    const readable = flags === 0x80;
    body.expect([0, 0, 0], `${field}.flags`);
    const nameLength = body.u16(`${field}.nameLength`);
    const valueLength = body.u16(`${field}.valueLength`);
    const name = decodeText(body.take(nameLength, `${field}.name`), `${field}.name`);
    const value = decodeText(body.take(valueLength, `${field}.value`), `${field}.value`);
    return { type: 'Notation', notation: { readable, name, value } };
  },

  // 5.2.3.8
  PreferredHashAlgorithms: (body, _ctx, field) => ({
    type: 'PreferredHashAlgorithms',
    algorithms: algorithmList(body, HASH_ALGORITHMS, `${field}.algorithms`),
  }),

  // 5.2.3.9
  PreferredCompressionAlgorithms: (body, _ctx, field) => ({
    type: 'PreferredCompressionAlgorithms',
    algorithms: algorithmList(body, COMPRESSION_ALGORITHMS, `${field}.algorithms`),
  }),

  // 5.2.3.17, bitmask: kept raw
  KeyServerPreferences: (body) => ({ type: 'KeyServerPreferences', flags: body.rest() }),

  // 5.2.3.18
  PreferredKeyServer: (body, _ctx, field) => ({
    type: 'PreferredKeyServer',
    uri: decodeText(body.rest(), `${field}.uri`),
  }),

  // 5.2.3.19
  PrimaryUserId: (body, _ctx, field) => ({
    type: 'PrimaryUserId',
    primary: flag(body, `${field}.primary`),
  }),

  // 5.2.3.20
  PolicyUri: (body, _ctx, field) => ({
    type: 'PolicyUri',
    uri: decodeText(body.rest(), `${field}.uri`),
  }),

  // 5.2.3.21, bitmask: kept raw
  KeyFlags: (body) => ({ type: 'KeyFlags', flags: body.rest() }),

  // 5.2.3.22
  SignersUserId: (body, _ctx, field) => ({
    type: 'SignersUserId',
    userId: decodeText(body.rest(), `${field}.userId`),
  }),

  // 5.2.3.23
  RevocationReason: (body, _ctx, field) => ({
    type: 'RevocationReason',
    code: readCode(body, REVOCATION_CODES, `${field}.code`),
    reason: decodeText(body.rest(), `${field}.reason`),
  }),

  // 5.2.3.24, bitmask: kept raw
  Features: (body) => ({ type: 'Features', flags: body.rest() }),

  // 5.2.3.25
  SignatureTarget: (body, _ctx, field) => ({
    type: 'SignatureTarget',
    publicKeyAlgorithm: readCode(body, PUBLIC_KEY_ALGORITHMS, `${field}.publicKeyAlgorithm`),
    hashAlgorithm: readCode(body, HASH_ALGORITHMS, `${field}.hashAlgorithm`),
    hash: body.rest(),
  }),

  // 5.2.3.26
  EmbeddedSignature: (body, ctx, field) => ({
    type: 'EmbeddedSignature',
    signature: readEmbeddedSignature(body, ctx, `${field}.signature`),
  }),

  // rfc4880bis 5.2.3.28; fingerprint length follows the key version
  IssuerFingerprint: (body, _ctx, field) => ({
    type: 'IssuerFingerprint',
    keyVersion: readCode(body, KEY_VERSIONS, `${field}.keyVersion`),
    fingerprint: body.rest(),
  }),

  // rfc4880bis 5.2.3.8
  PreferredAeadAlgorithms: (body, _ctx, field) => ({
    type: 'PreferredAeadAlgorithms',
    algorithms: algorithmList(body, AEAD_ALGORITHMS, `${field}.algorithms`),
  }),
};

/**
 * Read one subpacket: length, type octet, then exactly `length - 1` body bytes.
 */
export function readSubpacket(reader: ByteReader, ctx: ParseContext, field: string): Subpacket {
  const length = readLength(reader, `${field}.length`);
  if (length === 0) {
    throw new WireError(
      ERROR_CODES.E_MALFORMED,
      `${field}.length`,
      `${field}.length: a subpacket must at least hold its type octet`
    );
  }
  const tag = classifySubpacketTag(reader.u8(`${field}.type`));
  const data = reader.take(length - 1, `${field}.body`);
  const { critical } = tag;

  if (ctx.log.isLevelEnabled('debug')) {
    const subpacket = tag.kind === 'known' ? tag.type : `${tag.kind}(${tag.code})`;
    ctx.log.debug({ subpacket, critical, body: toHex(data) }, 'parsing subpacket');
  }

  if (tag.kind === 'experimental') {
    return { type: 'Experimental', code: tag.code, data, critical };
  }
  if (tag.kind === 'other') {
    return { type: 'Other', code: tag.code, data, critical };
  }

  const name = tag.type;
  const path = `${field}.${name}`;

  try {
    const body = ByteReader.complete(data);
    const parsed = SUBPACKET_GRAMMARS[name](body, ctx, path);
    body.finish(path);
    return { ...parsed, critical };
  } catch (err) {
    if (err instanceof WireError) {
      ctx.log.warn({ subpacket: name, code: err.code, field: err.field }, 'invalid subpacket');
    }
    throw err;
  }
}

/**
 * Read subpackets until the area is exhausted.
 */
export function readSubpackets(area: ByteReader, ctx: ParseContext, field: string): Subpacket[] {
  const subpackets: Subpacket[] = [];
  while (!area.isEmpty()) {
    subpackets.push(readSubpacket(area, ctx, `${field}[${subpackets.length}]`));
  }
  return subpackets;
}
