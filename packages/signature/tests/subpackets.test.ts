import { describe, it, expect } from 'vitest';
import { parseSubpackets } from '../src/parser.js';
import type { Subpacket } from '../src/types.js';
import { catchWireError, repeat, subpacket, text, u8, v4Body, type Bytes } from './fixtures.js';

const KEY_ID = [0x01, 0x23, 0x45, 0x67, 0x89, 0xab, 0xcd, 0xef];

function parseOne(bytes: Bytes): Subpacket {
  const subpackets = parseSubpackets(u8(bytes), { complete: true });
  expect(subpackets).toHaveLength(1);
  return subpackets[0];
}

function parseError(bytes: Bytes) {
  return catchWireError(() => parseSubpackets(u8(bytes), { complete: true }));
}

describe('subpacket grammars', () => {
  describe('times', () => {
    it('reads the signature creation time', () => {
      const sp = parseOne(subpacket(2, [0x5f, 0x5e, 0x10, 0x00]));

      expect(sp.type).toBe('SignatureCreationTime');
      expect(sp.type === 'SignatureCreationTime' && sp.created.toISOString()).toBe(
        '2020-09-13T12:26:40.000Z'
      );
    });

    it('reads expiration times as offsets from the epoch', () => {
      const sig = parseOne(subpacket(3, [0x00, 0x00, 0x0e, 0x10]));
      const key = parseOne(subpacket(9, [0x00, 0x01, 0x51, 0x80]));

      expect(sig.type === 'SignatureExpirationTime' && sig.expires.getTime()).toBe(3600 * 1000);
      expect(key.type === 'KeyExpirationTime' && key.expires.getTime()).toBe(86400 * 1000);
    });

    it('rejects a short creation time', () => {
      const err = parseError(subpacket(2, [0x00, 0x00]));

      expect(err.code).toBe('E_MALFORMED');
      expect(err.field).toBe('subpackets[0].SignatureCreationTime.created');
    });

    it('rejects a long creation time', () => {
      const err = parseError(subpacket(2, [0x00, 0x00, 0x00, 0x00, 0x00]));

      expect(err.code).toBe('E_MALFORMED');
      expect(err.field).toBe('subpackets[0].SignatureCreationTime');
      expect(err.message).toBe('subpackets[0].SignatureCreationTime: 1 unexpected trailing byte(s)');
    });
  });

  describe('flags', () => {
    it('reads one-octet booleans', () => {
      expect(parseOne(subpacket(4, [1]))).toEqual({
        type: 'ExportableCertification',
        exportable: true,
        critical: false,
      });
      expect(parseOne(subpacket(7, [0]))).toEqual({
        type: 'Revocable',
        revocable: false,
        critical: false,
      });
      expect(parseOne(subpacket(25, [1]))).toEqual({
        type: 'PrimaryUserId',
        primary: true,
        critical: false,
      });
    });

    it('treats any value other than 1 as false', () => {
      const sp = parseOne(subpacket(4, [2]));

      expect(sp.type === 'ExportableCertification' && sp.exportable).toBe(false);
    });

    it('requires the boolean octet', () => {
      const err = parseError(subpacket(7, []));

      expect(err.code).toBe('E_MALFORMED');
      expect(err.field).toBe('subpackets[0].Revocable.revocable');
    });

    it('keeps bitmask subpackets raw', () => {
      expect(parseOne(subpacket(23, [0x80]))).toEqual({
        type: 'KeyServerPreferences',
        flags: u8([0x80]),
        critical: false,
      });
      expect(parseOne(subpacket(27, [0x03, 0x00]))).toEqual({
        type: 'KeyFlags',
        flags: u8([0x03, 0x00]),
        critical: false,
      });
      expect(parseOne(subpacket(30, [0x01]))).toEqual({
        type: 'Features',
        flags: u8([0x01]),
        critical: false,
      });
    });
  });

  it('reads a trust signature', () => {
    expect(parseOne(subpacket(5, [1, 120]))).toEqual({
      type: 'TrustSignature',
      depth: 1,
      value: 120,
      critical: false,
    });
  });

  describe('text', () => {
    it('reads a regular expression', () => {
      const pattern = '<[^>]+[@.]example\\.org>$';
      const sp = parseOne(subpacket(6, text(pattern)));

      expect(sp.type === 'RegularExpression' && sp.pattern).toBe(pattern);
    });

    it('reads URIs and user IDs', () => {
      const server = parseOne(subpacket(24, text('hkps://keys.example.test')));
      const policy = parseOne(subpacket(26, text('https://example.test/policy')));
      const signer = parseOne(subpacket(28, text('Test User <test@example.test>')));

      expect(server.type === 'PreferredKeyServer' && server.uri).toBe('hkps://keys.example.test');
      expect(policy.type === 'PolicyUri' && policy.uri).toBe('https://example.test/policy');
      expect(signer.type === 'SignersUserId' && signer.userId).toBe('Test User <test@example.test>');
    });

    it('accepts an empty string', () => {
      const sp = parseOne(subpacket(26, []));

      expect(sp.type === 'PolicyUri' && sp.uri).toBe('');
    });

    it('decodes multi-byte UTF-8', () => {
      const sp = parseOne(subpacket(28, text('Zoë Test')));

      expect(sp.type === 'SignersUserId' && sp.userId).toBe('Zoë Test');
    });

    it('rejects invalid UTF-8', () => {
      const err = parseError(subpacket(28, [0x61, 0xff]));

      expect(err.code).toBe('E_MALFORMED');
      expect(err.field).toBe('subpackets[0].SignersUserId.userId');
      expect(err.message).toBe('subpackets[0].SignersUserId.userId: invalid UTF-8 text');
    });
  });

  describe('algorithm preferences', () => {
    it('reads ordered algorithm lists', () => {
      expect(parseOne(subpacket(11, [9, 8, 7, 2]))).toEqual({
        type: 'PreferredSymmetricAlgorithms',
        algorithms: [9, 8, 7, 2],
        critical: false,
      });
      expect(parseOne(subpacket(21, [10, 9, 8]))).toEqual({
        type: 'PreferredHashAlgorithms',
        algorithms: [10, 9, 8],
        critical: false,
      });
      expect(parseOne(subpacket(22, [2, 1, 0]))).toEqual({
        type: 'PreferredCompressionAlgorithms',
        algorithms: [2, 1, 0],
        critical: false,
      });
      expect(parseOne(subpacket(34, [2, 1]))).toEqual({
        type: 'PreferredAeadAlgorithms',
        algorithms: [2, 1],
        critical: false,
      });
    });

    it('accepts an empty list', () => {
      const sp = parseOne(subpacket(11, []));

      expect(sp.type === 'PreferredSymmetricAlgorithms' && sp.algorithms).toEqual([]);
    });

    it('rejects an unknown algorithm and names its position', () => {
      const err = parseError(subpacket(34, [1, 2, 3]));

      expect(err.code).toBe('E_UNKNOWN_CODE');
      expect(err.field).toBe('subpackets[0].PreferredAeadAlgorithms.algorithms[2]');
      expect(err.message).toBe('subpackets[0].PreferredAeadAlgorithms.algorithms[2]: unknown code 3');
    });
  });

  describe('revocation key', () => {
    it('infers a V4 key from a 20-byte fingerprint', () => {
      const fingerprint = repeat(0x11, 20);
      const sp = parseOne(subpacket(12, [0x80, 17, ...fingerprint]));

      expect(sp).toEqual({
        type: 'RevocationKey',
        revocationKey: {
          keyClass: 0x80,
          algorithm: 17,
          keyVersion: 4,
          fingerprint: u8(fingerprint),
        },
        critical: false,
      });
    });

    it('infers a V5 key from a 32-byte fingerprint', () => {
      const sp = parseOne(subpacket(12, [0xc0, 1, ...repeat(0x22, 32)]));

      expect(sp.type === 'RevocationKey' && sp.revocationKey.keyVersion).toBe(5);
      expect(sp.type === 'RevocationKey' && sp.revocationKey.keyClass).toBe(0xc0);
    });

    it('rejects other fingerprint lengths', () => {
      const err = parseError(subpacket(12, [0x80, 1, ...repeat(0x11, 19)]));

      expect(err.code).toBe('E_MALFORMED');
      expect(err.field).toBe('subpackets[0].RevocationKey.fingerprint');
    });

    it('rejects an unknown class', () => {
      const err = parseError(subpacket(12, [0x40, 1, ...repeat(0x11, 20)]));

      expect(err.code).toBe('E_UNKNOWN_CODE');
      expect(err.field).toBe('subpackets[0].RevocationKey.class');
    });
  });

  describe('issuer', () => {
    it('reads the key ID', () => {
      const sp = parseOne(subpacket(16, KEY_ID));

      expect(sp.type === 'Issuer' && sp.keyId.toHex()).toBe('0123456789abcdef');
    });

    it('rejects a short key ID', () => {
      const err = parseError(subpacket(16, KEY_ID.slice(0, 7)));

      expect(err.code).toBe('E_MALFORMED');
      expect(err.field).toBe('subpackets[0].Issuer.keyId');
    });

    it('rejects a long key ID', () => {
      const err = parseError(subpacket(16, [...KEY_ID, 0x00]));

      expect(err.code).toBe('E_MALFORMED');
      expect(err.field).toBe('subpackets[0].Issuer');
    });

    it('reads an issuer fingerprint', () => {
      const sp = parseOne(subpacket(33, [4, ...repeat(0x33, 20)]));

      expect(sp).toEqual({
        type: 'IssuerFingerprint',
        keyVersion: 4,
        fingerprint: u8(repeat(0x33, 20)),
        critical: false,
      });
    });

    it('rejects an unknown fingerprint key version', () => {
      const err = parseError(subpacket(33, [7, ...repeat(0x33, 20)]));

      expect(err.code).toBe('E_UNKNOWN_CODE');
      expect(err.field).toBe('subpackets[0].IssuerFingerprint.keyVersion');
    });
  });

  describe('notation', () => {
    function notation(flags: Bytes, name: Bytes, value: Bytes): Bytes {
      return subpacket(20, [
        ...flags,
        name.length >> 8,
        name.length & 0xff,
        value.length >> 8,
        value.length & 0xff,
        ...name,
        ...value,
      ]);
    }

    it('reads a human-readable notation', () => {
      const sp = parseOne(notation([0x80, 0, 0, 0], text('test@example.test'), text('yes')));

      expect(sp).toEqual({
        type: 'Notation',
        notation: { readable: true, name: 'test@example.test', value: 'yes' },
        critical: false,
      });
    });

    it('reads the readable flag from the top bit only', () => {
      const sp = parseOne(notation([0x00, 0, 0, 0], text('n'), text('v')));

      expect(sp.type === 'Notation' && sp.notation.readable).toBe(false);
    });

    it('rejects reserved bits in the first flag octet', () => {
      const err = parseError(notation([0x81, 0, 0, 0], text('n'), text('v')));

      expect(err.code).toBe('E_MALFORMED');
      expect(err.field).toBe('subpackets[0].Notation.flags');
      expect(err.message).toBe('subpackets[0].Notation.flags: reserved flag bits 0x01 set');
    });

    it('rejects reserved flag bits', () => {
      const err = parseError(notation([0x80, 0, 1, 0], text('n'), text('v')));

      expect(err.code).toBe('E_MALFORMED');
      expect(err.field).toBe('subpackets[0].Notation.flags');
    });

    it('rejects a value length past the body', () => {
      const err = parseError(subpacket(20, [0x80, 0, 0, 0, 0, 1, 0, 5, 0x6e, 0x76]));

      expect(err.code).toBe('E_MALFORMED');
      expect(err.field).toBe('subpackets[0].Notation.value');
    });

    it('rejects invalid UTF-8 in the name', () => {
      const err = parseError(notation([0x80, 0, 0, 0], [0xc3], text('v')));

      expect(err.code).toBe('E_MALFORMED');
      expect(err.field).toBe('subpackets[0].Notation.name');
    });
  });

  describe('revocation reason', () => {
    it('reads the code and reason', () => {
      expect(parseOne(subpacket(29, [0x02, ...text('key compromised')]))).toEqual({
        type: 'RevocationReason',
        code: 2,
        reason: 'key compromised',
        critical: false,
      });
    });

    it('rejects an unknown code', () => {
      const err = parseError(subpacket(29, [0x04]));

      expect(err.code).toBe('E_UNKNOWN_CODE');
      expect(err.field).toBe('subpackets[0].RevocationReason.code');
    });
  });

  it('reads a signature target', () => {
    const hash = repeat(0x44, 32);

    expect(parseOne(subpacket(31, [22, 8, ...hash]))).toEqual({
      type: 'SignatureTarget',
      publicKeyAlgorithm: 22,
      hashAlgorithm: 8,
      hash: u8(hash),
      critical: false,
    });
  });

  it('reads an embedded signature', () => {
    const sp = parseOne(subpacket(32, v4Body({ signatureType: 0x19 })));

    expect(sp.type).toBe('EmbeddedSignature');
    expect(sp.type === 'EmbeddedSignature' && sp.signature.signatureType).toBe(0x19);
  });
});

describe('subpacket framing', () => {
  it('splits the critical bit off the type octet', () => {
    const sp = parseOne(subpacket(0x82, [0x00, 0x00, 0x00, 0x00]));

    expect(sp.type).toBe('SignatureCreationTime');
    expect(sp.critical).toBe(true);
  });

  it('keeps experimental subpackets opaque', () => {
    expect(parseOne(subpacket(101, [1, 2, 3]))).toEqual({
      type: 'Experimental',
      code: 101,
      data: u8([1, 2, 3]),
      critical: false,
    });
  });

  it('keeps unknown subpackets opaque', () => {
    expect(parseOne(subpacket(50, [0xde, 0xad]))).toEqual({
      type: 'Other',
      code: 50,
      data: u8([0xde, 0xad]),
      critical: false,
    });
  });

  it('keeps the critical bit on unknown subpackets', () => {
    expect(parseOne(subpacket(254, []))).toEqual({
      type: 'Other',
      code: 254,
      data: u8([]),
      critical: true,
    });
  });

  it('does not interpret the body of an unknown subpacket', () => {
    const sp = parseOne(subpacket(111, [0xff, 0xff]));

    expect(sp.type).toBe('Other');
  });

  it('rejects a zero length', () => {
    const err = parseError([0x00]);

    expect(err.code).toBe('E_MALFORMED');
    expect(err.field).toBe('subpackets[0].length');
  });

  it('reads consecutive subpackets in order', () => {
    const subpackets = parseSubpackets(
      u8([...subpacket(16, KEY_ID), ...subpacket(101, []), ...subpacket(27, [0x01])]),
      { complete: true }
    );

    expect(subpackets.map((s) => s.type)).toEqual(['Issuer', 'Experimental', 'KeyFlags']);
  });

  it('names the position of a failing subpacket', () => {
    const err = parseError([...subpacket(27, [0x01]), ...subpacket(16, [0x00])]);

    expect(err.field).toBe('subpackets[1].Issuer.keyId');
  });
});
