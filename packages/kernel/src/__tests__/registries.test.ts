import { describe, it, expect } from 'vitest';
import {
  HASH_ALGORITHMS,
  PUBLIC_KEY_ALGORITHMS,
  SIGNATURE_TYPES,
  SUBPACKET_TYPES,
} from '../constants.js';
import {
  classifySubpacketTag,
  codeName,
  fromCode,
  isCodeOf,
  subpacketCode,
} from '../registries.js';

describe('fromCode', () => {
  it('returns known codes unchanged', () => {
    expect(fromCode(HASH_ALGORITHMS, 8)).toBe(HASH_ALGORITHMS.SHA256);
    expect(fromCode(SIGNATURE_TYPES, 0x13)).toBe(SIGNATURE_TYPES.CertPositive);
  });

  it('returns undefined for codes outside the table', () => {
    expect(fromCode(HASH_ALGORITHMS, 253)).toBeUndefined();
    expect(fromCode(HASH_ALGORITHMS, 4)).toBeUndefined();
    expect(fromCode(PUBLIC_KEY_ALGORITHMS, 111)).toBeUndefined();
  });

  it('accepts the private public-key range', () => {
    for (let code = 100; code <= 110; code++) {
      expect(isCodeOf(PUBLIC_KEY_ALGORITHMS, code)).toBe(true);
    }
  });
});

describe('codeName', () => {
  it('maps codes back to names', () => {
    expect(codeName(HASH_ALGORITHMS, 10)).toBe('SHA512');
    expect(codeName(PUBLIC_KEY_ALGORITHMS, 22)).toBe('EdDSA');
  });

  it('returns undefined for unknown codes', () => {
    expect(codeName(SIGNATURE_TYPES, 0x99)).toBeUndefined();
  });
});

describe('subpacketCode', () => {
  it('is the inverse of classification for known types', () => {
    for (const [type, code] of Object.entries(SUBPACKET_TYPES)) {
      expect(classifySubpacketTag(code)).toEqual({ kind: 'known', type, code, critical: false });
    }
    expect(subpacketCode('EmbeddedSignature')).toBe(32);
  });
});

describe('classifySubpacketTag', () => {
  it('splits off the critical bit', () => {
    expect(classifySubpacketTag(0x82)).toEqual({
      kind: 'known',
      type: 'SignatureCreationTime',
      code: 2,
      critical: true,
    });
  });

  it('keeps the experimental range as a catch-all', () => {
    expect(classifySubpacketTag(100)).toEqual({ kind: 'experimental', code: 100, critical: false });
    expect(classifySubpacketTag(110)).toEqual({ kind: 'experimental', code: 110, critical: false });
  });

  it('classifies everything else as other', () => {
    expect(classifySubpacketTag(1)).toEqual({ kind: 'other', code: 1, critical: false });
    expect(classifySubpacketTag(111)).toEqual({ kind: 'other', code: 111, critical: false });
  });

  it('keeps the raw octet for catch-alls with the critical bit set', () => {
    expect(classifySubpacketTag(254)).toEqual({ kind: 'other', code: 254, critical: true });
    expect(classifySubpacketTag(0xe5)).toEqual({ kind: 'experimental', code: 0xe5, critical: true });
  });
});
