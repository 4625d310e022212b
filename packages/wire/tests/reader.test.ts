/**
 * Tests for the byte cursor
 */

import { describe, it, expect } from 'vitest';
import { ByteReader } from '../src/reader.js';
import { WireError } from '../src/errors.js';

function catchError(fn: () => unknown): WireError {
  try {
    fn();
  } catch (err) {
    if (err instanceof WireError) {
      return err;
    }
    throw err;
  }
  throw new Error('expected a WireError');
}

describe('ByteReader', () => {
  it('reads big-endian integers', () => {
    const reader = ByteReader.complete(new Uint8Array([0x01, 0x02, 0x03, 0xff, 0xff, 0xff, 0xfe]));

    expect(reader.u8('a')).toBe(1);
    expect(reader.u16('b')).toBe(0x0203);
    expect(reader.u32('c')).toBe(0xfffffffe);
  });

  it('reads a u32 above 2^31 as unsigned', () => {
    const reader = ByteReader.complete(new Uint8Array([0xff, 0xff, 0xff, 0xfe]));
    expect(reader.u32('c')).toBe(0xfffffffe);
  });

  it('tracks position and remaining bytes', () => {
    const reader = ByteReader.complete(new Uint8Array([1, 2, 3, 4]));
    reader.take(3, 'x');

    expect(reader.position).toBe(3);
    expect(reader.remaining).toBe(1);
    expect(reader.isEmpty()).toBe(false);
    expect(Array.from(reader.rest())).toEqual([4]);
    expect(reader.isEmpty()).toBe(true);
  });

  it('returns owned copies from take', () => {
    const source = new Uint8Array([9, 8, 7]);
    const taken = ByteReader.complete(source).take(2, 'x');
    source[0] = 0;

    expect(Array.from(taken)).toEqual([9, 8]);
  });

  it('reports incomplete input when streaming', () => {
    const reader = ByteReader.streaming(new Uint8Array([1]));
    const err = catchError(() => reader.u32('created'));

    expect(err.code).toBe('E_INCOMPLETE');
    expect(err.field).toBe('created');
    expect(err.needed).toBe(3);
    expect(err.retriable).toBe(true);
  });

  it('reports malformed input when complete', () => {
    const reader = ByteReader.complete(new Uint8Array([1]));
    const err = catchError(() => reader.u16('length'));

    expect(err.code).toBe('E_MALFORMED');
    expect(err.needed).toBeUndefined();
    expect(err.retriable).toBe(false);
  });

  it('gives slices complete semantics', () => {
    const reader = ByteReader.streaming(new Uint8Array([1, 2, 3]));
    const slice = reader.slice(2, 'area');

    expect(slice.complete).toBe(true);
    expect(reader.remaining).toBe(1);
    slice.u8('a');
    expect(catchError(() => slice.u16('b')).code).toBe('E_MALFORMED');
  });

  it('reports an oversized slice as incomplete when streaming', () => {
    const reader = ByteReader.streaming(new Uint8Array([1, 2]));
    const err = catchError(() => reader.slice(5, 'area'));

    expect(err.code).toBe('E_INCOMPLETE');
    expect(err.needed).toBe(3);
  });

  describe('expect', () => {
    it('consumes a matching literal', () => {
      const reader = ByteReader.complete(new Uint8Array([0, 0, 0, 7]));
      reader.expect([0, 0, 0], 'reserved');
      expect(reader.u8('next')).toBe(7);
    });

    it('rejects a mismatch even when input is short', () => {
      const reader = ByteReader.streaming(new Uint8Array([4]));
      const err = catchError(() => reader.expect([5], 'hashedLength'));

      expect(err.code).toBe('E_MALFORMED');
      expect(err.message).toBe('hashedLength: expected 0x05 at offset 0, found 0x04');
    });

    it('reports a matching prefix as incomplete when streaming', () => {
      const reader = ByteReader.streaming(new Uint8Array([0]));
      expect(catchError(() => reader.expect([0, 0, 0], 'reserved')).code).toBe('E_INCOMPLETE');
    });
  });

  describe('finish', () => {
    it('passes when everything was consumed', () => {
      const reader = ByteReader.complete(new Uint8Array([1]));
      reader.u8('a');
      expect(() => reader.finish('body')).not.toThrow();
    });

    it('rejects trailing bytes', () => {
      const reader = ByteReader.complete(new Uint8Array([1, 2]));
      reader.u8('a');
      const err = catchError(() => reader.finish('body'));

      expect(err.code).toBe('E_MALFORMED');
      expect(err.message).toBe('body: 1 unexpected trailing byte(s)');
    });
  });
});
