/**
 * Cursor over an immutable byte buffer.
 *
 * A reader is either streaming or complete. Running out of bytes in a
 * streaming reader means more input may still arrive (E_INCOMPLETE);
 * in a complete reader the buffer is all there is (E_MALFORMED).
 * Slices taken for length-prefixed fields are always complete.
 */

import { ERROR_CODES } from '@pgpsig/kernel';
import { WireError } from './errors.js';

export class ByteReader {
  private offset = 0;

  constructor(
    private readonly bytes: Uint8Array,
    readonly complete: boolean
  ) {}

  /** Reader over a buffer known to hold the whole value */
  static complete(bytes: Uint8Array): ByteReader {
    return new ByteReader(bytes, true);
  }

  /** Reader over a buffer that may still be filling */
  static streaming(bytes: Uint8Array): ByteReader {
    return new ByteReader(bytes, false);
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  isEmpty(): boolean {
    return this.remaining === 0;
  }

  u8(field: string): number {
    this.ensure(1, field);
    const value = this.bytes[this.offset];
    this.offset += 1;
    return value;
  }

  u16(field: string): number {
    this.ensure(2, field);
    const value = (this.bytes[this.offset] << 8) | this.bytes[this.offset + 1];
    this.offset += 2;
    return value;
  }

  u32(field: string): number {
    this.ensure(4, field);
    const view = new DataView(this.bytes.buffer, this.bytes.byteOffset, this.bytes.byteLength);
    const value = view.getUint32(this.offset);
    this.offset += 4;
    return value;
  }

  /**
   * Take exactly `count` bytes as an owned copy.
   */
  take(count: number, field: string): Uint8Array {
    this.ensure(count, field);
    const value = this.bytes.slice(this.offset, this.offset + count);
    this.offset += count;
    return value;
  }

  /**
   * Take everything that is left.
   */
  rest(): Uint8Array {
    const value = this.bytes.slice(this.offset);
    this.offset = this.bytes.length;
    return value;
  }

  /**
   * Take `count` bytes as a complete reader of their own.
   */
  slice(count: number, field: string): ByteReader {
    this.ensure(count, field);
    const view = this.bytes.subarray(this.offset, this.offset + count);
    this.offset += count;
    return ByteReader.complete(view);
  }

  /**
   * Consume a literal byte sequence.
   * A mismatch is malformed even when the input is short.
   */
  expect(literal: readonly number[], field: string): void {
    const available = Math.min(literal.length, this.remaining);
    for (let i = 0; i < available; i++) {
      const actual = this.bytes[this.offset + i];
      if (actual !== literal[i]) {
        throw new WireError(
          ERROR_CODES.E_MALFORMED,
          field,
          `${field}: expected 0x${hexByte(literal[i])} at offset ${this.offset + i}, found 0x${hexByte(actual)}`
        );
      }
    }
    this.ensure(literal.length, field);
    this.offset += literal.length;
  }

  /**
   * Fail unless every byte has been consumed.
   */
  finish(field: string): void {
    if (this.remaining > 0) {
      throw new WireError(
        ERROR_CODES.E_MALFORMED,
        field,
        `${field}: ${this.remaining} unexpected trailing byte(s)`
      );
    }
  }

  private ensure(count: number, field: string): void {
    const remaining = this.remaining;
    if (remaining >= count) {
      return;
    }

    if (this.complete) {
      throw new WireError(
        ERROR_CODES.E_MALFORMED,
        field,
        `${field}: need ${count} byte(s), only ${remaining} left in a length-bounded field`
      );
    }

    throw new WireError(
      ERROR_CODES.E_INCOMPLETE,
      field,
      `${field}: need ${count} byte(s), only ${remaining} available`,
      { needed: count - remaining }
    );
  }
}

function hexByte(value: number): string {
  return value.toString(16).padStart(2, '0');
}
