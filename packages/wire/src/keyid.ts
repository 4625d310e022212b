/**
 * Eight-octet key identifier
 */

import { ERROR_CODES, KEY_ID_LENGTH } from '@pgpsig/kernel';
import { WireError } from './errors.js';
import { toHex } from './hex.js';
import type { ByteReader } from './reader.js';

export class KeyId {
  private constructor(private readonly value: Uint8Array) {}

  static fromBytes(bytes: Uint8Array): KeyId {
    if (bytes.length !== KEY_ID_LENGTH) {
      throw new WireError(
        ERROR_CODES.E_MALFORMED,
        'keyId',
        `key ID must be ${KEY_ID_LENGTH} bytes, got ${bytes.length}`
      );
    }
    return new KeyId(bytes.slice());
  }

  static read(reader: ByteReader, field: string): KeyId {
    return new KeyId(reader.take(KEY_ID_LENGTH, field));
  }

  get bytes(): Uint8Array {
    return this.value.slice();
  }

  toHex(): string {
    return toHex(this.value);
  }

  equals(other: KeyId): boolean {
    return this.toHex() === other.toHex();
  }

  toString(): string {
    return this.toHex().toUpperCase();
  }
}
