/**
 * Byte builders for signature packet fixtures
 */

import { WireError } from '@pgpsig/wire';

export type Bytes = number[];

export function text(value: string): Bytes {
  return Array.from(new TextEncoder().encode(value));
}

export function repeat(value: number, count: number): Bytes {
  return new Array<number>(count).fill(value);
}

/**
 * One subpacket with a one-octet length
 */
export function subpacket(tag: number, body: Bytes): Bytes {
  const length = body.length + 1;
  if (length > 191) {
    throw new Error('fixture subpacket too long for a one-octet length');
  }
  return [length, tag, ...body];
}

/** 8-bit MPI holding a single octet */
export function mpi8(value: number): Bytes {
  return [0x00, 0x08, value];
}

export interface V4Fields {
  version?: number;
  signatureType?: number;
  publicKeyAlgorithm?: number;
  hashAlgorithm?: number;
  hashed?: Bytes;
  unhashed?: Bytes;
  prefix?: Bytes;
  value?: Bytes;
}

export function v4Body(fields: V4Fields = {}): Bytes {
  const hashed = fields.hashed ?? [];
  const unhashed = fields.unhashed ?? [];
  return [
    fields.version ?? 4,
    fields.signatureType ?? 0x00,
    fields.publicKeyAlgorithm ?? 1,
    fields.hashAlgorithm ?? 8,
    hashed.length >> 8,
    hashed.length & 0xff,
    ...hashed,
    unhashed.length >> 8,
    unhashed.length & 0xff,
    ...unhashed,
    ...(fields.prefix ?? [0xaa, 0xbb]),
    ...(fields.value ?? mpi8(0xff)),
  ];
}

export function u8(bytes: Bytes): Uint8Array {
  return Uint8Array.from(bytes);
}

/**
 * Run fn and return the WireError it throws.
 */
export function catchWireError(fn: () => unknown): WireError {
  try {
    fn();
  } catch (err) {
    if (err instanceof WireError) {
      return err;
    }
    throw err;
  }
  throw new Error('expected a WireError to be thrown');
}
