/**
 * Multiprecision integers (RFC 4880 §3.2)
 *
 * Two-octet bit count followed by the big-endian magnitude. Leading zero
 * octets are dropped on read, so the bit count is always recomputed from
 * the stored magnitude.
 */

import { ERROR_CODES, LIMITS } from '@pgpsig/kernel';
import { WireError } from './errors.js';
import { toHex } from './hex.js';
import type { ByteReader } from './reader.js';
import type { ByteWriter } from './writer.js';

export class Mpi {
  private constructor(private readonly magnitude: Uint8Array) {}

  static fromBytes(bytes: Uint8Array): Mpi {
    return new Mpi(stripLeadingZeros(bytes).slice());
  }

  static fromBigInt(value: bigint): Mpi {
    if (value < 0n) {
      throw new RangeError('MPI values are unsigned');
    }
    const hex = value === 0n ? '' : value.toString(16);
    const padded = hex.length % 2 === 0 ? hex : `0${hex}`;
    return new Mpi(new Uint8Array(Buffer.from(padded, 'hex')));
  }

  get bytes(): Uint8Array {
    return this.magnitude.slice();
  }

  get bitLength(): number {
    if (this.magnitude.length === 0) {
      return 0;
    }
    const top = this.magnitude[0];
    return (this.magnitude.length - 1) * 8 + (32 - Math.clz32(top));
  }

  toBigInt(): bigint {
    return this.magnitude.length === 0 ? 0n : BigInt(`0x${toHex(this.magnitude)}`);
  }

  toHex(): string {
    return toHex(this.magnitude);
  }

  equals(other: Mpi): boolean {
    return this.toHex() === other.toHex();
  }
}

function stripLeadingZeros(bytes: Uint8Array): Uint8Array {
  let start = 0;
  while (start < bytes.length && bytes[start] === 0) {
    start++;
  }
  return bytes.subarray(start);
}

/**
 * Read one MPI.
 */
export function readMpi(reader: ByteReader, field: string): Mpi {
  const bits = reader.u16(`${field}.bits`);
  if (bits > LIMITS.maxMpiBits) {
    throw new WireError(
      ERROR_CODES.E_MALFORMED,
      field,
      `${field}: MPI of ${bits} bits exceeds the ${LIMITS.maxMpiBits}-bit limit`
    );
  }
  const magnitude = reader.take((bits + 7) >>> 3, field);
  return Mpi.fromBytes(magnitude);
}

export function writeMpi(writer: ByteWriter, mpi: Mpi): void {
  writer.u16(mpi.bitLength).bytes(mpi.bytes);
}
