/**
 * Signature value decoding
 *
 * The number of MPIs that follow the header depends on the public-key
 * algorithm: RSA carries m^d, DSA/ECDSA/EdDSA carry (r, s). Any other code,
 * private and experimental ones included, is read as a single MPI.
 */

import { DSA_FAMILY, RSA_FAMILY, type PublicKeyAlgorithm } from '@pgpsig/kernel';
import { readMpi, type ByteReader, type Mpi } from '@pgpsig/wire';

/**
 * Number of MPIs in the signature value for an algorithm
 */
export function signatureValueArity(algorithm: PublicKeyAlgorithm): number {
  if (RSA_FAMILY.includes(algorithm)) {
    return 1;
  }
  if (DSA_FAMILY.includes(algorithm)) {
    return 2;
  }
  return 1;
}

export function readSignatureValue(
  reader: ByteReader,
  algorithm: PublicKeyAlgorithm,
  field: string
): Mpi[] {
  const count = signatureValueArity(algorithm);
  const value: Mpi[] = [];
  for (let i = 0; i < count; i++) {
    value.push(readMpi(reader, `${field}[${i}]`));
  }
  return value;
}
