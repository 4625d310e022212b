/**
 * OpenPGP wire primitives
 *
 * Byte cursor with incomplete/malformed semantics, scalar length codec,
 * multiprecision integers, key IDs and text fields.
 *
 * @packageDocumentation
 */

export * from './codes.js';
export * from './errors.js';
export * from './hex.js';
export * from './keyid.js';
export * from './length.js';
export * from './mpi.js';
export * from './reader.js';
export * from './text.js';
export * from './time.js';
export * from './writer.js';
