/**
 * Hex encoding for fingerprints, key IDs and log output
 */

/**
 * Encode bytes as lowercase hex
 */
export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}

/**
 * Decode a hex string (case-insensitive, optional spaces) to bytes
 */
export function fromHex(hex: string): Uint8Array {
  const clean = hex.replace(/\s+/g, '');
  if (clean.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(clean)) {
    throw new Error(`Invalid hex string: ${hex}`);
  }
  return new Uint8Array(Buffer.from(clean, 'hex'));
}
