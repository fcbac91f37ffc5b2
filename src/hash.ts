import { createHash } from 'node:crypto';
import { bytesToHex } from './hex';

/** SHA-256 applied twice. */
export function doubleSha256(data: Uint8Array): Uint8Array {
  const first = createHash('sha256').update(data).digest();
  return new Uint8Array(createHash('sha256').update(first).digest());
}

/**
 * Double SHA-256 as it is displayed for block and transaction hashes:
 * digest bytes reversed, lowercase hex.
 */
export function hash256Hex(data: Uint8Array): string {
  return bytesToHex(doubleSha256(data).reverse());
}
