/**
 * Mutation strategies for encoded byte streams.
 *
 * Takes a valid encoding and corrupts it so that decoders see truncated
 * data, oversized or non-canonical lengths, and stray trailing bytes.
 */

import { Rng } from './rng';

/** A mutation function that transforms an encoded stream. */
export type ByteMutator = (input: Uint8Array, rng: Rng) => Uint8Array;

/** Flip a random bit. */
export function flipBit(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  const result = new Uint8Array(input);
  result[rng.int(0, input.length - 1)] ^= 1 << rng.int(0, 7);
  return result;
}

/** Overwrite a random byte. */
export function replaceByte(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  const result = new Uint8Array(input);
  result[rng.int(0, input.length - 1)] = rng.int(0, 255);
  return result;
}

/** Insert a random byte. */
export function insertByte(input: Uint8Array, rng: Rng): Uint8Array {
  const pos = rng.int(0, input.length);
  return concat(input.subarray(0, pos), Uint8Array.of(rng.int(0, 255)), input.subarray(pos));
}

/** Delete a random byte. */
export function deleteByte(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  const pos = rng.int(0, input.length - 1);
  return concat(input.subarray(0, pos), input.subarray(pos + 1));
}

/** Cut the stream short. */
export function truncateBytes(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  return input.slice(0, rng.int(0, input.length - 1));
}

/** Append bytes after the end of the value. */
export function appendTrailing(input: Uint8Array, rng: Rng): Uint8Array {
  return concat(input, Uint8Array.from({ length: rng.int(1, 4) }, () => rng.int(0, 255)));
}

const LENGTH_PREFIXES: readonly Uint8Array[] = [
  Uint8Array.of(0xfd, 0x00, 0x00),
  Uint8Array.of(0xfd, 0xfc, 0x00),
  Uint8Array.of(0xfe, 0xff, 0xff, 0x00, 0x00),
  Uint8Array.of(0xfe, 0x01, 0x00, 0x00, 0x02),
  Uint8Array.of(0xff, 0xff, 0xff, 0xff, 0xff, 0x01, 0x00, 0x00, 0x00),
  Uint8Array.of(0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80),
];

/** Splice in a non-canonical, oversized or overflowing length form. */
export function insertLengthPrefix(input: Uint8Array, rng: Rng): Uint8Array {
  const pos = rng.int(0, input.length);
  return concat(input.subarray(0, pos), rng.pick(LENGTH_PREFIXES), input.subarray(pos));
}

/** All available byte mutators. */
export const BYTE_MUTATORS: ByteMutator[] = [
  flipBit,
  replaceByte,
  insertByte,
  deleteByte,
  truncateBytes,
  appendTrailing,
  insertLengthPrefix,
];

/**
 * Apply 1-N random mutations to an encoded stream.
 * @param count - Number of mutations to apply (default: 1-3)
 */
export function mutateBytes(input: Uint8Array, rng: Rng, count?: number): Uint8Array {
  const n = count ?? rng.int(1, 3);
  let result = input;
  for (let i = 0; i < n; i++) {
    result = rng.pick(BYTE_MUTATORS)(result, rng);
  }
  return result;
}

function concat(...parts: Uint8Array[]): Uint8Array {
  const result = new Uint8Array(parts.reduce((n, p) => n + p.length, 0));
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}
