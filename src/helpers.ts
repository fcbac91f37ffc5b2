import { ByteBuffer } from './ByteBuffer';
import type { Codec } from './codecs/Codec';
import { CodecError } from './errors';

export const U64_MAX = 0xffffffffffffffffn;

/**
 * Encode a VarInt: base-128 groups, most significant first, with bit 7 set on
 * every group but the last. One is subtracted from the remaining magnitude
 * before each more-significant group, so every byte sequence decodes to a
 * distinct value.
 *
 *   0 -> 00, 0x80 -> 80 00, 0xffff -> 82 fe 7f
 */
export function encodeVarInt(buf: ByteBuffer, value: bigint): void {
  if (value < 0n || value > U64_MAX) {
    throw new CodecError('TypeMismatch', `VarInt magnitude ${value} outside [0, 2^64-1]`, {
      value: value.toString(),
    });
  }
  const groups: number[] = [];
  let n = value;
  for (;;) {
    groups.push(Number(n & 0x7fn) | (groups.length > 0 ? 0x80 : 0x00));
    if (n <= 0x7fn) break;
    n = (n >> 7n) - 1n;
  }
  for (let i = groups.length - 1; i >= 0; i--) {
    buf.writeByte(groups[i]);
  }
}

/** Number of bytes encodeVarInt() writes for `value`. */
export function varIntSize(value: bigint): number {
  let size = 1;
  let n = value;
  while (n > 0x7fn) {
    n = (n >> 7n) - 1n;
    size++;
  }
  return size;
}

/**
 * Decode a VarInt whose magnitude must not exceed `max`.
 * Fails with Overflow as soon as the accumulated value cannot fit.
 */
export function decodeVarInt(buf: ByteBuffer, max: bigint = U64_MAX): bigint {
  const start = buf.offset;
  let n = 0n;
  for (;;) {
    const byte = buf.readByte();
    if (n > max >> 7n) {
      throw varIntOverflow(start, max);
    }
    n = (n << 7n) | BigInt(byte & 0x7f);
    if ((byte & 0x80) === 0) {
      return n;
    }
    if (n === max) {
      throw varIntOverflow(start, max);
    }
    n++;
  }
}

function varIntOverflow(offset: number, max: bigint): CodecError {
  return new CodecError('Overflow', `VarInt at offset ${offset} exceeds maximum ${max}`, {
    offset,
    max: max.toString(),
  });
}

/**
 * Encode a CompactSize length prefix.
 *   < 0xfd        1 byte
 *   <= 0xffff     0xfd + uint16
 *   <= 0xffffffff 0xfe + uint32
 *   otherwise     0xff + uint64
 */
export function encodeCompactSize(buf: ByteBuffer, value: number | bigint, maxSize: number): void {
  const n = toLength(value);
  if (n > BigInt(maxSize)) {
    throw new CodecError('SizeLimitExceeded', `CompactSize ${n} exceeds maximum ${maxSize}`, {
      value: n.toString(),
      maxSize,
    });
  }
  if (n < 0xfdn) {
    buf.writeByte(Number(n));
  } else if (n <= 0xffffn) {
    buf.writeByte(0xfd);
    buf.writeUint(Number(n), 2);
  } else if (n <= 0xffffffffn) {
    buf.writeByte(0xfe);
    buf.writeUint(Number(n), 4);
  } else {
    buf.writeByte(0xff);
    buf.writeBigUint64(n);
  }
}

/**
 * Decode a CompactSize, rejecting any form longer than the shortest one
 * able to hold the value, and any value above `maxSize`.
 */
export function decodeCompactSize(buf: ByteBuffer, maxSize: number): number {
  const start = buf.offset;
  const prefix = buf.readByte();
  let n: bigint;
  let minimum: bigint;
  if (prefix < 0xfd) {
    n = BigInt(prefix);
    minimum = 0n;
  } else if (prefix === 0xfd) {
    n = BigInt(buf.readUint(2));
    minimum = 0xfdn;
  } else if (prefix === 0xfe) {
    n = BigInt(buf.readUint(4));
    minimum = 0x10000n;
  } else {
    n = buf.readBigUint64();
    minimum = 0x100000000n;
  }
  if (n < minimum) {
    throw new CodecError('NonCanonicalEncoding', `non-canonical CompactSize at offset ${start}`, {
      offset: start,
      prefix,
      value: n.toString(),
    });
  }
  if (n > BigInt(maxSize)) {
    throw new CodecError('SizeLimitExceeded', `CompactSize ${n} exceeds maximum ${maxSize}`, {
      offset: start,
      value: n.toString(),
      maxSize,
    });
  }
  return Number(n);
}

/** Number of bytes encodeCompactSize() writes for `value`. */
export function compactSizeSize(value: number | bigint): number {
  const n = toLength(value);
  if (n < 0xfdn) return 1;
  if (n <= 0xffffn) return 3;
  if (n <= 0xffffffffn) return 5;
  return 9;
}

function toLength(value: number | bigint): bigint {
  if (typeof value === 'number' && !Number.isSafeInteger(value)) {
    throw new CodecError('TypeMismatch', `CompactSize must be an integer, got ${value}`);
  }
  const n = BigInt(value);
  if (n < 0n) {
    throw new CodecError('TypeMismatch', `CompactSize must be non-negative, got ${n}`);
  }
  return n;
}

const scratch = new DataView(new ArrayBuffer(8));

/** IEEE-754 single-precision bit pattern of `value`. */
export function floatToBits(value: number): number {
  scratch.setFloat32(0, value);
  return scratch.getUint32(0);
}

export function bitsToFloat(bits: number): number {
  scratch.setUint32(0, bits);
  return scratch.getFloat32(0);
}

/** IEEE-754 double-precision bit pattern of `value`. */
export function doubleToBits(value: number): bigint {
  scratch.setFloat64(0, value);
  return scratch.getBigUint64(0);
}

export function bitsToDouble(bits: bigint): number {
  scratch.setBigUint64(0, bits);
  return scratch.getFloat64(0);
}

/** Exact byte length `codec` would produce for `value`. */
export function sizeOf<T>(codec: Codec<T>, value: T): number {
  return codec.size(value);
}

/**
 * Encode a value into a buffer sized from codec.size() and verify that the
 * encoder wrote exactly that many bytes.
 */
export function serialize<T>(codec: Codec<T>, value: T): Uint8Array {
  const expected = codec.size(value);
  const buffer = ByteBuffer.alloc(expected);
  codec.encode(buffer, value);
  if (buffer.length !== expected) {
    throw new Error(
      `${codec.constructor.name}: size() predicted ${expected} bytes but encode() wrote ${buffer.length}`,
    );
  }
  return buffer.takeAndClear();
}

/** Decode a complete encoding. Bytes left over after the value are rejected. */
export function deserialize<T>(codec: Codec<T>, data: Uint8Array): T {
  const buffer = ByteBuffer.from(data);
  const value = codec.decode(buffer);
  if (buffer.remaining > 0) {
    throw new CodecError('TypeMismatch', `${buffer.remaining} trailing byte(s) after value`, {
      offset: buffer.offset,
      remaining: buffer.remaining,
    });
  }
  return value;
}

/** Lexicographic byte order; a proper prefix sorts first. */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return a.length - b.length;
}
