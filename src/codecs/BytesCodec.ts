import { ByteBuffer } from '../ByteBuffer';
import { Codec } from './Codec';
import { CodecLimits, resolveLimits } from '../config';
import { CodecError } from '../errors';
import { compactSizeSize, decodeCompactSize, encodeCompactSize } from '../helpers';

/**
 * Variable-length byte run: CompactSize length followed by the raw bytes.
 * Used for scripts and other opaque payloads.
 */
export class BytesCodec implements Codec<Uint8Array> {
  private readonly maxSize: number;

  constructor(limits?: CodecLimits) {
    this.maxSize = resolveLimits(limits).maxSize;
  }

  encode(buffer: ByteBuffer, value: Uint8Array): void {
    encodeCompactSize(buffer, value.length, this.maxSize);
    buffer.writeBytes(value);
  }

  decode(buffer: ByteBuffer): Uint8Array {
    const length = decodeCompactSize(buffer, this.maxSize);
    return buffer.readBytes(length);
  }

  size(value: Uint8Array): number {
    return compactSizeSize(value.length) + value.length;
  }
}

/**
 * Fixed-width byte run written as-is with no length prefix,
 * e.g. 32-byte hashes.
 */
export class FixedBytesCodec implements Codec<Uint8Array> {
  readonly width: number;

  constructor(width: number) {
    if (!Number.isSafeInteger(width) || width < 0) {
      throw new RangeError(`FixedBytesCodec: width must be a non-negative integer, got ${width}`);
    }
    this.width = width;
  }

  encode(buffer: ByteBuffer, value: Uint8Array): void {
    if (value.length !== this.width) {
      throw new CodecError('TypeMismatch', `bytes[${this.width}]: expected ${this.width} bytes, got ${value.length}`, {
        expected: this.width,
        actual: value.length,
      });
    }
    buffer.writeBytes(value);
  }

  decode(buffer: ByteBuffer): Uint8Array {
    return buffer.readBytes(this.width);
  }

  size(): number {
    return this.width;
  }
}
