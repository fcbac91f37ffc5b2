import { ByteBuffer } from '../ByteBuffer';
import { Codec } from './Codec';
import { CodecLimits, resolveLimits } from '../config';
import { compactSizeSize, decodeCompactSize, encodeCompactSize } from '../helpers';

/**
 * Standalone CompactSize codec, for fields that carry a length or count
 * without a collection attached to it.
 */
export class CompactSizeCodec implements Codec<number> {
  readonly maxSize: number;

  constructor(limits?: CodecLimits) {
    this.maxSize = resolveLimits(limits).maxSize;
  }

  encode(buffer: ByteBuffer, value: number): void {
    encodeCompactSize(buffer, value, this.maxSize);
  }

  decode(buffer: ByteBuffer): number {
    return decodeCompactSize(buffer, this.maxSize);
  }

  size(value: number): number {
    return compactSizeSize(value);
  }
}
