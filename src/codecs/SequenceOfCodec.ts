import { ByteBuffer } from '../ByteBuffer';
import { Codec } from './Codec';
import { CodecLimits, resolveLimits } from '../config';
import { compactSizeSize, decodeCompactSize, encodeCompactSize } from '../helpers';

export interface SequenceOfOptions<T> {
  /** Codec for each element in the sequence. */
  itemCodec: Codec<T>;
  limits?: CodecLimits;
}

/**
 * Ordered sequence codec: CompactSize element count followed by each
 * element's encoding in order.
 */
export class SequenceOfCodec<T> implements Codec<T[]> {
  private readonly itemCodec: Codec<T>;
  private readonly maxSize: number;

  constructor(options: SequenceOfOptions<T>) {
    this.itemCodec = options.itemCodec;
    this.maxSize = resolveLimits(options.limits).maxSize;
  }

  encode(buffer: ByteBuffer, value: T[]): void {
    encodeCompactSize(buffer, value.length, this.maxSize);
    for (const item of value) {
      this.itemCodec.encode(buffer, item);
    }
  }

  decode(buffer: ByteBuffer): T[] {
    const count = decodeCompactSize(buffer, this.maxSize);
    const result: T[] = [];
    for (let i = 0; i < count; i++) {
      result.push(this.itemCodec.decode(buffer));
    }
    return result;
  }

  size(value: T[]): number {
    let total = compactSizeSize(value.length);
    for (const item of value) {
      total += this.itemCodec.size(item);
    }
    return total;
  }
}
