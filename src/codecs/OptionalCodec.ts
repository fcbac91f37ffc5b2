import { ByteBuffer } from '../ByteBuffer';
import { Codec } from './Codec';
import { readFlag } from './BooleanCodec';
import { CodecLimits, resolveLimits } from '../config';

/**
 * Optional value codec: one presence byte, then the value only when present.
 * `undefined` is the absent value.
 */
export class OptionalCodec<T> implements Codec<T | undefined> {
  private readonly itemCodec: Codec<T>;
  private readonly strict: boolean;

  constructor(itemCodec: Codec<T>, limits?: CodecLimits) {
    if (itemCodec instanceof OptionalCodec) {
      // `undefined` cannot stand for both an absent outer and an absent inner value
      throw new Error('OptionalCodec cannot wrap another OptionalCodec');
    }
    this.itemCodec = itemCodec;
    this.strict = resolveLimits(limits).strictBooleans;
  }

  encode(buffer: ByteBuffer, value: T | undefined): void {
    if (value === undefined) {
      buffer.writeByte(0);
      return;
    }
    buffer.writeByte(1);
    this.itemCodec.encode(buffer, value);
  }

  decode(buffer: ByteBuffer): T | undefined {
    if (!readFlag(buffer, this.strict, 'presence')) {
      return undefined;
    }
    return this.itemCodec.decode(buffer);
  }

  size(value: T | undefined): number {
    return value === undefined ? 1 : 1 + this.itemCodec.size(value);
  }
}
