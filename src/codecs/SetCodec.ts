import { ByteBuffer } from '../ByteBuffer';
import { Codec } from './Codec';
import { CodecLimits, resolveLimits } from '../config';
import { CodecError, CodecErrorContext } from '../errors';
import { bytesToHex } from '../hex';
import {
  compactSizeSize,
  compareBytes,
  decodeCompactSize,
  encodeCompactSize,
  serialize,
} from '../helpers';

export interface SetOptions<T> {
  itemCodec: Codec<T>;
  /** Natural order of an ordered set; omitted means canonical encoded-byte order. */
  compare?: (a: T, b: T) => number;
  limits?: CodecLimits;
}

/**
 * Key set codec: CompactSize count followed by each member.
 */
export class SetCodec<T> implements Codec<Set<T>> {
  private readonly itemCodec: Codec<T>;
  private readonly compare?: (a: T, b: T) => number;
  private readonly maxSize: number;

  constructor(options: SetOptions<T>) {
    this.itemCodec = options.itemCodec;
    this.compare = options.compare;
    this.maxSize = resolveLimits(options.limits).maxSize;
  }

  get ordered(): boolean {
    return this.compare !== undefined;
  }

  encode(buffer: ByteBuffer, value: Set<T>): void {
    encodeCompactSize(buffer, value.size, this.maxSize);
    const { compare } = this;
    if (compare) {
      const items = [...value].sort(compare);
      items.forEach((item, i) => {
        if (i > 0 && compare(items[i - 1], item) === 0) {
          throw duplicateMember(`member ${i}`, { index: i });
        }
        this.itemCodec.encode(buffer, item);
      });
      return;
    }
    const encoded = [...value].map(item => serialize(this.itemCodec, item));
    encoded.sort(compareBytes);
    encoded.forEach((bytes, i) => {
      if (i > 0 && compareBytes(encoded[i - 1], bytes) === 0) {
        throw duplicateMember(`member ${i}`, { index: i });
      }
      buffer.writeBytes(bytes);
    });
  }

  decode(buffer: ByteBuffer): Set<T> {
    const count = decodeCompactSize(buffer, this.maxSize);
    const result = new Set<T>();
    const seen = new Set<string>();
    for (let i = 0; i < count; i++) {
      const offset = buffer.offset;
      const item = this.itemCodec.decode(buffer);
      const encoded = bytesToHex(buffer.slice(offset, buffer.offset));
      if (seen.has(encoded)) {
        throw duplicateMember(`offset ${offset}`, { offset, index: i });
      }
      seen.add(encoded);
      result.add(item);
    }
    return result;
  }

  size(value: Set<T>): number {
    let total = compactSizeSize(value.size);
    for (const item of value) {
      total += this.itemCodec.size(item);
    }
    return total;
  }
}

function duplicateMember(where: string, context: CodecErrorContext): CodecError {
  return new CodecError('TypeMismatch', `duplicate set member at ${where}`, context);
}
