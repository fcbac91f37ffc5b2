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

export interface MapOptions<K, V> {
  keyCodec: Codec<K>;
  valueCodec: Codec<V>;
  /**
   * Natural key order of an ordered map. When omitted the map is treated as
   * unordered and entries are written sorted by their encoded key bytes.
   */
  compare?: (a: K, b: K) => number;
  limits?: CodecLimits;
}

/**
 * Key/value map codec: CompactSize entry count, then key and value of each
 * entry. Decoding inserts entries in the order read.
 */
export class MapCodec<K, V> implements Codec<Map<K, V>> {
  private readonly keyCodec: Codec<K>;
  private readonly valueCodec: Codec<V>;
  private readonly compare?: (a: K, b: K) => number;
  private readonly maxSize: number;

  constructor(options: MapOptions<K, V>) {
    this.keyCodec = options.keyCodec;
    this.valueCodec = options.valueCodec;
    this.compare = options.compare;
    this.maxSize = resolveLimits(options.limits).maxSize;
  }

  /** True when entries follow a caller-supplied natural order. */
  get ordered(): boolean {
    return this.compare !== undefined;
  }

  encode(buffer: ByteBuffer, value: Map<K, V>): void {
    encodeCompactSize(buffer, value.size, this.maxSize);
    const { compare } = this;
    if (compare) {
      const entries = [...value.entries()].sort((a, b) => compare(a[0], b[0]));
      entries.forEach(([key, item], i) => {
        if (i > 0 && compare(entries[i - 1][0], key) === 0) {
          throw duplicateKey(`entry ${i}`, { index: i });
        }
        this.keyCodec.encode(buffer, key);
        this.valueCodec.encode(buffer, item);
      });
      return;
    }
    const encoded = [...value.entries()].map(([key, item]) => ({
      key: serialize(this.keyCodec, key),
      item,
    }));
    encoded.sort((a, b) => compareBytes(a.key, b.key));
    encoded.forEach(({ key, item }, i) => {
      // keys with equal content encode to equal bytes even when they are distinct objects
      if (i > 0 && compareBytes(encoded[i - 1].key, key) === 0) {
        throw duplicateKey(`entry ${i}`, { index: i });
      }
      buffer.writeBytes(key);
      this.valueCodec.encode(buffer, item);
    });
  }

  decode(buffer: ByteBuffer): Map<K, V> {
    const count = decodeCompactSize(buffer, this.maxSize);
    const result = new Map<K, V>();
    const seen = new Set<string>();
    for (let i = 0; i < count; i++) {
      const offset = buffer.offset;
      const key = this.keyCodec.decode(buffer);
      const encodedKey = bytesToHex(buffer.slice(offset, buffer.offset));
      if (seen.has(encodedKey)) {
        throw duplicateKey(`offset ${offset}`, { offset, index: i });
      }
      seen.add(encodedKey);
      result.set(key, this.valueCodec.decode(buffer));
    }
    return result;
  }

  size(value: Map<K, V>): number {
    let total = compactSizeSize(value.size);
    for (const [key, item] of value) {
      total += this.keyCodec.size(key) + this.valueCodec.size(item);
    }
    return total;
  }
}

function duplicateKey(where: string, context: CodecErrorContext): CodecError {
  return new CodecError('TypeMismatch', `duplicate map key at ${where}`, context);
}
