import type { ByteBuffer } from '../ByteBuffer';

/**
 * Base interface for all wire codecs.
 * @template T The TypeScript type this codec encodes/decodes.
 */
export interface Codec<T> {
  /** Append the encoding of a value to the buffer. */
  encode(buffer: ByteBuffer, value: T): void;

  /** Decode a value from the buffer at its current read offset. */
  decode(buffer: ByteBuffer): T;

  /** Exact number of bytes encode() writes for this value. */
  size(value: T): number;
}

/** The value type a codec encodes. */
export type CodecValue<C> = C extends Codec<infer T> ? T : never;
