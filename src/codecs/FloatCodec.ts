import { ByteBuffer } from '../ByteBuffer';
import { Codec } from './Codec';
import { bitsToDouble, bitsToFloat, doubleToBits, floatToBits } from '../helpers';

/**
 * IEEE-754 float codec. The bit pattern is written as a little-endian
 * unsigned integer of the same width (4 bytes for single, 8 for double).
 */
export class FloatCodec implements Codec<number> {
  readonly precision: 32 | 64;

  constructor(precision: 32 | 64 = 64) {
    this.precision = precision;
  }

  encode(buffer: ByteBuffer, value: number): void {
    if (this.precision === 32) {
      buffer.writeUint(floatToBits(value), 4);
    } else {
      buffer.writeBigUint64(doubleToBits(value));
    }
  }

  decode(buffer: ByteBuffer): number {
    return this.precision === 32
      ? bitsToFloat(buffer.readUint(4))
      : bitsToDouble(buffer.readBigUint64());
  }

  size(): number {
    return this.precision / 8;
  }
}
