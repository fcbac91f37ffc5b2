import { ByteBuffer, UintWidth } from '../ByteBuffer';
import { Codec } from './Codec';
import { CodecError } from '../errors';

export type IntegerWidth = 8 | 16 | 32;

export interface IntegerOptions {
  /** Width in bits. */
  width: IntegerWidth;
  /** Two's complement when true. Defaults to false. */
  signed?: boolean;
}

/** Inclusive value range of an integer of the given width. */
export function integerRange(width: IntegerWidth, signed: boolean): { min: number; max: number } {
  const span = 2 ** width;
  return signed ? { min: -(span / 2), max: span / 2 - 1 } : { min: 0, max: span - 1 };
}

/**
 * Fixed-width little-endian integer codec for 8, 16 and 32 bit values.
 * 64-bit values go through BigIntegerCodec.
 */
export class IntegerCodec implements Codec<number> {
  readonly width: IntegerWidth;
  readonly signed: boolean;
  private readonly min: number;
  private readonly max: number;

  constructor(options: IntegerOptions) {
    this.width = options.width;
    this.signed = options.signed ?? false;
    const range = integerRange(this.width, this.signed);
    this.min = range.min;
    this.max = range.max;
  }

  private get byteWidth(): UintWidth {
    switch (this.width) {
      case 8:
        return 1;
      case 16:
        return 2;
      case 32:
        return 4;
    }
  }

  encode(buffer: ByteBuffer, value: number): void {
    if (!Number.isInteger(value) || value < this.min || value > this.max) {
      throw new CodecError(
        'TypeMismatch',
        `${this.typeName}: value ${value} out of range [${this.min}, ${this.max}]`,
        { value, min: this.min, max: this.max },
      );
    }
    const bits = value < 0 ? value + 2 ** this.width : value;
    buffer.writeUint(bits, this.byteWidth);
  }

  decode(buffer: ByteBuffer): number {
    const bits = buffer.readUint(this.byteWidth);
    return this.signed && bits > this.max ? bits - 2 ** this.width : bits;
  }

  size(): number {
    return this.byteWidth;
  }

  /** Short type name such as "u16" or "i32". */
  get typeName(): string {
    return `${this.signed ? 'i' : 'u'}${this.width}`;
  }
}

const I64_MIN = -(2n ** 63n);
const I64_MAX = 2n ** 63n - 1n;
const U64_MAX = 2n ** 64n - 1n;

/**
 * 64-bit little-endian integer codec. Values are bigints.
 */
export class BigIntegerCodec implements Codec<bigint> {
  readonly signed: boolean;

  constructor(options: { signed?: boolean } = {}) {
    this.signed = options.signed ?? false;
  }

  encode(buffer: ByteBuffer, value: bigint): void {
    const min = this.signed ? I64_MIN : 0n;
    const max = this.signed ? I64_MAX : U64_MAX;
    if (value < min || value > max) {
      throw new CodecError('TypeMismatch', `${this.typeName}: value ${value} out of range [${min}, ${max}]`, {
        value: value.toString(),
      });
    }
    buffer.writeBigUint64(BigInt.asUintN(64, value));
  }

  decode(buffer: ByteBuffer): bigint {
    const bits = buffer.readBigUint64();
    return this.signed ? BigInt.asIntN(64, bits) : bits;
  }

  size(): number {
    return 8;
  }

  get typeName(): string {
    return this.signed ? 'i64' : 'u64';
  }
}
