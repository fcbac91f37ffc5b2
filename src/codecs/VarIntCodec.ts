import { ByteBuffer } from '../ByteBuffer';
import { Codec } from './Codec';
import { IntegerWidth, integerRange } from './IntegerCodec';
import { CodecError } from '../errors';
import { decodeVarInt, encodeVarInt, varIntSize } from '../helpers';

export interface VarIntOptions {
  /** Width of the target integer in bits; decoding fails with Overflow beyond it. */
  width: IntegerWidth;
  signed?: boolean;
}

/**
 * VarInt codec for 8, 16 and 32 bit targets.
 * Signed values are encoded through their two's complement bit pattern at the
 * declared width, not zig-zag.
 */
export class VarIntCodec implements Codec<number> {
  readonly width: IntegerWidth;
  readonly signed: boolean;
  private readonly min: number;
  private readonly max: number;
  private readonly maxMagnitude: bigint;

  constructor(options: VarIntOptions) {
    this.width = options.width;
    this.signed = options.signed ?? false;
    const range = integerRange(this.width, this.signed);
    this.min = range.min;
    this.max = range.max;
    this.maxMagnitude = (1n << BigInt(this.width)) - 1n;
  }

  encode(buffer: ByteBuffer, value: number): void {
    encodeVarInt(buffer, this.toMagnitude(value));
  }

  decode(buffer: ByteBuffer): number {
    const magnitude = Number(decodeVarInt(buffer, this.maxMagnitude));
    return this.signed && magnitude > this.max ? magnitude - 2 ** this.width : magnitude;
  }

  size(value: number): number {
    return varIntSize(this.toMagnitude(value));
  }

  private toMagnitude(value: number): bigint {
    if (!Number.isInteger(value) || value < this.min || value > this.max) {
      throw new CodecError(
        'TypeMismatch',
        `varint<${this.signed ? 'i' : 'u'}${this.width}>: value ${value} out of range [${this.min}, ${this.max}]`,
        { value, min: this.min, max: this.max },
      );
    }
    return BigInt(value < 0 ? value + 2 ** this.width : value);
  }
}

/**
 * VarInt codec for 64-bit targets. Values are bigints.
 */
export class BigVarIntCodec implements Codec<bigint> {
  readonly signed: boolean;

  constructor(options: { signed?: boolean } = {}) {
    this.signed = options.signed ?? false;
  }

  encode(buffer: ByteBuffer, value: bigint): void {
    encodeVarInt(buffer, this.toMagnitude(value));
  }

  decode(buffer: ByteBuffer): bigint {
    const magnitude = decodeVarInt(buffer);
    return this.signed ? BigInt.asIntN(64, magnitude) : magnitude;
  }

  size(value: bigint): number {
    return varIntSize(this.toMagnitude(value));
  }

  private toMagnitude(value: bigint): bigint {
    const wrapped = this.signed ? BigInt.asIntN(64, value) : BigInt.asUintN(64, value);
    if (wrapped !== value) {
      throw new CodecError('TypeMismatch', `varint<${this.signed ? 'i' : 'u'}64>: value ${value} out of range`, {
        value: value.toString(),
      });
    }
    return BigInt.asUintN(64, value);
  }
}
