import { ByteBuffer } from '../ByteBuffer';
import { Codec } from './Codec';
import { CodecLimits, resolveLimits } from '../config';
import { CodecError } from '../errors';

/**
 * Boolean codec. Encodes as a single byte: 0 = false, 1 = true.
 */
export class BooleanCodec implements Codec<boolean> {
  private readonly strict: boolean;

  constructor(limits?: CodecLimits) {
    this.strict = resolveLimits(limits).strictBooleans;
  }

  encode(buffer: ByteBuffer, value: boolean): void {
    buffer.writeByte(value ? 1 : 0);
  }

  decode(buffer: ByteBuffer): boolean {
    return readFlag(buffer, this.strict, 'boolean');
  }

  size(): number {
    return 1;
  }
}

/**
 * Read a 0/1 flag byte. Under strict policy any other byte is a TypeMismatch,
 * otherwise every nonzero byte counts as set.
 */
export function readFlag(buffer: ByteBuffer, strict: boolean, what: string): boolean {
  const offset = buffer.offset;
  const byte = buffer.readByte();
  if (byte > 1 && strict) {
    throw new CodecError('TypeMismatch', `invalid ${what} byte 0x${byte.toString(16)} at offset ${offset}`, {
      offset,
      byte,
    });
  }
  return byte !== 0;
}
