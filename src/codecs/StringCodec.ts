import { ByteBuffer } from '../ByteBuffer';
import { Codec } from './Codec';
import { CodecLimits, resolveLimits } from '../config';
import { CodecError } from '../errors';
import { compactSizeSize, decodeCompactSize, encodeCompactSize } from '../helpers';

const encoder = new TextEncoder();
// ignoreBOM keeps a leading U+FEFF as part of the value
const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Number of bytes in the UTF-8 encoding of a string, without encoding it.
 * Lone surrogates have no UTF-8 form and fail with TypeMismatch.
 */
export function utf8Length(value: string): number {
  let length = 0;
  for (let i = 0; i < value.length; i++) {
    const code = value.charCodeAt(i);
    if (code < 0x80) {
      length += 1;
    } else if (code < 0x800) {
      length += 2;
    } else if (code >= 0xd800 && code <= 0xdbff && isLowSurrogate(value.charCodeAt(i + 1))) {
      length += 4;
      i++;
    } else if (code >= 0xd800 && code <= 0xdfff) {
      throw new CodecError('TypeMismatch', `lone surrogate 0x${code.toString(16)} at index ${i}`, { index: i });
    } else {
      length += 3;
    }
  }
  return length;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * String codec: CompactSize byte length followed by the UTF-8 bytes.
 * No terminator, no escaping.
 */
export class StringCodec implements Codec<string> {
  private readonly maxSize: number;

  constructor(limits?: CodecLimits) {
    this.maxSize = resolveLimits(limits).maxSize;
  }

  encode(buffer: ByteBuffer, value: string): void {
    utf8Length(value);
    const bytes = encoder.encode(value);
    encodeCompactSize(buffer, bytes.length, this.maxSize);
    buffer.writeBytes(bytes);
  }

  decode(buffer: ByteBuffer): string {
    const length = decodeCompactSize(buffer, this.maxSize);
    const offset = buffer.offset;
    const bytes = buffer.readBytes(length);
    try {
      return decoder.decode(bytes);
    } catch (e) {
      throw new CodecError('TypeMismatch', `invalid UTF-8 in string at offset ${offset}`, {
        offset,
        length,
        reason: e instanceof Error ? e.message : String(e),
      });
    }
  }

  size(value: string): number {
    const length = utf8Length(value);
    return compactSizeSize(length) + length;
  }
}
