import { OptionalCodec } from '../../src/codecs/OptionalCodec';
import { StringCodec } from '../../src/codecs/StringCodec';
import { deserialize, serialize } from '../../src/helpers';
import { bytesToHex, hexToBytes } from '../../src/hex';
import { isCodecError } from '../../src/errors';

describe('OptionalCodec', () => {
  const codec = new OptionalCodec(new StringCodec());

  it('writes a zero presence byte for an absent value', () => {
    expect(bytesToHex(serialize(codec, undefined))).toBe('00');
    expect(codec.size(undefined)).toBe(1);
    expect(deserialize(codec, hexToBytes('00'))).toBeUndefined();
  });

  it('writes a one presence byte followed by the value', () => {
    expect(bytesToHex(serialize(codec, 'x'))).toBe('010178');
    expect(codec.size('x')).toBe(3);
    expect(deserialize(codec, hexToBytes('010178'))).toBe('x');
  });

  it('rejects other presence bytes by default', () => {
    try {
      deserialize(codec, hexToBytes('020178'));
      throw new Error('expected a CodecError');
    } catch (e) {
      expect(isCodecError(e, 'TypeMismatch')).toBe(true);
      expect(e instanceof Error && e.message).toBe('invalid presence byte 0x2 at offset 0');
    }
  });

  it('treats any nonzero presence byte as present when not strict', () => {
    const lenient = new OptionalCodec(new StringCodec(), { strictBooleans: false });
    expect(deserialize(lenient, hexToBytes('ff0178'))).toBe('x');
  });

  it('refuses to wrap another optional', () => {
    expect(() => new OptionalCodec(new OptionalCodec(new StringCodec()))).toThrow(
      'OptionalCodec cannot wrap another OptionalCodec',
    );
  });
});
