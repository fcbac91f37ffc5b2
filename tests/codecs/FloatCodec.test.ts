import { FloatCodec } from '../../src/codecs/FloatCodec';
import { deserialize, serialize } from '../../src/helpers';
import { bytesToHex, hexToBytes } from '../../src/hex';

describe('FloatCodec', () => {
  it('writes the single-precision bit pattern little-endian', () => {
    const codec = new FloatCodec(32);
    expect(codec.size()).toBe(4);
    expect(bytesToHex(serialize(codec, 1.0))).toBe('0000803f');
    expect(bytesToHex(serialize(codec, 785.066650390625))).toBe('44444444');
    expect(deserialize(codec, hexToBytes('0000003f'))).toBe(0.5);
  });

  it('writes the double-precision bit pattern little-endian', () => {
    const codec = new FloatCodec();
    expect(codec.size()).toBe(8);
    expect(bytesToHex(serialize(codec, 2.0))).toBe('0000000000000040');
    expect(bytesToHex(serialize(codec, 785.066650390625))).toBe('0000008088888840');
    expect(deserialize(codec, hexToBytes('000000000000f03f'))).toBe(1.0);
  });

  it('rounds doubles to single precision', () => {
    expect(deserialize(new FloatCodec(32), serialize(new FloatCodec(32), 0.1))).toBe(Math.fround(0.1));
  });

  it('preserves special values', () => {
    const codec = new FloatCodec();
    expect(deserialize(codec, serialize(codec, Infinity))).toBe(Infinity);
    expect(deserialize(codec, serialize(codec, NaN))).toBeNaN();
    expect(Object.is(deserialize(codec, serialize(codec, -0)), -0)).toBe(true);
  });
});
