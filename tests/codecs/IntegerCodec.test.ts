import { BigIntegerCodec, IntegerCodec, integerRange } from '../../src/codecs/IntegerCodec';
import { deserialize, serialize } from '../../src/helpers';
import { bytesToHex, hexToBytes } from '../../src/hex';
import { CodecError } from '../../src/errors';

describe('IntegerCodec', () => {
  it('encodes unsigned values little-endian at exact width', () => {
    expect(bytesToHex(serialize(new IntegerCodec({ width: 8 }), 0xff))).toBe('ff');
    expect(bytesToHex(serialize(new IntegerCodec({ width: 16 }), 0x1234))).toBe('3412');
    expect(bytesToHex(serialize(new IntegerCodec({ width: 32 }), 0x01020304))).toBe('04030201');
  });

  it('encodes signed values as two\'s complement', () => {
    const i8 = new IntegerCodec({ width: 8, signed: true });
    const i16 = new IntegerCodec({ width: 16, signed: true });
    const i32 = new IntegerCodec({ width: 32, signed: true });
    expect(bytesToHex(serialize(i8, -1))).toBe('ff');
    expect(bytesToHex(serialize(i16, -2))).toBe('feff');
    expect(bytesToHex(serialize(i32, -2147483648))).toBe('00000080');
    expect(deserialize(i8, hexToBytes('80'))).toBe(-128);
    expect(deserialize(i16, hexToBytes('feff'))).toBe(-2);
    expect(deserialize(i32, hexToBytes('ffffff7f'))).toBe(2147483647);
  });

  it('reports fixed sizes and type names', () => {
    const u16 = new IntegerCodec({ width: 16 });
    expect(u16.size()).toBe(2);
    expect(u16.typeName).toBe('u16');
    expect(new IntegerCodec({ width: 32, signed: true }).typeName).toBe('i32');
  });

  it('rejects out-of-range and fractional values with TypeMismatch', () => {
    const u8 = new IntegerCodec({ width: 8 });
    expect(() => serialize(u8, 256)).toThrow('u8: value 256 out of range [0, 255]');
    expect(() => serialize(u8, -1)).toThrow(CodecError);
    expect(() => serialize(u8, 1.5)).toThrow(CodecError);
    expect(() => serialize(new IntegerCodec({ width: 8, signed: true }), 128)).toThrow(
      'i8: value 128 out of range [-128, 127]',
    );
  });

  it('computes ranges', () => {
    expect(integerRange(16, false)).toEqual({ min: 0, max: 65535 });
    expect(integerRange(32, true)).toEqual({ min: -2147483648, max: 2147483647 });
  });
});

describe('BigIntegerCodec', () => {
  it('encodes 64-bit values little-endian', () => {
    const u64 = new BigIntegerCodec();
    expect(bytesToHex(serialize(u64, 0x0102030405060708n))).toBe('0807060504030201');
    expect(deserialize(u64, hexToBytes('ffffffffffffffff'))).toBe(0xffffffffffffffffn);
  });

  it('encodes signed 64-bit values as two\'s complement', () => {
    const i64 = new BigIntegerCodec({ signed: true });
    expect(bytesToHex(serialize(i64, -1n))).toBe('ffffffffffffffff');
    expect(bytesToHex(serialize(i64, -(2n ** 63n)))).toBe('0000000000000080');
    expect(deserialize(i64, hexToBytes('ffffffffffffffff'))).toBe(-1n);
  });

  it('rejects out-of-range values', () => {
    expect(() => serialize(new BigIntegerCodec(), -1n)).toThrow(CodecError);
    expect(() => serialize(new BigIntegerCodec({ signed: true }), 2n ** 63n)).toThrow(CodecError);
  });
});
