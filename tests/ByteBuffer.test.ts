import { ByteBuffer } from '../src/ByteBuffer';
import { CodecError } from '../src/errors';

describe('ByteBuffer', () => {
  describe('alloc and basic properties', () => {
    it('starts with zero length and offset', () => {
      const buf = ByteBuffer.alloc();
      expect(buf.length).toBe(0);
      expect(buf.offset).toBe(0);
      expect(buf.remaining).toBe(0);
    });

    it('copies the source array in from()', () => {
      const source = new Uint8Array([1, 2, 3]);
      const buf = ByteBuffer.from(source);
      source[0] = 9;
      expect(buf.toHex()).toBe('010203');
      expect(buf.remaining).toBe(3);
    });

    it('parses hex in fromHex()', () => {
      expect(ByteBuffer.fromHex('00ff7f').toUint8Array()).toEqual(new Uint8Array([0x00, 0xff, 0x7f]));
    });
  });

  describe('writeByte / readByte', () => {
    it('writes at the end and reads from the cursor', () => {
      const buf = ByteBuffer.alloc(0);
      buf.writeByte(0x12);
      buf.writeByte(0x34);
      expect(buf.length).toBe(2);
      expect(buf.readByte()).toBe(0x12);
      buf.writeByte(0x56);
      expect(buf.readByte()).toBe(0x34);
      expect(buf.readByte()).toBe(0x56);
      expect(buf.remaining).toBe(0);
    });

    it('throws InsufficientData when reading past end', () => {
      const buf = ByteBuffer.fromHex('01');
      buf.readByte();
      expect(() => buf.readByte()).toThrow(CodecError);
      try {
        buf.readByte();
      } catch (e) {
        expect(e).toBeInstanceOf(CodecError);
        if (e instanceof CodecError) {
          expect(e.kind).toBe('InsufficientData');
          expect(e.context).toEqual({ offset: 1, requested: 1, remaining: 0 });
        }
      }
    });

    it('grows past the initial capacity', () => {
      const buf = ByteBuffer.alloc(1);
      for (let i = 0; i < 100; i++) buf.writeByte(i);
      expect(buf.length).toBe(100);
      expect(buf.at(99)).toBe(99);
    });
  });

  describe('read / append / peek', () => {
    it('reads exactly n bytes and never a partial run', () => {
      const buf = ByteBuffer.fromHex('0102030405');
      expect(buf.read(2)).toEqual(new Uint8Array([1, 2]));
      expect(() => buf.read(4)).toThrow('need 4 byte(s) at offset 2, 3 remaining');
      expect(buf.offset).toBe(2);
      expect(buf.readBytes(3)).toEqual(new Uint8Array([3, 4, 5]));
    });

    it('appends bytes at the end', () => {
      const buf = ByteBuffer.alloc();
      buf.append(new Uint8Array([0xaa, 0xbb]));
      buf.writeBytes(new Uint8Array([0xcc]));
      expect(buf.toHex()).toBe('aabbcc');
    });

    it('peeks without moving the cursor', () => {
      const buf = ByteBuffer.fromHex('a1b2c3');
      buf.readByte();
      expect(buf.peek()).toEqual(new Uint8Array([0xb2]));
      expect(buf.peek(2)).toEqual(new Uint8Array([0xb2, 0xc3]));
      expect(buf.offset).toBe(1);
    });

    it('rejects negative read counts', () => {
      expect(() => ByteBuffer.fromHex('00').read(-1)).toThrow(RangeError);
    });
  });

  describe('fixed-width little-endian accessors', () => {
    it('writes uint16 and uint32 least significant byte first', () => {
      const buf = ByteBuffer.alloc();
      buf.writeUint(0x1234, 2);
      buf.writeUint(0xdeadbeef, 4);
      buf.writeUint(0x7f, 1);
      expect(buf.toHex()).toBe('3412efbeadde7f');
      expect(buf.readUint(2)).toBe(0x1234);
      expect(buf.readUint(4)).toBe(0xdeadbeef);
      expect(buf.readUint(1)).toBe(0x7f);
    });

    it('writes uint64 little-endian', () => {
      const buf = ByteBuffer.alloc();
      buf.writeBigUint64(0x0102030405060708n);
      expect(buf.toHex()).toBe('0807060504030201');
      expect(buf.readBigUint64()).toBe(0x0102030405060708n);
    });
  });

  describe('insert', () => {
    it('inserts at begin, middle and end', () => {
      const buf = ByteBuffer.fromHex('0203');
      buf.insert(0, new Uint8Array([0x01]));
      buf.insert(3, new Uint8Array([0x04]));
      buf.insert(2, new Uint8Array([0xaa, 0xbb]));
      expect(buf.toHex()).toBe('0102aabb0304');
    });

    it('moves the cursor when inserting before it', () => {
      const buf = ByteBuffer.fromHex('0a0b0c');
      buf.readByte();
      buf.insert(0, new Uint8Array([0x01, 0x02]));
      expect(buf.offset).toBe(3);
      expect(buf.readByte()).toBe(0x0b);
    });

    it('leaves the cursor when inserting at or after it', () => {
      const buf = ByteBuffer.fromHex('0a0b0c');
      buf.readByte();
      buf.insert(1, new Uint8Array([0xff]));
      expect(buf.offset).toBe(1);
      expect(buf.readByte()).toBe(0xff);
    });

    it('rejects positions outside [0, length]', () => {
      const buf = ByteBuffer.fromHex('00');
      expect(() => buf.insert(2, new Uint8Array([1]))).toThrow(RangeError);
      expect(() => buf.insert(-1, new Uint8Array([1]))).toThrow(RangeError);
    });
  });

  describe('erase', () => {
    it('erases a single byte by default', () => {
      const buf = ByteBuffer.fromHex('010203');
      buf.erase(1);
      expect(buf.toHex()).toBe('0103');
    });

    it('erases a range', () => {
      const buf = ByteBuffer.fromHex('0102030405');
      buf.erase(1, 4);
      expect(buf.toHex()).toBe('0105');
      expect(buf.length).toBe(2);
    });

    it('keeps the cursor on the same unread byte when erasing before it', () => {
      const buf = ByteBuffer.fromHex('0102030405');
      buf.read(3);
      buf.erase(0, 2);
      expect(buf.offset).toBe(1);
      expect(buf.readByte()).toBe(0x04);
    });

    it('moves the cursor to the erase start when it lay inside the range', () => {
      const buf = ByteBuffer.fromHex('0102030405');
      buf.read(2);
      buf.erase(1, 4);
      expect(buf.offset).toBe(1);
      expect(buf.readByte()).toBe(0x05);
    });

    it('rejects an end before start', () => {
      expect(() => ByteBuffer.fromHex('0102').erase(2, 1)).toThrow(RangeError);
    });
  });

  describe('clear and takeAndClear', () => {
    it('clear empties the buffer for reuse', () => {
      const buf = ByteBuffer.fromHex('0102');
      buf.readByte();
      buf.clear();
      expect(buf.length).toBe(0);
      expect(buf.offset).toBe(0);
      buf.writeByte(0x09);
      expect(buf.toHex()).toBe('09');
    });

    it('takeAndClear hands off the contents and leaves the buffer empty', () => {
      const buf = ByteBuffer.alloc();
      buf.writeBytes(new Uint8Array([1, 2, 3]));
      const taken = buf.takeAndClear();
      expect(taken).toEqual(new Uint8Array([1, 2, 3]));
      expect(buf.length).toBe(0);
      buf.writeByte(0x42);
      expect(taken).toEqual(new Uint8Array([1, 2, 3]));
      expect(buf.toHex()).toBe('42');
    });
  });

  describe('cursor control', () => {
    it('seek and reset move the read cursor', () => {
      const buf = ByteBuffer.fromHex('0a0b0c');
      buf.seek(2);
      expect(buf.readByte()).toBe(0x0c);
      buf.reset();
      expect(buf.readByte()).toBe(0x0a);
      expect(() => buf.seek(4)).toThrow(RangeError);
    });

    it('at() returns undefined past the end', () => {
      const buf = ByteBuffer.fromHex('0a');
      expect(buf.at(0)).toBe(0x0a);
      expect(buf.at(1)).toBeUndefined();
    });

    it('slice() copies a span without moving the cursor', () => {
      const buf = ByteBuffer.fromHex('0a0b0c0d');
      buf.readByte();
      expect(buf.slice(1, 3)).toEqual(new Uint8Array([0x0b, 0x0c]));
      expect(buf.slice(2)).toEqual(new Uint8Array([0x0c, 0x0d]));
      expect(buf.offset).toBe(1);
      expect(() => buf.slice(3, 2)).toThrow(RangeError);
      expect(() => buf.slice(0, 5)).toThrow(RangeError);
    });
  });
});
