import { CodecError } from './errors';
import { bytesToHex, hexToBytes } from './hex';

export type UintWidth = 1 | 2 | 4;

/**
 * Growable byte buffer for wire encoding/decoding.
 * Writes always append at the end; reads consume from an independent cursor.
 * Multi-byte integers are little-endian.
 */
export class ByteBuffer {
  private _data: Uint8Array;
  private _view: DataView;
  private _length: number;
  private _offset: number;

  private constructor(data: Uint8Array, length: number) {
    this._data = data;
    this._view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this._length = length;
    this._offset = 0;
  }

  /** Allocate an empty buffer with optional initial capacity. */
  static alloc(initialCapacity = 256): ByteBuffer {
    return new ByteBuffer(new Uint8Array(Math.max(initialCapacity, 0)), 0);
  }

  /** Copy existing bytes into a new buffer positioned for reading. */
  static from(data: Uint8Array): ByteBuffer {
    return new ByteBuffer(new Uint8Array(data), data.length);
  }

  /** Parse a hex string (even length, no prefix) into a buffer. */
  static fromHex(hex: string): ByteBuffer {
    return ByteBuffer.from(hexToBytes(hex));
  }

  /** Total number of bytes held. */
  get length(): number {
    return this._length;
  }

  /** Current read position. */
  get offset(): number {
    return this._offset;
  }

  /** Bytes remaining from cursor to end. */
  get remaining(): number {
    return this._length - this._offset;
  }

  /** Byte at an absolute position, or undefined past the end. */
  at(position: number): number | undefined {
    if (position < 0 || position >= this._length) return undefined;
    return this._data[position];
  }

  writeByte(value: number): void {
    this.ensureCapacity(this._length + 1);
    this._data[this._length++] = value & 0xff;
  }

  readByte(): number {
    this.require(1);
    return this._data[this._offset++];
  }

  writeBytes(data: Uint8Array): void {
    this.ensureCapacity(this._length + data.length);
    this._data.set(data, this._length);
    this._length += data.length;
  }

  /** Read exactly `count` bytes into a fresh array. */
  readBytes(count: number): Uint8Array {
    this.require(count);
    const result = this._data.slice(this._offset, this._offset + count);
    this._offset += count;
    return result;
  }

  append(data: Uint8Array): void {
    this.writeBytes(data);
  }

  read(count: number): Uint8Array {
    return this.readBytes(count);
  }

  /** Look at the next `count` unread bytes without moving the cursor. */
  peek(count = 1): Uint8Array {
    this.require(count);
    return this._data.slice(this._offset, this._offset + count);
  }

  /** Write an unsigned integer of 1, 2 or 4 bytes. */
  writeUint(value: number, width: UintWidth): void {
    this.ensureCapacity(this._length + width);
    switch (width) {
      case 1:
        this._view.setUint8(this._length, value);
        break;
      case 2:
        this._view.setUint16(this._length, value, true);
        break;
      case 4:
        this._view.setUint32(this._length, value, true);
        break;
    }
    this._length += width;
  }

  readUint(width: UintWidth): number {
    this.require(width);
    const at = this._offset;
    this._offset += width;
    switch (width) {
      case 1:
        return this._view.getUint8(at);
      case 2:
        return this._view.getUint16(at, true);
      case 4:
        return this._view.getUint32(at, true);
    }
  }

  writeBigUint64(value: bigint): void {
    this.ensureCapacity(this._length + 8);
    this._view.setBigUint64(this._length, value, true);
    this._length += 8;
  }

  readBigUint64(): bigint {
    this.require(8);
    const result = this._view.getBigUint64(this._offset, true);
    this._offset += 8;
    return result;
  }

  /**
   * Insert bytes at an absolute position in [0, length].
   * Inserting before the cursor moves the cursor along with the bytes it pointed at.
   */
  insert(position: number, data: Uint8Array): void {
    this.checkPosition(position);
    this.ensureCapacity(this._length + data.length);
    this._data.copyWithin(position + data.length, position, this._length);
    this._data.set(data, position);
    this._length += data.length;
    if (position < this._offset) {
      this._offset += data.length;
    }
  }

  /** Remove bytes in [start, end). `end` defaults to start + 1. */
  erase(start: number, end = start + 1): void {
    this.checkPosition(start);
    this.checkPosition(end);
    if (end < start) {
      throw new RangeError(`erase: end ${end} precedes start ${start}`);
    }
    const count = end - start;
    this._data.copyWithin(start, end, this._length);
    this._length -= count;
    if (this._offset >= end) {
      this._offset -= count;
    } else if (this._offset > start) {
      this._offset = start;
    }
  }

  /** Truncate to empty and reset the cursor. Capacity is kept for reuse. */
  clear(): void {
    this._length = 0;
    this._offset = 0;
  }

  /**
   * Hand off the current contents without copying and leave the buffer empty.
   * The returned array is no longer referenced by this buffer; the next write
   * allocates a fresh arena.
   */
  takeAndClear(): Uint8Array {
    const taken = this._data.subarray(0, this._length);
    this._data = new Uint8Array(0);
    this._view = new DataView(this._data.buffer);
    this._length = 0;
    this._offset = 0;
    return taken;
  }

  /** Copy of the bytes in [start, end), regardless of cursor. */
  slice(start: number, end: number = this._length): Uint8Array {
    this.checkPosition(start);
    this.checkPosition(end);
    if (end < start) {
      throw new RangeError(`slice: end ${end} precedes start ${start}`);
    }
    return this._data.slice(start, end);
  }

  /** Copy of all bytes held, regardless of cursor. */
  toUint8Array(): Uint8Array {
    return this._data.slice(0, this._length);
  }

  toHex(): string {
    return bytesToHex(this._data.subarray(0, this._length));
  }

  /** Reset cursor to 0. */
  reset(): void {
    this._offset = 0;
  }

  seek(position: number): void {
    this.checkPosition(position);
    this._offset = position;
  }

  private require(count: number): void {
    if (!Number.isSafeInteger(count) || count < 0) {
      throw new RangeError(`read count must be a non-negative integer, got ${count}`);
    }
    if (count > this.remaining) {
      throw new CodecError(
        'InsufficientData',
        `ByteBuffer: need ${count} byte(s) at offset ${this._offset}, ${this.remaining} remaining`,
        { offset: this._offset, requested: count, remaining: this.remaining },
      );
    }
  }

  private checkPosition(position: number): void {
    if (!Number.isInteger(position) || position < 0 || position > this._length) {
      throw new RangeError(`position ${position} out of range [0, ${this._length}]`);
    }
  }

  private ensureCapacity(bytesNeeded: number): void {
    if (bytesNeeded <= this._data.length) return;
    let newSize = Math.max(this._data.length, 16);
    while (newSize < bytesNeeded) {
      newSize *= 2;
    }
    const newData = new Uint8Array(newSize);
    newData.set(this._data.subarray(0, this._length));
    this._data = newData;
    this._view = new DataView(newData.buffer);
  }
}
