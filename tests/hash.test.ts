import { doubleSha256, hash256Hex } from '../src/hash';
import { bytesToHex } from '../src/hex';
import { ByteBuffer } from '../src/ByteBuffer';
import { FloatCodec } from '../src/codecs/FloatCodec';

describe('hashing', () => {
  it('double SHA-256 of the empty input', () => {
    expect(bytesToHex(doubleSha256(new Uint8Array(0)))).toBe(
      '5df6e0e2761359d30a8275058e299fcc0381534545f55cf43e41983f5d4c9456',
    );
  });

  it('hash256Hex displays the digest byte-reversed', () => {
    expect(hash256Hex(new Uint8Array(0))).toBe(
      '56944c5d3f98413ef45cf54545538103cc9f298e0575820ad3591376e2e0f65d',
    );
  });

  it('fingerprints 1000 encoded floats', () => {
    const codec = new FloatCodec(32);
    const buf = ByteBuffer.alloc();
    for (let i = 0; i < 1000; i++) codec.encode(buf, i);
    expect(buf.length).toBe(4000);
    expect(hash256Hex(buf.toUint8Array())).toBe('8e8b4cf3e4df8b332057e3e23af42ebc663b61e0495d5e7e32d85099d7f3fe0c');
    buf.reset();
    for (let i = 0; i < 1000; i++) expect(codec.decode(buf)).toBe(i);
  });

  it('fingerprints 1000 encoded doubles', () => {
    const codec = new FloatCodec(64);
    const buf = ByteBuffer.alloc();
    for (let i = 0; i < 1000; i++) codec.encode(buf, i);
    expect(buf.length).toBe(8000);
    expect(hash256Hex(buf.toUint8Array())).toBe('43d0c82591953c4eafe114590d392676a01585d25b25d433557f0d7878b23f96');
    buf.reset();
    for (let i = 0; i < 1000; i++) expect(codec.decode(buf)).toBe(i);
  });
});
