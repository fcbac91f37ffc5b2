import { SchemaBuilder, SchemaNode, naturalCompare } from '../../src/schema/SchemaBuilder';
import { deserialize, serialize } from '../../src/helpers';
import { bytesToHex, hexToBytes } from '../../src/hex';
import { isCodecError } from '../../src/errors';

function hexOf(node: SchemaNode, value: unknown): string {
  return bytesToHex(serialize(SchemaBuilder.build(node), value));
}

describe('SchemaBuilder', () => {
  it('builds primitive codecs', () => {
    expect(hexOf({ type: 'bool' }, true)).toBe('01');
    expect(hexOf({ type: 'int', width: 8 }, 0xab)).toBe('ab');
    expect(hexOf({ type: 'int', width: 16, signed: true }, -2)).toBe('feff');
    expect(hexOf({ type: 'int', width: 64 }, 1n)).toBe('0100000000000000');
    expect(hexOf({ type: 'float', precision: 32 }, 0.5)).toBe('0000003f');
    expect(hexOf({ type: 'float', precision: 64 }, 4.0)).toBe('0000000000001040');
  });

  it('builds VarInt codecs for every width', () => {
    expect(hexOf({ type: 'varint', width: 16 }, 0xffff)).toBe('82fe7f');
    expect(hexOf({ type: 'varint', width: 64 }, 0x80123456n)).toBe('86ffc7e756');
    expect(hexOf({ type: 'varint', width: 32, signed: true }, -1)).toBe('8efefefe7f');
  });

  it('builds length-prefixed codecs', () => {
    expect(hexOf({ type: 'compactsize' }, 253)).toBe('fdfd00');
    expect(hexOf({ type: 'string' }, 'hi')).toBe('026869');
    expect(hexOf({ type: 'bytes' }, new Uint8Array([9]))).toBe('0109');
    expect(hexOf({ type: 'bytes', fixedSize: 2 }, new Uint8Array([9, 8]))).toBe('0908');
  });

  it('builds containers', () => {
    expect(hexOf({ type: 'vector', item: { type: 'int', width: 8 } }, [1, 2])).toBe('020102');
    expect(hexOf({ type: 'optional', item: { type: 'int', width: 8 } }, 7)).toBe('0107');
    expect(
      hexOf(
        { type: 'map', key: { type: 'string' }, value: { type: 'bool' }, sorted: true },
        new Map([
          ['b', true],
          ['aa', false],
        ]),
      ),
    ).toBe('02' + '02616100' + '016201');
    expect(hexOf({ type: 'set', item: { type: 'int', width: 32 } }, new Set([256, 1]))).toBe(
      '02' + '00010000' + '01000000',
    );
    expect(hexOf({ type: 'set', item: { type: 'int', width: 32 }, sorted: true }, new Set([256, 1]))).toBe(
      '02' + '01000000' + '00010000',
    );
  });

  it('builds records', () => {
    const node: SchemaNode = {
      type: 'record',
      fields: [
        { name: 'a', schema: { type: 'int', width: 8 } },
        { name: 'b', schema: { type: 'string' } },
      ],
    };
    expect(hexOf(node, { a: 1, b: 'x' })).toBe('01' + '0178');
    expect(deserialize(SchemaBuilder.build(node), hexToBytes('020179'))).toEqual({ a: 2, b: 'y' });
  });

  it('passes limits to every length-bearing codec', () => {
    const codec = SchemaBuilder.build({ type: 'vector', item: { type: 'string' } }, { maxSize: 2 });
    expect(() => serialize(codec, ['abc'])).toThrow('CompactSize 3 exceeds maximum 2');
    const lenient = SchemaBuilder.build({ type: 'optional', item: { type: 'bool' } }, { strictBooleans: false });
    expect(deserialize(lenient, hexToBytes('0203'))).toBe(true);
  });

  it('refuses $ref without a registry', () => {
    expect(() => SchemaBuilder.build({ type: '$ref', ref: 'Node' })).toThrow(
      'Cannot resolve $ref "Node" without a schema registry',
    );
  });

  it('resolves recursive $refs lazily in buildAll', () => {
    const codecs = SchemaBuilder.buildAll({
      Tree: {
        type: 'record',
        fields: [
          { name: 'label', schema: { type: 'string' } },
          { name: 'children', schema: { type: 'vector', item: { type: '$ref', ref: 'Tree' } } },
        ],
      },
    });
    const tree = { label: 'root', children: [{ label: 'leaf', children: [] }] };
    const bytes = serialize(codecs.Tree, tree);
    expect(bytesToHex(bytes)).toBe('04726f6f74' + '01' + '046c656166' + '00');
    expect(deserialize(codecs.Tree, bytes)).toEqual(tree);
  });

  it('reports unresolved $refs when first used', () => {
    const codecs = SchemaBuilder.buildAll({ A: { type: 'vector', item: { type: '$ref', ref: 'Missing' } } });
    expect(() => serialize(codecs.A, [1])).toThrow('Unresolved $ref: "Missing"');
  });

  it('rejects an optional directly inside an optional', () => {
    expect(() =>
      SchemaBuilder.build({ type: 'optional', item: { type: 'optional', item: { type: 'bool' } } }),
    ).toThrow('Nested optional schema: optional<optional<T>> cannot round-trip');
    const wrapped = SchemaBuilder.build({
      type: 'optional',
      item: { type: 'vector', item: { type: 'optional', item: { type: 'bool' } } },
    });
    expect(bytesToHex(serialize(wrapped, [undefined, true]))).toBe('01' + '02' + '00' + '0101');
  });

  it('builds from JSON', () => {
    const codec = SchemaBuilder.fromJSON('{"type":"vector","item":{"type":"varint","width":32}}');
    expect(bytesToHex(serialize(codec, [0x80]))).toBe('018000');
  });

  it('rejects unknown schema types', () => {
    expect(() => SchemaBuilder.fromJSON('{"type":"UTF8String"}')).toThrow('Unknown schema type: UTF8String');
  });
});

describe('naturalCompare', () => {
  it('orders numbers, bigints, strings, booleans and bytes', () => {
    expect(naturalCompare(2, 10)).toBeLessThan(0);
    expect(naturalCompare(10n, 2)).toBeGreaterThan(0);
    expect(naturalCompare('b', 'aa')).toBeGreaterThan(0);
    expect(naturalCompare(false, true)).toBeLessThan(0);
    expect(naturalCompare(new Uint8Array([1]), new Uint8Array([1]))).toBe(0);
  });

  it('rejects mixed types', () => {
    try {
      naturalCompare('a', 1);
      throw new Error('expected a CodecError');
    } catch (e) {
      expect(isCodecError(e, 'TypeMismatch')).toBe(true);
    }
  });
});
