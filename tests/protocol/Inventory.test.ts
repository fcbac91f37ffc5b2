import { InventoryCodec, InventoryType, createInventory } from '../../src/protocol/Inventory';
import { SequenceOfCodec } from '../../src/codecs/SequenceOfCodec';
import { deserialize, serialize, sizeOf } from '../../src/helpers';
import { bytesToHex } from '../../src/hex';

describe('Inventory', () => {
  it('encodes type then hash', () => {
    const inv = createInventory({ type: InventoryType.TX, hash: new Uint8Array(32).fill(0xcd) });
    expect(bytesToHex(serialize(InventoryCodec, inv))).toBe('01000000' + 'cd'.repeat(32));
    expect(sizeOf(InventoryCodec, inv)).toBe(36);
  });

  it('sizes a vector of inventories', () => {
    const codec = new SequenceOfCodec({ itemCodec: InventoryCodec });
    const items = Array.from({ length: 10 }, (_, i) =>
      createInventory({ type: InventoryType.BLOCK, hash: new Uint8Array(32).fill(i) }),
    );
    expect(sizeOf(codec, items)).toBe(361);
    expect(deserialize(codec, serialize(codec, items))).toEqual(items);
  });

  it('defaults to an error entry with a zero hash', () => {
    expect(createInventory()).toEqual({ type: InventoryType.ERROR, hash: new Uint8Array(32) });
  });
});
