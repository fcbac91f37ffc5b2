import { Codec } from '../codecs/Codec';
import { IntegerCodec } from '../codecs/IntegerCodec';
import { FixedBytesCodec } from '../codecs/BytesCodec';
import { RecordCodec, field } from '../codecs/RecordCodec';
import { HASH_LENGTH } from './Transaction';

export const InventoryType = {
  ERROR: 0,
  TX: 1,
  BLOCK: 2,
  FILTERED_BLOCK: 3,
  CMPCT_BLOCK: 4,
} as const;

/** Announcement of an object by type and hash. */
export interface Inventory {
  type: number;
  hash: Uint8Array;
}

export const InventoryCodec: Codec<Inventory> = new RecordCodec([
  field('type', new IntegerCodec({ width: 32 })),
  field('hash', new FixedBytesCodec(HASH_LENGTH)),
]);

export function createInventory(init: Partial<Inventory> = {}): Inventory {
  return {
    type: init.type ?? InventoryType.ERROR,
    hash: init.hash ?? new Uint8Array(HASH_LENGTH),
  };
}
