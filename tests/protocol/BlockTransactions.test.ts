import {
  BlockTransactionsCodec,
  createBlockTransactions,
  createBlockTransactionsCodec,
} from '../../src/protocol/BlockTransactions';
import { createTransaction, createTxIn } from '../../src/protocol/Transaction';
import { deserialize, serialize, sizeOf } from '../../src/helpers';
import { bytesToHex } from '../../src/hex';

describe('BlockTransactions', () => {
  it('sizes an empty block', () => {
    expect(sizeOf(BlockTransactionsCodec, createBlockTransactions())).toBe(33);
    expect(bytesToHex(serialize(BlockTransactionsCodec, createBlockTransactions()))).toBe('00'.repeat(33));
  });

  it('sizes blocks with transactions', () => {
    expect(sizeOf(BlockTransactionsCodec, createBlockTransactions({ transactions: [createTransaction()] }))).toBe(43);
    const many = createBlockTransactions({
      transactions: Array.from({ length: 253 }, () => createTransaction()),
    });
    expect(sizeOf(BlockTransactionsCodec, many)).toBe(2565);
  });

  it('round-trips', () => {
    const block = createBlockTransactions({
      blockHash: new Uint8Array(32).fill(7),
      transactions: [createTransaction({ inputs: [createTxIn()] }), createTransaction({ lockTime: 9 })],
    });
    expect(deserialize(BlockTransactionsCodec, serialize(BlockTransactionsCodec, block))).toEqual(block);
  });

  it('limits the transaction count', () => {
    const codec = createBlockTransactionsCodec({ maxSize: 1 });
    const block = createBlockTransactions({ transactions: [createTransaction(), createTransaction()] });
    expect(() => serialize(codec, block)).toThrow('CompactSize 2 exceeds maximum 1');
  });
});
