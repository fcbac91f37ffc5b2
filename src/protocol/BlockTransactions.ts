import { Codec } from '../codecs/Codec';
import { FixedBytesCodec } from '../codecs/BytesCodec';
import { SequenceOfCodec } from '../codecs/SequenceOfCodec';
import { RecordCodec, field } from '../codecs/RecordCodec';
import { CodecLimits } from '../config';
import { HASH_LENGTH, Transaction, createTransactionCodecs } from './Transaction';

/** Transactions of one block, keyed by the block's hash. */
export interface BlockTransactions {
  blockHash: Uint8Array;
  transactions: Transaction[];
}

export function createBlockTransactionsCodec(limits?: CodecLimits): Codec<BlockTransactions> {
  return new RecordCodec([
    field('blockHash', new FixedBytesCodec(HASH_LENGTH)),
    field('transactions', new SequenceOfCodec({ itemCodec: createTransactionCodecs(limits).transaction, limits })),
  ]);
}

export const BlockTransactionsCodec: Codec<BlockTransactions> = createBlockTransactionsCodec();

export function createBlockTransactions(init: Partial<BlockTransactions> = {}): BlockTransactions {
  return {
    blockHash: init.blockHash ?? new Uint8Array(HASH_LENGTH),
    transactions: init.transactions ?? [],
  };
}
