export {
  HASH_LENGTH,
  NULL_INDEX,
  SEQUENCE_FINAL,
  CURRENT_TX_VERSION,
  createTransactionCodecs,
  OutPointCodec,
  TxInCodec,
  TxOutCodec,
  TransactionCodec,
  createOutPoint,
  createTxIn,
  createTxOut,
  createTransaction,
  transactionId,
} from './Transaction';
export type { OutPoint, TxIn, TxOut, Transaction, TransactionCodecs } from './Transaction';
export { createBlockTransactionsCodec, BlockTransactionsCodec, createBlockTransactions } from './BlockTransactions';
export type { BlockTransactions } from './BlockTransactions';
export { InventoryType, InventoryCodec, createInventory } from './Inventory';
export type { Inventory } from './Inventory';
