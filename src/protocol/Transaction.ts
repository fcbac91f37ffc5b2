import { Codec } from '../codecs/Codec';
import { BigIntegerCodec, IntegerCodec } from '../codecs/IntegerCodec';
import { BytesCodec, FixedBytesCodec } from '../codecs/BytesCodec';
import { SequenceOfCodec } from '../codecs/SequenceOfCodec';
import { RecordCodec, field } from '../codecs/RecordCodec';
import { CodecLimits } from '../config';
import { hash256Hex } from '../hash';
import { serialize } from '../helpers';

export const HASH_LENGTH = 32;
/** Index of an out point that refers to no output. */
export const NULL_INDEX = 0xffffffff;
export const SEQUENCE_FINAL = 0xffffffff;
export const CURRENT_TX_VERSION = 2;

export interface OutPoint {
  hash: Uint8Array;
  index: number;
}

export interface TxIn {
  prevout: OutPoint;
  scriptSig: Uint8Array;
  sequence: number;
}

export interface TxOut {
  /** Amount in base units; -1 marks an unset output. */
  value: bigint;
  scriptPubKey: Uint8Array;
}

export interface Transaction {
  version: number;
  inputs: TxIn[];
  outputs: TxOut[];
  lockTime: number;
}

export interface TransactionCodecs {
  outPoint: Codec<OutPoint>;
  txIn: Codec<TxIn>;
  txOut: Codec<TxOut>;
  transaction: Codec<Transaction>;
}

/** Build the transaction record codecs under the given limits. */
export function createTransactionCodecs(limits?: CodecLimits): TransactionCodecs {
  const u32 = new IntegerCodec({ width: 32 });

  const outPoint = new RecordCodec([
    field('hash', new FixedBytesCodec(HASH_LENGTH)),
    field('index', u32),
  ]);

  const txIn = new RecordCodec([
    field('prevout', outPoint),
    field('scriptSig', new BytesCodec(limits)),
    field('sequence', u32),
  ]);

  const txOut = new RecordCodec([
    field('value', new BigIntegerCodec({ signed: true })),
    field('scriptPubKey', new BytesCodec(limits)),
  ]);

  const transaction = new RecordCodec([
    field('version', new IntegerCodec({ width: 32, signed: true })),
    field('inputs', new SequenceOfCodec({ itemCodec: txIn, limits })),
    field('outputs', new SequenceOfCodec({ itemCodec: txOut, limits })),
    field('lockTime', u32),
  ]);

  return { outPoint, txIn, txOut, transaction };
}

const defaultCodecs = createTransactionCodecs();

export const OutPointCodec: Codec<OutPoint> = defaultCodecs.outPoint;
export const TxInCodec: Codec<TxIn> = defaultCodecs.txIn;
export const TxOutCodec: Codec<TxOut> = defaultCodecs.txOut;
export const TransactionCodec: Codec<Transaction> = defaultCodecs.transaction;

export function createOutPoint(init: Partial<OutPoint> = {}): OutPoint {
  return {
    hash: init.hash ?? new Uint8Array(HASH_LENGTH),
    index: init.index ?? NULL_INDEX,
  };
}

export function createTxIn(init: Partial<TxIn> = {}): TxIn {
  return {
    prevout: init.prevout ?? createOutPoint(),
    scriptSig: init.scriptSig ?? new Uint8Array(0),
    sequence: init.sequence ?? SEQUENCE_FINAL,
  };
}

export function createTxOut(init: Partial<TxOut> = {}): TxOut {
  return {
    value: init.value ?? -1n,
    scriptPubKey: init.scriptPubKey ?? new Uint8Array(0),
  };
}

export function createTransaction(init: Partial<Transaction> = {}): Transaction {
  return {
    version: init.version ?? CURRENT_TX_VERSION,
    inputs: init.inputs ?? [],
    outputs: init.outputs ?? [],
    lockTime: init.lockTime ?? 0,
  };
}

/** Display hash of a transaction's serialization. */
export function transactionId(tx: Transaction): string {
  return hash256Hex(serialize(TransactionCodec, tx));
}
