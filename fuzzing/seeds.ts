/**
 * Seed corpora for mutation-based fuzzing: valid shape modules for the
 * parser, and valid encoded streams for the decoders.
 */

import type { Codec } from '../src/codecs/Codec';
import { serialize } from '../src/helpers';
import {
  TransactionCodec,
  createTransaction,
  createTxIn,
  createTxOut,
  createOutPoint,
} from '../src/protocol/Transaction';
import { BlockTransactionsCodec, createBlockTransactions } from '../src/protocol/BlockTransactions';
import { InventoryCodec, createInventory } from '../src/protocol/Inventory';

/** Minimal valid module. */
export const SEED_MINIMAL = `
record Flag {
  set: bool;
}
`;

/** All primitive types. */
export const SEED_PRIMITIVES = `
record Primitives {
  flag: bool;
  a: u8;
  b: u16;
  c: u32;
  d: u64;
  e: i8;
  f: i16;
  g: i32;
  h: i64;
  x: f32;
  y: f64;
  n: compactsize;
  s: string;
  raw: bytes;
  hash: bytes[32];
}
`;

/** VarInt targets of every width. */
export const SEED_VARINTS = `
record Coin {
  code: varint<u32>;
  amount: varint<u64>;
  delta: varint<i64>;
  small: varint<u8>;
}
`;

/** Containers, nested. */
export const SEED_CONTAINERS = `
// containers
record Containers {
  list: vector<u32>;
  nested: vector<vector<string>>;
  names: map<u32, string>;
  ordered: sortedmap<string, vector<u8>>;
  tags: set<string>;
  heights: sortedset<u64>;
  note: optional<string>;
  maybeList: optional<vector<bytes>>;
}
`;

/** Records referring to each other. */
export const SEED_REFERENCES = `
record OutPoint {
  hash: bytes[32];
  index: u32;
}

record TxIn {
  prevout: OutPoint;
  scriptSig: bytes;
  sequence: u32;
}

record TxOut {
  value: i64;
  scriptPubKey: bytes;
}

record Transaction {
  version: i32;
  inputs: vector<TxIn>;
  outputs: vector<TxOut>;
  lockTime: u32;
}
`;

/** Forward references are allowed; declaration order does not matter. */
export const SEED_FORWARD_REFERENCE = `
record Locator {
  tip: Header;
  have: vector<bytes[32]>;
}

record Header {
  prev: bytes[32];
  time: u32;
}
`;

export const ALL_SEEDS = [
  SEED_MINIMAL,
  SEED_PRIMITIVES,
  SEED_VARINTS,
  SEED_CONTAINERS,
  SEED_REFERENCES,
  SEED_FORWARD_REFERENCE,
];

export interface StreamSeed {
  name: string;
  codec: Codec<unknown>;
  bytes: Uint8Array;
}

function streamSeed<T>(name: string, codec: Codec<T>, value: T): StreamSeed {
  return { name, codec, bytes: serialize(codec, value) };
}

const sampleTx = createTransaction({
  inputs: [
    createTxIn({
      prevout: createOutPoint({ hash: new Uint8Array(32).fill(0x11), index: 1 }),
      scriptSig: Uint8Array.of(0x51, 0x52, 0x53),
    }),
  ],
  outputs: [createTxOut({ value: 5000n, scriptPubKey: new Uint8Array(253).fill(0x6a) })],
  lockTime: 500000,
});

/** Valid protocol encodings, each paired with the codec that reads it. */
export const STREAM_SEEDS: StreamSeed[] = [
  streamSeed('empty transaction', TransactionCodec, createTransaction()),
  streamSeed('transaction', TransactionCodec, sampleTx),
  streamSeed('block transactions', BlockTransactionsCodec, createBlockTransactions({ transactions: [sampleTx, sampleTx] })),
  streamSeed('inventory', InventoryCodec, createInventory({ type: 1, hash: new Uint8Array(32).fill(0xab) })),
];
