/**
 * Random schema and value generator.
 *
 * Produces SchemaNode trees together with values that conform to them, so
 * that every generated pair must survive an encode/decode round trip.
 */

import type { SchemaNode } from '../../src/schema/SchemaBuilder';
import { integerRange } from '../../src/codecs/IntegerCodec';
import { MAX_SIZE } from '../../src/config';
import { Rng } from './rng';

export interface GeneratorOptions {
  /** Maximum nesting depth for composite types (default: 4). */
  maxDepth?: number;
  /** Maximum fields per record (default: 6). */
  maxFields?: number;
  /** Maximum elements per vector, map or set, and characters per string (default: 8). */
  maxItems?: number;
  /** Probability that an optional value is absent (default: 0.3). */
  absentProbability?: number;
}

const DEFAULTS: Required<GeneratorOptions> = {
  maxDepth: 4,
  maxFields: 6,
  maxItems: 8,
  absentProbability: 0.3,
};

/** Types usable as map keys and set members: primitives with value equality. */
export const KEY_SCHEMAS: readonly SchemaNode[] = [
  { type: 'bool' },
  { type: 'int', width: 8 },
  { type: 'int', width: 16, signed: true },
  { type: 'int', width: 32 },
  { type: 'int', width: 64, signed: true },
  { type: 'varint', width: 16 },
  { type: 'varint', width: 32, signed: true },
  { type: 'varint', width: 64 },
  { type: 'compactsize' },
  { type: 'string' },
];

const FLOAT_SCHEMAS: readonly SchemaNode[] = [
  { type: 'float', precision: 32 },
  { type: 'float', precision: 64 },
];

const STRING_CHARS = ['a', 'b', 'z', '0', ' ', '\n', 'é', 'ß', '€', '中', '🎉'];

const MAX_FIXED_SIZE = 0x10000;

const COMPACT_SIZE_BOUNDARIES = [0, 1, 0xfc, 0xfd, 0xfe, 0xffff, 0x10000, MAX_SIZE];

export class SchemaGenerator {
  readonly rng: Rng;
  private opts: Required<GeneratorOptions>;

  constructor(seed: number, options?: GeneratorOptions) {
    this.rng = new Rng(seed);
    this.opts = { ...DEFAULTS, ...options };
  }

  /** A random schema tree without $ref nodes. Records always have at least one field. */
  schema(depth = 0): SchemaNode {
    if (depth >= this.opts.maxDepth || this.rng.chance(0.35)) {
      return this.leaf();
    }
    switch (this.rng.int(0, 4)) {
      case 0:
        return { type: 'vector', item: this.schema(depth + 1) };
      case 1:
        return {
          type: 'map',
          key: this.rng.pick(KEY_SCHEMAS),
          value: this.schema(depth + 1),
          sorted: this.rng.chance(0.5),
        };
      case 2:
        return { type: 'set', item: this.rng.pick(KEY_SCHEMAS), sorted: this.rng.chance(0.5) };
      case 3: {
        const item = this.schema(depth + 1);
        // optional<optional<T>> is not encodable
        return item.type === 'optional' ? item : { type: 'optional', item };
      }
      default:
        return this.record(depth);
    }
  }

  record(depth = 0): SchemaNode {
    const count = this.rng.int(1, this.opts.maxFields);
    return {
      type: 'record',
      fields: Array.from({ length: count }, (_, i) => ({ name: `f${i}`, schema: this.schema(depth + 1) })),
    };
  }

  leaf(): SchemaNode {
    switch (this.rng.int(0, 3)) {
      case 0:
        return this.rng.pick(FLOAT_SCHEMAS);
      case 1:
        return this.rng.chance(0.5) ? { type: 'bytes' } : { type: 'bytes', fixedSize: this.rng.int(1, 8) };
      default:
        return this.rng.pick(KEY_SCHEMAS);
    }
  }

  /**
   * A random value conforming to `node`. `$ref` nodes are looked up in
   * `registry`; the registry must not be cyclic.
   */
  value(node: SchemaNode, registry: Record<string, SchemaNode> = {}): unknown {
    const rng = this.rng;
    switch (node.type) {
      case 'bool':
        return rng.chance(0.5);

      case 'int':
      case 'varint':
        if (node.width === 64) {
          const bits = rng.bigUint64() >> BigInt(rng.int(0, 63));
          return node.signed ? BigInt.asIntN(64, bits) : bits;
        } else {
          const { min, max } = integerRange(node.width, node.signed ?? false);
          return rng.chance(0.2) ? rng.pick([min, max, 0]) : rng.int(min, max);
        }

      case 'float':
        return node.precision === 32
          ? Math.fround((rng.next() - 0.5) * 1e6)
          : (rng.next() - 0.5) * 1e12;

      case 'compactsize':
        return rng.chance(0.5) ? rng.pick(COMPACT_SIZE_BOUNDARIES) : rng.int(0, 100000);

      case 'string': {
        const length = rng.int(0, this.opts.maxItems);
        return Array.from({ length }, () => rng.pick(STRING_CHARS)).join('');
      }

      case 'bytes': {
        if (node.fixedSize !== undefined && node.fixedSize > MAX_FIXED_SIZE) {
          throw new RangeError(`bytes[${node.fixedSize}] is too large to generate`);
        }
        const length = node.fixedSize ?? (rng.chance(0.05) ? rng.int(0xfd, 0x140) : rng.int(0, this.opts.maxItems));
        return Uint8Array.from({ length }, () => rng.int(0, 255));
      }

      case 'vector':
        return Array.from({ length: rng.int(0, this.opts.maxItems) }, () => this.value(node.item, registry));

      case 'map': {
        const result = new Map<unknown, unknown>();
        const count = rng.int(0, this.opts.maxItems);
        for (let i = 0; i < count; i++) {
          result.set(this.value(node.key, registry), this.value(node.value, registry));
        }
        return result;
      }

      case 'set': {
        const result = new Set<unknown>();
        const count = rng.int(0, this.opts.maxItems);
        for (let i = 0; i < count; i++) {
          result.add(this.value(node.item, registry));
        }
        return result;
      }

      case 'optional':
        return rng.chance(this.opts.absentProbability) ? undefined : this.value(node.item, registry);

      case 'record': {
        const result: Record<string, unknown> = {};
        for (const f of node.fields) {
          result[f.name] = this.value(f.schema, registry);
        }
        return result;
      }

      case '$ref': {
        const target = registry[node.ref];
        if (!target) {
          throw new Error(`Unresolved $ref "${node.ref}" in generator`);
        }
        return this.value(target, registry);
      }
    }
  }
}
