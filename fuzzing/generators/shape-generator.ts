/**
 * Grammar-aware random shape module generator.
 *
 * Produces structurally plausible record shape text by following
 * the grammar with randomized choices at each production. References
 * only point at records declared earlier, so the result never recurses.
 */

import { Rng } from './rng';

export interface ShapeGeneratorOptions {
  /** Maximum nesting depth for types (default: 3). */
  maxDepth?: number;
  /** Maximum number of records per module (default: 6). */
  maxRecords?: number;
  /** Maximum fields per record (default: 6). */
  maxFields?: number;
  /** Probability of a record reference instead of an inline type (default: 0.25). */
  refProbability?: number;
  /** Probability of a comment line before a record (default: 0.2). */
  commentProbability?: number;
}

const DEFAULTS: Required<ShapeGeneratorOptions> = {
  maxDepth: 3,
  maxRecords: 6,
  maxFields: 6,
  refProbability: 0.25,
  commentProbability: 0.2,
};

const INTEGER_TYPES = ['u8', 'u16', 'u32', 'u64', 'i8', 'i16', 'i32', 'i64'] as const;

const KEY_TYPES = [...INTEGER_TYPES, 'bool', 'compactsize', 'string'] as const;

const UPPER_NAMES = [
  'Block', 'Header', 'Coin', 'Undo', 'Script', 'Witness', 'Peer', 'Addr',
  'Filter', 'Locator', 'Stamp', 'Entry', 'Record', 'Bundle', 'Batch', 'Index',
];

const LOWER_NAMES = [
  'hash', 'height', 'nonce', 'amount', 'script', 'flags', 'time', 'count',
  'entries', 'items', 'data', 'key', 'value', 'prev', 'next', 'tag',
];

export class ShapeGenerator {
  private rng: Rng;
  private opts: Required<ShapeGeneratorOptions>;
  private definedRecords: string[] = [];

  constructor(seed: number, options?: ShapeGeneratorOptions) {
    this.rng = new Rng(seed);
    this.opts = { ...DEFAULTS, ...options };
  }

  /** Generate a complete shape module string. */
  generateModule(): string {
    this.definedRecords = [];
    const numRecords = this.rng.int(1, this.opts.maxRecords);

    const records: string[] = [];
    for (let i = 0; i < numRecords; i++) {
      const name = this.uniqueRecordName();
      const body = this.generateFields();
      const comment = this.rng.chance(this.opts.commentProbability) ? `// ${name} layout\n` : '';
      records.push(`${comment}record ${name} {\n${body}\n}`);
      this.definedRecords.push(name);
    }

    return records.join('\n\n') + '\n';
  }

  private generateFields(): string {
    const numFields = this.rng.int(1, this.opts.maxFields);
    const usedNames = new Set<string>();
    const fields: string[] = [];
    for (let i = 0; i < numFields; i++) {
      const name = this.uniqueFieldName(usedNames);
      usedNames.add(name);
      fields.push(`  ${name}: ${this.generateType(0)};`);
    }
    return fields.join('\n');
  }

  /** Generate a random type expression. */
  private generateType(depth: number): string {
    if (this.definedRecords.length > 0 && this.rng.chance(this.opts.refProbability)) {
      return this.rng.pick(this.definedRecords);
    }

    const leafWeight = Math.min(0.8, 0.4 + depth * 0.2);
    if (depth >= this.opts.maxDepth || this.rng.chance(leafWeight)) {
      return this.generateLeafType();
    }

    const compositeChoices = [
      () => `vector<${this.generateType(depth + 1)}>`,
      () => {
        const item = this.generateType(depth + 1);
        return item.startsWith('optional<') ? item : `optional<${item}>`;
      },
      () => `${this.rng.chance(0.5) ? 'sortedmap' : 'map'}<${this.rng.pick(KEY_TYPES)}, ${this.generateType(depth + 1)}>`,
      () => `${this.rng.chance(0.5) ? 'sortedset' : 'set'}<${this.rng.pick(KEY_TYPES)}>`,
    ];
    return this.rng.pick(compositeChoices)();
  }

  private generateLeafType(): string {
    const leafGenerators = [
      () => this.rng.pick(KEY_TYPES),
      () => this.rng.pick(['f32', 'f64']),
      () => `varint<${this.rng.pick(INTEGER_TYPES)}>`,
      () => 'bytes',
      () => `bytes[${this.rng.int(1, 64)}]`,
    ];
    return this.rng.pick(leafGenerators)();
  }

  private uniqueRecordName(): string {
    let name: string;
    let attempts = 0;
    do {
      name = this.rng.pick(UPPER_NAMES) + this.rng.int(1, 999);
      attempts++;
    } while (this.definedRecords.includes(name) && attempts < 100);
    return name;
  }

  private uniqueFieldName(used: Set<string>): string {
    let name: string;
    let attempts = 0;
    do {
      name = this.rng.pick(LOWER_NAMES) + this.rng.int(1, 999);
      attempts++;
    } while (used.has(name) && attempts < 100);
    return name;
  }
}

/**
 * Generate a random shape module string.
 * @param seed - RNG seed for reproducibility
 * @param options - Generator options
 */
export function generateShapeModule(seed: number, options?: ShapeGeneratorOptions): string {
  const gen = new ShapeGenerator(seed, options);
  return gen.generateModule();
}
