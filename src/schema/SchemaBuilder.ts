import { ByteBuffer } from '../ByteBuffer';
import { Codec } from '../codecs/Codec';
import { BooleanCodec } from '../codecs/BooleanCodec';
import { BigIntegerCodec, IntegerCodec } from '../codecs/IntegerCodec';
import { FloatCodec } from '../codecs/FloatCodec';
import { BigVarIntCodec, VarIntCodec } from '../codecs/VarIntCodec';
import { CompactSizeCodec } from '../codecs/CompactSizeCodec';
import { StringCodec } from '../codecs/StringCodec';
import { BytesCodec, FixedBytesCodec } from '../codecs/BytesCodec';
import { SequenceOfCodec } from '../codecs/SequenceOfCodec';
import { MapCodec } from '../codecs/MapCodec';
import { SetCodec } from '../codecs/SetCodec';
import { OptionalCodec } from '../codecs/OptionalCodec';
import { RecordCodec } from '../codecs/RecordCodec';
import { CodecLimits } from '../config';
import { CodecError } from '../errors';
import { compareBytes } from '../helpers';

/**
 * A codec that lazily resolves its target. Used for recursive type references ($ref).
 */
class LazyCodec implements Codec<unknown> {
  private _resolved: Codec<unknown> | null = null;
  private readonly _resolver: () => Codec<unknown>;

  constructor(resolver: () => Codec<unknown>) {
    this._resolver = resolver;
  }

  private get codec(): Codec<unknown> {
    if (!this._resolved) {
      this._resolved = this._resolver();
    }
    return this._resolved;
  }

  encode(buffer: ByteBuffer, value: unknown): void {
    this.codec.encode(buffer, value);
  }

  decode(buffer: ByteBuffer): unknown {
    return this.codec.decode(buffer);
  }

  size(value: unknown): number {
    return this.codec.size(value);
  }
}

export type IntegerSchemaWidth = 8 | 16 | 32 | 64;

export interface SchemaField {
  name: string;
  schema: SchemaNode;
}

/**
 * JSON-serializable schema definition for any wire type.
 */
export type SchemaNode =
  | { type: 'bool' }
  | { type: 'int'; width: IntegerSchemaWidth; signed?: boolean }
  | { type: 'float'; precision: 32 | 64 }
  | { type: 'varint'; width: IntegerSchemaWidth; signed?: boolean }
  | { type: 'compactsize' }
  | { type: 'string' }
  | { type: 'bytes'; fixedSize?: number }
  | { type: 'vector'; item: SchemaNode }
  | { type: 'map'; key: SchemaNode; value: SchemaNode; sorted?: boolean }
  | { type: 'set'; item: SchemaNode; sorted?: boolean }
  | { type: 'optional'; item: SchemaNode }
  | { type: 'record'; fields: SchemaField[] }
  | { type: '$ref'; ref: string };

/**
 * Natural order used by sorted maps and sets built from a schema:
 * numeric for numbers and bigints, code-unit order for strings,
 * false before true, byte order for byte arrays.
 */
export function naturalCompare(a: unknown, b: unknown): number {
  if ((typeof a === 'number' || typeof a === 'bigint') && (typeof b === 'number' || typeof b === 'bigint')) {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return Number(a) - Number(b);
  }
  if (a instanceof Uint8Array && b instanceof Uint8Array) {
    return compareBytes(a, b);
  }
  throw new CodecError('TypeMismatch', `cannot order keys of type ${typeof a} and ${typeof b}`);
}

/**
 * Builds a Codec from a JSON schema definition.
 */
export class SchemaBuilder {
  /** Build a Codec from a schema node definition. */
  static build(node: SchemaNode, limits?: CodecLimits): Codec<unknown> {
    return buildNode(node, limits, ref => {
      throw new Error(
        `Cannot resolve $ref "${ref}" without a schema registry. ` +
        `Use SchemaBuilder.buildAll() for schemas containing $ref nodes.`,
      );
    });
  }

  /**
   * Build codecs for all schemas in a registry, resolving $ref nodes lazily.
   * Returns a map of type name to Codec.
   */
  static buildAll(schemas: Record<string, SchemaNode>, limits?: CodecLimits): Record<string, Codec<unknown>> {
    const codecs: Record<string, Codec<unknown>> = {};

    const resolve = (ref: string): Codec<unknown> =>
      new LazyCodec(() => {
        const target = codecs[ref];
        if (!target) {
          throw new Error(`Unresolved $ref: "${ref}"`);
        }
        return target;
      });

    for (const [name, schema] of Object.entries(schemas)) {
      codecs[name] = buildNode(schema, limits, resolve);
    }

    return codecs;
  }

  /** Parse a JSON string into a SchemaNode and build the codec. */
  static fromJSON(json: string, limits?: CodecLimits): Codec<unknown> {
    const node = JSON.parse(json) as SchemaNode;
    return SchemaBuilder.build(node, limits);
  }
}

function buildNode(
  node: SchemaNode,
  limits: CodecLimits | undefined,
  resolve: (ref: string) => Codec<unknown>,
): Codec<unknown> {
  const build = (child: SchemaNode): Codec<unknown> => buildNode(child, limits, resolve);

  switch (node.type) {
    case 'bool':
      return new BooleanCodec(limits);

    case 'int':
      return node.width === 64
        ? new BigIntegerCodec({ signed: node.signed })
        : new IntegerCodec({ width: node.width, signed: node.signed });

    case 'float':
      return new FloatCodec(node.precision);

    case 'varint':
      return node.width === 64
        ? new BigVarIntCodec({ signed: node.signed })
        : new VarIntCodec({ width: node.width, signed: node.signed });

    case 'compactsize':
      return new CompactSizeCodec(limits);

    case 'string':
      return new StringCodec(limits);

    case 'bytes':
      return node.fixedSize !== undefined ? new FixedBytesCodec(node.fixedSize) : new BytesCodec(limits);

    case 'vector':
      return new SequenceOfCodec({ itemCodec: build(node.item), limits });

    case 'map':
      return new MapCodec({
        keyCodec: build(node.key),
        valueCodec: build(node.value),
        compare: node.sorted ? naturalCompare : undefined,
        limits,
      });

    case 'set':
      return new SetCodec({
        itemCodec: build(node.item),
        compare: node.sorted ? naturalCompare : undefined,
        limits,
      });

    case 'optional':
      if (node.item.type === 'optional') {
        throw new Error('Nested optional schema: optional<optional<T>> cannot round-trip');
      }
      return new OptionalCodec(build(node.item), limits);

    case 'record':
      return new RecordCodec(node.fields.map(f => ({ name: f.name, codec: build(f.schema) })));

    case '$ref':
      return resolve(node.ref);

    default:
      throw new Error(`Unknown schema type: ${(node as { type: string }).type}`);
  }
}
