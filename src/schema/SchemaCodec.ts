import { Codec } from '../codecs/Codec';
import { CodecLimits } from '../config';
import { deserialize, serialize } from '../helpers';
import { bytesToHex, hexToBytes } from '../hex';
import { SchemaBuilder, SchemaNode } from './SchemaBuilder';

/**
 * High-level codec that wraps a schema definition.
 * Encodes values to Uint8Array and decodes Uint8Array back to values.
 */
export class SchemaCodec {
  private readonly _codec: Codec<unknown>;

  constructor(schema: SchemaNode | Codec<unknown>, limits?: CodecLimits) {
    this._codec = isSchemaNode(schema) ? SchemaBuilder.build(schema, limits) : schema;
  }

  /** Wrap the named type of a schema registry. */
  static fromRegistry(
    schemas: Record<string, SchemaNode>,
    typeName: string,
    limits?: CodecLimits,
  ): SchemaCodec {
    const codec = SchemaBuilder.buildAll(schemas, limits)[typeName];
    if (!codec) {
      throw new Error(`Type "${typeName}" not found. Available: ${Object.keys(schemas).join(', ')}`);
    }
    return new SchemaCodec(codec);
  }

  /** Encode a value to a Uint8Array. */
  encode(value: unknown): Uint8Array {
    return serialize(this._codec, value);
  }

  /** Encode a value and return hex string. */
  encodeToHex(value: unknown): string {
    return bytesToHex(this.encode(value));
  }

  /** Decode a Uint8Array back to a value. Trailing bytes are rejected. */
  decode(data: Uint8Array): unknown {
    return deserialize(this._codec, data);
  }

  /** Decode a hex string back to a value. */
  decodeFromHex(hex: string): unknown {
    return this.decode(hexToBytes(hex));
  }

  /** Encoded byte length of a value. */
  size(value: unknown): number {
    return this._codec.size(value);
  }

  /** Access the underlying built codec. */
  get codec(): Codec<unknown> {
    return this._codec;
  }
}

function isSchemaNode(value: SchemaNode | Codec<unknown>): value is SchemaNode {
  return 'type' in value && typeof value.type === 'string';
}
