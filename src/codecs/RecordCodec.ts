import { ByteBuffer } from '../ByteBuffer';
import { Codec } from './Codec';
import { OptionalCodec } from './OptionalCodec';
import { CodecError } from '../errors';

export interface RecordField<N extends string = string, T = unknown> {
  /** Field name (used as key in the JS object). */
  name: N;
  /** Codec for this field's type. */
  codec: Codec<T>;
}

/** Object type described by a field list. */
export type RecordValue<F extends readonly RecordField[]> = {
  [E in F[number] as E['name']]: E extends RecordField<string, infer T> ? T : never;
};

/** Declare a record field, keeping its name and value type. */
export function field<N extends string, T>(name: N, codec: Codec<T>): RecordField<N, T> {
  return { name, codec };
}

/**
 * Aggregate record codec. Fields are written and read in declaration order;
 * the record adds no prefix, padding or separators of its own.
 */
export class RecordCodec<F extends readonly RecordField[]> implements Codec<RecordValue<F>> {
  readonly fields: F;

  constructor(fields: F) {
    const seen = new Set<string>();
    for (const f of fields) {
      if (f.name === '__proto__') {
        // assigning it on a plain object replaces the prototype instead of adding a field
        throw new Error(`Reserved record field name: '${f.name}'`);
      }
      if (seen.has(f.name)) {
        throw new Error(`Duplicate record field: '${f.name}'`);
      }
      seen.add(f.name);
    }
    this.fields = fields;
  }

  encode(buffer: ByteBuffer, value: RecordValue<F>): void {
    for (const f of this.fields) {
      f.codec.encode(buffer, this.fieldValue(value, f));
    }
  }

  decode(buffer: ByteBuffer): RecordValue<F> {
    const result: Record<string, unknown> = {};
    for (const f of this.fields) {
      result[f.name] = f.codec.decode(buffer);
    }
    return result as RecordValue<F>;
  }

  size(value: RecordValue<F>): number {
    let total = 0;
    for (const f of this.fields) {
      total += f.codec.size(this.fieldValue(value, f));
    }
    return total;
  }

  private fieldValue(value: object, f: RecordField): unknown {
    const fieldValue: unknown = Reflect.get(value, f.name);
    if (fieldValue === undefined && !(f.codec instanceof OptionalCodec)) {
      throw new CodecError('TypeMismatch', `Missing mandatory field: '${f.name}'`, { field: f.name });
    }
    return fieldValue;
  }
}
