import type { IntegerSchemaWidth, SchemaNode } from '../schema/SchemaBuilder';
import type { ShapeIntegerName, ShapeModule, ShapeType } from './types';

/**
 * Convert every record of a shape module to a SchemaNode registry.
 *
 * Record references become `$ref` nodes, so the result is meant for
 * SchemaBuilder.buildAll(). References to undeclared records and duplicate
 * record or field names throw.
 */
export function convertModuleToSchemaNodes(module: ShapeModule): Record<string, SchemaNode> {
  const declared = new Set<string>();
  for (const record of module.records) {
    if (declared.has(record.name)) {
      throw new Error(`Duplicate record "${record.name}"`);
    }
    declared.add(record.name);
  }

  const result: Record<string, SchemaNode> = {};
  for (const record of module.records) {
    const fieldNames = new Set<string>();
    result[record.name] = {
      type: 'record',
      fields: record.fields.map(f => {
        if (f.name === '__proto__') {
          throw new Error(`Reserved field name "${f.name}" in record "${record.name}"`);
        }
        if (fieldNames.has(f.name)) {
          throw new Error(`Duplicate field "${f.name}" in record "${record.name}"`);
        }
        fieldNames.add(f.name);
        return { name: f.name, schema: convertType(f.type, declared, `${record.name}.${f.name}`) };
      }),
    };
  }
  return result;
}

function convertType(type: ShapeType, declared: Set<string>, path: string): SchemaNode {
  switch (type.kind) {
    case 'primitive':
      switch (type.name) {
        case 'bool':
          return { type: 'bool' };
        case 'f32':
          return { type: 'float', precision: 32 };
        case 'f64':
          return { type: 'float', precision: 64 };
        case 'compactsize':
          return { type: 'compactsize' };
        case 'string':
          return { type: 'string' };
        default:
          return { type: 'int', ...integerShape(type.name) };
      }

    case 'varint':
      return { type: 'varint', ...integerShape(type.of) };

    case 'bytes':
      return type.fixedSize !== undefined ? { type: 'bytes', fixedSize: type.fixedSize } : { type: 'bytes' };

    case 'vector':
      return { type: 'vector', item: convertType(type.item, declared, `${path}[]`) };

    case 'optional':
      if (type.item.kind === 'optional') {
        throw new Error(`Nested optional at ${path}`);
      }
      return { type: 'optional', item: convertType(type.item, declared, `${path}?`) };

    case 'set':
      return { type: 'set', item: convertType(type.item, declared, `${path}{}`), sorted: type.sorted };

    case 'map':
      return {
        type: 'map',
        key: convertType(type.key, declared, `${path}<key>`),
        value: convertType(type.value, declared, `${path}<value>`),
        sorted: type.sorted,
      };

    case 'ref':
      if (!declared.has(type.name)) {
        throw new Error(`Unknown type reference "${type.name}" at ${path}`);
      }
      return { type: '$ref', ref: type.name };
  }
}

function integerShape(name: ShapeIntegerName): { width: IntegerSchemaWidth; signed: boolean } {
  const width = Number(name.slice(1));
  if (width !== 8 && width !== 16 && width !== 32 && width !== 64) {
    throw new Error(`Unsupported integer type "${name}"`);
  }
  return { width, signed: name.startsWith('i') };
}
