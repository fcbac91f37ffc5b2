/**
 * AST types for parsed record shape modules.
 */

/** A complete shape file: an ordered list of record declarations. */
export interface ShapeModule {
  records: ShapeRecord[];
}

/** `record Name { field: Type; ... }` */
export interface ShapeRecord {
  name: string;
  fields: ShapeField[];
}

export interface ShapeField {
  name: string;
  type: ShapeType;
}

export type ShapeIntegerName = 'u8' | 'u16' | 'u32' | 'u64' | 'i8' | 'i16' | 'i32' | 'i64';

export type ShapePrimitiveName = ShapeIntegerName | 'bool' | 'f32' | 'f64' | 'compactsize' | 'string';

/** Discriminated union of all field types. */
export type ShapeType =
  | ShapePrimitiveType
  | ShapeVarIntType
  | ShapeBytesType
  | ShapeVectorType
  | ShapeOptionalType
  | ShapeSetType
  | ShapeMapType
  | ShapeTypeReference;

export interface ShapePrimitiveType {
  kind: 'primitive';
  name: ShapePrimitiveName;
}

export interface ShapeVarIntType {
  kind: 'varint';
  of: ShapeIntegerName;
}

export interface ShapeBytesType {
  kind: 'bytes';
  /** Present for `bytes[N]`: exactly N bytes, no length prefix. */
  fixedSize?: number;
}

export interface ShapeVectorType {
  kind: 'vector';
  item: ShapeType;
}

export interface ShapeOptionalType {
  kind: 'optional';
  item: ShapeType;
}

export interface ShapeSetType {
  kind: 'set';
  item: ShapeType;
  sorted: boolean;
}

export interface ShapeMapType {
  kind: 'map';
  key: ShapeType;
  value: ShapeType;
  sorted: boolean;
}

/** Reference to another record by name. */
export interface ShapeTypeReference {
  kind: 'ref';
  name: string;
}
