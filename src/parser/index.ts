export { parseShapeModule } from './ShapeParser';
export { convertModuleToSchemaNodes } from './toSchemaNode';
export type {
  ShapeModule,
  ShapeRecord,
  ShapeField,
  ShapeType,
  ShapeIntegerName,
  ShapePrimitiveName,
  ShapePrimitiveType,
  ShapeVarIntType,
  ShapeBytesType,
  ShapeVectorType,
  ShapeOptionalType,
  ShapeSetType,
  ShapeMapType,
  ShapeTypeReference,
} from './types';
