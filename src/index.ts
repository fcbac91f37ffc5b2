export { ByteBuffer } from './ByteBuffer';
export type { UintWidth } from './ByteBuffer';
export { CodecError, isCodecError } from './errors';
export type { CodecErrorKind, CodecErrorContext } from './errors';
export { MAX_SIZE, DEFAULT_LIMITS, resolveLimits } from './config';
export type { CodecLimits, ResolvedLimits } from './config';
export { bytesToHex, hexToBytes } from './hex';
export {
  U64_MAX,
  encodeVarInt,
  decodeVarInt,
  varIntSize,
  encodeCompactSize,
  decodeCompactSize,
  compactSizeSize,
  floatToBits,
  bitsToFloat,
  doubleToBits,
  bitsToDouble,
  sizeOf,
  serialize,
  deserialize,
  compareBytes,
} from './helpers';
export { doubleSha256, hash256Hex } from './hash';
export { formatValue } from './format';
export type { Codec, CodecValue } from './codecs/Codec';
export { BooleanCodec } from './codecs/BooleanCodec';
export { IntegerCodec, BigIntegerCodec, integerRange } from './codecs/IntegerCodec';
export type { IntegerWidth, IntegerOptions } from './codecs/IntegerCodec';
export { FloatCodec } from './codecs/FloatCodec';
export { VarIntCodec, BigVarIntCodec } from './codecs/VarIntCodec';
export type { VarIntOptions } from './codecs/VarIntCodec';
export { CompactSizeCodec } from './codecs/CompactSizeCodec';
export { StringCodec, utf8Length } from './codecs/StringCodec';
export { BytesCodec, FixedBytesCodec } from './codecs/BytesCodec';
export { SequenceOfCodec } from './codecs/SequenceOfCodec';
export type { SequenceOfOptions } from './codecs/SequenceOfCodec';
export { MapCodec } from './codecs/MapCodec';
export type { MapOptions } from './codecs/MapCodec';
export { SetCodec } from './codecs/SetCodec';
export type { SetOptions } from './codecs/SetCodec';
export { OptionalCodec } from './codecs/OptionalCodec';
export { RecordCodec, field } from './codecs/RecordCodec';
export type { RecordField, RecordValue } from './codecs/RecordCodec';
export { SchemaBuilder, naturalCompare } from './schema/SchemaBuilder';
export type { SchemaNode, SchemaField, IntegerSchemaWidth } from './schema/SchemaBuilder';
export { SchemaCodec } from './schema/SchemaCodec';
export * from './parser';
export * from './protocol';
