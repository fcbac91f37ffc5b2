/**
 * Text mutators for shape modules.
 *
 * Most of them know the notation (fields end in `;`, generics use `<>`,
 * fixed byte runs carry `[N]`) so that the mutated text reaches past the
 * first character the grammar rejects.
 */

import { Rng } from './rng';

export type Mutator = (input: string, rng: Rng) => string;

const FIELD_TYPES = [
  'bool', 'u8', 'u16', 'u32', 'u64', 'i8', 'i16', 'i32', 'i64', 'f32', 'f64',
  'compactsize', 'string', 'bytes', 'bytes[0]', 'bytes[32]', 'varint<u64>', 'varint<i8>',
  'vector<u8>', 'optional<string>', 'set<bytes>', 'sortedset<u32>', 'map<string, u8>',
  'sortedmap<i64, bool>', 'Unknown', 'varint<string>', 'vector<>', 'map<u8>',
];

const SIZE_LITERALS = ['0', '1', '31', '32', '33', '255', '65536', '4294967296', '00', '99999999999999999999'];

function spliceAt(input: string, start: number, deleteCount: number, insert: string): string {
  return input.slice(0, start) + insert + input.slice(start + deleteCount);
}

function positionsOf(input: string, pattern: RegExp): RegExpMatchArray[] {
  return [...input.matchAll(pattern)];
}

/** Replace the type of one field with an arbitrary, possibly invalid, type. */
export function swapFieldType(input: string, rng: Rng): string {
  const fields = positionsOf(input, /:\s*([^;]+);/g);
  if (fields.length === 0) return input;
  const match = rng.pick(fields);
  const typeStart = (match.index ?? 0) + match[0].indexOf(match[1]);
  return spliceAt(input, typeStart, match[1].length, rng.pick(FIELD_TYPES));
}

/** Point a record reference at a name nobody declares. */
export function danglingReference(input: string, rng: Rng): string {
  const refs = positionsOf(input, /[:<,]\s*([A-Z][A-Za-z0-9_]*)/g);
  if (refs.length === 0) return input;
  const match = rng.pick(refs);
  const start = (match.index ?? 0) + match[0].length - match[1].length;
  return spliceAt(input, start, match[1].length, `${match[1]}Missing${rng.int(0, 9)}`);
}

/** Repeat one field line inside its record. */
export function duplicateField(input: string, rng: Rng): string {
  const fields = positionsOf(input, /[A-Za-z_][A-Za-z0-9_]*\s*:[^;]*;/g);
  if (fields.length === 0) return input;
  const match = rng.pick(fields);
  const end = (match.index ?? 0) + match[0].length;
  return spliceAt(input, end, 0, ` ${match[0]}`);
}

/** Append a copy of a whole record declaration. */
export function duplicateRecord(input: string, rng: Rng): string {
  const records = positionsOf(input, /record\s+[A-Z][A-Za-z0-9_]*\s*\{[^}]*\}/g);
  if (records.length === 0) return input;
  return `${input}\n${rng.pick(records)[0]}\n`;
}

/** Lowercase the first letter of a record name. */
export function lowercaseRecordName(input: string, rng: Rng): string {
  const names = positionsOf(input, /record\s+([A-Z])/g);
  if (names.length === 0) return input;
  const match = rng.pick(names);
  const at = (match.index ?? 0) + match[0].length - 1;
  return spliceAt(input, at, 1, match[1].toLowerCase());
}

/** Put a boundary value in a `bytes[N]` size. */
export function fixedSizeBoundary(input: string, rng: Rng): string {
  const sizes = positionsOf(input, /bytes\s*\[\s*(\d+)\s*\]/g);
  if (sizes.length === 0) return spliceAt(input, rng.int(0, input.length), 0, `[${rng.pick(SIZE_LITERALS)}]`);
  const match = rng.pick(sizes);
  const start = (match.index ?? 0) + match[0].indexOf(match[1]);
  return spliceAt(input, start, match[1].length, rng.pick(SIZE_LITERALS));
}

/** Wrap one field type in several container layers. */
export function deepNesting(input: string, rng: Rng): string {
  const fields = positionsOf(input, /:\s*([^;]+);/g);
  if (fields.length === 0) return input;
  const match = rng.pick(fields);
  const typeStart = (match.index ?? 0) + match[0].indexOf(match[1]);
  let type = match[1];
  const depth = rng.int(2, 12);
  for (let i = 0; i < depth; i++) {
    type = rng.chance(0.5) ? `vector<${type}>` : `optional<${type}>`;
  }
  return spliceAt(input, typeStart, match[1].length, type);
}

/** Drop one of the characters that delimit the notation. */
export function dropDelimiter(input: string, rng: Rng): string {
  const delimiters = positionsOf(input, /[{}<>[\]:;,]/g);
  if (delimiters.length === 0) return input;
  return spliceAt(input, rng.pick(delimiters).index ?? 0, 1, '');
}

/** Add a stray delimiter, comment marker or keyword. */
export function strayToken(input: string, rng: Rng): string {
  const tokens = ['{', '}', '<', '>', '[', ']', ':', ';', ',', '//', '/', 'record', 'record X {'];
  return spliceAt(input, rng.int(0, input.length), 0, rng.pick(tokens));
}

/** Turn the rest of one line into a comment. */
export function commentOut(input: string, rng: Rng): string {
  return spliceAt(input, rng.int(0, input.length), 0, '// ');
}

/** Join every line, so line comments swallow what follows them. */
export function joinLines(input: string): string {
  return input.replace(/\n/g, ' ');
}

/** Reverse the order of the record declarations. */
export function reverseLines(input: string): string {
  return input.split('\n').reverse().join('\n');
}

/** Cut the text short. */
export function truncate(input: string, rng: Rng): string {
  if (input.length <= 1) return input;
  return input.slice(0, rng.int(1, input.length - 1));
}

/** Flip one bit of one character. */
export function flipCharBit(input: string, rng: Rng): string {
  if (input.length === 0) return input;
  const at = rng.int(0, input.length - 1);
  return spliceAt(input, at, 1, String.fromCharCode(input.charCodeAt(at) ^ (1 << rng.int(0, 6))));
}

/** Insert control characters or non-ASCII letters into an identifier position. */
export function insertOddCharacters(input: string, rng: Rng): string {
  const odd = ['\0', '\t', '\r', ' ', ' ', 'é', 'ß', '中', '\u{1f600}'];
  return spliceAt(input, rng.int(0, input.length), 0, rng.pick(odd));
}

/** Stretch the first identifier to many times its length. */
export function longIdentifier(input: string, rng: Rng): string {
  const match = input.match(/[a-z][A-Za-z0-9_]*/);
  if (!match) return input;
  return spliceAt(input, match.index ?? 0, match[0].length, match[0].repeat(rng.int(2, 10)));
}

export const MUTATORS: Mutator[] = [
  swapFieldType,
  danglingReference,
  duplicateField,
  duplicateRecord,
  lowercaseRecordName,
  fixedSizeBoundary,
  deepNesting,
  dropDelimiter,
  strayToken,
  commentOut,
  joinLines,
  reverseLines,
  truncate,
  flipCharBit,
  insertOddCharacters,
  longIdentifier,
];

/** Apply `count` random mutators in sequence (1 to 3 when omitted). */
export function mutate(input: string, rng: Rng, count?: number): string {
  let result = input;
  for (let i = count ?? rng.int(1, 3); i > 0; i--) {
    result = rng.pick(MUTATORS)(result, rng);
  }
  return result;
}
