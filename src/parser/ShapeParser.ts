import peggy from 'peggy';
import { SHAPE_GRAMMAR } from './grammar';
import type { ShapeModule } from './types';

let cachedParser: peggy.Parser | null = null;

function getParser(): peggy.Parser {
  if (!cachedParser) {
    cachedParser = peggy.generate(SHAPE_GRAMMAR);
  }
  return cachedParser;
}

/**
 * Parse a record shape module into an AST.
 *
 * @param input - Shape notation text (e.g. contents of a .shape file)
 * @throws peggy.parser.SyntaxError if the input is not valid shape notation
 */
export function parseShapeModule(input: string): ShapeModule {
  const parser = getParser();
  return parser.parse(input) as ShapeModule;
}
