#!/usr/bin/env npx tsx
/**
 * CLI tool to decode a serialized value against a record shape or schema file.
 *
 * Usage:
 *   npx tsx cli/decode-stream.ts <schema.shape|schema.json> <TypeName> <hex | path-to-hex-file> [--max-size N]
 *
 * Defaults to schemas/transaction.shape when the first argument is omitted
 * and only a type name and payload are given.
 */

import * as fs from 'fs';
import * as path from 'path';
import { SchemaCodec } from '../src/schema/SchemaCodec';
import type { SchemaNode } from '../src/schema/SchemaBuilder';
import { parseShapeModule } from '../src/parser/ShapeParser';
import { convertModuleToSchemaNodes } from '../src/parser/toSchemaNode';
import { CodecLimits } from '../src/config';
import { isCodecError } from '../src/errors';
import { formatValue } from '../src/format';
import { hash256Hex } from '../src/hash';
import { hexToBytes } from '../src/hex';

const DEFAULT_SCHEMA = path.join(__dirname, '..', 'schemas', 'transaction.shape');

const USAGE =
  'Usage: npx tsx cli/decode-stream.ts [schema.shape|schema.json] <TypeName> <hex | file> [--max-size N]';

function loadSchemas(schemaPath: string): Record<string, SchemaNode> {
  const text = fs.readFileSync(schemaPath, 'utf-8');
  if (schemaPath.endsWith('.json')) {
    return JSON.parse(text) as Record<string, SchemaNode>;
  }
  return convertModuleToSchemaNodes(parseShapeModule(text));
}

/** Accept either a literal hex string or a file containing one. */
function loadPayload(arg: string): Uint8Array {
  if (fs.existsSync(arg)) {
    return hexToBytes(fs.readFileSync(arg, 'utf-8'));
  }
  return hexToBytes(arg);
}

function parseArgs(argv: string[]): { positional: string[]; limits: CodecLimits } {
  const positional: string[] = [];
  const limits: CodecLimits = {};
  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === '--max-size') {
      const raw = argv[++i];
      const maxSize = Number(raw);
      if (raw === undefined || !Number.isSafeInteger(maxSize) || maxSize < 0) {
        console.error(`Error: --max-size expects a non-negative integer, got ${raw}`);
        process.exit(1);
      }
      limits.maxSize = maxSize;
    } else {
      positional.push(argv[i]);
    }
  }
  return { positional, limits };
}

function main(): void {
  const { positional, limits } = parseArgs(process.argv.slice(2));

  if (positional.length < 2 || positional.length > 3) {
    console.error(USAGE);
    process.exit(1);
  }

  const [schemaArg, typeName, payloadArg] =
    positional.length === 3 ? positional : [DEFAULT_SCHEMA, positional[0], positional[1]];

  const schemaPath = path.resolve(schemaArg);
  if (!fs.existsSync(schemaPath)) {
    console.error(`Error: schema file not found: ${schemaPath}`);
    process.exit(1);
  }

  const codec = SchemaCodec.fromRegistry(loadSchemas(schemaPath), typeName, limits);
  const bytes = loadPayload(payloadArg);

  console.log(`=== ${typeName} (${bytes.length} bytes) ===`);
  console.log(`hash256: ${hash256Hex(bytes)}\n`);

  try {
    console.log(formatValue(codec.decode(bytes)));
  } catch (err) {
    if (isCodecError(err)) {
      console.error(`Decode failed (${err.kind}): ${err.message}`);
      for (const [key, value] of Object.entries(err.context)) {
        console.error(`  ${key}: ${value}`);
      }
      process.exit(2);
    }
    throw err;
  }
}

main();
