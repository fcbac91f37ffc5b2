#!/usr/bin/env npx tsx
/**
 * Compile a record shape file into a SchemaNode JSON registry.
 *
 * Usage:
 *   npx tsx cli/generate-schema.ts <input.shape> [output.json] [--type Name]
 *
 * `--type` keeps only the named record and the records it references.
 * Without an output path the JSON goes to stdout.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parseShapeModule } from '../src/parser/ShapeParser';
import { convertModuleToSchemaNodes } from '../src/parser/toSchemaNode';
import { SchemaBuilder, SchemaNode } from '../src/schema/SchemaBuilder';

const USAGE = 'Usage: npx tsx cli/generate-schema.ts <input.shape> [output.json] [--type Name]';

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

/** Names of the records `node` refers to, directly or through containers. */
function referencedRecords(node: SchemaNode, into: Set<string>): void {
  switch (node.type) {
    case '$ref':
      into.add(node.ref);
      break;
    case 'vector':
    case 'optional':
    case 'set':
      referencedRecords(node.item, into);
      break;
    case 'map':
      referencedRecords(node.key, into);
      referencedRecords(node.value, into);
      break;
    case 'record':
      for (const f of node.fields) referencedRecords(f.schema, into);
      break;
    default:
      break;
  }
}

/** The named record plus everything reachable from it, in declaration order. */
function closure(schemas: Record<string, SchemaNode>, root: string): Record<string, SchemaNode> {
  if (!(root in schemas)) {
    fail(`Error: no record "${root}". Available: ${Object.keys(schemas).join(', ')}`);
  }
  const reached = new Set<string>([root]);
  const pending = [root];
  for (let name = pending.pop(); name !== undefined; name = pending.pop()) {
    const refs = new Set<string>();
    referencedRecords(schemas[name], refs);
    for (const ref of refs) {
      if (!reached.has(ref)) {
        reached.add(ref);
        pending.push(ref);
      }
    }
  }
  return Object.fromEntries(Object.entries(schemas).filter(([name]) => reached.has(name)));
}

function main(): void {
  const positional: string[] = [];
  let typeName: string | undefined;
  const argv = process.argv.slice(2);
  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === '--type') {
      typeName = argv[++i] ?? fail(USAGE);
    } else {
      positional.push(argv[i]);
    }
  }
  const [input, output] = positional;
  if (input === undefined) fail(USAGE);

  const inputPath = path.resolve(input);
  if (!fs.existsSync(inputPath)) fail(`Error: input file not found: ${inputPath}`);

  let schemas = convertModuleToSchemaNodes(parseShapeModule(fs.readFileSync(inputPath, 'utf-8')));
  if (typeName !== undefined) schemas = closure(schemas, typeName);
  // every record must build before anything is written
  SchemaBuilder.buildAll(schemas);

  const json = `${JSON.stringify(schemas, null, 2)}\n`;
  if (output === undefined) {
    process.stdout.write(json);
    return;
  }
  const outputPath = path.resolve(output);
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, json, 'utf-8');
  console.log(`Wrote ${Object.keys(schemas).length} record(s) from ${path.basename(inputPath)} to ${outputPath}`);
}

main();
