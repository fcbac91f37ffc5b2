/**
 * Standalone continuous fuzzer for the shape parser and the codecs.
 *
 * Alternates grammar-aware shape generation, shape text mutation and
 * encoded stream mutation in a loop, reporting any input that hangs or
 * fails with something other than a clean rejection.
 *
 * Usage:
 *   npx tsx fuzzing/run.ts [--iterations N]
 */

import { parseShapeModule } from '../src/parser/ShapeParser';
import { convertModuleToSchemaNodes } from '../src/parser/toSchemaNode';
import { SchemaBuilder } from '../src/schema/SchemaBuilder';
import { deserialize, serialize } from '../src/helpers';
import { isCodecError } from '../src/errors';
import { bytesToHex } from '../src/hex';
import { generateShapeModule } from './generators/shape-generator';
import { SchemaGenerator } from './generators/schema-generator';
import { Rng } from './generators/rng';
import { mutate } from './generators/mutator';
import { mutateBytes } from './generators/byte-mutator';
import { ALL_SEEDS, STREAM_SEEDS } from './seeds';

const TIMEOUT_MS = 2000;

type Strategy = 'generation' | 'mutation' | 'stream';

interface FuzzResult {
  seed: number;
  strategy: Strategy;
  input: string;
  error?: string;
  timedOut: boolean;
  accepted: boolean;
}

/** Parse, convert, build, and round-trip a value of every record. */
function fuzzShape(input: string, seed: number, strategy: Strategy): FuzzResult {
  const result: FuzzResult = { seed, strategy, input, timedOut: false, accepted: false };
  const start = Date.now();

  let registry;
  try {
    registry = convertModuleToSchemaNodes(parseShapeModule(input));
  } catch {
    // parser and converter rejections are expected
    result.timedOut = Date.now() - start > TIMEOUT_MS;
    return result;
  }

  try {
    const codecs = SchemaBuilder.buildAll(registry);
    const gen = new SchemaGenerator(seed);
    for (const [name, node] of Object.entries(registry)) {
      const value = gen.value(node, registry);
      const bytes = serialize(codecs[name], value);
      deserialize(codecs[name], bytes);
    }
    result.accepted = true;
  } catch (e) {
    // self-recursive or unorderable shapes from mutation are rejected, not findings
    if (!(e instanceof RangeError) && !isCodecError(e)) {
      result.error = e instanceof Error ? e.stack ?? e.message : String(e);
    }
  }

  result.timedOut = Date.now() - start > TIMEOUT_MS;
  return result;
}

/** Decode a corrupted stream; anything but a CodecError is a finding. */
function fuzzStream(iteration: number): FuzzResult {
  const streamSeed = STREAM_SEEDS[iteration % STREAM_SEEDS.length];
  const bytes = mutateBytes(streamSeed.bytes, new Rng(iteration));
  const result: FuzzResult = {
    seed: iteration,
    strategy: 'stream',
    input: `${streamSeed.name}: ${bytesToHex(bytes)}`,
    timedOut: false,
    accepted: false,
  };
  const start = Date.now();
  try {
    deserialize(streamSeed.codec, bytes);
    result.accepted = true;
  } catch (e) {
    if (!isCodecError(e)) {
      result.error = e instanceof Error ? e.stack ?? e.message : String(e);
    }
  }
  result.timedOut = Date.now() - start > TIMEOUT_MS;
  return result;
}

function main() {
  const args = process.argv.slice(2);
  let maxIterations = Infinity;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--iterations' && args[i + 1]) {
      maxIterations = parseInt(args[i + 1], 10);
      i++;
    }
  }

  console.log(`Shape & Codec Fuzzer`);
  console.log(`Max iterations: ${maxIterations === Infinity ? 'unlimited' : maxIterations}`);
  console.log('');

  let iteration = 0;
  const counts: Record<Strategy, number> = { generation: 0, mutation: 0, stream: 0 };
  let accepted = 0;
  let timedOut = 0;
  const findings: FuzzResult[] = [];

  const startTime = Date.now();

  while (iteration < maxIterations) {
    let result: FuzzResult;

    switch (iteration % 3) {
      case 0:
        result = fuzzShape(generateShapeModule(iteration), iteration, 'generation');
        break;
      case 1: {
        const seed = ALL_SEEDS[iteration % ALL_SEEDS.length];
        const rng = new Rng(iteration);
        result = fuzzShape(mutate(seed, rng, rng.int(1, 5)), iteration, 'mutation');
        break;
      }
      default:
        result = fuzzStream(iteration);
    }
    counts[result.strategy]++;

    if (result.accepted) accepted++;
    if (result.timedOut || result.error !== undefined) {
      if (result.timedOut) timedOut++;
      findings.push(result);
      console.error(`\n[!] ${result.timedOut ? 'TIMEOUT' : 'ERROR'} at iteration ${iteration} (${result.strategy}):`);
      console.error(`    Input: ${result.input.slice(0, 200)}...`);
      if (result.error) console.error(`    ${result.error.split('\n')[0]}`);
    }

    iteration++;

    // Progress report every 1000 iterations
    if (iteration % 1000 === 0) {
      const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
      const rate = (iteration / ((Date.now() - startTime) / 1000)).toFixed(0);
      console.log(
        `[${elapsed}s] iteration=${iteration} rate=${rate}/s ` +
        `generated=${counts.generation} mutated=${counts.mutation} streams=${counts.stream} ` +
        `accepted=${accepted} timeouts=${timedOut}`
      );
    }
  }

  // Final report
  const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log('');
  console.log('=== Final Report ===');
  console.log(`Total iterations: ${iteration}`);
  console.log(`Elapsed: ${elapsed}s`);
  console.log(`Generated: ${counts.generation}`);
  console.log(`Mutated: ${counts.mutation}`);
  console.log(`Streams: ${counts.stream}`);
  console.log(`Accepted: ${accepted}`);
  console.log(`Timeouts: ${timedOut}`);

  if (findings.length > 0) {
    console.log('');
    console.log(`=== ${findings.length} issue(s) found ===`);
    for (const finding of findings) {
      console.log(`  Seed: ${finding.seed}, Strategy: ${finding.strategy}`);
      console.log(`  Input: ${finding.input.slice(0, 300)}`);
      if (finding.error) console.log(`  Error: ${finding.error}`);
      console.log('');
    }
    process.exit(1);
  } else {
    console.log('\nNo issues found.');
    process.exit(0);
  }
}

main();
