#!/usr/bin/env node

/**
 * pacer-transpose - pivot benchmark CSV from stdin into one column per family
 *
 * Run with: my-bench | pacer-transpose [--file <path>]
 *
 * With --file the original report is echoed to stdout and the transposed
 * table is written to the file instead.
 */

import { realpathSync } from 'fs';
import { writeFile } from 'fs/promises';
import type { Readable, Writable } from 'stream';
import { fileURLToPath } from 'url';
import { transposeInput, transposeStream } from './transpose/transpose.js';
import { ConfigurationError } from './utils/errors.js';
import { logger } from './utils/logger.js';

const log = logger.child('transpose');

export const TRANSPOSE_USAGE = `Usage: pacer-transpose [options] < report.csv

Options:
  -f, --file <FILE>   File to write the table to. If omitted, writes to stdout
  -h, --help          Show this message`;

export interface TransposeArgs {
  file?: string;
  help: boolean;
}

export function parseTransposeArgs(argv: readonly string[]): TransposeArgs {
  const args: TransposeArgs = { help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '-h' || arg === '--help') {
      args.help = true;
    } else if (arg === '-f' || arg === '--file') {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new ConfigurationError(`${arg} requires a value`);
      }
      args.file = value;
      i++;
    } else if (arg.startsWith('--file=')) {
      args.file = arg.slice('--file='.length);
    } else {
      throw new ConfigurationError(`Unknown option: ${arg}`);
    }
  }

  return args;
}

export interface TransposeIO {
  input?: Readable;
  output?: Writable;
}

export async function runTranspose(
  argv: readonly string[] = process.argv.slice(2),
  io: TransposeIO = {}
): Promise<void> {
  const input = io.input ?? process.stdin;
  const output = io.output ?? process.stdout;

  const args = parseTransposeArgs(argv);
  if (args.help) {
    console.log(TRANSPOSE_USAGE);
    return;
  }

  if (!args.file) {
    await transposeStream(input, output);
    return;
  }

  const table = await transposeInput(input, { echo: output });
  try {
    await writeFile(args.file, table, 'utf-8');
    log.info(`Wrote transposed table to ${args.file}`);
  } catch (err) {
    log.error(`Could not write ${args.file}: ${err instanceof Error ? err.message : String(err)}`);
    log.error('Displaying results below:');
    output.write(table);
  }
}

function isDirectRun(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    // npm links bins, so compare resolved paths
    return realpathSync(script) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

// Direct execution support
if (isDirectRun()) {
  runTranspose().catch((err: unknown) => {
    console.error(`Transpose failed: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  });
}
