/**
 * Transposes benchmark CSV so each benchmark family becomes a column.
 *
 * Assumes the families were run over the same sizes. Turns:
 *
 * ```txt
 * Name,Time (ns)
 * vec/range/1024,102541
 * vec/range/4096,423289
 * vec/gen/1024,102316
 * vec/gen/4096,416523
 * ```
 *
 * into:
 *
 * ```txt
 * Size,vec/range,vec/gen
 * 1024,102541,102316
 * 4096,423289,416523
 * ```
 */

import { createInterface } from 'readline';
import type { Readable, Writable } from 'stream';
import { CSV_HEADER } from '../benchmarks/framework/CsvReporter.js';
import { ReportParseError } from '../utils/errors.js';

export const SIZE_COLUMN = 'Size';

const ROW_PATTERN = /^([^,]+\/[^,]+)\/([0-9]+),([0-9]+)$/;

export interface ReportRow {
  /** Qualified name without the trailing size */
  family: string;
  size: bigint;
  time: string;
}

/**
 * Parse one line of a report. Returns null for the header and blank lines.
 */
export function parseReportLine(line: string, lineNumber: number): ReportRow | null {
  const text = line.endsWith('\r') ? line.slice(0, -1) : line;
  if (text === '' || text === CSV_HEADER) {
    return null;
  }
  const match = ROW_PATTERN.exec(text);
  if (!match) {
    throw new ReportParseError('expected <entry>/<bench>/<size>,<time>', lineNumber, text);
  }
  const [, family, size, time] = match;
  return { family, size: BigInt(size), time };
}

export class ReportTransposer {
  private readonly families: string[] = [];
  private readonly knownFamilies = new Set<string>();
  private readonly bySize = new Map<bigint, Map<string, string>>();
  private lineNumber = 0;
  private sawHeader = false;

  /**
   * Feed the next input line
   */
  push(line: string): void {
    this.lineNumber++;
    const text = line.endsWith('\r') ? line.slice(0, -1) : line;

    if (!this.sawHeader) {
      if (text === '') {
        return;
      }
      if (text !== CSV_HEADER) {
        throw new ReportParseError(`expected header '${CSV_HEADER}'`, this.lineNumber, text);
      }
      this.sawHeader = true;
      return;
    }

    const row = parseReportLine(text, this.lineNumber);
    if (!row) {
      return;
    }

    if (!this.knownFamilies.has(row.family)) {
      this.knownFamilies.add(row.family);
      this.families.push(row.family);
    }

    let cells = this.bySize.get(row.size);
    if (!cells) {
      cells = new Map();
      this.bySize.set(row.size, cells);
    }
    if (cells.has(row.family)) {
      throw new ReportParseError(
        `duplicate result for ${row.family} at size ${row.size}`,
        this.lineNumber,
        text
      );
    }
    cells.set(row.family, row.time);
  }

  get familyNames(): readonly string[] {
    return this.families;
  }

  /**
   * The transposed table, header first, sizes ascending
   */
  toLines(): string[] {
    if (!this.sawHeader) {
      throw new ReportParseError(`missing header '${CSV_HEADER}'`, this.lineNumber, '');
    }

    const sizes = [...this.bySize.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
    const lines = [[SIZE_COLUMN, ...this.families].join(',')];
    for (const size of sizes) {
      const cells = this.bySize.get(size) ?? new Map<string, string>();
      const values = this.families.map(family => cells.get(family) ?? '');
      lines.push([size.toString(), ...values].join(','));
    }
    return lines;
  }

  toString(): string {
    return this.toLines()
      .map(line => `${line}\n`)
      .join('');
  }
}

/**
 * Transpose a whole report held in memory
 */
export function transposeReport(text: string): string {
  const transposer = new ReportTransposer();
  const lines = text.split('\n');
  // A trailing newline leaves one empty element that is not a line
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  for (const line of lines) {
    transposer.push(line);
  }
  return transposer.toString();
}

export interface TransposeStreamOptions {
  /** Receives every input line unchanged as it is read */
  echo?: Writable;
}

/**
 * Read a whole report from `input` and return the transposed table
 */
export async function transposeInput(
  input: Readable,
  options: TransposeStreamOptions = {}
): Promise<string> {
  const transposer = new ReportTransposer();
  const lines = createInterface({ input, crlfDelay: Infinity });

  try {
    for await (const line of lines) {
      options.echo?.write(`${line}\n`);
      transposer.push(line);
    }
  } finally {
    lines.close();
  }

  return transposer.toString();
}

/**
 * Read a report from `input` and write the transposed table to `output`
 */
export async function transposeStream(
  input: Readable,
  output: Writable,
  options: TransposeStreamOptions = {}
): Promise<void> {
  output.write(await transposeInput(input, options));
}
