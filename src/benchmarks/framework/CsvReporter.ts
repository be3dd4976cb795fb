/**
 * CsvReporter - streams results in the benchmark CSV wire format
 *
 * ```txt
 * Name,Time (ns)
 * gen_bench/pop/1024,103674
 * gen_bench/pop/4096,412499
 * ```
 */

import type { ResultSink, RunResult } from './types.js';

export const CSV_HEADER = 'Name,Time (ns)';

/**
 * Anything that accepts text, e.g. process.stdout or a file stream
 */
export interface ReportOutput {
  write(chunk: string): unknown;
}

export function formatRow(result: Pick<RunResult, 'qualifiedName' | 'meanNs'>): string {
  return `${result.qualifiedName},${result.meanNs}`;
}

/**
 * Render a complete report
 */
export function formatReport(results: ReadonlyArray<RunResult>): string {
  return [CSV_HEADER, ...results.map(formatRow)].map(line => `${line}\n`).join('');
}

export class CsvReporter implements ResultSink {
  private headerWritten = false;
  private rows = 0;

  constructor(private readonly output: ReportOutput = process.stdout) {}

  report(result: RunResult): void {
    this.writeHeader();
    this.output.write(`${formatRow(result)}\n`);
    this.rows++;
  }

  /**
   * Emit the header if no result was reported
   */
  finish(): void {
    this.writeHeader();
  }

  get rowCount(): number {
    return this.rows;
  }

  private writeHeader(): void {
    if (this.headerWritten) {
      return;
    }
    this.output.write(`${CSV_HEADER}\n`);
    this.headerWritten = true;
  }
}
