/**
 * Error hierarchy shared by the runner, the reporter and the transpose tool.
 */

export type PacerErrorCode = 'CONFIGURATION' | 'BODY_FAILURE' | 'INPUT_FAILURE' | 'REPORT_PARSE';

/**
 * Base error class for all pacer errors
 */
export class PacerError extends Error {
  public readonly code: PacerErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: PacerErrorCode,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid range, builder misuse or bad run settings. Raised before any
 * body executes.
 */
export class ConfigurationError extends PacerError {
  public readonly entryName?: string;

  constructor(message: string, entryName?: string, context?: Record<string, unknown>) {
    super(entryName ? `Benchmark '${entryName}': ${message}` : message, 'CONFIGURATION', {
      entryName,
      ...context,
    });
    this.entryName = entryName;
  }
}

/**
 * A benchmark body threw. The failed run is not counted.
 */
export class BodyFailureError extends PacerError {
  public readonly qualifiedName: string;
  public readonly runIndex: number;

  constructor(qualifiedName: string, runIndex: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Benchmark ${qualifiedName} failed on run ${runIndex + 1}: ${reason}`,
      'BODY_FAILURE',
      { qualifiedName, runIndex },
      { cause }
    );
    this.qualifiedName = qualifiedName;
    this.runIndex = runIndex;
  }
}

export type InputStage = 'generate' | 'clone';

/**
 * The generator or the clone function threw while preparing input for a
 * benchmark. Nothing was timed.
 */
export class InputFailureError extends PacerError {
  public readonly qualifiedName: string;
  public readonly stage: InputStage;

  constructor(qualifiedName: string, stage: InputStage, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const action = stage === 'generate' ? 'generate' : 'copy';
    super(
      `Benchmark ${qualifiedName} could not ${action} its input: ${reason}`,
      'INPUT_FAILURE',
      { qualifiedName, stage },
      { cause }
    );
    this.qualifiedName = qualifiedName;
    this.stage = stage;
  }
}

/**
 * A line of benchmark CSV that the transpose tool cannot pivot.
 */
export class ReportParseError extends PacerError {
  public readonly lineNumber: number;
  public readonly line: string;

  constructor(message: string, lineNumber: number, line: string) {
    super(`Line ${lineNumber}: ${message}: '${line}'`, 'REPORT_PARSE', { lineNumber, line });
    this.lineNumber = lineNumber;
    this.line = line;
  }
}
