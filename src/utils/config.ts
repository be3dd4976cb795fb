import { z } from 'zod';
import { ConfigurationError } from './errors.js';

const NANOS_PER_SECOND = 1_000_000_000;

export const RunConfigSchema = z.object({
  /** Only run benchmarks whose qualified name contains this string */
  filter: z.string().optional(),
  /** Keep running until this much active time has accumulated */
  minDurationNs: z.bigint().nonnegative(),
  /** Keep running until at least this many runs have completed */
  minRuns: z.number().int().min(1).max(Number.MAX_SAFE_INTEGER),
});

export type RunConfig = z.infer<typeof RunConfigSchema>;

const defaultConfig: RunConfig = {
  filter: undefined,
  minDurationNs: BigInt(NANOS_PER_SECOND),
  minRuns: 8,
};

export const DEFAULT_RUN_CONFIG: Readonly<RunConfig> = Object.freeze({ ...defaultConfig });

/**
 * Convert a duration in (possibly fractional) seconds to nanoseconds
 */
export function secondsToNanos(value: string, option: string): bigint {
  if (!/^\d+(\.\d+)?$/.test(value)) {
    throw new ConfigurationError(`${option} expects a non-negative number of seconds, got '${value}'`);
  }
  const nanos = Math.round(parseFloat(value) * NANOS_PER_SECOND);
  if (!Number.isSafeInteger(nanos)) {
    throw new ConfigurationError(`${option} is too large: '${value}'`);
  }
  return BigInt(nanos);
}

function parseRuns(value: string, option: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ConfigurationError(`${option} expects a positive integer, got '${value}'`);
  }
  return parseInt(value, 10);
}

export function loadConfig(
  overrides: Partial<RunConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): RunConfig {
  const envConfig: Partial<RunConfig> = {};

  if (env.BENCH_FILTER) {
    envConfig.filter = env.BENCH_FILTER;
  }
  if (env.BENCH_MIN_DURATION) {
    envConfig.minDurationNs = secondsToNanos(env.BENCH_MIN_DURATION, 'BENCH_MIN_DURATION');
  }
  if (env.BENCH_MIN_RUNS) {
    envConfig.minRuns = parseRuns(env.BENCH_MIN_RUNS, 'BENCH_MIN_RUNS');
  }

  const merged = {
    ...defaultConfig,
    ...envConfig,
    ...withoutUndefined(overrides),
  };

  return validateRunConfig(merged);
}

/**
 * Check a run configuration, throwing a ConfigurationError listing every problem
 */
export function validateRunConfig(config: RunConfig): RunConfig {
  const parsed = RunConfigSchema.safeParse(config);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid run configuration (${issues})`);
  }
  return parsed.data;
}

function withoutUndefined(overrides: Partial<RunConfig>): Partial<RunConfig> {
  const result: Partial<RunConfig> = {};
  if (overrides.filter !== undefined) result.filter = overrides.filter;
  if (overrides.minDurationNs !== undefined) result.minDurationNs = overrides.minDurationNs;
  if (overrides.minRuns !== undefined) result.minRuns = overrides.minRuns;
  return result;
}

export interface ParsedArgs {
  overrides: Partial<RunConfig>;
  help: boolean;
}

export const USAGE = `Usage: <benchmark> [options]

Options:
  -f, --filter <FILTER>          Only run benchmarks that contain this string
  -d, --min-duration <SECONDS>   Run each benchmark at least this long (default: 1)
  -r, --min-runs <RUNS>          Run each benchmark at least this many times (default: 8)
  -h, --help                     Show this message`;

/**
 * Parse benchmark program arguments into config overrides.
 * Accepts `--opt value` and `--opt=value`.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const overrides: Partial<RunConfig> = {};
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq > -1 ? arg.slice(0, eq) : arg;
    const inline = eq > -1 ? arg.slice(eq + 1) : undefined;

    const takeValue = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined) {
        throw new ConfigurationError(`${flag} requires a value`);
      }
      i++;
      return next;
    };

    switch (flag) {
      case '-f':
      case '--filter':
        overrides.filter = takeValue();
        break;
      case '-d':
      case '--min-duration':
      case '--min_duration':
        overrides.minDurationNs = secondsToNanos(takeValue(), flag);
        break;
      case '-r':
      case '--min-runs':
      case '--min_runs':
        overrides.minRuns = parseRuns(takeValue(), flag);
        break;
      case '-h':
      case '--help':
        help = true;
        break;
      default:
        throw new ConfigurationError(`Unknown option: ${arg}`);
    }
  }

  return { overrides, help };
}
