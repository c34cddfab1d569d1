import type {
  GenerateOptions,
  GenerateResult,
  RandomJsonError,
} from '@randomjson/core';

export const LOG_PREFIX = '[randomjson]';

export function logLine(message: string): void {
  process.stderr.write(`${LOG_PREFIX} ${message}\n`);
}

/**
 * Print the options and run summary to stderr.
 * Intended to be used behind the --verbose flag.
 */
export function printRunDebug(
  options: GenerateOptions,
  result: GenerateResult
): void {
  logLine(`options: ${JSON.stringify(options)}`);
  logLine(`seed: ${result.seed}`);
  if (result.metrics) {
    const { compileMs, evaluateMs } = result.metrics;
    logLine(
      `timings: compile=${compileMs.toFixed(2)}ms evaluate=${evaluateMs.toFixed(2)}ms`
    );
  }
}

/** Metrics as one bare JSON line. */
export function printMetrics(result: GenerateResult): void {
  process.stderr.write(`${JSON.stringify(result.metrics ?? {})}\n`);
}

export function printErrorDebug(
  error: RandomJsonError,
  env: 'dev' | 'prod'
): void {
  logLine(`error: ${JSON.stringify(error.toJSON(env), null, 2)}`);
}
