import { ConfigError, type GenerateOptions } from '@randomjson/core';

export const ENV_SEED = 'RANDOMJSON_RANDOM_SEED';
export const ENV_VERBOSE = 'RANDOMJSON_VERBOSE';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  onlyPreprocessor?: boolean;
  seed?: string;
  maxRepeat?: string;
  maxItems?: string;
  pretty?: boolean;
  printMetrics?: boolean;
  verbose?: boolean;
}

const INTEGER_TEXT = /^\d+$/;

/**
 * Parse a non-negative integer flag value.
 *
 * @throws ConfigError
 */
export function parseLimit(flag: string, raw: string): number {
  const text = raw.trim();
  const value = Number(text);
  if (!INTEGER_TEXT.test(text) || !Number.isSafeInteger(value)) {
    throw new ConfigError({
      message: `Invalid ${flag}: "${raw}" (expected a non-negative integer)`,
      setting: flag,
      value: raw,
    });
  }
  return value;
}

/**
 * Map CLI flags onto core GenerateOptions. Metrics are collected only when
 * something will print them.
 */
export function parseGenerateOptions(options: CliOptions): GenerateOptions {
  const generateOptions: GenerateOptions = {
    metrics: options.printMetrics === true || options.verbose === true,
  };
  if (options.seed !== undefined) {
    generateOptions.seed = options.seed;
  }
  if (options.maxRepeat !== undefined) {
    generateOptions.maxRepeat = parseLimit('--max-repeat', options.maxRepeat);
  }
  if (options.maxItems !== undefined) {
    generateOptions.maxItems = parseLimit('--max-items', options.maxItems);
  }
  return generateOptions;
}

/** Pretty output uses two-space indentation; compact otherwise. */
export function resolveIndent(options: CliOptions): number | undefined {
  return options.pretty === true ? 2 : undefined;
}
