/**
 * Configuration options for a generation run
 *
 * All options are optional; `resolveOptions` merges them over
 * DEFAULT_OPTIONS and rejects out-of-range values with ConfigError.
 */

import { randomInt } from 'node:crypto';

import { builtinRegistry } from '../functions/builtins.js';
import type { FunctionRegistry } from '../functions/registry.js';
import { fnv1a32 } from '../util/rng.js';
import { ConfigError } from './errors.js';

const INTEGER_TEXT = /^[+-]?\d+$/;
const SEED_SPACE = 0x100000000;

export interface GenerateOptions {
  /**
   * Integer seed, or any string (integer text is read as a number, other
   * text is hashed). A fresh random seed is drawn when omitted.
   */
  seed?: number | string;
  /** Largest count a single repeat or `copy` may produce (default: 10000) */
  maxRepeat?: number;
  /** Total items all repeats and copies of one run may produce (default: 1000000) */
  maxItems?: number;
  /** Collect timings and counters (default: true) */
  metrics?: boolean;
  /** Functions visible to the template (default: the built-ins) */
  functions?: FunctionRegistry;
}

export type SeedSource = 'option' | 'random';

export interface ResolvedOptions {
  seed: number;
  seedSource: SeedSource;
  maxRepeat: number;
  maxItems: number;
  metrics: boolean;
  functions: FunctionRegistry;
}

export const DEFAULT_OPTIONS: Readonly<Omit<ResolvedOptions, 'seed' | 'seedSource'>> =
  Object.freeze({
    maxRepeat: 10_000,
    maxItems: 1_000_000,
    metrics: true,
    functions: builtinRegistry,
  });

/**
 * Merge user options over the defaults.
 *
 * @throws ConfigError for a malformed seed or limit
 */
export function resolveOptions(
  userOptions: GenerateOptions = {}
): ResolvedOptions {
  const resolved: ResolvedOptions = {
    ...DEFAULT_OPTIONS,
    ...definedOnly(userOptions),
    seed:
      userOptions.seed === undefined
        ? randomSeed()
        : parseSeed(userOptions.seed),
    seedSource: userOptions.seed === undefined ? 'random' : 'option',
  };

  validateLimit('maxRepeat', resolved.maxRepeat);
  validateLimit('maxItems', resolved.maxItems);
  return resolved;
}

/**
 * Normalize a seed to a uint32.
 *
 * @throws ConfigError for non-integer numbers and empty strings
 */
export function parseSeed(seed: number | string): number {
  if (typeof seed === 'number') {
    if (!Number.isSafeInteger(seed)) {
      throw new ConfigError({
        message: `Seed must be an integer, got ${seed}`,
        setting: 'seed',
        value: seed,
      });
    }
    return seed >>> 0;
  }

  const text = seed.trim();
  if (text === '') {
    throw new ConfigError({
      message: 'Seed must not be empty',
      setting: 'seed',
      value: seed,
    });
  }
  if (INTEGER_TEXT.test(text)) {
    const parsed = Number(text);
    if (Number.isSafeInteger(parsed)) {
      return parsed >>> 0;
    }
  }
  return fnv1a32(text);
}

function randomSeed(): number {
  return randomInt(0, SEED_SPACE);
}

function validateLimit(setting: 'maxRepeat' | 'maxItems', value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ConfigError({
      message: `${setting} must be a non-negative integer, got ${value}`,
      setting,
      value,
    });
  }
}

/** Drop keys explicitly set to undefined so they do not mask defaults. */
function definedOnly(options: GenerateOptions): Partial<ResolvedOptions> {
  const out: Partial<ResolvedOptions> = {};
  if (options.maxRepeat !== undefined) out.maxRepeat = options.maxRepeat;
  if (options.maxItems !== undefined) out.maxItems = options.maxItems;
  if (options.metrics !== undefined) out.metrics = options.metrics;
  if (options.functions !== undefined) out.functions = options.functions;
  return out;
}
