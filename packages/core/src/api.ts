// Public entry points. Each call is one run: it owns its RNG, counters and
// metrics, so concurrent runs never share state.

import {
  parseInputDocument,
  validateInputDocument,
  type InputDocument,
} from './document/input-document.js';
import { Evaluator } from './eval/evaluator.js';
import { VariableTable } from './eval/variable-table.js';
import { builtinRegistry } from './functions/builtins.js';
import { Counters, type FunctionRegistry } from './functions/registry.js';
import { compileTemplate } from './parser/template-compiler.js';
import { describeTemplate } from './parser/template-view.js';
import {
  resolveOptions,
  type GenerateOptions,
  type ResolvedOptions,
} from './types/options.js';
import type { JsonValue, Value } from './types/value.js';
import { appendPointer, ROOT_POINTER } from './util/json-pointer.js';
import { MetricsCollector, type MetricsSnapshot } from './util/metrics.js';
import { createRng } from './util/rng.js';

const SCHEMA_POINTER = appendPointer(ROOT_POINTER, 'schema');

export interface GenerateResult {
  /** The resolved document. */
  value: Value;
  /** Effective uint32 seed; passing it back reproduces `value`. */
  seed: number;
  /** Present when metrics are enabled. */
  metrics?: MetricsSnapshot;
}

export interface PreprocessOptions {
  functions?: FunctionRegistry;
  /** Pointer prefix for error locations (default ''). */
  basePointer?: string;
}

/**
 * Resolve an input document (`{ schema, variables }`), given as JSON text
 * or already parsed; both forms are validated the same way. Error locations
 * start at `/schema`.
 *
 * @throws ParseError, DocumentValidationError, ConfigError or any template
 *   or evaluation error
 */
export function generate(
  document: InputDocument | string,
  options: GenerateOptions = {}
): GenerateResult {
  const input =
    typeof document === 'string'
      ? parseInputDocument(document).unwrap()
      : validateInputDocument(document).unwrap();
  return run(
    input.schema,
    input.variables,
    resolveOptions(options),
    SCHEMA_POINTER
  );
}

/**
 * Resolve a bare template against `variables`. Error locations are relative
 * to the template root.
 */
export function evaluateTemplate(
  schema: JsonValue,
  variables: Readonly<Record<string, unknown>> = {},
  options: GenerateOptions = {}
): GenerateResult {
  return run(schema, variables, resolveOptions(options), ROOT_POINTER);
}

/**
 * Compile a template without evaluating it and return its JSON view: every
 * directive appears as a `{ "type": ... }` record.
 */
export function preprocess(
  schema: JsonValue,
  options: PreprocessOptions = {}
): Value {
  const root = compileTemplate(schema, {
    functions: options.functions ?? builtinRegistry,
    basePointer: options.basePointer ?? ROOT_POINTER,
  });
  return describeTemplate(root);
}

function run(
  schema: JsonValue,
  variables: Readonly<Record<string, unknown>>,
  options: ResolvedOptions,
  basePointer: string
): GenerateResult {
  const metrics = new MetricsCollector({ enabled: options.metrics });
  const table = VariableTable.from(variables);

  const root = metrics.time('COMPILE', () =>
    compileTemplate(schema, { functions: options.functions, basePointer })
  );
  const evaluator = new Evaluator({
    variables: table,
    rng: createRng(options.seed),
    counters: new Counters(),
    limits: { maxRepeat: options.maxRepeat, maxItems: options.maxItems },
    metrics,
  });
  const value = metrics.time('EVALUATE', () => evaluator.evaluate(root));

  const result: GenerateResult = { value, seed: options.seed };
  if (metrics.isEnabled()) {
    result.metrics = metrics.snapshotMetrics();
  }
  return result;
}
