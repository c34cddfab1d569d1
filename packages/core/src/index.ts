// @randomjson/core entry point
//
// High-level entry points live in ./api.js (generate, evaluateTemplate,
// preprocess). The building blocks below are exported for callers that
// compile once and evaluate many times, or register their own functions.

export * from './api.js';

// Values and templates
export * from './types/value.js';
export * from './types/template.js';
export {
  ok,
  err,
  isOk,
  isErr,
  Ok,
  Err,
  type Result,
} from './types/result.js';

// Errors
export {
  ErrorCode,
  EXIT_CODES,
  type Severity,
  getExitCode,
} from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';
export { didYouMean, suggestName } from './errors/suggestions.js';
export * from './types/errors.js';

// Options
export {
  DEFAULT_OPTIONS,
  parseSeed,
  resolveOptions,
  type GenerateOptions,
  type ResolvedOptions,
  type SeedSource,
} from './types/options.js';

// Parsing and compilation
export {
  MARKER_CLOSE,
  MARKER_OPEN,
  isMarker,
  parseMarker,
} from './parser/directive-parser.js';
export { castValue, coerceLiteral } from './parser/coerce.js';
export {
  compileTemplate,
  type CompileOptions,
} from './parser/template-compiler.js';
export { describeTemplate } from './parser/template-view.js';

// Evaluation
export {
  Evaluator,
  OMITTED,
  type EvaluationLimits,
  type EvaluatorOptions,
  type Outcome,
} from './eval/evaluator.js';
export { VariableTable, type VariableValue } from './eval/variable-table.js';

// Functions
export {
  Counters,
  FunctionRegistry,
  checkArity,
  describeArity,
  type Arity,
  type FunctionContext,
  type FunctionDefinition,
  type FunctionHandler,
} from './functions/registry.js';
export {
  BUILTIN_FUNCTIONS,
  builtinRegistry,
  formatTemplate,
} from './functions/builtins.js';

// Input documents
export {
  INPUT_DOCUMENT_SCHEMA,
  parseInputDocument,
  validateInputDocument,
  type InputDocument,
} from './document/input-document.js';

// Utilities
export { createRng, fnv1a32, XorShift32, type Rng } from './util/rng.js';
export { uuidV4, isUUIDv4 } from './util/uuid.js';
export {
  MetricsCollector,
  METRIC_PHASES,
  type MetricPhase,
  type MetricsSnapshot,
} from './util/metrics.js';
export {
  appendPointer,
  encodePointerToken,
  ROOT_POINTER,
  type JsonPointer,
} from './util/json-pointer.js';
