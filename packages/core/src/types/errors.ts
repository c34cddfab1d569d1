/**
 * Error hierarchy for randomjson
 * Provides structured error handling with context and suggestions
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';
import { suggestName } from '../errors/suggestions.js';
import { DIRECTIVE_KINDS } from './template.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  path?: string; // JSON Pointer of the template node (e.g., '/schema/items/2')
  marker?: string; // Raw marker string as written in the template
  value?: unknown; // Problematic value (may contain variable data)
  valueExcerpt?: string; // Safe excerpt of value
  suggestion?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface RandomJsonErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

const SENSITIVE_KEYS = new Set([
  'password',
  'apiKey',
  'secret',
  'token',
  'ssn',
  'creditCard',
]);

/**
 * Base error class for all randomjson errors
 */
export abstract class RandomJsonError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context: ErrorContext;
  public readonly cause?: Error;

  constructor(params: RandomJsonErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = { ...(context ?? {}) };
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Attach the pointer of the node being evaluated. The innermost location
   * wins: a pointer that is already set is kept.
   */
  locate(path: string): this {
    if (this.context.path === undefined) {
      this.context.path = path;
    }
    return this;
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and applies basic redaction to context.value
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: env === 'prod' ? this.#redactContext(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }

  #redactContext(context: ErrorContext): ErrorContext {
    const redactValue = (val: unknown): unknown => {
      if (val && typeof val === 'object') {
        if (Array.isArray(val)) return val.map(redactValue);
        const out: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(val)) {
          out[k] = SENSITIVE_KEYS.has(k) ? '[REDACTED]' : redactValue(v);
        }
        return out;
      }
      return val;
    };

    const redacted: ErrorContext = { ...context };
    if ('value' in redacted) {
      redacted.value = redactValue(redacted.value);
      if (redacted.valueExcerpt !== undefined) {
        redacted.valueExcerpt = excerpt(redacted.value);
      }
    }
    return redacted;
  }
}

/**
 * Malformed marker strings (missing delimiter, empty kind, bad segments)
 */
export class MarkerSyntaxError extends RandomJsonError {
  constructor(params: { message: string; marker: string; path?: string }) {
    super({
      message: params.message,
      errorCode: ErrorCode.MARKER_SYNTAX,
      context: {
        path: params.path,
        marker: params.marker,
        valueExcerpt: params.marker,
      },
    });
  }

  get marker(): string | undefined {
    return this.context.marker;
  }
}

/**
 * Marker whose kind tag is not one of the known directive kinds
 */
export class UnknownDirectiveKindError extends RandomJsonError {
  public readonly kind: string;

  constructor(params: { kind: string; marker: string; path?: string }) {
    super({
      message: `Unknown directive kind "${params.kind}" in ${params.marker}`,
      errorCode: ErrorCode.UNKNOWN_DIRECTIVE_KIND,
      context: {
        path: params.path,
        marker: params.marker,
        valueExcerpt: params.marker,
        suggestion: suggestName(
          params.kind,
          DIRECTIVE_KINDS,
          'directive kinds'
        ),
      },
    });
    this.kind = params.kind;
  }
}

export class UnboundVariableError extends RandomJsonError {
  public readonly variable: string;

  constructor(params: {
    name: string;
    path?: string;
    available?: readonly string[];
  }) {
    super({
      message: `Variable "${params.name}" is not defined`,
      errorCode: ErrorCode.UNBOUND_VARIABLE,
      context: {
        path: params.path,
        suggestion:
          suggestName(params.name, params.available ?? [], 'variables') ??
          'Add it to the "variables" object of the input document',
      },
    });
    this.variable = params.name;
  }
}

export class FunctionNotFoundError extends RandomJsonError {
  public readonly functionName: string;

  constructor(params: {
    name: string;
    path?: string;
    available?: readonly string[];
  }) {
    super({
      message: `Function "${params.name}" is not registered`,
      errorCode: ErrorCode.FUNCTION_NOT_FOUND,
      context: {
        path: params.path,
        suggestion: suggestName(
          params.name,
          params.available ?? [],
          'functions'
        ),
      },
    });
    this.functionName = params.name;
  }
}

export class ArgumentArityError extends RandomJsonError {
  public readonly functionName: string;
  public readonly expected: string;
  public readonly received: number;

  constructor(params: {
    functionName: string;
    expected: string;
    received: number;
    path?: string;
  }) {
    super({
      message: `Function "${params.functionName}" expects ${params.expected} argument(s), got ${params.received}`,
      errorCode: ErrorCode.ARGUMENT_ARITY,
      context: { path: params.path },
    });
    this.functionName = params.functionName;
    this.expected = params.expected;
    this.received = params.received;
  }
}

/**
 * A value could not be converted to, or used as, the required type
 */
export class TypeCoercionError extends RandomJsonError {
  public readonly targetType: string;

  constructor(params: {
    message: string;
    targetType: string;
    value?: unknown;
    path?: string;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.TYPE_COERCION,
      context: {
        path: params.path,
        value: params.value,
        valueExcerpt:
          params.value === undefined ? undefined : excerpt(params.value),
      },
      cause: params.cause,
    });
    this.targetType = params.targetType;
  }
}

export class InvalidRepeatCountError extends RandomJsonError {
  constructor(params: {
    message: string;
    count: unknown;
    limit?: number;
    path?: string;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.INVALID_REPEAT_COUNT,
      context: {
        path: params.path,
        value: params.count,
        valueExcerpt: excerpt(params.count),
        limit: params.limit,
        suggestion:
          params.limit === undefined
            ? undefined
            : 'Raise --max-repeat / --max-items if the size is intended',
      },
    });
  }
}

/**
 * A built-in handler failed for a reason other than arity or argument type
 */
export class FunctionCallError extends RandomJsonError {
  public readonly functionName: string;

  constructor(params: {
    functionName: string;
    message: string;
    path?: string;
    cause?: Error;
  }) {
    super({
      message: `Function "${params.functionName}" failed: ${params.message}`,
      errorCode: ErrorCode.FUNCTION_CALL_FAILED,
      context: { path: params.path },
      cause: params.cause,
    });
    this.functionName = params.functionName;
  }
}

/**
 * Individual shape violation in the input document
 */
export interface ValidationFailure {
  path: string;
  message: string;
  keyword: string;
  schemaPath: string;
  params?: Record<string, unknown>;
}

/**
 * The input document does not have the { schema, variables } shape
 */
export class DocumentValidationError extends RandomJsonError {
  public readonly failures: ValidationFailure[];

  constructor(params: { message: string; failures: ValidationFailure[] }) {
    const first = params.failures[0];
    super({
      message: params.message,
      errorCode: ErrorCode.DOCUMENT_VALIDATION_FAILED,
      context: {
        path: first?.path,
        failures: params.failures,
        suggestion: first ? `${first.path || '/'} ${first.message}` : undefined,
      },
    });
    this.failures = params.failures;
  }
}

export class ConfigError extends RandomJsonError {
  public readonly setting: string;

  constructor(params: { message: string; setting: string; value?: unknown }) {
    super({
      message: params.message,
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context: {
        setting: params.setting,
        value: params.value,
        valueExcerpt:
          params.value === undefined ? undefined : excerpt(params.value),
      },
    });
    this.setting = params.setting;
  }
}

/**
 * Input text that is not valid JSON
 */
export class ParseError extends RandomJsonError {
  constructor(params: {
    message: string;
    input?: string;
    position?: number;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.PARSE_ERROR,
      context: {
        position: params.position,
        valueExcerpt:
          params.input === undefined ? undefined : excerpt(params.input),
      },
      cause: params.cause,
    });
  }

  get position(): number | undefined {
    const position = this.context.position;
    return typeof position === 'number' ? position : undefined;
  }
}

/**
 * Unexpected failure outside the documented error classes
 */
export class InternalError extends RandomJsonError {
  constructor(params: { message: string; cause?: Error }) {
    super({
      message: params.message,
      errorCode: ErrorCode.INTERNAL_ERROR,
      cause: params.cause,
    });
  }
}

export function isRandomJsonError(error: unknown): error is RandomJsonError {
  return error instanceof RandomJsonError;
}

/**
 * Run `fn`, attaching `path` to any RandomJsonError it raises that has no
 * location yet.
 */
export function withPath<T>(path: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (isRandomJsonError(error)) {
      error.locate(path);
    }
    throw error;
  }
}

export function createValidationFailure(
  path: string,
  message: string,
  keyword: string,
  schemaPath: string,
  params?: Record<string, unknown>
): ValidationFailure {
  return {
    path,
    message,
    keyword,
    schemaPath,
    params,
  };
}

function excerpt(value: unknown, max = 80): string {
  const text =
    typeof value === 'string' ? value : (JSON.stringify(value) ?? String(value));
  return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}
