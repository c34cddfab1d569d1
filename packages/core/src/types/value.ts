/**
 * Value model shared by the template compiler, the variable table, the
 * built-in functions and the evaluator.
 */

export type Scalar = string | number | boolean | null;

export type ValueList = readonly Value[];

export interface ValueRecord {
  readonly [key: string]: Value;
}

/** Fully resolved output: JSON-shaped, directive-free. */
export type Value = Scalar | ValueList | ValueRecord;

/** Raw template input. Any JSON document is a valid schema node. */
export type JsonValue = Value;

export type ValueTypeName =
  | 'string'
  | 'integer'
  | 'float'
  | 'boolean'
  | 'null'
  | 'list'
  | 'object';

export function isScalar(value: unknown): value is Scalar {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}

export function isValueList(value: Value): value is ValueList {
  return Array.isArray(value);
}

export function isValueRecord(value: Value): value is ValueRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrow an unknown (e.g. JSON.parse output) to a Value, rejecting
 * non-finite numbers, functions, symbols and class instances.
 */
export function isValue(value: unknown): value is Value {
  if (isScalar(value)) return true;
  if (Array.isArray(value)) return value.every(isValue);
  if (typeof value === 'object' && value !== null) {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto !== Object.prototype && proto !== null) return false;
    return Object.values(value).every(isValue);
  }
  return false;
}

export function typeNameOf(value: Value): ValueTypeName {
  if (value === null) return 'null';
  if (typeof value === 'string') return 'string';
  if (typeof value === 'boolean') return 'boolean';
  if (typeof value === 'number') {
    return Number.isInteger(value) ? 'integer' : 'float';
  }
  return isValueList(value) ? 'list' : 'object';
}

/** Structural equality; record key order is irrelevant. */
export function valuesEqual(a: Value, b: Value): boolean {
  if (a === b) return true;
  if (isValueList(a)) {
    return (
      isValueList(b) &&
      a.length === b.length &&
      a.every((item, i) => valuesEqual(item, b[i] ?? null))
    );
  }
  if (isValueRecord(a)) {
    if (!isValueRecord(b)) return false;
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every((key) => {
      const right = b[key];
      const left = a[key];
      return (
        right !== undefined && left !== undefined && valuesEqual(left, right)
      );
    });
  }
  return false;
}

/**
 * Falsy values: false, null, 0, "", empty list and empty record.
 */
export function isTruthy(value: Value): boolean {
  if (value === null || value === false || value === 0 || value === '') {
    return false;
  }
  if (isValueList(value)) return value.length > 0;
  if (isValueRecord(value)) return Object.keys(value).length > 0;
  return true;
}

/** Text form used by `format` and `cast(..., "str")`. */
export function stringifyValue(value: Value): string {
  if (typeof value === 'string') return value;
  if (value === null || typeof value !== 'object') return String(value);
  return JSON.stringify(value);
}

/**
 * Build a record from entries without touching Object.prototype for keys
 * such as "__proto__".
 */
export function recordFromEntries(
  entries: Iterable<readonly [string, Value]>
): ValueRecord {
  return Object.fromEntries(entries);
}

/** Freeze a value in place, recursively, and return it. */
export function deepFreeze<T extends Value>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
