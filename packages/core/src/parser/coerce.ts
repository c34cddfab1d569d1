import { TypeCoercionError } from '../types/errors.js';
import { err, isErr, ok, type Result } from '../types/result.js';
import type { ConstType } from '../types/template.js';
import {
  isTruthy,
  isValue,
  isValueList,
  isValueRecord,
  stringifyValue,
  typeNameOf,
  type Value,
} from '../types/value.js';

const INTEGER_TEXT = /^[+-]?\d+$/;
const FLOAT_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const TRUE_TEXT = new Set(['true', '1']);
const FALSE_TEXT = new Set(['false', '0']);

export type CoercionResult = Result<Value, TypeCoercionError>;

/**
 * Convert the raw text of a `{{const|value|type}}` marker.
 */
export function coerceLiteral(raw: string, type: ConstType): CoercionResult {
  return castValue(raw, type);
}

/**
 * Convert any value to `type`; shared by const markers and `cast`.
 */
export function castValue(value: Value, type: ConstType): CoercionResult {
  switch (type) {
    case 'str':
      return ok(stringifyValue(value));
    case 'int':
      return toInteger(value);
    case 'float':
      return toFloat(value);
    case 'bool':
      return toBoolean(value);
    case 'list':
      return toList(value);
    case 'dict':
      return toDict(value);
  }
}

function toInteger(value: Value): CoercionResult {
  if (typeof value === 'boolean') return ok(value ? 1 : 0);
  if (typeof value === 'number') {
    const truncated = Math.trunc(value);
    return Number.isSafeInteger(truncated)
      ? ok(truncated)
      : fail(value, 'int', 'out of the safe integer range');
  }
  if (typeof value === 'string') {
    const text = value.trim();
    if (!INTEGER_TEXT.test(text)) return fail(value, 'int');
    const parsed = Number(text);
    return Number.isSafeInteger(parsed)
      ? ok(parsed)
      : fail(value, 'int', 'out of the safe integer range');
  }
  return fail(value, 'int');
}

function toFloat(value: Value): CoercionResult {
  if (typeof value === 'boolean') return ok(value ? 1 : 0);
  if (typeof value === 'number') return ok(value);
  if (typeof value === 'string') {
    const text = value.trim();
    const parsed = Number(text);
    if (!FLOAT_TEXT.test(text) || !Number.isFinite(parsed)) {
      return fail(value, 'float');
    }
    return ok(parsed);
  }
  return fail(value, 'float');
}

function toBoolean(value: Value): CoercionResult {
  if (typeof value === 'string') {
    const text = value.trim().toLowerCase();
    if (TRUE_TEXT.has(text)) return ok(true);
    if (FALSE_TEXT.has(text)) return ok(false);
    return fail(value, 'bool', 'expected true, false, 1 or 0');
  }
  return ok(isTruthy(value));
}

function toList(value: Value): CoercionResult {
  if (isValueList(value)) return ok(value);
  if (typeof value === 'string') {
    const parsed = parseJsonText(value, 'list');
    if (isErr(parsed)) return parsed;
    return isValueList(parsed.value)
      ? parsed
      : fail(value, 'list', 'not a JSON array');
  }
  return fail(value, 'list');
}

function toDict(value: Value): CoercionResult {
  if (isValueRecord(value)) return ok(value);
  if (typeof value === 'string') {
    const parsed = parseJsonText(value, 'dict');
    if (isErr(parsed)) return parsed;
    return isValueRecord(parsed.value)
      ? parsed
      : fail(value, 'dict', 'not a JSON object');
  }
  return fail(value, 'dict');
}

function parseJsonText(text: string, type: ConstType): CoercionResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return err(
      new TypeCoercionError({
        message: `Cannot convert ${JSON.stringify(text)} to ${type}: invalid JSON`,
        targetType: type,
        value: text,
        cause: error instanceof Error ? error : undefined,
      })
    );
  }
  return isValue(parsed) ? ok(parsed) : fail(text, type, 'not JSON data');
}

function fail(value: Value, type: ConstType, reason?: string): CoercionResult {
  const shown =
    typeof value === 'string' ? JSON.stringify(value) : typeNameOf(value);
  return err(
    new TypeCoercionError({
      message: `Cannot convert ${shown} to ${type}${reason ? `: ${reason}` : ''}`,
      targetType: type,
      value,
    })
  );
}
