// Argument readers for built-in handlers. Each throws TypeCoercionError
// naming the function and the argument position.

import { TypeCoercionError } from '../types/errors.js';
import {
  isValueList,
  isValueRecord,
  typeNameOf,
  type Value,
  type ValueList,
  type ValueRecord,
} from '../types/value.js';

export interface ArgSite {
  readonly fn: string;
  /** Zero-based argument index. */
  readonly index: number;
}

function mismatch(site: ArgSite, expected: string, value: Value): never {
  throw new TypeCoercionError({
    message: `Argument ${site.index + 1} of "${site.fn}" must be ${expected}, got ${typeNameOf(value)}`,
    targetType: expected,
    value,
  });
}

export function argAt(args: readonly Value[], index: number): Value {
  return args[index] ?? null;
}

export function expectNumber(site: ArgSite, value: Value): number {
  if (typeof value !== 'number') return mismatch(site, 'a number', value);
  return value;
}

export function expectInteger(site: ArgSite, value: Value): number {
  if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
    return mismatch(site, 'an integer', value);
  }
  return value;
}

export function expectString(site: ArgSite, value: Value): string {
  if (typeof value !== 'string') return mismatch(site, 'a string', value);
  return value;
}

export function expectList(site: ArgSite, value: Value): ValueList {
  if (!isValueList(value)) return mismatch(site, 'a list', value);
  return value;
}

export function expectRecord(site: ArgSite, value: Value): ValueRecord {
  if (!isValueRecord(value)) return mismatch(site, 'an object', value);
  return value;
}

export function expectBoolean(site: ArgSite, value: Value): boolean {
  if (typeof value !== 'boolean') return mismatch(site, 'a boolean', value);
  return value;
}

/** Every argument must share the type of the first; returns them narrowed. */
export function expectAll<T extends Value>(
  fn: string,
  args: readonly Value[],
  read: (site: ArgSite, value: Value) => T
): T[] {
  return args.map((value, index) => read({ fn, index }, value));
}
