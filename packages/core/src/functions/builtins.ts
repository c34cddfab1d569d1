/**
 * Built-in functions available to every template.
 *
 * Handlers receive fully evaluated arguments and the run context. They throw
 * TypeCoercionError for arguments of the wrong type and ArgumentArityError
 * for arity rules that depend on argument values (`format`); any other throw
 * is wrapped into FunctionCallError by the evaluator.
 */

import { castValue } from '../parser/coerce.js';
import { ArgumentArityError, TypeCoercionError } from '../types/errors.js';
import { isErr } from '../types/result.js';
import { isConstType } from '../types/template.js';
import {
  isValueList,
  isValueRecord,
  recordFromEntries,
  stringifyValue,
  typeNameOf,
  valuesEqual,
  type Value,
  type ValueList,
} from '../types/value.js';
import type { Rng } from '../util/rng.js';
import { uuidV4 } from '../util/uuid.js';
import {
  argAt,
  expectAll,
  expectBoolean,
  expectInteger,
  expectList,
  expectNumber,
  expectRecord,
  expectString,
} from './args.js';
import {
  FunctionRegistry,
  type Arity,
  type FunctionDefinition,
  type FunctionHandler,
} from './registry.js';

function define(
  name: string,
  arity: Arity,
  description: string,
  call: FunctionHandler
): FunctionDefinition {
  return Object.freeze({ name, arity, description, call });
}

function finite(value: number): number {
  if (!Number.isFinite(value)) {
    throw new RangeError('result is not a finite number');
  }
  return value;
}

/**
 * Left-to-right `{}` substitution; `{{` and `}}` stand for literal braces.
 * @throws ArgumentArityError when placeholders and arguments differ in number
 */
export function formatTemplate(
  template: string,
  values: readonly Value[]
): string {
  let out = '';
  let used = 0;
  let placeholders = 0;
  for (let i = 0; i < template.length; i++) {
    const ch = template[i];
    const next = template[i + 1];
    if (ch === '{' && next === '{') {
      out += '{';
      i++;
    } else if (ch === '}' && next === '}') {
      out += '}';
      i++;
    } else if (ch === '{' && next === '}') {
      placeholders++;
      const value = values[used++];
      if (value !== undefined) out += stringifyValue(value);
      i++;
    } else if (ch === '{' || ch === '}') {
      throw new SyntaxError(
        `Single "${ch}" at offset ${i} in format string; write "${ch}${ch}" for a literal brace`
      );
    } else {
      out += ch;
    }
  }
  if (placeholders !== values.length) {
    throw new ArgumentArityError({
      functionName: 'format',
      expected: String(placeholders + 1),
      received: values.length + 1,
    });
  }
  return out;
}

function chainedPairs(
  args: readonly Value[],
  test: (left: Value, right: Value) => boolean
): boolean {
  for (let i = 1; i < args.length; i++) {
    if (!test(argAt(args, i - 1), argAt(args, i))) return false;
  }
  return true;
}

function compare(fn: string, args: readonly Value[]): number {
  const left = argAt(args, 0);
  const right = argAt(args, 1);
  if (typeof left === 'number') {
    const r = expectNumber({ fn, index: 1 }, right);
    return left - r;
  }
  if (typeof left === 'string') {
    const r = expectString({ fn, index: 1 }, right);
    return left < r ? -1 : left > r ? 1 : 0;
  }
  throw new TypeCoercionError({
    message: `Argument 1 of "${fn}" must be a number or a string, got ${typeNameOf(left)}`,
    targetType: 'number | string',
    value: left,
  });
}

function add(args: readonly Value[]): Value {
  const first = argAt(args, 0);
  if (typeof first === 'boolean') {
    return expectAll('add', args, expectBoolean).some(Boolean);
  }
  if (typeof first === 'number') {
    const numbers = expectAll('add', args, expectNumber);
    return finite(numbers.reduce((a, b) => a + b, 0));
  }
  if (typeof first === 'string') {
    return expectAll('add', args, expectString).join('');
  }
  if (isValueList(first)) {
    const lists = expectAll('add', args, expectList);
    return lists.flatMap((list): Value[] => [...list]);
  }
  if (isValueRecord(first)) {
    const records = expectAll('add', args, expectRecord);
    return recordFromEntries(
      records.flatMap((record) => Object.entries(record))
    );
  }
  throw new TypeCoercionError({
    message: 'Cannot add null values',
    targetType: 'number | string | boolean | list | object',
    value: first,
  });
}

function sub(args: readonly Value[]): Value {
  const left = argAt(args, 0);
  if (typeof left === 'boolean') {
    return left && !expectBoolean({ fn: 'sub', index: 1 }, argAt(args, 1));
  }
  const a = expectNumber({ fn: 'sub', index: 0 }, left);
  const b = expectNumber({ fn: 'sub', index: 1 }, argAt(args, 1));
  return finite(a - b);
}

function mul(args: readonly Value[]): Value {
  if (typeof argAt(args, 0) === 'boolean') {
    return expectAll('mul', args, expectBoolean).every(Boolean);
  }
  const numbers = expectAll('mul', args, expectNumber);
  return finite(numbers.reduce((a, b) => a * b, 1));
}

function numericPair(fn: string, args: readonly Value[]): [number, number] {
  return [
    expectNumber({ fn, index: 0 }, argAt(args, 0)),
    expectNumber({ fn, index: 1 }, argAt(args, 1)),
  ];
}

function sample(list: ValueList, k: number, rng: Rng): Value[] {
  if (k < 0 || k > list.length) {
    throw new RangeError(`sample size ${k} is outside 0..${list.length}`);
  }
  // Partial Fisher-Yates over a copy: the first k slots are the sample.
  const pool = [...list];
  for (let i = 0; i < k; i++) {
    const j = rng.nextInt(i, pool.length);
    const picked = argAt(pool, j);
    pool[j] = argAt(pool, i);
    pool[i] = picked;
  }
  return pool.slice(0, k);
}

// Integer bounds draw an integer; any fractional bound draws a float.
function rand(args: readonly Value[], rng: Rng): number {
  if (args.length === 0) return rng.nextFloat01();
  const [min, max]: [number, number] =
    args.length === 1
      ? [0, expectNumber({ fn: 'rand', index: 0 }, argAt(args, 0))]
      : [
          expectNumber({ fn: 'rand', index: 0 }, argAt(args, 0)),
          expectNumber({ fn: 'rand', index: 1 }, argAt(args, 1)),
        ];
  if (!(min < max)) {
    throw new RangeError(
      args.length === 1
        ? `upper bound must be a positive number, got ${max}`
        : `min (${min}) must be less than max (${max})`
    );
  }
  if (Number.isSafeInteger(min) && Number.isSafeInteger(max)) {
    return rng.nextInt(min, max);
  }
  return finite(min + (max - min) * rng.nextFloat01());
}

// List elements at any depth; a copied value shares them across every slot.
function nestedItemCount(value: Value): number {
  if (isValueList(value)) {
    return value.reduce<number>(
      (total, item) => total + 1 + nestedItemCount(item),
      0
    );
  }
  if (value !== null && typeof value === 'object') {
    return Object.values(value).reduce<number>(
      (total, item) => total + nestedItemCount(item),
      0
    );
  }
  return 0;
}

function len(args: readonly Value[]): number {
  const value = argAt(args, 0);
  if (typeof value === 'string' || isValueList(value)) return value.length;
  if (isValueRecord(value)) return Object.keys(value).length;
  throw new TypeCoercionError({
    message: `Argument 1 of "len" must be a string, list or object, got ${typeNameOf(value)}`,
    targetType: 'string | list | object',
    value,
  });
}

function cast(args: readonly Value[]): Value {
  const type = expectString({ fn: 'cast', index: 1 }, argAt(args, 1));
  if (!isConstType(type)) {
    throw new TypeCoercionError({
      message: `Unknown cast type "${type}"`,
      targetType: type,
    });
  }
  const result = castValue(argAt(args, 0), type);
  if (isErr(result)) throw result.error;
  return result.value;
}

const BINARY = { min: 2, max: 2 } as const;

export const BUILTIN_FUNCTIONS: readonly FunctionDefinition[] = [
  define(
    'uuid',
    { min: 0, max: 0 },
    'Random UUID v4 string.',
    (_args, { rng }) => uuidV4(rng)
  ),
  define(
    'choice',
    { min: 1, max: 1 },
    'One element of a list, chosen uniformly.',
    (args, { rng }) => {
      const list = expectList({ fn: 'choice', index: 0 }, argAt(args, 0));
      if (list.length === 0) {
        throw new RangeError('cannot choose from an empty list');
      }
      return rng.pick(list);
    }
  ),
  define(
    'sample',
    { min: 1, max: 2 },
    'k distinct elements of a list (default 1), in sampled order.',
    (args, { rng }) => {
      const list = expectList({ fn: 'sample', index: 0 }, argAt(args, 0));
      const k =
        args.length > 1
          ? expectInteger({ fn: 'sample', index: 1 }, argAt(args, 1))
          : 1;
      return sample(list, k, rng);
    }
  ),
  define(
    'rand',
    { min: 0, max: 2 },
    'rand(): float in [0, 1). rand(n): number in [0, n). rand(min, max): number in [min, max). Integer bounds give integers.',
    (args, { rng }) => rand(args, rng)
  ),
  define(
    'format',
    { min: 1 },
    'Replace each {} with the next argument; {{ and }} are literal braces.',
    (args) =>
      formatTemplate(
        expectString({ fn: 'format', index: 0 }, argAt(args, 0)),
        args.slice(1)
      )
  ),

  define(
    'eq',
    { min: 2 },
    'True when every adjacent pair is structurally equal.',
    (args) => chainedPairs(args, valuesEqual)
  ),
  define(
    'ne',
    { min: 2 },
    'True when no adjacent pair is structurally equal.',
    (args) => chainedPairs(args, (a, b) => !valuesEqual(a, b))
  ),
  define('gt', BINARY, 'left > right.', (args) => compare('gt', args) > 0),
  define('ge', BINARY, 'left >= right.', (args) => compare('ge', args) >= 0),
  define('lt', BINARY, 'left < right.', (args) => compare('lt', args) < 0),
  define('le', BINARY, 'left <= right.', (args) => compare('le', args) <= 0),

  define(
    'add',
    { min: 1 },
    'Sum numbers, concatenate strings or lists, merge objects, or booleans.',
    add
  ),
  define('sub', BINARY, 'Difference; for booleans left && !right.', sub),
  define('mul', { min: 1 }, 'Product of numbers; and of booleans.', mul),
  define('div', BINARY, 'Division.', (args) => {
    const [a, b] = numericPair('div', args);
    if (b === 0) throw new RangeError('division by zero');
    return finite(a / b);
  }),
  define('mod', BINARY, 'Remainder with the sign of the divisor.', (args) => {
    const [a, b] = numericPair('mod', args);
    if (b === 0) throw new RangeError('modulo by zero');
    return finite(((a % b) + b) % b);
  }),
  define('pow', BINARY, 'left raised to right.', (args) => {
    const [a, b] = numericPair('pow', args);
    return finite(a ** b);
  }),
  define('neg', { min: 1, max: 1 }, 'Negate a number; not of a boolean.', (args) => {
    const value = argAt(args, 0);
    if (typeof value === 'boolean') return !value;
    return 0 - expectNumber({ fn: 'neg', index: 0 }, value);
  }),

  define('len', { min: 1, max: 1 }, 'Length of a string, list or object.', len),
  define('cast', BINARY, 'Convert to int, float, str, bool, list or dict.', cast),
  define('copy', BINARY, 'List of n copies of a value.', (args, ctx) => {
    const value = argAt(args, 0);
    const n = expectInteger({ fn: 'copy', index: 1 }, argAt(args, 1));
    ctx.reserveItems(n, 1 + nestedItemCount(value));
    return new Array<Value>(n).fill(value);
  }),
  define(
    'count',
    { min: 0, max: 2 },
    'Add delta (default 1) to counter key (default "default"); returns the total.',
    (args, { counters }) => {
      const delta =
        args.length > 0
          ? expectNumber({ fn: 'count', index: 0 }, argAt(args, 0))
          : 1;
      const key =
        args.length > 1
          ? expectString({ fn: 'count', index: 1 }, argAt(args, 1))
          : 'default';
      return finite(counters.add(key, delta));
    }
  ),
];

export const builtinRegistry = new FunctionRegistry(BUILTIN_FUNCTIONS);
