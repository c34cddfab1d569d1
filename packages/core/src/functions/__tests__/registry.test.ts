import { describe, expect, it } from 'vitest';

import { createRng } from '../../util/rng.js';
import { captureError } from '../../test-utils/capture.js';
import { ArgumentArityError, FunctionNotFoundError } from '../../types/errors.js';
import {
  checkArity,
  Counters,
  describeArity,
  FunctionRegistry,
  type FunctionDefinition,
} from '../registry.js';

function constant(name: string, value: number): FunctionDefinition {
  return {
    name,
    arity: { min: 0, max: 0 },
    description: `Always ${value}.`,
    call: () => value,
  };
}

describe('FunctionRegistry', () => {
  it('resolves registered definitions and lists names sorted', () => {
    const registry = new FunctionRegistry([constant('two', 2), constant('one', 1)]);
    expect(registry.has('one')).toBe(true);
    expect(registry.get('missing')).toBeUndefined();
    expect(registry.resolve('two').name).toBe('two');
    expect(registry.names()).toEqual(['one', 'two']);
    expect(registry.definitions().map((d) => d.name)).toEqual(['one', 'two']);
  });

  it('rejects duplicate names on construction', () => {
    expect(() => new FunctionRegistry([constant('a', 1), constant('a', 2)])).toThrow(
      'Duplicate function definition: a'
    );
  });

  it('with() returns a new registry and leaves the original untouched', () => {
    const base = new FunctionRegistry([constant('a', 1)]);
    const extended = base.with([constant('a', 10), constant('b', 2)]);
    expect(base.names()).toEqual(['a']);
    expect(extended.names()).toEqual(['a', 'b']);
    expect(
      extended.resolve('a').call([], {
        rng: createRng(1),
        counters: new Counters(),
        reserveItems: () => undefined,
      })
    ).toBe(10);
    expect(Object.isFrozen(base)).toBe(true);
  });

  it('resolve() names close matches for unknown functions', () => {
    const registry = new FunctionRegistry([constant('uuid', 0), constant('rand', 0)]);
    const error = captureError(() => registry.resolve('uid'));
    expect(error).toBeInstanceOf(FunctionNotFoundError);
    expect(error.message).toBe('Function "uid" is not registered');
    expect(error.context.suggestion).toBe('Did you mean "uuid"?');
  });
});

describe('arity', () => {
  it('describeArity covers fixed, ranged and variadic functions', () => {
    expect(describeArity({ min: 2, max: 2 })).toBe('2');
    expect(describeArity({ min: 0, max: 2 })).toBe('0-2');
    expect(describeArity({ min: 1 })).toBe('at least 1');
  });

  it('checkArity enforces both bounds', () => {
    const def: FunctionDefinition = {
      name: 'pair',
      arity: { min: 1, max: 2 },
      description: '',
      call: () => null,
    };
    expect(() => checkArity(def, 1)).not.toThrow();
    expect(() => checkArity(def, 2)).not.toThrow();
    const error = captureError(() => checkArity(def, 3));
    expect(error).toBeInstanceOf(ArgumentArityError);
    expect(error.message).toBe('Function "pair" expects 1-2 argument(s), got 3');
    expect(() => checkArity(def, 0)).toThrow(ArgumentArityError);
  });
});

describe('Counters', () => {
  it('accumulates per key', () => {
    const counters = new Counters();
    expect(counters.get('x')).toBe(0);
    expect(counters.add('x', 2)).toBe(2);
    expect(counters.add('x', -5)).toBe(-3);
    expect(counters.add('y', 1)).toBe(1);
    expect(counters.get('x')).toBe(-3);
  });
});
