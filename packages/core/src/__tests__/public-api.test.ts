import { describe, expect, it } from 'vitest';

import {
  builtinRegistry,
  compileTemplate,
  Counters,
  createRng,
  ErrorCode,
  Evaluator,
  generate,
  VariableTable,
  type FunctionDefinition,
} from '../index.js';

describe('public API surface', () => {
  it('compiles once and evaluates many times', () => {
    const root = compileTemplate(['{{repeat}}', 2, ['{{function|rand}}', 100]], {
      functions: builtinRegistry,
    });
    const runs = [1, 1, 2].map((seed) =>
      new Evaluator({
        variables: VariableTable.empty(),
        rng: createRng(seed),
        counters: new Counters(),
        limits: { maxRepeat: 10, maxItems: 100 },
      }).evaluate(root)
    );
    expect(runs[0]).toEqual(runs[1]);
    expect(runs[0]).toHaveLength(2);
  });

  it('accepts an extended function registry', () => {
    const shout: FunctionDefinition = {
      name: 'shout',
      arity: { min: 1, max: 1 },
      description: 'Upper-case a string.',
      call: ([value]) => String(value ?? '').toUpperCase(),
    };
    const result = generate(
      { schema: ['{{function|shout}}', '{{variable|w}}'], variables: { w: 'hi' } },
      { seed: 1, functions: builtinRegistry.with([shout]) }
    );
    expect(result.value).toBe('HI');
    expect(builtinRegistry.has('shout')).toBe(false);
  });

  it('exposes error codes', () => {
    expect(ErrorCode.UNBOUND_VARIABLE).toBe('E100');
  });
});
