import { describe, expect, it } from 'vitest';

import { captureError } from '../../test-utils/capture.js';
import { ConfigError, UnboundVariableError } from '../../types/errors.js';
import { VariableTable } from '../variable-table.js';

describe('VariableTable', () => {
  it('binds scalars and lists of scalars', () => {
    const table = VariableTable.from({ n: 3, s: 'x', off: false, none: null, list: [1, 'a', null] });
    expect(table.size).toBe(5);
    expect(table.lookup('n')).toBe(3);
    expect(table.lookup('none')).toBeNull();
    expect(table.lookup('list')).toEqual([1, 'a', null]);
    expect(table.has('off')).toBe(true);
    expect(table.names()).toEqual(['n', 's', 'off', 'none', 'list']);
  });

  it('freezes list bindings', () => {
    const source = [1, 2];
    const bound = VariableTable.from({ list: source }).lookup('list');
    expect(Object.isFrozen(bound)).toBe(true);
  });

  it('rejects nested containers', () => {
    const nested = captureError(() => VariableTable.from({ deep: [[1]] }));
    expect(nested).toBeInstanceOf(ConfigError);
    expect(nested.message).toBe(
      'Variable "deep" must be a string, number, boolean, null or a list of those'
    );
    expect(nested.context.setting).toBe('variables.deep');
    expect(() => VariableTable.from({ obj: { a: 1 } })).toThrow(ConfigError);
  });

  it('reports unbound names with close matches', () => {
    const table = VariableTable.from({ count: 1, name: 'x' });
    const error = captureError(() => table.lookup('nme'));
    expect(error).toBeInstanceOf(UnboundVariableError);
    expect(error.message).toBe('Variable "nme" is not defined');
    expect(error.context.suggestion).toBe('Did you mean "name"?');
  });

  it('empty() has no bindings', () => {
    const table = VariableTable.empty();
    expect(table.size).toBe(0);
    expect(() => table.lookup('x')).toThrow(UnboundVariableError);
  });
});
