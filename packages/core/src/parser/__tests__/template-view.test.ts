import { describe, expect, it } from 'vitest';

import { builtinRegistry } from '../../functions/builtins.js';
import { compileTemplate } from '../template-compiler.js';
import { describeTemplate } from '../template-view.js';

describe('describeTemplate', () => {
  it('renders every directive as a typed record', () => {
    const root = compileTemplate(
      {
        id: '{{function|uuid}}',
        tags: [
          '{{repeat}}',
          '{{variable|n}}',
          ['{{function|choice}}', ['a', 'b']],
        ],
        flag: ['{{cond}}', [['{{const|true|bool}}', 1]]],
        n: '{{const|3|int}}',
        plain: [1, 'x', null],
      },
      { functions: builtinRegistry }
    );

    expect(describeTemplate(root)).toEqual({
      id: { type: 'function', name: 'uuid' },
      tags: {
        type: 'repeat',
        amount: { type: 'variable', name: 'n' },
        node: { type: 'function', name: 'choice', args: [['a', 'b']] },
      },
      flag: { type: 'cond', body: [[{ type: 'const', value: true }, 1]] },
      n: { type: 'const', value: 3 },
      plain: [1, 'x', null],
    });
  });

  it('keeps object key order', () => {
    const root = compileTemplate(
      { z: 1, a: 2, m: 3 },
      { functions: builtinRegistry }
    );
    const view = describeTemplate(root);
    expect(view !== null && typeof view === 'object' && Object.keys(view)).toEqual([
      'z',
      'a',
      'm',
    ]);
  });
});
