import type { TemplateNode } from '../types/template.js';
import { recordFromEntries, type Value } from '../types/value.js';

/**
 * JSON view of a compiled template, printed by `--only-preprocessor`.
 * Directives become `{ "type": ... }` records; lists, objects and literals
 * keep their shape.
 */
export function describeTemplate(node: TemplateNode): Value {
  switch (node.tag) {
    case 'literal':
      return node.value;
    case 'const':
      return { type: 'const', value: node.value };
    case 'variable':
      return { type: 'variable', name: node.name };
    case 'call':
      return node.args.length === 0
        ? { type: 'function', name: node.fn.name }
        : {
            type: 'function',
            name: node.fn.name,
            args: node.args.map(describeTemplate),
          };
    case 'repeat':
      return {
        type: 'repeat',
        amount: describeTemplate(node.count),
        node: describeTemplate(node.template),
      };
    case 'cond':
      return {
        type: 'cond',
        body: node.branches.map((branch) => [
          describeTemplate(branch.test),
          describeTemplate(branch.value),
        ]),
      };
    case 'list':
      return node.items.map(describeTemplate);
    case 'object':
      return recordFromEntries(
        node.entries.map(([key, child]): [string, Value] => [
          key,
          describeTemplate(child),
        ])
      );
  }
}
