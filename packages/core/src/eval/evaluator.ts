/**
 * Evaluator
 *
 * Depth-first, left-to-right transform of a compiled TemplateNode into a
 * Value. A cond with no truthy branch yields OMITTED, which the enclosing
 * object, list, repeat or call drops; at the root it becomes null.
 */

import {
  checkArity,
  Counters,
  type FunctionContext,
} from '../functions/registry.js';
import {
  FunctionCallError,
  InvalidRepeatCountError,
  isRandomJsonError,
  withPath,
} from '../types/errors.js';
import type {
  CallNode,
  CondNode,
  RepeatNode,
  TemplateNode,
} from '../types/template.js';
import {
  isTruthy,
  isValue,
  recordFromEntries,
  type Value,
} from '../types/value.js';
import { MetricsCollector } from '../util/metrics.js';
import type { Rng } from '../util/rng.js';
import type { VariableTable } from './variable-table.js';

export const OMITTED: unique symbol = Symbol('randomjson.omitted');

export type Outcome = Value | typeof OMITTED;

export interface EvaluationLimits {
  maxRepeat: number;
  maxItems: number;
}

export interface EvaluatorOptions {
  variables: VariableTable;
  rng: Rng;
  limits: EvaluationLimits;
  counters?: Counters;
  metrics?: MetricsCollector;
}

export class Evaluator {
  private readonly variables: VariableTable;
  private readonly limits: EvaluationLimits;
  private readonly metrics: MetricsCollector;
  private readonly functionContext: FunctionContext;
  private itemsUsed = 0;

  constructor(options: EvaluatorOptions) {
    this.variables = options.variables;
    this.limits = options.limits;
    this.metrics = options.metrics ?? new MetricsCollector({ enabled: false });
    this.functionContext = {
      rng: options.rng,
      counters: options.counters ?? new Counters(),
      reserveItems: (count, itemWeight) =>
        this.reserveItems(count, itemWeight),
    };
  }

  /** Items claimed so far by repeats and `copy` calls. */
  get itemsGenerated(): number {
    return this.itemsUsed;
  }

  /**
   * Resolve the whole tree. An omitted root resolves to null.
   * @throws RandomJsonError located at the failing node
   */
  evaluate(root: TemplateNode): Value {
    const outcome = this.evaluateNode(root);
    return outcome === OMITTED ? null : outcome;
  }

  evaluateNode(node: TemplateNode): Outcome {
    this.metrics.addNodeEvaluated();
    switch (node.tag) {
      case 'literal':
      case 'const':
        return node.value;
      case 'variable':
        return withPath(node.ptr, () => this.variables.lookup(node.name));
      case 'call':
        return this.evaluateCall(node);
      case 'repeat':
        return this.evaluateRepeat(node);
      case 'cond':
        return this.evaluateCond(node);
      case 'list':
        return this.evaluateAll(node.items);
      case 'object': {
        const entries: Array<[string, Value]> = [];
        for (const [key, child] of node.entries) {
          const value = this.evaluateNode(child);
          if (value !== OMITTED) {
            entries.push([key, value]);
          }
        }
        return recordFromEntries(entries);
      }
    }
  }

  private evaluateAll(nodes: readonly TemplateNode[]): Value[] {
    const out: Value[] = [];
    for (const node of nodes) {
      const value = this.evaluateNode(node);
      if (value !== OMITTED) {
        out.push(value);
      }
    }
    return out;
  }

  private evaluateCall(node: CallNode): Value {
    const { fn, ptr } = node;
    const args = this.evaluateAll(node.args);
    withPath(ptr, () => checkArity(fn, args.length));
    this.metrics.addFunctionCall(fn.name);

    let result: unknown;
    try {
      result = fn.call(args, this.functionContext);
    } catch (error) {
      if (isRandomJsonError(error)) {
        throw error.locate(ptr);
      }
      throw new FunctionCallError({
        functionName: fn.name,
        message: error instanceof Error ? error.message : String(error),
        path: ptr,
        cause: error instanceof Error ? error : undefined,
      });
    }
    if (!isValue(result)) {
      throw new FunctionCallError({
        functionName: fn.name,
        message: 'returned a value that is not JSON data',
        path: ptr,
      });
    }
    return result;
  }

  private evaluateRepeat(node: RepeatNode): Value[] {
    const count = this.evaluateNode(node.count);
    if (count === OMITTED) {
      throw new InvalidRepeatCountError({
        message: 'Repeat count resolved to nothing (no cond branch matched)',
        count: null,
        path: node.count.ptr,
      });
    }
    if (
      typeof count !== 'number' ||
      !Number.isSafeInteger(count) ||
      count < 0
    ) {
      throw new InvalidRepeatCountError({
        message: `Repeat count must be a non-negative integer, got ${JSON.stringify(count)}`,
        count,
        path: node.count.ptr,
      });
    }
    withPath(node.ptr, () => this.reserveItems(count));
    this.metrics.addRepeatItems(count);

    const items: Value[] = [];
    for (let i = 0; i < count; i++) {
      const item = this.evaluateNode(node.template);
      if (item !== OMITTED) {
        items.push(item);
      }
    }
    return items;
  }

  private evaluateCond(node: CondNode): Outcome {
    for (const branch of node.branches) {
      const test = this.evaluateNode(branch.test);
      if (test !== OMITTED && isTruthy(test)) {
        return this.evaluateNode(branch.value);
      }
    }
    this.metrics.addCondOmitted();
    return OMITTED;
  }

  /**
   * @throws InvalidRepeatCountError when `count` is negative, above maxRepeat,
   *   or would take the run past maxItems
   */
  private reserveItems(count: number, itemWeight = 1): void {
    const { maxRepeat, maxItems } = this.limits;
    if (!Number.isSafeInteger(count) || count < 0) {
      throw new InvalidRepeatCountError({
        message: `Repeat count must be a non-negative integer, got ${count}`,
        count,
      });
    }
    if (count > maxRepeat) {
      throw new InvalidRepeatCountError({
        message: `Repeat count ${count} exceeds the limit of ${maxRepeat}`,
        count,
        limit: maxRepeat,
      });
    }
    const total = count * itemWeight;
    if (this.itemsUsed + total > maxItems) {
      throw new InvalidRepeatCountError({
        message: `Generating ${total} more item(s) would exceed the run limit of ${maxItems}`,
        count,
        limit: maxItems,
      });
    }
    this.itemsUsed += total;
  }
}
