import {
  ArgumentArityError,
  FunctionNotFoundError,
} from '../types/errors.js';
import type { Value } from '../types/value.js';
import type { Rng } from '../util/rng.js';

/** Per-run named counters backing the `count` built-in. */
export class Counters {
  private readonly totals = new Map<string, number>();

  add(key: string, delta: number): number {
    const total = (this.totals.get(key) ?? 0) + delta;
    this.totals.set(key, total);
    return total;
  }

  get(key: string): number {
    return this.totals.get(key) ?? 0;
  }
}

/** Run-scoped state handed to every handler. */
export interface FunctionContext {
  readonly rng: Rng;
  readonly counters: Counters;
  /**
   * Claim `count` generated items, each holding `itemWeight` (default 1)
   * items of its own, against the run's size limits. `count` alone is
   * checked against maxRepeat; `count * itemWeight` is charged to maxItems.
   * @throws InvalidRepeatCountError
   */
  reserveItems(count: number, itemWeight?: number): void;
}

export type FunctionHandler = (
  args: readonly Value[],
  context: FunctionContext
) => Value;

export interface Arity {
  readonly min: number;
  /** Omitted for variadic functions. */
  readonly max?: number;
}

export interface FunctionDefinition {
  readonly name: string;
  readonly arity: Arity;
  readonly description: string;
  readonly call: FunctionHandler;
}

export function describeArity(arity: Arity): string {
  if (arity.max === undefined) return `at least ${arity.min}`;
  if (arity.max === arity.min) return String(arity.min);
  return `${arity.min}-${arity.max}`;
}

/**
 * Immutable name → definition table. Extending it yields a new registry so
 * a registry shared between runs is never mutated.
 */
export class FunctionRegistry {
  private readonly table: ReadonlyMap<string, FunctionDefinition>;

  constructor(definitions: Iterable<FunctionDefinition> = []) {
    const table = new Map<string, FunctionDefinition>();
    for (const definition of definitions) {
      if (table.has(definition.name)) {
        throw new Error(`Duplicate function definition: ${definition.name}`);
      }
      table.set(definition.name, definition);
    }
    this.table = table;
    Object.freeze(this);
  }

  /** New registry with `definitions` added; same-name entries replace existing ones. */
  with(definitions: Iterable<FunctionDefinition>): FunctionRegistry {
    const merged = new Map(this.table);
    for (const definition of definitions) {
      merged.set(definition.name, definition);
    }
    return new FunctionRegistry(merged.values());
  }

  has(name: string): boolean {
    return this.table.has(name);
  }

  get(name: string): FunctionDefinition | undefined {
    return this.table.get(name);
  }

  /**
   * @throws FunctionNotFoundError
   */
  resolve(name: string): FunctionDefinition {
    const definition = this.table.get(name);
    if (!definition) {
      throw new FunctionNotFoundError({ name, available: this.names() });
    }
    return definition;
  }

  names(): string[] {
    return [...this.table.keys()].sort();
  }

  definitions(): FunctionDefinition[] {
    return this.names().flatMap((name) => {
      const definition = this.table.get(name);
      return definition ? [definition] : [];
    });
  }
}

/**
 * @throws ArgumentArityError when `received` is outside the definition's bounds
 */
export function checkArity(
  definition: FunctionDefinition,
  received: number
): void {
  const { min, max } = definition.arity;
  if (received < min || (max !== undefined && received > max)) {
    throw new ArgumentArityError({
      functionName: definition.name,
      expected: describeArity(definition.arity),
      received,
    });
  }
}
