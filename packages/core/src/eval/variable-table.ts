import { ConfigError, UnboundVariableError } from '../types/errors.js';
import {
  deepFreeze,
  isScalar,
  type Scalar,
  type Value,
} from '../types/value.js';

export type VariableValue = Scalar | readonly Scalar[];

/**
 * Immutable name → value bindings for one run. Values are scalars or lists
 * of scalars and are frozen on construction.
 */
export class VariableTable {
  private readonly bindings: ReadonlyMap<string, VariableValue>;

  private constructor(bindings: Map<string, VariableValue>) {
    this.bindings = bindings;
  }

  static empty(): VariableTable {
    return new VariableTable(new Map());
  }

  /**
   * @throws ConfigError for a value that is neither a scalar nor a list of scalars
   */
  static from(
    variables: Readonly<Record<string, unknown>> = {}
  ): VariableTable {
    const bindings = new Map<string, VariableValue>();
    for (const [name, value] of Object.entries(variables)) {
      bindings.set(name, toVariableValue(name, value));
    }
    return new VariableTable(bindings);
  }

  /**
   * @throws UnboundVariableError
   */
  lookup(name: string): Value {
    const value = this.bindings.get(name);
    if (value === undefined) {
      throw new UnboundVariableError({ name, available: this.names() });
    }
    return value;
  }

  has(name: string): boolean {
    return this.bindings.has(name);
  }

  names(): string[] {
    return [...this.bindings.keys()];
  }

  get size(): number {
    return this.bindings.size;
  }
}

function toVariableValue(name: string, value: unknown): VariableValue {
  if (isScalar(value)) {
    return value;
  }
  if (Array.isArray(value)) {
    const items: Scalar[] = [];
    for (const item of value) {
      if (!isScalar(item)) {
        throw invalid(name, value);
      }
      items.push(item);
    }
    return deepFreeze(items);
  }
  throw invalid(name, value);
}

function invalid(name: string, value: unknown): ConfigError {
  return new ConfigError({
    message: `Variable "${name}" must be a string, number, boolean, null or a list of those`,
    setting: `variables.${name}`,
    value,
  });
}
