/**
 * Keel Interpreter — Variable Scopes
 *
 * Scopes form a chain: top scope (facts) → node scope → class or define
 * scope. Lookup walks outward. A variable may be assigned once per scope.
 */

import type { Value } from '@keel/manifest-dsl';

export class VariableScope {
  private readonly variables = new Map<string, Value>();

  /**
   * @param name - Class or define path segment, or `''` for top and node scopes
   * @param parent - Enclosing scope, absent for the top scope
   */
  constructor(
    readonly name: string,
    readonly parent?: VariableScope | undefined,
  ) {}

  /** Returns false if `name` is already set in this scope. */
  define(name: string, value: Value): boolean {
    if (this.variables.has(name)) {
      return false;
    }
    this.variables.set(name, value);
    return true;
  }

  /** Local value only, no parent lookup. */
  own(name: string): Value | undefined {
    return this.variables.get(name);
  }

  lookup(name: string): Value | undefined {
    return this.variables.get(name) ?? this.parent?.lookup(name);
  }

  /** Class and define names from the outermost scope inward. */
  path(): ReadonlyArray<string> {
    const outer = this.parent?.path() ?? [];
    return this.name === '' ? outer : [...outer, this.name];
  }

  /** Every visible variable, inner scopes shadowing outer ones. */
  flatten(): ReadonlyMap<string, Value> {
    const result = new Map(this.parent?.flatten() ?? []);
    for (const [name, value] of this.variables) {
      result.set(name, value);
    }
    return result;
  }
}
