/**
 * Keel Kernel — Type Registry
 *
 * The TypeRegistry maps a resource type name to its validation pipeline.
 *
 * Registry invariants:
 * - Built once from a fixed list of entries; read-only afterwards
 * - Duplicate type names are rejected at construction
 * - Unregistered types are validated with defaultType (no parameter check),
 *   so manifests that use types this registry does not know still compile
 * - Validation diagnostics are prefixed with the resource identity key
 */

import type { Result } from '@keel/manifest-dsl';
import { diagnostic } from '@keel/manifest-dsl';
import type { Resource } from '../types/resource.js';
import { resourceKey } from '../types/resource.js';
import type { TypeMethods } from '../validation/pipeline.js';
import { defaultType } from '../validation/pipeline.js';

export class TypeRegistry {
  private readonly types: ReadonlyMap<string, TypeMethods>;

  /**
   * @param entries - Type name and pipeline pairs
   * @throws {Error} If a type name appears twice
   */
  constructor(entries: Iterable<readonly [string, TypeMethods]>) {
    const types = new Map<string, TypeMethods>();
    for (const [name, methods] of entries) {
      if (types.has(name)) {
        throw new Error(`Resource type already registered: ${name}`);
      }
      types.set(name, methods);
    }
    this.types = types;
  }

  get(type: string): TypeMethods | undefined {
    return this.types.get(type);
  }

  has(type: string): boolean {
    return this.types.has(type);
  }

  /** Registered type names, sorted. */
  names(): ReadonlyArray<string> {
    return [...this.types.keys()].sort();
  }

  /**
   * Run a resource through its type's pipeline.
   *
   * The returned resource may carry a different title (nameval); callers
   * must key it by the returned identity, not the input one.
   */
  validate(resource: Resource): Result<Resource> {
    const methods = this.types.get(resource.id.type) ?? defaultType;
    const result = methods.validate(resource);
    if (result.ok) {
      return result;
    }
    return {
      ok: false,
      error: diagnostic(
        result.error.kind,
        `${resourceKey(resource.id)}: ${result.error.message}`,
        result.error.location ?? resource.location,
      ),
    };
  }
}
