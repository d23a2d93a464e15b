/**
 * Keel Kernel — Catalog Assembly
 *
 * Builds the immutable Catalog from validated resources:
 *   1. identity map over every declared resource (duplicates rejected)
 *   2. partition into local and exported resources
 *   3. dependency edges between local resources
 *
 * Resources must already have passed the type registry, since validation
 * can rewrite titles.
 */

import type { Result } from '@keel/manifest-dsl';
import { DiagnosticKind, failure, formatLocation } from '@keel/manifest-dsl';
import type { Catalog } from '../types/catalog.js';
import type { Resource } from '../types/resource.js';
import { resourceKey } from '../types/resource.js';
import { buildEdges } from './edges.js';

export function assembleCatalog(
  node: string,
  resources: ReadonlyArray<Resource>,
  warnings: ReadonlyArray<string>,
): Result<Catalog> {
  const local = new Map<string, Resource>();
  const exported = new Map<string, Resource>();

  for (const resource of resources) {
    const key = resourceKey(resource.id);
    const previous = local.get(key) ?? exported.get(key);
    if (previous !== undefined) {
      const where = previous.location !== undefined ? ` at ${formatLocation(previous.location)}` : '';
      return failure(
        DiagnosticKind.DuplicateResource,
        `${key} is already declared${where}`,
        resource.location,
      );
    }
    (resource.exported ? exported : local).set(key, resource);
  }

  const edges = buildEdges(local);
  if (!edges.ok) {
    return edges;
  }
  return {
    ok: true,
    value: { node, resources: local, exported, edges: edges.value, warnings: [...warnings] },
  };
}
