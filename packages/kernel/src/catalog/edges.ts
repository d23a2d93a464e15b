/**
 * Keel Kernel — Dependency Edges
 *
 * Turns relationship metaparameters into directed edges between resource
 * identity keys. An edge `a → b` means a depends on b:
 *
 *   before, notify             the referenced resource depends on the declaring one
 *   require, subscribe, after  the declaring resource depends on the referenced one
 *
 * A relationship value is a reference string (`Package[nginx]`) or an array
 * of them. Every reference must resolve to a resource in `resources`.
 * Cycles are not detected here.
 */

import type { Result, Value } from '@keel/manifest-dsl';
import { DiagnosticKind, failure, showValue } from '@keel/manifest-dsl';
import type { Resource } from '../types/resource.js';
import {
  BACKWARD_RELATIONSHIPS,
  FORWARD_RELATIONSHIPS,
  parseReference,
  resourceKey,
} from '../types/resource.js';

export type EdgeMap = ReadonlyMap<string, ReadonlySet<string>>;

export function buildEdges(resources: ReadonlyMap<string, Resource>): Result<EdgeMap> {
  const edges = new Map<string, Set<string>>();
  const link = (from: string, to: string): void => {
    const targets = edges.get(from) ?? new Set<string>();
    targets.add(to);
    edges.set(from, targets);
  };

  for (const [key, resource] of resources) {
    for (const [relationships, forward] of [
      [FORWARD_RELATIONSHIPS, true],
      [BACKWARD_RELATIONSHIPS, false],
    ] as const) {
      for (const attribute of relationships) {
        const value = resource.attributes.get(attribute);
        if (value === undefined) {
          continue;
        }
        for (const reference of flatten(value)) {
          const target = resolve(reference, resources);
          if (!target.ok) {
            return failure(
              DiagnosticKind.UnresolvedReference,
              `${key}: ${attribute} ${target.error}`,
              resource.location,
            );
          }
          if (forward) {
            link(target.value, key);
          } else {
            link(key, target.value);
          }
        }
      }
    }
  }
  return { ok: true, value: edges };
}

function flatten(value: Value): ReadonlyArray<Value> {
  return value.kind === 'array' ? value.values.flatMap(flatten) : [value];
}

type Resolution = { readonly ok: true; readonly value: string } | { readonly ok: false; readonly error: string };

function resolve(reference: Value, resources: ReadonlyMap<string, Resource>): Resolution {
  const id = reference.kind === 'string' ? parseReference(reference.value) : null;
  if (id === null) {
    return { ok: false, error: `value ${showValue(reference)} is not a resource reference` };
  }
  const key = resourceKey(id);
  if (!resources.has(key)) {
    return { ok: false, error: `targets ${key}, which is not in the catalog` };
  }
  return { ok: true, value: key };
}
