/**
 * Keel Kernel — Catalog
 *
 * The validated, dependency-annotated resource set for one node. A Catalog
 * is assembled once per compilation and never modified afterwards.
 */

import type { Resource } from './resource.js';

export interface Catalog {
  readonly node: string;
  /** Resources applied on this node, keyed by `type[title]`. */
  readonly resources: ReadonlyMap<string, Resource>;
  /** Resources declared with `@@`, published for other nodes. */
  readonly exported: ReadonlyMap<string, Resource>;
  /**
   * Dependency edges: resource key → keys of the resources it depends on.
   * Resources without dependencies have no entry.
   */
  readonly edges: ReadonlyMap<string, ReadonlySet<string>>;
  /** Interpreter warnings, in the order they were raised. */
  readonly warnings: ReadonlyArray<string>;
}

/** Facts about a node: fact name → value. */
export type Facts = ReadonlyMap<string, string>;
