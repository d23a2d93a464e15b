/**
 * Keel Kernel — Collaborator Interfaces
 *
 * Everything the orchestrator needs from the outside world is expressed
 * here as an interface: fact collection, interpretation, template
 * evaluation, hierarchical lookup, the exported-resource store and source
 * file access.
 *
 * No implementations are provided here, apart from noopLookup. Concrete
 * collaborators live in @keel/interpreter and @keel/runtime-host and are
 * injected at construction time.
 *
 * Every collaborator reports failure as a Result. A collaborator that throws
 * anyway is caught at the orchestrator boundary and converted to a
 * diagnostic; it never crashes the host process.
 */

import type { Result, TopLevelKind, TopLevelStatement, Value } from '@keel/manifest-dsl';
import { UNDEFINED } from '@keel/manifest-dsl';
import type { Facts } from '../types/catalog.js';
import type { Resource } from '../types/resource.js';

// ---------------------------------------------------------------------------
// Facts
// ---------------------------------------------------------------------------

/** Collects the facts of a node. A missing fact is legitimate. */
export type FactProvider = (node: string) => Promise<Facts>;

// ---------------------------------------------------------------------------
// Templates and lookup
// ---------------------------------------------------------------------------

/** A template file name (relative to the templates directory) or inline source. */
export type TemplateSource =
  | { readonly kind: 'file'; readonly name: string }
  | { readonly kind: 'inline'; readonly text: string };

/** Variables visible to a template or a lookup: name → value. */
export type Scope = ReadonlyMap<string, Value>;

/** Renders templates. Opaque and possibly slow; called one at a time. */
export interface TemplateEvaluator {
  evaluate(source: TemplateSource, scope: Scope): Promise<Result<string>>;
}

/** What the interpreter sees of template rendering. */
export interface TemplateRenderer {
  render(source: TemplateSource, scope: Scope): Promise<Result<string>>;
}

/** External hierarchical key/value data. */
export interface HierarchicalLookup {
  lookup(key: string, scope: Scope): Promise<Result<Value>>;
}

/** Lookup used when no hierarchy is configured: every key is undefined. */
export const noopLookup: HierarchicalLookup = {
  lookup: () => Promise.resolve<Result<Value>>({ ok: true, value: UNDEFINED }),
};

// ---------------------------------------------------------------------------
// Exported resources
// ---------------------------------------------------------------------------

/** Selects exported resources of one type, optionally by one attribute. */
export interface ResourceQuery {
  readonly type: string;
  readonly attribute?: { readonly name: string; readonly value: Value } | undefined;
  /** Node whose own exports are left out (the node being compiled). */
  readonly excludeNode?: string | undefined;
}

/**
 * Store of resources exported by previously compiled nodes, and of their
 * facts. Resources it returns are treated as already validated.
 */
export interface ExportedResourceStore {
  getFacts(node: string): Promise<Result<ReadonlyArray<readonly [string, string]>>>;
  getResources(query: ResourceQuery): Promise<Result<ReadonlyArray<Resource>>>;
  publish(node: string, exported: ReadonlyArray<Resource>): Promise<Result<void>>;
}

// ---------------------------------------------------------------------------
// Interpreter
// ---------------------------------------------------------------------------

/**
 * Loads a class, define or node definition by name through the parse cache.
 * Resolves to `undefined` when the file that would define the unit does not
 * exist.
 */
export type UnitLoader = (
  kind: TopLevelKind,
  name: string,
) => Promise<Result<TopLevelStatement | undefined>>;

export interface InterpreterServices {
  readonly templates: TemplateRenderer;
  readonly lookup: HierarchicalLookup;
  readonly exportedStore?: ExportedResourceStore | undefined;
  /** Modules whose classes are skipped by `include`. */
  readonly ignoredModules: ReadonlySet<string>;
}

export interface InterpreterRequest {
  readonly node: string;
  readonly facts: Facts;
  /** The node block selected for `node`. */
  readonly unit: Extract<TopLevelStatement, { kind: 'node' }>;
  readonly loadUnit: UnitLoader;
  readonly services: InterpreterServices;
}

export interface InterpreterOutput {
  /** Resources declared by this node; each goes through the type registry. */
  readonly resources: ReadonlyArray<Resource>;
  /** Resources collected from other nodes, admitted as already validated. */
  readonly collected?: ReadonlyArray<Resource> | undefined;
  readonly warnings: ReadonlyArray<string>;
}

/** Evaluates the manifests of one node into declared resources. */
export interface Interpreter {
  interpret(request: InterpreterRequest): Promise<Result<InterpreterOutput>>;
}

// ---------------------------------------------------------------------------
// Source files
// ---------------------------------------------------------------------------

export interface SourceReader {
  /** @throws if the file cannot be read */
  readText(path: string): Promise<string>;
  exists(path: string): Promise<boolean>;
}
