/**
 * Keel Kernel — Resource Model
 *
 * A Resource is one declared unit of managed state, identified by its
 * (type, title) pair. Attribute values are manifest Values; metaparameters
 * share the attribute map with type-specific parameters.
 *
 * Resources are immutable. Validators rewrite a resource by building a new
 * one through withAttribute() / withTitle(); nothing mutates a map in place.
 *
 * Identity invariant: a resource's title may change during validation
 * (the `nameval` combinator), but never after the resource has been inserted
 * into an identity-keyed structure such as a Catalog.
 */

import type { SourceLocation, Value } from '@keel/manifest-dsl';

// ---------------------------------------------------------------------------
// Identity
// ---------------------------------------------------------------------------

/** The identity of a resource. Type names are lowercase. */
export interface ResourceIdentity {
  readonly type: string;
  readonly title: string;
}

/**
 * Identity key used by catalogs and edge maps: `type[title]`.
 *
 * @example resourceKey({ type: 'file', title: '/etc/motd' }) // 'file[/etc/motd]'
 */
export function resourceKey(id: ResourceIdentity): string {
  return `${id.type}[${id.title}]`;
}

// ---------------------------------------------------------------------------
// Resource
// ---------------------------------------------------------------------------

export interface Resource {
  readonly id: ResourceIdentity;
  readonly attributes: ReadonlyMap<string, Value>;
  /** Declared with `@@`: published for other nodes instead of applied locally. */
  readonly exported: boolean;
  /** Class and define path that declared the resource, outermost first. */
  readonly scope: ReadonlyArray<string>;
  readonly location?: SourceLocation | undefined;
}

export interface ResourceInit {
  readonly type: string;
  readonly title: string;
  readonly attributes?: Iterable<readonly [string, Value]> | undefined;
  readonly exported?: boolean | undefined;
  readonly scope?: ReadonlyArray<string> | undefined;
  readonly location?: SourceLocation | undefined;
}

/** Build a resource, lowercasing the type name. */
export function createResource(init: ResourceInit): Resource {
  return {
    id: { type: init.type.toLowerCase(), title: init.title },
    attributes: new Map(init.attributes ?? []),
    exported: init.exported ?? false,
    scope: init.scope ?? [],
    location: init.location,
  };
}

/** A copy of `resource` with `name` set to `value`. */
export function withAttribute(resource: Resource, name: string, value: Value): Resource {
  const attributes = new Map(resource.attributes);
  attributes.set(name, value);
  return { ...resource, attributes };
}

/** A copy of `resource` with a new title. Must not be called after catalog insertion. */
export function withTitle(resource: Resource, title: string): Resource {
  return { ...resource, id: { type: resource.id.type, title } };
}

// ---------------------------------------------------------------------------
// Metaparameters and relationships
// ---------------------------------------------------------------------------

/** Attributes accepted on every resource type regardless of its legal parameters. */
export const METAPARAMETERS: ReadonlySet<string> = new Set([
  'alias',
  'audit',
  'before',
  'after',
  'require',
  'notify',
  'subscribe',
  'loglevel',
  'noop',
  'schedule',
  'stage',
  'tag',
  'tags',
]);

/** Relationships where the referenced resource depends on the declaring one. */
export const FORWARD_RELATIONSHIPS: ReadonlyArray<string> = ['before', 'notify'];

/** Relationships where the declaring resource depends on the referenced one. */
export const BACKWARD_RELATIONSHIPS: ReadonlyArray<string> = ['require', 'subscribe', 'after'];

// ---------------------------------------------------------------------------
// References
// ---------------------------------------------------------------------------

const REFERENCE_PATTERN = /^([A-Za-z][A-Za-z0-9_]*(?:::[A-Za-z][A-Za-z0-9_]*)*)\[(.+)\]$/s;

/**
 * Parse reference text `Type[title]`. The type is matched case-insensitively
 * and returned lowercase. Returns null for anything else.
 */
export function parseReference(text: string): ResourceIdentity | null {
  const match = REFERENCE_PATTERN.exec(text);
  if (match === null || match[1] === undefined || match[2] === undefined) {
    return null;
  }
  return { type: match[1].toLowerCase(), title: match[2] };
}

/**
 * Render a reference with a capitalized type: `Package[nginx]`,
 * `Apache::Vhost[www]`.
 */
export function formatReference(id: ResourceIdentity): string {
  const type = id.type
    .split('::')
    .map((segment) => segment.charAt(0).toUpperCase() + segment.slice(1))
    .join('::');
  return `${type}[${id.title}]`;
}
