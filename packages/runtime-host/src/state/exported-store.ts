/**
 * Keel Runtime Host — File-backed Exported Resource Store
 *
 * Implements ExportedResourceStore over StateIO. Everything lives in one
 * JSON document, `state/exported.json`:
 *
 *   {
 *     "version": 1,
 *     "nodes": {
 *       "web1.example.com": {
 *         "facts": { "osfamily": "Debian" },
 *         "resources": [
 *           { "type": "host", "title": "web1", "attributes": { "ip": "10.0.0.5" }, "scope": ["web"] }
 *         ]
 *       }
 *     }
 *   }
 *
 * Attribute values are encoded as JSON: strings, booleans and arrays map to
 * themselves, undef to null, and numbers to `{ "number": "<decimal text>" }`
 * so that no precision is lost.
 *
 * The document is validated on every load; a malformed document is
 * reported as an InternalError and never partially used. Publishing replaces
 * the node's previous resources.
 */

import type { Result, Value } from '@keel/manifest-dsl';
import { DiagnosticKind, UNDEFINED, arr, bool, failure, formatDecimal, parseDecimal, str, valueEquals } from '@keel/manifest-dsl';
import type { ExportedResourceStore, Resource, ResourceQuery } from '@keel/kernel';
import { createResource } from '@keel/kernel';
import type { StateIO } from './state-io.js';

export const EXPORTED_FILE = 'exported.json';
const STORE_VERSION = 1;

export type JsonValue = string | boolean | null | { readonly number: string } | ReadonlyArray<JsonValue>;

interface StoredResource {
  readonly type: string;
  readonly title: string;
  readonly attributes: Readonly<Record<string, JsonValue>>;
  readonly scope: ReadonlyArray<string>;
}

interface StoredNode {
  readonly facts: Readonly<Record<string, string>>;
  readonly resources: ReadonlyArray<StoredResource>;
}

interface StoreDocument {
  readonly version: number;
  readonly nodes: Readonly<Record<string, StoredNode>>;
}

// ---------------------------------------------------------------------------
// Value encoding
// ---------------------------------------------------------------------------

export function encodeValue(value: Value): JsonValue {
  switch (value.kind) {
    case 'string':
    case 'boolean':
      return value.value;
    case 'number':
      return { number: formatDecimal(value.value) };
    case 'array':
      return value.values.map(encodeValue);
    case 'undefined':
      return null;
  }
}

/** Decode a stored value; undefined when the shape is not a JsonValue. */
export function decodeValue(json: unknown): Value | undefined {
  if (json === null) return UNDEFINED;
  if (typeof json === 'string') return str(json);
  if (typeof json === 'boolean') return bool(json);
  if (Array.isArray(json)) {
    const values: Value[] = [];
    for (const item of json) {
      const decoded = decodeValue(item);
      if (decoded === undefined) return undefined;
      values.push(decoded);
    }
    return arr(values);
  }
  if (typeof json === 'object' && 'number' in json && typeof json.number === 'string') {
    const decimal = parseDecimal(json.number);
    return decimal === null ? undefined : { kind: 'number', value: decimal };
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export class FileExportedStore implements ExportedResourceStore {
  constructor(
    private readonly stateIO: StateIO,
    private readonly filename: string = EXPORTED_FILE,
  ) {}

  async getFacts(node: string): Promise<Result<ReadonlyArray<readonly [string, string]>>> {
    const document = this.load();
    if (!document.ok) return document;
    const stored = document.value.get(node);
    return { ok: true, value: stored === undefined ? [] : [...stored.facts] };
  }

  async getResources(query: ResourceQuery): Promise<Result<ReadonlyArray<Resource>>> {
    const document = this.load();
    if (!document.ok) return document;
    const type = query.type.toLowerCase();
    const found: Resource[] = [];
    for (const [node, stored] of document.value) {
      if (node === query.excludeNode) continue;
      for (const resource of stored.resources) {
        if (resource.id.type === type && matchesAttribute(resource, query.attribute)) {
          found.push(resource);
        }
      }
    }
    return { ok: true, value: found };
  }

  async publish(node: string, exported: ReadonlyArray<Resource>): Promise<Result<void>> {
    const document = this.load();
    if (!document.ok) return document;
    const previous = document.value.get(node);
    document.value.set(node, { facts: previous?.facts ?? new Map<string, string>(), resources: exported });
    this.save(document.value);
    return { ok: true, value: undefined };
  }

  /** Record the facts a node was compiled with, keeping its resources. */
  async recordFacts(node: string, facts: ReadonlyMap<string, string>): Promise<Result<void>> {
    const document = this.load();
    if (!document.ok) return document;
    const previous = document.value.get(node);
    document.value.set(node, { facts, resources: previous?.resources ?? [] });
    this.save(document.value);
    return { ok: true, value: undefined };
  }

  // -------------------------------------------------------------------------

  private load(): Result<Map<string, NodeEntry>> {
    let raw: unknown;
    try {
      raw = this.stateIO.readJson(this.filename);
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      return failure(DiagnosticKind.InternalError, `Cannot read exported resource store ${this.filename}: ${reason}`);
    }
    if (raw === undefined) {
      return { ok: true, value: new Map<string, NodeEntry>() };
    }
    const nodes = decodeDocument(raw);
    return nodes === undefined
      ? failure(DiagnosticKind.InternalError, `Malformed exported resource store ${this.filename}`)
      : { ok: true, value: nodes };
  }

  private save(nodes: ReadonlyMap<string, NodeEntry>): void {
    const document: StoreDocument = {
      version: STORE_VERSION,
      nodes: Object.fromEntries(
        [...nodes].map(([node, entry]): [string, StoredNode] => [
          node,
          {
            facts: Object.fromEntries(entry.facts),
            resources: entry.resources.map((r) => ({
              type: r.id.type,
              title: r.id.title,
              attributes: Object.fromEntries([...r.attributes].map(([k, v]): [string, JsonValue] => [k, encodeValue(v)])),
              scope: r.scope,
            })),
          },
        ]),
      ),
    };
    this.stateIO.writeJson(this.filename, document);
  }
}

interface NodeEntry {
  readonly facts: ReadonlyMap<string, string>;
  readonly resources: ReadonlyArray<Resource>;
}

function matchesAttribute(resource: Resource, attribute: ResourceQuery['attribute']): boolean {
  if (attribute === undefined) return true;
  const actual = resource.attributes.get(attribute.name);
  if (actual === undefined) return false;
  if (valueEquals(actual, attribute.value)) return true;
  return actual.kind === 'array' && actual.values.some((v) => valueEquals(v, attribute.value));
}

// ---------------------------------------------------------------------------
// Document validation
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeDocument(raw: unknown): Map<string, NodeEntry> | undefined {
  if (!isRecord(raw) || raw['version'] !== STORE_VERSION) {
    return undefined;
  }
  const storedNodes = raw['nodes'];
  if (!isRecord(storedNodes)) {
    return undefined;
  }
  const nodes = new Map<string, NodeEntry>();
  for (const [node, stored] of Object.entries(storedNodes)) {
    if (!isRecord(stored)) return undefined;
    const storedFacts = stored['facts'];
    const storedResources = stored['resources'];
    if (!isRecord(storedFacts) || !Array.isArray(storedResources)) {
      return undefined;
    }
    const facts = new Map<string, string>();
    for (const [name, value] of Object.entries(storedFacts)) {
      if (typeof value !== 'string') return undefined;
      facts.set(name, value);
    }
    const resources: Resource[] = [];
    for (const item of storedResources) {
      const resource = decodeResource(item);
      if (resource === undefined) return undefined;
      resources.push(resource);
    }
    nodes.set(node, { facts, resources });
  }
  return nodes;
}

function decodeResource(item: unknown): Resource | undefined {
  if (!isRecord(item)) return undefined;
  const { type, title, attributes, scope } = item;
  if (typeof type !== 'string' || typeof title !== 'string' || !isRecord(attributes)) {
    return undefined;
  }
  if (!Array.isArray(scope) || !scope.every((s): s is string => typeof s === 'string')) {
    return undefined;
  }
  const decoded: Array<[string, Value]> = [];
  for (const [name, json] of Object.entries(attributes)) {
    const value = decodeValue(json);
    if (value === undefined) return undefined;
    decoded.push([name, value]);
  }
  return createResource({ type, title, attributes: decoded, exported: true, scope });
}
