/**
 * output.ts — Rendering of catalogs, statistics, facts and statements.
 *
 * Every function returns lines (or a JSON-ready object) instead of printing,
 * so commands stay testable with a captured Terminal.
 */

import type { Diagnostic, Statement } from '@keel/manifest-dsl';
import { formatDiagnostic, showValue } from '@keel/manifest-dsl';
import type { Catalog, CompilerStats, Facts, Resource, SampleSummary } from '@keel/kernel';
import { encodeValue } from '@keel/runtime-host';
import type { Theme } from './theme.js';

/** Where commands write. Each call is one line. */
export interface Terminal {
  out(line: string): void;
  err(line: string): void;
}

export const processTerminal: Terminal = {
  out: (line) => { process.stdout.write(line + '\n'); },
  err: (line) => { process.stderr.write(line + '\n'); },
};

// ---------------------------------------------------------------------------
// Catalogs
// ---------------------------------------------------------------------------

function resourceLines(
  key: string,
  resource: Resource,
  edges: ReadonlyMap<string, ReadonlySet<string>>,
  theme: Theme,
): string[] {
  const lines = [`  ${theme.key(key)}`];
  const names = [...resource.attributes.keys()].sort();
  for (const name of names) {
    const value = resource.attributes.get(name);
    if (value !== undefined) lines.push(`    ${name} => ${showValue(value)}`);
  }
  const deps = edges.get(key);
  if (deps !== undefined && deps.size > 0) {
    lines.push(theme.muted(`    depends on ${[...deps].join(', ')}`));
  }
  return lines;
}

export function formatCatalog(catalog: Catalog, theme: Theme): string[] {
  const lines = [
    `${theme.title(`Catalog for ${catalog.node}`)} (${catalog.resources.size} resources, ${catalog.exported.size} exported)`,
  ];
  for (const [key, resource] of catalog.resources) {
    lines.push(...resourceLines(key, resource, catalog.edges, theme));
  }
  if (catalog.exported.size > 0) {
    lines.push(theme.title('Exported resources'));
    for (const [key, resource] of catalog.exported) {
      lines.push(...resourceLines(key, resource, catalog.edges, theme));
    }
  }
  if (catalog.warnings.length > 0) {
    lines.push(theme.title('Warnings'));
    for (const warning of catalog.warnings) {
      lines.push(`  ${theme.warning(warning)}`);
    }
  }
  return lines;
}

function resourceJson(resource: Resource) {
  return {
    type: resource.id.type,
    title: resource.id.title,
    attributes: Object.fromEntries([...resource.attributes].map(([k, v]) => [k, encodeValue(v)] as const)),
    scope: resource.scope,
  };
}

export function catalogJson(catalog: Catalog) {
  return {
    node: catalog.node,
    resources: [...catalog.resources.values()].map(resourceJson),
    exported: [...catalog.exported.values()].map(resourceJson),
    edges: Object.fromEntries([...catalog.edges].map(([key, deps]) => [key, [...deps]] as const)),
    warnings: catalog.warnings,
  };
}

// ---------------------------------------------------------------------------
// Statistics
// ---------------------------------------------------------------------------

const ms = (n: number): string => `${n.toFixed(2)}ms`;

export function formatSummary(key: string, s: SampleSummary): string {
  return `    ${key}  count=${s.count} total=${ms(s.total)} mean=${ms(s.mean)} min=${ms(s.min)} max=${ms(s.max)}`;
}

export function formatStats(stats: CompilerStats, theme: Theme): string[] {
  const lines = [theme.title('Statistics')];
  for (const store of [stats.parsing, stats.catalog, stats.templates]) {
    lines.push(`  ${store.name}`);
    const summary = store.summary();
    if (summary.size === 0) {
      lines.push(theme.muted('    (none)'));
    }
    for (const [key, s] of summary) {
      lines.push(formatSummary(key, s));
    }
  }
  return lines;
}

export function statsJson(stats: CompilerStats) {
  return Object.fromEntries(
    [stats.parsing, stats.catalog, stats.templates].map((store) => [store.name, Object.fromEntries(store.summary())] as const),
  );
}

// ---------------------------------------------------------------------------
// Facts, statements, diagnostics
// ---------------------------------------------------------------------------

/** `name => value`, sorted by fact name. */
export function formatFacts(facts: Facts): string[] {
  return [...facts].sort(([a], [b]) => a.localeCompare(b)).map(([name, value]) => `${name} => ${value}`);
}

export function describeStatement(statement: Statement): string {
  switch (statement.kind) {
    case 'class':
    case 'define':
      return `${statement.kind} ${statement.name}`;
    case 'node':
      return `node ${statement.matchers.map((m) => (m.kind === 'default' ? 'default' : `'${m.name}'`)).join(', ')}`;
    case 'resource':
      return `${statement.exported ? '@@' : ''}${statement.type} resource`;
    default:
      return statement.kind;
  }
}

export function formatStatements(statements: ReadonlyArray<Statement>, theme: Theme): string[] {
  return statements.map((s) => `${theme.muted(`${s.location.line}:${s.location.column}`)}  ${describeStatement(s)}`);
}

export function formatError(error: Diagnostic, theme: Theme): string {
  return theme.error(formatDiagnostic(error));
}
