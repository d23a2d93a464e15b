/**
 * Keel Kernel — Catalog Assembly Tests
 *
 *   CAT-U1: assembly keys resources by identity and partitions exports
 *   CAT-U2: a second declaration of one identity is a DuplicateResource
 *   CAT-U3: each relationship metaparameter produces the right edge direction
 *   CAT-U4: references that do not resolve are UnresolvedReference
 *   CAT-U5: fileSourceCheck resolves module sources through the reader
 */

import { describe, it, expect } from 'vitest';
import type { Value } from '@keel/manifest-dsl';
import { DiagnosticKind, arr, num, str } from '@keel/manifest-dsl';
import { assembleCatalog } from '../src/catalog/builder.js';
import { fileSourceCheck } from '../src/catalog/checks.js';
import type { SourceReader } from '../src/adapters/index.js';
import type { Catalog } from '../src/types/catalog.js';
import type { Resource } from '../src/types/resource.js';
import { createResource } from '../src/types/resource.js';

function resource(
  type: string,
  title: string,
  attributes: Record<string, Value> = {},
  exported = false,
): Resource {
  return createResource({ type, title, attributes: Object.entries(attributes), exported });
}

function assemble(resources: ReadonlyArray<Resource>): Catalog {
  const result = assembleCatalog('web1.example.com', resources, []);
  if (!result.ok) {
    throw new Error(result.error.message);
  }
  return result.value;
}

/** Edge map rendered as sorted `from -> to` lines. */
function edgeLines(catalog: Catalog): string[] {
  const lines: string[] = [];
  for (const [from, targets] of catalog.edges) {
    for (const to of targets) {
      lines.push(`${from} -> ${to}`);
    }
  }
  return lines.sort();
}

describe('CAT-U1: assembly', () => {
  it('keys local and exported resources separately', () => {
    const catalog = assemble([
      resource('package', 'nginx'),
      resource('host', 'web1', { ip: str('10.0.0.1') }, true),
    ]);
    expect([...catalog.resources.keys()]).toEqual(['package[nginx]']);
    expect([...catalog.exported.keys()]).toEqual(['host[web1]']);
    expect(catalog.node).toBe('web1.example.com');
    expect(catalog.edges.size).toBe(0);
  });

  it('carries interpreter warnings through', () => {
    const result = assembleCatalog('n', [], ['Unknown variable $foo']);
    expect(result.ok ? result.value.warnings : []).toEqual(['Unknown variable $foo']);
  });
});

describe('CAT-U2: duplicates', () => {
  it('names the earlier declaration location', () => {
    const first = createResource({
      type: 'file',
      title: '/etc/motd',
      location: { file: '/m/site.pp', line: 3, column: 5 },
    });
    const second = createResource({
      type: 'file',
      title: '/etc/motd',
      location: { file: '/m/site.pp', line: 9, column: 5 },
    });
    expect(assembleCatalog('n', [first, second], [])).toEqual({
      ok: false,
      error: {
        kind: DiagnosticKind.DuplicateResource,
        message: 'file[/etc/motd] is already declared at /m/site.pp:3:5',
        location: { file: '/m/site.pp', line: 9, column: 5 },
      },
    });
  });

  it('counts an exported and a local declaration as duplicates', () => {
    const result = assembleCatalog('n', [resource('host', 'a', {}, true), resource('host', 'a')], []);
    expect(result.ok ? 'ok' : result.error.kind).toBe(DiagnosticKind.DuplicateResource);
  });
});

describe('CAT-U3: edges', () => {
  const pkg = resource('package', 'nginx');
  const conf = resource('file', '/etc/nginx/nginx.conf');

  it('require and subscribe point from the declaring resource', () => {
    const catalog = assemble([
      pkg,
      conf,
      resource('service', 'nginx', {
        require: str('Package[nginx]'),
        subscribe: str('File[/etc/nginx/nginx.conf]'),
      }),
    ]);
    expect(edgeLines(catalog)).toEqual([
      'service[nginx] -> file[/etc/nginx/nginx.conf]',
      'service[nginx] -> package[nginx]',
    ]);
  });

  it('before and notify point at the declaring resource', () => {
    const catalog = assemble([
      resource('package', 'nginx', { before: str('File[/etc/nginx/nginx.conf]') }),
      resource('file', '/etc/nginx/nginx.conf', { notify: str('Service[nginx]') }),
      resource('service', 'nginx'),
    ]);
    expect(edgeLines(catalog)).toEqual([
      'file[/etc/nginx/nginx.conf] -> package[nginx]',
      'service[nginx] -> file[/etc/nginx/nginx.conf]',
    ]);
  });

  it('flattens nested arrays of references', () => {
    const catalog = assemble([
      pkg,
      conf,
      resource('exec', 'reload', {
        after: arr([str('Package[nginx]'), arr([str('File[/etc/nginx/nginx.conf]')])]),
      }),
    ]);
    expect(edgeLines(catalog)).toEqual([
      'exec[reload] -> file[/etc/nginx/nginx.conf]',
      'exec[reload] -> package[nginx]',
    ]);
  });

  it('matches multi-segment reference types case-insensitively', () => {
    const catalog = assemble([
      resource('apache::vhost', 'www'),
      resource('service', 'httpd', { require: str('Apache::Vhost[www]') }),
    ]);
    expect(edgeLines(catalog)).toEqual(['service[httpd] -> apache::vhost[www]']);
  });
});

describe('CAT-U4: unresolved references', () => {
  it('rejects a target missing from the catalog', () => {
    const result = assembleCatalog('n', [resource('service', 'nginx', { require: str('Package[nginx]') })], []);
    expect(result).toEqual({
      ok: false,
      error: {
        kind: DiagnosticKind.UnresolvedReference,
        message: 'service[nginx]: require targets package[nginx], which is not in the catalog',
      },
    });
  });

  it('rejects a target that is only exported', () => {
    const result = assembleCatalog(
      'n',
      [resource('host', 'db', {}, true), resource('service', 'app', { require: str('Host[db]') })],
      [],
    );
    expect(result.ok ? 'ok' : result.error.kind).toBe(DiagnosticKind.UnresolvedReference);
  });

  it('rejects a value that is not a reference', () => {
    const result = assembleCatalog('n', [resource('service', 'nginx', { before: num(3) })], []);
    expect(result).toEqual({
      ok: false,
      error: {
        kind: DiagnosticKind.UnresolvedReference,
        message: 'service[nginx]: before value 3 is not a resource reference',
      },
    });
  });
});

describe('CAT-U5: fileSourceCheck', () => {
  const reader = (files: ReadonlyArray<string>): SourceReader => ({
    readText: () => Promise.reject(new Error('not used')),
    exists: (path) => Promise.resolve(files.includes(path)),
  });
  const context = (files: ReadonlyArray<string>) => ({ modules: '/etc/keel/modules', reader: reader(files) });

  it('accepts a module source that exists', async () => {
    const catalog = assemble([resource('file', '/etc/motd', { source: str('keel:///modules/motd/motd.txt') })]);
    const result = await fileSourceCheck.run(catalog, context(['/etc/keel/modules/motd/files/motd.txt']));
    expect(result.ok).toBe(true);
  });

  it('rejects a module source that is missing', async () => {
    const catalog = assemble([resource('file', '/etc/motd', { source: str('keel:///modules/motd/motd.txt') })]);
    const result = await fileSourceCheck.run(catalog, context([]));
    expect(result).toEqual({
      ok: false,
      error: {
        kind: DiagnosticKind.CheckFailed,
        message:
          'file[/etc/motd]: source keel:///modules/motd/motd.txt not found at /etc/keel/modules/motd/files/motd.txt',
      },
    });
  });

  it('ignores other URL schemes and non-file resources', async () => {
    const catalog = assemble([
      resource('file', '/etc/motd', { source: str('https://example.invalid/motd') }),
      resource('exec', 'x', { source: str('keel:///modules/missing/x') }),
    ]);
    expect((await fileSourceCheck.run(catalog, context([]))).ok).toBe(true);
  });

  it('rejects a malformed module URL', async () => {
    const catalog = assemble([resource('file', '/etc/motd', { source: str('keel:///modules/motd') })]);
    const result = await fileSourceCheck.run(catalog, context([]));
    expect(result.ok ? 'ok' : result.error.message).toBe('file[/etc/motd]: malformed source keel:///modules/motd');
  });
});
