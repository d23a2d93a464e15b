/**
 * Keel Runtime Host — FileExportedStore Tests
 *
 *   EXP-U1: published resources are returned to other nodes, never their own
 *   EXP-U2: attribute queries match equal values and array membership
 *   EXP-U3: values survive the JSON encoding exactly
 *   EXP-U4: facts are recorded per node and survive publishing
 *   EXP-U5: a malformed store is reported as InternalError
 *
 * Isolation: uses MemoryStateIO — no filesystem I/O.
 */

import { describe, it, expect } from 'vitest';
import type { Value } from '@keel/manifest-dsl';
import { DiagnosticKind, UNDEFINED, arr, bool, num, str } from '@keel/manifest-dsl';
import type { Resource } from '@keel/kernel';
import { createResource } from '@keel/kernel';
import { FileExportedStore, decodeValue, encodeValue } from '../src/state/exported-store.js';
import { MemoryStateIO } from '../src/state/state-io.js';

function host(title: string, attributes: Array<[string, Value]>): Resource {
  return createResource({ type: 'host', title, attributes, exported: true, scope: ['web'] });
}

async function titles(store: FileExportedStore, query: Parameters<FileExportedStore['getResources']>[0]): Promise<string[]> {
  const result = await store.getResources(query);
  if (!result.ok) throw new Error(result.error.message);
  return result.value.map((r) => r.id.title);
}

describe('FileExportedStore', () => {
  it('EXP-U1: published resources are returned to other nodes, never their own', async () => {
    const store = new FileExportedStore(new MemoryStateIO());
    await store.publish('web1', [host('web1', [['ip', str('10.0.0.5')]])]);
    await store.publish('web2', [host('web2', [['ip', str('10.0.0.6')]])]);

    expect(await titles(store, { type: 'Host', excludeNode: 'web1' })).toEqual(['web2']);
    expect(await titles(store, { type: 'host' })).toEqual(['web1', 'web2']);
    expect(await titles(store, { type: 'file' })).toEqual([]);
  });

  it('EXP-U1b: publishing again replaces the node’s previous resources', async () => {
    const store = new FileExportedStore(new MemoryStateIO());
    await store.publish('web1', [host('old', [])]);
    await store.publish('web1', [host('new', [])]);

    expect(await titles(store, { type: 'host' })).toEqual(['new']);
  });

  it('EXP-U2: attribute queries match equal values and array membership', async () => {
    const store = new FileExportedStore(new MemoryStateIO());
    await store.publish('web1', [
      host('a', [['tag', str('prod')]]),
      host('b', [['tag', arr([str('staging'), str('prod')])]]),
      host('c', [['tag', str('staging')]]),
      host('d', []),
    ]);

    expect(await titles(store, { type: 'host', attribute: { name: 'tag', value: str('prod') } })).toEqual(['a', 'b']);
  });

  it('EXP-U3: values survive the JSON encoding exactly', async () => {
    const stateIO = new MemoryStateIO();
    const value = arr([str('x'), bool(true), num('12.50'), UNDEFINED, arr([num('-0.05')])]);
    await new FileExportedStore(stateIO).publish('web1', [host('web1', [['weird', value]])]);

    expect(encodeValue(value)).toEqual(['x', true, { number: '12.5' }, null, [{ number: '-0.05' }]]);

    const reread = await new FileExportedStore(stateIO).getResources({ type: 'host' });
    if (!reread.ok) throw new Error(reread.error.message);
    const resource = reread.value[0];
    expect(resource?.attributes.get('weird')).toEqual(value);
    expect(resource?.exported).toBe(true);
    expect(resource?.scope).toEqual(['web']);

    expect(decodeValue({ number: 'twelve' })).toBeUndefined();
    expect(decodeValue(7)).toBeUndefined();
  });

  it('EXP-U4: facts are recorded per node and survive publishing', async () => {
    const store = new FileExportedStore(new MemoryStateIO());
    await store.recordFacts('web1', new Map([['osfamily', 'Debian']]));
    await store.publish('web1', [host('web1', [])]);

    expect(await store.getFacts('web1')).toEqual({ ok: true, value: [['osfamily', 'Debian']] });
    expect(await store.getFacts('web2')).toEqual({ ok: true, value: [] });
    expect(await titles(store, { type: 'host' })).toEqual(['web1']);
  });

  it('EXP-U5: a malformed store is reported as InternalError', async () => {
    const wrongShape = new MemoryStateIO();
    wrongShape.writeJson('exported.json', { version: 2, nodes: {} });
    expect(await new FileExportedStore(wrongShape).getFacts('web1')).toEqual({
      ok: false,
      error: { kind: DiagnosticKind.InternalError, message: 'Malformed exported resource store exported.json' },
    });

    const corrupt = new MemoryStateIO();
    corrupt.writeRaw('exported.json', '{not json');
    const result = await new FileExportedStore(corrupt).publish('web1', []);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe(DiagnosticKind.InternalError);
      expect(result.error.message).toMatch(/^Cannot read exported resource store exported\.json: /);
    }
  });
});
