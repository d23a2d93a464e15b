/**
 * Keel Kernel — Unit Path Resolution
 *
 * Deterministic mapping from a unit name to the manifest file that defines it:
 *
 *   node unit          <manifests>/site.pp
 *   apache             <modules>/apache/manifests/init.pp
 *   apache::vhost      <modules>/apache/manifests/vhost.pp
 *   apache::mod::ssl   <modules>/apache/manifests/mod/ssl.pp
 */

import { posix } from 'node:path';
import type { Result, TopLevelKind } from '@keel/manifest-dsl';
import { DiagnosticKind, failure } from '@keel/manifest-dsl';

export interface CompilerPaths {
  readonly manifests: string;
  readonly modules: string;
  readonly templates: string;
}

export function joinPath(...segments: ReadonlyArray<string>): string {
  return posix.join(...segments);
}

export function resolveUnitPath(paths: CompilerPaths, kind: TopLevelKind, name: string): Result<string> {
  if (kind === 'node') {
    return { ok: true, value: joinPath(paths.manifests, 'site.pp') };
  }
  const segments = name.split('::');
  const [module, ...rest] = segments;
  if (module === undefined || segments.some((segment) => segment === '')) {
    return failure(DiagnosticKind.InternalError, `Cannot resolve a path for ${kind} ${JSON.stringify(name)}`);
  }
  const file = rest.length === 0 ? 'init.pp' : `${joinPath(...rest)}.pp`;
  return { ok: true, value: joinPath(paths.modules, module, 'manifests', file) };
}

/** The module a class or define name belongs to: its first segment. */
export function moduleOf(name: string): string {
  const index = name.indexOf('::');
  return index === -1 ? name : name.slice(0, index);
}
