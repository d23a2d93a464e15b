/**
 * Keel Kernel — Extra Catalog Checks
 *
 * Optional consistency checks run on an assembled catalog. A check can turn
 * a successful compilation into a failure, never the reverse.
 */

import type { Result } from '@keel/manifest-dsl';
import { DiagnosticKind, failure } from '@keel/manifest-dsl';
import type { SourceReader } from '../adapters/index.js';
import type { Catalog } from '../types/catalog.js';
import { joinPath } from '../compiler/paths.js';

export interface CheckContext {
  /** Absolute modules directory. */
  readonly modules: string;
  readonly reader: SourceReader;
}

export interface CatalogCheck {
  readonly name: string;
  run(catalog: Catalog, context: CheckContext): Promise<Result<void>>;
}

const MODULE_SOURCE = /^keel:\/\/\/modules\/([^/]+)\/(.+)$/;

/**
 * Every `keel:///modules/<module>/<path>` source of a file resource must
 * exist at `<modules>/<module>/files/<path>`. Other sources are not checked.
 */
export const fileSourceCheck: CatalogCheck = {
  name: 'file-sources',
  async run(catalog, context) {
    for (const [key, resource] of catalog.resources) {
      if (resource.id.type !== 'file') {
        continue;
      }
      const source = resource.attributes.get('source');
      const urls = source === undefined ? [] : source.kind === 'array' ? source.values : [source];
      for (const url of urls) {
        if (url.kind !== 'string' || !url.value.startsWith('keel:///')) {
          continue;
        }
        const match = MODULE_SOURCE.exec(url.value);
        if (match === null || match[1] === undefined || match[2] === undefined) {
          return failure(DiagnosticKind.CheckFailed, `${key}: malformed source ${url.value}`, resource.location);
        }
        const path = joinPath(context.modules, match[1], 'files', match[2]);
        if (!(await context.reader.exists(path))) {
          return failure(
            DiagnosticKind.CheckFailed,
            `${key}: source ${url.value} not found at ${path}`,
            resource.location,
          );
        }
      }
    }
    return { ok: true, value: undefined };
  },
};
