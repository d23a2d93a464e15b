/**
 * runtime.ts — Wires the runtime-host collaborators into a CatalogCompiler.
 *
 * One Runtime per CLI invocation. Everything persistent (exported resources,
 * compile log) lives under the preferences' state directory.
 */

import type { FactProvider, LogSink } from '@keel/kernel';
import { CatalogCompiler, CompileLogger, fileSourceCheck } from '@keel/kernel';
import { ManifestInterpreter } from '@keel/interpreter';
import type { Preferences, SystemInfo } from '@keel/runtime-host';
import {
  FileExportedStore,
  FileLogSink,
  FileStateIO,
  FsSourceReader,
  SubstitutionTemplateEvaluator,
  factProvider,
} from '@keel/runtime-host';
import { TeeLogSink } from './logging/console-log-sink.js';

export interface Runtime {
  readonly preferences: Preferences;
  readonly compiler: CatalogCompiler;
  readonly store: FileExportedStore;
  readonly reader: FsSourceReader;
  /** Stored facts when the store knows the node, otherwise local ones. */
  readonly facts: FactProvider;
}

export interface RuntimeOptions {
  /** Receives log entries in addition to logs/compile.jsonl. */
  readonly console?: LogSink | undefined;
  /** Stands in for the local machine during fact collection. */
  readonly system?: SystemInfo | undefined;
}

export function buildRuntime(preferences: Preferences, options: RuntimeOptions = {}): Runtime {
  const stateIO = new FileStateIO(preferences.stateDir);
  const reader = new FsSourceReader();
  const store = new FileExportedStore(stateIO);

  const sinks: LogSink[] = [new FileLogSink(stateIO)];
  if (options.console !== undefined) sinks.push(options.console);
  const logger = new CompileLogger(new TeeLogSink(sinks), preferences.logLevel);

  const compiler = new CatalogCompiler({
    paths: {
      manifests: preferences.manifests,
      modules: preferences.modules,
      templates: preferences.templates,
    },
    reader,
    interpreter: new ManifestInterpreter(),
    templates: new SubstitutionTemplateEvaluator(preferences.templates, reader),
    exportedStore: store,
    ignoredModules: preferences.ignoredModules,
    extraChecks: preferences.extraTests ? [fileSourceCheck] : [],
    logger,
  });

  const facts = factProvider({ store, system: options.system });
  return { preferences, compiler, store, reader, facts };
}
