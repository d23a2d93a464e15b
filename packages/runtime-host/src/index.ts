/**
 * @keel/runtime-host
 *
 * Keel runtime host — side-effectful collaborator implementations and state
 * persistence. Depends on @keel/kernel (interfaces); implements concrete
 * platform-specific behavior using Node.js built-ins.
 *
 * The kernel package defines interfaces; this package provides implementations.
 * No kernel code imports from this package.
 */

// Source files
export { FsSourceReader } from './adapters/fs.js';

// Facts
export type { CollectFactsOptions, MemoryInfo, SystemInfo } from './facts/collect-facts.js';
export {
  collectFacts,
  factProvider,
  formatStorage,
  localFacts,
  nodeFacts,
  nodeSystemInfo,
  parseMeminfo,
  parseOsRelease,
} from './facts/collect-facts.js';

// Templates
export { SubstitutionTemplateEvaluator, renderValue, substitute } from './templates/substitution-evaluator.js';

// Logging
export { COMPILE_LOG, FileLogSink } from './logging/file-log-sink.js';
export { ulid } from './logging/ulid.js';

// StateIO — state/ and logs/ I/O abstraction
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO, isNodeError } from './state/state-io.js';

// Exported resources
export type { JsonValue } from './state/exported-store.js';
export { EXPORTED_FILE, FileExportedStore, decodeValue, encodeValue } from './state/exported-store.js';

// Preferences
export type { ConfigFile, PreferenceOptions, Preferences } from './preferences.js';
export { CONFIG_FILE, ConfigurationError, readConfigFile, resolvePreferences } from './preferences.js';
