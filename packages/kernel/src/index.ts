/**
 * @keel/kernel
 *
 * Keel compilation kernel — resource model, validator combinators, type
 * registry, compute cache, measurement, catalog assembly, the catalog
 * compiler, and collaborator interfaces.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net, or any other I/O API. node:path is used for
 * path arithmetic only.
 *
 * Concrete collaborators (file access, fact collection, log persistence)
 * live in @keel/runtime-host; the reference interpreter lives in
 * @keel/interpreter.
 */

// Types
export type { Catalog, Facts } from './types/catalog.js';
export type { Resource, ResourceIdentity, ResourceInit } from './types/resource.js';
export {
  BACKWARD_RELATIONSHIPS,
  FORWARD_RELATIONSHIPS,
  METAPARAMETERS,
  createResource,
  formatReference,
  parseReference,
  resourceKey,
  withAttribute,
  withTitle,
} from './types/resource.js';

// Collaborator interfaces (implementations live in runtime-host and interpreter)
export type {
  ExportedResourceStore,
  FactProvider,
  HierarchicalLookup,
  Interpreter,
  InterpreterOutput,
  InterpreterRequest,
  InterpreterServices,
  ResourceQuery,
  Scope,
  SourceReader,
  TemplateEvaluator,
  TemplateRenderer,
  TemplateSource,
  UnitLoader,
} from './adapters/index.js';
export { noopLookup } from './adapters/index.js';

// Validation
export type { ParameterRules, ParameterValidator, Validator } from './validation/combinators.js';
export {
  chain,
  defaultvalue,
  fullyQualified,
  fullyQualifieds,
  inrange,
  integer,
  integers,
  ipaddr,
  isIPv4,
  mandatory,
  mandatoryIfNotAbsent,
  nameval,
  noTrailingSlash,
  parameterFunctions,
  rarray,
  string,
  strings,
  validateSourceOrContent,
  values,
} from './validation/combinators.js';
export type { TypeMethods } from './validation/pipeline.js';
export { defaultType, defaultValidate, fakeType, typeMethods } from './validation/pipeline.js';
export { TypeRegistry } from './registry/type-registry.js';
export { NATIVE_TYPES, createNativeRegistry } from './registry/native-types.js';

// Caching, measurement, concurrency
export { ComputeCache } from './cache/compute-cache.js';
export type { ComputeCacheStats } from './cache/compute-cache.js';
export type { Clock, CompilerStats, Sample, SampleSummary } from './stats/stats-store.js';
export { StatsStore, createCompilerStats, measure } from './stats/stats-store.js';
export { SerialQueue } from './concurrency/serial-queue.js';
export { TemplateService, unavailableTemplates } from './services/template-service.js';

// Catalog assembly and compilation
export type { EdgeMap } from './catalog/edges.js';
export { buildEdges } from './catalog/edges.js';
export { assembleCatalog } from './catalog/builder.js';
export type { CatalogCheck, CheckContext } from './catalog/checks.js';
export { fileSourceCheck } from './catalog/checks.js';
export type { CompilerPaths } from './compiler/paths.js';
export { joinPath, moduleOf, resolveUnitPath } from './compiler/paths.js';
export { selectStatement } from './compiler/select.js';
export type { CompilerOptions } from './compiler/catalog-compiler.js';
export { CatalogCompiler } from './compiler/catalog-compiler.js';

// Logging (sinks live in runtime-host and cli)
export type { LogEntry, LogLevel, LogSink } from './logging/log-sink.js';
export { LOG_LEVELS, isLogLevel } from './logging/log-sink.js';
export { CompileLogger } from './logging/compile-logger.js';
