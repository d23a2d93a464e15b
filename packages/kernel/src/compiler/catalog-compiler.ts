/**
 * Keel Kernel — Catalog Compiler
 *
 * The per-node orchestrator: parse → interpret → validate → assemble.
 *
 * For each compile(node, facts):
 *   1. the node unit (<manifests>/site.pp) is loaded through the parse cache
 *      and the node block for `node` (or `default`) selected
 *   2. the interpreter evaluates it, loading further class and define units
 *      through the same cache
 *   3. every declared resource goes through the type registry; resources
 *      collected from other nodes are admitted as they are
 *   4. the catalog is assembled (duplicates, exported partition, edges)
 *   5. configured extra checks run on the assembled catalog
 *
 * Compiler guarantees:
 * - The first failure aborts the compilation; the caller receives exactly
 *   one diagnostic and never a partial catalog
 * - Collaborators that throw are converted to diagnostics; a failing log
 *   sink never changes the outcome (see CompileLogger)
 * - Each file is read and parsed at most once per compiler, however many
 *   compilations request it concurrently (ComputeCache keyed by absolute path)
 * - Every parse is measured in `stats.parsing` under its path, every
 *   compilation in `stats.catalog` under the node name
 * - No retry: retry policy belongs to the caller
 */

import { posix } from 'node:path';
import type { Result, Statement, TopLevelKind, TopLevelStatement } from '@keel/manifest-dsl';
import { DiagnosticKind, failure, formatDiagnostic, parse } from '@keel/manifest-dsl';
import type {
  ExportedResourceStore,
  HierarchicalLookup,
  Interpreter,
  InterpreterOutput,
  InterpreterServices,
  SourceReader,
  TemplateEvaluator,
} from '../adapters/index.js';
import { noopLookup } from '../adapters/index.js';
import { ComputeCache } from '../cache/compute-cache.js';
import type { ComputeCacheStats } from '../cache/compute-cache.js';
import { assembleCatalog } from '../catalog/builder.js';
import type { CatalogCheck } from '../catalog/checks.js';
import { CompileLogger } from '../logging/compile-logger.js';
import { createNativeRegistry } from '../registry/native-types.js';
import type { TypeRegistry } from '../registry/type-registry.js';
import { TemplateService, unavailableTemplates } from '../services/template-service.js';
import type { Clock, CompilerStats } from '../stats/stats-store.js';
import { createCompilerStats, measure } from '../stats/stats-store.js';
import type { Catalog, Facts } from '../types/catalog.js';
import type { Resource } from '../types/resource.js';
import type { CompilerPaths } from './paths.js';
import { resolveUnitPath } from './paths.js';
import { selectStatement } from './select.js';

export interface CompilerOptions {
  readonly paths: CompilerPaths;
  readonly reader: SourceReader;
  readonly interpreter: Interpreter;
  /** Defaults to the native type registry. */
  readonly registry?: TypeRegistry | undefined;
  /** Defaults to an evaluator that rejects every template. */
  readonly templates?: TemplateEvaluator | undefined;
  /** Defaults to noopLookup. */
  readonly lookup?: HierarchicalLookup | undefined;
  readonly exportedStore?: ExportedResourceStore | undefined;
  readonly ignoredModules?: ReadonlySet<string> | undefined;
  /** Run after assembly; any failure fails the compilation. */
  readonly extraChecks?: ReadonlyArray<CatalogCheck> | undefined;
  readonly logger?: CompileLogger | undefined;
  readonly clock?: Clock | undefined;
}

type ParsedFile = ReadonlyArray<Statement>;

export class CatalogCompiler {
  readonly stats: CompilerStats;
  readonly paths: CompilerPaths;

  private readonly cache = new ComputeCache<string, ParsedFile>();
  private readonly registry: TypeRegistry;
  private readonly services: InterpreterServices;
  private readonly logger: CompileLogger;

  constructor(private readonly options: CompilerOptions) {
    this.paths = {
      manifests: posix.resolve(options.paths.manifests),
      modules: posix.resolve(options.paths.modules),
      templates: posix.resolve(options.paths.templates),
    };
    this.stats = createCompilerStats(options.clock);
    this.registry = options.registry ?? createNativeRegistry();
    this.logger = options.logger ?? new CompileLogger();
    this.services = {
      templates: new TemplateService(options.templates ?? unavailableTemplates, this.stats.templates),
      lookup: options.lookup ?? noopLookup,
      exportedStore: options.exportedStore,
      ignoredModules: options.ignoredModules ?? new Set(),
    };
  }

  /**
   * Compile the catalog of one node.
   *
   * @param node - Node name, matched against `node` blocks in site.pp
   * @param facts - Facts about the node, visible as top-scope variables
   */
  async compile(node: string, facts: Facts): Promise<Result<Catalog>> {
    this.logger.debug(node, 'Received query for node');
    const result = await measure(this.stats.catalog, node, () => this.run(node, facts));
    if (result.ok) {
      this.logger.info(node, `Compiled ${result.value.resources.size} resources`);
    } else {
      this.logger.error(node, formatDiagnostic(result.error));
    }
    return result;
  }

  /** Parse a manifest file through the cache. */
  parseFile(path: string): Promise<Result<ParsedFile>> {
    return this.cache.get(path, () =>
      measure(this.stats.parsing, path, async () => {
        let text: string;
        try {
          text = await this.options.reader.readText(path);
        } catch (err: unknown) {
          const reason = err instanceof Error ? err.message : String(err);
          return failure<ParsedFile>(DiagnosticKind.ParseError, `Cannot read ${path}: ${reason}`);
        }
        return parse(path, text);
      }),
    );
  }

  /**
   * Load a class, define or node unit. Resolves to `undefined` when the
   * unit's file does not exist, so that callers can tell a missing unit
   * from a broken one.
   */
  async loadUnit(kind: TopLevelKind, name: string): Promise<Result<TopLevelStatement | undefined>> {
    const path = resolveUnitPath(this.paths, kind, name);
    if (!path.ok) {
      return path;
    }
    if (!this.cache.has(path.value)) {
      const found = await this.exists(path.value);
      if (!found.ok || !found.value) {
        return found.ok ? { ok: true, value: undefined } : found;
      }
    }
    const statements = await this.parseFile(path.value);
    if (!statements.ok) {
      return statements;
    }
    return selectStatement(statements.value, kind, name, path.value);
  }

  cacheStats(): ComputeCacheStats {
    return this.cache.stats();
  }

  // -------------------------------------------------------------------------

  private async run(node: string, facts: Facts): Promise<Result<Catalog>> {
    const unit = await this.loadUnit('node', node);
    if (!unit.ok) {
      return unit;
    }
    if (unit.value?.kind !== 'node') {
      const site = resolveUnitPath(this.paths, 'node', node);
      return failure(DiagnosticKind.ParseError, `Cannot read ${site.ok ? site.value : 'site manifest'}: file not found`);
    }

    const output = await this.interpret(node, facts, unit.value);
    if (!output.ok) {
      return output;
    }
    for (const warning of output.value.warnings) {
      this.logger.warning(node, `${node}: ${warning}`);
    }

    const validated: Resource[] = [];
    for (const resource of output.value.resources) {
      const result = this.registry.validate(resource);
      if (!result.ok) {
        return result;
      }
      validated.push(result.value);
    }

    const catalog = assembleCatalog(node, [...validated, ...(output.value.collected ?? [])], output.value.warnings);
    if (!catalog.ok) {
      return catalog;
    }
    const checked = await this.runChecks(catalog.value);
    return checked.ok ? catalog : checked;
  }

  private async exists(path: string): Promise<Result<boolean>> {
    try {
      return { ok: true, value: await this.options.reader.exists(path) };
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      return failure(DiagnosticKind.ParseError, `Cannot read ${path}: ${reason}`);
    }
  }

  private async interpret(
    node: string,
    facts: Facts,
    unit: Extract<TopLevelStatement, { kind: 'node' }>,
  ): Promise<Result<InterpreterOutput>> {
    try {
      return await this.options.interpreter.interpret({
        node,
        facts,
        unit,
        loadUnit: (kind, name) => this.loadUnit(kind, name),
        services: this.services,
      });
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      return failure(DiagnosticKind.InterpreterError, `Interpreter failed for ${node}: ${reason}`);
    }
  }

  private async runChecks(catalog: Catalog): Promise<Result<void>> {
    const context = { modules: this.paths.modules, reader: this.options.reader };
    for (const check of this.options.extraChecks ?? []) {
      let result: Result<void>;
      try {
        result = await check.run(catalog, context);
      } catch (err: unknown) {
        const reason = err instanceof Error ? err.message : String(err);
        result = failure(DiagnosticKind.CheckFailed, `Check ${check.name} failed: ${reason}`);
      }
      if (!result.ok) {
        return result;
      }
    }
    return { ok: true, value: undefined };
  }
}
