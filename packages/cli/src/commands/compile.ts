/**
 * keel compile — Compile the catalog of one node
 *
 * Usage:
 *   keel compile <node> [--basedir <dir>] [--json] [--stats] [--extra-tests] [--publish]
 *
 * Facts come from the exported resource store when it knows the node,
 * otherwise from the local machine. On success the catalog is printed to
 * stdout; log entries go to stderr and to logs/compile.jsonl. With
 * --publish, the node's facts and exported resources are written to the
 * store for other nodes to collect.
 */

import { Command } from 'commander';
import { ConsoleLogSink } from '../logging/console-log-sink.js';
import { catalogJson, formatCatalog, formatError, formatStats, statsJson } from '../output.js';
import { buildRuntime } from '../runtime.js';
import type { CommandContext, PreferenceFlags } from './context.js';
import { loadPreferences, processContext } from './context.js';

export interface CompileFlags extends PreferenceFlags {
  readonly json?: boolean | undefined;
  readonly stats?: boolean | undefined;
  readonly publish?: boolean | undefined;
}

/** @returns the process exit code */
export async function runCompile(node: string, flags: CompileFlags, ctx: CommandContext): Promise<number> {
  const preferences = loadPreferences(flags, ctx);
  if (preferences === undefined) return 1;

  const { terminal, theme } = ctx;
  const runtime = buildRuntime(preferences, {
    console: new ConsoleLogSink((line) => terminal.err(line), theme),
    system: ctx.system,
  });

  const facts = await runtime.facts(node);
  const result = await runtime.compiler.compile(node, facts);
  if (!result.ok) {
    // Already reported through the compiler's logger.
    return 1;
  }
  const catalog = result.value;

  if (flags.json === true) {
    const json = flags.stats === true ? { ...catalogJson(catalog), stats: statsJson(runtime.compiler.stats) } : catalogJson(catalog);
    terminal.out(JSON.stringify(json, null, 2));
  } else {
    for (const line of formatCatalog(catalog, theme)) terminal.out(line);
    if (flags.stats === true) {
      for (const line of formatStats(runtime.compiler.stats, theme)) terminal.out(line);
    }
  }

  if (flags.publish === true) {
    const recorded = await runtime.store.recordFacts(node, facts);
    const published = recorded.ok ? await runtime.store.publish(node, [...catalog.exported.values()]) : recorded;
    if (!published.ok) {
      terminal.err(formatError(published.error, theme));
      return 1;
    }
    terminal.err(theme.ok(`Published ${catalog.exported.size} exported resources for ${node}`));
  }
  return 0;
}

export const compileCommand = new Command('compile')
  .description('Compile the catalog of a node')
  .argument('<node>', 'Node name, matched against node blocks in site.pp')
  .option('--basedir <dir>', 'Base directory holding keel.json, manifests/ and modules/')
  .option('--log-level <level>', 'Minimum log level: debug, info, warning or error')
  .option('--json', 'Output the catalog as JSON')
  .option('--stats', 'Print parse, compile and template timings')
  .option('--extra-tests', 'Run extra catalog checks (file sources)')
  .option('--publish', 'Store the node facts and exported resources for other nodes')
  .action(async (node: string, flags: CompileFlags) => {
    process.exitCode = await runCompile(node, flags, processContext());
  });
