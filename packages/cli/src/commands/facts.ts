/**
 * keel facts — Show the facts a node would be compiled with
 *
 * Usage:
 *   keel facts <node> [--basedir <dir>] [--json]
 */

import { Command } from 'commander';
import { FileExportedStore, FileStateIO, collectFacts } from '@keel/runtime-host';
import { formatFacts } from '../output.js';
import type { CommandContext, PreferenceFlags } from './context.js';
import { loadPreferences, processContext } from './context.js';

export interface FactsFlags extends PreferenceFlags {
  readonly json?: boolean | undefined;
}

export async function runFacts(node: string, flags: FactsFlags, ctx: CommandContext): Promise<number> {
  const preferences = loadPreferences(flags, ctx);
  if (preferences === undefined) return 1;

  const store = new FileExportedStore(new FileStateIO(preferences.stateDir));
  const facts = await collectFacts(node, { store, system: ctx.system });

  if (flags.json === true) {
    const sorted = [...facts].sort(([a], [b]) => a.localeCompare(b));
    ctx.terminal.out(JSON.stringify(Object.fromEntries(sorted), null, 2));
  } else {
    for (const line of formatFacts(facts)) ctx.terminal.out(line);
  }
  return 0;
}

export const factsCommand = new Command('facts')
  .description('Show the facts of a node: stored facts if any, otherwise local ones')
  .argument('<node>', 'Node name')
  .option('--basedir <dir>', 'Base directory holding keel.json and the state directory')
  .option('--json', 'Output as JSON')
  .action(async (node: string, flags: FactsFlags) => {
    process.exitCode = await runFacts(node, flags, processContext());
  });
