/**
 * keel parse — Check the syntax of one manifest file
 *
 * Usage:
 *   keel parse <file>
 *
 * Prints the top-level statements with their positions, or the parse
 * error with its location.
 */

import { Command } from 'commander';
import { parse } from '@keel/manifest-dsl';
import { FsSourceReader } from '@keel/runtime-host';
import { formatError, formatStatements } from '../output.js';
import type { CommandContext } from './context.js';
import { processContext } from './context.js';

export async function runParse(file: string, ctx: CommandContext): Promise<number> {
  const { terminal, theme } = ctx;
  let text: string;
  try {
    text = await new FsSourceReader().readText(file);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    terminal.err(theme.error(`Cannot read ${file}: ${reason}`));
    return 1;
  }

  const result = parse(file, text);
  if (!result.ok) {
    terminal.err(formatError(result.error, theme));
    return 1;
  }
  terminal.out(`${file}: ${result.value.length} top-level statements`);
  for (const line of formatStatements(result.value, theme)) terminal.out(line);
  return 0;
}

export const parseCommand = new Command('parse')
  .description('Parse a manifest file and list its top-level statements')
  .argument('<file>', 'Manifest file')
  .action(async (file: string) => {
    process.exitCode = await runParse(file, processContext());
  });
