/**
 * context.ts — What a command needs from its surroundings.
 *
 * Commander actions run with processContext(); tests pass a captured
 * Terminal, the plain theme, an explicit environment and a fixed SystemInfo.
 */

import type { LogLevel } from '@keel/kernel';
import { isLogLevel } from '@keel/kernel';
import type { Preferences, SystemInfo } from '@keel/runtime-host';
import { ConfigurationError, resolvePreferences } from '@keel/runtime-host';
import type { Terminal } from '../output.js';
import { processTerminal } from '../output.js';
import type { Theme } from '../theme.js';
import { defaultTheme } from '../theme.js';

export interface CommandContext {
  readonly terminal: Terminal;
  readonly theme: Theme;
  readonly env: NodeJS.ProcessEnv;
  readonly system?: SystemInfo | undefined;
}

export function processContext(): CommandContext {
  return { terminal: processTerminal, theme: defaultTheme, env: process.env };
}

/** Options shared by every command that reads preferences. */
export interface PreferenceFlags {
  readonly basedir?: string | undefined;
  readonly logLevel?: string | undefined;
  readonly extraTests?: boolean | undefined;
}

/**
 * Resolve preferences from flags, environment and keel.json. Configuration
 * problems are printed and yield undefined; the caller exits with 1.
 */
export function loadPreferences(flags: PreferenceFlags, ctx: CommandContext): Preferences | undefined {
  let logLevel: LogLevel | undefined;
  if (flags.logLevel !== undefined) {
    if (!isLogLevel(flags.logLevel)) {
      ctx.terminal.err(ctx.theme.error(`Unknown log level ${flags.logLevel} (expected debug, info, warning or error)`));
      return undefined;
    }
    logLevel = flags.logLevel;
  }
  try {
    return resolvePreferences({ basedir: flags.basedir, logLevel, extraTests: flags.extraTests }, ctx.env);
  } catch (err: unknown) {
    if (err instanceof ConfigurationError) {
      ctx.terminal.err(ctx.theme.error(`${err.name}: ${err.message}`));
      return undefined;
    }
    throw err;
  }
}
