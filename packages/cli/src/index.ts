/**
 * @keel/cli
 *
 * Keel CLI — operator command-line interface
 *
 * Usage:
 *   keel --help
 *   keel compile <node> [--basedir <dir>] [--json] [--stats] [--extra-tests] [--publish]
 *   keel facts <node> [--basedir <dir>] [--json]
 *   keel parse <file>
 *
 * The run* functions behind each command are exported for embedding and
 * tests; they take a CommandContext and return the exit code.
 */

export { program } from './commands/index.js';
export type { CommandContext, PreferenceFlags } from './commands/context.js';
export { loadPreferences, processContext } from './commands/context.js';
export type { CompileFlags } from './commands/compile.js';
export { runCompile } from './commands/compile.js';
export type { FactsFlags } from './commands/facts.js';
export { runFacts } from './commands/facts.js';
export { runParse } from './commands/parse.js';
export type { Runtime, RuntimeOptions } from './runtime.js';
export { buildRuntime } from './runtime.js';
export { ConsoleLogSink, TeeLogSink } from './logging/console-log-sink.js';
export type { Terminal } from './output.js';
export { catalogJson, describeStatement, formatCatalog, formatFacts, formatStats, processTerminal } from './output.js';
export type { Theme } from './theme.js';
export { createTheme, defaultTheme, plainTheme } from './theme.js';
