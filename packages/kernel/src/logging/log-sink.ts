/**
 * Keel Kernel — Log Sink Interface
 *
 * Defines the injection point for compilation log persistence.
 *
 * The kernel owns the contract (this interface) and the CompileLogger class.
 * Concrete sinks live in the runtime host (JSONL file) and the CLI
 * (console), and are injected at construction time. The kernel never writes
 * to disk or to a terminal directly.
 */

/** Severity, lowest first. */
export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

export const LOG_LEVELS: ReadonlyArray<LogLevel> = ['debug', 'info', 'warning', 'error'];

export interface LogEntry {
  /** ISO-8601 timestamp. */
  readonly timestamp: string;
  readonly level: LogLevel;
  /** Node whose compilation produced the entry. */
  readonly node: string;
  readonly message: string;
}

/**
 * A sink that receives log entries.
 *
 * append() is synchronous: the entry is handed over before the logger
 * returns. Implementations must not silently discard entries.
 */
export interface LogSink {
  append(entry: LogEntry): void;
}

/** Type guard for level names read from configuration. */
export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
