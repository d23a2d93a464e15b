/**
 * Keel Kernel — Compile Logger
 *
 * Filters entries by level and forwards the rest to an injected LogSink.
 * If no sink is injected (tests, embedded use), every call is a no-op.
 * A sink that throws loses the entry; the failure is counted in
 * `droppedEntries` and never reaches the caller.
 */

import type { LogEntry, LogLevel, LogSink } from './log-sink.js';
import { LOG_LEVELS } from './log-sink.js';

export class CompileLogger {
  private readonly threshold: number;
  private dropped = 0;

  /**
   * @param sink - Destination for entries at or above `level`
   * @param level - Minimum level forwarded to the sink
   * @param now - Timestamp source, injectable for tests
   */
  constructor(
    private readonly sink?: LogSink,
    readonly level: LogLevel = 'warning',
    private readonly now: () => Date = () => new Date(),
  ) {
    this.threshold = LOG_LEVELS.indexOf(level);
  }

  /** True when an entry at `level` would reach the sink. */
  enabled(level: LogLevel): boolean {
    return this.sink !== undefined && LOG_LEVELS.indexOf(level) >= this.threshold;
  }

  log(level: LogLevel, node: string, message: string): void {
    if (this.sink === undefined || !this.enabled(level)) {
      return;
    }
    const entry: LogEntry = { timestamp: this.now().toISOString(), level, node, message };
    try {
      this.sink.append(entry);
    } catch {
      this.dropped += 1;
    }
  }

  /** Entries lost because the sink threw. */
  get droppedEntries(): number {
    return this.dropped;
  }

  debug(node: string, message: string): void {
    this.log('debug', node, message);
  }

  info(node: string, message: string): void {
    this.log('info', node, message);
  }

  warning(node: string, message: string): void {
    this.log('warning', node, message);
  }

  error(node: string, message: string): void {
    this.log('error', node, message);
  }
}
