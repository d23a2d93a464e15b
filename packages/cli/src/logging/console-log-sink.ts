/**
 * Console and fan-out log sinks for the CLI.
 *
 * ConsoleLogSink prints `level: message` with the level colored; the CLI
 * points it at stderr so catalog output on stdout stays machine-readable.
 */

import type { LogEntry, LogSink } from '@keel/kernel';
import type { Theme } from '../theme.js';
import { levelColor } from '../theme.js';

export class ConsoleLogSink implements LogSink {
  constructor(
    private readonly write: (line: string) => void,
    private readonly theme: Theme,
  ) {}

  append(entry: LogEntry): void {
    this.write(`${levelColor(this.theme, entry.level)(entry.level)}: ${entry.message}`);
  }
}

/** Hands every entry to each sink, in order. */
export class TeeLogSink implements LogSink {
  constructor(private readonly sinks: ReadonlyArray<LogSink>) {}

  append(entry: LogEntry): void {
    for (const sink of this.sinks) {
      sink.append(entry);
    }
  }
}
