/**
 * Keel Runtime Host — File-backed Compile Log Sink
 *
 * Implements the kernel's LogSink by appending one JSONL line per entry to
 * `logs/compile.jsonl` through the injected StateIO:
 *
 *   {"event_id":"01J…","timestamp":"…","level":"warning","node":"web1","message":"…"}
 *
 * The write completes before append() returns.
 */

import type { LogEntry, LogSink } from '@keel/kernel';
import type { StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

export const COMPILE_LOG = 'compile.jsonl';

export class FileLogSink implements LogSink {
  constructor(
    private readonly stateIO: StateIO,
    private readonly filename: string = COMPILE_LOG,
  ) {}

  append(entry: LogEntry): void {
    const line = JSON.stringify({
      event_id: ulid(),
      timestamp: entry.timestamp,
      level: entry.level,
      node: entry.node,
      message: entry.message,
    });
    this.stateIO.appendLine(this.filename, line);
  }
}
