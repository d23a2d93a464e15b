/**
 * Keel Runtime Host — StateIO Interface
 *
 * An injectable I/O abstraction for reading/writing JSON state files and
 * appending to JSONL log files under one state directory.
 *
 * Two implementations are provided:
 *   - FileStateIO   — durable file I/O under a state directory
 *   - MemoryStateIO — in-memory I/O for tests and embedded (non-persistent) use
 *
 * The exported-resource store and the compile log sink inject StateIO rather
 * than touching the file system, so both can be tested without a disk.
 */

import { appendFileSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

// ---------------------------------------------------------------------------
// StateIO Interface
// ---------------------------------------------------------------------------

/**
 * I/O for reading, writing, and appending state.
 *
 * All file paths are relative filenames — the implementation resolves them
 * under its root. Callers never construct absolute paths directly.
 *
 * Invariants:
 * - readJson and writeJson address the `state/` subdirectory
 * - appendLine and readLogRaw address the `logs/` subdirectory
 */
export interface StateIO {
  /**
   * Read and parse a JSON file.
   *
   * Returns undefined if the file does not exist. The parsed value is not
   * trusted: callers validate its shape.
   *
   * @param filename - Filename within the state subdirectory (e.g. 'exported.json')
   * @throws SyntaxError if the file exists but is not valid JSON
   */
  readJson(filename: string): unknown;

  /**
   * Serialize a value as JSON and write it, replacing any existing file.
   * Creates the state subdirectory if it does not exist.
   */
  writeJson(filename: string, value: unknown): void;

  /**
   * Append a line to a log file. A newline is added after the content.
   * Creates the logs subdirectory if it does not exist.
   *
   * @param logfilename - Filename within the logs subdirectory (e.g. 'compile.jsonl')
   */
  appendLine(logfilename: string, line: string): void;

  /** Raw text of a log file, or an empty string if it does not exist. */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * Durable file-system StateIO rooted at one directory.
 *
 * Reads and writes JSON state at `<root>/state/<filename>`.
 * Appends log lines to           `<root>/logs/<logfilename>`.
 *
 * Directory creation is on demand. Synchronous I/O matches the CLI's
 * single-process design. ENOENT is recoverable; every other error,
 * including a corrupt JSON file, is rethrown.
 */
export class FileStateIO implements StateIO {
  constructor(readonly root: string) {}

  readJson(filename: string): unknown {
    const filePath = join(this.root, 'state', filename);
    let raw: string;
    try {
      raw = readFileSync(filePath, 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return undefined;
      }
      throw err;
    }
    return JSON.parse(raw);
  }

  writeJson(filename: string, value: unknown): void {
    const subDir = join(this.root, 'state');
    mkdirSync(subDir, { recursive: true });
    writeFileSync(join(subDir, filename), JSON.stringify(value, null, 2), 'utf-8');
  }

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.root, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    try {
      return readFileSync(join(this.root, 'logs', logfilename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return '';
      }
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/**
 * In-memory StateIO. Instances are isolated from each other.
 *
 * State is kept as JSON text so that values round-trip exactly as they
 * would through FileStateIO (undefined fields disappear, and so on).
 */
export class MemoryStateIO implements StateIO {
  private readonly files = new Map<string, string>();
  private readonly logs = new Map<string, string[]>();

  readJson(filename: string): unknown {
    const raw = this.files.get(filename);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  writeJson(filename: string, value: unknown): void {
    this.files.set(filename, JSON.stringify(value));
  }

  /** Store raw text as a state file, e.g. to simulate corruption. */
  writeRaw(filename: string, raw: string): void {
    this.files.set(filename, raw);
  }

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /**
   * All lines appended to a log file. Specific to MemoryStateIO; use it in
   * tests to verify log output without touching the file system.
   */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    if (lines.length === 0) return '';
    // Match FileStateIO: each appendLine call adds 'line\n'
    return lines.join('\n') + '\n';
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** True for a Node.js errno exception with the given code. */
export function isNodeError(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}
