/**
 * Keel Runtime Host — Filesystem Source Reader
 *
 * Implements the SourceReader interface from @keel/kernel with
 * node:fs/promises. The kernel defines the interface; this package owns the
 * concrete implementation. Kernel code never imports node:fs directly.
 *
 * Both manifest loading and the file-source extra check go through this
 * reader.
 */

import { readFile, stat } from 'node:fs/promises';
import type { SourceReader } from '@keel/kernel';
import { isNodeError } from '../state/state-io.js';

/**
 * Reject paths containing null bytes. They are never valid in file system
 * paths and can bypass OS-level checks on some platforms.
 */
function assertSafePath(path: string): void {
  if (path.includes('\0')) {
    throw new Error(`Invalid path: null byte detected in path: ${JSON.stringify(path)}`);
  }
}

export class FsSourceReader implements SourceReader {
  async readText(path: string): Promise<string> {
    assertSafePath(path);
    return readFile(path, 'utf-8');
  }

  /** True for an existing regular file. Directories do not count. */
  async exists(path: string): Promise<boolean> {
    assertSafePath(path);
    try {
      return (await stat(path)).isFile();
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT') || isNodeError(err, 'ENOTDIR')) {
        return false;
      }
      throw err;
    }
  }
}
