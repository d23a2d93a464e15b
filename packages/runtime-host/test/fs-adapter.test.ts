/**
 * Keel Runtime Host — FsSourceReader Tests
 *
 *   FSR-U1: readText returns file contents
 *   FSR-U2: exists is true for regular files only
 *   FSR-U3: paths containing null bytes are rejected before any I/O
 *
 * Isolation: uses a fresh temp directory.
 */

import { describe, it, expect } from 'vitest';
import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FsSourceReader } from '../src/adapters/fs.js';

function fixture(): string {
  const dir = mkdtempSync(join(tmpdir(), 'keel-fsr-'));
  mkdirSync(join(dir, 'manifests'));
  writeFileSync(join(dir, 'manifests', 'site.pp'), "node default { notify { 'hi': } }\n", 'utf-8');
  return dir;
}

describe('FsSourceReader', () => {
  const reader = new FsSourceReader();

  it('FSR-U1: readText returns file contents', async () => {
    const dir = fixture();
    expect(await reader.readText(join(dir, 'manifests', 'site.pp'))).toBe("node default { notify { 'hi': } }\n");
    await expect(reader.readText(join(dir, 'missing.pp'))).rejects.toThrow(/ENOENT/);
  });

  it('FSR-U2: exists is true for regular files only', async () => {
    const dir = fixture();
    expect(await reader.exists(join(dir, 'manifests', 'site.pp'))).toBe(true);
    expect(await reader.exists(join(dir, 'manifests'))).toBe(false);
    expect(await reader.exists(join(dir, 'missing.pp'))).toBe(false);
    expect(await reader.exists(join(dir, 'manifests', 'site.pp', 'child'))).toBe(false);
  });

  it('FSR-U3: paths containing null bytes are rejected', async () => {
    await expect(reader.exists('/etc/keel\0/site.pp')).rejects.toThrow('Invalid path: null byte detected');
  });
});
