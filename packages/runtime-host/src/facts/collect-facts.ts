/**
 * Keel Runtime Host — Fact Collection
 *
 * Produces the facts of a node for compilation:
 *
 *   1. If an exported-resource store is configured and knows facts for the
 *      node, those facts are used as they are.
 *   2. Otherwise facts are collected from the local machine (memory, OS
 *      release, kernel, hardware, user, address) and the node-derived facts
 *      (fqdn, hostname, domain, clientcert) are layered on top.
 *
 * Local collection goes through the injectable SystemInfo, so tests never
 * depend on the machine they run on. A store that fails to answer is
 * treated like a store without facts for the node.
 */

import { readFile } from 'node:fs/promises';
import { arch, freemem, hostname, networkInterfaces, release, totalmem, type, userInfo } from 'node:os';
import type { ExportedResourceStore, FactProvider, Facts } from '@keel/kernel';
import { isNodeError } from '../state/state-io.js';

// ---------------------------------------------------------------------------
// System information
// ---------------------------------------------------------------------------

export interface MemoryInfo {
  /** All sizes in bytes. */
  readonly total: number;
  readonly free: number;
  readonly swapTotal?: number | undefined;
  readonly swapFree?: number | undefined;
}

/** What fact collection needs from the local machine. */
export interface SystemInfo {
  memory(): Promise<MemoryInfo>;
  /** Contents of /etc/os-release, or undefined where there is none. */
  osRelease(): Promise<string | undefined>;
  /** Kernel name and release, e.g. `Linux` and `6.1.0-18-amd64`. */
  kernel(): { readonly name: string; readonly release: string };
  machine(): string;
  hostname(): string;
  username(): string;
  /** First non-internal IPv4 address. */
  ipv4(): string | undefined;
}

/** SystemInfo backed by node:os, /proc/meminfo and /etc/os-release. */
export const nodeSystemInfo: SystemInfo = {
  async memory() {
    const meminfo = await readOptional('/proc/meminfo');
    const fields = meminfo === undefined ? new Map<string, number>() : parseMeminfo(meminfo);
    return {
      total: fields.get('MemTotal') ?? totalmem(),
      free: fields.get('MemFree') ?? freemem(),
      swapTotal: fields.get('SwapTotal'),
      swapFree: fields.get('SwapFree'),
    };
  },
  osRelease: () => readOptional('/etc/os-release'),
  kernel: () => ({ name: type(), release: release() }),
  machine: () => arch() === 'x64' ? 'x86_64' : arch(),
  hostname: () => hostname(),
  username: () => userInfo().username,
  ipv4() {
    for (const addresses of Object.values(networkInterfaces())) {
      const found = addresses?.find((a) => a.family === 'IPv4' && !a.internal);
      if (found !== undefined) return found.address;
    }
    return undefined;
  },
};

async function readOptional(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) {
      return undefined;
    }
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Parsing and formatting
// ---------------------------------------------------------------------------

const STORAGE_PREFIXES = ['', 'K', 'M', 'G', 'T'];

/**
 * Format a byte count the way memory facts are reported.
 *
 * @example formatStorage(8589934592) // '8.00 GB'
 */
export function formatStorage(bytes: number): string {
  let size = bytes;
  let order = 0;
  while (size > 1024 && order < STORAGE_PREFIXES.length - 1) {
    size /= 1024;
    order++;
  }
  return `${size.toFixed(2)} ${STORAGE_PREFIXES[order] ?? ''}B`;
}

/** `/proc/meminfo` lines (`MemTotal:  16303428 kB`) → field → bytes. */
export function parseMeminfo(text: string): Map<string, number> {
  const fields = new Map<string, number>();
  for (const line of text.split('\n')) {
    const match = /^(\w+):\s+(\d+)(?:\s+kB)?\s*$/.exec(line);
    if (match?.[1] !== undefined && match[2] !== undefined) {
      const factor = line.trimEnd().endsWith('kB') ? 1024 : 1;
      fields.set(match[1], Number(match[2]) * factor);
    }
  }
  return fields;
}

/** `KEY=value` lines of os-release; double-quoted values are unquoted. */
export function parseOsRelease(text: string): Map<string, string> {
  const fields = new Map<string, string>();
  for (const line of text.split('\n')) {
    const eq = line.indexOf('=');
    if (eq <= 0 || line.startsWith('#')) continue;
    const raw = line.slice(eq + 1).trim();
    const value = raw.length >= 2 && raw.startsWith('"') && raw.endsWith('"') ? raw.slice(1, -1) : raw;
    fields.set(line.slice(0, eq).trim(), value);
  }
  return fields;
}

/** Facts derived from the node name. These override local facts. */
export function nodeFacts(node: string): Array<[string, string]> {
  const dot = node.indexOf('.');
  return [
    ['fqdn', node],
    ['hostname', dot < 0 ? node : node.slice(0, dot)],
    ['domain', dot < 0 ? '' : node.slice(dot + 1)],
    ['clientcert', node],
  ];
}

// ---------------------------------------------------------------------------
// Collection
// ---------------------------------------------------------------------------

/** Facts of the local machine, without the node-derived ones. */
export async function localFacts(system: SystemInfo = nodeSystemInfo): Promise<Map<string, string>> {
  const facts = new Map<string, string>();

  const memory = await system.memory();
  facts.set('memorysize', formatStorage(memory.total));
  facts.set('memoryfree', formatStorage(memory.free));
  if (memory.swapTotal !== undefined) facts.set('swapsize', formatStorage(memory.swapTotal));
  if (memory.swapFree !== undefined) facts.set('swapfree', formatStorage(memory.swapFree));

  const osRelease = await system.osRelease();
  const os = osRelease === undefined ? new Map<string, string>() : parseOsRelease(osRelease);
  const distid = os.get('NAME') ?? '?';
  const distrelease = os.get('VERSION_ID') ?? '?';
  facts.set('lsbdistid', distid);
  facts.set('operatingsystem', distid);
  facts.set('osfamily', distid === 'Ubuntu' ? 'Debian' : distid);
  facts.set('lsbdistrelease', distrelease);
  facts.set('operatingsystemrelease', distrelease);
  facts.set('lsbmajdistrelease', distrelease === '?' ? '?' : (distrelease.split('.')[0] ?? distrelease));
  facts.set('lsbdistcodename', os.get('VERSION_CODENAME') ?? '?');
  facts.set('lsbdistdescription', os.get('PRETTY_NAME') ?? '?');

  const kernel = system.kernel();
  const versionParts = (kernel.release.split('-')[0] ?? '').split('.');
  facts.set('kernel', kernel.name);
  facts.set('kernelrelease', kernel.release);
  facts.set('kernelversion', versionParts.slice(0, 3).join('.'));
  facts.set('kernelmajversion', versionParts.slice(0, 2).join('.'));

  facts.set('hardwareisa', system.machine());
  facts.set('hardwaremodel', system.machine());
  facts.set('hostname', system.hostname());
  facts.set('id', system.username());
  facts.set('ipaddress', system.ipv4() ?? '127.0.0.1');
  return facts;
}

export interface CollectFactsOptions {
  readonly store?: ExportedResourceStore | undefined;
  readonly system?: SystemInfo | undefined;
}

/**
 * Collect the facts of `node`: stored facts when the store has any,
 * otherwise local facts overridden by the node-derived ones.
 */
export async function collectFacts(node: string, options: CollectFactsOptions = {}): Promise<Facts> {
  if (options.store !== undefined) {
    const stored = await options.store.getFacts(node);
    if (stored.ok && stored.value.length > 0) {
      return new Map(stored.value);
    }
  }
  const facts = await localFacts(options.system);
  for (const [name, value] of nodeFacts(node)) {
    facts.set(name, value);
  }
  return facts;
}

/** A FactProvider bound to fixed options. */
export function factProvider(options: CollectFactsOptions = {}): FactProvider {
  return (node) => collectFacts(node, options);
}
