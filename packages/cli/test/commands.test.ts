/**
 * Keel CLI — Command Tests
 *
 *   CLI-U1: compile prints the validated catalog with dependencies
 *   CLI-U2: compile --json --stats emits one JSON document
 *   CLI-U3: compile --publish stores exported resources for other nodes to collect
 *   CLI-U4: compile failures are logged to stderr and compile.jsonl, exit code 1
 *   CLI-U5: --extra-tests checks file sources; configuration errors exit 1
 *   CLI-U6: facts prints node-derived and local facts
 *   CLI-U7: parse lists top-level statements or reports the syntax error
 *   CLI-U8: ConsoleLogSink prints `level: message`
 *
 * Isolation: every test builds its own temp base directory, passes an empty
 * environment, a fixed SystemInfo, the plain theme and a captured Terminal.
 */

import { describe, it, expect } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { SystemInfo } from '@keel/runtime-host';
import { FileExportedStore, FileStateIO } from '@keel/runtime-host';
import type { CommandContext } from '../src/commands/context.js';
import { runCompile } from '../src/commands/compile.js';
import { runFacts } from '../src/commands/facts.js';
import { runParse } from '../src/commands/parse.js';
import { ConsoleLogSink } from '../src/logging/console-log-sink.js';
import { plainTheme } from '../src/theme.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const SITE = [
  "node 'web1' {",
  '  include motd',
  "  @@host { 'web1': ip => '10.0.0.5' }",
  '}',
  "node 'db1' {",
  '  Host <<| |>>',
  '}',
  'node default {',
  '  include missing',
  '}',
].join('\n');

const MOTD = [
  'class motd {',
  "  package { 'figlet': }",
  "  file { '/etc/motd':",
  '    content => "Welcome to ${hostname}",',
  "    require => Package['figlet']",
  '  }',
  '}',
].join('\n');

const fixedSystem: SystemInfo = {
  memory: async () => ({ total: 4 * 1024 * 1024 * 1024, free: 1024 * 1024 * 1024 }),
  osRelease: async () => 'NAME="Ubuntu"\nVERSION_ID="24.04"\n',
  kernel: () => ({ name: 'Linux', release: '6.8.0-31-generic' }),
  machine: () => 'x86_64',
  hostname: () => 'buildbox',
  username: () => 'deploy',
  ipv4: () => '10.0.0.9',
};

function basedir(files: Record<string, string>): string {
  const dir = mkdtempSync(join(tmpdir(), 'keel-cli-'));
  for (const [path, text] of Object.entries(files)) {
    mkdirSync(dirname(join(dir, path)), { recursive: true });
    writeFileSync(join(dir, path), text, 'utf-8');
  }
  return dir;
}

function site(): string {
  return basedir({ 'manifests/site.pp': SITE, 'modules/motd/manifests/init.pp': MOTD });
}

interface Captured extends CommandContext {
  readonly stdout: string[];
  readonly stderr: string[];
}

function capture(): Captured {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    terminal: { out: (line) => { stdout.push(line); }, err: (line) => { stderr.push(line); } },
    theme: plainTheme,
    env: {},
    system: fixedSystem,
  };
}

// ---------------------------------------------------------------------------
// compile
// ---------------------------------------------------------------------------

describe('keel compile', () => {
  it('CLI-U1: prints the validated catalog with dependencies', async () => {
    const ctx = capture();
    const code = await runCompile('web1', { basedir: site() }, ctx);

    expect(code).toBe(0);
    expect(ctx.stderr).toEqual([]);
    expect(ctx.stdout).toEqual([
      'Catalog for web1 (2 resources, 1 exported)',
      '  package[figlet]',
      '    ensure => "present"',
      '    name => "figlet"',
      '  file[/etc/motd]',
      '    content => "Welcome to web1"',
      '    ensure => "present"',
      '    path => "/etc/motd"',
      '    require => "Package[figlet]"',
      '    depends on package[figlet]',
      'Exported resources',
      '  host[web1]',
      '    ensure => "present"',
      '    ip => "10.0.0.5"',
      '    name => "web1"',
    ]);
  });

  it('CLI-U2: --json --stats emits one JSON document', async () => {
    const dir = site();
    const ctx = capture();
    const code = await runCompile('web1', { basedir: dir, json: true, stats: true }, ctx);

    expect(code).toBe(0);
    expect(ctx.stdout).toHaveLength(1);
    const doc: unknown = JSON.parse(ctx.stdout[0] ?? '');
    expect(doc).toMatchObject({
      node: 'web1',
      edges: { 'file[/etc/motd]': ['package[figlet]'] },
      exported: [
        {
          type: 'host',
          title: 'web1',
          attributes: { ip: '10.0.0.5', ensure: 'present', name: 'web1' },
          scope: [],
        },
      ],
      warnings: [],
      stats: {
        parsing: {
          [join(dir, 'manifests', 'site.pp')]: { count: 1 },
          [join(dir, 'modules', 'motd', 'manifests', 'init.pp')]: { count: 1 },
        },
        catalog: { web1: { count: 1 } },
        templates: {},
      },
    });
  });

  it('CLI-U3: --publish stores exported resources for other nodes to collect', async () => {
    const dir = site();
    const web = capture();
    expect(await runCompile('web1', { basedir: dir, publish: true }, web)).toBe(0);
    expect(web.stderr).toEqual(['Published 1 exported resources for web1']);

    const store = new FileExportedStore(new FileStateIO(dir));
    const facts = await store.getFacts('web1');
    expect(facts.ok && new Map(facts.value).get('fqdn')).toBe('web1');

    const db = capture();
    expect(await runCompile('db1', { basedir: dir }, db)).toBe(0);
    expect(db.stdout).toEqual([
      'Catalog for db1 (1 resources, 0 exported)',
      '  host[web1]',
      '    ensure => "present"',
      '    ip => "10.0.0.5"',
      '    name => "web1"',
    ]);
  });

  it('CLI-U4: failures are logged to stderr and compile.jsonl, exit code 1', async () => {
    const dir = site();
    const ctx = capture();
    const code = await runCompile('other', { basedir: dir }, ctx);

    const sitePath = join(dir, 'manifests', 'site.pp');
    expect(code).toBe(1);
    expect(ctx.stdout).toEqual([]);
    expect(ctx.stderr).toEqual([`error: InterpreterError: Unknown class missing (at ${sitePath}:9:3)`]);

    const lines = readFileSync(join(dir, 'logs', 'compile.jsonl'), 'utf-8').trimEnd().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({
      level: 'error',
      node: 'other',
      message: `InterpreterError: Unknown class missing (at ${sitePath}:9:3)`,
    });
  });

  it('CLI-U4b: debug logging shows the query and the compiled resource count', async () => {
    const ctx = capture();
    expect(await runCompile('web1', { basedir: site(), logLevel: 'debug' }, ctx)).toBe(0);
    expect(ctx.stderr).toEqual(['debug: Received query for node', 'info: Compiled 2 resources']);
  });

  it('CLI-U5: --extra-tests fails on a missing module file source', async () => {
    const dir = basedir({
      'manifests/site.pp': "node default { file { '/etc/issue': source => 'keel:///modules/motd/issue' } }",
    });
    const relaxed = capture();
    expect(await runCompile('web1', { basedir: dir }, relaxed)).toBe(0);

    const strict = capture();
    expect(await runCompile('web1', { basedir: dir, extraTests: true }, strict)).toBe(1);
    expect(strict.stderr).toHaveLength(1);
    expect(strict.stderr[0]).toMatch(
      `error: CheckFailed: file[/etc/issue]: source keel:///modules/motd/issue not found at ${join(dir, 'modules', 'motd', 'files', 'issue')}`,
    );
  });

  it('CLI-U5b: configuration errors are printed and exit 1', async () => {
    const dir = basedir({ 'keel.json': '{ "logLevel": "loud" }' });
    const ctx = capture();
    expect(await runCompile('web1', { basedir: dir }, ctx)).toBe(1);
    expect(ctx.stderr).toEqual([
      `ConfigurationError: ${join(dir, 'keel.json')}: logLevel must be one of debug, info, warning, error`,
    ]);

    const flag = capture();
    expect(await runCompile('web1', { basedir: site(), logLevel: 'chatty' }, flag)).toBe(1);
    expect(flag.stderr).toEqual(['Unknown log level chatty (expected debug, info, warning or error)']);
  });
});

// ---------------------------------------------------------------------------
// facts and parse
// ---------------------------------------------------------------------------

describe('keel facts', () => {
  it('CLI-U6: prints node-derived and local facts', async () => {
    const ctx = capture();
    expect(await runFacts('web1.example.com', { basedir: basedir({}), json: true }, ctx)).toBe(0);
    const facts: unknown = JSON.parse(ctx.stdout.join('\n'));
    expect(facts).toMatchObject({
      fqdn: 'web1.example.com',
      hostname: 'web1',
      domain: 'example.com',
      clientcert: 'web1.example.com',
      osfamily: 'Debian',
      memorysize: '4.00 GB',
      kernelversion: '6.8.0',
    });

    const text = capture();
    await runFacts('web1.example.com', { basedir: basedir({}) }, text);
    expect(text.stdout).toContain('domain => example.com');
    expect(text.stdout[0]).toBe('clientcert => web1.example.com');
  });
});

describe('keel parse', () => {
  it('CLI-U7: lists top-level statements', async () => {
    const dir = basedir({ 'site.pp': "class motd { }\nnode 'web1', default { }\n@@host { 'h': }" });
    const file = join(dir, 'site.pp');
    const ctx = capture();

    expect(await runParse(file, ctx)).toBe(0);
    expect(ctx.stdout).toEqual([
      `${file}: 3 top-level statements`,
      '1:1  class motd',
      "2:1  node 'web1', default",
      '3:3  @@host resource',
    ]);
  });

  it('CLI-U7b: reports syntax errors and unreadable files', async () => {
    const dir = basedir({ 'broken.pp': "file { 'abc" });
    const file = join(dir, 'broken.pp');
    const ctx = capture();

    expect(await runParse(file, ctx)).toBe(1);
    expect(ctx.stderr).toEqual([`ParseError: Unterminated string (at ${file}:1:8)`]);

    const missing = capture();
    expect(await runParse(join(dir, 'nope.pp'), missing)).toBe(1);
    expect(missing.stderr[0]).toMatch(/^Cannot read .*nope\.pp: ENOENT/);
  });
});

describe('ConsoleLogSink', () => {
  it('CLI-U8: prints `level: message`', () => {
    const lines: string[] = [];
    const sink = new ConsoleLogSink((line) => { lines.push(line); }, plainTheme);
    sink.append({ timestamp: '2024-05-01T00:00:00.000Z', level: 'warning', node: 'web1', message: 'web1: careful' });
    expect(lines).toEqual(['warning: web1: careful']);
  });
});
