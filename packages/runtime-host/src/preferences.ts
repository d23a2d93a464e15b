/**
 * Keel Runtime Host — Preferences Resolution
 *
 * Resolves the compiler preferences with the following precedence, per
 * setting:
 *
 *   1. Explicit option (e.g. from a --basedir or --extra-tests CLI flag)
 *   2. Environment variable (KEEL_BASEDIR, KEEL_LOG_LEVEL, KEEL_EXTRA_TESTS)
 *   3. `<basedir>/keel.json`
 *   4. Defaults
 *
 * Layout under the base directory, unless keel.json says otherwise:
 *
 *   <basedir>/
 *     keel.json
 *     manifests/site.pp
 *     modules/<module>/manifests/…
 *     modules/<module>/files/…
 *     templates/
 *     state/exported.json
 *     logs/compile.jsonl
 *
 * Relative paths in keel.json are resolved against the base directory.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { LogLevel } from '@keel/kernel';
import { isLogLevel } from '@keel/kernel';
import { isNodeError } from './state/state-io.js';

export const CONFIG_FILE = 'keel.json';

/** Thrown when keel.json or an environment variable cannot be used. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export interface Preferences {
  readonly basedir: string;
  readonly manifests: string;
  readonly modules: string;
  readonly templates: string;
  /** Root of the state/ and logs/ directories. */
  readonly stateDir: string;
  readonly logLevel: LogLevel;
  readonly extraTests: boolean;
  readonly ignoredModules: ReadonlySet<string>;
}

export interface PreferenceOptions {
  readonly basedir?: string | undefined;
  readonly logLevel?: LogLevel | undefined;
  readonly extraTests?: boolean | undefined;
}

/** The settings keel.json may carry. */
export interface ConfigFile {
  manifests?: string | undefined;
  modules?: string | undefined;
  templates?: string | undefined;
  stateDir?: string | undefined;
  logLevel?: LogLevel | undefined;
  extraTests?: boolean | undefined;
  ignoredModules?: ReadonlyArray<string> | undefined;
}

// ---------------------------------------------------------------------------
// Primary Resolution Function
// ---------------------------------------------------------------------------

/**
 * Resolve the preferences.
 *
 * @param env - Environment to read KEEL_* variables from
 * @throws ConfigurationError if keel.json is unreadable or malformed, or an
 *   environment variable holds an unusable value
 */
export function resolvePreferences(
  opts: PreferenceOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): Preferences {
  const basedir = resolve(nonEmpty(opts.basedir) ?? nonEmpty(env['KEEL_BASEDIR']) ?? '.');
  const config = readConfigFile(resolve(basedir, CONFIG_FILE));
  const within = (path: string | undefined, fallback: string): string => resolve(basedir, path ?? fallback);

  return {
    basedir,
    manifests: within(config.manifests, 'manifests'),
    modules: within(config.modules, 'modules'),
    templates: within(config.templates, 'templates'),
    stateDir: within(config.stateDir, '.'),
    logLevel: opts.logLevel ?? envLogLevel(env['KEEL_LOG_LEVEL']) ?? config.logLevel ?? 'warning',
    extraTests: opts.extraTests ?? envFlag(env['KEEL_EXTRA_TESTS']) ?? config.extraTests ?? false,
    ignoredModules: new Set(config.ignoredModules ?? []),
  };
}

// ---------------------------------------------------------------------------
// Config File
// ---------------------------------------------------------------------------

/** Parse keel.json. A missing file is an empty configuration. */
export function readConfigFile(path: string): ConfigFile {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) {
      return {};
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Cannot read ${path}: ${reason}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Invalid JSON in ${path}: ${reason}`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(`${path}: expected a JSON object`);
  }

  const config: ConfigFile = {};
  const entries: Array<[string, unknown]> = Object.entries(parsed);
  for (const [key, value] of entries) {
    switch (key) {
      case 'manifests':
      case 'modules':
      case 'templates':
      case 'stateDir':
        if (typeof value !== 'string' || value === '') {
          throw new ConfigurationError(`${path}: ${key} must be a non-empty string`);
        }
        config[key] = value;
        break;
      case 'logLevel':
        if (typeof value !== 'string' || !isLogLevel(value)) {
          throw new ConfigurationError(`${path}: logLevel must be one of debug, info, warning, error`);
        }
        config.logLevel = value;
        break;
      case 'extraTests':
        if (typeof value !== 'boolean') {
          throw new ConfigurationError(`${path}: extraTests must be a boolean`);
        }
        config.extraTests = value;
        break;
      case 'ignoredModules':
        if (!Array.isArray(value) || !value.every((m): m is string => typeof m === 'string')) {
          throw new ConfigurationError(`${path}: ignoredModules must be an array of strings`);
        }
        config.ignoredModules = value;
        break;
      default:
        throw new ConfigurationError(`${path}: unknown setting ${key}`);
    }
  }
  return config;
}

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

function envLogLevel(value: string | undefined): LogLevel | undefined {
  const level = nonEmpty(value);
  if (level === undefined) return undefined;
  if (!isLogLevel(level)) {
    throw new ConfigurationError(`KEEL_LOG_LEVEL must be one of debug, info, warning, error (got ${level})`);
  }
  return level;
}

function envFlag(value: string | undefined): boolean | undefined {
  switch (nonEmpty(value)?.toLowerCase()) {
    case undefined:
      return undefined;
    case '1':
    case 'true':
    case 'yes':
      return true;
    case '0':
    case 'false':
    case 'no':
      return false;
    default:
      throw new ConfigurationError(`KEEL_EXTRA_TESTS must be true or false (got ${value ?? ''})`);
  }
}
