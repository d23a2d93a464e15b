/**
 * Keel Runtime Host — Preferences Resolution Tests
 *
 *   PREF-U1: defaults lay everything out under the base directory
 *   PREF-U2: keel.json settings apply, relative paths resolve against basedir
 *   PREF-U3: explicit option > environment > keel.json > default
 *   PREF-U4: KEEL_BASEDIR is honored when no basedir option is given
 *   PREF-U5: unusable keel.json or environment values throw ConfigurationError
 *
 * Isolation: each test gets its own temp base directory and passes an
 * explicit environment object, so process.env is never read or modified.
 */

import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigurationError, resolvePreferences } from '../src/preferences.js';

function baseDir(config?: unknown): string {
  const dir = mkdtempSync(join(tmpdir(), 'keel-pref-'));
  if (config !== undefined) {
    writeFileSync(join(dir, 'keel.json'), typeof config === 'string' ? config : JSON.stringify(config), 'utf-8');
  }
  return dir;
}

describe('resolvePreferences', () => {
  it('PREF-U1: defaults lay everything out under the base directory', () => {
    const dir = baseDir();
    const prefs = resolvePreferences({ basedir: dir }, {});

    expect(prefs.basedir).toBe(dir);
    expect(prefs.manifests).toBe(join(dir, 'manifests'));
    expect(prefs.modules).toBe(join(dir, 'modules'));
    expect(prefs.templates).toBe(join(dir, 'templates'));
    expect(prefs.stateDir).toBe(dir);
    expect(prefs.logLevel).toBe('warning');
    expect(prefs.extraTests).toBe(false);
    expect([...prefs.ignoredModules]).toEqual([]);
  });

  it('PREF-U2: keel.json settings apply, relative paths resolve against basedir', () => {
    const dir = baseDir({
      manifests: 'site',
      templates: '/srv/templates',
      stateDir: 'var',
      logLevel: 'info',
      extraTests: true,
      ignoredModules: ['legacy', 'vendor'],
    });
    const prefs = resolvePreferences({ basedir: dir }, {});

    expect(prefs.manifests).toBe(join(dir, 'site'));
    expect(prefs.modules).toBe(join(dir, 'modules'));
    expect(prefs.templates).toBe('/srv/templates');
    expect(prefs.stateDir).toBe(join(dir, 'var'));
    expect(prefs.logLevel).toBe('info');
    expect(prefs.extraTests).toBe(true);
    expect([...prefs.ignoredModules]).toEqual(['legacy', 'vendor']);
  });

  it('PREF-U3: explicit option > environment > keel.json > default', () => {
    const dir = baseDir({ logLevel: 'info', extraTests: true });

    const fromEnv = resolvePreferences({ basedir: dir }, { KEEL_LOG_LEVEL: 'debug', KEEL_EXTRA_TESTS: 'false' });
    expect(fromEnv.logLevel).toBe('debug');
    expect(fromEnv.extraTests).toBe(false);

    const fromOption = resolvePreferences(
      { basedir: dir, logLevel: 'error', extraTests: true },
      { KEEL_LOG_LEVEL: 'debug', KEEL_EXTRA_TESTS: 'false' },
    );
    expect(fromOption.logLevel).toBe('error');
    expect(fromOption.extraTests).toBe(true);
  });

  it('PREF-U4: KEEL_BASEDIR is honored when no basedir option is given', () => {
    const dir = baseDir({ logLevel: 'debug' });
    const prefs = resolvePreferences({}, { KEEL_BASEDIR: dir });

    expect(prefs.basedir).toBe(dir);
    expect(prefs.logLevel).toBe('debug');
  });

  it('PREF-U5: unusable configuration throws ConfigurationError', () => {
    const broken = baseDir('{ "logLevel": ');
    expect(() => resolvePreferences({ basedir: broken }, {})).toThrow(ConfigurationError);

    const unknown = baseDir({ colour: 'blue' });
    expect(() => resolvePreferences({ basedir: unknown }, {})).toThrow(
      `${join(unknown, 'keel.json')}: unknown setting colour`,
    );

    const badType = baseDir({ ignoredModules: 'legacy' });
    expect(() => resolvePreferences({ basedir: badType }, {})).toThrow(
      `${join(badType, 'keel.json')}: ignoredModules must be an array of strings`,
    );

    const plain = baseDir();
    expect(() => resolvePreferences({ basedir: plain }, { KEEL_LOG_LEVEL: 'loud' })).toThrow(
      'KEEL_LOG_LEVEL must be one of debug, info, warning, error (got loud)',
    );
    expect(() => resolvePreferences({ basedir: plain }, { KEEL_EXTRA_TESTS: 'maybe' })).toThrow(ConfigurationError);
  });
});
