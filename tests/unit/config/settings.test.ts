import { describe, it, expect } from 'vitest';
import { resolve } from 'path';
import { readEnvToggles } from '../../../src/config/env.js';
import { overridesFromCli, resolveSettings } from '../../../src/config/settings.js';
import { DEFAULT_PROFILE, DEFAULT_TOGGLES } from '../../../src/selection/index.js';

describe('readEnvToggles', () => {
  it('reads the toggle variables case-insensitively', () => {
    expect(readEnvToggles({ INCLUDE_DOCS: 'TRUE', INCLUDE_TESTS: 'true', LIST_ONLY: 'no' })).toEqual({
      includeDocs: true,
      includeTests: true,
      listOnly: false,
    });
  });

  it('leaves unset variables out', () => {
    expect(readEnvToggles({})).toEqual({});
    expect(readEnvToggles({ INCLUDE_ART_PROCESSING: 'True' })).toEqual({ includeArtProcessing: true });
  });
});

describe('resolveSettings', () => {
  it('falls back to hardcoded defaults', () => {
    const settings = resolveSettings();
    expect(settings).toEqual({
      root: resolve('.'),
      outDir: 'code-stacks',
      profile: DEFAULT_PROFILE,
      toggles: DEFAULT_TOGGLES,
      tree: false,
      verbose: false,
    });
  });

  it('lets env override the config file', () => {
    const settings = resolveSettings({ env: { includeDocs: false }, config: { includeDocs: true, includeTests: true } });
    expect(settings.toggles.includeDocs).toBe(false);
    expect(settings.toggles.includeTests).toBe(true);
  });

  it('lets CLI flags override env', () => {
    const settings = resolveSettings({ cli: { listOnly: true }, env: { listOnly: false } });
    expect(settings.toggles.listOnly).toBe(true);
  });

  it('prefers the CLI root and out dir over the config file', () => {
    const settings = resolveSettings({
      cli: { root: '/tmp/cli-root', outDir: 'cli-out' },
      config: { root: '/tmp/config-root', outDir: 'config-out' },
    });
    expect(settings.root).toBe(resolve('/tmp/cli-root'));
    expect(settings.outDir).toBe('cli-out');
  });

  it('replaces profile lists wholesale from the config file', () => {
    const settings = resolveSettings({ config: { includedDirectories: ['src'], excludeHiddenDirectories: false } });
    expect(settings.profile.includedDirectories).toEqual(['src']);
    expect(settings.profile.excludeHiddenDirectories).toBe(false);
    expect(settings.profile.rootFiles).toEqual(DEFAULT_PROFILE.rootFiles);
  });

  it('keeps the default lists frozen in resolved settings', () => {
    const settings = resolveSettings();
    expect(Object.isFrozen(settings.profile.includedDirectories)).toBe(true);
    expect(Object.isFrozen(settings.profile.excludedFilenamePatterns)).toBe(true);
  });
});

describe('overridesFromCli', () => {
  it('leaves flags the user did not type out of the CLI layer', () => {
    expect(overridesFromCli(undefined, {})).toEqual({});
  });

  it('passes explicit values through', () => {
    expect(overridesFromCli('repo', { docs: true, tests: false, outDir: 'out', tree: true })).toEqual({
      root: 'repo',
      outDir: 'out',
      includeDocs: true,
      includeTests: false,
      tree: true,
    });
  });

  it('lets --no-docs switch off docs turned on by env and config', () => {
    const settings = resolveSettings({
      cli: overridesFromCli(undefined, { docs: false }),
      env: { includeDocs: true },
      config: { includeDocs: true },
    });
    expect(settings.toggles.includeDocs).toBe(false);
  });

  it('lets --no-list-only win over LIST_ONLY', () => {
    const settings = resolveSettings({
      cli: overridesFromCli(undefined, { listOnly: false }),
      env: { listOnly: true },
    });
    expect(settings.toggles.listOnly).toBe(false);
  });

  it('forces listing for the list command', () => {
    expect(overridesFromCli(undefined, { listOnly: false }, true)).toEqual({ listOnly: true });
  });
});
