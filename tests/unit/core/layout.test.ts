import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { getConfigPath, getOverridesFile, getPrefix, resolveLayout } from '../../../src/core/layout.js';

const VARS = [
  'PYENV_ROOT',
  'PATCHLINK_HOME',
  'PATCHLINK_VERSIONS_DIR',
  'PATCHLINK_STATE_DIR',
  'PATCHLINK_MANAGED_ROOT',
  'PATCHLINK_PREFIX',
];

describe('layout', () => {
  let saved: Record<string, string | undefined>;

  beforeEach(() => {
    saved = {};
    for (const name of VARS) {
      saved[name] = process.env[name];
      delete process.env[name];
    }
    process.env.PYENV_ROOT = '/opt/pyenv';
  });

  afterEach(() => {
    for (const name of VARS) {
      const value = saved[name];
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
  });

  it('derives versions and state directories from PYENV_ROOT', () => {
    process.env.PATCHLINK_MANAGED_ROOT = '/opt/uv/python';

    expect(resolveLayout()).toEqual({
      versionsDir: '/opt/pyenv/versions',
      managedRoot: '/opt/uv/python',
      stateDir: '/opt/pyenv/patchlink',
      prefix: 'uv-',
    });
  });

  it('lets environment variables win over settings', () => {
    process.env.PATCHLINK_VERSIONS_DIR = '/srv/versions';
    process.env.PATCHLINK_STATE_DIR = '/srv/state';
    process.env.PATCHLINK_MANAGED_ROOT = '/srv/managed';
    process.env.PATCHLINK_PREFIX = 'tc-';

    expect(resolveLayout({ prefix: 'ignored-', managed_root: '/ignored' })).toEqual({
      versionsDir: '/srv/versions',
      managedRoot: '/srv/managed',
      stateDir: '/srv/state',
      prefix: 'tc-',
    });
  });

  it('uses settings when the environment is silent', () => {
    const layout = resolveLayout({ prefix: 'uvpy-', managed_root: '/data/uv' });
    expect(layout.managedRoot).toBe('/data/uv');
    expect(layout.prefix).toBe('uvpy-');
    expect(getPrefix()).toBe('uv-');
  });

  it('treats empty variables as unset', () => {
    process.env.PATCHLINK_VERSIONS_DIR = '';
    process.env.PATCHLINK_STATE_DIR = '';
    process.env.PATCHLINK_MANAGED_ROOT = '';
    process.env.PATCHLINK_PREFIX = '';

    expect(resolveLayout({ managed_root: '/data/uv' })).toEqual({
      versionsDir: '/opt/pyenv/versions',
      managedRoot: '/data/uv',
      stateDir: '/opt/pyenv/patchlink',
      prefix: 'uv-',
    });
  });

  it('places the override store in the state directory', () => {
    const layout = { versionsDir: '/v', managedRoot: '/m', stateDir: '/s', prefix: 'uv-' };
    expect(getOverridesFile(layout)).toBe('/s/alias-overrides.tsv');
  });

  it('falls back to the home directory when PATCHLINK_HOME is empty', () => {
    process.env.PATCHLINK_HOME = '';
    expect(getConfigPath()).toBe(join(homedir(), '.patchlink', 'config.yaml'));
  });

  it('keeps the config file under PATCHLINK_HOME', () => {
    process.env.PATCHLINK_HOME = '/home/tester/.patchlink';
    expect(getConfigPath()).toBe(join('/home/tester/.patchlink', 'config.yaml'));
  });
});
