import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { APP_NAME, DEFAULT_PREFIX, HOME_DIR, OVERRIDES_FILE, envVar } from '../config/branding.js';
import type { Settings } from '../config/schema.js';
import type { Layout } from '../types/records.js';
import { RequiredToolMissingError } from './errors.js';
import { captureCommand, commandExists } from '../utils/commands.js';

const VERSIONS_DIR = 'versions';
const CONFIG_FILE = 'config.yaml';

// ── Own home (settings) ─────────────────────────────────────────────

export function getHomeRoot(): string {
  return process.env[envVar('HOME')] || join(homedir(), HOME_DIR);
}

export function getConfigPath(): string {
  return join(getHomeRoot(), CONFIG_FILE);
}

// ── Host discovery ──────────────────────────────────────────────────

function requireOutput(command: string, args: string[]): string {
  if (!commandExists(command)) {
    throw new RequiredToolMissingError(command);
  }
  const output = captureCommand(command, args);
  if (!output) {
    throw new Error(`\`${[command, ...args].join(' ')}\` printed nothing`);
  }
  return output;
}

export function getPyenvRoot(): string {
  return process.env.PYENV_ROOT || requireOutput('pyenv', ['root']);
}

export function getVersionsDir(): string {
  return process.env[envVar('VERSIONS_DIR')] || join(getPyenvRoot(), VERSIONS_DIR);
}

export function getStateDir(): string {
  return process.env[envVar('STATE_DIR')] || join(getPyenvRoot(), APP_NAME);
}

export function getManagedRoot(settings: Settings = {}): string {
  return (
    process.env[envVar('MANAGED_ROOT')] ||
    settings.managed_root ||
    requireOutput('uv', ['python', 'dir'])
  );
}

export function getPrefix(settings: Settings = {}): string {
  return process.env[envVar('PREFIX')] || settings.prefix || DEFAULT_PREFIX;
}

export function resolveLayout(settings: Settings = {}): Layout {
  return {
    versionsDir: resolve(getVersionsDir()),
    managedRoot: resolve(getManagedRoot(settings)),
    stateDir: resolve(getStateDir()),
    prefix: getPrefix(settings),
  };
}

export function getOverridesFile(layout: Layout): string {
  return join(layout.stateDir, OVERRIDES_FILE);
}
