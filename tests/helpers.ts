import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { Host } from '../src/core/host.js';
import type { Diagnostic, Layout } from '../src/types/records.js';

export interface Sandbox {
  root: string;
  layout: Layout;
  overridesFile: string;
  cleanup(): void;
}

export function createSandbox(): Sandbox {
  const root = mkdtempSync(join(tmpdir(), 'patchlink-test-'));
  const layout: Layout = {
    versionsDir: join(root, 'versions'),
    managedRoot: join(root, 'managed'),
    stateDir: join(root, 'state'),
    prefix: 'uv-',
  };
  mkdirSync(layout.versionsDir, { recursive: true });
  mkdirSync(layout.managedRoot, { recursive: true });
  return {
    root,
    layout,
    overridesFile: join(layout.stateDir, 'alias-overrides.tsv'),
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  };
}

/** Writes a shell script that answers the version query with `version`. */
export function makeFakeRuntime(path: string, version: string): void {
  mkdirSync(join(path, '..'), { recursive: true });
  writeFileSync(
    path,
    `#!/bin/sh\nif [ "$1" = "-c" ]; then\n  echo "${version}"\n  exit 0\nfi\nexit 2\n`,
    { mode: 0o755 },
  );
}

/** Creates `<managedRoot>/<name>` with a runtime at bin/python3. */
export function makeInstallation(layout: Layout, name: string, version: string): string {
  const dir = join(layout.managedRoot, name);
  makeFakeRuntime(join(dir, 'bin', 'python3'), version);
  return dir;
}

/** Links `<versionsDir>/<prefix><name>` to the installation. */
export function register(layout: Layout, name: string, installationDir: string): string {
  const id = `${layout.prefix}${name}`;
  symlinkSync(installationDir, join(layout.versionsDir, id));
  return id;
}

export function installAndRegister(layout: Layout, name: string, version: string): string {
  const dir = makeInstallation(layout, name, version);
  register(layout, name, dir);
  return dir;
}

export interface RecordingHost extends Host {
  calls: string[];
}

export function fakeHost(options: { failRehash?: Error; missingTool?: Error } = {}): RecordingHost {
  const calls: string[] = [];
  return {
    calls,
    requireTools() {
      calls.push('requireTools');
      if (options.missingTool) throw options.missingTool;
    },
    rehash() {
      calls.push('rehash');
      if (options.failRehash) throw options.failRehash;
    },
  };
}

export function collectDiagnostics(): { diagnostics: Diagnostic[]; report: (d: Diagnostic) => void } {
  const diagnostics: Diagnostic[] = [];
  return { diagnostics, report: (d) => diagnostics.push(d) };
}
