import { execFileSync } from 'node:child_process';
import { readdirSync } from 'node:fs';
import { join } from 'node:path';
import { ProbeError } from './errors.js';
import { isExecutableFile } from '../utils/fs.js';

// ── Runtime discovery ───────────────────────────────────────────────

const RUNTIME_CANDIDATES = ['bin/python3', 'bin/python'];
const RUNTIME_SCAN_DIR = 'bin';
const RUNTIME_SCAN_PREFIX = 'python3.';

const VERSION_SCRIPT = 'import sys; print(".".join(map(str, sys.version_info[:3])))';
const VERSION_PATTERN = /^[0-9]+\.[0-9]+\.[0-9]+$/;

export const DEFAULT_PROBE_TIMEOUT_MS = 5000;

export interface ProbeOptions {
  timeoutMs?: number;
}

export function findRuntime(installationDir: string): string | null {
  for (const candidate of RUNTIME_CANDIDATES) {
    const path = join(installationDir, candidate);
    if (isExecutableFile(path)) return path;
  }

  const scanDir = join(installationDir, RUNTIME_SCAN_DIR);
  let names: string[];
  try {
    names = readdirSync(scanDir);
  } catch {
    return null;
  }
  for (const name of names.filter((n) => n.startsWith(RUNTIME_SCAN_PREFIX)).sort()) {
    const path = join(scanDir, name);
    if (isExecutableFile(path)) return path;
  }
  return null;
}

// ── Version probing ─────────────────────────────────────────────────

export function probeVersion(installationDir: string, options: ProbeOptions = {}): string {
  const runtime = findRuntime(installationDir);
  if (!runtime) {
    throw new ProbeError('NoRuntimeFound', installationDir, `no runtime executable in ${installationDir}`);
  }

  let output: string;
  try {
    output = execFileSync(runtime, ['-c', VERSION_SCRIPT], {
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'ignore'],
      timeout: options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS,
    });
  } catch (err) {
    throw new ProbeError('ProbeFailed', installationDir, `${runtime} did not report a version`, {
      cause: err,
    });
  }

  const version = output.trim();
  if (!VERSION_PATTERN.test(version)) {
    throw new ProbeError(
      'ProbeFailed',
      installationDir,
      `${runtime} printed an unparseable version: ${JSON.stringify(version)}`,
    );
  }
  return version;
}
