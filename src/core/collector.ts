import { readdirSync, type Dirent } from 'node:fs';
import { join } from 'node:path';
import type { InstallationRecord, Layout } from '../types/records.js';
import { ProbeError } from './errors.js';
import { probeVersion, type ProbeOptions } from './probe.js';
import { dirExists } from '../utils/fs.js';
import { resolveSymlinkTarget } from '../utils/platform.js';

export interface CollectOptions extends ProbeOptions {
  /** Observes installations left out because their probe failed. */
  onSkip?: (installationId: string, error: ProbeError) => void;
}

export function listRegistrations(layout: Layout): string[] {
  let entries: Dirent[];
  try {
    entries = readdirSync(layout.versionsDir, { withFileTypes: true });
  } catch {
    return [];
  }
  return entries
    .filter((e) => e.isSymbolicLink() && e.name.startsWith(layout.prefix))
    .map((e) => e.name)
    .sort();
}

export function collectRecords(layout: Layout, options: CollectOptions = {}): InstallationRecord[] {
  const records: InstallationRecord[] = [];

  for (const installationId of listRegistrations(layout)) {
    let installationPath: string;
    try {
      installationPath = resolveSymlinkTarget(join(layout.versionsDir, installationId));
    } catch {
      continue;
    }
    if (!dirExists(installationPath)) continue;

    try {
      const version = probeVersion(installationPath, options);
      records.push({ version, installationPath, installationId });
    } catch (err) {
      if (!(err instanceof ProbeError)) throw err;
      options.onSkip?.(installationId, err);
    }
  }

  return records;
}
