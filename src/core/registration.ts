import { readdirSync, type Dirent } from 'node:fs';
import { join } from 'node:path';
import type { Layout } from '../types/records.js';
import { ALIAS_PATTERN } from '../config/schema.js';
import { aliasPath, isOwnedLink, link, removeLink } from './linker.js';
import { lstatOrNull, resolveSymlinkTarget } from '../utils/platform.js';

function readEntries(dir: string): Dirent[] {
  try {
    return readdirSync(dir, { withFileTypes: true });
  } catch {
    return [];
  }
}

export function syncRegistrations(layout: Layout): string[] {
  const created: string[] = [];
  const dirs = readEntries(layout.managedRoot)
    .filter((e) => e.isDirectory() && !e.name.startsWith('.'))
    .map((e) => e.name)
    .sort();

  for (const name of dirs) {
    const linkName = `${layout.prefix}${name}`;
    const outcome = link(layout, linkName, join(layout.managedRoot, name), 'safe');
    if (outcome === 'created' || outcome === 'replaced') {
      created.push(linkName);
    }
  }
  return created;
}

export function clearAliases(layout: Layout): string[] {
  const removed: string[] = [];
  for (const entry of readEntries(layout.versionsDir)) {
    if (!entry.isSymbolicLink() || !ALIAS_PATTERN.test(entry.name)) continue;
    if (removeLink(layout, entry.name, 'safe')) {
      removed.push(entry.name);
    }
  }
  return removed.sort();
}

export interface UnregisterOptions {
  /** Also remove custom names pointing at the same installation. */
  allLinks?: boolean;
}

/**
 * Removes the link `name` and the other links that point at the same
 * installation. The installation directory itself is left alone.
 */
export function unregister(layout: Layout, name: string, options: UnregisterOptions = {}): string[] {
  const path = aliasPath(layout, name);
  const stat = lstatOrNull(path);
  if (!stat) {
    throw new Error(`"${name}" is not present in ${layout.versionsDir}`);
  }
  if (!stat.isSymbolicLink()) {
    throw new Error(`"${name}" is not a link; refusing to remove an installation directory`);
  }
  if (!options.allLinks && !isOwnedLink(layout, path)) {
    throw new Error(`"${name}" does not point into ${layout.managedRoot}`);
  }

  const installationPath = resolveSymlinkTarget(path);
  const removed: string[] = [];

  for (const entry of readEntries(layout.versionsDir)) {
    if (!entry.isSymbolicLink()) continue;
    const candidate = aliasPath(layout, entry.name);
    if (resolveSymlinkTarget(candidate) !== installationPath) continue;

    const ours = entry.name.startsWith(layout.prefix) || ALIAS_PATTERN.test(entry.name);
    if (entry.name !== name && !ours && !options.allLinks) continue;

    if (removeLink(layout, entry.name, 'force')) {
      removed.push(entry.name);
    }
  }
  return removed.sort();
}
