import { join, resolve, relative, isAbsolute, sep } from 'node:path';
import { rmSync } from 'node:fs';
import type { Layout, LinkMode, LinkOutcome } from '../types/records.js';
import { ensureDir } from '../utils/fs.js';
import {
  createSymlink,
  removeSymlink,
  resolveSymlinkTarget,
  lstatOrNull,
} from '../utils/platform.js';

// ── Ownership ───────────────────────────────────────────────────────

/** True when `path` is the provenance root or lies beneath it. */
export function isManagedPath(layout: Layout, path: string): boolean {
  const rel = relative(resolve(layout.managedRoot), resolve(path));
  if (rel === '') return true;
  return rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

export function aliasPath(layout: Layout, name: string): string {
  return join(layout.versionsDir, name);
}

export function isOwnedLink(layout: Layout, path: string): boolean {
  if (!lstatOrNull(path)?.isSymbolicLink()) return false;
  return isManagedPath(layout, resolveSymlinkTarget(path));
}

/** An entry named `alias` exists and is not one of ours. */
export function isProtected(layout: Layout, alias: string): boolean {
  const path = aliasPath(layout, alias);
  if (!lstatOrNull(path)) return false;
  return !isOwnedLink(layout, path);
}

// ── Mutation ────────────────────────────────────────────────────────

export function link(layout: Layout, name: string, targetPath: string, mode: LinkMode): LinkOutcome {
  ensureDir(layout.versionsDir);
  const path = aliasPath(layout, name);
  const existing = lstatOrNull(path);

  if (!existing) {
    createSymlink(targetPath, path);
    return 'created';
  }

  if (existing.isSymbolicLink() && resolveSymlinkTarget(path) === resolve(targetPath)) {
    return 'unchanged';
  }

  if (mode === 'force') {
    rmSync(path, { recursive: true, force: true });
  } else if (isOwnedLink(layout, path)) {
    removeSymlink(path);
  } else {
    return 'occupied';
  }

  createSymlink(targetPath, path);
  return 'replaced';
}

/**
 * Removes the symlink `name`. Safe mode only removes owned links;
 * neither mode touches anything that is not a symlink.
 */
export function removeLink(layout: Layout, name: string, mode: LinkMode): boolean {
  const path = aliasPath(layout, name);
  if (!lstatOrNull(path)?.isSymbolicLink()) return false;
  if (mode === 'safe' && !isOwnedLink(layout, path)) return false;
  removeSymlink(path);
  return true;
}
