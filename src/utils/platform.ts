import { symlinkSync, unlinkSync, readlinkSync, lstatSync, type Stats } from 'node:fs';
import { resolve, dirname } from 'node:path';

export function createSymlink(target: string, link: string): void {
  symlinkSync(target, link, 'dir');
}

export function removeSymlink(path: string): void {
  unlinkSync(path);
}

/** Link target made absolute against the link's own directory. */
export function resolveSymlinkTarget(path: string): string {
  return resolve(dirname(path), readlinkSync(path));
}

export function lstatOrNull(path: string): Stats | null {
  try {
    return lstatSync(path);
  } catch {
    return null;
  }
}

export function isSymlink(path: string): boolean {
  return lstatOrNull(path)?.isSymbolicLink() ?? false;
}
