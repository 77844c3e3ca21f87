import { readFileSync, writeFileSync, renameSync, rmSync } from 'node:fs';
import { dirname, basename, join } from 'node:path';
import { OverrideEntrySchema, type OverrideEntry } from '../config/schema.js';
import { InvalidOverrideError } from './errors.js';
import { ensureDir } from '../utils/fs.js';

// Line format: <alias>\t<target>\n, insertion order.

const DELIMITER = '\t';

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

// Only an absent store reads as empty.
function readLines(file: string): string[] | null {
  try {
    return readFileSync(file, 'utf-8').split('\n');
  } catch (err) {
    if (isMissing(err)) return null;
    throw err;
  }
}

function parseLine(line: string): OverrideEntry | null {
  const idx = line.indexOf(DELIMITER);
  if (idx <= 0) return null;
  return { alias: line.slice(0, idx), target: line.slice(idx + 1).replace(/\r$/, '') };
}

function readEntries(file: string): OverrideEntry[] {
  const entries: OverrideEntry[] = [];
  for (const line of readLines(file) ?? []) {
    const entry = parseLine(line);
    if (entry) entries.push(entry);
  }
  return entries;
}

function formatEntries(entries: OverrideEntry[]): string {
  return entries.map((e) => `${e.alias}${DELIMITER}${e.target}\n`).join('');
}

function replaceStore(file: string, entries: OverrideEntry[]): void {
  const dir = dirname(file);
  ensureDir(dir);
  const tmp = join(dir, `.${basename(file)}.${process.pid}.${Date.now()}.tmp`);
  try {
    writeFileSync(tmp, formatEntries(entries), 'utf-8');
    renameSync(tmp, file);
  } catch (err) {
    rmSync(tmp, { force: true });
    throw err;
  }
}

function validate(alias: string, target: string): OverrideEntry {
  const parsed = OverrideEntrySchema.safeParse({ alias, target });
  if (!parsed.success) {
    throw new InvalidOverrideError(parsed.error.issues.map((i) => i.message).join('; '));
  }
  return parsed.data;
}

// ── Public API ──────────────────────────────────────────────────────

export function getOverride(file: string, alias: string): string | null {
  return readEntries(file).find((e) => e.alias === alias)?.target ?? null;
}

export function listOverrides(file: string): OverrideEntry[] {
  return readEntries(file);
}

export function setOverride(file: string, alias: string, target: string): void {
  const entry = validate(alias, target);
  const kept = readEntries(file).filter((e) => e.alias !== entry.alias);
  replaceStore(file, [...kept, entry]);
}

export function unsetOverride(file: string, alias: string): boolean {
  if (readLines(file) === null) return false;
  const entries = readEntries(file);
  const kept = entries.filter((e) => e.alias !== alias);
  replaceStore(file, kept);
  return kept.length !== entries.length;
}
