import { isAbsolute, resolve } from 'node:path';
import type {
  AliasPlan,
  InstallationRecord,
  Layout,
  Reporter,
} from '../types/records.js';
import { APP_NAME } from '../config/branding.js';
import { getOverride } from './overrides.js';
import { aliasPath, isProtected } from './linker.js';
import { dirExists } from '../utils/fs.js';
import { lstatOrNull, resolveSymlinkTarget } from '../utils/platform.js';

export interface ResolveOptions {
  overridesFile: string;
  /** Command name used in the pin suggestions of conflict warnings. */
  commandName?: string;
  report?: Reporter;
}

// ── Grouping ────────────────────────────────────────────────────────

export function compareBytes(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, 'utf-8'), Buffer.from(b, 'utf-8'));
}

export function groupByVersion(records: InstallationRecord[]): Map<string, InstallationRecord[]> {
  const byVersion = new Map<string, InstallationRecord[]>();
  for (const record of records) {
    const group = byVersion.get(record.version);
    if (group) {
      group.push(record);
    } else {
      byVersion.set(record.version, [record]);
    }
  }

  const groups = new Map<string, InstallationRecord[]>();
  for (const version of [...byVersion.keys()].sort(compareBytes)) {
    const members = byVersion.get(version) ?? [];
    groups.set(
      version,
      [...members].sort((a, b) => compareBytes(a.installationId, b.installationId)),
    );
  }
  return groups;
}

// ── Override targets ────────────────────────────────────────────────

/**
 * Absolute targets must name an existing directory; anything else is looked
 * up as a name in the versions directory and followed if it is a link.
 */
export function resolveOverrideTarget(layout: Layout, target: string): string | null {
  if (isAbsolute(target)) {
    return dirExists(target) ? resolve(target) : null;
  }
  const path = aliasPath(layout, target);
  const stat = lstatOrNull(path);
  if (!stat) return null;
  return stat.isSymbolicLink() ? resolveSymlinkTarget(path) : path;
}

type OverrideMatch =
  | { kind: 'matched'; member: InstallationRecord }
  | { kind: 'unmatched' }
  | { kind: 'unresolvable' };

function matchOverride(layout: Layout, target: string, group: InstallationRecord[]): OverrideMatch {
  if (!isAbsolute(target)) {
    const byId = group.find((m) => m.installationId === target);
    if (byId) return { kind: 'matched', member: byId };
  }
  const resolved = resolveOverrideTarget(layout, target);
  if (resolved === null) return { kind: 'unresolvable' };
  const byPath = group.find((m) => resolve(m.installationPath) === resolved);
  return byPath ? { kind: 'matched', member: byPath } : { kind: 'unmatched' };
}

// ── Resolution ──────────────────────────────────────────────────────

export function displayId(layout: Layout, installationId: string): string {
  return installationId.startsWith(layout.prefix)
    ? installationId.slice(layout.prefix.length)
    : installationId;
}

export function resolveGroup(
  layout: Layout,
  alias: string,
  group: InstallationRecord[],
  options: ResolveOptions,
): AliasPlan {
  const report = options.report ?? (() => {});

  if (isProtected(layout, alias)) {
    report({
      level: 'warn',
      code: 'protected-foreign-alias',
      alias,
      message: `alias '${alias}' exists and points to a non-managed installation; not overriding.`,
    });
    return { alias, action: 'skip', reason: 'protected' };
  }

  const override = getOverride(options.overridesFile, alias);
  if (override !== null) {
    const match = matchOverride(layout, override, group);
    if (match.kind === 'matched') {
      if (group.length > 1) {
        report({
          level: 'info',
          code: 'override-applied',
          alias,
          message:
            `multiple toolchains report ${alias}; using manual override '${override}' ` +
            `(${displayId(layout, match.member.installationId)}).`,
        });
      }
      return { alias, action: 'link', installation: match.member, source: 'override' };
    }
    const why =
      match.kind === 'unmatched'
        ? 'it does not match any current candidate'
        : 'it could not be resolved';
    report({
      level: 'warn',
      code: 'override-unresolvable',
      alias,
      message: `override for '${alias}' points to '${override}' but ${why}; ignoring override.`,
    });
  }

  const [chosen] = group;
  if (group.length > 1) {
    const command = options.commandName ?? APP_NAME;
    report({
      level: 'warn',
      code: 'conflict',
      alias,
      message:
        `multiple toolchains report ${alias}; chose '${displayId(layout, chosen.installationId)}' ` +
        `-> ${chosen.installationPath}.`,
      hints: [
        'to select a different one, run one of:',
        ...group.map((m) => `  ${command} alias ${alias} ${m.installationId}`),
      ],
    });
    return { alias, action: 'link', installation: chosen, source: 'fallback' };
  }
  return { alias, action: 'link', installation: chosen, source: 'single' };
}

export function resolveAliases(
  records: InstallationRecord[],
  layout: Layout,
  options: ResolveOptions,
): AliasPlan[] {
  const plans: AliasPlan[] = [];
  for (const [version, group] of groupByVersion(records)) {
    plans.push(resolveGroup(layout, version, group, options));
  }
  return plans;
}
