import type { Command } from 'commander';
import {
  getOverride,
  listOverrides,
  resolveOverrideTarget,
  setOverride,
  unsetOverride,
} from '../core/index.js';
import { ok, info, warn, dieWith } from '../ui/output.js';
import { printTable } from '../ui/table.js';
import { loadContext } from './context.js';
import { runRefresh, summarize } from './refresh.js';

interface AliasOptions {
  unset?: boolean;
  list?: boolean;
  refresh: boolean;
}

export function registerAlias(program: Command): void {
  program
    .command('alias')
    .description('Pin the installation an X.Y.Z alias should point at')
    .argument('[alias]', 'Patch alias (e.g., 3.12.2)')
    .argument('[target]', 'Registered name (e.g., uv-cpython-3.12.2-macos) or absolute path')
    .option('--unset', 'Remove the pin for <alias>')
    .option('--list', 'Show every pin')
    .option('--no-refresh', 'Do not refresh aliases after changing a pin')
    .action((alias: string | undefined, target: string | undefined, opts: AliasOptions) => {
      try {
        const ctx = loadContext();

        if (opts.list || !alias) {
          printTable(
            ['Alias', 'Target'],
            listOverrides(ctx.overridesFile).map((e) => [e.alias, e.target]),
            'No pinned aliases.',
          );
          return;
        }

        if (opts.unset) {
          if (unsetOverride(ctx.overridesFile, alias)) {
            ok(`Unpinned ${alias}`);
          } else {
            info(`${alias} was not pinned`);
            return;
          }
        } else if (target === undefined) {
          const current = getOverride(ctx.overridesFile, alias);
          console.log(current ?? '');
          return;
        } else {
          if (resolveOverrideTarget(ctx.layout, target) === null) {
            warn(`'${target}' does not resolve to an installation yet; the pin is kept anyway.`);
          }
          setOverride(ctx.overridesFile, alias, target);
          ok(`Pinned ${alias} -> ${target}`);
        }

        if (opts.refresh) {
          ok(summarize(runRefresh(ctx)));
        }
      } catch (err) {
        dieWith(err);
      }
    });
}
