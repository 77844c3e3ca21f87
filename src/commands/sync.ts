import type { Command } from 'commander';
import { clearAliases, syncRegistrations } from '../core/index.js';
import { ok, info, dieWith } from '../ui/output.js';
import { loadContext } from './context.js';
import { runRefresh, summarize } from './refresh.js';

export function registerSync(program: Command): void {
  program
    .command('sync')
    .description('Register every installation under the managed root, then refresh aliases')
    .option('--no-refresh-aliases', 'Clear managed X.Y.Z aliases instead of refreshing them')
    .action((opts: { refreshAliases: boolean }) => {
      try {
        const ctx = loadContext();
        ctx.host.requireTools();

        const created = syncRegistrations(ctx.layout);
        for (const name of created) info(`registered ${name}`);

        if (opts.refreshAliases) {
          ok(summarize(runRefresh(ctx)));
          return;
        }

        const removed = clearAliases(ctx.layout);
        ctx.host.rehash();
        ok(`cleared ${removed.length} patch alias(es)`);
      } catch (err) {
        dieWith(err);
      }
    });
}
