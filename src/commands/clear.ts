import type { Command } from 'commander';
import { clearAliases } from '../core/index.js';
import { ok, dieWith } from '../ui/output.js';
import { loadContext } from './context.js';

export function registerClear(program: Command): void {
  program
    .command('clear')
    .description('Remove every X.Y.Z alias that points into the managed root')
    .action(() => {
      try {
        const ctx = loadContext();
        ctx.host.requireTools();
        const removed = clearAliases(ctx.layout);
        ctx.host.rehash();
        ok(`cleared ${removed.length} patch alias(es)`);
      } catch (err) {
        dieWith(err);
      }
    });
}
