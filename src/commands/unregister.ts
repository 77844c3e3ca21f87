import type { Command } from 'commander';
import { unregister } from '../core/index.js';
import { ok, info, dieWith } from '../ui/output.js';
import { askConfirm } from '../ui/prompts.js';
import { loadContext } from './context.js';

export function registerUnregister(program: Command): void {
  program
    .command('unregister')
    .description('Remove a registered toolchain and the aliases pointing at it (files are kept)')
    .argument('<name>', 'Registered name or X.Y.Z alias')
    .option('--all-links', 'Also remove custom names pointing at the same installation')
    .option('-y, --yes', 'Skip confirmation prompt')
    .action(async (name: string, opts: { allLinks?: boolean; yes?: boolean }) => {
      try {
        const ctx = loadContext();
        ctx.host.requireTools();

        if (opts.allLinks && !opts.yes) {
          const confirmed = await askConfirm(
            `Remove every link in ${ctx.layout.versionsDir} that points where "${name}" does?`,
            false,
          );
          if (!confirmed) {
            console.log('Cancelled.');
            return;
          }
        }

        const removed = unregister(ctx.layout, name, { allLinks: opts.allLinks });
        for (const link of removed) info(`removed ${link}`);
        ctx.host.rehash();
        ok(`Unregistered ${name}`);
      } catch (err) {
        dieWith(err);
      }
    });
}
