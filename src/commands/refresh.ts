import type { Command } from 'commander';
import { refresh } from '../core/index.js';
import { APP_NAME } from '../config/branding.js';
import { ok, warn, dieWith, printDiagnostic } from '../ui/output.js';
import type { RefreshReport } from '../types/records.js';
import { loadContext, type CommandContext } from './context.js';

export function runRefresh(ctx: CommandContext): RefreshReport {
  return refresh(ctx.layout, ctx.host, {
    overridesFile: ctx.overridesFile,
    timeoutMs: ctx.probeTimeoutMs,
    commandName: APP_NAME,
    report: printDiagnostic,
    onSkip: (id, err) => warn(`skipping ${id}: ${err.message}`),
  });
}

export function summarize(report: RefreshReport): string {
  const changed = report.created.length + report.replaced.length;
  return (
    `${report.records.length} toolchain(s), ${changed} alias(es) written, ` +
    `${report.unchanged.length} unchanged, ${report.skipped.length} skipped`
  );
}

export function registerRefresh(program: Command): void {
  program
    .command('refresh')
    .description('Recreate X.Y.Z aliases for every registered toolchain')
    .action(() => {
      try {
        const report = runRefresh(loadContext());
        ok(summarize(report));
      } catch (err) {
        dieWith(err);
      }
    });
}
