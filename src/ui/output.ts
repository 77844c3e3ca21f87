import chalk from 'chalk';
import type { Diagnostic } from '../types/records.js';
import { APP_NAME } from '../config/branding.js';
import { CacheInvalidationError, RequiredToolMissingError } from '../core/errors.js';

export const ok = (msg: string) => console.log(chalk.green('✓'), msg);
export const fail = (msg: string) => console.error(chalk.red('✗'), msg);
export const warn = (msg: string) => console.error(chalk.yellow('⚠'), msg);
export const note = (msg: string) => console.error(chalk.cyan('›'), msg);
export const info = (msg: string) => console.log(chalk.blue('ℹ'), msg);

export function die(msg: string, exitCode = 1): never {
  fail(msg);
  process.exit(exitCode);
}

export function exitCodeFor(err: unknown): number {
  if (err instanceof RequiredToolMissingError) return 127;
  if (err instanceof CacheInvalidationError) return err.exitCode;
  return 1;
}

export function dieWith(err: unknown): never {
  const msg = err instanceof Error ? err.message : String(err);
  die(`${APP_NAME}: ${msg}`, exitCodeFor(err));
}

export function printDiagnostic(diagnostic: Diagnostic): void {
  if (diagnostic.level === 'warn') {
    warn(diagnostic.message);
  } else {
    note(diagnostic.message);
  }
  for (const hint of diagnostic.hints ?? []) {
    console.error(chalk.dim(hint));
  }
}
