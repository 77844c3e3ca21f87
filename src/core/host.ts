import { execFileSync } from 'node:child_process';
import type { Settings } from '../config/schema.js';
import { CacheInvalidationError, RequiredToolMissingError } from './errors.js';
import { commandExists } from '../utils/commands.js';

export interface Host {
  /** Throws RequiredToolMissingError before anything is mutated. */
  requireTools(): void;
  /** Cache-invalidation hook run at the end of every refresh. */
  rehash(): void;
}

const DEFAULT_REHASH_COMMAND = ['pyenv', 'rehash'];

export function rehashCommand(settings: Settings = {}): string[] {
  const configured = settings.rehash_command;
  if (configured === undefined) return DEFAULT_REHASH_COMMAND;
  return Array.isArray(configured) ? configured : configured.trim().split(/\s+/);
}

export function requireCommands(names: string[]): void {
  for (const name of names) {
    if (!commandExists(name)) {
      throw new RequiredToolMissingError(name);
    }
  }
}

function exitStatus(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 1;
}

export function createPyenvHost(settings: Settings = {}): Host {
  const [command, ...args] = rehashCommand(settings);
  return {
    requireTools() {
      requireCommands([command]);
    },
    rehash() {
      try {
        execFileSync(command, args, { stdio: 'inherit' });
      } catch (err) {
        throw new CacheInvalidationError([command, ...args].join(' '), exitStatus(err), {
          cause: err,
        });
      }
    },
  };
}
