import type { Command } from 'commander';
import * as settings from '../config/settings.js';
import { SETTINGS_KEYS } from '../config/schema.js';
import { getConfigPath } from '../core/index.js';
import { ok, dieWith } from '../ui/output.js';

export function registerConfig(program: Command): void {
  const cmd = program
    .command('config')
    .description(`Manage user settings (${SETTINGS_KEYS.join(', ')})`);

  cmd
    .command('set')
    .description('Set a config value')
    .argument('<key>', 'Config key')
    .argument('<value>', 'Config value')
    .action((key: string, value: string) => {
      try {
        settings.init(getConfigPath());
        settings.set(key, value);
        ok(`Set ${key} = ${value}`);
      } catch (err) {
        dieWith(err);
      }
    });

  cmd
    .command('get')
    .description('Get a config value')
    .argument('<key>', 'Config key')
    .action((key: string) => {
      try {
        settings.init(getConfigPath());
        const value = settings.get(key);
        if (value) {
          console.log(value);
        }
      } catch (err) {
        dieWith(err);
      }
    });
}
