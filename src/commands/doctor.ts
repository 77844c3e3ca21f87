import type { Command } from 'commander';
import * as settings from '../config/settings.js';
import { DISPLAY_NAME } from '../config/branding.js';
import type { Settings } from '../config/schema.js';
import {
  getConfigPath,
  getOverridesFile,
  listOverrides,
  listRegistrations,
  rehashCommand,
  resolveLayout,
} from '../core/index.js';
import { commandExists } from '../utils/commands.js';
import { dirExists, fileExists } from '../utils/fs.js';
import { ok, fail, warn, info } from '../ui/output.js';

export function registerDoctor(program: Command): void {
  program
    .command('doctor')
    .description('Check host tools and directories')
    .action(() => {
      console.log(`\n${DISPLAY_NAME} Doctor\n`);

      console.log('Tools:');
      let loaded: Settings = {};
      try {
        loaded = settings.init(getConfigPath());
      } catch (err) {
        fail(`  ${String(err)}`);
      }
      const [rehash] = rehashCommand(loaded);
      for (const cmd of new Set(['pyenv', 'uv', rehash])) {
        if (commandExists(cmd)) {
          ok(`  ${cmd} — available`);
        } else {
          fail(`  ${cmd} — not found`);
        }
      }
      console.log('');

      console.log('Directories:');
      try {
        const layout = resolveLayout(loaded);
        for (const [label, path] of [
          ['Versions dir', layout.versionsDir],
          ['Managed root', layout.managedRoot],
          ['State dir', layout.stateDir],
        ] as const) {
          if (dirExists(path)) {
            ok(`  ${label} — ${path}`);
          } else {
            warn(`  ${label} — missing (${path})`);
          }
        }
        info(`  Prefix — ${layout.prefix}`);
        info(`  Registered toolchains — ${listRegistrations(layout).length}`);

        const overridesFile = getOverridesFile(layout);
        if (fileExists(overridesFile)) {
          info(`  Pinned aliases — ${listOverrides(overridesFile).length}`);
        }
      } catch (err) {
        fail(`  ${String(err)}`);
      }
      console.log('');

      ok('Doctor complete.');
    });
}
