#!/usr/bin/env node
import { Command } from 'commander';
import { APP_NAME, DESCRIPTION } from './config/branding.js';
import {
  registerVersion,
  registerRefresh,
  registerSync,
  registerAlias,
  registerList,
  registerClear,
  registerUnregister,
  registerConfig,
  registerDoctor,
} from './commands/index.js';

const program = new Command()
  .name(APP_NAME)
  .description(DESCRIPTION)
  .showHelpAfterError(true);

registerVersion(program);
registerRefresh(program);
registerSync(program);
registerAlias(program);
registerList(program);
registerClear(program);
registerUnregister(program);
registerConfig(program);
registerDoctor(program);

await program.parseAsync();
