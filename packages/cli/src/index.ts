#!/usr/bin/env node
import { Command } from 'commander';
import { COMMONROOM_VERSION } from '@commonroom/core';
import { registerServeCommand } from './commands/serve.js';
import { registerMigrateCommand } from './commands/migrate.js';
import { registerCheckDocsCommand } from './commands/check-docs.js';

const program = new Command();
program
  .name('commonroom')
  .description('Commonroom: community site with accounts, presence and shared content')
  .version(COMMONROOM_VERSION);

registerServeCommand(program);
registerMigrateCommand(program);
registerCheckDocsCommand(program);

program.parse();
