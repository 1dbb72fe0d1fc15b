#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { registerSSHCommands } from './commands/ssh';
import { registerToolCommands } from './commands/tools';
import { logger } from '../lib/logger';

const program = new Command();

program
  .name('rsk')
  .description('Remote Shell Kit - run commands on remote hosts over SSH')
  .option('-v, --verbose', 'Log SSH session activity')
  .hook('preAction', (thisCommand) => {
    if (thisCommand.opts().verbose) {
      logger.setLevel('debug');
    }
  });

registerSSHCommands(program);
registerToolCommands(program);

program.parseAsync().catch((error: unknown) => {
  console.error(
    chalk.red(`✗ Error: ${error instanceof Error ? error.message : error}`)
  );
  process.exit(1);
});
