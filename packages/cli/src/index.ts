#!/usr/bin/env tsx

import { Command } from 'commander';
import chalk from 'chalk';
import { RELAYWATCH_VERSION, errorMessage } from '@relaywatch/shared';
import { reportAction } from './commands/report.js';

const program = new Command();

program
  .name('relaywatch')
  .description(`${chalk.bold('relaywatch')} ${RELAYWATCH_VERSION}: Tor relay health report`)
  .option('--stdout', 'Print report to stdout instead of emailing')
  .action(reportAction);

program.parseAsync(process.argv).catch((err: unknown) => {
  console.log(chalk.red(`Error: ${errorMessage(err)}`));
});
