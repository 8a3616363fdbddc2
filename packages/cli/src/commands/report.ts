import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { createLogger, errorMessage, getLogger, setDefaultLogger } from '@relaywatch/shared';
import type { RelayWatchConfig } from '@relaywatch/shared';
import { loadConfig, runReport } from '@relaywatch/core';
import type { ReportStage } from '@relaywatch/core';

export interface ReportCommandOptions {
  stdout?: boolean;
}

function stageHandler(spinner: Ora | null): (stage: ReportStage) => void {
  return (stage) => {
    if (!spinner) return;
    switch (stage) {
      case 'collect':
        spinner.start('Collecting relay status...');
        break;
      case 'send':
        spinner.text = 'Sending report email...';
        break;
      case 'done':
        spinner.stop();
        break;
    }
  };
}

/**
 * Collect and deliver one report. Never rejects and never sets a failing
 * exit code: an unattended scheduler should not treat a bad report as a failed job.
 */
export async function reportAction(options: ReportCommandOptions): Promise<void> {
  let config: RelayWatchConfig;
  try {
    config = loadConfig().config;
  } catch (err) {
    console.log(chalk.red(`Error: ${errorMessage(err)}`));
    return;
  }

  setDefaultLogger(createLogger({ level: config.logLevel, pretty: process.stderr.isTTY === true }));

  const stdout = options.stdout === true;
  const spinner = stdout ? null : ora({ stream: process.stderr });

  try {
    await runReport({ config, stdout, onStage: stageHandler(spinner) });
  } catch (err) {
    spinner?.stop();
    getLogger().error({ err }, 'Report run failed');
    console.log(chalk.red(`Error: ${errorMessage(err)}`));
  }
}
