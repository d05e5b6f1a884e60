import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';
import { openStreamArchive } from '../../infra/persistence/database.js';
import { isProcessRunning, readStreamerLock } from '../../streamer-daemon/pid-lock.js';
import { formatUptime, loadSessionConfig, reportCliError, type SessionConfig } from '../shared/session-config.js';

interface StatusCommandOptions {
  config?: string;
  summaries?: string | boolean;
}

function printSummaries(archiveDb: string, limit: number): void {
  if (!fs.existsSync(archiveDb)) {
    console.log(chalk.gray('  No archive yet'));
    return;
  }

  const { db, archive } = openStreamArchive(archiveDb);
  try {
    const summaries = archive.listSummaries(limit);
    if (summaries.length === 0) {
      console.log(chalk.gray('  No summaries yet'));
      return;
    }
    for (const summary of summaries) {
      const when = new Date(summary.createdAt).toISOString();
      console.log(`  ${chalk.cyan(summary.kind.padEnd(6))} ${chalk.gray(when)} ${summary.durationMinutes}m, ${summary.entryCount} entries`);
      if (summary.topics.length > 0) {
        console.log(chalk.gray(`         ${summary.topics.join(' / ')}`));
      }
    }
  } finally {
    db.close();
  }
}

function runStatus(options: StatusCommandOptions): void {
  let session: SessionConfig;
  try {
    session = loadSessionConfig(options.config);
  } catch (error) {
    process.exitCode = reportCliError('Invalid configuration', error);
    return;
  }
  const { config, paths } = session;
  const lock = readStreamerLock(paths.pidFile);

  console.log(chalk.blue('\nStreamer Status:\n'));

  if (!lock) {
    console.log(chalk.white('  Status:'), chalk.yellow('Not running'));
  } else {
    const running = isProcessRunning(lock.pid);
    console.log(chalk.white('  Status:'), running ? chalk.green('Running') : chalk.red('Not Running'));
    console.log(chalk.white('  PID:'), chalk.cyan(lock.pid));
    console.log(chalk.white('  Mode:'), chalk.cyan(lock.mode));
    console.log(chalk.white('  Started:'), chalk.gray(new Date(lock.startedAt).toISOString()));
    if (running) {
      console.log(chalk.white('  Uptime:'), chalk.gray(formatUptime(Date.now() - lock.startedAt)));
    } else {
      console.log(chalk.yellow('\n⚠ Process is not running but PID file exists'));
    }
  }

  console.log(chalk.white('  Generator:'), chalk.gray(`${config.generator.provider} (${config.generator.model})`));
  console.log(chalk.white('  Data dir:'), chalk.gray(paths.dataDir));
  console.log(chalk.white('  Log file:'), chalk.gray(paths.logFile));
  if (fs.existsSync(paths.shutdownMarker)) {
    console.log(chalk.white('  Shutdown:'), chalk.yellow('requested, waiting for the streamer'));
  }

  if (options.summaries) {
    const limit = typeof options.summaries === 'string' ? Number.parseInt(options.summaries, 10) : 5;
    console.log(chalk.blue('\nRecent summaries:\n'));
    printSummaries(paths.archiveDb, Number.isFinite(limit) && limit > 0 ? limit : 5);
  }
  console.log();
}

export const statusCommand = new Command('status')
  .description('Show whether a stream is running')
  .option('-c, --config <path>', 'Configuration file')
  .option('-s, --summaries [count]', 'Also list recent summaries')
  .action((options: StatusCommandOptions) => {
    runStatus(options);
  });
