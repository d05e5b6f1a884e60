import { Command } from 'commander';
import chalk from 'chalk';
import { writeShutdownMarker } from '../../infra/shutdown/marker-watcher.js';
import { isProcessRunning, readStreamerLock, releaseStreamerLock } from '../../streamer-daemon/pid-lock.js';
import { loadSessionConfig, reportCliError, type SessionConfig } from '../shared/session-config.js';

interface StopCommandOptions {
  config?: string;
  wait?: boolean;
  timeout: string;
  force?: boolean;
}

async function waitForExit(pid: number, timeoutMs: number): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    if (!isProcessRunning(pid)) {
      return true;
    }
    await new Promise((resolve) => setTimeout(resolve, 200));
  }
  return !isProcessRunning(pid);
}

async function runStop(options: StopCommandOptions): Promise<void> {
  let session: SessionConfig;
  try {
    session = loadSessionConfig(options.config);
  } catch (error) {
    process.exitCode = reportCliError('Invalid configuration', error);
    return;
  }
  const { paths } = session;

  const lock = readStreamerLock(paths.pidFile);
  if (!lock || !isProcessRunning(lock.pid)) {
    console.log(chalk.yellow('Streamer is not running'));
    if (lock) {
      releaseStreamerLock(paths.pidFile);
    }
    return;
  }

  if (options.force) {
    // Two interrupts: the second one aborts without a farewell
    console.log(chalk.yellow(`Forcing streamer (PID: ${lock.pid}) to stop...`));
    process.kill(lock.pid, 'SIGINT');
    await new Promise((resolve) => setTimeout(resolve, 100));
    process.kill(lock.pid, 'SIGINT');
  } else {
    try {
      writeShutdownMarker(paths.shutdownMarker, { requestedAt: Date.now(), requestedBy: process.pid });
    } catch (error) {
      process.exitCode = reportCliError('Cannot request shutdown', error);
      return;
    }
    console.log(chalk.blue(`Shutdown requested (PID: ${lock.pid})`));
    console.log(chalk.gray('  The streamer says goodbye and writes its summary before exiting.'));
  }

  if (!options.wait && !options.force) {
    return;
  }

  const timeoutMs = Number.parseInt(options.timeout, 10) * 1000;
  const exited = await waitForExit(lock.pid, Number.isFinite(timeoutMs) && timeoutMs > 0 ? timeoutMs : 120_000);
  if (exited) {
    console.log(chalk.green('✓ Streamer stopped'));
  } else {
    console.log(chalk.yellow('Streamer is still running; use --force to cut it off'));
    process.exitCode = 1;
  }
}

export const stopCommand = new Command('stop')
  .description('End the stream gracefully (farewell, summary, exit)')
  .option('-c, --config <path>', 'Configuration file')
  .option('-w, --wait', 'Wait until the process has exited')
  .option('-t, --timeout <seconds>', 'How long to wait with --wait', '120')
  .option('-f, --force', 'Abort immediately without a farewell')
  .action(async (options: StopCommandOptions) => {
    await runStop(options);
  });
