/**
 * Start command - run one streaming session
 *
 * Foreground by default. With --detach the session is re-launched as a
 * detached child that logs to the data directory.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { spawn } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { loadCommentFilterConfig } from '../../infra/config/comment-filter-config.js';
import { JsonlChatSource } from '../../infra/collaborators/jsonl-chat-source.js';
import { FilePromptTemplates, getUserTemplateDir } from '../../infra/prompts/template-loader.js';
import { createFileLogger } from '../../streamer-daemon/file-logger.js';
import { StreamerDaemon, EXIT_FATAL } from '../../streamer-daemon/daemon.js';
import { isProcessRunning, readStreamerLock } from '../../streamer-daemon/pid-lock.js';
import { loadSessionConfig, reportCliError, type SessionConfig } from '../shared/session-config.js';

const BACKGROUND_ENV = 'STREAMER_BACKGROUND';

interface StartCommandOptions {
  theme?: string;
  seed?: string;
  chatFile?: string;
  mock?: boolean;
  config?: string;
  detach?: boolean;
  debug?: boolean;
}

function readTheme(themeFile: string): { content: string; source: string } {
  const content = fs.readFileSync(themeFile, 'utf-8').trim();
  if (!content) {
    throw new Error(`Theme file is empty: ${themeFile}`);
  }
  return { content, source: path.resolve(themeFile) };
}

function buildChildArgs(options: StartCommandOptions): string[] {
  const args = [path.join(__dirname, '..', 'index.js'), 'start'];
  if (options.theme) args.push('--theme', path.resolve(options.theme));
  if (options.seed) args.push('--seed', options.seed);
  if (options.chatFile) args.push('--chat-file', path.resolve(options.chatFile));
  if (options.mock) args.push('--mock');
  if (options.config) args.push('--config', path.resolve(options.config));
  if (options.debug) args.push('--debug');
  return args;
}

function startDetached(options: StartCommandOptions, logFile: string, pidFile: string): void {
  console.log(chalk.blue('Starting streamer in background...'));

  fs.mkdirSync(path.dirname(logFile), { recursive: true, mode: 0o700 });
  const logFd = fs.openSync(logFile, 'a');
  const child = spawn(process.execPath, buildChildArgs(options), {
    detached: true,
    stdio: ['ignore', logFd, logFd],
    env: { ...process.env, [BACKGROUND_ENV]: '1' },
  });
  child.unref();
  fs.closeSync(logFd);

  setTimeout(() => {
    const lock = readStreamerLock(pidFile);
    if (lock && isProcessRunning(lock.pid)) {
      console.log(chalk.green('\n✓ Streamer started in background'));
      console.log(chalk.gray(`  PID: ${lock.pid}`));
      console.log(chalk.gray(`  Log: ${logFile}`));
      console.log(chalk.gray('\nUse `streamer stop` to end the stream'));
    } else {
      console.log(chalk.red('Failed to start streamer. Check logs:'));
      console.log(chalk.gray(`  ${logFile}`));
      process.exitCode = EXIT_FATAL;
    }
  }, 1500).unref();
}

async function runStart(options: StartCommandOptions): Promise<void> {
  const isBackground = process.env[BACKGROUND_ENV] === '1';

  let session: SessionConfig;
  try {
    session = loadSessionConfig(options.config);
  } catch (error) {
    process.exitCode = reportCliError('Invalid configuration', error);
    return;
  }
  const { config, paths } = session;

  const existing = readStreamerLock(paths.pidFile);
  if (existing && isProcessRunning(existing.pid)) {
    console.log(chalk.yellow('⚠ Streamer is already running'));
    console.log(chalk.gray(`  PID: ${existing.pid}`));
    console.log(chalk.gray('\nRun `streamer stop` first'));
    process.exitCode = EXIT_FATAL;
    return;
  }

  if (options.detach && !isBackground) {
    startDetached(options, paths.logFile, paths.pidFile);
    return;
  }

  const logger = createFileLogger(paths.logFile, { echo: isBackground ? null : console, debug: options.debug });

  try {
    const daemon = new StreamerDaemon({
      config,
      paths,
      filterConfig: loadCommentFilterConfig(),
      templates: new FilePromptTemplates({ userDir: getUserTemplateDir() }),
      mock: options.mock,
      seed: options.seed,
      theme: options.theme ? readTheme(options.theme) : undefined,
      chatSource: options.chatFile ? new JsonlChatSource({ filePath: options.chatFile, logger }) : undefined,
      logger,
      mode: isBackground ? 'background' : 'foreground',
      handleSignals: true,
      exit: (code) => process.exit(code),
    });

    if (!isBackground) {
      console.log(chalk.blue('Starting streamer...'));
      console.log(chalk.gray(`  Generator: ${options.mock ? 'mock' : config.generator.provider}`));
      console.log(chalk.gray(`  Data dir: ${paths.dataDir}`));
      console.log(chalk.gray('  Press Ctrl+C to end the stream (twice to force)\n'));
    }

    const report = await daemon.run();
    process.exitCode = report.exitCode;

    if (!isBackground && report.result.outcome === 'graceful') {
      console.log(chalk.green('\n✓ Stream ended'));
      if (report.result.summaryTaskId) {
        console.log(chalk.gray(`  Summary task: ${report.result.summaryTaskId}`));
      }
    } else if (report.result.outcome === 'fatal') {
      console.error(chalk.red(`Stream stopped: ${report.result.error.message}`));
    }
  } catch (error) {
    logger.error('[Start] Streamer failed', error);
    process.exitCode = reportCliError('Failed to start streamer', error);
  }
}

export const startCommand = new Command('start')
  .description('Start streaming')
  .option('--theme <file>', 'Text file with a theme to talk about')
  .option('--seed <n>', 'Seed for reproducible mode selection')
  .option('--chat-file <jsonl>', 'Replay live chat from a JSONL file')
  .option('--mock', 'Use the offline text generator')
  .option('-c, --config <path>', 'Configuration file (default: streamer.json in the config dir)')
  .option('-d, --detach', 'Run in the background')
  .option('--debug', 'Write debug lines to the log file')
  .action(async (options: StartCommandOptions) => {
    await runStart(options);
  });
