import * as fs from 'fs';
import * as path from 'path';
import { format } from 'util';
import type { StreamLogger } from '../app/stream/handlers/types.js';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface FileLoggerOptions {
  /** Also forward to this logger; null for file only */
  echo?: StreamLogger | null;
  /** Write debug lines to the file */
  debug?: boolean;
  now?: () => Date;
}

export function formatLogLine(level: LogLevel, args: unknown[], at: Date): string {
  return `[${at.toISOString()}] ${level.toUpperCase()} ${format(...args)}\n`;
}

/**
 * Logger that appends timestamped lines to `logFile`.
 */
export function createFileLogger(logFile: string, options: FileLoggerOptions = {}): StreamLogger {
  fs.mkdirSync(path.dirname(logFile), { recursive: true, mode: 0o700 });
  const echo = options.echo === undefined ? console : options.echo;
  const now = options.now ?? (() => new Date());

  const write = (level: LogLevel, args: unknown[]): void => {
    if (level !== 'debug' || options.debug) {
      fs.appendFileSync(logFile, formatLogLine(level, args, now()));
    }
    echo?.[level](...args);
  };

  return {
    debug: (...args: unknown[]) => write('debug', args),
    info: (...args: unknown[]) => write('info', args),
    warn: (...args: unknown[]) => write('warn', args),
    error: (...args: unknown[]) => write('error', args),
  };
}
