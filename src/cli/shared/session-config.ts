import chalk from 'chalk';
import { ConfigValidationError, loadRuntimeConfig, type StreamerConfig } from '../../infra/config/runtime-config.js';
import { resolveStreamerPaths, type StreamerPaths } from '../../infra/config/streamer-paths.js';

export interface SessionConfig {
  config: StreamerConfig;
  paths: StreamerPaths;
}

export function loadSessionConfig(configPath?: string): SessionConfig {
  const config = loadRuntimeConfig(configPath ? { configPath } : {});
  return { config, paths: resolveStreamerPaths(config.paths.dataDir) };
}

/**
 * Print a configuration or startup error and return the exit code to use.
 */
export function reportCliError(prefix: string, error: unknown): number {
  if (error instanceof ConfigValidationError) {
    console.error(chalk.red(`${prefix}: ${error.message}`));
    for (const issue of error.errors) {
      console.error(chalk.gray(`  ${issue.path}: ${issue.message}`));
    }
    return 1;
  }

  console.error(chalk.red(`${prefix}:`), error instanceof Error ? error.message : String(error));
  return 1;
}

export function formatUptime(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) {
    return `${days}d ${hours % 24}h ${minutes % 60}m`;
  } else if (hours > 0) {
    return `${hours}h ${minutes % 60}m`;
  } else if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  return `${seconds}s`;
}
