import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';
import * as path from 'path';
import { getConfigDir } from '../../infra/config/config-paths.js';
import { getCommentFilterPath, loadCommentFilterConfig } from '../../infra/config/comment-filter-config.js';
import {
  DEFAULT_STREAMER_CONFIG,
  STREAMER_CONFIG_SCHEMA,
  getRuntimeConfigPath,
  loadRuntimeConfig,
  redactConfig,
  saveRuntimeConfig,
} from '../../infra/config/runtime-config.js';
import { FilePromptTemplates, getUserTemplateDir, seedPromptTemplates } from '../../infra/prompts/template-loader.js';
import { reportCliError } from '../shared/session-config.js';

type InitStatus = 'created' | 'exists' | 'overwritten';

interface InitResult {
  file: string;
  status: InitStatus;
}

function writeJsonFile(filePath: string, value: unknown, force: boolean): InitResult {
  const existed = fs.existsSync(filePath);
  if (existed && !force) {
    return { file: filePath, status: 'exists' };
  }
  fs.mkdirSync(path.dirname(filePath), { recursive: true, mode: 0o700 });
  fs.writeFileSync(filePath, JSON.stringify(value, null, 2) + '\n', { mode: 0o600 });
  return { file: filePath, status: existed ? 'overwritten' : 'created' };
}

function initConfigFiles(force: boolean): InitResult[] {
  const configPath = getRuntimeConfigPath();
  const results: InitResult[] = [];

  const configExisted = fs.existsSync(configPath);
  if (configExisted && !force) {
    results.push({ file: configPath, status: 'exists' });
  } else {
    saveRuntimeConfig(DEFAULT_STREAMER_CONFIG, configPath);
    results.push({ file: configPath, status: configExisted ? 'overwritten' : 'created' });
  }

  results.push(
    writeJsonFile(path.join(path.dirname(configPath), 'streamer.schema.json'), STREAMER_CONFIG_SCHEMA, true)
  );
  results.push(
    writeJsonFile(getCommentFilterPath(), { ngWords: [], blockedUsers: [], allowedUsers: [] }, force)
  );

  const promptDir = getUserTemplateDir();
  for (const file of seedPromptTemplates(promptDir)) {
    results.push({ file: path.join(promptDir, file), status: 'created' });
  }
  return results;
}

export const configCommand = new Command('config').description('Manage streamer configuration');

configCommand
  .command('show')
  .description('Print the effective configuration (defaults, file, environment)')
  .option('-c, --config <path>', 'Configuration file')
  .action((options: { config?: string }) => {
    try {
      const config = loadRuntimeConfig(options.config ? { configPath: options.config } : {});
      console.log(JSON.stringify(redactConfig(config), null, 2));
    } catch (error) {
      process.exitCode = reportCliError('Invalid configuration', error);
    }
  });

configCommand
  .command('path')
  .description('Print the configuration directory')
  .action(() => {
    console.log(getConfigDir());
  });

configCommand
  .command('validate')
  .description('Check the configuration, the comment filter and the prompt templates')
  .option('-c, --config <path>', 'Configuration file')
  .action((options: { config?: string }) => {
    try {
      loadRuntimeConfig(options.config ? { configPath: options.config } : {});
      const filter = loadCommentFilterConfig();
      console.log(chalk.green('✓ Configuration is valid'));
      console.log(chalk.gray(`  NG words: ${filter.ngWords.length}, patterns: ${filter.ngPatterns.length}`));
    } catch (error) {
      process.exitCode = reportCliError('Invalid configuration', error);
      return;
    }

    const missing = new FilePromptTemplates().findMissing();
    if (missing.length > 0) {
      console.log(chalk.red(`✗ Missing prompt templates: ${missing.join(', ')}`));
      process.exitCode = 1;
    } else {
      console.log(chalk.green('✓ Prompt templates are complete'));
    }
  });

configCommand
  .command('init')
  .description('Write default configuration files and editable prompt templates')
  .option('-f, --force', 'Overwrite existing configuration files')
  .action((options: { force?: boolean }) => {
    console.log(chalk.bold('\nInitializing streamer configuration...'));
    console.log(chalk.gray(`Directory: ${getConfigDir()}\n`));

    let results: InitResult[];
    try {
      results = initConfigFiles(options.force ?? false);
    } catch (error) {
      process.exitCode = reportCliError('Initialization failed', error);
      return;
    }

    for (const result of results) {
      const icon = result.status === 'exists' ? chalk.gray('•') : chalk.green('✓');
      console.log(`  ${icon} ${result.file}`);
      console.log(chalk.gray(`    ${result.status}`));
    }

    const skipped = results.filter((result) => result.status === 'exists').length;
    if (skipped > 0 && !options.force) {
      console.log(chalk.gray(`\n${skipped} file(s) already exist. Use ${chalk.bold('--force')} to overwrite.`));
    }

    console.log(chalk.bold('\nNext steps:'));
    console.log(`  1. Set ${chalk.cyan('OPENAI_API_KEY')} or run with ${chalk.cyan('--mock')}`);
    console.log(`  2. Edit the prompt templates under ${chalk.cyan(getUserTemplateDir())}`);
    console.log(`  3. Run ${chalk.cyan('streamer start')}`);
  });
