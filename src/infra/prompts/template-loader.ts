import * as fs from 'fs';
import * as path from 'path';
import { STREAM_MODES } from '../../domain/stream/modes.js';
import type { PromptTemplateName, PromptTemplateSource } from '../../app/stream/prompt-composer.js';
import { getConfigDir, resolveBundledDir } from '../config/config-paths.js';

export const PROMPT_TEMPLATE_NAMES: readonly PromptTemplateName[] = [
  'persona',
  ...STREAM_MODES.map((mode): PromptTemplateName => `mode/${mode}`),
  'greeting',
  'farewell',
  'comment-response',
  'stream-summary',
  'daily-summary',
  'memory-digest',
  'memory-compress',
];

export function getDefaultTemplateDir(): string {
  return resolveBundledDir(__dirname, 'infra', 'prompts', 'defaults');
}

export function getUserTemplateDir(): string {
  return path.join(getConfigDir(), 'prompts');
}

export function templateFileName(name: PromptTemplateName): string {
  return `${name}.md`;
}

export interface FilePromptTemplatesOptions {
  /** Checked first; a template present here overrides the bundled one */
  userDir?: string;
  defaultDir?: string;
}

/**
 * Reads `<name>.md` from the user's prompt directory, falling back to the
 * bundled defaults. Contents are cached per path.
 */
export class FilePromptTemplates implements PromptTemplateSource {
  private cache = new Map<string, string>();
  private userDir: string | null;
  private defaultDir: string;

  constructor(options: FilePromptTemplatesOptions = {}) {
    this.userDir = options.userDir ?? null;
    this.defaultDir = options.defaultDir ?? getDefaultTemplateDir();
  }

  load(name: PromptTemplateName): string {
    const templatePath = this.resolve(name);
    const cached = this.cache.get(templatePath);
    if (cached !== undefined) {
      return cached;
    }

    const content = fs.readFileSync(templatePath, 'utf-8');
    this.cache.set(templatePath, content);
    return content;
  }

  resolve(name: PromptTemplateName): string {
    const fileName = templateFileName(name);
    if (this.userDir) {
      const userPath = path.join(this.userDir, fileName);
      if (fs.existsSync(userPath)) {
        return userPath;
      }
    }

    const defaultPath = path.join(this.defaultDir, fileName);
    if (!fs.existsSync(defaultPath)) {
      throw new Error(`Prompt template not found: ${defaultPath}`);
    }
    return defaultPath;
  }

  /**
   * Names missing from the bundled defaults. Empty when the install is complete.
   */
  findMissing(): PromptTemplateName[] {
    return PROMPT_TEMPLATE_NAMES.filter((name) => !fs.existsSync(path.join(this.defaultDir, templateFileName(name))));
  }

  clearCache(): void {
    this.cache.clear();
  }
}

/**
 * Copy bundled templates into `targetDir` so they can be edited. Existing
 * files are left alone. Returns the relative paths written.
 */
export function seedPromptTemplates(targetDir: string, defaultDir: string = getDefaultTemplateDir()): string[] {
  const written: string[] = [];
  for (const name of PROMPT_TEMPLATE_NAMES) {
    const fileName = templateFileName(name);
    const targetPath = path.join(targetDir, fileName);
    if (fs.existsSync(targetPath)) {
      continue;
    }

    const sourcePath = path.join(defaultDir, fileName);
    if (!fs.existsSync(sourcePath)) {
      continue;
    }

    fs.mkdirSync(path.dirname(targetPath), { recursive: true, mode: 0o700 });
    fs.writeFileSync(targetPath, fs.readFileSync(sourcePath, 'utf-8'), { mode: 0o600 });
    written.push(fileName);
  }
  return written;
}
