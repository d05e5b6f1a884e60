import * as fs from 'fs';
import * as path from 'path';
import Ajv2020 from 'ajv/dist/2020.js';
import {
  DEFAULT_COMMENT_FILTER_CONFIG,
  type CommentFilterConfig,
} from '../../app/stream/comment-filter.js';
import { ConfigValidationError } from './runtime-config.js';
import { getConfigDir, resolveBundledDir } from './config-paths.js';

/**
 * Shape of `comment-filter.json`. Words and users extend the defaults;
 * the scalar settings replace them.
 */
export interface CommentFilterFile {
  ngWords?: string[];
  ngPatterns?: string[];
  blockedUsers?: string[];
  allowedUsers?: string[];
  minLength?: number;
  maxLength?: number;
  matchingMode?: CommentFilterConfig['matchingMode'];
  /** Skip the bundled NG-word list */
  replaceDefaultNgWords?: boolean;
}

const stringList = { type: 'array', items: { type: 'string' } };

export const COMMENT_FILTER_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  title: 'Comment Filter Configuration',
  type: 'object',
  properties: {
    $schema: { type: 'string' },
    ngWords: stringList,
    ngPatterns: { type: 'array', items: { type: 'string', format: 'regex' } },
    blockedUsers: stringList,
    allowedUsers: stringList,
    minLength: { type: 'integer', minimum: 0 },
    maxLength: { type: 'integer', minimum: 1 },
    matchingMode: { enum: ['substring', 'word_boundary'] },
    replaceDefaultNgWords: { type: 'boolean' },
  },
  additionalProperties: false,
};

export function getCommentFilterPath(): string {
  return path.join(getConfigDir(), 'comment-filter.json');
}

export function getDefaultNgWordsPath(): string {
  return path.join(resolveBundledDir(__dirname, 'infra', 'config', 'defaults'), 'ng-words.txt');
}

/**
 * Parse a word list: one word per line, blank lines skipped, `#` lines are
 * comments unless the line is just `#`.
 */
export function parseWordList(content: string): string[] {
  const words: string[] = [];
  for (const line of content.split(/\r?\n/)) {
    const word = line.trim();
    if (!word) {
      continue;
    }
    if (word.startsWith('#') && word.length > 1) {
      continue;
    }
    words.push(word);
  }
  return words;
}

export function validateCommentFilterFile(value: unknown): CommentFilterFile {
  const ajv = new Ajv2020({ allErrors: true, strict: false });
  ajv.addFormat('regex', (pattern: string) => {
    try {
      new RegExp(pattern);
      return true;
    } catch {
      return false;
    }
  });

  const validate = ajv.compile<CommentFilterFile>(COMMENT_FILTER_SCHEMA);
  if (!validate(value)) {
    const errors = (validate.errors ?? []).map((err) => ({
      path: err.instancePath || '/',
      message: err.message ?? 'Unknown validation error',
    }));
    throw new ConfigValidationError(
      `Invalid comment filter config: ${errors.map((e) => `${e.path}: ${e.message}`).join('; ')}`,
      errors
    );
  }
  return value;
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

export function mergeCommentFilterConfig(defaultNgWords: string[], file: CommentFilterFile): CommentFilterConfig {
  const base = DEFAULT_COMMENT_FILTER_CONFIG;
  const ngWords = file.replaceDefaultNgWords ? file.ngWords ?? [] : [...defaultNgWords, ...(file.ngWords ?? [])];
  const minLength = file.minLength ?? base.minLength;

  return {
    ngWords: unique(ngWords),
    ngPatterns: unique([...base.ngPatterns, ...(file.ngPatterns ?? [])]),
    blockedUsers: unique(file.blockedUsers ?? []),
    allowedUsers: unique(file.allowedUsers ?? []),
    minLength,
    maxLength: Math.max(minLength, file.maxLength ?? base.maxLength),
    matchingMode: file.matchingMode ?? base.matchingMode,
  };
}

/**
 * Bundled NG words plus `comment-filter.json`, when present.
 */
export function loadCommentFilterConfig(
  options: { filePath?: string; ngWordsPath?: string } = {}
): CommentFilterConfig {
  const ngWordsPath = options.ngWordsPath ?? getDefaultNgWordsPath();
  const defaultNgWords = fs.existsSync(ngWordsPath) ? parseWordList(fs.readFileSync(ngWordsPath, 'utf-8')) : [];

  const filePath = options.filePath ?? getCommentFilterPath();
  if (!fs.existsSync(filePath)) {
    return mergeCommentFilterConfig(defaultNgWords, {});
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError(`Cannot parse ${filePath}: ${message}`, [{ path: '/', message }]);
  }

  return mergeCommentFilterConfig(defaultNgWords, validateCommentFilterFile(parsed));
}
