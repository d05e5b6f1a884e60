/**
 * Configuration module exports
 */
export { APP_DIR_NAME, getConfigDir, getDefaultDataDir, resolveBundledDir } from './config-paths.js';

export {
  type StreamerConfig,
  type GeneratorProvider,
  ConfigValidationError,
  DEFAULT_STREAMER_CONFIG,
  STREAMER_CONFIG_SCHEMA,
  getRuntimeConfigPath,
  validateStreamerConfig,
  normalizeConfig,
  applyEnvironmentOverrides,
  loadRuntimeConfig,
  saveRuntimeConfig,
  redactConfig,
} from './runtime-config.js';

export {
  type CommentFilterFile,
  COMMENT_FILTER_SCHEMA,
  getCommentFilterPath,
  getDefaultNgWordsPath,
  parseWordList,
  validateCommentFilterFile,
  mergeCommentFilterConfig,
  loadCommentFilterConfig,
} from './comment-filter-config.js';

export { type StreamerPaths, resolveStreamerPaths } from './streamer-paths.js';
