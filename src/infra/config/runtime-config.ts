import * as fs from 'fs';
import * as path from 'path';
import Ajv2020 from 'ajv/dist/2020.js';
import addFormats from 'ajv-formats';
import {
  DEFAULT_DWELL_POLICY,
  DEFAULT_MODE_WEIGHTS,
  STREAM_MODES,
  type ModeDwellPolicy,
  type ModeWeights,
} from '../../domain/stream/modes.js';
import { StreamError, StreamErrorCodes } from '../../domain/stream/errors.js';
import { getConfigDir, getDefaultDataDir } from './config-paths.js';

export type GeneratorProvider = 'openai' | 'mock';

export interface StreamerConfig {
  $schema?: string;
  paths: {
    dataDir: string;
  };
  generator: {
    provider: GeneratorProvider;
    baseUrl: string;
    model: string;
    apiKey?: string;
    temperature: number;
    maxTokens: number;
  };
  speech: {
    charsPerSecond: number;
    minDurationMs: number;
    /** Caption and speak utterances sentence by sentence */
    segmentUtterances: boolean;
    segmentMaxLength: number;
    segmentMinMergeLength: number;
  };
  stream: {
    pollIntervalMs: number;
    cadenceMs: number;
    idleRestartMs: number;
    contextEntries: number;
    generationTimeoutMs: number;
    speechTimeoutMs: number;
    farewellTimeoutMs: number;
    summaryTimeoutMs: number;
    fallbackGreeting: string;
    fallbackFarewell: string;
  };
  modes: {
    weights: ModeWeights;
    dwell: ModeDwellPolicy;
  };
  comments: {
    responseThreshold: number;
    pendingLimit: number;
    restartDelayMs: number;
  };
  cooldown: {
    failureThreshold: number;
    cooldownCycles: number;
  };
  dailySummary: {
    enabled: boolean;
    cron: string;
    timezone?: string;
  };
  memory: {
    enabled: boolean;
    intervalMs: number;
    minEntries: number;
    compressionThreshold: number;
    contextBlocks: number;
  };
  shutdown: {
    markerPollMs: number;
  };
}

export class ConfigValidationError extends StreamError {
  constructor(
    message: string,
    public readonly errors: Array<{ path: string; message: string }>
  ) {
    super(StreamErrorCodes.CONFIG_INVALID, message, { errors });
    this.name = 'ConfigValidationError';
  }
}

export const DEFAULT_STREAMER_CONFIG: StreamerConfig = {
  $schema: './streamer.schema.json',
  paths: {
    dataDir: getDefaultDataDir(),
  },
  generator: {
    provider: 'openai',
    baseUrl: 'https://api.openai.com/v1',
    model: 'gpt-4o-mini',
    temperature: 0.9,
    maxTokens: 400,
  },
  speech: {
    charsPerSecond: 8,
    minDurationMs: 500,
    segmentUtterances: true,
    segmentMaxLength: 60,
    segmentMinMergeLength: 10,
  },
  stream: {
    pollIntervalMs: 1000,
    cadenceMs: 4000,
    idleRestartMs: 90_000,
    contextEntries: 10,
    generationTimeoutMs: 30_000,
    speechTimeoutMs: 60_000,
    farewellTimeoutMs: 30_000,
    summaryTimeoutMs: 60_000,
    fallbackGreeting: 'Hello everyone, welcome to the stream!',
    fallbackFarewell: 'That is all for today. Thank you for watching, see you next time!',
  },
  modes: {
    weights: { ...DEFAULT_MODE_WEIGHTS },
    dwell: { ...DEFAULT_DWELL_POLICY },
  },
  comments: {
    responseThreshold: 3,
    pendingLimit: 50,
    restartDelayMs: 5000,
  },
  cooldown: {
    failureThreshold: 5,
    cooldownCycles: 3,
  },
  dailySummary: {
    enabled: false,
    cron: '55 23 * * *',
  },
  memory: {
    enabled: true,
    intervalMs: 300_000,
    minEntries: 5,
    compressionThreshold: 5,
    contextBlocks: 5,
  },
  shutdown: {
    markerPollMs: 1000,
  },
};

const positiveInt = { type: 'integer', minimum: 1 };
const nonNegativeInt = { type: 'integer', minimum: 0 };

const modeWeightProperties = Object.fromEntries(
  STREAM_MODES.map((mode) => [mode, { type: 'number', minimum: 0 }])
);

/**
 * Schema of the config file. Every field is optional; missing ones come
 * from the defaults.
 */
export const STREAMER_CONFIG_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  title: 'Monologue Streamer Configuration',
  type: 'object',
  properties: {
    $schema: { type: 'string' },
    paths: {
      type: 'object',
      properties: { dataDir: { type: 'string', minLength: 1 } },
      additionalProperties: false,
    },
    generator: {
      type: 'object',
      properties: {
        provider: { enum: ['openai', 'mock'] },
        baseUrl: { type: 'string', format: 'uri' },
        model: { type: 'string', minLength: 1 },
        apiKey: { type: 'string' },
        temperature: { type: 'number', minimum: 0, maximum: 2 },
        maxTokens: positiveInt,
      },
      additionalProperties: false,
    },
    speech: {
      type: 'object',
      properties: {
        charsPerSecond: { type: 'number', exclusiveMinimum: 0 },
        minDurationMs: nonNegativeInt,
        segmentUtterances: { type: 'boolean' },
        segmentMaxLength: positiveInt,
        segmentMinMergeLength: nonNegativeInt,
      },
      additionalProperties: false,
    },
    stream: {
      type: 'object',
      properties: {
        pollIntervalMs: positiveInt,
        cadenceMs: nonNegativeInt,
        idleRestartMs: positiveInt,
        contextEntries: positiveInt,
        generationTimeoutMs: positiveInt,
        speechTimeoutMs: positiveInt,
        farewellTimeoutMs: positiveInt,
        summaryTimeoutMs: positiveInt,
        fallbackGreeting: { type: 'string', minLength: 1 },
        fallbackFarewell: { type: 'string', minLength: 1 },
      },
      additionalProperties: false,
    },
    modes: {
      type: 'object',
      properties: {
        weights: {
          type: 'object',
          properties: modeWeightProperties,
          additionalProperties: false,
        },
        dwell: {
          type: 'object',
          properties: {
            minDwellTurns: nonNegativeInt,
            maxDwellTurns: positiveInt,
            minDwellMs: nonNegativeInt,
            deepDiveMinHistory: nonNegativeInt,
          },
          additionalProperties: false,
        },
      },
      additionalProperties: false,
    },
    comments: {
      type: 'object',
      properties: {
        responseThreshold: positiveInt,
        pendingLimit: positiveInt,
        restartDelayMs: nonNegativeInt,
      },
      additionalProperties: false,
    },
    cooldown: {
      type: 'object',
      properties: {
        failureThreshold: positiveInt,
        cooldownCycles: nonNegativeInt,
      },
      additionalProperties: false,
    },
    dailySummary: {
      type: 'object',
      properties: {
        enabled: { type: 'boolean' },
        cron: { type: 'string', minLength: 1 },
        timezone: { type: 'string' },
      },
      additionalProperties: false,
    },
    memory: {
      type: 'object',
      properties: {
        enabled: { type: 'boolean' },
        intervalMs: nonNegativeInt,
        minEntries: positiveInt,
        compressionThreshold: { type: 'integer', minimum: 2 },
        contextBlocks: positiveInt,
      },
      additionalProperties: false,
    },
    shutdown: {
      type: 'object',
      properties: { markerPollMs: positiveInt },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
};

export function getRuntimeConfigPath(): string {
  return path.join(getConfigDir(), 'streamer.json');
}

function createValidator(): Ajv2020 {
  const ajv = new Ajv2020({ allErrors: true, strict: false });
  addFormats(ajv);
  return ajv;
}

/**
 * Check a parsed config file against the schema.
 */
export function validateStreamerConfig(value: unknown): void {
  const validate = createValidator().compile(STREAMER_CONFIG_SCHEMA);
  if (!validate(value)) {
    const errors = (validate.errors ?? []).map((err) => ({
      path: err.instancePath || '/',
      message: err.message ?? 'Unknown validation error',
    }));
    throw new ConfigValidationError(
      `Invalid streamer config: ${errors.map((e) => `${e.path}: ${e.message}`).join('; ')}`,
      errors
    );
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toPositiveInt(value: unknown, fallback: number): number {
  if (typeof value === 'number' && Number.isInteger(value) && value > 0) {
    return value;
  }
  if (typeof value === 'string') {
    const parsed = Number.parseInt(value, 10);
    if (Number.isInteger(parsed) && parsed > 0) {
      return parsed;
    }
  }
  return fallback;
}

function toNonNegativeInt(value: unknown, fallback: number): number {
  if (value === 0 || value === '0') {
    return 0;
  }
  return toPositiveInt(value, fallback);
}

function toNumber(value: unknown, fallback: number): number {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim()) {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return fallback;
}

function toBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  }
  return fallback;
}

function toStringValue(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim().length > 0 ? value : fallback;
}

function toOptionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value : undefined;
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

export function deepMerge(base: Record<string, unknown>, value: unknown): Record<string, unknown> {
  if (!isRecord(value)) {
    return { ...base };
  }

  const merged: Record<string, unknown> = { ...base };
  for (const key of Object.keys(value)) {
    const baseValue = merged[key];
    const sourceValue = value[key];
    merged[key] = isRecord(baseValue) && isRecord(sourceValue) ? deepMerge(baseValue, sourceValue) : sourceValue;
  }
  return merged;
}

/**
 * Coerce a merged, loosely typed object into a complete StreamerConfig.
 */
export function normalizeConfig(raw: Record<string, unknown>): StreamerConfig {
  const defaults = DEFAULT_STREAMER_CONFIG;
  const paths = section(raw, 'paths');
  const generator = section(raw, 'generator');
  const speech = section(raw, 'speech');
  const stream = section(raw, 'stream');
  const modes = section(raw, 'modes');
  const weights = section(modes, 'weights');
  const dwell = section(modes, 'dwell');
  const comments = section(raw, 'comments');
  const cooldown = section(raw, 'cooldown');
  const dailySummary = section(raw, 'dailySummary');
  const memory = section(raw, 'memory');
  const shutdown = section(raw, 'shutdown');

  const modeWeights = { ...defaults.modes.weights };
  for (const mode of STREAM_MODES) {
    modeWeights[mode] = Math.max(0, toNumber(weights[mode], defaults.modes.weights[mode]));
  }

  const minDwellTurns = toNonNegativeInt(dwell.minDwellTurns, defaults.modes.dwell.minDwellTurns);
  const apiKey = toOptionalString(generator.apiKey);
  const timezone = toOptionalString(dailySummary.timezone);

  return {
    $schema: './streamer.schema.json',
    paths: {
      dataDir: path.resolve(toStringValue(paths.dataDir, defaults.paths.dataDir)),
    },
    generator: {
      provider: generator.provider === 'mock' ? 'mock' : 'openai',
      baseUrl: toStringValue(generator.baseUrl, defaults.generator.baseUrl).replace(/\/+$/, ''),
      model: toStringValue(generator.model, defaults.generator.model),
      ...(apiKey ? { apiKey } : {}),
      temperature: toNumber(generator.temperature, defaults.generator.temperature),
      maxTokens: toPositiveInt(generator.maxTokens, defaults.generator.maxTokens),
    },
    speech: {
      charsPerSecond: Math.max(0.1, toNumber(speech.charsPerSecond, defaults.speech.charsPerSecond)),
      minDurationMs: toNonNegativeInt(speech.minDurationMs, defaults.speech.minDurationMs),
      segmentUtterances: toBoolean(speech.segmentUtterances, defaults.speech.segmentUtterances),
      segmentMaxLength: toPositiveInt(speech.segmentMaxLength, defaults.speech.segmentMaxLength),
      segmentMinMergeLength: toNonNegativeInt(speech.segmentMinMergeLength, defaults.speech.segmentMinMergeLength),
    },
    stream: {
      pollIntervalMs: toPositiveInt(stream.pollIntervalMs, defaults.stream.pollIntervalMs),
      cadenceMs: toNonNegativeInt(stream.cadenceMs, defaults.stream.cadenceMs),
      idleRestartMs: toPositiveInt(stream.idleRestartMs, defaults.stream.idleRestartMs),
      contextEntries: toPositiveInt(stream.contextEntries, defaults.stream.contextEntries),
      generationTimeoutMs: toPositiveInt(stream.generationTimeoutMs, defaults.stream.generationTimeoutMs),
      speechTimeoutMs: toPositiveInt(stream.speechTimeoutMs, defaults.stream.speechTimeoutMs),
      farewellTimeoutMs: toPositiveInt(stream.farewellTimeoutMs, defaults.stream.farewellTimeoutMs),
      summaryTimeoutMs: toPositiveInt(stream.summaryTimeoutMs, defaults.stream.summaryTimeoutMs),
      fallbackGreeting: toStringValue(stream.fallbackGreeting, defaults.stream.fallbackGreeting),
      fallbackFarewell: toStringValue(stream.fallbackFarewell, defaults.stream.fallbackFarewell),
    },
    modes: {
      weights: modeWeights,
      dwell: {
        minDwellTurns,
        maxDwellTurns: Math.max(minDwellTurns, toPositiveInt(dwell.maxDwellTurns, defaults.modes.dwell.maxDwellTurns)),
        minDwellMs: toNonNegativeInt(dwell.minDwellMs, defaults.modes.dwell.minDwellMs),
        deepDiveMinHistory: toNonNegativeInt(dwell.deepDiveMinHistory, defaults.modes.dwell.deepDiveMinHistory),
      },
    },
    comments: {
      responseThreshold: toPositiveInt(comments.responseThreshold, defaults.comments.responseThreshold),
      pendingLimit: toPositiveInt(comments.pendingLimit, defaults.comments.pendingLimit),
      restartDelayMs: toNonNegativeInt(comments.restartDelayMs, defaults.comments.restartDelayMs),
    },
    cooldown: {
      failureThreshold: toPositiveInt(cooldown.failureThreshold, defaults.cooldown.failureThreshold),
      cooldownCycles: toNonNegativeInt(cooldown.cooldownCycles, defaults.cooldown.cooldownCycles),
    },
    dailySummary: {
      enabled: toBoolean(dailySummary.enabled, defaults.dailySummary.enabled),
      cron: toStringValue(dailySummary.cron, defaults.dailySummary.cron),
      ...(timezone ? { timezone } : {}),
    },
    memory: {
      enabled: toBoolean(memory.enabled, defaults.memory.enabled),
      intervalMs: toNonNegativeInt(memory.intervalMs, defaults.memory.intervalMs),
      minEntries: toPositiveInt(memory.minEntries, defaults.memory.minEntries),
      compressionThreshold: Math.max(
        2,
        toPositiveInt(memory.compressionThreshold, defaults.memory.compressionThreshold)
      ),
      contextBlocks: toPositiveInt(memory.contextBlocks, defaults.memory.contextBlocks),
    },
    shutdown: {
      markerPollMs: toPositiveInt(shutdown.markerPollMs, defaults.shutdown.markerPollMs),
    },
  };
}

/**
 * Environment overrides, applied on top of the file.
 */
export function applyEnvironmentOverrides(
  config: StreamerConfig,
  env: NodeJS.ProcessEnv = process.env
): StreamerConfig {
  const apiKey = toOptionalString(env.OPENAI_API_KEY) ?? config.generator.apiKey;
  return normalizeConfig(
    deepMerge(toRecord(config), {
      paths: { dataDir: toStringValue(env.STREAMER_DATA_DIR, config.paths.dataDir) },
      generator: {
        provider: env.STREAMER_GENERATOR === 'mock' || env.STREAMER_GENERATOR === 'openai'
          ? env.STREAMER_GENERATOR
          : config.generator.provider,
        baseUrl: toStringValue(env.STREAMER_BASE_URL, config.generator.baseUrl),
        model: toStringValue(env.STREAMER_MODEL, config.generator.model),
        ...(apiKey ? { apiKey } : {}),
      },
      stream: {
        cadenceMs: toNonNegativeInt(env.STREAMER_CADENCE_MS, config.stream.cadenceMs),
      },
      dailySummary: {
        enabled: toBoolean(env.STREAMER_DAILY_SUMMARY, config.dailySummary.enabled),
      },
    })
  );
}

function toRecord(config: StreamerConfig): Record<string, unknown> {
  return deepMerge({}, structuredClone(config));
}

/**
 * Defaults, then `streamer.json` (validated), then environment overrides.
 */
export function loadRuntimeConfig(
  options: { configPath?: string; env?: NodeJS.ProcessEnv } = {}
): StreamerConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? getRuntimeConfigPath();
  const defaults = toRecord(DEFAULT_STREAMER_CONFIG);

  let merged = defaults;
  if (fs.existsSync(configPath)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigValidationError(`Cannot parse ${configPath}: ${message}`, [{ path: '/', message }]);
    }
    validateStreamerConfig(parsed);
    merged = deepMerge(defaults, parsed);
  }

  return applyEnvironmentOverrides(normalizeConfig(merged), env);
}

export function saveRuntimeConfig(config: StreamerConfig, configPath: string = getRuntimeConfigPath()): void {
  const configDir = path.dirname(configPath);
  if (!fs.existsSync(configDir)) {
    fs.mkdirSync(configDir, { recursive: true, mode: 0o700 });
  }

  const normalized = normalizeConfig(toRecord(config));
  validateStreamerConfig(normalized);
  fs.writeFileSync(configPath, JSON.stringify(normalized, null, 2), { mode: 0o600 });
}

/**
 * Config with the API key masked, for display.
 */
export function redactConfig(config: StreamerConfig): StreamerConfig {
  if (!config.generator.apiKey) {
    return config;
  }
  return { ...config, generator: { ...config.generator, apiKey: '********' } };
}
