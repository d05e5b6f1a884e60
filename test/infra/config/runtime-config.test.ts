import { describe, test, expect } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  ConfigValidationError,
  DEFAULT_STREAMER_CONFIG,
  applyEnvironmentOverrides,
  loadRuntimeConfig,
  normalizeConfig,
  redactConfig,
  saveRuntimeConfig,
  validateStreamerConfig,
} from '../../../src/infra/config/runtime-config.js';

function writeConfig(content: unknown): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'streamer-runtime-config-'));
  const file = path.join(dir, 'streamer.json');
  fs.writeFileSync(file, typeof content === 'string' ? content : JSON.stringify(content));
  return file;
}

function missingConfigPath(): string {
  return path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'streamer-runtime-config-')), 'streamer.json');
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

describe('runtime config', () => {
  test('uses the defaults when no file exists', () => {
    const config = loadRuntimeConfig({ configPath: missingConfigPath(), env: {} });

    expect(config.generator).toEqual({
      provider: 'openai',
      baseUrl: 'https://api.openai.com/v1',
      model: 'gpt-4o-mini',
      temperature: 0.9,
      maxTokens: 400,
    });
    expect(config.stream.cadenceMs).toBe(4000);
    expect(config.modes.weights).toEqual(DEFAULT_STREAMER_CONFIG.modes.weights);
    expect(config.dailySummary).toEqual({ enabled: false, cron: '55 23 * * *' });
  });

  test('merges a partial file over the defaults', () => {
    const configPath = writeConfig({
      stream: { cadenceMs: 2500 },
      modes: { weights: { deep_dive: 0 } },
      generator: { baseUrl: 'http://localhost:8080/v1/' },
    });

    const config = loadRuntimeConfig({ configPath, env: {} });

    expect(config.stream.cadenceMs).toBe(2500);
    expect(config.stream.pollIntervalMs).toBe(1000);
    expect(config.modes.weights.deep_dive).toBe(0);
    expect(config.modes.weights.normal_monologue).toBe(60);
    expect(config.generator.baseUrl).toBe('http://localhost:8080/v1');
  });

  test('rejects values outside the schema with their location', () => {
    const configPath = writeConfig({ stream: { cadenceMs: -1 } });

    const error = captureError(() => loadRuntimeConfig({ configPath, env: {} }));

    expect(error).toBeInstanceOf(ConfigValidationError);
    expect(error instanceof ConfigValidationError ? error.errors : []).toEqual([
      { path: '/stream/cadenceMs', message: 'must be >= 0' },
    ]);
  });

  test('rejects unknown keys and unparsable files', () => {
    expect(() => validateStreamerConfig({ voice: 'alto' })).toThrow('must NOT have additional properties');
    expect(() => loadRuntimeConfig({ configPath: writeConfig('{ not json'), env: {} })).toThrow(/^Cannot parse /);
  });

  test('applies environment overrides last', () => {
    const configPath = writeConfig({ generator: { provider: 'openai' }, stream: { cadenceMs: 2500 } });

    const config = loadRuntimeConfig({
      configPath,
      env: {
        OPENAI_API_KEY: 'test-key',
        STREAMER_GENERATOR: 'mock',
        STREAMER_CADENCE_MS: '1500',
        STREAMER_DAILY_SUMMARY: 'yes',
      },
    });

    expect(config.generator.provider).toBe('mock');
    expect(config.generator.apiKey).toBe('test-key');
    expect(config.stream.cadenceMs).toBe(1500);
    expect(config.dailySummary.enabled).toBe(true);
  });

  test('ignores environment values it cannot use', () => {
    const base = loadRuntimeConfig({ configPath: missingConfigPath(), env: {} });

    const config = applyEnvironmentOverrides(base, { STREAMER_GENERATOR: 'llama', STREAMER_CADENCE_MS: 'soon' });

    expect(config.generator.provider).toBe('openai');
    expect(config.stream.cadenceMs).toBe(4000);
  });

  test('keeps the dwell window consistent', () => {
    const config = normalizeConfig({ modes: { dwell: { minDwellTurns: 4, maxDwellTurns: 2 } } });
    expect(config.modes.dwell.minDwellTurns).toBe(4);
    expect(config.modes.dwell.maxDwellTurns).toBe(4);
  });

  test('fills memory and segmentation settings', () => {
    const config = normalizeConfig({
      speech: { segmentUtterances: false, segmentMaxLength: 40 },
      memory: { intervalMs: 0, compressionThreshold: 1 },
    });

    expect(config.speech).toEqual({
      charsPerSecond: 8,
      minDurationMs: 500,
      segmentUtterances: false,
      segmentMaxLength: 40,
      segmentMinMergeLength: 10,
    });
    expect(config.memory).toEqual({
      enabled: true,
      intervalMs: 0,
      minEntries: 5,
      compressionThreshold: 2,
      contextBlocks: 5,
    });
    expect(() => validateStreamerConfig({ memory: { compressionThreshold: 1 } })).toThrow(
      '/memory/compressionThreshold: must be >= 2'
    );
  });

  test('saves a file that loads back the same', () => {
    const configPath = missingConfigPath();
    const original = normalizeConfig({ stream: { cadenceMs: 3210 }, dailySummary: { enabled: true, timezone: 'UTC' } });

    saveRuntimeConfig(original, configPath);

    expect(loadRuntimeConfig({ configPath, env: {} })).toEqual(original);
  });

  test('masks the API key for display', () => {
    const config = normalizeConfig({ generator: { apiKey: 'test-secret' } });
    expect(redactConfig(config).generator.apiKey).toBe('********');
    expect(config.generator.apiKey).toBe('test-secret');
  });
});
