/**
 * Search Settings Tests
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { clearConfigCache, ConfigurationError } from '@tunekit/utils';
import {
  loadSearchSettings,
  parseSearchSettings,
  readSearchSettingsFromEnv,
} from '../../src/config/SearchSettings.js';
import { BoundsError } from '../../src/errors.js';

describe('parseSearchSettings', () => {
  it('should apply defaults', () => {
    expect(parseSearchSettings({})).toEqual({
      bounds: { concurrencyMultiplier: 2 },
      radius: 3,
      minInitialized: 3,
      maxMeasurements: 100,
      constraints: {},
      objectives: { perf_throughput: 1 },
    });
  });

  it('should map bounds and search parameters', () => {
    const settings = parseSearchSettings({
      run_config_search_max_model_batch_size: 16,
      run_config_search_min_instance_count: 2,
      run_config_search_max_concurrency: 256,
      run_config_search_concurrency_multiplier: 4,
      run_config_search_radius: 2,
      objectives: { perf_latency_p99: 1 },
      constraints: { default: { perf_latency_p99: { max: 50 } } },
    });

    expect(settings.bounds).toEqual({
      maxModelBatchSize: 16,
      minInstanceCount: 2,
      maxConcurrency: 256,
      concurrencyMultiplier: 4,
    });
    expect(settings.radius).toBe(2);
    expect(settings.objectives).toEqual({ perf_latency_p99: 1 });
    expect(settings.constraints).toEqual({ default: { perf_latency_p99: { max: 50 } } });
  });

  it('should reject invalid values', () => {
    expect(() => parseSearchSettings({ run_config_search_radius: -1 })).toThrow(ConfigurationError);
    expect(() => parseSearchSettings({ run_config_search_max_concurrency: 'many' })).toThrow(
      /run_config_search_max_concurrency/
    );
  });

  it('should reject a min bound above its max', () => {
    expect(() =>
      parseSearchSettings({
        run_config_search_min_concurrency: 64,
        run_config_search_max_concurrency: 8,
      })
    ).toThrow(BoundsError);
  });
});

describe('readSearchSettingsFromEnv', () => {
  it('should read numeric settings by their upper-case names', () => {
    expect(
      readSearchSettingsFromEnv({
        RUN_CONFIG_SEARCH_MAX_CONCURRENCY: '64',
        RUN_CONFIG_SEARCH_RADIUS: '2',
        RUN_CONFIG_SEARCH_UNKNOWN: 'x',
        PATH: '/usr/bin',
      })
    ).toEqual({
      run_config_search_max_concurrency: 64,
      run_config_search_radius: 2,
    });
  });

  it('should reject non-numeric settings', () => {
    expect(() => readSearchSettingsFromEnv({ RUN_CONFIG_SEARCH_RADIUS: 'wide' })).toThrow(
      ConfigurationError
    );
  });
});

describe('loadSearchSettings', () => {
  let dir: string;

  beforeEach(() => {
    clearConfigCache();
    dir = mkdtempSync(join(tmpdir(), 'tunekit-search-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should prefer config.yaml over the environment', () => {
    const configPath = join(dir, 'config.yaml');
    writeFileSync(
      configPath,
      [
        'run_config_search_max_concurrency: 32',
        'profile_models:',
        '  - classifier',
        'constraints:',
        '  classifier:',
        '    perf_latency_p99:',
        '      max: 20',
        '',
      ].join('\n')
    );

    const settings = loadSearchSettings({
      configPath,
      env: { RUN_CONFIG_SEARCH_MAX_CONCURRENCY: '64', RUN_CONFIG_SEARCH_RADIUS: '2' },
    });

    expect(settings.bounds.maxConcurrency).toBe(32);
    expect(settings.radius).toBe(2);
    expect(settings.constraints).toEqual({ classifier: { perf_latency_p99: { max: 20 } } });
  });

  it('should fall back to the environment without a config file', () => {
    const settings = loadSearchSettings({
      configPath: join(dir, 'missing.yaml'),
      env: { RUN_CONFIG_SEARCH_MIN_INITIALIZED: '5' },
    });

    expect(settings.minInitialized).toBe(5);
    expect(settings.maxMeasurements).toBe(100);
  });
});
