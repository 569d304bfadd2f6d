/**
 * Search Settings
 *
 * Flat run_config_search_* settings, read from config.yaml with
 * RUN_CONFIG_SEARCH_* environment variables as fallback.
 *
 * Priority: config.yaml > environment variable > default
 */

import { z } from 'zod';
import { ConfigurationError, getNumberEnv, loadConfigFromYaml, createLogger } from '@tunekit/utils';
import {
  createGlobalBounds,
  DEFAULT_CONCURRENCY_MULTIPLIER,
  validateGlobalBounds,
  type GlobalBounds,
} from '../generate/GlobalBounds.js';
import { ConstraintSourceSchema, type ConstraintSource } from '../result/ConstraintEvaluator.js';
import { DEFAULT_OBJECTIVES, type Objectives } from '../result/RunMeasurement.js';

const logger = createLogger('@tunekit/search');

const optionalCount = z.number().int().positive().optional();

export const SearchSettingsSchema = z.object({
  run_config_search_min_model_batch_size: optionalCount,
  run_config_search_max_model_batch_size: optionalCount,
  run_config_search_min_instance_count: optionalCount,
  run_config_search_max_instance_count: optionalCount,
  run_config_search_min_concurrency: optionalCount,
  run_config_search_max_concurrency: optionalCount,
  run_config_search_concurrency_multiplier: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_CONCURRENCY_MULTIPLIER),
  run_config_search_radius: z.number().int().nonnegative().default(3),
  run_config_search_min_initialized: z.number().int().nonnegative().default(3),
  run_config_search_max_measurements: z.number().int().positive().default(100),
  constraints: ConstraintSourceSchema.default({}),
  objectives: z.record(z.number().nonnegative()).default({ ...DEFAULT_OBJECTIVES }),
});

export interface SearchSettings {
  bounds: GlobalBounds;
  radius: number;
  minInitialized: number;
  maxMeasurements: number;
  constraints: ConstraintSource;
  objectives: Objectives;
}

const NUMERIC_SETTING_KEYS = Object.keys(SearchSettingsSchema.shape).filter((key) =>
  key.startsWith('run_config_search_')
);

/**
 * Validate raw settings; throws ConfigurationError or BoundsError
 */
export function parseSearchSettings(raw: unknown): SearchSettings {
  const result = SearchSettingsSchema.safeParse(raw ?? {});

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid search settings: ${issues.join('; ')}`, undefined, {
      issues,
    });
  }

  const settings = result.data;
  const bounds = validateGlobalBounds(
    createGlobalBounds({
      minModelBatchSize: settings.run_config_search_min_model_batch_size,
      maxModelBatchSize: settings.run_config_search_max_model_batch_size,
      minInstanceCount: settings.run_config_search_min_instance_count,
      maxInstanceCount: settings.run_config_search_max_instance_count,
      minConcurrency: settings.run_config_search_min_concurrency,
      maxConcurrency: settings.run_config_search_max_concurrency,
      concurrencyMultiplier: settings.run_config_search_concurrency_multiplier,
    })
  );

  return {
    bounds,
    radius: settings.run_config_search_radius,
    minInitialized: settings.run_config_search_min_initialized,
    maxMeasurements: settings.run_config_search_max_measurements,
    constraints: settings.constraints,
    objectives: settings.objectives,
  };
}

/**
 * Numeric settings present in the environment, keyed like config.yaml
 */
export function readSearchSettingsFromEnv(
  env: NodeJS.ProcessEnv = process.env
): Record<string, number> {
  const values: Record<string, number> = {};

  for (const key of NUMERIC_SETTING_KEYS) {
    const value = getNumberEnv(key.toUpperCase(), env);
    if (value !== undefined) {
      values[key] = value;
    }
  }

  return values;
}

export interface LoadSearchSettingsOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

export function loadSearchSettings(options: LoadSearchSettingsOptions = {}): SearchSettings {
  const fromEnv = readSearchSettingsFromEnv(options.env);
  const fromFile = loadConfigFromYaml(options.configPath);

  const settings = parseSearchSettings({ ...fromEnv, ...fromFile });

  logger.info('Loaded search settings', {
    radius: settings.radius,
    minInitialized: settings.minInitialized,
    maxMeasurements: settings.maxMeasurements,
    bounds: settings.bounds,
  });

  return settings;
}
