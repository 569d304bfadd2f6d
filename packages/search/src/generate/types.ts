/**
 * Search Types
 *
 * Baseline model configuration shape and the entities a search runs over.
 */

import { z } from 'zod';
import type { SearchDimensions } from './SearchDimensions.js';

export const InstanceGroupSchema = z
  .object({
    count: z.number().int().positive().optional(),
    kind: z.string().optional(),
  })
  .passthrough();

export const EnsembleSchedulingSchema = z
  .object({
    step: z.array(z.object({ model_name: z.string().min(1) }).passthrough()),
  })
  .passthrough();

/**
 * Baseline model configuration as returned by the serving platform.
 * Keys not listed here pass through unchanged into every variant.
 */
export const BaselineModelConfigSchema = z
  .object({
    name: z.string().min(1),
    platform: z.string().optional(),
    max_batch_size: z.number().int().nonnegative(),
    input: z.array(z.record(z.unknown())).min(1),
    output: z.array(z.record(z.unknown())).optional(),
    sequence_batching: z.record(z.unknown()).optional(),
    dynamic_batching: z.record(z.unknown()).optional(),
    instance_group: z.array(InstanceGroupSchema).optional(),
    ensemble_scheduling: EnsembleSchedulingSchema.optional(),
  })
  .passthrough();

export type BaselineModelConfig = z.infer<typeof BaselineModelConfigSchema>;

export type BenchmarkFlagValue = string | number | boolean;

export type BenchmarkFlags = Record<string, BenchmarkFlagValue>;

export type ModelConfigFields = Record<string, unknown>;

/**
 * One model requested for search
 */
export interface ModelSpec {
  modelName: string;
  benchmarkFlags?: BenchmarkFlags;
  cpuOnly?: boolean;
}

/**
 * A model resolved against its baseline configuration
 */
export interface SearchModel {
  name: string;
  baseline: BaselineModelConfig;
  benchmarkFlags: BenchmarkFlags;
  cpuOnly: boolean;
}

/**
 * Entity taking part in a search; composites (ensembles) carry one
 * stage per scheduling step, plain models have none
 */
export interface SearchEntity extends SearchModel {
  stages: SearchModel[];
}

/**
 * Source of baseline configurations (model repository, serving API, ...)
 */
export interface BaselineConfigProvider {
  getBaselineConfig(modelName: string): Promise<unknown>;
}

/**
 * How concurrency is chosen at each step
 */
export type ConcurrencyMode = 'derived' | 'coordinate';

export interface SearchConfig {
  dimensions: SearchDimensions;
  radius: number;
  /** Neighbors measured before the walk may move or stop */
  minInitialized: number;
  concurrencyMode?: ConcurrencyMode;
}

export type SearchPhase = 'default' | 'stepping';
