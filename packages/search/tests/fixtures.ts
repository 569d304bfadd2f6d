/**
 * Shared builders for search tests
 */

import {
  parseBaselineConfig,
  SearchDimension,
  SearchDimensions,
  type BenchmarkFlags,
  type SearchEntity,
  type SearchModel,
} from '../src/index.js';

export function baselineFor(name: string, overrides: Record<string, unknown> = {}) {
  return parseBaselineConfig(
    {
      name,
      input: [{ name: 'INPUT__0', data_type: 'TYPE_FP32', dims: [16] }],
      max_batch_size: 4,
      ...overrides,
    },
    name
  );
}

export function searchModel(
  name: string,
  overrides: Record<string, unknown> = {},
  benchmarkFlags: BenchmarkFlags = {}
): SearchModel {
  return { name, baseline: baselineFor(name, overrides), benchmarkFlags, cpuOnly: false };
}

export function plainEntity(
  name: string,
  overrides: Record<string, unknown> = {},
  benchmarkFlags: BenchmarkFlags = {}
): SearchEntity {
  return { ...searchModel(name, overrides, benchmarkFlags), stages: [] };
}

export function ensembleEntity(name: string, stages: SearchModel[]): SearchEntity {
  return {
    ...searchModel(name, {
      platform: 'ensemble',
      ensemble_scheduling: { step: stages.map((stage) => ({ model_name: stage.name })) },
    }),
    stages,
  };
}

/**
 * max_batch_size (exponential) and instance_count (linear) per entity
 */
export function batchAndInstanceDimensions(entityCount: number): SearchDimensions {
  const dimensions = new SearchDimensions();
  for (let entityIndex = 0; entityIndex < entityCount; entityIndex++) {
    dimensions.addDimensions(entityIndex, [
      new SearchDimension('max_batch_size', 'exponential'),
      new SearchDimension('instance_count', 'linear'),
    ]);
  }
  return dimensions;
}
