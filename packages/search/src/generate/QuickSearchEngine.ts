/**
 * QuickSearchEngine
 *
 * Turns coordinates into concrete multi-model run configs.
 *
 * Phases:
 *   default  - one config built from each model's baseline, emitted once
 *   stepping - one config per call at the current cursor coordinate
 *
 * The engine never moves the cursor itself; callers pick the next
 * coordinate (see QuickSearch) and set it between calls.
 *
 * Entities map onto dimension entity indices in order: a plain model
 * takes one index, an ensemble takes one per stage.
 */

import { createLogger } from '@tunekit/utils';
import { Coordinate } from './Coordinate.js';
import {
  clampBatchSize,
  clampConcurrency,
  clampInstanceCount,
  concurrencyOverride,
  createGlobalBounds,
  deriveConcurrency,
  validateGlobalBounds,
  type GlobalBounds,
} from './GlobalBounds.js';
import { ModelRunConfig, ModelVariant, RunConfig } from './RunConfig.js';
import type { DimensionValues } from './SearchDimensions.js';
import { isComposite } from './SearchEntities.js';
import type {
  BaselineModelConfig,
  BenchmarkFlags,
  ConcurrencyMode,
  ModelConfigFields,
  SearchConfig,
  SearchEntity,
  SearchModel,
  SearchPhase,
} from './types.js';
import type { VariantNameRegistry } from './VariantNameRegistry.js';
import { DimensionError } from '../errors.js';

const logger = createLogger('@tunekit/search');

const RESERVED_BENCHMARK_FLAGS = ['model-name', 'batch-size', 'concurrency-range'];

export interface QuickSearchEngineOptions {
  searchConfig: SearchConfig;
  entities: SearchEntity[];
  registry: VariantNameRegistry;
  bounds?: Partial<GlobalBounds>;
}

/**
 * A model variant before naming, with its computed concurrency
 */
interface ResolvedModel {
  model: SearchModel;
  fields: ModelConfigFields;
  concurrency: number;
}

function baselineInstanceCount(baseline: BaselineModelConfig): number {
  return baseline.instance_group?.[0]?.count ?? 1;
}

export class QuickSearchEngine {
  private readonly searchConfig: SearchConfig;
  private readonly entities: SearchEntity[];
  private readonly registry: VariantNameRegistry;
  private readonly bounds: GlobalBounds;
  private readonly concurrencyMode: ConcurrencyMode;
  private phase: SearchPhase = 'default';
  private coordinateToMeasure: Coordinate;

  constructor(options: QuickSearchEngineOptions) {
    this.searchConfig = options.searchConfig;
    this.entities = options.entities;
    this.registry = options.registry;
    this.bounds = validateGlobalBounds(createGlobalBounds(options.bounds));
    this.concurrencyMode = options.searchConfig.concurrencyMode ?? 'derived';
    this.coordinateToMeasure = this.getStartingCoordinate();
  }

  getSearchConfig(): SearchConfig {
    return this.searchConfig;
  }

  getBounds(): GlobalBounds {
    return { ...this.bounds };
  }

  getPhase(): SearchPhase {
    return this.phase;
  }

  getStartingCoordinate(): Coordinate {
    return this.searchConfig.dimensions.startingCoordinate();
  }

  getCoordinateToMeasure(): Coordinate {
    return this.coordinateToMeasure;
  }

  setCoordinateToMeasure(coordinate: Coordinate): void {
    const slotCount = this.searchConfig.dimensions.slotCount;
    if (coordinate.length !== slotCount) {
      throw new DimensionError(
        `Coordinate ${coordinate.toString()} has ${coordinate.length} slots, expected ${slotCount}`,
        { coordinate: coordinate.toArray(), slotCount }
      );
    }
    this.coordinateToMeasure = coordinate;
  }

  /**
   * Default config on the first call, then the config at the cursor
   */
  next(): RunConfig {
    if (this.phase === 'default') {
      this.phase = 'stepping';
      return this.createDefaultRunConfig();
    }
    return this.createRunConfig(this.coordinateToMeasure);
  }

  /**
   * Config built from every model's baseline, with default names
   */
  createDefaultRunConfig(): RunConfig {
    const models = this.entities.map((entity) => {
      const stages = entity.stages.map(
        (stage) =>
          new ModelVariant(
            this.registry.nameFor(stage.name, stage.baseline, true),
            stage.baseline,
            stage.cpuOnly
          )
      );

      const concurrency = isComposite(entity)
        ? this.compositeConcurrency(
            entity.stages.map((stage) => this.defaultConcurrency(stage.baseline))
          )
        : clampConcurrency(this.bounds, this.defaultConcurrency(entity.baseline));

      const name = this.registry.nameFor(entity.name, entity.baseline, true);
      return new ModelRunConfig(
        entity.name,
        new ModelVariant(name, entity.baseline, entity.cpuOnly),
        this.benchmarkParams(entity.benchmarkFlags, name, concurrency),
        stages
      );
    });

    logger.debug('Created default run config', {
      models: models.map((model) => model.variantName),
    });

    return new RunConfig(models, true);
  }

  /**
   * Config at an explicit coordinate
   */
  createRunConfig(coordinate: Coordinate): RunConfig {
    const values = this.searchConfig.dimensions.valuesFor(coordinate);
    let dimensionIndex = 0;

    const takeValues = (): DimensionValues => {
      const entityValues = values[dimensionIndex];
      if (entityValues === undefined) {
        throw new DimensionError(`No dimensions defined for entity index ${dimensionIndex}`, {
          dimensionIndex,
          entityCount: values.length,
        });
      }
      dimensionIndex++;
      return entityValues;
    };

    const models = this.entities.map((entity) => {
      if (!isComposite(entity)) {
        const resolved = this.resolveModel(entity, takeValues());
        const name = this.registry.nameFor(entity.name, resolved.fields);
        return new ModelRunConfig(
          entity.name,
          new ModelVariant(name, resolved.fields, entity.cpuOnly),
          this.benchmarkParams(
            entity.benchmarkFlags,
            name,
            clampConcurrency(this.bounds, resolved.concurrency)
          )
        );
      }

      const resolvedStages = entity.stages.map((stage) => this.resolveModel(stage, takeValues()));
      const stages = resolvedStages.map(
        (resolved) =>
          new ModelVariant(
            this.registry.nameFor(resolved.model.name, resolved.fields),
            resolved.fields,
            resolved.model.cpuOnly
          )
      );

      const name = this.registry.nameFor(entity.name, {
        ...entity.baseline,
        stages: stages.map((stage) => stage.name),
      });
      const concurrency = this.compositeConcurrency(
        resolvedStages.map((resolved) => resolved.concurrency)
      );

      return new ModelRunConfig(
        entity.name,
        new ModelVariant(name, entity.baseline, entity.cpuOnly),
        this.benchmarkParams(entity.benchmarkFlags, name, concurrency),
        stages
      );
    });

    if (dimensionIndex !== values.length) {
      throw new DimensionError(
        `Dimensions cover ${values.length} entity indices but models use ${dimensionIndex}`,
        { entityCount: values.length, used: dimensionIndex }
      );
    }

    logger.debug('Created run config', {
      coordinate: coordinate.toString(),
      models: models.map((model) => model.variantName),
    });

    return new RunConfig(models, false, coordinate);
  }

  /**
   * Apply dimension values and bounds to one model's baseline
   */
  private resolveModel(model: SearchModel, values: DimensionValues): ResolvedModel {
    const { baseline } = model;

    const batchSize = clampBatchSize(this.bounds, values.max_batch_size ?? baseline.max_batch_size);
    const instanceCount = clampInstanceCount(
      this.bounds,
      values.instance_count ?? baselineInstanceCount(baseline)
    );

    const concurrency =
      this.concurrencyMode === 'coordinate' && values.concurrency !== undefined
        ? values.concurrency
        : deriveConcurrency(this.bounds, batchSize, instanceCount);

    const fields: ModelConfigFields = {
      ...baseline,
      max_batch_size: batchSize,
      instance_group: [{ count: instanceCount, kind: model.cpuOnly ? 'KIND_CPU' : 'KIND_GPU' }],
    };

    if (baseline.sequence_batching !== undefined) {
      delete fields.dynamic_batching;
    } else if (batchSize > 0) {
      fields.dynamic_batching = {};
    }

    return { model, fields, concurrency };
  }

  private defaultConcurrency(baseline: BaselineModelConfig): number {
    return deriveConcurrency(this.bounds, baseline.max_batch_size, baselineInstanceCount(baseline));
  }

  /**
   * Smallest stage concurrency, unless a concurrency bound is configured
   */
  private compositeConcurrency(stageConcurrencies: number[]): number {
    return concurrencyOverride(this.bounds) ?? Math.min(...stageConcurrencies);
  }

  private benchmarkParams(
    flags: BenchmarkFlags,
    variantName: string,
    concurrency: number
  ): BenchmarkFlags {
    const params: BenchmarkFlags = {
      'model-name': variantName,
      'batch-size': 1,
      'concurrency-range': concurrency,
    };

    for (const [flag, value] of Object.entries(flags)) {
      if (!RESERVED_BENCHMARK_FLAGS.includes(flag)) {
        params[flag] = value;
      }
    }

    return params;
  }
}
