/**
 * SearchEntities
 *
 * Resolves model specs into search entities, fetching baselines for the
 * models and for every ensemble step.
 */

import { ConfigurationError, createLogger } from '@tunekit/utils';
import {
  BaselineModelConfigSchema,
  type BaselineConfigProvider,
  type BaselineModelConfig,
  type ModelSpec,
  type SearchEntity,
  type SearchModel,
} from './types.js';

const logger = createLogger('@tunekit/search');

/**
 * Validate a raw baseline configuration
 */
export function parseBaselineConfig(raw: unknown, modelName: string): BaselineModelConfig {
  const result = BaselineModelConfigSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigurationError(
      `Invalid baseline configuration for model '${modelName}': ${issues.join('; ')}`,
      modelName,
      { issues }
    );
  }

  return result.data;
}

export function isEnsemble(baseline: BaselineModelConfig): boolean {
  return baseline.platform === 'ensemble' || baseline.ensemble_scheduling !== undefined;
}

/**
 * Number of dimension entity indices an entity consumes
 */
export function dimensionSlotsFor(entity: SearchEntity): number {
  return entity.stages.length > 0 ? entity.stages.length : 1;
}

export function isComposite(entity: SearchEntity): boolean {
  return entity.stages.length > 0;
}

async function resolveModel(
  provider: BaselineConfigProvider,
  spec: ModelSpec
): Promise<SearchModel> {
  const raw = await provider.getBaselineConfig(spec.modelName);
  const baseline = parseBaselineConfig(raw, spec.modelName);

  return {
    name: spec.modelName,
    baseline,
    benchmarkFlags: { ...spec.benchmarkFlags },
    cpuOnly: spec.cpuOnly ?? false,
  };
}

/**
 * Resolve specs into entities; ensemble steps become ordered stages
 */
export async function createSearchEntities(
  specs: ModelSpec[],
  provider: BaselineConfigProvider
): Promise<SearchEntity[]> {
  const entities: SearchEntity[] = [];

  for (const spec of specs) {
    const model = await resolveModel(provider, spec);

    if (!isEnsemble(model.baseline)) {
      entities.push({ ...model, stages: [] });
      continue;
    }

    const steps = model.baseline.ensemble_scheduling?.step ?? [];
    if (steps.length === 0) {
      throw new ConfigurationError(
        `Ensemble '${spec.modelName}' has no scheduling steps`,
        'ensemble_scheduling'
      );
    }

    const stages: SearchModel[] = [];
    for (const step of steps) {
      stages.push(await resolveModel(provider, { modelName: step.model_name, cpuOnly: spec.cpuOnly }));
    }

    logger.debug('Resolved ensemble stages', {
      modelName: spec.modelName,
      stages: stages.map((stage) => stage.name),
    });

    entities.push({ ...model, stages });
  }

  return entities;
}
