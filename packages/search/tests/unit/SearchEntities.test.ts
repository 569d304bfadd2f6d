/**
 * SearchEntities Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { ConfigurationError } from '@tunekit/utils';
import {
  createSearchEntities,
  dimensionSlotsFor,
  isComposite,
  isEnsemble,
  parseBaselineConfig,
} from '../../src/generate/SearchEntities.js';
import type { BaselineConfigProvider } from '../../src/generate/types.js';

const INPUT = [{ name: 'INPUT__0', data_type: 'TYPE_FP32', dims: [16] }];

function createProvider(configs: Record<string, unknown>): BaselineConfigProvider {
  return {
    getBaselineConfig: vi.fn(async (modelName: string) => configs[modelName]),
  };
}

const configs: Record<string, unknown> = {
  classifier: { name: 'classifier', input: INPUT, max_batch_size: 8, backend: 'onnxruntime' },
  preprocess: { name: 'preprocess', input: INPUT, max_batch_size: 4 },
  resnet50_trt: { name: 'resnet50_trt', input: INPUT, max_batch_size: 16 },
  pipeline: {
    name: 'pipeline',
    platform: 'ensemble',
    input: INPUT,
    max_batch_size: 4,
    ensemble_scheduling: {
      step: [{ model_name: 'preprocess' }, { model_name: 'resnet50_trt' }],
    },
  },
};

describe('parseBaselineConfig', () => {
  it('should keep unknown keys', () => {
    const baseline = parseBaselineConfig(configs.classifier, 'classifier');

    expect(baseline.max_batch_size).toBe(8);
    expect(baseline.backend).toBe('onnxruntime');
  });

  it('should reject a baseline without inputs', () => {
    expect(() => parseBaselineConfig({ name: 'broken', max_batch_size: 1 }, 'broken')).toThrow(
      ConfigurationError
    );
  });

  it('should list the failing fields', () => {
    expect(() => parseBaselineConfig({ name: 'broken', input: INPUT, max_batch_size: -1 }, 'broken')).toThrow(
      /max_batch_size/
    );
  });
});

describe('createSearchEntities', () => {
  it('should resolve plain models with their flags', async () => {
    const [entity] = await createSearchEntities(
      [{ modelName: 'classifier', benchmarkFlags: { percentile: 95 } }],
      createProvider(configs)
    );

    expect(entity?.name).toBe('classifier');
    expect(entity?.benchmarkFlags).toEqual({ percentile: 95 });
    expect(entity?.cpuOnly).toBe(false);
    expect(entity?.stages).toEqual([]);
    expect(entity && isComposite(entity)).toBe(false);
    expect(entity && dimensionSlotsFor(entity)).toBe(1);
  });

  it('should resolve ensemble steps into ordered stages', async () => {
    const provider = createProvider(configs);
    const [entity] = await createSearchEntities([{ modelName: 'pipeline', cpuOnly: true }], provider);

    expect(entity?.stages.map((stage) => stage.name)).toEqual(['preprocess', 'resnet50_trt']);
    expect(entity?.stages.map((stage) => stage.cpuOnly)).toEqual([true, true]);
    expect(entity && dimensionSlotsFor(entity)).toBe(2);
    expect(provider.getBaselineConfig).toHaveBeenCalledTimes(3);
  });

  it('should reject an ensemble without steps', async () => {
    const provider = createProvider({
      empty: { name: 'empty', input: INPUT, max_batch_size: 0, ensemble_scheduling: { step: [] } },
    });

    await expect(createSearchEntities([{ modelName: 'empty' }], provider)).rejects.toThrow(
      ConfigurationError
    );
  });

  it('should reject a missing baseline', async () => {
    await expect(
      createSearchEntities([{ modelName: 'unknown' }], createProvider(configs))
    ).rejects.toThrow(ConfigurationError);
  });
});

describe('isEnsemble', () => {
  it('should detect ensembles by platform or scheduling', () => {
    expect(isEnsemble(parseBaselineConfig(configs.pipeline, 'pipeline'))).toBe(true);
    expect(
      isEnsemble(parseBaselineConfig({ name: 'e', input: INPUT, max_batch_size: 0, platform: 'ensemble' }, 'e'))
    ).toBe(true);
    expect(isEnsemble(parseBaselineConfig(configs.classifier, 'classifier'))).toBe(false);
  });
});
