/**
 * GlobalBounds
 *
 * Process-wide overrides for batch size, instance count and concurrency.
 * A bound always wins over a computed value: max clamps down, then min
 * clamps up.
 */

import { BoundsError } from '../errors.js';

export const DEFAULT_CONCURRENCY_MULTIPLIER = 2;

export interface GlobalBounds {
  minModelBatchSize?: number;
  maxModelBatchSize?: number;
  minInstanceCount?: number;
  maxInstanceCount?: number;
  minConcurrency?: number;
  maxConcurrency?: number;
  concurrencyMultiplier: number;
}

export function createGlobalBounds(overrides: Partial<GlobalBounds> = {}): GlobalBounds {
  return {
    ...overrides,
    concurrencyMultiplier: overrides.concurrencyMultiplier ?? DEFAULT_CONCURRENCY_MULTIPLIER,
  };
}

/**
 * Throws BoundsError for any min greater than its paired max
 */
export function validateGlobalBounds(bounds: GlobalBounds): GlobalBounds {
  const pairs: Array<[string, number | undefined, number | undefined]> = [
    ['model batch size', bounds.minModelBatchSize, bounds.maxModelBatchSize],
    ['instance count', bounds.minInstanceCount, bounds.maxInstanceCount],
    ['concurrency', bounds.minConcurrency, bounds.maxConcurrency],
  ];

  for (const [bound, min, max] of pairs) {
    if (min !== undefined && max !== undefined && min > max) {
      throw new BoundsError(bound, min, max);
    }
  }

  return bounds;
}

export function clamp(value: number, min?: number, max?: number): number {
  let clamped = value;
  if (max !== undefined && clamped > max) {
    clamped = max;
  }
  if (min !== undefined && clamped < min) {
    clamped = min;
  }
  return clamped;
}

export function clampBatchSize(bounds: GlobalBounds, batchSize: number): number {
  return clamp(batchSize, bounds.minModelBatchSize, bounds.maxModelBatchSize);
}

export function clampInstanceCount(bounds: GlobalBounds, instanceCount: number): number {
  return clamp(instanceCount, bounds.minInstanceCount, bounds.maxInstanceCount);
}

export function clampConcurrency(bounds: GlobalBounds, concurrency: number): number {
  return clamp(concurrency, bounds.minConcurrency, bounds.maxConcurrency);
}

/**
 * batch × instances × multiplier, treating non-batching models as batch 1
 */
export function deriveConcurrency(
  bounds: GlobalBounds,
  batchSize: number,
  instanceCount: number
): number {
  return Math.max(batchSize, 1) * instanceCount * bounds.concurrencyMultiplier;
}

/**
 * Configured concurrency override, max taking priority over min
 */
export function concurrencyOverride(bounds: GlobalBounds): number | undefined {
  return bounds.maxConcurrency ?? bounds.minConcurrency;
}
