/**
 * Property tests for naming, bounds and constraints
 *
 * Invariants:
 * - Naming: equal payloads share a name regardless of key order
 * - Clamping: idempotent and within [min, max] when min <= max
 * - Constraints: raising a max or lowering a min never turns a pass into
 *   a failure, and the infeasibility score is zero exactly when
 *   constraints hold
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { clamp } from '../../src/generate/GlobalBounds.js';
import { VariantNameRegistry } from '../../src/generate/VariantNameRegistry.js';
import { ConstraintEvaluator } from '../../src/result/ConstraintEvaluator.js';
import { RunMeasurement } from '../../src/result/RunMeasurement.js';

describe('VariantNameRegistry - Property Tests', () => {
  const payload = fc.dictionary(
    fc.string({ minLength: 1, maxLength: 8 }).filter((key) => key !== 'name' && key !== '__proto__'),
    fc.oneof(fc.integer(), fc.boolean(), fc.string(), fc.array(fc.integer(), { maxLength: 3 }))
  );

  it('should name a payload the same regardless of key order', () => {
    fc.assert(
      fc.property(payload, (fields) => {
        const registry = new VariantNameRegistry();
        const reversed = Object.fromEntries(Object.entries(fields).reverse());

        expect(registry.nameFor('m', reversed)).toBe(registry.nameFor('m', fields));
        expect(registry.variantCount('m')).toBe(1);
      })
    );
  });

  it('should assign sequential names to distinct payloads', () => {
    fc.assert(
      fc.property(fc.uniqueArray(fc.integer({ min: 0, max: 1024 }), { minLength: 1, maxLength: 10 }), (sizes) => {
        const registry = new VariantNameRegistry();
        const names = sizes.map((size) => registry.nameFor('m', { max_batch_size: size }));

        expect(names).toEqual(sizes.map((_, index) => `m_config_${index}`));
      })
    );
  });
});

describe('GlobalBounds - Property Tests', () => {
  const value = fc.integer({ min: 0, max: 4096 });

  it('should clamp idempotently into [min, max]', () => {
    fc.assert(
      fc.property(value, value, value, (v, a, b) => {
        const min = Math.min(a, b);
        const max = Math.max(a, b);
        const clamped = clamp(v, min, max);

        expect(clamped).toBeGreaterThanOrEqual(min);
        expect(clamped).toBeLessThanOrEqual(max);
        expect(clamp(clamped, min, max)).toBe(clamped);
      })
    );
  });
});

describe('ConstraintEvaluator - Property Tests', () => {
  const evaluator = new ConstraintEvaluator();
  const latency = fc.integer({ min: 1, max: 1000 });

  it('should keep passing when a max bound is widened', () => {
    fc.assert(
      fc.property(latency, latency, fc.integer({ min: 0, max: 500 }), (measured, limit, widening) => {
        const measurement = RunMeasurement.fromValues([{ perf_latency_p99: measured }]);
        const tight = [{ perf_latency_p99: { max: limit } }];
        const loose = [{ perf_latency_p99: { max: limit + widening } }];

        if (evaluator.satisfies(tight, measurement)) {
          expect(evaluator.satisfies(loose, measurement)).toBe(true);
        }
        expect(evaluator.infeasibilityScore(loose, measurement)).toBeLessThanOrEqual(
          evaluator.infeasibilityScore(tight, measurement)
        );
      })
    );
  });

  it('should keep passing when a min bound is lowered', () => {
    fc.assert(
      fc.property(latency, latency, fc.integer({ min: 0, max: 500 }), (measured, limit, lowering) => {
        const measurement = RunMeasurement.fromValues([{ perf_throughput: measured }]);
        const tight = [{ perf_throughput: { min: limit } }];
        const loose = [{ perf_throughput: { min: limit - lowering } }];

        if (evaluator.satisfies(tight, measurement)) {
          expect(evaluator.satisfies(loose, measurement)).toBe(true);
        }
        expect(evaluator.infeasibilityScore(loose, measurement)).toBeLessThanOrEqual(
          evaluator.infeasibilityScore(tight, measurement)
        );
      })
    );
  });

  it('should keep passing when both bounds are widened', () => {
    fc.assert(
      fc.property(latency, latency, latency, fc.integer({ min: 0, max: 500 }), (measured, a, b, widening) => {
        const measurement = RunMeasurement.fromValues([{ perf_throughput: measured }]);
        const min = Math.min(a, b);
        const max = Math.max(a, b);
        const tight = [{ perf_throughput: { min, max } }];
        const loose = [{ perf_throughput: { min: min - widening, max: max + widening } }];

        if (evaluator.satisfies(tight, measurement)) {
          expect(evaluator.satisfies(loose, measurement)).toBe(true);
        }
      })
    );
  });

  it('should score zero exactly when constraints hold', () => {
    fc.assert(
      fc.property(latency, latency, latency, (measured, min, max) => {
        const measurement = RunMeasurement.fromValues([{ perf_throughput: measured }]);
        const constraints = [{ perf_throughput: { min, max } }];

        expect(evaluator.infeasibilityScore(constraints, measurement) === 0).toBe(
          evaluator.satisfies(constraints, measurement)
        );
      })
    );
  });
});
