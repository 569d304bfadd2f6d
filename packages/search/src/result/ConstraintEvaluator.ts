/**
 * ConstraintEvaluator
 *
 * Checks measurements against per-model metric bounds and scores how far
 * an infeasible measurement is from passing. Violations are results, not
 * errors: the search uses the score to rank infeasible candidates.
 */

import { z } from 'zod';
import type { RunMeasurement } from './RunMeasurement.js';

export const MetricBoundSchema = z
  .object({
    min: z.number().optional(),
    max: z.number().optional(),
  })
  .strict();

export const ModelConstraintsSchema = z.record(MetricBoundSchema);

/**
 * Constraints keyed by model name, with `default` for undeclared models
 */
export const ConstraintSourceSchema = z.record(ModelConstraintsSchema);

export type MetricBound = z.infer<typeof MetricBoundSchema>;
export type ModelConstraints = z.infer<typeof ModelConstraintsSchema>;
export type ConstraintSource = z.infer<typeof ConstraintSourceSchema>;

/**
 * Constraints per model position; undefined means unconstrained
 */
export type ConstraintsPerModel = ReadonlyArray<ModelConstraints | undefined>;

export const DEFAULT_CONSTRAINT_KEY = 'default';

/**
 * Per-position constraints for the given models
 */
export function resolveConstraints(
  modelNames: readonly string[],
  source: ConstraintSource
): ConstraintsPerModel {
  return modelNames.map((name) => source[name] ?? source[DEFAULT_CONSTRAINT_KEY]);
}

export class ConstraintEvaluator {
  /**
   * True when every constrained metric of every model is within bounds
   */
  satisfies(constraints: ConstraintsPerModel, measurement: RunMeasurement): boolean {
    return this.violations(constraints, measurement).length === 0;
  }

  /**
   * Sum of relative overshoot across violated bounds, as a percentage.
   * Zero exactly when `satisfies` holds.
   */
  infeasibilityScore(constraints: ConstraintsPerModel, measurement: RunMeasurement): number {
    const failure = this.violations(constraints, measurement).reduce(
      (sum, violation) => sum + violation.relativeOvershoot,
      0
    );
    return failure * 100;
  }

  /**
   * Every violated bound, in model then record order
   */
  violations(constraints: ConstraintsPerModel, measurement: RunMeasurement): ConstraintViolation[] {
    const violations: ConstraintViolation[] = [];

    measurement.data().forEach((records, modelIndex) => {
      const modelConstraints = constraints[modelIndex];
      if (modelConstraints === undefined) {
        return;
      }

      for (const record of records) {
        const bound = modelConstraints[record.tag];
        if (bound === undefined) {
          continue;
        }

        if (bound.min !== undefined && record.value < bound.min) {
          violations.push({
            modelIndex,
            tag: record.tag,
            kind: 'min',
            limit: bound.min,
            value: record.value,
            relativeOvershoot: relativeDistance(bound.min - record.value, bound.min),
          });
        }
        if (bound.max !== undefined && record.value > bound.max) {
          violations.push({
            modelIndex,
            tag: record.tag,
            kind: 'max',
            limit: bound.max,
            value: record.value,
            relativeOvershoot: relativeDistance(record.value - bound.max, bound.max),
          });
        }
      }
    });

    return violations;
  }
}

export interface ConstraintViolation {
  modelIndex: number;
  tag: string;
  kind: 'min' | 'max';
  limit: number;
  value: number;
  relativeOvershoot: number;
}

/**
 * A zero limit has no relative scale; fall back to the absolute distance
 */
function relativeDistance(distance: number, limit: number): number {
  return limit === 0 ? distance : distance / Math.abs(limit);
}
