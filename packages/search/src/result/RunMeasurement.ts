/**
 * RunMeasurement
 *
 * Metrics measured for one run config, one record list per model in
 * the config's model order.
 */

import { createRecord } from '../record/metrics.js';
import type { MetricRecord } from '../record/MetricRecord.js';

/**
 * Objective weights keyed by metric tag
 */
export type Objectives = Record<string, number>;

export const DEFAULT_OBJECTIVES: Readonly<Objectives> = { perf_throughput: 1 };

export class RunMeasurement {
  private readonly perModel: readonly (readonly MetricRecord[])[];

  constructor(perModel: MetricRecord[][]) {
    this.perModel = perModel.map((records) => [...records]);
  }

  /**
   * Build from raw values, e.g. [{ perf_throughput: 100, perf_latency_p99: 12 }]
   */
  static fromValues(perModel: Array<Record<string, number>>, timestamp?: number): RunMeasurement {
    return new RunMeasurement(
      perModel.map((values) =>
        Object.entries(values).map(([tag, value]) => createRecord(tag, value, timestamp))
      )
    );
  }

  get modelCount(): number {
    return this.perModel.length;
  }

  data(): readonly (readonly MetricRecord[])[] {
    return this.perModel;
  }

  getRecord(modelIndex: number, tag: string): MetricRecord | undefined {
    return this.perModel[modelIndex]?.find((record) => record.tag === tag);
  }

  /**
   * Mean over models of the objective-weighted percentage gain of this
   * measurement over `baseline`. Weights are normalized per model over
   * the objectives present in both measurements.
   */
  weightedPercentageGain(
    baseline: RunMeasurement,
    objectives: Readonly<Objectives> = DEFAULT_OBJECTIVES
  ): number {
    const modelCount = Math.min(this.modelCount, baseline.modelCount);
    if (modelCount === 0) {
      return 0;
    }

    let total = 0;
    for (let modelIndex = 0; modelIndex < modelCount; modelIndex++) {
      let weightSum = 0;
      let weightedGain = 0;

      for (const [tag, weight] of Object.entries(objectives)) {
        const candidate = this.getRecord(modelIndex, tag);
        const reference = baseline.getRecord(modelIndex, tag);
        if (candidate === undefined || reference === undefined || weight <= 0) {
          continue;
        }
        weightSum += weight;
        weightedGain += weight * candidate.calculatePercentageGain(reference);
      }

      total += weightSum > 0 ? weightedGain / weightSum : 0;
    }

    return total / modelCount;
  }

  /**
   * Positive when this measurement beats `other`, zero when tied
   */
  compareTo(other: RunMeasurement, objectives: Readonly<Objectives> = DEFAULT_OBJECTIVES): number {
    const gain = this.weightedPercentageGain(other, objectives);
    return Number.isNaN(gain) ? 0 : Math.sign(gain);
  }

  isBetterThan(other: RunMeasurement, objectives: Readonly<Objectives> = DEFAULT_OBJECTIVES): boolean {
    return this.compareTo(other, objectives) > 0;
  }
}
