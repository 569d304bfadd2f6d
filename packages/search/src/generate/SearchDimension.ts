/**
 * SearchDimension
 *
 * One tunable axis of the search space.
 *
 * Slot values resolve as:
 *   linear:      slot + 1   (slot 0 is the value 1)
 *   exponential: 2 ^ slot
 *
 * Slots below minBound are lifted to minBound before resolving.
 */

import { DimensionError } from '../errors.js';

export type DimensionLaw = 'linear' | 'exponential';

export class SearchDimension {
  constructor(
    readonly name: string,
    readonly law: DimensionLaw,
    readonly minBound: number = 0
  ) {
    if (!Number.isInteger(minBound) || minBound < 0) {
      throw new DimensionError(`Dimension '${name}' has invalid minBound ${minBound}`, {
        dimension: name,
        minBound,
      });
    }
  }

  /**
   * Resolve a coordinate slot to the concrete value for this axis
   */
  valueAt(slot: number): number {
    const index = Math.max(slot, this.minBound);

    if (this.law === 'exponential') {
      return 2 ** index;
    }
    return index + 1;
  }
}
