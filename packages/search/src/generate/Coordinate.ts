/**
 * Coordinate
 *
 * Immutable point in the discrete search space, one non-negative
 * integer per dimension slot.
 */

import { DimensionError } from '../errors.js';

export class Coordinate {
  private readonly values: readonly number[];

  constructor(values: Iterable<number>) {
    const slots = Array.from(values);

    for (const [slot, value] of slots.entries()) {
      if (!Number.isInteger(value) || value < 0) {
        throw new DimensionError(`Coordinate slot ${slot} must be a non-negative integer`, {
          slot,
          value,
        });
      }
    }

    this.values = Object.freeze(slots);
  }

  get length(): number {
    return this.values.length;
  }

  at(slot: number): number {
    const value = this.values[slot];
    if (value === undefined) {
      throw new DimensionError(`Slot ${slot} is out of range for coordinate ${this.toString()}`, {
        slot,
        length: this.values.length,
      });
    }
    return value;
  }

  toArray(): number[] {
    return [...this.values];
  }

  equals(other: Coordinate): boolean {
    return (
      this.values.length === other.values.length &&
      this.values.every((value, slot) => value === other.values[slot])
    );
  }

  /**
   * Return a new coordinate with one slot floored at lowerBound
   */
  clampToBound(slot: number, lowerBound: number): Coordinate {
    const current = this.at(slot);
    if (current >= lowerBound) {
      return this;
    }

    const values = this.toArray();
    values[slot] = lowerBound;
    return new Coordinate(values);
  }

  /**
   * All coordinates within Chebyshev distance `radius` of this one,
   * excluding this coordinate and anything with a negative slot.
   *
   * Ordered lexicographically by per-slot offset, first slot most
   * significant. Iterating twice yields the same sequence.
   */
  neighborsWithinRadius(radius: number): Iterable<Coordinate> {
    if (!Number.isInteger(radius) || radius < 0) {
      throw new DimensionError(`Radius must be a non-negative integer, got ${radius}`, { radius });
    }

    const origin = this.values;

    return {
      *[Symbol.iterator]() {
        if (origin.length === 0 || radius === 0) {
          return;
        }

        const lower = origin.map((value) => Math.max(-radius, -value));
        const offsets = [...lower];

        for (;;) {
          if (offsets.some((offset) => offset !== 0)) {
            yield new Coordinate(origin.map((value, slot) => value + (offsets[slot] ?? 0)));
          }

          // Odometer increment, last slot fastest
          let slot = offsets.length - 1;
          while (slot >= 0 && offsets[slot] === radius) {
            offsets[slot] = lower[slot] ?? 0;
            slot--;
          }
          if (slot < 0) {
            return;
          }
          offsets[slot] = (offsets[slot] ?? 0) + 1;
        }
      },
    };
  }

  toString(): string {
    return `[${this.values.join(', ')}]`;
  }
}
