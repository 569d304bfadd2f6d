/**
 * SearchDimensions
 *
 * Ordered set of dimensions, grouped per entity index. Insertion order
 * is the coordinate slot order.
 */

import { Coordinate } from './Coordinate.js';
import { SearchDimension } from './SearchDimension.js';
import { DimensionError } from '../errors.js';

/**
 * Resolved values for one entity, keyed by dimension name
 */
export type DimensionValues = Record<string, number>;

interface DimensionSlot {
  entityIndex: number;
  dimension: SearchDimension;
}

export class SearchDimensions {
  private readonly slots: DimensionSlot[] = [];

  /**
   * Append dimensions for an entity. Entity indices must be contiguous:
   * either the last index used or the next one.
   */
  addDimensions(entityIndex: number, dimensions: SearchDimension[]): void {
    const lastIndex = this.entityCount - 1;

    if (entityIndex !== lastIndex && entityIndex !== lastIndex + 1) {
      throw new DimensionError(
        `Entity index ${entityIndex} is not contiguous (expected ${lastIndex} or ${lastIndex + 1})`,
        { entityIndex, entityCount: this.entityCount }
      );
    }

    for (const dimension of dimensions) {
      this.slots.push({ entityIndex, dimension });
    }
  }

  get slotCount(): number {
    return this.slots.length;
  }

  get entityCount(): number {
    const last = this.slots[this.slots.length - 1];
    return last === undefined ? 0 : last.entityIndex + 1;
  }

  getDimensions(): SearchDimension[] {
    return this.slots.map((slot) => slot.dimension);
  }

  getDimension(slot: number): SearchDimension {
    const entry = this.slots[slot];
    if (entry === undefined) {
      throw new DimensionError(`No dimension at slot ${slot}`, { slot, slotCount: this.slotCount });
    }
    return entry.dimension;
  }

  /**
   * Coordinate with every slot at its dimension's minBound
   */
  startingCoordinate(): Coordinate {
    return new Coordinate(this.slots.map((slot) => slot.dimension.minBound));
  }

  /**
   * Resolve a coordinate into per-entity dimension values
   */
  valuesFor(coordinate: Coordinate): DimensionValues[] {
    if (coordinate.length !== this.slotCount) {
      throw new DimensionError(
        `Coordinate ${coordinate.toString()} has ${coordinate.length} slots, expected ${this.slotCount}`,
        { coordinate: coordinate.toArray(), slotCount: this.slotCount }
      );
    }

    const values: DimensionValues[] = Array.from({ length: this.entityCount }, () => ({}));

    this.slots.forEach(({ entityIndex, dimension }, slot) => {
      const entityValues = values[entityIndex];
      if (entityValues !== undefined) {
        entityValues[dimension.name] = dimension.valueAt(coordinate.at(slot));
      }
    });

    return values;
  }

  /**
   * Whether every slot of the coordinate is at or above its minBound
   */
  isWithinBounds(coordinate: Coordinate): boolean {
    return (
      coordinate.length === this.slotCount &&
      this.slots.every(({ dimension }, slot) => coordinate.at(slot) >= dimension.minBound)
    );
  }
}
