/**
 * MetricRecord
 *
 * A single measured metric value. Each metric kind fixes its polarity,
 * and every comparison, difference and gain is expressed so that
 * "greater"/"positive" means "better" regardless of polarity.
 */

import { ValidationError } from '@tunekit/utils';

export type Polarity = 'higher_is_better' | 'lower_is_better';

export abstract class MetricRecord {
  abstract readonly tag: string;
  abstract readonly polarity: Polarity;

  constructor(
    readonly value: number,
    readonly timestamp: number = 0
  ) {}

  /**
   * Column header, optionally marking an aggregated value
   */
  abstract header(aggregated?: boolean): string;

  /**
   * New record of the same metric kind
   */
  protected abstract withValue(value: number, timestamp?: number): MetricRecord;

  /**
   * Positive when this record is better than `other`
   */
  compareTo(other: MetricRecord): number {
    const difference = this.value - other.value;
    return this.polarity === 'higher_is_better' ? difference : -difference;
  }

  equals(other: MetricRecord): boolean {
    return this.tag === other.tag && this.value === other.value;
  }

  isBetterThan(other: MetricRecord): boolean {
    return this.compareTo(other) > 0;
  }

  isWorseThan(other: MetricRecord): boolean {
    return this.compareTo(other) < 0;
  }

  add(other: MetricRecord): MetricRecord {
    this.assertSameTag(other);
    return this.withValue(this.value + other.value);
  }

  /**
   * Difference oriented by polarity: positive when this is better
   */
  subtract(other: MetricRecord): MetricRecord {
    this.assertSameTag(other);
    return this.withValue(
      this.polarity === 'higher_is_better' ? this.value - other.value : other.value - this.value
    );
  }

  /**
   * Percentage improvement of this record over `baseline`
   */
  calculatePercentageGain(baseline: MetricRecord): number {
    this.assertSameTag(baseline);

    const delta =
      this.polarity === 'higher_is_better'
        ? this.value - baseline.value
        : baseline.value - this.value;

    if (baseline.value === 0) {
      return delta === 0 ? 0 : Math.sign(delta) * Number.POSITIVE_INFINITY;
    }

    return (delta / baseline.value) * 100;
  }

  toJSON(): { tag: string; value: number; timestamp: number } {
    return { tag: this.tag, value: this.value, timestamp: this.timestamp };
  }

  private assertSameTag(other: MetricRecord): void {
    if (other.tag !== this.tag) {
      throw new ValidationError(`Cannot combine '${this.tag}' with '${other.tag}'`, {
        tag: this.tag,
        otherTag: other.tag,
      });
    }
  }
}
