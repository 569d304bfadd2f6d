/**
 * RunConfig
 *
 * Output of one search step: a named variant and benchmark parameters
 * per model, plus named stage variants for ensembles.
 */

import type { Coordinate } from './Coordinate.js';
import type { BenchmarkFlags, ModelConfigFields } from './types.js';

export class ModelVariant {
  private readonly fields: ModelConfigFields;

  constructor(
    readonly name: string,
    fields: ModelConfigFields,
    readonly cpuOnly: boolean = false
  ) {
    this.fields = { ...fields, name };
  }

  getField(key: string): unknown {
    return this.fields[key];
  }

  /**
   * Field mapping in the baseline's shape, name included
   */
  toDict(): ModelConfigFields {
    return { ...this.fields, cpu_only: this.cpuOnly };
  }
}

export class ModelRunConfig {
  constructor(
    readonly modelName: string,
    readonly variant: ModelVariant,
    readonly benchmarkParams: Readonly<BenchmarkFlags>,
    readonly stages: readonly ModelVariant[] = []
  ) {}

  get variantName(): string {
    return this.variant.name;
  }

  get concurrency(): number {
    const value = this.benchmarkParams['concurrency-range'];
    return typeof value === 'number' ? value : Number(value);
  }

  isComposite(): boolean {
    return this.stages.length > 0;
  }

  /**
   * Benchmark parameters as command-line flags
   */
  representation(): string {
    return Object.entries(this.benchmarkParams)
      .map(([flag, value]) => `--${flag}=${String(value)}`)
      .join(' ');
  }
}

export class RunConfig {
  constructor(
    readonly models: readonly ModelRunConfig[],
    readonly isDefault: boolean,
    readonly coordinate?: Coordinate
  ) {}

  representation(): string {
    return this.models.map((model) => model.representation()).join(' ');
  }

  /**
   * Variant names and concurrency of every model; equal keys mean equal configs
   */
  key(): string {
    return this.models
      .map((model) => {
        const stages = model.isComposite()
          ? `(${model.stages.map((stage) => stage.name).join(',')})`
          : '';
        return `${model.variantName}${stages}@${model.concurrency}`;
      })
      .join('|');
  }
}
