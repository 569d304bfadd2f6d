/**
 * Metric kinds
 *
 * One record class per measured metric. Latency and memory are
 * lower-is-better; throughput and utilization are higher-is-better.
 */

import { ValidationError } from '@tunekit/utils';
import { MetricRecord, type Polarity } from './MetricRecord.js';

export class PerfThroughput extends MetricRecord {
  static readonly TAG = 'perf_throughput';
  readonly tag = PerfThroughput.TAG;
  readonly polarity: Polarity = 'higher_is_better';

  header(): string {
    return 'Throughput (infer/sec)';
  }

  protected withValue(value: number, timestamp?: number): PerfThroughput {
    return new PerfThroughput(value, timestamp);
  }
}

export class PerfLatencyAvg extends MetricRecord {
  static readonly TAG = 'perf_latency_avg';
  readonly tag = PerfLatencyAvg.TAG;
  readonly polarity: Polarity = 'lower_is_better';

  header(): string {
    return 'Avg Latency (ms)';
  }

  protected withValue(value: number, timestamp?: number): PerfLatencyAvg {
    return new PerfLatencyAvg(value, timestamp);
  }
}

export class PerfLatencyP90 extends MetricRecord {
  static readonly TAG = 'perf_latency_p90';
  readonly tag = PerfLatencyP90.TAG;
  readonly polarity: Polarity = 'lower_is_better';

  header(): string {
    return 'p90 Latency (ms)';
  }

  protected withValue(value: number, timestamp?: number): PerfLatencyP90 {
    return new PerfLatencyP90(value, timestamp);
  }
}

export class PerfLatencyP95 extends MetricRecord {
  static readonly TAG = 'perf_latency_p95';
  readonly tag = PerfLatencyP95.TAG;
  readonly polarity: Polarity = 'lower_is_better';

  header(): string {
    return 'p95 Latency (ms)';
  }

  protected withValue(value: number, timestamp?: number): PerfLatencyP95 {
    return new PerfLatencyP95(value, timestamp);
  }
}

export class PerfLatencyP99 extends MetricRecord {
  static readonly TAG = 'perf_latency_p99';
  readonly tag = PerfLatencyP99.TAG;
  readonly polarity: Polarity = 'lower_is_better';

  header(): string {
    return 'p99 Latency (ms)';
  }

  protected withValue(value: number, timestamp?: number): PerfLatencyP99 {
    return new PerfLatencyP99(value, timestamp);
  }
}

export class PerfClientResponseWait extends MetricRecord {
  static readonly TAG = 'perf_client_response_wait';
  readonly tag = PerfClientResponseWait.TAG;
  readonly polarity: Polarity = 'lower_is_better';

  header(): string {
    return 'Response Wait Time (ms)';
  }

  protected withValue(value: number, timestamp?: number): PerfClientResponseWait {
    return new PerfClientResponseWait(value, timestamp);
  }
}

export class GpuUsedMemory extends MetricRecord {
  static readonly TAG = 'gpu_used_memory';
  readonly tag = GpuUsedMemory.TAG;
  readonly polarity: Polarity = 'lower_is_better';

  header(aggregated: boolean = false): string {
    return `${aggregated ? 'Max ' : ''}GPU Memory Usage (MB)`;
  }

  protected withValue(value: number, timestamp?: number): GpuUsedMemory {
    return new GpuUsedMemory(value, timestamp);
  }
}

export class GpuUtilization extends MetricRecord {
  static readonly TAG = 'gpu_utilization';
  readonly tag = GpuUtilization.TAG;
  readonly polarity: Polarity = 'higher_is_better';

  header(aggregated: boolean = false): string {
    return `${aggregated ? 'Max ' : ''}GPU Utilization (%)`;
  }

  protected withValue(value: number, timestamp?: number): GpuUtilization {
    return new GpuUtilization(value, timestamp);
  }
}

export class CpuUsedRam extends MetricRecord {
  static readonly TAG = 'cpu_used_ram';
  readonly tag = CpuUsedRam.TAG;
  readonly polarity: Polarity = 'lower_is_better';

  header(aggregated: boolean = false): string {
    return `${aggregated ? 'Max ' : ''}RAM Usage (MB)`;
  }

  protected withValue(value: number, timestamp?: number): CpuUsedRam {
    return new CpuUsedRam(value, timestamp);
  }
}

type MetricRecordClass = new (value: number, timestamp?: number) => MetricRecord;

const METRIC_KINDS: ReadonlyMap<string, MetricRecordClass> = new Map<string, MetricRecordClass>([
  [PerfThroughput.TAG, PerfThroughput],
  [PerfLatencyAvg.TAG, PerfLatencyAvg],
  [PerfLatencyP90.TAG, PerfLatencyP90],
  [PerfLatencyP95.TAG, PerfLatencyP95],
  [PerfLatencyP99.TAG, PerfLatencyP99],
  [PerfClientResponseWait.TAG, PerfClientResponseWait],
  [GpuUsedMemory.TAG, GpuUsedMemory],
  [GpuUtilization.TAG, GpuUtilization],
  [CpuUsedRam.TAG, CpuUsedRam],
]);

export function metricTags(): string[] {
  return [...METRIC_KINDS.keys()];
}

export function isMetricTag(tag: string): boolean {
  return METRIC_KINDS.has(tag);
}

/**
 * Build a record from its metric tag
 */
export function createRecord(tag: string, value: number, timestamp?: number): MetricRecord {
  const kind = METRIC_KINDS.get(tag);
  if (kind === undefined) {
    throw new ValidationError(`Unknown metric tag '${tag}'`, { tag, known: metricTags() });
  }
  return new kind(value, timestamp);
}
