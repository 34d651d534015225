/**
 * In-memory counters and histograms for harness runs, with Prometheus text export.
 *
 * Series are keyed `name|label=value,...` with labels sorted by name, which is
 * also the key format of {@link MetricsSnapshot}.
 */

import type { Realization } from '../matcher/types.js';

export const METRIC_CALLS = 'wildmatch_match_calls_total';
export const METRIC_FAILURES = 'wildmatch_case_failures_total';
export const METRIC_DURATION = 'wildmatch_battery_duration_seconds';

const HELP: Readonly<Record<string, string>> = {
  [METRIC_CALLS]: 'Total matcher invocations',
  [METRIC_FAILURES]: 'Cases whose result differed from the expected outcome',
  [METRIC_DURATION]: 'Wall time spent running a battery through one realization',
};

type Labels = Record<string, string>;

interface Series {
  name: string;
  labels: Labels;
}

interface HistogramSeries extends Series {
  sum: number;
  count: number;
  /** Cumulative count per entry of the collector's bucket bounds. */
  bucketCounts: number[];
}

interface CounterSeries extends Series {
  value: number;
}

export interface MetricsSnapshot {
  counters: Record<string, number>;
  histograms: {
    sums: Record<string, number>;
    counts: Record<string, number>;
    /** `name|labels|bound` for each bound an observation fell under, plus `|Inf`. */
    buckets: Record<string, number>;
  };
}

function seriesKey(name: string, labels: Labels): string {
  const pairs = Object.keys(labels)
    .sort()
    .map((k) => `${k}=${labels[k]}`);
  return `${name}|${pairs.join(',')}`;
}

function renderLabels(labels: Labels, le?: string): string {
  const parts = Object.keys(labels)
    .sort()
    .map((k) => `${k}="${labels[k]}"`);
  if (le !== undefined) parts.push(`le="${le}"`);
  return parts.length > 0 ? `{${parts.join(',')}}` : '';
}

function header(lines: string[], name: string, type: 'counter' | 'histogram'): void {
  lines.push(`# HELP ${name} ${HELP[name] ?? name}`);
  lines.push(`# TYPE ${name} ${type}`);
}

export class MetricsCollector {
  static readonly DEFAULT_BUCKETS: readonly number[] = [
    0.0001, 0.0005, 0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1.0, 5.0, 10.0, 60.0,
  ];

  private readonly _bounds: number[];
  private readonly _counters = new Map<string, CounterSeries>();
  private readonly _histograms = new Map<string, HistogramSeries>();

  constructor(buckets?: readonly number[]) {
    this._bounds = [...(buckets ?? MetricsCollector.DEFAULT_BUCKETS)].sort((a, b) => a - b);
  }

  increment(name: string, labels: Labels, amount: number = 1): void {
    const key = seriesKey(name, labels);
    const series = this._counters.get(key);
    if (series) {
      series.value += amount;
    } else {
      this._counters.set(key, { name, labels: { ...labels }, value: amount });
    }
  }

  observe(name: string, labels: Labels, value: number): void {
    const key = seriesKey(name, labels);
    let series = this._histograms.get(key);
    if (!series) {
      series = { name, labels: { ...labels }, sum: 0, count: 0, bucketCounts: this._bounds.map(() => 0) };
      this._histograms.set(key, series);
    }
    series.sum += value;
    series.count += 1;
    for (let i = 0; i < this._bounds.length; i++) {
      if (value <= this._bounds[i]) series.bucketCounts[i] += 1;
    }
  }

  snapshot(): MetricsSnapshot {
    const snap: MetricsSnapshot = { counters: {}, histograms: { sums: {}, counts: {}, buckets: {} } };
    for (const [key, series] of this._counters) {
      snap.counters[key] = series.value;
    }
    for (const [key, series] of this._histograms) {
      snap.histograms.sums[key] = series.sum;
      snap.histograms.counts[key] = series.count;
      series.bucketCounts.forEach((n, i) => {
        if (n > 0) snap.histograms.buckets[`${key}|${this._bounds[i]}`] = n;
      });
      snap.histograms.buckets[`${key}|Inf`] = series.count;
    }
    return snap;
  }

  reset(): void {
    this._counters.clear();
    this._histograms.clear();
  }

  exportPrometheus(): string {
    const lines: string[] = [];

    let current: string | null = null;
    for (const key of [...this._counters.keys()].sort()) {
      const series = this._counters.get(key);
      if (!series) continue;
      if (series.name !== current) {
        header(lines, series.name, 'counter');
        current = series.name;
      }
      lines.push(`${series.name}${renderLabels(series.labels)} ${series.value}`);
    }

    current = null;
    for (const key of [...this._histograms.keys()].sort()) {
      const series = this._histograms.get(key);
      if (!series) continue;
      const { name, labels } = series;
      if (name !== current) {
        header(lines, name, 'histogram');
        current = name;
      }
      this._bounds.forEach((bound, i) => {
        lines.push(`${name}_bucket${renderLabels(labels, String(bound))} ${series.bucketCounts[i]}`);
      });
      lines.push(`${name}_bucket${renderLabels(labels, '+Inf')} ${series.count}`);
      lines.push(`${name}_sum${renderLabels(labels)} ${series.sum}`);
      lines.push(`${name}_count${renderLabels(labels)} ${series.count}`);
    }

    return lines.length > 0 ? lines.join('\n') + '\n' : '';
  }

  incrementCalls(realization: Realization, amount: number): void {
    this.increment(METRIC_CALLS, { realization }, amount);
  }

  incrementFailures(battery: string, realization: Realization, amount: number = 1): void {
    this.increment(METRIC_FAILURES, { battery, realization }, amount);
  }

  observeDuration(battery: string, realization: Realization, durationSeconds: number): void {
    this.observe(METRIC_DURATION, { battery, realization }, durationSeconds);
  }
}
