/**
 * Metrics sink consumed by every kernel component.
 *
 * Exporting to a telemetry backend is left to the host; the kernel only
 * records counters, timings and gauges against this interface.
 */

export type MetricTags = Record<string, string | number | boolean>;

export interface MetricsSink {
  increment(name: string, value?: number, tags?: MetricTags): void;
  timing(name: string, ms: number, tags?: MetricTags): void;
  gauge(name: string, value: number, tags?: MetricTags): void;
}

export interface TimingSummary {
  count: number;
  sum: number;
  min: number;
  max: number;
  avg: number;
}

export interface MetricsSnapshot {
  counters: Record<string, number>;
  gauges: Record<string, number>;
  timings: Record<string, TimingSummary>;
}

export class NoopMetrics implements MetricsSink {
  increment(): void {}
  timing(): void {}
  gauge(): void {}
}

/**
 * Keeps everything in process memory. Series are keyed by name plus sorted
 * tags, e.g. `queue.enqueued{taskType=exports}`.
 */
export class InMemoryMetrics implements MetricsSink {
  private counters = new Map<string, number>();
  private gauges = new Map<string, number>();
  private timings = new Map<string, TimingSummary>();

  increment(name: string, value: number = 1, tags?: MetricTags): void {
    const key = seriesKey(name, tags);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  timing(name: string, ms: number, tags?: MetricTags): void {
    const key = seriesKey(name, tags);
    const current = this.timings.get(key);
    if (!current) {
      this.timings.set(key, { count: 1, sum: ms, min: ms, max: ms, avg: ms });
      return;
    }
    current.count++;
    current.sum += ms;
    current.min = Math.min(current.min, ms);
    current.max = Math.max(current.max, ms);
    current.avg = current.sum / current.count;
  }

  gauge(name: string, value: number, tags?: MetricTags): void {
    this.gauges.set(seriesKey(name, tags), value);
  }

  /** Counter value for an exact series; 0 when never incremented. */
  counter(name: string, tags?: MetricTags): number {
    return this.counters.get(seriesKey(name, tags)) ?? 0;
  }

  /** Sum of a counter across every tag combination. */
  counterTotal(name: string): number {
    let total = 0;
    for (const [key, value] of this.counters) {
      if (key === name || key.startsWith(`${name}{`)) total += value;
    }
    return total;
  }

  gaugeValue(name: string, tags?: MetricTags): number | undefined {
    return this.gauges.get(seriesKey(name, tags));
  }

  snapshot(): MetricsSnapshot {
    const timings: Record<string, TimingSummary> = {};
    for (const [key, summary] of this.timings) {
      timings[key] = { ...summary };
    }
    return {
      counters: Object.fromEntries(this.counters),
      gauges: Object.fromEntries(this.gauges),
      timings,
    };
  }

  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.timings.clear();
  }
}

function seriesKey(name: string, tags?: MetricTags): string {
  if (!tags) return name;
  const keys = Object.keys(tags).sort();
  if (keys.length === 0) return name;
  return `${name}{${keys.map(k => `${k}=${String(tags[k])}`).join(',')}}`;
}
