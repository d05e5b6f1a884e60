/**
 * Stream Metrics
 *
 * In-process counters, gauges and duration samples for one session. Keys are
 * `<component>.<name>`; durations keep the most recent samples only.
 */

export interface DurationStats {
  count: number;
  minMs: number;
  maxMs: number;
  meanMs: number;
  p95Ms: number;
}

export interface StreamMetricsSnapshot {
  windowStart: number;
  windowEnd: number;
  counters: Record<string, number>;
  gauges: Record<string, number>;
  durations: Record<string, DurationStats>;
}

export interface StreamMetricsOptions {
  /** Samples kept per duration key */
  maxSamples?: number;
  now?: () => number;
}

const DEFAULT_MAX_SAMPLES = 1000;

function computeStats(samples: readonly number[]): DurationStats {
  const sorted = [...samples].sort((a, b) => a - b);
  const total = sorted.reduce((sum, value) => sum + value, 0);
  return {
    count: sorted.length,
    minMs: sorted[0],
    maxMs: sorted[sorted.length - 1],
    meanMs: total / sorted.length,
    p95Ms: sorted[Math.min(sorted.length - 1, Math.floor(sorted.length * 0.95))],
  };
}

export class StreamMetrics {
  private counters: Record<string, number> = {};
  private gauges: Record<string, number> = {};
  private samples = new Map<string, number[]>();
  private windowStart: number;
  private maxSamples: number;
  private now: () => number;

  constructor(options: StreamMetricsOptions = {}) {
    this.now = options.now ?? Date.now;
    this.maxSamples = options.maxSamples ?? DEFAULT_MAX_SAMPLES;
    this.windowStart = this.now();
  }

  increment(component: string, name: string, by = 1): void {
    const key = `${component}.${name}`;
    this.counters[key] = (this.counters[key] || 0) + by;
  }

  setGauge(component: string, name: string, value: number): void {
    this.gauges[`${component}.${name}`] = value;
  }

  /**
   * Record how long an operation took and count it as a success or an error.
   */
  recordDuration(component: string, operation: string, durationMs: number, success: boolean): void {
    const key = `${component}.${operation}_duration`;
    let samples = this.samples.get(key);
    if (!samples) {
      samples = [];
      this.samples.set(key, samples);
    }
    samples.push(durationMs);
    if (samples.length > this.maxSamples) {
      samples.splice(0, samples.length - this.maxSamples);
    }
    this.increment(component, `${operation}_${success ? 'success' : 'error'}`);
  }

  getSnapshot(): StreamMetricsSnapshot {
    return this.buildSnapshot(() => true);
  }

  getComponentMetrics(component: string): StreamMetricsSnapshot {
    const prefix = `${component}.`;
    return this.buildSnapshot((key) => key.startsWith(prefix));
  }

  reset(): void {
    this.counters = {};
    this.gauges = {};
    this.samples.clear();
    this.windowStart = this.now();
  }

  private buildSnapshot(include: (key: string) => boolean): StreamMetricsSnapshot {
    const durations: Record<string, DurationStats> = {};
    for (const [key, samples] of this.samples) {
      if (include(key) && samples.length > 0) {
        durations[key] = computeStats(samples);
      }
    }
    return {
      windowStart: this.windowStart,
      windowEnd: this.now(),
      counters: Object.fromEntries(Object.entries(this.counters).filter(([key]) => include(key))),
      gauges: Object.fromEntries(Object.entries(this.gauges).filter(([key]) => include(key))),
      durations,
    };
  }
}
