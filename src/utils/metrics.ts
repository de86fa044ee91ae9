export interface MetricSample {
  value: number;
  timestamp: number;
}

export interface MetricSummary {
  count: number;
  avg: number;
  min: number;
  max: number;
}

const MAX_SAMPLES_PER_KEY = 1000;

/**
 * 📊 In-process timing samples and counters for jobs, page fetches and
 * webhook attempts. Each key keeps its most recent samples only.
 */
export class MetricsCollector {
  private metrics: Map<string, MetricSample[]>;
  private counters: Map<string, number>;

  constructor(private readonly now: () => number = Date.now) {
    this.metrics = new Map();
    this.counters = new Map();
  }

  recordJobDuration(status: string, duration: number) {
    this.record('job_duration', duration);
    this.increment(`jobs_${status.toLowerCase()}`);
  }

  recordPageFetch(category: string, duration: number) {
    this.record(`page_fetch_${category}`, duration);
  }

  recordPageFailure(code: string) {
    this.increment(`page_failures_${code.toLowerCase()}`);
  }

  recordWebhookAttempt(outcome: string, duration: number) {
    this.record('webhook_attempt', duration);
    this.increment(`webhook_${outcome.toLowerCase()}`);
  }

  increment(key: string, by = 1) {
    this.counters.set(key, (this.counters.get(key) ?? 0) + by);
  }

  private record(key: string, value: number) {
    const samples = this.metrics.get(key) ?? [];
    samples.push({ value, timestamp: this.now() });
    if (samples.length > MAX_SAMPLES_PER_KEY) samples.splice(0, samples.length - MAX_SAMPLES_PER_KEY);
    this.metrics.set(key, samples);
  }

  getMetrics(key: string): MetricSample[] {
    return [...(this.metrics.get(key) ?? [])];
  }

  getCounter(key: string): number {
    return this.counters.get(key) ?? 0;
  }

  summarize(): { timings: Record<string, MetricSummary>; counters: Record<string, number> } {
    const timings: Record<string, MetricSummary> = {};
    for (const [key, samples] of this.metrics) {
      if (samples.length === 0) continue;
      const values = samples.map((sample) => sample.value);
      const total = values.reduce((sum, value) => sum + value, 0);
      timings[key] = {
        count: values.length,
        avg: Math.round(total / values.length),
        min: Math.min(...values),
        max: Math.max(...values),
      };
    }
    return { timings, counters: Object.fromEntries(this.counters) };
  }

  clearMetrics() {
    this.metrics.clear();
    this.counters.clear();
  }
}
