/**
 * In-process metrics for monitoring tool performance
 * Tracks call counts, errors, and latency histograms
 */

type Labels = Record<string, string>;

interface Histogram {
  values: number[];
  sum: number;
}

export interface HistogramStats {
  count: number;
  sum: number;
  p50: number;
  p95: number;
  p99: number;
}

// Keep only the most recent observations per histogram
const MAX_OBSERVATIONS = 1000;

class MetricsRegistry {
  #counters: Map<string, number> = new Map();
  #histograms: Map<string, Histogram> = new Map();

  // Increment a counter
  inc(name: string, labels: Labels = {}): void {
    const key = this.makeKey(name, labels);
    this.#counters.set(key, (this.#counters.get(key) ?? 0) + 1);
  }

  // Observe a value in a histogram
  observe(name: string, value: number, labels: Labels = {}): void {
    const key = this.makeKey(name, labels);
    const histogram = this.#histograms.get(key) ?? { values: [], sum: 0 };
    histogram.values.push(value);
    histogram.sum += value;

    if (histogram.values.length > MAX_OBSERVATIONS) {
      const removed = histogram.values.shift();
      if (removed !== undefined) {
        histogram.sum -= removed;
      }
    }

    this.#histograms.set(key, histogram);
  }

  getCounter(name: string, labels: Labels = {}): number {
    return this.#counters.get(this.makeKey(name, labels)) ?? 0;
  }

  // Histogram stats (p50, p95, p99)
  getHistogram(name: string, labels: Labels = {}): HistogramStats | null {
    return this.stats(this.makeKey(name, labels));
  }

  // All metrics keyed by name{labels}
  getAllMetrics(): { counters: Record<string, number>; histograms: Record<string, HistogramStats | null> } {
    const counters = Object.fromEntries(this.#counters);
    const histograms: Record<string, HistogramStats | null> = {};
    for (const key of this.#histograms.keys()) {
      histograms[key] = this.stats(key);
    }
    return { counters, histograms };
  }

  reset(): void {
    this.#counters.clear();
    this.#histograms.clear();
  }

  private stats(key: string): HistogramStats | null {
    const histogram = this.#histograms.get(key);
    if (!histogram || histogram.values.length === 0) {
      return null;
    }

    const sorted = [...histogram.values].sort((a, b) => a - b);
    const percentile = (p: number): number => {
      const index = Math.ceil((p / 100) * sorted.length) - 1;
      return sorted[Math.max(0, index)] ?? 0;
    };

    return {
      count: sorted.length,
      sum: histogram.sum,
      p50: percentile(50),
      p95: percentile(95),
      p99: percentile(99),
    };
  }

  private makeKey(name: string, labels: Labels): string {
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}="${v}"`)
      .join(",");
    return labelStr ? `${name}{${labelStr}}` : name;
  }
}

export const metrics = new MetricsRegistry();

// Helper to record tool execution metrics
export function recordToolExecution(
  tool: string,
  duration_ms: number,
  success: boolean,
  errCode?: string
): void {
  metrics.inc("namegroups.tool.calls_total", { tool });

  if (!success) {
    metrics.inc("namegroups.tool.errors_total", { tool, err_code: errCode ?? "UNKNOWN" });
  }

  metrics.observe("namegroups.tool.latency_ms", duration_ms, { tool });
}
