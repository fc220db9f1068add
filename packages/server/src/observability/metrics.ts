/**
 * In-process metrics for monitoring tool performance
 * Tracks call counts, errors, and latency histograms
 */

interface Histogram {
  values: number[];
  sum: number;
  count: number;
}

export interface HistogramSummary {
  count: number;
  sum: number;
  p50: number;
  p95: number;
  p99: number;
}

type Labels = Record<string, string>;

// Keep only the most recent observations per series
const MAX_OBSERVATIONS = 1000;

export class MetricsRegistry {
  #counters = new Map<string, number>();
  #histograms = new Map<string, Histogram>();

  // Increment a counter
  inc(name: string, labels: Labels = {}): void {
    const key = this.makeKey(name, labels);
    this.#counters.set(key, (this.#counters.get(key) ?? 0) + 1);
  }

  // Observe a value in a histogram
  observe(name: string, value: number, labels: Labels = {}): void {
    const key = this.makeKey(name, labels);
    const histogram = this.#histograms.get(key) ?? { values: [], sum: 0, count: 0 };
    histogram.values.push(value);
    histogram.sum += value;

    if (histogram.values.length > MAX_OBSERVATIONS) {
      const removed = histogram.values.shift();
      if (removed !== undefined) {
        histogram.sum -= removed;
      }
    }
    histogram.count = histogram.values.length;

    this.#histograms.set(key, histogram);
  }

  getCounter(name: string, labels: Labels = {}): number {
    return this.#counters.get(this.makeKey(name, labels)) ?? 0;
  }

  // Histogram stats (p50, p95, p99)
  getHistogram(name: string, labels: Labels = {}): HistogramSummary | null {
    return this.summarize(this.#histograms.get(this.makeKey(name, labels)));
  }

  // All metrics keyed by series (for debugging)
  getAllMetrics(): {
    counters: Record<string, number>;
    histograms: Record<string, HistogramSummary | null>;
  } {
    const histograms: Record<string, HistogramSummary | null> = {};
    for (const [key, histogram] of this.#histograms) {
      histograms[key] = this.summarize(histogram);
    }

    return { counters: Object.fromEntries(this.#counters), histograms };
  }

  reset(): void {
    this.#counters.clear();
    this.#histograms.clear();
  }

  private summarize(histogram: Histogram | undefined): HistogramSummary | null {
    if (!histogram || histogram.values.length === 0) {
      return null;
    }

    const sorted = [...histogram.values].sort((a, b) => a - b);
    const percentile = (p: number) => {
      const index = Math.ceil((p / 100) * sorted.length) - 1;
      return sorted[Math.max(0, index)];
    };

    return {
      count: histogram.count,
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

// Record one tool execution
export function recordToolExecution(
  tool: string,
  duration_ms: number,
  success: boolean,
  errCode?: string
): void {
  metrics.inc("studylog.tool.calls_total", { tool });

  if (!success) {
    metrics.inc("studylog.tool.errors_total", { tool, err_code: errCode ?? "UNKNOWN" });
  }

  metrics.observe("studylog.tool.latency_ms", duration_ms, { tool });
}
