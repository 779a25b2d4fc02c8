import { Logger } from "./logger";
import { MetricCounterName, MetricTimerName } from "./types";

interface HistogramSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
}

export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, number[]>();

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  startTimer(name: MetricTimerName): () => number {
    const startedAt = Date.now();
    return () => {
      const durationMs = Date.now() - startedAt;
      const values = this.timers.get(name) ?? [];
      values.push(durationMs);
      this.timers.set(name, values);
      return durationMs;
    };
  }

  getCounters(): Record<MetricCounterName, number> {
    return {
      sources_crawled: this.counters.get("sources_crawled") ?? 0,
      sources_failed: this.counters.get("sources_failed") ?? 0,
      listings_discovered: this.counters.get("listings_discovered") ?? 0,
      detail_fetch_failed: this.counters.get("detail_fetch_failed") ?? 0,
      records_new: this.counters.get("records_new") ?? 0,
      records_seen: this.counters.get("records_seen") ?? 0,
    };
  }

  getTimerSummaries(): Record<MetricTimerName, HistogramSummary> {
    return {
      index_fetch_ms: this.summarize("index_fetch_ms"),
      detail_fetch_ms: this.summarize("detail_fetch_ms"),
      source_crawl_ms: this.summarize("source_crawl_ms"),
    };
  }

  logSummary(logger: Logger): void {
    logger.info("metrics_summary", {
      counters: this.getCounters(),
      timers: this.getTimerSummaries(),
    });
  }

  private summarize(name: MetricTimerName): HistogramSummary {
    const values = this.timers.get(name) ?? [];
    if (values.length === 0) {
      return { count: 0, min: 0, max: 0, avg: 0 };
    }

    let total = 0;
    let min = values[0];
    let max = values[0];
    for (const value of values) {
      total += value;
      min = Math.min(min, value);
      max = Math.max(max, value);
    }

    return {
      count: values.length,
      min,
      max,
      avg: Number((total / values.length).toFixed(2)),
    };
  }
}
