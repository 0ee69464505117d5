import { Logger } from "./logger";
import { MetricCounterName, MetricTimerName } from "./types";

export interface HistogramSummary {
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
      auth_cache_hits: this.counters.get("auth_cache_hits") ?? 0,
      auth_extractions: this.counters.get("auth_extractions") ?? 0,
      auth_manual: this.counters.get("auth_manual") ?? 0,
      auth_rejections: this.counters.get("auth_rejections") ?? 0,
      reports_fetched: this.counters.get("reports_fetched") ?? 0,
      downloads_ok: this.counters.get("downloads_ok") ?? 0,
      downloads_skipped: this.counters.get("downloads_skipped") ?? 0,
      downloads_failed: this.counters.get("downloads_failed") ?? 0,
    };
  }

  getTimerSummaries(): Record<MetricTimerName, HistogramSummary> {
    return {
      extract_ms: this.summarize("extract_ms"),
      report_fetch_ms: this.summarize("report_fetch_ms"),
      download_ms: this.summarize("download_ms"),
    };
  }

  /** Emits counters and timer summaries as one `metrics_summary` event. */
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
