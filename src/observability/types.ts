export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  orderId?: string;
  url?: string;
  stage?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "auth_cache_hits"
  | "auth_extractions"
  | "auth_manual"
  | "auth_rejections"
  | "reports_fetched"
  | "downloads_ok"
  | "downloads_skipped"
  | "downloads_failed";

export type MetricTimerName = "extract_ms" | "report_fetch_ms" | "download_ms";
