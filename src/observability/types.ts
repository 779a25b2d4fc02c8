export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  sourceId?: string;
  url?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "sources_crawled"
  | "sources_failed"
  | "listings_discovered"
  | "detail_fetch_failed"
  | "records_new"
  | "records_seen";

export type MetricTimerName = "index_fetch_ms" | "detail_fetch_ms" | "source_crawl_ms";
