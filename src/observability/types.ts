export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  docId?: string;
  url?: string;
  pageUrl?: string;
  folder?: string;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "pages_crawled"
  | "docs_discovered"
  | "docs_refreshed"
  | "downloads_ok"
  | "downloads_failed"
  | "downloads_skipped"
  | "extracts_ok"
  | "extracts_failed"
  | "mention_docs_ok"
  | "mention_docs_skipped"
  | "mentions_found"
  | "conversions_failed";

export type MetricTimerName = "page_fetch_ms" | "download_ms" | "extract_ms" | "mentions_ms";
