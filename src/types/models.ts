/** Marker written when no plot location could be resolved. A normal value, not an error. */
export const PLOT_LOCATION_NOT_FOUND = "None";

export interface DocumentRecord {
  /** Repository record id, e.g. `CDS_Record_2881420`. */
  recordId: string;
  title?: string;
  /** `YYYY-MM-DD` */
  lastModified?: string;
  url?: string;
  collection?: string;
  techReportNumbers: string[];
  plotLocation: string;
}

export interface CrawlState {
  resultPage: number;
  start: number;
  depth: number;
  failures: string[];
}

export type MentionKind = "Figure" | "Table";

export type MentionKey = `${MentionKind} ${string}`;

/** Insertion-ordered: keys in order of first appearance, contexts in order of appearance. */
export type MentionMap = Record<MentionKey, string[]>;

export interface MentionRecord {
  name: MentionKey;
  /** Every key of the document, repeated on each record. */
  mentions: MentionMap;
  atlusUrl: string;
  paper: string;
  paperName: string | null;
}

export interface DocumentDiscoveredItem {
  docId: string;
  url: string;
  title: string;
  collection: string;
  resultPage: number;
  discoveredAt: string;
}

export interface DownloadResult {
  docId: string;
  url: string;
  status: "downloaded_ok" | "download_failed" | "skipped";
  refreshed: boolean;
  pdfPath?: string;
  bytes?: number;
  sha256?: string;
  techReportNumbers: string[];
  plotLocation: string;
  error?: string;
  downloadedAt: string;
}

export interface ExtractionResult {
  docId: string;
  status: "extracted_ok" | "extracted_failed" | "skipped";
  pageBound?: number;
  textLocation?: string;
  error?: string;
  extractedAt: string;
}
