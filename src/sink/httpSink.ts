import { FetchFn, HttpError } from "../core/fetch";
import { DocumentDiscoveredItem, DownloadResult, ExtractionResult, MentionRecord } from "../types";
import { Sink } from "./types";

type StageName = "discovered" | "download" | "extract" | "mentions";

export interface HttpSinkOptions {
  endpoint: string;
  token?: string;
  fetchFn?: FetchFn;
  timeoutMs?: number;
}

/** POSTs each batch once as `{ stage, sentAt, items }`. A non-2xx answer is an `HttpError`. */
export class HttpSink implements Sink {
  private readonly endpoint: string;
  private readonly token?: string;
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number;

  constructor(options: HttpSinkOptions) {
    this.endpoint = options.endpoint;
    this.token = options.token;
    this.fetchFn = options.fetchFn ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 15_000;
  }

  async publishDiscovered(items: DocumentDiscoveredItem[]): Promise<void> {
    await this.post("discovered", items);
  }

  async publishDownloadResult(results: DownloadResult[]): Promise<void> {
    await this.post("download", results);
  }

  async publishExtractionResult(results: ExtractionResult[]): Promise<void> {
    await this.post("extract", results);
  }

  async publishMentionRecords(records: MentionRecord[]): Promise<void> {
    await this.post("mentions", records);
  }

  private async post(stage: StageName, items: object[]): Promise<void> {
    if (items.length === 0) {
      return;
    }

    const headers: Record<string, string> = { "content-type": "application/json" };
    if (this.token) {
      headers.authorization = `Bearer ${this.token}`;
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await this.fetchFn(this.endpoint, {
        method: "POST",
        headers,
        body: JSON.stringify({ stage, sentAt: new Date().toISOString(), items }),
        signal: controller.signal,
      });
      await response.body?.cancel();
      if (!response.ok) {
        throw new HttpError(response.status, this.endpoint);
      }
    } finally {
      clearTimeout(timeout);
    }
  }
}
