import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { vi } from "vitest";
import { Logger } from "../observability";
import { Sink } from "../sink";
import { DocumentDiscoveredItem, DownloadResult, ExtractionResult, MentionRecord } from "../types";

export function quietLogger(component = "test"): Logger {
  return new Logger({ component, runId: "run_test", echo: false });
}

export function makeTempDir(prefix = "plotmine-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export interface StubResponse {
  status?: number;
  body?: string;
  headers?: Record<string, string>;
}

export type StubRoute = string | StubResponse | (() => Promise<Response>);

function requestUrl(input: string | URL | Request): string {
  if (typeof input === "string") {
    return input;
  }
  return input instanceof URL ? input.toString() : input.url;
}

/** `fetch` stand-in answering from a URL → response table; unknown URLs get a 404. */
export function stubFetch(routes: Record<string, StubRoute>) {
  return vi.fn(async (input: string | URL | Request): Promise<Response> => {
    const route = routes[requestUrl(input)];
    if (route === undefined) {
      return new Response("not found", { status: 404 });
    }
    if (typeof route === "string") {
      return new Response(route, { status: 200, headers: { "content-type": "text/html" } });
    }
    if (typeof route === "function") {
      return route();
    }
    return new Response(route.body ?? null, { status: route.status ?? 200, headers: route.headers });
  });
}

export function requestedUrls(fetchFn: ReturnType<typeof stubFetch>): string[] {
  return fetchFn.mock.calls.map(([input]) => requestUrl(input));
}

export class RecordingSink implements Sink {
  readonly discovered: DocumentDiscoveredItem[] = [];
  readonly downloads: DownloadResult[] = [];
  readonly extracts: ExtractionResult[] = [];
  readonly mentions: MentionRecord[] = [];

  async publishDiscovered(items: DocumentDiscoveredItem[]): Promise<void> {
    this.discovered.push(...items);
  }

  async publishDownloadResult(results: DownloadResult[]): Promise<void> {
    this.downloads.push(...results);
  }

  async publishExtractionResult(results: ExtractionResult[]): Promise<void> {
    this.extracts.push(...results);
  }

  async publishMentionRecords(records: MentionRecord[]): Promise<void> {
    this.mentions.push(...records);
  }
}

export type SinkStage = "discovered" | "download" | "extract" | "mentions";

/** Records like `RecordingSink` but rejects every publication of the given stages. */
export class FailingSink extends RecordingSink {
  private readonly failing: ReadonlySet<SinkStage>;

  constructor(...stages: SinkStage[]) {
    super();
    this.failing = new Set(stages);
  }

  async publishDiscovered(items: DocumentDiscoveredItem[]): Promise<void> {
    this.failIf("discovered");
    await super.publishDiscovered(items);
  }

  async publishDownloadResult(results: DownloadResult[]): Promise<void> {
    this.failIf("download");
    await super.publishDownloadResult(results);
  }

  async publishExtractionResult(results: ExtractionResult[]): Promise<void> {
    this.failIf("extract");
    await super.publishExtractionResult(results);
  }

  async publishMentionRecords(records: MentionRecord[]): Promise<void> {
    this.failIf("mentions");
    await super.publishMentionRecords(records);
  }

  private failIf(stage: SinkStage): void {
    if (this.failing.has(stage)) {
      throw new Error("sink down");
    }
  }
}
