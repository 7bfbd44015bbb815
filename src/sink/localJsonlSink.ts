import fs from "node:fs";
import path from "node:path";
import { DocumentDiscoveredItem, DownloadResult, ExtractionResult, MentionRecord } from "../types";
import { Sink } from "./types";

export class LocalJsonlSink implements Sink {
  private readonly discoveredPath: string;
  private readonly downloadsPath: string;
  private readonly extractsPath: string;
  private readonly mentionsPath: string;
  private readonly runId: string;

  constructor(manifestsDir: string, runId: string) {
    const resolvedDir = path.resolve(manifestsDir);
    fs.mkdirSync(resolvedDir, { recursive: true });
    this.discoveredPath = path.join(resolvedDir, "discovered.jsonl");
    this.downloadsPath = path.join(resolvedDir, "downloads.jsonl");
    this.extractsPath = path.join(resolvedDir, "extracts.jsonl");
    this.mentionsPath = path.join(resolvedDir, "mentions.jsonl");
    this.runId = runId;
  }

  async publishDiscovered(items: DocumentDiscoveredItem[]): Promise<void> {
    await this.appendLines(this.discoveredPath, items);
  }

  async publishDownloadResult(results: DownloadResult[]): Promise<void> {
    await this.appendLines(this.downloadsPath, results);
  }

  async publishExtractionResult(results: ExtractionResult[]): Promise<void> {
    await this.appendLines(this.extractsPath, results);
  }

  async publishMentionRecords(records: MentionRecord[]): Promise<void> {
    await this.appendLines(this.mentionsPath, records);
  }

  private async appendLines(filePath: string, records: object[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const content = records.map((record) => JSON.stringify({ runId: this.runId, ...record })).join("\n") + "\n";
    await fs.promises.appendFile(filePath, content, "utf-8");
  }
}
