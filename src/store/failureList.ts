import fs from "node:fs";
import path from "node:path";

/**
 * Append-only list of source URLs that could not be processed. One line per failure, written as it
 * happens so a crash mid-run keeps what was recorded.
 */
export class FailureList {
  readonly filePath: string;
  private readonly entries: string[] = [];

  constructor(filePath: string) {
    this.filePath = filePath;
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  record(url: string): void {
    this.entries.push(url);
    fs.appendFileSync(this.filePath, `${url}\n`, "utf-8");
  }

  list(): readonly string[] {
    return this.entries;
  }
}
