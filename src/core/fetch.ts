import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { Agent, Dispatcher } from "undici";

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Agent | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

export type FetchFn = typeof fetch;

type DispatchingRequestInit = RequestInit & { dispatcher?: Dispatcher };

export class HttpError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, url: string) {
    super(`HTTP ${status} while fetching ${url}`);
    this.name = "HttpError";
    this.status = status;
    this.url = url;
  }
}

export interface HttpClientOptions {
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
  fetchFn?: FetchFn;
}

export interface DownloadedFile {
  path: string;
  bytes: number;
  sha256: string;
  contentType?: string;
}

export class HttpClient {
  private readonly options: HttpClientOptions;
  private readonly fetchFn: FetchFn;

  constructor(options: HttpClientOptions) {
    this.options = options;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async getHtml(url: string): Promise<string> {
    const response = await this.request(url, "text/html,application/xhtml+xml", this.options.requestTimeoutMs);
    if (!response.ok) {
      throw new HttpError(response.status, url);
    }
    return await response.text();
  }

  /** Status of a GET on `url`; network errors still throw. */
  async getStatus(url: string): Promise<number> {
    const response = await this.request(url, "*/*", this.options.requestTimeoutMs);
    await response.body?.cancel();
    return response.status;
  }

  /**
   * Streams `url` into `outputPath`, hashing on the way. The body lands in `<outputPath>.part` first and
   * is renamed once complete, so `outputPath` never names a partial file.
   */
  async download(url: string, outputPath: string): Promise<DownloadedFile> {
    const response = await this.request(url, "application/pdf,*/*", this.options.downloadTimeoutMs);
    if (!response.ok) {
      throw new HttpError(response.status, url);
    }
    if (!response.body) {
      throw new Error(`Empty response body from ${url}`);
    }

    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    const tempPath = `${outputPath}.part`;
    const hash = crypto.createHash("sha256");
    let bytes = 0;

    const readable = Readable.fromWeb(response.body);
    readable.on("data", (chunk: Buffer | Uint8Array) => {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
      hash.update(buffer);
      bytes += buffer.length;
    });

    try {
      await pipeline(readable, fs.createWriteStream(tempPath, { flags: "w" }));
      await fs.promises.rename(tempPath, outputPath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw error;
    }

    return {
      path: outputPath,
      bytes,
      sha256: hash.digest("hex"),
      contentType: response.headers.get("content-type") ?? undefined,
    };
  }

  private async request(url: string, accept: string, timeoutMs: number): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    const init: DispatchingRequestInit = {
      method: "GET",
      headers: {
        "user-agent": this.options.userAgent,
        accept,
      },
      dispatcher: getFetchDispatcher(this.options.ignoreHttpsErrors),
      signal: controller.signal,
      redirect: "follow",
    };

    try {
      return await this.fetchFn(url, init);
    } finally {
      clearTimeout(timeout);
    }
  }
}
