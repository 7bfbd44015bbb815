import fs from "node:fs";
import path from "node:path";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { AppConfig, DEFAULT_CONFIG } from "../config";
import { HttpClient } from "../core/fetch";
import { TextExtractionTool } from "../extract";
import { MetricsRegistry } from "../observability";
import { readMetadataFile } from "../store";
import { FailingSink, makeTempDir, quietLogger, RecordingSink, requestedUrls, StubRoute, stubFetch } from "../testing/helpers";
import { countCollection, crawlCollection, CrawlDependencies, CrawlOptions, extractCollectionPdfs } from "./crawler";

const PAGE_0 = "https://repo.test/search?cc=Test+Papers&rg=10&m1=a&jrec=1";
const PAGE_1 = "https://repo.test/search?cc=Test+Papers&rg=10&m1=a&jrec=11";
const RECORD_A = "https://repo.test/record/101";
const RECORD_B = "https://repo.test/record/102";
const PDF_A = "https://repo.test/record/101/files/doc-a.pdf";

const LISTING = `
  <html><body>
    <a class="titlelink" href="/record/101?ln=en">Paper A</a>
    <a class="titlelink" href="/record/102">Paper B</a>
  </body></html>`;

function recordPage(modified: string, withPdf: boolean): string {
  const pdfMeta = withPdf ? `<meta name="citation_pdf_url" content="/record/101/files/doc-a.pdf">` : "";
  return `
    <html><head>${pdfMeta}</head><body>
      <table><tr><td class="formatRecordLabel">Note</td><td><a href="https://plots.test/a">plots</a></td></tr></table>
      <div class="recordlastmodifiedbox">Record created 2023-01-01, last modified ${modified}</div>
    </body></html>`;
}

function fakeTool(fail = false) {
  const extract = vi.fn(async (pdfPath: string, outputDir: string, _lastPage?: number): Promise<string> => {
    if (fail) {
      throw new Error("tool exited with code 1");
    }
    const produced = path.join(outputDir, `${path.basename(pdfPath, ".pdf")}.mmd`);
    fs.writeFileSync(produced, "Extracted text", "utf-8");
    return produced;
  });
  const tool: TextExtractionTool = { extract };
  return { tool, extract };
}

describe("crawlCollection", () => {
  let root: string;
  let routes: Record<string, StubRoute>;
  let config: AppConfig;

  beforeEach(() => {
    root = makeTempDir();
    config = { ...DEFAULT_CONFIG, baseUrl: "https://repo.test", outputRoot: root };
    routes = {
      [PAGE_0]: LISTING,
      [PAGE_1]: "<html><body>No results</body></html>",
      [RECORD_A]: recordPage("2024-02-10", true),
      [RECORD_B]: recordPage("2024-01-05", false),
      [PDF_A]: { body: "%PDF-1.4 a" },
    };
  });

  function setup(tool: TextExtractionTool, sink: RecordingSink = new RecordingSink()) {
    const fetchFn = stubFetch(routes);
    const deps: CrawlDependencies = {
      config,
      logger: quietLogger(),
      metrics: new MetricsRegistry(),
      sink,
      http: new HttpClient({
        userAgent: "test-agent",
        ignoreHttpsErrors: false,
        requestTimeoutMs: 1_000,
        downloadTimeoutMs: 1_000,
        fetchFn,
      }),
      pageReader: { readPages: async () => ["Introduction", "Results", "References"] },
      extractionTool: tool,
    };
    return { deps, fetchFn, sink };
  }

  const options: CrawlOptions = { collection: "Test Papers", start: 0, depth: -1, overwrite: false, extractText: true };
  const folderA = () => path.join(root, "Test_Papers", "CDS_Record_101");

  it("visits pages until one lists nothing and records failures", async () => {
    const { tool, extract } = fakeTool();
    const { deps, sink } = setup(tool);

    const summary = await crawlCollection(deps, options);

    expect(summary).toEqual({ pagesVisited: 2, documentsSeen: 2, documentsRefreshed: 1, failures: [RECORD_B] });
    expect(fs.readFileSync(path.join(root, "Test_Papers", "failed_list.txt"), "utf-8")).toBe(`${RECORD_B}\n`);
    expect(fs.readFileSync(path.join(folderA(), "doc-a.pdf"), "utf-8")).toBe("%PDF-1.4 a");
    expect(fs.readFileSync(path.join(folderA(), "document.mmd"), "utf-8")).toBe("Extracted text");
    expect(fs.existsSync(path.join(folderA(), "doc-a.mmd"))).toBe(false);
    expect(extract).toHaveBeenCalledWith(path.join(folderA(), "doc-a.pdf"), folderA(), 3);

    expect(readMetadataFile(path.join(folderA(), "meta_info.txt"))).toEqual({
      paperName: "Paper A",
      lastModified: "2024-02-10",
      url: RECORD_A,
      collection: "Test_Papers",
      techReportNumbers: [],
      plotLocation: "https://plots.test/a",
    });

    expect(sink.discovered.map((item) => item.docId)).toEqual(["CDS_Record_101", "CDS_Record_102"]);
    expect(sink.downloads.map((item) => item.status)).toEqual(["downloaded_ok", "download_failed"]);
    expect(sink.extracts).toHaveLength(1);
    expect(sink.extracts[0]).toMatchObject({ docId: "CDS_Record_101", status: "extracted_ok", pageBound: 3 });
  });

  it("carries on when the sink rejects every publication", async () => {
    const { tool, extract } = fakeTool();
    const { deps } = setup(tool, new FailingSink("discovered", "download", "extract"));

    const summary = await crawlCollection(deps, options);

    expect(summary).toEqual({ pagesVisited: 2, documentsSeen: 2, documentsRefreshed: 1, failures: [RECORD_B] });
    expect(readMetadataFile(path.join(folderA(), "meta_info.txt"))?.lastModified).toBe("2024-02-10");
    expect(fs.readFileSync(path.join(folderA(), "document.mmd"), "utf-8")).toBe("Extracted text");
    expect(extract).toHaveBeenCalledTimes(1);
  });

  it("stops after the depth page", async () => {
    const { deps, fetchFn } = setup(fakeTool().tool);

    const summary = await crawlCollection(deps, { ...options, depth: 0 });

    expect(summary.pagesVisited).toBe(1);
    expect(requestedUrls(fetchFn)).not.toContain(PAGE_1);
  });

  it("leaves an unchanged document alone on the next run", async () => {
    const first = fakeTool();
    await crawlCollection(setup(first.tool).deps, options);
    const metadataPath = path.join(folderA(), "meta_info.txt");
    fs.writeFileSync(metadataPath, fs.readFileSync(metadataPath, "utf-8").replace("Paper A", "Kept title"), "utf-8");

    const second = fakeTool();
    const { deps, fetchFn } = setup(second.tool);
    const summary = await crawlCollection(deps, options);

    expect(summary.documentsRefreshed).toBe(0);
    expect(readMetadataFile(metadataPath)?.paperName).toBe("Kept title");
    expect(second.extract).not.toHaveBeenCalled();
    expect(requestedUrls(fetchFn)).not.toContain(PDF_A);
  });

  it("rewrites metadata when the record was modified since the last run", async () => {
    await crawlCollection(setup(fakeTool().tool).deps, options);
    routes[RECORD_A] = recordPage("2024-05-01", true);

    const summary = await crawlCollection(setup(fakeTool().tool).deps, options);

    expect(summary.documentsRefreshed).toBe(1);
    expect(readMetadataFile(path.join(folderA(), "meta_info.txt"))?.lastModified).toBe("2024-05-01");
  });

  it("re-downloads and re-extracts a modified record when overwriting", async () => {
    await crawlCollection(setup(fakeTool().tool).deps, options);
    routes[RECORD_A] = recordPage("2024-05-01", true);
    routes[PDF_A] = { body: "%PDF-1.4 revised" };

    const again = fakeTool();
    await crawlCollection(setup(again.tool).deps, { ...options, overwrite: true });

    expect(fs.readFileSync(path.join(folderA(), "doc-a.pdf"), "utf-8")).toBe("%PDF-1.4 revised");
    expect(again.extract).toHaveBeenCalledTimes(1);
  });

  it("records an extraction failure and moves on", async () => {
    const { deps, sink } = setup(fakeTool(true).tool);

    const summary = await crawlCollection(deps, options);

    expect(summary.failures).toEqual([RECORD_A, RECORD_B]);
    expect(sink.extracts.map((item) => item.status)).toEqual(["extracted_failed"]);
    expect(fs.existsSync(path.join(folderA(), "document.mmd"))).toBe(false);
  });

  it("skips a document whose stored date cannot be read", async () => {
    fs.mkdirSync(folderA(), { recursive: true });
    fs.writeFileSync(path.join(folderA(), "meta_info.txt"), "PAPER NAME : Paper A\nLAST MODIFICATION DATE : yesterday\n", "utf-8");
    const { deps, fetchFn } = setup(fakeTool().tool);

    const summary = await crawlCollection(deps, options);

    expect(summary.failures).toEqual([RECORD_B]);
    expect(summary.documentsRefreshed).toBe(0);
    expect(requestedUrls(fetchFn)).not.toContain(PDF_A);
  });

  it("skips text extraction when disabled", async () => {
    const { tool, extract } = fakeTool();
    await crawlCollection(setup(tool).deps, { ...options, extractText: false });

    expect(extract).not.toHaveBeenCalled();
    expect(fs.existsSync(path.join(folderA(), "doc-a.pdf"))).toBe(true);
  });
});

describe("countCollection", () => {
  it("reads the record total from the first result page", async () => {
    const fetchFn = stubFetch({
      [PAGE_0]: `<table><tr><td class="searchresultsboxheader" align="center"><strong>1,234</strong> records found</td></tr></table>`,
    });
    const http = new HttpClient({ userAgent: "test-agent", ignoreHttpsErrors: false, requestTimeoutMs: 1_000, downloadTimeoutMs: 1_000, fetchFn });

    const count = await countCollection(
      { config: { ...DEFAULT_CONFIG, baseUrl: "https://repo.test" }, logger: quietLogger(), http },
      "Test Papers",
    );

    expect(count).toBe(1234);
  });
});

describe("extractCollectionPdfs", () => {
  it("extracts every downloaded PDF and counts failures", async () => {
    const root = makeTempDir();
    const collectionDir = path.join(root, "Test_Papers");
    for (const [folder, pdf] of [
      ["CDS_Record_5", "good.pdf"],
      ["CDS_Record_6", "bad.pdf"],
    ]) {
      fs.mkdirSync(path.join(collectionDir, folder), { recursive: true });
      fs.writeFileSync(path.join(collectionDir, folder, pdf), "%PDF", "utf-8");
    }
    fs.mkdirSync(path.join(collectionDir, "notes"));

    const extract = vi.fn(async (pdfPath: string, outputDir: string): Promise<string> => {
      if (pdfPath.endsWith("bad.pdf")) {
        throw new Error("tool exited with code 1");
      }
      const produced = path.join(outputDir, "good.mmd");
      fs.writeFileSync(produced, "text", "utf-8");
      return produced;
    });
    const sink = new RecordingSink();

    const summary = await extractCollectionPdfs(
      {
        config: { ...DEFAULT_CONFIG, outputRoot: root },
        logger: quietLogger(),
        metrics: new MetricsRegistry(),
        sink,
        pageReader: { readPages: async () => ["no keywords here"] },
        extractionTool: { extract },
      },
      "Test Papers",
    );

    expect(summary).toEqual({ processed: 2, ok: 1, failed: 1 });
    expect(extract).toHaveBeenCalledWith(path.join(collectionDir, "CDS_Record_5", "good.pdf"), path.join(collectionDir, "CDS_Record_5"), undefined);
    expect(fs.readFileSync(path.join(collectionDir, "CDS_Record_5", "document.mmd"), "utf-8")).toBe("text");
    expect(fs.readFileSync(path.join(collectionDir, "failed_list.txt"), "utf-8")).toBe(
      `${path.join(collectionDir, "CDS_Record_6", "bad.pdf")}\n`,
    );
    expect(sink.extracts.map((item) => item.docId)).toEqual(["CDS_Record_5"]);
  });

  it("counts an extraction as done when its publication fails", async () => {
    const root = makeTempDir();
    const folder = path.join(root, "Test_Papers", "CDS_Record_5");
    fs.mkdirSync(folder, { recursive: true });
    fs.writeFileSync(path.join(folder, "good.pdf"), "%PDF", "utf-8");

    const summary = await extractCollectionPdfs(
      {
        config: { ...DEFAULT_CONFIG, outputRoot: root },
        logger: quietLogger(),
        metrics: new MetricsRegistry(),
        sink: new FailingSink("extract"),
        pageReader: { readPages: async () => [] },
        extractionTool: fakeTool().tool,
      },
      "Test Papers",
    );

    expect(summary).toEqual({ processed: 1, ok: 1, failed: 0 });
    expect(fs.existsSync(path.join(root, "Test_Papers", "failed_list.txt"))).toBe(false);
  });

  it("fails when the collection has never been crawled", async () => {
    await expect(
      extractCollectionPdfs(
        {
          config: { ...DEFAULT_CONFIG, outputRoot: makeTempDir() },
          logger: quietLogger(),
          metrics: new MetricsRegistry(),
          sink: new RecordingSink(),
          pageReader: { readPages: async () => [] },
          extractionTool: fakeTool().tool,
        },
        "Missing Collection",
      ),
    ).rejects.toThrow("Collection directory not found");
  });
});
