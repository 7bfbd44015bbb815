import fs from "node:fs";
import path from "node:path";
import { AppConfig } from "../config";
import { HttpClient } from "../core/fetch";
import { fetchDocument } from "../download/downloader";
import { findPageBound, PdfPageReader } from "../extract/pageRange";
import { TextExtractionTool } from "../extract/textExtractor";
import { errorMessage, Logger, MetricsRegistry } from "../observability";
import { publishSafely, Sink } from "../sink";
import { FailureList, readMetadataFile, writeMetadataFile } from "../store";
import { CrawlState, DocumentDiscoveredItem, DownloadResult, ExtractionResult } from "../types";
import {
  buildSearchUrl,
  extractModificationDate,
  extractPaperLinks,
  extractRecordCount,
  FALLBACK_MODIFICATION_DATE,
  ParsedPaperLink,
  recordFolderName,
} from "./htmlParser";
import { DateParseError, needsRefresh } from "./modificationTracker";
import { PlotLocationProbe } from "./plotLocation";

export interface CrawlDependencies {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
  http: HttpClient;
  pageReader: PdfPageReader;
  extractionTool: TextExtractionTool;
  plotProbes?: readonly PlotLocationProbe[];
}

export interface CrawlOptions {
  collection: string;
  start: number;
  /** Last result page to visit; negative means no bound. */
  depth: number;
  overwrite: boolean;
  extractText: boolean;
}

export interface CrawlSummary {
  pagesVisited: number;
  documentsSeen: number;
  documentsRefreshed: number;
  failures: string[];
}

type TextStageDeps = Pick<CrawlDependencies, "config" | "logger" | "metrics" | "pageReader" | "extractionTool">;

type DocumentOutcome = "refreshed" | "unchanged" | "skipped" | "failed";

export function collectionDirectory(outputRoot: string, collection: string): string {
  return path.join(outputRoot, collection.replace(/ /g, "_"));
}

function ensureDirectory(dir: string): void {
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (error) {
    throw new Error(`Cannot create output directory ${dir}: ${errorMessage(error)}`);
  }
}

/**
 * Page bound, then the external extraction, then renaming its output to the configured text file.
 * Throws on any failure; callers own the per-document boundary.
 */
async function extractDocumentText(deps: TextStageDeps, pdfPath: string, folder: string): Promise<ExtractionResult> {
  const { config, logger, metrics } = deps;
  const docId = path.basename(folder);
  const textLocation = path.join(folder, config.files.text);
  const stopTimer = metrics.startTimer("extract_ms");

  const pageBound = await findPageBound(deps.pageReader, pdfPath, config.pageBoundKeywords);
  logger.info("extract_page_bound", { docId, pageBound: pageBound ?? "none" });
  const produced = await deps.extractionTool.extract(pdfPath, folder, pageBound);
  if (path.resolve(produced) !== path.resolve(textLocation)) {
    await fs.promises.rename(produced, textLocation);
  }

  const durationMs = stopTimer();
  metrics.incrementCounter("extracts_ok", 1);
  logger.info("extract_item_ok", { docId, textLocation, durationMs });
  return { docId, status: "extracted_ok", pageBound, textLocation, extractedAt: new Date().toISOString() };
}

async function processDocument(
  deps: CrawlDependencies,
  options: CrawlOptions,
  link: ParsedPaperLink,
  collectionDir: string,
  failures: FailureList,
): Promise<DocumentOutcome> {
  const { config, logger, metrics, sink, http } = deps;
  const folderName = recordFolderName(link.url);
  if (!folderName) {
    logger.warn("crawl_document_no_record_id", { url: link.url });
    failures.record(link.url);
    return "failed";
  }

  const folder = path.join(collectionDir, folderName);
  fs.mkdirSync(folder, { recursive: true });
  const metadataPath = path.join(folder, config.files.metadata);

  let html: string;
  try {
    html = await http.getHtml(link.url);
  } catch (error) {
    logger.error("crawl_document_fetch_failed", { docId: folderName, url: link.url, error: errorMessage(error) });
    failures.record(link.url);
    return "failed";
  }

  const fetchedDate = extractModificationDate(html) ?? FALLBACK_MODIFICATION_DATE;
  const storedDate = readMetadataFile(metadataPath)?.lastModified;

  let refresh: boolean;
  try {
    refresh = needsRefresh(storedDate, fetchedDate);
  } catch (error) {
    if (!(error instanceof DateParseError)) {
      throw error;
    }
    logger.error("crawl_document_bad_date", { docId: folderName, url: link.url, storedDate, fetchedDate, error: error.message });
    return "skipped";
  }
  if (storedDate !== undefined) {
    logger.info("crawl_document_dates", { docId: folderName, storedDate, fetchedDate, refresh });
  }

  const fetched = await fetchDocument(
    {
      http,
      logger,
      metrics,
      plotLocation: config.plotLocation,
      plotProbes: deps.plotProbes,
    },
    link.url,
    folder,
    { overwrite: options.overwrite && refresh, pageHtml: html },
  );

  const download: DownloadResult = {
    docId: folderName,
    url: link.url,
    status: fetched.pdfPath ? (fetched.downloaded ? "downloaded_ok" : "skipped") : "download_failed",
    refreshed: refresh,
    pdfPath: fetched.pdfPath,
    bytes: fetched.bytes,
    sha256: fetched.sha256,
    techReportNumbers: fetched.techReportNumbers,
    plotLocation: fetched.plotLocation,
    error: fetched.error,
    downloadedAt: new Date().toISOString(),
  };
  if (!fetched.pdfPath) {
    logger.error("crawl_document_download_failed", { docId: folderName, url: link.url, error: fetched.error });
    failures.record(link.url);
    await publishSafely(logger, "download", () => sink.publishDownloadResult([download]));
    return "failed";
  }

  if (refresh || options.overwrite) {
    logger.info("crawl_document_metadata_written", { docId: folderName });
    writeMetadataFile(metadataPath, {
      recordId: folderName,
      title: link.title,
      lastModified: fetchedDate,
      url: link.url,
      collection: options.collection,
      techReportNumbers: fetched.techReportNumbers,
      plotLocation: fetched.plotLocation,
    });
  }
  await publishSafely(logger, "download", () => sink.publishDownloadResult([download]));

  const textLocation = path.join(folder, config.files.text);
  const hasText = fs.existsSync(textLocation);
  const extract = options.extractText && (!hasText || options.overwrite);
  if (extract) {
    if (hasText) {
      await fs.promises.rm(textLocation, { force: true });
    }
    let result: ExtractionResult;
    try {
      result = await extractDocumentText(deps, fetched.pdfPath, folder);
    } catch (error) {
      metrics.incrementCounter("extracts_failed", 1);
      logger.error("extract_item_failed", { docId: folderName, url: link.url, error: errorMessage(error) });
      failures.record(link.url);
      const failed: ExtractionResult = {
        docId: folderName,
        status: "extracted_failed",
        error: errorMessage(error),
        extractedAt: new Date().toISOString(),
      };
      await publishSafely(logger, "extract", () => sink.publishExtractionResult([failed]));
      return "failed";
    }
    await publishSafely(logger, "extract", () => sink.publishExtractionResult([result]));
  }

  return refresh ? "refreshed" : "unchanged";
}

/**
 * Walks result pages from `start` until a page lists no documents or `depth` is passed, bringing each
 * listed document's folder up to date.
 */
export async function crawlCollection(deps: CrawlDependencies, options: CrawlOptions): Promise<CrawlSummary> {
  const { config, logger, metrics, sink, http } = deps;
  const collectionDir = collectionDirectory(config.outputRoot, options.collection);
  ensureDirectory(collectionDir);
  const failures = new FailureList(path.join(collectionDir, config.files.failures));

  const state: CrawlState = { resultPage: options.start, start: options.start, depth: options.depth, failures: [] };
  let pagesVisited = 0;
  let documentsSeen = 0;
  let documentsRefreshed = 0;

  while (true) {
    if (state.depth >= 0 && state.resultPage > state.depth) {
      logger.info("crawl_depth_reached", { depth: state.depth, resultPage: state.resultPage });
      break;
    }

    const pageUrl = buildSearchUrl(config.baseUrl, options.collection, state.resultPage, config.resultsPerPage);
    logger.info("crawl_page_start", { pageUrl, resultPage: state.resultPage, depth: state.depth });
    const stopTimer = metrics.startTimer("page_fetch_ms");

    let html: string;
    try {
      html = await http.getHtml(pageUrl);
    } catch (error) {
      logger.error("crawl_page_fetch_failed", { pageUrl, resultPage: state.resultPage, error: errorMessage(error) });
      break;
    }
    stopTimer();
    metrics.incrementCounter("pages_crawled", 1);
    pagesVisited += 1;

    const links = extractPaperLinks(html, pageUrl);
    if (links.length === 0) {
      logger.info("crawl_no_more_results", { pageUrl, resultPage: state.resultPage });
      break;
    }

    metrics.incrementCounter("docs_discovered", links.length);
    const discoveredAt = new Date().toISOString();
    const discovered: DocumentDiscoveredItem[] = links.map((link) => ({
      docId: recordFolderName(link.url) ?? link.url,
      url: link.url,
      title: link.title,
      collection: options.collection,
      resultPage: state.resultPage,
      discoveredAt,
    }));
    await publishSafely(logger, "discovered", () => sink.publishDiscovered(discovered));

    for (const link of links) {
      documentsSeen += 1;
      logger.info("crawl_document_start", { url: link.url, resultPage: state.resultPage });
      let outcome: DocumentOutcome;
      try {
        outcome = await processDocument(deps, options, link, collectionDir, failures);
      } catch (error) {
        logger.error("crawl_document_failed", { url: link.url, error: errorMessage(error) });
        failures.record(link.url);
        outcome = "failed";
      }
      if (outcome === "refreshed") {
        documentsRefreshed += 1;
        metrics.incrementCounter("docs_refreshed", 1);
      }
      logger.info("crawl_document_complete", { url: link.url, outcome });
    }

    logger.info("crawl_page_complete", { pageUrl, documents: links.length });
    state.resultPage += 1;
  }

  state.failures = [...failures.list()];
  logger.info("crawl_finished", {
    pagesVisited,
    documentsSeen,
    documentsRefreshed,
    failures: state.failures.length,
    failureFile: failures.filePath,
  });
  return { pagesVisited, documentsSeen, documentsRefreshed, failures: state.failures };
}

/** Reports the total record count of a collection from its first result page; -1 when unknown. */
export async function countCollection(deps: Pick<CrawlDependencies, "config" | "logger" | "http">, collection: string): Promise<number> {
  const pageUrl = buildSearchUrl(deps.config.baseUrl, collection, 0, deps.config.resultsPerPage);
  const html = await deps.http.getHtml(pageUrl);
  const count = extractRecordCount(html) ?? -1;
  deps.logger.info("crawl_record_count", { pageUrl, collection, records: count });
  return count;
}

/** Runs the page-bound + extraction step over every PDF already downloaded for a collection. */
export async function extractCollectionPdfs(
  deps: TextStageDeps & Pick<CrawlDependencies, "sink">,
  collection: string,
): Promise<{ processed: number; ok: number; failed: number }> {
  const { config, logger, metrics } = deps;
  const collectionDir = collectionDirectory(config.outputRoot, collection);
  if (!fs.existsSync(collectionDir)) {
    throw new Error(`Collection directory not found: ${collectionDir}`);
  }
  const failures = new FailureList(path.join(collectionDir, config.files.failures));
  const summary = { processed: 0, ok: 0, failed: 0 };

  const folders = fs
    .readdirSync(collectionDir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory() && entry.name.startsWith("CDS_"))
    .map((entry) => path.join(collectionDir, entry.name))
    .sort();

  for (const folder of folders) {
    const pdfs = fs
      .readdirSync(folder)
      .filter((name) => name.toLowerCase().endsWith(".pdf"))
      .sort();
    for (const pdf of pdfs) {
      const pdfPath = path.join(folder, pdf);
      summary.processed += 1;
      let result: ExtractionResult;
      try {
        result = await extractDocumentText(deps, pdfPath, folder);
      } catch (error) {
        metrics.incrementCounter("extracts_failed", 1);
        logger.error("extract_item_failed", { docId: path.basename(folder), path: pdfPath, error: errorMessage(error) });
        failures.record(pdfPath);
        summary.failed += 1;
        continue;
      }
      summary.ok += 1;
      await publishSafely(logger, "extract", () => deps.sink.publishExtractionResult([result]));
    }
  }

  logger.info("extract_pdfs_finished", { collection, ...summary });
  return summary;
}
