import fs from "node:fs";
import path from "node:path";
import { PlotLocationConfig } from "../config";
import { HttpClient } from "../core/fetch";
import { extractPdfUrl, extractTechReportNumbers } from "../crawl/htmlParser";
import { PlotLocationProbe, resolvePlotLocation } from "../crawl/plotLocation";
import { errorMessage, Logger, MetricsRegistry } from "../observability";
import { PLOT_LOCATION_NOT_FOUND } from "../types";

export interface DocumentFetcherDeps {
  http: HttpClient;
  logger: Logger;
  metrics: MetricsRegistry;
  plotLocation: PlotLocationConfig;
  plotProbes?: readonly PlotLocationProbe[];
}

export interface FetchDocumentOptions {
  overwrite: boolean;
  /** Record page already fetched by the caller; saves a second request. */
  pageHtml?: string;
}

export interface FetchedDocument {
  /** Absent when the page has no download reference or the download failed. */
  pdfPath?: string;
  downloaded: boolean;
  bytes?: number;
  sha256?: string;
  techReportNumbers: string[];
  plotLocation: string;
  error?: string;
}

function pdfFileName(pdfUrl: string): string {
  const lastSegment = new URL(pdfUrl).pathname.split("/").pop() ?? "";
  const base = lastSegment.replace(/\.pdf$/i, "") || "document";
  return `${base}.pdf`;
}

/**
 * Downloads the primary PDF of a record page into `folder`. An existing file is reused unless
 * `overwrite` is set, in which case it is removed and fetched again. Report numbers and plot location
 * are always read from the page.
 */
export async function fetchDocument(
  deps: DocumentFetcherDeps,
  url: string,
  folder: string,
  options: FetchDocumentOptions,
): Promise<FetchedDocument> {
  const { http, logger, metrics } = deps;
  const html = options.pageHtml ?? (await http.getHtml(url));
  const pdfUrl = extractPdfUrl(html, url);

  if (!pdfUrl) {
    logger.warn("download_no_pdf_reference", { url });
    return { downloaded: false, techReportNumbers: [], plotLocation: PLOT_LOCATION_NOT_FOUND, error: "no citation_pdf_url" };
  }

  const techReportNumbers = extractTechReportNumbers(html);
  const plotLocation = await resolvePlotLocation(html, url, {
    config: deps.plotLocation,
    http,
    logger,
    probes: deps.plotProbes,
  });
  const fullPath = path.join(folder, pdfFileName(pdfUrl));

  if (fs.existsSync(fullPath)) {
    if (!options.overwrite) {
      logger.info("download_skipped_existing", { url, path: fullPath });
      metrics.incrementCounter("downloads_skipped", 1);
      return { pdfPath: fullPath, downloaded: false, techReportNumbers, plotLocation };
    }
    await fs.promises.rm(fullPath, { force: true });
  }

  const stopTimer = metrics.startTimer("download_ms");
  try {
    const file = await http.download(pdfUrl, fullPath);
    const durationMs = stopTimer();
    metrics.incrementCounter("downloads_ok", 1);
    logger.info("download_ok", { url, pdfUrl, path: fullPath, bytes: file.bytes, durationMs });
    return {
      pdfPath: fullPath,
      downloaded: true,
      bytes: file.bytes,
      sha256: file.sha256,
      techReportNumbers,
      plotLocation,
    };
  } catch (error) {
    const durationMs = stopTimer();
    metrics.incrementCounter("downloads_failed", 1);
    logger.warn("download_failed", { url, pdfUrl, durationMs, error: errorMessage(error) });
    return { downloaded: false, techReportNumbers, plotLocation, error: errorMessage(error) };
  }
}
