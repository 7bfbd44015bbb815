import fs from "node:fs";
import path from "node:path";
import { FileNames } from "../config";
import { errorMessage, Logger, MetricsRegistry } from "../observability";
import { publishSafely, Sink } from "../sink";
import { readMetadataFile } from "../store";
import { MentionRecord, PLOT_LOCATION_NOT_FOUND } from "../types";
import { extractMentions, splitLines } from "./mentionExtractor";
import { assembleRecords, writeRecords } from "./recordAssembler";
import { TextNormalizer } from "./textNormalizer";

export interface MentionRunDeps {
  files: FileNames;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
  normalizer: TextNormalizer;
}

export interface MentionRunOptions {
  inputRoot: string;
  /** Without it each document's output goes into its own directory. */
  outputRoot?: string;
  outputFileName?: string;
}

export interface MentionRunSummary {
  processed: number;
  written: number;
  skipped: number;
  records: number;
}

export interface DocumentMentions {
  outputPath: string;
  records: MentionRecord[];
}

function ensureDirectory(dir: string, label: string): void {
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (error) {
    throw new Error(`Cannot create ${label} directory ${dir}: ${errorMessage(error)}`);
  }
}

/** Reads, extracts, normalizes and writes one document directory. Returns `undefined` when skipped. */
export async function processDocumentDirectory(
  deps: MentionRunDeps,
  folder: string,
  outputPath: string,
): Promise<DocumentMentions | undefined> {
  const { files, logger, metrics } = deps;
  const textPath = path.join(folder, files.text);
  const metadataPath = path.join(folder, files.metadata);

  if (!fs.existsSync(textPath)) {
    logger.error("mentions_text_missing", { folder, file: files.text });
    return undefined;
  }
  const metadata = readMetadataFile(metadataPath);
  if (!metadata) {
    logger.error("mentions_metadata_missing", { folder, file: files.metadata });
    return undefined;
  }

  const text = await fs.promises.readFile(textPath, "utf-8");
  const mentions = extractMentions(splitLines(text));
  const records = await assembleRecords(
    {
      paper: path.basename(folder),
      paperName: metadata.paperName,
      plotLocation: metadata.plotLocation || PLOT_LOCATION_NOT_FOUND,
    },
    mentions,
    deps.normalizer,
  );
  metrics.incrementCounter("mentions_found", Object.values(mentions).reduce((acc, contexts) => acc + contexts.length, 0));

  await writeRecords(outputPath, records);
  return { outputPath, records };
}

export async function runMentionExtraction(deps: MentionRunDeps, options: MentionRunOptions): Promise<MentionRunSummary> {
  const { logger, metrics, sink } = deps;
  const inputRoot = path.resolve(options.inputRoot);
  const outputFileName = options.outputFileName ?? deps.files.mentions;

  if (!fs.existsSync(inputRoot) || !fs.statSync(inputRoot).isDirectory()) {
    throw new Error(`Input directory not found: ${inputRoot}`);
  }
  const outputRoot = options.outputRoot ? path.resolve(options.outputRoot) : undefined;
  if (outputRoot) {
    ensureDirectory(outputRoot, "output");
  }

  const summary: MentionRunSummary = { processed: 0, written: 0, skipped: 0, records: 0 };
  const entries = fs.readdirSync(inputRoot, { withFileTypes: true }).sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    if (!entry.isDirectory()) {
      continue;
    }

    const folder = path.join(inputRoot, entry.name);
    const outputPath = outputRoot ? path.join(outputRoot, entry.name, outputFileName) : path.join(folder, outputFileName);
    summary.processed += 1;
    const stopTimer = metrics.startTimer("mentions_ms");

    let result: DocumentMentions | undefined;
    try {
      result = await processDocumentDirectory(deps, folder, outputPath);
    } catch (error) {
      logger.error("mentions_document_failed", { folder, error: errorMessage(error) });
    }
    const durationMs = stopTimer();
    if (!result) {
      summary.skipped += 1;
      metrics.incrementCounter("mention_docs_skipped", 1);
      continue;
    }

    summary.written += 1;
    summary.records += result.records.length;
    metrics.incrementCounter("mention_docs_ok", 1);
    logger.info("mentions_document_ok", { folder, outputPath, records: result.records.length, durationMs });
    const records = result.records;
    await publishSafely(logger, "mentions", () => sink.publishMentionRecords(records));
  }

  logger.info("mentions_finished", { ...summary });
  return summary;
}
