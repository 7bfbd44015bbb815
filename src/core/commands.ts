import { countCollection, crawlCollection, CrawlOptions, CrawlSummary, extractCollectionPdfs } from "../crawl";
import { CommandTextExtractionTool, PdfPageReader, PdfParsePageReader, TextExtractionTool } from "../extract";
import { CommandMarkupConverter, MarkupConverter, MentionRunOptions, MentionRunSummary, runMentionExtraction, TextNormalizer } from "../mentions";
import { RunContext } from "./context";

/** External tools, replaceable in tests. */
export interface ToolOverrides {
  pageReader?: PdfPageReader;
  extractionTool?: TextExtractionTool;
  markupConverter?: MarkupConverter;
}

function textStage(ctx: RunContext, tools: ToolOverrides): { pageReader: PdfPageReader; extractionTool: TextExtractionTool } {
  return {
    pageReader: tools.pageReader ?? new PdfParsePageReader(),
    extractionTool: tools.extractionTool ?? new CommandTextExtractionTool(ctx.config.extractionCommand, ctx.logger.child("extract_tool")),
  };
}

export async function runCount(ctx: RunContext, collection: string): Promise<number> {
  ctx.logger.info("count_start", { collection });
  const count = await countCollection(ctx, collection);
  ctx.logger.info("count_complete", { collection, records: count });
  return count;
}

export async function runCrawl(ctx: RunContext, options: CrawlOptions, tools: ToolOverrides = {}): Promise<CrawlSummary> {
  ctx.logger.info("crawl_start", { ...options, outputRoot: ctx.config.outputRoot });
  const summary = await crawlCollection(
    {
      config: ctx.config,
      logger: ctx.logger,
      metrics: ctx.metrics,
      sink: ctx.sink,
      http: ctx.http,
      ...textStage(ctx, tools),
    },
    options,
  );
  ctx.logger.info("crawl_complete", { ...summary, failures: summary.failures.length });
  return summary;
}

export async function runExtractPdfs(
  ctx: RunContext,
  collection: string,
  tools: ToolOverrides = {},
): Promise<{ processed: number; ok: number; failed: number }> {
  ctx.logger.info("extract_pdfs_start", { collection, outputRoot: ctx.config.outputRoot });
  const summary = await extractCollectionPdfs(
    {
      config: ctx.config,
      logger: ctx.logger,
      metrics: ctx.metrics,
      sink: ctx.sink,
      ...textStage(ctx, tools),
    },
    collection,
  );
  ctx.logger.info("extract_pdfs_complete", { collection, ...summary });
  return summary;
}

export async function runMentions(ctx: RunContext, options: MentionRunOptions, tools: ToolOverrides = {}): Promise<MentionRunSummary> {
  ctx.logger.info("mentions_start", { ...options });
  const converter =
    tools.markupConverter ??
    new CommandMarkupConverter(ctx.config.markupConverterCommand, ctx.config.markupConverterArgs, ctx.logger.child("markup_converter"));
  const summary = await runMentionExtraction(
    {
      files: ctx.config.files,
      logger: ctx.logger,
      metrics: ctx.metrics,
      sink: ctx.sink,
      normalizer: new TextNormalizer({ converter, logger: ctx.logger, metrics: ctx.metrics }),
    },
    options,
  );
  ctx.logger.info("mentions_complete", { ...summary });
  return summary;
}
