import { AppConfig, loadConfig } from "../config";
import { runCount, runCrawl, runExtractPdfs, runMentions, ToolOverrides } from "../core/commands";
import { createRunContext, RunContext } from "../core/context";

export type CommandName = "crawl" | "extract-pdfs" | "mentions";

export interface ParsedCliArgs {
  command: CommandName;
  configPath?: string;
  ignoreHttpsErrors: boolean;
  collection?: string;
  start: number;
  depth?: number;
  outputDir?: string;
  countOnly: boolean;
  extractText: boolean;
  overwrite: boolean;
  inputDir?: string;
  outputFile?: string;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

const HELP_TEXT = `
Usage:
  plotmine <command> [options]

Commands:
  crawl          Harvest a collection: metadata, PDFs and (optionally) extracted text
  extract-pdfs   Run text extraction over a collection's downloaded PDFs
  mentions       Extract figure/table mentions from harvested document directories

crawl options:
  --collection <name>  Repository collection, e.g. "ATLAS Papers" (required)
  --depth <n>          Last result page to visit, negative for no bound (required)
  --start <n>          First result page (default 0)
  --output-dir <dir>   Output root (default from config)
  --count              Only report the number of records in the collection
  --extract-text       Run the text extraction tool on new or overwritten documents
  --overwrite          Re-download updated PDFs, rewrite metadata and re-extract text

extract-pdfs options:
  --collection <name>  Collection whose PDFs to process (required)
  --output-dir <dir>   Output root holding the collection (default from config)

mentions options:
  --input-dir <dir>    Directory of document directories (required)
  --output-dir <dir>   Output root; default writes beside each document
  --output-file <name> Output file name (default figures_and_tables.json)

Options:
  --config <path>        Optional path to JSON config file
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  -h, --help             Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "crawl" || raw === "extract-pdfs" || raw === "mentions") {
    return raw;
  }
  return undefined;
}

function optionValue(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  if (index < 0) {
    return undefined;
  }
  const value = argv[index + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new CliUsageError(`${name} expects a value`);
  }
  return value;
}

function intOption(argv: string[], name: string): number | undefined {
  const raw = optionValue(argv, name);
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed)) {
    throw new CliUsageError(`${name} expects an integer, got "${raw}"`);
  }
  return parsed;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const parsed: ParsedCliArgs = {
    command,
    configPath: optionValue(argv, "--config"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    collection: optionValue(argv, "--collection"),
    start: intOption(argv, "--start") ?? 0,
    depth: intOption(argv, "--depth"),
    outputDir: optionValue(argv, "--output-dir"),
    countOnly: argv.includes("--count"),
    extractText: argv.includes("--extract-text"),
    overwrite: argv.includes("--overwrite"),
    inputDir: optionValue(argv, "--input-dir"),
    outputFile: optionValue(argv, "--output-file"),
  };

  if ((command === "crawl" || command === "extract-pdfs") && !parsed.collection) {
    throw new CliUsageError(`${command} requires --collection`);
  }
  if (command === "crawl" && !parsed.countOnly && parsed.depth === undefined) {
    throw new CliUsageError("crawl requires --depth");
  }
  if (command === "mentions" && !parsed.inputDir) {
    throw new CliUsageError("mentions requires --input-dir");
  }

  return parsed;
}

function applyOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  let result = config;
  if (parsed.ignoreHttpsErrors) {
    result = { ...result, ignoreHttpsErrors: true };
  }
  if (parsed.outputDir && parsed.command !== "mentions") {
    result = { ...result, outputRoot: parsed.outputDir };
  }
  return result;
}

async function dispatch(ctx: RunContext, parsed: ParsedCliArgs, tools: ToolOverrides): Promise<void> {
  const collection = parsed.collection ?? "";
  switch (parsed.command) {
    case "crawl":
      if (parsed.countOnly) {
        const count = await runCount({ ...ctx, logger: ctx.logger.child("count") }, collection);
        console.log(`Records: ${count}`);
        return;
      }
      await runCrawl(
        { ...ctx, logger: ctx.logger.child("crawl") },
        {
          collection,
          start: parsed.start,
          depth: parsed.depth ?? -1,
          overwrite: parsed.overwrite,
          extractText: parsed.extractText,
        },
        tools,
      );
      return;
    case "extract-pdfs":
      await runExtractPdfs({ ...ctx, logger: ctx.logger.child("extract") }, collection, tools);
      return;
    case "mentions":
      await runMentions(
        { ...ctx, logger: ctx.logger.child("mentions") },
        {
          inputRoot: parsed.inputDir ?? "",
          outputRoot: parsed.outputDir,
          outputFileName: parsed.outputFile,
        },
        tools,
      );
      return;
  }
}

export async function runCli(argv: string[], tools: ToolOverrides = {}): Promise<number> {
  let parsed: ParsedCliArgs | "help";
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    if (!(error instanceof CliUsageError)) {
      throw error;
    }
    console.error(error.message);
    console.error(HELP_TEXT.trim());
    return 1;
  }

  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const config = applyOverrides(loadConfig(parsed.configPath), parsed);
  const ctx = createRunContext(config, { command: parsed.command });

  ctx.logger.info("command_start", {
    command: parsed.command,
    collection: parsed.collection,
    start: parsed.start,
    depth: parsed.depth,
    countOnly: parsed.countOnly,
    extractText: parsed.extractText,
    overwrite: parsed.overwrite,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    logFile: ctx.logger.logFile,
  });

  try {
    await dispatch(ctx, parsed, tools);
    ctx.logger.info("command_complete", { command: parsed.command });
    return 0;
  } finally {
    ctx.metrics.printSummary();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
