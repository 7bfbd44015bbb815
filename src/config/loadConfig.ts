import fs from "node:fs";
import path from "node:path";
import { AppConfig, ConfigOverrides, SinkType } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  baseUrl: "https://cds.cern.ch",
  userAgent: "plotmine/0.1 (figure mention harvester)",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 30_000,
  downloadTimeoutMs: 180_000,
  resultsPerPage: 10,
  outputRoot: "data",
  logDir: "logs",
  manifestsDir: "data/manifests",
  files: {
    metadata: "meta_info.txt",
    text: "document.mmd",
    mentions: "figures_and_tables.json",
    failures: "failed_list.txt",
  },
  extractionCommand: "nougat",
  markupConverterCommand: "latex2text",
  markupConverterArgs: [],
  pageBoundKeywords: ["References", "ACKNOWLEDGMENT"],
  plotLocation: {
    papersLinkPattern: "atlas.web.cern.ch/Atlas",
    resultsLinkPattern: "cms-results.web.cern.ch/cms-results",
    repositoryRecordPattern: "cds.cern.ch/record",
    papersBaseUrl: "https://atlas.web.cern.ch/Atlas/GROUPS/PHYSICS/PAPERS/",
  },
  sinkType: "local_jsonl",
  httpSinkEndpoint: undefined,
  httpSinkToken: undefined,
};

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed: ConfigOverrides | null = JSON.parse(raw);
  return parsed ?? {};
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toSinkType(value: string | undefined, fallback: SinkType): SinkType {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "local_jsonl" || normalized === "http") {
    return normalized;
  }
  return fallback;
}

export function loadConfig(configPath?: string): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    files: {
      ...DEFAULT_CONFIG.files,
      ...(fileConfig.files ?? {}),
    },
    plotLocation: {
      ...DEFAULT_CONFIG.plotLocation,
      ...(fileConfig.plotLocation ?? {}),
    },
  };

  return {
    ...merged,
    baseUrl: process.env.BASE_URL ?? merged.baseUrl,
    userAgent: process.env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(process.env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(process.env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    downloadTimeoutMs: toInt(process.env.DOWNLOAD_TIMEOUT_MS, merged.downloadTimeoutMs),
    resultsPerPage: toInt(process.env.RESULTS_PER_PAGE, merged.resultsPerPage),
    outputRoot: process.env.OUTPUT_ROOT ?? merged.outputRoot,
    logDir: process.env.LOG_DIR ?? merged.logDir,
    manifestsDir: process.env.MANIFESTS_DIR ?? merged.manifestsDir,
    extractionCommand: process.env.EXTRACTION_COMMAND ?? merged.extractionCommand,
    markupConverterCommand: process.env.MARKUP_CONVERTER_COMMAND ?? merged.markupConverterCommand,
    sinkType: toSinkType(process.env.SINK_TYPE, merged.sinkType),
    httpSinkEndpoint: process.env.HTTP_SINK_ENDPOINT ?? merged.httpSinkEndpoint,
    httpSinkToken: process.env.HTTP_SINK_TOKEN ?? merged.httpSinkToken,
  };
}

export { DEFAULT_CONFIG };
