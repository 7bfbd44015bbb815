export interface FileNames {
  metadata: string;
  text: string;
  mentions: string;
  failures: string;
}

export interface PlotLocationConfig {
  papersLinkPattern: string;
  resultsLinkPattern: string;
  repositoryRecordPattern: string;
  papersBaseUrl: string;
}

export type SinkType = "local_jsonl" | "http";

export interface AppConfig {
  baseUrl: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
  resultsPerPage: number;
  outputRoot: string;
  logDir: string;
  manifestsDir: string;
  files: FileNames;
  extractionCommand: string;
  markupConverterCommand: string;
  markupConverterArgs: string[];
  pageBoundKeywords: string[];
  plotLocation: PlotLocationConfig;
  sinkType: SinkType;
  httpSinkEndpoint?: string;
  httpSinkToken?: string;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "files" | "plotLocation">> & {
  files?: Partial<FileNames>;
  plotLocation?: Partial<PlotLocationConfig>;
};
