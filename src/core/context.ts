import path from "node:path";
import { AppConfig } from "../config";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createSink, Sink } from "../sink";
import { HttpClient } from "./fetch";

/** Everything one command invocation needs; nothing is process-global. */
export interface RunContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
  http: HttpClient;
}

export interface RunContextOptions {
  command: string;
  now?: Date;
  echo?: boolean;
  sink?: Sink;
  http?: HttpClient;
}

export function runLogPath(config: AppConfig, command: string, runId: string): string {
  return path.resolve(config.logDir, `${command}_${runId}.log`);
}

export function createRunContext(config: AppConfig, options: RunContextOptions): RunContext {
  const runId = createRunId(options.now);
  const logger = new Logger({
    component: "cli",
    runId,
    logFile: runLogPath(config, options.command, runId),
    echo: options.echo,
  });

  return {
    runId,
    config,
    logger,
    metrics: new MetricsRegistry(),
    sink: options.sink ?? createSink(config, runId),
    http:
      options.http ??
      new HttpClient({
        userAgent: config.userAgent,
        ignoreHttpsErrors: config.ignoreHttpsErrors,
        requestTimeoutMs: config.requestTimeoutMs,
        downloadTimeoutMs: config.downloadTimeoutMs,
      }),
  };
}
