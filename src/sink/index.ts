import { AppConfig } from "../config";
import { HttpSink } from "./httpSink";
import { LocalJsonlSink } from "./localJsonlSink";
import { Sink } from "./types";

export function createSink(config: AppConfig, runId: string): Sink {
  switch (config.sinkType) {
    case "local_jsonl":
      return new LocalJsonlSink(config.manifestsDir, runId);
    case "http":
      if (!config.httpSinkEndpoint) {
        throw new Error("The http sink needs an endpoint (httpSinkEndpoint or HTTP_SINK_ENDPOINT)");
      }
      return new HttpSink({ endpoint: config.httpSinkEndpoint, token: config.httpSinkToken });
    default:
      throw new Error(`Unsupported sink type: ${String(config.sinkType)}`);
  }
}

export * from "./types";
export { HttpSink } from "./httpSink";
export { LocalJsonlSink } from "./localJsonlSink";
export { publishSafely } from "./publish";
