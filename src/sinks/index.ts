import type { FeatureSink, SinkFormat } from "../types.js";
import { JsonArraySink, NdjsonSink } from "./fileSinks.js";

export interface SinkConfig {
  format: SinkFormat;
  path: string;
}

export function createSink(config: SinkConfig): FeatureSink {
  if (config.format === "ndjson") {
    return new NdjsonSink(config.path);
  }
  return new JsonArraySink(config.path);
}

export { JsonArraySink, NdjsonSink };
