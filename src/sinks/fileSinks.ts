import { NdjsonWriter } from "../io/files.js";
import type { FeatureSink, FeatureVector } from "../types.js";

/** One feature row per line. */
export class NdjsonSink implements FeatureSink {
  readonly name = "ndjson";
  private writer?: NdjsonWriter;

  constructor(private readonly path: string) {}

  async insertMany(records: FeatureVector[]): Promise<void> {
    const writer = await this.open();
    for (const record of records) {
      await writer.write(record);
    }
  }

  async close(): Promise<void> {
    // An empty run still leaves an (empty) output file behind.
    const writer = await this.open();
    await writer.close();
  }

  private async open(): Promise<NdjsonWriter> {
    if (!this.writer) {
      this.writer = await NdjsonWriter.open(this.path);
    }
    return this.writer;
  }
}

/** Streams rows into a single JSON array; the closing bracket is written on `close`. */
export class JsonArraySink implements FeatureSink {
  readonly name = "json";
  private writer?: NdjsonWriter;
  private written = 0;

  constructor(private readonly path: string) {}

  async insertMany(records: FeatureVector[]): Promise<void> {
    const writer = await this.open();
    for (const record of records) {
      const separator = this.written === 0 ? "\n" : ",\n";
      await writer.writeText(`${separator}  ${JSON.stringify(record)}`);
      this.written += 1;
    }
  }

  async close(): Promise<void> {
    const writer = await this.open();
    await writer.writeText(this.written === 0 ? "]\n" : "\n]\n");
    await writer.close();
  }

  private async open(): Promise<NdjsonWriter> {
    if (!this.writer) {
      this.writer = await NdjsonWriter.open(this.path);
      await this.writer.writeText("[");
    }
    return this.writer;
  }
}
