import { once } from "node:events";
import { constants as fsConstants, createReadStream, createWriteStream, type WriteStream } from "node:fs";
import { access, mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { createInterface } from "node:readline";
import { FatalIOError } from "../common/errors.js";

export async function assertReadable(path: string): Promise<void> {
  try {
    await access(path, fsConstants.R_OK);
  } catch (error) {
    throw new FatalIOError(path, error);
  }
}

async function ensureParentDir(path: string): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
  } catch (error) {
    throw new FatalIOError(path, error);
  }
}

/** Yields raw lines (without terminators) of a text file, streaming. */
export async function* readLines(path: string): AsyncGenerator<string> {
  await assertReadable(path);
  const lines = createInterface({
    input: createReadStream(path, { encoding: "utf8" }),
    crlfDelay: Number.POSITIVE_INFINITY,
  });
  try {
    for await (const line of lines) {
      yield line;
    }
  } finally {
    lines.close();
  }
}

async function readText(path: string): Promise<string> {
  await assertReadable(path);
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    throw new FatalIOError(path, error);
  }
}

export async function readJsonFile(path: string): Promise<unknown> {
  const body = await readText(path);
  try {
    return JSON.parse(body) as unknown;
  } catch (error) {
    throw new FatalIOError(path, error);
  }
}

export async function writeJsonFile(path: string, value: unknown): Promise<void> {
  await ensureParentDir(path);
  try {
    await writeFile(path, `${JSON.stringify(value, null, 2)}\n`, "utf8");
  } catch (error) {
    throw new FatalIOError(path, error);
  }
}

/** Line-at-a-time JSON writer that respects stream backpressure. */
export class NdjsonWriter {
  private failure?: FatalIOError;

  private constructor(
    readonly path: string,
    private readonly stream: WriteStream,
  ) {
    // A failed write is reported from the next write or close.
    stream.on("error", (error) => {
      this.failure ??= new FatalIOError(path, error);
    });
  }

  static async open(path: string): Promise<NdjsonWriter> {
    await ensureParentDir(path);
    const stream = createWriteStream(path, { encoding: "utf8" });
    try {
      await once(stream, "open");
    } catch (error) {
      throw new FatalIOError(path, error);
    }
    return new NdjsonWriter(path, stream);
  }

  async write(value: unknown): Promise<void> {
    await this.writeText(`${JSON.stringify(value)}\n`);
  }

  async writeText(chunk: string): Promise<void> {
    this.throwIfFailed();
    if (!this.stream.write(chunk)) {
      await this.drained();
    }
    this.throwIfFailed();
  }

  async close(): Promise<void> {
    this.throwIfFailed();
    if (this.stream.closed) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      this.stream.end((error?: Error | null) => {
        if (error) {
          reject(this.failure ?? new FatalIOError(this.path, error));
          return;
        }
        resolve();
      });
    });
    this.throwIfFailed();
  }

  private async drained(): Promise<void> {
    await new Promise<void>((resolve) => {
      const done = (): void => {
        this.stream.off("drain", done);
        this.stream.off("error", done);
        this.stream.off("close", done);
        resolve();
      };
      this.stream.on("drain", done);
      this.stream.on("error", done);
      this.stream.on("close", done);
    });
  }

  private throwIfFailed(): void {
    if (this.failure) {
      throw this.failure;
    }
  }
}

export interface JsonRecordsFile {
  records: unknown[];
  malformedLines: number;
}

/** Reads either a JSON array file or ndjson; blank lines are ignored. */
export async function readJsonRecords(path: string): Promise<JsonRecordsFile> {
  const body = await readText(path);
  const trimmed = body.trimStart();
  if (trimmed.startsWith("[")) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed) as unknown;
    } catch (error) {
      throw new FatalIOError(path, error);
    }
    if (!Array.isArray(parsed)) {
      throw new FatalIOError(path, "expected a JSON array");
    }
    return { records: parsed, malformedLines: 0 };
  }
  const records: unknown[] = [];
  let malformedLines = 0;
  for (const line of body.split(/\r?\n/)) {
    if (!line.trim()) {
      continue;
    }
    try {
      records.push(JSON.parse(line) as unknown);
    } catch {
      malformedLines += 1;
    }
  }
  return { records, malformedLines };
}

export type JsonRecordLine = { status: "record"; value: unknown } | { status: "malformed"; line: string };

/**
 * Streams a file holding one JSON value per line: ndjson, or a JSON array
 * written one row per line as the JSON array sink does. Array brackets and row
 * separators around a line are dropped before parsing; a whole array on one
 * line is expanded.
 */
export async function* streamJsonRecords(path: string): AsyncGenerator<JsonRecordLine> {
  for await (const line of readLines(path)) {
    const inline = parseInlineArray(line);
    if (inline) {
      for (const value of inline) {
        yield { status: "record", value };
      }
      continue;
    }
    const body = stripArrayPunctuation(line);
    if (!body) {
      continue;
    }
    let value: unknown;
    try {
      value = JSON.parse(body) as unknown;
    } catch {
      yield { status: "malformed", line };
      continue;
    }
    yield { status: "record", value };
  }
}

function parseInlineArray(line: string): unknown[] | undefined {
  const trimmed = line.trim();
  if (!trimmed.startsWith("[") || !trimmed.endsWith("]")) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(trimmed);
    return Array.isArray(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

function stripArrayPunctuation(line: string): string {
  let body = line.trim();
  if (body.startsWith("[")) {
    body = body.slice(1).trimStart();
  }
  if (body.endsWith("]")) {
    body = body.slice(0, -1).trimEnd();
  }
  if (body.startsWith(",")) {
    body = body.slice(1).trimStart();
  }
  if (body.endsWith(",")) {
    body = body.slice(0, -1).trimEnd();
  }
  return body;
}
