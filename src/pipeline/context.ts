import { MalformedInputError } from "../common/errors.js";
import { parseRawLine } from "../curate/rawRecord.js";
import { readLines, writeJsonFile } from "../io/files.js";
import type { Logger } from "../logger.js";
import type { RawCampaignRecord } from "../types.js";

export interface StageContext {
  logger: Logger;
}

export interface StageResult<TStats> {
  stats: TStats;
  outputPath: string;
  statsPath?: string;
}

export type RawLine =
  | { status: "record"; lineNumber: number; record: RawCampaignRecord }
  | { status: "malformed"; lineNumber: number; error: MalformedInputError };

/**
 * Streams an ndjson dump. Blank lines are skipped silently; lines that are not
 * JSON objects come back as `malformed` so each stage can count them.
 */
export async function* readRawRecords(path: string): AsyncGenerator<RawLine> {
  let lineNumber = 0;
  for await (const line of readLines(path)) {
    lineNumber += 1;
    if (!line.trim()) {
      continue;
    }
    let entry: RawLine;
    try {
      entry = { status: "record", lineNumber, record: parseRawLine(line, lineNumber) };
    } catch (error) {
      if (!(error instanceof MalformedInputError)) {
        throw error;
      }
      entry = { status: "malformed", lineNumber, error };
    }
    yield entry;
  }
}

export function logMalformed(logger: Logger, error: MalformedInputError): void {
  logger.warn(`Skipping line: ${error.message}`);
}

/**
 * Runs a stage body and writes its stats file afterwards, also when the body
 * fails; the original error is rethrown.
 */
export async function runWithStats<TStats>(
  statsPath: string,
  body: () => Promise<void>,
  collect: () => TStats,
): Promise<TStats> {
  try {
    await body();
  } catch (error) {
    await writeJsonFile(statsPath, collect());
    throw error;
  }
  const stats = collect();
  await writeJsonFile(statsPath, stats);
  return stats;
}
