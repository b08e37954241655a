import { MalformedInputError } from "../common/errors.js";
import {
  asRecord,
  idOrUndefined,
  numberOrUndefined,
  readPath,
  stringOrUndefined,
} from "../common/records.js";
import type { RawCampaignRecord } from "../types.js";

export function parseRawLine(line: string, lineNumber: number): RawCampaignRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line) as unknown;
  } catch (error) {
    throw new MalformedInputError(lineNumber, error instanceof Error ? error.message : String(error));
  }
  const record = asRecord(parsed);
  if (!record) {
    throw new MalformedInputError(lineNumber, "expected a JSON object");
  }
  const data = asRecord(record.data) ?? {};
  return { ...record, data };
}

export function rawId(record: RawCampaignRecord): string | undefined {
  return idOrUndefined(record.data.id);
}

export function rawState(record: RawCampaignRecord): string {
  return (stringOrUndefined(record.data.state) ?? "").trim().toLowerCase();
}

export function rawName(record: RawCampaignRecord): string | undefined {
  return stringOrUndefined(record.data.name);
}

export function rawProjectUrl(record: RawCampaignRecord): string | undefined {
  return stringOrUndefined(readPath(record.data, ["urls", "web", "project"]));
}

export function rawCreatorId(record: RawCampaignRecord): string | undefined {
  return idOrUndefined(readPath(record.data, ["creator", "id"]));
}

export function rawCreatorUrl(record: RawCampaignRecord): string | undefined {
  return stringOrUndefined(readPath(record.data, ["creator", "urls", "web", "user"]));
}

/** Epoch seconds; 0 when absent so that "missing" and "zero" read the same. */
export function rawTimestamp(
  record: RawCampaignRecord,
  key: "created_at" | "launched_at" | "deadline" | "state_changed_at",
): number {
  return numberOrUndefined(record.data[key]) ?? 0;
}
