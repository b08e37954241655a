import { errorKindOf, InvalidTimestampError, MissingFieldError, type PipelineError } from "../common/errors.js";
import { roundTo } from "../common/math.js";
import {
  increment,
  numberOrUndefined,
  readPath,
  sortedCounts,
  type Counts,
  stringOrUndefined,
} from "../common/records.js";
import type { CampaignOutcome, CuratedCampaignRecord, RawCampaignRecord } from "../types.js";
import { rawCreatorId, rawCreatorUrl, rawId, rawProjectUrl, rawTimestamp } from "./rawRecord.js";
import { StatePolicy, type StateDecision } from "./statePolicy.js";

const SECONDS_PER_DAY = 86_400;

export type WebRecordResult =
  | { status: "curated"; record: CuratedCampaignRecord }
  | { status: "excluded"; reason: string; error?: PipelineError };

export interface WebDatabaseStats {
  summary: {
    total_processed: number;
    included: number;
    excluded: number;
    malformed: number;
  };
  by_state: Record<string, number>;
  excluded_by_reason: Record<string, number>;
  by_category: Record<string, number>;
  by_country: Record<string, number>;
  errors: Record<string, number>;
}

export interface CategorySplit {
  category: string;
  subcategory: string;
}

export function splitCategorySlug(slug: string | undefined): CategorySplit {
  const text = (slug ?? "").trim();
  if (!text) {
    return { category: "unknown", subcategory: "" };
  }
  const [category] = text.split("/", 1);
  return { category: category || "unknown", subcategory: text };
}

/** `dd/mm/yyyy` in UTC; empty when the timestamp cannot be rendered. */
export function formatDisplayDate(epochSeconds: number): string {
  const date = new Date(epochSeconds * 1000);
  if (!Number.isFinite(epochSeconds) || Number.isNaN(date.getTime())) {
    return "";
  }
  const dd = String(date.getUTCDate()).padStart(2, "0");
  const mm = String(date.getUTCMonth() + 1).padStart(2, "0");
  return `${dd}/${mm}/${date.getUTCFullYear()}`;
}

/** Inverse of {@link formatDisplayDate}: UTC midnight of a `dd/mm/yyyy` date, in epoch seconds. */
export function parseDisplayDate(text: string): number | undefined {
  const match = /^(\d{2})\/(\d{2})\/(\d{4})$/.exec(text.trim());
  if (!match) {
    return undefined;
  }
  const [, dd, mm, yyyy] = match;
  const epochSeconds = Date.UTC(Number(yyyy), Number(mm) - 1, Number(dd)) / 1000;
  return formatDisplayDate(epochSeconds) === text.trim() ? epochSeconds : undefined;
}

export function calendarDayDiff(fromEpochSeconds: number, toEpochSeconds: number): number {
  return (
    Math.floor(toEpochSeconds / SECONDS_PER_DAY) - Math.floor(fromEpochSeconds / SECONDS_PER_DAY)
  );
}

export function pledgePerBacker(pledgedUsd: number, backersCount: number): number {
  if (backersCount <= 0) {
    return 0;
  }
  return roundTo(pledgedUsd / backersCount, 2);
}

/**
 * Flattens a record whose outcome has already been decided. Throws when the
 * record cannot satisfy the curated invariants (id present, launch before deadline).
 */
export function flattenRecord(raw: RawCampaignRecord, state: CampaignOutcome): CuratedCampaignRecord {
  const data = raw.data;
  const id = rawId(raw);
  if (!id) {
    throw new MissingFieldError("id");
  }

  const launchedAt = rawTimestamp(raw, "launched_at");
  const deadline = rawTimestamp(raw, "deadline");
  if (!launchedAt || !deadline) {
    throw new InvalidTimestampError(`Campaign ${id} is missing launched_at or deadline`);
  }
  if (launchedAt >= deadline) {
    throw new InvalidTimestampError(
      `Campaign ${id} launched_at=${launchedAt} is not before deadline=${deadline}`,
    );
  }

  const usdRate = numberOrUndefined(data.static_usd_rate) ?? 1;
  const goalUsd = (numberOrUndefined(data.goal) ?? 0) * usdRate;
  const pledgedUsd = (numberOrUndefined(data.pledged) ?? 0) * usdRate;
  const backersCount = numberOrUndefined(data.backers_count) ?? 0;
  const { category, subcategory } = splitCategorySlug(
    stringOrUndefined(readPath(data, ["category", "slug"])),
  );

  return {
    id,
    state,
    name: stringOrUndefined(data.name) ?? "",
    blurb: stringOrUndefined(data.blurb) ?? "",
    category,
    subcategory,
    country: stringOrUndefined(readPath(data, ["location", "expanded_country"])) ?? "",
    location: stringOrUndefined(readPath(data, ["location", "name"])) ?? "",
    goal_usd: goalUsd,
    pledged_usd: pledgedUsd,
    backers_count: backersCount,
    currency: stringOrUndefined(data.currency) ?? "",
    cal_launched_at: launchedAt,
    cal_deadline: deadline,
    launched_at: formatDisplayDate(launchedAt),
    deadline: formatDisplayDate(deadline),
    campaign_duration_days: calendarDayDiff(launchedAt, deadline),
    percent_funded: numberOrUndefined(data.percent_funded) ?? 0,
    pledge_per_backer: pledgePerBacker(pledgedUsd, backersCount),
    is_staff_pick: data.staff_pick === true,
    creator_id: rawCreatorId(raw),
    links: {
      project: rawProjectUrl(raw),
      creator: rawCreatorUrl(raw),
    },
  };
}

/**
 * Curates raw records into the flat web database shape. Outcome decisions come
 * from the shared {@link StatePolicy}, or are passed in when the caller has
 * already run the state filter on the same record.
 */
export class WebRecordNormalizer {
  private readonly policy: StatePolicy;
  private readonly totals = { total_processed: 0, included: 0, excluded: 0, malformed: 0 };
  private readonly byState: Counts = new Map();
  private readonly excludedByReason: Counts = new Map();
  private readonly byCategory: Counts = new Map();
  private readonly byCountry: Counts = new Map();
  private readonly errors: Counts = new Map();

  constructor(policy: StatePolicy = new StatePolicy()) {
    this.policy = policy;
  }

  normalize(raw: RawCampaignRecord, decided?: StateDecision): WebRecordResult {
    this.totals.total_processed += 1;
    const decision = decided ?? this.policy.evaluate(raw);
    increment(this.byState, decision.rawState || "missing");
    if (decision.status === "excluded") {
      return this.exclude(decision.reason);
    }

    let record: CuratedCampaignRecord;
    try {
      record = flattenRecord(raw, decision.state);
    } catch (error) {
      increment(this.errors, errorKindOf(error));
      if (error instanceof MissingFieldError) {
        return this.exclude(`missing_${error.field}`, error);
      }
      if (error instanceof InvalidTimestampError) {
        return this.exclude("invalid_timestamps", error);
      }
      return this.exclude("processing_error");
    }

    this.totals.included += 1;
    increment(this.byCategory, record.category);
    increment(this.byCountry, record.country || "unknown");
    return { status: "curated", record };
  }

  noteMalformed(): void {
    this.totals.total_processed += 1;
    this.totals.malformed += 1;
    increment(this.errors, "malformed_input");
  }

  stats(): WebDatabaseStats {
    return {
      summary: { ...this.totals },
      by_state: sortedCounts(this.byState),
      excluded_by_reason: sortedCounts(this.excludedByReason),
      by_category: sortedCounts(this.byCategory),
      by_country: sortedCounts(this.byCountry),
      errors: sortedCounts(this.errors),
    };
  }

  private exclude(reason: string, error?: PipelineError): WebRecordResult {
    this.totals.excluded += 1;
    increment(this.excludedByReason, reason);
    return { status: "excluded", reason, error };
  }
}
