import { increment, sortedCounts, type Counts } from "../common/records.js";
import type { RawCampaignRecord } from "../types.js";
import {
  rawCreatorId,
  rawId,
  rawName,
  rawProjectUrl,
  rawState,
  rawTimestamp,
} from "./rawRecord.js";

export type DedupDecision =
  | { action: "keep"; id?: string }
  | { action: "duplicate"; id: string };

export interface MemberSummary {
  id: string;
  name?: string;
  state: string;
  creator_id?: string;
  url?: string;
  launched_at?: number;
  deadline?: number;
}

export interface DuplicateGroup {
  id: string;
  occurrences: number;
  member_summaries: MemberSummary[];
}

export interface SecondaryGroupCounts {
  name: number;
  url: number;
  creator: number;
}

export interface DuplicateStats {
  total: number;
  malformed: number;
  missing_id: number;
  duplicates_removed: number;
  unique_remaining: number;
  by_state: Record<string, number>;
  groups: DuplicateGroup[];
  secondary_groups?: SecondaryGroupCounts;
  generated_at: string;
}

/** Keep/drop on the primary key only. First occurrence wins. */
export class Deduper {
  private readonly seen = new Set<string>();

  check(id: string): "keep" | "duplicate" {
    if (this.seen.has(id)) {
      return "duplicate";
    }
    this.seen.add(id);
    return "keep";
  }

  get size(): number {
    return this.seen.size;
  }
}

/**
 * Diagnostic grouping of duplicates. Never consulted for keep/drop; the engine
 * runs without it when only the deduplicated stream is needed.
 */
export class DuplicateReporter {
  private readonly firstSeen = new Map<string, MemberSummary>();
  private readonly duplicates = new Map<string, MemberSummary[]>();
  private readonly byName = new Map<string, number>();
  private readonly byUrl = new Map<string, number>();
  private readonly byCreator = new Map<string, number>();

  recordKept(id: string, record: RawCampaignRecord): void {
    this.firstSeen.set(id, summarizeMember(id, record));
    bump(this.byName, rawName(record)?.toLowerCase());
    bump(this.byUrl, rawProjectUrl(record)?.toLowerCase());
    bump(this.byCreator, rawCreatorId(record));
  }

  recordDuplicate(id: string, record: RawCampaignRecord): void {
    const members = this.duplicates.get(id) ?? [];
    members.push(summarizeMember(id, record));
    this.duplicates.set(id, members);
  }

  groups(): DuplicateGroup[] {
    const out: DuplicateGroup[] = [];
    for (const [id, extra] of this.duplicates) {
      const first = this.firstSeen.get(id);
      const members = first ? [first, ...extra] : extra;
      out.push({ id, occurrences: members.length, member_summaries: members });
    }
    return out;
  }

  secondaryGroups(): SecondaryGroupCounts {
    return {
      name: countShared(this.byName),
      url: countShared(this.byUrl),
      creator: countShared(this.byCreator),
    };
  }
}

export interface DedupEngineOptions {
  reporter?: DuplicateReporter;
}

export class DedupEngine {
  private readonly deduper = new Deduper();
  private readonly reporter?: DuplicateReporter;
  private readonly byState: Counts = new Map();
  private total = 0;
  private malformed = 0;
  private missingId = 0;
  private duplicatesRemoved = 0;
  private kept = 0;

  constructor(options: DedupEngineOptions = {}) {
    this.reporter = options.reporter;
  }

  process(record: RawCampaignRecord): DedupDecision {
    this.total += 1;
    const id = rawId(record);
    if (!id) {
      // Nothing to compare against; kept as-is.
      this.missingId += 1;
      this.noteKept(record);
      return { action: "keep" };
    }

    if (this.deduper.check(id) === "duplicate") {
      this.duplicatesRemoved += 1;
      this.reporter?.recordDuplicate(id, record);
      return { action: "duplicate", id };
    }

    this.reporter?.recordKept(id, record);
    this.noteKept(record);
    return { action: "keep", id };
  }

  noteMalformed(): void {
    this.total += 1;
    this.malformed += 1;
  }

  stats(): DuplicateStats {
    const stats: DuplicateStats = {
      total: this.total,
      malformed: this.malformed,
      missing_id: this.missingId,
      duplicates_removed: this.duplicatesRemoved,
      unique_remaining: this.kept,
      by_state: sortedCounts(this.byState),
      groups: this.reporter?.groups() ?? [],
      generated_at: new Date().toISOString(),
    };
    if (this.reporter) {
      stats.secondary_groups = this.reporter.secondaryGroups();
    }
    return stats;
  }

  private noteKept(record: RawCampaignRecord): void {
    this.kept += 1;
    const state = rawState(record);
    if (state) {
      increment(this.byState, state);
    }
  }
}

function summarizeMember(id: string, record: RawCampaignRecord): MemberSummary {
  return {
    id,
    name: rawName(record),
    state: rawState(record),
    creator_id: rawCreatorId(record),
    url: rawProjectUrl(record),
    launched_at: optionalTimestamp(record, "launched_at"),
    deadline: optionalTimestamp(record, "deadline"),
  };
}

function optionalTimestamp(record: RawCampaignRecord, key: "launched_at" | "deadline"): number | undefined {
  const value = rawTimestamp(record, key);
  return value > 0 ? value : undefined;
}

function bump(counts: Map<string, number>, key: string | undefined): void {
  if (!key) {
    return;
  }
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

function countShared(counts: Map<string, number>): number {
  let shared = 0;
  for (const count of counts.values()) {
    if (count > 1) {
      shared += 1;
    }
  }
  return shared;
}
