import { mean, ratio } from "../common/math.js";
import type {
  CreatorHistory,
  CreatorHistorySummary,
  CuratedCampaignRecord,
  EnrichedCampaignRecord,
} from "../types.js";

export interface HistoryStats {
  records: number;
  creators: number;
  records_without_creator: number;
  records_with_history: number;
  max_history_length: number;
}

export const EMPTY_HISTORY_SUMMARY: Readonly<CreatorHistorySummary> = Object.freeze({
  previous_projects_count: 0,
  previous_successful: 0,
  previous_failed: 0,
  previous_success_rate: 0,
  average_funding_goal: 0,
  average_pledged: 0,
  have_previous_project: false,
});

/**
 * Per-creator campaigns ordered by deadline. Built once per run; lookups are a
 * binary search over the creator's own campaigns.
 */
export class CreatorIndex {
  private constructor(
    private readonly byCreator: ReadonlyMap<string, readonly CuratedCampaignRecord[]>,
  ) {}

  static build(records: Iterable<CuratedCampaignRecord>): CreatorIndex {
    const groups = new Map<string, CuratedCampaignRecord[]>();
    for (const record of records) {
      if (!record.creator_id) {
        continue;
      }
      const group = groups.get(record.creator_id);
      if (group) {
        group.push(record);
      } else {
        groups.set(record.creator_id, [record]);
      }
    }
    for (const group of groups.values()) {
      group.sort((a, b) => a.cal_deadline - b.cal_deadline || a.id.localeCompare(b.id));
    }
    return new CreatorIndex(groups);
  }

  get creatorCount(): number {
    return this.byCreator.size;
  }

  /** Campaigns of the same creator that ended strictly before `record` launched. */
  historyFor(record: CuratedCampaignRecord): CreatorHistory {
    const creatorId = record.creator_id;
    const group = creatorId ? this.byCreator.get(creatorId) : undefined;
    if (!group) {
      return { creatorId, entries: [], summary: { ...EMPTY_HISTORY_SUMMARY } };
    }
    const cut = firstDeadlineAtOrAfter(group, record.cal_launched_at);
    const entries = group.slice(0, cut);
    return { creatorId, entries, summary: summarizeHistory(entries) };
  }
}

export function summarizeHistory(entries: readonly CuratedCampaignRecord[]): CreatorHistorySummary {
  const total = entries.length;
  if (total === 0) {
    return { ...EMPTY_HISTORY_SUMMARY };
  }
  let successful = 0;
  let failed = 0;
  for (const entry of entries) {
    if (entry.state === "successful") {
      successful += 1;
    } else if (entry.state === "failed") {
      failed += 1;
    }
  }
  return {
    previous_projects_count: total,
    previous_successful: successful,
    previous_failed: failed,
    previous_success_rate: ratio(successful, total),
    average_funding_goal: mean(entries.map((entry) => entry.goal_usd)),
    average_pledged: mean(entries.map((entry) => entry.pledged_usd)),
    have_previous_project: true,
  };
}

export function enrichWithHistory(
  records: readonly CuratedCampaignRecord[],
  index: CreatorIndex = CreatorIndex.build(records),
): { records: EnrichedCampaignRecord[]; stats: HistoryStats } {
  const stats: HistoryStats = {
    records: records.length,
    creators: index.creatorCount,
    records_without_creator: 0,
    records_with_history: 0,
    max_history_length: 0,
  };
  const enriched = records.map((record) => {
    if (!record.creator_id) {
      stats.records_without_creator += 1;
    }
    const { summary } = index.historyFor(record);
    if (summary.have_previous_project) {
      stats.records_with_history += 1;
      stats.max_history_length = Math.max(stats.max_history_length, summary.previous_projects_count);
    }
    return { ...record, ...summary };
  });
  return { records: enriched, stats };
}

function firstDeadlineAtOrAfter(group: readonly CuratedCampaignRecord[], launchedAt: number): number {
  let lo = 0;
  let hi = group.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (group[mid].cal_deadline < launchedAt) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}
