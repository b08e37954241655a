import { increment, sortedCounts, type Counts } from "../common/records.js";
import type { RawCampaignRecord } from "../types.js";
import { formatPct, StatePolicy, type StateDecision } from "./statePolicy.js";

export interface CanceledStats {
  total: number;
  converted_to_failed: number;
  excluded_early: number;
  invalid_timestamps: number;
  by_time_remaining: Record<string, number>;
}

export interface FilterStats {
  summary: {
    total_processed: number;
    included: number;
    excluded: number;
    malformed: number;
  };
  by_state: Record<string, number>;
  excluded_by_reason: Record<string, number>;
  canceled: CanceledStats;
}

export type FilterOutcome =
  | { status: "included"; record: RawCampaignRecord; decision: StateDecision }
  | { status: "excluded"; decision: StateDecision };

/**
 * Applies the state policy to a record stream and keeps the running tallies.
 * Relabelled records are copies; the input record is left untouched.
 */
export class StateFilter {
  private readonly policy: StatePolicy;
  private readonly totals = { total_processed: 0, included: 0, excluded: 0, malformed: 0 };
  private readonly byState: Counts = new Map();
  private readonly excludedByReason: Counts = new Map();
  private readonly canceled = { total: 0, converted_to_failed: 0, excluded_early: 0, invalid_timestamps: 0 };
  private readonly byTimeRemaining: Counts = new Map();

  constructor(policy: StatePolicy = new StatePolicy()) {
    this.policy = policy;
  }

  apply(record: RawCampaignRecord): FilterOutcome {
    this.totals.total_processed += 1;
    const decision = this.policy.evaluate(record);
    increment(this.byState, decision.rawState || "missing");
    this.tallyCancellation(decision);

    if (decision.status === "excluded") {
      this.totals.excluded += 1;
      increment(this.excludedByReason, decision.reason);
      return { status: "excluded", decision };
    }

    this.totals.included += 1;
    return { status: "included", record: relabel(record, decision.state), decision };
  }

  noteMalformed(): void {
    this.totals.total_processed += 1;
    this.totals.malformed += 1;
  }

  stats(): FilterStats {
    return {
      summary: { ...this.totals },
      by_state: sortedCounts(this.byState),
      excluded_by_reason: sortedCounts(this.excludedByReason),
      canceled: {
        ...this.canceled,
        by_time_remaining: sortedCounts(this.byTimeRemaining, (a, b) => Number.parseFloat(a) - Number.parseFloat(b)),
      },
    };
  }

  private tallyCancellation(decision: StateDecision): void {
    if (decision.rawState !== "canceled") {
      return;
    }
    this.canceled.total += 1;
    if (decision.reason === "invalid_timestamps") {
      this.canceled.invalid_timestamps += 1;
      return;
    }
    if (decision.status === "included") {
      this.canceled.converted_to_failed += 1;
    } else {
      this.canceled.excluded_early += 1;
    }
    if (typeof decision.timeRemainingPct === "number") {
      increment(this.byTimeRemaining, `${formatPct(decision.timeRemainingPct)}%`);
    }
  }
}

function relabel(record: RawCampaignRecord, state: string): RawCampaignRecord {
  if (record.data.state === state) {
    return record;
  }
  return { ...record, data: { ...record.data, state } };
}

