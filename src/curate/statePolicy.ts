import type { CampaignOutcome, RawCampaignRecord } from "../types.js";
import { rawState, rawTimestamp } from "./rawRecord.js";

export const EXCLUDED_STATES: ReadonlySet<string> = new Set([
  "suspended",
  "started",
  "live",
  "submitted",
]);
export const TERMINAL_STATES: ReadonlySet<string> = new Set(["successful", "failed"]);
export const CANCELLATION_THRESHOLD_PCT = 60;

export type StateDecision =
  | {
      status: "included";
      state: CampaignOutcome;
      rawState: string;
      reason: string;
      timeRemainingPct?: number;
    }
  | {
      status: "excluded";
      rawState: string;
      reason: string;
      timeRemainingPct?: number;
    };

export interface StatePolicyOptions {
  excludedStates?: Iterable<string>;
  cancellationThresholdPct?: number;
}

/**
 * Single source of truth for which lifecycle states survive curation and how a
 * cancellation is relabelled. Shared by the state filter and the web normalizer.
 */
export class StatePolicy {
  readonly excludedStates: ReadonlySet<string>;
  readonly cancellationThresholdPct: number;

  constructor(options: StatePolicyOptions = {}) {
    this.excludedStates = new Set(options.excludedStates ?? EXCLUDED_STATES);
    this.cancellationThresholdPct = options.cancellationThresholdPct ?? CANCELLATION_THRESHOLD_PCT;
  }

  evaluate(record: RawCampaignRecord): StateDecision {
    const state = rawState(record);

    if (this.excludedStates.has(state)) {
      return { status: "excluded", rawState: state, reason: state };
    }

    if (isTerminalState(state)) {
      return { status: "included", state, rawState: state, reason: state };
    }

    if (state === "canceled") {
      return this.evaluateCancellation(record);
    }

    return { status: "excluded", rawState: state, reason: `unknown_state_${state}` };
  }

  private evaluateCancellation(record: RawCampaignRecord): StateDecision {
    const deadline = rawTimestamp(record, "deadline");
    const canceledAt = rawTimestamp(record, "state_changed_at");
    const createdAt = rawTimestamp(record, "created_at");
    if (!deadline || !canceledAt || !createdAt) {
      return { status: "excluded", rawState: "canceled", reason: "invalid_timestamps" };
    }

    const pct = timeRemainingPct(deadline, canceledAt, createdAt);
    const label = formatPct(pct);
    if (pct <= this.cancellationThresholdPct) {
      return {
        status: "included",
        state: "failed",
        rawState: "canceled",
        reason: `converted_${label}`,
        timeRemainingPct: pct,
      };
    }
    return {
      status: "excluded",
      rawState: "canceled",
      reason: `excluded_${label}`,
      timeRemainingPct: pct,
    };
  }
}

/** Share of the scheduled duration still ahead at cancellation, in percent. */
export function timeRemainingPct(deadline: number, canceledAt: number, createdAt: number): number {
  const total = deadline - createdAt;
  if (total <= 0) {
    return 0;
  }
  return ((deadline - canceledAt) * 100) / total;
}

export function formatPct(pct: number): string {
  return pct.toFixed(1);
}

export function isTerminalState(state: string): state is CampaignOutcome {
  return TERMINAL_STATES.has(state);
}
