import { ratio, roundTo } from "../common/math.js";
import { compareKeys } from "../common/records.js";
import { formatDisplayDate, pledgePerBacker } from "../curate/webRecord.js";
import type { CuratedCampaignRecord } from "../types.js";

const SECONDS_PER_DAY = 86_400;

export const ANALYTICS_PERIODS = {
  "7d": 7,
  "30d": 30,
  "90d": 90,
  "180d": 180,
  "1y": 365,
  "2y": 730,
} as const;

export type AnalyticsPeriod = keyof typeof ANALYTICS_PERIODS;

export type BreakdownSort = "projects" | "funds";

export interface WindowMetrics {
  start: number;
  end: number;
  period: string;
  total_projects: number;
  total_funds: number;
  successful_projects: number;
  /** Percent, 0..100. */
  success_rate: number;
}

/** Percent change against the previous window; `null` when the previous value is 0 and the recent one is not. */
export interface MetricChanges {
  total_projects: number | null;
  total_funds: number | null;
  successful_projects: number | null;
  success_rate: number | null;
}

export interface BreakdownRow {
  name: string;
  total_projects: number;
  total_funds: number;
  successful_projects: number;
  success_rate: number;
  growth: number | null;
}

export interface PeriodReport {
  period: AnalyticsPeriod;
  days: number;
  recent: WindowMetrics;
  previous: WindowMetrics;
  changes: MetricChanges;
  breakdown: {
    level: "category" | "subcategory";
    sort_by: BreakdownSort;
    top: BreakdownRow[];
  };
}

export interface BackerFundingRow {
  category: string;
  total_funds: number;
  total_backers: number;
  funding_per_backer: number;
}

export interface TopFundedCampaign {
  id: string;
  name: string;
  category: string;
  pledged_usd: number;
  backers_count: number;
  average_pledge: number;
  url?: string;
}

export interface WebAnalyticsReport {
  category: string | null;
  end_date: string;
  overall: WindowMetrics;
  periods: PeriodReport[];
  backer_funding: BackerFundingRow[];
  top_funded: TopFundedCampaign[];
}

export interface WebAnalyticsOptions {
  /** Restricts every figure to one category (case-insensitive); breakdowns then go by subcategory. */
  category?: string;
  sortBy?: BreakdownSort;
  /** Epoch seconds closing the most recent window. Defaults to the latest deadline in the data. */
  endDate?: number;
  top?: number;
}

interface Tally {
  total_projects: number;
  total_funds: number;
  successful_projects: number;
}

export function percentChange(recent: number, previous: number): number | null {
  if (previous === 0) {
    return recent > 0 ? null : 0;
  }
  return roundTo(((recent - previous) / previous) * 100, 2);
}

/** Records whose deadline falls inside `[start, end]`, both ends inclusive. */
export function inWindow(
  records: readonly CuratedCampaignRecord[],
  start: number,
  end: number,
): CuratedCampaignRecord[] {
  return records.filter((record) => record.cal_deadline >= start && record.cal_deadline <= end);
}

export function windowMetrics(records: readonly CuratedCampaignRecord[], start: number, end: number): WindowMetrics {
  const tally = tallyRecords(records);
  return {
    start,
    end,
    period: `${formatDisplayDate(start)} - ${formatDisplayDate(end)}`,
    total_projects: tally.total_projects,
    total_funds: roundTo(tally.total_funds, 2),
    successful_projects: tally.successful_projects,
    success_rate: successRate(tally),
  };
}

export function metricChanges(recent: WindowMetrics, previous: WindowMetrics): MetricChanges {
  return {
    total_projects: percentChange(recent.total_projects, previous.total_projects),
    total_funds: percentChange(recent.total_funds, previous.total_funds),
    successful_projects: percentChange(recent.successful_projects, previous.successful_projects),
    success_rate: percentChange(recent.success_rate, previous.success_rate),
  };
}

/** Top groups of the recent window by project count or funds, with growth on that same measure. */
export function categoryBreakdown(
  recent: readonly CuratedCampaignRecord[],
  previous: readonly CuratedCampaignRecord[],
  options: { level: "category" | "subcategory"; sortBy: BreakdownSort; top: number },
): BreakdownRow[] {
  const keyOf = (record: CuratedCampaignRecord): string =>
    options.level === "subcategory" ? record.subcategory : record.category;
  const recentGroups = groupTallies(recent, keyOf);
  const previousGroups = groupTallies(previous, keyOf);
  const measure = (tally: Tally): number =>
    options.sortBy === "funds" ? tally.total_funds : tally.total_projects;

  return [...recentGroups]
    .sort(([nameA, a], [nameB, b]) => measure(b) - measure(a) || compareKeys(nameA, nameB))
    .slice(0, options.top)
    .map(([name, tally]) => {
      const before = previousGroups.get(name);
      return {
        name,
        total_projects: tally.total_projects,
        total_funds: roundTo(tally.total_funds, 2),
        successful_projects: tally.successful_projects,
        success_rate: successRate(tally),
        growth: percentChange(measure(tally), before ? measure(before) : 0),
      };
    });
}

/** Pledged dollars per backer for each category, over campaigns with at least one backer. */
export function backerFunding(records: readonly CuratedCampaignRecord[]): BackerFundingRow[] {
  const totals = new Map<string, { funds: number; backers: number }>();
  for (const record of records) {
    if (record.backers_count <= 0) {
      continue;
    }
    const entry = totals.get(record.category) ?? { funds: 0, backers: 0 };
    entry.funds += record.pledged_usd;
    entry.backers += record.backers_count;
    totals.set(record.category, entry);
  }
  return [...totals]
    .map(([category, entry]) => ({
      category,
      total_funds: roundTo(entry.funds, 2),
      total_backers: entry.backers,
      funding_per_backer: roundTo(entry.funds / entry.backers, 2),
    }))
    .sort((a, b) => b.funding_per_backer - a.funding_per_backer || compareKeys(a.category, b.category));
}

export function topFunded(records: readonly CuratedCampaignRecord[], top: number): TopFundedCampaign[] {
  const seen = new Set<string>();
  const out: TopFundedCampaign[] = [];
  const sorted = [...records].sort((a, b) => b.pledged_usd - a.pledged_usd || compareKeys(a.id, b.id));
  for (const record of sorted) {
    if (out.length >= top) {
      break;
    }
    if (seen.has(record.id)) {
      continue;
    }
    seen.add(record.id);
    out.push({
      id: record.id,
      name: record.name,
      category: record.category,
      pledged_usd: record.pledged_usd,
      backers_count: record.backers_count,
      average_pledge: pledgePerBacker(record.pledged_usd, record.backers_count),
      ...(record.links.project ? { url: record.links.project } : {}),
    });
  }
  return out;
}

/**
 * Market overview of the web database: the whole span, then each recent window
 * against the window of equal length before it.
 */
export function analyzeWebDatabase(
  records: readonly CuratedCampaignRecord[],
  options: WebAnalyticsOptions = {},
): WebAnalyticsReport {
  const sortBy = options.sortBy ?? "projects";
  const top = options.top ?? 5;
  const wanted = options.category?.trim().toLowerCase();
  const scoped = wanted ? records.filter((record) => record.category.toLowerCase() === wanted) : [...records];
  const endDate = options.endDate ?? latestDeadline(records);

  const periods: PeriodReport[] = [];
  for (const [period, days] of periodEntries()) {
    const recentStart = endDate - days * SECONDS_PER_DAY;
    const previousStart = recentStart - days * SECONDS_PER_DAY;
    const recentRecords = inWindow(scoped, recentStart, endDate);
    const previousRecords = inWindow(scoped, previousStart, recentStart);
    const recent = windowMetrics(recentRecords, recentStart, endDate);
    const previous = windowMetrics(previousRecords, previousStart, recentStart);
    const level = wanted ? "subcategory" : "category";
    periods.push({
      period,
      days,
      recent,
      previous,
      changes: metricChanges(recent, previous),
      breakdown: {
        level,
        sort_by: sortBy,
        top: categoryBreakdown(recentRecords, previousRecords, { level, sortBy, top }),
      },
    });
  }

  return {
    category: wanted || null,
    end_date: formatDisplayDate(endDate),
    overall: overallMetrics(scoped, endDate),
    periods,
    backer_funding: backerFunding(scoped),
    top_funded: topFunded(scoped, top),
  };
}

function overallMetrics(records: readonly CuratedCampaignRecord[], endDate: number): WindowMetrics {
  const launches = records.map((record) => record.cal_launched_at).filter((value) => value > 0);
  const start = launches.length > 0 ? Math.min(...launches) : endDate;
  const end = records.length > 0 ? latestDeadline(records) : endDate;
  return windowMetrics(records, start, end);
}

function latestDeadline(records: readonly CuratedCampaignRecord[]): number {
  let latest = 0;
  for (const record of records) {
    latest = Math.max(latest, record.cal_deadline);
  }
  return latest;
}

function periodEntries(): Array<[AnalyticsPeriod, number]> {
  const entries: Array<[AnalyticsPeriod, number]> = [];
  for (const period of Object.keys(ANALYTICS_PERIODS)) {
    if (isAnalyticsPeriod(period)) {
      entries.push([period, ANALYTICS_PERIODS[period]]);
    }
  }
  return entries;
}

function isAnalyticsPeriod(value: string): value is AnalyticsPeriod {
  return Object.hasOwn(ANALYTICS_PERIODS, value);
}

function tallyRecords(records: readonly CuratedCampaignRecord[]): Tally {
  const tally: Tally = { total_projects: 0, total_funds: 0, successful_projects: 0 };
  for (const record of records) {
    addToTally(tally, record);
  }
  return tally;
}

function groupTallies(
  records: readonly CuratedCampaignRecord[],
  keyOf: (record: CuratedCampaignRecord) => string,
): Map<string, Tally> {
  const groups = new Map<string, Tally>();
  for (const record of records) {
    const key = keyOf(record);
    const tally = groups.get(key) ?? { total_projects: 0, total_funds: 0, successful_projects: 0 };
    addToTally(tally, record);
    groups.set(key, tally);
  }
  return groups;
}

function addToTally(tally: Tally, record: CuratedCampaignRecord): void {
  tally.total_projects += 1;
  tally.total_funds += record.pledged_usd;
  if (record.state === "successful") {
    tally.successful_projects += 1;
  }
}

function successRate(tally: Tally): number {
  return roundTo(ratio(tally.successful_projects, tally.total_projects) * 100, 2);
}
