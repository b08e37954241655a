import type { WebAnalyticsReport } from "../analytics/webAnalytics.js";
import type { DuplicateStats } from "../curate/dedup.js";
import type { FilterStats } from "../curate/stateFilter.js";
import type { WebDatabaseStats } from "../curate/webRecord.js";
import type { ValidationReport } from "../features/validate.js";
import type { HistoryStageStats } from "./history.js";
import type { FeatureStats } from "./features.js";

export function formatDedupSummary(stats: DuplicateStats): string {
  return (
    `Dedup: total=${stats.total}, unique=${stats.unique_remaining}, ` +
    `duplicates_removed=${stats.duplicates_removed}, malformed=${stats.malformed}, ` +
    `missing_id=${stats.missing_id}, groups=${stats.groups.length}`
  );
}

export function formatFilterSummary(stats: FilterStats): string {
  const { summary, canceled } = stats;
  return (
    `Filter: processed=${summary.total_processed}, included=${summary.included}, ` +
    `excluded=${summary.excluded}, malformed=${summary.malformed}, ` +
    `canceled=${canceled.total} (converted=${canceled.converted_to_failed}, ` +
    `excluded_early=${canceled.excluded_early}, invalid_timestamps=${canceled.invalid_timestamps})`
  );
}

export function formatWebDatabaseSummary(stats: WebDatabaseStats): string {
  const { summary } = stats;
  return (
    `Web database: processed=${summary.total_processed}, included=${summary.included}, ` +
    `excluded=${summary.excluded}, malformed=${summary.malformed}, ` +
    `categories=${Object.keys(stats.by_category).length}, countries=${Object.keys(stats.by_country).length}`
  );
}

export function formatHistorySummary(stats: HistoryStageStats): string {
  return (
    `History: records=${stats.records}, creators=${stats.creators}, ` +
    `with_history=${stats.records_with_history}, without_creator=${stats.records_without_creator}, ` +
    `max_history=${stats.max_history_length}, invalid_input=${stats.invalid_records}`
  );
}

export function formatFeatureSummary(stats: FeatureStats): string {
  const { summary, vocabulary } = stats;
  return (
    `Features: records=${summary.records}, assembled=${summary.assembled}, ` +
    `with_fallbacks=${summary.with_fallbacks}, invalid_input=${summary.invalid_input}, ` +
    `vocabulary=${vocabulary.version} (${vocabulary.source}, ${vocabulary.size} categories)`
  );
}

export function formatValidationSummary(report: ValidationReport): string {
  const { summary } = report;
  if (summary.records_with_issues === 0) {
    return `Validation: all ${summary.records - summary.records_without_id} records passed`;
  }
  const problems = Object.entries(report.problems)
    .map(([problem, count]) => `${problem}=${count}`)
    .join(", ");
  return `Validation: ${summary.records_with_issues}/${summary.records} records with issues (${problems})`;
}

export function formatAnalyticsSummary(report: WebAnalyticsReport): string {
  const { overall } = report;
  const scope = report.category ?? "all categories";
  return (
    `Analytics (${scope}): projects=${overall.total_projects}, funds=${overall.total_funds}, ` +
    `success_rate=${overall.success_rate}%, span=${overall.period}, end=${report.end_date}`
  );
}
