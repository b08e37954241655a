import { loadCuratedRecords } from "../curate/curatedRecord.js";
import { CreatorIndex, enrichWithHistory, type HistoryStats } from "../history/creatorIndex.js";
import { writeJsonFile } from "../io/files.js";
import type { CuratedCampaignRecord, EnrichedCampaignRecord, HistoryConfig } from "../types.js";
import { runWithStats, type StageContext, type StageResult } from "./context.js";
import { formatHistorySummary } from "./summary.js";

export interface HistoryStageStats extends HistoryStats {
  invalid_records: number;
}

export interface HistoryStageResult extends StageResult<HistoryStageStats> {
  records: EnrichedCampaignRecord[];
}

/** Enriches already curated records; `invalidRecords` is carried into the stats. */
export async function writeHistory(
  records: readonly CuratedCampaignRecord[],
  config: HistoryConfig,
  context: StageContext,
  invalidRecords = 0,
): Promise<HistoryStageResult> {
  const logger = context.logger.child("history");
  const index = CreatorIndex.build(records);
  let enriched: EnrichedCampaignRecord[] = [];
  let historyStats: HistoryStats = {
    records: records.length,
    creators: index.creatorCount,
    records_without_creator: 0,
    records_with_history: 0,
    max_history_length: 0,
  };

  const stats = await runWithStats(
    config.stats,
    async () => {
      const result = enrichWithHistory(records, index);
      enriched = result.records;
      historyStats = result.stats;
      await writeJsonFile(config.output, enriched);
    },
    () => ({ ...historyStats, invalid_records: invalidRecords }),
  );
  logger.info(formatHistorySummary(stats));
  return { stats, records: enriched, outputPath: config.output, statsPath: config.stats };
}

export async function runHistoryStage(config: HistoryConfig, context: StageContext): Promise<HistoryStageResult> {
  const { records, invalid } = await loadCuratedRecords(config.input);
  if (invalid > 0) {
    context.logger.warn(`Skipped ${invalid} invalid rows in ${config.input}`);
  }
  return writeHistory(records, config, context, invalid);
}
