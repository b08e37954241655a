import { analyzeWebDatabase, type WebAnalyticsReport } from "../analytics/webAnalytics.js";
import { loadCuratedRecords } from "../curate/curatedRecord.js";
import { writeJsonFile } from "../io/files.js";
import type { AnalyzeConfig } from "../types.js";
import type { StageContext, StageResult } from "./context.js";
import { formatAnalyticsSummary } from "./summary.js";

export async function runAnalyzeStage(
  config: AnalyzeConfig,
  context: StageContext,
): Promise<StageResult<WebAnalyticsReport>> {
  const logger = context.logger.child("analyze");
  const { records, invalid } = await loadCuratedRecords(config.input);
  if (invalid > 0) {
    logger.warn(`Skipped ${invalid} invalid rows in ${config.input}`);
  }
  const report = analyzeWebDatabase(records, {
    category: config.category,
    sortBy: config.sortBy,
    endDate: config.endDate,
    top: config.top,
  });
  if (config.category && report.overall.total_projects === 0) {
    logger.warn(`No campaigns found for category "${config.category}"`);
  }
  await writeJsonFile(config.output, report);
  logger.info(formatAnalyticsSummary(report));
  for (const period of report.periods) {
    logger.debug(
      `${period.period} ${period.recent.period}: projects=${period.recent.total_projects} ` +
        `funds=${period.recent.total_funds} success_rate=${period.recent.success_rate}%`,
    );
  }
  return { stats: report, outputPath: config.output };
}
