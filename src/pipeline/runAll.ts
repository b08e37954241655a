import type { ValidationReport } from "../features/validate.js";
import type { RunAllConfig } from "../types.js";
import type { StageContext } from "./context.js";
import { runCurationPass, type CurationPassResult } from "./curation.js";
import { assembleFeatures, type FeatureServices, type FeatureStats } from "./features.js";
import { writeHistory, type HistoryStageStats } from "./history.js";
import { runValidateStage } from "./validate.js";

export interface RunAllSummary {
  startedAt: string;
  finishedAt: string;
  dedup: CurationPassResult["dedup"];
  filter: CurationPassResult["filter"];
  webDatabase: CurationPassResult["webDatabase"];
  history: HistoryStageStats;
  features: FeatureStats;
  validation: ValidationReport;
}

/** All stages chained; the raw dump is read once and the curated set stays in memory. */
export async function runAll(
  config: RunAllConfig,
  context: StageContext,
  services: FeatureServices,
): Promise<RunAllSummary> {
  const startedAt = new Date().toISOString();
  const curation = await runCurationPass(config, context);
  const history = await writeHistory(curation.records, config.history, context);
  const features = await assembleFeatures(curation.records, config.features, services, context);
  const validation = await runValidateStage(config.validate, context);
  return {
    startedAt,
    finishedAt: new Date().toISOString(),
    dedup: curation.dedup,
    filter: curation.filter,
    webDatabase: curation.webDatabase,
    history: history.stats,
    features: features.stats,
    validation: validation.stats,
  };
}
