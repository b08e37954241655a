export { readRawRecords, runWithStats, type StageContext, type StageResult } from "./pipeline/context.js";
export {
  createDedupEngine,
  runCurationPass,
  runDedupStage,
  runFilterStage,
  runWebDatabaseStage,
  type CurationPassResult,
  type WebDatabaseResult,
} from "./pipeline/curation.js";
export { runHistoryStage, writeHistory, type HistoryStageStats } from "./pipeline/history.js";
export {
  assembleFeatures,
  runFeatureStage,
  wordVectorTokens,
  type FeatureServices,
  type FeatureStats,
} from "./pipeline/features.js";
export { runValidateStage } from "./pipeline/validate.js";
export { runAnalyzeStage } from "./pipeline/analyze.js";
export { runAll, type RunAllSummary } from "./pipeline/runAll.js";
