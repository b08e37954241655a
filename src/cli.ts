#!/usr/bin/env node
import { buildStageConfig } from "./config.js";
import { HttpTextEmbeddingService } from "./features/embedding.js";
import { loadWordVectorTable } from "./features/wordVectors.js";
import { Logger } from "./logger.js";
import {
  runAll,
  runAnalyzeStage,
  runDedupStage,
  runFeatureStage,
  runFilterStage,
  runHistoryStage,
  runValidateStage,
  runWebDatabaseStage,
  type FeatureServices,
} from "./pipeline.js";
import type { FeatureConfig } from "./types.js";

function createFeatureServices(config: FeatureConfig, logger: Logger): FeatureServices {
  return {
    embeddings: new HttpTextEmbeddingService({
      endpoints: { long_form: config.embedding.longFormUrl, short_form: config.embedding.shortFormUrl },
      timeoutMs: config.embedding.timeoutMs,
      apiKey: config.embedding.apiKey,
    }),
    loadWordVectors: (tokens) =>
      loadWordVectorTable(config.wordVectors.path, {
        dimension: config.wordVectors.dimension,
        restrictTo: tokens,
        logger,
      }),
  };
}

async function main(): Promise<void> {
  const stage = buildStageConfig(process.argv.slice(2), process.env);
  const logger = new Logger({ debugEnabled: process.env.PIPELINE_DEBUG === "1" });
  const context = { logger };
  const startedMs = Date.now();

  switch (stage.command) {
    case "dedup":
      await runDedupStage(stage.config, context);
      break;
    case "filter":
      await runFilterStage(stage.config, context);
      break;
    case "web-db":
      await runWebDatabaseStage(stage.config, context);
      break;
    case "history":
      await runHistoryStage(stage.config, context);
      break;
    case "features":
      await runFeatureStage(stage.config, context, createFeatureServices(stage.config, logger));
      break;
    case "validate":
      await runValidateStage(stage.config, context);
      break;
    case "analyze":
      await runAnalyzeStage(stage.config, context);
      break;
    case "run": {
      const summary = await runAll(stage.config, context, createFeatureServices(stage.config.features, logger));
      process.stdout.write(
        `Finished. curated=${summary.webDatabase.summary.included} ` +
          `features=${summary.features.summary.assembled} ` +
          `with_fallbacks=${summary.features.summary.with_fallbacks} ` +
          `validation_issues=${summary.validation.summary.records_with_issues}\n`,
      );
      break;
    }
  }
  logger.info(`${stage.command} done in ${((Date.now() - startedMs) / 1000).toFixed(2)}s`);
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`Fatal error: ${message}\n`);
  process.exit(1);
});
