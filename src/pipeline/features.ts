import { mapWithConcurrency } from "../common/concurrency.js";
import { increment, sortedCounts, type Counts } from "../common/records.js";
import { loadCuratedRecords } from "../curate/curatedRecord.js";
import { FeatureAssembler } from "../features/assembler.js";
import { ProjectDetailIndex, loadProjectDetails } from "../features/details.js";
import type { TextEmbeddingService } from "../features/embedding.js";
import { subcategoryText, tokenize } from "../features/text.js";
import { deriveVocabulary, loadVocabulary, vocabularyFile } from "../features/vocabulary.js";
import type { WordVectorLookupService } from "../features/wordVectors.js";
import { CreatorIndex, type HistoryStats } from "../history/creatorIndex.js";
import { writeJsonFile } from "../io/files.js";
import { createSink } from "../sinks/index.js";
import type {
  CategoryVocabulary,
  CuratedCampaignRecord,
  FeatureConfig,
  FeatureDiagnostics,
  FeatureSink,
} from "../types.js";
import { runWithStats, type StageContext, type StageResult } from "./context.js";
import { formatFeatureSummary } from "./summary.js";

export interface FeatureServices {
  embeddings: TextEmbeddingService;
  /** Receives every token the batch will look up, so large tables can be loaded partially. */
  loadWordVectors(tokens: ReadonlySet<string>): Promise<WordVectorLookupService>;
  /** Defaults to the file sink named by the config. */
  sink?: FeatureSink;
}

export interface FeatureStats {
  summary: {
    records: number;
    assembled: number;
    with_fallbacks: number;
    invalid_input: number;
  };
  labels: { successful: number; failed: number };
  details: { with_details: number; without_details: number };
  fallbacks_by_field: Record<string, number>;
  fallbacks_by_kind: Record<string, number>;
  vocabulary: { version: string; source: CategoryVocabulary["source"]; size: number };
  history: HistoryStats;
}

export type FeatureStageResult = StageResult<FeatureStats>;

export function wordVectorTokens(records: readonly CuratedCampaignRecord[]): Set<string> {
  const tokens = new Set<string>();
  for (const record of records) {
    for (const token of tokenize(subcategoryText(record.subcategory))) {
      tokens.add(token);
    }
    for (const token of tokenize(record.country)) {
      tokens.add(token);
    }
  }
  return tokens;
}

export async function resolveVocabulary(
  config: Pick<FeatureConfig, "vocabulary">,
  records: readonly CuratedCampaignRecord[],
): Promise<CategoryVocabulary> {
  if (config.vocabulary) {
    return loadVocabulary(config.vocabulary);
  }
  return deriveVocabulary(records);
}

/**
 * Assembles and sinks feature rows for curated records. Rows are processed in
 * batches of `batchSize`; inside a batch up to `concurrency` records are in
 * flight and results are written in input order.
 */
export async function assembleFeatures(
  records: readonly CuratedCampaignRecord[],
  config: FeatureConfig,
  services: FeatureServices,
  context: StageContext,
  invalidInput = 0,
): Promise<FeatureStageResult> {
  const logger = context.logger.child("features");
  const vocabulary = await resolveVocabulary(config, records);
  await writeJsonFile(config.vocabularyOutput, vocabularyFile(vocabulary));
  logger.info(
    `Category vocabulary ${vocabulary.version} (${vocabulary.source}): ${vocabulary.categories.length} categories`,
  );

  const details = config.details ? await loadProjectDetails(config.details, logger) : ProjectDetailIndex.empty();
  const wordVectors = await services.loadWordVectors(wordVectorTokens(records));
  const index = CreatorIndex.build(records);
  const assembler = new FeatureAssembler({
    embeddings: services.embeddings,
    wordVectors,
    vocabulary,
    logger,
  });
  const sink = services.sink ?? createSink({ format: config.format, path: config.output });
  logger.info(
    `Assembling ${records.length} records via ${sink.name} sink (concurrency=${config.concurrency}, batch=${config.batchSize})`,
  );

  const stats: FeatureStats = {
    summary: { records: records.length, assembled: 0, with_fallbacks: 0, invalid_input: invalidInput },
    labels: { successful: 0, failed: 0 },
    details: { with_details: 0, without_details: 0 },
    fallbacks_by_field: {},
    fallbacks_by_kind: {},
    vocabulary: { version: vocabulary.version, source: vocabulary.source, size: vocabulary.categories.length },
    history: {
      records: records.length,
      creators: index.creatorCount,
      records_without_creator: 0,
      records_with_history: 0,
      max_history_length: 0,
    },
  };
  const diagnostics: FeatureDiagnostics[] = [];
  const fallbacksByField: Counts = new Map();
  const fallbacksByKind: Counts = new Map();

  const result = await runWithStats(
    config.stats,
    async () => {
      try {
        for (let start = 0; start < records.length; start += config.batchSize) {
          const batch = records.slice(start, start + config.batchSize);
          const assembled = await mapWithConcurrency(batch, config.concurrency, async (record) => {
            const { summary } = index.historyFor(record);
            const detail = details.get(record.id);
            noteRecord(stats, record, summary.previous_projects_count, detail !== undefined);
            return assembler.assemble({ record, history: summary, detail });
          });
          await sink.insertMany(assembled.map((entry) => entry.vector));
          for (const entry of assembled) {
            stats.summary.assembled += 1;
            if (entry.diagnostics.fallbacks.length === 0) {
              continue;
            }
            stats.summary.with_fallbacks += 1;
            diagnostics.push(entry.diagnostics);
            for (const fallback of entry.diagnostics.fallbacks) {
              increment(fallbacksByField, fallback.field);
              increment(fallbacksByKind, fallback.kind);
            }
          }
          logger.debug(`Assembled ${Math.min(start + batch.length, records.length)}/${records.length}`);
        }
      } finally {
        await sink.close();
      }
      await writeJsonFile(config.diagnostics, { vocabulary_version: vocabulary.version, records: diagnostics });
    },
    () => ({
      ...stats,
      fallbacks_by_field: sortedCounts(fallbacksByField),
      fallbacks_by_kind: sortedCounts(fallbacksByKind),
    }),
  );
  logger.info(formatFeatureSummary(result));
  return { stats: result, outputPath: config.output, statsPath: config.stats };
}

export async function runFeatureStage(
  config: FeatureConfig,
  context: StageContext,
  services: FeatureServices,
): Promise<FeatureStageResult> {
  const { records, invalid } = await loadCuratedRecords(config.input);
  if (invalid > 0) {
    context.logger.warn(`Skipped ${invalid} invalid rows in ${config.input}`);
  }
  return assembleFeatures(records, config, services, context, invalid);
}

function noteRecord(
  stats: FeatureStats,
  record: CuratedCampaignRecord,
  historyLength: number,
  hasDetail: boolean,
): void {
  if (record.state === "successful") {
    stats.labels.successful += 1;
  } else {
    stats.labels.failed += 1;
  }
  if (hasDetail) {
    stats.details.with_details += 1;
  } else {
    stats.details.without_details += 1;
  }
  if (!record.creator_id) {
    stats.history.records_without_creator += 1;
  }
  if (historyLength > 0) {
    stats.history.records_with_history += 1;
    stats.history.max_history_length = Math.max(stats.history.max_history_length, historyLength);
  }
}
