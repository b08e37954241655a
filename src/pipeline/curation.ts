import { DedupEngine, DuplicateReporter, type DuplicateStats } from "../curate/dedup.js";
import { StateFilter, type FilterStats } from "../curate/stateFilter.js";
import { StatePolicy } from "../curate/statePolicy.js";
import { WebRecordNormalizer, type WebDatabaseStats } from "../curate/webRecord.js";
import { assertReadable, NdjsonWriter, writeJsonFile } from "../io/files.js";
import type {
  CuratedCampaignRecord,
  DedupConfig,
  FilterConfig,
  WebDatabaseConfig,
} from "../types.js";
import { logMalformed, readRawRecords, runWithStats, type StageContext, type StageResult } from "./context.js";
import { formatDedupSummary, formatFilterSummary, formatWebDatabaseSummary } from "./summary.js";

export function createDedupEngine(report: boolean): DedupEngine {
  return new DedupEngine({ reporter: report ? new DuplicateReporter() : undefined });
}

export async function runDedupStage(config: DedupConfig, context: StageContext): Promise<StageResult<DuplicateStats>> {
  const logger = context.logger.child("dedup");
  await assertReadable(config.input);
  const engine = createDedupEngine(config.report);
  const writer = await NdjsonWriter.open(config.output);

  const stats = await runWithStats(
    config.stats,
    async () => {
      try {
        for await (const line of readRawRecords(config.input)) {
          if (line.status === "malformed") {
            engine.noteMalformed();
            logMalformed(logger, line.error);
            continue;
          }
          const decision = engine.process(line.record);
          if (decision.action === "keep") {
            await writer.write(line.record);
          }
        }
      } finally {
        await writer.close();
      }
    },
    () => engine.stats(),
  );
  logger.info(formatDedupSummary(stats));
  return { stats, outputPath: config.output, statsPath: config.stats };
}

export async function runFilterStage(config: FilterConfig, context: StageContext): Promise<StageResult<FilterStats>> {
  const logger = context.logger.child("filter");
  await assertReadable(config.input);
  const filter = new StateFilter(new StatePolicy());
  const writer = await NdjsonWriter.open(config.output);

  const stats = await runWithStats(
    config.stats,
    async () => {
      try {
        for await (const line of readRawRecords(config.input)) {
          if (line.status === "malformed") {
            filter.noteMalformed();
            logMalformed(logger, line.error);
            continue;
          }
          const outcome = filter.apply(line.record);
          if (outcome.status === "included") {
            await writer.write(outcome.record);
          } else {
            logger.debug(`Excluded campaign at line ${line.lineNumber}: ${outcome.decision.reason}`);
          }
        }
      } finally {
        await writer.close();
      }
    },
    () => filter.stats(),
  );
  logger.info(formatFilterSummary(stats));
  return { stats, outputPath: config.output, statsPath: config.stats };
}

export interface WebDatabaseResult extends StageResult<WebDatabaseStats> {
  records: CuratedCampaignRecord[];
}

export async function runWebDatabaseStage(
  config: WebDatabaseConfig,
  context: StageContext,
): Promise<WebDatabaseResult> {
  const logger = context.logger.child("web-db");
  await assertReadable(config.input);
  const normalizer = new WebRecordNormalizer(new StatePolicy());
  const records: CuratedCampaignRecord[] = [];

  const stats = await runWithStats(
    config.stats,
    async () => {
      for await (const line of readRawRecords(config.input)) {
        if (line.status === "malformed") {
          normalizer.noteMalformed();
          logMalformed(logger, line.error);
          continue;
        }
        const result = normalizer.normalize(line.record);
        if (result.status === "curated") {
          records.push(result.record);
        } else if (result.error) {
          logger.debug(`Excluded campaign at line ${line.lineNumber}: ${result.error.message}`);
        }
      }
      await writeJsonFile(config.output, records);
    },
    () => normalizer.stats(),
  );
  logger.info(formatWebDatabaseSummary(stats));
  return { stats, records, outputPath: config.output, statsPath: config.stats };
}

export interface CurationPassResult {
  records: CuratedCampaignRecord[];
  dedup: DuplicateStats;
  filter: FilterStats;
  webDatabase: WebDatabaseStats;
}

/**
 * Dedup, filter and web database in a single read of the raw dump. Each stage
 * still writes its own output and stats file. The filter's decision is handed
 * to the normalizer so state exclusion runs once per record.
 */
export async function runCurationPass(
  configs: { dedup: DedupConfig; filter: FilterConfig; webDatabase: WebDatabaseConfig },
  context: StageContext,
): Promise<CurationPassResult> {
  const logger = context.logger.child("curate");
  await assertReadable(configs.dedup.input);
  const policy = new StatePolicy();
  const engine = createDedupEngine(configs.dedup.report);
  const filter = new StateFilter(policy);
  const normalizer = new WebRecordNormalizer(policy);
  const records: CuratedCampaignRecord[] = [];
  const deduplicated = await NdjsonWriter.open(configs.dedup.output);
  const filtered = await NdjsonWriter.open(configs.filter.output);

  const persistStats = async (): Promise<void> => {
    await writeJsonFile(configs.dedup.stats, engine.stats());
    await writeJsonFile(configs.filter.stats, filter.stats());
    await writeJsonFile(configs.webDatabase.stats, normalizer.stats());
  };

  try {
    try {
      for await (const line of readRawRecords(configs.dedup.input)) {
        if (line.status === "malformed") {
          engine.noteMalformed();
          logMalformed(logger, line.error);
          continue;
        }
        if (engine.process(line.record).action === "duplicate") {
          continue;
        }
        await deduplicated.write(line.record);
        const outcome = filter.apply(line.record);
        if (outcome.status === "excluded") {
          continue;
        }
        await filtered.write(outcome.record);
        const result = normalizer.normalize(outcome.record, outcome.decision);
        if (result.status === "curated") {
          records.push(result.record);
        }
      }
    } finally {
      await deduplicated.close();
      await filtered.close();
    }
    await writeJsonFile(configs.webDatabase.output, records);
  } catch (error) {
    await persistStats();
    throw error;
  }
  await persistStats();

  const result = {
    records,
    dedup: engine.stats(),
    filter: filter.stats(),
    webDatabase: normalizer.stats(),
  };
  logger.info(formatDedupSummary(result.dedup));
  logger.info(formatFilterSummary(result.filter));
  logger.info(formatWebDatabaseSummary(result.webDatabase));
  return result;
}
