import { FeatureValidator, type ValidationReport } from "../features/validate.js";
import { streamJsonRecords, writeJsonFile } from "../io/files.js";
import type { ValidateConfig } from "../types.js";
import type { StageContext, StageResult } from "./context.js";
import { formatValidationSummary } from "./summary.js";

export async function runValidateStage(
  config: ValidateConfig,
  context: StageContext,
): Promise<StageResult<ValidationReport>> {
  const logger = context.logger.child("validate");
  const validator = new FeatureValidator();
  for await (const entry of streamJsonRecords(config.input)) {
    if (entry.status === "malformed") {
      validator.noteMalformed();
      logger.debug(`Malformed feature line: ${entry.line.slice(0, 80)}`);
      continue;
    }
    validator.check(entry.value);
  }
  const report = validator.report();
  await writeJsonFile(config.output, report);
  logger.info(formatValidationSummary(report));
  for (const [id, problems] of Object.entries(report.campaigns).slice(0, 20)) {
    logger.debug(`Campaign ${id}: ${problems.join("; ")}`);
  }
  return { stats: report, outputPath: config.output };
}
