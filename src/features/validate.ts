import { variance } from "../common/math.js";
import { asRecord, idOrUndefined, increment, sortedCounts, type Counts } from "../common/records.js";

export const EMBEDDING_FIELDS = [
  "description_embedding",
  "blurb_embedding",
  "risk_embedding",
  "category_embedding",
  "subcategory_embedding",
  "country_embedding",
] as const;

export type EmbeddingField = (typeof EMBEDDING_FIELDS)[number];

export type EmbeddingProblem =
  | "missing"
  | "not_numeric"
  | "empty"
  | "all_zeros"
  | "all_identical"
  | "non_finite"
  | "low_variance";

export const LOW_VARIANCE_THRESHOLD = 1e-6;

export interface EmbeddingIssue {
  field: EmbeddingField;
  problem: EmbeddingProblem;
}

export interface ValidationReport {
  summary: {
    records: number;
    records_without_id: number;
    records_with_issues: number;
    malformed_lines: number;
  };
  problems: Record<string, number>;
  by_field: Record<string, number>;
  campaigns: Record<string, string[]>;
}

export function checkEmbedding(value: unknown): EmbeddingProblem[] {
  if (value === undefined || value === null) {
    return ["missing"];
  }
  if (!Array.isArray(value)) {
    return ["not_numeric"];
  }
  if (value.length === 0) {
    return ["empty"];
  }
  const numbers: number[] = [];
  for (const item of value) {
    if (typeof item !== "number") {
      return ["not_numeric"];
    }
    numbers.push(item);
  }

  const problems: EmbeddingProblem[] = [];
  if (numbers.every((item) => item === 0)) {
    problems.push("all_zeros");
  }
  if (numbers.every((item) => item === numbers[0])) {
    problems.push("all_identical");
  }
  if (numbers.some((item) => !Number.isFinite(item))) {
    problems.push("non_finite");
    return problems;
  }
  if (variance(numbers) < LOW_VARIANCE_THRESHOLD) {
    problems.push("low_variance");
  }
  return problems;
}

export function checkFeatureRecord(record: unknown): EmbeddingIssue[] {
  const row = asRecord(record) ?? {};
  const issues: EmbeddingIssue[] = [];
  for (const field of EMBEDDING_FIELDS) {
    for (const problem of checkEmbedding(row[field])) {
      issues.push({ field, problem });
    }
  }
  return issues;
}

/**
 * Audits feature rows for degenerate embeddings, one row at a time so a
 * feature file never has to fit in memory. Rows without an id are counted and skipped.
 */
export class FeatureValidator {
  private readonly summary = { records: 0, records_without_id: 0, records_with_issues: 0, malformed_lines: 0 };
  private readonly problems: Counts = new Map();
  private readonly byField: Counts = new Map();
  private readonly campaigns = new Map<string, string[]>();

  check(record: unknown): void {
    this.summary.records += 1;
    const id = idOrUndefined(asRecord(record)?.id);
    if (!id) {
      this.summary.records_without_id += 1;
      return;
    }
    const issues = checkFeatureRecord(record);
    if (issues.length === 0) {
      return;
    }
    this.summary.records_with_issues += 1;
    this.campaigns.set(
      id,
      issues.map((issue) => `${issue.field}: ${issue.problem}`),
    );
    for (const issue of issues) {
      increment(this.problems, issue.problem);
      increment(this.byField, issue.field);
    }
  }

  noteMalformed(count = 1): void {
    this.summary.malformed_lines += count;
  }

  report(): ValidationReport {
    return {
      summary: { ...this.summary },
      problems: sortedCounts(this.problems),
      by_field: sortedCounts(this.byField),
      campaigns: Object.fromEntries(this.campaigns),
    };
  }
}

export function validateFeatureRecords(records: readonly unknown[], malformedLines = 0): ValidationReport {
  const validator = new FeatureValidator();
  for (const record of records) {
    validator.check(record);
  }
  validator.noteMalformed(malformedLines);
  return validator.report();
}
