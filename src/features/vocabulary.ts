import { createHash } from "node:crypto";
import { z } from "zod";
import { ConfigError } from "../config.js";
import { readJsonFile } from "../io/files.js";
import type { CategoryVocabulary, CuratedCampaignRecord } from "../types.js";

const vocabularyFileSchema = z.object({
  version: z.string().min(1),
  categories: z
    .array(z.string())
    .min(1)
    .refine((categories) => new Set(categories).size === categories.length, {
      message: "categories must be distinct",
    }),
});

/** Sorted distinct categories of the batch, frozen for the rest of the run. */
export function deriveVocabulary(records: Iterable<Pick<CuratedCampaignRecord, "category">>): CategoryVocabulary {
  const distinct = new Set<string>();
  for (const record of records) {
    distinct.add(record.category);
  }
  const categories = Object.freeze([...distinct].sort());
  return Object.freeze({
    version: `batch-${hashCategories(categories)}`,
    source: "batch",
    categories,
  });
}

/** A pinned vocabulary keeps the file's order, so appending a category leaves earlier columns in place. */
export async function loadVocabulary(path: string): Promise<CategoryVocabulary> {
  const parsed = vocabularyFileSchema.safeParse(await readJsonFile(path));
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigError(`Invalid vocabulary file ${path}: ${details.join("; ")}`);
  }
  const categories = Object.freeze([...parsed.data.categories]);
  return Object.freeze({ version: parsed.data.version, source: "config", categories });
}

export function vocabularyFile(vocabulary: CategoryVocabulary): { version: string; categories: string[] } {
  return { version: vocabulary.version, categories: [...vocabulary.categories] };
}

/** One-hot row; an out-of-vocabulary category gives an all-zero row. */
export function oneHot(vocabulary: CategoryVocabulary, category: string): number[] {
  return vocabulary.categories.map((entry) => (entry === category ? 1 : 0));
}

export function hasCategory(vocabulary: CategoryVocabulary, category: string): boolean {
  return vocabulary.categories.includes(category);
}

function hashCategories(categories: readonly string[]): string {
  return createHash("sha256").update(categories.join("\n")).digest("hex").slice(0, 12);
}
