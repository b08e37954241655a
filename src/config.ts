import { dirname, join } from "node:path";
import { z } from "zod";
import { parseDisplayDate } from "./curate/webRecord.js";
import type {
  AnalyzeConfig,
  Command,
  DedupConfig,
  FeatureConfig,
  RunAllConfig,
  StageConfig,
  StagePaths,
  ValidateConfig,
} from "./types.js";

export const COMMANDS: readonly Command[] = [
  "dedup",
  "filter",
  "web-db",
  "history",
  "features",
  "validate",
  "analyze",
  "run",
];

const pathSchema = z.string().trim().min(1);

const stagePathsSchema = z.object({
  input: pathSchema,
  output: pathSchema,
  stats: pathSchema,
});

const dedupSchema = stagePathsSchema.extend({ report: z.boolean() });

const featureSchema = stagePathsSchema.extend({
  format: z.enum(["json", "ndjson"]),
  vocabulary: pathSchema.optional(),
  vocabularyOutput: pathSchema,
  details: pathSchema.optional(),
  diagnostics: pathSchema,
  concurrency: z.number().int().min(1).max(64),
  batchSize: z.number().int().min(1).max(10_000),
  embedding: z.object({
    longFormUrl: z.string().url(),
    shortFormUrl: z.string().url(),
    timeoutMs: z.number().int().min(100).max(600_000),
    apiKey: z.string().min(1).optional(),
  }),
  wordVectors: z.object({
    path: pathSchema,
    dimension: z.number().int().min(1).max(4096),
  }),
});

const validateSchema = z.object({ input: pathSchema, output: pathSchema });

const analyzeSchema = z.object({
  input: pathSchema,
  output: pathSchema,
  category: z.string().trim().min(1).optional(),
  sortBy: z.enum(["projects", "funds"]),
  endDate: z.number().int().min(0).optional(),
  top: z.number().int().min(1).max(100),
});

const DEFAULTS = {
  dataDir: "data",
  format: "json",
  concurrency: 4,
  batchSize: 100,
  embeddingTimeoutMs: 30_000,
  wordVectorDimension: 100,
  report: true,
  analyticsTop: 5,
} as const;

/** File layout of one run below a data directory. */
export function defaultPaths(dataDir: string) {
  return {
    raw: join(dataDir, "raw.ndjson"),
    deduplicated: join(dataDir, "deduplicated.ndjson"),
    filtered: join(dataDir, "filtered.ndjson"),
    webDatabase: join(dataDir, "web_database.json"),
    history: join(dataDir, "web_database_history.json"),
    features: join(dataDir, "features.json"),
    vocabulary: join(dataDir, "category_vocabulary.json"),
    diagnostics: join(dataDir, "feature_diagnostics.json"),
    validation: join(dataDir, "stats", "validation.json"),
    analytics: join(dataDir, "stats", "analytics.json"),
    stats: {
      dedup: join(dataDir, "stats", "dedup.json"),
      filter: join(dataDir, "stats", "filter.json"),
      webDatabase: join(dataDir, "stats", "web_database.json"),
      history: join(dataDir, "stats", "history.json"),
      features: join(dataDir, "stats", "features.json"),
    },
  };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type CliRaw = Record<string, string | boolean>;

export function buildStageConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): StageConfig {
  const [command, ...rest] = argv;
  if (!isCommand(command)) {
    throw new ConfigError(
      `Unknown command "${command ?? ""}". Expected one of: ${COMMANDS.join(", ")}.`,
    );
  }
  const args = parseCliArgs(rest);
  const paths = defaultPaths(readString(args, "data-dir", DEFAULTS.dataDir));

  switch (command) {
    case "dedup":
      return { command, config: buildDedupConfig(args, paths.raw, paths.deduplicated, paths.stats.dedup) };
    case "filter":
      return {
        command,
        config: validated(stagePathsSchema, readStagePaths(args, paths.deduplicated, paths.filtered, paths.stats.filter)),
      };
    case "web-db":
      return {
        command,
        config: validated(
          stagePathsSchema,
          readStagePaths(args, paths.filtered, paths.webDatabase, paths.stats.webDatabase),
        ),
      };
    case "history":
      return {
        command,
        config: validated(stagePathsSchema, readStagePaths(args, paths.webDatabase, paths.history, paths.stats.history)),
      };
    case "features": {
      const output = readString(args, "output", paths.features);
      // Vocabulary and diagnostics follow the features file unless set explicitly.
      const beside = defaultPaths(dirname(output));
      return {
        command,
        config: buildFeatureConfig(args, env, {
          input: readString(args, "input", paths.webDatabase),
          output,
          stats: readString(args, "stats", paths.stats.features),
          vocabularyOutput: beside.vocabulary,
          diagnostics: beside.diagnostics,
        }),
      };
    }
    case "validate":
      return {
        command,
        config: validated(validateSchema, {
          input: readString(args, "input", paths.features),
          output: readString(args, "output", paths.validation),
        }),
      };
    case "analyze":
      return { command, config: buildAnalyzeConfig(args, paths.webDatabase, paths.analytics) };
    case "run":
      return { command, config: buildRunAllConfig(args, env, paths) };
  }
}

function buildDedupConfig(args: CliRaw, input: string, output: string, stats: string): DedupConfig {
  return validated(dedupSchema, {
    ...readStagePaths(args, input, output, stats),
    report: readBool(args, "report", DEFAULTS.report),
  });
}

function buildAnalyzeConfig(args: CliRaw, input: string, output: string): AnalyzeConfig {
  const endDate = readOptionalString(args, "end-date");
  return validated(analyzeSchema, {
    input: readString(args, "input", input),
    output: readString(args, "output", output),
    category: readOptionalString(args, "category"),
    sortBy: readString(args, "sort", "projects"),
    // An unparseable date becomes NaN so the schema reports it under endDate.
    endDate: endDate === undefined ? undefined : parseDisplayDate(endDate) ?? Number.NaN,
    top: readInt(args, "top", DEFAULTS.analyticsTop),
  });
}

function buildFeatureConfig(
  args: CliRaw,
  env: NodeJS.ProcessEnv,
  defaults: StagePaths & { vocabularyOutput: string; diagnostics: string },
): FeatureConfig {
  const format = readString(args, "format", DEFAULTS.format);
  return validated(featureSchema, {
    input: defaults.input,
    output: defaults.output,
    stats: defaults.stats,
    format,
    vocabulary: readOptionalString(args, "vocabulary") ?? emptyToUndefined(env.CATEGORY_VOCABULARY_PATH),
    vocabularyOutput: readString(args, "vocabulary-output", defaults.vocabularyOutput),
    details: readOptionalString(args, "details"),
    diagnostics: readString(args, "diagnostics", defaults.diagnostics),
    concurrency: readInt(args, "concurrency", readEnvInt(env, "FEATURE_CONCURRENCY", DEFAULTS.concurrency)),
    batchSize: readInt(args, "batch-size", DEFAULTS.batchSize),
    embedding: {
      longFormUrl: env.EMBEDDING_LONG_FORM_URL ?? "",
      shortFormUrl: env.EMBEDDING_SHORT_FORM_URL ?? "",
      timeoutMs: readEnvInt(env, "EMBEDDING_TIMEOUT_MS", DEFAULTS.embeddingTimeoutMs),
      apiKey: emptyToUndefined(env.EMBEDDING_API_KEY),
    },
    wordVectors: {
      path: readOptionalString(args, "word-vectors") ?? env.WORD_VECTORS_PATH ?? "",
      dimension: readEnvInt(env, "WORD_VECTOR_DIMENSION", DEFAULTS.wordVectorDimension),
    },
  });
}

function buildRunAllConfig(
  args: CliRaw,
  env: NodeJS.ProcessEnv,
  paths: ReturnType<typeof defaultPaths>,
): RunAllConfig {
  const features = buildFeatureConfig(args, env, {
    input: paths.webDatabase,
    output: paths.features,
    stats: paths.stats.features,
    vocabularyOutput: paths.vocabulary,
    diagnostics: paths.diagnostics,
  });
  return {
    dedup: validated(dedupSchema, {
      input: readString(args, "input", paths.raw),
      output: paths.deduplicated,
      stats: paths.stats.dedup,
      report: readBool(args, "report", DEFAULTS.report),
    }),
    filter: { input: paths.deduplicated, output: paths.filtered, stats: paths.stats.filter },
    webDatabase: { input: paths.filtered, output: paths.webDatabase, stats: paths.stats.webDatabase },
    history: { input: paths.webDatabase, output: paths.history, stats: paths.stats.history },
    features,
    validate: { input: features.output, output: paths.validation } satisfies ValidateConfig,
  };
}

function validated<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (parsed.success) {
    return parsed.data;
  }
  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
  throw new ConfigError(`Invalid configuration: ${issues}`);
}

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((command) => command === value);
}

function readStagePaths(args: CliRaw, input: string, output: string, stats: string): StagePaths {
  return {
    input: readString(args, "input", input),
    output: readString(args, "output", output),
    stats: readString(args, "stats", stats),
  };
}

export function parseCliArgs(argv: string[]): CliRaw {
  const out: CliRaw = {};
  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith("--")) {
      continue;
    }
    const key = token.slice(2);
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) {
      out[key] = true;
      continue;
    }
    out[key] = next;
    i += 1;
  }
  return out;
}

function readString(args: CliRaw, key: string, fallback: string): string {
  const value = args[key];
  if (typeof value === "string") {
    return value;
  }
  return fallback;
}

function readOptionalString(args: CliRaw, key: string): string | undefined {
  const value = args[key];
  return typeof value === "string" ? value : undefined;
}

function readInt(args: CliRaw, key: string, fallback: number): number {
  const value = args[key];
  if (typeof value !== "string") {
    return fallback;
  }
  return Number.parseInt(value, 10);
}

function readBool(args: CliRaw, key: string, fallback: boolean): boolean {
  const value = args[key];
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value !== "string") {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  return fallback;
}

function readEnvInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (!raw) {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    return fallback;
  }
  return parsed;
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value && value.trim() ? value : undefined;
}
