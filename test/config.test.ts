import test from "node:test";
import assert from "node:assert/strict";
import { join } from "node:path";
import { ConfigError, buildStageConfig, parseCliArgs } from "../src/config.js";

const featureEnv = {
  EMBEDDING_LONG_FORM_URL: "http://embeddings.local/long",
  EMBEDDING_SHORT_FORM_URL: "http://embeddings.local/short",
  WORD_VECTORS_PATH: "vectors/glove.txt",
};

test("parseCliArgs reads flags and values", () => {
  assert.deepEqual(parseCliArgs(["--input", "a.ndjson", "--report", "--stats", "s.json", "stray"]), {
    input: "a.ndjson",
    report: true,
    stats: "s.json",
  });
});

test("stage commands default to paths under data/", () => {
  assert.deepEqual(buildStageConfig(["filter"], {}), {
    command: "filter",
    config: {
      input: join("data", "deduplicated.ndjson"),
      output: join("data", "filtered.ndjson"),
      stats: join("data", "stats", "filter.json"),
    },
  });
  assert.deepEqual(buildStageConfig(["dedup", "--input", "dump.ndjson", "--report", "false"], {}), {
    command: "dedup",
    config: {
      input: "dump.ndjson",
      output: join("data", "deduplicated.ndjson"),
      stats: join("data", "stats", "dedup.json"),
      report: false,
    },
  });
});

test("a custom data directory moves every default", () => {
  const stage = buildStageConfig(["validate", "--data-dir", "out"], {});
  assert.deepEqual(stage, {
    command: "validate",
    config: { input: join("out", "features.json"), output: join("out", "stats", "validation.json") },
  });
});

test("feature config reads services from the environment", () => {
  const stage = buildStageConfig(["features", "--format", "ndjson", "--concurrency", "8"], {
    ...featureEnv,
    EMBEDDING_TIMEOUT_MS: "5000",
    EMBEDDING_API_KEY: "test-secret",
    FEATURE_CONCURRENCY: "2",
  });
  assert.equal(stage.command, "features");
  if (stage.command !== "features") {
    return;
  }
  assert.equal(stage.config.format, "ndjson");
  assert.equal(stage.config.concurrency, 8);
  assert.equal(stage.config.batchSize, 100);
  assert.equal(stage.config.vocabulary, undefined);
  assert.deepEqual(stage.config.embedding, {
    longFormUrl: "http://embeddings.local/long",
    shortFormUrl: "http://embeddings.local/short",
    timeoutMs: 5000,
    apiKey: "test-secret",
  });
  assert.deepEqual(stage.config.wordVectors, { path: "vectors/glove.txt", dimension: 100 });
});

test("env concurrency applies when no flag is given", () => {
  const stage = buildStageConfig(["run"], { ...featureEnv, FEATURE_CONCURRENCY: "2" });
  assert.equal(stage.command, "run");
  if (stage.command !== "run") {
    return;
  }
  assert.equal(stage.config.features.concurrency, 2);
  assert.equal(stage.config.features.embedding.timeoutMs, 30_000);
  assert.equal(stage.config.dedup.input, join("data", "raw.ndjson"));
  assert.equal(stage.config.validate.input, stage.config.features.output);
});

test("invalid configuration is rejected", () => {
  assert.throws(() => buildStageConfig(["train"], {}), ConfigError);
  assert.throws(() => buildStageConfig([], {}), /Unknown command ""/);
  assert.throws(
    () => buildStageConfig(["features"], { ...featureEnv, EMBEDDING_LONG_FORM_URL: "not a url" }),
    /embedding\.longFormUrl/,
  );
  assert.throws(() => buildStageConfig(["features", "--concurrency", "zero"], featureEnv), /concurrency/);
  assert.throws(() => buildStageConfig(["features", "--format", "csv"], featureEnv), /format/);
  assert.throws(
    () => buildStageConfig(["features"], { ...featureEnv, WORD_VECTORS_PATH: undefined }),
    /wordVectors\.path/,
  );
});

test("features side files follow --output", () => {
  const stage = buildStageConfig(["features", "--output", join("exports", "features.ndjson")], featureEnv);
  assert.equal(stage.command, "features");
  if (stage.command !== "features") {
    return;
  }
  assert.equal(stage.config.vocabularyOutput, join("exports", "category_vocabulary.json"));
  assert.equal(stage.config.diagnostics, join("exports", "feature_diagnostics.json"));
  assert.equal(stage.config.stats, join("data", "stats", "features.json"));

  const pinned = buildStageConfig(
    ["features", "--output", join("exports", "features.json"), "--vocabulary-output", "vocab.json"],
    featureEnv,
  );
  assert.equal(pinned.command === "features" ? pinned.config.vocabularyOutput : undefined, "vocab.json");
});

test("analyze reads the web database and writes one report", () => {
  assert.deepEqual(buildStageConfig(["analyze"], {}), {
    command: "analyze",
    config: {
      input: join("data", "web_database.json"),
      output: join("data", "stats", "analytics.json"),
      category: undefined,
      sortBy: "projects",
      endDate: undefined,
      top: 5,
    },
  });
  const stage = buildStageConfig(
    ["analyze", "--category", "games", "--sort", "funds", "--end-date", "12/12/2024", "--top", "3"],
    {},
  );
  assert.equal(stage.command, "analyze");
  if (stage.command !== "analyze") {
    return;
  }
  assert.equal(stage.config.category, "games");
  assert.equal(stage.config.sortBy, "funds");
  assert.equal(stage.config.endDate, 1_733_961_600);
  assert.equal(stage.config.top, 3);

  assert.throws(() => buildStageConfig(["analyze", "--end-date", "2024-12-12"], {}), /endDate/);
  assert.throws(() => buildStageConfig(["analyze", "--sort", "backers"], {}), /sortBy/);
});
