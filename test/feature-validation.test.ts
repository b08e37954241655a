import test from "node:test";
import assert from "node:assert/strict";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { checkEmbedding, validateFeatureRecords } from "../src/features/validate.js";
import { runValidateStage } from "../src/pipeline.js";
import { JsonArraySink } from "../src/sinks/index.js";
import type { FeatureVector } from "../src/types.js";
import { captureLogger, withTempDir } from "./fixtures.js";

function healthyRow(id: number | string) {
  return {
    id,
    description_embedding: [0.1, 0.5, -0.3],
    blurb_embedding: [0.2, -0.4, 0.9],
    risk_embedding: [1, 0, -1],
    category_embedding: [0, 1, 0, 0],
    subcategory_embedding: [0.3, 0.1, 0.7],
    country_embedding: [0.8, -0.2, 0.4],
  };
}

test("checkEmbedding flags degenerate vectors", () => {
  assert.deepEqual(checkEmbedding(undefined), ["missing"]);
  assert.deepEqual(checkEmbedding([]), ["empty"]);
  assert.deepEqual(checkEmbedding("0,0"), ["not_numeric"]);
  assert.deepEqual(checkEmbedding([0, 0, 0]), ["all_zeros", "all_identical", "low_variance"]);
  assert.deepEqual(checkEmbedding([2, 2]), ["all_identical", "low_variance"]);
  assert.deepEqual(checkEmbedding([1, Number.NaN]), ["non_finite"]);
  assert.deepEqual(checkEmbedding([0.5, 0.5001]), ["low_variance"]);
  assert.deepEqual(checkEmbedding([0.1, 0.9]), []);
});

test("report maps campaign ids to problems and counts them", () => {
  const report = validateFeatureRecords(
    [
      healthyRow(1),
      { ...healthyRow(2), risk_embedding: new Array<number>(384).fill(0) },
      { ...healthyRow("3"), country_embedding: undefined, blurb_embedding: [] },
      { description_embedding: [1, 2] },
    ],
    2,
  );

  assert.deepEqual(report.summary, {
    records: 4,
    records_without_id: 1,
    records_with_issues: 2,
    malformed_lines: 2,
  });
  assert.deepEqual(report.campaigns, {
    "2": ["risk_embedding: all_zeros", "risk_embedding: all_identical", "risk_embedding: low_variance"],
    "3": ["blurb_embedding: empty", "country_embedding: missing"],
  });
  assert.deepEqual(report.problems, { all_identical: 1, all_zeros: 1, empty: 1, low_variance: 1, missing: 1 });
  assert.deepEqual(report.by_field, { blurb_embedding: 1, country_embedding: 1, risk_embedding: 3 });
});

function featureRow(id: string, blurb: number[]): FeatureVector {
  return {
    id,
    description_embedding: [0.1, 0.5, -0.3],
    blurb_embedding: blurb,
    risk_embedding: [1, 0, -1],
    category_embedding: [0, 1, 0, 0],
    subcategory_embedding: [0.3, 0.1, 0.7],
    country_embedding: [0.8, -0.2, 0.4],
    funding_goal_log: 3,
    previous_funding_goal_log: 0,
    previous_pledged_log: 0,
    previous_success_rate: 0,
    description_length: 10,
    image_count: 0,
    video_count: 0,
    campaign_duration: 30,
    previous_projects_count: 0,
    state: 1,
  };
}

test("validate stage reads a sink-written feature file row by row", async () => {
  await withTempDir(async (dir) => {
    const input = join(dir, "features.json");
    const output = join(dir, "stats", "validation.json");
    const sink = new JsonArraySink(input);
    for (let batch = 0; batch < 3; batch += 1) {
      const rows: FeatureVector[] = [];
      for (let i = 0; i < 4; i += 1) {
        const id = `${batch}-${i}`;
        rows.push(featureRow(id, i === 0 ? [0, 0, 0] : [0.2, -0.4, 0.9]));
      }
      await sink.insertMany(rows);
    }
    await sink.close();

    const { logger } = captureLogger();
    const result = await runValidateStage({ input, output }, { logger });

    assert.deepEqual(result.stats.summary, {
      records: 12,
      records_without_id: 0,
      records_with_issues: 3,
      malformed_lines: 0,
    });
    assert.deepEqual(Object.keys(result.stats.campaigns), ["0-0", "1-0", "2-0"]);
    assert.deepEqual(result.stats.by_field, { blurb_embedding: 9 });
    assert.deepEqual(JSON.parse(await readFile(output, "utf8")), result.stats);
  });
});

test("campaign ids that name object members get their own entry", () => {
  const report = validateFeatureRecords([
    { ...healthyRow("constructor"), blurb_embedding: [] },
    { ...healthyRow("__proto__"), risk_embedding: [] },
  ]);
  assert.deepEqual(Object.entries(report.campaigns), [
    ["constructor", ["blurb_embedding: empty"]],
    ["__proto__", ["risk_embedding: empty"]],
  ]);
});
