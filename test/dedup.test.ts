import test from "node:test";
import assert from "node:assert/strict";
import { DedupEngine, Deduper, DuplicateReporter } from "../src/curate/dedup.js";
import { parseRawLine } from "../src/curate/rawRecord.js";
import { MalformedInputError } from "../src/common/errors.js";
import type { RawCampaignRecord } from "../src/types.js";
import { makeRaw } from "./fixtures.js";

function dedup(records: RawCampaignRecord[], engine = new DedupEngine()): RawCampaignRecord[] {
  return records.filter((record) => engine.process(record).action === "keep");
}

const sample: RawCampaignRecord[] = [
  makeRaw({ id: 1, name: "Lamp", state: "successful", creator: { id: 9 } }),
  makeRaw({ id: 2, name: "Board Game", state: "failed", creator: { id: 9 } }),
  makeRaw({ id: 1, name: "Lamp (rescrape)", state: "successful" }),
  makeRaw({ id: "3", name: "lamp", state: "live" }),
  makeRaw({ id: 2, name: "Board Game", state: "failed" }),
  makeRaw({ id: 1, name: "Lamp", state: "successful" }),
];

test("Deduper keeps the first occurrence of an id", () => {
  const deduper = new Deduper();
  assert.equal(deduper.check("7"), "keep");
  assert.equal(deduper.check("7"), "duplicate");
  assert.equal(deduper.check("8"), "keep");
  assert.equal(deduper.size, 2);
});

test("DedupEngine drops later occurrences and keeps input order", () => {
  const kept = dedup(sample);
  assert.deepEqual(
    kept.map((record) => record.data.name),
    ["Lamp", "Board Game", "lamp"],
  );
});

test("dedup is idempotent", () => {
  const once = dedup(sample);
  const twice = dedup(once);
  assert.deepEqual(twice, once);
});

test("numeric and string ids compare equal", () => {
  const engine = new DedupEngine();
  assert.equal(engine.process(makeRaw({ id: 42 })).action, "keep");
  assert.deepEqual(engine.process(makeRaw({ id: "42" })), { action: "duplicate", id: "42" });
});

test("records without an id are kept and counted", () => {
  const engine = new DedupEngine();
  assert.deepEqual(engine.process(makeRaw({ name: "no id", state: "failed" })), { action: "keep" });
  assert.deepEqual(engine.process(makeRaw({ name: "no id", state: "failed" })), { action: "keep" });
  const stats = engine.stats();
  assert.equal(stats.missing_id, 2);
  assert.equal(stats.unique_remaining, 2);
  assert.equal(stats.duplicates_removed, 0);
});

test("stats report totals, states and duplicate groups", () => {
  const engine = new DedupEngine({ reporter: new DuplicateReporter() });
  dedup(sample, engine);
  engine.noteMalformed();
  const stats = engine.stats();

  assert.equal(stats.total, 7);
  assert.equal(stats.malformed, 1);
  assert.equal(stats.duplicates_removed, 3);
  assert.equal(stats.unique_remaining, 3);
  assert.deepEqual(stats.by_state, { failed: 1, live: 1, successful: 1 });
  assert.deepEqual(
    stats.groups.map((group) => [group.id, group.occurrences]),
    [
      ["1", 3],
      ["2", 2],
    ],
  );
  assert.deepEqual(
    stats.groups[0].member_summaries.map((member) => member.name),
    ["Lamp", "Lamp (rescrape)", "Lamp"],
  );
  // "Lamp" and "lamp" share a lowercase name; ids 1 and 2 share creator 9.
  assert.deepEqual(stats.secondary_groups, { name: 1, url: 0, creator: 1 });
});

test("without a reporter no groups are collected", () => {
  const engine = new DedupEngine();
  dedup(sample, engine);
  const stats = engine.stats();
  assert.deepEqual(stats.groups, []);
  assert.equal(stats.secondary_groups, undefined);
});

test("parseRawLine rejects non-object lines", () => {
  assert.throws(() => parseRawLine("{not json", 3), MalformedInputError);
  assert.throws(() => parseRawLine("[1,2]", 4), /line 4: expected a JSON object/);
  assert.deepEqual(parseRawLine('{"source":"x"}', 5), { source: "x", data: {} });
});
