import test from "node:test";
import assert from "node:assert/strict";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { FatalIOError } from "../src/common/errors.js";
import { ProjectDetailIndex, loadProjectDetails } from "../src/features/details.js";
import { withTempDir } from "./fixtures.js";

test("detail rows are keyed by id with defaults for absent fields", () => {
  const index = ProjectDetailIndex.fromRecords([
    { id: 10, description: "Long text.", risk: "Risky.", image_count: 3, video_count: "2" },
    { id: "11", description: null },
    { id: 10, description: "second copy" },
    { description: "no id" },
    "not an object",
  ]);

  assert.deepEqual(index.get("10"), {
    id: "10",
    description: "Long text.",
    risk: "Risky.",
    image_count: 3,
    video_count: 2,
  });
  assert.deepEqual(index.get("11"), { id: "11", description: "", risk: "", image_count: 0, video_count: 0 });
  assert.equal(index.get("12"), undefined);
  assert.deepEqual(index.stats, { loaded: 2, invalid: 2, malformed_lines: 0, duplicates: 1 });
});

test("loads a JSON array file", async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, "details.json");
    await writeFile(path, JSON.stringify([{ id: 1, description: "A." }, { id: 2, risk: "B." }]));
    const index = await loadProjectDetails(path);
    assert.equal(index.size, 2);
    assert.equal(index.get("2")?.risk, "B.");
  });
});

test("loads ndjson and counts malformed lines", async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, "details.ndjson");
    await writeFile(path, ['{"id": 1, "image_count": 5}', "{broken", "", '{"id": 2}'].join("\n"));
    const index = await loadProjectDetails(path);
    assert.equal(index.size, 2);
    assert.equal(index.get("1")?.image_count, 5);
    assert.equal(index.stats.malformed_lines, 1);
  });
});

test("a missing file is fatal", async () => {
  await withTempDir(async (dir) => {
    await assert.rejects(loadProjectDetails(join(dir, "absent.json")), FatalIOError);
  });
});
