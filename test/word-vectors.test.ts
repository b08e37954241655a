import test from "node:test";
import assert from "node:assert/strict";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { ExternalServiceError } from "../src/common/errors.js";
import {
  WordVectorTable,
  averageWordVectors,
  loadWordVectorTable,
  parseWordVectorLine,
} from "../src/features/wordVectors.js";
import { captureLogger, smallWordTable, withTempDir } from "./fixtures.js";

test("averages the vectors of known tokens", async () => {
  const table = smallWordTable();
  assert.deepEqual(await averageWordVectors(table, "Product Design"), [0.5, 0.5, 0]);
  assert.deepEqual(await averageWordVectors(table, "product unknownword"), [1, 0, 0]);
});

test("empty text or no known tokens gives the zero vector", async () => {
  const table = smallWordTable();
  assert.deepEqual(await averageWordVectors(table, ""), [0, 0, 0]);
  assert.deepEqual(await averageWordVectors(table, "zzz qqq"), [0, 0, 0]);
});

test("a wrong-width vector is a service error", async () => {
  const table = new WordVectorTable(3, new Map([["odd", [1, 2]]]));
  await assert.rejects(averageWordVectors(table, "odd"), ExternalServiceError);
});

test("parseWordVectorLine checks width and numbers", () => {
  assert.deepEqual(parseWordVectorLine("canada 0.1 -0.2 3", 3), { token: "canada", vector: [0.1, -0.2, 3] });
  assert.equal(parseWordVectorLine("canada 0.1 -0.2", 3), undefined);
  assert.equal(parseWordVectorLine("canada 0.1 x 3", 3), undefined);
});

test("loads a GloVe text table, optionally restricted to needed tokens", async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, "vectors.txt");
    await writeFile(path, ["the 0 0 1", "music 1 0 0", "broken 1 2", "", "games 0 1 0"].join("\n"));
    const { logger, lines } = captureLogger();

    const full = await loadWordVectorTable(path, { dimension: 3, logger });
    assert.equal(full.size, 3);
    assert.deepEqual(await full.lookup("music"), [1, 0, 0]);
    assert.match(lines[0], /Loaded 3 word vectors \(dim=3, skipped_lines=1\)/);

    const partial = await loadWordVectorTable(path, { dimension: 3, restrictTo: new Set(["games"]) });
    assert.equal(partial.size, 1);
    assert.equal(await partial.lookup("music"), undefined);
  });
});
