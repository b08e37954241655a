import test from "node:test";
import assert from "node:assert/strict";
import { existsSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { FatalIOError } from "../src/common/errors.js";
import { NdjsonWriter, streamJsonRecords, type JsonRecordLine } from "../src/io/files.js";
import { withTempDir } from "./fixtures.js";

async function collect(path: string): Promise<JsonRecordLine[]> {
  const out: JsonRecordLine[] = [];
  for await (const entry of streamJsonRecords(path)) {
    out.push(entry);
  }
  return out;
}

test("streams a row-per-line JSON array", async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, "rows.json");
    await writeFile(path, ["[", '  {"id": 1},', '  {"id": 2}', "]", ""].join("\n"));
    assert.deepEqual(await collect(path), [
      { status: "record", value: { id: 1 } },
      { status: "record", value: { id: 2 } },
    ]);
  });
});

test("streams ndjson and reports broken lines", async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, "rows.ndjson");
    await writeFile(path, ['{"id": "a"}', "", "{oops", '{"id": "b"}'].join("\n"));
    assert.deepEqual(await collect(path), [
      { status: "record", value: { id: "a" } },
      { status: "malformed", line: "{oops" },
      { status: "record", value: { id: "b" } },
    ]);
  });
});

test("a whole array on one line is expanded", async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, "inline.json");
    await writeFile(path, '[{"id": 1}, {"id": 2}]\n');
    assert.deepEqual(
      (await collect(path)).map((entry) => (entry.status === "record" ? entry.value : entry.line)),
      [{ id: 1 }, { id: 2 }],
    );
    await writeFile(path, "[]");
    assert.deepEqual(await collect(path), []);
  });
});

test("a missing file is fatal before anything is read", async () => {
  await withTempDir(async (dir) => {
    await assert.rejects(collect(join(dir, "absent.json")), FatalIOError);
  });
});

test("a failed write surfaces as FatalIOError", { skip: !existsSync("/dev/full") }, async () => {
  const writer = await NdjsonWriter.open("/dev/full");
  await writer.write({ id: 1 });
  await assert.rejects(writer.close(), FatalIOError);
});
