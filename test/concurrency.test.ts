import test from "node:test";
import assert from "node:assert/strict";
import { setTimeout as delay } from "node:timers/promises";
import { mapWithConcurrency } from "../src/common/concurrency.js";

test("keeps input order when tasks finish out of order", async () => {
  const result = await mapWithConcurrency([30, 5, 20, 1], 4, async (ms, index) => {
    await delay(ms);
    return `${index}:${ms}`;
  });
  assert.deepEqual(result, ["0:30", "1:5", "2:20", "3:1"]);
});

test("never runs more than the limit at once", async () => {
  let active = 0;
  let peak = 0;
  await mapWithConcurrency([1, 2, 3, 4, 5, 6, 7], 3, async () => {
    active += 1;
    peak = Math.max(peak, active);
    await delay(2);
    active -= 1;
  });
  assert.equal(peak, 3);
});

test("empty input and non-positive limits", async () => {
  assert.deepEqual(await mapWithConcurrency([], 4, async (value: number) => value), []);
  assert.deepEqual(await mapWithConcurrency([1, 2], 0, async (value) => value * 2), [2, 4]);
});

test("a failing task rejects the whole map", async () => {
  await assert.rejects(
    mapWithConcurrency([1, 2, 3], 2, async (value) => {
      if (value === 2) {
        throw new Error("boom");
      }
      return value;
    }),
    /boom/,
  );
});
