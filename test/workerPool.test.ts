import test from "node:test";
import assert from "node:assert/strict";
import { runPool } from "../src/import/workerPool.js";

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

test("runPool keeps input order and captures each failure", async () => {
  const failure = new Error("boom");
  const results = await runPool([
    async () => {
      await delay(15);
      return "slow";
    },
    async () => {
      throw failure;
    },
    async () => "fast"
  ]);

  assert.deepEqual(results, [
    { status: "fulfilled", value: "slow" },
    { status: "rejected", reason: failure },
    { status: "fulfilled", value: "fast" }
  ]);
});

test("runPool never runs more tasks than the concurrency limit", async () => {
  let running = 0;
  let peak = 0;
  const tasks = Array.from({ length: 10 }, (_, index) => async () => {
    running += 1;
    peak = Math.max(peak, running);
    await delay(5);
    running -= 1;
    return index;
  });

  const results = await runPool(tasks, 4);

  assert.equal(peak, 4);
  assert.deepEqual(results.map((entry) => (entry.status === "fulfilled" ? entry.value : -1)), [0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
});

test("runPool resolves an empty task list", async () => {
  assert.deepEqual(await runPool([]), []);
});
