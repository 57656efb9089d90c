import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { setTimeout as delay } from "node:timers/promises";
import { KeyedMutex, mapWithConcurrency, withTimeout } from "./concurrency.js";
import { deferred, tick } from "./test-support.js";

describe("mapWithConcurrency", () => {
  it("keeps input order and respects the limit", async () => {
    let inFlight = 0;
    let peak = 0;
    const results = await mapWithConcurrency([30, 5, 20, 0, 10], 2, async (ms, index) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await delay(ms);
      inFlight -= 1;
      return `${index}:${ms}`;
    });

    assert.deepEqual(results, ["0:30", "1:5", "2:20", "3:0", "4:10"]);
    assert.equal(peak, 2);
  });

  it("handles an empty list", async () => {
    assert.deepEqual(await mapWithConcurrency([], 4, async () => 1), []);
  });
});

describe("withTimeout", () => {
  it("passes the value through when work settles in time", async () => {
    assert.equal(await withTimeout(Promise.resolve(7), 50, () => new Error("late")), 7);
  });

  it("rejects with the timeout error when work hangs", async () => {
    const hang = new Promise<number>(() => {});
    await assert.rejects(() => withTimeout(hang, 10, () => new Error("late")), /late/);
  });

  it("returns the work itself when the timeout is disabled", () => {
    const work = Promise.resolve("x");
    assert.equal(withTimeout(work, 0, () => new Error("late")), work);
  });
});

describe("KeyedMutex", () => {
  it("runs callers for one key one after another", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const first = mutex.run("node@20.10.0", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = mutex.run("node@20.10.0", async () => {
      order.push("second");
    });
    await tick();

    assert.deepEqual(order, ["first:start"]);
    assert.equal(mutex.isLocked("node@20.10.0"), true);
    gate.resolve();
    await Promise.all([first, second]);
    assert.deepEqual(order, ["first:start", "first:end", "second"]);
    assert.equal(mutex.isLocked("node@20.10.0"), false);
  });

  it("lets different keys run together", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const held = mutex.run("node@20.10.0", () => gate.promise);
    const other = await mutex.run("python@3.11.9", async () => "done");

    assert.equal(other, "done");
    gate.resolve();
    await held;
  });

  it("releases the key when the work throws", async () => {
    const mutex = new KeyedMutex();
    await assert.rejects(
      () =>
        mutex.run("go@1.22.5", async () => {
          throw new Error("boom");
        }),
      /boom/,
    );
    assert.equal(mutex.isLocked("go@1.22.5"), false);
    assert.equal(await mutex.run("go@1.22.5", async () => 1), 1);
  });
});
