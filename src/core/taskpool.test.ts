import { describe, expect, test } from "vitest";

import { Future, FutureTimeoutError, PoolClosedError, TaskPool } from "./taskpool";
import { createLogger } from "../utils/logger";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("Future", () => {
  test("settles once", async () => {
    const f = new Future<number>(1);
    expect(f.resolve(1)).toBe(true);
    expect(f.resolve(2)).toBe(false);
    expect(f.reject(new Error("late"))).toBe(false);
    expect(await f.result()).toBe(1);
  });

  test("result rethrows the stored failure", async () => {
    const f = new Future<number>(2);
    f.reject(new Error("boom"));
    await expect(f.result()).rejects.toThrow("boom");
    expect(f.wasJoined()).toBe(true);
  });

  test("result times out without settling", async () => {
    const f = new Future<number>(3);
    await expect(f.result(5)).rejects.toBeInstanceOf(FutureTimeoutError);
    expect(f.done()).toBe(false);
  });
});

describe("TaskPool", () => {
  test("runs submitted tasks and returns their values", async () => {
    const pool = new TaskPool({ workers: 2 });
    const a = pool.submit(async (x: number, y: number) => x + y, [1, 2]);
    const b = pool.submit((s: string) => s.toUpperCase(), ["hi"]);
    expect(await a.result()).toBe(3);
    expect(await b.result()).toBe("HI");
    await pool.shutdown();
  });

  test("never runs more tasks at once than it has workers", async () => {
    const pool = new TaskPool({ workers: 2 });
    const gate = deferred();
    let running = 0;
    let peak = 0;

    const task = async (): Promise<void> => {
      running++;
      peak = Math.max(peak, running);
      await gate.promise;
      running--;
    };

    const futures = [1, 2, 3, 4].map(() => pool.submit(task, []));
    await new Promise((r) => setTimeout(r, 10));
    expect(pool.active).toBe(2);
    expect(pool.pending).toBe(2);

    gate.resolve();
    await Promise.all(futures.map((f) => f.result()));
    expect(peak).toBe(2);
    await pool.shutdown();
  });

  test("keeps FIFO order with one worker", async () => {
    const pool = new TaskPool({ workers: 1 });
    const order: number[] = [];
    const futures = [1, 2, 3].map((n) => pool.submit(async () => order.push(n), []));
    await Promise.all(futures.map((f) => f.result()));
    expect(order).toEqual([1, 2, 3]);
    await pool.shutdown();
  });

  test("shutdown drains the queue and refuses new work", async () => {
    const pool = new TaskPool({ workers: 1 });
    const f = pool.submit(async () => "done", []);
    await pool.shutdown();
    expect(f.done()).toBe(true);
    expect(pool.isClosed).toBe(true);
    expect(() => pool.submit(async () => 1, [])).toThrow(PoolClosedError);
    await pool.shutdown();
  });

  test("warns about failures nobody joined", async () => {
    const warnings: string[] = [];
    const keep = (msg: string) => {
      warnings.push(msg);
    };
    const logger = createLogger({ name: "pool", level: "warn", sink: { error: keep, warn: keep, info: keep, debug: keep } });
    const pool = new TaskPool({ workers: 1, logger });

    pool.submit(async () => {
      throw new Error("lost");
    }, []);
    const joined = pool.submit(async () => {
      throw new Error("seen");
    }, []);
    await expect(joined.result()).rejects.toThrow("seen");

    await pool.shutdown();
    expect(warnings).toEqual(["[pool] WARN: task #1 failed and was never joined: lost"]);
  });

  test("worker count has a floor of one", () => {
    const pool = new TaskPool({ workers: 0 });
    expect(pool.size).toBe(1);
    return pool.shutdown();
  });
});
