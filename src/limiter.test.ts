import { describe, expect, it } from "vitest";
import { ConcurrencyLimiter, DEFAULT_MAX_CONCURRENCY } from "./limiter.js";

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("ConcurrencyLimiter", () => {
  it("defaults to 50 slots", () => {
    expect(new ConcurrencyLimiter().capacity).toBe(DEFAULT_MAX_CONCURRENCY);
    expect(DEFAULT_MAX_CONCURRENCY).toBe(50);
  });

  it("rejects capacities that are not positive integers", () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow(RangeError);
    expect(() => new ConcurrencyLimiter(-3)).toThrow("Concurrency must be a positive integer, got -3");
    expect(() => new ConcurrencyLimiter(1.5)).toThrow(RangeError);
  });

  it("returns the task's result", async () => {
    const limiter = new ConcurrencyLimiter(1);
    await expect(limiter.run(async () => 42)).resolves.toBe(42);
  });

  it("never runs more tasks than its capacity", async () => {
    const limiter = new ConcurrencyLimiter(2);
    let running = 0;
    let maxRunning = 0;

    const tasks = Array.from({ length: 8 }, (_, i) =>
      limiter.run(async () => {
        running++;
        maxRunning = Math.max(maxRunning, running);
        await sleep(3);
        running--;
        return i;
      }),
    );

    await expect(Promise.all(tasks)).resolves.toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
    expect(maxRunning).toBe(2);
    expect(limiter.peakActive).toBe(2);
    expect(limiter.pending).toBe(0);
  });

  it("frees the slot when a task rejects", async () => {
    const limiter = new ConcurrencyLimiter(1);

    await expect(limiter.run(async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    await expect(limiter.run(async () => "next")).resolves.toBe("next");
  });

  it("queues callers until a slot frees up", async () => {
    const limiter = new ConcurrencyLimiter(1);
    const order: string[] = [];

    const first = limiter.run(async () => {
      order.push("first:start");
      await sleep(5);
      order.push("first:end");
    });
    const second = limiter.run(async () => {
      order.push("second:start");
    });

    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second:start"]);
  });
});
