import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { DeadlineExceeded, OperationCancelled } from "../errors.js";
import { RateLimiter } from "../rate-limiter.js";
import { deadline } from "../timing.js";

beforeEach(() => {
  vi.useFakeTimers({ now: 0 });
});

afterEach(() => {
  vi.useRealTimers();
});

function acquireMany(limiter: RateLimiter, count: number): Promise<void[]> {
  return Promise.all(Array.from({ length: count }, () => limiter.acquire()));
}

describe("RateLimiter", () => {
  it("rejects a non-positive rate", () => {
    expect(() => new RateLimiter({ requestsPerSecond: 0 })).toThrow(RangeError);
  });

  it("grants the first request immediately", async () => {
    const limiter = new RateLimiter({ requestsPerSecond: 3 });
    await limiter.acquire();
    expect(Date.now()).toBe(0);
    expect(limiter.stats().granted).toBe(1);
  });

  it("spaces grants so no one-second window holds more than the rate", async () => {
    const limiter = new RateLimiter({ requestsPerSecond: 3 });
    const all = acquireMany(limiter, 7);

    // Grants land at 0, 334, 668, 1002, ...
    const checkpoints: Array<[number, number]> = [
      [333, 1],
      [334, 2],
      [667, 2],
      [668, 3],
      [999, 3],
      [1002, 4],
      [2004, 7],
    ];
    for (const [time, granted] of checkpoints) {
      await vi.advanceTimersByTimeAsync(time - Date.now());
      expect(limiter.stats().granted).toBe(granted);
    }
    await all;
  });

  it("allows a burst up to its capacity", async () => {
    const limiter = new RateLimiter({ requestsPerSecond: 2, burst: 3 });
    const burst = acquireMany(limiter, 3);
    let fourthGranted = false;
    const fourth = limiter.acquire().then(() => {
      fourthGranted = true;
    });
    await burst;
    expect(Date.now()).toBe(0);

    await vi.advanceTimersByTimeAsync(499);
    expect(fourthGranted).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await fourth;
    expect(fourthGranted).toBe(true);
  });

  it("serves waiters in arrival order", async () => {
    const limiter = new RateLimiter({ requestsPerSecond: 10 });
    const order: string[] = [];
    const all = ["a", "b", "c"].map((name) => limiter.acquire().then(() => order.push(name)));

    await vi.advanceTimersByTimeAsync(500);
    await Promise.all(all);

    expect(order).toEqual(["a", "b", "c"]);
  });

  it("removes a waiter whose deadline passes", async () => {
    const limiter = new RateLimiter({ requestsPerSecond: 1 });
    await limiter.acquire();

    const scope = deadline(100);
    const waiting = limiter.acquire(scope.signal);
    const outcome = waiting.catch((error: unknown) => error);

    await vi.advanceTimersByTimeAsync(100);
    expect(await outcome).toBeInstanceOf(DeadlineExceeded);
    expect(limiter.stats().waiting).toBe(0);
    scope.dispose();
  });

  it("rejects at once for an already aborted signal", async () => {
    const limiter = new RateLimiter({ requestsPerSecond: 1 });
    const controller = new AbortController();
    controller.abort();
    await expect(limiter.acquire(controller.signal)).rejects.toBeInstanceOf(OperationCancelled);
    expect(limiter.stats().granted).toBe(0);
  });

  it("reports grants and waiters", async () => {
    const limiter = new RateLimiter({ requestsPerSecond: 1 });
    const all = acquireMany(limiter, 3);
    expect(limiter.stats()).toEqual({ requestsPerSecond: 1, granted: 1, waiting: 2, availableTokens: 0, pausedMs: 0 });

    await vi.advanceTimersByTimeAsync(2000);
    expect(limiter.stats()).toEqual({ requestsPerSecond: 1, granted: 3, waiting: 0, availableTokens: 0, pausedMs: 0 });
    await all;
  });

  it("holds every waiter while paused", async () => {
    const limiter = new RateLimiter({ requestsPerSecond: 1000 });
    await limiter.acquire();
    limiter.pauseFor(500);

    let granted = 0;
    const all = Promise.all([limiter.acquire(), limiter.acquire()].map((p) => p.then(() => granted++)));
    expect(limiter.stats().pausedMs).toBe(500);

    await vi.advanceTimersByTimeAsync(499);
    expect(granted).toBe(0);
    await vi.advanceTimersByTimeAsync(1);
    expect(granted).toBe(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(granted).toBe(2);
    await all;
  });

  it("keeps the longer of two pauses", () => {
    const limiter = new RateLimiter({ requestsPerSecond: 1000 });
    limiter.pauseFor(500);
    limiter.pauseFor(100);
    expect(limiter.stats().pausedMs).toBe(500);
  });
});
