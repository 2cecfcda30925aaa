/**
 * Cancellable waits, deadlines and a bounded worker pool.
 *
 * Every suspension point in the core goes through an AbortSignal so that a
 * caller's deadline or cancellation reaches the limiter queue, the network
 * call and the retry delay alike.
 */

import { DeadlineExceeded, abortError, throwIfAborted } from "./errors.js";

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

/** Sleep that rejects with the abort reason as soon as `signal` fires. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(abortError(signal));
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      if (signal) reject(abortError(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

// ─── Deadlines ──────────────────────────────────────────

export interface Deadline {
  signal: AbortSignal;
  /** Stop the timer and detach from the parent signal. */
  dispose(): void;
}

/**
 * Derive a signal that aborts with DeadlineExceeded after `timeoutMs`, or
 * with the parent's reason if the parent aborts first. Without a timeout the
 * derived signal only follows the parent.
 */
export function deadline(timeoutMs: number | undefined, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | null = null;

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  if (timeoutMs !== undefined && !controller.signal.aborted) {
    timer = setTimeout(() => {
      controller.abort(new DeadlineExceeded(`Deadline of ${timeoutMs}ms exceeded`));
    }, timeoutMs);
  }

  return {
    signal: controller.signal,
    dispose() {
      if (timer !== null) clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}

// ─── Worker Pool ────────────────────────────────────────

/**
 * Run `task` over `items` with at most `limit` in flight, preserving order.
 *
 * The first failure aborts the signal handed to the remaining tasks and stops
 * the workers from picking new items, so no request keeps running after the
 * pool has already failed.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, signal: AbortSignal) => Promise<R>,
  signal?: AbortSignal
): Promise<R[]> {
  throwIfAborted(signal);
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(signal?.reason);
  signal?.addEventListener("abort", onParentAbort, { once: true });

  const results: R[] = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      throwIfAborted(controller.signal);
      const index = next++;
      results[index] = await task(items[index], controller.signal);
    }
  };

  const failFast = (error: unknown): never => {
    if (!controller.signal.aborted) controller.abort(error);
    throw error;
  };

  const workers = Math.max(1, Math.min(limit, items.length));
  try {
    await Promise.all(Array.from({ length: workers }, () => worker().catch(failFast)));
    return results;
  } finally {
    signal?.removeEventListener("abort", onParentAbort);
  }
}
