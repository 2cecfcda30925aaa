/**
 * Token bucket shared by every outbound GitLab request in a context.
 *
 * Tokens refill continuously at `requestsPerSecond`. With the default burst
 * of 1 the grants are spaced at least 1000/rps ms apart, so any half-open
 * one-second window holds at most `requestsPerSecond` grants. Waiters are
 * served FIFO.
 *
 * A server back-off (429 with Retry-After) pauses the whole bucket, so every
 * request of the context waits, not only the one that was throttled.
 */

import { abortError } from "./errors.js";

export interface RateLimiterOptions {
  requestsPerSecond: number;
  /** Bucket capacity. Values above 1 allow short bursts. */
  burst?: number;
  now?: () => number;
}

export interface RateLimiterStats {
  requestsPerSecond: number;
  granted: number;
  waiting: number;
  availableTokens: number;
  /** Time left on a server back-off pause, 0 when not paused */
  pausedMs: number;
}

interface Waiter {
  resolve: () => void;
  detach: () => void;
}

export class RateLimiter {
  private readonly ratePerMs: number;
  private readonly capacity: number;
  private readonly now: () => number;
  private tokens: number;
  private lastRefill: number;
  private granted = 0;
  private pausedUntil = 0;
  private readonly waiters: Waiter[] = [];
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(private readonly options: RateLimiterOptions) {
    if (!(options.requestsPerSecond > 0)) {
      throw new RangeError(`requestsPerSecond must be positive, got ${options.requestsPerSecond}`);
    }
    this.ratePerMs = options.requestsPerSecond / 1000;
    this.capacity = Math.max(1, options.burst ?? 1);
    this.now = options.now ?? (() => Date.now());
    this.tokens = this.capacity;
    this.lastRefill = this.now();
  }

  /** Resolve once a token is taken; reject with the abort reason if `signal` fires first. */
  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.reject(abortError(signal));

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, detach: () => {} };

      if (signal) {
        const onAbort = () => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) this.waiters.splice(index, 1);
          reject(abortError(signal));
        };
        signal.addEventListener("abort", onAbort, { once: true });
        waiter.detach = () => signal.removeEventListener("abort", onAbort);
      }

      this.waiters.push(waiter);
      this.drain();
    });
  }

  /** Hold every grant, queued or future, for `ms` from now. A shorter pause never cuts a longer one. */
  pauseFor(ms: number): void {
    const until = this.now() + ms;
    if (until <= this.pausedUntil) return;
    this.pausedUntil = until;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.drain();
  }

  stats(): RateLimiterStats {
    this.refill();
    return {
      requestsPerSecond: this.options.requestsPerSecond,
      granted: this.granted,
      waiting: this.waiters.length,
      availableTokens: Math.floor(this.tokens),
      pausedMs: Math.max(0, this.pausedUntil - this.now()),
    };
  }

  private refill(): void {
    const now = this.now();
    const elapsed = now - this.lastRefill;
    if (elapsed > 0) {
      this.tokens = Math.min(this.capacity, this.tokens + elapsed * this.ratePerMs);
      this.lastRefill = now;
    }
  }

  private drain(): void {
    this.refill();
    const pausedMs = this.pausedUntil - this.now();

    while (pausedMs <= 0 && this.tokens >= 1) {
      const waiter = this.waiters.shift();
      if (!waiter) break;
      this.tokens -= 1;
      this.granted++;
      waiter.detach();
      waiter.resolve();
    }

    if (this.waiters.length > 0 && this.timer === null) {
      const waitMs =
        pausedMs > 0 ? Math.ceil(pausedMs) : Math.max(1, Math.ceil((1 - this.tokens) / this.ratePerMs));
      this.timer = setTimeout(() => {
        this.timer = null;
        this.drain();
      }, waitMs);
    }
  }
}
