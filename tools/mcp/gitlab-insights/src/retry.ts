/**
 * Retry/backoff policy as a pure function over attempt outcomes.
 *
 * Each request attempt yields an AttemptOutcome instead of throwing; the
 * policy turns (outcome, attempt number) into a decision. Only the fetch
 * engine acts on the decision, so the policy itself never sleeps.
 */

import {
  GitLabError,
  RateLimitExceeded,
  RetriesExhausted,
  TransientNetworkError,
} from "./errors.js";

// ─── Types ──────────────────────────────────────────────

export type AttemptOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: GitLabError };

export type Classification = "retryable" | "fatal";

export type RetryDecision<T> =
  | { action: "complete"; value: T }
  | { action: "retry"; delayMs: number; error: GitLabError }
  | { action: "fail"; error: GitLabError };

export interface RetryPolicyOptions {
  /** Retries after the first attempt; total attempts = maxRetries + 1. */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Source of jitter in [0, 1). */
  random?: () => number;
}

// ─── Policy ─────────────────────────────────────────────

export class RetryPolicy {
  private readonly random: () => number;

  constructor(private readonly options: RetryPolicyOptions) {
    this.random = options.random ?? Math.random;
  }

  get maxRetries(): number {
    return this.options.maxRetries;
  }

  classify(error: GitLabError): Classification {
    if (error instanceof TransientNetworkError || error instanceof RateLimitExceeded) {
      return "retryable";
    }
    return "fatal";
  }

  /**
   * Delay before retry number `attempt` (1-based), or null when the budget is
   * spent. Exponential with ±25% jitter, capped at maxDelayMs; a larger
   * server hint wins and is used as-is.
   */
  nextDelay(attempt: number, retryAfterMs: number | null = null): number | null {
    if (attempt < 1 || attempt > this.options.maxRetries) return null;

    const exponent = Math.min(attempt - 1, 30);
    const exponential = this.options.baseDelayMs * Math.pow(2, exponent);
    const jitterFactor = 0.75 + this.random() * 0.5;
    const computed = Math.min(this.options.maxDelayMs, Math.round(exponential * jitterFactor));

    if (retryAfterMs !== null && retryAfterMs > computed) return retryAfterMs;
    return computed;
  }

  /** `attempt` is the number of attempts made so far, including this one. */
  decide<T>(outcome: AttemptOutcome<T>, attempt: number): RetryDecision<T> {
    if (outcome.ok) return { action: "complete", value: outcome.value };

    const { error } = outcome;
    if (this.classify(error) === "fatal") return { action: "fail", error };

    const hint = error instanceof RateLimitExceeded ? error.retryAfterMs : null;
    const delayMs = this.nextDelay(attempt, hint);
    if (delayMs === null) {
      return { action: "fail", error: new RetriesExhausted(attempt, error) };
    }
    return { action: "retry", delayMs, error };
  }
}
