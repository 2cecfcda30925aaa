/**
 * Insights facade: the operations collaborators call.
 *
 * createContext() wires one limiter, cache, client and fetch engine from a
 * resolved configuration. Nothing here is a module-level singleton; two
 * contexts share no state.
 */

import { isSnapshot, isTrend, TtlCache, type CacheStats } from "./cache.js";
import { SqliteCacheStore, type CacheStore } from "./cache-store.js";
import type { InsightsConfig } from "./config.js";
import { InsufficientData, throwIfAborted } from "./errors.js";
import { GitLabClient, targetKey, type Target, type Transport } from "./gitlab.js";
import { scoreSnapshot, type HealthScore } from "./health.js";
import type { CanonicalContributor } from "./identity.js";
import { withLogging } from "./logger.js";
import { FetchEngine, type FetchTransition } from "./pagination.js";
import { RateLimiter, type RateLimiterStats } from "./rate-limiter.js";
import { RecordSource } from "./records.js";
import { RetryPolicy } from "./retry.js";
import { SnapshotBuilder, type Snapshot } from "./snapshot.js";
import { deadline } from "./timing.js";
import { analyzeTrends, type TrendReport } from "./trends.js";
import { windowLabel, type TimeWindow } from "./window.js";

// ─── Context ────────────────────────────────────────────

export interface ContextOptions {
  transport?: Transport;
  /** Clock for snapshot timestamps, cache expiry and Retry-After dates */
  now?: () => number;
  /** Refill clock of the rate limiter; it must advance for queued requests to be granted */
  limiterNow?: () => number;
  /** Jitter source for the retry policy */
  random?: () => number;
  /** Overrides cache.persistPath */
  store?: CacheStore;
  onTransition?: (transition: FetchTransition) => void;
}

export interface InsightsContext {
  readonly config: Readonly<InsightsConfig>;
  readonly limiter: RateLimiter;
  readonly cache: TtlCache;
  readonly client: GitLabClient;
  readonly engine: FetchEngine;
  readonly builder: SnapshotBuilder;
}

export function createContext(config: Readonly<InsightsConfig>, options: ContextOptions = {}): InsightsContext {
  const limiter = new RateLimiter({ requestsPerSecond: config.rateLimit.requestsPerSecond, now: options.limiterNow });
  const store =
    options.store ?? (config.cache.persistPath ? new SqliteCacheStore(config.cache.persistPath) : undefined);
  const cache = new TtlCache({ now: options.now, store });
  const client = new GitLabClient({
    baseUrl: config.gitlab.url,
    token: config.gitlab.token,
    timeoutMs: config.gitlab.timeoutMs,
    limiter,
    transport: options.transport,
    now: options.now,
  });
  const engine = new FetchEngine({
    client,
    policy: new RetryPolicy({ ...config.retry, random: options.random }),
    maxPages: config.gitlab.maxPages,
    onTransition: options.onTransition,
  });
  const builder = new SnapshotBuilder({
    source: new RecordSource({ engine, cache, ttlMs: config.cache.recordsTtlMs }),
    perPage: config.gitlab.perPage,
    maxWorkers: config.concurrency.maxWorkers,
    projectPagination: config.gitlab.projectPagination,
    aliases: config.identity.aliases,
    workflow: config.workflow,
    now: options.now,
  });

  return { config, limiter, cache, client, engine, builder };
}

// ─── Operations ─────────────────────────────────────────

export interface CallOptions {
  signal?: AbortSignal;
  /** Overall deadline for the call, covering every request it makes */
  timeoutMs?: number;
}

export function snapshotKey(target: Target, window: TimeWindow): string {
  return `snapshot:${targetKey(target)}:${windowLabel(window)}`;
}

export function trendKey(target: Target, window: TimeWindow): string {
  return `trend:${targetKey(target)}:${windowLabel(window)}`;
}

async function withDeadline<T>(options: CallOptions, run: (signal: AbortSignal) => Promise<T>): Promise<T> {
  throwIfAborted(options.signal);
  const scope = deadline(options.timeoutMs, options.signal);
  try {
    return await run(scope.signal);
  } finally {
    scope.dispose();
  }
}

export class Insights {
  constructor(readonly context: InsightsContext) {}

  getSnapshot(target: Target, window: TimeWindow, options: CallOptions = {}): Promise<Snapshot> {
    return withLogging(
      "get_snapshot",
      () => withDeadline(options, (signal) => this.snapshot(target, window, signal)),
      { target: targetKey(target) }
    );
  }

  getHealthScore(target: Target, window: TimeWindow, options: CallOptions = {}): Promise<HealthScore> {
    return withLogging(
      "get_health_score",
      () =>
        withDeadline(options, async (signal) => {
          const snapshot = await this.snapshot(target, window, signal);
          return scoreSnapshot(snapshot, this.context.config.scoring);
        }),
      { target: targetKey(target) }
    );
  }

  getTrend(target: Target, window: TimeWindow, options: CallOptions = {}): Promise<TrendReport> {
    const { cache, config } = this.context;
    return withLogging(
      "get_trend",
      () =>
        withDeadline(options, async (signal) => {
          const value = await cache.getOrCompute(
            trendKey(target, window),
            config.cache.trendTtlMs,
            async () => {
              const snapshot = await this.snapshot(target, window, signal);
              const report = analyzeTrends([snapshot], window, config.trends);
              return { kind: "trend" as const, report };
            },
            isTrend
          );
          return value.report;
        }),
      { target: targetKey(target) }
    );
  }

  resolveContributors(
    target: Target,
    window: TimeWindow,
    options: CallOptions = {}
  ): Promise<CanonicalContributor[]> {
    return withLogging(
      "resolve_contributors",
      () =>
        withDeadline(options, async (signal) => {
          const snapshot = await this.snapshot(target, window, signal);
          if (!snapshot.contributors) {
            throw new InsufficientData(
              `No commit or merge request data for ${targetKey(target)}`,
              snapshot.missing
            );
          }
          return snapshot.contributors.contributors;
        }),
      { target: targetKey(target) }
    );
  }

  /** Drop cached entries under `prefix`, or everything. Returns entries dropped. */
  clearCache(prefix?: string): number {
    const { cache } = this.context;
    if (prefix === undefined || prefix === "") {
      const { entries } = cache.stats();
      cache.clearAll();
      return entries;
    }
    return cache.invalidate(prefix);
  }

  cacheStats(): CacheStats {
    return this.context.cache.stats();
  }

  limiterStats(): RateLimiterStats {
    return this.context.limiter.stats();
  }

  close(): void {
    this.context.cache.close();
  }

  private async snapshot(target: Target, window: TimeWindow, signal: AbortSignal): Promise<Snapshot> {
    const { cache, config, builder } = this.context;
    const value = await cache.getOrCompute(
      snapshotKey(target, window),
      config.cache.snapshotTtlMs,
      async () => ({ kind: "snapshot" as const, snapshot: await builder.build(target, window, signal) }),
      isSnapshot
    );
    return value.snapshot;
  }
}

export function createInsights(context: InsightsContext): Insights {
  return new Insights(context);
}
