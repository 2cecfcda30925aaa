/**
 * TTL cache for GitLab record sets and the analytics built on them.
 *
 * Caches at the data-source level (not tool level) so a snapshot, a health
 * score and a trend over the same target share one set of API calls.
 *
 * Keys:
 *   records:<operation>:<target>:<params hash>   raw record sets
 *   snapshot:<target>:<since>..<until>           built snapshots
 *   trend:<target>:<since>..<until>              trend reports
 *
 * Entries are deep-frozen before they become visible and are never served
 * once `now - createdAt >= ttlMs`. Record sets are optionally mirrored to a
 * persistent CacheStore.
 */

import { createHash } from "node:crypto";
import { z } from "zod";
import type { CacheStore } from "./cache-store.js";
import { log } from "./logger.js";
import { deepFreeze } from "./immutable.js";
import type { Snapshot } from "./snapshot.js";
import type { TrendReport } from "./trends.js";

// ─── Types ──────────────────────────────────────────────

export type CacheValue =
  | { kind: "records"; records: readonly unknown[] }
  | { kind: "snapshot"; snapshot: Snapshot }
  | { kind: "trend"; report: TrendReport };

export type RecordsValue = Extract<CacheValue, { kind: "records" }>;
export type SnapshotValue = Extract<CacheValue, { kind: "snapshot" }>;
export type TrendValue = Extract<CacheValue, { kind: "trend" }>;

export const isRecords = (value: CacheValue): value is RecordsValue => value.kind === "records";
export const isSnapshot = (value: CacheValue): value is SnapshotValue => value.kind === "snapshot";
export const isTrend = (value: CacheValue): value is TrendValue => value.kind === "trend";

interface CacheEntry {
  value: CacheValue;
  createdAt: number;
  ttlMs: number;
  version: number;
}

export interface CacheStats {
  entries: number;
  activeEntries: number;
  hits: number;
  misses: number;
  persistent: boolean;
  keys: string[];
}

export interface TtlCacheOptions {
  now?: () => number;
  store?: CacheStore;
}

const PersistedRecords = z.object({
  kind: z.literal("records"),
  records: z.array(z.unknown()),
});

// ─── Keys ───────────────────────────────────────────────

/** Key-order independent JSON, so equal parameter sets hash equally. */
function stableStringify(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(",")}]`;
  if (typeof value === "object" && value !== null) {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

export function hashParams(params: unknown): string {
  return createHash("sha1").update(stableStringify(params)).digest("hex").slice(0, 16);
}

export function recordsKey(operation: string, target: string, params: unknown): string {
  return `records:${operation}:${target}:${hashParams(params)}`;
}

// ─── Cache Implementation ───────────────────────────────

export class TtlCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly now: () => number;
  private readonly store: CacheStore | undefined;
  private nextVersion = 1;
  /** Bumped by every invalidation; getOrCompute discards results that straddle one. */
  private epoch = 0;
  private hits = 0;
  private misses = 0;

  constructor(options: TtlCacheOptions = {}) {
    this.now = options.now ?? (() => Date.now());
    this.store = options.store;
  }

  get(key: string): CacheValue | undefined {
    const entry = this.entries.get(key) ?? this.loadPersisted(key);
    if (entry && this.isFresh(entry)) {
      this.hits++;
      return entry.value;
    }
    if (entry) this.evict(key);
    this.misses++;
    return undefined;
  }

  put(key: string, value: CacheValue, ttlMs: number): void {
    if (!(ttlMs > 0)) throw new RangeError(`ttlMs must be positive, got ${ttlMs}`);
    const entry: CacheEntry = {
      value: deepFreeze(value),
      createdAt: this.now(),
      ttlMs,
      version: this.nextVersion++,
    };
    this.entries.set(key, entry);
    if (this.store && value.kind === "records") {
      this.store.save(key, {
        payload: JSON.stringify(value),
        createdAt: entry.createdAt,
        ttlMs,
        version: entry.version,
      });
    }
  }

  /**
   * Get a cached value, or compute and cache it if missing or expired.
   * A cached value of another kind counts as a miss.
   */
  async getOrCompute<T extends CacheValue>(
    key: string,
    ttlMs: number,
    compute: () => Promise<T>,
    accept: (value: CacheValue) => value is T
  ): Promise<T> {
    const existing = this.get(key);
    if (existing !== undefined && accept(existing)) return existing;

    const startedAt = this.epoch;
    const value = await compute();
    if (this.epoch === startedAt) {
      this.put(key, value, ttlMs);
    } else {
      log("debug", "cache invalidated during compute; result not stored", { key });
    }
    return deepFreeze(value);
  }

  /** Drop every entry whose key starts with `prefix`; returns how many were dropped. */
  invalidate(prefix: string): number {
    this.epoch++;
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        removed++;
      }
    }
    const persisted = this.store?.deletePrefix(prefix) ?? 0;
    return Math.max(removed, persisted);
  }

  clearAll(): void {
    this.epoch++;
    this.entries.clear();
    this.store?.clear();
  }

  stats(): CacheStats {
    let activeEntries = 0;
    for (const entry of this.entries.values()) {
      if (this.isFresh(entry)) activeEntries++;
    }
    return {
      entries: this.entries.size,
      activeEntries,
      hits: this.hits,
      misses: this.misses,
      persistent: this.store !== undefined,
      keys: [...this.entries.keys()].sort(),
    };
  }

  close(): void {
    this.store?.close();
  }

  private isFresh(entry: CacheEntry): boolean {
    return this.now() - entry.createdAt < entry.ttlMs;
  }

  private evict(key: string): void {
    this.entries.delete(key);
    this.store?.delete(key);
  }

  private loadPersisted(key: string): CacheEntry | undefined {
    if (!this.store || !key.startsWith("records:")) return undefined;
    const stored = this.store.load(key);
    if (!stored) return undefined;

    let json: unknown;
    try {
      json = JSON.parse(stored.payload);
    } catch (error) {
      log("warn", "discarding unreadable persisted cache entry", { key, error: String(error) });
      this.store.delete(key);
      return undefined;
    }
    const parsed = PersistedRecords.safeParse(json);
    if (!parsed.success) {
      log("warn", "discarding malformed persisted cache entry", { key });
      this.store.delete(key);
      return undefined;
    }

    const value: RecordsValue = { kind: "records", records: parsed.data.records };
    const entry: CacheEntry = {
      value: deepFreeze(value),
      createdAt: stored.createdAt,
      ttlMs: stored.ttlMs,
      version: stored.version,
    };
    if (this.isFresh(entry)) {
      this.entries.set(key, entry);
      this.nextVersion = Math.max(this.nextVersion, stored.version + 1);
    }
    return entry;
  }
}
