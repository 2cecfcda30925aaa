/**
 * Paginated fetch engine.
 *
 * Drives one list request to completion as a small state machine:
 *
 *   INIT → FETCHING_PAGE → { FETCHING_PAGE | RETRYING | DONE | FAILED }
 *   RETRYING → FETCHING_PAGE | FAILED
 *
 * Each page attempt goes through the client (rate limiter included) and the
 * retry policy decides what happens next. Results are collected into a single
 * ordered set; nothing is returned until the last page has been accepted.
 */

import { PaginationInconsistency, RateLimitExceeded, throwIfAborted } from "./errors.js";
import type { GitLabClient, Page, PageCursor, RequestDescriptor } from "./gitlab.js";
import { log } from "./logger.js";
import type { AttemptOutcome, RetryPolicy } from "./retry.js";
import { sleep } from "./timing.js";

// ─── Types ──────────────────────────────────────────────

export type FetchState = "INIT" | "FETCHING_PAGE" | "RETRYING" | "DONE" | "FAILED";

export interface FetchTransition {
  operation: string;
  from: FetchState;
  to: FetchState;
  /** 1-based page number being fetched when the transition happened */
  page: number;
  /** 1-based attempt number for that page */
  attempt: number;
}

export interface PaginatedResultSet {
  readonly records: readonly unknown[];
  readonly pages: number;
  /** Total HTTP attempts, retries included */
  readonly attempts: number;
  /** Cursor mode only: records dropped because their id was already seen */
  readonly duplicatesDropped: number;
}

export interface FetchEngineOptions {
  client: GitLabClient;
  policy: RetryPolicy;
  maxPages: number;
  onTransition?: (transition: FetchTransition) => void;
}

function recordId(record: unknown): string | null {
  if (typeof record !== "object" || record === null || !("id" in record)) return null;
  const { id } = record;
  return typeof id === "string" || typeof id === "number" ? String(id) : null;
}

// ─── Engine ─────────────────────────────────────────────

export class FetchEngine {
  constructor(private readonly options: FetchEngineOptions) {}

  async fetchAll(descriptor: RequestDescriptor, signal?: AbortSignal): Promise<PaginatedResultSet> {
    const run = new FetchRun(descriptor.operation, this.options.onTransition);
    try {
      const result =
        descriptor.pagination === "offset"
          ? await this.collectOffset(descriptor, run, signal)
          : await this.collectCursor(descriptor, run, signal);
      run.moveTo("DONE");
      return result;
    } catch (error) {
      run.moveTo("FAILED");
      throw error;
    }
  }

  /** Single-resource GET under the same limiter and retry policy. */
  async fetchOne(operation: string, path: string, signal?: AbortSignal): Promise<unknown> {
    const run = new FetchRun(operation, this.options.onTransition);
    try {
      run.page = 1;
      const value = await this.withRetry(run, () => this.options.client.requestOne(path, signal), signal);
      run.moveTo("DONE");
      return value;
    } catch (error) {
      run.moveTo("FAILED");
      throw error;
    }
  }

  private async fetchPage(
    descriptor: RequestDescriptor,
    cursor: PageCursor,
    run: FetchRun,
    signal: AbortSignal | undefined
  ): Promise<Page> {
    throwIfAborted(signal);
    run.page++;
    if (run.page > this.options.maxPages) {
      throw new PaginationInconsistency(
        `${descriptor.operation}: exceeded ${this.options.maxPages} pages`
      );
    }
    return this.withRetry(
      run,
      () => this.options.client.requestPage(descriptor, cursor, signal),
      signal
    );
  }

  private async withRetry<T>(
    run: FetchRun,
    attemptOnce: () => Promise<AttemptOutcome<T>>,
    signal: AbortSignal | undefined
  ): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      run.attempt = attempt;
      run.moveTo("FETCHING_PAGE");
      run.attempts++;
      const decision = this.options.policy.decide(await attemptOnce(), attempt);

      if (decision.action === "complete") return decision.value;
      if (decision.action === "fail") throw decision.error;

      run.moveTo("RETRYING");
      // Server back-off holds every request that shares the limiter
      if (decision.error instanceof RateLimitExceeded) this.options.client.backOff(decision.delayMs);
      log("warn", `${run.operation}: ${decision.error.message}; retrying`, {
        page: run.page,
        attempt,
        delayMs: decision.delayMs,
      });
      await sleep(decision.delayMs, signal);
    }
  }

  // ─── Offset pagination ─────────────────────────────────

  private async collectOffset(
    descriptor: RequestDescriptor,
    run: FetchRun,
    signal: AbortSignal | undefined
  ): Promise<PaginatedResultSet> {
    const records: unknown[] = [];
    const seen = new Set<string>();
    let pageNumber = 1;
    let advertisedPerPage: number | null = null;
    let advertisedTotal: number | null = null;

    for (;;) {
      const page = await this.fetchPage(descriptor, { kind: "offset", page: pageNumber }, run, signal);
      const where = `${descriptor.operation} page ${pageNumber}`;

      if (page.perPage !== null) {
        if (advertisedPerPage !== null && page.perPage !== advertisedPerPage) {
          throw new PaginationInconsistency(
            `${where}: page size changed from ${advertisedPerPage} to ${page.perPage}`
          );
        }
        advertisedPerPage = page.perPage;
      }
      if (page.total !== null) advertisedTotal = page.total;

      if (page.records.length === 0) {
        if (pageNumber > 1) {
          throw new PaginationInconsistency(`${where}: empty page after the previous page advertised more`);
        }
        if (page.nextPage !== null) {
          throw new PaginationInconsistency(`${where}: empty page still advertises page ${page.nextPage}`);
        }
        break;
      }

      for (const record of page.records) {
        const id = recordId(record);
        if (id !== null) {
          if (seen.has(id)) {
            throw new PaginationInconsistency(`${where}: record ${id} returned twice`);
          }
          seen.add(id);
        }
        records.push(record);
      }

      if (page.nextPage === null) break;

      const pageSize = advertisedPerPage ?? descriptor.perPage;
      if (page.records.length < pageSize) {
        throw new PaginationInconsistency(
          `${where}: short page (${page.records.length} of ${pageSize}) still advertises page ${page.nextPage}`
        );
      }
      if (page.nextPage <= pageNumber) {
        throw new PaginationInconsistency(`${where}: next page ${page.nextPage} does not advance`);
      }
      pageNumber = page.nextPage;
    }

    if (advertisedTotal !== null && advertisedTotal !== records.length) {
      throw new PaginationInconsistency(
        `${descriptor.operation}: collected ${records.length} records, server reported ${advertisedTotal}`
      );
    }

    return Object.freeze({
      records: Object.freeze(records),
      pages: run.page,
      attempts: run.attempts,
      duplicatesDropped: 0,
    });
  }

  // ─── Keyset pagination ─────────────────────────────────

  private async collectCursor(
    descriptor: RequestDescriptor,
    run: FetchRun,
    signal: AbortSignal | undefined
  ): Promise<PaginatedResultSet> {
    const records: unknown[] = [];
    const seenIds = new Set<string>();
    const seenCursors = new Set<string>();
    let cursor: string | null = null;
    let duplicatesDropped = 0;

    for (;;) {
      const page = await this.fetchPage(descriptor, { kind: "cursor", url: cursor }, run, signal);
      const where = `${descriptor.operation} page ${run.page}`;

      if (page.records.length === 0 && page.nextCursor !== null) {
        throw new PaginationInconsistency(`${where}: empty page still links to a next page`);
      }

      for (const record of page.records) {
        const id = recordId(record);
        if (id !== null) {
          if (seenIds.has(id)) {
            duplicatesDropped++;
            continue;
          }
          seenIds.add(id);
        }
        records.push(record);
      }

      if (page.nextCursor === null) break;
      if (seenCursors.has(page.nextCursor)) {
        throw new PaginationInconsistency(`${where}: next link repeats an earlier cursor`);
      }
      seenCursors.add(page.nextCursor);
      cursor = page.nextCursor;
    }

    return Object.freeze({
      records: Object.freeze(records),
      pages: run.page,
      attempts: run.attempts,
      duplicatesDropped,
    });
  }
}

/** Mutable bookkeeping for one fetch; never shared between fetches. */
class FetchRun {
  state: FetchState = "INIT";
  page = 0;
  attempt = 0;
  attempts = 0;

  constructor(
    readonly operation: string,
    private readonly onTransition?: (transition: FetchTransition) => void
  ) {}

  moveTo(next: FetchState): void {
    const from = this.state;
    this.state = next;
    this.onTransition?.({
      operation: this.operation,
      from,
      to: next,
      page: this.page,
      attempt: this.attempt,
    });
  }
}
