/**
 * GitLab REST v4 transport and single-request client.
 *
 * One call to requestPage() is one rate-limited HTTP attempt. It never
 * throws: every failure, including cancellation, comes back as a typed
 * AttemptOutcome so the fetch engine can apply the retry policy.
 */

import {
  AuthenticationError,
  AuthorizationError,
  GitLabError,
  MalformedRequest,
  RateLimitExceeded,
  ResourceNotFound,
  TransientNetworkError,
  UnexpectedResponse,
  abortError,
  describeError,
} from "./errors.js";
import { log } from "./logger.js";
import type { RateLimiter } from "./rate-limiter.js";
import type { AttemptOutcome } from "./retry.js";
import { deadline } from "./timing.js";

// ─── Targets ────────────────────────────────────────────

export type TargetKind = "project" | "group";

/** A project or group, by numeric id or full path ("group/project"). */
export interface Target {
  kind: TargetKind;
  id: string;
}

export function targetPath(target: Target): string {
  return `/${target.kind}s/${encodeURIComponent(target.id)}`;
}

export function targetKey(target: Target): string {
  return `${target.kind}/${target.id}`;
}

// ─── Requests ───────────────────────────────────────────

export type PaginationMode = "offset" | "cursor";

export type PageCursor =
  | { kind: "offset"; page: number }
  | { kind: "cursor"; url: string | null };

/** Immutable description of a list request; the cursor travels separately. */
export interface RequestDescriptor {
  readonly operation: string;
  readonly target: Target;
  /** Path below /api/v4, e.g. "/projects/42/issues" */
  readonly path: string;
  readonly params: Readonly<Record<string, string>>;
  readonly pagination: PaginationMode;
  readonly perPage: number;
}

export interface Page {
  records: unknown[];
  /** X-Next-Page; null when the header is absent or empty */
  nextPage: number | null;
  /** X-Per-Page as the server applied it */
  perPage: number | null;
  total: number | null;
  totalPages: number | null;
  /** Link rel="next" for keyset pagination */
  nextCursor: string | null;
}

// ─── Transport ──────────────────────────────────────────

export interface HttpResponse {
  status: number;
  headers: { get(name: string): string | null };
  body: string;
}

export type Transport = (
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal }
) => Promise<HttpResponse>;

export const fetchTransport: Transport = async (url, init) => {
  const response = await fetch(url, { headers: init.headers, signal: init.signal });
  return { status: response.status, headers: response.headers, body: await response.text() };
};

// ─── Header Parsing ─────────────────────────────────────

function headerInt(value: string | null): number | null {
  if (value === null || value.trim() === "") return null;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : null;
}

/** Retry-After as milliseconds: delta-seconds or an HTTP date. */
export function parseRetryAfter(value: string | null, now: number): number | null {
  if (value === null || value.trim() === "") return null;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return Number.parseInt(trimmed, 10) * 1000;
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return null;
  return Math.max(0, date - now);
}

/** Extract rel="next" from an RFC 8288 Link header. */
export function parseNextLink(value: string | null): string | null {
  if (!value) return null;
  for (const match of value.matchAll(/<([^>]+)>\s*;\s*rel="?([^";,]+)"?/g)) {
    if (match[2] === "next") return match[1];
  }
  return null;
}

function errorMessage(status: number, body: string): string {
  try {
    const json: unknown = JSON.parse(body);
    if (typeof json === "object" && json !== null) {
      if ("message" in json && typeof json.message === "string") return json.message;
      if ("message" in json && json.message !== undefined) return JSON.stringify(json.message);
      if ("error" in json && typeof json.error === "string") return json.error;
    }
  } catch {
    // not JSON; fall through to the raw body
  }
  const snippet = body.trim().slice(0, 200);
  return snippet ? `HTTP ${status}: ${snippet}` : `HTTP ${status}`;
}

/** Map a non-2xx response onto the error taxonomy. */
export function errorForResponse(response: HttpResponse, now: number): GitLabError {
  const { status } = response;
  const message = errorMessage(status, response.body);
  if (status === 401) return new AuthenticationError(message, { status });
  if (status === 403) return new AuthorizationError(message, { status });
  if (status === 404) return new ResourceNotFound(message, { status });
  if (status === 429) {
    return new RateLimitExceeded(message, parseRetryAfter(response.headers.get("retry-after"), now));
  }
  if (status === 408 || status >= 500) return new TransientNetworkError(message, { status });
  if (status >= 400) return new MalformedRequest(message, { status });
  return new UnexpectedResponse(`Unexpected status ${status}`, { status });
}

// ─── Client ─────────────────────────────────────────────

export interface GitLabClientOptions {
  baseUrl: string;
  token: string;
  timeoutMs: number;
  limiter: RateLimiter;
  transport?: Transport;
  now?: () => number;
}

export class GitLabClient {
  readonly apiBase: string;
  private readonly transport: Transport;
  private readonly now: () => number;

  constructor(private readonly options: GitLabClientOptions) {
    this.apiBase = `${options.baseUrl.replace(/\/+$/, "")}/api/v4`;
    this.transport = options.transport ?? fetchTransport;
    this.now = options.now ?? (() => Date.now());
  }

  /** Pause every request through this client's limiter, e.g. on a 429. */
  backOff(ms: number): void {
    this.options.limiter.pauseFor(ms);
  }

  /** Build the URL for a page. Keyset continuations use the server's link verbatim. */
  pageUrl(descriptor: RequestDescriptor, cursor: PageCursor): string {
    if (cursor.kind === "cursor" && cursor.url !== null) return cursor.url;

    const query = new URLSearchParams(descriptor.params);
    query.set("per_page", String(descriptor.perPage));
    if (cursor.kind === "offset") {
      query.set("page", String(cursor.page));
    } else {
      query.set("pagination", "keyset");
    }
    return `${this.apiBase}${descriptor.path}?${query.toString()}`;
  }

  async requestPage(
    descriptor: RequestDescriptor,
    cursor: PageCursor,
    signal?: AbortSignal
  ): Promise<AttemptOutcome<Page>> {
    const url = this.pageUrl(descriptor, cursor);
    if (!url.startsWith(this.apiBase)) {
      return {
        ok: false,
        error: new UnexpectedResponse(`Pagination link points outside ${this.apiBase}: ${url}`),
      };
    }

    const response = await this.send(url, signal);
    if (!response.ok) return response;

    const { value } = response;
    let body: unknown;
    try {
      body = JSON.parse(value.body);
    } catch (error) {
      // Truncated bodies show up as parse failures; treat them like a dropped connection
      return {
        ok: false,
        error: new TransientNetworkError(`Invalid JSON from ${descriptor.operation}`, { cause: error }),
      };
    }
    if (!Array.isArray(body)) {
      return {
        ok: false,
        error: new UnexpectedResponse(`Expected a JSON array from ${descriptor.operation}`),
      };
    }

    return {
      ok: true,
      value: {
        records: body,
        nextPage: headerInt(value.headers.get("x-next-page")),
        perPage: headerInt(value.headers.get("x-per-page")),
        total: headerInt(value.headers.get("x-total")),
        totalPages: headerInt(value.headers.get("x-total-pages")),
        nextCursor: parseNextLink(value.headers.get("link")),
      },
    };
  }

  /** Fetch a single resource, e.g. GET /projects/:id. */
  async requestOne(path: string, signal?: AbortSignal): Promise<AttemptOutcome<unknown>> {
    const response = await this.send(`${this.apiBase}${path}`, signal);
    if (!response.ok) return response;
    try {
      return { ok: true, value: JSON.parse(response.value.body) };
    } catch (error) {
      return { ok: false, error: new TransientNetworkError(`Invalid JSON from ${path}`, { cause: error }) };
    }
  }

  private async send(url: string, signal?: AbortSignal): Promise<AttemptOutcome<HttpResponse>> {
    try {
      await this.options.limiter.acquire(signal);
    } catch (error) {
      if (error instanceof GitLabError) return { ok: false, error };
      throw error;
    }

    const request = deadline(this.options.timeoutMs, signal);
    try {
      log("debug", "GET", { url });
      const response = await this.transport(url, {
        headers: {
          Authorization: `Bearer ${this.options.token}`,
          Accept: "application/json",
        },
        signal: request.signal,
      });
      if (response.status >= 200 && response.status < 300) return { ok: true, value: response };
      return { ok: false, error: errorForResponse(response, this.now()) };
    } catch (error) {
      if (signal?.aborted) return { ok: false, error: abortError(signal) };
      if (request.signal.aborted) {
        return {
          ok: false,
          error: new TransientNetworkError(`Request timed out after ${this.options.timeoutMs}ms`, { cause: error }),
        };
      }
      return { ok: false, error: new TransientNetworkError(describeError(error), { cause: error }) };
    } finally {
      request.dispose();
    }
  }
}
