import { describe, it, expect, vi } from "vitest";
import {
  AuthenticationError,
  AuthorizationError,
  MalformedRequest,
  RateLimitExceeded,
  ResourceNotFound,
  TransientNetworkError,
  UnexpectedResponse,
} from "../errors.js";
import {
  GitLabClient,
  errorForResponse,
  parseNextLink,
  parseRetryAfter,
  targetKey,
  targetPath,
  type Transport,
} from "../gitlab.js";
import { RateLimiter } from "../rate-limiter.js";
import { requestDescriptor } from "../records.js";
import { BASE_URL, response } from "./fake-gitlab.js";

vi.spyOn(console, "error").mockImplementation(() => {});

const NOW = Date.UTC(2026, 0, 1, 0, 0, 0);

function client(transport: Transport, timeoutMs = 1000) {
  return new GitLabClient({
    baseUrl: `${BASE_URL}/`,
    token: "test-secret",
    timeoutMs,
    limiter: new RateLimiter({ requestsPerSecond: 1000, burst: 100 }),
    transport,
    now: () => NOW,
  });
}

const descriptor = requestDescriptor({
  operation: "merge_requests",
  target: { kind: "project", id: "acme/widgets" },
  path: "/projects/acme%2Fwidgets/merge_requests",
  params: { state: "merged" },
  perPage: 50,
});

describe("targets", () => {
  it("encodes path ids", () => {
    expect(targetPath({ kind: "project", id: "acme/widgets" })).toBe("/projects/acme%2Fwidgets");
    expect(targetPath({ kind: "group", id: "7" })).toBe("/groups/7");
    expect(targetKey({ kind: "group", id: "acme" })).toBe("group/acme");
  });
});

describe("parseRetryAfter()", () => {
  it("reads delta-seconds", () => {
    expect(parseRetryAfter("30", NOW)).toBe(30_000);
  });

  it("reads an HTTP date relative to now", () => {
    expect(parseRetryAfter("Thu, 01 Jan 2026 00:00:10 GMT", NOW)).toBe(10_000);
  });

  it("clamps a past date to zero", () => {
    expect(parseRetryAfter("Wed, 31 Dec 2025 23:59:00 GMT", NOW)).toBe(0);
  });

  it("ignores missing or unreadable values", () => {
    expect(parseRetryAfter(null, NOW)).toBeNull();
    expect(parseRetryAfter("soon", NOW)).toBeNull();
  });
});

describe("parseNextLink()", () => {
  it("picks rel=next among several links", () => {
    const header =
      '<https://gitlab.test/api/v4/projects?id_after=5>; rel="next", <https://gitlab.test/api/v4/projects>; rel="first"';
    expect(parseNextLink(header)).toBe("https://gitlab.test/api/v4/projects?id_after=5");
  });

  it("returns null without a next link", () => {
    expect(parseNextLink('<https://gitlab.test/api/v4/projects>; rel="first"')).toBeNull();
    expect(parseNextLink(null)).toBeNull();
  });
});

describe("errorForResponse()", () => {
  const cases: Array<[number, new (...args: never[]) => Error]> = [
    [401, AuthenticationError],
    [403, AuthorizationError],
    [404, ResourceNotFound],
    [429, RateLimitExceeded],
    [408, TransientNetworkError],
    [500, TransientNetworkError],
    [503, TransientNetworkError],
    [400, MalformedRequest],
    [422, MalformedRequest],
  ];

  for (const [status, type] of cases) {
    it(`maps ${status} to ${type.name}`, () => {
      expect(errorForResponse(response(status, {}), NOW)).toBeInstanceOf(type);
    });
  }

  it("uses the message from a JSON error body", () => {
    const error = errorForResponse(response(403, { message: "403 Forbidden" }), NOW);
    expect(error.message).toBe("403 Forbidden");
    expect(error.status).toBe(403);
  });

  it("serializes structured validation messages", () => {
    const error = errorForResponse(response(400, { message: { per_page: ["is invalid"] } }), NOW);
    expect(error.message).toBe('{"per_page":["is invalid"]}');
  });

  it("falls back to the raw body", () => {
    expect(errorForResponse(response(502, "<html>Bad Gateway</html>"), NOW).message).toBe(
      "HTTP 502: <html>Bad Gateway</html>"
    );
  });

  it("carries Retry-After on 429", () => {
    const error = errorForResponse(response(429, "", { "Retry-After": "7" }), NOW);
    expect(error instanceof RateLimitExceeded && error.retryAfterMs).toBe(7000);
  });
});

describe("GitLabClient", () => {
  it("builds offset and keyset page URLs", () => {
    const c = client(async () => response(200, []));
    expect(c.pageUrl(descriptor, { kind: "offset", page: 3 })).toBe(
      "https://gitlab.test/api/v4/projects/acme%2Fwidgets/merge_requests?state=merged&per_page=50&page=3"
    );
    expect(c.pageUrl(descriptor, { kind: "cursor", url: null })).toBe(
      "https://gitlab.test/api/v4/projects/acme%2Fwidgets/merge_requests?state=merged&per_page=50&pagination=keyset"
    );
  });

  it("parses pagination headers", async () => {
    const c = client(async () =>
      response(200, [{ id: 1 }], {
        "X-Next-Page": "3",
        "X-Per-Page": "50",
        "X-Total": "120",
        "X-Total-Pages": "3",
      })
    );
    const outcome = await c.requestPage(descriptor, { kind: "offset", page: 2 });
    expect(outcome).toEqual({
      ok: true,
      value: { records: [{ id: 1 }], nextPage: 3, perPage: 50, total: 120, totalPages: 3, nextCursor: null },
    });
  });

  it("treats a truncated body as transient", async () => {
    const outcome = await client(async () => response(200, '[{"id": 1}, {"id"')).requestPage(descriptor, {
      kind: "offset",
      page: 1,
    });
    expect(outcome.ok === false && outcome.error).toBeInstanceOf(TransientNetworkError);
  });

  it("rejects a non-array list body", async () => {
    const outcome = await client(async () => response(200, { id: 1 })).requestPage(descriptor, {
      kind: "offset",
      page: 1,
    });
    expect(outcome.ok === false && outcome.error).toBeInstanceOf(UnexpectedResponse);
  });

  it("turns a network failure into a transient error", async () => {
    const outcome = await client(async () => {
      throw new Error("ECONNRESET");
    }).requestOne("/projects/1");
    expect(outcome.ok).toBe(false);
    expect(outcome.ok === false && outcome.error.message).toBe("ECONNRESET");
    expect(outcome.ok === false && outcome.error).toBeInstanceOf(TransientNetworkError);
  });

  it("times out a request that never answers", async () => {
    const hanging: Transport = (_url, init) =>
      new Promise((_resolve, reject) => {
        init.signal.addEventListener("abort", () => reject(init.signal.reason), { once: true });
      });
    const outcome = await client(hanging, 10).requestOne("/projects/1");
    expect(outcome.ok === false && outcome.error.message).toBe("Request timed out after 10ms");
  });
});
