/** Record builders for a single project with known activity. */

import { resolveConfig, type InsightsConfig } from "../config.js";
import { DAY_MS } from "../timing.js";
import { lastDays, type TimeWindow } from "../window.js";
import { BASE_URL, FakeGitLab } from "./fake-gitlab.js";

const HOUR_MS = 60 * 60 * 1000;

/** 2026-03-31T12:00:00Z */
export const NOW = Date.UTC(2026, 2, 31, 12, 0, 0);
export const WINDOW: TimeWindow = lastDays(30, NOW);
const SINCE = Date.parse(WINDOW.since);

export const PROJECT_ID = 42;
export const PROJECT_PATH = "acme/widgets";

export function iso(ms: number): string {
  return new Date(ms).toISOString();
}

export function at(days: number, hours = 0): string {
  return iso(SINCE + days * DAY_MS + hours * HOUR_MS);
}

export function testConfig(overrides: Record<string, unknown> = {}): Readonly<InsightsConfig> {
  return resolveConfig({
    file: {
      gitlab: { url: BASE_URL, token: "test-secret", perPage: 20 },
      rateLimit: { requestsPerSecond: 1000 },
      retry: { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 5 },
      logging: { level: "error" },
    },
    overrides,
  });
}

export function project(id = PROJECT_ID, path = PROJECT_PATH) {
  return { id, name: path.slice(path.lastIndexOf("/") + 1), path_with_namespace: path };
}

export function commit(n: number, author: string, when: string) {
  return {
    id: `c${String(n).padStart(39, "0")}`,
    author_name: author,
    author_email: `${author}@example.com`,
    created_at: when,
    committed_date: when,
    stats: { additions: 10, deletions: 2 },
  };
}

export function issue(n: number, created: string, closed: string | null, extra: Record<string, unknown> = {}) {
  return {
    id: 1000 + n,
    iid: n,
    state: closed ? "closed" : "opened",
    created_at: created,
    closed_at: closed,
    labels: [],
    assignees: [],
    ...extra,
  };
}

export function mergeRequest(n: number, created: string, merged: string | null, author: string | null = null) {
  return {
    id: 5000 + n,
    iid: n,
    state: merged ? "merged" : "opened",
    created_at: created,
    merged_at: merged,
    closed_at: null,
    user_notes_count: 2,
    author: author ? { username: author, name: author } : null,
  };
}

/**
 * 50 commits by 5 authors, 10 closed and 2 open issues (2 days to close),
 * 8 merged and 1 open merge request (5 hours to merge), all in WINDOW.
 */
export function healthyProject(gitlab: FakeGitLab, id = PROJECT_ID): FakeGitLab {
  const commits = Array.from({ length: 50 }, (_, i) => commit(i, `dev${i % 5}`, at(0, i * 12 + 1)));
  const issues = [
    ...Array.from({ length: 10 }, (_, i) => issue(i + 1, at(i + 1), at(i + 3))),
    issue(11, at(20), null),
    issue(12, at(21), null),
  ];
  const mergeRequests = [
    ...Array.from({ length: 8 }, (_, i) => mergeRequest(i + 1, at(i + 1), at(i + 1, 5))),
    mergeRequest(9, at(25), null),
  ];

  return gitlab
    .single(`/projects/${id}`, project(id))
    .list(`/projects/${id}/repository/commits`, commits)
    .list(`/projects/${id}/issues`, issues)
    .list(`/projects/${id}/merge_requests`, mergeRequests);
}
