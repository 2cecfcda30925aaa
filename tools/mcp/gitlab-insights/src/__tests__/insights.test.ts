import { describe, it, expect, vi, beforeEach } from "vitest";
import { AuthenticationError, DeadlineExceeded, InsufficientData, OperationCancelled } from "../errors.js";
import type { Target, Transport } from "../gitlab.js";
import { createContext, createInsights, type Insights } from "../insights.js";
import { getLogLevel, setLogLevel } from "../logger.js";
import type { FetchTransition } from "../pagination.js";
import { FakeGitLab } from "./fake-gitlab.js";
import {
  NOW,
  PROJECT_ID,
  WINDOW,
  at,
  commit,
  healthyProject,
  project,
  testConfig,
} from "./fixtures.js";

vi.spyOn(console, "error").mockImplementation(() => {});

const TARGET: Target = { kind: "project", id: String(PROJECT_ID) };
const COMMITS_PATH = `/projects/${PROJECT_ID}/repository/commits`;
const ISSUES_PATH = `/projects/${PROJECT_ID}/issues`;
const MRS_PATH = `/projects/${PROJECT_ID}/merge_requests`;

let gitlab: FakeGitLab;

function insightsFor(
  transport: Transport,
  overrides: Record<string, unknown> = {},
  onTransition?: (transition: FetchTransition) => void
): Insights {
  return createInsights(
    createContext(testConfig(overrides), { transport, now: () => NOW, random: () => 0.5, onTransition })
  );
}

beforeEach(() => {
  gitlab = new FakeGitLab();
});

describe("createContext()", () => {
  it("keeps the limiter on its own clock when the context clock is frozen", async () => {
    const context = createContext(testConfig(), { transport: gitlab.transport, now: () => NOW });
    await context.limiter.acquire();
    await context.limiter.acquire();
    expect(context.limiter.stats().granted).toBe(2);
  });

  it("leaves the process log level alone", () => {
    setLogLevel("warn");
    try {
      createContext(testConfig({ logging: { level: "debug" } }), { transport: gitlab.transport });
      createContext(testConfig({ logging: { level: "error" } }), { transport: gitlab.transport });
      expect(getLogLevel()).toBe("warn");
    } finally {
      setLogLevel("info");
    }
  });
});

describe("getSnapshot()", () => {
  it("builds section metrics for a project", async () => {
    healthyProject(gitlab);
    const snapshot = await insightsFor(gitlab.transport).getSnapshot(TARGET, WINDOW);

    expect(snapshot.projects).toEqual([{ id: 42, name: "widgets", path: "acme/widgets" }]);
    expect(snapshot.commits).toEqual({
      total: 50,
      perWeek: 11.67,
      additions: 500,
      deletions: 100,
      authors: 5,
      lastCommitAt: "2026-03-26T01:00:00.000Z",
    });
    expect(snapshot.issues).toEqual({
      considered: 12,
      open: 2,
      closed: 10,
      closureRate: 0.8333,
      overdue: 0,
      unassignedOpen: 2,
      avgResolutionDays: 2,
      byLabel: {},
      byWorkflowState: { to_do: 2, in_progress: 0, in_review: 0, blocked: 0, done: 10 },
    });
    expect(snapshot.mergeRequests).toEqual({
      considered: 9,
      open: 1,
      merged: 8,
      closed: 0,
      mergeRate: 0.8889,
      avgMergeHours: 5,
      avgNotesPerMergeRequest: 2,
    });
    expect(snapshot.contributors?.total).toBe(5);
    expect(snapshot.missing).toEqual([]);
    expect(snapshot.builtAt).toBe("2026-03-31T12:00:00.000Z");
  });

  it("sends the token as a bearer header", async () => {
    healthyProject(gitlab);
    await insightsFor(gitlab.transport).getSnapshot(TARGET, WINDOW);
    expect(new Set(gitlab.requests.map((request) => request.authorization))).toEqual(
      new Set(["Bearer test-secret"])
    );
  });

  it("emits 30 daily samples per series metric", async () => {
    healthyProject(gitlab);
    const snapshot = await insightsFor(gitlab.transport).getSnapshot(TARGET, WINDOW);
    const commitSamples = snapshot.series.filter((sample) => sample.metric === "commits");
    expect(commitSamples).toHaveLength(30);
    expect(commitSamples[0]).toEqual({ metric: "commits", bucket: WINDOW.since, value: 2 });
    expect(commitSamples.reduce((sum, sample) => sum + sample.value, 0)).toBe(50);
  });

  it("returns a frozen value", async () => {
    healthyProject(gitlab);
    const snapshot = await insightsFor(gitlab.transport).getSnapshot(TARGET, WINDOW);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.commits)).toBe(true);
    expect(Object.isFrozen(snapshot.series)).toBe(true);
  });

  it("serves a repeated call from the cache", async () => {
    healthyProject(gitlab);
    const insights = insightsFor(gitlab.transport);
    await insights.getSnapshot(TARGET, WINDOW);
    // project + 3 commit pages + issues + merge requests
    expect(gitlab.requests).toHaveLength(6);

    await insights.getSnapshot(TARGET, WINDOW);
    expect(gitlab.requests).toHaveLength(6);
    expect(insights.cacheStats().hits).toBe(1);
  });

  it("aggregates every project of a group", async () => {
    healthyProject(gitlab, 42);
    healthyProject(gitlab, 43);
    gitlab.list("/groups/7/projects", [project(43, "acme/gears"), project(42, "acme/widgets")]);

    const snapshot = await insightsFor(gitlab.transport, { gitlab: { projectPagination: "keyset" } }).getSnapshot(
      { kind: "group", id: "7" },
      WINDOW
    );

    expect(snapshot.projects.map((p) => p.id)).toEqual([42, 43]);
    expect(snapshot.commits?.total).toBe(100);
    expect(snapshot.issues?.considered).toBe(24);
    expect(gitlab.requestsTo("/groups/7/projects")[0].query.get("pagination")).toBe("keyset");
  });

  it("retries a transient failure and reports the retry as a transition", async () => {
    healthyProject(gitlab);
    gitlab.script(COMMITS_PATH, { status: 503, body: { message: "upstream unavailable" } });
    const transitions: FetchTransition[] = [];

    const snapshot = await insightsFor(gitlab.transport, {}, (t) => transitions.push(t)).getSnapshot(
      TARGET,
      WINDOW
    );

    expect(snapshot.commits?.total).toBe(50);
    expect(gitlab.requestsTo(COMMITS_PATH)).toHaveLength(4);
    expect(transitions.filter((t) => t.operation === "commits").map((t) => t.to)).toEqual([
      "FETCHING_PAGE",
      "RETRYING",
      "FETCHING_PAGE",
      "FETCHING_PAGE",
      "FETCHING_PAGE",
      "DONE",
    ]);
  });

  it("marks a forbidden section as missing and keeps the rest", async () => {
    healthyProject(gitlab);
    gitlab.script(ISSUES_PATH, { status: 403, body: { message: "403 Forbidden" } });

    const snapshot = await insightsFor(gitlab.transport).getSnapshot(TARGET, WINDOW);

    expect(snapshot.issues).toBeNull();
    expect(snapshot.commits?.total).toBe(50);
    expect(snapshot.missing).toEqual([{ section: "issues", kind: "authorization", message: "403 Forbidden" }]);
  });

  it("treats a disabled repository as an empty section", async () => {
    healthyProject(gitlab);
    gitlab.script(COMMITS_PATH, { status: 404, body: { message: "404 Repository Not Found" } });

    const snapshot = await insightsFor(gitlab.transport).getSnapshot(TARGET, WINDOW);

    expect(snapshot.commits?.total).toBe(0);
    expect(snapshot.missing).toEqual([]);
  });

  it("fails with InsufficientData when every section is missing", async () => {
    healthyProject(gitlab);
    for (const path of [COMMITS_PATH, ISSUES_PATH, MRS_PATH]) {
      gitlab.script(path, { status: 403, body: { message: "403 Forbidden" } });
    }

    const error = await insightsFor(gitlab.transport)
      .getSnapshot(TARGET, WINDOW)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InsufficientData);
    expect(error instanceof InsufficientData && error.failures.map((f) => f.section)).toEqual([
      "commits",
      "issues",
      "mergeRequests",
    ]);
  });

  it("propagates authentication failures", async () => {
    gitlab.script(`/projects/${PROJECT_ID}`, { status: 401, body: { message: "401 Unauthorized" } });
    await expect(insightsFor(gitlab.transport).getSnapshot(TARGET, WINDOW)).rejects.toBeInstanceOf(
      AuthenticationError
    );
  });

  it("rejects with DeadlineExceeded when the call deadline passes", async () => {
    const hanging: Transport = (_url, init) =>
      new Promise((_resolve, reject) => {
        init.signal.addEventListener("abort", () => reject(init.signal.reason), { once: true });
      });

    await expect(
      insightsFor(hanging).getSnapshot(TARGET, WINDOW, { timeoutMs: 20 })
    ).rejects.toBeInstanceOf(DeadlineExceeded);
  });

  it("rejects with OperationCancelled for an aborted signal", async () => {
    healthyProject(gitlab);
    const controller = new AbortController();
    controller.abort();

    await expect(
      insightsFor(gitlab.transport).getSnapshot(TARGET, WINDOW, { signal: controller.signal })
    ).rejects.toBeInstanceOf(OperationCancelled);
    expect(gitlab.requests).toHaveLength(0);
  });
});

describe("getHealthScore()", () => {
  it("grades an active project A", async () => {
    healthyProject(gitlab);
    const health = await insightsFor(gitlab.transport).getHealthScore(TARGET, WINDOW);

    expect(health.score).toBe(96);
    expect(health.grade).toBe("A");
    expect(health.partial).toBe(false);
    expect(health.factors.issueResolution).toEqual({ score: 83.3, weight: 0.25, effectiveWeight: 0.25 });
    expect(health.factors.mergeEfficiency.score).toBe(100);
    expect(health.recommendations).toEqual([]);
  });

  it("renormalizes over the sections that were fetched", async () => {
    healthyProject(gitlab);
    gitlab.script(ISSUES_PATH, { status: 403, body: { message: "403 Forbidden" } });

    const health = await insightsFor(gitlab.transport).getHealthScore(TARGET, WINDOW);

    expect(health.partial).toBe(true);
    expect(health.score).toBe(100);
    expect(health.factors.issueResolution).toEqual({ score: null, weight: 0.25, effectiveWeight: 0 });
    expect(health.factors.commitActivity.effectiveWeight).toBe(0.4667);
    expect(health.recommendations.map((r) => r.id)).toEqual(["partial-data"]);
    expect(health.recommendations[0].condition).toBe("no data for issueResolution");
  });
});

describe("getTrend()", () => {
  it("reports commits that started in the current half as new", async () => {
    const commits = Array.from({ length: 20 }, (_, i) => commit(i, "dev0", at(15, i)));
    gitlab
      .single(`/projects/${PROJECT_ID}`, project())
      .list(COMMITS_PATH, commits)
      .list(ISSUES_PATH, [])
      .list(MRS_PATH, []);

    const trend = await insightsFor(gitlab.transport).getTrend(TARGET, WINDOW);

    expect(trend.previousWindow).toEqual({ since: WINDOW.since, until: "2026-03-16T12:00:00.000Z" });
    expect(trend.metrics[0]).toEqual({
      metric: "commits",
      previous: 0,
      current: 20,
      delta: "new",
      percentChange: null,
      direction: "rising",
    });
    expect(trend.summary).toEqual({ rising: 1, falling: 0, flat: 4 });
  });
});

describe("resolveContributors()", () => {
  it("merges aliased identities", async () => {
    healthyProject(gitlab);
    const insights = insightsFor(gitlab.transport, {
      identity: { aliases: { "dev0@example.com": "Dana", dev1: "Dana" } },
    });

    const contributors = await insights.resolveContributors(TARGET, WINDOW);

    expect(contributors).toHaveLength(4);
    expect(contributors[0]).toEqual({
      name: "Dana",
      mapped: true,
      aliases: ["dev0", "dev0@example.com", "dev1", "dev1@example.com"],
      projects: ["acme/widgets"],
      commits: 20,
      additions: 200,
      deletions: 40,
      mergeRequests: 0,
      issuesClosed: 0,
    });
  });
});

describe("clearCache()", () => {
  it("drops entries by prefix and refetches only what was dropped", async () => {
    healthyProject(gitlab);
    const insights = insightsFor(gitlab.transport);
    await insights.getSnapshot(TARGET, WINDOW);

    expect(insights.clearCache("snapshot:")).toBe(1);
    await insights.getSnapshot(TARGET, WINDOW);
    expect(gitlab.requests).toHaveLength(6);

    expect(insights.clearCache()).toBe(5);
    await insights.getSnapshot(TARGET, WINDOW);
    expect(gitlab.requests).toHaveLength(12);
  });
});
