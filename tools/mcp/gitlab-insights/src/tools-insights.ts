import { z } from "zod";
import type { Target } from "./gitlab.js";
import type { Insights } from "./insights.js";
import { getOperationMetrics } from "./logger.js";
import { lastDays, makeWindow, type TimeWindow } from "./window.js";
import {
  type McpServer,
  toolResponse,
  toolError,
  wrapTool,
} from "./tool-helpers.js";

const DEFAULT_DAYS = 30;

const scopeShape = {
  kind: z
    .enum(["project", "group"])
    .describe("Whether id names a project or a group"),
  id: z
    .string()
    .min(1)
    .describe("Numeric id or URL path, e.g. 'my-group/my-project'"),
  days: z
    .number()
    .int()
    .positive()
    .optional()
    .describe(`Window of the last N days (default ${DEFAULT_DAYS}); ignored when since is given`),
  since: z
    .string()
    .optional()
    .describe("Window start, ISO 8601 (inclusive)"),
  until: z
    .string()
    .optional()
    .describe("Window end, ISO 8601 (exclusive, default now)"),
  timeoutMs: z
    .number()
    .int()
    .positive()
    .optional()
    .describe("Deadline for the whole call in milliseconds"),
};

interface ScopeArgs {
  kind: Target["kind"];
  id: string;
  days?: number;
  since?: string;
  until?: string;
  timeoutMs?: number;
}

export function resolveScope(
  args: ScopeArgs,
  now: number
): { target: Target; window: TimeWindow; options: { timeoutMs?: number } } {
  const window = args.since
    ? makeWindow(args.since, args.until ?? new Date(now))
    : lastDays(args.days ?? DEFAULT_DAYS, now);
  return {
    target: { kind: args.kind, id: args.id },
    window,
    options: { timeoutMs: args.timeoutMs },
  };
}

export function register(server: McpServer, insights: Insights, now: () => number = () => Date.now()) {
  server.registerTool(
    "get_snapshot",
    {
      title: "GitLab Snapshot",
      description:
        "Fetch a metrics snapshot for a GitLab project or group over a time window: commit activity, issue closure and resolution time, merge request throughput, contributors, and daily series. Sections that could not be fetched are listed under 'missing'. Results are cached.",
      inputSchema: scopeShape,
    },
    wrapTool("get_snapshot", async (args: ScopeArgs) => {
      const { target, window, options } = resolveScope(args, now());
      return toolResponse(await insights.getSnapshot(target, window, options));
    })
  );

  server.registerTool(
    "get_health_score",
    {
      title: "Health Score",
      description:
        "Score a GitLab project or group 0-100 from commit activity, issue resolution, merge efficiency and contributor diversity. Returns the letter grade, per-factor scores, whether the score rests on partial data, and recommendations ordered by severity.",
      inputSchema: scopeShape,
    },
    wrapTool("get_health_score", async (args: ScopeArgs) => {
      const { target, window, options } = resolveScope(args, now());
      return toolResponse(await insights.getHealthScore(target, window, options));
    })
  );

  server.registerTool(
    "get_trend",
    {
      title: "Activity Trend",
      description:
        "Compare the previous and current half of a window for commits, opened and closed issues, and opened and merged merge requests. Each metric is rising, falling or flat; a metric that went from zero to some activity is reported as 'new'.",
      inputSchema: scopeShape,
    },
    wrapTool("get_trend", async (args: ScopeArgs) => {
      const { target, window, options } = resolveScope(args, now());
      return toolResponse(await insights.getTrend(target, window, options));
    })
  );

  server.registerTool(
    "resolve_contributors",
    {
      title: "Resolve Contributors",
      description:
        "List the contributors of a project or group over a window, with commit emails, usernames and display names merged through the configured alias map. Each entry carries its aliases, projects and contribution totals.",
      inputSchema: scopeShape,
    },
    wrapTool("resolve_contributors", async (args: ScopeArgs) => {
      const { target, window, options } = resolveScope(args, now());
      return toolResponse(await insights.resolveContributors(target, window, options));
    })
  );

  server.registerTool(
    "clear_cache",
    {
      title: "Clear Cache",
      description:
        "Invalidate cached entries whose key starts with the given prefix (e.g. 'snapshot:project/42'), or everything when no prefix is given. Returns the number of entries dropped.",
      inputSchema: {
        prefix: z
          .string()
          .optional()
          .describe("Key prefix; omit to clear the whole cache"),
      },
    },
    async ({ prefix }) => {
      try {
        return toolResponse({ cleared: insights.clearCache(prefix) });
      } catch (error) {
        return toolError(error);
      }
    }
  );

  server.registerTool(
    "get_cache_stats",
    {
      title: "Cache and Rate Limit Stats",
      description:
        "Cache entry counts and hit/miss totals, rate limiter state, and per-operation call metrics for this server process.",
    },
    async () => {
      return toolResponse({
        cache: insights.cacheStats(),
        rateLimit: insights.limiterStats(),
        operations: getOperationMetrics(),
      });
    }
  );

  server.registerResource(
    "insights-stats",
    "gitlab-insights://stats",
    {
      title: "Insights Server Stats",
      description: "Cache, rate limiter and operation metrics",
      mimeType: "application/json",
    },
    async (uri) => ({
      contents: [
        {
          uri: uri.href,
          text: JSON.stringify(
            {
              cache: insights.cacheStats(),
              rateLimit: insights.limiterStats(),
              operations: getOperationMetrics(),
            },
            null,
            2
          ),
        },
      ],
    })
  );
}

export const INSIGHTS_TOOLS = [
  "get_snapshot",
  "get_health_score",
  "get_trend",
  "resolve_contributors",
  "clear_cache",
  "get_cache_stats",
] as const;
