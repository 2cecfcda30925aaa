/**
 * Insights configuration: defaults < config file < environment < flags.
 *
 * The layers are merged and validated once, producing a frozen value that is
 * handed to createContext(). Nothing below this module reads the environment
 * or the filesystem for settings.
 *
 * Config file: .gitlab-insights.json in the working directory (JSON).
 */

import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join } from "node:path";
import { parseArgs } from "node:util";
import { z } from "zod";
import { deepFreeze, isPlainObject } from "./immutable.js";

// ─── TTL Presets (milliseconds) ─────────────────────────

export const TTL = {
  /** Snapshots and the raw record sets they are built from */
  SNAPSHOT: 15 * 60 * 1000,
  /** Trend aggregates */
  TREND: 30 * 60 * 1000,
} as const;

// ─── Scoring Defaults ───────────────────────────────────

export const DEFAULT_WEIGHTS = {
  commitActivity: 0.35,
  issueResolution: 0.25,
  mergeEfficiency: 0.25,
  contributorDiversity: 0.15,
} as const;

/** Lower bounds are inclusive; bands must be strictly descending and end at 0. */
export const DEFAULT_GRADES = [
  { grade: "A", min: 90 },
  { grade: "B", min: 80 },
  { grade: "C", min: 70 },
  { grade: "D", min: 60 },
  { grade: "F", min: 0 },
] as const;

export const DEFAULT_THRESHOLDS = {
  /** Commit activity saturates at this many commits per week */
  commitsPerWeekCeiling: 10,
  /** Contributor diversity saturates at this many canonical contributors */
  contributorCeiling: 5,
  moderateResolutionDays: 14,
  slowResolutionDays: 30,
  fastMergeHours: 24,
  slowMergeHours: 168,
  /** Recommendation triggers */
  attentionScore: 60,
  minWeeklyCommits: 1,
  minContributors: 2,
  maxOverdueIssues: 0,
  maxUnassignedRatio: 0.3,
  minMergeRate: 0.7,
} as const;

// ─── Workflow Defaults ──────────────────────────────────

export const WORKFLOW_STATES = ["to_do", "in_progress", "in_review", "blocked", "done"] as const;

export type WorkflowState = (typeof WORKFLOW_STATES)[number];

/**
 * Board label mappings in precedence order: when an open issue carries labels
 * of several states, the state listed first wins.
 */
export const DEFAULT_WORKFLOW_LABELS: ReadonlyArray<{ state: WorkflowState; labels: readonly string[] }> = [
  { state: "blocked", labels: ["Blocked", "On Hold", "Waiting", "Pending", "Stalled"] },
  {
    state: "in_review",
    labels: ["In Review", "Code Review", "Review", "Testing", "QA", "Awaiting Review", "Under Review"],
  },
  {
    state: "in_progress",
    labels: ["In Progress", "Doing", "In Development", "InProgress", "WIP", "Work In Progress", "Active", "Started"],
  },
  { state: "to_do", labels: ["To Do", "TODO", "Backlog", "Open", "New", "To-Do", "Ready"] },
  { state: "done", labels: ["Done", "Closed", "Complete", "Completed", "Finished", "Resolved"] },
];

// ─── Schema ─────────────────────────────────────────────

const WeightsSchema = z
  .object({
    commitActivity: z.number().min(0).max(1),
    issueResolution: z.number().min(0).max(1),
    mergeEfficiency: z.number().min(0).max(1),
    contributorDiversity: z.number().min(0).max(1),
  })
  .refine(
    (w) => Math.abs(w.commitActivity + w.issueResolution + w.mergeEfficiency + w.contributorDiversity - 1) < 1e-6,
    { message: "weights must sum to 1.0" }
  );

const GradesSchema = z
  .array(z.object({ grade: z.string().min(1), min: z.number().int().min(0).max(100) }))
  .min(1)
  .refine((bands) => bands.every((band, i) => i === 0 || band.min < bands[i - 1].min), {
    message: "grade bands must be strictly descending",
  })
  .refine((bands) => bands[bands.length - 1].min === 0, {
    message: "the last grade band must start at 0",
  });

const ThresholdsSchema = z.object({
  commitsPerWeekCeiling: z.number().positive().default(DEFAULT_THRESHOLDS.commitsPerWeekCeiling),
  contributorCeiling: z.number().positive().default(DEFAULT_THRESHOLDS.contributorCeiling),
  moderateResolutionDays: z.number().positive().default(DEFAULT_THRESHOLDS.moderateResolutionDays),
  slowResolutionDays: z.number().positive().default(DEFAULT_THRESHOLDS.slowResolutionDays),
  fastMergeHours: z.number().positive().default(DEFAULT_THRESHOLDS.fastMergeHours),
  slowMergeHours: z.number().positive().default(DEFAULT_THRESHOLDS.slowMergeHours),
  attentionScore: z.number().min(0).max(100).default(DEFAULT_THRESHOLDS.attentionScore),
  minWeeklyCommits: z.number().min(0).default(DEFAULT_THRESHOLDS.minWeeklyCommits),
  minContributors: z.number().int().min(0).default(DEFAULT_THRESHOLDS.minContributors),
  maxOverdueIssues: z.number().int().min(0).default(DEFAULT_THRESHOLDS.maxOverdueIssues),
  maxUnassignedRatio: z.number().min(0).max(1).default(DEFAULT_THRESHOLDS.maxUnassignedRatio),
  minMergeRate: z.number().min(0).max(1).default(DEFAULT_THRESHOLDS.minMergeRate),
});

const WorkflowLabelsSchema = z.array(
  z.object({ state: z.enum(WORKFLOW_STATES), labels: z.array(z.string().min(1)) })
);

export const InsightsConfigSchema = z.object({
  gitlab: z.object({
    url: z.string().url().default("https://gitlab.com"),
    token: z.string().min(1, "GitLab API token not configured. Set GITLAB_API_TOKEN."),
    timeoutMs: z.number().int().positive().default(30_000),
    perPage: z.number().int().min(1).max(100).default(100),
    maxPages: z.number().int().positive().default(1000),
    /** Group project listings support keyset pagination; other lists are offset-based */
    projectPagination: z.enum(["offset", "keyset"]).default("offset"),
  }),
  rateLimit: z
    .object({ requestsPerSecond: z.number().positive().default(3) })
    .default({}),
  retry: z
    .object({
      maxRetries: z.number().int().min(0).default(3),
      baseDelayMs: z.number().int().min(0).default(1000),
      maxDelayMs: z.number().int().min(0).default(30_000),
    })
    .default({}),
  concurrency: z.object({ maxWorkers: z.number().int().positive().default(4) }).default({}),
  cache: z
    .object({
      snapshotTtlMs: z.number().int().positive().default(TTL.SNAPSHOT),
      recordsTtlMs: z.number().int().positive().default(TTL.SNAPSHOT),
      trendTtlMs: z.number().int().positive().default(TTL.TREND),
      /** SQLite file for raw record sets; null keeps the cache in memory only */
      persistPath: z.string().min(1).nullable().default(null),
    })
    .default({}),
  scoring: z
    .object({
      weights: WeightsSchema.default({ ...DEFAULT_WEIGHTS }),
      thresholds: ThresholdsSchema.default({}),
      grades: GradesSchema.default(DEFAULT_GRADES.map((band) => ({ ...band }))),
    })
    .default({}),
  trends: z.object({ minChangePercent: z.number().min(0).default(10) }).default({}),
  identity: z
    .object({
      /** Raw username, email or display name → canonical contributor name */
      aliases: z.record(z.string(), z.string().min(1)).default({}),
    })
    .default({}),
  workflow: z
    .object({
      states: WorkflowLabelsSchema.default(
        DEFAULT_WORKFLOW_LABELS.map((entry) => ({ state: entry.state, labels: [...entry.labels] }))
      ),
      allowOpenAsDone: z.boolean().default(false),
    })
    .default({}),
  logging: z
    .object({ level: z.enum(["debug", "info", "warn", "error"]).default("info") })
    .default({}),
});

export type InsightsConfig = z.infer<typeof InsightsConfigSchema>;
export type ScoringConfig = InsightsConfig["scoring"];
export type ScoringWeights = ScoringConfig["weights"];
export type ScoringThresholds = ScoringConfig["thresholds"];
export type GradeBand = ScoringConfig["grades"][number];
export type WorkflowConfig = InsightsConfig["workflow"];

export type ConfigLayer = Record<string, unknown>;

// ─── Layers ─────────────────────────────────────────────

export const CONFIG_FILE_NAME = ".gitlab-insights.json";

export function defaultConfigPath(cwd: string = process.cwd()): string {
  return join(cwd, CONFIG_FILE_NAME);
}

/** Read the JSON config file; a missing file is an empty layer. */
export async function loadConfigFile(path: string): Promise<ConfigLayer> {
  if (!existsSync(path)) return {};
  const content = await readFile(path, "utf-8");
  const json: unknown = JSON.parse(content);
  if (!isPlainObject(json)) {
    throw new Error(`Config file ${path} must contain a JSON object`);
  }
  return json;
}

function envNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return Number(value);
}

/** Build the environment layer. Only variables that are set appear in it. */
export function configFromEnv(env: NodeJS.ProcessEnv): ConfigLayer {
  const gitlab: ConfigLayer = {};
  if (env.GITLAB_URL) gitlab.url = env.GITLAB_URL;
  if (env.GITLAB_API_TOKEN) gitlab.token = env.GITLAB_API_TOKEN;
  const timeoutSeconds = envNumber(env.GITLAB_TIMEOUT);
  if (timeoutSeconds !== undefined) gitlab.timeoutMs = timeoutSeconds * 1000;

  const layer: ConfigLayer = {};
  if (Object.keys(gitlab).length > 0) layer.gitlab = gitlab;

  const rps = envNumber(env.GITLAB_RATE_LIMIT);
  if (rps !== undefined) layer.rateLimit = { requestsPerSecond: rps };

  const maxRetries = envNumber(env.GITLAB_MAX_RETRIES);
  if (maxRetries !== undefined) layer.retry = { maxRetries };

  if (env.GITLAB_CACHE_PATH) layer.cache = { persistPath: env.GITLAB_CACHE_PATH };
  if (env.GITLAB_LOG_LEVEL) layer.logging = { level: env.GITLAB_LOG_LEVEL };

  return layer;
}

/** Command-line flags: --config <path> plus a few overrides. */
export function configFromArgs(args: string[]): { configPath: string | undefined; overrides: ConfigLayer } {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string" },
      url: { type: "string" },
      "rate-limit": { type: "string" },
      "cache-path": { type: "string" },
      "log-level": { type: "string" },
    },
    strict: true,
  });

  const overrides: ConfigLayer = {};
  if (values.url) overrides.gitlab = { url: values.url };
  const rps = envNumber(values["rate-limit"]);
  if (rps !== undefined) overrides.rateLimit = { requestsPerSecond: rps };
  if (values["cache-path"]) overrides.cache = { persistPath: values["cache-path"] };
  if (values["log-level"]) overrides.logging = { level: values["log-level"] };
  return { configPath: values.config, overrides };
}

/** Deep-merge plain objects; arrays and scalars from later layers replace earlier ones. */
export function mergeLayers(...layers: ConfigLayer[]): ConfigLayer {
  const result: ConfigLayer = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue;
      const existing = result[key];
      result[key] =
        isPlainObject(existing) && isPlainObject(value) ? mergeLayers(existing, value) : value;
    }
  }
  return result;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export interface ConfigSources {
  file?: ConfigLayer;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigLayer;
}

/** Merge and validate all layers into one frozen configuration value. */
export function resolveConfig(sources: ConfigSources = {}): Readonly<InsightsConfig> {
  const merged = mergeLayers(
    sources.file ?? {},
    sources.env ? configFromEnv(sources.env) : {},
    sources.overrides ?? {}
  );
  const parsed = InsightsConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  return deepFreeze(parsed.data);
}
