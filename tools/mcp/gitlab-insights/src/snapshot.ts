/**
 * Snapshot builder: normalized activity for a project or group over a window.
 *
 * Resolves the projects in scope, fetches commits, issues and merge requests
 * per project through a bounded worker pool, and reduces them to section
 * metrics, daily series and canonical contributors.
 *
 * Degradation: a section whose fetch fails is reported in `missing` and left
 * null; the build fails only when every section is missing. Authentication
 * failures, deadlines and cancellation are never degraded.
 */

import { z } from "zod";
import type { WorkflowConfig, WorkflowState } from "./config.js";
import {
  GitLabError,
  InsufficientData,
  ResourceNotFound,
  UnexpectedResponse,
  isCallerVisible,
  type SectionFailure,
} from "./errors.js";
import { targetKey, targetPath, type Target } from "./gitlab.js";
import { IdentityResolver, type AliasMap, type CanonicalContributor, type RawIdentity } from "./identity.js";
import { deepFreeze } from "./immutable.js";
import { log } from "./logger.js";
import { requestDescriptor, type RecordSource } from "./records.js";
import { DAY_MS, mapWithConcurrency } from "./timing.js";
import { WorkflowClassifier } from "./workflow.js";
import {
  bucketOf,
  contains,
  dayBuckets,
  windowDays,
  windowEnd,
  windowLabel,
  type TimeWindow,
} from "./window.js";

// ─── Record Schemas ─────────────────────────────────────

const Person = z.object({
  username: z.string(),
  name: z.string().nullish(),
});

const CommitRecord = z.object({
  id: z.string(),
  author_name: z.string().nullish(),
  author_email: z.string().nullish(),
  created_at: z.string(),
  committed_date: z.string().nullish(),
  stats: z.object({ additions: z.number(), deletions: z.number() }).nullish(),
});

const IssueRecord = z.object({
  id: z.number(),
  iid: z.number(),
  state: z.string(),
  created_at: z.string(),
  closed_at: z.string().nullish(),
  /** YYYY-MM-DD */
  due_date: z.string().nullish(),
  labels: z.array(z.string()).default([]),
  assignees: z.array(Person).default([]),
  assignee: Person.nullish(),
  closed_by: Person.nullish(),
});

const MergeRequestRecord = z.object({
  id: z.number(),
  iid: z.number(),
  state: z.string(),
  created_at: z.string(),
  merged_at: z.string().nullish(),
  closed_at: z.string().nullish(),
  user_notes_count: z.number().default(0),
  author: Person.nullish(),
});

const ProjectRecord = z.object({
  id: z.number(),
  name: z.string(),
  path_with_namespace: z.string(),
});

export type CommitRecord = z.infer<typeof CommitRecord>;
export type IssueRecord = z.infer<typeof IssueRecord>;
export type MergeRequestRecord = z.infer<typeof MergeRequestRecord>;

// ─── Snapshot Types ─────────────────────────────────────

export const SERIES_METRICS = [
  "commits",
  "issues_opened",
  "issues_closed",
  "merge_requests_opened",
  "merge_requests_merged",
] as const;

export type SeriesMetric = (typeof SERIES_METRICS)[number];

export interface MetricSample {
  metric: SeriesMetric;
  /** Bucket start, ISO 8601 */
  bucket: string;
  value: number;
}

export interface ProjectRef {
  id: number;
  name: string;
  path: string;
}

export interface CommitMetrics {
  total: number;
  perWeek: number;
  additions: number;
  deletions: number;
  /** Distinct raw commit authors, before identity resolution */
  authors: number;
  lastCommitAt: string | null;
}

export interface IssueMetrics {
  /** Issues created or closed in the window */
  considered: number;
  open: number;
  closed: number;
  closureRate: number | null;
  overdue: number;
  unassignedOpen: number;
  avgResolutionDays: number | null;
  byLabel: Record<string, number>;
  byWorkflowState: Record<WorkflowState, number>;
}

export interface MergeRequestMetrics {
  /** MRs created, merged or closed in the window */
  considered: number;
  open: number;
  merged: number;
  closed: number;
  mergeRate: number | null;
  avgMergeHours: number | null;
  avgNotesPerMergeRequest: number | null;
}

export interface ContributorMetrics {
  total: number;
  contributors: CanonicalContributor[];
}

export type SectionName = "commits" | "issues" | "mergeRequests";

export interface Snapshot {
  target: Target;
  window: TimeWindow;
  projects: ProjectRef[];
  commits: CommitMetrics | null;
  issues: IssueMetrics | null;
  mergeRequests: MergeRequestMetrics | null;
  contributors: ContributorMetrics | null;
  series: MetricSample[];
  /** Sections that could not be fetched, with the reason */
  missing: SectionFailure[];
  builtAt: string;
}

// ─── Helpers ────────────────────────────────────────────

export function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function ms(timestamp: string): number {
  return Date.parse(timestamp);
}

function commitTime(commit: CommitRecord): string {
  return commit.committed_date ?? commit.created_at;
}

/** Issue state as of the window end. */
function closedInWindow(issue: IssueRecord, window: TimeWindow): boolean {
  return contains(window, issue.closed_at);
}

function mergedInWindow(mr: MergeRequestRecord, window: TimeWindow): boolean {
  return contains(window, mr.merged_at);
}

function closedUnmergedInWindow(mr: MergeRequestRecord, window: TimeWindow): boolean {
  return !mr.merged_at && contains(window, mr.closed_at);
}

function isAssigned(issue: IssueRecord): boolean {
  return issue.assignees.length > 0 || Boolean(issue.assignee);
}

/** Due at the end of its due date; overdue if that is at or before the window end. */
function isOverdue(issue: IssueRecord, window: TimeWindow): boolean {
  if (!issue.due_date) return false;
  const due = Date.parse(`${issue.due_date}T00:00:00Z`);
  return !Number.isNaN(due) && due + DAY_MS <= windowEnd(window);
}

// ─── Section Metrics ────────────────────────────────────

/** Issues created or closed in the window. */
export function isConsideredIssue(issue: IssueRecord, window: TimeWindow): boolean {
  return contains(window, issue.created_at) || closedInWindow(issue, window);
}

/** Merge requests created, merged or closed in the window. */
export function isConsideredMergeRequest(mr: MergeRequestRecord, window: TimeWindow): boolean {
  return contains(window, mr.created_at) || mergedInWindow(mr, window) || contains(window, mr.closed_at);
}

export function commitMetrics(commits: readonly CommitRecord[], window: TimeWindow): CommitMetrics {
  const authors = new Set<string>();
  let additions = 0;
  let deletions = 0;
  let last: string | null = null;

  for (const commit of commits) {
    const author = (commit.author_email ?? commit.author_name ?? "").trim().toLowerCase();
    if (author) authors.add(author);
    additions += commit.stats?.additions ?? 0;
    deletions += commit.stats?.deletions ?? 0;
    const at = commitTime(commit);
    if (last === null || ms(at) > ms(last)) last = at;
  }

  const weeks = windowDays(window) / 7;
  return {
    total: commits.length,
    perWeek: round(commits.length / weeks, 2),
    additions,
    deletions,
    authors: authors.size,
    lastCommitAt: last === null ? null : new Date(ms(last)).toISOString(),
  };
}

export function issueMetrics(
  issues: readonly IssueRecord[],
  window: TimeWindow,
  classifier: WorkflowClassifier
): IssueMetrics {
  const closed = issues.filter((issue) => closedInWindow(issue, window));
  const open = issues.filter((issue) => !closedInWindow(issue, window));

  const resolutionDays = closed.flatMap((issue) =>
    issue.closed_at ? [(ms(issue.closed_at) - ms(issue.created_at)) / DAY_MS] : []
  );

  const labelCounts = new Map<string, number>();
  for (const issue of issues) {
    for (const label of issue.labels) labelCounts.set(label, (labelCounts.get(label) ?? 0) + 1);
  }
  const byLabel: Record<string, number> = {};
  for (const label of [...labelCounts.keys()].sort()) byLabel[label] = labelCounts.get(label) ?? 0;

  const avgResolution = mean(resolutionDays);
  return {
    considered: issues.length,
    open: open.length,
    closed: closed.length,
    closureRate: issues.length > 0 ? round(closed.length / issues.length, 4) : null,
    overdue: open.filter((issue) => isOverdue(issue, window)).length,
    unassignedOpen: open.filter((issue) => !isAssigned(issue)).length,
    avgResolutionDays: avgResolution === null ? null : round(avgResolution, 1),
    byLabel,
    byWorkflowState: classifier.tally(
      issues.map((issue) => ({
        state: closedInWindow(issue, window) ? "closed" : "opened",
        labels: issue.labels,
      }))
    ),
  };
}

export function mergeRequestMetrics(
  mrs: readonly MergeRequestRecord[],
  window: TimeWindow
): MergeRequestMetrics {
  const merged = mrs.filter((mr) => mergedInWindow(mr, window));
  const closed = mrs.filter((mr) => closedUnmergedInWindow(mr, window));
  const open = mrs.length - merged.length - closed.length;

  const mergeHours = merged.flatMap((mr) =>
    mr.merged_at ? [(ms(mr.merged_at) - ms(mr.created_at)) / 3_600_000] : []
  );
  const avgMerge = mean(mergeHours);
  const avgNotes = mean(mrs.map((mr) => mr.user_notes_count));

  return {
    considered: mrs.length,
    open,
    merged: merged.length,
    closed: closed.length,
    mergeRate: mrs.length > 0 ? round(merged.length / mrs.length, 4) : null,
    avgMergeHours: avgMerge === null ? null : round(avgMerge, 1),
    avgNotesPerMergeRequest: avgNotes === null ? null : round(avgNotes, 1),
  };
}

function countSeries(
  metric: SeriesMetric,
  timestamps: ReadonlyArray<string | null | undefined>,
  window: TimeWindow
): MetricSample[] {
  const counts = new Map<string, number>(dayBuckets(window).map((bucket) => [bucket, 0]));
  for (const timestamp of timestamps) {
    if (!timestamp) continue;
    const bucket = bucketOf(window, timestamp);
    if (bucket !== null) counts.set(bucket, (counts.get(bucket) ?? 0) + 1);
  }
  return [...counts].map(([bucket, value]) => ({ metric, bucket, value }));
}

// ─── Builder ────────────────────────────────────────────

export interface SnapshotBuilderOptions {
  source: RecordSource;
  perPage: number;
  maxWorkers: number;
  projectPagination: "offset" | "keyset";
  aliases: AliasMap;
  workflow: WorkflowConfig;
  now?: () => number;
}

/** A record together with the project path it was fetched from. */
interface Owned<T> {
  project: string;
  record: T;
}

interface SectionRecords {
  commits: Owned<CommitRecord>[];
  issues: Owned<IssueRecord>[];
  mergeRequests: Owned<MergeRequestRecord>[];
}

interface ProjectScope {
  ref: ProjectRef;
  target: Target;
}

type TaskOutcome =
  | { section: SectionName; project: ProjectScope; ok: true; records: readonly unknown[] }
  | { section: SectionName; project: ProjectScope; ok: false; error: GitLabError };

const SECTIONS: readonly SectionName[] = ["commits", "issues", "mergeRequests"];

function parseRecords<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, records: readonly unknown[], what: string): T[] {
  const parsed = z.array(schema).safeParse(records);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new UnexpectedResponse(`Unexpected ${what} payload at ${issue.path.join(".")}: ${issue.message}`);
  }
  return parsed.data;
}

export class SnapshotBuilder {
  private readonly classifier: WorkflowClassifier;
  private readonly identities: IdentityResolver;
  private readonly now: () => number;

  constructor(private readonly options: SnapshotBuilderOptions) {
    this.classifier = new WorkflowClassifier(options.workflow);
    this.identities = new IdentityResolver(options.aliases);
    this.now = options.now ?? (() => Date.now());
  }

  async build(target: Target, window: TimeWindow, signal?: AbortSignal): Promise<Snapshot> {
    const projects = await this.resolveProjects(target, signal);

    const tasks = projects.flatMap((project) => SECTIONS.map((section) => ({ section, project })));
    const outcomes = await mapWithConcurrency(
      tasks,
      this.options.maxWorkers,
      async ({ section, project }, taskSignal): Promise<TaskOutcome> => {
        try {
          const records = await this.fetchSection(section, project.target, window, taskSignal);
          return { section, project, ok: true, records };
        } catch (error) {
          if (!(error instanceof GitLabError) || isCallerVisible(error)) throw error;
          // Repository or issue tracker disabled on this project
          if (error instanceof ResourceNotFound) return { section, project, ok: true, records: [] };
          return { section, project, ok: false, error };
        }
      },
      signal
    );

    const missing: SectionFailure[] = [];
    const records: Partial<SectionRecords> = {};
    for (const section of SECTIONS) {
      const sectionOutcomes = outcomes.filter((outcome) => outcome.section === section);
      const failed = sectionOutcomes.find((outcome) => !outcome.ok);
      if (failed && !failed.ok) {
        missing.push({ section, kind: failed.error.kind, message: failed.error.message });
        log("warn", `snapshot section ${section} unavailable`, {
          target: targetKey(target),
          project: failed.project.ref.path,
          error: failed.error.message,
        });
        continue;
      }
      try {
        this.assign(records, section, sectionOutcomes, window);
      } catch (error) {
        if (!(error instanceof UnexpectedResponse)) throw error;
        missing.push({ section, kind: error.kind, message: error.message });
      }
    }

    if (missing.length === SECTIONS.length) {
      throw new InsufficientData(
        `No data available for ${targetKey(target)} in ${windowLabel(window)}`,
        missing
      );
    }

    return deepFreeze(this.assemble(target, window, projects, records, missing));
  }

  // ─── Fetching ──────────────────────────────────────────

  private async resolveProjects(target: Target, signal?: AbortSignal): Promise<ProjectScope[]> {
    const { source, perPage } = this.options;
    let raw: readonly unknown[];
    if (target.kind === "project") {
      raw = [await source.one("project", target, targetPath(target), signal)];
    } else {
      const keyset = this.options.projectPagination === "keyset";
      raw = await source.list(
        requestDescriptor({
          operation: "group_projects",
          target,
          path: `${targetPath(target)}/projects`,
          params: { include_subgroups: "true", archived: "false", order_by: "id", sort: "asc" },
          pagination: keyset ? "cursor" : "offset",
          perPage,
        }),
        signal
      );
    }

    return parseRecords(ProjectRecord, raw, "project")
      .map((project) => ({
        ref: { id: project.id, name: project.name, path: project.path_with_namespace },
        target: { kind: "project" as const, id: String(project.id) },
      }))
      .sort((a, b) => a.ref.id - b.ref.id);
  }

  private fetchSection(
    section: SectionName,
    project: Target,
    window: TimeWindow,
    signal: AbortSignal
  ): Promise<readonly unknown[]> {
    const { source, perPage } = this.options;
    const base = targetPath(project);
    switch (section) {
      case "commits":
        return source.list(
          requestDescriptor({
            operation: "commits",
            target: project,
            path: `${base}/repository/commits`,
            params: { since: window.since, until: window.until, with_stats: "true" },
            perPage,
          }),
          signal
        );
      case "issues":
        return source.list(
          requestDescriptor({
            operation: "issues",
            target: project,
            path: `${base}/issues`,
            params: { scope: "all", updated_after: window.since, order_by: "created_at", sort: "asc" },
            perPage,
          }),
          signal
        );
      case "mergeRequests":
        return source.list(
          requestDescriptor({
            operation: "merge_requests",
            target: project,
            path: `${base}/merge_requests`,
            params: { scope: "all", updated_after: window.since, order_by: "created_at", sort: "asc" },
            perPage,
          }),
          signal
        );
    }
  }

  private assign(
    records: Partial<SectionRecords>,
    section: SectionName,
    outcomes: readonly TaskOutcome[],
    window: TimeWindow
  ): void {
    const owned = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string): Owned<T>[] =>
      outcomes.flatMap((outcome) =>
        outcome.ok
          ? parseRecords(schema, outcome.records, what).map((record) => ({
              project: outcome.project.ref.path,
              record,
            }))
          : []
      );

    switch (section) {
      case "commits":
        records.commits = owned(CommitRecord, "commit").filter(({ record }) =>
          contains(window, commitTime(record))
        );
        break;
      case "issues":
        records.issues = owned(IssueRecord, "issue").filter(({ record }) => isConsideredIssue(record, window));
        break;
      case "mergeRequests":
        records.mergeRequests = owned(MergeRequestRecord, "merge request").filter(({ record }) =>
          isConsideredMergeRequest(record, window)
        );
        break;
    }
  }

  // ─── Assembly ──────────────────────────────────────────

  private assemble(
    target: Target,
    window: TimeWindow,
    projects: readonly ProjectScope[],
    records: Partial<SectionRecords>,
    missing: SectionFailure[]
  ): Snapshot {
    const commits = records.commits?.map(({ record }) => record);
    const issues = records.issues?.map(({ record }) => record);
    const mergeRequests = records.mergeRequests?.map(({ record }) => record);

    const series: MetricSample[] = [];
    if (commits) series.push(...countSeries("commits", commits.map(commitTime), window));
    if (issues) {
      series.push(...countSeries("issues_opened", issues.map((issue) => issue.created_at), window));
      series.push(...countSeries("issues_closed", issues.map((issue) => issue.closed_at), window));
    }
    if (mergeRequests) {
      series.push(...countSeries("merge_requests_opened", mergeRequests.map((mr) => mr.created_at), window));
      series.push(...countSeries("merge_requests_merged", mergeRequests.map((mr) => mr.merged_at), window));
    }

    // Authorship comes from commits and MRs; issue closers alone are not enough
    const contributors =
      commits || mergeRequests ? this.identities.resolve(rawIdentities(records, window)) : null;

    return {
      target: { ...target },
      window: { since: window.since, until: window.until },
      projects: projects.map((project) => project.ref),
      commits: commits ? commitMetrics(commits, window) : null,
      issues: issues ? issueMetrics(issues, window, this.classifier) : null,
      mergeRequests: mergeRequests ? mergeRequestMetrics(mergeRequests, window) : null,
      contributors: contributors ? { total: contributors.length, contributors } : null,
      series,
      missing,
      builtAt: new Date(this.now()).toISOString(),
    };
  }
}

/** Commit authors, MR authors and issue closers, tagged with their project. */
function rawIdentities(records: Partial<SectionRecords>, window: TimeWindow): RawIdentity[] {
  const raws: RawIdentity[] = [];

  for (const { project, record: commit } of records.commits ?? []) {
    raws.push({
      email: commit.author_email,
      name: commit.author_name,
      project,
      commits: 1,
      additions: commit.stats?.additions ?? 0,
      deletions: commit.stats?.deletions ?? 0,
    });
  }
  for (const { project, record: mr } of records.mergeRequests ?? []) {
    if (!mr.author || !contains(window, mr.created_at)) continue;
    raws.push({ username: mr.author.username, name: mr.author.name, project, mergeRequests: 1 });
  }
  for (const { project, record: issue } of records.issues ?? []) {
    if (!issue.closed_by || !closedInWindow(issue, window)) continue;
    raws.push({ username: issue.closed_by.username, name: issue.closed_by.name, project, issuesClosed: 1 });
  }
  return raws;
}
