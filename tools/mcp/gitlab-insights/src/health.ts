/**
 * Health scoring: weighted composite score, letter grade and recommendations.
 *
 * Each factor is normalized to 0–100 against configured thresholds. Factors
 * without data are dropped and the remaining weights renormalized, which marks
 * the score as partial. Recommendations come from RECOMMENDATION_RULES, an
 * ordered table evaluated against the snapshot and the factor scores.
 */

import type { GradeBand, ScoringConfig, ScoringThresholds, ScoringWeights } from "./config.js";
import { InsufficientData } from "./errors.js";
import type { Target } from "./gitlab.js";
import { round, type Snapshot } from "./snapshot.js";
import type { TimeWindow } from "./window.js";

// ─── Types ──────────────────────────────────────────────

export type FactorName = keyof ScoringWeights;

export const FACTORS: readonly FactorName[] = [
  "commitActivity",
  "issueResolution",
  "mergeEfficiency",
  "contributorDiversity",
];

export interface FactorScore {
  /** 0–100, one decimal; null when the snapshot has no data for it */
  score: number | null;
  /** Configured weight */
  weight: number;
  /** Weight after renormalization over the factors that have data */
  effectiveWeight: number;
}

export type Severity = "critical" | "high" | "medium" | "low";

const SEVERITY_RANK: Record<Severity, number> = { critical: 4, high: 3, medium: 2, low: 1 };

export interface Recommendation {
  id: string;
  title: string;
  severity: Severity;
  /** The observed condition that triggered the rule */
  condition: string;
  action: string;
}

export interface HealthScore {
  target: Target;
  window: TimeWindow;
  score: number;
  grade: string;
  partial: boolean;
  factors: Record<FactorName, FactorScore>;
  recommendations: Recommendation[];
}

// ─── Factors ────────────────────────────────────────────

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Raw 0–100 factor values, or null where the snapshot has nothing to score. */
export function factorValues(
  snapshot: Snapshot,
  thresholds: ScoringThresholds
): Record<FactorName, number | null> {
  const { commits, issues, mergeRequests, contributors } = snapshot;

  let issueResolution: number | null = null;
  if (issues && issues.closureRate !== null) {
    issueResolution = issues.closureRate * 100;
    const days = issues.avgResolutionDays;
    if (days !== null && days > thresholds.slowResolutionDays) issueResolution *= 0.5;
    else if (days !== null && days > thresholds.moderateResolutionDays) issueResolution *= 0.75;
  }

  let mergeEfficiency: number | null = null;
  if (mergeRequests && mergeRequests.mergeRate !== null) {
    mergeEfficiency = mergeRequests.mergeRate * 100;
    const hours = mergeRequests.avgMergeHours;
    if (hours !== null && hours < thresholds.fastMergeHours) mergeEfficiency *= 1.2;
    else if (hours !== null && hours > thresholds.slowMergeHours) mergeEfficiency *= 0.8;
  }

  return {
    commitActivity: commits
      ? (commits.perWeek / thresholds.commitsPerWeekCeiling) * 100
      : null,
    issueResolution,
    mergeEfficiency,
    contributorDiversity: contributors
      ? (contributors.total / thresholds.contributorCeiling) * 100
      : null,
  };
}

export function gradeFor(score: number, bands: readonly GradeBand[]): string {
  for (const band of bands) {
    if (score >= band.min) return band.grade;
  }
  return bands[bands.length - 1].grade;
}

// ─── Recommendation Rules ───────────────────────────────

export interface RuleContext {
  snapshot: Snapshot;
  score: number;
  partial: boolean;
  factors: Record<FactorName, FactorScore>;
  thresholds: ScoringThresholds;
}

export interface RecommendationRule {
  id: string;
  title: string;
  severity: Severity;
  /** Returns the condition text when the rule fires, else null */
  when: (ctx: RuleContext) => string | null;
  action: string;
}

export const RECOMMENDATION_RULES: readonly RecommendationRule[] = [
  {
    id: "health-attention",
    title: "Project health needs attention",
    severity: "critical",
    when: ({ score, thresholds }) =>
      score < thresholds.attentionScore ? `health score ${score} is below ${thresholds.attentionScore}` : null,
    action: "Review the lowest-scoring factors and address them first.",
  },
  {
    id: "stale-activity",
    title: "Very low commit activity",
    severity: "high",
    when: ({ snapshot: { commits }, thresholds }) =>
      commits && commits.perWeek < thresholds.minWeeklyCommits
        ? `${commits.perWeek} commits per week (minimum ${thresholds.minWeeklyCommits})`
        : null,
    action: "Check whether the project is stale or work is happening elsewhere.",
  },
  {
    id: "overdue-issues",
    title: "Overdue issues",
    severity: "high",
    when: ({ snapshot: { issues }, thresholds }) =>
      issues && issues.overdue > thresholds.maxOverdueIssues ? `${issues.overdue} open issues are past their due date` : null,
    action: "Re-plan or close overdue issues.",
  },
  {
    id: "low-contributor-diversity",
    title: "Low contributor diversity",
    severity: "medium",
    when: ({ snapshot: { contributors }, thresholds }) =>
      contributors && contributors.total < thresholds.minContributors
        ? `${contributors.total} active contributor(s) (minimum ${thresholds.minContributors})`
        : null,
    action: "Involve more team members to reduce single-person dependency.",
  },
  {
    id: "slow-issue-resolution",
    title: "Issues take too long to resolve",
    severity: "medium",
    when: ({ snapshot: { issues }, thresholds }) =>
      issues && issues.avgResolutionDays !== null && issues.avgResolutionDays > thresholds.slowResolutionDays
        ? `average resolution ${issues.avgResolutionDays} days (limit ${thresholds.slowResolutionDays})`
        : null,
    action: "Review the triage process and break large issues down.",
  },
  {
    id: "unassigned-issues",
    title: "Many unassigned issues",
    severity: "medium",
    when: ({ snapshot: { issues }, thresholds }) =>
      issues && issues.considered > 0 && issues.unassignedOpen > issues.considered * thresholds.maxUnassignedRatio
        ? `${issues.unassignedOpen} of ${issues.considered} issues have no assignee`
        : null,
    action: "Assign owners to open issues.",
  },
  {
    id: "low-merge-rate",
    title: "Low merge rate",
    severity: "medium",
    when: ({ snapshot: { mergeRequests }, thresholds }) =>
      mergeRequests && mergeRequests.mergeRate !== null && mergeRequests.mergeRate < thresholds.minMergeRate
        ? `merge rate ${round(mergeRequests.mergeRate * 100, 1)}% (minimum ${round(thresholds.minMergeRate * 100, 1)}%)`
        : null,
    action: "Review why merge requests are abandoned or left open.",
  },
  {
    id: "slow-merges",
    title: "Slow merge request turnaround",
    severity: "low",
    when: ({ snapshot: { mergeRequests }, thresholds }) =>
      mergeRequests && mergeRequests.avgMergeHours !== null && mergeRequests.avgMergeHours > thresholds.slowMergeHours
        ? `average time to merge ${mergeRequests.avgMergeHours} hours (limit ${thresholds.slowMergeHours})`
        : null,
    action: "Prefer smaller merge requests or add reviewers.",
  },
  {
    id: "partial-data",
    title: "Score based on partial data",
    severity: "low",
    when: ({ partial, factors }) =>
      partial
        ? `no data for ${FACTORS.filter((name) => factors[name].score === null).join(", ")}`
        : null,
    action: "Check access to the missing sections and retry.",
  },
];

/** Fire every matching rule; order by severity, then table order. */
export function evaluateRules(
  ctx: RuleContext,
  rules: readonly RecommendationRule[] = RECOMMENDATION_RULES
): Recommendation[] {
  const fired: Array<{ index: number; recommendation: Recommendation }> = [];
  rules.forEach((rule, index) => {
    const condition = rule.when(ctx);
    if (condition !== null) {
      fired.push({
        index,
        recommendation: { id: rule.id, title: rule.title, severity: rule.severity, condition, action: rule.action },
      });
    }
  });
  return fired
    .sort(
      (a, b) =>
        SEVERITY_RANK[b.recommendation.severity] - SEVERITY_RANK[a.recommendation.severity] || a.index - b.index
    )
    .map(({ recommendation }) => recommendation);
}

// ─── Scoring ────────────────────────────────────────────

function rounded(factor: FactorScore): FactorScore {
  return {
    score: factor.score === null ? null : round(factor.score, 1),
    weight: factor.weight,
    effectiveWeight: round(factor.effectiveWeight, 4),
  };
}

export function scoreSnapshot(
  snapshot: Snapshot,
  config: ScoringConfig,
  rules: readonly RecommendationRule[] = RECOMMENDATION_RULES
): HealthScore {
  const values = factorValues(snapshot, config.thresholds);
  const available = FACTORS.filter((name) => values[name] !== null);
  const totalWeight = available.reduce((sum, name) => sum + config.weights[name], 0);

  if (available.length === 0 || totalWeight <= 0) {
    throw new InsufficientData("No factor data available to score", snapshot.missing);
  }

  const factor = (name: FactorName): FactorScore => {
    const raw = values[name];
    if (raw === null) return { score: null, weight: config.weights[name], effectiveWeight: 0 };
    return {
      score: clamp(raw, 0, 100),
      weight: config.weights[name],
      effectiveWeight: config.weights[name] / totalWeight,
    };
  };
  const exact: Record<FactorName, FactorScore> = {
    commitActivity: factor("commitActivity"),
    issueResolution: factor("issueResolution"),
    mergeEfficiency: factor("mergeEfficiency"),
    contributorDiversity: factor("contributorDiversity"),
  };

  let weighted = 0;
  for (const name of available) {
    weighted += (exact[name].score ?? 0) * exact[name].effectiveWeight;
  }

  const factors: Record<FactorName, FactorScore> = {
    commitActivity: rounded(exact.commitActivity),
    issueResolution: rounded(exact.issueResolution),
    mergeEfficiency: rounded(exact.mergeEfficiency),
    contributorDiversity: rounded(exact.contributorDiversity),
  };

  const score = clamp(Math.round(weighted), 0, 100);
  const partial = available.length < FACTORS.length;

  return {
    target: snapshot.target,
    window: snapshot.window,
    score,
    grade: gradeFor(score, config.grades),
    partial,
    factors,
    recommendations: evaluateRules({ snapshot, score, partial, factors, thresholds: config.thresholds }, rules),
  };
}
