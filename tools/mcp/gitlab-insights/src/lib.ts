/** Public API for embedding the insights core without the MCP server. */

export {
  createContext,
  createInsights,
  Insights,
  snapshotKey,
  trendKey,
  type CallOptions,
  type ContextOptions,
  type InsightsContext,
} from "./insights.js";
export {
  configFromArgs,
  configFromEnv,
  defaultConfigPath,
  loadConfigFile,
  mergeLayers,
  resolveConfig,
  InsightsConfigSchema,
  DEFAULT_GRADES,
  DEFAULT_THRESHOLDS,
  DEFAULT_WEIGHTS,
  DEFAULT_WORKFLOW_LABELS,
  WORKFLOW_STATES,
  type ConfigLayer,
  type InsightsConfig,
  type ScoringConfig,
  type WorkflowState,
} from "./config.js";
export * from "./errors.js";
export {
  fetchTransport,
  GitLabClient,
  targetKey,
  type HttpResponse,
  type Target,
  type TargetKind,
  type Transport,
} from "./gitlab.js";
export { lastDays, makeWindow, type TimeWindow } from "./window.js";
export { getLogLevel, setLogLevel, type LogLevel } from "./logger.js";
export type { Snapshot, SeriesMetric, MetricSample, SectionName } from "./snapshot.js";
export {
  RECOMMENDATION_RULES,
  scoreSnapshot,
  type HealthScore,
  type Recommendation,
  type RecommendationRule,
} from "./health.js";
export { analyzeTrends, type MetricTrend, type TrendReport } from "./trends.js";
export { resolveIdentities, type AliasMap, type CanonicalContributor, type RawIdentity } from "./identity.js";
export type { CacheStore } from "./cache-store.js";
export type { FetchTransition } from "./pagination.js";
