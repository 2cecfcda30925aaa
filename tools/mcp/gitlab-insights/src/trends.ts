/**
 * Trend analysis: previous vs current half of a window.
 *
 * The window is cut into two equal runs of whole days that end at
 * `window.until`; a leftover leading day is ignored. Daily samples from every
 * snapshot are merged (the most recently built snapshot wins for a bucket both
 * cover) and totalled per half.
 */

import { InsufficientData, MalformedRequest } from "./errors.js";
import type { Target } from "./gitlab.js";
import { SERIES_METRICS, round, type SeriesMetric, type Snapshot } from "./snapshot.js";
import { DAY_MS } from "./timing.js";
import { makeWindow, windowDays, windowEnd, type TimeWindow } from "./window.js";

// ─── Types ──────────────────────────────────────────────

export type Direction = "rising" | "falling" | "flat";

export interface MetricTrend {
  metric: SeriesMetric;
  previous: number;
  current: number;
  /** current - previous, or "new" when the previous half had nothing */
  delta: number | "new";
  /** Rounded to one decimal; null when previous is 0 */
  percentChange: number | null;
  direction: Direction;
}

export interface TrendReport {
  target: Target;
  window: TimeWindow;
  previousWindow: TimeWindow;
  currentWindow: TimeWindow;
  metrics: MetricTrend[];
  summary: Record<Direction, number>;
}

export interface TrendOptions {
  /** Absolute percent change below which a metric is flat */
  minChangePercent: number;
}

// ─── Analysis ───────────────────────────────────────────

export function splitWindow(window: TimeWindow): { previous: TimeWindow; current: TimeWindow } {
  const halfDays = Math.floor(Math.floor(windowDays(window)) / 2);
  if (halfDays < 1) {
    throw new MalformedRequest("Trend window must span at least two whole days");
  }
  const end = windowEnd(window);
  const middle = end - halfDays * DAY_MS;
  const start = middle - halfDays * DAY_MS;
  return {
    previous: makeWindow(new Date(start), new Date(middle)),
    current: makeWindow(new Date(middle), new Date(end)),
  };
}

export function classifyChange(
  previous: number,
  current: number,
  minChangePercent: number
): Pick<MetricTrend, "delta" | "percentChange" | "direction"> {
  if (previous === 0) {
    if (current > 0) return { delta: "new", percentChange: null, direction: "rising" };
    return { delta: current - previous, percentChange: null, direction: "flat" };
  }

  const percentChange = round(((current - previous) / previous) * 100, 1);
  let direction: Direction = "flat";
  if (Math.abs(percentChange) >= minChangePercent) {
    direction = percentChange > 0 ? "rising" : "falling";
  }
  return { delta: current - previous, percentChange, direction };
}

export function analyzeTrends(
  snapshots: readonly Snapshot[],
  window: TimeWindow,
  options: TrendOptions
): TrendReport {
  if (snapshots.length === 0) {
    throw new InsufficientData("No snapshots to analyze", []);
  }
  const { previous, current } = splitWindow(window);
  const previousStart = Date.parse(previous.since);
  const middle = Date.parse(current.since);
  const end = Date.parse(current.until);

  // metric → bucket → value, latest snapshot last so it overwrites
  const merged = new Map<SeriesMetric, Map<number, number>>();
  const ordered = snapshots
    .map((snapshot, index) => ({ snapshot, index }))
    .sort((a, b) => Date.parse(a.snapshot.builtAt) - Date.parse(b.snapshot.builtAt) || a.index - b.index);
  for (const { snapshot } of ordered) {
    for (const sample of snapshot.series) {
      const bucket = Date.parse(sample.bucket);
      if (bucket < previousStart || bucket >= end) continue;
      let buckets = merged.get(sample.metric);
      if (!buckets) {
        buckets = new Map();
        merged.set(sample.metric, buckets);
      }
      buckets.set(bucket, sample.value);
    }
  }

  const metrics: MetricTrend[] = [];
  for (const metric of SERIES_METRICS) {
    const buckets = merged.get(metric);
    if (!buckets || buckets.size === 0) continue;

    let previousTotal = 0;
    let currentTotal = 0;
    for (const [bucket, value] of buckets) {
      if (bucket < middle) previousTotal += value;
      else currentTotal += value;
    }
    metrics.push({
      metric,
      previous: previousTotal,
      current: currentTotal,
      ...classifyChange(previousTotal, currentTotal, options.minChangePercent),
    });
  }

  const summary: Record<Direction, number> = { rising: 0, falling: 0, flat: 0 };
  for (const trend of metrics) summary[trend.direction]++;

  return {
    target: ordered[ordered.length - 1].snapshot.target,
    window: { since: window.since, until: window.until },
    previousWindow: previous,
    currentWindow: current,
    metrics,
    summary,
  };
}
