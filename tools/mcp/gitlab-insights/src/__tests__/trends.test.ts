import { describe, it, expect } from "vitest";
import { InsufficientData, MalformedRequest } from "../errors.js";
import type { MetricSample, Snapshot } from "../snapshot.js";
import { analyzeTrends, classifyChange, splitWindow } from "../trends.js";
import { makeWindow } from "../window.js";

const MARCH = makeWindow("2026-03-01T00:00:00.000Z", "2026-03-31T00:00:00.000Z");

function sample(metric: MetricSample["metric"], day: string, value: number): MetricSample {
  return { metric, bucket: `${day}T00:00:00.000Z`, value };
}

function snapshot(id: string, builtAt: string, series: MetricSample[]): Snapshot {
  return {
    target: { kind: "project", id },
    window: MARCH,
    projects: [],
    commits: null,
    issues: null,
    mergeRequests: null,
    contributors: null,
    series,
    missing: [],
    builtAt,
  };
}

describe("splitWindow()", () => {
  it("cuts an even window into two halves", () => {
    expect(splitWindow(MARCH)).toEqual({
      previous: { since: "2026-03-01T00:00:00.000Z", until: "2026-03-16T00:00:00.000Z" },
      current: { since: "2026-03-16T00:00:00.000Z", until: "2026-03-31T00:00:00.000Z" },
    });
  });

  it("drops the leading day of an odd window", () => {
    const split = splitWindow(makeWindow("2026-03-01T00:00:00.000Z", "2026-04-01T00:00:00.000Z"));
    expect(split.previous.since).toBe("2026-03-02T00:00:00.000Z");
    expect(split.current.since).toBe("2026-03-17T00:00:00.000Z");
  });

  it("rejects windows shorter than two days", () => {
    const short = makeWindow("2026-03-01T00:00:00.000Z", "2026-03-02T12:00:00.000Z");
    expect(() => splitWindow(short)).toThrow(MalformedRequest);
  });
});

describe("classifyChange()", () => {
  it("marks growth from zero as new", () => {
    expect(classifyChange(0, 20, 10)).toEqual({ delta: "new", percentChange: null, direction: "rising" });
  });

  it("treats zero to zero as flat", () => {
    expect(classifyChange(0, 0, 10)).toEqual({ delta: 0, percentChange: null, direction: "flat" });
  });

  it("applies the minimum change inclusively", () => {
    expect(classifyChange(10, 11, 10)).toEqual({ delta: 1, percentChange: 10, direction: "rising" });
    expect(classifyChange(100, 109, 10)).toEqual({ delta: 9, percentChange: 9, direction: "flat" });
  });

  it("detects a fall", () => {
    expect(classifyChange(10, 5, 10)).toEqual({ delta: -5, percentChange: -50, direction: "falling" });
  });
});

describe("analyzeTrends()", () => {
  it("merges snapshots with the most recently built one winning", () => {
    const older = snapshot("42", "2026-03-30T00:00:00.000Z", [
      sample("commits", "2026-03-02", 4),
      sample("commits", "2026-03-20", 3),
      sample("commits", "2026-02-20", 9),
    ]);
    const newer = snapshot("43", "2026-03-31T00:00:00.000Z", [
      sample("commits", "2026-03-20", 5),
      sample("issues_opened", "2026-03-05", 2),
    ]);

    const report = analyzeTrends([newer, older], MARCH, { minChangePercent: 10 });

    expect(report.target).toEqual({ kind: "project", id: "43" });
    expect(report.metrics).toEqual([
      { metric: "commits", previous: 4, current: 5, delta: 1, percentChange: 25, direction: "rising" },
      { metric: "issues_opened", previous: 2, current: 0, delta: -2, percentChange: -100, direction: "falling" },
    ]);
    expect(report.summary).toEqual({ rising: 1, falling: 1, flat: 0 });
  });

  it("fails with InsufficientData when there is nothing to analyze", () => {
    expect(() => analyzeTrends([], MARCH, { minChangePercent: 10 })).toThrow(InsufficientData);
  });
});
