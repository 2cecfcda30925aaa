/**
 * Analysis windows and daily buckets.
 *
 * A window is half-open: `since <= t < until`. Daily buckets are aligned to
 * `since`, not to calendar days, so a window of N whole days has exactly N
 * buckets.
 */

import { MalformedRequest } from "./errors.js";
import { DAY_MS, HOUR_MS } from "./timing.js";

export interface TimeWindow {
  /** ISO 8601, inclusive */
  readonly since: string;
  /** ISO 8601, exclusive */
  readonly until: string;
}

function toMillis(value: string | Date, field: string): number {
  const ms = value instanceof Date ? value.getTime() : Date.parse(value);
  if (Number.isNaN(ms)) throw new MalformedRequest(`Invalid ${field}: ${String(value)}`);
  return ms;
}

/** Validate and canonicalize a window to ISO strings. */
export function makeWindow(since: string | Date, until: string | Date): TimeWindow {
  const start = toMillis(since, "since");
  const end = toMillis(until, "until");
  if (start >= end) {
    throw new MalformedRequest("Window start must be before its end");
  }
  return Object.freeze({ since: new Date(start).toISOString(), until: new Date(end).toISOString() });
}

/**
 * The `days` days ending at `now` rounded down to a multiple of `alignMs`.
 * Windows, and with them cache keys, stay the same for every call inside one
 * alignment step.
 */
export function lastDays(days: number, now: number = Date.now(), alignMs: number = HOUR_MS): TimeWindow {
  if (!Number.isInteger(days) || days < 1) {
    throw new MalformedRequest(`days must be a positive integer, got ${days}`);
  }
  if (!(alignMs > 0)) {
    throw new MalformedRequest(`alignMs must be positive, got ${alignMs}`);
  }
  const until = Math.floor(now / alignMs) * alignMs;
  return makeWindow(new Date(until - days * DAY_MS), new Date(until));
}

export function windowStart(window: TimeWindow): number {
  return Date.parse(window.since);
}

export function windowEnd(window: TimeWindow): number {
  return Date.parse(window.until);
}

export function windowDays(window: TimeWindow): number {
  return (windowEnd(window) - windowStart(window)) / DAY_MS;
}

export function contains(window: TimeWindow, timestamp: string | null | undefined): boolean {
  if (!timestamp) return false;
  const ms = Date.parse(timestamp);
  return !Number.isNaN(ms) && ms >= windowStart(window) && ms < windowEnd(window);
}

/** Start of every daily bucket that begins inside the window. */
export function dayBuckets(window: TimeWindow): string[] {
  const buckets: string[] = [];
  const end = windowEnd(window);
  for (let t = windowStart(window); t < end; t += DAY_MS) {
    buckets.push(new Date(t).toISOString());
  }
  return buckets;
}

/** The bucket a timestamp falls in, or null outside the window. */
export function bucketOf(window: TimeWindow, timestamp: string): string | null {
  if (!contains(window, timestamp)) return null;
  const start = windowStart(window);
  const offset = Math.floor((Date.parse(timestamp) - start) / DAY_MS);
  return new Date(start + offset * DAY_MS).toISOString();
}

export function windowLabel(window: TimeWindow): string {
  return `${window.since}..${window.until}`;
}
