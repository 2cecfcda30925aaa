/**
 * Structured logging for insight operations and GitLab requests.
 *
 * Logs to stderr (the MCP stdio transport owns stdout).
 * Provides an operation wrapper that captures timing, errors, and context.
 */

// ─── Types ──────────────────────────────────────────────

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  operation?: string;
  duration_ms?: number;
  message: string;
  context?: Record<string, unknown>;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/** Process-wide; set once by the entry point. */
let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

// ─── Logger ─────────────────────────────────────────────

function formatEntry(entry: LogEntry): string {
  const parts = [entry.timestamp, entry.level.toUpperCase().padEnd(5)];

  if (entry.operation) {
    parts.push(`[${entry.operation}]`);
  }

  parts.push(entry.message);

  if (entry.duration_ms !== undefined) {
    parts.push(`(${entry.duration_ms}ms)`);
  }

  if (entry.context && Object.keys(entry.context).length > 0) {
    parts.push(JSON.stringify(entry.context));
  }

  return parts.join(" ");
}

function emit(entry: LogEntry): void {
  if (LEVEL_RANK[entry.level] < LEVEL_RANK[threshold]) return;
  console.error(formatEntry(entry));
}

export function log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
  emit({ timestamp: new Date().toISOString(), level, message, context });
}

export function logOperation(
  operation: string,
  level: LogLevel,
  message: string,
  duration_ms?: number,
  context?: Record<string, unknown>
): void {
  emit({ timestamp: new Date().toISOString(), level, operation, duration_ms, message, context });
}

// ─── Operation Metrics ──────────────────────────────────

interface OperationMetrics {
  calls: number;
  errors: number;
  totalMs: number;
  lastCallAt: string | null;
}

const metrics = new Map<string, OperationMetrics>();

export function recordOperation(operation: string, durationMs: number, isError: boolean): void {
  const existing = metrics.get(operation) ?? {
    calls: 0,
    errors: 0,
    totalMs: 0,
    lastCallAt: null,
  };

  existing.calls++;
  if (isError) existing.errors++;
  existing.totalMs += durationMs;
  existing.lastCallAt = new Date().toISOString();

  metrics.set(operation, existing);
}

export function getOperationMetrics(): Record<string, OperationMetrics & { avgMs: number }> {
  const result: Record<string, OperationMetrics & { avgMs: number }> = {};
  for (const [operation, m] of metrics) {
    result[operation] = {
      ...m,
      avgMs: m.calls > 0 ? Math.round(m.totalMs / m.calls) : 0,
    };
  }
  return result;
}

export function resetOperationMetrics(): void {
  metrics.clear();
}

const SLOW_OPERATION_MS = 5000;

/**
 * Wrap an operation with logging and metrics.
 * Returns the same result but logs execution time and errors.
 */
export async function withLogging<T>(
  operation: string,
  fn: () => Promise<T>,
  context?: Record<string, unknown>
): Promise<T> {
  const start = Date.now();
  try {
    const result = await fn();
    const duration = Date.now() - start;
    recordOperation(operation, duration, false);
    if (duration > SLOW_OPERATION_MS) {
      logOperation(operation, "warn", "slow execution", duration, context);
    } else {
      logOperation(operation, "debug", "completed", duration, context);
    }
    return result;
  } catch (error) {
    const duration = Date.now() - start;
    recordOperation(operation, duration, true);
    logOperation(operation, "error", error instanceof Error ? error.message : String(error), duration, context);
    throw error;
  }
}
