/**
 * Error taxonomy for GitLab data access and analytics.
 *
 * Every failure the core surfaces is a GitLabError subclass with a stable
 * `kind`, so callers (and the MCP layer) can branch without string matching.
 */

export type GitLabErrorKind =
  | "transient_network"
  | "rate_limit_exceeded"
  | "authentication"
  | "authorization"
  | "resource_not_found"
  | "malformed_request"
  | "unexpected_response"
  | "pagination_inconsistency"
  | "insufficient_data"
  | "deadline_exceeded"
  | "operation_cancelled"
  | "retries_exhausted";

interface GitLabErrorOptions {
  status?: number;
  cause?: unknown;
}

export abstract class GitLabError extends Error {
  abstract readonly kind: GitLabErrorKind;
  readonly status: number | undefined;

  constructor(message: string, options: GitLabErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.status = options.status;
  }
}

// ─── Remote failures ────────────────────────────────────

/** Connection reset, socket timeout, 408 or 5xx. Retried locally. */
export class TransientNetworkError extends GitLabError {
  readonly kind = "transient_network" as const;
}

/** HTTP 429. `retryAfterMs` is the server's hint, when it sent one. */
export class RateLimitExceeded extends GitLabError {
  readonly kind = "rate_limit_exceeded" as const;
  readonly retryAfterMs: number | null;

  constructor(message: string, retryAfterMs: number | null, options: GitLabErrorOptions = {}) {
    super(message, { status: 429, ...options });
    this.retryAfterMs = retryAfterMs;
  }
}

export class AuthenticationError extends GitLabError {
  readonly kind = "authentication" as const;
}

export class AuthorizationError extends GitLabError {
  readonly kind = "authorization" as const;
}

export class ResourceNotFound extends GitLabError {
  readonly kind = "resource_not_found" as const;
}

/** 400/422 and other 4xx the server will never accept on retry. */
export class MalformedRequest extends GitLabError {
  readonly kind = "malformed_request" as const;
}

/** A 2xx body that is not the shape the endpoint documents. */
export class UnexpectedResponse extends GitLabError {
  readonly kind = "unexpected_response" as const;
}

// ─── Core failures ──────────────────────────────────────

export class PaginationInconsistency extends GitLabError {
  readonly kind = "pagination_inconsistency" as const;
}

export interface SectionFailure {
  section: string;
  kind: GitLabErrorKind;
  message: string;
}

export class InsufficientData extends GitLabError {
  readonly kind = "insufficient_data" as const;
  readonly failures: readonly SectionFailure[];

  constructor(message: string, failures: readonly SectionFailure[]) {
    super(message);
    this.failures = failures;
  }
}

export class DeadlineExceeded extends GitLabError {
  readonly kind = "deadline_exceeded" as const;
}

export class OperationCancelled extends GitLabError {
  readonly kind = "operation_cancelled" as const;
}

export class RetriesExhausted extends GitLabError {
  readonly kind = "retries_exhausted" as const;
  readonly attempts: number;
  readonly lastError: GitLabError;

  constructor(attempts: number, lastError: GitLabError) {
    super(`Gave up after ${attempts} attempts: ${lastError.message}`, {
      status: lastError.status,
      cause: lastError,
    });
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

// ─── Helpers ────────────────────────────────────────────

function isTimeoutReason(reason: unknown): boolean {
  return (
    typeof reason === "object" &&
    reason !== null &&
    "name" in reason &&
    reason.name === "TimeoutError"
  );
}

/** Map an aborted signal's reason onto the taxonomy. */
export function abortError(signal: AbortSignal): GitLabError {
  const reason: unknown = signal.reason;
  if (reason instanceof GitLabError) return reason;
  if (isTimeoutReason(reason)) return new DeadlineExceeded("Deadline exceeded");
  return new OperationCancelled("Operation cancelled", { cause: reason });
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw abortError(signal);
}

/** Errors that must reach the caller instead of degrading a snapshot. */
export function isCallerVisible(error: GitLabError): boolean {
  return (
    error instanceof AuthenticationError ||
    error instanceof DeadlineExceeded ||
    error instanceof OperationCancelled
  );
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
