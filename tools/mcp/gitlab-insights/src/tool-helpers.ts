/**
 * Shared helpers for MCP tool registration.
 *
 * Tools return JSON text on success. Failures become an error response whose
 * text carries the error kind, so a caller can tell an auth failure from a
 * missing project without parsing the message.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { GitLabError, InsufficientData, RateLimitExceeded, RetriesExhausted, describeError } from "./errors.js";
import { withLogging } from "./logger.js";

/** Re-export McpServer type for tool group files */
export type { McpServer };

/** Standard MCP tool response wrapping data as JSON */
export function toolResponse(data: unknown) {
  return {
    content: [
      {
        type: "text" as const,
        text: typeof data === "string" ? data : JSON.stringify(data, null, 2),
      },
    ],
  };
}

export function errorPayload(error: unknown): Record<string, unknown> {
  if (!(error instanceof GitLabError)) {
    return { kind: "internal", message: describeError(error) };
  }
  const payload: Record<string, unknown> = { kind: error.kind, message: error.message };
  if (error.status !== undefined) payload.status = error.status;
  if (error instanceof RateLimitExceeded) payload.retryAfterMs = error.retryAfterMs;
  if (error instanceof InsufficientData) payload.failures = error.failures;
  if (error instanceof RetriesExhausted) {
    payload.attempts = error.attempts;
    payload.lastKind = error.lastError.kind;
  }
  return payload;
}

/** Standard MCP tool error response */
export function toolError(error: unknown) {
  return {
    content: [
      {
        type: "text" as const,
        text: `Error: ${JSON.stringify(errorPayload(error))}`,
      },
    ],
    isError: true as const,
  };
}

/** Wrap an async tool handler with logging; errors become a tool error response. */
export function wrapTool<T>(
  toolName: string,
  handler: (params: T) => Promise<ReturnType<typeof toolResponse>>
): (params: T) => Promise<ReturnType<typeof toolResponse> | ReturnType<typeof toolError>> {
  return async (params: T) => {
    try {
      return await withLogging(toolName, () => handler(params));
    } catch (error) {
      return toolError(error);
    }
  };
}
