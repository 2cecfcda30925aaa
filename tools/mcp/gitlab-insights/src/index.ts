#!/usr/bin/env node

/**
 * GitLab Insights MCP Server
 *
 * Exposes GitLab project and group analytics as MCP tools over stdio.
 *
 * Tools:
 *   - get_snapshot: Commit, issue, merge request and contributor metrics
 *   - get_health_score: Weighted 0-100 score, grade and recommendations
 *   - get_trend: Previous vs current half-window comparison
 *   - resolve_contributors: Contributors merged through the alias map
 *   - clear_cache: Invalidate cached entries by key prefix
 *   - get_cache_stats: Cache, rate limiter and operation metrics
 *
 * Configuration layers, lowest precedence first: built-in defaults,
 * .gitlab-insights.json (or --config), GITLAB_* environment variables,
 * command-line flags.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { configFromArgs, defaultConfigPath, loadConfigFile, resolveConfig } from "./config.js";
import { createContext, createInsights } from "./insights.js";
import { log, setLogLevel } from "./logger.js";
import { INSIGHTS_TOOLS, register } from "./tools-insights.js";

const VERSION = "0.1.0";

async function main() {
  const { configPath, overrides } = configFromArgs(process.argv.slice(2));
  const config = resolveConfig({
    file: await loadConfigFile(configPath ?? defaultConfigPath()),
    env: process.env,
    overrides,
  });

  setLogLevel(config.logging.level);
  const insights = createInsights(createContext(config));
  const server = new McpServer({
    name: "gitlab-insights",
    version: VERSION,
  });
  register(server, insights);

  process.on("SIGINT", () => {
    console.error("Shutting down GitLab Insights MCP server...");
    server
      .close()
      .catch((error: unknown) => log("error", "Failed to close server", { error: String(error) }))
      .finally(() => {
        insights.close();
        process.exit(0);
      });
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`GitLab Insights MCP Server v${VERSION} running on stdio (${config.gitlab.url})`);
  console.error(`Tools: ${INSIGHTS_TOOLS.join(", ")}`);
}

main().catch((error) => {
  console.error("Fatal error in GitLab Insights MCP server:", error);
  process.exit(1);
});
