#!/usr/bin/env node
/**
 * pr-issue-sync MCP Server - Entry Point
 *
 * Serves the sync tools over stdio. Uses the same environment as the CLI
 * except PR_NUMBER, which each tool call supplies.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createGitHubClient } from "./github-client.js";
import { loadConfig } from "./lib/config.js";
import { createDebugLogger } from "./lib/debug-logger.js";
import { GraphQLIssueApi } from "./lib/issue-api.js";
import { ProjectClient } from "./lib/project-client.js";
import { registerHealthTools } from "./tools/health-tools.js";
import { registerSyncTools } from "./tools/sync-tools.js";

async function main(): Promise<void> {
  console.error("[pr-issue-sync] Starting MCP server...");

  const config = loadConfig();
  const debugLogger = createDebugLogger();
  const client = createGitHubClient(config, debugLogger);
  const projects = new ProjectClient(client, config);

  const server = new McpServer({
    name: "pr-issue-sync",
    version: "1.0.0",
  });

  registerHealthTools(server, client, projects);
  registerSyncTools(server, {
    projects,
    issues: new GraphQLIssueApi(client, config),
    debugLogger,
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error("[pr-issue-sync] MCP server connected and ready.");
}

main().catch((error: unknown) => {
  console.error("[pr-issue-sync] Fatal error:", error);
  process.exit(1);
});
