/**
 * MCP tools for PR-driven issue status sync.
 *
 * Exposes the sync run and single status writes to MCP clients. Output
 * that the CLI prints goes into the tool result instead, because stdout
 * carries the MCP protocol.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { DebugLogger } from "../lib/debug-logger.js";
import { logToolCall } from "../lib/debug-logger.js";
import { errorMessage } from "../lib/errors.js";
import type { IssueApi } from "../lib/issue-api.js";
import type { ProjectClient } from "../lib/project-client.js";
import { syncPullRequestIssues } from "../lib/pr-sync.js";
import { ISSUE_STATUSES } from "../lib/statuses.js";
import { toolError, toolSuccess, type SyncLogger } from "../types.js";

export interface SyncToolDeps {
  projects: ProjectClient;
  issues: IssueApi;
  debugLogger?: DebugLogger | null;
}

/**
 * A SyncLogger that keeps lines for the tool result.
 */
export function createCollectingLogger(): SyncLogger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => lines.push(message),
    warn: (message) => lines.push(`Warning: ${message}`),
  };
}

export function registerSyncTools(server: McpServer, deps: SyncToolDeps): void {
  const { projects, issues } = deps;
  const debugLogger = deps.debugLogger ?? null;

  server.tool(
    "pr_sync__sync_pull_request",
    "Sync the project Status of every issue a pull request closes. " +
      "Merged: close issues and set Done. Closed without merge: set " +
      "Selected for Development and clear assignees. Open: set In Development " +
      "(draft) or Ready For Review and assign the PR assignees (or author). " +
      "Returns: per-issue report and log lines.",
    {
      prNumber: z.number().int().positive().describe("Pull request number"),
    },
    async (args) =>
      logToolCall(debugLogger, "pr_sync__sync_pull_request", args, async () => {
        const logger = createCollectingLogger();
        try {
          const report = await syncPullRequestIssues(
            { projects, issues, logger },
            args.prNumber,
          );
          return toolSuccess({ ...report, log: logger.lines });
        } catch (error: unknown) {
          return toolError(
            `Failed to sync PR #${args.prNumber}: ${errorMessage(error)}`,
          );
        }
      }),
  );

  server.tool(
    "pr_sync__set_issue_status",
    "Set the project Status of one issue. Provide exactly one of " +
      "issueNumber or issueNodeId.",
    {
      status: z.enum(ISSUE_STATUSES).describe("Target Status option"),
      issueNumber: z.number().int().positive().optional().describe("Issue number"),
      issueNodeId: z.string().optional().describe("Issue GraphQL node ID"),
    },
    async (args) =>
      logToolCall(debugLogger, "pr_sync__set_issue_status", args, async () => {
        try {
          await projects.setIssueStatus(args.status, {
            issueNumber: args.issueNumber,
            issueNodeId: args.issueNodeId,
          });
          return toolSuccess({
            issueNumber: args.issueNumber ?? null,
            issueNodeId: args.issueNodeId ?? null,
            status: args.status,
          });
        } catch (error: unknown) {
          return toolError(`Failed to set issue status: ${errorMessage(error)}`);
        }
      }),
  );

  server.tool(
    "pr_sync__get_issue_status",
    "Get the current project Status of an issue.",
    {
      issueNumber: z.number().int().positive().describe("Issue number"),
    },
    async (args) =>
      logToolCall(debugLogger, "pr_sync__get_issue_status", args, async () => {
        try {
          const nodeId = await projects.resolveIssueNodeId(args.issueNumber);
          const status = await projects.getCurrentStatus(nodeId);
          return toolSuccess({ issueNumber: args.issueNumber, status });
        } catch (error: unknown) {
          return toolError(`Failed to get issue status: ${errorMessage(error)}`);
        }
      }),
  );
}
