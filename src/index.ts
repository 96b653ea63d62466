#!/usr/bin/env node
/**
 * pr-issue-sync CLI - Entry Point
 *
 * Reads TOKEN, ORG, REPO, PROJECT_NUMBER and PR_NUMBER from the
 * environment and syncs the project Status of every issue the pull
 * request closes. Intended to run from a pull_request workflow.
 */

import { createGitHubClient } from "./github-client.js";
import { loadConfig, loadPrNumber } from "./lib/config.js";
import { createDebugLogger } from "./lib/debug-logger.js";
import { GraphQLIssueApi } from "./lib/issue-api.js";
import { ProjectClient } from "./lib/project-client.js";
import { syncPullRequestIssues } from "./lib/pr-sync.js";
import { consoleLogger } from "./types.js";

async function main(): Promise<void> {
  // Both are validated before the first request
  const config = loadConfig();
  const prNumber = loadPrNumber();

  const debugLogger = createDebugLogger();
  const client = createGitHubClient(config, debugLogger);

  try {
    const report = await syncPullRequestIssues(
      {
        projects: new ProjectClient(client, config),
        issues: new GraphQLIssueApi(client, config),
        logger: consoleLogger,
      },
      prNumber,
    );

    debugLogger?.recordRun(report);

    const warnings = report.issues.reduce((n, i) => n + i.warnings.length, 0);
    console.log(
      `Synced ${report.issues.length} issue(s) for PR #${prNumber} to '${report.targetStatus}'` +
        (warnings > 0 ? ` with ${warnings} warning(s)` : ""),
    );
  } finally {
    await debugLogger?.flush();
  }
}

main().catch((error: unknown) => {
  console.error("[pr-issue-sync] Fatal error:", error instanceof Error ? error.message : error);
  process.exit(1);
});
