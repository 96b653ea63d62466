/**
 * One sync run: bring every issue a pull request closes in line with the
 * pull request's state. Issues are processed one at a time, in the order
 * GitHub returns the closing references.
 */

import type { IssueSnapshot, SyncLogger } from "../types.js";
import type { IssueApi } from "./issue-api.js";
import { IssueUpdater, type IssueReport } from "./issue-updater.js";
import type { ProjectClient } from "./project-client.js";
import { mapPullRequestToStatus } from "./status-mapper.js";
import type { IssueStatus } from "./statuses.js";

export interface SyncDependencies {
  projects: Pick<ProjectClient, "getLinkedIssues" | "setIssueStatus">;
  issues: IssueApi;
  logger: SyncLogger;
}

export interface SyncReport {
  prNumber: number;
  targetStatus: IssueStatus;
  issues: IssueReport[];
}

export async function syncPullRequestIssues(
  deps: SyncDependencies,
  prNumber: number,
): Promise<SyncReport> {
  const { projects, issues, logger } = deps;

  const linkedIssues = await projects.getLinkedIssues(prNumber);
  logger.info(
    `Linked issues: ${linkedIssues.map((i) => `#${i.number}`).join(", ") || "(none)"}`,
  );

  const pr = await issues.getPull(prNumber);
  const decision = mapPullRequestToStatus(pr);

  if (pr.merged) {
    logger.info("PR is merged. Closing linked issues and setting status to 'Done'.");
  } else if (pr.state === "closed") {
    logger.info(
      "PR closed without merging. Setting linked issues status to " +
        "'Selected for Development' and removing assignees.",
    );
  } else {
    if (pr.assignees.length === 0) {
      logger.info(`No assignees on PR, using PR author: ${pr.author}`);
    } else {
      logger.info(`PR assignees: ${pr.assignees.join(", ")}`);
    }
    logger.info(`Target status: ${decision.targetStatus}`);
  }

  // Snapshots are fetched by node id before any issue is modified; a
  // closing reference may point into another repository
  const snapshots: IssueSnapshot[] = [];
  for (const linked of linkedIssues) {
    snapshots.push(await issues.getIssue(linked.id));
  }

  const updater = new IssueUpdater(issues, projects, logger);
  const reports: IssueReport[] = [];
  for (const snapshot of snapshots) {
    reports.push(await updater.apply(snapshot, decision));
  }

  return { prNumber, targetStatus: decision.targetStatus, issues: reports };
}
