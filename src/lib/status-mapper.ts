/**
 * Maps a pull request's lifecycle state to the Status its linked issues
 * should carry and the side effects to apply to them.
 */

import type { PullRequestSnapshot } from "../types.js";
import type { IssueStatus } from "./statuses.js";

export type AssigneeAction =
  | { kind: "assign"; logins: string[] }
  | { kind: "clear" }
  | { kind: "none" };

export interface StatusDecision {
  targetStatus: IssueStatus;
  assigneeAction: AssigneeAction;
  closeIssue: boolean;
}

/**
 * Logins a linked issue should be assigned to: the PR assignees, or the
 * PR author when nobody is assigned.
 */
export function resolvePrAssignees(pr: PullRequestSnapshot): string[] {
  return pr.assignees.length > 0 ? [...pr.assignees] : [pr.author];
}

/**
 * Decide the target status. Checked in order: merged, closed, open.
 */
export function mapPullRequestToStatus(pr: PullRequestSnapshot): StatusDecision {
  if (pr.merged) {
    return {
      targetStatus: "Done",
      assigneeAction: { kind: "none" },
      closeIssue: true,
    };
  }

  if (pr.state === "closed") {
    return {
      targetStatus: "Selected for Development",
      assigneeAction: { kind: "clear" },
      closeIssue: false,
    };
  }

  return {
    targetStatus: pr.draft ? "In Development" : "Ready For Review",
    assigneeAction: { kind: "assign", logins: resolvePrAssignees(pr) },
    closeIssue: false,
  };
}
