/**
 * Applies a StatusDecision to one linked issue.
 *
 * Close and (un)assign are side effects that may fail per issue (e.g.
 * missing permissions); their errors are logged as PartialActionError and
 * processing continues. The final status write is not caught: a missing
 * option or item means the project is misconfigured and the run stops.
 */

import type { IssueSnapshot, SyncLogger } from "../types.js";
import type { IssueApi } from "./issue-api.js";
import type { ProjectClient } from "./project-client.js";
import type { StatusDecision } from "./status-mapper.js";
import type { IssueStatus } from "./statuses.js";
import { PartialActionError, type PartialAction } from "./errors.js";

export type StatusWriter = Pick<ProjectClient, "setIssueStatus">;

export interface IssueReport {
  number: number;
  closed: boolean;
  assigneesChanged: boolean;
  status: IssueStatus;
  warnings: string[];
}

function sameMembers(a: string[], b: string[]): boolean {
  const left = new Set(a);
  const right = new Set(b);
  return left.size === right.size && [...left].every((v) => right.has(v));
}

export class IssueUpdater {
  constructor(
    private readonly issues: IssueApi,
    private readonly statusWriter: StatusWriter,
    private readonly logger: SyncLogger,
  ) {}

  async apply(
    issue: IssueSnapshot,
    decision: StatusDecision,
  ): Promise<IssueReport> {
    const report: IssueReport = {
      number: issue.number,
      closed: false,
      assigneesChanged: false,
      status: decision.targetStatus,
      warnings: [],
    };

    if (decision.closeIssue) {
      if (issue.state === "open") {
        report.closed = await this.attempt(report, "close", async () => {
          await this.issues.closeIssue(issue);
          this.logger.info(`Closed issue #${issue.number}`);
        });
      } else {
        this.logger.info(`Issue #${issue.number} already closed`);
      }
    }

    const action = decision.assigneeAction;
    if (action.kind === "clear" && issue.assignees.length > 0) {
      report.assigneesChanged = await this.attempt(report, "unassign", async () => {
        await this.issues.setAssignees(issue, []);
        this.logger.info(`Removed assignees from issue #${issue.number}`);
      });
    } else if (
      action.kind === "assign" &&
      !sameMembers(issue.assignees, action.logins)
    ) {
      report.assigneesChanged = await this.attempt(report, "assign", async () => {
        await this.issues.setAssignees(issue, action.logins);
        this.logger.info(
          `Assigned issue #${issue.number} to ${action.logins.join(", ")}`,
        );
      });
    }

    await this.statusWriter.setIssueStatus(decision.targetStatus, {
      issueNodeId: issue.id,
    });
    this.logger.info(
      `Set issue #${issue.number} status to '${decision.targetStatus}'`,
    );

    return report;
  }

  /**
   * Run a side effect; on failure record and log a PartialActionError.
   * Returns whether the side effect succeeded.
   */
  private async attempt(
    report: IssueReport,
    action: PartialAction,
    run: () => Promise<void>,
  ): Promise<boolean> {
    try {
      await run();
      return true;
    } catch (error) {
      const partial = new PartialActionError(report.number, action, error);
      report.warnings.push(partial.message);
      this.logger.warn(partial.message);
      return false;
    }
  }
}
