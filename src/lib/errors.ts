/**
 * Error taxonomy for PR/issue status sync.
 *
 * ConfigError and its NotFoundError subclass mean the run is misconfigured
 * and must stop. ApiError wraps every failed GraphQL request.
 * PartialActionError describes a per-issue side effect that failed and was
 * skipped; it is logged, never thrown out of the updater.
 */

export class SyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends SyncError {}

export class NotFoundError extends ConfigError {}

export class ValidationError extends SyncError {}

export class ApiError extends SyncError {
  /** HTTP status of the failed request, when one was received. */
  readonly status: number | undefined;
  /** GraphQL error types from the response body (e.g. "NOT_FOUND"). */
  readonly errorTypes: string[];

  constructor(
    message: string,
    details: { status?: number; errorTypes?: string[]; cause?: unknown } = {},
  ) {
    super(message, { cause: details.cause });
    this.status = details.status;
    this.errorTypes = details.errorTypes ?? [];
  }

  get isNotFound(): boolean {
    return this.status === 404 || this.errorTypes.includes("NOT_FOUND");
  }
}

export type PartialAction = "close" | "assign" | "unassign";

const ACTION_DESCRIPTIONS: Record<PartialAction, string> = {
  close: "close issue",
  assign: "assign issue",
  unassign: "remove assignees from issue",
};

export class PartialActionError extends SyncError {
  readonly issueNumber: number;
  readonly action: PartialAction;

  constructor(issueNumber: number, action: PartialAction, cause: unknown) {
    super(
      `Could not ${ACTION_DESCRIPTIONS[action]} #${issueNumber}: ${errorMessage(cause)}`,
      { cause },
    );
    this.issueNumber = issueNumber;
    this.action = action;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
