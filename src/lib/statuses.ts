/**
 * Project "Status" options this tool knows how to set.
 *
 * The option names must match the project's single-select options exactly;
 * the project may define more, but only these can be written.
 */

export const STATUS_FIELD_NAME = "Status";

export const ISSUE_STATUSES = [
  "Selected for Development",
  "Weekly Backlog",
  "In Development",
  "Ready For Review",
  "On Hold",
  "Done",
] as const;

export type IssueStatus = (typeof ISSUE_STATUSES)[number];

/**
 * Check if a name is one of the recognized statuses.
 */
export function isIssueStatus(name: string): name is IssueStatus {
  return ISSUE_STATUSES.some((status) => status === name);
}
