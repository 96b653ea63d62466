/**
 * TypeScript types for the PR/issue status sync.
 *
 * Models the slices of the GitHub GraphQL schema (Projects V2, Issues,
 * Pull Requests) that the sync reads, plus the shared config and tool
 * result helpers.
 */

// ---------------------------------------------------------------------------
// Projects V2 - Fields
// ---------------------------------------------------------------------------

export interface ProjectV2SingleSelectFieldOption {
  id: string;
  name: string;
}

export interface ProjectV2SingleSelectField {
  id: string;
  name: string;
  options: ProjectV2SingleSelectFieldOption[];
}

// ---------------------------------------------------------------------------
// Projects V2 - Items
// ---------------------------------------------------------------------------

export interface ProjectItemFieldValue {
  name: string;
  fieldName: string;
}

export interface ProjectItem {
  id: string;
  project: { id: string; title: string };
  fieldValues: ProjectItemFieldValue[];
}

// ---------------------------------------------------------------------------
// Issues & Pull Requests
// ---------------------------------------------------------------------------

/** An issue referenced by a PR's closing keywords ("Closes #N"). */
export interface IssueReference {
  id: string;
  number: number;
  title: string;
  body: string;
}

export interface IssueSnapshot {
  id: string;
  number: number;
  state: "open" | "closed";
  assignees: string[];
}

export interface PullRequestSnapshot {
  number: number;
  merged: boolean;
  state: "open" | "closed";
  draft: boolean;
  assignees: string[];
  author: string;
}

/** Identifies an issue for a status write. Exactly one key is set. */
export type IssueIdentifier =
  | { issueNumber: number; issueNodeId?: undefined }
  | { issueNodeId: string; issueNumber?: undefined };

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

export interface SyncLogger {
  info(message: string): void;
  warn(message: string): void;
}

export const consoleLogger: SyncLogger = {
  info: (message) => console.log(message),
  warn: (message) => console.error(`Warning: ${message}`),
};

// ---------------------------------------------------------------------------
// MCP Tool Helpers
// ---------------------------------------------------------------------------

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{
    type: "text";
    text: string;
  }>;
  isError?: boolean;
}

export function toolSuccess(data: unknown): ToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(data, null, 2) }],
  };
}

export function toolError(message: string): ToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify({ error: message }) }],
    isError: true,
  };
}

// ---------------------------------------------------------------------------
// GitHub Client Types
// ---------------------------------------------------------------------------

export interface GitHubClientConfig {
  token: string;
  /** GraphQL endpoint, e.g. https://api.github.com/graphql */
  graphqlUrl: string;
  /** Per-request network timeout. */
  timeoutMs: number;
}

export interface SyncConfig extends GitHubClientConfig {
  organization: string;
  repository: string;
  projectNumber: number;
}
