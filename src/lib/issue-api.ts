/**
 * Issue and pull request operations used by the updater.
 *
 * IssueApi is the collaborator boundary: the updater only needs snapshots,
 * close, and wholesale assignee replacement. GraphQLIssueApi implements it
 * over the shared GitHubClient.
 */

import type { GitHubClient } from "../github-client.js";
import type { IssueSnapshot, PullRequestSnapshot, SyncConfig } from "../types.js";
import { NotFoundError } from "./errors.js";

export interface IssueApi {
  /** Snapshot of the issue with this node id, in whatever repository it lives. */
  getIssue(issueNodeId: string): Promise<IssueSnapshot>;
  getPull(prNumber: number): Promise<PullRequestSnapshot>;
  closeIssue(issue: IssueSnapshot): Promise<void>;
  /** Replace the issue's assignees with exactly `logins`. */
  setAssignees(issue: IssueSnapshot, logins: string[]): Promise<void>;
  getAssignees(issueNodeId: string): Promise<string[]>;
}

// ---------------------------------------------------------------------------
// GraphQL queries and mutations
// ---------------------------------------------------------------------------

const ISSUE_QUERY = `query IssueSnapshot($id: ID!) {
  node(id: $id) {
    ... on Issue {
      id
      number
      state
      assignees(first: 100) { nodes { login } }
    }
  }
}`;

const PULL_REQUEST_QUERY = `query PullRequestSnapshot($owner: String!, $repo: String!, $number: Int!) {
  repository(owner: $owner, name: $repo) {
    pullRequest(number: $number) {
      number
      merged
      state
      isDraft
      author { login }
      assignees(first: 100) { nodes { login } }
    }
  }
}`;

const USER_ID_QUERY = `query UserId($login: String!) {
  user(login: $login) { id }
}`;

const CLOSE_ISSUE_MUTATION = `mutation CloseIssue($issueId: ID!) {
  closeIssue(input: { issueId: $issueId, stateReason: COMPLETED }) {
    issue { id state }
  }
}`;

const UPDATE_ASSIGNEES_MUTATION = `mutation UpdateIssueAssignees($issueId: ID!, $assigneeIds: [ID!]!) {
  updateIssue(input: { id: $issueId, assigneeIds: $assigneeIds }) {
    issue { id }
  }
}`;

// ---------------------------------------------------------------------------
// Response shapes
// ---------------------------------------------------------------------------

interface IssueNode {
  id: string;
  number: number;
  state: "OPEN" | "CLOSED";
  assignees: { nodes: Array<{ login: string }> };
}

// Any node type matches the query; only an Issue fills in the fields
interface IssueResult {
  node: Partial<IssueNode> | null;
}

function isIssueNode(node: Partial<IssueNode> | null): node is IssueNode {
  return (
    !!node?.id &&
    node.number !== undefined &&
    node.state !== undefined &&
    node.assignees !== undefined
  );
}

interface PullRequestResult {
  repository: {
    pullRequest: {
      number: number;
      merged: boolean;
      state: "OPEN" | "CLOSED" | "MERGED";
      isDraft: boolean;
      author: { login: string } | null;
      assignees: { nodes: Array<{ login: string }> };
    } | null;
  } | null;
}

interface UserIdResult {
  user: { id: string } | null;
}

// Deleted accounts surface as a null author
const GHOST_LOGIN = "ghost";

// ---------------------------------------------------------------------------
// GraphQLIssueApi
// ---------------------------------------------------------------------------

export class GraphQLIssueApi implements IssueApi {
  constructor(
    private readonly client: GitHubClient,
    private readonly config: Pick<SyncConfig, "organization" | "repository">,
  ) {}

  private get repoVars(): { owner: string; repo: string } {
    return { owner: this.config.organization, repo: this.config.repository };
  }

  private get repoName(): string {
    return `${this.config.organization}/${this.config.repository}`;
  }

  async getIssue(issueNodeId: string): Promise<IssueSnapshot> {
    const result = await this.client.query<IssueResult>(ISSUE_QUERY, {
      id: issueNodeId,
    });

    const issue = result.node;
    if (!isIssueNode(issue)) {
      throw new NotFoundError(`Issue ${issueNodeId} not found`);
    }

    return {
      id: issue.id,
      number: issue.number,
      state: issue.state === "OPEN" ? "open" : "closed",
      assignees: issue.assignees.nodes.map((a) => a.login),
    };
  }

  async getPull(prNumber: number): Promise<PullRequestSnapshot> {
    const result = await this.client.query<PullRequestResult>(
      PULL_REQUEST_QUERY,
      { ...this.repoVars, number: prNumber },
    );

    const pr = result.repository?.pullRequest;
    if (!pr) {
      throw new NotFoundError(
        `Pull request #${prNumber} not found in ${this.repoName}`,
      );
    }

    return {
      number: pr.number,
      merged: pr.merged,
      state: pr.state === "OPEN" ? "open" : "closed",
      draft: pr.isDraft,
      assignees: pr.assignees.nodes.map((a) => a.login),
      author: pr.author?.login ?? GHOST_LOGIN,
    };
  }

  async closeIssue(issue: IssueSnapshot): Promise<void> {
    await this.client.mutate(CLOSE_ISSUE_MUTATION, { issueId: issue.id });
  }

  async setAssignees(issue: IssueSnapshot, logins: string[]): Promise<void> {
    const assigneeIds: string[] = [];
    for (const login of logins) {
      assigneeIds.push(await this.resolveUserId(login));
    }
    await this.client.mutate(UPDATE_ASSIGNEES_MUTATION, {
      issueId: issue.id,
      assigneeIds,
    });
  }

  async getAssignees(issueNodeId: string): Promise<string[]> {
    const issue = await this.getIssue(issueNodeId);
    return issue.assignees;
  }

  private async resolveUserId(login: string): Promise<string> {
    const result = await this.client.query<UserIdResult>(USER_ID_QUERY, {
      login,
    });
    if (!result.user) {
      throw new NotFoundError(`User "${login}" not found`);
    }
    return result.user.id;
  }
}
