/**
 * Projects V2 access for the configured project: project id, the "Status"
 * single-select field, project items, and status writes.
 *
 * Single-select field values have no REST equivalent, so everything here
 * goes through GraphQL. The project id and the field table are fetched at
 * most once per ProjectClient.
 */

import type { GitHubClient } from "../github-client.js";
import type {
  IssueIdentifier,
  IssueReference,
  ProjectItem,
  ProjectV2SingleSelectField,
  SyncConfig,
} from "../types.js";
import { FieldOptionCache } from "./cache.js";
import {
  ApiError,
  ConfigError,
  NotFoundError,
  ValidationError,
} from "./errors.js";
import { STATUS_FIELD_NAME, isIssueStatus, type IssueStatus } from "./statuses.js";

export type ProjectClientConfig = Pick<
  SyncConfig,
  "organization" | "repository" | "projectNumber"
>;

// ---------------------------------------------------------------------------
// GraphQL queries and mutations
// ---------------------------------------------------------------------------

const PROJECT_ID_QUERY = `query ProjectId($owner: String!, $number: Int!) {
  OWNER_TYPE(login: $owner) {
    projectV2(number: $number) {
      id
    }
  }
}`;

const PROJECT_FIELDS_QUERY = `query ProjectFields($projectId: ID!) {
  node(id: $projectId) {
    ... on ProjectV2 {
      fields(first: 50) {
        nodes {
          ... on ProjectV2SingleSelectField {
            id
            name
            options { id name }
          }
        }
      }
    }
  }
}`;

const ISSUE_PROJECT_ITEMS_QUERY = `query IssueProjectItems($issueId: ID!) {
  node(id: $issueId) {
    ... on Issue {
      projectItems(first: 10) {
        nodes {
          id
          project { id title }
          fieldValues(first: 20) {
            nodes {
              ... on ProjectV2ItemFieldSingleSelectValue {
                name
                field { ... on ProjectV2SingleSelectField { name } }
              }
            }
          }
        }
      }
    }
  }
}`;

const LINKED_ISSUES_QUERY = `query LinkedIssues($owner: String!, $repo: String!, $number: Int!) {
  repository(owner: $owner, name: $repo) {
    pullRequest(number: $number) {
      id
      closingIssuesReferences(first: 50) {
        edges {
          node { id number title body }
        }
      }
    }
  }
}`;

const ISSUE_NODE_ID_QUERY = `query IssueNodeId($owner: String!, $repo: String!, $number: Int!) {
  repository(owner: $owner, name: $repo) {
    issue(number: $number) { id }
  }
}`;

const UPDATE_FIELD_MUTATION = `mutation UpdateItemField($projectId: ID!, $itemId: ID!, $fieldId: ID!, $optionId: String!) {
  updateProjectV2ItemFieldValue(input: {
    projectId: $projectId,
    itemId: $itemId,
    fieldId: $fieldId,
    value: { singleSelectOptionId: $optionId }
  }) {
    projectV2Item { id }
  }
}`;

// ---------------------------------------------------------------------------
// Response shapes
// ---------------------------------------------------------------------------

type ProjectIdResult = Record<
  string,
  { projectV2: { id: string } | null } | null | undefined
>;

interface ProjectFieldsResult {
  node: {
    fields?: {
      nodes: Array<Partial<ProjectV2SingleSelectField> | null>;
    };
  } | null;
}

interface IssueProjectItemsResult {
  node: {
    projectItems?: {
      nodes: Array<{
        id: string;
        project: { id: string; title: string };
        fieldValues: {
          nodes: Array<{ name?: string; field?: { name?: string } } | null>;
        };
      }>;
    };
  } | null;
}

interface LinkedIssuesResult {
  repository: {
    pullRequest: {
      id: string;
      closingIssuesReferences: {
        edges: Array<{ node: IssueReference | null } | null>;
      };
    } | null;
  } | null;
}

interface IssueNodeIdResult {
  repository: { issue: { id: string } | null } | null;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isSingleSelectField(
  field: Partial<ProjectV2SingleSelectField> | null,
): field is ProjectV2SingleSelectField {
  return !!field?.id && !!field.name && Array.isArray(field.options);
}

/**
 * Validate the arguments of a status write. Runs before any request.
 */
export function validateStatusRequest(
  status: string,
  identifier: { issueNumber?: number; issueNodeId?: string },
): { status: IssueStatus; identifier: IssueIdentifier } {
  const resolved = resolveIdentifier(identifier);
  if (!isIssueStatus(status)) {
    throw new ConfigError(`Unrecognized status "${status}".`);
  }
  return { status, identifier: resolved };
}

function resolveIdentifier({
  issueNumber,
  issueNodeId,
}: {
  issueNumber?: number;
  issueNodeId?: string;
}): IssueIdentifier {
  if (issueNumber !== undefined) {
    if (issueNodeId) {
      throw new ValidationError(
        "Only one of issueNumber or issueNodeId must be provided.",
      );
    }
    if (!Number.isInteger(issueNumber) || issueNumber < 1) {
      throw new ValidationError(
        `issueNumber must be a positive integer, got ${issueNumber}.`,
      );
    }
    return { issueNumber };
  }
  if (!issueNodeId) {
    throw new ValidationError(
      "Either issueNumber or issueNodeId must be provided.",
    );
  }
  return { issueNodeId };
}

// ---------------------------------------------------------------------------
// ProjectClient
// ---------------------------------------------------------------------------

export class ProjectClient {
  private projectId: string | undefined;
  private readonly fieldCache = new FieldOptionCache();

  constructor(
    private readonly client: GitHubClient,
    private readonly config: ProjectClientConfig,
  ) {}

  /**
   * Resolve the project node id from owner + project number.
   * Tries the organization first, then a user with the same login.
   */
  async resolveProjectId(): Promise<string> {
    if (this.projectId) return this.projectId;

    const { organization, projectNumber } = this.config;
    for (const ownerType of ["organization", "user"]) {
      let result: ProjectIdResult;
      try {
        result = await this.client.query<ProjectIdResult>(
          PROJECT_ID_QUERY.replace("OWNER_TYPE", ownerType),
          { owner: organization, number: projectNumber },
        );
      } catch (error) {
        // A missing owner of this type is reported as NOT_FOUND; try the next
        if (error instanceof ApiError && error.isNotFound) continue;
        throw error;
      }
      const id = result[ownerType]?.projectV2?.id;
      if (id) {
        this.projectId = id;
        return id;
      }
    }

    throw new ConfigError(
      `Project #${projectNumber} not found for owner "${organization}"`,
    );
  }

  /**
   * Single-select fields of the project, fetched once and cached.
   */
  async getProjectFields(): Promise<FieldOptionCache> {
    if (this.fieldCache.isPopulated()) return this.fieldCache;

    const projectId = await this.resolveProjectId();
    const result = await this.client.query<ProjectFieldsResult>(
      PROJECT_FIELDS_QUERY,
      { projectId },
    );
    this.fieldCache.populate(
      (result.node?.fields?.nodes ?? []).filter(isSingleSelectField),
    );
    return this.fieldCache;
  }

  /**
   * Resolve the "Status" field id and the option id for a status name.
   */
  async resolveStatusField(
    status: string,
  ): Promise<{ fieldId: string; optionId: string }> {
    const fields = await this.getProjectFields();

    const fieldId = fields.getFieldId(STATUS_FIELD_NAME);
    if (!fieldId) {
      throw new NotFoundError(
        `Field "${STATUS_FIELD_NAME}" not found in project fields. ` +
          `Available fields: ${fields.getFieldNames().join(", ") || "(none)"}`,
      );
    }

    const optionId = fields.resolveOptionId(STATUS_FIELD_NAME, status);
    if (!optionId) {
      throw new NotFoundError(
        `Option "${status}" not found for field "${STATUS_FIELD_NAME}". ` +
          `Valid options: ${fields.getOptionNames(STATUS_FIELD_NAME).join(", ")}`,
      );
    }

    return { fieldId, optionId };
  }

  /**
   * Set a single-select field value on a project item.
   */
  async setFieldValue(
    itemId: string,
    fieldId: string,
    optionId: string,
  ): Promise<void> {
    const projectId = await this.resolveProjectId();
    await this.client.mutate(UPDATE_FIELD_MUTATION, {
      projectId,
      itemId,
      fieldId,
      optionId,
    });
  }

  /**
   * Project items of an issue (first 10) with their single-select values.
   */
  async getIssueProjectItems(issueNodeId: string): Promise<ProjectItem[]> {
    const result = await this.client.query<IssueProjectItemsResult>(
      ISSUE_PROJECT_ITEMS_QUERY,
      { issueId: issueNodeId },
    );

    return (result.node?.projectItems?.nodes ?? []).map((item) => ({
      id: item.id,
      project: item.project,
      fieldValues: item.fieldValues.nodes.flatMap((fv) =>
        fv?.name && fv.field?.name
          ? [{ name: fv.name, fieldName: fv.field.name }]
          : [],
      ),
    }));
  }

  /**
   * Resolve the issue's item in this project.
   */
  async resolveItemId(issueNodeId: string): Promise<string> {
    const projectId = await this.resolveProjectId();
    const items = await this.getIssueProjectItems(issueNodeId);
    const item = items.find((i) => i.project.id === projectId);
    if (!item) {
      throw new NotFoundError(
        `Issue ${issueNodeId} is not in project #${this.config.projectNumber}`,
      );
    }
    return item.id;
  }

  /**
   * Current "Status" option name of the issue in this project, or null.
   */
  async getCurrentStatus(issueNodeId: string): Promise<string | null> {
    const projectId = await this.resolveProjectId();
    const items = await this.getIssueProjectItems(issueNodeId);
    const item = items.find((i) => i.project.id === projectId);
    return (
      item?.fieldValues.find((fv) => fv.fieldName === STATUS_FIELD_NAME)
        ?.name ?? null
    );
  }

  /**
   * Issues the pull request closes via closing keywords.
   */
  async getLinkedIssues(prNumber: number): Promise<IssueReference[]> {
    const { organization, repository } = this.config;
    const result = await this.client.query<LinkedIssuesResult>(
      LINKED_ISSUES_QUERY,
      { owner: organization, repo: repository, number: prNumber },
    );

    const pullRequest = result.repository?.pullRequest;
    if (!pullRequest) {
      throw new NotFoundError(
        `Pull request #${prNumber} not found in ${organization}/${repository}`,
      );
    }

    return pullRequest.closingIssuesReferences.edges.flatMap((edge) =>
      edge?.node ? [edge.node] : [],
    );
  }

  /**
   * Resolve an issue number to its GraphQL node ID.
   */
  async resolveIssueNodeId(issueNumber: number): Promise<string> {
    const { organization, repository } = this.config;
    const result = await this.client.query<IssueNodeIdResult>(
      ISSUE_NODE_ID_QUERY,
      { owner: organization, repo: repository, number: issueNumber },
    );

    const nodeId = result.repository?.issue?.id;
    if (!nodeId) {
      throw new NotFoundError(
        `Issue #${issueNumber} not found in ${organization}/${repository}`,
      );
    }
    return nodeId;
  }

  /**
   * Set the project "Status" of an issue identified by number or node id.
   * Arguments are validated before any request is made.
   */
  async setIssueStatus(
    status: string,
    identifier: { issueNumber?: number; issueNodeId?: string },
  ): Promise<void> {
    const request = validateStatusRequest(status, identifier);
    const target = request.identifier;

    const { fieldId, optionId } = await this.resolveStatusField(request.status);
    const issueNodeId =
      target.issueNumber !== undefined
        ? await this.resolveIssueNodeId(target.issueNumber)
        : target.issueNodeId;
    const itemId = await this.resolveItemId(issueNodeId);

    await this.setFieldValue(itemId, fieldId, optionId);
  }
}
