import { describe, it, expect, vi } from "vitest";
import type { GitHubClient } from "../github-client.js";
import { NotFoundError } from "../lib/errors.js";
import { GraphQLIssueApi } from "../lib/issue-api.js";
import type { IssueSnapshot } from "../types.js";

function mockClient() {
  const query = vi.fn(async (_query: string, _variables?: Record<string, unknown>): Promise<unknown> => ({}));
  const mutate = vi.fn(async (_mutation: string, _variables?: Record<string, unknown>): Promise<unknown> => ({}));
  const client = {
    config: { token: "test-token", graphqlUrl: "http://localhost", timeoutMs: 1000 },
    query,
    mutate,
    getAuthenticatedUser: vi.fn(),
  } as unknown as GitHubClient;
  return { client, query, mutate };
}

const CONFIG = { organization: "acme", repository: "widgets" };

const ISSUE: IssueSnapshot = { id: "I_5", number: 5, state: "open", assignees: ["alice"] };

describe("GraphQLIssueApi.getIssue", () => {
  it("maps the issue snapshot looked up by node id", async () => {
    const { client, query } = mockClient();
    query.mockResolvedValueOnce({
      node: {
        id: "I_5",
        number: 5,
        state: "CLOSED",
        assignees: { nodes: [{ login: "alice" }, { login: "bob" }] },
      },
    });

    const api = new GraphQLIssueApi(client, CONFIG);
    expect(await api.getIssue("I_5")).toEqual({
      id: "I_5",
      number: 5,
      state: "closed",
      assignees: ["alice", "bob"],
    });
    expect(query.mock.calls[0][0]).toContain("node(id: $id)");
    expect(query.mock.calls[0][1]).toEqual({ id: "I_5" });
  });

  it("throws NotFoundError for a missing node", async () => {
    const { client, query } = mockClient();
    query.mockResolvedValueOnce({ node: null });
    const api = new GraphQLIssueApi(client, CONFIG);
    await expect(api.getIssue("I_gone")).rejects.toThrow(
      new NotFoundError("Issue I_gone not found"),
    );
  });

  it("throws NotFoundError when the node is not an issue", async () => {
    const { client, query } = mockClient();
    query.mockResolvedValueOnce({ node: {} });
    const api = new GraphQLIssueApi(client, CONFIG);
    await expect(api.getIssue("PR_1")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("getAssignees returns the issue's logins", async () => {
    const { client, query } = mockClient();
    query.mockResolvedValueOnce({
      node: { id: "I_5", number: 5, state: "OPEN", assignees: { nodes: [{ login: "carol" }] } },
    });
    const api = new GraphQLIssueApi(client, CONFIG);
    expect(await api.getAssignees("I_5")).toEqual(["carol"]);
  });
});

describe("GraphQLIssueApi.getPull", () => {
  it.each([
    { state: "MERGED", merged: true, expected: { merged: true, state: "closed" } },
    { state: "CLOSED", merged: false, expected: { merged: false, state: "closed" } },
    { state: "OPEN", merged: false, expected: { merged: false, state: "open" } },
  ])("maps $state", async ({ state, merged, expected }) => {
    const { client, query } = mockClient();
    query.mockResolvedValueOnce({
      repository: {
        pullRequest: {
          number: 42,
          merged,
          state,
          isDraft: false,
          author: { login: "bob" },
          assignees: { nodes: [] },
        },
      },
    });
    const api = new GraphQLIssueApi(client, CONFIG);
    expect(await api.getPull(42)).toMatchObject(expected);
  });

  it("uses ghost for a deleted author", async () => {
    const { client, query } = mockClient();
    query.mockResolvedValueOnce({
      repository: {
        pullRequest: {
          number: 3,
          merged: false,
          state: "OPEN",
          isDraft: true,
          author: null,
          assignees: { nodes: [{ login: "alice" }] },
        },
      },
    });
    const api = new GraphQLIssueApi(client, CONFIG);
    expect(await api.getPull(3)).toEqual({
      number: 3,
      merged: false,
      state: "open",
      draft: true,
      assignees: ["alice"],
      author: "ghost",
    });
  });

  it("throws NotFoundError for a missing pull request", async () => {
    const { client, query } = mockClient();
    query.mockResolvedValueOnce({ repository: null });
    const api = new GraphQLIssueApi(client, CONFIG);
    await expect(api.getPull(1)).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe("GraphQLIssueApi mutations", () => {
  it("closes an issue by node id", async () => {
    const { client, mutate } = mockClient();
    const api = new GraphQLIssueApi(client, CONFIG);
    await api.closeIssue(ISSUE);
    expect(mutate).toHaveBeenCalledWith(
      expect.stringContaining("closeIssue(input: { issueId: $issueId, stateReason: COMPLETED })"),
      { issueId: "I_5" },
    );
  });

  it("resolves logins to user ids and replaces assignees", async () => {
    const { client, query, mutate } = mockClient();
    query
      .mockResolvedValueOnce({ user: { id: "U_bob" } })
      .mockResolvedValueOnce({ user: { id: "U_carol" } });

    const api = new GraphQLIssueApi(client, CONFIG);
    await api.setAssignees(ISSUE, ["bob", "carol"]);

    expect(query.mock.calls.map((c) => c[1])).toEqual([{ login: "bob" }, { login: "carol" }]);
    expect(mutate.mock.calls[0][1]).toEqual({
      issueId: "I_5",
      assigneeIds: ["U_bob", "U_carol"],
    });
  });

  it("clears assignees with an empty list", async () => {
    const { client, query, mutate } = mockClient();
    const api = new GraphQLIssueApi(client, CONFIG);
    await api.setAssignees(ISSUE, []);
    expect(query).not.toHaveBeenCalled();
    expect(mutate.mock.calls[0][1]).toEqual({ issueId: "I_5", assigneeIds: [] });
  });

  it("fails without mutating when a login does not exist", async () => {
    const { client, query, mutate } = mockClient();
    query.mockResolvedValueOnce({ user: null });
    const api = new GraphQLIssueApi(client, CONFIG);
    await expect(api.setAssignees(ISSUE, ["nobody"])).rejects.toThrow(
      'User "nobody" not found',
    );
    expect(mutate).not.toHaveBeenCalled();
  });
});
