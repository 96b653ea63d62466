import { describe, it, expect, vi, beforeEach } from "vitest";

// Mock @octokit/graphql to avoid real API calls; keep the real error class
const mockGraphql = vi.hoisted(() => {
  const fn = Object.assign(vi.fn(), { defaults: vi.fn() });
  fn.defaults.mockReturnValue(fn);
  return fn;
});

vi.mock("@octokit/graphql", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@octokit/graphql")>();
  return { ...actual, graphql: mockGraphql };
});

import { createGitHubClient, operationName, toApiError } from "../github-client.js";
import { ApiError } from "../lib/errors.js";

const CONFIG = {
  token: "test-token",
  graphqlUrl: "https://api.github.com/graphql",
  timeoutMs: 10_000,
};

describe("createGitHubClient", () => {
  beforeEach(() => {
    mockGraphql.mockReset();
  });

  it("configures the endpoint and bearer token", () => {
    createGitHubClient(CONFIG);
    expect(mockGraphql.defaults).toHaveBeenCalledWith({
      url: "https://api.github.com/graphql",
      headers: { authorization: "bearer test-token" },
    });
  });

  it("passes variables and a timeout signal with each request", async () => {
    mockGraphql.mockResolvedValueOnce({ repository: { id: "R_1" } });
    const client = createGitHubClient(CONFIG);

    const result = await client.query<{ repository: { id: string } }>(
      "query Repo($owner: String!) { repository(owner: $owner, name: \"x\") { id } }",
      { owner: "acme" },
    );

    expect(result).toEqual({ repository: { id: "R_1" } });
    const [, params] = mockGraphql.mock.calls[0];
    expect(params.owner).toBe("acme");
    expect(params.request.signal).toBeInstanceOf(AbortSignal);
  });

  it("wraps HTTP failures in ApiError with the status code", async () => {
    mockGraphql.mockRejectedValueOnce(
      Object.assign(new Error("Bad credentials"), { status: 401 }),
    );
    const client = createGitHubClient(CONFIG);

    const error = await client
      .mutate("mutation CloseIssue($issueId: ID!) { closeIssue { issue { id } } }", {
        issueId: "I_1",
      })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      status: 401,
      message: "GraphQL CloseIssue failed with status code 401: Bad credentials",
    });
  });

  it("caches the authenticated user", async () => {
    mockGraphql.mockResolvedValue({ viewer: { login: "test-user" } });
    const client = createGitHubClient(CONFIG);

    expect(await client.getAuthenticatedUser()).toBe("test-user");
    expect(await client.getAuthenticatedUser()).toBe("test-user");
    expect(mockGraphql).toHaveBeenCalledTimes(1);
  });

  it("stores config", () => {
    const client = createGitHubClient(CONFIG);
    expect(client.config).toEqual(CONFIG);
  });
});

describe("toApiError", () => {
  it("returns ApiError instances unchanged", () => {
    const original = new ApiError("boom", { status: 502 });
    expect(toApiError(original)).toBe(original);
  });

  it("wraps network errors without a status", () => {
    const error = toApiError(new Error("socket hang up"));
    expect(error.status).toBeUndefined();
    expect(error.message).toBe("GraphQL request failed: socket hang up");
    expect(error.isNotFound).toBe(false);
  });

  it("treats 404 as not found", () => {
    const error = toApiError({ status: 404, message: "Not Found" }, "ProjectId");
    expect(error.status).toBe(404);
    expect(error.isNotFound).toBe(true);
  });

  it("keeps the original error as cause", () => {
    const cause = new Error("timeout");
    expect(toApiError(cause).cause).toBe(cause);
  });
});

describe("operationName", () => {
  it("reads query and mutation names", () => {
    expect(operationName("query LinkedIssues($number: Int!) { x }")).toBe("LinkedIssues");
    expect(operationName("\n  mutation CloseIssue($issueId: ID!) { x }")).toBe("CloseIssue");
  });

  it("returns undefined for anonymous documents", () => {
    expect(operationName("query { viewer { login } }")).toBeUndefined();
  });
});
