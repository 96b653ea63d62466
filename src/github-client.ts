/**
 * GitHub GraphQL client with authentication, request timeouts, and
 * error normalization.
 *
 * Wraps @octokit/graphql. Every failed request, whether a non-2xx HTTP
 * response, a GraphQL `errors` payload, or a network failure, surfaces
 * as an ApiError. Nothing is retried; the caller decides whether to
 * rerun.
 */

import { graphql, GraphqlResponseError } from "@octokit/graphql";
import type { DebugLogger } from "./lib/debug-logger.js";
import { ApiError, errorMessage } from "./lib/errors.js";
import type { GitHubClientConfig } from "./types.js";

export interface GitHubClient {
  /** Execute a GraphQL query. */
  query: <T = unknown>(
    queryString: string,
    variables?: Record<string, unknown>,
  ) => Promise<T>;

  /** Execute a GraphQL mutation. */
  mutate: <T = unknown>(
    mutation: string,
    variables?: Record<string, unknown>,
  ) => Promise<T>;

  /** Get the authenticated user's login. */
  getAuthenticatedUser: () => Promise<string>;

  /** Configuration. */
  config: GitHubClientConfig;
}

/**
 * Name of a named query or mutation document, e.g. "LinkedIssues".
 */
export function operationName(document: string): string | undefined {
  return /^\s*(?:query|mutation)\s+([_A-Za-z]\w*)/.exec(document)?.[1];
}

/**
 * Translate whatever @octokit/graphql threw into an ApiError.
 */
export function toApiError(error: unknown, operation?: string): ApiError {
  if (error instanceof ApiError) return error;

  const label = operation ? `GraphQL ${operation}` : "GraphQL request";

  if (error instanceof GraphqlResponseError) {
    return new ApiError(`${label} failed: ${error.message}`, {
      status: 200,
      errorTypes: (error.errors ?? [])
        .map((e) => e.type)
        .filter((t): t is string => typeof t === "string"),
      cause: error,
    });
  }

  const status =
    error && typeof error === "object" && "status" in error &&
    typeof error.status === "number"
      ? error.status
      : undefined;

  return new ApiError(
    status !== undefined
      ? `${label} failed with status code ${status}: ${errorMessage(error)}`
      : `${label} failed: ${errorMessage(error)}`,
    { status, cause: error },
  );
}

/**
 * Create an authenticated GitHub GraphQL client.
 */
export function createGitHubClient(
  clientConfig: GitHubClientConfig,
  debugLogger?: DebugLogger | null,
): GitHubClient {
  const graphqlWithAuth = graphql.defaults({
    url: clientConfig.graphqlUrl,
    headers: {
      authorization: `bearer ${clientConfig.token}`,
    },
  });

  async function executeGraphQL<T>(
    queryString: string,
    variables?: Record<string, unknown>,
  ): Promise<T> {
    const operation = operationName(queryString);
    const t0 = Date.now();
    try {
      const response = await graphqlWithAuth<T>(queryString, {
        ...variables,
        request: { signal: AbortSignal.timeout(clientConfig.timeoutMs) },
      });

      debugLogger?.recordRequest({
        operation,
        variables,
        durationMs: Date.now() - t0,
        status: 200,
      });

      return response;
    } catch (error: unknown) {
      const apiError = toApiError(error, operation);

      debugLogger?.recordRequest({
        operation,
        variables,
        durationMs: Date.now() - t0,
        status: apiError.status ?? 0,
        error: apiError.message,
      });

      throw apiError;
    }
  }

  let authenticatedUser: string | undefined;

  return {
    config: clientConfig,

    query<T>(queryString: string, variables?: Record<string, unknown>) {
      return executeGraphQL<T>(queryString, variables);
    },

    mutate<T>(mutation: string, variables?: Record<string, unknown>) {
      return executeGraphQL<T>(mutation, variables);
    },

    async getAuthenticatedUser(): Promise<string> {
      if (authenticatedUser) return authenticatedUser;

      const result = await executeGraphQL<{ viewer: { login: string } }>(
        `query Viewer { viewer { login } }`,
      );
      authenticatedUser = result.viewer.login;
      return authenticatedUser;
    },
  };
}
