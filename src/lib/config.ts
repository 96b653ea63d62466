/**
 * Environment configuration loader.
 *
 * Values are validated with Zod before any client is created, so a missing
 * token or a non-numeric project number fails the run before the first
 * network call.
 */

import { z } from "zod";
import type { SyncConfig } from "../types.js";
import { ConfigError } from "./errors.js";

export const DEFAULT_GRAPHQL_URL = "https://api.github.com/graphql";
export const DEFAULT_TIMEOUT_MS = 10_000;

type Env = Record<string, string | undefined>;

/**
 * Read an environment variable, treating empty strings and unexpanded
 * `${VAR}` placeholders as unset.
 */
export function resolveEnv(env: Env, name: string): string | undefined {
  const val = env[name];
  if (!val || val.startsWith("${")) return undefined;
  return val;
}

const positiveInt = (name: string) =>
  z
    .string({ required_error: `${name} is not set` })
    .regex(/^\d+$/, `${name} must be a positive integer`)
    .transform((v) => parseInt(v, 10))
    .refine((n) => n > 0, `${name} must be a positive integer`);

const required = (name: string, what: string) =>
  z.string({
    required_error: `GitHub ${what} is not set. Please set the ${name} environment variable.`,
  });

const EnvSchema = z.object({
  TOKEN: required("TOKEN", "token"),
  ORG: required("ORG", "organization"),
  REPO: required("REPO", "repository"),
  PROJECT_NUMBER: positiveInt("PROJECT_NUMBER"),
  GRAPHQL_URL: z.string().url().default(DEFAULT_GRAPHQL_URL),
  REQUEST_TIMEOUT_MS: positiveInt("REQUEST_TIMEOUT_MS").optional(),
});

const PrNumberSchema = z.object({ PR_NUMBER: positiveInt("PR_NUMBER") });

function pick(env: Env, names: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const name of names) {
    const val = resolveEnv(env, name);
    if (val !== undefined) result[name] = val;
  }
  return result;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => issue.message).join("; ");
}

/**
 * Build the sync configuration from the environment.
 * Throws ConfigError listing every missing or malformed value.
 */
export function loadConfig(env: Env = process.env): SyncConfig {
  const parsed = EnvSchema.safeParse(
    pick(env, [
      "TOKEN",
      "ORG",
      "REPO",
      "PROJECT_NUMBER",
      "GRAPHQL_URL",
      "REQUEST_TIMEOUT_MS",
    ]),
  );
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }

  return {
    token: parsed.data.TOKEN,
    organization: parsed.data.ORG,
    repository: parsed.data.REPO,
    projectNumber: parsed.data.PROJECT_NUMBER,
    graphqlUrl: parsed.data.GRAPHQL_URL,
    timeoutMs: parsed.data.REQUEST_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS,
  };
}

/**
 * Read the pull request number for a CLI run.
 */
export function loadPrNumber(env: Env = process.env): number {
  const parsed = PrNumberSchema.safeParse(pick(env, ["PR_NUMBER"]));
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }
  return parsed.data.PR_NUMBER;
}
