/**
 * Health check tool: token, project access, and the Status field, each
 * reported separately.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { GitHubClient } from "../github-client.js";
import { errorMessage } from "../lib/errors.js";
import type { ProjectClient } from "../lib/project-client.js";
import { STATUS_FIELD_NAME } from "../lib/statuses.js";
import { toolSuccess } from "../types.js";

type CheckResult = { status: "ok" | "fail" | "skipped"; detail?: string };

export function registerHealthTools(
  server: McpServer,
  client: GitHubClient,
  projects: Pick<ProjectClient, "resolveProjectId" | "getProjectFields">,
): void {
  server.tool(
    "pr_sync__health_check",
    "Validate GitHub API connectivity, project access, and the Status field",
    {},
    async () => {
      const checks: Record<"auth" | "projectAccess" | "statusField", CheckResult> = {
        auth: { status: "skipped" },
        projectAccess: { status: "skipped" },
        statusField: { status: "skipped" },
      };

      try {
        const login = await client.getAuthenticatedUser();
        checks.auth = { status: "ok", detail: `Authenticated as ${login}` };
      } catch (e) {
        checks.auth = { status: "fail", detail: errorMessage(e) };
      }

      try {
        const projectId = await projects.resolveProjectId();
        checks.projectAccess = { status: "ok", detail: projectId };
      } catch (e) {
        checks.projectAccess = { status: "fail", detail: errorMessage(e) };
      }

      // The field lookup needs the project id
      if (checks.projectAccess.status === "ok") {
        try {
          const fields = await projects.getProjectFields();
          const options = fields.getOptionNames(STATUS_FIELD_NAME);
          checks.statusField =
            options.length > 0
              ? { status: "ok", detail: options.join(", ") }
              : {
                  status: "fail",
                  detail: `No "${STATUS_FIELD_NAME}" single-select field`,
                };
        } catch (e) {
          checks.statusField = { status: "fail", detail: errorMessage(e) };
        }
      }

      const allOk = Object.values(checks).every((c) => c.status === "ok");
      return toolSuccess({ status: allOk ? "ok" : "issues_found", checks });
    },
  );
}
