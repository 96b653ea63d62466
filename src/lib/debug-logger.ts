/**
 * JSONL run log, written when PR_SYNC_DEBUG=true.
 *
 * One file per process under ~/.pr-issue-sync/logs/. It holds a line per
 * GraphQL request, one per MCP tool call, and for CLI runs a closing
 * summary line. Lines are appended in the order they are recorded.
 */

import { appendFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import { homedir } from "node:os";
import { randomBytes } from "node:crypto";
import type { ToolResult } from "../types.js";
import { errorMessage } from "./errors.js";
import type { SyncReport } from "./pr-sync.js";

export const DEFAULT_LOG_DIR = join(homedir(), ".pr-issue-sync", "logs");

export interface DebugLoggerOptions {
  logDir?: string;
  /** Start time of the run; names the log file. */
  startedAt?: Date;
}

export interface RequestRecord {
  operation?: string;
  variables?: Record<string, unknown>;
  durationMs: number;
  /** HTTP status, 0 when no response arrived. */
  status: number;
  error?: string;
}

export interface ToolCallRecord {
  tool: string;
  params: Record<string, unknown>;
  durationMs: number;
  ok: boolean;
  error?: string;
}

type LogLine =
  | ({ cat: "graphql" } & RequestRecord)
  | ({ cat: "tool" } & ToolCallRecord)
  | {
      cat: "run";
      prNumber: number;
      targetStatus: string;
      issues: number[];
      warnings: string[];
    };

const SENSITIVE_KEY = /token|auth|secret|key|password|credential/i;

/**
 * Copy of `value` with every sensitive key replaced by "[REDACTED]", at
 * any depth.
 */
export function redact(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redact);
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [
        k,
        SENSITIVE_KEY.test(k) ? "[REDACTED]" : redact(v),
      ]),
    );
  }
  return value;
}

function logFileName(startedAt: Date): string {
  // 2026-10-18T09:57:03.120Z -> 20261018-095703
  const stamp = startedAt
    .toISOString()
    .slice(0, 19)
    .replace(/[-:]/g, "")
    .replace("T", "-");
  return `run-${stamp}-${randomBytes(3).toString("hex")}.jsonl`;
}

export class DebugLogger {
  readonly path: string;
  private dirReady = false;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: DebugLoggerOptions = {}) {
    this.path = join(
      options.logDir ?? DEFAULT_LOG_DIR,
      logFileName(options.startedAt ?? new Date()),
    );
  }

  recordRequest(record: RequestRecord): void {
    this.write({
      cat: "graphql",
      ...record,
      variables: record.variables && asRecord(redact(record.variables)),
    });
  }

  recordToolCall(record: ToolCallRecord): void {
    this.write({
      cat: "tool",
      ...record,
      params: asRecord(redact(record.params)),
    });
  }

  recordRun(report: SyncReport): void {
    this.write({
      cat: "run",
      prNumber: report.prNumber,
      targetStatus: report.targetStatus,
      issues: report.issues.map((i) => i.number),
      warnings: report.issues.flatMap((i) => i.warnings),
    });
  }

  /** Resolves once every recorded line is on disk (or has failed). */
  flush(): Promise<void> {
    return this.queue;
  }

  private write(line: LogLine): void {
    const text = JSON.stringify({ ts: new Date().toISOString(), ...line }) + "\n";
    this.queue = this.queue
      .then(async () => {
        if (!this.dirReady) {
          await mkdir(dirname(this.path), { recursive: true });
          this.dirReady = true;
        }
        await appendFile(this.path, text);
      })
      .catch((error: unknown) => {
        console.error(
          `[pr-issue-sync] Could not write debug log ${this.path}: ${errorMessage(error)}`,
        );
      });
  }
}

function asRecord(value: unknown): Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

/**
 * DebugLogger when PR_SYNC_DEBUG is "true", otherwise null.
 */
export function createDebugLogger(
  env: Record<string, string | undefined> = process.env,
  options?: DebugLoggerOptions,
): DebugLogger | null {
  return env.PR_SYNC_DEBUG === "true" ? new DebugLogger(options) : null;
}

/**
 * Run an MCP tool handler and record the call. A handler that returns an
 * error result counts as a failed call, the same as one that throws.
 */
export async function logToolCall(
  logger: DebugLogger | null,
  tool: string,
  params: Record<string, unknown>,
  handler: () => Promise<ToolResult>,
): Promise<ToolResult> {
  if (!logger) return handler();

  const started = Date.now();
  let result: ToolResult;
  try {
    result = await handler();
  } catch (error) {
    logger.recordToolCall({
      tool,
      params,
      durationMs: Date.now() - started,
      ok: false,
      error: errorMessage(error),
    });
    throw error;
  }

  logger.recordToolCall({
    tool,
    params,
    durationMs: Date.now() - started,
    ok: !result.isError,
    ...(result.isError ? { error: toolErrorText(result) } : {}),
  });
  return result;
}

function toolErrorText(result: ToolResult): string {
  return result.content.map((c) => c.text).join("\n");
}
