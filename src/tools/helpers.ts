import type { ServerContext } from "./context.js";
import type { ToolResponse, SuccessResponse, ErrorResponse, ErrorCategory } from "../types/response.js";
import type { ToolMetadata, ExecutionContext } from "../types/tool.js";
import type { RuleFailure } from "../rules/rule.js";
import { LockdownErrorCode } from "../shared/errors.js";

// ── Response Builders ──────────────────────────────────────────────

export function success(tool: string, targetHost: string, durationMs: number | null, data: Record<string, unknown>, extra?: Partial<SuccessResponse>): SuccessResponse {
  return { status: "success", tool, target_host: targetHost, duration_ms: durationMs, data, ...extra };
}

export function error(tool: string, targetHost: string, durationMs: number | null, opts: { code: string; category: ErrorCategory; message: string; remediation?: string[] }): ErrorResponse {
  return {
    status: "error", tool, target_host: targetHost, duration_ms: durationMs,
    error_code: opts.code, error_category: opts.category, message: opts.message,
    remediation: opts.remediation ?? [],
  };
}

// ── Failure Categorization ─────────────────────────────────────────

const FAILURE_CATEGORIES: Record<RuleFailure["code"], { category: ErrorCategory; remediation: (ctx: ServerContext) => string[] }> = {
  [LockdownErrorCode.MALFORMED_DATABASE]: {
    category: "format",
    remediation: (ctx) => [
      `Inspect ${ctx.config.passwd_path} for truncated or hand-edited lines`,
      "Run pwck (or the platform equivalent) to locate broken entries",
      "No changes were made; rerun once the file is repaired",
    ],
  },
  [LockdownErrorCode.NOT_FOUND]: {
    category: "not_found",
    remediation: (ctx) => [`Check that passwd_path (${ctx.config.passwd_path}) points at the account database`],
  },
  [LockdownErrorCode.PERMISSION_DENIED]: {
    category: "privilege",
    remediation: () => ["Run the server as root; the account database and its journal are root-owned"],
  },
  [LockdownErrorCode.IO_ERROR]: {
    category: "io",
    remediation: (ctx) => [`Check free space and file-system health under ${ctx.config.passwd_path} and ${ctx.config.state_dir}`],
  },
  [LockdownErrorCode.JOURNAL_CORRUPT]: {
    category: "state",
    remediation: (ctx) => [`Inspect ${ctx.config.state_dir}/journal.json; move it aside to start a fresh journal`],
  },
  [LockdownErrorCode.NOT_APPLICABLE]: {
    category: "validation",
    remediation: () => ["Call accounts_rule_info to see the platforms this rule supports"],
  },
  [LockdownErrorCode.INVALID_CONFIG]: {
    category: "validation",
    remediation: (ctx) => [`Fix ${ctx.configPath} and restart the server`],
  },
  INTERNAL_ERROR: {
    category: "state",
    remediation: () => ["Check server logs for details"],
  },
};

/** Build an ErrorResponse from a failed rule operation. */
export function ruleFailure(tool: string, ctx: ServerContext, durationMs: number, failure: RuleFailure): ErrorResponse {
  const { category, remediation } = FAILURE_CATEGORIES[failure.code];
  return error(tool, ctx.targetHost, durationMs, { code: failure.code, category, message: failure.message, remediation: remediation(ctx) });
}

/** Run a synchronous rule operation and measure it. */
export function timed<T>(fn: () => T): { result: T; durationMs: number } {
  const start = performance.now();
  const result = fn();
  return { result, durationMs: Math.round(performance.now() - start) };
}

// ── Tool Registration Helper ───────────────────────────────────────

/** Register a tool on the context's registry with less boilerplate. */
export function registerTool(
  ctx: ServerContext,
  metadata: ToolMetadata,
  handler: (args: Record<string, unknown>, execCtx: ExecutionContext) => Promise<ToolResponse>,
): void {
  ctx.registry.register({ metadata, execute: handler });
}
