import { z } from "zod";
import type { ServerContext } from "../context.js";
import type { ErrorResponse } from "../../types/response.js";
import { registerTool, success, error, ruleFailure, timed } from "../helpers.js";
import { LockdownErrorCode } from "../../shared/errors.js";

const ReportInput = z.object({});

const FixInput = z.object({
  confirmed: z.boolean().optional().default(false).describe("Pass true to confirm execution after reviewing a confirmation_required response."),
  dry_run: z.boolean().optional().default(false).describe("Preview without executing: returns the rewritten records without touching the file."),
});

const UndoInput = z.object({
  confirmed: z.boolean().optional().default(false).describe("Pass true to confirm execution after reviewing a confirmation_required response."),
  dry_run: z.boolean().optional().default(false).describe("List the recorded changes that would be undone without undoing them."),
});

/** Gate shared by every tool: the framework only runs rules on platforms they apply to. */
function notApplicable(tool: string, ctx: ServerContext): ErrorResponse | null {
  if (ctx.rule.isApplicable(ctx.platform)) return null;
  return ruleFailure(tool, ctx, 0, {
    code: LockdownErrorCode.NOT_APPLICABLE,
    message: `${ctx.rule.metadata.name} does not apply to ${ctx.platform.name} ${ctx.platform.version} (${ctx.platform.family})`,
  });
}

function rootRequired(tool: string, ctx: ServerContext): ErrorResponse | null {
  if (!ctx.rule.metadata.rootRequired || ctx.isRoot) return null;
  return error(tool, ctx.targetHost, null, {
    code: "ROOT_REQUIRED",
    category: "privilege",
    message: `${ctx.rule.metadata.name} changes root-owned files and must run as root`,
    remediation: ["Restart the server as root, or use dry_run to preview the changes"],
  });
}

export function registerAccountTools(ctx: ServerContext): void {
  registerTool(ctx, {
    name: "accounts_rule_info",
    description: "Describe the system-account lockdown rule: guidance references, applicability on this host, configuration item state, and recorded changes available for undo.",
    module: "accounts",
    riskLevel: "read-only",
    inputSchema: ReportInput,
    annotations: { readOnlyHint: true, idempotentHint: true },
  }, async () => {
    const meta = ctx.rule.metadata;
    const { result: changes, durationMs } = timed(() => ctx.journal.findRuleChanges(meta.ruleNumber));
    return success("accounts_rule_info", ctx.targetHost, durationMs, {
      rule: { number: meta.ruleNumber, name: meta.name, help: meta.helpText, guidance: meta.guidance, mandatory: meta.mandatory, root_required: meta.rootRequired },
      config_item: { key: meta.configItem.key, instructions: meta.configItem.instructions, default: meta.configItem.defaultValue, current: ctx.rule.enabled },
      applicable: ctx.rule.isApplicable(ctx.platform),
      platform: ctx.platform,
      running_as_root: ctx.isRoot,
      passwd_path: ctx.config.passwd_path,
      uid_threshold: ctx.config.rules.block_system_accounts.uid_threshold,
      recorded_changes: changes.map((c) => ({ id: c.id, type: c.event.type, path: c.event.filepath, recorded_at: c.recordedAt })),
      ...(ctx.firstRun ? { setup: { first_run: true, config_path: ctx.configPath } } : {}),
    });
  });

  registerTool(ctx, {
    name: "accounts_report",
    description: "Audit the account database for system accounts (UID below the human threshold, not root) that can still log in. Read-only.",
    module: "accounts",
    riskLevel: "read-only",
    inputSchema: ReportInput,
    annotations: { readOnlyHint: true, idempotentHint: true },
  }, async () => {
    const gate = notApplicable("accounts_report", ctx);
    if (gate) return gate;
    const { result, durationMs } = timed(() => ctx.rule.report());
    if (!result.success || !result.verdict) {
      return ruleFailure("accounts_report", ctx, durationMs, result.error ?? { code: "INTERNAL_ERROR", message: result.detail });
    }
    const { verdict } = result;
    return success("accounts_report", ctx.targetHost, durationMs, {
      compliant: verdict.compliant,
      examined: verdict.examined,
      exempt: verdict.exempt,
      blocked: verdict.blocked,
      findings: verdict.findings,
    }, {
      summary: result.detail,
      severity: verdict.compliant ? "info" : "high",
    });
  });

  registerTool(ctx, {
    name: "accounts_fix",
    description: "Block login for every non-compliant system account by setting its login field to /sbin/nologin. The file is replaced atomically and the change is journaled for accounts_undo. High risk.",
    module: "accounts",
    riskLevel: "high",
    inputSchema: FixInput,
    annotations: { destructiveHint: false, idempotentHint: true },
  }, async (args) => {
    const input = FixInput.parse(args);
    const gate = notApplicable("accounts_fix", ctx)
      ?? ctx.safetyGate.check({
        toolName: "accounts_fix",
        toolRiskLevel: "high",
        targetHost: ctx.targetHost,
        target: ctx.config.passwd_path,
        description: `Set /sbin/nologin on system accounts in ${ctx.config.passwd_path}`,
        warnings: ["Services that run as a system account with an interactive shell will no longer be able to log in as it"],
        confirmed: input.confirmed,
        dryRun: input.dry_run,
      })
      ?? (input.dry_run ? null : rootRequired("accounts_fix", ctx));
    if (gate) return gate;

    const { result, durationMs } = timed(() => ctx.rule.fix({ dryRun: input.dry_run }));
    if (!result.success) {
      return ruleFailure("accounts_fix", ctx, durationMs, result.error ?? { code: "INTERNAL_ERROR", message: result.detail });
    }
    const data: Record<string, unknown> = {
      skipped: result.skipped,
      changed: result.changed,
      permissions_corrected: result.permissionsCorrected,
      changes: result.changes,
    };
    if (!input.dry_run && !result.skipped) {
      // Re-evaluate so the caller sees the post-fix state
      data.compliant_after = ctx.rule.report().compliant;
    }
    return success("accounts_fix", ctx.targetHost, durationMs, data, { summary: result.detail, ...(input.dry_run ? { dry_run: true } : {}) });
  });

  registerTool(ctx, {
    name: "accounts_undo",
    description: "Undo the latest accounts_fix by replaying its journal in reverse: restores the original account database content and ownership/mode. High risk.",
    module: "accounts",
    riskLevel: "high",
    inputSchema: UndoInput,
    annotations: { destructiveHint: true },
  }, async (args) => {
    const input = UndoInput.parse(args);
    const gate = ctx.safetyGate.check({
      toolName: "accounts_undo",
      toolRiskLevel: "high",
      targetHost: ctx.targetHost,
      target: ctx.config.passwd_path,
      description: `Restore ${ctx.config.passwd_path} to its state before the last fix`,
      warnings: ["Accounts blocked by the last fix will be able to log in again"],
      confirmed: input.confirmed,
      dryRun: input.dry_run,
    }) ?? (input.dry_run ? null : rootRequired("accounts_undo", ctx));
    if (gate) return gate;

    const { result, durationMs } = timed(() => ctx.rule.undo({ dryRun: input.dry_run }));
    if (!result.success) {
      return ruleFailure("accounts_undo", ctx, durationMs, result.error ?? { code: "INTERNAL_ERROR", message: result.detail });
    }
    return success("accounts_undo", ctx.targetHost, durationMs, { steps: result.steps }, { summary: result.detail, ...(input.dry_run ? { dry_run: true } : {}) });
  });
}
