import type { FileAccess, FilePermissions } from "../fs/file-access.js";
import type { ChangeJournal } from "../journal/types.js";
import type { PlatformContext } from "../types/platform.js";
import type { BlockSystemAccountsSettings } from "../types/config.js";
import { isApplicable } from "../platform/applicability.js";
import { evaluateCompliance } from "../accounts/evaluator.js";
import { commitRewrite, planRewrite } from "../accounts/remediator.js";
import type { ClassifierOptions } from "../accounts/types.js";
import { LockdownError, LockdownErrorCode, isInterrupt } from "../shared/errors.js";
import { logger } from "../logger.js";
import type { FixResult, ReportResult, Rule, RuleFailure, RuleMetadata, RuleResult, UndoResult } from "./rule.js";

export const BLOCK_SYSTEM_ACCOUNTS: RuleMetadata = {
  ruleNumber: 40,
  name: "BlockSystemAccounts",
  helpText:
    "Searches the account database for system accounts that currently allow login. " +
    "The fix sets the login field of each such entry to /sbin/nologin. The root account " +
    "is never blocked, since administrators need it in certain situations, and local " +
    "user accounts (UID at or above the human-account threshold) are left alone.",
  guidance: [
    "CIS", "NSA(2.3.1.4)", "cce-3987-5", "4525-2", "4657-3", "4661-5", "4807-4",
    "4701-9", "4669-8", "4436-2", "4815-7", "4696-1", "4216-8", "4758-9", "4621-9",
    "4515-3", "4282-0", "4802-5", "4806-6", "4471-9", "4617-7", "4418-0", "4810-8",
    "3955-2", "3834-9", "4408-1", "4536-9", "4809-0", "3841-4",
  ],
  mandatory: true,
  rootRequired: true,
  configItem: {
    key: "blocksysaccounts",
    datatype: "bool",
    instructions: "If you have system accounts that need to have valid shells, set rules.block_system_accounts.enabled to false (or no).",
    defaultValue: true,
  },
  applicability: {
    families: ["linux", "solaris", "freebsd"],
    os: { "Mac OS X": { from: "10.9", to: "10.10.10" } },
  },
};

export interface BlockSystemAccountsDeps {
  readonly settings: BlockSystemAccountsSettings;
  readonly passwdPath: string;
  readonly baseline: FilePermissions;
  readonly files: FileAccess;
  readonly journal: ChangeJournal;
}

/** Blocks login for system accounts in the account database; root and human accounts are exempt. */
export class BlockSystemAccounts implements Rule {
  readonly metadata = BLOCK_SYSTEM_ACCOUNTS;
  private readonly deps: BlockSystemAccountsDeps;

  constructor(deps: BlockSystemAccountsDeps) {
    this.deps = deps;
  }

  get enabled(): boolean {
    return this.deps.settings.enabled;
  }

  private get classifierOptions(): ClassifierOptions {
    return { uidThreshold: this.deps.settings.uid_threshold };
  }

  isApplicable(platform: PlatformContext): boolean {
    return isApplicable(this.metadata.applicability, platform);
  }

  report(): ReportResult {
    const path = this.deps.passwdPath;
    try {
      const verdict = evaluateCompliance(this.deps.files.readWholeFile(path), this.classifierOptions);
      if (verdict.empty) {
        logger.warn({ rule: this.metadata.name, path }, "Account database is empty");
        return { success: true, compliant: false, verdict, detail: `${path} is empty; no account records to examine.` };
      }
      const summary = `${verdict.examined} account records examined: ${verdict.exempt} exempt, ${verdict.blocked} system accounts blocked`;
      if (verdict.compliant) {
        logger.info({ rule: this.metadata.name, path, examined: verdict.examined }, "Compliant");
        return { success: true, compliant: true, verdict, detail: `${summary}. No system account can log in.` };
      }
      logger.warn({ rule: this.metadata.name, path, findings: verdict.findings.length }, "Not compliant");
      const detail = [`${summary}. ${verdict.findings.length} system account(s) can log in:`, ...verdict.reasons].join("\n");
      return { success: true, compliant: false, verdict, detail };
    } catch (err) {
      return { ...this.failed("report", err), compliant: false, verdict: null };
    }
  }

  fix(options: { dryRun?: boolean } = {}): FixResult {
    const dryRun = options.dryRun ?? false;
    const untouched = { changed: false, permissionsCorrected: false, changes: [] };
    if (!this.enabled) {
      logger.info({ rule: this.metadata.name, item: this.metadata.configItem.key }, "Configuration item disabled, fix skipped");
      return { success: true, skipped: true, dryRun, ...untouched, detail: `${this.metadata.configItem.key} is disabled; no changes made.` };
    }

    const path = this.deps.passwdPath;
    try {
      if (dryRun) {
        const plan = planRewrite(this.deps.files.readWholeFile(path), this.classifierOptions);
        const detail = plan.changed
          ? [`${plan.changes.length} record(s) would be blocked:`, ...plan.changes.map((c) => `${c.before} -> ${c.after}`)].join("\n")
          : "No records need changes.";
        return { success: true, skipped: false, dryRun, changed: plan.changed, permissionsCorrected: false, changes: plan.changes, detail };
      }

      const { journal } = this.deps;
      const ruleId = this.metadata.ruleNumber;
      // Only the latest fix stays replayable
      journal.clearPriorChanges(ruleId);
      journal.beginChangeSet(ruleId);

      const result = commitRewrite(
        { path, ruleId, baseline: this.deps.baseline, files: this.deps.files, journal },
        (current) => planRewrite(current, this.classifierOptions),
      );

      const lines: string[] = [];
      if (result.permissionsCorrected) lines.push(`Reset ownership and mode of ${path} to the baseline.`);
      if (result.replaced) {
        lines.push(`Blocked login for ${result.plan.changes.length} system account(s):`);
        lines.push(...result.plan.changes.map((c) => `line ${c.lineNumber}: ${c.username}`));
      } else {
        lines.push("No records need changes.");
      }
      logger.info({ rule: this.metadata.name, path, changed: result.plan.changes.length, permissionsCorrected: result.permissionsCorrected }, "Fix complete");
      return {
        success: true,
        skipped: false,
        dryRun,
        changed: result.replaced,
        permissionsCorrected: result.permissionsCorrected,
        changes: result.plan.changes,
        detail: lines.join("\n"),
      };
    } catch (err) {
      return { ...this.failed("fix", err), skipped: false, dryRun, ...untouched };
    }
  }

  undo(options: { dryRun?: boolean } = {}): UndoResult {
    const dryRun = options.dryRun ?? false;
    const ruleId = this.metadata.ruleNumber;
    try {
      const steps = dryRun ? this.deps.journal.planRollback(ruleId) : this.deps.journal.rollback(ruleId);
      if (steps.length === 0) return { success: true, dryRun, steps, detail: "No recorded changes to undo." };
      const verb = dryRun ? "Would undo" : "Undid";
      return { success: true, dryRun, steps, detail: [`${verb} ${steps.length} change(s):`, ...steps.map((s) => `${s.id}: ${s.detail}`)].join("\n") };
    } catch (err) {
      return { ...this.failed("undo", err), dryRun, steps: [] };
    }
  }

  /** Outermost boundary: interrupts propagate, everything else becomes a failure result. */
  private failed(operation: string, err: unknown): RuleResult {
    if (isInterrupt(err)) throw err;
    const path = this.deps.passwdPath;
    let failure: RuleFailure;
    let detail: string;
    if (err instanceof LockdownError) {
      failure = { code: err.code, message: err.message, context: err.context };
      detail = err.code === LockdownErrorCode.MALFORMED_DATABASE ? `${path} is in bad format: ${err.message}` : err.message;
      logger.error({ rule: this.metadata.name, operation, code: err.code, context: err.context }, err.message);
    } else {
      const message = err instanceof Error ? err.message : String(err);
      failure = { code: "INTERNAL_ERROR", message };
      detail = `${operation} failed unexpectedly: ${message}`;
      logger.error({ rule: this.metadata.name, operation, err }, "Unexpected error");
    }
    return { success: false, detail, error: failure };
  }
}
