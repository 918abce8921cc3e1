import type { Applicability } from "../platform/applicability.js";
import type { PlatformContext } from "../types/platform.js";
import type { RecordChange, Verdict } from "../accounts/types.js";
import type { RollbackStep } from "../journal/types.js";
import type { LockdownErrorCode } from "../shared/errors.js";

/** A boolean configuration item that gates whether fix may change the system. */
export interface ConfigItem {
  readonly key: string;
  readonly datatype: "bool";
  readonly instructions: string;
  readonly defaultValue: boolean;
}

export interface RuleMetadata {
  readonly ruleNumber: number;
  readonly name: string;
  readonly helpText: string;
  /** Benchmark references (CIS, NSA, CCE ids) the rule satisfies. */
  readonly guidance: readonly string[];
  readonly mandatory: boolean;
  readonly rootRequired: boolean;
  readonly configItem: ConfigItem;
  readonly applicability: Applicability;
}

export interface RuleFailure {
  readonly code: LockdownErrorCode | "INTERNAL_ERROR";
  readonly message: string;
  readonly context?: Record<string, unknown>;
}

/** Outcome of any rule operation: a flag plus a human-readable detail string. */
export interface RuleResult {
  readonly success: boolean;
  readonly detail: string;
  readonly error?: RuleFailure;
}

export interface ReportResult extends RuleResult {
  readonly compliant: boolean;
  /** null when the database could not be evaluated at all. */
  readonly verdict: Verdict | null;
}

export interface FixResult extends RuleResult {
  /** The configuration item is disabled; nothing was examined or changed. */
  readonly skipped: boolean;
  readonly dryRun: boolean;
  readonly changed: boolean;
  readonly permissionsCorrected: boolean;
  readonly changes: readonly RecordChange[];
}

export interface UndoResult extends RuleResult {
  readonly dryRun: boolean;
  readonly steps: readonly RollbackStep[];
}

export interface Rule {
  readonly metadata: RuleMetadata;
  /** Current value of the rule's configuration item. */
  readonly enabled: boolean;
  isApplicable(platform: PlatformContext): boolean;
  report(): ReportResult;
  fix(options?: { dryRun?: boolean }): FixResult;
  undo(options?: { dryRun?: boolean }): UndoResult;
}
