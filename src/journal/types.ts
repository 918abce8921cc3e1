import type { FilePermissions } from "../fs/file-access.js";

/**
 * A state change made by a rule.
 * `conf`: a configuration file's content was replaced.
 * `perm`: a file's ownership or mode was changed from `prior`.
 */
export type ChangeEvent =
  | { readonly type: "conf"; readonly filepath: string }
  | { readonly type: "perm"; readonly filepath: string; readonly prior: FilePermissions };

/** What is needed to put a replaced file back. */
export interface FileReplacement {
  readonly path: string;
  readonly tempPath: string;
  /** Copy of the original content kept by the journal. */
  readonly snapshotPath: string;
  readonly priorPermissions: FilePermissions;
}

export interface JournalEntry {
  readonly id: string;
  readonly ruleId: number;
  readonly recordedAt: string;
  readonly event: ChangeEvent;
  readonly replacement?: FileReplacement;
}

/** One compensating action, as executed (or previewed) by a rollback. */
export interface RollbackStep {
  readonly id: string;
  readonly action: "restore_content" | "restore_permissions" | "skipped";
  readonly path: string;
  readonly detail: string;
}

/**
 * Undo log for rule changes. Entries are kept in the order they were recorded;
 * rollback runs their compensating actions newest first.
 */
export interface ChangeJournal {
  /** Start numbering change ids for `ruleId` from the beginning. */
  beginChangeSet(ruleId: number): void;
  /** Forget every entry recorded for `ruleId`, so only the latest run is replayable. */
  clearPriorChanges(ruleId: number): void;
  nextChangeId(ruleId: number): string;
  recordEvent(id: string, event: ChangeEvent): void;
  /** Snapshot `path` so that its replacement by `tempPath` can be undone. */
  recordFileReplacement(path: string, tempPath: string, id: string): void;
  findRuleChanges(ruleId: number): JournalEntry[];
  /** Compensating actions `rollback` would run, newest first, without running them. */
  planRollback(ruleId: number): RollbackStep[];
  rollback(ruleId: number): RollbackStep[];
}
