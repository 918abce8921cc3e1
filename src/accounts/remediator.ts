// Rewrites the account database so every non-exempt account has a blocking shell.
// planRewrite() is pure; commitRewrite() applies a plan with the fixed protocol:
//   1. correct ownership/mode to the baseline (journaled) before anything else
//   2. write the new content to <path>.tmp in the same directory
//   3. journal the event and the file replacement
//   4. rename the temp file over the original
//   5. re-apply the baseline and reset the security label
// A failure before step 4 leaves the original byte-for-byte untouched and removes the temp file.
import type { FileAccess, FilePermissions } from "../fs/file-access.js";
import { formatMode, samePermissions } from "../fs/file-access.js";
import type { ChangeJournal } from "../journal/types.js";
import { logger } from "../logger.js";
import { classifyAccount } from "./classifier.js";
import { parseAccountDatabase } from "./parser.js";
import { BLOCKING_SHELL, DEFAULT_UID_THRESHOLD } from "./types.js";
import type { AccountRecord, ClassifierOptions, RecordChange, RewritePlan } from "./types.js";

/** Fields of `record` with its effective login field set to the blocking shell. */
export function blockedFields(record: AccountRecord): string[] {
  const fields = [...record.fields];
  switch (record.layout.kind) {
    case "no-shell":
    case "standard":
      // Append: a 6-field record gains the override field, a 5-field one gains a shell.
      fields.push(BLOCKING_SHELL);
      break;
    case "override":
    case "extended":
      // The canonical shell stays as it is; only the governing last field changes.
      fields[fields.length - 1] = BLOCKING_SHELL;
      break;
  }
  return fields;
}

/** Build the replacement content. Throws on the first malformed line; nothing partial escapes. */
export function planRewrite(text: string, options: ClassifierOptions = { uidThreshold: DEFAULT_UID_THRESHOLD }): RewritePlan {
  const changes: RecordChange[] = [];
  let content = "";
  for (const line of parseAccountDatabase(text)) {
    if (line.kind !== "account") {
      content += line.rawLine;
      continue;
    }
    const classification = classifyAccount(line, options);
    if (!classification.needsRemediation) {
      content += line.rawLine;
      continue;
    }
    const after = [line.username, ...blockedFields(line)].join(":");
    content += after + "\n";
    changes.push({ lineNumber: line.lineNumber, username: line.username, before: line.rawLine.trim(), after });
  }
  return { content, changed: changes.length > 0, changes };
}

export interface CommitOptions {
  readonly path: string;
  readonly ruleId: number;
  readonly baseline: FilePermissions;
  readonly files: FileAccess;
  readonly journal: ChangeJournal;
}

export interface CommitResult {
  readonly plan: RewritePlan;
  /** Ownership/mode was corrected before the rewrite. */
  readonly permissionsCorrected: boolean;
  /** The file content was replaced. */
  readonly replaced: boolean;
}

/**
 * Apply the baseline permissions and, when the plan changes anything, replace
 * the file atomically. `buildPlan` runs after the permission step and before any
 * content is written, so a malformed file aborts with only the (journaled)
 * permission correction applied.
 */
export function commitRewrite(options: CommitOptions, buildPlan: (current: string) => RewritePlan): CommitResult {
  const { path, ruleId, baseline, files, journal } = options;
  const current = files.readWholeFile(path);

  let permissionsCorrected = false;
  const prior = files.getPermissions(path);
  if (!samePermissions(prior, baseline)) {
    const id = journal.nextChangeId(ruleId);
    journal.recordEvent(id, { type: "perm", filepath: path, prior });
    files.setPermissions(path, baseline);
    permissionsCorrected = true;
    logger.info(
      { path, id, from: { ...prior, mode: formatMode(prior.mode) }, to: { ...baseline, mode: formatMode(baseline.mode) } },
      "Corrected account database permissions",
    );
  }

  const plan = buildPlan(current);
  if (!plan.changed) return { plan, permissionsCorrected, replaced: false };

  const tempPath = `${path}.tmp`;
  let id: string;
  try {
    files.writeWholeFile(tempPath, plan.content);
    id = journal.nextChangeId(ruleId);
    journal.recordEvent(id, { type: "conf", filepath: path });
    journal.recordFileReplacement(path, tempPath, id);
  } catch (err) {
    discardTemp(files, tempPath);
    throw err;
  }

  files.atomicReplace(tempPath, path);
  files.setPermissions(path, baseline);
  files.resetSecurityLabel(path);
  logger.info({ path, id, changed: plan.changes.length }, "Account database replaced");

  return { plan, permissionsCorrected, replaced: true };
}

function discardTemp(files: FileAccess, tempPath: string): void {
  try {
    files.removeFile(tempPath);
  } catch (cleanupErr) {
    logger.warn({ tempPath, error: cleanupErr instanceof Error ? cleanupErr.message : String(cleanupErr) }, "Could not remove temp file");
  }
}
