// File-backed change journal.
// State lives in <stateDir>/journal.json; original file contents are copied to
// <stateDir>/snapshots/<id>.orig before a replacement so rollback can restore them.
// The journal file itself is rewritten through temp-file-then-rename like any
// other file this server replaces.
import { join } from "node:path";
import { z } from "zod";
import type { FileAccess } from "../fs/file-access.js";
import { formatMode } from "../fs/file-access.js";
import { LockdownError, LockdownErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";
import type { ChangeEvent, ChangeJournal, JournalEntry, RollbackStep } from "./types.js";

const JOURNAL_FILE = "journal.json";
const SNAPSHOT_DIR = "snapshots";

const PermissionsSchema = z.object({
  uid: z.number().int(),
  gid: z.number().int(),
  mode: z.number().int().min(0).max(0o7777),
});

const EventSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("conf"), filepath: z.string().min(1) }),
  z.object({ type: z.literal("perm"), filepath: z.string().min(1), prior: PermissionsSchema }),
]);

const EntrySchema = z.object({
  id: z.string().regex(/^\d{7,}$/),
  ruleId: z.number().int().nonnegative(),
  recordedAt: z.string(),
  event: EventSchema,
  replacement: z
    .object({
      path: z.string().min(1),
      tempPath: z.string().min(1),
      snapshotPath: z.string().min(1),
      priorPermissions: PermissionsSchema,
    })
    .optional(),
});

const JournalStateSchema = z.object({
  version: z.literal(1),
  rules: z.record(
    z.string(),
    z.object({
      counter: z.number().int().nonnegative(),
      entries: z.array(EntrySchema),
    }),
  ),
});

type JournalState = z.infer<typeof JournalStateSchema>;
type RuleState = JournalState["rules"][string];

/** Change ids: rule number padded to 4 digits, then a 3-digit counter. */
export function formatChangeId(ruleId: number, counter: number): string {
  return `${String(ruleId).padStart(4, "0")}${String(counter).padStart(3, "0")}`;
}

export function ruleIdOf(changeId: string): number {
  return Number.parseInt(changeId.slice(0, 4), 10);
}

export class FileChangeJournal implements ChangeJournal {
  private readonly files: FileAccess;
  private readonly stateDir: string;
  private readonly journalPath: string;

  constructor(files: FileAccess, stateDir: string) {
    this.files = files;
    this.stateDir = stateDir;
    this.journalPath = join(stateDir, JOURNAL_FILE);
  }

  beginChangeSet(ruleId: number): void {
    this.update((state) => {
      ruleState(state, ruleId).counter = 0;
    });
  }

  clearPriorChanges(ruleId: number): void {
    this.update((state) => {
      const rs = ruleState(state, ruleId);
      for (const entry of rs.entries) {
        if (entry.replacement) this.files.removeFile(entry.replacement.snapshotPath);
      }
      logger.debug({ ruleId, cleared: rs.entries.length }, "Cleared prior journal entries");
      rs.entries = [];
    });
  }

  nextChangeId(ruleId: number): string {
    let id = "";
    this.update((state) => {
      const rs = ruleState(state, ruleId);
      rs.counter += 1;
      id = formatChangeId(ruleId, rs.counter);
    });
    return id;
  }

  recordEvent(id: string, event: ChangeEvent): void {
    this.update((state) => {
      const rs = ruleState(state, ruleIdOf(id));
      const existing = rs.entries.findIndex((e) => e.id === id);
      const entry: JournalEntry = { id, ruleId: ruleIdOf(id), recordedAt: new Date().toISOString(), event };
      if (existing >= 0) rs.entries[existing] = entry;
      else rs.entries.push(entry);
    });
    logger.info({ id, event }, "Recorded change event");
  }

  recordFileReplacement(path: string, tempPath: string, id: string): void {
    const snapshotDir = join(this.stateDir, SNAPSHOT_DIR);
    const snapshotPath = join(snapshotDir, `${id}.orig`);
    this.files.ensureDirectory(snapshotDir);
    this.files.writeWholeFile(snapshotPath, this.files.readWholeFile(path));
    const priorPermissions = this.files.getPermissions(path);

    this.update((state) => {
      const rs = ruleState(state, ruleIdOf(id));
      const replacement = { path, tempPath, snapshotPath, priorPermissions };
      const index = rs.entries.findIndex((e) => e.id === id);
      if (index >= 0) {
        rs.entries[index] = { ...rs.entries[index], replacement };
      } else {
        rs.entries.push({
          id,
          ruleId: ruleIdOf(id),
          recordedAt: new Date().toISOString(),
          event: { type: "conf", filepath: path },
          replacement,
        });
      }
    });
    logger.info({ id, path, snapshotPath }, "Recorded file replacement");
  }

  findRuleChanges(ruleId: number): JournalEntry[] {
    return [...(this.load().rules[String(ruleId)]?.entries ?? [])];
  }

  planRollback(ruleId: number): RollbackStep[] {
    return this.findRuleChanges(ruleId).reverse().map((entry) => describeCompensation(entry));
  }

  rollback(ruleId: number): RollbackStep[] {
    const steps: RollbackStep[] = [];
    for (const entry of this.findRuleChanges(ruleId).reverse()) {
      const step = describeCompensation(entry);
      if (step.action === "restore_content" && entry.replacement) {
        const { path, snapshotPath, priorPermissions } = entry.replacement;
        const tempPath = `${path}.tmp`;
        this.files.writeWholeFile(tempPath, this.files.readWholeFile(snapshotPath));
        this.files.atomicReplace(tempPath, path);
        this.files.setPermissions(path, priorPermissions);
        this.files.resetSecurityLabel(path);
      } else if (step.action === "restore_permissions" && entry.event.type === "perm") {
        this.files.setPermissions(entry.event.filepath, entry.event.prior);
      }
      logger.info({ id: entry.id, action: step.action, path: step.path }, "Rolled back change");
      steps.push(step);
    }
    this.clearPriorChanges(ruleId);
    return steps;
  }

  private load(): JournalState {
    if (!this.files.exists(this.journalPath)) return { version: 1, rules: {} };
    const raw = this.files.readWholeFile(this.journalPath);
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new LockdownError(LockdownErrorCode.JOURNAL_CORRUPT, `${this.journalPath} is not valid JSON`, {
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    const parsed = JournalStateSchema.safeParse(json);
    if (!parsed.success) {
      throw new LockdownError(LockdownErrorCode.JOURNAL_CORRUPT, `${this.journalPath} does not match the journal schema`, {
        issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      });
    }
    return parsed.data;
  }

  private update(mutate: (state: JournalState) => void): void {
    const state = this.load();
    mutate(state);
    this.files.ensureDirectory(this.stateDir);
    const tempPath = `${this.journalPath}.tmp`;
    this.files.writeWholeFile(tempPath, JSON.stringify(state, null, 2) + "\n");
    this.files.atomicReplace(tempPath, this.journalPath);
  }
}

function ruleState(state: JournalState, ruleId: number): RuleState {
  const key = String(ruleId);
  const existing = state.rules[key];
  if (existing) return existing;
  const created: RuleState = { counter: 0, entries: [] };
  state.rules[key] = created;
  return created;
}

function describeCompensation(entry: JournalEntry): RollbackStep {
  if (entry.replacement) {
    return {
      id: entry.id,
      action: "restore_content",
      path: entry.replacement.path,
      detail: `restore ${entry.replacement.path} from ${entry.replacement.snapshotPath}`,
    };
  }
  if (entry.event.type === "perm") {
    const { uid, gid, mode } = entry.event.prior;
    return {
      id: entry.id,
      action: "restore_permissions",
      path: entry.event.filepath,
      detail: `restore owner ${uid}:${gid} and mode ${formatMode(mode)} on ${entry.event.filepath}`,
    };
  }
  // A conf event whose replacement was never recorded: the file was not replaced.
  return { id: entry.id, action: "skipped", path: entry.event.filepath, detail: "no replacement recorded" };
}
