import { LockdownError, LockdownErrorCode } from "../shared/errors.js";
import { BLOCKING_SHELLS } from "./types.js";
import type { AccountRecord, ClassificationResult, ClassifierOptions, ExemptionReason } from "./types.js";

const INTEGER = /^\s*[+-]?\d+\s*$/;

/** Parse the UID field of a record. Anything but an integer aborts the whole run. */
export function parseUid(record: AccountRecord): number {
  const token = record.fields[1] ?? "";
  if (token === "0") return 0;
  if (!INTEGER.test(token)) {
    throw new LockdownError(
      LockdownErrorCode.MALFORMED_DATABASE,
      `line ${record.lineNumber}: account '${record.username}' has a non-numeric UID '${token}'`,
      { lineNumber: record.lineNumber, username: record.username, uid: token },
    );
  }
  return Number.parseInt(token, 10);
}

/** The last field on the line governs login, whichever layout the record uses. */
export function effectiveShellOf(record: AccountRecord): string {
  return record.fields[record.fields.length - 1] ?? "";
}

export function isBlockingShell(value: string): boolean {
  return BLOCKING_SHELLS.some((shell) => shell === value);
}

export function classifyAccount(record: AccountRecord, options: ClassifierOptions): ClassificationResult {
  const uid = parseUid(record);
  let exemptReason: ExemptionReason | null = null;
  if (uid === 0) exemptReason = "root";
  else if (uid >= options.uidThreshold) exemptReason = "human";

  const effectiveShell = effectiveShellOf(record);
  const loginBlocked = isBlockingShell(effectiveShell);
  const exempt = exemptReason !== null;
  return {
    uid,
    exempt,
    exemptReason,
    loginBlocked,
    needsRemediation: !exempt && !loginBlocked,
    effectiveShell,
  };
}
