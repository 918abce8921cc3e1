import { classifyAccount } from "./classifier.js";
import { isAccountRecord, parseAccountDatabase } from "./parser.js";
import type { AccountRecord, ClassificationResult, ClassifierOptions, Finding, Verdict } from "./types.js";

export interface ClassifiedRecord {
  readonly record: AccountRecord;
  readonly classification: ClassificationResult;
}

/** Parse and classify every account record in the database. Format errors abort immediately. */
export function classifyDatabase(text: string, options: ClassifierOptions): ClassifiedRecord[] {
  const records = parseAccountDatabase(text).filter(isAccountRecord);
  return records.map((record) => ({ record, classification: classifyAccount(record, options) }));
}

export function describeFinding(finding: Finding): string {
  return `line ${finding.lineNumber}: system account '${finding.username}' (uid ${finding.uid}) can log in with shell '${finding.effectiveShell}'`;
}

/**
 * Read-only compliance check over the whole database.
 * A zero-byte file cannot be shown compliant and yields an empty, non-compliant verdict.
 * A file of only comments and blank lines has no system accounts and is compliant.
 */
export function evaluateCompliance(text: string, options: ClassifierOptions): Verdict {
  if (text.length === 0) {
    return { compliant: false, empty: true, reasons: [], findings: [], examined: 0, exempt: 0, blocked: 0 };
  }
  const classified = classifyDatabase(text, options);

  const findings: Finding[] = [];
  let exempt = 0;
  let blocked = 0;
  for (const { record, classification } of classified) {
    if (classification.exempt) exempt++;
    else if (classification.loginBlocked) blocked++;
    else {
      findings.push({
        lineNumber: record.lineNumber,
        username: record.username,
        uid: classification.uid,
        effectiveShell: classification.effectiveShell,
      });
    }
  }

  return {
    compliant: findings.length === 0,
    empty: false,
    reasons: findings.map(describeFinding),
    findings,
    examined: classified.length,
    exempt,
    blocked,
  };
}
