import { LockdownError, LockdownErrorCode } from "../shared/errors.js";
import { MIN_RECORD_TOKENS } from "./types.js";
import type { AccountLine, AccountRecord, ShellLayout } from "./types.js";

/** Split text into lines, each keeping its own terminator. */
export function splitLines(text: string): string[] {
  if (text === "") return [];
  return text.split(/(?<=\n)/);
}

function layoutOf(fields: readonly string[]): ShellLayout {
  // fields[0..4] are password, UID, GID, GECOS, home
  const [shell, override, ...trailing] = fields.slice(5);
  if (shell === undefined) return { kind: "no-shell" };
  if (override === undefined) return { kind: "standard", shell };
  if (trailing.length === 0) return { kind: "override", shell, override };
  return { kind: "extended", shell, override, trailing };
}

/**
 * Parse the account database into one entry per line, in file order.
 * Throws MALFORMED_DATABASE on the first substantive line with too few fields;
 * no partial result is returned.
 */
export function parseAccountDatabase(text: string): AccountLine[] {
  return splitLines(text).map((rawLine, index): AccountLine => {
    const lineNumber = index + 1;
    if (rawLine.startsWith("#")) return { kind: "comment", lineNumber, rawLine };
    if (/^\s*$/.test(rawLine)) return { kind: "blank", lineNumber, rawLine };

    const tokens = rawLine.trim().split(":");
    if (tokens.length < MIN_RECORD_TOKENS) {
      throw new LockdownError(
        LockdownErrorCode.MALFORMED_DATABASE,
        `line ${lineNumber} has ${tokens.length} fields, expected at least ${MIN_RECORD_TOKENS}`,
        { lineNumber, fieldCount: tokens.length },
      );
    }
    const [username, ...fields] = tokens;
    const record: AccountRecord = { kind: "account", lineNumber, rawLine, username, fields, layout: layoutOf(fields) };
    return record;
  });
}

/** Narrow a parsed line to an account record. */
export function isAccountRecord(line: AccountLine): line is AccountRecord {
  return line.kind === "account";
}
