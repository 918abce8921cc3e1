/** Shells that refuse interactive login. Checked against the last field of a record. */
export const BLOCKING_SHELLS = ["/sbin/nologin", "/dev/null"] as const;

/** Value written into the effective login field of a remediated record. */
export const BLOCKING_SHELL = "/sbin/nologin";

/** Minimum colon-delimited tokens (username included) for a substantive line. */
export const MIN_RECORD_TOKENS = 6;

/** UIDs at or above this value belong to human accounts unless configured otherwise. */
export const DEFAULT_UID_THRESHOLD = 500;

/**
 * Shape of the shell-related fields that follow the home directory.
 * Some platforms append a 7th field after the shell that overrides it; the
 * last field present is the one that governs login.
 */
export type ShellLayout =
  | { readonly kind: "no-shell" }
  | { readonly kind: "standard"; readonly shell: string }
  | { readonly kind: "override"; readonly shell: string; readonly override: string }
  | { readonly kind: "extended"; readonly shell: string; readonly override: string; readonly trailing: readonly string[] };

interface LineBase {
  /** 1-based position in the file. */
  readonly lineNumber: number;
  /** Original line including its terminator. */
  readonly rawLine: string;
}

export interface CommentLine extends LineBase {
  readonly kind: "comment";
}

export interface BlankLine extends LineBase {
  readonly kind: "blank";
}

export interface AccountRecord extends LineBase {
  readonly kind: "account";
  readonly username: string;
  /** Tokens after the username: password, UID, GID, GECOS, home, shell, [override, ...]. */
  readonly fields: readonly string[];
  readonly layout: ShellLayout;
}

export type AccountLine = CommentLine | BlankLine | AccountRecord;

export type ExemptionReason = "root" | "human";

export interface ClassificationResult {
  readonly uid: number;
  readonly exempt: boolean;
  readonly exemptReason: ExemptionReason | null;
  readonly loginBlocked: boolean;
  readonly needsRemediation: boolean;
  /** Last field of the record, the one that decides whether login is possible. */
  readonly effectiveShell: string;
}

export interface ClassifierOptions {
  readonly uidThreshold: number;
}

/** A system account that can still log in. */
export interface Finding {
  readonly lineNumber: number;
  readonly username: string;
  readonly uid: number;
  readonly effectiveShell: string;
}

export interface Verdict {
  readonly compliant: boolean;
  /** The database file has no content at all. */
  readonly empty: boolean;
  readonly reasons: readonly string[];
  readonly findings: readonly Finding[];
  readonly examined: number;
  readonly exempt: number;
  readonly blocked: number;
}

export interface RecordChange {
  readonly lineNumber: number;
  readonly username: string;
  readonly before: string;
  readonly after: string;
}

export interface RewritePlan {
  readonly content: string;
  readonly changed: boolean;
  readonly changes: readonly RecordChange[];
}
