export enum LockdownErrorCode {
  MALFORMED_DATABASE = "MALFORMED_DATABASE",
  NOT_FOUND = "NOT_FOUND",
  PERMISSION_DENIED = "PERMISSION_DENIED",
  IO_ERROR = "IO_ERROR",
  JOURNAL_CORRUPT = "JOURNAL_CORRUPT",
  NOT_APPLICABLE = "NOT_APPLICABLE",
  INVALID_CONFIG = "INVALID_CONFIG",
}

export class LockdownError extends Error {
  readonly code: LockdownErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: LockdownErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "LockdownError";
    this.code = code;
    this.context = context;
  }
}

/** Operator-initiated aborts surface as AbortError and are never converted into results. */
export function isInterrupt(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

/** Map a Node errno failure on `path` to a LockdownError. */
export function fromErrno(err: unknown, operation: string, path: string): LockdownError {
  if (err instanceof LockdownError) return err;
  const errno = err instanceof Error && "code" in err ? String(err.code) : undefined;
  const detail = err instanceof Error ? err.message : String(err);
  const context = { operation, path, errno, cause: detail };
  if (errno === "ENOENT") {
    return new LockdownError(LockdownErrorCode.NOT_FOUND, `${operation} failed: ${path} does not exist`, context);
  }
  if (errno === "EACCES" || errno === "EPERM") {
    return new LockdownError(LockdownErrorCode.PERMISSION_DENIED, `${operation} failed: permission denied on ${path}`, context);
  }
  return new LockdownError(LockdownErrorCode.IO_ERROR, `${operation} failed on ${path}: ${detail}`, context);
}
