// File-system boundary for the account database and the change journal.
// Every call is synchronous: a report or fix is one blocking pass over the file.
// NodeFileAccess translates errno failures into LockdownError codes, so callers
// only ever see NOT_FOUND / PERMISSION_DENIED / IO_ERROR from here.
import {
  readFileSync,
  writeFileSync,
  renameSync,
  rmSync,
  existsSync,
  mkdirSync,
  statSync,
  chownSync,
  chmodSync,
} from "node:fs";
import { execFileSync } from "node:child_process";
import { fromErrno } from "../shared/errors.js";
import { logger } from "../logger.js";

/** Ownership and permission bits of a file. */
export interface FilePermissions {
  readonly uid: number;
  readonly gid: number;
  /** Permission bits only (e.g. 0o644), file type bits stripped. */
  readonly mode: number;
}

export interface FileAccess {
  readWholeFile(path: string): string;
  writeWholeFile(path: string, text: string): void;
  /** Rename `tempPath` over `path`. Both must live on the same file system. */
  atomicReplace(tempPath: string, path: string): void;
  removeFile(path: string): void;
  exists(path: string): boolean;
  ensureDirectory(path: string): void;
  getPermissions(path: string): FilePermissions;
  setPermissions(path: string, permissions: FilePermissions): void;
  /** Restore the default security context of `path`. Best-effort. */
  resetSecurityLabel(path: string): void;
}

export function samePermissions(a: FilePermissions, b: FilePermissions): boolean {
  return a.uid === b.uid && a.gid === b.gid && a.mode === b.mode;
}

export function formatMode(mode: number): string {
  return mode.toString(8).padStart(4, "0");
}

/** Local file access through synchronous fs calls. */
export class NodeFileAccess implements FileAccess {
  private readonly selinux: boolean;

  constructor(options: { selinux: boolean }) {
    this.selinux = options.selinux;
  }

  readWholeFile(path: string): string {
    try {
      return readFileSync(path, "utf-8");
    } catch (err) {
      throw fromErrno(err, "read", path);
    }
  }

  writeWholeFile(path: string, text: string): void {
    try {
      writeFileSync(path, text, { encoding: "utf-8", mode: 0o600 });
    } catch (err) {
      throw fromErrno(err, "write", path);
    }
  }

  atomicReplace(tempPath: string, path: string): void {
    try {
      renameSync(tempPath, path);
    } catch (err) {
      throw fromErrno(err, "rename", path);
    }
  }

  removeFile(path: string): void {
    try {
      rmSync(path, { force: true });
    } catch (err) {
      throw fromErrno(err, "remove", path);
    }
  }

  exists(path: string): boolean {
    return existsSync(path);
  }

  ensureDirectory(path: string): void {
    try {
      mkdirSync(path, { recursive: true, mode: 0o700 });
    } catch (err) {
      throw fromErrno(err, "mkdir", path);
    }
  }

  getPermissions(path: string): FilePermissions {
    try {
      const st = statSync(path);
      return { uid: st.uid, gid: st.gid, mode: st.mode & 0o7777 };
    } catch (err) {
      throw fromErrno(err, "stat", path);
    }
  }

  setPermissions(path: string, permissions: FilePermissions): void {
    try {
      chownSync(path, permissions.uid, permissions.gid);
      chmodSync(path, permissions.mode);
    } catch (err) {
      throw fromErrno(err, "chown/chmod", path);
    }
  }

  resetSecurityLabel(path: string): void {
    if (!this.selinux) return;
    try {
      execFileSync("restorecon", [path], { stdio: "ignore", timeout: 5_000 });
    } catch (err) {
      logger.warn({ path, error: err instanceof Error ? err.message : String(err) }, "restorecon failed; security label left as is");
    }
  }
}
