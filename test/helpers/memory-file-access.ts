import type { FileAccess, FilePermissions } from "../../src/fs/file-access.js";
import { LockdownError, LockdownErrorCode } from "../../src/shared/errors.js";

interface MemoryFile {
  content: string;
  permissions: FilePermissions;
}

type Operation = "read" | "write" | "rename" | "setPermissions";

/**
 * In-process stand-in for the file system. Records every mutating call so tests
 * can assert on ordering, and can be told to fail a given operation on a path.
 */
export class MemoryFileAccess implements FileAccess {
  readonly files = new Map<string, MemoryFile>();
  readonly directories = new Set<string>();
  readonly calls: string[] = [];
  readonly labelResets: string[] = [];
  private readonly failures = new Map<string, LockdownError>();

  seed(path: string, content: string, permissions: FilePermissions = { uid: 0, gid: 0, mode: 0o644 }): void {
    this.files.set(path, { content, permissions });
  }

  content(path: string): string | undefined {
    return this.files.get(path)?.content;
  }

  failNext(operation: Operation, path: string, code = LockdownErrorCode.IO_ERROR): void {
    this.failures.set(`${operation}:${path}`, new LockdownError(code, `${operation} failed on ${path}`));
  }

  private maybeFail(operation: Operation, path: string): void {
    const key = `${operation}:${path}`;
    const failure = this.failures.get(key);
    if (failure) {
      this.failures.delete(key);
      throw failure;
    }
  }

  private get(path: string): MemoryFile {
    const file = this.files.get(path);
    if (!file) throw new LockdownError(LockdownErrorCode.NOT_FOUND, `${path} does not exist`);
    return file;
  }

  readWholeFile(path: string): string {
    this.maybeFail("read", path);
    return this.get(path).content;
  }

  writeWholeFile(path: string, text: string): void {
    this.calls.push(`write ${path}`);
    this.maybeFail("write", path);
    const existing = this.files.get(path);
    this.files.set(path, { content: text, permissions: existing?.permissions ?? { uid: 0, gid: 0, mode: 0o600 } });
  }

  atomicReplace(tempPath: string, path: string): void {
    this.calls.push(`rename ${tempPath} ${path}`);
    this.maybeFail("rename", path);
    const temp = this.get(tempPath);
    this.files.set(path, temp);
    this.files.delete(tempPath);
  }

  removeFile(path: string): void {
    this.calls.push(`remove ${path}`);
    this.files.delete(path);
  }

  exists(path: string): boolean {
    return this.files.has(path) || this.directories.has(path);
  }

  ensureDirectory(path: string): void {
    this.directories.add(path);
  }

  getPermissions(path: string): FilePermissions {
    return { ...this.get(path).permissions };
  }

  setPermissions(path: string, permissions: FilePermissions): void {
    this.calls.push(`chmod ${path}`);
    this.maybeFail("setPermissions", path);
    this.get(path).permissions = { ...permissions };
  }

  resetSecurityLabel(path: string): void {
    this.labelResets.push(path);
  }
}
