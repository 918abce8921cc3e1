import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { NodeFileAccess, formatMode, samePermissions } from "../../../src/fs/file-access.js";
import { FileChangeJournal } from "../../../src/journal/change-journal.js";
import { BlockSystemAccounts } from "../../../src/rules/block-system-accounts.js";
import { LockdownError, LockdownErrorCode } from "../../../src/shared/errors.js";
import { caught } from "../../helpers/caught.js";

const ORIGINAL = "root:x:0:0:root:/root:/bin/bash\ndaemon:x:1:1:daemon:/usr/sbin:/bin/sh\nalice:x:1000:1000::/home/alice:/bin/bash\n";
const FIXED = "root:x:0:0:root:/root:/bin/bash\ndaemon:x:1:1:daemon:/usr/sbin:/bin/sh:/sbin/nologin\nalice:x:1000:1000::/home/alice:/bin/bash\n";

describe("NodeFileAccess", () => {
  let tmpDir: string;
  const files = new NodeFileAccess({ selinux: false });
  const uid = process.getuid?.() ?? 0;
  const gid = process.getgid?.() ?? 0;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "lockdown-fs-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("maps a missing file to NOT_FOUND", () => {
    const err = caught(() => files.readWholeFile(path.join(tmpDir, "missing")));
    expect(err).toBeInstanceOf(LockdownError);
    expect(err).toMatchObject({ code: LockdownErrorCode.NOT_FOUND });
  });

  it("replaces a file by rename", async () => {
    const target = path.join(tmpDir, "passwd");
    await fs.writeFile(target, "old\n");
    files.writeWholeFile(`${target}.tmp`, "new\n");

    files.atomicReplace(`${target}.tmp`, target);

    expect(await fs.readFile(target, "utf-8")).toBe("new\n");
    expect(files.exists(`${target}.tmp`)).toBe(false);
  });

  it("reads and sets ownership and mode", async () => {
    const target = path.join(tmpDir, "passwd");
    await fs.writeFile(target, ORIGINAL);

    files.setPermissions(target, { uid, gid, mode: 0o640 });

    expect(files.getPermissions(target)).toEqual({ uid, gid, mode: 0o640 });
  });

  it("creates nested directories", () => {
    const dir = path.join(tmpDir, "a", "b");
    files.ensureDirectory(dir);
    expect(files.exists(dir)).toBe(true);
  });

  it("formats and compares permissions", () => {
    expect(formatMode(0o644)).toBe("0644");
    expect(samePermissions({ uid: 0, gid: 0, mode: 0o644 }, { uid: 0, gid: 0, mode: 0o600 })).toBe(false);
  });

  it("fixes and undoes a real account database", async () => {
    const passwd = path.join(tmpDir, "passwd");
    await fs.writeFile(passwd, ORIGINAL);
    await fs.chmod(passwd, 0o644);
    const rule = new BlockSystemAccounts({
      settings: { enabled: true, uid_threshold: 500 },
      passwdPath: passwd,
      baseline: { uid, gid, mode: 0o644 },
      files,
      journal: new FileChangeJournal(files, path.join(tmpDir, "state")),
    });

    expect(rule.fix()).toMatchObject({ success: true, changed: true, permissionsCorrected: false });
    expect(await fs.readFile(passwd, "utf-8")).toBe(FIXED);
    expect(files.getPermissions(passwd)).toEqual({ uid, gid, mode: 0o644 });
    expect((await fs.readdir(tmpDir)).sort()).toEqual(["passwd", "state"]);
    expect(rule.report().compliant).toBe(true);

    expect(rule.undo()).toMatchObject({ success: true, steps: [{ id: "0040001", action: "restore_content" }] });
    expect(await fs.readFile(passwd, "utf-8")).toBe(ORIGINAL);
    expect(files.getPermissions(passwd)).toEqual({ uid, gid, mode: 0o644 });
  });
});
