import { classifyAccount, parseUid, isBlockingShell } from "../../../src/accounts/classifier.js";
import { parseAccountDatabase, isAccountRecord } from "../../../src/accounts/parser.js";
import type { AccountRecord } from "../../../src/accounts/types.js";
import { LockdownErrorCode } from "../../../src/shared/errors.js";
import { caught } from "../../helpers/caught.js";

function record(line: string): AccountRecord {
  const [parsed] = parseAccountDatabase(line + "\n");
  if (!isAccountRecord(parsed)) throw new Error(`not an account line: ${line}`);
  return parsed;
}

const options = { uidThreshold: 500 };

describe("parseUid", () => {
  it("parses integer UIDs", () => {
    expect(parseUid(record("daemon:x:1:1:daemon:/usr/sbin:/bin/sh"))).toBe(1);
    expect(parseUid(record("alice:x:1001:1001:Alice:/home/alice:/bin/bash"))).toBe(1001);
  });

  it("accepts the literal 0 for root", () => {
    expect(parseUid(record("root:x:0:0:root:/root:/bin/bash"))).toBe(0);
  });

  it("rejects non-numeric UIDs as a malformed database", () => {
    expect(caught(() => parseUid(record("bad:x:abc:1:bad:/:/bin/sh")))).toMatchObject({ code: LockdownErrorCode.MALFORMED_DATABASE });
  });

  it("rejects an empty UID field", () => {
    expect(() => parseUid(record("bad:x::1:bad:/:/bin/sh"))).toThrow("non-numeric UID ''");
  });
});

describe("isBlockingShell", () => {
  it.each([
    ["/sbin/nologin", true],
    ["/dev/null", true],
    ["/usr/sbin/nologin", false],
    ["/bin/false", false],
    ["", false],
  ])("%s -> %s", (shell, expected) => {
    expect(isBlockingShell(shell)).toBe(expected);
  });
});

describe("classifyAccount", () => {
  it("marks low-UID accounts with a real shell for remediation", () => {
    expect(classifyAccount(record("daemon:x:1:1:daemon:/usr/sbin:/bin/sh"), options)).toEqual({
      uid: 1,
      exempt: false,
      exemptReason: null,
      loginBlocked: false,
      needsRemediation: true,
      effectiveShell: "/bin/sh",
    });
  });

  it("exempts root regardless of shell", () => {
    const result = classifyAccount(record("root:x:0:0:root:/root:/bin/bash"), options);
    expect(result.exempt).toBe(true);
    expect(result.exemptReason).toBe("root");
    expect(result.needsRemediation).toBe(false);
  });

  it("exempts human accounts at and above the threshold", () => {
    expect(classifyAccount(record("edge:x:500:500::/home/edge:/bin/bash"), options).exemptReason).toBe("human");
    expect(classifyAccount(record("below:x:499:499::/home/below:/bin/bash"), options).exempt).toBe(false);
  });

  it("honours a configured threshold", () => {
    const result = classifyAccount(record("svc:x:800:800::/srv:/bin/bash"), { uidThreshold: 1000 });
    expect(result.needsRemediation).toBe(true);
  });

  it("treats /sbin/nologin and /dev/null as blocked", () => {
    expect(classifyAccount(record("bin:x:2:2:bin:/bin:/sbin/nologin"), options).loginBlocked).toBe(true);
    expect(classifyAccount(record("sys:x:3:3:sys:/dev:/dev/null"), options).loginBlocked).toBe(true);
  });

  it("uses the override field rather than the canonical shell", () => {
    const overridden = classifyAccount(record("bin:x:2:2:bin:/bin:/sbin/nologin:/bin/bash"), options);
    expect(overridden.loginBlocked).toBe(false);
    expect(overridden.effectiveShell).toBe("/bin/bash");

    const blocked = classifyAccount(record("bin:x:2:2:bin:/bin:/bin/bash:/sbin/nologin"), options);
    expect(blocked.loginBlocked).toBe(true);
  });
});
