import { jest } from "@jest/globals";
import { registerAccountTools } from "../../../src/tools/accounts/index.js";
import { ToolRegistry } from "../../../src/tools/registry.js";
import type { ServerContext } from "../../../src/tools/context.js";
import { SafetyGate } from "../../../src/safety/gate.js";
import { BlockSystemAccounts } from "../../../src/rules/block-system-accounts.js";
import { FileChangeJournal } from "../../../src/journal/change-journal.js";
import { DEFAULT_CONFIG } from "../../../src/config/loader.js";
import type { PlatformContext } from "../../../src/types/platform.js";
import type { RegisteredTool } from "../../../src/types/tool.js";
import { MemoryFileAccess } from "../../helpers/memory-file-access.js";

const PASSWD = DEFAULT_CONFIG.passwd_path;
const ORIGINAL = "root:x:0:0:root:/root:/bin/bash\ndaemon:x:1:1:daemon:/usr/sbin:/bin/sh\n";
const FIXED = "root:x:0:0:root:/root:/bin/bash\ndaemon:x:1:1:daemon:/usr/sbin:/bin/sh:/sbin/nologin\n";
const LINUX: PlatformContext = { family: "linux", name: "Rocky Linux", version: "9.3", mac_system: "selinux" };

describe("account tools", () => {
  let files: MemoryFileAccess;

  function setup(overrides: Partial<Pick<ServerContext, "platform" | "isRoot">> = {}): ToolRegistry {
    const journal = new FileChangeJournal(files, DEFAULT_CONFIG.state_dir);
    const rule = new BlockSystemAccounts({
      settings: DEFAULT_CONFIG.rules.block_system_accounts,
      passwdPath: PASSWD,
      baseline: { uid: 0, gid: 0, mode: 0o644 },
      files,
      journal,
    });
    const registry = new ToolRegistry();
    const ctx: ServerContext = {
      config: DEFAULT_CONFIG,
      platform: overrides.platform ?? LINUX,
      rule,
      journal,
      safetyGate: new SafetyGate(DEFAULT_CONFIG.safety),
      registry,
      targetHost: "test-host",
      isRoot: overrides.isRoot ?? true,
      configPath: "/tmp/config.yaml",
      firstRun: false,
    };
    registerAccountTools(ctx);
    return registry;
  }

  function tool(registry: ToolRegistry, name: string): RegisteredTool {
    const found = registry.get(name);
    if (!found) throw new Error(`tool ${name} not registered`);
    return found;
  }

  const exec = { targetHost: "test-host" };

  beforeEach(() => {
    files = new MemoryFileAccess();
    files.seed(PASSWD, ORIGINAL);
  });

  it("registers the four account tools", () => {
    const registry = setup();
    expect([...registry.getAll().keys()]).toEqual(["accounts_rule_info", "accounts_report", "accounts_fix", "accounts_undo"]);
  });

  it("reports findings with high severity", async () => {
    const response = await tool(setup(), "accounts_report").execute({}, exec);
    expect(response).toMatchObject({
      status: "success",
      tool: "accounts_report",
      severity: "high",
      data: {
        compliant: false,
        examined: 2,
        findings: [{ lineNumber: 2, username: "daemon", uid: 1, effectiveShell: "/bin/sh" }],
      },
    });
  });

  it("maps a malformed database to a format error", async () => {
    files.seed(PASSWD, "root:x:0\n");
    const response = await tool(setup(), "accounts_report").execute({}, exec);
    expect(response).toMatchObject({ status: "error", error_code: "MALFORMED_DATABASE", error_category: "format" });
  });

  it("refuses to run on platforms the rule does not apply to", async () => {
    const report = jest.spyOn(BlockSystemAccounts.prototype, "report");
    const registry = setup({ platform: { family: "darwin", name: "Mac OS X", version: "13.1", mac_system: "none" } });
    const response = await tool(registry, "accounts_report").execute({}, exec);
    expect(response).toMatchObject({ status: "error", error_code: "NOT_APPLICABLE", error_category: "validation" });
    expect(report).not.toHaveBeenCalled();
    report.mockRestore();
  });

  it("asks for confirmation before fixing", async () => {
    const response = await tool(setup(), "accounts_fix").execute({}, exec);
    expect(response).toMatchObject({ status: "confirmation_required", risk_level: "high", dry_run_available: true });
    expect(files.content(PASSWD)).toBe(ORIGINAL);
  });

  it("previews a fix on a dry run without confirmation or root", async () => {
    const response = await tool(setup({ isRoot: false }), "accounts_fix").execute({ dry_run: true }, exec);
    expect(response).toMatchObject({ status: "success", dry_run: true, data: { changed: true } });
    expect(files.content(PASSWD)).toBe(ORIGINAL);
  });

  it("requires root for a confirmed fix", async () => {
    const response = await tool(setup({ isRoot: false }), "accounts_fix").execute({ confirmed: true }, exec);
    expect(response).toMatchObject({ status: "error", error_code: "ROOT_REQUIRED", error_category: "privilege" });
  });

  it("applies a confirmed fix and re-evaluates compliance", async () => {
    const response = await tool(setup(), "accounts_fix").execute({ confirmed: true }, exec);
    expect(response).toMatchObject({ status: "success", data: { changed: true, compliant_after: true } });
    expect(files.content(PASSWD)).toBe(FIXED);
  });

  it("undoes the last fix", async () => {
    const registry = setup();
    await tool(registry, "accounts_fix").execute({ confirmed: true }, exec);

    const response = await tool(registry, "accounts_undo").execute({ confirmed: true }, exec);

    expect(response).toMatchObject({ status: "success", data: { steps: [{ id: "0040001", action: "restore_content" }] } });
    expect(files.content(PASSWD)).toBe(ORIGINAL);
  });

  it("lists recorded changes in rule info", async () => {
    const registry = setup();
    await tool(registry, "accounts_fix").execute({ confirmed: true }, exec);

    const response = await tool(registry, "accounts_rule_info").execute({}, exec);

    expect(response).toMatchObject({
      status: "success",
      data: {
        rule: { number: 40, name: "BlockSystemAccounts" },
        config_item: { key: "blocksysaccounts", current: true },
        applicable: true,
        recorded_changes: [{ id: "0040001", type: "conf", path: PASSWD }],
      },
    });
  });
});
