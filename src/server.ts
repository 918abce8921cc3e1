#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { z } from "zod";
import { hostname } from "node:os";

import { logger } from "./logger.js";
import { loadConfig, baselinePermissions } from "./config/loader.js";
import { detectPlatform, isRunningAsRoot } from "./platform/detector.js";
import { NodeFileAccess } from "./fs/file-access.js";
import { FileChangeJournal } from "./journal/change-journal.js";
import { BlockSystemAccounts } from "./rules/block-system-accounts.js";
import { SafetyGate } from "./safety/gate.js";
import { ToolRegistry } from "./tools/registry.js";
import { registerAccountTools } from "./tools/accounts/index.js";
import type { ServerContext } from "./tools/context.js";
import type { ToolResponse } from "./types/index.js";

async function main(): Promise<void> {
  logger.info("Starting system-account-lockdown server");

  // ── Phase 1: Load config ──────────────────────────────────────
  const { config, configPath, firstRun } = loadConfig(process.env.ACCOUNT_LOCKDOWN_CONFIG);
  logger.info({ configPath, firstRun }, "Configuration loaded");

  // ── Phase 2: Detect platform and privileges ───────────────────
  const platform = detectPlatform(config.platform);
  const isRoot = isRunningAsRoot();
  if (!isRoot) {
    logger.warn("Not running as root; accounts_fix and accounts_undo are limited to dry runs");
  }

  // ── Phase 3: Wire the rule ────────────────────────────────────
  const files = new NodeFileAccess({ selinux: platform.mac_system === "selinux" });
  const journal = new FileChangeJournal(files, config.state_dir);
  const rule = new BlockSystemAccounts({
    settings: config.rules.block_system_accounts,
    passwdPath: config.passwd_path,
    baseline: baselinePermissions(config.baseline),
    files,
    journal,
  });
  if (!rule.isApplicable(platform)) {
    logger.warn({ rule: rule.metadata.name, platform }, "Rule does not apply to this platform; tools will refuse to run it");
  }

  // ── Phase 4: Registry, safety gate and tools ──────────────────
  const registry = new ToolRegistry();
  const ctx: ServerContext = {
    config, platform, rule, journal, registry,
    safetyGate: new SafetyGate(config.safety),
    targetHost: hostname(), isRoot, configPath, firstRun,
  };
  registerAccountTools(ctx);
  logger.info(
    { toolCount: registry.size, gated: registry.namesAtRisk(config.safety.confirmation_threshold) },
    "Tools registered",
  );

  // ── Phase 5: Create MCP server and expose tools ───────────────
  const server = new McpServer({
    name: "system-account-lockdown",
    version: "0.1.0",
  });

  for (const [name, tool] of registry.getAll()) {
    const meta = tool.metadata;
    const inputShape: z.ZodRawShape = meta.inputSchema.shape;

    server.registerTool(
      name,
      {
        title: name,
        description: meta.description,
        inputSchema: inputShape,
        annotations: {
          readOnlyHint: meta.annotations?.readOnlyHint ?? meta.riskLevel === "read-only",
          destructiveHint: meta.annotations?.destructiveHint ?? false,
          idempotentHint: meta.annotations?.idempotentHint ?? false,
          openWorldHint: meta.annotations?.openWorldHint ?? false,
        },
      },
      async (args: Record<string, unknown>) => {
        try {
          const response: ToolResponse = await tool.execute(args, { targetHost: ctx.targetHost });
          return {
            content: [{ type: "text" as const, text: JSON.stringify(response, null, 2) }],
          };
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          logger.error({ tool: name, err }, "Tool execution error");
          return {
            isError: true,
            content: [{
              type: "text" as const,
              text: JSON.stringify({
                status: "error",
                tool: name,
                target_host: ctx.targetHost,
                duration_ms: null,
                error_code: "INTERNAL_ERROR",
                error_category: "state",
                message,
                remediation: ["Check server logs for details"],
              }),
            }],
          };
        }
      },
    );
  }

  // ── Phase 6: Connect transport ────────────────────────────────
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ tools: registry.size, host: ctx.targetHost }, "system-account-lockdown server running on stdio");
}

main().catch((err) => {
  logger.fatal({ err }, "Fatal startup error");
  process.exit(1);
});
