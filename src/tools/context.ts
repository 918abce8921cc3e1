import type { LockdownConfig } from "../types/config.js";
import type { PlatformContext } from "../types/platform.js";
import type { SafetyGate } from "../safety/gate.js";
import type { Rule } from "../rules/rule.js";
import type { ChangeJournal } from "../journal/types.js";
import type { ToolRegistry } from "./registry.js";

/**
 * Shared server context, the glue between all components.
 * Created once at startup, passed to all tool modules.
 */
export interface ServerContext {
  readonly config: LockdownConfig;
  readonly platform: PlatformContext;
  readonly rule: Rule;
  readonly journal: ChangeJournal;
  readonly safetyGate: SafetyGate;
  readonly registry: ToolRegistry;
  readonly targetHost: string;
  readonly isRoot: boolean;
  readonly configPath: string;
  readonly firstRun: boolean;
}
