import type { z } from "zod";
import type { RiskLevel } from "./risk.js";
import type { ToolResponse } from "./response.js";

/** Metadata declared by every tool at registration time. */
export interface ToolMetadata {
  readonly name: string;
  readonly description: string;
  readonly module: string;
  readonly riskLevel: RiskLevel;
  readonly inputSchema: z.AnyZodObject;
  readonly annotations?: {
    readOnlyHint?: boolean;
    destructiveHint?: boolean;
    idempotentHint?: boolean;
    openWorldHint?: boolean;
  };
}

/** A registered tool with its execute function. */
export interface RegisteredTool {
  readonly metadata: ToolMetadata;
  readonly execute: (args: Record<string, unknown>, context: ExecutionContext) => Promise<ToolResponse>;
}

/** Context passed to tool execute functions. */
export interface ExecutionContext {
  readonly targetHost: string;
}
