import type { RegisteredTool } from "../types/tool.js";
import type { RiskLevel } from "../types/risk.js";
import { RISK_ORDER } from "../types/risk.js";
import { logger } from "../logger.js";

/**
 * Holds the account tools the MCP server exposes, in registration order.
 * Names are unique; a second registration under a taken name is a wiring bug.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  register(tool: RegisteredTool): void {
    const { name, module, riskLevel } = tool.metadata;
    if (this.tools.has(name)) {
      throw new Error(`tool ${name} is already registered`);
    }
    this.tools.set(name, tool);
    logger.debug({ tool: name, module, riskLevel }, "Tool registered");
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  getAll(): ReadonlyMap<string, RegisteredTool> {
    return this.tools;
  }

  /** Names of the tools at or above `level`, i.e. those the safety gate may stop. */
  namesAtRisk(level: RiskLevel): string[] {
    return [...this.tools.values()]
      .filter((tool) => RISK_ORDER[tool.metadata.riskLevel] >= RISK_ORDER[level])
      .map((tool) => tool.metadata.name);
  }

  get size(): number {
    return this.tools.size;
  }
}
