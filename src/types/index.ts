export type { PlatformContext, PlatformFamily, MACSystem } from "./platform.js";
export type { RiskLevel } from "./risk.js";
export { RISK_ORDER } from "./risk.js";
export type { LockdownConfig, PermissionBaseline, BlockSystemAccountsSettings } from "./config.js";
export type { ToolResponse, SuccessResponse, ErrorResponse, ConfirmationResponse, ErrorCategory } from "./response.js";
export type { ToolMetadata, RegisteredTool, ExecutionContext } from "./tool.js";
