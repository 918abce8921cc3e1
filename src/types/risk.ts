/** Risk levels ordered from lowest to highest. */
export type RiskLevel = "read-only" | "low" | "moderate" | "high" | "critical";

/** Numeric ordering for risk comparison. */
export const RISK_ORDER: Record<RiskLevel, number> = {
  "read-only": 0,
  "low": 1,
  "moderate": 2,
  "high": 3,
  "critical": 4,
};
