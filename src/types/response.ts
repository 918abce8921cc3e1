/** Error categories surfaced to the client. */
export type ErrorCategory =
  | "privilege"
  | "not_found"
  | "validation"
  | "format"
  | "io"
  | "state";

/** Base fields present in every response. */
export interface ResponseBase {
  status: "success" | "error" | "confirmation_required";
  tool: string;
  target_host: string;
  // null = nothing ran; 0 would be ambiguous with "ran instantly"
  duration_ms: number | null;
}

/** Successful response with tool-specific data. */
export interface SuccessResponse extends ResponseBase {
  status: "success";
  data: Record<string, unknown>;
  summary?: string;
  severity?: "info" | "warning" | "high" | "critical";
  dry_run?: boolean;
}

/** Error response. */
export interface ErrorResponse extends ResponseBase {
  status: "error";
  error_code: string;
  error_category: ErrorCategory;
  message: string;
  remediation: string[];
}

/** Confirmation required response. */
export interface ConfirmationResponse extends ResponseBase {
  status: "confirmation_required";
  risk_level: string;
  dry_run_available: boolean;
  preview: {
    target: string;
    description: string;
    warnings: string[];
  };
}

export type ToolResponse = SuccessResponse | ErrorResponse | ConfirmationResponse;
