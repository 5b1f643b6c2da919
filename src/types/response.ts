/** Error categories reported to MCP clients. */
export type ErrorCategory = "not_runnable" | "not_found" | "validation" | "canceled" | "tool_failed" | "internal";

/** Fields present in every response. */
export interface ResponseBase {
  status: "success" | "error" | "confirmation_required";
  tool: string;
  /** Interpreter id the operation targeted; null before one is resolved. */
  interpreter: string | null;
  duration_ms: number | null;
}

export interface SuccessResponse extends ResponseBase {
  status: "success";
  data: Record<string, unknown>;
}

export interface ErrorResponse extends ResponseBase {
  status: "error";
  error_code: string;
  error_category: ErrorCategory;
  message: string;
  remediation: string[];
  /** Sink output collected before the failure. */
  output?: string[];
}

/**
 * Returned instead of running when a prompt was not confirmed.
 * The client repeats the call with `confirmed: true` to proceed.
 */
export interface ConfirmationResponse extends ResponseBase {
  status: "confirmation_required";
  // null = nothing executed; 0 would read as "ran instantly"
  duration_ms: null;
  prompts: string[];
}

export type ToolResponse = SuccessResponse | ErrorResponse | ConfirmationResponse;
