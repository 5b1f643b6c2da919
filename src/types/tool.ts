import type { z } from "zod";
import type { ToolResponse } from "./response.js";

/** Metadata declared by every tool at registration time. */
export interface ToolMetadata {
  readonly name: string;
  readonly description: string;
  /** Changes the environment (install, uninstall, bootstrap). */
  readonly mutating: boolean;
  readonly inputSchema: z.AnyZodObject;
  readonly annotations?: {
    readOnlyHint?: boolean;
    destructiveHint?: boolean;
    idempotentHint?: boolean;
    openWorldHint?: boolean;
  };
}

/** A registered tool; execute validates its own arguments. */
export interface RegisteredTool {
  readonly metadata: ToolMetadata;
  readonly execute: (args: unknown, context: ExecutionContext) => Promise<ToolResponse>;
}

/** Per-request context passed to tool execute functions. */
export interface ExecutionContext {
  readonly signal?: AbortSignal;
}
