import type { z } from "zod";
import type { ServerContext } from "./context.js";
import type { InterpreterConfiguration } from "../types/interpreter.js";
import type {
  ConfirmationResponse,
  ErrorCategory,
  ErrorResponse,
  SuccessResponse,
  ToolResponse,
} from "../types/response.js";
import type { ExecutionContext, ToolMetadata } from "../types/tool.js";
import { PackageToolError, PackageToolErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

// ── Response Builders ──────────────────────────────────────────────

export function success(tool: string, interpreter: string | null, durationMs: number, data: Record<string, unknown>): SuccessResponse {
  return { status: "success", tool, interpreter, duration_ms: durationMs, data };
}

export function error(
  tool: string,
  interpreter: string | null,
  durationMs: number | null,
  opts: { code: string; category: ErrorCategory; message: string; remediation?: string[]; output?: string[] },
): ErrorResponse {
  return {
    status: "error", tool, interpreter, duration_ms: durationMs,
    error_code: opts.code, error_category: opts.category, message: opts.message,
    remediation: opts.remediation ?? [],
    ...(opts.output ? { output: opts.output } : {}),
  };
}

export function confirmationRequired(tool: string, interpreter: string | null, prompts: readonly string[]): ConfirmationResponse {
  return { status: "confirmation_required", tool, interpreter, duration_ms: null, prompts: [...prompts] };
}

/** Milliseconds since `start` (a performance.now() reading), rounded. */
export function elapsed(start: number): number {
  return Math.round(performance.now() - start);
}

// ── Error Mapping ──────────────────────────────────────────────────

const ERROR_MAP: Record<PackageToolErrorCode, { category: ErrorCategory; remediation: string[] }> = {
  [PackageToolErrorCode.NOT_RUNNABLE]: {
    category: "not_runnable",
    remediation: ["Check interpreter_path in the config file", "Run interpreter_list to see which interpreters are runnable"],
  },
  [PackageToolErrorCode.OPERATION_CANCELED]: {
    category: "canceled",
    remediation: ["Repeat the call with confirmed: true to proceed"],
  },
  [PackageToolErrorCode.SPAWN_FAILED]: {
    category: "internal",
    remediation: ["Check that the interpreter can be started from this account"],
  },
  [PackageToolErrorCode.CONFIG_INVALID]: {
    category: "validation",
    remediation: ["Fix the reported keys in the config file"],
  },
  [PackageToolErrorCode.INTERPRETER_NOT_FOUND]: {
    category: "not_found",
    remediation: ["Run interpreter_list to see configured interpreter ids"],
  },
};

export function errorFromException(tool: string, interpreter: string | null, durationMs: number | null, err: unknown): ErrorResponse {
  if (err instanceof PackageToolError) {
    const mapped = ERROR_MAP[err.code];
    return error(tool, interpreter, durationMs, { code: err.code, category: mapped.category, message: err.message, remediation: mapped.remediation });
  }
  const message = err instanceof Error ? err.message : String(err);
  logger.error({ tool, error: message }, "Tool execution error");
  return error(tool, interpreter, durationMs, {
    code: "INTERNAL_ERROR", category: "internal", message,
    remediation: ["Check server logs for details"],
  });
}

// ── Interpreter Resolution ─────────────────────────────────────────

/** Interpreter by id, or the first configured one when id is omitted. */
export function resolveInterpreter(ctx: ServerContext, id?: string): InterpreterConfiguration {
  const found = id === undefined ? ctx.interpreters[0] : ctx.interpreters.find((c) => c.id === id);
  if (!found) {
    throw new PackageToolError(
      PackageToolErrorCode.INTERPRETER_NOT_FOUND,
      id === undefined ? "No interpreters are configured" : `Unknown interpreter: ${id}`,
      { interpreter: id ?? null, configPath: ctx.configPath },
    );
  }
  return found;
}

// ── Tool Registration Helper ───────────────────────────────────────

/** Register a tool whose handler receives arguments already validated by its schema. */
export function registerTool<S extends z.ZodRawShape>(
  ctx: ServerContext,
  metadata: Omit<ToolMetadata, "inputSchema"> & { readonly inputSchema: z.ZodObject<S> },
  handler: (input: z.infer<z.ZodObject<S>>, execCtx: ExecutionContext) => Promise<ToolResponse>,
): void {
  ctx.registry.register({
    metadata,
    execute: async (args, execCtx) => {
      const parsed = metadata.inputSchema.safeParse(args ?? {});
      if (!parsed.success) {
        return error(metadata.name, null, null, {
          code: "INVALID_ARGUMENTS", category: "validation",
          message: parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; "),
        });
      }
      const start = performance.now();
      try {
        return await handler(parsed.data, execCtx);
      } catch (err) {
        return errorFromException(metadata.name, null, elapsed(start), err);
      }
    },
  });
}
