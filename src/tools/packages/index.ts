import { z } from "zod";
import type { ServerContext } from "../context.js";
import type { ToolResponse } from "../../types/response.js";
import { BufferedOutputSink } from "../../output/sink.js";
import { ArgumentConfirmationGate } from "../../safety/gate.js";
import { isRunnable } from "../../interpreter/configuration.js";
import { isOperationCanceled } from "../../shared/errors.js";
import { messages } from "../../packages/messages.js";
import { registerTool, resolveInterpreter, success, error, confirmationRequired, elapsed } from "../helpers.js";

const interpreterArg = z.string().min(1).optional()
  .describe("Interpreter id from the config file. Omit to use the first configured interpreter.");
const confirmedArg = z.boolean().optional().default(false)
  .describe("Pass true to confirm execution after reviewing a confirmation_required response.");
const elevateArg = z.boolean().optional().default(false)
  .describe("Run the package tool with elevated privileges.");

/** Success/error response for a mutating operation, with the collected output attached. */
function outcome(tool: string, interpreter: string, start: number, ok: boolean, output: BufferedOutputSink, data: Record<string, unknown>): ToolResponse {
  const lines = output.text();
  if (!ok) {
    return error(tool, interpreter, elapsed(start), {
      code: "TOOL_FAILED", category: "tool_failed",
      message: lines[lines.length - 1] ?? "Package tool failed",
      remediation: ["Review the package tool output for the cause", "Run pkg_freeze to check the current state"],
      output: lines,
    });
  }
  return success(tool, interpreter, elapsed(start), { ...data, output: lines, output_visibility: output.visibility });
}

export function registerPackageTools(ctx: ServerContext): void {
  const locator = ctx.packages.locator;

  // ── interpreter_list ────────────────────────────────────────────
  registerTool(ctx, {
    name: "interpreter_list", description: "List configured interpreters and how the package tool is launched for each.",
    mutating: false,
    inputSchema: z.object({}),
    annotations: { readOnlyHint: true, idempotentHint: true },
  }, async () => {
    const start = performance.now();
    const interpreters = ctx.interpreters.map((config) => ({
      id: config.id,
      version: config.version,
      prefix_path: config.prefixPath,
      interpreter_path: config.interpreterPath,
      runnable: isRunnable(config),
      tool_module_installed: locator.hasInstalledModule(config),
      tool_invocation: locator.resolve(config),
    }));
    return success("interpreter_list", null, elapsed(start), {
      interpreters, config_path: ctx.configPath, first_run: ctx.firstRun,
    });
  });

  // ── pkg_freeze ──────────────────────────────────────────────────
  registerTool(ctx, {
    name: "pkg_freeze", description: "List installed packages (name==version; names only when the package tool is unavailable).",
    mutating: false,
    inputSchema: z.object({ interpreter: interpreterArg }),
    annotations: { readOnlyHint: true, idempotentHint: true },
  }, async (input, execCtx) => {
    const config = resolveInterpreter(ctx, input.interpreter);
    const start = performance.now();
    const packages = [...(await ctx.packages.freeze(config, { signal: execCtx.signal }))].sort();
    return success("pkg_freeze", config.id, elapsed(start), { packages, count: packages.length });
  });

  // ── pkg_is_installed ────────────────────────────────────────────
  registerTool(ctx, {
    name: "pkg_is_installed", description: "Check whether a requirement such as 'requests>=2.0' is installed and satisfied (needs setuptools).",
    mutating: false,
    inputSchema: z.object({
      interpreter: interpreterArg,
      requirement: z.string().min(1).describe("Requirement in setuptools syntax"),
    }),
    annotations: { readOnlyHint: true, idempotentHint: true },
  }, async (input, execCtx) => {
    const config = resolveInterpreter(ctx, input.interpreter);
    const start = performance.now();
    const installed = await ctx.packages.isInstalled(config, input.requirement, { signal: execCtx.signal });
    return success("pkg_is_installed", config.id, elapsed(start), { requirement: input.requirement, installed });
  });

  // ── pkg_install ─────────────────────────────────────────────────
  registerTool(ctx, {
    name: "pkg_install", description: "Install a package. Asks for confirmation first if the package tool itself must be installed.",
    mutating: true,
    inputSchema: z.object({
      interpreter: interpreterArg,
      package: z.string().min(1).describe("Package specifier, e.g. 'requests' or 'requests==2.31.0'"),
      elevate: elevateArg,
      confirmed: confirmedArg,
    }),
    annotations: { readOnlyHint: false, destructiveHint: false, openWorldHint: true },
  }, async (input, execCtx) => {
    const config = resolveInterpreter(ctx, input.interpreter);
    const gate = new ArgumentConfirmationGate(input.confirmed, "pkg_install");
    const output = new BufferedOutputSink("pkg_install");
    const start = performance.now();
    const ok = await ctx.packages.installWithToolCheck(config, input.package, gate, {
      elevate: input.elevate, output, signal: execCtx.signal,
    });
    if (gate.declinedPrompts.length > 0) return confirmationRequired("pkg_install", config.id, gate.declinedPrompts);
    return outcome("pkg_install", config.id, start, ok, output, { package: input.package });
  });

  // ── pkg_query_install ───────────────────────────────────────────
  registerTool(ctx, {
    name: "pkg_query_install", description: "Install a package only after confirmation; optionally does nothing when it is already installed.",
    mutating: true,
    inputSchema: z.object({
      interpreter: interpreterArg,
      package: z.string().min(1).describe("Package specifier"),
      skip_if_installed: z.boolean().optional().default(true).describe("Return success without prompting when already installed."),
      elevate: elevateArg,
      confirmed: confirmedArg,
    }),
    annotations: { readOnlyHint: false, destructiveHint: false, openWorldHint: true },
  }, async (input, execCtx) => {
    const config = resolveInterpreter(ctx, input.interpreter);
    const gate = new ArgumentConfirmationGate(input.confirmed, "pkg_query_install");
    const output = new BufferedOutputSink("pkg_query_install");
    const start = performance.now();
    try {
      const ok = await ctx.packages.queryInstall(config, input.package, gate, messages.installPackagePrompt(input.package), {
        skipIfInstalled: input.skip_if_installed, elevate: input.elevate, output, signal: execCtx.signal,
      });
      return outcome("pkg_query_install", config.id, start, ok, output, { package: input.package });
    } catch (err) {
      if (isOperationCanceled(err) && gate.declinedPrompts.length > 0) {
        return confirmationRequired("pkg_query_install", config.id, gate.declinedPrompts);
      }
      throw err;
    }
  });

  // ── pkg_uninstall ───────────────────────────────────────────────
  registerTool(ctx, {
    name: "pkg_uninstall", description: "Uninstall a package. Requires confirmation.",
    mutating: true,
    inputSchema: z.object({
      interpreter: interpreterArg,
      package: z.string().min(1).describe("Package name"),
      elevate: elevateArg,
      confirmed: confirmedArg,
    }),
    annotations: { destructiveHint: true },
  }, async (input, execCtx) => {
    const config = resolveInterpreter(ctx, input.interpreter);
    const gate = new ArgumentConfirmationGate(input.confirmed, "pkg_uninstall");
    if (gate.confirm(messages.uninstallPackagePrompt(input.package)) === "cancel") {
      return confirmationRequired("pkg_uninstall", config.id, gate.declinedPrompts);
    }
    const output = new BufferedOutputSink("pkg_uninstall");
    const start = performance.now();
    const ok = await ctx.packages.uninstall(config, input.package, {
      elevate: input.elevate, output, signal: execCtx.signal,
    });
    return outcome("pkg_uninstall", config.id, start, ok, output, { package: input.package });
  });

  // ── pkg_install_tool ────────────────────────────────────────────
  registerTool(ctx, {
    name: "pkg_install_tool", description: "Install the package tool itself into the interpreter. Requires confirmation.",
    mutating: true,
    inputSchema: z.object({
      interpreter: interpreterArg,
      elevate: z.boolean().optional()
        .describe("Run elevated. Omit to follow the elevate_tool_installs preference."),
      confirmed: confirmedArg,
    }),
    annotations: { readOnlyHint: false, destructiveHint: false, openWorldHint: true },
  }, async (input, execCtx) => {
    const config = resolveInterpreter(ctx, input.interpreter);
    const gate = new ArgumentConfirmationGate(input.confirmed, "pkg_install_tool");
    const output = new BufferedOutputSink("pkg_install_tool");
    const start = performance.now();
    try {
      const ok = await ctx.packages.queryInstallTool(config, gate, messages.installToolPrompt(ctx.packages.toolName), {
        skipIfInstalled: true, elevate: input.elevate, output, signal: execCtx.signal,
      });
      return outcome("pkg_install_tool", config.id, start, ok, output, { tool: ctx.packages.toolName });
    } catch (err) {
      if (isOperationCanceled(err) && gate.declinedPrompts.length > 0) {
        return confirmationRequired("pkg_install_tool", config.id, gate.declinedPrompts);
      }
      throw err;
    }
  });
}
