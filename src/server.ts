#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { logger } from "./logger.js";
import { loadConfig, toInterpreterConfiguration } from "./config/loader.js";
import { configPreferenceSource } from "./config/preferences.js";
import { ExecaProcessRunner } from "./execution/process-runner.js";
import { ToolLocator } from "./tooling/locator.js";
import { PackageManager, BUNDLED_BOOTSTRAP_SCRIPT } from "./packages/manager.js";
import { isRunnable } from "./interpreter/configuration.js";
import { ToolRegistry } from "./tools/registry.js";
import { registerPackageTools } from "./tools/packages/index.js";
import { errorFromException } from "./tools/helpers.js";
import type { ServerContext } from "./tools/context.js";

async function main(): Promise<void> {
  logger.info("Starting python-packages-mcp server");

  // ── Phase 1: Load config ──────────────────────────────────────
  const { config, configPath, firstRun } = loadConfig(process.env.PYTHON_PACKAGES_CONFIG);
  logger.info({ configPath, firstRun }, "Configuration loaded");

  // ── Phase 2: Interpreters ─────────────────────────────────────
  const interpreters = config.interpreters.map(toInterpreterConfiguration);
  for (const interp of interpreters) {
    if (!isRunnable(interp)) {
      logger.warn({ interpreter: interp.id, path: interp.interpreterPath }, "Configured interpreter is not runnable");
    }
  }
  if (interpreters.length === 0) {
    logger.warn({ configPath }, "No interpreters configured — add entries under 'interpreters'");
  }

  // ── Phase 3: Package manager ──────────────────────────────────
  // Preferences are re-read from the config file by each operation.
  const packages = new PackageManager({
    runner: new ExecaProcessRunner(config.privilege.method),
    locator: new ToolLocator(config.tool.name),
    preferences: configPreferenceSource(configPath),
    bootstrapScriptPath: config.tool.bootstrap_script ?? BUNDLED_BOOTSTRAP_SCRIPT,
  });

  // ── Phase 4: Register tools ───────────────────────────────────
  const registry = new ToolRegistry();
  const ctx: ServerContext = { config, configPath, firstRun, interpreters, packages, registry };
  registerPackageTools(ctx);
  logger.info({ toolCount: registry.size }, "All tool modules registered");

  // ── Phase 5: Create MCP server ────────────────────────────────
  const server = new McpServer({
    name: "python-packages-mcp",
    version: "0.1.0",
  });

  for (const tool of registry) {
    const meta = tool.metadata;
    const name = meta.name;
    server.registerTool(
      name,
      {
        title: name,
        description: meta.description,
        inputSchema: meta.inputSchema.shape,
        annotations: {
          readOnlyHint: meta.annotations?.readOnlyHint ?? !meta.mutating,
          destructiveHint: meta.annotations?.destructiveHint ?? false,
          idempotentHint: meta.annotations?.idempotentHint ?? false,
          openWorldHint: meta.annotations?.openWorldHint ?? false,
        },
      },
      async (args: Record<string, unknown>, extra: { signal: AbortSignal }) => {
        try {
          const response = await tool.execute(args, { signal: extra.signal });
          return { content: [{ type: "text" as const, text: JSON.stringify(response, null, 2) }] };
        } catch (err) {
          const response = errorFromException(name, null, null, err);
          return { content: [{ type: "text" as const, text: JSON.stringify(response, null, 2) }] };
        }
      },
    );
  }

  // ── Phase 6: Connect transport ────────────────────────────────
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ tools: registry.size, interpreters: interpreters.length }, "python-packages-mcp server running on stdio");
}

main().catch((err: unknown) => {
  logger.fatal({ error: err }, "Fatal startup error");
  process.exit(1);
});
