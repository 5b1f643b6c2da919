import type { ServerConfig } from "../types/config.js";
import type { InterpreterConfiguration } from "../types/interpreter.js";
import type { PackageManager } from "../packages/manager.js";
import type { ToolRegistry } from "./registry.js";

/**
 * Shared server context — created once at startup, passed to all tool modules.
 * Holds collaborators only; no per-operation state lives here.
 */
export interface ServerContext {
  readonly config: ServerConfig;
  readonly configPath: string;
  readonly firstRun: boolean;
  readonly interpreters: readonly InterpreterConfiguration[];
  readonly packages: PackageManager;
  readonly registry: ToolRegistry;
}
