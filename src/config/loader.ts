// Config loader — reads ~/.config/python-packages/config.yaml and validates it against
// ServerConfigSchema, which fills every unset key with its default.
// On first run (no config file), writes DEFAULT_CONFIG_YAML and returns firstRun: true.
// Config shape lives in src/types/config.ts — add new fields to the schema there.
import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { ServerConfigSchema, type InterpreterEntry, type ServerConfig } from "../types/config.js";
import type { InterpreterConfiguration } from "../types/interpreter.js";
import { PackageToolError, PackageToolErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

export const DEFAULT_CONFIG_PATH = join(homedir(), ".config", "python-packages", "config.yaml");

/** Default config YAML written on first run. */
export const DEFAULT_CONFIG_YAML = `# python-packages-mcp configuration
# Generated automatically on first run. All values shown are defaults.

tool:
  # Package tool module name; also names the scripts probed under each prefix.
  name: pip
  # Bootstrap script run by pkg_install_tool (null = bundled scripts/tool_bootstrap.py)
  bootstrap_script: null

preferences:
  show_output_window_for_installs: true
  elevate_tool_installs: false

privilege:
  # sudo | doas | pkexec (ignored on Windows, which uses a RunAs prompt)
  method: sudo

# Interpreters the server manages. Example:
# interpreters:
#   - id: system
#     prefix_path: /usr
#     library_path: /usr/lib/python3.11
#     interpreter_path: /usr/bin/python3
#     version: "3.11"
interpreters: []
`;

export interface ConfigResult {
  config: ServerConfig;
  configPath: string;
  firstRun: boolean;
}

export function defaultConfig(): ServerConfig {
  return ServerConfigSchema.parse({});
}

/** Validate already-parsed YAML; throws CONFIG_INVALID with the zod issues. */
export function parseConfig(raw: unknown): ServerConfig {
  const result = ServerConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new PackageToolError(PackageToolErrorCode.CONFIG_INVALID, "Invalid configuration", {
      issues: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }
  return result.data;
}

/**
 * Read and validate a config file without side effects. A missing file yields
 * the defaults; YAML or schema errors throw.
 */
export function readConfig(configPath: string): ServerConfig {
  if (!existsSync(configPath)) return defaultConfig();
  const raw: unknown = parseYaml(readFileSync(configPath, "utf-8"));
  return parseConfig(raw);
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    logger.info({ configPath }, "No config file found — generating defaults (first run)");
    try {
      mkdirSync(dirname(configPath), { recursive: true });
      writeFileSync(configPath, DEFAULT_CONFIG_YAML, "utf-8");
    } catch (err) {
      logger.warn({ configPath, error: err }, "Could not write default config file");
    }
    return { config: defaultConfig(), configPath, firstRun: true };
  }

  try {
    return { config: readConfig(configPath), configPath, firstRun: false };
  } catch (err) {
    logger.error({ configPath, error: err }, "Failed to load config — using defaults");
    return { config: defaultConfig(), configPath, firstRun: false };
  }
}

export function toInterpreterConfiguration(entry: InterpreterEntry): InterpreterConfiguration {
  return {
    id: entry.id,
    prefixPath: entry.prefix_path,
    libraryPath: entry.library_path,
    interpreterPath: entry.interpreter_path,
    version: entry.version,
  };
}
