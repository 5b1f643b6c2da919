// Installed-package enumeration. Strategies run in order and the first one that
// returns a set wins; the last one (site-packages scan) always returns a set.
import { readdir } from "node:fs/promises";
import { join } from "node:path";
import type { InterpreterConfiguration } from "../types/interpreter.js";
import type { ProcessResult, ProcessRunner } from "../execution/process-runner.js";
import type { ToolLocator } from "../tooling/locator.js";
import { isRunnable } from "../interpreter/configuration.js";
import { isOperationCanceled } from "../shared/errors.js";
import { UNBUFFERED_ENV } from "./constants.js";
import { logger } from "../logger.js";

/** Package identifiers: `name==version`, or bare `name` from a directory scan. */
export type PackageSet = ReadonlySet<string>;

export interface FreezeContext {
  readonly config: InterpreterConfiguration;
  readonly locator: ToolLocator;
  readonly runner: ProcessRunner;
  readonly signal?: AbortSignal;
  /** Entries gathered by earlier strategies for a later one to merge. */
  readonly seed: Set<string>;
}

export type FreezeStrategy = (ctx: FreezeContext) => Promise<PackageSet | null>;

const PACKAGE_DIR_NAME = /^([a-z0-9_]+)(-.+)?/i;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Matches `<tool> <version>` in the tool's --version output. */
export function toolVersionPattern(toolName: string): RegExp {
  return new RegExp(`${escapeRegExp(toolName)} ([0-9][0-9.]*)`);
}

/** Leading package name of a site-packages directory, e.g. "requests-2.28.1" → "requests". */
export function packageNameFromDirectory(dirName: string): string | null {
  return PACKAGE_DIR_NAME.exec(dirName)?.[1] ?? null;
}

/** Run the tool; null when it could not be launched at all. */
async function runTool(ctx: FreezeContext, args: string[]): Promise<ProcessResult | null> {
  if (!isRunnable(ctx.config)) return null;
  const cmd = ctx.locator.buildCommand(ctx.config, args);
  try {
    return await ctx.runner.run(cmd.executable, cmd.args, {
      cwd: ctx.config.prefixPath,
      env: UNBUFFERED_ENV,
      visible: false,
      output: null,
      quoteArgs: false,
      signal: ctx.signal,
    });
  } catch (err) {
    if (isOperationCanceled(err)) throw err;
    logger.debug({ interpreter: ctx.config.id, args, error: err }, "Package tool could not be run");
    return null;
  }
}

/** Seeds `<tool>==<version>`; never decides the result on its own. */
export const probeToolVersion: FreezeStrategy = async (ctx) => {
  const result = await runTool(ctx, ["--version"]);
  if (result?.exitCode !== 0) return null;
  const pattern = toolVersionPattern(ctx.locator.toolName);
  for (const line of result.stdoutLines) {
    const version = pattern.exec(line)?.[1];
    if (version) ctx.seed.add(`${ctx.locator.toolName}==${version}`);
  }
  return null;
};

export const runToolFreeze: FreezeStrategy = async (ctx) => {
  const result = await runTool(ctx, ["freeze"]);
  if (result?.exitCode !== 0) {
    logger.debug({ interpreter: ctx.config.id, exitCode: result?.exitCode ?? null }, "freeze failed — scanning site-packages");
    return null;
  }
  const lines = new Set(ctx.seed);
  for (const line of result.stdoutLines) {
    const trimmed = line.trim();
    if (trimmed) lines.add(trimmed);
  }
  return lines;
};

/** Degraded inventory from directory names; names only, no versions. */
export const scanSitePackages: FreezeStrategy = async (ctx) => {
  // Entries from a failed tool run are not trusted.
  ctx.seed.clear();
  const packagesPath = join(ctx.config.libraryPath, "site-packages");
  try {
    const entries = await readdir(packagesPath, { withFileTypes: true });
    const names = new Set<string>();
    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      const name = packageNameFromDirectory(entry.name);
      if (name) names.add(name);
    }
    return names;
  } catch (err) {
    logger.debug({ packagesPath, error: err }, "site-packages scan failed");
    return new Set<string>();
  }
};

export const FREEZE_STRATEGIES: readonly FreezeStrategy[] = [probeToolVersion, runToolFreeze, scanSitePackages];

export async function runFreezeStrategies(
  ctx: FreezeContext,
  strategies: readonly FreezeStrategy[] = FREEZE_STRATEGIES,
): Promise<PackageSet> {
  for (const strategy of strategies) {
    const result = await strategy(ctx);
    if (result) return result;
  }
  return new Set<string>();
}
