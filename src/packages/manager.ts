// Package manager — the operations behind every package tool.
// Each call receives the interpreter configuration explicitly and keeps no state
// between calls; concurrent calls are not serialized here.
// Mutating operations (install, uninstall, installTool) write a start line and a
// terminal line to the sink; queries (freeze, isInstalled) never write to it.
import { join } from "node:path";
import type { InterpreterConfiguration } from "../types/interpreter.js";
import type { OutputSink } from "../types/output.js";
import type { ProcessRunner } from "../execution/process-runner.js";
import type { ConfirmationGate } from "../safety/gate.js";
import { staticPreferences, type PreferenceSource, type Preferences } from "../config/preferences.js";
import { isRunnable, throwIfNotRunnable } from "../interpreter/configuration.js";
import { ToolLocator } from "../tooling/locator.js";
import { PackageToolErrorCode, isOperationCanceled, isPackageToolError, operationCanceled } from "../shared/errors.js";
import { runFreezeStrategies, type PackageSet } from "./freeze.js";
import { insecureArgument } from "./secure.js";
import { UNBUFFERED_ENV } from "./constants.js";
import { messages } from "./messages.js";
import { logger } from "../logger.js";

/** Bootstrap script shipped with this package (scripts/ at the package root). */
export const BUNDLED_BOOTSTRAP_SCRIPT = join(__dirname, "..", "..", "scripts", "tool_bootstrap.py");

export interface PackageManagerDeps {
  readonly runner: ProcessRunner;
  readonly locator?: ToolLocator;
  readonly preferences?: PreferenceSource;
  readonly bootstrapScriptPath?: string;
}

export interface OperationOptions {
  readonly signal?: AbortSignal;
}

export interface InstallOptions extends OperationOptions {
  readonly elevate?: boolean;
  readonly output?: OutputSink | null;
}

export interface QueryInstallOptions extends InstallOptions {
  /** Skip the prompt (and the install) when the target is already present. */
  readonly skipIfInstalled?: boolean;
}

export class PackageManager {
  readonly locator: ToolLocator;
  private readonly runner: ProcessRunner;
  private readonly preferences: PreferenceSource;
  private readonly bootstrapScriptPath: string;

  constructor(deps: PackageManagerDeps) {
    this.runner = deps.runner;
    this.locator = deps.locator ?? new ToolLocator();
    this.preferences = deps.preferences ?? staticPreferences();
    this.bootstrapScriptPath = deps.bootstrapScriptPath ?? BUNDLED_BOOTSTRAP_SCRIPT;
  }

  get toolName(): string {
    return this.locator.toolName;
  }

  /**
   * Enumerate installed packages. Never throws except when canceled; falls back
   * to a site-packages directory scan, and to an empty set after that.
   */
  async freeze(config: InterpreterConfiguration, options: OperationOptions = {}): Promise<PackageSet> {
    return runFreezeStrategies({
      config,
      locator: this.locator,
      runner: this.runner,
      signal: options.signal,
      seed: new Set<string>(),
    });
  }

  /**
   * Whether `requirement` (setuptools syntax, e.g. "requests>=2.0") is installed
   * and satisfied. Needs setuptools in the target environment; without it every
   * requirement reports false.
   */
  async isInstalled(
    config: InterpreterConfiguration,
    requirement: string,
    options: OperationOptions = {},
  ): Promise<boolean> {
    if (!isRunnable(config)) return false;

    const code = `import pkg_resources; pkg_resources.require('${escapePythonLiteral(requirement)}')`;
    try {
      const result = await this.runner.run(config.interpreterPath, ["-c", code], {
        cwd: config.prefixPath,
        env: UNBUFFERED_ENV,
        visible: false,
        output: null,
        quoteArgs: true,
        signal: options.signal,
      });
      return result.exitCode === 0;
    } catch (err) {
      if (
        isPackageToolError(err, PackageToolErrorCode.NOT_RUNNABLE) ||
        isPackageToolError(err, PackageToolErrorCode.SPAWN_FAILED)
      ) {
        return false;
      }
      throw err;
    }
  }

  async install(config: InterpreterConfiguration, pkg: string, options: InstallOptions = {}): Promise<boolean> {
    throwIfNotRunnable(config);
    const prefs = this.preferences.read();
    const output = options.output ?? null;

    this.report(output, messages.packageInstalling(pkg), prefs);
    const args = ["install"];
    const insecure = insecureArgument(config, output);
    if (insecure) args.push(insecure);
    args.push(pkg);

    const exitCode = await this.runTool(config, args, options);
    this.report(
      output,
      exitCode === 0 ? messages.packageInstallSucceeded(pkg) : messages.packageInstallFailed(pkg, exitCode),
      prefs,
    );
    return exitCode === 0;
  }

  async uninstall(config: InterpreterConfiguration, pkg: string, options: InstallOptions = {}): Promise<boolean> {
    throwIfNotRunnable(config);
    const prefs = this.preferences.read();
    const output = options.output ?? null;

    this.report(output, messages.packageUninstalling(pkg), prefs);
    const exitCode = await this.runTool(config, ["uninstall", "-y", pkg], options);
    this.report(
      output,
      exitCode === 0 ? messages.packageUninstallSucceeded(pkg) : messages.packageUninstallFailed(pkg, exitCode),
      prefs,
    );
    return exitCode === 0;
  }

  /**
   * Bootstrap the package tool by running the bundled script with the interpreter.
   * Bypasses the locator: the tool is assumed absent. Elevation defaults to the
   * elevateToolInstalls preference.
   */
  async installTool(config: InterpreterConfiguration, options: InstallOptions = {}): Promise<boolean> {
    throwIfNotRunnable(config);
    const prefs = this.preferences.read();
    const output = options.output ?? null;
    const tool = this.toolName;

    this.report(output, messages.toolInstalling(tool), prefs);
    const result = await this.runner.run(config.interpreterPath, [this.bootstrapScriptPath], {
      cwd: config.prefixPath,
      visible: false,
      output,
      quoteArgs: true,
      elevate: options.elevate ?? prefs.elevateToolInstalls,
      signal: options.signal,
    });
    this.report(
      output,
      result.exitCode === 0 ? messages.toolInstallSucceeded(tool) : messages.toolInstallFailed(tool, result.exitCode),
      prefs,
    );
    return result.exitCode === 0;
  }

  /**
   * Ask before installing `pkg`. Throws OPERATION_CANCELED when the gate
   * answers "cancel"; nothing is spawned in that case.
   */
  async queryInstall(
    config: InterpreterConfiguration,
    pkg: string,
    gate: ConfirmationGate,
    message: string,
    options: QueryInstallOptions = {},
  ): Promise<boolean> {
    throwIfNotRunnable(config);
    if (options.skipIfInstalled && (await this.isInstalled(config, pkg, options))) {
      logger.debug({ interpreter: config.id, pkg }, "Already installed — not prompting");
      return true;
    }
    await this.confirm(gate, message, options.signal);
    return this.install(config, pkg, options);
  }

  /** Ask before bootstrapping the package tool; cancel behaves as in queryInstall. */
  async queryInstallTool(
    config: InterpreterConfiguration,
    gate: ConfirmationGate,
    message: string,
    options: QueryInstallOptions = {},
  ): Promise<boolean> {
    throwIfNotRunnable(config);
    if (options.skipIfInstalled && this.locator.hasInstalledModule(config)) {
      logger.debug({ interpreter: config.id, tool: this.toolName }, "Tool already installed — not prompting");
      return true;
    }
    await this.confirm(gate, message, options.signal);
    return this.installTool(config, options);
  }

  /**
   * Install `pkg`, first offering to bootstrap the tool when its module is
   * missing. Declining the bootstrap resolves to false rather than an error.
   */
  async installWithToolCheck(
    config: InterpreterConfiguration,
    pkg: string,
    gate: ConfirmationGate | null,
    options: InstallOptions = {},
  ): Promise<boolean> {
    if (gate && !this.locator.hasInstalledModule(config)) {
      try {
        // Tool elevation follows the elevateToolInstalls preference, not the package's flag.
        await this.queryInstallTool(config, gate, messages.installToolPrompt(this.toolName), {
          output: options.output,
          signal: options.signal,
        });
      } catch (err) {
        if (isOperationCanceled(err)) return false;
        throw err;
      }
    }
    return this.install(config, pkg, options);
  }

  private async runTool(config: InterpreterConfiguration, args: string[], options: InstallOptions): Promise<number> {
    const cmd = this.locator.buildCommand(config, args);
    const result = await this.runner.run(cmd.executable, cmd.args, {
      cwd: config.prefixPath,
      env: UNBUFFERED_ENV,
      visible: false,
      output: options.output ?? null,
      quoteArgs: false,
      elevate: options.elevate ?? false,
      signal: options.signal,
    });
    return result.exitCode;
  }

  private async confirm(gate: ConfirmationGate, message: string, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw operationCanceled();
    const decision = await gate.confirm(message, signal);
    if (decision === "cancel" || signal?.aborted) throw operationCanceled(`Declined: ${message}`);
  }

  /** Write a status line, then reveal the sink as the preferences ask. */
  private report(output: OutputSink | null, line: string, prefs: Preferences): void {
    if (!output) return;
    output.writeLine(line);
    if (prefs.showOutputWindowForInstalls) {
      output.showAndActivate();
    } else {
      output.show();
    }
  }
}

/** Escape for a single-quoted Python string literal. */
function escapePythonLiteral(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'").replace(/\r?\n/g, " ");
}
