// Package tool locator — decides how the tool is launched for a given interpreter.
// Probes fixed locations under the prefix; a miss on all of them is not an error,
// it selects `<interpreter> -m <tool>`, which is always assumed to be valid.
import { existsSync, statSync } from "node:fs";
import { join } from "node:path";
import type { InterpreterConfiguration } from "../types/interpreter.js";
import type { ToolCommand, ToolInvocation } from "../types/invocation.js";
import { quoteSingleArgument } from "../execution/quoting.js";

interface ToolCandidate {
  /** Relative to the configuration's prefix path. */
  readonly relativePath: string;
  /** Script files are run through the interpreter. */
  readonly isScript: boolean;
}

export class ToolLocator {
  constructor(readonly toolName: string = "pip") {}

  /** Probe order matters: first existing candidate wins. */
  candidates(): readonly ToolCandidate[] {
    const tool = this.toolName;
    return [
      { relativePath: join("Scripts", `${tool}-script.py`), isScript: true },
      { relativePath: `${tool}-script.py`, isScript: true },
      { relativePath: join("Scripts", `${tool}.exe`), isScript: false },
      { relativePath: `${tool}.exe`, isScript: false },
    ];
  }

  resolve(config: InterpreterConfiguration): ToolInvocation {
    for (const candidate of this.candidates()) {
      const fullPath = join(config.prefixPath, candidate.relativePath);
      if (!existsSync(fullPath)) continue;

      if (candidate.isScript) {
        return {
          executablePath: config.interpreterPath,
          leadingArguments: [quoteSingleArgument(fullPath)],
          requiresInterpreterPrefix: true,
        };
      }
      return { executablePath: fullPath, leadingArguments: [], requiresInterpreterPrefix: false };
    }

    return {
      executablePath: config.interpreterPath,
      leadingArguments: ["-m", this.toolName],
      requiresInterpreterPrefix: true,
    };
  }

  buildCommand(config: InterpreterConfiguration, args: readonly string[]): ToolCommand {
    const invocation = this.resolve(config);
    return { executable: invocation.executablePath, args: [...invocation.leadingArguments, ...args] };
  }

  /** Whether the tool's package directory exists in site-packages. */
  hasInstalledModule(config: InterpreterConfiguration): boolean {
    try {
      return statSync(join(config.libraryPath, "site-packages", this.toolName)).isDirectory();
    } catch {
      return false;
    }
  }
}
