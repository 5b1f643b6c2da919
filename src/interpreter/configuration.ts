import { statSync } from "node:fs";
import type { InterpreterConfiguration } from "../types/interpreter.js";
import { PackageToolError, PackageToolErrorCode } from "../shared/errors.js";

/** An interpreter is runnable when its executable is an existing file. */
export function isRunnable(config: InterpreterConfiguration | null | undefined): boolean {
  if (!config || !config.interpreterPath) return false;
  try {
    return statSync(config.interpreterPath).isFile();
  } catch {
    return false;
  }
}

export function throwIfNotRunnable(config: InterpreterConfiguration | null | undefined): asserts config is InterpreterConfiguration {
  if (!isRunnable(config)) {
    throw new PackageToolError(
      PackageToolErrorCode.NOT_RUNNABLE,
      `Interpreter is not runnable: ${config?.interpreterPath || "(no interpreter path)"}`,
      { interpreter: config?.id ?? null },
    );
  }
}

/** Parse "3.11.2" into [3, 11, 2]; non-numeric parts count as 0. */
export function parseVersion(version: string): number[] {
  return version
    .trim()
    .split(".")
    .map((part) => {
      const n = Number.parseInt(part, 10);
      return Number.isNaN(n) ? 0 : n;
    });
}

/** Negative when a < b, zero when equal, positive when a > b. */
export function compareVersions(a: string, b: string): number {
  const left = parseVersion(a);
  const right = parseVersion(b);
  const len = Math.max(left.length, right.length);
  for (let i = 0; i < len; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}
