// Process execution layer — every package tool and interpreter launch goes through here.
// ExecaProcessRunner.run() is the boundary between operations and the OS: it fails fast
// on unrunnable executables, streams output line by line, and always releases the child.
import execa from "execa";
import type { ExecaChildProcess } from "execa";
import { existsSync } from "node:fs";
import { isAbsolute } from "node:path";
import type { Readable } from "node:stream";
import { createInterface, type Interface } from "node:readline";
import type { OutputSink } from "../types/output.js";
import type { PrivilegeMethod } from "../types/config.js";
import { PackageToolError, PackageToolErrorCode, operationCanceled } from "../shared/errors.js";
import { quoteSingleArgument, unquoteArgument } from "./quoting.js";
import { logger } from "../logger.js";

export interface ProcessRunOptions {
  readonly cwd?: string;
  /** Merged over the current environment. */
  readonly env?: Readonly<Record<string, string>>;
  /** Show a console window (Windows only). */
  readonly visible?: boolean;
  /** Receives stdout via writeLine and stderr via writeErrorLine. */
  readonly output?: OutputSink | null;
  /**
   * false: arguments arrive already quoted for a command line and are unquoted here.
   * true (default): arguments are passed through as given.
   */
  readonly quoteArgs?: boolean;
  readonly elevate?: boolean;
  readonly signal?: AbortSignal;
}

/** Outcome of one process run. */
export interface ProcessResult {
  readonly exitCode: number;
  readonly stdoutLines: readonly string[];
  readonly stderrLines: readonly string[];
}

export interface ProcessRunner {
  run(executable: string, args: readonly string[], options?: ProcessRunOptions): Promise<ProcessResult>;
}

// Exit code reported for a child terminated by a signal.
const SIGNALED_EXIT_CODE = 128;

const ELEVATION_PREFIX: Record<PrivilegeMethod, readonly string[]> = {
  // -n: fail instead of waiting on a password prompt nobody can answer
  sudo: ["sudo", "-n"],
  doas: ["doas", "-n"],
  pkexec: ["pkexec"],
};

/** Local runner on execa (no shell; arguments are never re-parsed). */
export class ExecaProcessRunner implements ProcessRunner {
  constructor(
    private readonly privilegeMethod: PrivilegeMethod = "sudo",
    private readonly platform: NodeJS.Platform = process.platform,
  ) {}

  async run(executable: string, args: readonly string[], options: ProcessRunOptions = {}): Promise<ProcessResult> {
    if (isAbsolute(executable) && !existsSync(executable)) {
      throw new PackageToolError(PackageToolErrorCode.NOT_RUNNABLE, `Executable not found: ${executable}`, { executable });
    }
    if (options.signal?.aborted) throw operationCanceled();

    const argv = options.quoteArgs === false ? args.map(unquoteArgument) : [...args];
    const [file, fileArgs] = options.elevate ? this.elevated(executable, argv) : [executable, argv];
    logger.debug({ file, args: fileArgs, cwd: options.cwd, elevate: options.elevate ?? false }, "Spawning process");

    const stdoutLines: string[] = [];
    const stderrLines: string[] = [];
    const readers: Interface[] = [];
    let child: ExecaChildProcess | undefined;
    const onAbort = (): void => {
      child?.cancel();
    };
    options.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      child = execa(file, fileArgs, {
        cwd: options.cwd,
        env: options.env ? { ...options.env } : undefined,
        windowsHide: !options.visible,
        stdin: "ignore",
        buffer: false,
        reject: false,
      });

      const drained: Promise<void>[] = [];
      if (child.stdout) {
        const rl = createInterface({ input: child.stdout, crlfDelay: Infinity });
        readers.push(rl);
        rl.on("line", (line) => {
          stdoutLines.push(line);
          options.output?.writeLine(line);
        });
        drained.push(linesDrained(rl, child.stdout));
      }
      if (child.stderr) {
        const rl = createInterface({ input: child.stderr, crlfDelay: Infinity });
        readers.push(rl);
        rl.on("line", (line) => {
          stderrLines.push(line);
          options.output?.writeErrorLine(line);
        });
        drained.push(linesDrained(rl, child.stderr));
      }

      const result = await child;
      await Promise.all(drained);

      if (result.isCanceled || options.signal?.aborted) throw operationCanceled();

      let exitCode: number;
      if (typeof result.exitCode === "number") {
        exitCode = result.exitCode;
      } else if (result.signal) {
        exitCode = SIGNALED_EXIT_CODE;
      } else {
        throw new PackageToolError(PackageToolErrorCode.SPAWN_FAILED, `Process failed to start: ${file}`, {
          command: result.command,
        });
      }

      logger.debug({ file, exitCode }, "Process exited");
      return { exitCode, stdoutLines, stderrLines };
    } finally {
      options.signal?.removeEventListener("abort", onAbort);
      for (const rl of readers) rl.close();
      if (child?.pid !== undefined && child.exitCode === null && !child.killed) child.kill();
    }
  }

  private elevated(executable: string, argv: string[]): [string, string[]] {
    if (this.platform === "win32") {
      const list = argv.map((a) => `'${escapePowerShell(quoteSingleArgument(a))}'`).join(",");
      const script =
        `$p = Start-Process -FilePath '${escapePowerShell(executable)}'` +
        (argv.length > 0 ? ` -ArgumentList ${list}` : "") +
        " -Verb RunAs -Wait -PassThru; exit $p.ExitCode";
      return ["powershell.exe", ["-NoProfile", "-NonInteractive", "-Command", script]];
    }
    const [command, ...prefix] = ELEVATION_PREFIX[this.privilegeMethod];
    return [command, [...prefix, executable, ...argv]];
  }
}

/**
 * Settles once every line has been delivered. A failed spawn destroys the stream
 * without ending it, so readline never closes; the stream's own close covers that.
 */
function linesDrained(rl: Interface, stream: Readable): Promise<void> {
  return new Promise((resolve) => {
    rl.once("close", () => resolve());
    stream.once("close", () => resolve());
  });
}

function escapePowerShell(value: string): string {
  return value.replace(/'/g, "''");
}
