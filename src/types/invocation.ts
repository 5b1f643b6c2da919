/**
 * How to launch the package tool for one interpreter configuration.
 * Computed per call; the filesystem can change between calls.
 */
export interface ToolInvocation {
  readonly executablePath: string;
  /** Arguments placed before the caller's own (script path, or -m <tool>). */
  readonly leadingArguments: readonly string[];
  /** True when executablePath is the interpreter rather than the tool itself. */
  readonly requiresInterpreterPrefix: boolean;
}

/** Executable plus the complete argument list. */
export interface ToolCommand {
  readonly executable: string;
  readonly args: string[];
}
