import type { InterpreterConfiguration } from "../types/interpreter.js";
import type { OutputSink } from "../types/output.js";
import { compareVersions } from "../interpreter/configuration.js";
import { INSECURE_ARGUMENT, LAST_INSECURE_RUNTIME_VERSION } from "./constants.js";
import { messages } from "./messages.js";

/**
 * Whether the tool can download over a secure transport on this runtime.
 * Python 2.5 and earlier ship without the ssl module; no detection is done
 * for a separately added one.
 */
export function isSecureInstall(config: InterpreterConfiguration): boolean {
  return compareVersions(config.version, LAST_INSECURE_RUNTIME_VERSION) > 0;
}

/**
 * The insecure modifier for an install command, or null when not needed.
 * Evaluated per call; writes a notice to the sink when the modifier applies.
 */
export function insecureArgument(config: InterpreterConfiguration, output?: OutputSink | null): string | null {
  if (isSecureInstall(config)) return null;
  output?.writeErrorLine(messages.insecureOption(config.version));
  return INSECURE_ARGUMENT;
}
