// Confirmation gate — asked before any install that needs the user's consent
// (bootstrapping the package tool, installing a package on request).
// A "cancel" decision becomes OPERATION_CANCELED in the package manager.
import { logger } from "../logger.js";

export type ConfirmationDecision = "proceed" | "cancel";

export interface ConfirmationGate {
  confirm(message: string, signal?: AbortSignal): ConfirmationDecision | Promise<ConfirmationDecision>;
}

/**
 * Gate answered up front by a `confirmed` argument, the way MCP tools are.
 * Unconfirmed prompts are recorded so the caller can echo them back in a
 * confirmation_required response.
 */
export class ArgumentConfirmationGate implements ConfirmationGate {
  private readonly declined: string[] = [];

  constructor(
    private readonly confirmed: boolean,
    private readonly toolName = "unknown",
  ) {}

  confirm(message: string): ConfirmationDecision {
    if (this.confirmed) return "proceed";
    logger.info({ tool: this.toolName, prompt: message }, "Confirmation required");
    this.declined.push(message);
    return "cancel";
  }

  /** Prompts answered with "cancel", in order. */
  get declinedPrompts(): readonly string[] {
    return this.declined;
  }
}
