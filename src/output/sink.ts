import type { OutputSink } from "../types/output.js";
import { logger } from "../logger.js";

export interface OutputLine {
  readonly stream: "stdout" | "stderr";
  readonly text: string;
}

export type OutputVisibility = "hidden" | "shown" | "activated";

/**
 * Sink that keeps every line in memory and mirrors it to the debug log.
 * MCP tool handlers return the collected lines in their response.
 */
export class BufferedOutputSink implements OutputSink {
  private readonly entries: OutputLine[] = [];
  private state: OutputVisibility = "hidden";

  constructor(private readonly label?: string) {}

  writeLine(text: string): void {
    this.entries.push({ stream: "stdout", text });
    logger.debug({ sink: this.label, line: text }, "output");
  }

  writeErrorLine(text: string): void {
    this.entries.push({ stream: "stderr", text });
    logger.debug({ sink: this.label, line: text }, "output (stderr)");
  }

  show(): void {
    if (this.state === "hidden") this.state = "shown";
  }

  showAndActivate(): void {
    this.state = "activated";
  }

  get visibility(): OutputVisibility {
    return this.state;
  }

  get lines(): readonly OutputLine[] {
    return this.entries;
  }

  /** Plain text of every line, both streams, in write order. */
  text(): string[] {
    return this.entries.map((e) => e.text);
  }
}
