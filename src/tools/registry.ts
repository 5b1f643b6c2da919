import type { RegisteredTool } from "../types/tool.js";
import { logger } from "../logger.js";

/**
 * Tools by name. Iteration follows registration order, which is the order
 * tools/list reports them in.
 */
export class ToolRegistry implements Iterable<RegisteredTool> {
  private readonly tools = new Map<string, RegisteredTool>();

  /** A second registration under one name is a wiring mistake and throws. */
  register(tool: RegisteredTool): void {
    const { name } = tool.metadata;
    if (this.tools.has(name)) {
      throw new Error(`Tool already registered: ${name}`);
    }
    this.tools.set(name, tool);
    logger.debug({ tool: name, mutating: tool.metadata.mutating }, "Tool registered");
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  [Symbol.iterator](): Iterator<RegisteredTool> {
    return this.tools.values();
  }

  get size(): number {
    return this.tools.size;
  }
}
