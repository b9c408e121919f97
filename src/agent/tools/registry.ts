/**
 * Tool Registry
 *
 * Holds the tools offered to the model, dispatches calls by name, and
 * gathers the citations produced while answering one query.
 */

import { ToolConfigurationError } from '../../errors/index.js';
import type { SourceCitation, Tool, ToolDefinition } from './types.js';

export class ToolRegistry {
  // Map keeps first-insertion order when a name is re-registered
  private readonly tools = new Map<string, Tool>();

  /**
   * Register a tool under its definition's name. A later tool with the
   * same name replaces the earlier one.
   *
   * @throws ToolConfigurationError when the definition has no name
   */
  register(tool: Tool): void {
    const name = tool.definition().name;
    if (!name) {
      throw new ToolConfigurationError('Tool must have a "name" in its definition');
    }
    this.tools.set(name, tool);
  }

  listDefinitions(): ToolDefinition[] {
    return [...this.tools.values()].map((tool) => tool.definition());
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }

  /**
   * Run a tool by name. An unknown name is reported as text so the model
   * can recover.
   */
  async invoke(name: string, args: Record<string, unknown>): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) {
      return `Tool '${name}' not found`;
    }
    return tool.execute(args);
  }

  /**
   * Citations of the first tool, in registration order, that has any.
   * Lists from several tools are never merged.
   */
  collectCitations(): SourceCitation[] {
    for (const tool of this.tools.values()) {
      const citations = tool.getCitations();
      if (citations.length > 0) {
        return [...citations];
      }
    }
    return [];
  }

  clearCitations(): void {
    for (const tool of this.tools.values()) {
      tool.resetCitations();
    }
  }
}
