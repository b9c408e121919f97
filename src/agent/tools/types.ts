/**
 * Tool Types
 *
 * Vendor-neutral tool contract. Definitions use the JSON Schema subset the
 * model APIs accept; adapters translate them to the wire format.
 */

export type ToolParameterType = 'string' | 'integer' | 'number' | 'boolean';

export interface ToolParameter {
  type: ToolParameterType;
  description: string;
}

export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, ToolParameter>;
  required: string[];
}

/**
 * Name, purpose and parameters of a tool, as shown to the model.
 */
export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: ToolInputSchema;
}

/**
 * Attribution for material a tool returned.
 */
export interface SourceCitation {
  /** e.g. "MCP: Build Rich-Context AI Apps - Lesson 2" */
  title: string;
  url: string | null;
}

/**
 * A named capability the model can call.
 *
 * `execute` reports "no results" and unknown filters in its returned text
 * so the model can explain them. Each call replaces the citation list.
 */
export interface Tool {
  definition(): ToolDefinition;
  execute(args: Record<string, unknown>): Promise<string>;
  /** Citations from the most recent execute, empty when none */
  getCitations(): SourceCitation[];
  resetCitations(): void;
}
