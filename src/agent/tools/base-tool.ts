/**
 * Base class for tools whose arguments are validated with zod.
 */

import type { z } from 'zod';
import type { SourceCitation, Tool, ToolDefinition } from './types.js';

export abstract class ValidatedTool<TSchema extends z.ZodTypeAny> implements Tool {
  private citations: SourceCitation[] = [];

  protected abstract readonly schema: TSchema;

  abstract definition(): ToolDefinition;

  /** Runs with arguments that passed the schema. */
  protected abstract run(input: z.output<TSchema>): Promise<string>;

  async execute(args: Record<string, unknown>): Promise<string> {
    this.citations = [];

    const parsed = this.schema.safeParse(args);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`)
        .join('; ');
      return `Invalid input for tool '${this.definition().name}': ${issues}`;
    }

    return this.run(parsed.data);
  }

  getCitations(): SourceCitation[] {
    return [...this.citations];
  }

  resetCitations(): void {
    this.citations = [];
  }

  protected setCitations(citations: SourceCitation[]): void {
    this.citations = citations;
  }
}
