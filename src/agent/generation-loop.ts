/**
 * Generation Loop
 *
 * Drives one model conversation for one query:
 *
 * ```
 * awaiting_model ──(stop_reason tool_use + registry)──> executing_tools ──> done
 *        │                                                               ▲
 *        └───────────────────(any other reply)──────────────────────────┘
 * ```
 *
 * The follow-up request after executing_tools carries no tools, so the
 * model cannot ask for a second round.
 */

import type {
  ChatMessage,
  ContentBlock,
  MessageClient,
  MessageRequest,
  ToolResultBlock,
  ToolUseBlock,
} from '../providers/types.js';
import type { ToolDefinition } from './tools/types.js';
import type { ToolRegistry } from './tools/registry.js';
import { type Logger, consoleLogger } from '../utils/index.js';

export const SYSTEM_PROMPT = `You are an AI assistant specialized in course materials and educational content, with tools for searching course content and reading course outlines.

Tool usage:
- Use search_course_content for questions about specific course content or detailed educational material
- Use get_course_outline for questions about a course's structure: its title, link, instructor or list of lessons
- Use at most one tool call per query
- Synthesize tool results into accurate, fact-based answers
- If a tool returns no results, say so clearly without offering alternatives

When answering an outline question, include the course title, the course link and every lesson with its number and title.

Response protocol:
- General knowledge questions: answer from existing knowledge without using a tool
- Course-specific questions: use a tool first, then answer
- No meta-commentary: do not explain your reasoning or search process, and do not mention the tools or their results

Every answer must be:
1. Brief and focused
2. Educational
3. Clear
4. Supported by examples when they help

Provide only the direct answer to what was asked.`;

export type GenerationState = 'awaiting_model' | 'executing_tools' | 'done';

export interface GenerationInput {
  query: string;
  /** Flattened "User: ...\nAssistant: ..." history */
  history?: string | null;
  tools?: ToolDefinition[];
  /** Required for tool calls to be executed */
  registry?: ToolRegistry;
}

/**
 * Build the system prompt, appending prior conversation when there is any.
 */
export function buildSystemPrompt(history?: string | null): string {
  return history ? `${SYSTEM_PROMPT}\n\nPrevious conversation:\n${history}` : SYSTEM_PROMPT;
}

/**
 * Text of the first text block, or "" when the reply has none.
 */
export function firstText(content: ContentBlock[]): string {
  for (const block of content) {
    if (block.type === 'text') {
      return block.text;
    }
  }
  return '';
}

export class GenerationLoop {
  private readonly client: MessageClient;
  private readonly logger: Logger;

  constructor(client: MessageClient, logger: Logger = consoleLogger) {
    this.client = client;
    this.logger = logger;
  }

  /**
   * Answer one query. At most two model requests are made.
   *
   * Rejects with the client's error when a model request fails. A tool
   * that throws is reported to the model as a tool result instead.
   */
  async generate(input: GenerationInput): Promise<string> {
    const system = buildSystemPrompt(input.history);
    const userMessage: ChatMessage = { role: 'user', content: input.query };

    const request: MessageRequest = { system, messages: [userMessage] };
    if (input.tools && input.tools.length > 0) {
      request.tools = input.tools;
      request.toolChoice = { type: 'auto' };
    }

    this.transition('awaiting_model', `${request.tools?.length ?? 0} tool(s) offered`);
    const response = await this.client.createMessage(request);

    if (response.stopReason !== 'tool_use' || !input.registry) {
      this.transition('done', `stop reason ${response.stopReason}`);
      return firstText(response.content);
    }

    const toolUses = response.content.filter(
      (block): block is ToolUseBlock => block.type === 'tool_use'
    );
    if (toolUses.length === 0) {
      this.transition('done', 'tool_use stop without tool calls');
      return firstText(response.content);
    }

    this.transition('executing_tools', `${toolUses.length} call(s)`);
    const results = await this.executeTools(toolUses, input.registry);

    const followUp: MessageRequest = {
      system,
      messages: [
        userMessage,
        { role: 'assistant', content: response.content },
        { role: 'user', content: results },
      ],
    };

    const final = await this.client.createMessage(followUp);
    this.transition('done', `stop reason ${final.stopReason}`);
    return firstText(final.content);
  }

  private async executeTools(
    toolUses: ToolUseBlock[],
    registry: ToolRegistry
  ): Promise<ToolResultBlock[]> {
    const results: ToolResultBlock[] = [];
    // One at a time, in the order the model asked
    for (const toolUse of toolUses) {
      this.logger.debug?.(`tool ${toolUse.name} ${JSON.stringify(toolUse.input)}`);
      let content: string;
      try {
        content = await registry.invoke(toolUse.name, toolUse.input);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Tool ${toolUse.name} failed: ${message}`);
        content = `Tool '${toolUse.name}' failed: ${message}`;
      }
      results.push({ type: 'tool_result', toolUseId: toolUse.id, content });
    }
    return results;
  }

  private transition(state: GenerationState, detail?: string): void {
    this.logger.debug?.(detail ? `generation: ${state} (${detail})` : `generation: ${state}`);
  }
}
