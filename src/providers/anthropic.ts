/**
 * Anthropic Message Client
 *
 * Adapts the Messages API of @anthropic-ai/sdk to MessageClient.
 * The key is read only after validation and never appears in errors.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { ToolDefinition } from '../agent/tools/types.js';
import { LLMRequestError } from '../errors/index.js';
import { getAnthropicKey } from './validation.js';
import type {
  ChatMessage,
  ContentBlock,
  MessageClient,
  MessageRequest,
  MessageResponse,
} from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface AnthropicClientOptions {
  model: string;
  temperature: number;
  maxTokens: number;
  /** Request timeout in milliseconds */
  timeout?: number;
  maxRetries?: number;
  /** Defaults to the validated ANTHROPIC_API_KEY */
  apiKey?: string;
}

/**
 * The part of the SDK client this adapter calls; tests pass a fake.
 */
export interface MessagesAPI {
  create(params: Anthropic.MessageCreateParamsNonStreaming): Promise<Anthropic.Message>;
}

// ============================================================================
// CONVERSION
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toAnthropicTool(tool: ToolDefinition): Anthropic.Tool {
  return {
    name: tool.name,
    description: tool.description,
    input_schema: {
      type: 'object',
      properties: tool.input_schema.properties,
      required: tool.input_schema.required,
    },
  };
}

function toAnthropicMessage(message: ChatMessage): Anthropic.MessageParam {
  if (typeof message.content === 'string') {
    return { role: message.role, content: message.content };
  }

  const content = message.content.map((block): Anthropic.ContentBlockParam => {
    switch (block.type) {
      case 'text':
        return { type: 'text', text: block.text };
      case 'tool_use':
        return { type: 'tool_use', id: block.id, name: block.name, input: block.input };
      case 'tool_result':
        return { type: 'tool_result', tool_use_id: block.toolUseId, content: block.content };
    }
  });

  return { role: message.role, content };
}

/**
 * Keep text and tool_use blocks; anything else the API may add is dropped.
 */
export function fromAnthropicContent(blocks: Anthropic.ContentBlock[]): ContentBlock[] {
  const content: ContentBlock[] = [];
  for (const block of blocks) {
    if (block.type === 'text') {
      content.push({ type: 'text', text: block.text });
    } else if (block.type === 'tool_use') {
      content.push({
        type: 'tool_use',
        id: block.id,
        name: block.name,
        input: isRecord(block.input) ? block.input : {},
      });
    }
  }
  return content;
}

/**
 * Wrap any failure from the SDK in an LLMRequestError.
 */
export function toLLMRequestError(error: unknown): LLMRequestError {
  if (error instanceof Anthropic.APIError) {
    const status = typeof error.status === 'number' ? error.status : undefined;
    return new LLMRequestError(`Anthropic API request failed: ${error.message}`, status, error);
  }
  if (error instanceof Error) {
    return new LLMRequestError(`Anthropic API request failed: ${error.message}`, undefined, error);
  }
  return new LLMRequestError(`Anthropic API request failed: ${String(error)}`);
}

// ============================================================================
// CLIENT
// ============================================================================

export class AnthropicMessageClient implements MessageClient {
  readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly messages: MessagesAPI;

  /**
   * @param messages - Injected Messages API; built from the options when omitted
   * @throws APIKeyError when no messages API is injected and the key is missing or malformed
   */
  constructor(options: AnthropicClientOptions, messages?: MessagesAPI) {
    this.model = options.model;
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens;
    this.messages =
      messages ??
      new Anthropic({
        apiKey: options.apiKey ?? getAnthropicKey(),
        timeout: options.timeout,
        maxRetries: options.maxRetries,
      }).messages;
  }

  buildRequest(request: MessageRequest): Anthropic.MessageCreateParamsNonStreaming {
    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: this.maxTokens,
      temperature: this.temperature,
      system: request.system,
      messages: request.messages.map(toAnthropicMessage),
    };

    if (request.tools && request.tools.length > 0) {
      params.tools = request.tools.map(toAnthropicTool);
    }
    if (request.toolChoice) {
      params.tool_choice = { type: request.toolChoice.type };
    }

    return params;
  }

  async createMessage(request: MessageRequest): Promise<MessageResponse> {
    const params = this.buildRequest(request);

    let response: Anthropic.Message;
    try {
      response = await this.messages.create(params);
    } catch (error) {
      throw toLLMRequestError(error);
    }

    return {
      content: fromAnthropicContent(response.content),
      stopReason: response.stop_reason ?? 'end_turn',
    };
  }
}
