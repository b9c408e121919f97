/**
 * Message Types
 *
 * The model conversation as the generation loop sees it. Adapters convert
 * these to and from a vendor's wire format.
 */

import type { ToolDefinition } from '../agent/tools/types.js';

export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ToolUseBlock {
  type: 'tool_use';
  /** Id the matching tool_result must echo */
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface ToolResultBlock {
  type: 'tool_result';
  toolUseId: string;
  content: string;
}

/** Blocks a model can produce */
export type ContentBlock = TextBlock | ToolUseBlock;

export type MessageContent = string | Array<ContentBlock | ToolResultBlock>;

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: MessageContent;
}

export interface ToolChoice {
  type: 'auto';
}

/**
 * One model request. Model name and sampling settings belong to the client.
 */
export interface MessageRequest {
  system: string;
  messages: ChatMessage[];
  tools?: ToolDefinition[];
  toolChoice?: ToolChoice;
}

export interface MessageResponse {
  content: ContentBlock[];
  /** e.g. "end_turn", "tool_use", "max_tokens" */
  stopReason: string;
}

/**
 * Sends one request to a model and returns its reply.
 *
 * Implementations reject with LLMRequestError when the request fails.
 */
export interface MessageClient {
  createMessage(request: MessageRequest): Promise<MessageResponse>;
}
