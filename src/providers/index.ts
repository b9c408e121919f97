/**
 * Providers Module
 *
 * Model access for the generation loop.
 *
 * ```typescript
 * import { createMessageClient } from './providers/index.js';
 * const client = createMessageClient(config);
 * ```
 */

export type {
  ChatMessage,
  ContentBlock,
  MessageClient,
  MessageContent,
  MessageRequest,
  MessageResponse,
  TextBlock,
  ToolChoice,
  ToolResultBlock,
  ToolUseBlock,
} from './types.js';

export {
  validateAnthropicKey,
  getAnthropicKey,
  AnthropicKeySchema,
  type ValidationResult,
} from './validation.js';

export {
  AnthropicMessageClient,
  fromAnthropicContent,
  toLLMRequestError,
  type AnthropicClientOptions,
  type MessagesAPI,
} from './anthropic.js';

export { createMessageClient } from './factory.js';
