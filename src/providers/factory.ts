/**
 * Builds the message client from the loaded configuration.
 */

import type { Config } from '../config/index.js';
import { AnthropicMessageClient } from './anthropic.js';
import type { MessageClient } from './types.js';

/**
 * @throws APIKeyError when ANTHROPIC_API_KEY is missing or malformed
 */
export function createMessageClient(config: Config): MessageClient {
  return new AnthropicMessageClient({
    model: config.default_model,
    temperature: config.llm.temperature,
    maxTokens: config.llm.max_tokens,
    timeout: config.llm.timeout_ms,
    maxRetries: config.llm.max_retries,
  });
}
