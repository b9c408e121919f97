/**
 * API Key Validation
 *
 * Validates the Anthropic key format without exposing its value.
 * These functions NEVER log or return the key except getAnthropicKey,
 * whose result goes straight to the SDK client.
 */

import { z } from 'zod';
import { getEnv, SETUP_INSTRUCTIONS } from '../config/env.js';
import { APIKeyError } from '../errors/index.js';

/**
 * Result of validating the API key.
 */
export type ValidationResult =
  | { valid: true }
  | { valid: false; error: string; setupInstructions: string };

/**
 * Anthropic API key format: sk-ant-... (only the stable prefix is checked)
 */
export const AnthropicKeySchema = z
  .string()
  .trim()
  .min(1, 'ANTHROPIC_API_KEY environment variable is not set')
  .refine(
    (key) => key.startsWith('sk-ant-'),
    'Invalid Anthropic API key format (should start with "sk-ant-")'
  );

/**
 * Check that the key exists and looks like an Anthropic key.
 */
export function validateAnthropicKey(): ValidationResult {
  const result = AnthropicKeySchema.safeParse(getEnv('ANTHROPIC_API_KEY') ?? '');

  if (!result.success) {
    return {
      valid: false,
      error: result.error.issues[0]?.message ?? 'Invalid API key format',
      setupInstructions: SETUP_INSTRUCTIONS,
    };
  }

  return { valid: true };
}

/**
 * Return the validated key.
 *
 * @throws APIKeyError when the key is missing or malformed
 */
export function getAnthropicKey(): string {
  const result = AnthropicKeySchema.safeParse(getEnv('ANTHROPIC_API_KEY') ?? '');
  if (!result.success) {
    throw new APIKeyError(
      'Anthropic',
      'ANTHROPIC_API_KEY',
      result.error.issues[0]?.message ?? 'Invalid API key format'
    );
  }
  return result.data;
}
