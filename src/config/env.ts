/**
 * Environment Variable Handler
 *
 * Loads and provides secure access to the Anthropic API key and path
 * overrides. Supports .env files for local development via dotenv.
 *
 * SECURITY NOTES:
 * - Keys are NEVER logged, even in verbose mode
 * - Keys are NEVER included in error messages
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/**
 * Nothing is required at load time. The key is checked when the first
 * model request is about to be made, so `crag load` and `crag courses`
 * work without one.
 */
export const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().optional(),
  /** Overrides ~/.course-rag */
  COURSE_RAG_HOME: z.string().optional(),
  /** Overrides <home>/courses.db */
  COURSE_RAG_DB: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

// ============================================================================
// PRIVATE STATE
// ============================================================================

/** Cached environment (loaded once). Reset with _clearEnvCache() in tests. */
let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  _envCache = EnvSchema.parse({
    ANTHROPIC_API_KEY: process.env.ANTHROPIC_API_KEY,
    COURSE_RAG_HOME: emptyToUndefined(process.env.COURSE_RAG_HOME),
    COURSE_RAG_DB: emptyToUndefined(process.env.COURSE_RAG_DB),
  });

  return _envCache;
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value?.trim() ? value : undefined;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Check if the Anthropic API key is configured (non-empty)
 * WITHOUT exposing its value.
 */
export function hasApiKey(): boolean {
  return Boolean(loadEnv().ANTHROPIC_API_KEY?.trim());
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to stub different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

/**
 * Shown when the API key is missing or malformed.
 */
export const SETUP_INSTRUCTIONS = `
To answer questions, course-rag needs an Anthropic API key:

1. Get your API key from https://console.anthropic.com/
2. Set the environment variable:

   # macOS/Linux (add to ~/.bashrc or ~/.zshrc)
   export ANTHROPIC_API_KEY="sk-ant-..."

   # or put it in a .env file in the working directory
   ANTHROPIC_API_KEY=sk-ant-...

3. Restart your terminal or run: source ~/.bashrc
`.trim();
