/**
 * Default Configuration Values
 *
 * Used when no config.toml exists and for every field a user's file omits.
 * The loader merges user config ON TOP of these defaults.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  default_model: 'claude-sonnet-4-20250514',

  // Deterministic, short answers
  llm: {
    temperature: 0,
    max_tokens: 800,
    timeout_ms: 60000,
    max_retries: 2,
  },

  search: {
    max_results: 5,
  },

  chunking: {
    chunk_size: 800,
    chunk_overlap: 100,
  },

  // Two exchanges is enough context for follow-up questions
  session: {
    max_history: 2,
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.course-rag/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# course-rag configuration

default_model = "${DEFAULT_CONFIG.default_model}"

[llm]
temperature = ${DEFAULT_CONFIG.llm.temperature}
max_tokens = ${DEFAULT_CONFIG.llm.max_tokens}
timeout_ms = ${DEFAULT_CONFIG.llm.timeout_ms}
max_retries = ${DEFAULT_CONFIG.llm.max_retries}

[search]
max_results = ${DEFAULT_CONFIG.search.max_results}

# Applied by: crag load
[chunking]
chunk_size = ${DEFAULT_CONFIG.chunking.chunk_size}
chunk_overlap = ${DEFAULT_CONFIG.chunking.chunk_overlap}

[session]
max_history = ${DEFAULT_CONFIG.session.max_history}
`;
