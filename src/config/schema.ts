/**
 * Configuration Schema
 *
 * Defines the shape of ~/.course-rag/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * LLM request settings
 * Applied to every Messages API call made by the generation loop
 */
export const LLMConfigSchema = z.object({
  temperature: z
    .number()
    .min(0)
    .max(1)
    .describe('Sampling temperature (0 = deterministic answers)'),
  max_tokens: z
    .number()
    .int()
    .min(1)
    .max(8192)
    .describe('Maximum tokens in a generated answer'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Request timeout in milliseconds'),
  max_retries: z
    .number()
    .int()
    .min(0)
    .max(10)
    .describe('Retries for failed requests (handled by the SDK)'),
});

/**
 * Search configuration
 * Controls how many transcript chunks a search returns
 */
export const SearchConfigSchema = z.object({
  max_results: z.number().int().min(1).max(50).describe('Number of chunks returned per search'),
});

/**
 * Chunking configuration
 * Used when loading course transcripts into the store
 */
export const ChunkingConfigSchema = z
  .object({
    chunk_size: z.number().int().min(100).max(10000).describe('Maximum characters per chunk'),
    chunk_overlap: z
      .number()
      .int()
      .min(0)
      .describe('Characters of trailing sentences repeated at the start of the next chunk'),
  })
  .refine((value) => value.chunk_overlap < value.chunk_size, {
    message: 'chunk_overlap must be smaller than chunk_size',
    path: ['chunk_overlap'],
  });

/**
 * Session configuration
 */
export const SessionConfigSchema = z.object({
  max_history: z
    .number()
    .int()
    .min(0)
    .max(50)
    .describe('Question/answer exchanges remembered per session'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  default_model: z.string().min(1).describe('Anthropic model used for answers'),
  llm: LLMConfigSchema,
  search: SearchConfigSchema,
  chunking: ChunkingConfigSchema,
  session: SessionConfigSchema,
});

/**
 * TypeScript type inferred from the schema
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Sparse config as written by users: every section and field optional.
 * Full validation happens on the merged result.
 */
export const PartialConfigSchema = z.object({
  default_model: z.string().optional(),
  llm: LLMConfigSchema.partial().optional(),
  search: SearchConfigSchema.partial().optional(),
  chunking: z
    .object({
      chunk_size: z.number().int().optional(),
      chunk_overlap: z.number().int().optional(),
    })
    .optional(),
  session: SessionConfigSchema.partial().optional(),
});
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
