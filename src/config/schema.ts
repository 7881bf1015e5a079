/**
 * Configuration Schema
 *
 * Defines the shape of ~/.docent/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

export const LLMProviderTypeSchema = z.enum(['anthropic', 'openai', 'ollama']);
export type LLMProviderType = z.infer<typeof LLMProviderTypeSchema>;

export const EmbeddingProviderTypeSchema = z.enum(['openai', 'ollama']);
export type EmbeddingProviderType = z.infer<typeof EmbeddingProviderTypeSchema>;

/**
 * Reasoning model used for planning and code generation
 */
export const LLMConfigSchema = z.object({
  provider: LLMProviderTypeSchema.describe('LLM provider used by the agent'),
  model: z.string().min(1).describe('Model id passed to the provider'),
  max_output_tokens: z
    .number()
    .int()
    .min(64)
    .max(32000)
    .describe('Maximum tokens per planning or generation call'),
  temperature: z.number().min(0).max(2).describe('Sampling temperature for planning (0 = deterministic)'),
});

/**
 * Embedding provider. Vectors are only comparable within one model, so
 * changing provider/model/dimensions requires re-ingesting.
 */
export const EmbeddingConfigSchema = z.object({
  provider: EmbeddingProviderTypeSchema.describe('Embedding provider (openai or ollama)'),
  model: z.string().min(1).describe('Embedding model name'),
  dimensions: z.number().int().min(1).max(8192).describe('Vector dimensionality of the model'),
  batch_size: z
    .number()
    .int()
    .min(1)
    .max(256)
    .describe('Number of chunks embedded per request (1-256)'),
  timeout_ms: z
    .number()
    .int()
    .min(100)
    .max(600000)
    .describe('Timeout per embedding request in milliseconds'),
  max_retries: z.number().int().min(0).max(10).describe('Retries after a failed embedding request'),
  retry_base_delay_ms: z
    .number()
    .int()
    .min(0)
    .max(60000)
    .describe('Initial backoff delay; doubles on each retry'),
});

export const ChunkingConfigSchema = z
  .object({
    max_tokens: z.number().int().min(1).max(8192).describe('Maximum tokens per chunk'),
    overlap_tokens: z.number().int().min(0).describe('Tokens shared by adjacent chunks'),
  })
  .refine((c) => c.overlap_tokens < c.max_tokens, {
    message: 'overlap_tokens must be smaller than max_tokens',
    path: ['overlap_tokens'],
  });

export const IndexConfigSchema = z.object({
  metric: z
    .enum(['cosine', 'euclidean'])
    .describe('Distance metric; changing it requires a full reindex'),
});

export const RetrievalConfigSchema = z.object({
  top_k: z.number().int().min(1).max(100).describe('Number of chunks returned per retrieval'),
  oversample_factor: z
    .number()
    .int()
    .min(1)
    .max(20)
    .describe('Neighbours fetched per requested result, before deduplication'),
  diversity: z
    .enum(['none', 'page'])
    .describe('"page" keeps only the best chunk per document page'),
  min_score: z.number().min(0).max(1).describe('Drop results scoring below this (0-1)'),
});

export const AgentConfigSchema = z.object({
  max_steps: z.number().int().min(1).max(50).describe('Tool steps before a session is truncated'),
  max_plan_retries: z
    .number()
    .int()
    .min(0)
    .max(10)
    .describe('Retries for malformed or failed planning calls'),
  max_tool_retries: z
    .number()
    .int()
    .min(0)
    .max(10)
    .describe('Failed attempts a retryable tool may make per session'),
  plan_timeout_ms: z.number().int().min(100).max(600000).describe('Timeout per planning call'),
  tool_timeout_ms: z.number().int().min(100).max(600000).describe('Default timeout per tool call'),
  retry_base_delay_ms: z.number().int().min(0).max(60000).describe('Initial planning backoff delay'),
  persist_sessions: z.boolean().describe('Store finished session traces in the database'),
});

export const IngestionConfigSchema = z.object({
  max_file_size_mb: z.number().min(1).max(1024).describe('Largest file accepted by ingest'),
  allowed_extensions: z
    .array(z.string().regex(/^\.[a-z0-9]+$/, 'must look like ".txt"'))
    .min(1)
    .describe('File extensions accepted by ingest'),
  concurrency: z.number().int().min(1).max(32).describe('Files ingested at once by the CLI'),
});

/**
 * Root configuration schema: the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  llm: LLMConfigSchema,
  embedding: EmbeddingConfigSchema,
  chunking: ChunkingConfigSchema,
  index: IndexConfigSchema,
  retrieval: RetrievalConfigSchema,
  agent: AgentConfigSchema,
  ingestion: IngestionConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Every field optional, for sparse user files merged over the defaults.
 * Chunking is listed separately because refined objects cannot be
 * deep-partialed; the refinement is rechecked on the merged result.
 */
export const PartialConfigSchema = ConfigSchema.omit({ chunking: true })
  .deepPartial()
  .extend({
    chunking: z
      .object({
        max_tokens: z.number().int().min(1).max(8192),
        overlap_tokens: z.number().int().min(0),
      })
      .partial()
      .optional(),
  });
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
