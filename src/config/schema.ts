/**
 * Configuration Schema
 *
 * Defines the shape of ~/.tender-insight/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * LLM provider configuration
 * Used for query expansion, field extraction and LLM reranking
 */
export const LLMConfigSchema = z.object({
  provider: z
    .enum(['openai', 'openai-compatible'])
    .describe('LLM provider (openai-compatible reads OPENAI_BASE_URL or base_url)'),
  model: z.string().min(1).describe('Chat model used for expansion and extraction'),
  base_url: z.string().url().optional().describe('Override the API base URL'),
  temperature: z.number().min(0).max(2).default(0).describe('Sampling temperature'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .default(60000)
    .describe('Per-request timeout in milliseconds'),
});

/**
 * Embedding provider configuration
 */
export const EmbeddingConfigSchema = z.object({
  model: z.string().min(1).describe('Embedding model name'),
  dimensions: z
    .number()
    .int()
    .positive()
    .optional()
    .describe('Requested vector size (for models that support shortening)'),
  batch_size: z
    .number()
    .int()
    .min(1)
    .max(100)
    .default(32)
    .describe('Number of texts to embed per batch (1-100, default 32)'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .default(120000)
    .describe('Timeout in milliseconds for one embedding batch'),
});

/**
 * Reranker configuration
 * `llm` scores candidates with the configured chat model, `none` disables reranking
 */
export const RerankerConfigSchema = z.object({
  provider: z.enum(['llm', 'none']).describe('Reranker provider'),
  model: z.string().optional().describe('Chat model for the llm reranker (defaults to llm.model)'),
});

/**
 * Vector store configuration
 */
export const StoreConfigSchema = z.object({
  path: z.string().optional().describe('SQLite file (default ~/.tender-insight/vectors.db)'),
  namespace: z.string().min(1).describe('Namespace documents are indexed into'),
});

/**
 * Isolation mode for a namespace
 * isolated: cleared before each document, cumulative: never cleared
 */
export const IsolationModeSchema = z.enum(['isolated', 'cumulative']);
export type IsolationMode = z.infer<typeof IsolationModeSchema>;

/**
 * Pipeline configuration
 * Chunking, retrieval quality controls, timeouts and concurrency
 */
export const PipelineConfigSchema = z.object({
  chunk_size: z.number().int().min(50).max(20000),
  chunk_overlap: z.number().int().min(0),
  retrieval_k: z.number().int().min(1).max(100),
  similarity_threshold: z.number().min(-1).max(1),
  enable_reranking: z.boolean(),
  rerank_top_k: z.number().int().min(1).max(200),
  rerank_final_k: z.number().int().min(1).max(200),
  enable_query_expansion: z.boolean(),
  max_expansions: z.number().int().min(1).max(10),
  enable_multi_round_retrieval: z.boolean(),
  max_retrieval_rounds: z.number().int().min(1).max(10),
  coverage_threshold: z
    .number()
    .min(-1)
    .max(1)
    .describe('A hit at or above this score ends multi-round retrieval early'),
  isolation_mode: IsolationModeSchema,
  workflow_timeout_ms: z.number().int().min(100),
  per_call_max_retries: z.number().int().min(0).max(10),
  retry_base_delay_ms: z.number().int().min(0),
  retry_max_delay_ms: z.number().int().min(0),
  agent_concurrency: z.number().int().min(1).max(16),
  field_concurrency: z.number().int().min(1).max(16),
  cancellation_grace_ms: z.number().int().min(0),
});

/**
 * Observability configuration
 * Langfuse keys may also come from LANGFUSE_PUBLIC_KEY / LANGFUSE_SECRET_KEY
 */
export const ObservabilityConfigSchema = z.object({
  enabled: z.boolean(),
  langfuse_public_key: z.string().optional(),
  langfuse_secret_key: z.string().optional(),
  langfuse_host: z.string().optional(),
});

/**
 * Report output configuration
 */
export const OutputConfigSchema = z.object({
  dir: z.string().min(1).describe('Directory Markdown reports are written to'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  llm: LLMConfigSchema,
  embedding: EmbeddingConfigSchema,
  reranker: RerankerConfigSchema,
  store: StoreConfigSchema,
  pipeline: PipelineConfigSchema,
  observability: ObservabilityConfigSchema,
  output: OutputConfigSchema,
});

/**
 * TypeScript type inferred from the schema
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for sparse user files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
