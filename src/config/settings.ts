/**
 * Resolved pipeline settings
 *
 * The snake_case `pipeline` section of config.toml is resolved once at
 * startup into this camelCase value. Core components receive it through
 * their constructors and never read global configuration afterwards.
 */

import type { Config, IsolationMode } from './schema.js';
import { DEFAULT_CONFIG } from './defaults.js';

export interface PipelineSettings {
  chunkSize: number;
  chunkOverlap: number;
  retrievalK: number;
  similarityThreshold: number;
  enableReranking: boolean;
  rerankTopK: number;
  rerankFinalK: number;
  enableQueryExpansion: boolean;
  maxExpansions: number;
  enableMultiRoundRetrieval: boolean;
  maxRetrievalRounds: number;
  coverageThreshold: number;
  isolationMode: IsolationMode;
  workflowTimeout: number;
  perCallMaxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  agentConcurrency: number;
  fieldConcurrency: number;
  cancellationGraceMs: number;
  embeddingBatchSize: number;
}

/**
 * Resolve the pipeline section (plus embedding batching) of a config.
 */
export function resolvePipelineSettings(config: Config): PipelineSettings {
  const p = config.pipeline;
  return {
    chunkSize: p.chunk_size,
    chunkOverlap: p.chunk_overlap,
    retrievalK: p.retrieval_k,
    similarityThreshold: p.similarity_threshold,
    enableReranking: p.enable_reranking,
    rerankTopK: p.rerank_top_k,
    rerankFinalK: p.rerank_final_k,
    enableQueryExpansion: p.enable_query_expansion,
    maxExpansions: p.max_expansions,
    enableMultiRoundRetrieval: p.enable_multi_round_retrieval,
    maxRetrievalRounds: p.max_retrieval_rounds,
    coverageThreshold: p.coverage_threshold,
    isolationMode: p.isolation_mode,
    workflowTimeout: p.workflow_timeout_ms,
    perCallMaxRetries: p.per_call_max_retries,
    retryBaseDelayMs: p.retry_base_delay_ms,
    retryMaxDelayMs: p.retry_max_delay_ms,
    agentConcurrency: p.agent_concurrency,
    fieldConcurrency: p.field_concurrency,
    cancellationGraceMs: p.cancellation_grace_ms,
    embeddingBatchSize: config.embedding.batch_size,
  };
}

/**
 * Default settings with selected overrides. Handy for tests and embedding
 * the pipeline as a library without a config file.
 */
export function createPipelineSettings(overrides: Partial<PipelineSettings> = {}): PipelineSettings {
  return { ...resolvePipelineSettings(DEFAULT_CONFIG), ...overrides };
}
