/**
 * Provider capability interfaces
 *
 * The pipeline depends on capabilities, not vendors: anything that can
 * `embed`, `complete` or `rerank` can be substituted. The OpenAI-backed
 * implementations live in openai.ts; tests use in-process fakes.
 */

import type { ZodType, ZodTypeDef } from 'zod';

/**
 * Turns texts into vectors. Implementations batch internally only if
 * they need to; callers already batch by embedding.batch_size.
 */
export interface EmbeddingProvider {
  readonly name: string;
  readonly model: string;
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

/**
 * A structured completion request. The provider parses the model output
 * as JSON and validates it against `schema`.
 */
export interface CompletionRequest<T> {
  /** Short label for logs and traces (e.g. 'query-expansion') */
  name: string;
  prompt: string;
  schema: ZodType<T, ZodTypeDef, unknown>;
  system?: string;
  signal?: AbortSignal;
  /** Free-form tags for tracing (agent, field, ...) */
  metadata?: Record<string, string>;
}

export interface LLMProvider {
  readonly name: string;
  readonly model: string;
  complete<T>(request: CompletionRequest<T>): Promise<T>;
}

/** A passage offered to the reranker */
export interface RerankCandidate {
  id: string;
  text: string;
  /** Similarity score from the vector store */
  score: number;
}

/** A reranked passage, best first */
export interface RerankedCandidate {
  id: string;
  score: number;
}

export interface RerankerProvider {
  readonly name: string;
  rerank(
    query: string,
    candidates: RerankCandidate[],
    topK: number,
    signal?: AbortSignal
  ): Promise<RerankedCandidate[]>;
}

/**
 * The providers a pipeline run needs. `reranker` is null when
 * reranking is disabled or not configured.
 */
export interface ProviderSet {
  llm: LLMProvider;
  embedder: EmbeddingProvider;
  reranker: RerankerProvider | null;
}
