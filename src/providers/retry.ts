/**
 * Bounded retry for provider calls
 *
 * - Exponential backoff with full jitter, capped at maxDelayMs
 * - Only TransientProviderError is retried
 * - PermanentProviderError and cancellation fail immediately
 * - Waits end early when the AbortSignal fires
 */

import { TransientProviderError } from '../errors/index.js';
import { checkCancelled, sleep } from '../utils/async.js';
import type { Logger } from '../utils/logger.js';
import type { PipelineSettings } from '../config/settings.js';
import type {
  CompletionRequest,
  EmbeddingProvider,
  LLMProvider,
  ProviderSet,
  RerankCandidate,
  RerankedCandidate,
  RerankerProvider,
} from './types.js';

export interface RetryPolicy {
  /** Retries after the first attempt (0 = single attempt) */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Injectable for deterministic tests (default Math.random) */
  random?: () => number;
}

export interface RetryOptions {
  signal?: AbortSignal;
  logger?: Logger;
  /** Label used in retry log lines */
  label?: string;
}

/**
 * Delay before retry number `attempt` (1-based): a random value in
 * [0, min(maxDelayMs, baseDelayMs * 2^(attempt-1))].
 */
export function computeBackoff(attempt: number, policy: RetryPolicy): number {
  const exponential = policy.baseDelayMs * 2 ** (attempt - 1);
  const capped = Math.min(policy.maxDelayMs, exponential);
  const random = policy.random ?? Math.random;
  return Math.floor(random() * capped);
}

/**
 * Run `operation`, retrying transient failures.
 *
 * @example
 * ```ts
 * const vectors = await withRetry(
 *   (signal) => embedder.embed(texts, signal),
 *   { maxRetries: 3, baseDelayMs: 500, maxDelayMs: 8000 },
 *   { signal, label: 'embed' }
 * );
 * ```
 */
export async function withRetry<T>(
  operation: (signal?: AbortSignal) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<T> {
  const { signal, logger, label = 'provider call' } = options;
  let attempt = 0;

  for (;;) {
    checkCancelled(signal);
    try {
      return await operation(signal);
    } catch (error) {
      if (!(error instanceof TransientProviderError) || attempt >= policy.maxRetries) {
        throw error;
      }
      attempt++;
      const delay = computeBackoff(attempt, policy);
      logger?.debug?.(
        `${label} failed (${error.message}); retry ${attempt}/${policy.maxRetries} in ${delay}ms`
      );
      await sleep(delay, signal);
    }
  }
}

/**
 * Build a retry policy from resolved pipeline settings.
 */
export function retryPolicyFromSettings(settings: PipelineSettings): RetryPolicy {
  return {
    maxRetries: settings.perCallMaxRetries,
    baseDelayMs: settings.retryBaseDelayMs,
    maxDelayMs: settings.retryMaxDelayMs,
  };
}

// ============================================================================
// Retrying provider wrappers
// ============================================================================

class RetryingLLMProvider implements LLMProvider {
  constructor(
    private readonly inner: LLMProvider,
    private readonly policy: RetryPolicy,
    private readonly logger?: Logger
  ) {}

  get name(): string {
    return this.inner.name;
  }

  get model(): string {
    return this.inner.model;
  }

  complete<T>(request: CompletionRequest<T>): Promise<T> {
    return withRetry((signal) => this.inner.complete({ ...request, signal }), this.policy, {
      signal: request.signal,
      logger: this.logger,
      label: request.name,
    });
  }
}

class RetryingEmbeddingProvider implements EmbeddingProvider {
  constructor(
    private readonly inner: EmbeddingProvider,
    private readonly policy: RetryPolicy,
    private readonly logger?: Logger
  ) {}

  get name(): string {
    return this.inner.name;
  }

  get model(): string {
    return this.inner.model;
  }

  embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    return withRetry((s) => this.inner.embed(texts, s), this.policy, {
      signal,
      logger: this.logger,
      label: 'embed',
    });
  }
}

class RetryingRerankerProvider implements RerankerProvider {
  constructor(
    private readonly inner: RerankerProvider,
    private readonly policy: RetryPolicy,
    private readonly logger?: Logger
  ) {}

  get name(): string {
    return this.inner.name;
  }

  rerank(
    query: string,
    candidates: RerankCandidate[],
    topK: number,
    signal?: AbortSignal
  ): Promise<RerankedCandidate[]> {
    return withRetry((s) => this.inner.rerank(query, candidates, topK, s), this.policy, {
      signal,
      logger: this.logger,
      label: 'rerank',
    });
  }
}

/**
 * Wrap every provider of a set so each call retries transient failures.
 */
export function withRetries(providers: ProviderSet, policy: RetryPolicy, logger?: Logger): ProviderSet {
  return {
    llm: new RetryingLLMProvider(providers.llm, policy, logger),
    embedder: new RetryingEmbeddingProvider(providers.embedder, policy, logger),
    reranker: providers.reranker
      ? new RetryingRerankerProvider(providers.reranker, policy, logger)
      : null,
  };
}
