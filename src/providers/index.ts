/**
 * Providers Module
 *
 * Builds the capability set (LLM, embedder, reranker) a pipeline run needs
 * from configuration. Core components only see the interfaces in types.ts.
 *
 * MAIN ENTRY POINT:
 * ```typescript
 * import { createProviders } from './providers/index.js';
 * const providers = createProviders(config);
 * ```
 *
 * Retries are applied by the pipeline that consumes the set.
 */

import type { Config } from '../config/schema.js';
import { getEnv } from '../config/env.js';
import { APIKeyError, ConfigError } from '../errors/index.js';
import {
  createChatTransport,
  createEmbeddingTransport,
  createOpenAIClient,
  OpenAIEmbeddingProvider,
  OpenAILLMProvider,
} from './openai.js';
import { LLMReranker } from './reranker.js';
import type { ProviderSet } from './types.js';

export interface CreateProvidersOptions {
  /** Overrides OPENAI_API_KEY (tests, embedding as a library) */
  apiKey?: string;
}

/**
 * Create the provider set described by `config`.
 *
 * @throws APIKeyError when no API key is configured
 * @throws ConfigError when an openai-compatible provider has no base URL
 */
export function createProviders(config: Config, options: CreateProvidersOptions = {}): ProviderSet {
  const apiKey = options.apiKey ?? getEnv('OPENAI_API_KEY');
  if (!apiKey?.trim()) {
    throw new APIKeyError('OpenAI', 'OPENAI_API_KEY');
  }

  const baseURL = config.llm.base_url ?? getEnv('OPENAI_BASE_URL');
  if (config.llm.provider === 'openai-compatible' && !baseURL) {
    throw new ConfigError(
      'llm.provider is "openai-compatible" but no base URL is set',
      'Set llm.base_url in config.toml or the OPENAI_BASE_URL environment variable'
    );
  }

  const name = config.llm.provider;
  const chatClient = createOpenAIClient({ apiKey, baseURL, timeout: config.llm.timeout_ms });
  const embeddingClient = createOpenAIClient({
    apiKey,
    baseURL,
    timeout: config.embedding.timeout_ms,
  });
  const chat = createChatTransport(chatClient);

  const llm = new OpenAILLMProvider({
    transport: chat,
    model: config.llm.model,
    temperature: config.llm.temperature,
    name,
  });

  const embedder = new OpenAIEmbeddingProvider({
    transport: createEmbeddingTransport(embeddingClient),
    model: config.embedding.model,
    dimensions: config.embedding.dimensions,
    name,
  });

  const rerankingEnabled =
    config.pipeline.enable_reranking && config.reranker.provider !== 'none';
  const rerankerModel = config.reranker.model ?? config.llm.model;
  const reranker = rerankingEnabled
    ? new LLMReranker(
        rerankerModel === config.llm.model
          ? llm
          : new OpenAILLMProvider({ transport: chat, model: rerankerModel, name })
      )
    : null;

  return { llm, embedder, reranker };
}

export type {
  EmbeddingProvider,
  LLMProvider,
  RerankerProvider,
  ProviderSet,
  CompletionRequest,
  RerankCandidate,
  RerankedCandidate,
} from './types.js';

export {
  OpenAILLMProvider,
  OpenAIEmbeddingProvider,
  classifyProviderError,
  extractJsonObject,
  createOpenAIClient,
  createChatTransport,
  createEmbeddingTransport,
  DEFAULT_SYSTEM_PROMPT,
  type ChatTransport,
  type ChatRequest,
  type ChatResponse,
  type EmbeddingTransport,
  type EmbeddingRequest,
} from './openai.js';

export { LLMReranker, normalizeScores } from './reranker.js';

export {
  withRetry,
  withRetries,
  computeBackoff,
  retryPolicyFromSettings,
  type RetryPolicy,
  type RetryOptions,
} from './retry.js';
