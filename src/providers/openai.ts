/**
 * OpenAI-backed providers
 *
 * Chat completions (query expansion, extraction) and embeddings through
 * the official `openai` SDK. Works against api.openai.com and any
 * OpenAI-compatible endpoint via `baseURL`.
 *
 * The SDK's own retries are disabled (maxRetries: 0); retry policy lives
 * in retry.ts so every provider follows the same rules. SDK failures are
 * mapped onto TransientProviderError / PermanentProviderError here.
 *
 * SECURITY: the API key is passed straight to the client and never logged.
 */

import OpenAI from 'openai';
import {
  PermanentProviderError,
  TransientProviderError,
} from '../errors/index.js';
import { OperationCancelledError } from '../utils/async.js';
import type { CompletionRequest, EmbeddingProvider, LLMProvider } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
}

export interface ChatResponse {
  content: string | null;
}

/** Sends one chat completion request in JSON mode */
export type ChatTransport = (request: ChatRequest, signal?: AbortSignal) => Promise<ChatResponse>;

export interface EmbeddingRequest {
  model: string;
  input: string[];
  dimensions?: number;
}

/** Embeds a batch of texts, returning vectors in input order */
export type EmbeddingTransport = (
  request: EmbeddingRequest,
  signal?: AbortSignal
) => Promise<number[][]>;

export interface OpenAIClientOptions {
  apiKey: string;
  baseURL?: string;
  /** Request timeout in milliseconds */
  timeout: number;
}

// ============================================================================
// CONSTANTS
// ============================================================================

export const DEFAULT_SYSTEM_PROMPT =
  '你是一个专业的招投标文件分析专家。严格忠于原文，不要添加任何主观判断。只返回有效的JSON。';

const PERMANENT_STATUSES = new Set([400, 401, 403, 404, 422]);

// ============================================================================
// ERROR CLASSIFICATION
// ============================================================================

function readStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const { status } = error;
    return typeof status === 'number' ? status : undefined;
  }
  return undefined;
}

/**
 * Map an SDK (or fetch) failure onto the pipeline's provider taxonomy.
 *
 * - 400/401/403/404/422: permanent (bad key, bad request, unknown model)
 * - 408/409/429/5xx, connection failures, timeouts: transient
 * - user aborts: cancellation
 */
export function classifyProviderError(
  provider: string,
  error: unknown
): TransientProviderError | PermanentProviderError | OperationCancelledError {
  if (
    error instanceof TransientProviderError ||
    error instanceof PermanentProviderError ||
    error instanceof OperationCancelledError
  ) {
    return error;
  }
  if (error instanceof OpenAI.APIUserAbortError) {
    return new OperationCancelledError(error);
  }

  const message = error instanceof Error ? error.message : String(error);
  const status = readStatus(error);

  if (status !== undefined && PERMANENT_STATUSES.has(status)) {
    return new PermanentProviderError(provider, message, { status, cause: error });
  }
  return new TransientProviderError(provider, message, { status, cause: error });
}

// ============================================================================
// STRUCTURED OUTPUT PARSING
// ============================================================================

/**
 * Parse a model reply as a JSON object. Falls back to the outermost
 * `{...}` span when the model wrapped the JSON in prose or a code fence.
 *
 * @returns The parsed value, or undefined when no JSON object is found
 */
export function extractJsonObject(text: string): unknown {
  const trimmed = text.trim();
  try {
    return JSON.parse(trimmed);
  } catch {
    const start = trimmed.indexOf('{');
    const end = trimmed.lastIndexOf('}');
    if (start === -1 || end <= start) {
      return undefined;
    }
    try {
      return JSON.parse(trimmed.slice(start, end + 1));
    } catch {
      return undefined;
    }
  }
}

// ============================================================================
// SDK TRANSPORTS
// ============================================================================

/**
 * Create an OpenAI client with SDK retries disabled.
 */
export function createOpenAIClient(options: OpenAIClientOptions): OpenAI {
  return new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseURL,
    timeout: options.timeout,
    maxRetries: 0,
  });
}

/**
 * Chat transport over `client.chat.completions.create` in JSON mode.
 */
export function createChatTransport(client: OpenAI): ChatTransport {
  return async (request, signal) => {
    const completion = await client.chat.completions.create(
      {
        model: request.model,
        messages: request.messages,
        temperature: request.temperature,
        response_format: { type: 'json_object' },
      },
      { signal }
    );

    return { content: completion.choices[0]?.message.content ?? null };
  };
}

/**
 * Embedding transport over `client.embeddings.create`.
 */
export function createEmbeddingTransport(client: OpenAI): EmbeddingTransport {
  return async (request, signal) => {
    const response = await client.embeddings.create(
      {
        model: request.model,
        input: request.input,
        ...(request.dimensions !== undefined && { dimensions: request.dimensions }),
      },
      { signal }
    );

    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  };
}

// ============================================================================
// PROVIDERS
// ============================================================================

export interface OpenAILLMProviderOptions {
  transport: ChatTransport;
  model: string;
  temperature?: number;
  /** Provider label used in errors and traces */
  name?: string;
}

/**
 * LLMProvider over an OpenAI-compatible chat endpoint.
 *
 * @example
 * ```ts
 * const client = createOpenAIClient({ apiKey, timeout: 60000 });
 * const llm = new OpenAILLMProvider({ transport: createChatTransport(client), model: 'gpt-4o-mini' });
 * const { queries } = await llm.complete({ name: 'expand', prompt, schema });
 * ```
 */
export class OpenAILLMProvider implements LLMProvider {
  readonly name: string;
  readonly model: string;
  private readonly transport: ChatTransport;
  private readonly temperature: number;

  constructor(options: OpenAILLMProviderOptions) {
    this.transport = options.transport;
    this.model = options.model;
    this.temperature = options.temperature ?? 0;
    this.name = options.name ?? 'openai';
  }

  async complete<T>(request: CompletionRequest<T>): Promise<T> {
    let response: ChatResponse;
    try {
      response = await this.transport(
        {
          model: this.model,
          temperature: this.temperature,
          messages: [
            { role: 'system', content: request.system ?? DEFAULT_SYSTEM_PROMPT },
            { role: 'user', content: request.prompt },
          ],
        },
        request.signal
      );
    } catch (error) {
      throw classifyProviderError(this.name, error);
    }

    if (!response.content) {
      throw new TransientProviderError(this.name, `${request.name}: empty completion`);
    }

    const parsed = extractJsonObject(response.content);
    const result = request.schema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      const detail = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid';
      throw new TransientProviderError(this.name, `${request.name}: malformed output (${detail})`);
    }

    return result.data;
  }
}

export interface OpenAIEmbeddingProviderOptions {
  transport: EmbeddingTransport;
  model: string;
  dimensions?: number;
  name?: string;
}

/**
 * EmbeddingProvider over an OpenAI-compatible embeddings endpoint.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name: string;
  readonly model: string;
  private readonly transport: EmbeddingTransport;
  private readonly dimensions?: number;

  constructor(options: OpenAIEmbeddingProviderOptions) {
    this.transport = options.transport;
    this.model = options.model;
    this.dimensions = options.dimensions;
    this.name = options.name ?? 'openai';
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    let vectors: number[][];
    try {
      vectors = await this.transport(
        { model: this.model, input: texts, dimensions: this.dimensions },
        signal
      );
    } catch (error) {
      throw classifyProviderError(this.name, error);
    }

    if (vectors.length !== texts.length) {
      throw new TransientProviderError(
        this.name,
        `expected ${texts.length} embeddings, received ${vectors.length}`
      );
    }
    return vectors;
  }
}
