/**
 * Provider decorators that record calls under a span: completions as
 * generations, reranking as a child span.
 */

import type {
  CompletionRequest,
  LLMProvider,
  RerankCandidate,
  RerankedCandidate,
  RerankerProvider,
} from '../providers/types.js';
import type { SpanHandle } from './types.js';

export class TracedLLM implements LLMProvider {
  readonly name: string;
  readonly model: string;

  constructor(
    private readonly inner: LLMProvider,
    private readonly parent: SpanHandle
  ) {
    this.name = inner.name;
    this.model = inner.model;
  }

  async complete<T>(request: CompletionRequest<T>): Promise<T> {
    const generation = this.parent.generation({
      name: request.name,
      model: this.model,
      input: request.prompt,
      metadata: request.metadata,
    });

    try {
      const output = await this.inner.complete(request);
      generation.update({ output });
      return output;
    } catch (error) {
      generation.update({
        level: 'ERROR',
        statusMessage: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      generation.end();
    }
  }
}

export class TracedReranker implements RerankerProvider {
  readonly name: string;

  constructor(
    private readonly inner: RerankerProvider,
    private readonly parent: SpanHandle
  ) {
    this.name = inner.name;
  }

  async rerank(
    query: string,
    candidates: RerankCandidate[],
    topK: number,
    signal?: AbortSignal
  ): Promise<RerankedCandidate[]> {
    const span = this.parent.span({
      name: 'rerank',
      input: { query, candidates: candidates.length, topK },
      metadata: { reranker: this.name },
    });

    try {
      const output = await this.inner.rerank(query, candidates, topK, signal);
      span.update({ output: output.map((r) => r.id) });
      return output;
    } catch (error) {
      span.update({
        level: 'ERROR',
        statusMessage: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      span.end();
    }
  }
}
