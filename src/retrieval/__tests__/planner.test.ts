/**
 * RetrievalPlanner tests
 *
 * The namespace handle is a stub that returns a fixed hit list, so the
 * tests control scores exactly and can count queries per round.
 */

import { describe, it, expect, vi } from 'vitest';
import { RetrievalPlanner, type PlannerSettings } from '../planner.js';
import { createPipelineSettings } from '../../config/settings.js';
import type { NamespaceHandle } from '../../namespace/manager.js';
import type { RerankerProvider } from '../../providers/types.js';
import type { StoreHit } from '../../store/types.js';
import { FakeReranker, HashingEmbedder, ScriptedLLM } from '../../test-utils/fakes.js';
import { OperationCancelledError } from '../../utils/async.js';

function hit(chunkId: string, score: number): StoreHit {
  return {
    chunkId,
    namespaceId: 'ns',
    documentId: 'doc',
    text: `text ${chunkId}`,
    span: { start: 0, end: 6 },
    score,
  };
}

function stubHandle(hits: StoreHit[]): NamespaceHandle & { ks: number[] } {
  const ks: number[] = [];
  return {
    namespaceId: 'ns',
    sessionId: 'session-1',
    mode: 'isolated',
    cleared: 0,
    ks,
    upsert: async () => {},
    query: async (_vector, k) => {
      ks.push(k);
      return hits.slice(0, k);
    },
    count: async () => hits.length,
  };
}

function settings(overrides: Partial<PlannerSettings> = {}): PlannerSettings {
  return createPipelineSettings({
    retrievalK: 3,
    similarityThreshold: 0.3,
    enableReranking: false,
    rerankTopK: 10,
    rerankFinalK: 2,
    enableQueryExpansion: false,
    maxExpansions: 3,
    enableMultiRoundRetrieval: true,
    maxRetrievalRounds: 3,
    coverageThreshold: 0.8,
    ...overrides,
  });
}

const noLLM = () => new ScriptedLLM(() => ({ queries: [] }));

describe('RetrievalPlanner.expand', () => {
  it('returns the original query when expansion is disabled', async () => {
    const llm = noLLM();
    const planner = new RetrievalPlanner({ llm, embedder: new HashingEmbedder(), reranker: null }, settings());

    await expect(planner.expand('预算金额')).resolves.toEqual(['预算金额']);
    expect(llm.calls).toHaveLength(0);
  });

  it('does not call the model when maxExpansions is 1', async () => {
    const llm = noLLM();
    const planner = new RetrievalPlanner(
      { llm, embedder: new HashingEmbedder(), reranker: null },
      settings({ enableQueryExpansion: true, maxExpansions: 1 })
    );

    await expect(planner.expand('预算金额')).resolves.toEqual(['预算金额']);
    expect(llm.calls).toHaveLength(0);
  });

  it('puts the original first, drops duplicates and caps at maxExpansions', async () => {
    const llm = new ScriptedLLM(() => ({ queries: ['  预算 ', '预算金额', '采购预算', '控制价'] }));
    const planner = new RetrievalPlanner(
      { llm, embedder: new HashingEmbedder(), reranker: null },
      settings({ enableQueryExpansion: true, maxExpansions: 3 })
    );

    await expect(planner.expand('预算金额')).resolves.toEqual(['预算金额', '预算', '采购预算']);
    expect(llm.calls[0]?.name).toBe('query-expansion');
    expect(llm.calls[0]?.metadata).toEqual({ task: 'query-expansion' });
    expect(llm.calls[0]?.prompt).toContain('生成2个');
    expect(llm.calls[0]?.prompt).toContain('原始查询：预算金额');
  });

  it('falls back to the original query when expansion fails', async () => {
    const llm = new ScriptedLLM(() => ({ unexpected: true }));
    const logger = { warn: vi.fn() };
    const planner = new RetrievalPlanner(
      { llm, embedder: new HashingEmbedder(), reranker: null },
      settings({ enableQueryExpansion: true }),
      { logger }
    );

    await expect(planner.expand('预算金额')).resolves.toEqual(['预算金额']);
    expect(logger.warn).toHaveBeenCalledWith(
      'Query expansion failed, using the original query: scripted: query-expansion: malformed output'
    );
  });

  it('propagates cancellation', async () => {
    const controller = new AbortController();
    controller.abort();
    const planner = new RetrievalPlanner(
      { llm: noLLM(), embedder: new HashingEmbedder(), reranker: null },
      settings({ enableQueryExpansion: true })
    );

    await expect(planner.expand('预算金额', controller.signal)).rejects.toBeInstanceOf(OperationCancelledError);
  });
});

describe('RetrievalPlanner.retrieve', () => {
  const request = { field: 'budget_amount', query: 'q', alternates: ['alt1', 'alt2'] };

  it('stops after one round when a hit reaches the coverage threshold', async () => {
    const handle = stubHandle([hit('a', 0.9), hit('b', 0.5)]);
    const planner = new RetrievalPlanner({ llm: noLLM(), embedder: new HashingEmbedder(), reranker: null }, settings());

    const result = await planner.retrieve(handle, request);

    expect(result.rounds).toBe(1);
    expect(result.variants).toEqual(['q']);
    expect(handle.ks).toEqual([3]);
    expect(result.hits.map((h) => h.chunkId)).toEqual(['a', 'b']);
  });

  it('widens k and adds alternates each round until maxRetrievalRounds', async () => {
    const handle = stubHandle([hit('a', 0.5), hit('b', 0.4), hit('c', 0.2)]);
    const embedder = new HashingEmbedder();
    const planner = new RetrievalPlanner({ llm: noLLM(), embedder, reranker: null }, settings());

    const result = await planner.retrieve(handle, request);

    expect(result.rounds).toBe(3);
    expect(result.variants).toEqual(['q', 'alt1', 'alt2']);
    expect(handle.ks).toEqual([3, 6, 6, 9, 9, 9]);
    expect(embedder.calls).toEqual([['q'], ['alt1'], ['alt2']]);
    // c is under the similarity threshold
    expect(result.candidatePool).toBe(2);
    expect(result.hits.map((h) => h.chunkId)).toEqual(['a', 'b']);
    expect(result.reranked).toBe(false);
  });

  it('runs a single round when multi-round retrieval is disabled', async () => {
    const handle = stubHandle([hit('a', 0.5)]);
    const planner = new RetrievalPlanner(
      { llm: noLLM(), embedder: new HashingEmbedder(), reranker: null },
      settings({ enableMultiRoundRetrieval: false })
    );

    const result = await planner.retrieve(handle, request);

    expect(result.rounds).toBe(1);
    expect(handle.ks).toEqual([3]);
  });

  it('returns no hits when nothing clears the similarity threshold', async () => {
    const handle = stubHandle([hit('a', 0.1)]);
    const reranker = new FakeReranker();
    const planner = new RetrievalPlanner(
      { llm: noLLM(), embedder: new HashingEmbedder(), reranker },
      settings({ enableReranking: true })
    );

    const result = await planner.retrieve(handle, request);

    expect(result.hits).toEqual([]);
    expect(reranker.calls).toHaveLength(0);
  });

  it('reranks the capped pool and keeps rerankFinalK hits', async () => {
    const handle = stubHandle([hit('a', 0.7), hit('b', 0.6), hit('c', 0.5), hit('d', 0.4)]);
    const reranker = new FakeReranker();
    const planner = new RetrievalPlanner(
      { llm: noLLM(), embedder: new HashingEmbedder(), reranker },
      settings({ enableReranking: true, enableMultiRoundRetrieval: false, retrievalK: 4, rerankTopK: 3 })
    );

    const result = await planner.retrieve(handle, request);

    expect(reranker.calls[0]?.candidates.map((c) => c.id)).toEqual(['a', 'b', 'c']);
    expect(reranker.calls[0]?.topK).toBe(2);
    expect(result.candidatePool).toBe(3);
    expect(result.reranked).toBe(true);
    expect(result.hits.map((h) => [h.chunkId, h.rerankScore])).toEqual([
      ['c', 2],
      ['b', 1],
    ]);
  });

  it('ignores unknown and repeated ids from the reranker', async () => {
    const handle = stubHandle([hit('a', 0.7), hit('b', 0.6)]);
    const reranker: RerankerProvider = {
      name: 'sloppy',
      rerank: async () => [
        { id: 'zzz', score: 1 },
        { id: 'b', score: 0.9 },
        { id: 'b', score: 0.8 },
        { id: 'a', score: 0.1 },
      ],
    };
    const planner = new RetrievalPlanner(
      { llm: noLLM(), embedder: new HashingEmbedder(), reranker },
      settings({ enableReranking: true, enableMultiRoundRetrieval: false })
    );

    const result = await planner.retrieve(handle, request);

    expect(result.hits.map((h) => h.chunkId)).toEqual(['b', 'a']);
  });

  it('keeps similarity order when the reranker fails', async () => {
    const handle = stubHandle([hit('a', 0.7), hit('b', 0.6), hit('c', 0.5)]);
    const reranker: RerankerProvider = {
      name: 'down',
      rerank: async () => {
        throw new Error('reranker offline');
      },
    };
    const logger = { warn: vi.fn() };
    const planner = new RetrievalPlanner(
      { llm: noLLM(), embedder: new HashingEmbedder(), reranker },
      settings({ enableReranking: true, enableMultiRoundRetrieval: false }),
      { logger }
    );

    const result = await planner.retrieve(handle, request);

    expect(result.hits.map((h) => h.chunkId)).toEqual(['a', 'b']);
    expect(result.reranked).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith('Reranking failed, keeping similarity order: reranker offline');
  });

  it('breaks score ties by chunk id', async () => {
    const handle = stubHandle([hit('b', 0.5), hit('a', 0.5)]);
    const planner = new RetrievalPlanner(
      { llm: noLLM(), embedder: new HashingEmbedder(), reranker: null },
      settings({ enableMultiRoundRetrieval: false })
    );

    const result = await planner.retrieve(handle, request);

    expect(result.hits.map((h) => h.chunkId)).toEqual(['a', 'b']);
  });

  it('stops when the signal has fired', async () => {
    const controller = new AbortController();
    controller.abort();
    const planner = new RetrievalPlanner(
      { llm: noLLM(), embedder: new HashingEmbedder(), reranker: null },
      settings()
    );

    await expect(planner.retrieve(stubHandle([]), request, controller.signal)).rejects.toBeInstanceOf(
      OperationCancelledError
    );
  });
});
