import { describe, it, expect } from 'vitest';
import { LLMReranker, normalizeScores } from '../reranker.js';
import { ScriptedLLM } from '../../test-utils/fakes.js';
import type { RerankCandidate } from '../types.js';

const candidates: RerankCandidate[] = [
  { id: 'a', text: '投标人资格要求', score: 0.9 },
  { id: 'b', text: '投标保证金人民币5万元', score: 0.8 },
  { id: 'c', text: '保证金账户信息', score: 0.7 },
];

describe('LLMReranker', () => {
  it('orders by model score and keeps at most topK', async () => {
    const llm = new ScriptedLLM(() => ({
      scores: [
        { index: 1, score: 0.2 },
        { index: 2, score: 0.9 },
        { index: 3, score: 0.5 },
      ],
    }));
    const reranker = new LLMReranker(llm);

    const result = await reranker.rerank('投标保证金', candidates, 2);

    expect(result).toEqual([
      { id: 'b', score: 1 },
      { id: 'c', score: 0 },
    ]);
    expect(llm.calls[0]?.metadata).toEqual({ task: 'rerank' });
    expect(llm.calls[0]?.prompt).toContain('查询：投标保证金');
    expect(llm.calls[0]?.prompt).toContain('[2] 投标保证金人民币5万元');
  });

  it('scores omitted and out-of-range candidates lowest, keeping input order on ties', async () => {
    const llm = new ScriptedLLM(() => ({
      scores: [
        { index: 3, score: 0.7 },
        { index: 9, score: 1 },
      ],
    }));
    const reranker = new LLMReranker(llm);

    const result = await reranker.rerank('q', candidates, 3);

    expect(result.map((r) => r.id)).toEqual(['c', 'a', 'b']);
  });

  it('returns a subset of the input ids', async () => {
    const llm = new ScriptedLLM(() => ({ scores: [{ index: 1, score: 1 }] }));
    const result = await new LLMReranker(llm).rerank('q', candidates, 10);

    expect(result).toHaveLength(3);
    expect(new Set(result.map((r) => r.id))).toEqual(new Set(['a', 'b', 'c']));
  });

  it('does not call the model for an empty pool', async () => {
    const llm = new ScriptedLLM(() => ({ scores: [] }));

    await expect(new LLMReranker(llm).rerank('q', [], 5)).resolves.toEqual([]);
    expect(llm.calls).toHaveLength(0);
  });

  it('is named after the scoring model', () => {
    expect(new LLMReranker(new ScriptedLLM(() => ({}))).name).toBe('llm-reranker:scripted-model');
  });
});

describe('normalizeScores', () => {
  it('min-max normalizes spread scores', () => {
    expect(
      normalizeScores([
        { id: 'a', score: 0.8 },
        { id: 'b', score: 0.6 },
        { id: 'c', score: 0.4 },
      ]).map((r) => r.score)
    ).toEqual([1, expect.closeTo(0.5, 10), 0]);
  });

  it('falls back to rank scores when all scores are equal', () => {
    expect(
      normalizeScores([
        { id: 'a', score: 0.3 },
        { id: 'b', score: 0.3 },
        { id: 'c', score: 0.3 },
      ]).map((r) => r.score)
    ).toEqual([1, 0.75, 0.5]);
  });

  it('gives a single result score 1', () => {
    expect(normalizeScores([{ id: 'a', score: 0.1 }])).toEqual([{ id: 'a', score: 1 }]);
  });
});
