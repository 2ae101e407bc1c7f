/**
 * LLM-scored reranker
 *
 * Asks the chat model for a 0-1 relevance score per candidate passage and
 * reorders the pool by that score. The output is always a subset of the
 * input, at most `topK` long, with min-max normalized scores.
 *
 * @example
 * ```typescript
 * const reranker = new LLMReranker(llm);
 * const top = await reranker.rerank('投标保证金', candidates, 8);
 * ```
 */

import { z } from 'zod';
import type { LLMProvider, RerankCandidate, RerankedCandidate, RerankerProvider } from './types.js';

/** Passages longer than this are cut before scoring */
const MAX_PASSAGE_CHARS = 600;

const RerankScoresSchema = z.object({
  scores: z.array(
    z.object({
      index: z.number().int(),
      score: z.number(),
    })
  ),
});

function buildRerankPrompt(query: string, candidates: RerankCandidate[]): string {
  const passages = candidates
    .map((c, i) => `[${i + 1}] ${c.text.slice(0, MAX_PASSAGE_CHARS)}`)
    .join('\n\n');

  return `请评估以下每个段落与查询的相关程度，给出0到1之间的分数（1表示高度相关）。

查询：${query}

段落：
${passages}

请以JSON格式返回：{"scores": [{"index": 段落编号, "score": 分数}]}，为每个段落给出一个分数。`;
}

/**
 * Reranker that scores passages with an LLMProvider.
 *
 * Candidates the model leaves out get the lowest score. Equal scores keep
 * the incoming (similarity) order.
 */
export class LLMReranker implements RerankerProvider {
  readonly name: string;

  constructor(private readonly llm: LLMProvider) {
    this.name = `llm-reranker:${llm.model}`;
  }

  async rerank(
    query: string,
    candidates: RerankCandidate[],
    topK: number,
    signal?: AbortSignal
  ): Promise<RerankedCandidate[]> {
    if (candidates.length === 0 || topK <= 0) {
      return [];
    }

    const { scores } = await this.llm.complete({
      name: 'rerank',
      prompt: buildRerankPrompt(query, candidates),
      schema: RerankScoresSchema,
      signal,
      metadata: { task: 'rerank' },
    });

    const byIndex = new Map<number, number>();
    for (const entry of scores) {
      if (entry.index >= 1 && entry.index <= candidates.length) {
        byIndex.set(entry.index - 1, Math.min(1, Math.max(0, entry.score)));
      }
    }

    const scored = candidates.map((c, i) => ({ id: c.id, score: byIndex.get(i) ?? 0, order: i }));
    scored.sort((a, b) => b.score - a.score || a.order - b.order);

    return normalizeScores(scored.slice(0, topK).map(({ id, score }) => ({ id, score })));
  }
}

/**
 * Normalize scores to a meaningful 0-1 range.
 *
 * When scores have spread, min-max normalization is used. When they are
 * effectively identical (range < epsilon), rank-based scoring is used
 * instead: top result = 1.0, bottom = 0.5.
 */
export function normalizeScores(results: RerankedCandidate[]): RerankedCandidate[] {
  if (results.length <= 1) {
    return results.map((r) => ({ ...r, score: 1 }));
  }

  const scores = results.map((r) => r.score);
  const minScore = Math.min(...scores);
  const maxScore = Math.max(...scores);
  const range = maxScore - minScore;

  const EPSILON = 1e-6;
  if (range < EPSILON) {
    const n = results.length;
    return results.map((r, i) => ({
      ...r,
      score: 1 - (i / (n - 1)) * 0.5,
    }));
  }

  return results.map((r) => ({
    ...r,
    score: (r.score - minScore) / range,
  }));
}
