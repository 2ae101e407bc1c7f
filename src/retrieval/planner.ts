/**
 * Retrieval Planner
 *
 * Turns one field query into a short, ordered evidence list:
 *
 * 1. Expansion: the LLM proposes paraphrases; the original query is always
 *    variant 0 and the total never exceeds `maxExpansions`
 * 2. Rounds: every active variant is searched, hits under
 *    `similarityThreshold` are dropped and the rest merged per chunk id
 *    (max score wins)
 * 3. Coverage: stop once a hit reaches `coverageThreshold`, or at
 *    `maxRetrievalRounds`. Later rounds widen k and add the field's
 *    alternate queries
 * 4. Reranking: the pool (capped at `rerankTopK`) is rescored and cut to
 *    `rerankFinalK`; without a reranker the similarity order is cut instead
 *
 * An empty result is a valid outcome (the field is not in the document).
 */

import { z } from 'zod';
import type { PipelineSettings } from '../config/settings.js';
import { errorMessage } from '../errors/handler.js';
import type { NamespaceHandle } from '../namespace/manager.js';
import type { EmbeddingProvider, LLMProvider, RerankerProvider } from '../providers/types.js';
import type { StoreHit } from '../store/types.js';
import { checkCancelled, OperationCancelledError } from '../utils/async.js';
import { silentLogger, type Logger } from '../utils/logger.js';

// ============================================================================
// TYPES
// ============================================================================

export type PlannerSettings = Pick<
  PipelineSettings,
  | 'retrievalK'
  | 'similarityThreshold'
  | 'enableReranking'
  | 'rerankTopK'
  | 'rerankFinalK'
  | 'enableQueryExpansion'
  | 'maxExpansions'
  | 'enableMultiRoundRetrieval'
  | 'maxRetrievalRounds'
  | 'coverageThreshold'
>;

export interface PlannerProviders {
  llm: LLMProvider;
  embedder: EmbeddingProvider;
  reranker: RerankerProvider | null;
}

/** What a field asks the planner for */
export interface FieldQuery {
  field: string;
  query: string;
  /** Extra queries tried from round 2 on, in order */
  alternates: readonly string[];
}

export interface RetrievalHit extends StoreHit {
  /** Normalized reranker score, when the reranker ran */
  rerankScore?: number;
}

export interface RetrievalResult {
  field: string;
  /** Best first, at most `rerankFinalK` long */
  hits: RetrievalHit[];
  /** Every query variant searched, original first */
  variants: string[];
  /** Rounds executed (1..maxRetrievalRounds) */
  rounds: number;
  /** Size of the merged pool offered to the reranker */
  candidatePool: number;
  reranked: boolean;
}

export interface RetrievalPlannerOptions {
  logger?: Logger;
}

// ============================================================================
// PROMPTS
// ============================================================================

const ExpansionSchema = z.object({
  queries: z.array(z.string()),
});

function buildExpansionPrompt(query: string, count: number): string {
  return `为了在招标文件中检索信息，请为下面的检索查询生成${count}个不同表述的查询，覆盖同一信息需求的不同说法（同义词、常见条款标题、相关术语）。

原始查询：${query}

请以JSON格式返回：{"queries": ["查询1", "查询2"]}`;
}

// ============================================================================
// PLANNER
// ============================================================================

export class RetrievalPlanner {
  private readonly llm: LLMProvider;
  private readonly embedder: EmbeddingProvider;
  private readonly reranker: RerankerProvider | null;
  private readonly logger: Logger;

  constructor(
    providers: PlannerProviders,
    private readonly settings: PlannerSettings,
    options: RetrievalPlannerOptions = {}
  ) {
    this.llm = providers.llm;
    this.embedder = providers.embedder;
    this.reranker = providers.reranker;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Expand a query into 1..maxExpansions variants, original first.
   *
   * Expansion failures degrade to `[query]`; only cancellation propagates.
   */
  async expand(query: string, signal?: AbortSignal): Promise<string[]> {
    const limit = Math.max(1, this.settings.maxExpansions);
    if (!this.settings.enableQueryExpansion || limit === 1) {
      return [query];
    }

    try {
      const { queries } = await this.llm.complete({
        name: 'query-expansion',
        prompt: buildExpansionPrompt(query, limit - 1),
        schema: ExpansionSchema,
        signal,
        metadata: { task: 'query-expansion' },
      });
      return uniqueVariants([query, ...queries]).slice(0, limit);
    } catch (error) {
      if (isCancellation(error, signal)) {
        throw error;
      }
      this.logger.warn(`Query expansion failed, using the original query: ${errorMessage(error)}`);
      return [query];
    }
  }

  /**
   * Retrieve and rank evidence for one field.
   *
   * Embedding and store failures propagate; the caller turns them into a
   * field failure. Reranker failures fall back to similarity order.
   */
  async retrieve(
    handle: NamespaceHandle,
    request: FieldQuery,
    signal?: AbortSignal
  ): Promise<RetrievalResult> {
    const maxRounds = this.settings.enableMultiRoundRetrieval
      ? Math.max(1, this.settings.maxRetrievalRounds)
      : 1;

    const variants = await this.expand(request.query, signal);
    const vectors = new Map<string, number[]>();
    const pool = new Map<string, StoreHit>();
    let rounds = 0;

    for (let round = 1; round <= maxRounds; round++) {
      checkCancelled(signal);
      rounds = round;

      const alternate = round > 1 ? request.alternates[round - 2]?.trim() : undefined;
      if (alternate && !variants.includes(alternate)) {
        variants.push(alternate);
      }

      await this.embedMissing(variants, vectors, signal);

      const k = this.settings.retrievalK * round;
      for (const variant of variants) {
        const vector = vectors.get(variant);
        if (!vector) continue;

        const hits = await handle.query(vector, k);
        for (const hit of hits) {
          if (hit.score < this.settings.similarityThreshold) continue;
          const existing = pool.get(hit.chunkId);
          if (!existing || hit.score > existing.score) {
            pool.set(hit.chunkId, hit);
          }
        }
      }

      if (this.covered(pool)) {
        break;
      }
    }

    const candidates = [...pool.values()].sort(byScore).slice(0, this.settings.rerankTopK);
    const { hits, reranked } = await this.rank(request.query, candidates, signal);

    this.logger.debug?.(
      `${request.field}: ${hits.length} hits from ${candidates.length} candidates ` +
        `(${variants.length} variants, ${rounds} rounds${reranked ? ', reranked' : ''})`
    );

    return {
      field: request.field,
      hits,
      variants: [...variants],
      rounds,
      candidatePool: candidates.length,
      reranked,
    };
  }

  private covered(pool: Map<string, StoreHit>): boolean {
    for (const hit of pool.values()) {
      if (hit.score >= this.settings.coverageThreshold) return true;
    }
    return false;
  }

  private async embedMissing(
    variants: string[],
    vectors: Map<string, number[]>,
    signal?: AbortSignal
  ): Promise<void> {
    const missing = variants.filter((v) => !vectors.has(v));
    if (missing.length === 0) return;

    const embedded = await this.embedder.embed(missing, signal);
    missing.forEach((variant, i) => {
      const vector = embedded[i];
      if (vector && vector.length > 0) {
        vectors.set(variant, vector);
      }
    });
  }

  /**
   * Cut the pool to `rerankFinalK`, through the reranker when there is one.
   * The result is always a subset of `candidates`.
   */
  private async rank(
    query: string,
    candidates: StoreHit[],
    signal?: AbortSignal
  ): Promise<{ hits: RetrievalHit[]; reranked: boolean }> {
    const finalK = this.settings.rerankFinalK;
    const fallback = { hits: candidates.slice(0, finalK), reranked: false };

    if (!this.settings.enableReranking || !this.reranker || candidates.length === 0) {
      return fallback;
    }

    try {
      const scored = await this.reranker.rerank(
        query,
        candidates.map((c) => ({ id: c.chunkId, text: c.text, score: c.score })),
        finalK,
        signal
      );

      const byId = new Map(candidates.map((c) => [c.chunkId, c]));
      const seen = new Set<string>();
      const hits: RetrievalHit[] = [];
      for (const { id, score } of scored) {
        const hit = byId.get(id);
        if (!hit || seen.has(id)) continue;
        seen.add(id);
        hits.push({ ...hit, rerankScore: score });
        if (hits.length === finalK) break;
      }
      return { hits, reranked: true };
    } catch (error) {
      if (isCancellation(error, signal)) {
        throw error;
      }
      this.logger.warn(`Reranking failed, keeping similarity order: ${errorMessage(error)}`);
      return fallback;
    }
  }
}

// ============================================================================
// HELPERS
// ============================================================================

function byScore(a: StoreHit, b: StoreHit): number {
  return b.score - a.score || (a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0);
}

function uniqueVariants(queries: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of queries) {
    const query = raw.trim();
    if (query && !seen.has(query)) {
      seen.add(query);
      result.push(query);
    }
  }
  return result;
}

function isCancellation(error: unknown, signal?: AbortSignal): boolean {
  return error instanceof OperationCancelledError || signal?.aborted === true;
}
