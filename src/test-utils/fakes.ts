/**
 * Deterministic in-process providers for tests.
 *
 * No test talks to a real embedding, chat or reranking endpoint; these
 * fakes implement the same capability interfaces and record every call.
 */

import { TransientProviderError } from '../errors/index.js';
import type {
  CompletionRequest,
  EmbeddingProvider,
  LLMProvider,
  RerankCandidate,
  RerankedCandidate,
  RerankerProvider,
} from '../providers/types.js';
import { checkCancelled } from '../utils/async.js';

// ============================================================================
// EMBEDDER
// ============================================================================

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

function fnv1a(text: string): number {
  let hash = FNV_OFFSET;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash;
}

/**
 * Bag of character unigrams and bigrams hashed into a fixed number of
 * buckets, L2-normalized. Identical texts embed identically and texts
 * sharing many characters score high.
 */
export function hashEmbedding(text: string, dimensions = 64): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  const chars = Array.from(text).filter((c) => c.trim() !== '');

  const bump = (gram: string): void => {
    const bucket = fnv1a(gram) % dimensions;
    vector[bucket] = (vector[bucket] ?? 0) + 1;
  };

  chars.forEach((char, i) => {
    bump(char);
    const next = chars[i + 1];
    if (next !== undefined) {
      bump(char + next);
    }
  });

  const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  return norm === 0 ? vector : vector.map((v) => v / norm);
}

export class HashingEmbedder implements EmbeddingProvider {
  readonly name = 'hashing';
  readonly model: string;
  /** Texts of every embed() call, in order */
  readonly calls: string[][] = [];

  constructor(private readonly dimensions = 64) {
    this.model = `hashing-${dimensions}`;
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    checkCancelled(signal);
    this.calls.push([...texts]);
    return texts.map((t) => hashEmbedding(t, this.dimensions));
  }
}

// ============================================================================
// LLM
// ============================================================================

export interface ScriptedCall {
  name: string;
  prompt: string;
  system?: string;
  metadata: Record<string, string>;
  signal?: AbortSignal;
}

/** Produces the raw (pre-validation) output for a call, or throws */
export type Script = (call: ScriptedCall) => unknown;

/**
 * LLM whose replies come from a script function. Output is validated
 * against the request schema like a real provider's, so a script that
 * returns the wrong shape produces TransientProviderError.
 */
export class ScriptedLLM implements LLMProvider {
  readonly name = 'scripted';
  readonly model = 'scripted-model';
  readonly calls: ScriptedCall[] = [];

  constructor(private readonly script: Script) {}

  async complete<T>(request: CompletionRequest<T>): Promise<T> {
    checkCancelled(request.signal);
    const call: ScriptedCall = {
      name: request.name,
      prompt: request.prompt,
      system: request.system,
      metadata: request.metadata ?? {},
      signal: request.signal,
    };
    this.calls.push(call);

    const raw = await this.script(call);
    const parsed = request.schema.safeParse(raw);
    if (!parsed.success) {
      throw new TransientProviderError(this.name, `${request.name}: malformed output`);
    }
    return parsed.data;
  }

  /** Calls whose metadata carries `key=value` */
  callsWhere(key: string, value: string): ScriptedCall[] {
    return this.calls.filter((c) => c.metadata[key] === value);
  }
}

// ============================================================================
// RERANKER
// ============================================================================

/**
 * Reranker driven by a scoring function; defaults to reversing the
 * incoming order so tests can tell reranked output apart.
 */
export class FakeReranker implements RerankerProvider {
  readonly name = 'fake-reranker';
  readonly calls: Array<{ query: string; candidates: RerankCandidate[]; topK: number }> = [];

  constructor(
    private readonly score: (query: string, candidate: RerankCandidate, index: number) => number = (
      _query,
      _candidate,
      index
    ) => index
  ) {}

  async rerank(
    query: string,
    candidates: RerankCandidate[],
    topK: number,
    signal?: AbortSignal
  ): Promise<RerankedCandidate[]> {
    checkCancelled(signal);
    this.calls.push({ query, candidates: [...candidates], topK });
    return candidates
      .map((c, i) => ({ id: c.id, score: this.score(query, c, i) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, topK);
  }
}
