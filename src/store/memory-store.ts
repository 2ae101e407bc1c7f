/**
 * In-memory vector store
 *
 * Same contract as SqliteVectorStore without persistence. Used by
 * `analyze --in-memory` and by tests.
 */

import { cosineSimilarity, topK } from './similarity.js';
import type { NamespaceInfo, StoredChunk, StoreHit, VectorStore } from './types.js';

export class InMemoryVectorStore implements VectorStore {
  readonly name = 'memory';
  private readonly namespaces = new Map<string, Map<string, StoredChunk>>();

  async upsert(namespaceId: string, chunks: StoredChunk[]): Promise<void> {
    let namespace = this.namespaces.get(namespaceId);
    if (!namespace) {
      namespace = new Map();
      this.namespaces.set(namespaceId, namespace);
    }
    for (const chunk of chunks) {
      namespace.set(chunk.id, { ...chunk, namespaceId, embedding: [...chunk.embedding] });
    }
  }

  async query(namespaceId: string, vector: number[], k: number): Promise<StoreHit[]> {
    const namespace = this.namespaces.get(namespaceId);
    if (!namespace) {
      return [];
    }

    const hits: StoreHit[] = [];
    for (const chunk of namespace.values()) {
      if (chunk.embedding.length !== vector.length) {
        continue;
      }
      hits.push({
        chunkId: chunk.id,
        namespaceId,
        documentId: chunk.documentId,
        text: chunk.text,
        span: { ...chunk.span },
        ...(chunk.page !== undefined && { page: chunk.page }),
        score: cosineSimilarity(vector, chunk.embedding),
      });
    }
    return topK(hits, k, (hit) => hit.chunkId);
  }

  async clear(namespaceId: string): Promise<number> {
    const removed = this.namespaces.get(namespaceId)?.size ?? 0;
    this.namespaces.delete(namespaceId);
    return removed;
  }

  async count(namespaceId: string): Promise<number> {
    return this.namespaces.get(namespaceId)?.size ?? 0;
  }

  async listNamespaces(): Promise<NamespaceInfo[]> {
    return [...this.namespaces.entries()]
      .filter(([, chunks]) => chunks.size > 0)
      .map(([namespaceId, chunks]) => ({
        namespaceId,
        chunkCount: chunks.size,
        documentCount: new Set([...chunks.values()].map((c) => c.documentId)).size,
      }))
      .sort((a, b) => (a.namespaceId < b.namespaceId ? -1 : a.namespaceId > b.namespaceId ? 1 : 0));
  }

  async ping(): Promise<void> {}

  close(): void {
    this.namespaces.clear();
  }
}
