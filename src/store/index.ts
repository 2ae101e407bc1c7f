/**
 * Vector store module
 */

export type { VectorStore, StoredChunk, StoreHit, TextSpan, NamespaceInfo } from './types.js';
export { SqliteVectorStore, type SqliteVectorStoreOptions } from './sqlite-store.js';
export { InMemoryVectorStore } from './memory-store.js';
export { cosineSimilarity, topK } from './similarity.js';
