/**
 * Vector store types
 *
 * The store is an external collaborator: the pipeline only needs
 * namespaced upsert, similarity query and clear. SQLite and in-memory
 * implementations live beside this file.
 */

/** Half-open character range [start, end) in the document text */
export interface TextSpan {
  start: number;
  end: number;
}

/**
 * A chunk ready to be written: text, provenance and embedding.
 */
export interface StoredChunk {
  /** Content-derived id, stable across re-indexing */
  id: string;
  namespaceId: string;
  documentId: string;
  text: string;
  span: TextSpan;
  /** 1-based page number, when the document has pages */
  page?: number;
  embedding: number[];
}

/**
 * One similarity search result.
 */
export interface StoreHit {
  chunkId: string;
  namespaceId: string;
  documentId: string;
  text: string;
  span: TextSpan;
  page?: number;
  /** Cosine similarity in [-1, 1] */
  score: number;
}

export interface NamespaceInfo {
  namespaceId: string;
  chunkCount: number;
  documentCount: number;
}

/**
 * Namespaced vector store.
 *
 * `query` returns at most `k` hits, best first, one per chunk id.
 * `clear` removes every chunk of the namespace in one step and returns
 * how many were removed.
 */
export interface VectorStore {
  readonly name: string;
  upsert(namespaceId: string, chunks: StoredChunk[]): Promise<void>;
  query(namespaceId: string, vector: number[], k: number): Promise<StoreHit[]>;
  clear(namespaceId: string): Promise<number>;
  count(namespaceId: string): Promise<number>;
  listNamespaces(): Promise<NamespaceInfo[]>;
  /** Resolves when the store is reachable, rejects with StoreUnavailableError otherwise */
  ping(): Promise<void>;
  close(): void;
}
