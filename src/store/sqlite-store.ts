/**
 * SQLite vector store
 *
 * Chunks live in the `chunks` table keyed by (namespace_id, id), with
 * Float32 embeddings as BLOBs. Queries scan the namespace and score each
 * row by cosine similarity.
 *
 * Every driver failure is rethrown as StoreUnavailableError, which the
 * orchestrator treats as fatal.
 */

import type Database from 'better-sqlite3';
import { openDatabase } from '../database/connection.js';
import { runMigrations } from '../database/migrate.js';
import { blobToEmbedding, embeddingToBlob } from '../database/schema.js';
import {
  ChunkRowSchema,
  CountRowSchema,
  NamespaceStatsRowSchema,
  SchemaValidationError,
  validateRow,
  validateRows,
} from '../database/validation.js';
import { StoreUnavailableError } from '../errors/index.js';
import { cosineSimilarity, topK } from './similarity.js';
import type { NamespaceInfo, StoredChunk, StoreHit, VectorStore } from './types.js';

export interface SqliteVectorStoreOptions {
  /** Embedding model recorded with each chunk; queries only score matching rows */
  embeddingModel?: string;
}

/**
 * VectorStore backed by a better-sqlite3 connection.
 *
 * @example
 * ```ts
 * const store = SqliteVectorStore.open('~/.tender-insight/vectors.db');
 * await store.upsert('default', chunks);
 * const hits = await store.query('default', queryVector, 5);
 * ```
 */
export class SqliteVectorStore implements VectorStore {
  readonly name = 'sqlite';
  private readonly embeddingModel: string | null;

  constructor(
    private readonly db: Database.Database,
    options: SqliteVectorStoreOptions = {}
  ) {
    this.embeddingModel = options.embeddingModel ?? null;
  }

  /**
   * Open (or create) a store file and apply migrations.
   *
   * @throws StoreUnavailableError when the file cannot be opened or migrated
   */
  static open(path: string, options: SqliteVectorStoreOptions = {}): SqliteVectorStore {
    let db: Database.Database;
    try {
      db = openDatabase(path);
    } catch (error) {
      throw storeError(`Cannot open vector store at ${path}`, error);
    }

    const result = runMigrations(db);
    const failure = result.failed[0];
    if (failure) {
      db.close();
      throw new StoreUnavailableError(`Store migration ${failure.name} failed: ${failure.error}`);
    }
    return new SqliteVectorStore(db, options);
  }

  async upsert(namespaceId: string, chunks: StoredChunk[]): Promise<void> {
    if (chunks.length === 0) {
      return;
    }

    this.guard('upsert', () => {
      const insert = this.db.prepare(`
        INSERT OR REPLACE INTO chunks
          (namespace_id, id, document_id, content, embedding, start_offset, end_offset, page, embedding_model)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `);

      this.db.transaction((rows: StoredChunk[]) => {
        for (const chunk of rows) {
          insert.run(
            namespaceId,
            chunk.id,
            chunk.documentId,
            chunk.text,
            embeddingToBlob(chunk.embedding),
            chunk.span.start,
            chunk.span.end,
            chunk.page ?? null,
            this.embeddingModel
          );
        }
      })(chunks);
    });
  }

  async query(namespaceId: string, vector: number[], k: number): Promise<StoreHit[]> {
    const rows = this.guard('query', () => {
      const sql = this.embeddingModel
        ? `SELECT id, namespace_id, document_id, content, embedding, start_offset, end_offset, page
           FROM chunks WHERE namespace_id = ? AND (embedding_model IS NULL OR embedding_model = ?)`
        : `SELECT id, namespace_id, document_id, content, embedding, start_offset, end_offset, page
           FROM chunks WHERE namespace_id = ?`;
      const stmt = this.db.prepare(sql);
      return this.embeddingModel ? stmt.all(namespaceId, this.embeddingModel) : stmt.all(namespaceId);
    });

    const hits: StoreHit[] = [];
    for (const row of validateRows(ChunkRowSchema, rows, `chunks.namespace_id=${namespaceId}`)) {
      const embedding = blobToEmbedding(row.embedding);
      if (embedding.length !== vector.length) {
        continue;
      }
      hits.push({
        chunkId: row.id,
        namespaceId: row.namespace_id,
        documentId: row.document_id,
        text: row.content,
        span: { start: row.start_offset, end: row.end_offset },
        ...(row.page !== null && { page: row.page }),
        score: cosineSimilarity(vector, embedding),
      });
    }

    return topK(hits, k, (hit) => hit.chunkId);
  }

  async clear(namespaceId: string): Promise<number> {
    return this.guard('clear', () => {
      return this.db.prepare('DELETE FROM chunks WHERE namespace_id = ?').run(namespaceId).changes;
    });
  }

  async count(namespaceId: string): Promise<number> {
    const row = this.guard('count', () =>
      this.db.prepare('SELECT COUNT(*) AS count FROM chunks WHERE namespace_id = ?').get(namespaceId)
    );
    return validateRow(CountRowSchema, row, `chunks.count(${namespaceId})`).count;
  }

  async listNamespaces(): Promise<NamespaceInfo[]> {
    const rows = this.guard('listNamespaces', () =>
      this.db
        .prepare(
          `SELECT namespace_id, COUNT(*) AS chunk_count, COUNT(DISTINCT document_id) AS document_count
           FROM chunks GROUP BY namespace_id ORDER BY namespace_id`
        )
        .all()
    );

    return validateRows(NamespaceStatsRowSchema, rows, 'chunks.namespaces').map((row) => ({
      namespaceId: row.namespace_id,
      chunkCount: row.chunk_count,
      documentCount: row.document_count,
    }));
  }

  async ping(): Promise<void> {
    this.guard('ping', () => this.db.prepare('SELECT 1').get());
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  /**
   * Run a driver call, mapping failures to StoreUnavailableError.
   */
  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof SchemaValidationError || error instanceof StoreUnavailableError) {
        throw error;
      }
      throw storeError(`Vector store ${operation} failed`, error);
    }
  }
}

function storeError(message: string, error: unknown): StoreUnavailableError {
  const cause = error instanceof Error ? error : undefined;
  return new StoreUnavailableError(cause ? `${message}: ${cause.message}` : message, cause);
}
