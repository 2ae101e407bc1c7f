/**
 * Document Indexer
 *
 * Chunks a document, embeds the chunks in batches and upserts them into
 * a namespace.
 *
 * Key behaviours:
 * 1. Blank documents fail with EmptyDocumentError before any embedding call
 * 2. Batches of `embeddingBatchSize` texts per embedding call
 * 3. A failed batch is retried chunk by chunk; chunks that still fail are
 *    skipped and reported
 * 4. Permanent provider errors and cancellation stop indexing at once
 */

import type { PipelineSettings } from '../config/settings.js';
import type { LoadedDocument } from '../document/loader.js';
import {
  EmptyDocumentError,
  PermanentProviderError,
  TransientProviderError,
} from '../errors/index.js';
import { errorMessage } from '../errors/handler.js';
import type { NamespaceHandle } from '../namespace/manager.js';
import type { EmbeddingProvider } from '../providers/types.js';
import type { StoredChunk } from '../store/types.js';
import { checkCancelled, OperationCancelledError, yieldToEventLoop } from '../utils/async.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { chunkDocument, type TextChunk } from './chunker.js';

export type IndexerSettings = Pick<
  PipelineSettings,
  'chunkSize' | 'chunkOverlap' | 'embeddingBatchSize'
>;

export interface IndexProgress {
  embedded: number;
  total: number;
}

export interface IndexerOptions {
  logger?: Logger;
  onProgress?: (progress: IndexProgress) => void;
}

export interface IndexResult {
  namespaceId: string;
  documentId: string;
  /** Chunks written to the namespace */
  chunkCount: number;
  /** Chunks dropped because their embedding failed */
  skipped: number;
}

export class DocumentIndexer {
  private readonly logger: Logger;
  private readonly onProgress?: (progress: IndexProgress) => void;

  constructor(
    private readonly embedder: EmbeddingProvider,
    private readonly settings: IndexerSettings,
    options: IndexerOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.onProgress = options.onProgress;
  }

  /**
   * Index `document` into the namespace behind `handle`.
   *
   * @throws EmptyDocumentError for blank text (no provider call is made)
   * @throws TransientProviderError when no chunk could be embedded
   */
  async index(
    document: LoadedDocument,
    handle: NamespaceHandle,
    signal?: AbortSignal
  ): Promise<IndexResult> {
    if (document.text.trim().length === 0) {
      throw new EmptyDocumentError(document.source);
    }

    const chunks = chunkDocument(document, this.settings);
    if (chunks.length === 0) {
      throw new EmptyDocumentError(document.source);
    }

    const batchSize = Math.max(1, this.settings.embeddingBatchSize);
    let written = 0;
    let skipped = 0;
    let lastFailure: unknown;

    for (let i = 0; i < chunks.length; i += batchSize) {
      checkCancelled(signal);

      const batch = chunks.slice(i, i + batchSize);
      const embedded = await this.embedBatch(batch, signal, (chunk, error) => {
        skipped++;
        lastFailure = error;
        this.logger.warn(`Skipping chunk ${chunk.index}: ${errorMessage(error)}`);
      });

      if (embedded.length > 0) {
        await handle.upsert(embedded.map((e) => toStoredChunk(e.chunk, e.embedding, handle)));
        written += embedded.length;
      }

      this.onProgress?.({ embedded: Math.min(i + batch.length, chunks.length), total: chunks.length });
      await yieldToEventLoop();
    }

    if (written === 0) {
      throw new TransientProviderError(
        this.embedder.name,
        `no chunk could be embedded (${errorMessage(lastFailure)})`,
        { cause: lastFailure }
      );
    }

    this.logger.debug?.(
      `Indexed ${written} chunks into "${handle.namespaceId}"${skipped ? `, skipped ${skipped}` : ''}`
    );

    return {
      namespaceId: handle.namespaceId,
      documentId: document.documentId,
      chunkCount: written,
      skipped,
    };
  }

  /**
   * Embed a batch; on failure fall back to one call per chunk.
   */
  private async embedBatch(
    batch: TextChunk[],
    signal: AbortSignal | undefined,
    onSkip: (chunk: TextChunk, error: unknown) => void
  ): Promise<Array<{ chunk: TextChunk; embedding: number[] }>> {
    try {
      const vectors = await this.embedder.embed(batch.map((c) => c.text), signal);
      return pairWithVectors(batch, vectors, onSkip);
    } catch (error) {
      if (isFatal(error)) throw error;
      if (batch.length === 1) {
        batch.forEach((chunk) => onSkip(chunk, error));
        return [];
      }
      this.logger.debug?.(`Batch embedding failed, retrying chunk by chunk: ${errorMessage(error)}`);
    }

    const results: Array<{ chunk: TextChunk; embedding: number[] }> = [];
    for (const chunk of batch) {
      checkCancelled(signal);
      try {
        const vectors = await this.embedder.embed([chunk.text], signal);
        results.push(...pairWithVectors([chunk], vectors, onSkip));
      } catch (error) {
        if (isFatal(error)) throw error;
        onSkip(chunk, error);
      }
    }
    return results;
  }
}

function isFatal(error: unknown): boolean {
  return error instanceof PermanentProviderError || error instanceof OperationCancelledError;
}

function pairWithVectors(
  batch: TextChunk[],
  vectors: number[][],
  onSkip: (chunk: TextChunk, error: unknown) => void
): Array<{ chunk: TextChunk; embedding: number[] }> {
  const paired: Array<{ chunk: TextChunk; embedding: number[] }> = [];
  batch.forEach((chunk, i) => {
    const embedding = vectors[i];
    if (!embedding || embedding.length === 0) {
      onSkip(chunk, new Error('empty embedding returned'));
      return;
    }
    paired.push({ chunk, embedding });
  });
  return paired;
}

function toStoredChunk(chunk: TextChunk, embedding: number[], handle: NamespaceHandle): StoredChunk {
  return {
    id: chunk.id,
    namespaceId: handle.namespaceId,
    documentId: chunk.documentId,
    text: chunk.text,
    span: chunk.span,
    ...(chunk.page !== undefined && { page: chunk.page }),
    embedding,
  };
}
