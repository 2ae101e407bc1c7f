/**
 * Indexer Module
 *
 * Document chunking and namespace indexing.
 */

export { chunkDocument, chunkId, type ChunkOptions, type TextChunk } from './chunker.js';
export {
  DocumentIndexer,
  type IndexerSettings,
  type IndexerOptions,
  type IndexProgress,
  type IndexResult,
} from './indexer.js';
