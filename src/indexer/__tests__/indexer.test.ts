/**
 * DocumentIndexer tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DocumentIndexer, type IndexProgress } from '../indexer.js';
import { createDocument, type LoadedDocument } from '../../document/loader.js';
import { NamespaceManager, type NamespaceHandle } from '../../namespace/manager.js';
import { InMemoryVectorStore } from '../../store/memory-store.js';
import { HashingEmbedder } from '../../test-utils/fakes.js';
import {
  EmptyDocumentError,
  PermanentProviderError,
  TransientProviderError,
} from '../../errors/index.js';
import { OperationCancelledError } from '../../utils/async.js';

const SETTINGS = { chunkSize: 10, chunkOverlap: 3, embeddingBatchSize: 2 };

/**
 * Fails every call that includes a text containing `marker`.
 */
class FlakyEmbedder extends HashingEmbedder {
  constructor(
    private readonly marker: string,
    private readonly error: Error = new TransientProviderError('flaky', 'bad chunk')
  ) {
    super();
  }

  override async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.some((t) => t.includes(this.marker))) {
      this.calls.push([...texts]);
      throw this.error;
    }
    return super.embed(texts, signal);
  }
}

describe('DocumentIndexer', () => {
  let store: InMemoryVectorStore;
  let handle: NamespaceHandle;

  beforeEach(async () => {
    store = new InMemoryVectorStore();
    handle = await new NamespaceManager(store).acquire('session-1', 'isolated', 'ns');
  });

  it('embeds chunks in batches and writes them to the namespace', async () => {
    const embedder = new HashingEmbedder();
    const progress: IndexProgress[] = [];
    const indexer = new DocumentIndexer(embedder, SETTINGS, { onProgress: (p) => progress.push(p) });
    const doc = createDocument('abcdefghijklmnopqrstuvwxy');

    const result = await indexer.index(doc, handle);

    expect(result).toEqual({ namespaceId: 'ns', documentId: doc.documentId, chunkCount: 4, skipped: 0 });
    expect(embedder.calls).toEqual([
      ['abcdefghij', 'hijklmnopq'],
      ['opqrstuvwx', 'vwxy'],
    ]);
    expect(progress).toEqual([
      { embedded: 2, total: 4 },
      { embedded: 4, total: 4 },
    ]);
    expect(await store.count('ns')).toBe(4);
  });

  it('re-indexing the same document keeps the chunk count', async () => {
    const indexer = new DocumentIndexer(new HashingEmbedder(), SETTINGS);
    const doc = createDocument('abcdefghijklmnopqrstuvwxy');

    await indexer.index(doc, handle);
    await indexer.index(doc, handle);

    expect(await store.count('ns')).toBe(4);
  });

  it('retries a failed batch chunk by chunk and skips chunks that still fail', async () => {
    const embedder = new FlakyEmbedder('#');
    const logger = { warn: vi.fn(), debug: vi.fn() };
    const indexer = new DocumentIndexer(embedder, SETTINGS, { logger });
    const doc = createDocument('abcdefghij#lmnopqrstuvwxy');

    const result = await indexer.index(doc, handle);

    expect(result.chunkCount).toBe(3);
    expect(result.skipped).toBe(1);
    expect(embedder.calls).toEqual([
      ['abcdefghij', 'hij#lmnopq'],
      ['abcdefghij'],
      ['hij#lmnopq'],
      ['opqrstuvwx', 'vwxy'],
    ]);
    expect(logger.warn).toHaveBeenCalledWith('Skipping chunk 1: flaky: bad chunk');
    expect(await store.count('ns')).toBe(3);
  });

  it('fails when no chunk could be embedded', async () => {
    const indexer = new DocumentIndexer(new FlakyEmbedder('a'), SETTINGS);

    await expect(indexer.index(createDocument('aaaa'), handle)).rejects.toThrow(
      'hashing: no chunk could be embedded (flaky: bad chunk)'
    );
  });

  it('stops at once on a permanent provider error', async () => {
    const embedder = new FlakyEmbedder('#', new PermanentProviderError('flaky', 'invalid api key'));
    const indexer = new DocumentIndexer(embedder, SETTINGS);

    await expect(indexer.index(createDocument('abcdefghij#lmnopqrstuvwxy'), handle)).rejects.toBeInstanceOf(
      PermanentProviderError
    );
    expect(embedder.calls).toHaveLength(1);
    expect(await store.count('ns')).toBe(0);
  });

  it('rejects blank text without calling the embedder', async () => {
    const embedder = new HashingEmbedder();
    const indexer = new DocumentIndexer(embedder, SETTINGS);
    const blank: LoadedDocument = { documentId: 'blank', text: '  \n ', pageOffsets: [0] };

    await expect(indexer.index(blank, handle)).rejects.toBeInstanceOf(EmptyDocumentError);
    expect(embedder.calls).toHaveLength(0);
  });

  it('honours an aborted signal', async () => {
    const embedder = new HashingEmbedder();
    const indexer = new DocumentIndexer(embedder, SETTINGS);
    const controller = new AbortController();
    controller.abort();

    await expect(
      indexer.index(createDocument('abcdefghijklmnopqrstuvwxy'), handle, controller.signal)
    ).rejects.toBeInstanceOf(OperationCancelledError);
    expect(embedder.calls).toHaveLength(0);
  });
});
