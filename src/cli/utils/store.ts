/**
 * Opens the vector store a command works against.
 */

import { resolve } from 'node:path';
import { homedir } from 'node:os';
import type { Config } from '../../config/schema.js';
import { getDefaultStorePath } from '../../config/paths.js';
import { InMemoryVectorStore, SqliteVectorStore, type VectorStore } from '../../store/index.js';

export interface OpenStoreOptions {
  /** Use a process-local store that is discarded on exit */
  inMemory?: boolean;
}

/**
 * Resolve the configured store file, expanding a leading `~`.
 */
export function resolveStorePath(config: Config): string {
  const configured = config.store.path;
  if (!configured) {
    return getDefaultStorePath();
  }
  if (configured === '~' || configured.startsWith('~/')) {
    return resolve(homedir(), configured.slice(2));
  }
  return resolve(configured);
}

/**
 * @throws StoreUnavailableError when the SQLite file cannot be opened
 */
export function openStore(config: Config, options: OpenStoreOptions = {}): VectorStore {
  if (options.inMemory) {
    return new InMemoryVectorStore();
  }
  return SqliteVectorStore.open(resolveStorePath(config), {
    embeddingModel: config.embedding.model,
  });
}
