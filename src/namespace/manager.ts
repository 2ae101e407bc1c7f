/**
 * Namespace Manager
 *
 * Owns the lifecycle of retrieval namespaces:
 * - isolated: every chunk under the namespace is removed when it is acquired
 * - cumulative: chunks from earlier sessions stay queryable
 *
 * Each namespace has a read/write lock. The isolated-mode clear holds it
 * exclusively; upserts and queries through a handle share it. A clear can
 * therefore never interleave with indexing or retrieval on the same
 * namespace.
 */

import type { IsolationMode } from '../config/schema.js';
import { CLIError, StoreUnavailableError } from '../errors/index.js';
import { ReadWriteLock } from '../utils/concurrency.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import type { StoredChunk, StoreHit, VectorStore } from '../store/types.js';

/**
 * Access to one namespace for the duration of a session.
 */
export interface NamespaceHandle {
  readonly namespaceId: string;
  readonly sessionId: string;
  readonly mode: IsolationMode;
  /** Chunks removed by the isolated-mode clear (0 for cumulative) */
  readonly cleared: number;
  upsert(chunks: StoredChunk[]): Promise<void>;
  query(vector: number[], k: number): Promise<StoreHit[]>;
  count(): Promise<number>;
}

export interface NamespaceManagerOptions {
  logger?: Logger;
}

interface LockEntry {
  lock: ReadWriteLock;
  /** Handles acquired and not yet released */
  holders: number;
}

export class NamespaceManager {
  private readonly locks = new Map<string, LockEntry>();
  private readonly logger: Logger;

  constructor(
    private readonly store: VectorStore,
    options: NamespaceManagerOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Acquire a namespace for a session.
   *
   * In isolated mode the namespace is cleared before this resolves.
   * The namespace id defaults to the session id.
   *
   * @throws StoreUnavailableError when the store cannot be reached
   */
  async acquire(
    sessionId: string,
    mode: IsolationMode,
    namespaceId: string = sessionId
  ): Promise<NamespaceHandle> {
    const entry = this.entryFor(namespaceId);
    const { lock } = entry;
    entry.holders++;

    let cleared = 0;
    try {
      await this.call('ping', () => this.store.ping());
      if (mode === 'isolated') {
        cleared = await lock.exclusive(() => this.call('clear', () => this.store.clear(namespaceId)));
        this.logger.debug?.(`Cleared ${cleared} chunks from namespace "${namespaceId}"`);
      }
    } catch (error) {
      this.drop(namespaceId);
      throw error;
    }

    return {
      namespaceId,
      sessionId,
      mode,
      cleared,
      upsert: (chunks) =>
        lock.shared(() => this.call('upsert', () => this.store.upsert(namespaceId, chunks))),
      query: (vector, k) =>
        lock.shared(() => this.call('query', () => this.store.query(namespaceId, vector, k))),
      count: () => lock.shared(() => this.call('count', () => this.store.count(namespaceId))),
    };
  }

  /**
   * Release a handle. Data stays in the store: isolated namespaces are
   * cleared on their next acquire, not here.
   */
  release(handle: NamespaceHandle): void {
    this.drop(handle.namespaceId);
    this.logger.debug?.(
      `Released namespace "${handle.namespaceId}" (${handle.mode}, session ${handle.sessionId})`
    );
  }

  /** Namespaces with a lock currently tracked */
  get lockCount(): number {
    return this.locks.size;
  }

  private entryFor(namespaceId: string): LockEntry {
    let entry = this.locks.get(namespaceId);
    if (!entry) {
      entry = { lock: new ReadWriteLock(), holders: 0 };
      this.locks.set(namespaceId, entry);
    }
    return entry;
  }

  /**
   * Give up one hold on a namespace. The lock is forgotten once no handle
   * holds it and no call is queued on it.
   */
  private drop(namespaceId: string): void {
    const entry = this.locks.get(namespaceId);
    if (!entry) {
      return;
    }
    entry.holders = Math.max(0, entry.holders - 1);
    if (entry.holders === 0 && !entry.lock.busy) {
      this.locks.delete(namespaceId);
    }
  }

  /**
   * Run a store call, reporting anything that is not already a
   * user-facing error as StoreUnavailableError.
   */
  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof CLIError) {
        throw error;
      }
      const cause = error instanceof Error ? error : undefined;
      throw new StoreUnavailableError(
        `Vector store ${operation} failed${cause ? `: ${cause.message}` : ''}`,
        cause
      );
    }
  }
}
