/**
 * Database Connection Module
 *
 * Opens SQLite databases with better-sqlite3. Each store owns its
 * connection.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

/** Path that opens a private in-memory database */
export const IN_MEMORY_PATH = ':memory:';

/**
 * Open a database file with the store's pragmas applied.
 *
 * Creates the parent directory when needed. Pass ':memory:' for a
 * throwaway database (tests).
 */
export function openDatabase(path: string): Database.Database {
  if (path !== IN_MEMORY_PATH) {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const connection = new Database(path);

  // WAL mode for concurrent readers while a run writes
  if (path !== IN_MEMORY_PATH) {
    connection.pragma('journal_mode = WAL');
  }
  connection.pragma('foreign_keys = ON');

  return connection;
}
