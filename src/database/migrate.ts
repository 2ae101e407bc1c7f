/**
 * Database Migration Runner
 *
 * Applies SQL migrations in order, tracking which have been applied.
 * Migrations are idempotent - safe to run multiple times.
 */

import type Database from 'better-sqlite3';
import { errorMessage } from '../errors/handler.js';
import { MigrationRowSchema, validateRows } from './validation.js';

// ============================================================================
// Migration Result Type
// ============================================================================

/**
 * Result of running migrations.
 *
 * Provides explicit success/failure information instead of throwing.
 */
export interface MigrationResult {
  /** Names of migrations that were successfully applied */
  applied: string[];
  /** Migrations that failed with their error messages */
  failed: Array<{ name: string; error: string }>;
}

// ============================================================================
// Embedded Migrations
// ============================================================================

// SQL is embedded as strings so the built package needs no .sql files
const MIGRATIONS: Array<{ name: string; sql: string }> = [
  {
    name: '001-chunks.sql',
    sql: `
-- Migration 001: Chunk store
-- One row per (namespace, chunk). Chunk ids are content-derived, so
-- re-indexing a document overwrites its rows instead of duplicating them.

CREATE TABLE IF NOT EXISTS chunks (
  namespace_id TEXT NOT NULL,
  id TEXT NOT NULL,
  document_id TEXT NOT NULL,
  content TEXT NOT NULL,
  embedding BLOB NOT NULL,
  start_offset INTEGER NOT NULL,
  end_offset INTEGER NOT NULL,
  page INTEGER,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  PRIMARY KEY (namespace_id, id)
);

CREATE INDEX IF NOT EXISTS idx_chunks_document ON chunks(namespace_id, document_id);

-- Migrations Tracking Table
CREATE TABLE IF NOT EXISTS _migrations (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT UNIQUE NOT NULL,
  applied_at TEXT NOT NULL DEFAULT (datetime('now'))
);
    `.trim(),
  },
  {
    name: '002-embedding-model.sql',
    sql: `
-- Migration 002: Record the embedding model per chunk
-- Vectors from different models are not comparable; queries filter on it.
ALTER TABLE chunks ADD COLUMN embedding_model TEXT;
    `.trim(),
  },
];

/**
 * Run all pending migrations against `db`.
 *
 * Failed migrations do not stop subsequent migrations from being attempted.
 *
 * @example
 * ```ts
 * const result = runMigrations(db);
 * if (result.failed.length > 0) {
 *   throw new DatabaseError(`Migration failed: ${result.failed[0].error}`);
 * }
 * ```
 */
export function runMigrations(db: Database.Database): MigrationResult {
  const applied: string[] = [];
  const failed: Array<{ name: string; error: string }> = [];

  // Ensure migrations table exists (bootstrap)
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const appliedMigrations = new Set(getAppliedMigrations(db).map((m) => m.name));

  for (const migration of MIGRATIONS) {
    if (appliedMigrations.has(migration.name)) {
      continue;
    }

    try {
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
      })();

      applied.push(migration.name);
      appliedMigrations.add(migration.name);
    } catch (error) {
      failed.push({ name: migration.name, error: errorMessage(error) });
    }
  }

  return { applied, failed };
}

/**
 * Get list of applied migrations, oldest first.
 */
export function getAppliedMigrations(
  db: Database.Database
): Array<{ name: string; applied_at: string }> {
  const tableExists = db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='_migrations'")
    .get();

  if (!tableExists) {
    return [];
  }

  return validateRows(
    MigrationRowSchema,
    db.prepare('SELECT name, applied_at FROM _migrations ORDER BY id').all(),
    '_migrations'
  );
}

/**
 * Get count of available migrations.
 */
export function getMigrationCount(): number {
  return MIGRATIONS.length;
}
