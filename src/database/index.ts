/**
 * Database Module
 *
 * SQLite storage for document chunks.
 *
 * @example
 * ```ts
 * import { openDatabase, runMigrations } from './database/index.js';
 *
 * const db = openDatabase(path);
 * runMigrations(db);
 * ```
 */

// Connection management
export { openDatabase, IN_MEMORY_PATH } from './connection.js';

// Migration utilities
export {
  runMigrations,
  getAppliedMigrations,
  getMigrationCount,
  type MigrationResult,
} from './migrate.js';

// Embedding encoding
export { embeddingToBlob, blobToEmbedding } from './schema.js';

// Validation schemas and utilities
export {
  ChunkRowSchema,
  NamespaceStatsRowSchema,
  CountRowSchema,
  MigrationRowSchema,
  type ChunkRow,
  type NamespaceStatsRow,
  SchemaValidationError,
  validateRow,
  validateRows,
} from './validation.js';
