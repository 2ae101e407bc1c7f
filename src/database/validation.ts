/**
 * Database Row Validation
 *
 * Zod schemas for validating database reads at runtime.
 * better-sqlite3 returns `unknown` rows; these schemas turn them into
 * typed values or fail loudly on schema drift.
 *
 * Usage:
 * ```ts
 * const rows = db.prepare('SELECT * FROM chunks WHERE namespace_id = ?').all(ns);
 * return validateRows(ChunkRowSchema, rows, `chunks.namespace_id=${ns}`);
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { CLIError } from '../errors/types.js';

// ============================================================================
// Chunk Schema
// ============================================================================

/**
 * Zod schema for chunk rows read back for similarity scoring.
 *
 * `embedding` is a Buffer (BLOB); the Float32Array conversion happens
 * in the store.
 */
export const ChunkRowSchema = z.object({
  id: z.string(),
  namespace_id: z.string(),
  document_id: z.string(),
  content: z.string(),
  embedding: z.instanceof(Buffer),
  start_offset: z.number().int().nonnegative(),
  end_offset: z.number().int().nonnegative(),
  page: z.number().int().positive().nullable(),
});

export type ChunkRow = z.infer<typeof ChunkRowSchema>;

// ============================================================================
// Aggregate Schemas
// ============================================================================

export const NamespaceStatsRowSchema = z.object({
  namespace_id: z.string(),
  chunk_count: z.number().int().nonnegative(),
  document_count: z.number().int().nonnegative(),
});

export type NamespaceStatsRow = z.infer<typeof NamespaceStatsRowSchema>;

export const CountRowSchema = z.object({
  count: z.number().int().nonnegative(),
});

export const MigrationRowSchema = z.object({
  name: z.string(),
  applied_at: z.string(),
});

// ============================================================================
// Schema Validation Error
// ============================================================================

/**
 * Thrown when a database row fails Zod schema validation.
 *
 * Indicates schema drift: a failed migration, a manual edit, or a store
 * written by a different version.
 *
 * Exit code 5: Database error (same as DatabaseError)
 */
export class SchemaValidationError extends CLIError {
  /** Individual validation issues from Zod */
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const formattedIssues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));

    const issuesSummary = formattedIssues
      .slice(0, 3)
      .map((i) => `  - ${i.path}: ${i.message}`)
      .join('\n');

    const hint =
      `Schema validation failed:\n${issuesSummary}` +
      (formattedIssues.length > 3 ? `\n  ... and ${formattedIssues.length - 3} more` : '') +
      `\n\nThe store may have been written by another version.\n` +
      `Try: tender-insight namespaces clear <id>  and re-run the analysis`;

    super(message, hint, 5);
    this.name = 'SchemaValidationError';
    this.issues = formattedIssues;
  }
}

// ============================================================================
// Validation Utilities
// ============================================================================

/**
 * Validate a single database row against a Zod schema.
 *
 * @param context - Context string for error messages (e.g., "chunks.id=abc")
 * @throws SchemaValidationError if validation fails
 */
export function validateRow<T extends z.ZodSchema>(
  schema: T,
  row: unknown,
  context: string
): z.output<T> {
  const result = schema.safeParse(row);

  if (result.success) {
    return result.data;
  }

  throw new SchemaValidationError(`Database schema mismatch in ${context}`, result.error.issues);
}

/**
 * Validate an array of database rows against a Zod schema.
 * Throws on the first invalid row.
 */
export function validateRows<T extends z.ZodSchema>(
  schema: T,
  rows: unknown[],
  context: string
): z.output<T>[] {
  return rows.map((row, i) => {
    const result = schema.safeParse(row);
    if (!result.success) {
      throw new SchemaValidationError(
        `Database schema mismatch in ${context}[${i}]`,
        result.error.issues
      );
    }
    return result.data;
  });
}
