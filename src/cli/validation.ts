/**
 * Zod validation schemas for CLI inputs
 *
 * Commander.js parses arguments, then these schemas coerce types,
 * apply defaults and produce readable messages.
 */

import { z } from 'zod';
import { IsolationModeSchema } from '../config/schema.js';

// ============================================================================
// GLOBAL OPTIONS SCHEMA
// ============================================================================

export const GlobalOptionsSchema = z.object({
  verbose: z.boolean().default(false),
  json: z.boolean().default(false),
});

export type GlobalOptionsInput = z.input<typeof GlobalOptionsSchema>;
export type GlobalOptionsOutput = z.output<typeof GlobalOptionsSchema>;

// ============================================================================
// NAMESPACE ID
// ============================================================================

export const NamespaceIdSchema = z
  .string()
  .min(1, 'Namespace cannot be empty')
  .max(100, 'Namespace too long (max 100 chars)')
  .regex(/^[\w.-]+$/, 'Namespace can only contain letters, numbers, dots, hyphens, and underscores');

// ============================================================================
// ANALYZE COMMAND SCHEMA
// ============================================================================

export const AnalyzeOptionsSchema = z.object({
  namespace: NamespaceIdSchema.optional(),
  mode: IsolationModeSchema.optional(),
  timeout: z
    .string()
    .transform((val) => Number(val))
    .refine((val) => Number.isInteger(val) && val >= 1, {
      message: 'timeout must be a whole number of seconds (at least 1)',
    })
    .optional(),
  output: z.string().min(1, 'Output directory cannot be empty').optional(),
  inMemory: z.boolean().default(false),
  save: z.boolean().default(true),
});

export type AnalyzeOptions = z.output<typeof AnalyzeOptionsSchema>;

export const AnalyzeArgsSchema = z.object({
  file: z.string().min(1, 'File path is required'),
});

// ============================================================================
// VALIDATION HELPER
// ============================================================================

/**
 * Validate input with a Zod schema and return a formatted error message
 * if validation fails.
 *
 * @example
 * ```typescript
 * const result = validateInput(AnalyzeOptionsSchema, options);
 * if (!result.success) {
 *   throw new ValidationError(result.error);
 * }
 * const validOptions = result.data;
 * ```
 */
export function validateInput<T extends z.ZodSchema>(
  schema: T,
  input: unknown
): { success: true; data: z.output<T> } | { success: false; error: string } {
  const result = schema.safeParse(input);

  if (result.success) {
    return { success: true, data: result.data };
  }

  const errors = result.error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${path}${issue.message}`;
    })
    .join('\n  ');

  return { success: false, error: `Validation failed:\n  ${errors}` };
}
