/**
 * Environment Variable Handler
 *
 * Loads API keys and endpoint overrides from the environment.
 * Supports .env files for local development via dotenv.
 *
 * SECURITY NOTES:
 * - Keys are NEVER logged, even in verbose mode
 * - Keys are NEVER included in error messages
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/**
 * Every key is optional at load time. Presence is checked when a
 * provider that needs it is created.
 */
export const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  LANGFUSE_PUBLIC_KEY: z.string().optional(),
  LANGFUSE_SECRET_KEY: z.string().optional(),
  LANGFUSE_BASE_URL: z.string().url().optional(),
  /** Overrides ~/.tender-insight (config, default store) */
  TENDER_INSIGHT_HOME: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

// ============================================================================
// PRIVATE STATE
// ============================================================================

/** Cached environment (loaded once at first access, reset by _clearEnvCache) */
let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 *
 * Malformed URLs are dropped rather than failing startup; the provider
 * that needs them reports the missing value.
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const raw = {
    OPENAI_API_KEY: process.env.OPENAI_API_KEY,
    OPENAI_BASE_URL: process.env.OPENAI_BASE_URL,
    LANGFUSE_PUBLIC_KEY: process.env.LANGFUSE_PUBLIC_KEY,
    LANGFUSE_SECRET_KEY: process.env.LANGFUSE_SECRET_KEY,
    LANGFUSE_BASE_URL: process.env.LANGFUSE_BASE_URL,
    TENDER_INSIGHT_HOME: process.env.TENDER_INSIGHT_HOME,
  };

  const result = EnvSchema.safeParse(raw);

  if (result.success) {
    _envCache = result.data;
  } else {
    _envCache = {
      OPENAI_API_KEY: raw.OPENAI_API_KEY,
      LANGFUSE_PUBLIC_KEY: raw.LANGFUSE_PUBLIC_KEY,
      LANGFUSE_SECRET_KEY: raw.LANGFUSE_SECRET_KEY,
      TENDER_INSIGHT_HOME: raw.TENDER_INSIGHT_HOME,
    };
  }

  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Check whether the OpenAI key is configured (non-empty),
 * without exposing its value.
 */
export function hasApiKey(): boolean {
  return Boolean(loadEnv().OPENAI_API_KEY?.trim());
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to stub different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}
