/**
 * Tracer Factory
 *
 * Decision tree:
 *   1. observability.enabled === false    → NoopTracer
 *   2. No Langfuse keys (config or env)  → NoopTracer
 *   3. Keys present                      → LangfuseTracer
 *
 * Environment variables (LANGFUSE_PUBLIC_KEY, LANGFUSE_SECRET_KEY,
 * LANGFUSE_BASE_URL) take precedence over config.toml values.
 */

import type { Config } from '../config/schema.js';
import { getEnv } from '../config/env.js';
import type { Tracer } from './types.js';
import { createNoopTracer } from './noop-tracer.js';
import { createLangfuseTracer } from './langfuse-tracer.js';

export const DEFAULT_LANGFUSE_URL = 'https://cloud.langfuse.com';

/**
 * Create a tracer from the observability section of the config.
 */
export function createTracer(config: Config): Tracer {
  const obsConfig = config.observability;

  if (!obsConfig.enabled) {
    return createNoopTracer();
  }

  const publicKey = getEnv('LANGFUSE_PUBLIC_KEY') ?? obsConfig.langfuse_public_key;
  const secretKey = getEnv('LANGFUSE_SECRET_KEY') ?? obsConfig.langfuse_secret_key;

  if (!publicKey || !secretKey) {
    return createNoopTracer();
  }

  const baseUrl = getEnv('LANGFUSE_BASE_URL') ?? obsConfig.langfuse_host ?? DEFAULT_LANGFUSE_URL;

  return createLangfuseTracer({ publicKey, secretKey, baseUrl });
}
