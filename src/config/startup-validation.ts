/**
 * Startup Configuration Validation
 *
 * Checks API keys and provider settings before a command that talks to
 * the model provider runs, so a misconfiguration fails in milliseconds
 * instead of after indexing.
 *
 * Errors stop the command. Warnings (for example, tracing enabled without
 * Langfuse keys) are only printed with --verbose.
 */

import chalk from 'chalk';
import { errorMessage } from '../errors/handler.js';
import { getEnv, hasApiKey } from './env.js';
import { loadConfig } from './loader.js';
import type { Config } from './schema.js';

// ============================================================================
// Types
// ============================================================================

export interface StartupValidationResult {
  /** True when there are no errors */
  valid: boolean;
  /** Non-fatal issues */
  warnings: string[];
  /** Issues that prevent the command from running */
  errors: string[];
  /** Setup instructions for the errors */
  hints: string[];
}

export interface StartupValidationOptions {
  /** Skip provider checks (commands that never call the model provider) */
  skipProviders?: boolean;
  /** Validate this config instead of loading the user's file */
  config?: Config;
}

const OPENAI_SETUP_HINT = 'Set OPENAI_API_KEY in your environment or in a .env file';

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate configuration at CLI startup.
 *
 * @example
 * const result = validateStartupConfig();
 * if (!result.valid) printStartupValidation(result);
 */
export function validateStartupConfig(
  options: StartupValidationOptions = {}
): StartupValidationResult {
  const warnings: string[] = [];
  const errors: string[] = [];
  const hints: string[] = [];

  let config: Config | null = options.config ?? null;
  if (!config) {
    try {
      config = loadConfig({ createIfMissing: false });
    } catch (error) {
      errors.push(errorMessage(error));
      hints.push('Run: tender-insight config reset --force  to restore defaults');
    }
  }

  if (!options.skipProviders) {
    if (!hasApiKey()) {
      errors.push('OpenAI API key not set');
      hints.push(OPENAI_SETUP_HINT);
    }

    if (config?.llm.provider === 'openai-compatible' && !config.llm.base_url && !getEnv('OPENAI_BASE_URL')) {
      errors.push('llm.provider is "openai-compatible" but no base URL is configured');
      hints.push('Set llm.base_url in config.toml or OPENAI_BASE_URL');
    }
  }

  if (config?.observability.enabled) {
    const publicKey = getEnv('LANGFUSE_PUBLIC_KEY') ?? config.observability.langfuse_public_key;
    const secretKey = getEnv('LANGFUSE_SECRET_KEY') ?? config.observability.langfuse_secret_key;
    if (!publicKey || !secretKey) {
      warnings.push('observability.enabled is true but Langfuse keys are missing; tracing is off');
    }
  }

  return { valid: errors.length === 0, warnings, errors, hints };
}

/**
 * Print startup validation warnings/errors to stderr.
 *
 * @param verbose - Also print warnings
 */
export function printStartupValidation(result: StartupValidationResult, verbose = false): void {
  for (const error of result.errors) {
    console.error(chalk.red(`✗ ${error}`));
  }
  for (const hint of result.hints) {
    console.error(chalk.dim(`  ${hint}`));
  }
  if (verbose) {
    for (const warning of result.warnings) {
      console.warn(chalk.yellow(`⚠ ${warning}`));
    }
  }
}

/**
 * Commands that call the LLM or embedding provider.
 */
export const COMMANDS_REQUIRING_PROVIDERS = ['analyze'];

export function getValidationOptionsForCommand(command: string): StartupValidationOptions {
  return { skipProviders: !COMMANDS_REQUIRING_PROVIDERS.includes(command) };
}
