/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create the config file (~/.tender-insight/config.toml)
 * 2. Parse TOML and validate it against the partial schema
 * 3. Merge with defaults (user values override defaults)
 * 4. Re-validate the merged result and check cross-field rules
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML, { type AnyJson, type JsonMap } from '@iarna/toml';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';

export interface LoadConfigOptions {
  /** Config file to read (default ~/.tender-insight/config.toml) */
  path?: string;
  /** Write the commented template when the file doesn't exist */
  createIfMissing?: boolean;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isJsonMap(value: AnyJson | undefined): value is JsonMap {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

/**
 * Deep merge two objects, with source values overriding target.
 * Nested objects merge key by key; arrays and primitives replace.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) {
      continue;
    }
    const targetValue = result[key];
    result[key] =
      isPlainObject(sourceValue) && isPlainObject(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Rules that span more than one field.
 * Returns human-readable problems, empty when the config is consistent.
 */
export function checkConfigConsistency(config: Config): string[] {
  const problems: string[] = [];
  const { pipeline } = config;

  if (pipeline.chunk_overlap >= pipeline.chunk_size) {
    problems.push(
      `pipeline.chunk_overlap (${pipeline.chunk_overlap}) must be smaller than pipeline.chunk_size (${pipeline.chunk_size})`
    );
  }
  if (pipeline.rerank_final_k > pipeline.rerank_top_k) {
    problems.push(
      `pipeline.rerank_final_k (${pipeline.rerank_final_k}) must not exceed pipeline.rerank_top_k (${pipeline.rerank_top_k})`
    );
  }
  if (pipeline.retry_max_delay_ms < pipeline.retry_base_delay_ms) {
    problems.push('pipeline.retry_max_delay_ms must be at least pipeline.retry_base_delay_ms');
  }

  return problems;
}

/**
 * Validate a merged config object, throwing ConfigError with every issue.
 */
function finalizeConfig(merged: PlainObject, source: string): Config {
  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration in ${source}:\n${formatIssues(result.error.issues)}`,
      `Fix the values in ${source} or delete the file to restore defaults`
    );
  }

  const problems = checkConfigConsistency(result.data);
  if (problems.length > 0) {
    throw new ConfigError(
      `Inconsistent configuration in ${source}:\n${problems.map((p) => `  - ${p}`).join('\n')}`
    );
  }

  return result.data;
}

function readTomlFile(configPath: string): JsonMap {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or delete it to restore defaults`
    );
  }
}

/**
 * Load and parse the config file
 * Returns the merged config (defaults + user overrides)
 *
 * @throws ConfigError if the file exists but is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const configPath = options.path ?? getConfigPath();
  const createIfMissing = options.createIfMissing ?? true;

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return structuredClone(DEFAULT_CONFIG);
  }

  const parsed = readTomlFile(configPath);

  // Validate against the partial schema first for precise messages
  const partial = PartialConfigSchema.safeParse(parsed);
  if (!partial.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(partial.error.issues)}`,
      `Fix the values in ${configPath} or delete it to restore defaults`
    );
  }

  return finalizeConfig(deepMerge(DEFAULT_CONFIG, partial.data), configPath);
}

/**
 * Apply in-memory overrides (CLI flags) on top of a loaded config.
 */
export function withOverrides(config: Config, overrides: PlainObject): Config {
  return finalizeConfig(deepMerge(config, overrides), 'command-line options');
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue(config, 'pipeline.chunk_size') => 1000
 */
export function getConfigValue(config: Config, key: string): unknown {
  let current: unknown = config;
  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Parse a string value into the appropriate type
 * Handles booleans, numbers, and strings
 */
export function parseValue(value: string): boolean | number | string {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!Number.isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Set a specific config value by dot-notation path and write it back.
 * The complete config is validated before the file is touched.
 */
export function setConfigValue(key: string, value: string, configPath: string = getConfigPath()): void {
  const parts = key.split('.').filter((part) => part.length > 0);
  const leaf = parts.pop();
  if (leaf === undefined) {
    throw new ConfigError('Invalid config key: empty key');
  }

  const document: JsonMap = fs.existsSync(configPath) ? readTomlFile(configPath) : {};

  let current = document;
  for (const part of parts) {
    const next = current[part];
    if (isJsonMap(next)) {
      current = next;
    } else {
      const created: JsonMap = {};
      current[part] = created;
      current = created;
    }
  }
  current[leaf] = parseValue(value);

  const partial = PartialConfigSchema.safeParse(document);
  if (!partial.success) {
    throw new ConfigError(
      `Invalid value for '${key}':\n${formatIssues(partial.error.issues)}`,
      'Run: tender-insight config list  to see current values and types'
    );
  }
  finalizeConfig(deepMerge(DEFAULT_CONFIG, partial.data), configPath);

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, TOML.stringify(document), 'utf-8');
}

/**
 * Flatten a config into dot-notation entries for display
 * Returns entries like ['pipeline.chunk_size', 1000]
 */
export function listConfig(config: Config): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: PlainObject, prefix: string): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;
      if (isPlainObject(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(config, '');
  return entries;
}
