/**
 * Centralized Path Definitions
 *
 * Directory structure:
 * ~/.tender-insight/
 * ├── config.toml     (user configuration)
 * └── vectors.db      (SQLite vector store)
 *
 * TENDER_INSIGHT_HOME relocates the whole directory.
 */

import { join } from 'node:path';
import { homedir } from 'node:os';
import { getEnv } from './env.js';

/**
 * Get the application directory (~/.tender-insight)
 */
export function getAppDir(): string {
  return getEnv('TENDER_INSIGHT_HOME') ?? join(homedir(), '.tender-insight');
}

/**
 * Get the config file path (~/.tender-insight/config.toml)
 */
export function getConfigPath(): string {
  return join(getAppDir(), 'config.toml');
}

/**
 * Get the default vector store path (~/.tender-insight/vectors.db)
 */
export function getDefaultStorePath(): string {
  return join(getAppDir(), 'vectors.db');
}
