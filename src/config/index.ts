/**
 * Configuration module
 *
 * @example
 * ```ts
 * const config = loadConfig();
 * const settings = resolvePipelineSettings(config);
 * ```
 */

export {
  ConfigSchema,
  PartialConfigSchema,
  IsolationModeSchema,
  type Config,
  type PartialConfig,
  type IsolationMode,
} from './schema.js';
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
export {
  loadConfig,
  withOverrides,
  getConfigValue,
  setConfigValue,
  listConfig,
  parseValue,
  deepMerge,
  checkConfigConsistency,
  type LoadConfigOptions,
} from './loader.js';
export {
  resolvePipelineSettings,
  createPipelineSettings,
  type PipelineSettings,
} from './settings.js';
export { loadEnv, getEnv, hasApiKey, _clearEnvCache, type EnvVars } from './env.js';
export { getAppDir, getConfigPath, getDefaultStorePath } from './paths.js';
export {
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
  type StartupValidationResult,
  type StartupValidationOptions,
} from './startup-validation.js';
