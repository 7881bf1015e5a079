/**
 * Config Module
 *
 * Programmatic config access; CLI users go through `docent config`.
 */

export {
  ConfigSchema,
  PartialConfigSchema,
  LLMConfigSchema,
  EmbeddingConfigSchema,
  ChunkingConfigSchema,
  RetrievalConfigSchema,
  AgentConfigSchema,
  LLMProviderTypeSchema,
  EmbeddingProviderTypeSchema,
} from './schema.js';
export type { Config, PartialConfig, LLMProviderType, EmbeddingProviderType } from './schema.js';

export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

export { loadConfig, getConfigValue, setConfigValue, listConfig, deepMerge } from './loader.js';

export { getDocentDir, getDbPath, getConfigPath } from './paths.js';

export { loadEnv, getEnv, hasApiKey, getOllamaHost, EnvSchema, _clearEnvCache } from './env.js';
export type { EnvVars } from './env.js';

export {
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
  COMMANDS_REQUIRING_LLM,
  COMMANDS_REQUIRING_EMBEDDING,
} from './startup-validation.js';
export type { StartupValidationResult, StartupValidationOptions } from './startup-validation.js';
