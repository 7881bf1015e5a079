/**
 * Configuration Loader
 *
 * 1. Find/create the config directory (~/.docent)
 * 2. Load config.toml if it exists
 * 3. Validate the user's values with the partial schema
 * 4. Merge over the defaults and validate the result
 */

import * as fs from 'node:fs';
import TOML, { type JsonMap } from '@iarna/toml';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getConfigPath, getDocentDir } from './paths.js';
import { ConfigError } from '../errors/index.js';

function ensureDocentDir(): void {
  const dir = getDocentDir();
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function isJsonMap(value: unknown): value is JsonMap {
  return isRecord(value);
}

/**
 * Deep merge: nested objects merge key by key, everything else (including
 * arrays) is replaced by the source value.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];
    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

function parseToml(content: string, configPath: string): JsonMap {
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
 * Validate the merge of defaults and user values.
 */
function mergeWithDefaults(user: Record<string, unknown>, context: string): Config {
  const result = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, user));
  if (!result.success) {
    throw new ConfigError(
      `${context}:\n${formatIssues(result.error.issues)}`,
      'Run: docent config list  to see current values and types'
    );
  }
  return result.data;
}

/**
 * Load the merged config (defaults + user overrides).
 *
 * @param createIfMissing - Write the commented template on first run
 * @throws ConfigError if config.toml exists but is invalid
 */
export function loadConfig(createIfMissing = true): Config {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      ensureDocentDir();
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return structuredClone(DEFAULT_CONFIG);
  }

  const parsed = parseToml(fs.readFileSync(configPath, 'utf-8'), configPath);

  const validation = PartialConfigSchema.safeParse(parsed);
  if (!validation.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(validation.error.issues)}`,
      `Fix the values in ${configPath} or delete it to restore defaults`
    );
  }

  return mergeWithDefaults(validation.data, 'Invalid configuration');
}

/**
 * Get a config value by dot-notation path.
 * Example: getConfigValue('embedding.model') => 'text-embedding-3-small'
 */
export function getConfigValue(key: string): unknown {
  let current: unknown = loadConfig();
  for (const part of key.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Interpret a CLI string as boolean, number, or string.
 */
function parseValue(value: string): boolean | number | string {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!Number.isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Set a config value by dot-notation path and write config.toml.
 * The whole merged config is validated before anything is written.
 */
export function setConfigValue(key: string, value: string): void {
  const parts = key.split('.').filter((part) => part.length > 0);
  const lastPart = parts.pop();
  if (lastPart === undefined) {
    throw new ConfigError('Invalid config key: empty key');
  }

  const configPath = getConfigPath();
  ensureDocentDir();
  const config: JsonMap = fs.existsSync(configPath)
    ? parseToml(fs.readFileSync(configPath, 'utf-8'), configPath)
    : {};

  let current = config;
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
  current[lastPart] = parseValue(value);

  mergeWithDefaults(config, `Invalid value for '${key}'`);
  fs.writeFileSync(configPath, TOML.stringify(config), 'utf-8');
}

/**
 * All config values as flat [dot.path, value] pairs.
 */
export function listConfig(): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  const flatten = (obj: Record<string, unknown>, prefix: string): void => {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;
      if (isRecord(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  };

  flatten(loadConfig(), '');
  return entries;
}
