/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create the home directory (~/.course-rag)
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import { ConfigSchema, PartialConfigSchema, type Config, type PartialConfig } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';

/**
 * Merge a sparse user config over a complete one, section by section.
 */
export function mergeConfig(base: Config, user: PartialConfig): Config {
  return {
    default_model: user.default_model ?? base.default_model,
    llm: { ...base.llm, ...user.llm },
    search: { ...base.search, ...user.search },
    chunking: { ...base.chunking, ...user.chunking },
    session: { ...base.session, ...user.session },
  };
}

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

function readTomlFile(configPath: string): TOML.JsonMap {
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
 * Validate raw TOML data and merge it over the defaults.
 *
 * @throws ConfigError listing every invalid field
 */
export function resolveConfig(raw: unknown): Config {
  const partial = PartialConfigSchema.safeParse(raw);
  if (!partial.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(partial.error.issues)}`,
      'Run: crag config list  to see current values and types'
    );
  }

  const merged = ConfigSchema.safeParse(mergeConfig(DEFAULT_CONFIG, partial.data));
  if (!merged.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(merged.error.issues)}`,
      'Run: crag config list  to see current values and types'
    );
  }

  return merged.data;
}

/**
 * Load and parse the config file.
 * Returns the merged config (defaults + user overrides).
 *
 * @param createIfMissing - Write the commented template on first run
 */
export function loadConfig(createIfMissing = true): Config {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return mergeConfig(DEFAULT_CONFIG, {});
  }

  return resolveConfig(readTomlFile(configPath));
}

function isJsonMap(value: TOML.AnyJson | undefined): value is TOML.JsonMap {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
  );
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('llm.max_tokens') => 800
 */
export function getConfigValue(key: string): unknown {
  let current: unknown = loadConfig(false);
  for (const part of key.split('.')) {
    if (current === null || typeof current !== 'object' || !(part in current)) {
      return undefined;
    }
    current = Reflect.get(current, part);
  }
  return current;
}

/**
 * Set a specific config value by dot-notation path.
 * The whole file is re-validated before it is written back.
 */
export function setConfigValue(key: string, value: string): void {
  const parts = key.split('.').filter((part) => part.length > 0);
  const lastPart = parts.pop();
  if (lastPart === undefined) {
    throw new ConfigError('Invalid config key: empty key', 'Run: crag config list  to see available keys');
  }

  const configPath = getConfigPath();
  const config: TOML.JsonMap = fs.existsSync(configPath) ? readTomlFile(configPath) : {};

  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isJsonMap(next)) {
      current = next;
    } else {
      const created: TOML.JsonMap = {};
      current[part] = created;
      current = created;
    }
  }
  current[lastPart] = parseValue(value);

  // Throws before anything is written
  resolveConfig(config);

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, TOML.stringify(config), 'utf-8');
}

/**
 * Parse a CLI string into a boolean, number or string.
 */
function parseValue(value: string): boolean | number | string {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * List all config values in a flat format
 * Returns entries like ['llm.max_tokens', 800]
 */
export function listConfig(): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: object, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;
      if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(loadConfig(false));
  return entries;
}
