/**
 * CRM: Configuration Management
 *
 * Handles loading, validation, and path resolution for all configuration.
 * The config file is optional; anything it omits falls back to DEFAULT_CONFIG.
 *
 * @module config
 * @version 1.0.0
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { type Config, ConfigSchema, LogLevelSchema, type Result, ok, err } from '../types/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

const DEFAULT_BASE_DIR = path.join(os.homedir(), '.crm');

export const DEFAULT_CONFIG: Config = {
  api: {
    host: '127.0.0.1',
    port: 8000,
    body_limit_bytes: 10485760,
  },
  database: {
    file: 'crm.db',
  },
  paths: {
    base_dir: DEFAULT_BASE_DIR,
    config_file: 'config.json',
  },
  pagination: {
    default_page_size: 20,
    max_page_size: 100,
  },
  import: {
    natural_key: 'email',
    sample_size: 3,
    report_ttl_hours: 24,
    skip_unchanged: false,
  },
  logging: {
    level: 'info',
  },
};

// ═══════════════════════════════════════════════════════════════════════════
// PATH UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function expandPath(inputPath: string): string {
  if (inputPath.startsWith('~/')) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  if (inputPath === '~') {
    return os.homedir();
  }
  return inputPath;
}

export function getBaseDir(config?: Partial<Config>): string {
  return expandPath(config?.paths?.base_dir ?? DEFAULT_CONFIG.paths.base_dir);
}

export function getPath(relativePath: string, config?: Partial<Config>): string {
  return path.join(getBaseDir(config), relativePath);
}

export function getConfigPath(config?: Partial<Config>): string {
  return getPath(config?.paths?.config_file ?? DEFAULT_CONFIG.paths.config_file, config);
}

/**
 * Resolve the SQLite file. `:memory:` and absolute paths are used as given,
 * anything else lives under the base directory.
 */
export function getDatabasePath(config?: Partial<Config>): string {
  const file = config?.database?.file ?? DEFAULT_CONFIG.database.file;
  if (file === ':memory:') return file;
  const expanded = expandPath(file);
  return path.isAbsolute(expanded) ? expanded : getPath(expanded, config);
}

// ═══════════════════════════════════════════════════════════════════════════
// DIRECTORY MANAGEMENT
// ═══════════════════════════════════════════════════════════════════════════

export function ensureDirectories(config?: Partial<Config>): Result<void, Error> {
  try {
    const baseDir = getBaseDir(config);

    if (!fs.existsSync(baseDir)) {
      fs.mkdirSync(baseDir, { recursive: true, mode: 0o700 });
    }

    return ok(undefined);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION LOADING
// ═══════════════════════════════════════════════════════════════════════════

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Load configuration from file, merge with defaults.
 * LOG_LEVEL in the environment wins over the file.
 */
export function loadConfig(customPath?: string): Result<Config, Error> {
  try {
    const configPath = customPath ?? getConfigPath();
    const expandedPath = expandPath(configPath);

    let userConfig: Record<string, unknown> = {};

    if (fs.existsSync(expandedPath)) {
      const content = fs.readFileSync(expandedPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);
      if (!isPlainObject(parsed)) {
        return err(new Error(`Invalid configuration: ${expandedPath} must contain a JSON object`));
      }
      userConfig = parsed;
    }

    const merged = deepMerge({ ...DEFAULT_CONFIG }, userConfig);

    const envLevel = LogLevelSchema.safeParse(process.env.LOG_LEVEL);
    if (envLevel.success && isPlainObject(merged.logging)) {
      merged.logging = { ...merged.logging, level: envLevel.data };
    }

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      return err(new Error(`Invalid configuration: ${result.error.message}`));
    }

    return ok(result.data);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// SINGLETON PATTERN
// ═══════════════════════════════════════════════════════════════════════════

let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (cachedConfig === null) {
    const result = loadConfig();
    cachedConfig = result.success ? result.data : DEFAULT_CONFIG;
  }
  return cachedConfig;
}

export function clearConfigCache(): void {
  cachedConfig = null;
}

export function reloadConfig(customPath?: string): Result<Config, Error> {
  clearConfigCache();
  const result = loadConfig(customPath);
  if (result.success) {
    cachedConfig = result.data;
  }
  return result;
}
