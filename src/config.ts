/**
 * Configuration system with YAML and JSON support
 */

import { readFileSync, existsSync } from 'fs';
import YAML from 'js-yaml';
import { Logger, parseLogLevel, type LogLevel } from './logger.js';
import { defaultCachePath } from './checksum-cache.js';

const logger = new Logger({ context: 'ConfigManager' });

export interface CacheConfig {
  path: string;
  enabled: boolean;
  /** Records whose file mtime is older than this are pruned by `--cache-cleanup`. */
  cleanupAfterDays: number;
}

export interface ScanConfig {
  extensions: string[];
  minFileSize: number;
  minFiles: number;
  minDirSize: number;
  concurrency: number;
}

export interface AppConfig {
  cache: CacheConfig;
  scan: ScanConfig;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG_PATH = './dedupe-tree.yaml';

export function defaultConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    cache: {
      path: defaultCachePath(env),
      enabled: true,
      cleanupAfterDays: 30
    },
    scan: {
      extensions: [],
      minFileSize: 0,
      minFiles: 2,
      minDirSize: 0,
      concurrency: 8
    },
    logLevel: parseLogLevel(env.LOG_LEVEL)
  };
}

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberField(section: UnknownRecord, key: string, fallback: number): number {
  const value = section[key];
  return typeof value === 'number' ? value : fallback;
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: AppConfig;
  private configPath: string;

  constructor(configPath: string = DEFAULT_CONFIG_PATH, private env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.config = this.loadConfig();
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): AppConfig {
    const defaults = defaultConfig(this.env);

    if (!existsSync(this.configPath)) {
      logger.debug(`Config file not found: ${this.configPath}, using defaults`, { path: this.configPath });
      return defaults;
    }

    try {
      const content = readFileSync(this.configPath, 'utf-8');
      let parsed: unknown;

      if (this.configPath.endsWith('.json')) {
        parsed = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        parsed = YAML.load(content);
      } else {
        throw new Error(`Unsupported config format: ${this.configPath}`);
      }

      logger.info(`Loaded configuration from ${this.configPath}`);
      return this.mergeConfigs(defaults, parsed);
    } catch (error) {
      logger.warn(
        `Failed to load config: ${error instanceof Error ? error.message : String(error)}`,
        { path: this.configPath }
      );
      return defaults;
    }
  }

  /**
   * Merge user config with defaults (user config takes precedence, environment wins over both)
   */
  private mergeConfigs(defaults: AppConfig, user: unknown): AppConfig {
    if (!isRecord(user)) return defaults;

    const cache: UnknownRecord = isRecord(user.cache) ? user.cache : {};
    const scan: UnknownRecord = isRecord(user.scan) ? user.scan : {};

    const merged: AppConfig = {
      cache: {
        path: typeof cache.path === 'string' ? cache.path : defaults.cache.path,
        enabled: typeof cache.enabled === 'boolean' ? cache.enabled : defaults.cache.enabled,
        cleanupAfterDays: numberField(cache, 'cleanupAfterDays', defaults.cache.cleanupAfterDays)
      },
      scan: {
        extensions: Array.isArray(scan.extensions)
          ? scan.extensions.filter((ext): ext is string => typeof ext === 'string')
          : defaults.scan.extensions,
        minFileSize: numberField(scan, 'minFileSize', defaults.scan.minFileSize),
        minFiles: numberField(scan, 'minFiles', defaults.scan.minFiles),
        minDirSize: numberField(scan, 'minDirSize', defaults.scan.minDirSize),
        concurrency: numberField(scan, 'concurrency', defaults.scan.concurrency)
      },
      logLevel: typeof user.logLevel === 'string' ? parseLogLevel(user.logLevel, defaults.logLevel) : defaults.logLevel
    };

    if (this.env.DEDUPE_TREE_CACHE_PATH) {
      merged.cache.path = this.env.DEDUPE_TREE_CACHE_PATH;
    }
    if (this.env.LOG_LEVEL) {
      merged.logLevel = parseLogLevel(this.env.LOG_LEVEL, merged.logLevel);
    }

    return merged;
  }

  /**
   * Get complete configuration
   */
  getAll(): AppConfig {
    return structuredClone(this.config);
  }

  /**
   * Validate configuration
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const { cache, scan } = this.config;

    if (!Number.isInteger(scan.concurrency) || scan.concurrency < 1) {
      errors.push('scan.concurrency must be a positive integer');
    }
    if (scan.minFileSize < 0) {
      errors.push('scan.minFileSize must not be negative');
    }
    if (scan.minDirSize < 0) {
      errors.push('scan.minDirSize must not be negative');
    }
    if (!Number.isInteger(scan.minFiles) || scan.minFiles < 0) {
      errors.push('scan.minFiles must be a non-negative integer');
    }
    if (cache.cleanupAfterDays <= 0) {
      errors.push('cache.cleanupAfterDays must be greater than 0');
    }
    if (cache.enabled && cache.path.trim() === '') {
      errors.push('cache.path must not be empty when the cache is enabled');
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  /**
   * Get config file path
   */
  getPath(): string {
    return this.configPath;
  }
}
