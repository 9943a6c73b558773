import { config as loadEnv } from 'dotenv';
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import type { ZodType } from 'zod';
import { ConfigSchema, LogFormatSchema, LogLevelSchema, TransportSchema, type Config } from './schema.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError } from '../errors/index.js';

/**
 * Load configuration from environment variables and config files
 * Priority: Environment Variables > Config File > Defaults
 */
export class ConfigLoader {
  private config: Config;

  constructor() {
    // Load .env file if it exists
    loadEnv();

    // Start with defaults
    this.config = structuredClone(defaultConfig);

    // Load from config file if exists
    this.loadFromFile();

    // Override with environment variables
    this.loadFromEnv();

    // Validate final configuration
    this.validate();
  }

  /**
   * Load configuration from JSON file
   */
  private loadFromFile(): void {
    const configPath = join(process.cwd(), 'config', 'default.json');
    if (!existsSync(configPath)) {
      return;
    }

    let fileConfig: unknown;
    try {
      fileConfig = JSON.parse(readFileSync(configPath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(
        `Failed to load config file ${configPath}: ${(error as Error).message}`,
        { configPath },
        error as Error
      );
    }
    this.mergeConfig(fileConfig);
  }

  /**
   * Load configuration from environment variables
   */
  private loadFromEnv(): void {
    const env = process.env;

    // Corpus configuration
    if (env['QTDOCS_CORPUS_ROOT']) {
      this.config.corpus.root = env['QTDOCS_CORPUS_ROOT'];
    }
    if (env['QTDOCS_BASE_URL']) {
      this.config.corpus.baseUrl = env['QTDOCS_BASE_URL'];
    }

    // Cache configuration
    if (env['QTDOCS_CACHE_DIR']) {
      this.config.cache.dir = env['QTDOCS_CACHE_DIR'];
    }
    if (env['QTDOCS_MEMORY_CACHE_SIZE']) {
      this.config.cache.memoryEntries = parseInt(env['QTDOCS_MEMORY_CACHE_SIZE'], 10);
    }
    if (env['QTDOCS_WARM_ON_START']) {
      this.config.cache.warmOnStart = env['QTDOCS_WARM_ON_START'] === 'true';
    }

    // Index configuration
    if (env['QTDOCS_INDEX_PATH']) {
      this.config.index.path = env['QTDOCS_INDEX_PATH'];
    }
    if (env['QTDOCS_BUILD_INDEX_ON_START']) {
      this.config.index.buildOnStart = env['QTDOCS_BUILD_INDEX_ON_START'] === 'true';
    }

    // Reader configuration
    if (env['QTDOCS_READER_DEFAULT_LENGTH']) {
      this.config.reader.defaultLength = parseInt(env['QTDOCS_READER_DEFAULT_LENGTH'], 10);
    }
    if (env['QTDOCS_READER_MAX_LENGTH']) {
      this.config.reader.maxLength = parseInt(env['QTDOCS_READER_MAX_LENGTH'], 10);
    }

    // Search configuration
    if (env['QTDOCS_SEARCH_DEFAULT_LIMIT']) {
      this.config.search.defaultLimit = parseInt(env['QTDOCS_SEARCH_DEFAULT_LIMIT'], 10);
    }
    if (env['QTDOCS_SEARCH_MAX_LIMIT']) {
      this.config.search.maxLimit = parseInt(env['QTDOCS_SEARCH_MAX_LIMIT'], 10);
    }

    // Logging configuration
    if (env['QTDOCS_LOG_LEVEL']) {
      this.config.logging.level = parseEnvEnum(LogLevelSchema, env['QTDOCS_LOG_LEVEL'], 'QTDOCS_LOG_LEVEL');
    }
    if (env['QTDOCS_LOG_FORMAT']) {
      this.config.logging.format = parseEnvEnum(LogFormatSchema, env['QTDOCS_LOG_FORMAT'], 'QTDOCS_LOG_FORMAT');
    }
    if (env['QTDOCS_LOG_DIR']) {
      this.config.logging.dir = env['QTDOCS_LOG_DIR'];
    }
    if (env['QTDOCS_LOG_MAX_FILES']) {
      this.config.logging.maxFiles = parseInt(env['QTDOCS_LOG_MAX_FILES'], 10);
    }
    if (env['QTDOCS_LOG_MAX_SIZE']) {
      this.config.logging.maxSize = env['QTDOCS_LOG_MAX_SIZE'];
    }
    if (env['QTDOCS_LOG_TO_FILE']) {
      this.config.logging.toFile = env['QTDOCS_LOG_TO_FILE'] === 'true';
    }

    // MCP configuration
    if (env['QTDOCS_SERVER_NAME']) {
      this.config.mcp.serverName = env['QTDOCS_SERVER_NAME'];
    }
    if (env['QTDOCS_SERVER_VERSION']) {
      this.config.mcp.serverVersion = env['QTDOCS_SERVER_VERSION'];
    }
    if (env['QTDOCS_TRANSPORT']) {
      this.config.mcp.transport = parseEnvEnum(TransportSchema, env['QTDOCS_TRANSPORT'], 'QTDOCS_TRANSPORT');
    }
  }

  /**
   * Validate configuration using Zod schema
   */
  private validate(): void {
    const result = ConfigSchema.safeParse(this.config);
    if (!result.success) {
      throw new ConfigurationError(`Configuration validation failed: ${result.error.message}`, {
        issues: result.error.issues,
      });
    }
    this.config = result.data;
  }

  /**
   * Shallow-merge each section of a parsed config file into the current config.
   * Unknown sections are ignored; values are checked by validate().
   */
  private mergeConfig(source: unknown): void {
    if (!isRecord(source)) {
      throw new ConfigurationError('Config file must contain a JSON object');
    }
    for (const key of CONFIG_SECTIONS) {
      const sourceValue = source[key];
      if (isRecord(sourceValue)) {
        Object.assign(this.config[key], sourceValue);
      }
    }
  }

  /**
   * Get the current configuration
   */
  public getConfig(): Config {
    return this.config;
  }
}

const CONFIG_SECTIONS = [
  'corpus',
  'cache',
  'index',
  'reader',
  'search',
  'logging',
  'mcp',
] as const satisfies ReadonlyArray<keyof Config>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseEnvEnum<T>(schema: ZodType<T>, value: string, name: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(`Invalid value for ${name}: ${value}`, { name, value });
  }
  return result.data;
}

// Singleton instance
let configInstance: ConfigLoader | null = null;

/**
 * Get configuration singleton
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = new ConfigLoader();
  }
  return configInstance.getConfig();
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

// Export types
export type { Config } from './schema.js';
