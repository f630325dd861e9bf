import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from '../types/logger.js';
import { createNoOpLogger } from '../types/logger.js';
import { isNotFoundError, errorMessage } from '../utils/errors.js';
import type { HostConfigFile, MergedConfig } from './config-schema.js';
import {
  CONFIG_FILE_VERSION,
  DEFAULT_CONFIG,
  hostConfigFileSchema,
  parseLogLevel,
} from './config-schema.js';

export const CONFIG_FILE_NAME = 'host.json';

/**
 * Thrown when host.json exists but cannot be read or is invalid.
 */
export class ConfigError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to load config file ${filePath}: ${message}`, options);
    this.name = 'ConfigError';
    this.filePath = filePath;
  }
}

export interface ConfigLoaderOptions {
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

/**
 * ConfigLoader - loads and merges host configuration from multiple sources.
 *
 * Priority (highest wins):
 * 1. Environment variables
 * 2. Config file (data/config/host.json)
 * 3. Hardcoded defaults
 */
export class ConfigLoader {
  private readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly logger: Logger;
  private loadedConfig: HostConfigFile | null = null;

  constructor(configPath = DEFAULT_CONFIG.paths.config, options: ConfigLoaderOptions = {}) {
    this.configPath = configPath;
    this.env = options.env ?? process.env;
    this.logger = (options.logger ?? createNoOpLogger()).child({ component: 'config-loader' });
  }

  /**
   * Load and merge configuration from all sources.
   *
   * @throws ConfigError if host.json is unreadable, not JSON or fails validation
   */
  async load(): Promise<MergedConfig> {
    this.loadedConfig = await this.loadConfigFile();

    const config = this.deepClone(DEFAULT_CONFIG);
    config.paths.config = this.configPath;

    if (this.loadedConfig) {
      this.mergeConfigFile(config, this.loadedConfig);
    }

    this.mergeEnvironment(config);

    return config;
  }

  /**
   * Get the raw loaded config file (for debugging).
   */
  getLoadedConfigFile(): HostConfigFile | null {
    return this.loadedConfig;
  }

  private async loadConfigFile(): Promise<HostConfigFile | null> {
    const filePath = join(this.configPath, CONFIG_FILE_NAME);

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isNotFoundError(error)) {
        // File doesn't exist - that's OK, use defaults
        return null;
      }
      const message = errorMessage(error);
      throw new ConfigError(filePath, message, { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      const message = errorMessage(error);
      throw new ConfigError(filePath, `invalid JSON (${message})`, { cause: error });
    }

    const parsed = hostConfigFileSchema.safeParse(json);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(filePath, detail);
    }

    if (parsed.data.version > CONFIG_FILE_VERSION) {
      this.logger.warn(
        { fileVersion: parsed.data.version, supported: CONFIG_FILE_VERSION },
        'Config file version is newer than supported'
      );
    }

    return parsed.data;
  }

  private mergeConfigFile(config: MergedConfig, file: HostConfigFile): void {
    if (file.paths) {
      if (file.paths.persistentRoot) {
        config.paths.persistentRoot = file.paths.persistentRoot;
      }
      if (file.paths.logs) {
        config.paths.logs = file.paths.logs;
      }
    }

    if (file.debug !== undefined) {
      config.debug = file.debug;
    }

    if (file.logging) {
      if (file.logging.level) {
        config.logging.level = file.logging.level;
      }
      if (file.logging.pretty !== undefined) {
        config.logging.pretty = file.logging.pretty;
      }
      if (file.logging.maxFiles !== undefined) {
        config.logging.maxFiles = file.logging.maxFiles;
      }
      if (file.logging.toFile) {
        config.logging.logDir = config.paths.logs;
      }
    }

    if (file.plugins?.configs) {
      config.plugins.configs = { ...config.plugins.configs, ...file.plugins.configs };
    }
  }

  private mergeEnvironment(config: MergedConfig): void {
    const dataPath = this.env['DATA_PATH'];
    if (dataPath) {
      config.paths.data = dataPath;
      config.paths.persistentRoot = join(dataPath, 'plugins');
      config.paths.logs = join(dataPath, 'logs');
      if (config.logging.logDir !== null) {
        config.logging.logDir = config.paths.logs;
      }
    }

    const persistentDir = this.env['PERSISTENT_DIR'];
    if (persistentDir) {
      config.paths.persistentRoot = persistentDir;
    }

    const logLevel = this.env['LOG_LEVEL'];
    if (logLevel) {
      const level = parseLogLevel(logLevel);
      if (level) {
        config.logging.level = level;
      } else {
        this.logger.warn({ value: logLevel }, 'Ignoring invalid LOG_LEVEL');
      }
    }

    const debug = this.env['BOT_DEBUG'];
    if (debug !== undefined && debug !== '') {
      config.debug = ['1', 'true', 'yes', 'on'].includes(debug.toLowerCase());
    }
  }

  private deepClone<T>(obj: T): T {
    return structuredClone(obj);
  }
}

/**
 * Factory function for creating a config loader.
 */
export function createConfigLoader(
  configPath?: string,
  options?: ConfigLoaderOptions
): ConfigLoader {
  return new ConfigLoader(configPath, options);
}

/**
 * Load configuration from default paths.
 */
export async function loadConfig(
  configPath?: string,
  options?: ConfigLoaderOptions
): Promise<MergedConfig> {
  return createConfigLoader(configPath, options).load();
}
