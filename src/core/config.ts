import { join } from 'path';
import { z } from 'zod';
import { EnvsnapConfig, EnvsnapDirectories } from '../types/index.js';
import { readJsonOrJsoncFile, writeJsoncFile, exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { expandTilde } from '../utils/home-directory.js';
import { getEnvsnapDirectories } from './directory.js';
import {
  DEFAULT_ALTERNATE_REGISTRY_PACKAGES,
  DEFAULT_CORE_PACKAGES,
  DEFAULT_DOWNLOAD_TIMEOUT_MS,
  DEFAULT_SNAPSHOT_PATH,
  FILE_PATTERNS,
  GITHUB,
  REGISTRIES
} from '../constants/index.js';

/**
 * Configuration management for the envsnap CLI
 * Supports both JSON and JSONC formats
 */

const CONFIG_FILE_NAMES = [FILE_PATTERNS.CONFIG_JSONC, FILE_PATTERNS.CONFIG_JSON];
const DEFAULT_CONFIG_FILE = FILE_PATTERNS.CONFIG_JSONC; // Use JSONC by default for new configs

// Default configuration values
const DEFAULT_CONFIG: EnvsnapConfig = {
  rscript: 'Rscript',
  rCommand: 'R',
  primaryRegistry: {
    url: REGISTRIES.PRIMARY_URL
  },
  alternateRegistry: {
    url: REGISTRIES.ALTERNATE_URL,
    packages: [...DEFAULT_ALTERNATE_REGISTRY_PACKAGES]
  },
  corePackages: [...DEFAULT_CORE_PACKAGES],
  github: {
    branch: GITHUB.DEFAULT_BRANCH
  },
  snapshotPath: DEFAULT_SNAPSHOT_PATH,
  downloadTimeoutMs: DEFAULT_DOWNLOAD_TIMEOUT_MS
};

/**
 * Shape of the config file; every key is optional and falls back to the default.
 */
const configFileSchema = z.object({
  rscript: z.string().min(1).optional(),
  rCommand: z.string().min(1).optional(),
  libraryPaths: z.array(z.string().min(1)).optional(),
  installLibrary: z.string().min(1).optional(),
  primaryRegistry: z.object({
    url: z.string().url()
  }).optional(),
  alternateRegistry: z.object({
    url: z.string().url().optional(),
    packages: z.array(z.string().min(1)).optional()
  }).optional(),
  corePackages: z.array(z.string().min(1)).optional(),
  github: z.object({
    branch: z.string().min(1)
  }).optional(),
  snapshotPath: z.string().min(1).optional(),
  downloadTimeoutMs: z.number().int().positive().optional()
}).strict();

type ConfigFile = z.infer<typeof configFileSchema>;

function mergeWithDefaults(fileConfig: ConfigFile): EnvsnapConfig {
  const merged: EnvsnapConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    primaryRegistry: {
      ...DEFAULT_CONFIG.primaryRegistry,
      ...(fileConfig.primaryRegistry ?? {})
    },
    alternateRegistry: {
      ...DEFAULT_CONFIG.alternateRegistry,
      ...(fileConfig.alternateRegistry ?? {})
    },
    github: {
      ...DEFAULT_CONFIG.github,
      ...(fileConfig.github ?? {})
    }
  };

  if (merged.libraryPaths) {
    merged.libraryPaths = merged.libraryPaths.map(expandTilde);
  }
  if (merged.installLibrary) {
    merged.installLibrary = expandTilde(merged.installLibrary);
  }
  return merged;
}

class ConfigManager {
  private config: EnvsnapConfig | null = null;
  private configPath: string | null = null;
  private envsnapDirs: EnvsnapDirectories;

  constructor(directories: EnvsnapDirectories = getEnvsnapDirectories()) {
    this.envsnapDirs = directories;
  }

  /**
   * Find the existing config file (supports both .json and .jsonc)
   */
  private async findConfigFile(): Promise<string | null> {
    for (const fileName of CONFIG_FILE_NAMES) {
      const path = join(this.envsnapDirs.config, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  /**
   * Get the config path to use for saving.
   * An existing file keeps its format; otherwise JSONC is used.
   */
  private async getConfigPath(): Promise<string> {
    if (this.configPath) {
      return this.configPath;
    }

    const existingPath = await this.findConfigFile();
    this.configPath = existingPath ?? join(this.envsnapDirs.config, DEFAULT_CONFIG_FILE);
    return this.configPath;
  }

  /**
   * Load configuration from file, create default if it doesn't exist
   */
  async load(): Promise<EnvsnapConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();

    if (!configPath) {
      logger.debug('Config file not found, using defaults');
      this.config = structuredClone(DEFAULT_CONFIG);
      await this.save(); // Create the config file with defaults
      return this.config;
    }

    logger.debug(`Loading config from: ${configPath}`);
    let raw: unknown;
    try {
      raw = await readJsonOrJsoncFile(configPath);
    } catch (error) {
      logger.error('Failed to load configuration', { error });
      throw new ConfigError(`Failed to load configuration from ${configPath}`, { configPath, error });
    }

    const result = configFileSchema.safeParse(raw);
    if (!result.success) {
      const problems = result.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration in ${configPath}: ${problems}`, { configPath });
    }

    this.configPath = configPath;
    this.config = mergeWithDefaults(result.data);
    return this.config;
  }

  /**
   * Save current configuration to file
   */
  async save(): Promise<void> {
    if (!this.config) {
      throw new ConfigError('No configuration loaded to save');
    }

    const configPath = await this.getConfigPath();
    try {
      logger.debug(`Saving config to: ${configPath}`);
      await writeJsoncFile(configPath, this.config);
    } catch (error) {
      logger.error('Failed to save configuration', { error, configPath });
      throw new ConfigError(`Failed to save configuration to ${configPath}`, { configPath, error });
    }
  }

  /**
   * Get a configuration value
   */
  async get<K extends keyof EnvsnapConfig>(key: K): Promise<EnvsnapConfig[K]> {
    const config = await this.load();
    return config[key];
  }

  /**
   * Reset configuration to defaults
   */
  async reset(): Promise<void> {
    this.config = structuredClone(DEFAULT_CONFIG);
    await this.save();
    logger.info('Configuration reset to defaults');
  }

  /**
   * Get the configuration file path
   */
  async getConfigFilePath(): Promise<string> {
    return await this.getConfigPath();
  }

  getDirectories(): EnvsnapDirectories {
    return this.envsnapDirs;
  }
}

// Create and export a singleton instance
export const configManager = new ConfigManager();

// Export the class for testing purposes
export { ConfigManager, DEFAULT_CONFIG };
