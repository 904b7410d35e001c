import { join, resolve } from 'path';
import { CratefitConfig, CratefitDirectories, ResolvedSettings } from '../types/index.js';
import { readJsonOrJsoncFile, exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULTS, ENV_VARS, FILE_PATTERNS } from '../constants/index.js';
import { getCratefitDirectories } from './directory.js';

/**
 * Configuration management for the cratefit CLI.
 * Supports both JSON and JSONC formats.
 */

const CONFIG_FILE_NAMES = [FILE_PATTERNS.CONFIG_JSONC, FILE_PATTERNS.CONFIG_JSON];

const NUMERIC_KEYS = [
  'cacheAgeHours',
  'concurrency',
  'requestTimeoutMs',
  'maxTrials',
  'maxBacktracks'
] as const;

const STRING_KEYS = ['cacheDir', 'cargoPath', 'registryUrl'] as const;

/**
 * Values supplied on the command line. They win over everything else.
 */
export interface SettingsOverrides {
  cacheDir?: string;
  cacheAgeHours?: number;
  cargoPath?: string;
}

class ConfigManager {
  private config: CratefitConfig | null = null;
  private configPath: string | null = null;
  private directories: CratefitDirectories;

  constructor(directories: CratefitDirectories = getCratefitDirectories()) {
    this.directories = directories;
  }

  /**
   * Find the existing config file (supports both .json and .jsonc)
   */
  private async findConfigFile(): Promise<string | null> {
    for (const fileName of CONFIG_FILE_NAMES) {
      const path = join(this.directories.config, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  /**
   * Load the config file. A missing file yields an empty config.
   */
  async load(): Promise<CratefitConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();
    if (!configPath) {
      logger.debug('Config file not found, using defaults');
      this.config = {};
      return this.config;
    }

    logger.debug(`Loading config from: ${configPath}`);
    let raw: unknown;
    try {
      raw = await readJsonOrJsoncFile(configPath);
    } catch (error) {
      throw new ConfigError(`Failed to load configuration from ${configPath}`, { configPath, error });
    }
    this.configPath = configPath;
    this.config = parseConfig(raw, configPath);
    return this.config;
  }

  /**
   * Merge CLI overrides, environment, config file and defaults, in that order.
   */
  async resolveSettings(
    overrides: SettingsOverrides = {},
    env: NodeJS.ProcessEnv = process.env
  ): Promise<ResolvedSettings> {
    const fileConfig = await this.load();
    const source = this.configPath ?? 'config';

    const envCacheAge = env[ENV_VARS.CACHE_AGE_HOURS];
    const cacheAgeHours = overrides.cacheAgeHours
      ?? (envCacheAge !== undefined && envCacheAge !== ''
        ? parsePositiveNumber(envCacheAge, ENV_VARS.CACHE_AGE_HOURS)
        : undefined)
      ?? fileConfig.cacheAgeHours
      ?? DEFAULTS.CACHE_AGE_HOURS;
    assertPositive(cacheAgeHours, 'cacheAgeHours', source);

    const cacheDir = overrides.cacheDir
      ?? nonEmpty(env[ENV_VARS.CACHE_DIR])
      ?? fileConfig.cacheDir
      ?? this.directories.cache;

    const settings: ResolvedSettings = {
      cacheDir: resolve(cacheDir),
      cacheAgeHours,
      cargoPath: overrides.cargoPath ?? nonEmpty(env[ENV_VARS.CARGO]) ?? fileConfig.cargoPath ?? DEFAULTS.CARGO_PATH,
      registryUrl: (fileConfig.registryUrl ?? DEFAULTS.REGISTRY_URL).replace(/\/+$/, ''),
      concurrency: fileConfig.concurrency ?? DEFAULTS.CONCURRENCY,
      requestTimeoutMs: fileConfig.requestTimeoutMs ?? DEFAULTS.REQUEST_TIMEOUT_MS,
      maxTrials: fileConfig.maxTrials ?? DEFAULTS.MAX_TRIALS,
      maxBacktracks: fileConfig.maxBacktracks ?? DEFAULTS.MAX_BACKTRACKS
    };

    logger.debug('Resolved settings', settings);
    return settings;
  }

  /**
   * Path of the config file in use, or null when none exists
   */
  getConfigFilePath(): string | null {
    return this.configPath;
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

function assertPositive(value: number, key: string, source: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`Invalid value for '${key}' in ${source}: expected a positive number`, { key, value });
  }
}

function parsePositiveNumber(raw: string, key: string): number {
  const value = Number(raw);
  assertPositive(value, key, 'environment');
  return value;
}

/**
 * Validate the shape of a parsed config file.
 */
export function parseConfig(raw: unknown, source: string): CratefitConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`Invalid configuration structure in ${source}: expected an object`);
  }

  const config: CratefitConfig = {};
  for (const [key, value] of Object.entries(raw)) {
    if (isNumericKey(key)) {
      if (typeof value !== 'number') {
        throw new ConfigError(`Invalid value for '${key}' in ${source}: expected a number`, { key, value });
      }
      assertPositive(value, key, source);
      config[key] = value;
    } else if (isStringKey(key)) {
      if (typeof value !== 'string' || value.trim() === '') {
        throw new ConfigError(`Invalid value for '${key}' in ${source}: expected a non-empty string`, { key, value });
      }
      config[key] = value;
    } else {
      logger.warn(`Ignoring unknown config key '${key}' in ${source}`);
    }
  }
  return config;
}

function isNumericKey(key: string): key is typeof NUMERIC_KEYS[number] {
  return NUMERIC_KEYS.some(candidate => candidate === key);
}

function isStringKey(key: string): key is typeof STRING_KEYS[number] {
  return STRING_KEYS.some(candidate => candidate === key);
}

// Create and export a singleton instance
export const configManager = new ConfigManager();

// Export the class for testing purposes
export { ConfigManager };
