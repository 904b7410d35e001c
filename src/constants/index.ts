/**
 * Shared constants for the cratefit CLI application.
 * Single source of truth for directory names, file names and defaults.
 */

export const DIR_PATTERNS = {
  CRATEFIT: '.cratefit'
} as const;

export const CRATEFIT_DIRS = {
  CACHE: 'cache',
  CRATES: 'crates'
} as const;

export const FILE_PATTERNS = {
  CARGO_TOML: 'Cargo.toml',
  CARGO_LOCK: 'Cargo.lock',
  CONFIG_JSONC: 'config.jsonc',
  CONFIG_JSON: 'config.json',
  CACHE_RECORD_EXT: '.json'
} as const;

/**
 * Manifest tables that declare dependencies, keyed by the kind they carry.
 */
export const DEPENDENCY_TABLES = {
  'dependencies': 'normal',
  'dev-dependencies': 'dev',
  'build-dependencies': 'build'
} as const;

export const ENV_VARS = {
  CACHE_DIR: 'CRATEFIT_CACHE_DIR',
  CACHE_AGE_HOURS: 'CRATEFIT_CACHE_AGE_HOURS',
  CARGO: 'CRATEFIT_CARGO',
  VERBOSE: 'CRATEFIT_VERBOSE'
} as const;

export const DEFAULTS = {
  CACHE_AGE_HOURS: 48,
  CARGO_PATH: 'cargo',
  REGISTRY_URL: 'https://index.crates.io',
  CONCURRENCY: 8,
  REQUEST_TIMEOUT_MS: 30_000,
  MAX_TRIALS: 32,
  MAX_BACKTRACKS: 1000
} as const;

export const USER_AGENT = 'cratefit/0.1.0';
