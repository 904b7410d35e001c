/**
 * Common types and interfaces for the cratefit CLI application
 */

// Core application types
export interface CratefitDirectories {
  config: string;
  cache: string;
}

/**
 * Settings read from ~/.cratefit/config.jsonc. Every key is optional;
 * defaults live in core/config.ts.
 */
export interface CratefitConfig {
  cacheDir?: string;
  cacheAgeHours?: number;
  cargoPath?: string;
  registryUrl?: string;
  concurrency?: number;
  requestTimeoutMs?: number;
  maxTrials?: number;
  maxBacktracks?: number;
}

/**
 * Fully-resolved settings after merging CLI flags, environment and config file.
 */
export interface ResolvedSettings {
  cacheDir: string;
  cacheAgeHours: number;
  cargoPath: string;
  registryUrl: string;
  concurrency: number;
  requestTimeoutMs: number;
  maxTrials: number;
  maxBacktracks: number;
}

// Dependency types

export type DependencyKind = 'normal' | 'build' | 'dev';

export type DependencySource = 'registry' | 'git' | 'path';

// Command result types

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types

export class CratefitError extends Error {
  public code: ErrorCodes;
  public details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCodes, details?: Record<string, unknown>) {
    super(message);
    this.name = 'CratefitError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  REGISTRY_UNREACHABLE = 'REGISTRY_UNREACHABLE',
  CRATE_NOT_FOUND = 'CRATE_NOT_FOUND',
  NO_CANDIDATE_VERSIONS = 'NO_CANDIDATE_VERSIONS',
  UNRESOLVABLE_CONFLICT = 'UNRESOLVABLE_CONFLICT',
  VALIDATION_EXHAUSTED = 'VALIDATION_EXHAUSTED',
  BASELINE_FAILED = 'BASELINE_FAILED',
  CACHE_CORRUPT = 'CACHE_CORRUPT',
  NO_MEMBERS_MATCHED = 'NO_MEMBERS_MATCHED',
  MANIFEST_ERROR = 'MANIFEST_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  BUILD_TOOL_ERROR = 'BUILD_TOOL_ERROR',
  RUN_ABORTED = 'RUN_ABORTED',
  VALIDATION_ERROR = 'VALIDATION_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  SILENT = 'silent'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
