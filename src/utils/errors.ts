import { CratefitError, ErrorCodes, CommandResult, LogLevel } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for different types of errors in the cratefit CLI
 */

export interface RegistryUnreachableOptions {
  /** Set once the cache has been checked and holds nothing to fall back on */
  noCachedCopy?: boolean;
}

export class RegistryUnreachableError extends CratefitError {
  readonly reason: string;

  constructor(crateName: string, cause?: unknown, options: RegistryUnreachableOptions = {}) {
    const reason = cause instanceof RegistryUnreachableError
      ? cause.reason
      : cause instanceof Error ? cause.message : cause !== undefined ? String(cause) : 'unknown error';
    const context = options.noCachedCopy ? ' and no cached copy exists' : '';
    super(
      `Registry unreachable while fetching '${crateName}'${context}: ${reason}`,
      ErrorCodes.REGISTRY_UNREACHABLE,
      { crateName, reason }
    );
    this.name = 'RegistryUnreachableError';
    this.reason = reason;
  }
}

export class CrateNotFoundError extends CratefitError {
  constructor(crateName: string) {
    super(`Crate '${crateName}' does not exist in the registry`, ErrorCodes.CRATE_NOT_FOUND, { crateName });
    this.name = 'CrateNotFoundError';
  }
}

export class NoCandidateVersionsError extends CratefitError {
  constructor(
    crateName: string,
    details: {
      requirements: string[];
      requestedBy?: string[];
      availableVersions?: string[];
    }
  ) {
    super(
      `No non-yanked version of '${crateName}' matches ${details.requirements.join(', ')}`,
      ErrorCodes.NO_CANDIDATE_VERSIONS,
      { crateName, ...details }
    );
    this.name = 'NoCandidateVersionsError';
  }
}

export class UnresolvableConflictError extends CratefitError {
  constructor(
    crateName: string,
    details: {
      requirements: string[];
      requestedBy: string[];
      backtracks?: number;
    }
  ) {
    const sources = details.requirements
      .map((req, i) => `${req} (from ${details.requestedBy[i] ?? 'unknown'})`)
      .join(', ');
    super(
      `Unresolvable version conflict on '${crateName}': no single version satisfies ${sources}`,
      ErrorCodes.UNRESOLVABLE_CONFLICT,
      { crateName, ...details }
    );
    this.name = 'UnresolvableConflictError';
  }
}

export interface ExhaustionReport {
  trials: number;
  lastAssignment: Record<string, string>;
  /** Remaining search interval per direct crate */
  constraints: Record<string, { min: string; max: string } | null>;
  originalVersions: Record<string, string>;
  lastLog: string;
}

export class ValidationExhaustedError extends CratefitError {
  readonly report: ExhaustionReport;

  constructor(report: ExhaustionReport) {
    super(
      `No candidate assignment passed validation after ${report.trials} trial(s); manifests left unchanged`,
      ErrorCodes.VALIDATION_EXHAUSTED,
      { ...report }
    );
    this.name = 'ValidationExhaustedError';
    this.report = report;
  }
}

export interface BaselineFailure {
  /** Direct crate → original pin */
  pins: Record<string, string>;
  reason: string;
  /** Build output of the baseline trial; empty when it never ran */
  log: string;
}

export class BaselineFailedError extends CratefitError {
  readonly failure: BaselineFailure;

  constructor(failure: BaselineFailure) {
    super(
      `The project does not pass with its original pins (${failure.reason}); fix that first, manifests left unchanged`,
      ErrorCodes.BASELINE_FAILED,
      { ...failure }
    );
    this.name = 'BaselineFailedError';
    this.failure = failure;
  }
}

export class CacheCorruptError extends CratefitError {
  constructor(path: string, reason: string) {
    super(`Corrupt cache record at ${path}: ${reason}`, ErrorCodes.CACHE_CORRUPT, { path, reason });
    this.name = 'CacheCorruptError';
  }
}

export class NoMembersMatchedError extends CratefitError {
  constructor(includes: string[], availableMembers: string[]) {
    const message = includes.length === 0
      ? `Workspace processing requires at least one --include pattern. Available packages: ${availableMembers.join(', ')}`
      : `No packages in the workspace matched the include patterns [${includes.join(', ')}]. Available packages: ${availableMembers.join(', ')}`;
    super(message, ErrorCodes.NO_MEMBERS_MATCHED, { includes, availableMembers });
    this.name = 'NoMembersMatchedError';
  }
}

export class ManifestError extends CratefitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.MANIFEST_ERROR, details);
    this.name = 'ManifestError';
  }
}

export class FileSystemError extends CratefitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ValidationError extends CratefitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends CratefitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export class BuildToolError extends CratefitError {
  constructor(command: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to start build tool '${command}': ${reason}`, ErrorCodes.BUILD_TOOL_ERROR, { command, reason });
    this.name = 'BuildToolError';
  }
}

export class RunAbortedError extends CratefitError {
  constructor(message: string = 'Run aborted; manifests restored to their pre-run state') {
    super(message, ErrorCodes.RUN_ABORTED);
    this.name = 'RunAbortedError';
  }
}

/**
 * Extract the errno-style code from an unknown thrown value (e.g. 'ENOENT').
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof CratefitError) {
    // For CLI UX, avoid noisy error logs by default; surface details only in verbose mode
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      if (logger.getLevel() !== LogLevel.SILENT) {
        console.error(result.error);
      }
      process.exit(1);
    }
  };
}
