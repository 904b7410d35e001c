import { resolve } from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { configManager, type SettingsOverrides } from '../core/config.js';
import { LogLevel, type ResolvedSettings } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { createCliContext, type CommandContext } from './context.js';

/**
 * Options declared on the root program and visible to every command.
 */
export interface GlobalOptions {
  cwd?: string;
  cacheDir?: string;
  cacheAge?: number;
  verbose: boolean;
  quiet: boolean;
  silent: boolean;
}

/**
 * Commander argument parser for positive numbers (`--cache-age 12`).
 */
export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return parsed;
}

/** Collect repeated variadic values, splitting comma-separated lists. */
export function collectList(value: string, previous: string[] = []): string[] {
  return [...previous, ...value.split(',').map(item => item.trim()).filter(item => item !== '')];
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function readGlobalOptions(command: Command): GlobalOptions {
  const opts: Record<string, unknown> = command.optsWithGlobals();
  return {
    cwd: optionalString(opts.cwd),
    cacheDir: optionalString(opts.cacheDir),
    cacheAge: typeof opts.cacheAge === 'number' ? opts.cacheAge : undefined,
    verbose: opts.verbose === true,
    quiet: opts.quiet === true,
    silent: opts.silent === true
  };
}

/**
 * --silent beats --quiet beats --verbose.
 */
export function applyLogLevel(options: GlobalOptions): void {
  if (options.silent) {
    logger.setLevel(LogLevel.SILENT);
  } else if (options.quiet) {
    logger.setLevel(LogLevel.ERROR);
  } else if (options.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }
}

export function createCommandContext(options: GlobalOptions): CommandContext {
  return createCliContext({ cwd: options.cwd, silent: options.silent });
}

export async function loadSettings(
  options: GlobalOptions,
  cwd: string,
  extra: Pick<SettingsOverrides, 'cargoPath'> = {}
): Promise<ResolvedSettings> {
  const overrides: SettingsOverrides = { ...extra };
  if (options.cacheDir !== undefined) {
    overrides.cacheDir = resolve(cwd, options.cacheDir);
  }
  if (options.cacheAge !== undefined) {
    overrides.cacheAgeHours = options.cacheAge;
  }
  return configManager.resolveSettings(overrides);
}
