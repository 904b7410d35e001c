import { Command } from 'commander';
import pico from 'picocolors';

import type { ResolvedSettings } from '../types/index.js';
import type { OutputPort } from '../core/ports/output.js';
import { cleanCache, describeStaleLookup, fetchCrate, getCacheInfo } from '../core/registry/cache-maintenance.js';
import { FileCrateStore } from '../core/registry/crate-store.js';
import { RegistryClient } from '../core/registry/registry-client.js';
import { SparseIndexTransport } from '../core/registry/transport.js';
import { applyLogLevel, createCommandContext, loadSettings, readGlobalOptions } from '../cli/global-options.js';
import { withErrorHandling } from '../utils/errors.js';
import { formatAgeHours, formatPathForDisplay, formatTimestamp, pluralize } from '../utils/formatters.js';

interface CacheCleanOptions {
  full?: boolean;
}

interface CacheFetchOptions {
  force?: boolean;
}

async function prepare(command: Command): Promise<{ output: OutputPort; settings: ResolvedSettings; cwd: string }> {
  const globals = readGlobalOptions(command);
  applyLogLevel(globals);
  const ctx = createCommandContext(globals);
  const settings = await loadSettings(globals, ctx.cwd);
  return { output: ctx.output, settings, cwd: ctx.cwd };
}

async function cacheInfoCommand(_options: unknown, command: Command): Promise<void> {
  const { output, settings, cwd } = await prepare(command);
  const info = await getCacheInfo(new FileCrateStore(settings.cacheDir), { cacheAgeHours: settings.cacheAgeHours });

  const summary = [
    `Location: ${formatPathForDisplay(info.location, cwd)}`,
    `Records:  ${info.entryCount} (${info.staleCount} older than ${settings.cacheAgeHours}h)`
  ];
  if (info.oldestFetch && info.newestFetch) {
    summary.push(`Oldest:   ${formatTimestamp(info.oldestFetch)}`);
    summary.push(`Newest:   ${formatTimestamp(info.newestFetch)}`);
  }
  output.note(summary.join('\n'), 'Crate metadata cache');

  for (const entry of info.entries) {
    const age = formatAgeHours(entry.ageHours * 3_600_000);
    const line = `${entry.name} ${pico.dim(`${pluralize(entry.versionCount, 'version')}, fetched ${age} ago`)}`;
    output.message(entry.stale ? `${line} ${pico.yellow('(stale)')}` : line);
  }
}

async function cacheCleanCommand(options: CacheCleanOptions, command: Command): Promise<void> {
  const { output, settings } = await prepare(command);
  const result = await cleanCache(new FileCrateStore(settings.cacheDir), {
    cacheAgeHours: settings.cacheAgeHours,
    full: options.full === true
  });

  if (result.removed.length === 0 && !options.full) {
    output.info(`No records older than ${settings.cacheAgeHours}h`);
    return;
  }
  output.success(`Removed ${pluralize(result.removed.length, 'record')}; ${result.remaining} remaining`);
}

async function cacheFetchCommand(
  crate: string,
  requirement: string | undefined,
  options: CacheFetchOptions,
  command: Command
): Promise<void> {
  const { output, settings } = await prepare(command);
  const client = new RegistryClient({
    store: new FileCrateStore(settings.cacheDir),
    transport: new SparseIndexTransport({ registryUrl: settings.registryUrl, timeoutMs: settings.requestTimeoutMs }),
    cacheAgeHours: settings.cacheAgeHours,
    concurrency: settings.concurrency
  });

  const result = await fetchCrate(client, crate, requirement, options.force === true);
  const { record, source } = result.lookup;
  const origin = source === 'network' ? 'fetched from the registry' : source === 'cache' ? 'served from cache' : 'served from stale cache';
  output.info(`${record.crate}: ${pluralize(record.versions.length, 'version')} ${origin}`);
  const staleReason = describeStaleLookup(result.lookup);
  if (staleReason !== undefined) {
    output.warn(`${staleReason}; showing cached metadata from ${formatTimestamp(new Date(record.fetchedAt))}`);
  }

  if (result.matching.length === 0) {
    output.warn(`No version of ${record.crate} matches ${requirement ?? '*'}`);
    return;
  }
  const heading = requirement !== undefined ? `Versions matching ${requirement}` : 'Versions';
  const versions = result.matching
    .map(entry => (entry.yanked ? pico.dim(`${entry.version} (yanked)`) : entry.version))
    .join('\n');
  output.note(versions, heading);
}

export function setupCacheCommand(program: Command): void {
  const cache = program
    .command('cache')
    .description('Inspect and maintain the crate metadata cache');

  cache
    .command('info')
    .description('Show cache location, record count and record ages')
    .action(withErrorHandling(cacheInfoCommand));

  cache
    .command('clean')
    .description('Remove records older than the cache age')
    .option('--full', 'remove every record')
    .action(withErrorHandling(cacheCleanCommand));

  cache
    .command('fetch')
    .argument('<crate>', 'crate name')
    .argument('[requirement]', 'show only versions matching this requirement')
    .description('Fetch one crate into the cache and list its versions')
    .option('--force', 'bypass the cache age and refetch')
    .action(withErrorHandling(cacheFetchCommand));
}
