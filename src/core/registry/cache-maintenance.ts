import { parseRequirement } from '../resolution/requirement.js';
import type { CrateStore } from './crate-store.js';
import { hoursToMs, isFresh } from './crate-record.js';
import type { RegistryClient } from './registry-client.js';
import type { RegistryLookup } from './types.js';

/**
 * Inspect, clean and refresh operations over the crate store.
 */

export interface CacheEntryInfo {
  name: string;
  fetchedAt: Date;
  ageHours: number;
  versionCount: number;
  stale: boolean;
}

export interface CacheInfo {
  location: string;
  entryCount: number;
  staleCount: number;
  oldestFetch: Date | null;
  newestFetch: Date | null;
  entries: CacheEntryInfo[];
}

export interface CacheCleanResult {
  /** Names of the removed records */
  removed: string[];
  remaining: number;
}

export interface CacheMaintenanceOptions {
  cacheAgeHours: number;
  now?: Date;
}

export interface FetchedVersion {
  version: string;
  yanked: boolean;
}

export interface CrateFetchResult {
  lookup: RegistryLookup;
  requirement?: string;
  /** Versions matching the requirement (all versions without one), ascending */
  matching: FetchedVersion[];
}

export async function getCacheInfo(store: CrateStore, options: CacheMaintenanceOptions): Promise<CacheInfo> {
  const now = options.now ?? new Date();
  const cacheAgeMs = hoursToMs(options.cacheAgeHours);
  const records = await store.list();

  const entries: CacheEntryInfo[] = records.map(record => {
    const fetchedAt = new Date(record.fetchedAt);
    return {
      name: record.crate,
      fetchedAt,
      ageHours: (now.getTime() - fetchedAt.getTime()) / hoursToMs(1),
      versionCount: record.versions.length,
      stale: !isFresh(record, now, cacheAgeMs)
    };
  });

  let oldestFetch: Date | null = null;
  let newestFetch: Date | null = null;
  for (const entry of entries) {
    if (oldestFetch === null || entry.fetchedAt < oldestFetch) {
      oldestFetch = entry.fetchedAt;
    }
    if (newestFetch === null || entry.fetchedAt > newestFetch) {
      newestFetch = entry.fetchedAt;
    }
  }

  return {
    location: store.location,
    entryCount: entries.length,
    staleCount: entries.filter(entry => entry.stale).length,
    oldestFetch,
    newestFetch,
    entries
  };
}

/**
 * Remove stale records, or every record when `full` is set.
 */
export async function cleanCache(
  store: CrateStore,
  options: CacheMaintenanceOptions & { full?: boolean }
): Promise<CacheCleanResult> {
  const now = options.now ?? new Date();
  const cacheAgeMs = hoursToMs(options.cacheAgeHours);
  const records = await store.list();

  if (options.full) {
    // clear() also drops records too corrupt to be listed.
    await store.clear();
    return { removed: records.map(record => record.crate), remaining: 0 };
  }

  const removed: string[] = [];
  for (const record of records) {
    if (!isFresh(record, now, cacheAgeMs)) {
      if (await store.delete(record.crate)) {
        removed.push(record.crate);
      }
    }
  }

  return { removed, remaining: records.length - removed.length };
}

/**
 * Why a lookup served an old record, or undefined when it is current.
 */
export function describeStaleLookup(lookup: RegistryLookup): string | undefined {
  if (!lookup.stale) {
    return undefined;
  }
  return lookup.fallback === 'not-listed'
    ? `Registry no longer lists ${lookup.record.crate}`
    : 'Registry unreachable';
}

/**
 * Explicit single-crate refresh used by `cache fetch`.
 */
export async function fetchCrate(
  client: RegistryClient,
  name: string,
  requirement?: string,
  force: boolean = false
): Promise<CrateFetchResult> {
  const predicate = requirement !== undefined ? parseRequirement(requirement) : null;
  const lookup = await client.fetch(name, { force });

  const matching = lookup.record.versions
    .filter(entry => predicate === null || predicate.matches(entry.version))
    .map(entry => ({ version: entry.version, yanked: entry.yanked }));

  return { lookup, requirement, matching };
}
