import semver from 'semver';
import type { DependencyKind } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import type { CachedCrateRecord, CrateDependency, CrateVersion, RawIndexDependency, RawIndexEntry } from './types.js';

const HOUR_MS = 3_600_000;

export function normalizeCrateName(name: string): string {
  return name.trim().toLowerCase();
}

export function hoursToMs(hours: number): number {
  return hours * HOUR_MS;
}

/**
 * A record is fresh while `now - fetchedAt < cacheAgeMs`.
 */
export function isFresh(record: CachedCrateRecord, now: Date, cacheAgeMs: number): boolean {
  const fetchedAt = Date.parse(record.fetchedAt);
  if (Number.isNaN(fetchedAt)) {
    return false;
  }
  return now.getTime() - fetchedAt < cacheAgeMs;
}

function toDependencyKind(kind: string | null | undefined): DependencyKind {
  switch (kind) {
    case 'dev':
      return 'dev';
    case 'build':
      return 'build';
    default:
      return 'normal';
  }
}

function toCrateDependency(dep: RawIndexDependency): CrateDependency {
  const dependency: CrateDependency = {
    name: normalizeCrateName(dep.package ?? dep.name),
    req: dep.req,
    kind: toDependencyKind(dep.kind),
    optional: dep.optional === true
  };
  if (dep.target) {
    dependency.target = dep.target;
  }
  return dependency;
}

/**
 * Convert sparse index lines into a cache record. Entries whose version is
 * not valid SemVer are dropped.
 */
export function toCrateRecord(crate: string, entries: RawIndexEntry[], fetchedAt: Date): CachedCrateRecord {
  const versions: CrateVersion[] = [];
  for (const entry of entries) {
    const version = semver.valid(entry.vers);
    if (!version) {
      logger.debug(`Dropping index entry with invalid version`, { crate, vers: entry.vers });
      continue;
    }
    versions.push({
      version,
      yanked: entry.yanked,
      dependencies: entry.deps.map(toCrateDependency)
    });
  }
  versions.sort((a, b) => semver.compare(a.version, b.version));

  return {
    crate: normalizeCrateName(crate),
    fetchedAt: fetchedAt.toISOString(),
    versions
  };
}

function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOptionalString(value: unknown): value is string | null | undefined {
  return value === undefined || value === null || typeof value === 'string';
}

export function isRawIndexDependency(value: unknown): value is RawIndexDependency {
  return isObject(value)
    && 'name' in value && typeof value.name === 'string'
    && 'req' in value && typeof value.req === 'string'
    && (!('kind' in value) || isOptionalString(value.kind))
    && (!('optional' in value) || typeof value.optional === 'boolean')
    && (!('target' in value) || isOptionalString(value.target))
    && (!('package' in value) || isOptionalString(value.package));
}

export function isRawIndexEntry(value: unknown): value is RawIndexEntry {
  return isObject(value)
    && 'name' in value && typeof value.name === 'string'
    && 'vers' in value && typeof value.vers === 'string'
    && 'deps' in value && Array.isArray(value.deps) && value.deps.every(isRawIndexDependency)
    && 'yanked' in value && typeof value.yanked === 'boolean';
}

function isCrateDependency(value: unknown): value is CrateDependency {
  return isObject(value)
    && 'name' in value && typeof value.name === 'string'
    && 'req' in value && typeof value.req === 'string'
    && 'kind' in value && (value.kind === 'normal' || value.kind === 'build' || value.kind === 'dev')
    && 'optional' in value && typeof value.optional === 'boolean'
    && (!('target' in value) || typeof value.target === 'string');
}

function isCrateVersion(value: unknown): value is CrateVersion {
  return isObject(value)
    && 'version' in value && typeof value.version === 'string' && semver.valid(value.version) !== null
    && 'yanked' in value && typeof value.yanked === 'boolean'
    && 'dependencies' in value && Array.isArray(value.dependencies) && value.dependencies.every(isCrateDependency);
}

/**
 * Check the shape of a record read back from storage.
 * Returns a reason string when the value is unusable.
 */
export function checkCrateRecord(value: unknown): string | null {
  if (!isObject(value)) {
    return 'record is not an object';
  }
  if (!('crate' in value) || typeof value.crate !== 'string' || value.crate === '') {
    return 'missing crate name';
  }
  if (!('fetchedAt' in value) || typeof value.fetchedAt !== 'string' || Number.isNaN(Date.parse(value.fetchedAt))) {
    return 'missing or invalid fetchedAt';
  }
  if (!('versions' in value) || !Array.isArray(value.versions) || !value.versions.every(isCrateVersion)) {
    return 'invalid versions list';
  }
  return null;
}

export function isCachedCrateRecord(value: unknown): value is CachedCrateRecord {
  return checkCrateRecord(value) === null;
}
