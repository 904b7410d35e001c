import { join } from 'path';
import semver from 'semver';
import { FILE_PATTERNS } from '../../constants/index.js';
import { readTextFileIfExists } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { normalizeCrateName } from '../registry/crate-record.js';
import { minimumVersion, parseRequirement, sortVersionsAscending } from '../resolution/requirement.js';
import { getString, isTable, parseToml } from './toml-values.js';

/** Crate name → every version locked for it, ascending. */
export type LockedVersions = Map<string, string[]>;

export function lockfilePath(rootDir: string): string {
  return join(rootDir, FILE_PATTERNS.CARGO_LOCK);
}

export function parseLockfile(content: string, path: string): LockedVersions {
  const document = parseToml(content, path);
  const locked: LockedVersions = new Map();
  const packages = document.package;

  if (!Array.isArray(packages)) {
    return locked;
  }
  for (const entry of packages) {
    if (!isTable(entry)) {
      continue;
    }
    const name = getString(entry, 'name');
    const version = getString(entry, 'version');
    if (!name || !version || !semver.valid(version)) {
      continue;
    }
    const crate = normalizeCrateName(name);
    const versions = locked.get(crate) ?? [];
    versions.push(version);
    locked.set(crate, sortVersionsAscending(versions));
  }
  return locked;
}

/**
 * Read Cargo.lock beside the root manifest; null when there is none.
 */
export async function readLockfile(rootDir: string): Promise<LockedVersions | null> {
  const path = lockfilePath(rootDir);
  const content = await readTextFileIfExists(path);
  if (content === null) {
    logger.debug(`No lockfile at ${path}`);
    return null;
  }
  return parseLockfile(content, path);
}

/**
 * The "original pin" of a direct crate: the newest locked version that
 * satisfies every requirement on it, otherwise the lowest version the
 * requirements admit.
 */
export function selectBaseline(crate: string, requirements: string[], locked: LockedVersions | null): string | null {
  const parsed = requirements.map(requirement => parseRequirement(requirement));
  const lockedVersions = locked?.get(normalizeCrateName(crate)) ?? [];

  for (let i = lockedVersions.length - 1; i >= 0; i--) {
    const version = lockedVersions[i];
    if (parsed.every(requirement => requirement.matches(version))) {
      return version;
    }
  }

  let floor: string | null = null;
  for (const requirement of requirements) {
    const min = minimumVersion(requirement);
    if (min !== null && (floor === null || semver.gt(min, floor))) {
      floor = min;
    }
  }
  return floor;
}
