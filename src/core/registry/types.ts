import type { DependencyKind } from '../../types/index.js';

/**
 * Registry data as it is cached and consumed by the resolver.
 */

export interface CrateDependency {
  /** Registry name of the dependency (the `package` field when renamed) */
  name: string;
  /** Requirement string exactly as published */
  req: string;
  kind: DependencyKind;
  optional: boolean;
  /** cfg() expression or target triple for platform-specific dependencies */
  target?: string;
}

export interface CrateVersion {
  version: string;
  yanked: boolean;
  dependencies: CrateDependency[];
}

/**
 * One cached crate. `versions` is sorted ascending by SemVer precedence.
 */
export interface CachedCrateRecord {
  crate: string;
  /** ISO-8601 timestamp of the fetch that produced this record */
  fetchedAt: string;
  versions: CrateVersion[];
}

/**
 * Dependency entry of a sparse index line.
 */
export interface RawIndexDependency {
  name: string;
  req: string;
  kind?: string | null;
  optional?: boolean;
  target?: string | null;
  package?: string | null;
}

/**
 * One line of the sparse index file of a crate.
 */
export interface RawIndexEntry {
  name: string;
  vers: string;
  deps: RawIndexDependency[];
  yanked: boolean;
  cksum?: string;
}

/**
 * Performs the HTTP(S) metadata fetch for a crate.
 * Resolves `null` when the registry has no such crate; transport failures reject.
 */
export interface RegistryTransport {
  fetchCrate(name: string, signal?: AbortSignal): Promise<RawIndexEntry[] | null>;
}

export type LookupSource = 'cache' | 'network' | 'stale-cache';

/** Why a stale record was served instead of a fresh one */
export type StaleFallback = 'unreachable' | 'not-listed';

export interface RegistryLookup {
  record: CachedCrateRecord;
  /** True when the record is older than the cache age or came from a failed refresh */
  stale: boolean;
  source: LookupSource;
  /** Set with source 'stale-cache' */
  fallback?: StaleFallback;
}

export interface FetchOptions {
  force?: boolean;
  signal?: AbortSignal;
}
