import type { DependencyKind } from '../../types/index.js';
import type { FetchOptions, RegistryLookup } from '../registry/types.js';

/**
 * A requirement a selected package declares on a registry crate.
 */
export interface DirectDependency {
  name: string;
  requirement: string;
  kind: DependencyKind;
  /** Package that declares the requirement */
  requestedBy: string;
}

/** Inclusive version bounds. */
export interface VersionInterval {
  min: string;
  max: string;
}

export interface ResolutionRequest {
  directDependencies: DirectDependency[];
  /** Crates left out of resolution entirely (git and path sourced) */
  skip: ReadonlySet<string>;
  /** Extra per-crate bounds, set by the validator while narrowing */
  intervals?: ReadonlyMap<string, VersionInterval>;
}

/** Crate name → chosen version. */
export type CandidateAssignment = Map<string, string>;

export interface ResolutionResult {
  assignment: CandidateAssignment;
  /** Direct crate → ascending non-yanked versions matching its direct requirements */
  admissible: Map<string, string[]>;
  /** Crates whose metadata came from a stale cache record */
  staleCrates: string[];
  backtracks: number;
}

/**
 * Where the solver gets crate metadata. Satisfied by RegistryClient.
 */
export interface CrateMetadataSource {
  fetch(name: string, options?: FetchOptions): Promise<RegistryLookup>;
  fetchMany(names: Iterable<string>, options?: FetchOptions): Promise<Map<string, RegistryLookup>>;
}

export interface AssignmentViolation {
  crate: string;
  version: string | undefined;
  requirement: string;
  requestedBy: string;
}
