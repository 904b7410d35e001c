/**
 * Version resolution for a set of direct crate requirements.
 *
 * The solver keeps an explicit decision stack instead of recursing. Every
 * step rebuilds the requirements table (crate → requirements reaching it,
 * in discovery order) from the roots plus the current decisions, checks the
 * decided crates against it, then decides the next undecided crate with its
 * newest admissible version. A conflict jumps back to the most recent
 * decision that contributed to it and moves that decision to its next-newest
 * candidate.
 */

import semver from 'semver';
import { DEFAULTS } from '../../constants/index.js';
import { logger } from '../../utils/logger.js';
import { NoCandidateVersionsError, UnresolvableConflictError, ValidationError } from '../../utils/errors.js';
import { normalizeCrateName } from '../registry/crate-record.js';
import type { CachedCrateRecord, CrateDependency } from '../registry/types.js';
import { matchesRequirement, parseRequirement, type VersionRequirement } from './requirement.js';
import type {
  AssignmentViolation,
  CandidateAssignment,
  CrateMetadataSource,
  DirectDependency,
  ResolutionRequest,
  ResolutionResult,
  VersionInterval
} from './types.js';

interface RequirementEntry {
  requirement: VersionRequirement;
  requestedBy: string;
  /** Decided crate that contributed the entry; null for direct requirements */
  source: string | null;
}

type RequirementTable = Map<string, RequirementEntry[]>;

interface Decision {
  crate: string;
  /** Newest first */
  candidates: string[];
  cursor: number;
}

interface Conflict {
  crate: string;
  entries: RequirementEntry[];
  /** Decisions whose change could lift the conflict */
  culprits: Set<string>;
}

interface Edge {
  name: string;
  requirement: VersionRequirement;
}

export interface VersionSolverOptions {
  maxBacktracks?: number;
}

/**
 * Dependencies of a published version that take part in the closure:
 * normal and build, never optional, never dev.
 */
export function isResolvedEdge(dependency: CrateDependency): boolean {
  return !dependency.optional && dependency.kind !== 'dev';
}

function tryParseRequirement(raw: string, context: string): VersionRequirement | null {
  try {
    return parseRequirement(raw);
  } catch (error) {
    if (error instanceof ValidationError) {
      logger.warn(`Ignoring unparseable requirement '${raw}' declared by ${context}`);
      return null;
    }
    throw error;
  }
}

function withinInterval(version: string, interval: VersionInterval | undefined): boolean {
  if (!interval) {
    return true;
  }
  return semver.gte(version, interval.min) && semver.lte(version, interval.max);
}

function currentVersion(decision: Decision): string {
  return decision.candidates[decision.cursor];
}

export class VersionSolver {
  private readonly source: CrateMetadataSource;
  private readonly maxBacktracks: number;
  private readonly edgeCache = new Map<string, Edge[]>();

  constructor(source: CrateMetadataSource, options: VersionSolverOptions = {}) {
    this.source = source;
    this.maxBacktracks = options.maxBacktracks ?? DEFAULTS.MAX_BACKTRACKS;
  }

  async resolve(request: ResolutionRequest): Promise<ResolutionResult> {
    const skip = new Set([...request.skip].map(normalizeCrateName));
    const intervals = new Map<string, VersionInterval>();
    for (const [crate, interval] of request.intervals ?? []) {
      intervals.set(normalizeCrateName(crate), interval);
    }

    const roots = request.directDependencies
      .map(dep => ({ ...dep, name: normalizeCrateName(dep.name) }))
      .filter(dep => !skip.has(dep.name));

    const records = new Map<string, CachedCrateRecord>();
    const staleCrates = new Set<string>();
    const load = async (names: Iterable<string>): Promise<void> => {
      const missing = [...new Set(names)].filter(name => !records.has(name));
      if (missing.length === 0) {
        return;
      }
      const lookups = await this.source.fetchMany(missing);
      for (const [name, lookup] of lookups) {
        records.set(name, lookup.record);
        if (lookup.stale) {
          staleCrates.add(name);
        }
      }
    };

    await load(roots.map(root => root.name));

    const rootEntries: Array<{ crate: string; entry: RequirementEntry }> = roots.map(root => ({
      crate: root.name,
      entry: { requirement: parseRequirement(root.requirement), requestedBy: root.requestedBy, source: null }
    }));

    const admissible = this.computeAdmissible(rootEntries, records);

    const decisions: Decision[] = [];
    let backtracks = 0;

    for (;;) {
      const table = this.buildRequirementTable(rootEntries, decisions, records, skip);
      let conflict = this.findInconsistency(table, decisions);

      if (!conflict) {
        const decided = new Set(decisions.map(decision => decision.crate));
        const next = [...table.keys()].find(crate => !decided.has(crate));
        if (next === undefined) {
          break;
        }

        await load([next]);
        const entries = table.get(next) ?? [];
        const candidates = this.candidatesFor(this.recordFor(records, next), entries, intervals.get(next));
        if (candidates.length > 0) {
          decisions.push({ crate: next, candidates, cursor: 0 });
          logger.debug(`Decided ${next}@${candidates[0]}`, { alternatives: candidates.length - 1 });
          await load(this.edgesFor(records, next, candidates[0], skip).map(edge => edge.name));
          continue;
        }
        conflict = {
          crate: next,
          entries,
          culprits: new Set(entries.flatMap(entry => (entry.source ? [entry.source] : [])))
        };
      }

      backtracks++;
      logger.debug(`Conflict on '${conflict.crate}'`, {
        requirements: conflict.entries.map(entry => `${entry.requirement.raw} (from ${entry.requestedBy})`),
        backtracks
      });

      if (backtracks > this.maxBacktracks) {
        throw this.conflictError(conflict, intervals.get(conflict.crate), backtracks, true);
      }
      if (!this.backjump(decisions, conflict.culprits)) {
        throw this.conflictError(conflict, intervals.get(conflict.crate), backtracks, false);
      }

      const top = decisions[decisions.length - 1];
      await load(this.edgesFor(records, top.crate, currentVersion(top), skip).map(edge => edge.name));
    }

    const assignment: CandidateAssignment = new Map(
      decisions.map(decision => [decision.crate, currentVersion(decision)])
    );

    const violations = verifyAssignment(assignment, records, request.directDependencies, skip);
    if (violations.length > 0) {
      const first = violations[0];
      throw new UnresolvableConflictError(first.crate, {
        requirements: violations.filter(v => v.crate === first.crate).map(v => v.requirement),
        requestedBy: violations.filter(v => v.crate === first.crate).map(v => v.requestedBy),
        backtracks
      });
    }

    logger.debug('Resolution complete', { crates: assignment.size, backtracks });
    return {
      assignment,
      admissible,
      staleCrates: [...staleCrates].sort(),
      backtracks
    };
  }

  private recordFor(records: Map<string, CachedCrateRecord>, crate: string): CachedCrateRecord {
    const record = records.get(crate);
    if (!record) {
      // load() either stores every requested crate or throws.
      throw new Error(`Metadata for '${crate}' was not loaded`);
    }
    return record;
  }

  private computeAdmissible(
    rootEntries: Array<{ crate: string; entry: RequirementEntry }>,
    records: Map<string, CachedCrateRecord>
  ): Map<string, string[]> {
    const byCrate = new Map<string, RequirementEntry[]>();
    for (const { crate, entry } of rootEntries) {
      const rows = byCrate.get(crate) ?? [];
      rows.push(entry);
      byCrate.set(crate, rows);
    }

    const admissible = new Map<string, string[]>();
    for (const [crate, entries] of byCrate) {
      const available = this.recordFor(records, crate).versions.filter(entry => !entry.yanked);
      const versions = available
        .filter(entry => entries.every(row => row.requirement.matches(entry.version)))
        .map(entry => entry.version);

      if (versions.length === 0) {
        throw new NoCandidateVersionsError(crate, {
          requirements: entries.map(row => row.requirement.raw),
          requestedBy: entries.map(row => row.requestedBy),
          availableVersions: available.map(entry => entry.version)
        });
      }
      admissible.set(crate, versions);
    }
    return admissible;
  }

  private edgesFor(
    records: Map<string, CachedCrateRecord>,
    crate: string,
    version: string,
    skip: ReadonlySet<string>
  ): Edge[] {
    const key = `${crate}@${version}`;
    let edges = this.edgeCache.get(key);
    if (!edges) {
      const entry = this.recordFor(records, crate).versions.find(candidate => candidate.version === version);
      edges = [];
      for (const dependency of entry?.dependencies ?? []) {
        if (!isResolvedEdge(dependency)) {
          continue;
        }
        const requirement = tryParseRequirement(dependency.req, key);
        if (requirement) {
          edges.push({ name: dependency.name, requirement });
        }
      }
      this.edgeCache.set(key, edges);
    }
    return edges.filter(edge => !skip.has(edge.name));
  }

  private buildRequirementTable(
    rootEntries: Array<{ crate: string; entry: RequirementEntry }>,
    decisions: Decision[],
    records: Map<string, CachedCrateRecord>,
    skip: ReadonlySet<string>
  ): RequirementTable {
    const table: RequirementTable = new Map();
    const add = (crate: string, entry: RequirementEntry): void => {
      const rows = table.get(crate);
      if (rows) {
        rows.push(entry);
      } else {
        table.set(crate, [entry]);
      }
    };

    for (const { crate, entry } of rootEntries) {
      add(crate, entry);
    }
    for (const decision of decisions) {
      const version = currentVersion(decision);
      for (const edge of this.edgesFor(records, decision.crate, version, skip)) {
        add(edge.name, {
          requirement: edge.requirement,
          requestedBy: `${decision.crate}@${version}`,
          source: decision.crate
        });
      }
    }
    return table;
  }

  private findInconsistency(table: RequirementTable, decisions: Decision[]): Conflict | null {
    for (const decision of decisions) {
      const version = currentVersion(decision);
      const entries = table.get(decision.crate) ?? [];
      const violated = entries.filter(entry => !entry.requirement.matches(version));
      if (violated.length > 0) {
        const culprits = new Set<string>([decision.crate]);
        for (const entry of violated) {
          if (entry.source) {
            culprits.add(entry.source);
          }
        }
        return { crate: decision.crate, entries, culprits };
      }
    }
    return null;
  }

  private candidatesFor(
    record: CachedCrateRecord,
    entries: RequirementEntry[],
    interval: VersionInterval | undefined
  ): string[] {
    const candidates: string[] = [];
    for (let i = record.versions.length - 1; i >= 0; i--) {
      const entry = record.versions[i];
      if (entry.yanked || !withinInterval(entry.version, interval)) {
        continue;
      }
      if (entries.every(row => row.requirement.matches(entry.version))) {
        candidates.push(entry.version);
      }
    }
    return candidates;
  }

  /**
   * Drop decisions above the most recent culprit, then move the top decision
   * to its next candidate, popping exhausted ones. False when nothing is left.
   */
  private backjump(decisions: Decision[], culprits: Set<string>): boolean {
    let target = -1;
    for (let i = decisions.length - 1; i >= 0; i--) {
      if (culprits.has(decisions[i].crate)) {
        target = i;
        break;
      }
    }
    if (target === -1) {
      // Only direct requirements are involved; no decision can fix that.
      decisions.length = 0;
      return false;
    }

    decisions.length = target + 1;
    while (decisions.length > 0) {
      const top = decisions[decisions.length - 1];
      if (top.cursor + 1 < top.candidates.length) {
        top.cursor++;
        logger.debug(`Backtracking ${top.crate} to ${currentVersion(top)}`);
        return true;
      }
      decisions.pop();
    }
    return false;
  }

  private conflictError(
    conflict: Conflict,
    interval: VersionInterval | undefined,
    backtracks: number,
    capped: boolean
  ): NoCandidateVersionsError | UnresolvableConflictError {
    const requirements = conflict.entries.map(entry => entry.requirement.raw);
    const requestedBy = conflict.entries.map(entry => entry.requestedBy);
    if (interval) {
      requirements.push(`>=${interval.min}, <=${interval.max}`);
      requestedBy.push('validation narrowing');
    }

    if (!capped && conflict.entries.length <= 1) {
      return new NoCandidateVersionsError(conflict.crate, { requirements, requestedBy });
    }
    if (capped) {
      logger.warn(`Gave up after ${backtracks} backtracks (limit ${this.maxBacktracks})`);
    }
    return new UnresolvableConflictError(conflict.crate, { requirements, requestedBy, backtracks });
  }
}

/**
 * Check that every direct requirement and every dependency edge of every
 * chosen version is satisfied by the assignment. Returns the violations.
 */
export function verifyAssignment(
  assignment: CandidateAssignment,
  records: ReadonlyMap<string, CachedCrateRecord>,
  directDependencies: DirectDependency[],
  skip: ReadonlySet<string>
): AssignmentViolation[] {
  const violations: AssignmentViolation[] = [];

  for (const dep of directDependencies) {
    const crate = normalizeCrateName(dep.name);
    if (skip.has(crate)) {
      continue;
    }
    const version = assignment.get(crate);
    if (version === undefined || !matchesRequirement(version, dep.requirement)) {
      violations.push({ crate, version, requirement: dep.requirement, requestedBy: dep.requestedBy });
    }
  }

  for (const [crate, version] of assignment) {
    if (skip.has(crate)) {
      violations.push({ crate, version, requirement: 'skipped', requestedBy: 'skip list' });
      continue;
    }
    const entry = records.get(crate)?.versions.find(candidate => candidate.version === version);
    for (const dependency of entry?.dependencies ?? []) {
      if (!isResolvedEdge(dependency) || skip.has(dependency.name)) {
        continue;
      }
      const requirement = tryParseRequirement(dependency.req, `${crate}@${version}`);
      if (!requirement) {
        continue;
      }
      const chosen = assignment.get(dependency.name);
      if (chosen === undefined || !requirement.matches(chosen)) {
        violations.push({
          crate: dependency.name,
          version: chosen,
          requirement: dependency.req,
          requestedBy: `${crate}@${version}`
        });
      }
    }
  }

  return violations;
}

export default VersionSolver;
