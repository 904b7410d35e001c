import semver from 'semver';
import { ValidationError } from '../../utils/errors.js';

/**
 * Cargo version requirements on top of the `semver` package.
 *
 * Cargo separates comparators with commas and reads a bare version as a
 * caret requirement; node-semver separates with spaces and reads a bare
 * version as exact. Everything else (`*`, `1.*`, `~`, `^`, `=`, `<`, `<=`,
 * `>`, `>=`) has the same meaning in both.
 */

export interface VersionRequirement {
  /** Requirement as written in the manifest or index */
  readonly raw: string;
  /** Equivalent node-semver range */
  readonly range: string;
  matches(version: string): boolean;
}

export interface VersionDelta {
  major: number;
  minor: number;
  patch: number;
}

const OPERATOR_SPACING = /^(\^|~|=|<=|>=|<|>)\s+/;
const BARE_VERSION = /^v?\d/;
const WILDCARD_PART = /(^|\.)[*xX](?=\.|$)/;

const parsed = new Map<string, VersionRequirement>();

function translateComparator(comparator: string): string {
  const trimmed = comparator.trim().replace(OPERATOR_SPACING, '$1');
  if (trimmed === '' || trimmed === '*') {
    return '*';
  }
  if (BARE_VERSION.test(trimmed) && !WILDCARD_PART.test(trimmed.split(/[-+]/)[0])) {
    return `^${trimmed}`;
  }
  return trimmed;
}

/**
 * Translate a Cargo requirement into a node-semver range string.
 */
export function toSemverRange(requirement: string): string {
  const range = requirement
    .split(',')
    .map(translateComparator)
    .join(' ');

  if (semver.validRange(range) === null) {
    throw new ValidationError(`Invalid version requirement '${requirement}'`, { requirement });
  }
  return range;
}

export function parseRequirement(raw: string): VersionRequirement {
  const key = raw.trim();
  const existing = parsed.get(key);
  if (existing) {
    return existing;
  }

  const range = toSemverRange(key);
  const requirement: VersionRequirement = {
    raw: key,
    range,
    matches: (version: string) => semver.satisfies(version, range)
  };
  parsed.set(key, requirement);
  return requirement;
}

export function matchesRequirement(version: string, requirement: string): boolean {
  return parseRequirement(requirement).matches(version);
}

export function sortVersionsAscending(versions: Iterable<string>): string[] {
  return [...versions].sort(semver.compare);
}

/**
 * Lowest version a requirement admits, e.g. `1.2` → `1.2.0`, `>=0.3, <0.5` → `0.3.0`.
 */
export function minimumVersion(requirement: string): string | null {
  const min = semver.minVersion(parseRequirement(requirement).range);
  return min ? min.version : null;
}

/**
 * Absolute per-field distance between two versions.
 */
export function versionDelta(from: string, to: string): VersionDelta {
  const a = semver.parse(from);
  const b = semver.parse(to);
  if (!a || !b) {
    throw new ValidationError(`Cannot compare '${from}' and '${to}': not valid versions`);
  }
  return {
    major: Math.abs(a.major - b.major),
    minor: Math.abs(a.minor - b.minor),
    patch: Math.abs(a.patch - b.patch)
  };
}

/**
 * Orders deltas by major, then minor, then patch. Positive when `a` is larger.
 */
export function compareDeltas(a: VersionDelta, b: VersionDelta): number {
  return (a.major - b.major) || (a.minor - b.minor) || (a.patch - b.patch);
}
