import { compareDeltas, versionDelta, type VersionDelta } from '../resolution/requirement.js';
import { baselineVersion } from './narrowing.js';
import type { SearchState } from './types.js';

/**
 * Which direct crate to narrow after a failed trial.
 *
 * Candidates are crates whose interval has not collapsed and whose trial
 * version differs from the baseline. The largest distance from the baseline
 * wins (major, then minor, then patch, then number of versions in between);
 * ties go to the crate narrowed most recently, then to the smallest name.
 */

export interface BlameCandidate {
  crate: string;
  trialVersion: string;
  delta: VersionDelta;
  /** Number of admissible versions between baseline and trial version */
  distance: number;
}

export function blameCandidates(
  states: ReadonlyMap<string, SearchState>,
  pins: ReadonlyMap<string, string>
): BlameCandidate[] {
  const candidates: BlameCandidate[] = [];
  for (const [crate, state] of states) {
    const trialVersion = pins.get(crate);
    if (state.collapsed || trialVersion === undefined) {
      continue;
    }
    const baseline = baselineVersion(state);
    if (trialVersion === baseline) {
      continue;
    }
    const trialIndex = state.versions.indexOf(trialVersion);
    candidates.push({
      crate,
      trialVersion,
      delta: versionDelta(baseline, trialVersion),
      distance: trialIndex === -1 ? 0 : Math.abs(trialIndex - state.baselineIndex)
    });
  }
  return candidates;
}

export function selectBlamedCrate(candidates: BlameCandidate[], lastNarrowed: string | null): BlameCandidate | null {
  let best: BlameCandidate | null = null;
  for (const candidate of candidates) {
    if (best === null || compareBlame(candidate, best, lastNarrowed) > 0) {
      best = candidate;
    }
  }
  return best;
}

/**
 * Positive when `a` should be blamed before `b`.
 */
function compareBlame(a: BlameCandidate, b: BlameCandidate, lastNarrowed: string | null): number {
  const byDelta = compareDeltas(a.delta, b.delta) || (a.distance - b.distance);
  if (byDelta !== 0) {
    return byDelta;
  }
  if (a.crate === lastNarrowed) {
    return 1;
  }
  if (b.crate === lastNarrowed) {
    return -1;
  }
  return a.crate < b.crate ? 1 : a.crate > b.crate ? -1 : 0;
}
