import semver from 'semver';
import type { SearchState } from './types.js';

/**
 * Interval narrowing after a failed trial.
 *
 * A failure at index `f` rules out `f` and everything above it, so the
 * interval becomes `[lo, f - 1]`. Strategies differ in where the next
 * trial lands inside it. An empty interval collapses onto the baseline.
 */
export interface NarrowingStrategy {
  readonly name: string;
  /** Worst-case trials still needed to settle this crate */
  estimateTrials(state: SearchState): number;
  narrow(state: SearchState, failedVersion: string): SearchState;
}

/**
 * Expected cost of a trial, used to decide when walking down one version
 * at a time is affordable.
 */
export interface TrialCostModel {
  /** Expected duration of one trial in milliseconds */
  expectedTrialMs(state: SearchState): number;
}

export function remainingCount(state: SearchState): number {
  return state.collapsed ? 0 : Math.max(0, state.hi - state.lo + 1);
}

/**
 * Initial state: the whole admissible list above the baseline. A baseline
 * missing from the list maps to the first version at or above it.
 */
export function createSearchState(crate: string, versions: string[], baseline: string | null): SearchState {
  let baselineIndex = 0;
  if (baseline !== null) {
    const atOrAbove = versions.findIndex(version => semver.gte(version, baseline));
    baselineIndex = atOrAbove === -1 ? 0 : atOrAbove;
  }
  return {
    crate,
    versions,
    lo: baselineIndex,
    hi: versions.length - 1,
    baselineIndex,
    failed: new Set(),
    collapsed: versions.length <= 1
  };
}

export function baselineVersion(state: SearchState): string {
  return state.versions[state.baselineIndex];
}

function collapse(state: SearchState): SearchState {
  return { ...state, lo: state.baselineIndex, hi: state.baselineIndex, collapsed: true };
}

/**
 * Shared first step: record the failure and cut the interval below it.
 * Returns null when the crate collapsed.
 */
function cutBelow(state: SearchState, failedVersion: string): { state: SearchState; newHi: number } | null {
  const failed = new Set(state.failed);
  failed.add(failedVersion);

  let failedIndex = state.versions.indexOf(failedVersion);
  if (failedIndex === -1 || failedIndex > state.hi) {
    failedIndex = state.hi;
  }

  let newHi = failedIndex - 1;
  while (newHi >= state.lo && failed.has(state.versions[newHi])) {
    newHi--;
  }

  const next = { ...state, failed };
  if (newHi < state.lo) {
    return null;
  }
  return { state: next, newHi };
}

export const linearStrategy: NarrowingStrategy = {
  name: 'linear',

  estimateTrials(state: SearchState): number {
    return Math.max(0, remainingCount(state) - 1);
  },

  narrow(state: SearchState, failedVersion: string): SearchState {
    const cut = cutBelow(state, failedVersion);
    if (!cut) {
      return collapse({ ...state, failed: new Set([...state.failed, failedVersion]) });
    }
    return { ...cut.state, hi: cut.newHi };
  }
};

export const bisectionStrategy: NarrowingStrategy = {
  name: 'bisection',

  estimateTrials(state: SearchState): number {
    const remaining = remainingCount(state);
    return remaining <= 1 ? 0 : Math.ceil(Math.log2(remaining));
  },

  narrow(state: SearchState, failedVersion: string): SearchState {
    const cut = cutBelow(state, failedVersion);
    if (!cut) {
      return collapse({ ...state, failed: new Set([...state.failed, failedVersion]) });
    }
    const { lo } = cut.state;
    return { ...cut.state, hi: lo + Math.ceil((cut.newHi - lo) / 2) };
  }
};

export interface AdaptiveStrategyOptions {
  costModel?: TrialCostModel;
  /** Walk linearly while the remaining linear scan is expected to fit in this budget */
  linearBudgetMs?: number;
}

/**
 * Bisection while more than two candidates remain, linear below that. With a
 * cost model, cheap trials keep the linear walk so the newest passing version
 * is found rather than the first one bisection lands on.
 */
export function createAdaptiveStrategy(options: AdaptiveStrategyOptions = {}): NarrowingStrategy {
  const prefersLinear = (state: SearchState, remainingAfterCut: number): boolean => {
    if (remainingAfterCut <= 2) {
      return true;
    }
    if (!options.costModel || options.linearBudgetMs === undefined) {
      return false;
    }
    return (remainingAfterCut - 1) * options.costModel.expectedTrialMs(state) <= options.linearBudgetMs;
  };

  return {
    name: 'adaptive',

    estimateTrials(state: SearchState): number {
      return prefersLinear(state, remainingCount(state))
        ? linearStrategy.estimateTrials(state)
        : bisectionStrategy.estimateTrials(state);
    },

    narrow(state: SearchState, failedVersion: string): SearchState {
      const cut = cutBelow(state, failedVersion);
      const remainingAfterCut = cut ? cut.newHi - cut.state.lo + 1 : 0;
      return prefersLinear(state, remainingAfterCut)
        ? linearStrategy.narrow(state, failedVersion)
        : bisectionStrategy.narrow(state, failedVersion);
    }
  };
}

export const adaptiveStrategy: NarrowingStrategy = createAdaptiveStrategy();

export function getNarrowingStrategy(name: string): NarrowingStrategy | null {
  switch (name) {
    case 'linear':
      return linearStrategy;
    case 'bisection':
      return bisectionStrategy;
    case 'adaptive':
      return adaptiveStrategy;
    default:
      return null;
  }
}
