import type { CandidateAssignment, ResolutionRequest, ResolutionResult } from '../resolution/types.js';

export type ValidatorState =
  | 'initial'
  | 'baseline-passed'
  | 'baseline-failed'
  | 'trial'
  | 'build-failed'
  | 'test-failed'
  | 'success'
  | 'narrow'
  | 'converged'
  | 'exhausted'
  | 'aborted';

export interface ValidatorTransition {
  from: ValidatorState;
  to: ValidatorState;
  /** 1-based trial number, 0 before the first trial */
  trial: number;
  detail?: string;
}

export interface ValidationOutcome {
  trial: number;
  assignment: CandidateAssignment;
  buildOk: boolean;
  /** Absent when tests were skipped or the build failed */
  testOk?: boolean;
  log: string;
  durationMs: number;
}

/**
 * Per-crate admissible interval during narrowing. `versions` is ascending;
 * `lo`/`hi` are inclusive indexes into it.
 */
export interface SearchState {
  crate: string;
  versions: string[];
  lo: number;
  hi: number;
  /** Index of the original pin within `versions` */
  baselineIndex: number;
  failed: Set<string>;
  collapsed: boolean;
}

/**
 * The files a trial writes to. Implemented by TrialWorkspace.
 */
export interface TrialEnvironment {
  /** Pin direct crates exactly for one trial */
  applyTrial(pins: ReadonlyMap<string, string>): Promise<void>;
  /** Write the final pins once and keep the successful lockfile */
  commit(pins: ReadonlyMap<string, string>): Promise<void>;
  /** Put every touched file back to its pre-run state */
  restore(): Promise<void>;
}

/**
 * The part of the version solver the validator needs.
 */
export interface CandidateResolver {
  resolve(request: ResolutionRequest): Promise<ResolutionResult>;
}

export interface ValidationResult {
  assignment: CandidateAssignment;
  /** Final pins of the direct crates */
  pins: Map<string, string>;
  trials: number;
  outcomes: ValidationOutcome[];
}
