import { DEFAULTS } from '../../constants/index.js';
import { logger } from '../../utils/logger.js';
import {
  BaselineFailedError,
  NoCandidateVersionsError,
  RunAbortedError,
  UnresolvableConflictError,
  ValidationExhaustedError
} from '../../utils/errors.js';
import type { CandidateAssignment, ResolutionRequest, ResolutionResult, VersionInterval } from '../resolution/types.js';
import { blameCandidates, selectBlamedCrate } from './blame.js';
import { buildCargoArgs, type BuildOptions, type BuildRunner } from './cargo-runner.js';
import {
  adaptiveStrategy,
  createAdaptiveStrategy,
  createSearchState,
  type NarrowingStrategy,
  type TrialCostModel
} from './narrowing.js';
import type {
  CandidateResolver,
  SearchState,
  TrialEnvironment,
  ValidationOutcome,
  ValidationResult,
  ValidatorState,
  ValidatorTransition
} from './types.js';

export interface ValidatorOptions {
  resolver: CandidateResolver;
  environment: TrialEnvironment;
  runner: BuildRunner;
  /** Directory the build tool runs in (the project root) */
  workdir: string;
  build: BuildOptions;
  runTests: boolean;
  /** Defaults to the adaptive strategy */
  strategy?: NarrowingStrategy;
  /**
   * With the default strategy, keep scanning one version at a time while the
   * scan is expected to take at most this long, judged by measured trials.
   */
  linearBudgetMs?: number;
  maxTrials?: number;
  /** Run one trial at the original pins first and stop if it fails */
  checkBaseline?: boolean;
  signal?: AbortSignal;
  onTransition?: (transition: ValidatorTransition) => void;
  /** Millisecond clock, injectable for tests */
  clock?: () => number;
}

export interface ValidationInput {
  request: ResolutionRequest;
  initial: ResolutionResult;
  /** Direct crate → original pin */
  baselines: ReadonlyMap<string, string>;
}

/**
 * Average duration of the trials run so far.
 */
export class MeasuredTrialCost implements TrialCostModel {
  private total = 0;
  private count = 0;

  record(durationMs: number): void {
    this.total += durationMs;
    this.count++;
  }

  expectedTrialMs(): number {
    return this.count === 0 ? Number.POSITIVE_INFINITY : this.total / this.count;
  }
}

/**
 * Drives build/test trials until one passes or the search space is used up.
 *
 * initial → trial → success → converged
 *                 → build-failed | test-failed → narrow → trial → …
 *                                                       → exhausted
 * With checkBaseline the first trial runs the original pins and ends in
 * baseline-passed or baseline-failed.
 * Files are restored on every path except convergence.
 */
export class CompatibilityValidator {
  private readonly options: ValidatorOptions;
  private readonly strategy: NarrowingStrategy;
  private readonly cost = new MeasuredTrialCost();
  private readonly maxTrials: number;
  private readonly clock: () => number;
  private state: ValidatorState = 'initial';
  private trial = 0;

  constructor(options: ValidatorOptions) {
    this.options = options;
    this.maxTrials = options.maxTrials ?? DEFAULTS.MAX_TRIALS;
    this.clock = options.clock ?? (() => Date.now());
    this.strategy = options.strategy
      ?? (options.linearBudgetMs !== undefined
        ? createAdaptiveStrategy({ costModel: this.cost, linearBudgetMs: options.linearBudgetMs })
        : adaptiveStrategy);
  }

  getState(): ValidatorState {
    return this.state;
  }

  async run(input: ValidationInput): Promise<ValidationResult> {
    const states = new Map<string, SearchState>();
    for (const [crate, versions] of input.initial.admissible) {
      states.set(crate, createSearchState(crate, versions, input.baselines.get(crate) ?? null));
    }

    const narrowed = new Set<string>();
    const outcomes: ValidationOutcome[] = [];
    let current = input.initial.assignment;
    let lastNarrowed: string | null = null;

    try {
      if (this.options.checkBaseline) {
        outcomes.push(await this.verifyBaseline(input, states));
      }

      for (;;) {
        if (this.options.signal?.aborted) {
          this.transition('aborted');
          throw new RunAbortedError();
        }
        if (this.trial >= this.maxTrials) {
          logger.warn(`Reached the trial limit (${this.maxTrials})`);
          throw this.exhausted(current, states, input.baselines, outcomes);
        }

        const pins = directPins(current, states);
        const outcome = await this.runTrial(pins, current);
        outcomes.push(outcome);

        if (outcome.buildOk && outcome.testOk !== false) {
          this.transition('success');
          await this.options.environment.commit(pins);
          this.transition('converged');
          return { assignment: current, pins, trials: this.trial, outcomes };
        }

        this.transition(outcome.buildOk ? 'test-failed' : 'build-failed');
        this.transition('narrow');

        const next = await this.narrowAndResolve(states, pins, narrowed, lastNarrowed, input.request);
        if (!next) {
          throw this.exhausted(current, states, input.baselines, outcomes);
        }
        current = next.assignment;
        lastNarrowed = next.blamed;
      }
    } catch (error) {
      await this.restoreAfter(error);
      throw error;
    }
  }

  /**
   * Resolve with every direct crate held at its original pin and run one
   * trial. Throws BaselineFailedError when that cannot be resolved or fails.
   */
  private async verifyBaseline(input: ValidationInput, states: ReadonlyMap<string, SearchState>): Promise<ValidationOutcome> {
    const originalPins = Object.fromEntries(input.baselines);
    const intervals = new Map<string, VersionInterval>();
    for (const [crate, version] of input.baselines) {
      intervals.set(crate, { min: version, max: version });
    }

    let baseline: ResolutionResult;
    try {
      baseline = await this.options.resolver.resolve({ ...input.request, intervals });
    } catch (error) {
      if (!(error instanceof NoCandidateVersionsError) && !(error instanceof UnresolvableConflictError)) {
        throw error;
      }
      this.transition('baseline-failed');
      throw new BaselineFailedError({
        pins: originalPins,
        reason: `they cannot be resolved: ${error.message}`,
        log: ''
      });
    }

    const outcome = await this.runTrial(directPins(baseline.assignment, states), baseline.assignment);
    if (!outcome.buildOk || outcome.testOk === false) {
      this.transition('baseline-failed');
      throw new BaselineFailedError({
        pins: originalPins,
        reason: outcome.buildOk ? 'tests failed' : 'build failed',
        log: outcome.log
      });
    }
    this.transition('baseline-passed');
    return outcome;
  }

  private async runTrial(pins: Map<string, string>, assignment: CandidateAssignment): Promise<ValidationOutcome> {
    this.trial++;
    this.transition('trial', [...pins].map(([crate, version]) => `${crate}@${version}`).join(', '));

    const started = this.clock();
    await this.options.environment.applyTrial(pins);

    const { runner, workdir, build } = this.options;
    const buildArgs = buildCargoArgs('build', build);
    const buildRun = await runner.run(workdir, buildArgs);
    const log = [formatRunLog(buildArgs, buildRun.stdout, buildRun.stderr)];

    let testOk: boolean | undefined;
    if (buildRun.succeeded && this.options.runTests) {
      const testArgs = buildCargoArgs('test', build);
      const testRun = await runner.run(workdir, testArgs);
      testOk = testRun.succeeded;
      log.push(formatRunLog(testArgs, testRun.stdout, testRun.stderr));
    }

    const durationMs = this.clock() - started;
    this.cost.record(durationMs);

    const outcome: ValidationOutcome = {
      trial: this.trial,
      assignment: new Map(assignment),
      buildOk: buildRun.succeeded,
      log: log.join('\n'),
      durationMs
    };
    if (testOk !== undefined) {
      outcome.testOk = testOk;
    }
    return outcome;
  }

  /**
   * Narrow the blamed crate and ask for a new assignment. When the resolver
   * finds none under the narrowed interval, the newest version left in it is
   * treated as failed too. Returns null when no crate can be blamed.
   */
  private async narrowAndResolve(
    states: Map<string, SearchState>,
    pins: ReadonlyMap<string, string>,
    narrowed: Set<string>,
    lastNarrowed: string | null,
    request: ResolutionRequest
  ): Promise<{ assignment: CandidateAssignment; blamed: string } | null> {
    const exhaustedCrates = new Set<string>();

    for (;;) {
      const candidates = blameCandidates(states, pins).filter(candidate => !exhaustedCrates.has(candidate.crate));
      const blamed = selectBlamedCrate(candidates, lastNarrowed);
      if (!blamed) {
        return null;
      }

      let failedVersion = blamed.trialVersion;
      for (;;) {
        const before = states.get(blamed.crate);
        if (!before) {
          return null;
        }
        const after = this.strategy.narrow(before, failedVersion);
        states.set(blamed.crate, after);
        narrowed.add(blamed.crate);
        logger.debug(`Narrowed ${blamed.crate} with ${this.strategy.name}`, {
          failed: failedVersion,
          interval: describeInterval(after),
          collapsed: after.collapsed
        });

        try {
          const result = await this.options.resolver.resolve({
            ...request,
            intervals: intervalsFor(states, narrowed)
          });
          return { assignment: result.assignment, blamed: blamed.crate };
        } catch (error) {
          if (!(error instanceof NoCandidateVersionsError) && !(error instanceof UnresolvableConflictError)) {
            throw error;
          }
          logger.debug(`No assignment with ${blamed.crate} in ${describeInterval(after)}`, { reason: error.message });
          if (after.collapsed) {
            exhaustedCrates.add(blamed.crate);
            break;
          }
          failedVersion = after.versions[after.hi];
        }
      }
    }
  }

  private exhausted(
    current: CandidateAssignment,
    states: Map<string, SearchState>,
    baselines: ReadonlyMap<string, string>,
    outcomes: ValidationOutcome[]
  ): ValidationExhaustedError {
    this.transition('exhausted');
    const constraints: Record<string, VersionInterval | null> = {};
    for (const [crate, state] of states) {
      constraints[crate] = state.versions.length > 0
        ? { min: state.versions[state.lo], max: state.versions[state.hi] }
        : null;
    }
    return new ValidationExhaustedError({
      trials: this.trial,
      lastAssignment: Object.fromEntries(current),
      constraints,
      originalVersions: Object.fromEntries(baselines),
      lastLog: outcomes.length > 0 ? outcomes[outcomes.length - 1].log : ''
    });
  }

  private async restoreAfter(error: unknown): Promise<void> {
    try {
      await this.options.environment.restore();
    } catch (restoreError) {
      logger.error('Failed to restore manifests after an unsuccessful run', { restoreError, cause: error });
    }
  }

  private transition(to: ValidatorState, detail?: string): void {
    const transition: ValidatorTransition = { from: this.state, to, trial: this.trial };
    if (detail !== undefined) {
      transition.detail = detail;
    }
    logger.debug(`Validator ${this.state} → ${to}`, { trial: this.trial, detail });
    this.state = to;
    this.options.onTransition?.(transition);
  }
}

function directPins(assignment: CandidateAssignment, states: ReadonlyMap<string, SearchState>): Map<string, string> {
  const pins = new Map<string, string>();
  for (const crate of states.keys()) {
    const version = assignment.get(crate);
    if (version !== undefined) {
      pins.set(crate, version);
    }
  }
  return pins;
}

function intervalsFor(states: ReadonlyMap<string, SearchState>, narrowed: ReadonlySet<string>): Map<string, VersionInterval> {
  const intervals = new Map<string, VersionInterval>();
  for (const crate of narrowed) {
    const state = states.get(crate);
    if (state && state.versions.length > 0) {
      intervals.set(crate, { min: state.versions[state.lo], max: state.versions[state.hi] });
    }
  }
  return intervals;
}

function describeInterval(state: SearchState): string {
  return `[${state.versions[state.lo]}, ${state.versions[state.hi]}]`;
}

function formatRunLog(args: string[], stdout: string, stderr: string): string {
  return [`$ cargo ${args.join(' ')}`, stdout.trimEnd(), stderr.trimEnd()].filter(part => part !== '').join('\n');
}
