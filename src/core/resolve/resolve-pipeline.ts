import type { DependencySource, ResolvedSettings } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { formatPathForDisplay } from '../../utils/formatters.js';
import type { OutputPort } from '../ports/output.js';
import { consoleOutput } from '../ports/console-output.js';
import { scanProject, selectPackages } from '../manifest/cargo-manifest.js';
import { readLockfile, selectBaseline, type LockedVersions } from '../manifest/cargo-lock.js';
import { TrialWorkspace } from '../manifest/trial-workspace.js';
import type { CargoPackage, DependencyLocation } from '../manifest/types.js';
import { FileCrateStore, type CrateStore } from '../registry/crate-store.js';
import { RegistryClient } from '../registry/registry-client.js';
import { SparseIndexTransport } from '../registry/transport.js';
import type { RegistryTransport } from '../registry/types.js';
import type { CandidateAssignment, DirectDependency, ResolutionRequest, ResolutionResult } from '../resolution/types.js';
import { VersionSolver } from '../resolution/version-solver.js';
import { CargoRunner, type BuildRunner } from '../validation/cargo-runner.js';
import type { NarrowingStrategy } from '../validation/narrowing.js';
import type { ValidationOutcome, ValidationResult, ValidatorTransition } from '../validation/types.js';
import { CompatibilityValidator } from '../validation/validator.js';

export interface ResolvePipelineOptions {
  /** Directory or Cargo.toml of the package or workspace */
  path: string;
  includes: string[];
  settings: ResolvedSettings;
  release: boolean;
  features: string[];
  runTests: boolean;
  strategy?: NarrowingStrategy;
  linearBudgetMs?: number;
  /** Build the original pins before searching and stop if they fail */
  checkBaseline?: boolean;
  /** Run `cargo clean` once validation ends, whatever the outcome */
  clean?: boolean;
  output?: OutputPort;
  signal?: AbortSignal;
  onTransition?: (transition: ValidatorTransition) => void;
  // Collaborators, injectable for tests
  client?: RegistryClient;
  store?: CrateStore;
  transport?: RegistryTransport;
  runner?: BuildRunner;
}

export interface SkippedDependency {
  package: string;
  name: string;
  source: DependencySource;
}

export interface ResolvePipelineResult {
  packages: string[];
  assignment: CandidateAssignment;
  /** Final pins written for direct crates */
  pins: Map<string, string>;
  baselines: Map<string, string>;
  skipped: SkippedDependency[];
  stale: boolean;
  staleCrates: string[];
  trials: number;
  outcomes: ValidationOutcome[];
}

export interface PreparedRequest {
  request: ResolutionRequest;
  skipped: SkippedDependency[];
  /** Direct crate → every manifest entry declaring it */
  targets: Map<string, DependencyLocation[]>;
}

/**
 * Turn the selected packages' manifests into a resolution request. Git and
 * path dependencies go to `skip` and keep their manifest entries.
 */
export function buildResolutionRequest(packages: CargoPackage[]): PreparedRequest {
  const directDependencies: DirectDependency[] = [];
  const skip = new Set<string>();
  const skipped: SkippedDependency[] = [];
  const targets = new Map<string, DependencyLocation[]>();

  for (const pkg of packages) {
    for (const dep of pkg.dependencies) {
      if (dep.source !== 'registry') {
        skip.add(dep.name);
        skipped.push({ package: pkg.name, name: dep.name, source: dep.source });
        continue;
      }
      directDependencies.push({
        name: dep.name,
        requirement: dep.requirement ?? '*',
        kind: dep.kind,
        requestedBy: pkg.name
      });

      const locations = targets.get(dep.name) ?? [];
      const duplicate = locations.some(location =>
        location.manifestPath === dep.location.manifestPath
        && location.key === dep.location.key
        && location.table.join('.') === dep.location.table.join('.')
      );
      if (!duplicate) {
        locations.push(dep.location);
      }
      targets.set(dep.name, locations);
    }
  }

  for (const name of skip) {
    targets.delete(name);
  }

  return {
    request: {
      directDependencies: directDependencies.filter(dep => !skip.has(dep.name)),
      skip
    },
    skipped,
    targets
  };
}

export function computeBaselines(
  directDependencies: DirectDependency[],
  locked: LockedVersions | null
): Map<string, string> {
  const requirements = new Map<string, string[]>();
  for (const dep of directDependencies) {
    const list = requirements.get(dep.name) ?? [];
    list.push(dep.requirement);
    requirements.set(dep.name, list);
  }

  const baselines = new Map<string, string>();
  for (const [crate, reqs] of requirements) {
    const baseline = selectBaseline(crate, reqs, locked);
    if (baseline !== null) {
      baselines.set(crate, baseline);
    }
  }
  return baselines;
}

function createClient(options: ResolvePipelineOptions): RegistryClient {
  if (options.client) {
    return options.client;
  }
  const { settings } = options;
  return new RegistryClient({
    store: options.store ?? new FileCrateStore(settings.cacheDir),
    transport: options.transport ?? new SparseIndexTransport({
      registryUrl: settings.registryUrl,
      timeoutMs: settings.requestTimeoutMs
    }),
    cacheAgeHours: settings.cacheAgeHours,
    concurrency: settings.concurrency
  });
}

function reportTransition(output: OutputPort, transition: ValidatorTransition): void {
  switch (transition.to) {
    case 'trial':
      output.step(`Trial ${transition.trial}: ${transition.detail ?? ''}`.trimEnd());
      break;
    case 'build-failed':
      output.warn(`Trial ${transition.trial}: build failed, narrowing`);
      break;
    case 'test-failed':
      output.warn(`Trial ${transition.trial}: tests failed, narrowing`);
      break;
    case 'baseline-passed':
      output.success(`Trial ${transition.trial}: original pins pass, searching for newer versions`);
      break;
    default:
      break;
  }
}

/**
 * A failed clean is only a warning; it runs in a finally block.
 */
async function cleanBuildArtifacts(runner: BuildRunner, rootDir: string, output: OutputPort): Promise<void> {
  try {
    const run = await runner.run(rootDir, ['clean']);
    if (!run.succeeded) {
      output.warn(`cargo clean exited with ${run.exitCode ?? 'a signal'}`);
    }
  } catch (error) {
    logger.warn('Failed to run cargo clean', { error });
    output.warn('Could not run cargo clean');
  }
}

/**
 * scan → select → request → baselines → resolve → validate.
 * Manifests change only when a trial converges.
 */
export async function runResolvePipeline(options: ResolvePipelineOptions): Promise<ResolvePipelineResult> {
  const output = options.output ?? consoleOutput;

  const project = await scanProject(options.path);
  const selection = selectPackages(project, options.includes);
  for (const warning of selection.warnings) {
    output.warn(warning);
  }
  const packageNames = selection.packages.map(pkg => pkg.name);
  output.info(`Resolving ${packageNames.join(', ')} (${formatPathForDisplay(project.rootManifestPath)})`);

  const { request, skipped, targets } = buildResolutionRequest(selection.packages);
  for (const dep of skipped) {
    if (dep.source === 'git') {
      output.warn(`Skipping git dependency '${dep.name}' of ${dep.package}; its manifest entry is left unchanged`);
    } else {
      logger.debug(`Skipping path dependency '${dep.name}' of ${dep.package}`);
    }
  }

  if (request.directDependencies.length === 0) {
    output.info('No registry dependencies to resolve');
    return {
      packages: packageNames,
      assignment: new Map(),
      pins: new Map(),
      baselines: new Map(),
      skipped,
      stale: false,
      staleCrates: [],
      trials: 0,
      outcomes: []
    };
  }

  const locked = await readLockfile(project.rootDir);
  if (locked === null) {
    output.warn('No Cargo.lock found; original pins default to the lowest versions the requirements allow');
  }
  const baselines = computeBaselines(request.directDependencies, locked);

  const solver = new VersionSolver(createClient(options), { maxBacktracks: options.settings.maxBacktracks });
  const spinner = output.spinner();
  spinner.start(`Resolving ${targets.size} direct dependencies`);
  let initial: ResolutionResult;
  try {
    initial = await solver.resolve(request);
  } catch (error) {
    spinner.stop('Resolution failed');
    throw error;
  }
  spinner.stop(`Resolved ${initial.assignment.size} crates (${initial.backtracks} backtracks)`);

  if (initial.staleCrates.length > 0) {
    output.warn(`Resolution is based on stale metadata for: ${initial.staleCrates.join(', ')}`);
  }

  const workspace = await TrialWorkspace.open(project.rootDir, targets);
  const runner = options.runner ?? new CargoRunner(options.settings.cargoPath);
  const validator = new CompatibilityValidator({
    resolver: solver,
    environment: workspace,
    runner,
    workdir: project.rootDir,
    build: { packages: packageNames, features: options.features, release: options.release },
    runTests: options.runTests,
    strategy: options.strategy,
    linearBudgetMs: options.linearBudgetMs,
    maxTrials: options.settings.maxTrials,
    checkBaseline: options.checkBaseline,
    signal: options.signal,
    onTransition: transition => {
      reportTransition(output, transition);
      options.onTransition?.(transition);
    }
  });

  let validation: ValidationResult;
  try {
    validation = await validator.run({ request, initial, baselines });
  } finally {
    if (options.clean) {
      await cleanBuildArtifacts(runner, project.rootDir, output);
    }
  }

  return {
    packages: packageNames,
    assignment: validation.assignment,
    pins: validation.pins,
    baselines,
    skipped,
    stale: initial.staleCrates.length > 0,
    staleCrates: initial.staleCrates,
    trials: validation.trials,
    outcomes: validation.outcomes
  };
}
