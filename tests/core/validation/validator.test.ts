import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { MemoryCrateStore } from '../../../src/core/registry/crate-store.js';
import { RegistryClient } from '../../../src/core/registry/registry-client.js';
import type { RawIndexEntry } from '../../../src/core/registry/types.js';
import type { ResolutionRequest } from '../../../src/core/resolution/types.js';
import { VersionSolver } from '../../../src/core/resolution/version-solver.js';
import { linearStrategy } from '../../../src/core/validation/narrowing.js';
import type { TrialEnvironment, ValidationResult, ValidatorTransition } from '../../../src/core/validation/types.js';
import { CompatibilityValidator, type ValidatorOptions } from '../../../src/core/validation/validator.js';
import { BaselineFailedError, RunAbortedError, ValidationExhaustedError } from '../../../src/utils/errors.js';
import { dep, indexEntries, FakeTransport, ScriptedRunner, type RunnerCall } from '../../test-helpers.js';

class FakeEnvironment implements TrialEnvironment {
  current = new Map<string, string>();
  readonly trials: Array<Map<string, string>> = [];
  committed: Map<string, string> | null = null;
  restored = 0;

  async applyTrial(pins: ReadonlyMap<string, string>): Promise<void> {
    this.current = new Map(pins);
    this.trials.push(new Map(pins));
  }

  async commit(pins: ReadonlyMap<string, string>): Promise<void> {
    this.committed = new Map(pins);
  }

  async restore(): Promise<void> {
    this.restored++;
  }
}

const DEP_VERSIONS = indexEntries('dep', { '3.0.0': [], '3.1.0': [], '3.2.0': [], '3.3.0': [], '3.4.0': [] });

interface Harness {
  validator: CompatibilityValidator;
  environment: FakeEnvironment;
  runner: ScriptedRunner;
  transitions: ValidatorTransition[];
  run(): Promise<ValidationResult>;
}

function harness(
  crates: Record<string, RawIndexEntry[]>,
  request: ResolutionRequest,
  baselines: Record<string, string>,
  decide: (call: RunnerCall, environment: FakeEnvironment) => boolean,
  overrides: Partial<ValidatorOptions> = {}
): Harness {
  const client = new RegistryClient({
    store: new MemoryCrateStore(),
    transport: new FakeTransport(crates),
    cacheAgeHours: 48
  });
  const resolver = new VersionSolver(client);
  const environment = new FakeEnvironment();
  const runner = new ScriptedRunner(call => decide(call, environment));
  const transitions: ValidatorTransition[] = [];
  let now = 0;

  const validator = new CompatibilityValidator({
    resolver,
    environment,
    runner,
    workdir: '/work/demo',
    build: { packages: ['app'], features: [], release: false },
    runTests: true,
    onTransition: transition => transitions.push(transition),
    clock: () => (now += 1000),
    ...overrides
  });

  return {
    validator,
    environment,
    runner,
    transitions,
    run: async () => validator.run({
      request,
      initial: await resolver.resolve(request),
      baselines: new Map(Object.entries(baselines))
    })
  };
}

function requestFor(...deps: Array<[string, string]>): ResolutionRequest {
  return {
    directDependencies: deps.map(([name, requirement]) => ({ name, requirement, kind: 'normal', requestedBy: 'app' })),
    skip: new Set()
  };
}

const WORKS_UP_TO_3_2 = new Set(['3.0.0', '3.1.0', '3.2.0']);

describe('CompatibilityValidator', () => {
  it('converges on the first trial when the newest versions build', async () => {
    const h = harness({ dep: DEP_VERSIONS }, requestFor(['dep', '^3.0']), { dep: '3.0.0' }, () => true);

    const result = await h.run();

    assert.deepEqual(Object.fromEntries(result.pins), { dep: '3.4.0' });
    assert.equal(result.trials, 1);
    assert.deepEqual(h.runner.calls.map(call => call.args), [
      ['build', '--package', 'app'],
      ['test', '--package', 'app']
    ]);
    assert.equal(h.runner.calls[0].workdir, '/work/demo');
    assert.deepEqual(h.environment.committed && Object.fromEntries(h.environment.committed), { dep: '3.4.0' });
    assert.equal(h.environment.restored, 0);
    assert.equal(h.validator.getState(), 'converged');
  });

  it('narrows a failing crate until the build passes', async () => {
    const h = harness(
      { dep: DEP_VERSIONS },
      requestFor(['dep', '^3.0']),
      { dep: '3.0.0' },
      (call, environment) => call.args[0] !== 'build' || WORKS_UP_TO_3_2.has(environment.current.get('dep') ?? '')
    );

    const result = await h.run();

    assert.deepEqual(Object.fromEntries(result.pins), { dep: '3.2.0' });
    assert.equal(result.trials, 2);
    assert.deepEqual(h.environment.trials.map(pins => pins.get('dep')), ['3.4.0', '3.2.0']);
    assert.deepEqual(h.transitions.map(transition => transition.to), [
      'trial', 'build-failed', 'narrow', 'trial', 'success', 'converged'
    ]);
    assert.equal(h.transitions[0].detail, 'dep@3.4.0');
    assert.equal(result.outcomes[0].buildOk, false);
    assert.equal(result.outcomes[0].log, '$ cargo build --package app\nerror[E0308]: mismatched types');
  });

  it('treats failing tests like a failing build', async () => {
    const h = harness(
      { dep: DEP_VERSIONS },
      requestFor(['dep', '^3.0']),
      { dep: '3.0.0' },
      (call, environment) => call.args[0] !== 'test' || environment.current.get('dep') !== '3.4.0'
    );

    const result = await h.run();

    assert.deepEqual(Object.fromEntries(result.pins), { dep: '3.2.0' });
    assert.equal(result.outcomes[0].buildOk, true);
    assert.equal(result.outcomes[0].testOk, false);
    assert.equal(h.runner.calls.length, 4);
    assert.equal(h.transitions[1].to, 'test-failed');
  });

  it('skips tests when asked', async () => {
    const h = harness({ dep: DEP_VERSIONS }, requestFor(['dep', '^3.0']), { dep: '3.0.0' }, () => true, {
      runTests: false
    });

    const result = await h.run();

    assert.deepEqual(h.runner.calls.map(call => call.args[0]), ['build']);
    assert.equal(result.outcomes[0].testOk, undefined);
  });

  it('walks one version at a time with the linear strategy', async () => {
    const h = harness(
      { dep: DEP_VERSIONS },
      requestFor(['dep', '^3.0']),
      { dep: '3.0.0' },
      (_call, environment) => WORKS_UP_TO_3_2.has(environment.current.get('dep') ?? ''),
      { strategy: linearStrategy }
    );

    const result = await h.run();

    assert.deepEqual(h.environment.trials.map(pins => pins.get('dep')), ['3.4.0', '3.3.0', '3.2.0']);
    assert.equal(result.trials, 3);
  });

  it('blames the crate that moved furthest from its baseline', async () => {
    const h = harness(
      {
        a: indexEntries('a', { '1.0.0': [], '1.1.0': [] }),
        b: indexEntries('b', { '0.1.0': [], '0.2.0': [], '0.3.0': [] })
      },
      requestFor(['a', '^1.0'], ['b', '>=0.1']),
      { a: '1.0.0', b: '0.1.0' },
      (_call, environment) => environment.current.get('b') !== '0.3.0'
    );

    const result = await h.run();

    assert.deepEqual(Object.fromEntries(result.pins), { a: '1.1.0', b: '0.2.0' });
    assert.equal(result.trials, 2);
  });

  it('reports exhaustion and restores files when every trial fails', async () => {
    const h = harness({ dep: DEP_VERSIONS }, requestFor(['dep', '^3.0']), { dep: '3.0.0' }, () => false);

    const error = await h.run().then(
      () => assert.fail('expected the run to fail'),
      (caught: unknown) => caught
    );

    assert.ok(error instanceof ValidationExhaustedError);
    assert.deepEqual(h.environment.trials.map(pins => pins.get('dep')), ['3.4.0', '3.2.0', '3.1.0', '3.0.0']);
    assert.equal(error.report.trials, 4);
    assert.deepEqual(error.report.lastAssignment, { dep: '3.0.0' });
    assert.deepEqual(error.report.constraints, { dep: { min: '3.0.0', max: '3.0.0' } });
    assert.deepEqual(error.report.originalVersions, { dep: '3.0.0' });
    assert.equal(error.report.lastLog, '$ cargo build --package app\nerror[E0308]: mismatched types');
    assert.equal(h.environment.restored, 1);
    assert.equal(h.environment.committed, null);
    assert.equal(h.transitions[h.transitions.length - 1].to, 'exhausted');
  });

  it('gives up when no assignment fits the narrowed interval', async () => {
    const h = harness(
      {
        dep: DEP_VERSIONS,
        x: indexEntries('x', { '1.0.0': [dep('dep', '>=3.3')] })
      },
      requestFor(['dep', '^3.0'], ['x', '=1.0.0']),
      { dep: '3.0.0', x: '1.0.0' },
      () => false
    );

    await assert.rejects(h.run(), (error: unknown) => {
      assert.ok(error instanceof ValidationExhaustedError);
      assert.equal(error.report.trials, 1);
      assert.deepEqual(error.report.lastAssignment, { dep: '3.4.0', x: '1.0.0' });
      return true;
    });
    assert.equal(h.runner.calls.length, 1);
  });

  it('stops at the trial limit', async () => {
    const h = harness({ dep: DEP_VERSIONS }, requestFor(['dep', '^3.0']), { dep: '3.0.0' }, () => false, {
      maxTrials: 1
    });

    await assert.rejects(h.run(), (error: unknown) => {
      assert.ok(error instanceof ValidationExhaustedError);
      assert.equal(error.report.trials, 1);
      assert.deepEqual(error.report.lastAssignment, { dep: '3.2.0' });
      return true;
    });
  });

  it('aborts before the next trial and restores files', async () => {
    const controller = new AbortController();
    controller.abort();
    const h = harness({ dep: DEP_VERSIONS }, requestFor(['dep', '^3.0']), { dep: '3.0.0' }, () => true, {
      signal: controller.signal
    });

    await assert.rejects(h.run(), RunAbortedError);
    assert.equal(h.runner.calls.length, 0);
    assert.equal(h.environment.restored, 1);
    assert.deepEqual(h.transitions.map(transition => transition.to), ['aborted']);
  });
});

describe('CompatibilityValidator baseline check', () => {
  it('builds the original pins before searching', async () => {
    const h = harness({ dep: DEP_VERSIONS }, requestFor(['dep', '^3.0']), { dep: '3.0.0' }, () => true, {
      checkBaseline: true
    });

    const result = await h.run();

    assert.deepEqual(h.environment.trials.map(pins => pins.get('dep')), ['3.0.0', '3.4.0']);
    assert.deepEqual(h.transitions.map(transition => transition.to), [
      'trial', 'baseline-passed', 'trial', 'success', 'converged'
    ]);
    assert.deepEqual(Object.fromEntries(result.pins), { dep: '3.4.0' });
    assert.equal(result.trials, 2);
    assert.equal(result.outcomes.length, 2);
  });

  it('stops and restores files when the original pins fail to build', async () => {
    const h = harness(
      { dep: DEP_VERSIONS },
      requestFor(['dep', '^3.0']),
      { dep: '3.0.0' },
      (call, environment) => call.args[0] !== 'build' || environment.current.get('dep') !== '3.0.0',
      { checkBaseline: true }
    );

    await assert.rejects(h.run(), (error: unknown) => {
      assert.ok(error instanceof BaselineFailedError);
      assert.equal(
        error.message,
        'The project does not pass with its original pins (build failed); fix that first, manifests left unchanged'
      );
      assert.deepEqual(error.failure.pins, { dep: '3.0.0' });
      assert.equal(error.failure.log, '$ cargo build --package app\nerror[E0308]: mismatched types');
      return true;
    });
    assert.equal(h.runner.calls.length, 1);
    assert.equal(h.environment.restored, 1);
    assert.equal(h.environment.committed, null);
    assert.deepEqual(h.transitions.map(transition => transition.to), ['trial', 'baseline-failed']);
  });

  it('reports failing tests at the original pins', async () => {
    const h = harness(
      { dep: DEP_VERSIONS },
      requestFor(['dep', '^3.0']),
      { dep: '3.0.0' },
      call => call.args[0] !== 'test',
      { checkBaseline: true }
    );

    await assert.rejects(h.run(), (error: unknown) => {
      assert.ok(error instanceof BaselineFailedError);
      assert.equal(error.failure.reason, 'tests failed');
      return true;
    });
    assert.deepEqual(h.runner.calls.map(call => call.args[0]), ['build', 'test']);
  });

  it('fails without a trial when the original pins cannot be resolved', async () => {
    const h = harness({ dep: DEP_VERSIONS }, requestFor(['dep', '^3.0']), { dep: '3.0.5' }, () => true, {
      checkBaseline: true
    });

    await assert.rejects(h.run(), (error: unknown) => {
      assert.ok(error instanceof BaselineFailedError);
      assert.match(error.failure.reason, /^they cannot be resolved: /);
      assert.equal(error.failure.log, '');
      return true;
    });
    assert.equal(h.runner.calls.length, 0);
    assert.equal(h.environment.restored, 1);
  });
});
