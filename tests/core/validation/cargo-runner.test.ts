import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { tmpdir } from 'node:os';

import { buildCargoArgs, CargoRunner } from '../../../src/core/validation/cargo-runner.js';
import { BuildToolError } from '../../../src/utils/errors.js';

const posixOnly = { skip: process.platform === 'win32' };

describe('buildCargoArgs', () => {
  it('passes each package once', () => {
    assert.deepEqual(
      buildCargoArgs('build', { packages: ['app', 'util'], features: [], release: false }),
      ['build', '--package', 'app', '--package', 'util']
    );
  });

  it('joins trimmed features and drops blank ones', () => {
    assert.deepEqual(
      buildCargoArgs('test', { packages: [], features: [' serde ', '', 'tokio'], release: false }),
      ['test', '--features', 'serde,tokio']
    );
  });

  it('adds --release only in release mode', () => {
    assert.deepEqual(buildCargoArgs('build', { packages: [], features: [], release: true }), ['build', '--release']);
    assert.deepEqual(buildCargoArgs('build', { packages: [], features: ['   '], release: false }), ['build']);
  });
});

describe('CargoRunner', () => {
  it('reports a clean exit as success', posixOnly, async () => {
    const outcome = await new CargoRunner('/bin/sh').run(tmpdir(), ['-c', 'echo ok']);
    assert.deepEqual(outcome, { succeeded: true, exitCode: 0, stdout: 'ok\n', stderr: '' });
  });

  it('returns a failed outcome with the exit code and output', posixOnly, async () => {
    const outcome = await new CargoRunner('/bin/sh').run(tmpdir(), ['-c', 'echo broken >&2; exit 3']);
    assert.deepEqual(outcome, { succeeded: false, exitCode: 3, stdout: '', stderr: 'broken\n' });
  });

  it('raises BuildToolError when the executable cannot be started', async () => {
    await assert.rejects(
      new CargoRunner('/nonexistent/cargo').run(tmpdir(), ['build']),
      (error: unknown) => {
        assert.ok(error instanceof BuildToolError);
        assert.match(error.message, /^Failed to start build tool '\/nonexistent\/cargo': /);
        return true;
      }
    );
  });

  it('counts output past the buffer limit as a failed trial', posixOnly, async () => {
    const runner = new CargoRunner('/bin/sh', { maxBuffer: 1024 });
    const script = 'i=0; while [ $i -lt 2000 ]; do echo 0123456789; i=$((i+1)); done; exit 1';

    const outcome = await runner.run(tmpdir(), ['-c', script]);

    assert.equal(outcome.succeeded, false);
    assert.equal(outcome.exitCode, null);
    assert.equal(outcome.stderr, 'output exceeded 1024 bytes; process stopped');
  });
});
