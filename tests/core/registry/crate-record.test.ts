import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { checkCrateRecord, isFresh, toCrateRecord } from '../../../src/core/registry/crate-record.js';
import { dep, indexEntries } from '../../test-helpers.js';

const FETCHED_AT = '2026-01-01T00:00:00.000Z';
const HOUR = 3_600_000;

describe('isFresh', () => {
  const record = { crate: 'serde', fetchedAt: FETCHED_AT, versions: [] };

  it('is fresh strictly before the cache age elapses', () => {
    const now = new Date(Date.parse(FETCHED_AT) + 47 * HOUR);
    assert.equal(isFresh(record, now, 48 * HOUR), true);
  });

  it('is stale exactly at the cache age', () => {
    const now = new Date(Date.parse(FETCHED_AT) + 48 * HOUR);
    assert.equal(isFresh(record, now, 48 * HOUR), false);
  });

  it('treats an unparseable timestamp as stale', () => {
    assert.equal(isFresh({ ...record, fetchedAt: 'yesterday' }, new Date(), 48 * HOUR), false);
  });
});

describe('toCrateRecord', () => {
  it('sorts versions by precedence and drops invalid ones', () => {
    const entries = indexEntries('Serde', { '1.0.10': [], '1.0.9': [], 'banana': [], '1.0.10-rc.1': [] });
    const record = toCrateRecord('Serde', entries, new Date(FETCHED_AT));

    assert.equal(record.crate, 'serde');
    assert.equal(record.fetchedAt, FETCHED_AT);
    assert.deepEqual(record.versions.map(entry => entry.version), ['1.0.9', '1.0.10-rc.1', '1.0.10']);
  });

  it('maps renamed, dev and target-specific dependencies', () => {
    const entries = indexEntries('app-core', {
      '0.1.0': [
        dep('rng', '^0.8', { package: 'Rand', kind: 'dev' }),
        dep('libc', '^0.2', { target: 'cfg(unix)', optional: true }),
        dep('cc', '^1', { kind: 'build' }),
        dep('log', '^0.4', { kind: null })
      ]
    });
    const [version] = toCrateRecord('app-core', entries, new Date(FETCHED_AT)).versions;

    assert.deepEqual(version.dependencies, [
      { name: 'rand', req: '^0.8', kind: 'dev', optional: false },
      { name: 'libc', req: '^0.2', kind: 'normal', optional: true, target: 'cfg(unix)' },
      { name: 'cc', req: '^1', kind: 'build', optional: false },
      { name: 'log', req: '^0.4', kind: 'normal', optional: false }
    ]);
  });
});

describe('checkCrateRecord', () => {
  it('accepts a well-formed record', () => {
    const record = toCrateRecord('serde', indexEntries('serde', { '1.0.0': [] }), new Date(FETCHED_AT));
    assert.equal(checkCrateRecord(JSON.parse(JSON.stringify(record))), null);
  });

  it('names the broken field', () => {
    assert.equal(checkCrateRecord([]), 'record is not an object');
    assert.equal(checkCrateRecord({ fetchedAt: FETCHED_AT, versions: [] }), 'missing crate name');
    assert.equal(checkCrateRecord({ crate: 'serde', fetchedAt: 'nope', versions: [] }), 'missing or invalid fetchedAt');
    assert.equal(
      checkCrateRecord({ crate: 'serde', fetchedAt: FETCHED_AT, versions: [{ version: '1.0', yanked: false, dependencies: [] }] }),
      'invalid versions list'
    );
  });
});
