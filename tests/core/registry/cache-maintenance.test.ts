import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { cleanCache, describeStaleLookup, fetchCrate, getCacheInfo } from '../../../src/core/registry/cache-maintenance.js';
import { MemoryCrateStore } from '../../../src/core/registry/crate-store.js';
import { RegistryClient } from '../../../src/core/registry/registry-client.js';
import type { CachedCrateRecord } from '../../../src/core/registry/types.js';
import { FakeTransport, indexEntries } from '../../test-helpers.js';

const NOW = new Date('2026-06-01T00:00:00.000Z');
const HOUR = 3_600_000;

function cachedRecord(crate: string, ageHours: number, versionCount = 1): CachedCrateRecord {
  return {
    crate,
    fetchedAt: new Date(NOW.getTime() - ageHours * HOUR).toISOString(),
    versions: Array.from({ length: versionCount }, (_, i) => ({ version: `1.0.${i}`, yanked: false, dependencies: [] }))
  };
}

async function seededStore(): Promise<MemoryCrateStore> {
  const store = new MemoryCrateStore();
  await store.put(cachedRecord('anyhow', 2, 3));
  await store.put(cachedRecord('log', 50));
  await store.put(cachedRecord('tokio', 10, 2));
  return store;
}

describe('getCacheInfo', () => {
  it('summarizes entries, ages and staleness', async () => {
    const info = await getCacheInfo(await seededStore(), { cacheAgeHours: 48, now: NOW });

    assert.equal(info.location, 'memory');
    assert.equal(info.entryCount, 3);
    assert.equal(info.staleCount, 1);
    assert.equal(info.oldestFetch?.toISOString(), '2026-05-29T22:00:00.000Z');
    assert.equal(info.newestFetch?.toISOString(), '2026-05-31T22:00:00.000Z');
    assert.deepEqual(
      info.entries.map(entry => [entry.name, entry.ageHours, entry.versionCount, entry.stale]),
      [['anyhow', 2, 3, false], ['log', 50, 1, true], ['tokio', 10, 2, false]]
    );
  });

  it('reports an empty cache', async () => {
    const info = await getCacheInfo(new MemoryCrateStore(), { cacheAgeHours: 48, now: NOW });
    assert.equal(info.entryCount, 0);
    assert.equal(info.oldestFetch, null);
    assert.equal(info.newestFetch, null);
  });
});

describe('cleanCache', () => {
  it('removes only records older than the cache age', async () => {
    const store = await seededStore();
    const result = await cleanCache(store, { cacheAgeHours: 8, now: NOW });

    assert.deepEqual(result, { removed: ['log', 'tokio'], remaining: 1 });
    assert.deepEqual((await store.list()).map(record => record.crate), ['anyhow']);
  });

  it('removes everything with full', async () => {
    const store = await seededStore();
    const result = await cleanCache(store, { cacheAgeHours: 48, now: NOW, full: true });

    assert.deepEqual(result, { removed: ['anyhow', 'log', 'tokio'], remaining: 0 });
    assert.deepEqual(await store.list(), []);
  });
});

describe('fetchCrate', () => {
  it('lists versions matching a requirement, yanked ones included', async () => {
    const transport = new FakeTransport({
      rand: indexEntries('rand', { '0.7.3': [], '0.8.0': [], '0.8.5': [], '0.9.0': [] }, ['0.8.0'])
    });
    const client = new RegistryClient({ store: new MemoryCrateStore(), transport, cacheAgeHours: 48, now: () => NOW });

    const result = await fetchCrate(client, 'rand', '0.8');

    assert.equal(result.lookup.source, 'network');
    assert.deepEqual(result.matching, [
      { version: '0.8.0', yanked: true },
      { version: '0.8.5', yanked: false }
    ]);
  });

  it('refetches a fresh record when forced', async () => {
    const store = new MemoryCrateStore();
    await store.put(cachedRecord('rand', 1));
    const transport = new FakeTransport({ rand: indexEntries('rand', { '0.9.0': [] }) });
    const client = new RegistryClient({ store, transport, cacheAgeHours: 48, now: () => NOW });

    const result = await fetchCrate(client, 'rand', undefined, true);

    assert.deepEqual(transport.calls, ['rand']);
    assert.deepEqual(result.matching.map(entry => entry.version), ['0.9.0']);
  });
});

describe('describeStaleLookup', () => {
  it('says nothing about a current record', async () => {
    const transport = new FakeTransport({ rand: indexEntries('rand', { '0.9.0': [] }) });
    const client = new RegistryClient({ store: new MemoryCrateStore(), transport, cacheAgeHours: 48, now: () => NOW });

    const result = await fetchCrate(client, 'rand');

    assert.equal(describeStaleLookup(result.lookup), undefined);
  });

  it('blames the connection when the refresh failed', async () => {
    const store = new MemoryCrateStore();
    await store.put(cachedRecord('rand', 100));
    const transport = new FakeTransport();
    transport.failing = true;
    const client = new RegistryClient({ store, transport, cacheAgeHours: 48, now: () => NOW });

    const result = await fetchCrate(client, 'rand');

    assert.equal(describeStaleLookup(result.lookup), 'Registry unreachable');
  });

  it('names a crate the registry stopped listing', async () => {
    const store = new MemoryCrateStore();
    await store.put(cachedRecord('rand', 100));
    const client = new RegistryClient({ store, transport: new FakeTransport(), cacheAgeHours: 48, now: () => NOW });

    const result = await fetchCrate(client, 'rand');

    assert.equal(describeStaleLookup(result.lookup), 'Registry no longer lists rand');
  });
});
