import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { MemoryCrateStore } from '../../../src/core/registry/crate-store.js';
import { RegistryClient } from '../../../src/core/registry/registry-client.js';
import type { CachedCrateRecord } from '../../../src/core/registry/types.js';
import { CrateNotFoundError, RegistryUnreachableError } from '../../../src/utils/errors.js';
import { FakeTransport, indexEntries } from '../../test-helpers.js';

const NOW = new Date('2026-06-01T00:00:00.000Z');
const HOUR = 3_600_000;

function cachedRecord(crate: string, ageHours: number, versions: string[]): CachedCrateRecord {
  return {
    crate,
    fetchedAt: new Date(NOW.getTime() - ageHours * HOUR).toISOString(),
    versions: versions.map(version => ({ version, yanked: false, dependencies: [] }))
  };
}

function createClient(store = new MemoryCrateStore(), transport = new FakeTransport()): {
  client: RegistryClient;
  store: MemoryCrateStore;
  transport: FakeTransport;
} {
  const client = new RegistryClient({ store, transport, cacheAgeHours: 48, concurrency: 2, now: () => NOW });
  return { client, store, transport };
}

class FailingPutStore extends MemoryCrateStore {
  override async put(): Promise<void> {
    throw new Error('disk full');
  }
}

describe('RegistryClient', () => {
  it('serves a fresh cached record without touching the network', async () => {
    const { client, store, transport } = createClient();
    await store.put(cachedRecord('serde', 1, ['1.0.0']));

    const lookup = await client.fetch('serde');

    assert.equal(lookup.source, 'cache');
    assert.equal(lookup.stale, false);
    assert.deepEqual(transport.calls, []);
  });

  it('refetches a record older than the cache age and stores the result', async () => {
    const transport = new FakeTransport({ serde: indexEntries('serde', { '1.0.0': [], '1.0.1': [] }) });
    const { client, store } = createClient(new MemoryCrateStore(), transport);
    await store.put(cachedRecord('serde', 72, ['1.0.0']));

    const lookup = await client.fetch('serde');

    assert.equal(lookup.source, 'network');
    assert.deepEqual(lookup.record.versions.map(entry => entry.version), ['1.0.0', '1.0.1']);
    assert.equal((await store.get('serde'))?.fetchedAt, NOW.toISOString());
  });

  it('bypasses a fresh record when forced', async () => {
    const transport = new FakeTransport({ serde: indexEntries('serde', { '1.0.2': [] }) });
    const { client, store } = createClient(new MemoryCrateStore(), transport);
    await store.put(cachedRecord('serde', 1, ['1.0.0']));

    const lookup = await client.fetch('serde', { force: true });

    assert.equal(lookup.source, 'network');
    assert.deepEqual(transport.calls, ['serde']);
  });

  it('falls back to a stale record when the registry is unreachable', async () => {
    const transport = new FakeTransport();
    transport.failing = true;
    const { client, store } = createClient(new MemoryCrateStore(), transport);
    await store.put(cachedRecord('serde', 100, ['1.0.0']));

    const lookup = await client.fetch('serde');

    assert.equal(lookup.source, 'stale-cache');
    assert.equal(lookup.fallback, 'unreachable');
    assert.equal(lookup.stale, true);
    assert.deepEqual(lookup.record.versions.map(entry => entry.version), ['1.0.0']);
  });

  it('falls back to a stale record the registry no longer lists', async () => {
    const { client, store } = createClient();
    await store.put(cachedRecord('serde', 100, ['1.0.0']));

    const lookup = await client.fetch('serde');

    assert.equal(lookup.source, 'stale-cache');
    assert.equal(lookup.fallback, 'not-listed');
  });

  it('fails when the registry is unreachable and nothing is cached', async () => {
    const transport = new FakeTransport();
    transport.failing = true;
    const { client } = createClient(new MemoryCrateStore(), transport);

    await assert.rejects(client.fetch('serde'), (error: unknown) => {
      assert.ok(error instanceof RegistryUnreachableError);
      assert.equal(error.reason, 'connection refused');
      assert.equal(
        error.message,
        "Registry unreachable while fetching 'serde' and no cached copy exists: connection refused"
      );
      return true;
    });
  });

  it('reports a crate the registry does not know', async () => {
    const { client } = createClient();
    await assert.rejects(client.fetch('no-such-crate'), CrateNotFoundError);
  });

  it('looks each crate up once per run, even concurrently', async () => {
    const transport = new FakeTransport({ log: indexEntries('log', { '0.4.20': [] }) });
    const { client } = createClient(new MemoryCrateStore(), transport);

    const [first, second] = await Promise.all([client.fetch('log'), client.fetch('LOG')]);
    await client.fetch('log');

    assert.equal(first, second);
    assert.deepEqual(transport.calls, ['log']);
  });

  it('does not hand a forced call the result of a pending cached lookup', async () => {
    const transport = new FakeTransport({ serde: indexEntries('serde', { '1.0.2': [] }) });
    const { client, store } = createClient(new MemoryCrateStore(), transport);
    await store.put(cachedRecord('serde', 1, ['1.0.0']));

    const [plain, forced] = await Promise.all([client.fetch('serde'), client.fetch('serde', { force: true })]);

    assert.equal(plain.source, 'cache');
    assert.equal(forced.source, 'network');
    assert.deepEqual(forced.record.versions.map(entry => entry.version), ['1.0.2']);
    assert.deepEqual(transport.calls, ['serde']);
  });

  it('fetchMany keys results by normalized name', async () => {
    const transport = new FakeTransport({
      serde: indexEntries('serde', { '1.0.0': [] }),
      log: indexEntries('log', { '0.4.20': [] })
    });
    const { client } = createClient(new MemoryCrateStore(), transport);

    const lookups = await client.fetchMany(['Serde', 'serde', 'log']);

    assert.deepEqual([...lookups.keys()], ['serde', 'log']);
    assert.deepEqual([...transport.calls].sort(), ['log', 'serde']);
  });

  it('keeps fetched data when the cache write fails', async () => {
    const transport = new FakeTransport({ serde: indexEntries('serde', { '1.0.0': [] }) });
    const { client } = createClient(new FailingPutStore(), transport);

    const lookup = await client.fetch('serde');

    assert.equal(lookup.source, 'network');
    assert.equal(lookup.record.crate, 'serde');
  });
});
