import { after, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { readdir } from 'node:fs/promises';
import { join } from 'node:path';

import { FileCrateStore, MemoryCrateStore, type CrateStore } from '../../../src/core/registry/crate-store.js';
import type { CachedCrateRecord } from '../../../src/core/registry/types.js';
import { makeTempDir, removeTempDir, writeFiles } from '../../test-helpers.js';

function record(crate: string, versions: string[] = ['1.0.0']): CachedCrateRecord {
  return {
    crate,
    fetchedAt: '2026-03-01T12:00:00.000Z',
    versions: versions.map(version => ({ version, yanked: false, dependencies: [] }))
  };
}

function sharedContract(name: string, createStore: () => Promise<CrateStore>): void {
  describe(`${name} contract`, () => {
    it('round-trips a record under its normalized name', async () => {
      const store = await createStore();
      await store.put(record('Serde', ['1.0.0', '1.0.1']));

      const loaded = await store.get('SERDE');
      assert.equal(loaded?.crate, 'serde');
      assert.deepEqual(loaded?.versions.map(entry => entry.version), ['1.0.0', '1.0.1']);
    });

    it('returns null for an unknown crate', async () => {
      const store = await createStore();
      assert.equal(await store.get('missing'), null);
    });

    it('lists records sorted by name', async () => {
      const store = await createStore();
      await store.put(record('tokio'));
      await store.put(record('anyhow'));
      assert.deepEqual((await store.list()).map(entry => entry.crate), ['anyhow', 'tokio']);
    });

    it('deletes and clears', async () => {
      const store = await createStore();
      await store.put(record('anyhow'));
      await store.put(record('tokio'));
      await store.put(record('log'));

      assert.equal(await store.delete('anyhow'), true);
      assert.equal(await store.delete('anyhow'), false);
      assert.equal(await store.clear(), 2);
      assert.deepEqual(await store.list(), []);
    });
  });
}

describe('crate stores', () => {
  let root: string;
  let counter = 0;

  before(async () => {
    root = await makeTempDir('store');
  });

  after(async () => {
    await removeTempDir(root);
  });

  sharedContract('FileCrateStore', async () => new FileCrateStore(join(root, `cache-${counter++}`)));
  sharedContract('MemoryCrateStore', async () => new MemoryCrateStore());

  describe('FileCrateStore files', () => {
    it('writes one JSON file per crate under crates/', async () => {
      const cacheDir = join(root, 'layout');
      const store = new FileCrateStore(cacheDir);
      await store.put(record('serde'));
      assert.deepEqual(await readdir(join(cacheDir, 'crates')), ['serde.json']);
      assert.equal(store.location, cacheDir);
    });

    it('treats a corrupt record as absent and still clears it', async () => {
      const cacheDir = join(root, 'corrupt');
      const store = new FileCrateStore(cacheDir);
      await store.put(record('serde'));
      await writeFiles(cacheDir, {
        'crates/broken.json': '{"crate": "broken", ',
        'crates/wrong-shape.json': '{"crate": "wrong-shape", "fetchedAt": "2026-03-01T12:00:00.000Z", "versions": "1.0.0"}',
        'crates/notes.txt': 'not a record'
      });

      assert.equal(await store.get('broken'), null);
      assert.equal(await store.get('wrong-shape'), null);
      assert.deepEqual((await store.list()).map(entry => entry.crate), ['serde']);
      assert.equal(await store.clear(), 3);
      assert.deepEqual(await readdir(join(cacheDir, 'crates')), ['notes.txt']);
    });

    it('reports an empty store when the directory does not exist', async () => {
      const store = new FileCrateStore(join(root, 'never-created'));
      assert.deepEqual(await store.list(), []);
      assert.equal(await store.clear(), 0);
    });
  });
});
