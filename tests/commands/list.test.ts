import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { formatDependencyLine } from '../../src/commands/list.js';
import type { ManifestDependency } from '../../src/core/manifest/types.js';

function manifestDep(overrides: Partial<ManifestDependency>): ManifestDependency {
  return {
    key: 'serde',
    name: 'serde',
    requirement: '1.0',
    kind: 'normal',
    source: 'registry',
    optional: false,
    inherited: false,
    location: { manifestPath: '/work/demo/Cargo.toml', table: ['dependencies'], key: 'serde' },
    ...overrides
  };
}

describe('formatDependencyLine', () => {
  it('shows the name and requirement', () => {
    assert.equal(formatDependencyLine(manifestDep({})), 'serde 1.0');
  });

  it('marks renamed, optional and platform-specific entries', () => {
    const line = formatDependencyLine(manifestDep({
      key: 'rng',
      name: 'rand',
      requirement: '0.8',
      optional: true,
      target: 'cfg(unix)'
    }));
    assert.equal(line, 'rng → rand 0.8 (optional) [cfg(unix)]');
  });

  it('marks git and path entries without a requirement', () => {
    assert.equal(formatDependencyLine(manifestDep({ key: 'forked', name: 'forked', requirement: null, source: 'git' })), 'forked (git)');
    assert.equal(formatDependencyLine(manifestDep({ key: 'local', name: 'local', requirement: null, source: 'path' })), 'local (path)');
  });
});
