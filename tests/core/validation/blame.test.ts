import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { blameCandidates, selectBlamedCrate } from '../../../src/core/validation/blame.js';
import { createSearchState } from '../../../src/core/validation/narrowing.js';
import type { SearchState } from '../../../src/core/validation/types.js';

function states(): Map<string, SearchState> {
  return new Map([
    ['a', createSearchState('a', ['1.0.0', '1.1.0', '2.0.0'], '1.0.0')],
    ['b', createSearchState('b', ['0.1.0', '0.2.0', '0.3.0'], '0.1.0')],
    ['c', createSearchState('c', ['5.0.0'], '5.0.0')]
  ]);
}

describe('blame', () => {
  it('skips crates at their baseline and collapsed crates', () => {
    const candidates = blameCandidates(states(), new Map([['a', '1.0.0'], ['b', '0.2.0'], ['c', '5.0.0']]));
    assert.deepEqual(candidates.map(candidate => candidate.crate), ['b']);
    assert.deepEqual(candidates[0].delta, { major: 0, minor: 1, patch: 0 });
    assert.equal(candidates[0].distance, 1);
  });

  it('blames the largest version jump first', () => {
    const candidates = blameCandidates(states(), new Map([['a', '2.0.0'], ['b', '0.3.0']]));
    assert.equal(selectBlamedCrate(candidates, null)?.crate, 'a');
  });

  it('breaks ties by the crate narrowed last, then by name', () => {
    const candidates = blameCandidates(states(), new Map([['a', '1.1.0'], ['b', '0.2.0']]));
    assert.equal(selectBlamedCrate(candidates, 'b')?.crate, 'b');
    assert.equal(selectBlamedCrate(candidates, null)?.crate, 'a');
  });

  it('returns null when nothing can be blamed', () => {
    assert.equal(selectBlamedCrate([], null), null);
  });
});
