import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  compareDeltas,
  matchesRequirement,
  minimumVersion,
  sortVersionsAscending,
  toSemverRange,
  versionDelta
} from '../../../src/core/resolution/requirement.js';
import { ValidationError } from '../../../src/utils/errors.js';

describe('toSemverRange', () => {
  it('reads bare versions as caret requirements', () => {
    assert.equal(toSemverRange('1.2'), '^1.2');
    assert.equal(toSemverRange('0.3.1'), '^0.3.1');
    assert.equal(toSemverRange('1.0.0-rc.1'), '^1.0.0-rc.1');
  });

  it('keeps explicit operators and wildcards', () => {
    assert.equal(toSemverRange('=1.2.3'), '=1.2.3');
    assert.equal(toSemverRange('~1.2'), '~1.2');
    assert.equal(toSemverRange('1.*'), '1.*');
    assert.equal(toSemverRange('*'), '*');
    assert.equal(toSemverRange(''), '*');
  });

  it('turns comma-separated comparators into a space-separated range', () => {
    assert.equal(toSemverRange('>= 1.2, < 1.5'), '>=1.2 <1.5');
  });

  it('rejects requirements that are not ranges', () => {
    assert.throws(() => toSemverRange('banana'), ValidationError);
  });
});

describe('matchesRequirement', () => {
  it('follows caret rules below 1.0', () => {
    assert.equal(matchesRequirement('0.3.9', '0.3'), true);
    assert.equal(matchesRequirement('0.4.0', '0.3'), false);
    assert.equal(matchesRequirement('0.0.4', '^0.0.3'), false);
  });

  it('applies every comparator of a compound requirement', () => {
    assert.equal(matchesRequirement('1.4.9', '>=1.2, <1.5'), true);
    assert.equal(matchesRequirement('1.5.0', '>=1.2, <1.5'), false);
  });
});

describe('version helpers', () => {
  it('finds the lowest admitted version', () => {
    assert.equal(minimumVersion('1.2'), '1.2.0');
    assert.equal(minimumVersion('>=0.3, <0.5'), '0.3.0');
  });

  it('sorts by precedence, oldest first', () => {
    assert.deepEqual(sortVersionsAscending(['1.0.10', '1.0.9', '1.0.10-alpha']), ['1.0.9', '1.0.10-alpha', '1.0.10']);
  });

  it('measures and orders version distances', () => {
    const big = versionDelta('1.2.3', '2.0.1');
    const small = versionDelta('1.2.3', '1.9.0');
    assert.deepEqual(big, { major: 1, minor: 2, patch: 2 });
    assert.deepEqual(small, { major: 0, minor: 7, patch: 3 });
    assert.ok(compareDeltas(big, small) > 0);
    assert.equal(compareDeltas(small, small), 0);
  });
});
