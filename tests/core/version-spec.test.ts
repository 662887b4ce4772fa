import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  compareVersions,
  maxVersion,
  parseVersion,
  satisfiesVersion,
  sortVersions,
  versionBase
} from '../../src/core/version/version-spec.js';

describe('parseVersion', () => {
  it('splits an exact version into components', () => {
    const spec = parseVersion('1.2.3');
    assert.deepEqual(spec.components, ['1', '2', '3']);
    assert.equal(spec.isOpenEnded, false);
    assert.equal(spec.isLatest, false);
  });

  it('strips the open-ended marker', () => {
    const spec = parseVersion('1.2+');
    assert.deepEqual(spec.components, ['1', '2']);
    assert.equal(spec.isOpenEnded, true);
    assert.equal(versionBase(spec), '1.2');
  });

  it('treats a bare + as open-ended with no lower bound', () => {
    const spec = parseVersion('+');
    assert.deepEqual(spec.components, []);
    assert.equal(spec.isOpenEnded, true);
  });

  it('recognizes LATEST', () => {
    const spec = parseVersion('LATEST');
    assert.equal(spec.isLatest, true);
    assert.equal(spec.isOpenEnded, false);
  });
});

describe('compareVersions', () => {
  it('compares numerically rather than lexically', () => {
    assert.equal(compareVersions('1.10.0', '1.9.0'), 1);
    assert.equal(compareVersions('2.0', '10.0'), -1);
  });

  it('pads missing components with zero', () => {
    assert.equal(compareVersions('1.0', '1.0.0'), 0);
    assert.equal(compareVersions('1', '1.0.1'), -1);
  });

  it('ignores leading zeros and keeps long components exact', () => {
    assert.equal(compareVersions('1.007', '1.7'), 0);
    assert.equal(compareVersions('1.12345678901234567890', '1.12345678901234567891'), -1);
  });

  it('sorts a non-numeric component below a numeric one', () => {
    assert.equal(compareVersions('1.0.alpha', '1.0.0'), -1);
    assert.equal(compareVersions('1.0.beta', '1.0.alpha'), 1);
  });

  it('ignores a trailing open-ended marker', () => {
    assert.equal(compareVersions('1.2+', '1.2'), 0);
  });
});

describe('maxVersion and sortVersions', () => {
  it('returns undefined for an empty list', () => {
    assert.equal(maxVersion([]), undefined);
  });

  it('finds the greatest version', () => {
    assert.equal(maxVersion(['1.2.4', '1.10.0', '1.3.0']), '1.10.0');
  });

  it('sorts ascending without mutating the input', () => {
    const input = ['2.0.0', '1.10.0', '1.2.0'];
    assert.deepEqual(sortVersions(input), ['1.2.0', '1.10.0', '2.0.0']);
    assert.deepEqual(input, ['2.0.0', '1.10.0', '1.2.0']);
  });
});

describe('satisfiesVersion', () => {
  it('matches exact versions with implied trailing zeros', () => {
    assert.equal(satisfiesVersion('1.0', '1.0.0'), true);
    assert.equal(satisfiesVersion('1.0', '1.0.1'), false);
  });

  it('accepts anything at or above an open-ended lower bound, across majors', () => {
    assert.equal(satisfiesVersion('1.2.3+', '1.2.3'), true);
    assert.equal(satisfiesVersion('1.2.3+', '1.3.0'), true);
    assert.equal(satisfiesVersion('1.2.3+', '2.0.0'), true);
    assert.equal(satisfiesVersion('1.2.3+', '1.2.2'), false);
  });

  it('accepts any version for 0+', () => {
    assert.equal(satisfiesVersion('0+', '0.0.1'), true);
    assert.equal(satisfiesVersion('0+', '99.0'), true);
  });

  it('accepts only the greatest available version for LATEST', () => {
    const available = ['1.0.0', '1.1.0', '2.0.0'];
    assert.equal(satisfiesVersion('LATEST', '2.0.0', available), true);
    assert.equal(satisfiesVersion('LATEST', '1.1.0', available), false);
  });

  it('accepts any version for LATEST when nothing is known yet', () => {
    assert.equal(satisfiesVersion('LATEST', '1.1.0'), true);
  });
});
