import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'node:path';
import { Dependency } from '../../src/core/dependency.js';

function withVersions(version: string, versions: string[]): Dependency {
  const dep = new Dependency('com.example', 'widget', version);
  for (const v of versions) {
    dep.addVersion(v);
  }
  return dep;
}

describe('Dependency', () => {
  describe('keys', () => {
    it('uses the constraint in the key until a version is known', () => {
      const dep = new Dependency('com.example', 'widget', '1.0+');
      assert.equal(dep.versionlessKey, 'com.example:widget');
      assert.equal(dep.key, 'com.example:widget:1.0+');
    });

    it('uses the best version in the key once known', () => {
      const dep = withVersions('1.0+', ['1.0.0', '1.2.0']);
      assert.equal(dep.key, 'com.example:widget:1.2.0');
    });

    it('shows the best version next to a differing constraint', () => {
      assert.equal(withVersions('1.0+', ['1.2.0']).toString(), 'com.example:widget:1.0+ (1.2.0)');
      assert.equal(withVersions('1.2.0', ['1.2.0']).toString(), 'com.example:widget:1.2.0');
    });
  });

  describe('addVersion', () => {
    it('keeps only versions the constraint accepts, sorted ascending', () => {
      const dep = new Dependency('com.example', 'widget', '1.1+');
      assert.equal(dep.addVersion('1.2.0'), true);
      assert.equal(dep.addVersion('1.0.0'), false);
      assert.equal(dep.addVersion('1.1.0'), true);
      assert.deepEqual(dep.possibleVersions, ['1.1.0', '1.2.0']);
      assert.equal(dep.bestVersion, '1.2.0');
    });

    it('accepts every version for LATEST', () => {
      const dep = withVersions('LATEST', ['2.0.0', '1.0.0']);
      assert.deepEqual(dep.possibleVersions, ['1.0.0', '2.0.0']);
      assert.equal(dep.isAcceptableVersion('2.0.0'), true);
      assert.equal(dep.isAcceptableVersion('1.0.0'), false);
    });

    it('does not take back a version removed as unavailable', () => {
      const dep = withVersions('1.0+', ['1.0.0', '1.1.0']);
      dep.removePossibleVersion('1.1.0');
      assert.equal(dep.bestVersion, '1.0.0');
      assert.equal(dep.addVersion('1.1.0'), false);
      assert.deepEqual(dep.possibleVersions, ['1.0.0']);
    });
  });

  describe('bestVersionPath', () => {
    it('follows the Maven repository layout', () => {
      const dep = withVersions('1.0.0', ['1.0.0']);
      dep.repoPath = '/repo';
      assert.equal(dep.bestVersionPath, join('/repo', 'com', 'example', 'widget', '1.0.0'));
    });

    it('is undefined without a best version', () => {
      assert.equal(new Dependency('com.example', 'widget', '1.0.0').bestVersionPath, undefined);
    });
  });

  describe('isNewer', () => {
    it('compares best versions', () => {
      assert.equal(withVersions('1.0+', ['1.3.0']).isNewer(withVersions('1.2.0', ['1.2.0'])), true);
      assert.equal(withVersions('1.2.0', ['1.2.0']).isNewer(withVersions('1.0+', ['1.3.0'])), false);
    });

    it('falls back to the constraint base while unresolved', () => {
      const unresolved = new Dependency('com.example', 'widget', '2.0+');
      assert.equal(unresolved.isNewer(withVersions('1.5.0', ['1.5.0'])), true);
    });
  });

  describe('refineVersionRange', () => {
    it('raises the lower bound to the other version and drops newer versions it rejects', () => {
      const open = withVersions('1.0+', ['1.0.0', '1.0.5', '1.1.0']);
      const exact = withVersions('1.0.5', ['1.0.5']);

      assert.equal(open.refineVersionRange(exact), true);
      assert.equal(open.version, '1.0.5+');
      assert.deepEqual(open.possibleVersions, ['1.0.5']);
      assert.equal(open.bestVersion, '1.0.5');
    });

    it('never reconsiders a version a refinement dropped', () => {
      const open = withVersions('1.0+', ['1.0.0', '1.0.5', '1.1.0']);
      open.refineVersionRange(withVersions('1.0.5', ['1.0.5']));

      assert.equal(open.addVersion('1.1.0'), false);
      assert.equal(open.isAcceptableVersion('1.1.0'), false);
      assert.equal(open.clone().addVersion('1.1.0'), false);
    });

    it('intersects two open-ended ranges', () => {
      const older = withVersions('1.0+', ['1.0.0', '1.2.0', '1.4.0']);
      const newer = withVersions('1.2+', ['1.2.0', '1.4.0']);

      assert.equal(older.refineVersionRange(newer), true);
      assert.equal(older.version, '1.4.0+');
      assert.deepEqual(older.possibleVersions, ['1.4.0']);
    });

    it('fails without changes when the other version is outside the range', () => {
      const open = withVersions('1.2+', ['1.2.0', '1.3.0']);
      const exact = withVersions('1.0.0', ['1.0.0']);

      assert.equal(open.refineVersionRange(exact), false);
      assert.equal(open.version, '1.2+');
      assert.deepEqual(open.possibleVersions, ['1.2.0', '1.3.0']);
    });

    it('fails for an exact constraint', () => {
      const exact = withVersions('1.0.0', ['1.0.0']);
      assert.equal(exact.refineVersionRange(withVersions('1.0+', ['1.1.0'])), false);
      assert.equal(exact.version, '1.0.0');
    });

    it('fails when nothing would change', () => {
      const open = withVersions('1.0+', ['1.0.0']);
      assert.equal(open.refineVersionRange(withVersions('1.0.0', ['1.0.0'])), false);
      assert.equal(open.version, '1.0+');
    });

    it('fails when no possible version would remain', () => {
      const open = withVersions('1.0+', ['1.0.0', '1.1.0']);
      const exact = withVersions('1.0.5', ['1.0.5']);

      assert.equal(open.refineVersionRange(exact), false);
      assert.equal(open.version, '1.0+');
      assert.deepEqual(open.possibleVersions, ['1.0.0', '1.1.0']);
    });
  });

  describe('clone', () => {
    it('carries the constraint but no versions or repository', () => {
      const dep = withVersions('1.0+', ['1.0.0']);
      dep.repoPath = '/repo';
      const copy = dep.clone();

      assert.equal(copy.version, '1.0+');
      assert.equal(copy.hasPossibleVersions, false);
      assert.equal(copy.repoPath, '');
    });

    it('forgets versions found unavailable in another repository', () => {
      const dep = withVersions('1.0+', ['1.0.0', '1.1.0']);
      dep.removePossibleVersion('1.1.0');
      assert.equal(dep.clone().addVersion('1.1.0'), true);
    });
  });
});
