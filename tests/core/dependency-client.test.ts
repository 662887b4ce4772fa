import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'node:path';
import { readdir } from 'node:fs/promises';
import { DependencyClient } from '../../src/core/dependency-client.js';
import { ClientStore } from '../../src/core/clients/client-store.js';
import { ResolutionError, ValidationError } from '../../src/utils/errors.js';
import { exists } from '../../src/utils/fs.js';
import { CapturingLogger, createTempDir, removeTempDir, writeArtifact } from '../test-helpers.js';

describe('DependencyClient', () => {
  let testDir: string;
  let sdkPath: string;
  let sdkRepo: string;
  let extraRepo: string;
  let settingsDir: string;
  let logger: CapturingLogger;

  function register(clientName: string): Promise<DependencyClient> {
    return DependencyClient.register(clientName, sdkPath, [], settingsDir, { logger });
  }

  beforeEach(async () => {
    testDir = await createTempDir('client');
    sdkPath = join(testDir, 'sdk');
    sdkRepo = join(sdkPath, 'extras', 'android', 'm2repository');
    extraRepo = join(testDir, 'extra');
    settingsDir = join(testDir, 'settings');
    logger = new CapturingLogger();
    await writeArtifact(sdkRepo, { group: 'com.example', artifact: 'widget', versions: ['1.0.0', '1.0.5', '1.1.0'] });
  });

  afterEach(async () => {
    await removeTempDir(testDir);
  });

  it('rejects a client name that is not a valid file name', async () => {
    await assert.rejects(DependencyClient.register('ads/extra', sdkPath, [], settingsDir, { logger }), ValidationError);
  });

  it('takes the SDK path from ANDROID_HOME when none is given', async () => {
    const client = await DependencyClient.register('ads', undefined, [], settingsDir, {
      logger,
      env: { ANDROID_HOME: sdkPath }
    });
    assert.equal(client.sdkPath, sdkPath);
  });

  it('searches the SDK repositories before the extra ones', async () => {
    const client = await DependencyClient.register('ads', sdkPath, [extraRepo], settingsDir, { logger });
    assert.deepEqual(client.repositories, [
      '$SDK/extras/android/m2repository',
      '$SDK/extras/google/m2repository',
      extraRepo
    ]);
  });

  it('persists declarations with their original constraint', async () => {
    const client = await register('ads');

    const dep = await client.dependOn('com.example', 'widget', '1.0+', ['extra-example-m2repository']);

    assert.equal(dep.bestVersion, '1.1.0');
    assert.deepEqual(await new ClientStore(settingsDir, logger).read('ads'), [
      {
        groupId: 'com.example',
        artifactId: 'widget',
        version: '1.0+',
        packageIds: ['extra-example-m2repository']
      }
    ]);
  });

  it('reloads earlier declarations on registration', async () => {
    await (await register('ads')).dependOn('com.example', 'widget', '1.0+');

    const client = await register('ads');

    assert.deepEqual([...client.declaredDependencies.keys()], ['com.example:widget:1.1.0']);
  });

  it('resolves the declarations of every client together', async () => {
    const ads = await register('ads');
    const games = await register('games');
    await ads.dependOn('com.example', 'widget', '1.0+');
    await games.dependOn('com.example', 'widget', '1.0.5');

    const resolved = await ads.resolveDependencies(false);

    assert.deepEqual([...resolved.keys()], ['com.example:widget']);
    assert.equal(resolved.get('com.example:widget')?.bestVersion, '1.0.5');
  });

  it('records a dependency with no installed version and fails at resolution', async () => {
    const client = await register('ads');

    const dep = await client.dependOn('com.example', 'ghost', '1.0');

    assert.equal(dep.hasPossibleVersions, false);
    await assert.rejects(client.resolveDependencies(false), (error: unknown) =>
      error instanceof ResolutionError && error.message === 'Cannot resolve com.example:ghost:1.0'
    );
    await assert.rejects(client.loadDependencies(true), (error: unknown) =>
      error instanceof ResolutionError && error.message === 'Cannot find candidate artifact for com.example:ghost:1.0'
    );
  });

  it('adds the repositories of loaded records to the search roots', async () => {
    await writeArtifact(extraRepo, { group: 'com.example', artifact: 'gadget', versions: ['2.0'] });
    await (await register('ads')).dependOn('com.example', 'gadget', '2.0', undefined, [extraRepo]);

    const games = await register('games');
    const loaded = await games.loadDependencies(true);

    assert.deepEqual([...loaded.keys()], ['com.example:gadget:2.0']);
    assert.ok(games.repositories.includes(extraRepo));
  });

  it('clears only its own declarations', async () => {
    const ads = await register('ads');
    const games = await register('games');
    await ads.dependOn('com.example', 'widget', '1.0+');
    await games.dependOn('com.example', 'widget', '1.0.5');

    await ads.clearDependencies();

    assert.equal(ads.declaredDependencies.size, 0);
    assert.equal(await exists(join(settingsDir, 'deps.ads.yml')), false);
    assert.equal(await exists(join(settingsDir, 'deps.games.yml')), true);
  });

  it('erases every client file on reset', async () => {
    const ads = await register('ads');
    const games = await register('games');
    await ads.dependOn('com.example', 'widget', '1.0+');
    await games.dependOn('com.example', 'widget', '1.0.5');

    await ads.resetDependencies();

    assert.deepEqual(await readdir(settingsDir), []);
  });

  it('copies the resolved artifacts and does nothing on a repeat run', async () => {
    const client = await register('ads');
    await client.dependOn('com.example', 'widget', '1.0+');
    const dest = join(testDir, 'libs');

    const first = await client.copyDependencies(await client.resolveDependencies(false), dest);
    const second = await client.copyDependencies(await client.resolveDependencies(false), dest);

    assert.deepEqual(first.copied, [join(dest, 'widget-1.1.0.aar')]);
    assert.deepEqual(second.copied, []);
    assert.deepEqual(second.removed, []);
    assert.deepEqual(await readdir(dest), ['widget-1.1.0.aar']);
  });
});
