import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';

import { DEFAULT_CONFIG, findConfigFile, loadConfig, resolveConfig } from '../../src/core/config.js';
import { ConfigError } from '../../src/utils/errors.js';

describe('resolveConfig', () => {
  it('returns the defaults for a missing document', () => {
    assert.deepEqual(resolveConfig(undefined), {
      installedDirName: '_installed_',
      uninstalledDirName: '_uninstalled_',
      stateFileName: 'modkeeper.state.yml',
      archiveExtension: '.zip',
      cascade: true
    });
    assert.deepEqual(resolveConfig(null), DEFAULT_CONFIG);
  });

  it('merges keys over the defaults and trims strings', () => {
    const config = resolveConfig({ installedDirName: ' active ', cascade: false });
    assert.equal(config.installedDirName, 'active');
    assert.equal(config.uninstalledDirName, '_uninstalled_');
    assert.equal(config.cascade, false);
  });

  it('adds the leading dot to the archive extension', () => {
    assert.equal(resolveConfig({ archiveExtension: 'pak' }).archiveExtension, '.pak');
    assert.equal(resolveConfig({ archiveExtension: '.pak' }).archiveExtension, '.pak');
  });

  it('rejects values of the wrong type', () => {
    assert.throws(() => resolveConfig([], 'cfg'), { message: 'Config in cfg must be an object' });
    assert.throws(
      () => resolveConfig({ stateFileName: '' }, 'cfg'),
      { message: "Config key 'stateFileName' in cfg must be a non-empty string" }
    );
    assert.throws(
      () => resolveConfig({ cascade: 'yes' }, 'cfg'),
      { message: "Config key 'cascade' in cfg must be true or false" }
    );
  });

  it('rejects equal installed and uninstalled folder names', () => {
    assert.throws(
      () => resolveConfig({ installedDirName: 'mods', uninstalledDirName: 'mods' }),
      ConfigError
    );
  });
});

describe('loadConfig', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'modkeeper-config-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('uses the defaults when no config file exists', async () => {
    assert.equal(await findConfigFile(root), null);
    assert.deepEqual(await loadConfig(root), DEFAULT_CONFIG);
  });

  it('reads a commented config file', async () => {
    await writeFile(
      join(root, 'modkeeper.jsonc'),
      '{\n  // keep shared dependencies\n  "cascade": false,\n  "archiveExtension": "pak",\n}\n'
    );

    const config = await loadConfig(root);

    assert.equal(config.cascade, false);
    assert.equal(config.archiveExtension, '.pak');
  });

  it('prefers modkeeper.jsonc over modkeeper.json', async () => {
    await writeFile(join(root, 'modkeeper.json'), '{ "cascade": true }');
    await writeFile(join(root, 'modkeeper.jsonc'), '{ "cascade": false }');

    assert.equal(await findConfigFile(root), join(root, 'modkeeper.jsonc'));
    assert.equal((await loadConfig(root)).cascade, false);
  });

  it('reports a config file that does not parse', async () => {
    await writeFile(join(root, 'modkeeper.json'), '{ "cascade": ');
    await assert.rejects(loadConfig(root), ConfigError);
  });
});
