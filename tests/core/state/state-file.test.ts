import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, mkdir, readdir, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';

import {
  FileStateRepository,
  parseStateDocument,
  readState,
  serializeState
} from '../../../src/core/state/state-file.js';
import { createEmptyState } from '../../../src/core/state/mod-state.js';
import { DEFAULT_CONFIG } from '../../../src/core/config.js';
import { StateFileError } from '../../../src/utils/errors.js';

describe('state file', () => {
  describe('parseStateDocument', () => {
    it('sanitizes malformed entries and registers dependency targets', () => {
      const state = parseStateDocument({
        bundles: {
          'a.zip': { status: 'installed' },
          'b.zip': { status: 'weird', dependencies: ['a.zip', 'a.zip', ' ', 3, 'c.zip'] },
          'bad.zip': 'not a mapping',
          '  ': { status: 'installed' }
        }
      }, 'test.yml');

      assert.deepEqual(state.store.list(), [
        { id: 'a.zip', status: 'installed' },
        { id: 'b.zip', status: 'uninstalled' },
        { id: 'c.zip', status: 'uninstalled' }
      ]);
      assert.deepEqual(state.graph.dependenciesOf('b.zip'), ['a.zip', 'c.zip']);
    });

    it('treats an empty document or missing section as an empty state', () => {
      assert.equal(parseStateDocument(null, 'test.yml').store.size, 0);
      assert.equal(parseStateDocument({ bundles: 5 }, 'test.yml').store.size, 0);
    });

    it('rejects a document that is not a mapping', () => {
      assert.throws(() => parseStateDocument(['a.zip'], 'test.yml'), StateFileError);
    });

    it('drops self dependencies', () => {
      const state = parseStateDocument({
        bundles: { 'a.zip': { status: 'installed', dependencies: ['a.zip'] } }
      }, 'test.yml');
      assert.deepEqual(state.graph.dependenciesOf('a.zip'), []);
    });
  });

  it('serializes with the header, in insertion order, omitting empty dependency lists', () => {
    const state = createEmptyState();
    state.store.register('base.zip');
    state.store.markInstalled('base.zip');
    state.store.register('hd.zip');
    state.store.markInstalled('hd.zip');
    state.graph.addDependency('hd.zip', 'base.zip');

    assert.equal(serializeState(state), [
      '# This file is managed by modkeeper. Do not edit manually.',
      '',
      'bundles:',
      '  base.zip:',
      '    status: installed',
      '  hd.zip:',
      '    status: installed',
      '    dependencies:',
      '      - base.zip',
      ''
    ].join('\n'));
  });

  describe('on disk', () => {
    let trackingRoot: string;

    beforeEach(async () => {
      trackingRoot = await mkdtemp(join(tmpdir(), 'modkeeper-state-'));
    });

    afterEach(async () => {
      await rm(trackingRoot, { recursive: true, force: true });
    });

    it('starts empty without a state file', async () => {
      const state = await readState(trackingRoot, DEFAULT_CONFIG);
      assert.equal(state.store.size, 0);
    });

    it('saves and loads the same state without leaving temporary files', async () => {
      const repository = new FileStateRepository(trackingRoot, DEFAULT_CONFIG);
      const state = createEmptyState();
      state.store.register('base.zip');
      state.store.markInstalled('base.zip');
      state.store.register('patch.zip');
      state.graph.addDependency('patch.zip', 'base.zip');

      await repository.save(state);
      const loaded = await repository.load();

      assert.deepEqual(loaded.store.list(), state.store.list());
      assert.deepEqual(loaded.graph.toRecord(), { 'patch.zip': ['base.zip'] });
      assert.deepEqual(await readdir(trackingRoot), ['modkeeper.state.yml']);
    });

    it('fails with StateFileError on unparsable YAML', async () => {
      await writeFile(join(trackingRoot, 'modkeeper.state.yml'), 'bundles: [unclosed\n', 'utf8');
      await assert.rejects(readState(trackingRoot, DEFAULT_CONFIG), StateFileError);
    });

    it('imports a legacy dependencies.json when there is no state file', async () => {
      const installedDir = join(trackingRoot, '_installed_');
      await mkdir(installedDir);
      for (const name of ['base.zip', 'hd.zip', 'extra.zip']) {
        await writeFile(join(installedDir, name), 'placeholder');
      }
      const legacy = JSON.stringify({
        dependencies: { 'hd.zip': ['base.zip'], 'old.zip': [] },
        dependents: { 'base.zip': ['hd.zip'] }
      });
      await writeFile(join(trackingRoot, 'dependencies.json'), legacy, 'utf8');

      const state = await readState(trackingRoot, DEFAULT_CONFIG);

      assert.deepEqual(state.store.list(), [
        { id: 'hd.zip', status: 'installed' },
        { id: 'old.zip', status: 'uninstalled' },
        { id: 'base.zip', status: 'installed' },
        { id: 'extra.zip', status: 'installed' }
      ]);
      assert.deepEqual(state.graph.toRecord(), { 'hd.zip': ['base.zip'] });
      assert.equal(await readFile(join(trackingRoot, 'dependencies.json'), 'utf8'), legacy);
    });
  });
});
