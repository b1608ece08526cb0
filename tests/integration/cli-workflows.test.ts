import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, mkdir, readdir, readFile, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';

import { runCli, writeZip } from '../test-helpers.js';

/**
 * One install → graph → remove session against real folders, run through
 * the CLI entrypoint in non-interactive mode.
 */
describe('modkeeper CLI', () => {
  let root: string;
  let game: string;
  let updates: string;

  before(async () => {
    root = await mkdtemp(join(tmpdir(), 'modkeeper-cli-'));
    game = join(root, 'game');
    updates = join(root, 'updates');
    await mkdir(game);
    await writeZip(join(updates, 'base.zip'), { 'data/base.txt': 'base' });
    await writeZip(join(updates, 'hd.zip'), { 'data/hd.txt': 'hd', 'data/base.txt': 'hd base' });
  });

  after(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('refuses to prompt without a terminal', () => {
    const result = runCli(['install', game, updates]);
    assert.equal(result.code, 1);
    assert.equal(
      result.stderr,
      'Cannot prompt for selection in non-interactive mode. Use --bundle and --depends-on to provide the required input.'
    );
  });

  it('installs a bundle without dependencies', async () => {
    const result = runCli(['install', game, updates, '-b', 'base.zip']);

    assert.equal(result.code, 0);
    assert.deepEqual(result.stdout.split('\n'), [
      '✓ Installed base.zip',
      'Dependencies: none',
      'Copied 1 new file, overwrote 0 files'
    ]);
    assert.equal(await readFile(join(game, 'data', 'base.txt'), 'utf8'), 'base');
  });

  it('installs a dependant bundle over the files of its dependency', async () => {
    const result = runCli(['install', game, updates, '-b', 'hd.zip', '-d', 'base.zip']);

    assert.equal(result.code, 0);
    assert.deepEqual(result.stdout.split('\n'), [
      '✓ Installed hd.zip',
      'Dependencies: base.zip',
      'Copied 1 new file, overwrote 1 file'
    ]);
    assert.equal(await readFile(join(game, 'data', 'base.txt'), 'utf8'), 'hd base');
    assert.deepEqual((await readdir(join(updates, '_installed_'))).sort(), ['base.zip', 'hd.zip']);
  });

  it('prints the dependency graph', () => {
    const result = runCli(['graph', game, updates]);

    assert.equal(result.code, 0);
    assert.deepEqual(result.stdout.split('\n'), [
      'base.zip [INSTALLED]',
      '└── (no dependencies)',
      '',
      'hd.zip [INSTALLED]',
      '└── base.zip [INSTALLED]'
    ]);
  });

  it('blocks removal of a bundle that is still needed', () => {
    const result = runCli(['remove', game, updates, '-b', 'base.zip']);

    assert.equal(result.code, 1);
    assert.equal(result.stderr, "Cannot remove 'base.zip': still required by 'hd.zip'");
  });

  it('removes a bundle and its unused dependency', async () => {
    const result = runCli(['remove', game, updates, '-b', 'hd.zip']);

    assert.equal(result.code, 0);
    assert.deepEqual(result.stdout.split('\n'), [
      '✓ Removed hd.zip',
      'Also removed unused dependency: base.zip',
      'hd.zip: removed 2 files, 0 not found',
      'base.zip: removed 0 files, 1 not found'
    ]);
    assert.deepEqual(await readdir(game), []);
    assert.deepEqual((await readdir(join(updates, '_uninstalled_'))).sort(), ['base.zip', 'hd.zip']);
  });

  it('lists removed bundles as available again', () => {
    const result = runCli(['list', updates]);

    assert.equal(result.code, 0);
    assert.deepEqual(result.stdout.split('\n'), [
      'Installed bundles:',
      '  (none)',
      'Available bundles:',
      '  base.zip',
      '  hd.zip'
    ]);
  });
});
