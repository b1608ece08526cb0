import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, mkdir, rm, unlink } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';

import { runInstallPipeline } from '../../../src/core/install/install-pipeline.js';
import { runRemovalPipeline } from '../../../src/core/remove/removal-pipeline.js';
import { FileStateRepository } from '../../../src/core/state/state-file.js';
import { DEFAULT_CONFIG } from '../../../src/core/config.js';
import { ValidationError } from '../../../src/utils/errors.js';
import type { ExecutionContext } from '../../../src/types/index.js';
import { writeZip } from '../../test-helpers.js';
import { confirmingPrompt, recordingOutput } from '../pipeline-fakes.js';

describe('runRemovalPipeline with all', () => {
  let root: string;
  let trackingRoot: string;
  let ctx: ExecutionContext;
  let output: ReturnType<typeof recordingOutput>;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'modkeeper-remove-all-'));
    const gameFilesRoot = join(root, 'game');
    trackingRoot = join(root, 'updates');
    await mkdir(gameFilesRoot);
    for (const id of ['base', 'lib', 'app', 'solo']) {
      await writeZip(join(trackingRoot, `${id}.zip`), { [`${id}.txt`]: id });
    }

    output = recordingOutput();
    ctx = { gameFilesRoot, trackingRoot, config: DEFAULT_CONFIG, output, prompt: confirmingPrompt(true) };

    // app → lib → base, solo stands alone
    const presets: Array<[string, string[]]> = [
      ['base.zip', []],
      ['lib.zip', ['base.zip']],
      ['app.zip', ['lib.zip']],
      ['solo.zip', []]
    ];
    for (const [bundle, dependsOn] of presets) {
      const installed = await runInstallPipeline(ctx, { bundle, dependsOn });
      assert.equal(installed.success, true);
    }
    output.lines.length = 0;
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('removes dependants first and skips bundles a cascade already removed', async () => {
    const result = await runRemovalPipeline(ctx, { all: true, yes: true });

    assert.equal(result.success, true);
    assert.deepEqual(result.data?.outcomes.map(outcome => outcome.removed), [
      ['app.zip', 'lib.zip', 'base.zip'],
      ['solo.zip']
    ]);
    assert.deepEqual(
      output.lines.filter(line => line.startsWith('step:')),
      ['step:Processing app.zip', 'step:Processing solo.zip']
    );

    const state = await new FileStateRepository(trackingRoot, DEFAULT_CONFIG).load();
    assert.equal(state.store.size, 0);
  });

  it('keeps going past a failing bundle and fails the run', async () => {
    await unlink(join(trackingRoot, '_installed_', 'solo.zip'));

    const result = await runRemovalPipeline(ctx, { all: true, yes: true });

    assert.equal(result.success, false);
    assert.equal(result.error, '1 of 4 bundles failed to remove');
    assert.deepEqual(result.data?.outcomes.map(outcome => outcome.removed), [['app.zip', 'lib.zip', 'base.zip']]);
    assert.deepEqual(result.data?.failures, [{
      bundleId: 'solo.zip',
      reason: "Failed to remove files of 'solo.zip': archive not found in its _installed_ folder"
    }]);

    const state = await new FileStateRepository(trackingRoot, DEFAULT_CONFIG).load();
    assert.deepEqual(Array.from(state.store.listInstalled()), ['solo.zip']);
  });

  it('rejects all combined with a named bundle', async () => {
    await assert.rejects(runRemovalPipeline(ctx, { all: true, bundle: 'app.zip' }), ValidationError);
  });
});
