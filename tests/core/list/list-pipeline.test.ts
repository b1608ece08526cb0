import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, mkdir, readdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';

import { formatBundleListing, runListPipeline } from '../../../src/core/list/list-pipeline.js';
import { writeState } from '../../../src/core/state/state-file.js';
import { DEFAULT_CONFIG } from '../../../src/core/config.js';
import type { ExecutionContext } from '../../../src/types/index.js';
import { stateOf } from '../workflow-fakes.js';

describe('list pipeline', () => {
  let trackingRoot: string;
  let ctx: ExecutionContext;

  beforeEach(async () => {
    trackingRoot = await mkdtemp(join(tmpdir(), 'modkeeper-list-'));
    ctx = { trackingRoot, config: DEFAULT_CONFIG };
  });

  afterEach(async () => {
    await rm(trackingRoot, { recursive: true, force: true });
  });

  it('sorts bundles into installed, available and untracked', async () => {
    await writeState(trackingRoot, DEFAULT_CONFIG, stateOf(
      [['base.zip', 'installed'], ['hd.zip', 'installed'], ['draft.zip', 'uninstalled']],
      { 'hd.zip': ['base.zip'] }
    ));
    await mkdir(join(trackingRoot, '_installed_'));
    await mkdir(join(trackingRoot, '_uninstalled_'));
    await writeFile(join(trackingRoot, '_installed_', 'base.zip'), 'x');
    await writeFile(join(trackingRoot, '_installed_', 'stray.zip'), 'x');
    await writeFile(join(trackingRoot, '_uninstalled_', 'draft.zip'), 'x');
    await writeFile(join(trackingRoot, 'new.zip'), 'x');

    const result = await runListPipeline(ctx);

    assert.equal(result.success, true);
    assert.deepEqual(result.data, {
      installed: [
        { id: 'base.zip', dependencies: [], archivePresent: true },
        { id: 'hd.zip', dependencies: ['base.zip'], archivePresent: false }
      ],
      available: ['new.zip', 'draft.zip'],
      untracked: ['stray.zip']
    });
  });

  it('does not create anything in an empty updates directory', async () => {
    const result = await runListPipeline(ctx);

    assert.deepEqual(result.data, { installed: [], available: [], untracked: [] });
    assert.deepEqual(await readdir(trackingRoot), []);
  });
});

describe('formatBundleListing', () => {
  it('renders every section', () => {
    const lines = formatBundleListing({
      installed: [
        { id: 'base.zip', dependencies: [], archivePresent: true },
        { id: 'hd.zip', dependencies: ['base.zip'], archivePresent: false }
      ],
      available: [],
      untracked: ['stray.zip']
    });

    assert.deepEqual(lines, [
      'Installed bundles:',
      '  base.zip',
      '  hd.zip (depends on base.zip) [ARCHIVE MISSING]',
      'Available bundles:',
      '  (none)',
      'Untracked installed archives:',
      '  stray.zip'
    ]);
  });
});
