import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { BundleStore } from '../../../src/core/bundles/bundle-store.js';
import { DuplicateBundleError, UnknownBundleError } from '../../../src/utils/errors.js';

describe('BundleStore', () => {
  it('registers new bundles as uninstalled', () => {
    const store = new BundleStore();
    assert.deepEqual(store.register('base.zip'), { id: 'base.zip', status: 'uninstalled' });
    assert.equal(store.statusOf('base.zip'), 'uninstalled');
    assert.equal(store.size, 1);
  });

  it('treats registering an uninstalled bundle again as a no-op', () => {
    const store = new BundleStore();
    store.register('base.zip');
    store.register('base.zip');
    assert.equal(store.size, 1);
  });

  it('refuses to register an installed bundle again', () => {
    const store = new BundleStore();
    store.register('base.zip');
    store.markInstalled('base.zip');
    assert.throws(() => store.register('base.zip'), DuplicateBundleError);
    assert.equal(store.statusOf('base.zip'), 'installed');
  });

  it('changes status only for known bundles', () => {
    const store = new BundleStore();
    assert.throws(() => store.markInstalled('ghost.zip'), UnknownBundleError);
    assert.throws(() => store.markUninstalled('ghost.zip'), UnknownBundleError);

    store.register('base.zip');
    store.markInstalled('base.zip');
    assert.equal(store.isInstalled('base.zip'), true);
    store.markUninstalled('base.zip');
    assert.equal(store.isInstalled('base.zip'), false);
  });

  it('removes bundles and rejects unknown ids', () => {
    const store = new BundleStore();
    store.register('base.zip');
    store.remove('base.zip');
    assert.equal(store.has('base.zip'), false);
    assert.throws(() => store.remove('base.zip'), UnknownBundleError);
  });

  it('lists by status in insertion order and reflects later changes', () => {
    const store = new BundleStore();
    for (const id of ['c.zip', 'a.zip', 'b.zip']) store.register(id);
    store.markInstalled('c.zip');
    store.markInstalled('b.zip');

    const installed = store.listInstalled();
    assert.deepEqual(Array.from(installed), ['c.zip', 'b.zip']);
    assert.deepEqual(Array.from(store.listUninstalled()), ['a.zip']);

    store.markInstalled('a.zip');
    assert.deepEqual(Array.from(installed), ['c.zip', 'a.zip', 'b.zip']);
  });

  it('clones independently', () => {
    const store = new BundleStore();
    store.register('base.zip');
    const copy = store.clone();
    copy.markInstalled('base.zip');
    copy.register('extra.zip');

    assert.equal(store.isInstalled('base.zip'), false);
    assert.equal(store.has('extra.zip'), false);
    assert.deepEqual(copy.list(), [
      { id: 'base.zip', status: 'installed' },
      { id: 'extra.zip', status: 'uninstalled' }
    ]);
  });
});
