import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { ErrorCodes, ModKeeperError } from '../../src/types/index.js';
import {
  CyclicDependencyError,
  HasDependantsError,
  NoCandidateError,
  NotInstalledError,
  ValidationError,
  describeError,
  handleError
} from '../../src/utils/errors.js';

describe('error classes', () => {
  it('describe the cycle an edge would close', () => {
    const error = new CyclicDependencyError('a.zip', 'b.zip', ['b.zip', 'c.zip', 'a.zip']);
    assert.equal(
      error.message,
      "Adding 'b.zip' as a dependency of 'a.zip' would create a cycle: a.zip → b.zip → c.zip → a.zip"
    );
    assert.equal(error.code, ErrorCodes.CYCLIC_DEPENDENCY);
  });

  it('list blocking dependants', () => {
    const error = new HasDependantsError('base.zip', ['hd.zip']);
    assert.equal(error.message, "Cannot remove 'base.zip': still required by 'hd.zip'");
    assert.deepEqual(error.details, { bundleId: 'base.zip', dependants: ['hd.zip'] });
  });

  it('name the action that had no candidates', () => {
    assert.equal(new NoCandidateError('/mods').message, "No bundles available to install in '/mods'");
    assert.equal(new NoCandidateError('/mods', 'remove').message, "No bundles available to remove in '/mods'");
  });

  it('keep the validation hierarchy', () => {
    const error = new NotInstalledError('hd.zip');
    assert.ok(error instanceof ValidationError);
    assert.ok(error instanceof ModKeeperError);
    assert.equal(error.message, "Validation error: Bundle 'hd.zip' is not installed");
  });
});

describe('handleError', () => {
  it('turns thrown values into failed command results', () => {
    assert.deepEqual(handleError(new NotInstalledError('hd.zip')), {
      success: false,
      error: "Validation error: Bundle 'hd.zip' is not installed"
    });
    assert.deepEqual(handleError(new Error('boom')), { success: false, error: 'boom' });
    assert.deepEqual(handleError(42), { success: false, error: 'An unknown error occurred' });
  });
});

describe('describeError', () => {
  it('prefers the message of an Error', () => {
    assert.equal(describeError(new Error('bad zip')), 'bad zip');
    assert.equal(describeError('plain'), 'plain');
  });
});
