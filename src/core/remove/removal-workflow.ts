import type { ModState, StateRepository } from '../state/mod-state.js';
import { cloneState, installedDependantsOf } from '../state/mod-state.js';
import type { BundleFiles, RemovalReport } from '../files/archive-files.js';
import type { BundleSelector } from '../selection/bundle-selector.js';
import { ModKeeperError } from '../../types/index.js';
import {
  HasDependantsError,
  NoCandidateError,
  NotInstalledError,
  RemovalError,
  UnknownBundleError,
  describeError
} from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface RemovalRequest {
  gameFilesRoot: string;
  trackingRoot: string;
  /** Bundle to remove; asked from the selector when omitted */
  bundleId?: string;
  /** Also remove dependencies nothing else needs. Defaults to true. */
  cascade?: boolean;
}

export interface RemovalCollaborators {
  selector: BundleSelector;
  files: BundleFiles;
  persistence: StateRepository;
}

export interface RemovalOutcome {
  state: ModState;
  /** Removed ids, target first, in the order their files were removed */
  removed: string[];
  reports: RemovalReport[];
}

/**
 * Remove one installed bundle and, unless disabled, every dependency that
 * is left without dependants, depth-first.
 *
 * The whole invocation is one unit: if any removal or the final save fails,
 * bundles already removed are placed back in reverse order and nothing is
 * persisted.
 */
export async function runRemovalWorkflow(
  state: ModState,
  collaborators: RemovalCollaborators,
  request: RemovalRequest
): Promise<RemovalOutcome> {
  const { selector, files, persistence } = collaborators;
  const cascade = request.cascade ?? true;

  let target = request.bundleId;
  if (target === undefined) {
    const installed = Array.from(state.store.listInstalled());
    if (installed.length === 0) {
      throw new NoCandidateError(request.trackingRoot, 'remove');
    }
    target = await selector.selectRemovalTarget(installed);
  }

  const working = cloneState(state);
  const removed: string[] = [];
  const reports: RemovalReport[] = [];

  const removeOne = async (id: string): Promise<void> => {
    if (!working.store.has(id)) {
      throw new UnknownBundleError(id);
    }
    if (!working.store.isInstalled(id)) {
      throw new NotInstalledError(id);
    }
    const blocking = installedDependantsOf(working, id);
    if (blocking.length > 0) {
      throw new HasDependantsError(id, blocking);
    }

    const dependencies = working.graph.dependenciesOf(id);

    let report: RemovalReport;
    try {
      report = await files.removeFiles(id, request.gameFilesRoot, request.trackingRoot);
    } catch (error) {
      if (error instanceof ModKeeperError) throw error;
      throw new RemovalError(id, describeError(error));
    }
    removed.push(id);
    reports.push(report);

    working.store.remove(id);
    working.graph.removeBundleEdges(id);

    if (!cascade) return;
    for (const dependency of dependencies) {
      if (
        working.store.has(dependency) &&
        working.store.isInstalled(dependency) &&
        !working.graph.isUsedByOthers(dependency)
      ) {
        logger.debug(`Cascading removal from '${id}' to '${dependency}'`);
        await removeOne(dependency);
      }
    }
  };

  try {
    await removeOne(target);
    await persistence.save(working);
  } catch (error) {
    const rolledBack = await restoreRemoved(removed, files, request);
    if (error instanceof ModKeeperError && rolledBack.length > 0) {
      error.details = { ...error.details, rolledBack };
    }
    throw error;
  }

  return { state: working, removed, reports };
}

/**
 * Place removed bundles again, last removed first. Returns the ids placed.
 */
async function restoreRemoved(
  removed: string[],
  files: BundleFiles,
  request: RemovalRequest
): Promise<string[]> {
  const restored: string[] = [];
  for (const id of [...removed].reverse()) {
    try {
      await files.place(id, request.gameFilesRoot, request.trackingRoot);
      restored.push(id);
    } catch (error) {
      logger.error(`Could not restore files of '${id}'`, error);
    }
  }
  if (restored.length > 0) {
    logger.debug(`Rolled back removal of ${restored.join(', ')}`);
  }
  return restored;
}
