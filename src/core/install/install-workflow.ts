import type { ModState, StateRepository } from '../state/mod-state.js';
import { cloneState } from '../state/mod-state.js';
import type { BundleFiles, PlacementReport } from '../files/archive-files.js';
import type { BundleSelector } from '../selection/bundle-selector.js';
import { ModKeeperError } from '../../types/index.js';
import {
  NoCandidateError,
  NotInstalledError,
  PlacementError,
  UnknownBundleError,
  describeError
} from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface InstallRequest {
  gameFilesRoot: string;
  trackingRoot: string;
  /** Intake ids offered for installation */
  candidates: string[];
}

export interface InstallCollaborators {
  selector: BundleSelector;
  files: BundleFiles;
  persistence: StateRepository;
}

export interface InstallOutcome {
  /** State after the commit; the input state is never modified */
  state: ModState;
  bundleId: string;
  dependencies: string[];
  placement: PlacementReport;
}

/**
 * Install one bundle: SelectBundle → SelectDependencies → PlaceFiles → Commit.
 *
 * Every step before Commit works on a copy of `state`, so an abort at any
 * point leaves the caller's state and the state file untouched.
 */
export async function runInstallWorkflow(
  state: ModState,
  request: InstallRequest,
  collaborators: InstallCollaborators
): Promise<InstallOutcome> {
  const { selector, files, persistence } = collaborators;

  // SelectBundle
  if (request.candidates.length === 0) {
    throw new NoCandidateError(request.trackingRoot);
  }
  const bundleId = await selector.selectInstallTarget(request.candidates);
  if (!request.candidates.includes(bundleId)) {
    throw new UnknownBundleError(bundleId);
  }

  const working = cloneState(state);
  working.store.register(bundleId);

  // SelectDependencies
  // Asked even with nothing installed: preset ids must still be validated
  const installed = Array.from(working.store.listInstalled());
  const chosen = await selector.selectDependencies(bundleId, installed);
  for (const dependency of chosen) {
    if (dependency !== bundleId && working.store.has(dependency) && !working.store.isInstalled(dependency)) {
      throw new NotInstalledError(dependency);
    }
    working.graph.addDependency(bundleId, dependency);
  }
  logger.debug(`Dependencies of '${bundleId}': ${chosen.length > 0 ? chosen.join(', ') : 'none'}`);

  // PlaceFiles
  let placement: PlacementReport;
  try {
    placement = await files.place(bundleId, request.gameFilesRoot, request.trackingRoot);
  } catch (error) {
    if (error instanceof ModKeeperError) throw error;
    throw new PlacementError(bundleId, describeError(error));
  }

  // Commit
  working.store.markInstalled(bundleId);
  try {
    await persistence.save(working);
  } catch (error) {
    logger.debug(`Saving state failed, taking back files of '${bundleId}'`);
    try {
      await files.removeFiles(bundleId, request.gameFilesRoot, request.trackingRoot);
    } catch (rollbackError) {
      logger.error(`Could not take back files of '${bundleId}' after a failed save`, rollbackError);
    }
    throw error;
  }

  return {
    state: working,
    bundleId,
    dependencies: working.graph.dependenciesOf(bundleId),
    placement
  };
}
