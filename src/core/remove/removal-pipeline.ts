import type { CommandResult, ExecutionContext, RemoveOptions } from '../../types/index.js';
import type { ModState } from '../state/mod-state.js';
import { requireGameFilesRoot } from '../execution-context.js';
import { FileStateRepository } from '../state/state-file.js';
import { ArchiveBundleFiles } from '../files/archive-files.js';
import { ensureTrackingLayout } from '../intake/intake-scanner.js';
import { createPromptSelector } from '../selection/bundle-selector.js';
import { resolveOutput, resolvePrompt } from '../ports/resolve.js';
import { runRemovalWorkflow, type RemovalCollaborators, type RemovalOutcome } from './removal-workflow.js';
import { reportRemovalResult, reportRemovalSummary, type RemovalFailure } from './removal-reporter.js';
import { NoCandidateError, UserCancellationError, ValidationError, describeError } from '../../utils/errors.js';
import { pluralize } from '../../utils/formatters.js';
import { logger } from '../../utils/logger.js';

export interface RemovalPipelineResult {
  outcomes: RemovalOutcome[];
  failures: RemovalFailure[];
}

/**
 * Remove one installed bundle (or all of them with `all`) from the game
 * files directory of `ctx`.
 */
export async function runRemovalPipeline(
  ctx: ExecutionContext,
  options: RemoveOptions = {}
): Promise<CommandResult<RemovalPipelineResult>> {
  const gameFilesRoot = requireGameFilesRoot(ctx);
  const output = resolveOutput(ctx);

  await ensureTrackingLayout(ctx.trackingRoot, ctx.config);
  const persistence = new FileStateRepository(ctx.trackingRoot, ctx.config);
  const collaborators: RemovalCollaborators = {
    selector: createPromptSelector(resolvePrompt(ctx)),
    files: new ArchiveBundleFiles(ctx.config),
    persistence
  };
  const state = await persistence.load();
  const cascade = options.cascade === false ? false : ctx.config.cascade;

  if (options.all) {
    if (options.bundle !== undefined) {
      throw new ValidationError('--all cannot be combined with --bundle');
    }
    return removeAll(ctx, gameFilesRoot, state, collaborators, { ...options, cascade });
  }

  const outcome = await runRemovalWorkflow(state, collaborators, {
    gameFilesRoot,
    trackingRoot: ctx.trackingRoot,
    bundleId: options.bundle,
    cascade
  });
  reportRemovalResult(output, outcome, { gameFilesRoot, details: options.details });

  return { success: true, data: { outcomes: [outcome], failures: [] } };
}

/**
 * Remove every installed bundle, dependants before their dependencies.
 * Bundles already taken out by an earlier cascade are skipped.
 */
async function removeAll(
  ctx: ExecutionContext,
  gameFilesRoot: string,
  initialState: ModState,
  collaborators: RemovalCollaborators,
  options: RemoveOptions
): Promise<CommandResult<RemovalPipelineResult>> {
  const output = resolveOutput(ctx);
  const prompt = resolvePrompt(ctx);

  const installed = Array.from(initialState.store.listInstalled());
  if (installed.length === 0) {
    throw new NoCandidateError(ctx.trackingRoot, 'remove');
  }

  output.info(`Removing all ${pluralize(installed.length, 'installed bundle')}...`);
  if (!options.yes) {
    const confirmed = await prompt.confirm('Are you sure you want to remove ALL installed bundles?', false);
    if (!confirmed) {
      output.info('Operation cancelled.');
      return { success: true, data: { outcomes: [], failures: [] } };
    }
  }

  const outcomes: RemovalOutcome[] = [];
  const failures: RemovalFailure[] = [];
  let state = initialState;

  for (const bundleId of initialState.graph.removalOrder(installed)) {
    if (!state.store.isInstalled(bundleId)) {
      logger.debug(`Skipping '${bundleId}', already removed`);
      continue;
    }
    output.step(`Processing ${bundleId}`);
    try {
      const outcome = await runRemovalWorkflow(state, collaborators, {
        gameFilesRoot,
        trackingRoot: ctx.trackingRoot,
        bundleId,
        cascade: options.cascade
      });
      state = outcome.state;
      outcomes.push(outcome);
      reportRemovalResult(output, outcome, { gameFilesRoot, details: options.details });
    } catch (error) {
      if (error instanceof UserCancellationError) throw error;
      logger.debug(`Removal of '${bundleId}' failed`, error);
      failures.push({ bundleId, reason: describeError(error) });
    }
  }

  reportRemovalSummary(output, outcomes, failures);

  if (failures.length > 0) {
    return {
      success: false,
      error: `${failures.length} of ${pluralize(installed.length, 'bundle')} failed to remove`,
      data: { outcomes, failures }
    };
  }
  return { success: true, data: { outcomes, failures } };
}
