import type { CommandResult, ExecutionContext, InstallOptions } from '../../types/index.js';
import type { ModState } from '../state/mod-state.js';
import { requireGameFilesRoot } from '../execution-context.js';
import { FileStateRepository } from '../state/state-file.js';
import { ArchiveBundleFiles } from '../files/archive-files.js';
import { scanIntake } from '../intake/intake-scanner.js';
import { createPresetSelector, createPromptSelector } from '../selection/bundle-selector.js';
import { resolveOutput, resolvePrompt } from '../ports/resolve.js';
import { runInstallWorkflow, type InstallCollaborators, type InstallOutcome } from './install-workflow.js';
import {
  reportInstallResult,
  reportInstallSummary,
  type InstallFailure
} from './install-reporter.js';
import { NoCandidateError, UserCancellationError, ValidationError, describeError } from '../../utils/errors.js';
import { pluralize } from '../../utils/formatters.js';
import { logger } from '../../utils/logger.js';

export interface InstallPipelineResult {
  installed: InstallOutcome[];
  failures: InstallFailure[];
}

/**
 * Install one bundle (or every available one with `all`) into the game
 * files directory of `ctx`.
 */
export async function runInstallPipeline(
  ctx: ExecutionContext,
  options: InstallOptions = {}
): Promise<CommandResult<InstallPipelineResult>> {
  const gameFilesRoot = requireGameFilesRoot(ctx);
  const output = resolveOutput(ctx);
  const prompt = resolvePrompt(ctx);

  const persistence = new FileStateRepository(ctx.trackingRoot, ctx.config);
  const files = new ArchiveBundleFiles(ctx.config);

  const candidates = (await scanIntake(ctx.trackingRoot, ctx.config)).map(candidate => candidate.id);
  const state = await persistence.load();
  logger.debug(`Found ${candidates.length} intake archive(s)`, { candidates });

  if (options.all) {
    if (options.bundle !== undefined || options.dependsOn !== undefined) {
      throw new ValidationError('--all cannot be combined with --bundle or --depends-on');
    }
    return installAll(ctx, gameFilesRoot, state, candidates, { files, persistence }, options);
  }

  const selector = createPresetSelector(
    { bundle: options.bundle, dependsOn: options.dependsOn },
    createPromptSelector(prompt)
  );
  const outcome = await runInstallWorkflow(
    state,
    { gameFilesRoot, trackingRoot: ctx.trackingRoot, candidates },
    { selector, files, persistence }
  );
  reportInstallResult(output, outcome, { gameFilesRoot, details: options.details });

  return { success: true, data: { installed: [outcome], failures: [] } };
}

/**
 * Install every intake archive that is not installed yet. A failing bundle
 * does not stop the others; the result fails if any of them did.
 */
async function installAll(
  ctx: ExecutionContext,
  gameFilesRoot: string,
  initialState: ModState,
  candidates: string[],
  collaborators: Omit<InstallCollaborators, 'selector'>,
  options: InstallOptions
): Promise<CommandResult<InstallPipelineResult>> {
  const output = resolveOutput(ctx);
  const prompt = resolvePrompt(ctx);

  const pending = candidates.filter(id => !initialState.store.isInstalled(id));
  if (pending.length === 0) {
    throw new NoCandidateError(ctx.trackingRoot);
  }

  output.info(`Installing all ${pluralize(pending.length, 'available bundle')}...`);
  if (!options.yes) {
    const confirmed = await prompt.confirm('Are you sure you want to install ALL available bundles?', false);
    if (!confirmed) {
      output.info('Operation cancelled.');
      return { success: true, data: { installed: [], failures: [] } };
    }
  }

  const fallback = createPromptSelector(prompt);
  const installed: InstallOutcome[] = [];
  const failures: InstallFailure[] = [];
  let state = initialState;

  for (const bundleId of pending) {
    output.step(`Processing ${bundleId}`);
    const selector = createPresetSelector(
      { bundle: bundleId, dependsOn: options.yes ? [] : undefined },
      fallback
    );
    try {
      const outcome = await runInstallWorkflow(
        state,
        { gameFilesRoot, trackingRoot: ctx.trackingRoot, candidates: pending },
        { ...collaborators, selector }
      );
      state = outcome.state;
      installed.push(outcome);
      reportInstallResult(output, outcome, { gameFilesRoot, details: options.details });
    } catch (error) {
      if (error instanceof UserCancellationError) throw error;
      logger.debug(`Install of '${bundleId}' failed`, error);
      failures.push({ bundleId, reason: describeError(error) });
    }
  }

  reportInstallSummary(output, installed, failures);

  if (failures.length > 0) {
    return {
      success: false,
      error: `${failures.length} of ${pluralize(pending.length, 'bundle')} failed to install`,
      data: { installed, failures }
    };
  }
  return { success: true, data: { installed, failures } };
}
