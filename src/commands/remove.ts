import { Command } from 'commander';

import type { RemoveOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { createCliExecutionContext } from '../cli/context.js';
import { runRemovalPipeline } from '../core/remove/removal-pipeline.js';

export function setupRemoveCommand(program: Command): void {
  program
    .command('remove')
    .alias('rm')
    .description('Remove an installed bundle and the dependencies nothing else needs')
    .argument('<gameFilesPath>', 'game directory holding the bundle files')
    .argument('<targetFolderPath>', 'updates directory holding the bundle archives')
    .option('-b, --bundle <id>', 'bundle to remove (archive file name) instead of asking')
    .option('--no-cascade', 'keep dependencies that are no longer needed')
    .option('--all', 'remove every installed bundle')
    .option('-y, --yes', 'with --all: skip the confirmation')
    .option('--details', 'list the files that were removed')
    .action(withErrorHandling(async (
      gameFilesPath: string,
      targetFolderPath: string,
      options: RemoveOptions,
      command: Command
    ) => {
      const programOpts = command.parent?.opts() ?? {};
      const ctx = await createCliExecutionContext({
        gameFilesPath,
        targetFolderPath,
        plain: programOpts.plain === true
      });

      const result = await runRemovalPipeline(ctx, options);
      if (!result.success) {
        throw new Error(result.error ?? 'Remove operation failed');
      }
    }));
}
