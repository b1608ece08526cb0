import { Command } from 'commander';

import type { InstallOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { createCliExecutionContext } from '../cli/context.js';
import { runInstallPipeline } from '../core/install/install-pipeline.js';

async function installCommand(
  gameFilesPath: string,
  targetFolderPath: string,
  options: InstallOptions,
  command: Command
): Promise<void> {
  const programOpts = command.parent?.opts() ?? {};
  const ctx = await createCliExecutionContext({
    gameFilesPath,
    targetFolderPath,
    plain: programOpts.plain === true
  });

  const result = await runInstallPipeline(ctx, options);
  if (!result.success) {
    throw new Error(result.error ?? 'Install operation failed');
  }
}

export function setupInstallCommand(program: Command): void {
  program
    .command('install')
    .alias('i')
    .description('Install a bundle from the updates directory into the game files')
    .argument('<gameFilesPath>', 'game directory that receives the bundle files')
    .argument('<targetFolderPath>', 'updates directory holding the bundle archives')
    .option('-b, --bundle <id>', 'bundle to install (archive file name) instead of asking')
    .option('-d, --depends-on <ids...>', 'installed bundles the new bundle depends on')
    .option('--all', 'install every available bundle')
    .option('-y, --yes', 'with --all: skip the confirmation and install without dependencies')
    .option('--details', 'list the files that were copied and overwritten')
    .action(withErrorHandling(async (
      gameFilesPath: string,
      targetFolderPath: string,
      options: InstallOptions,
      command: Command
    ) => {
      await installCommand(gameFilesPath, targetFolderPath, options, command);
    }));
}
