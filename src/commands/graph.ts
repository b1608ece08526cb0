import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCliExecutionContext } from '../cli/context.js';
import { FileStateRepository } from '../core/state/state-file.js';
import { renderDependencyGraph } from '../core/graph/graph-renderer.js';
import { logger } from '../utils/logger.js';

export function setupGraphCommand(program: Command): void {
  program
    .command('graph')
    .description('Show every tracked bundle with its dependency tree')
    .argument('<gameFilesPath>', 'game directory (not read; kept for symmetry with install/remove)')
    .argument('<targetFolderPath>', 'updates directory holding the state file')
    .action(withErrorHandling(async (gameFilesPath: string, targetFolderPath: string) => {
      logger.debug(`Rendering graph for '${targetFolderPath}'`, { gameFilesPath });
      const ctx = await createCliExecutionContext({ targetFolderPath });
      const state = await new FileStateRepository(ctx.trackingRoot, ctx.config).load();

      for (const line of renderDependencyGraph(state, { color: ctx.color })) {
        console.log(line);
      }
    }));
}
