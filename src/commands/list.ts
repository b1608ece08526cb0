import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCliExecutionContext } from '../cli/context.js';
import { formatBundleListing, runListPipeline } from '../core/list/list-pipeline.js';

export function setupListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List installed and available bundles')
    .argument('<targetFolderPath>', 'updates directory holding the bundle archives')
    .action(withErrorHandling(async (targetFolderPath: string) => {
      const ctx = await createCliExecutionContext({ targetFolderPath });
      const result = await runListPipeline(ctx);
      if (!result.success || !result.data) {
        throw new Error(result.error ?? 'List operation failed');
      }

      for (const line of formatBundleListing(result.data, { color: ctx.color })) {
        console.log(line);
      }
    }));
}
