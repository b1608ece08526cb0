/**
 * Execution Context Module
 *
 * Resolves the two directories every command works on and loads the
 * configuration of the updates directory.
 *
 * - gameFilesRoot: where bundle files are extracted to
 * - trackingRoot: where intake archives, the tracking folders and the
 *   state file live
 */

import { resolve } from 'path';
import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { loadConfig } from './config.js';
import { isDirectory } from '../utils/fs.js';
import { ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Create an ExecutionContext from the command's positional arguments.
 * Relative paths resolve against the current working directory.
 *
 * @throws ValidationError when a given directory does not exist
 */
export async function createExecutionContext(options: ExecutionOptions): Promise<ExecutionContext> {
  const cwd = process.cwd();
  const trackingRoot = resolve(cwd, options.targetFolderPath);
  const gameFilesRoot = options.gameFilesPath !== undefined
    ? resolve(cwd, options.gameFilesPath)
    : undefined;

  if (!(await isDirectory(trackingRoot))) {
    throw new ValidationError(`Updates directory does not exist: ${trackingRoot}`, { trackingRoot });
  }
  if (gameFilesRoot !== undefined && !(await isDirectory(gameFilesRoot))) {
    throw new ValidationError(`Game files directory does not exist: ${gameFilesRoot}`, { gameFilesRoot });
  }

  const config = await loadConfig(trackingRoot);

  logger.debug('Created execution context', { gameFilesRoot, trackingRoot, config });

  return { gameFilesRoot, trackingRoot, config };
}

/**
 * The game files directory of a context built for a file-changing command
 */
export function requireGameFilesRoot(ctx: ExecutionContext): string {
  if (ctx.gameFilesRoot === undefined) {
    throw new ValidationError('A game files directory is required for this command');
  }
  return ctx.gameFilesRoot;
}
