#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';
import { LogLevel } from './types/index.js';

// Import command setup functions
import { setupInstallCommand } from './commands/install.js';
import { setupRemoveCommand } from './commands/remove.js';
import { setupGraphCommand } from './commands/graph.js';
import { setupListCommand } from './commands/list.js';

/**
 * modkeeper CLI - Main entry point
 *
 * Installs and removes zip bundles in a game directory while tracking
 * the dependencies between them.
 */

const program = new Command();

program
  .name('modkeeper')
  .description('Install, remove and track dependent mod bundles')
  .version(getVersion())
  .option('--verbose', 'print debug logging')
  .option('--plain', 'use plain numbered prompts instead of interactive menus')
  .configureHelp({
    sortSubcommands: true
  });

setupInstallCommand(program);
setupRemoveCommand(program);
setupGraphCommand(program);
setupListCommand(program);

program.hook('preAction', () => {
  const opts = program.opts();
  if (opts.verbose === true) {
    logger.setLevel(LogLevel.DEBUG);
  }
  logger.debug(`Working directory: ${process.cwd()}`);
});

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  // If no arguments provided, show help and exit successfully
  if (argv.length <= 2) {
    program.outputHelp();
    process.exit(0);
  }

  await program.parseAsync(argv);
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('modkeeper')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

// Export the program for testing purposes
export { program };
