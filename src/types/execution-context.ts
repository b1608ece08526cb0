/**
 * Execution Context Types
 *
 * Type definitions for the execution context that every command
 * builds once from its positional arguments.
 */

import type { OutputPort } from '../core/ports/output.js';
import type { PromptPort } from '../core/ports/prompt.js';
import type { ModKeeperConfig } from './index.js';

/**
 * ExecutionContext - Single source of truth for directory resolution
 *
 * Strictly separates:
 * - gameFilesRoot: Where bundle contents are extracted to
 * - trackingRoot: Where intake archives, `_installed_`, `_uninstalled_`
 *   and the state file live
 *
 * Also carries port interfaces for decoupled output and prompting,
 * so the same pipelines can be driven by a terminal or by tests.
 */
export interface ExecutionContext {
  /**
   * Absolute path of the game directory receiving bundle files.
   * Unset for commands that only read tracking data.
   */
  gameFilesRoot?: string;

  /** Absolute path of the updates directory. */
  trackingRoot: string;

  /** Effective configuration (defaults merged with `modkeeper.jsonc`). */
  config: ModKeeperConfig;

  /**
   * Output port for all user-facing messages.
   * When not provided, defaults to consoleOutput (plain console.log).
   */
  output?: OutputPort;

  /**
   * Prompt port for all interactive user prompts.
   * When not provided, defaults to nonInteractivePrompt (throws on prompt).
   */
  prompt?: PromptPort;

  /** Colorize rendered output (TTY sessions). */
  color?: boolean;
}

/**
 * Options for creating an ExecutionContext
 */
export interface ExecutionOptions {
  /** `<gameFilesPath>` positional argument. Optional for read-only commands. */
  gameFilesPath?: string;

  /** `<targetFolderPath>` positional argument. */
  targetFolderPath: string;
}
