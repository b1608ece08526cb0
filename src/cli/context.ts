/**
 * CLI Context Factory
 *
 * Creates ExecutionContext instances with CLI-specific port implementations
 * (Clack or readline prompts, Clack or plain output).
 *
 * Command handlers use this instead of calling createExecutionContext()
 * directly so ports are always injected.
 */

import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { createExecutionContext } from '../core/execution-context.js';
import { createClackOutput } from './clack-output-adapter.js';
import { createClackPrompt } from './clack-prompt-adapter.js';
import { createPlainPrompt } from './plain-prompt-adapter.js';
import { consoleOutput } from '../core/ports/console-output.js';
import { nonInteractivePrompt } from '../core/ports/console-prompt.js';
import type { OutputPort } from '../core/ports/output.js';
import type { PromptPort } from '../core/ports/prompt.js';

export interface CliContextOptions extends ExecutionOptions {
  /** Override interactive mode detection (undefined = auto-detect from TTY) */
  interactive?: boolean;
  /** Numbered readline prompts instead of Clack */
  plain?: boolean;
}

/** Cached port singletons for the lifetime of the CLI process. */
let cachedClackOutput: OutputPort | undefined;
let cachedClackPrompt: PromptPort | undefined;
let cachedPlainPrompt: PromptPort | undefined;

function getCliPorts(isInteractive: boolean, plain: boolean): { output: OutputPort; prompt: PromptPort } {
  if (!isInteractive) {
    return { output: consoleOutput, prompt: nonInteractivePrompt };
  }
  if (plain) {
    cachedPlainPrompt ??= createPlainPrompt();
    return { output: consoleOutput, prompt: cachedPlainPrompt };
  }
  cachedClackOutput ??= createClackOutput();
  cachedClackPrompt ??= createClackPrompt();
  return { output: cachedClackOutput, prompt: cachedClackPrompt };
}

/** Detect whether the current session is interactive (TTY, no CI). */
function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  const isTTY = process.stdin.isTTY === true;
  return isTTY && process.env.CI !== 'true';
}

/**
 * Create an ExecutionContext with CLI-specific ports injected.
 *
 * In interactive mode (TTY): Clack output and prompts, or readline prompts with --plain.
 * In non-interactive mode (CI/piped): plain console output and throws on prompts.
 */
export async function createCliExecutionContext(options: CliContextOptions): Promise<ExecutionContext> {
  const ctx = await createExecutionContext(options);
  const isInteractive = detectInteractive(options.interactive);
  const ports = getCliPorts(isInteractive, options.plain === true);

  ctx.output = ports.output;
  ctx.prompt = ports.prompt;
  ctx.color = process.stdout.isTTY === true && process.env.NO_COLOR === undefined;

  return ctx;
}
