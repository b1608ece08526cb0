/**
 * Clack Prompt Adapter
 *
 * CLI-specific PromptPort implementation that routes to @clack/prompts
 * for rich interactive terminal prompts.
 */

import * as clack from '@clack/prompts';
import type { PromptPort, PromptChoice } from '../core/ports/prompt.js';
import { UserCancellationError } from '../utils/errors.js';

function unwrap<T>(result: T | symbol): T {
  if (clack.isCancel(result)) {
    clack.cancel('Operation cancelled.');
    throw new UserCancellationError('Operation cancelled by user');
  }
  return result;
}

function toOptions(choices: PromptChoice[]): Array<{ value: string; label: string; hint?: string }> {
  return choices.map(c => ({
    label: c.title,
    value: c.value,
    ...(c.description ? { hint: c.description } : {}),
  }));
}

/**
 * Create a Clack-based PromptPort for interactive terminal sessions.
 */
export function createClackPrompt(): PromptPort {
  return {
    async confirm(message: string, initial?: boolean): Promise<boolean> {
      const result = await clack.confirm({
        message,
        initialValue: initial ?? false,
      });
      return unwrap(result);
    },

    async select(message: string, choices: PromptChoice[]): Promise<string> {
      const result = await clack.select<string>({
        message,
        options: toOptions(choices),
      });
      return unwrap(result);
    },

    async multiselect(message: string, choices: PromptChoice[], options?: { min?: number }): Promise<string[]> {
      const result = await clack.multiselect<string>({
        message,
        options: toOptions(choices),
        required: options?.min ? options.min > 0 : false,
      });
      return unwrap(result);
    },
  };
}
