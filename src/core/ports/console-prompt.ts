/**
 * Non-Interactive Prompt Adapter (Default/CI)
 *
 * PromptPort implementation that throws on any prompt attempt.
 * Used in CI pipelines and piped sessions where user interaction
 * is not possible.
 */

import type { PromptPort, PromptChoice } from './prompt.js';

export class NonInteractivePromptError extends Error {
  constructor(promptType: string) {
    super(
      `Cannot prompt for ${promptType} in non-interactive mode. ` +
      `Use --bundle and --depends-on to provide the required input.`
    );
    this.name = 'NonInteractivePromptError';
  }
}

export const nonInteractivePrompt: PromptPort = {
  async confirm(_message: string, _initial?: boolean): Promise<boolean> {
    throw new NonInteractivePromptError('confirmation');
  },

  async select(_message: string, _choices: PromptChoice[]): Promise<string> {
    throw new NonInteractivePromptError('selection');
  },

  async multiselect(_message: string, _choices: PromptChoice[]): Promise<string[]> {
    throw new NonInteractivePromptError('multi-selection');
  },
};
