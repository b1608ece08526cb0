/**
 * Plain Prompt Adapter
 *
 * PromptPort implementation that uses Node's readline module for
 * numbered-list prompts without box-drawing characters. Used on a TTY
 * when `--plain` is given.
 *
 * List answers follow the selection grammar of utils/selection.ts
 * (`1,3-5`, `all`).
 */

import { createInterface, type Interface as ReadlineInterface } from 'node:readline';
import type { PromptPort, PromptChoice } from '../core/ports/prompt.js';
import { UserCancellationError } from '../utils/errors.js';
import { parseSelection } from '../utils/selection.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Create a one-shot readline interface, auto-closing on completion. */
function createRl(): ReadlineInterface {
  return createInterface({
    input: process.stdin,
    output: process.stderr, // prompts go to stderr so stdout stays clean for piping
    terminal: true,
  });
}

/** Read a single line, handling Ctrl-C / EOF as cancellation. */
function askLine(rl: ReadlineInterface, query: string): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    rl.question(query, (answer) => {
      resolve(answer);
    });
    rl.once('close', () => {
      reject(new UserCancellationError('Prompt cancelled'));
    });
    rl.once('SIGINT', () => {
      rl.close();
      reject(new UserCancellationError('Prompt cancelled'));
    });
  });
}

function printChoices(message: string, choices: PromptChoice[]): void {
  console.error(message);
  choices.forEach((choice, i) => {
    const desc = choice.description ? ` - ${choice.description}` : '';
    console.error(`  ${i + 1}. ${choice.title}${desc}`);
  });
}

// ---------------------------------------------------------------------------
// Adapter
// ---------------------------------------------------------------------------

export function createPlainPrompt(): PromptPort {
  return {
    async confirm(message: string, initial?: boolean): Promise<boolean> {
      const hint = initial ? '[Y/n]' : '[y/N]';
      const rl = createRl();
      try {
        const answer = await askLine(rl, `${message} ${hint}: `);
        const trimmed = answer.trim().toLowerCase();
        if (trimmed === '') return initial ?? false;
        return trimmed === 'y' || trimmed === 'yes';
      } finally {
        rl.close();
      }
    },

    async select(message: string, choices: PromptChoice[]): Promise<string> {
      const rl = createRl();
      try {
        printChoices(message, choices);

        // eslint-disable-next-line no-constant-condition
        while (true) {
          const answer = await askLine(rl, 'Enter selection: ');
          const { indices } = parseSelection(answer, choices.length);
          if (indices.length === 1 && answer.trim().toLowerCase() !== 'all') {
            return choices[indices[0] - 1].value;
          }
          console.error(`Please enter one number between 1 and ${choices.length}.`);
        }
      } finally {
        rl.close();
      }
    },

    async multiselect(message: string, choices: PromptChoice[], options?: { min?: number }): Promise<string[]> {
      const rl = createRl();
      try {
        printChoices(message, choices);
        const min = options?.min ?? 0;

        // eslint-disable-next-line no-constant-condition
        while (true) {
          const answer = await askLine(rl, "Enter numbers (e.g. '1,3-5' or 'all'), or nothing for none: ");
          const { indices, ignored } = parseSelection(answer, choices.length);
          for (const part of ignored) {
            console.error(`Ignoring invalid input: ${part}`);
          }
          if (indices.length < min) {
            console.error(`Please select at least ${min} item${min === 1 ? '' : 's'}.`);
            continue;
          }
          return indices.map(n => choices[n - 1].value);
        }
      } finally {
        rl.close();
      }
    },
  };
}
