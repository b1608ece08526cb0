import type { ExecutionContext } from '../../types/execution-context.js';
import type { OutputPort } from './output.js';
import type { PromptPort } from './prompt.js';
import { consoleOutput } from './console-output.js';
import { nonInteractivePrompt } from './console-prompt.js';

/** Context output, or plain console output for contexts built outside the CLI */
export function resolveOutput(ctx: ExecutionContext): OutputPort {
  return ctx.output ?? consoleOutput;
}

/** Context prompt, or the prompt that refuses to ask */
export function resolvePrompt(ctx: ExecutionContext): PromptPort {
  return ctx.prompt ?? nonInteractivePrompt;
}
