/**
 * Prompt Port Interface
 *
 * Defines the contract for all interactive user prompts.
 * Workflows receive their selections through this interface instead of
 * talking to @clack/prompts or readline directly.
 *
 * Implementations:
 *   - ClackPromptAdapter (CLI, TTY): routes to @clack/prompts
 *   - PlainPromptAdapter (CLI, --plain): numbered lists over readline
 *   - nonInteractivePrompt (CI/default): throws on prompt attempts
 */

/**
 * A single choice option for select/multiselect prompts.
 * Values are bundle ids.
 */
export interface PromptChoice {
  title: string;
  value: string;
  description?: string;
}

/**
 * PromptPort defines all interactive prompt operations.
 */
export interface PromptPort {
  /** Prompt for a yes/no confirmation */
  confirm(message: string, initial?: boolean): Promise<boolean>;

  /** Prompt user to select one item from a list */
  select(message: string, choices: PromptChoice[]): Promise<string>;

  /** Prompt user to select any number of items from a list (possibly none) */
  multiselect(message: string, choices: PromptChoice[], options?: { min?: number }): Promise<string[]>;
}
