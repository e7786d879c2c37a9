import { createInterface } from 'readline/promises';
import { stdin as input, stdout as output } from 'process';
import { WorkbenchError } from '../types';

export interface Prompter {
  ask(message: string): Promise<string>;
}

/** Raised when the user presses Ctrl+C or closes stdin at a prompt. */
export class PromptAbortedError extends WorkbenchError {
  constructor() {
    super('PROMPT_ABORTED', 'Input closed');
    this.name = 'PromptAbortedError';
  }
}

/**
 * Opens a readline interface for each question and closes it afterwards, so
 * the terminal is back in cooked mode while a streamed child owns it and
 * Ctrl+C reaches that child as a signal.
 */
export function createTerminalPrompter(): Prompter {
  return {
    async ask(message) {
      const rl = createInterface({ input, output });
      const controller = new AbortController();
      const abort = () => controller.abort();
      rl.once('SIGINT', abort);
      rl.once('close', abort);

      try {
        return await rl.question(message, { signal: controller.signal });
      } catch (error) {
        if (controller.signal.aborted) {
          throw new PromptAbortedError();
        }
        throw error;
      } finally {
        rl.removeListener('close', abort);
        rl.close();
      }
    },
  };
}
