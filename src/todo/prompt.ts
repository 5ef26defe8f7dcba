import { createInterface } from 'node:readline';
import type { Notifier } from './notify.js';
import type { PrioritizeCollaborator, PromptRequest } from './prioritize.js';
import { parseActionKey } from './prioritize.js';

/**
 * Line-oriented interactive collaborator: one answer line per item.
 *
 * Answers are read through the readline async iterator, which buffers lines that arrive
 * before the prompt. End of input counts as `quit`.
 */
export interface ReadlineCollaborator extends PrioritizeCollaborator {
  close(): void;
}

export function formatPrompt(request: PromptRequest): string {
  const where = request.categoryName ? ` (in ${request.categoryName})` : '';
  return `Line ${request.position + 1}${where}: ${request.line.trimStart()}\n> `;
}

export function createReadlineCollaborator(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
  notify: Notifier
): ReadlineCollaborator {
  const rl = createInterface({ input, terminal: false });
  const answers = rl[Symbol.asyncIterator]();

  return {
    notify,
    async promptForAction(request) {
      output.write(formatPrompt(request));
      const next = await answers.next();
      return next.done ? { kind: 'quit' } : parseActionKey(next.value);
    },
    close() {
      rl.close();
    },
  };
}
