import { createInterface } from 'readline';
import type { Readable, Writable } from 'stream';

/** y/yes and n/no (any case); a blank answer is no. Anything else is undefined. */
export function parseYesNo(answer: string): boolean | undefined {
  const value = answer.trim().toLowerCase();
  if (value === 'y' || value === 'yes') return true;
  if (value === 'n' || value === 'no' || value === '') return false;
  return undefined;
}

export interface Prompter {
  /** Free-text question; a blank answer returns the fallback. */
  ask(question: string, fallback?: string): Promise<string>;
  /** Repeats the question until the answer is yes or no. */
  confirm(question: string): Promise<boolean>;
  close(): void;
}

/**
 * Line prompts on the given streams. Defaults to stdin and stderr so stdout
 * only ever carries the text summary. Once input ends, every question gets a
 * blank answer: `ask` returns its fallback and `confirm` returns false.
 */
export function createPrompter(
  input: Readable = process.stdin,
  output: Writable = process.stderr,
): Prompter {
  const rl = createInterface({ input, output });
  const pending = new Set<(answer: string) => void>();
  let closed = false;

  // End of input answers every open question with a blank line
  rl.once('close', () => {
    closed = true;
    for (const settle of pending) settle('');
    pending.clear();
  });

  const question = (text: string) =>
    new Promise<string>((resolve) => {
      if (closed) {
        resolve('');
        return;
      }
      pending.add(resolve);
      rl.question(text, (answer) => {
        pending.delete(resolve);
        resolve(answer);
      });
    });

  return {
    async ask(text, fallback = '') {
      const hint = fallback ? ` [${fallback}]` : '';
      const answer = (await question(`${text}${hint}: `)).trim();
      return answer || fallback;
    },
    async confirm(text) {
      for (;;) {
        const answer = parseYesNo(await question(`${text} (y/n): `));
        if (answer !== undefined) return answer;
        output.write('Please answer y or n.\n');
      }
    },
    close() {
      rl.close();
    },
  };
}
