/**
 * Terminal prompts
 *
 * All interactive input goes through the Prompter interface so commands can
 * be driven by a scripted prompter in tests.
 */

import { createInterface } from 'node:readline';
import { Writable } from 'node:stream';

/**
 * Raised when the operator interrupts a prompt (Ctrl+C or end of input)
 */
export class PromptCancelledError extends Error {
  constructor() {
    super('Operation cancelled by user');
    this.name = 'PromptCancelledError';
  }
}

export interface Prompter {
  /** Ask for a value; an empty answer yields `defaultValue` (or '') */
  ask(message: string, defaultValue?: string): Promise<string>;
  /** Ask for a value without echoing it */
  askSecret(message: string): Promise<string>;
  confirm(message: string, defaultValue?: boolean): Promise<boolean>;
  /** Show numbered choices and return the chosen value */
  choose<T extends string>(message: string, choices: ReadonlyArray<{ value: T; label: string }>): Promise<T>;
}

/**
 * Read one line. Output written after the question is suppressed when
 * `hidden` is set.
 */
function question(message: string, hidden: boolean): Promise<string> {
  let muted = false;
  const output = new Writable({
    write(chunk, encoding, callback) {
      if (!muted) {
        process.stdout.write(chunk, encoding);
      }
      callback();
    },
  });

  const rl = createInterface({
    input: process.stdin,
    output,
    terminal: process.stdin.isTTY === true,
  });

  return new Promise((resolve, reject) => {
    let answered = false;

    rl.on('SIGINT', () => {
      rl.close();
    });
    rl.on('close', () => {
      if (!answered) {
        process.stdout.write('\n');
        reject(new PromptCancelledError());
      }
    });

    rl.question(message, (answer) => {
      answered = true;
      rl.close();
      if (hidden) {
        process.stdout.write('\n');
      }
      resolve(answer);
    });
    muted = hidden;
  });
}

/**
 * Prompter backed by stdin/stdout
 */
export function createTerminalPrompter(): Prompter {
  return {
    async ask(message, defaultValue) {
      const hint = defaultValue ? ` [${defaultValue}]` : '';
      const answer = (await question(`${message}${hint}: `, false)).trim();
      return answer === '' ? (defaultValue ?? '') : answer;
    },

    async askSecret(message) {
      return question(`${message}: `, true);
    },

    async confirm(message, defaultValue = true) {
      const hint = defaultValue ? '[Y/n]' : '[y/N]';
      const answer = (await question(`${message} ${hint} `, false)).trim().toLowerCase();
      if (answer === 'y' || answer === 'yes') return true;
      if (answer === 'n' || answer === 'no') return false;
      return defaultValue;
    },

    async choose(message, choices) {
      process.stdout.write(`\n${message}\n`);
      choices.forEach((choice, index) => {
        process.stdout.write(`  ${index + 1}. ${choice.label}\n`);
      });
      for (;;) {
        const answer = (await question(`Select an option (1-${choices.length}): `, false)).trim();
        const picked = choices[Number.parseInt(answer, 10) - 1];
        if (picked && String(Number.parseInt(answer, 10)) === answer) {
          return picked.value;
        }
        process.stdout.write(`Invalid choice. Please enter a number between 1 and ${choices.length}.\n`);
      }
    },
  };
}
