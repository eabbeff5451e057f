/**
 * Operator confirmation
 *
 * Orchestrators ask through an injected Confirm function and never read the
 * terminal themselves.
 */

import * as readline from 'readline';

export type Confirm = (question: string) => Promise<boolean>;

/**
 * Prompt on the terminal. Without an interactive terminal every question is
 * answered "no", so destructive steps need --force in scripts.
 */
export function createPromptConfirm(
  input: NodeJS.ReadableStream & { isTTY?: boolean } = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Confirm {
  return async (question) => {
    if (!input.isTTY) {
      return false;
    }

    const rl = readline.createInterface({ input, output });
    try {
      const answer = await new Promise<string>(resolve => {
        rl.question(`${question} [y/N] `, resolve);
      });
      return /^y(es)?$/i.test(answer.trim());
    } finally {
      rl.close();
    }
  };
}

/**
 * Fixed answer, for scripted use and tests
 */
export function createStaticConfirm(answer: boolean): Confirm {
  return async () => answer;
}
