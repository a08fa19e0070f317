/**
 * Interactive Prompts
 *
 * Lightweight prompts using native readline.
 */

import * as readline from 'node:readline';
import chalk from 'chalk';

/**
 * Create readline interface
 */
function createInterface(): readline.Interface {
  return readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
}

/**
 * Ask a simple question
 */
export async function ask(question: string): Promise<string> {
  const rl = createInterface();
  return new Promise((resolve) => {
    rl.question(chalk.cyan(question), (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

/**
 * Ask until a non-empty answer is given
 */
export async function askRequired(question: string): Promise<string> {
  for (;;) {
    const answer = await ask(question);
    if (answer) return answer;
    console.log(chalk.yellow('  A value is required.'));
  }
}

/**
 * Ask for confirmation (yes/no)
 */
export async function confirm(message: string, defaultValue = false): Promise<boolean> {
  const hint = defaultValue ? '(Y/n)' : '(y/N)';
  const answer = await ask(`${message} ${chalk.dim(hint)} `);

  if (answer === '') {
    return defaultValue;
  }

  return answer.toLowerCase() === 'y' || answer.toLowerCase() === 'yes';
}
