/**
 * Operator-facing output helpers
 *
 * Diagnostics go through the winston logger; these functions print the
 * short status lines an operator reads. Structured output formats switch
 * them off so stdout stays machine-readable.
 */

import chalk from 'chalk';

let globalSuppressOutput = false;

/**
 * Set the global output suppression state
 * @returns The previous suppression state
 */
export function setSuppressOutput(suppress: boolean): boolean {
  const previous = globalSuppressOutput;
  globalSuppressOutput = suppress;
  return previous;
}

export function printError(message: string): void {
  // Errors print even when output is suppressed; they go to stderr
  console.error(chalk.red(`✖ ${message}`));
}

export function printSuccess(message: string): void {
  if (!globalSuppressOutput) {
    console.log(chalk.green(`✔ ${message}`));
  }
}

export function printWarning(message: string): void {
  if (!globalSuppressOutput) {
    console.log(chalk.yellow(`⚠ ${message}`));
  }
}

export function printInfo(message: string): void {
  if (!globalSuppressOutput) {
    console.log(chalk.cyan(`ℹ ${message}`));
  }
}
