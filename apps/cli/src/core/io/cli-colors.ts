/**
 * Shared color utilities for CLI output
 */

import chalk from 'chalk';

/**
 * Get the formatted preamble string with version
 */
export function getPreamble(version: string): string {
  return `${chalk.bold('modelstack')} ${chalk.dim(`v${version}`)} | ${chalk.cyan('model server + web UI + tool proxy')}`;
}

/**
 * Get the preamble separator line
 */
export function getPreambleSeparator(): string {
  return chalk.dim('━'.repeat(56));
}
