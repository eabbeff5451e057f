/**
 * Output Formatter - Multi-format output system for command results
 *
 * `summary` is the human-readable default; `json` and `yaml` serialize the
 * whole CommandResults for scripts.
 */

import chalk from 'chalk';
import yaml from 'js-yaml';
import type { CommandResult, CommandResults } from '../command-results.js';
import type { OUTPUT_FORMATS } from '../base-options-schema.js';

export type OutputFormat = typeof OUTPUT_FORMATS[number];

export interface OutputOptions {
  format: OutputFormat;
  quiet: boolean;
  verbose: boolean;
}

export class OutputFormatter {
  /**
   * Main entry point for formatting command results
   */
  static format(results: CommandResults, options: OutputOptions): string {
    switch (options.format) {
      case 'json':
        return JSON.stringify(this.cleanForSerialization(results), null, options.verbose ? 2 : 0);
      case 'yaml':
        return yaml.dump(this.cleanForSerialization(results), { lineWidth: -1, noRefs: true }).trimEnd();
      case 'summary':
        return this.formatSummary(results, options);
    }
  }

  /**
   * Human-readable summary format (default CLI output)
   */
  private static formatSummary(results: CommandResults, options: OutputOptions): string {
    const lines: string[] = [];

    if (!options.quiet) {
      lines.push(`${chalk.cyan(results.command)} completed in ${chalk.bold(`${results.duration}ms`)}`);
      if (options.verbose) {
        lines.push(chalk.dim(`Platform: ${results.platform}`));
        lines.push(chalk.dim(`Project: ${results.executionContext.projectName}`));
        lines.push(chalk.dim(`Timestamp: ${results.timestamp.toISOString()}`));
      }
      if (results.outcome !== 'completed') {
        lines.push(chalk.yellow(`Outcome: ${results.outcome}`));
      }
    }

    for (const result of results.results) {
      lines.push(...this.formatResult(result, options));
    }

    if (!options.quiet) {
      for (const warning of results.warnings) {
        lines.push(chalk.yellow(`[WARN] ${warning}`));
      }
    }

    if (!options.quiet && results.results.length > 1) {
      const parts = [chalk.green(`${results.summary.succeeded} succeeded`)];
      if (results.summary.failed > 0) {
        parts.push(chalk.red(`${results.summary.failed} failed`));
      }
      if (results.summary.warnings > 0) {
        parts.push(chalk.yellow(`${results.summary.warnings} warnings`));
      }
      parts.push(`${results.summary.total} total`);
      lines.push('');
      lines.push(`${chalk.cyan('Summary:')} ${parts.join(', ')}`);
    }

    return lines.join('\n');
  }

  private static formatResult(result: CommandResult, options: OutputOptions): string[] {
    const status = result.status ?? (result.success ? 'ok' : 'failed');
    const indicator = this.statusIndicator(result.success, status);
    const lines = [`${indicator} ${chalk.bold(result.entity)}: ${status}`];

    if (result.message && !options.quiet) {
      lines.push(chalk.dim(`   ${result.message}`));
    }
    if (options.verbose && result.metadata) {
      for (const [key, value] of Object.entries(result.metadata)) {
        if (value !== undefined && value !== null) {
          lines.push(chalk.dim(`   ${key}: ${this.formatValue(value)}`));
        }
      }
    }
    if (!result.success && result.error) {
      lines.push(chalk.red(`   error: ${result.error}`));
    }
    return lines;
  }

  private static statusIndicator(success: boolean, status: string): string {
    if (!success) return chalk.red('[FAIL]');
    switch (status) {
      case 'running':
      case 'healthy':
      case 'ok':
        return chalk.green('[OK]');
      case 'stopped':
      case 'declined':
        return chalk.yellow('[--]');
      case 'unknown':
        return chalk.dim('[??]');
      case 'unhealthy':
        return chalk.yellow('[WARN]');
      default:
        return chalk.dim('[--]');
    }
  }

  private static formatValue(value: unknown): string {
    if (Array.isArray(value)) return value.map(item => this.formatValue(item)).join(', ');
    if (value instanceof Date) return value.toISOString();
    if (typeof value === 'object' && value !== null) return JSON.stringify(value);
    return String(value);
  }

  /**
   * Dates become ISO strings and undefined fields are dropped, so JSON and
   * YAML render the same document
   */
  static cleanForSerialization(value: unknown): unknown {
    if (value instanceof Date) {
      return value.toISOString();
    }
    if (Array.isArray(value)) {
      return value.map(item => this.cleanForSerialization(item));
    }
    if (typeof value === 'object' && value !== null) {
      const cleaned: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        if (entry !== undefined && typeof entry !== 'function') {
          cleaned[key] = this.cleanForSerialization(entry);
        }
      }
      return cleaned;
    }
    return value;
  }
}

