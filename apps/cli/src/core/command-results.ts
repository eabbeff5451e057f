/**
 * Command Results Type System - Aggregated results for command execution
 *
 * Every command returns one CommandResults: one entry per entity it acted on
 * (a service, a volume, a backup bundle) plus a summary the output
 * formatter and the exit code are derived from.
 */

import * as os from 'os';
import { getVersion } from '../lib/version.js';
import type { StackContext } from './stack-context.js';

export interface CommandResult {
  entity: string;
  success: boolean;
  status?: string;
  message?: string;
  error?: string;
  metadata?: Record<string, unknown>;
}

/**
 * declined: the operator answered "no" to a confirmation
 * cancelled: a streaming command was interrupted
 */
export type CommandOutcome = 'completed' | 'declined' | 'cancelled';

export interface CommandResults {
  command: string;
  platform: string;
  timestamp: Date;
  duration: number;
  outcome: CommandOutcome;
  results: CommandResult[];
  warnings: string[];
  summary: {
    total: number;
    succeeded: number;
    failed: number;
    warnings: number;
  };
  executionContext: {
    user: string;
    workingDirectory: string;
    cliVersion: string;
    projectName: string;
  };
}

export interface CreateResultsOptions {
  outcome?: CommandOutcome;
  warnings?: string[];
}

export function createCommandResults(
  command: string,
  ctx: StackContext,
  startTime: number,
  results: CommandResult[],
  options: CreateResultsOptions = {}
): CommandResults {
  const warnings = options.warnings ?? [];
  const succeeded = results.filter(result => result.success).length;

  return {
    command,
    platform: ctx.platform,
    timestamp: new Date(),
    duration: Date.now() - startTime,
    outcome: options.outcome ?? 'completed',
    results,
    warnings,
    summary: {
      total: results.length,
      succeeded,
      failed: results.length - succeeded,
      warnings: warnings.length,
    },
    executionContext: {
      user: os.userInfo().username,
      workingDirectory: process.cwd(),
      cliVersion: getVersion(),
      projectName: ctx.projectName,
    },
  };
}

/**
 * 0 for success and declined confirmations, 130 for an interrupted stream,
 * 1 when anything failed
 */
export function exitCodeFor(results: CommandResults): number {
  if (results.outcome === 'cancelled') return 130;
  return results.summary.failed > 0 ? 1 : 0;
}
