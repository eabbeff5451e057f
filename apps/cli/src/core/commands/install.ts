/**
 * Install Command
 */

import type { z } from 'zod';
import { BaseOptionsSchema, CommonExtensions } from '../base-options-schema.js';
import { BASE_ALIASES, BASE_ARGS, FORCE_ARG, defineCommand } from '../command-definition.js';
import { createCommandResults, type CommandResult, type CommandResults } from '../command-results.js';
import type { EnvironmentCheck } from '../environment-checks.js';
import { installStack } from '../installer.js';
import { printSuccess, printWarning } from '../io/cli-logger.js';
import { LifecycleOrchestrator } from '../lifecycle-orchestrator.js';
import type { StackContext } from '../stack-context.js';

const InstallOptionsSchema = BaseOptionsSchema.extend({
  force: CommonExtensions.force,
});

type InstallOptions = z.output<typeof InstallOptionsSchema>;

export function checkToResult(check: EnvironmentCheck): CommandResult {
  return {
    entity: check.name,
    success: check.passed,
    status: check.passed ? 'ok' : 'failed',
    message: check.details,
    error: check.passed ? undefined : check.suggestion ?? check.details,
  };
}

async function runInstall(options: InstallOptions, ctx: StackContext): Promise<CommandResults> {
  const startTime = Date.now();
  const result = await installStack(ctx, new LifecycleOrchestrator(ctx), { force: options.force });

  if (result.status === 'declined') {
    const declined: CommandResult = {
      entity: result.configFile,
      success: true,
      status: 'declined',
      message: 'Existing installation kept',
    };
    return createCommandResults('install', ctx, startTime, [declined], { outcome: 'declined' });
  }

  printSuccess(`Installed into ${ctx.paths.homeDir}`);
  if (!result.checks.passed) {
    printWarning('Some environment checks failed; `modelstack check --fix` repairs what it can');
  }

  const results: CommandResult[] = result.written.map(file => ({ entity: file, success: true, status: 'written' }));
  results.push(...result.checks.checks.map(checkToResult));

  return createCommandResults('install', ctx, startTime, results);
}

export const installCommand = defineCommand({
  name: 'install',
  description: 'Write configuration and compose files, then check the host',
  schema: InstallOptionsSchema,
  argSpec: {
    args: {
      ...BASE_ARGS,
      ...FORCE_ARG,
    },
    aliases: {
      ...BASE_ALIASES,
      '-f': '--force',
    },
  },
  examples: [
    'modelstack install',
    'MODELSTACK_HOME=/srv/modelstack modelstack install --force',
  ],
  handler: runInstall,
});
