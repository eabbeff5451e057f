/**
 * Update Command
 *
 * Pulls newer images for the core services and the enabled extensions. A
 * running stack is only restarted with --force or after confirmation.
 */

import { z } from 'zod';
import { BaseOptionsSchema, CommonExtensions } from '../base-options-schema.js';
import { BASE_ALIASES, BASE_ARGS, FORCE_ARG, defineCommand } from '../command-definition.js';
import { createCommandResults, type CommandResult, type CommandResults } from '../command-results.js';
import { LifecycleOrchestrator } from '../lifecycle-orchestrator.js';
import type { StackContext } from '../stack-context.js';
import { updateResultsToCommandResults } from './start.js';

const UpdateOptionsSchema = BaseOptionsSchema.extend({
  services: z.boolean().default(false),
  extensions: z.boolean().default(false),
  force: CommonExtensions.force,
});

type UpdateOptions = z.output<typeof UpdateOptionsSchema>;

async function runUpdate(options: UpdateOptions, ctx: StackContext): Promise<CommandResults> {
  const startTime = Date.now();
  const lifecycle = new LifecycleOrchestrator(ctx);
  const request = {
    servicesOnly: options.services,
    extensionsOnly: options.extensions,
  };

  let result = await lifecycle.update({ ...request, forceRestart: options.force });
  if (result.status === 'restart-required') {
    const proceed = await ctx.confirm('The stack is running and must be restarted to update. Restart it now?');
    if (!proceed) {
      const declined: CommandResult = {
        entity: 'stack',
        success: true,
        status: 'declined',
        message: 'Update skipped; run `modelstack update --force` to restart and update',
      };
      return createCommandResults('update', ctx, startTime, [declined], { outcome: 'declined' });
    }
    result = await lifecycle.update({ ...request, forceRestart: true });
  }

  const results = updateResultsToCommandResults(result);
  const warnings: string[] = [];
  if (result.status === 'completed') {
    for (const failure of result.failures) {
      if (failure.service === 'core') continue;
      results.push({ entity: failure.service, success: false, status: 'failed', error: failure.error });
    }
    if (result.restarted) {
      warnings.push('The stack was restarted to apply the update');
    }
  }

  return createCommandResults('update', ctx, startTime, results, { warnings });
}

export const updateCommand = defineCommand({
  name: 'update',
  description: 'Pull newer images for services and extensions',
  schema: UpdateOptionsSchema,
  argSpec: {
    args: {
      ...BASE_ARGS,
      ...FORCE_ARG,
      '--services': {
        type: 'boolean',
        description: 'Update only the core services',
        default: false,
      },
      '--extensions': {
        type: 'boolean',
        description: 'Update only the enabled extensions',
        default: false,
      },
    },
    aliases: {
      ...BASE_ALIASES,
      '-f': '--force',
    },
  },
  examples: [
    'modelstack update',
    'modelstack update --services',
    'modelstack update --extensions --force',
  ],
  handler: runUpdate,
});
