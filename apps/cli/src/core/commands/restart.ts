/**
 * Restart Command
 *
 * Stop followed by start. Services the stop could not find are reported
 * as failures alongside the start results.
 */

import { z } from 'zod';
import { BaseOptionsSchema } from '../base-options-schema.js';
import { BASE_ALIASES, BASE_ARGS, defineCommand } from '../command-definition.js';
import { createCommandResults, type CommandResult, type CommandResults } from '../command-results.js';
import { LifecycleOrchestrator } from '../lifecycle-orchestrator.js';
import type { StackContext } from '../stack-context.js';
import { startResultsToCommandResults } from './start.js';
import { stopResultsToCommandResults } from './stop.js';

const RestartOptionsSchema = BaseOptionsSchema.extend({
  update: z.boolean().default(false),
});

type RestartOptions = z.output<typeof RestartOptionsSchema>;

async function runRestart(options: RestartOptions, ctx: StackContext): Promise<CommandResults> {
  const startTime = Date.now();
  const result = await new LifecycleOrchestrator(ctx).restart({ update: options.update });

  const results: CommandResult[] = [
    ...stopResultsToCommandResults(result.stop).filter(entry => !entry.success),
    ...startResultsToCommandResults(result.start),
  ];

  return createCommandResults('restart', ctx, startTime, results);
}

export const restartCommand = defineCommand({
  name: 'restart',
  description: 'Stop and start the stack',
  schema: RestartOptionsSchema,
  argSpec: {
    args: {
      ...BASE_ARGS,
      '--update': {
        type: 'boolean',
        description: 'Pull newer images before starting again',
        default: false,
      },
    },
    aliases: {
      ...BASE_ALIASES,
      '-u': '--update',
    },
  },
  examples: [
    'modelstack restart',
    'modelstack restart --update',
  ],
  handler: runRestart,
});
