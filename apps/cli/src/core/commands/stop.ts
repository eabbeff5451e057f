/**
 * Stop Command
 */

import type { z } from 'zod';
import { BaseOptionsSchema } from '../base-options-schema.js';
import { BASE_ALIASES, BASE_ARGS, defineCommand } from '../command-definition.js';
import { createCommandResults, type CommandResult, type CommandResults } from '../command-results.js';
import { LifecycleOrchestrator, type StopResult } from '../lifecycle-orchestrator.js';
import type { StackContext } from '../stack-context.js';

const StopOptionsSchema = BaseOptionsSchema;

type StopOptions = z.output<typeof StopOptionsSchema>;

export function stopResultsToCommandResults(result: StopResult): CommandResult[] {
  const results: CommandResult[] = result.stopped.map(service => ({
    entity: service,
    success: true,
    status: 'stopped',
  }));
  for (const failure of result.failures) {
    results.push({ entity: failure.service, success: false, status: 'failed', error: failure.error });
  }
  if (results.length === 0) {
    results.push({ entity: 'stack', success: true, status: 'stopped', message: 'Nothing was running' });
  }
  return results;
}

async function runStop(options: StopOptions, ctx: StackContext): Promise<CommandResults> {
  const startTime = Date.now();
  const result = await new LifecycleOrchestrator(ctx).stop();
  return createCommandResults('stop', ctx, startTime, stopResultsToCommandResults(result));
}

export const stopCommand = defineCommand({
  name: 'stop',
  description: 'Stop every service of the stack',
  schema: StopOptionsSchema,
  argSpec: {
    args: { ...BASE_ARGS },
    aliases: { ...BASE_ALIASES },
  },
  examples: [
    'modelstack stop',
    'modelstack stop --output json',
  ],
  handler: runStop,
});
