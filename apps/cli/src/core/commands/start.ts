/**
 * Start Command
 *
 * Brings up every managed service. A stack that is already running is left
 * alone.
 */

import { z } from 'zod';
import { BaseOptionsSchema } from '../base-options-schema.js';
import { BASE_ALIASES, BASE_ARGS, defineCommand } from '../command-definition.js';
import { createCommandResults, type CommandResult, type CommandResults } from '../command-results.js';
import { printInfo } from '../io/cli-logger.js';
import { LifecycleOrchestrator, type StartResult, type UpdateResult } from '../lifecycle-orchestrator.js';
import type { StackContext } from '../stack-context.js';

const StartOptionsSchema = BaseOptionsSchema.extend({
  update: z.boolean().default(false),
  wait: z.boolean().default(false),
  timeout: z.number().int().positive().default(120),
});

type StartOptions = z.output<typeof StartOptionsSchema>;

/**
 * One entry per service touched by a start, shared with restart
 */
export function startResultsToCommandResults(result: StartResult): CommandResult[] {
  if (result.alreadyRunning) {
    return [{ entity: 'stack', success: true, status: 'running', message: 'Stack is already running' }];
  }

  const results: CommandResult[] = [];
  if (result.update) {
    results.push(...updateResultsToCommandResults(result.update));
  }
  for (const service of result.started) {
    if (result.unhealthy.includes(service)) {
      results.push({ entity: service, success: false, status: 'unhealthy', error: 'Did not become healthy in time' });
    } else {
      results.push({ entity: service, success: true, status: 'started' });
    }
  }
  for (const failure of result.failures) {
    if (failure.service === 'core' && result.update) continue;
    results.push({ entity: failure.service, success: false, status: 'failed', error: failure.error });
  }
  return results;
}

/**
 * Entries for the image and extension pulls of an update
 */
export function updateResultsToCommandResults(update: UpdateResult): CommandResult[] {
  if (update.status === 'restart-required') {
    return [{
      entity: 'stack',
      success: false,
      status: 'restart-required',
      error: 'The stack is running; it must be stopped to update',
    }];
  }

  const results: CommandResult[] = [];
  const coreFailure = update.failures.find(failure => failure.service === 'core');
  if (update.coreUpdated) {
    results.push({ entity: 'core', success: true, status: 'updated', message: 'Pulled service images' });
  } else if (coreFailure) {
    results.push({ entity: 'core', success: false, status: 'failed', error: coreFailure.error });
  }
  for (const extension of update.extensions) {
    results.push(extension.success
      ? { entity: `extension:${extension.name}`, success: true, status: 'updated' }
      : { entity: `extension:${extension.name}`, success: false, status: 'failed', error: extension.error });
  }
  return results;
}

async function runStart(options: StartOptions, ctx: StackContext): Promise<CommandResults> {
  const startTime = Date.now();
  const lifecycle = new LifecycleOrchestrator(ctx);

  if (options.wait) {
    printInfo('Waiting for services to report healthy...');
  }
  const result = await lifecycle.start({
    update: options.update,
    waitForHealth: options.wait,
    healthTimeoutMs: options.timeout * 1000,
  });

  return createCommandResults('start', ctx, startTime, startResultsToCommandResults(result));
}

export const startCommand = defineCommand({
  name: 'start',
  description: 'Start the model server, web UI and tool proxy',
  schema: StartOptionsSchema,
  argSpec: {
    args: {
      ...BASE_ARGS,
      '--update': {
        type: 'boolean',
        description: 'Pull newer images before starting',
        default: false,
      },
      '--wait': {
        type: 'boolean',
        description: 'Wait until every service reports healthy',
        default: false,
      },
      '--timeout': {
        type: 'number',
        description: 'Seconds to wait for health with --wait',
        default: 120,
      },
    },
    aliases: {
      ...BASE_ALIASES,
      '-u': '--update',
      '-w': '--wait',
    },
  },
  examples: [
    'modelstack start',
    'modelstack start --update',
    'modelstack start --wait --timeout 300',
  ],
  handler: runStart,
});
