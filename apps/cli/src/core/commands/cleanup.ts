/**
 * Cleanup Command
 *
 * Removes leftovers of the stack (stopped containers, and networks and
 * volumes once nothing runs) without uninstalling it.
 */

import { z } from 'zod';
import { BaseOptionsSchema, CommonExtensions } from '../base-options-schema.js';
import { BASE_ALIASES, BASE_ARGS, FORCE_ARG, defineCommand } from '../command-definition.js';
import { createCommandResults, type CommandResult, type CommandResults } from '../command-results.js';
import { LifecycleOrchestrator } from '../lifecycle-orchestrator.js';
import { ResourceCleanupEngine, type CleanupFailure, type RemovedResources } from '../resource-cleanup.js';
import type { StackContext } from '../stack-context.js';

const CleanupOptionsSchema = BaseOptionsSchema.extend({
  volumes: z.boolean().default(false),
  force: CommonExtensions.force,
});

type CleanupOptions = z.output<typeof CleanupOptionsSchema>;

/**
 * One entry per removed or failed resource, shared with uninstall
 */
export function removalResults(removed: RemovedResources, failures: CleanupFailure[]): CommandResult[] {
  const results: CommandResult[] = [
    ...removed.containers.map(id => ({ entity: `container:${id}`, success: true, status: 'removed' })),
    ...removed.networks.map(name => ({ entity: `network:${name}`, success: true, status: 'removed' })),
    ...removed.images.map(image => ({ entity: `image:${image}`, success: true, status: 'removed' })),
    ...removed.volumes.map(name => ({ entity: `volume:${name}`, success: true, status: 'removed' })),
  ];
  for (const failure of failures) {
    results.push({ entity: failure.resource, success: false, status: 'failed', error: failure.error });
  }
  return results;
}

async function runCleanup(options: CleanupOptions, ctx: StackContext): Promise<CommandResults> {
  const startTime = Date.now();
  const cleanup = new ResourceCleanupEngine(ctx, new LifecycleOrchestrator(ctx));
  const result = await cleanup.cleanup({ removeVolumes: options.volumes, force: options.force });

  const results = removalResults(result.removed, result.failures);
  if (results.length === 0) {
    results.push({ entity: 'stack', success: true, status: 'clean', message: 'Nothing to remove' });
  }
  const warnings = [...result.warnings];
  if (result.volumesDeclined) {
    warnings.push('Volumes were kept');
  }

  return createCommandResults('cleanup', ctx, startTime, results, { warnings });
}

export const cleanupCommand = defineCommand({
  name: 'cleanup',
  description: 'Remove stopped containers and unused stack networks',
  schema: CleanupOptionsSchema,
  argSpec: {
    args: {
      ...BASE_ARGS,
      ...FORCE_ARG,
      '--volumes': {
        type: 'boolean',
        description: 'Also delete the stack volumes (models and chat data)',
        default: false,
      },
    },
    aliases: {
      ...BASE_ALIASES,
      '-f': '--force',
    },
  },
  examples: [
    'modelstack cleanup',
    'modelstack cleanup --volumes --force',
  ],
  handler: runCleanup,
});
