/**
 * Uninstall Command
 *
 * Stops the stack and removes its containers and networks. Volumes,
 * images and the configuration home go only when asked for.
 */

import { z } from 'zod';
import { BaseOptionsSchema, CommonExtensions } from '../base-options-schema.js';
import { BASE_ALIASES, BASE_ARGS, FORCE_ARG, defineCommand } from '../command-definition.js';
import { createCommandResults, type CommandResults } from '../command-results.js';
import { LifecycleOrchestrator } from '../lifecycle-orchestrator.js';
import { ResourceCleanupEngine } from '../resource-cleanup.js';
import type { StackContext } from '../stack-context.js';
import { removalResults } from './cleanup.js';

const UninstallOptionsSchema = BaseOptionsSchema.extend({
  removeVolumes: z.boolean().default(false),
  removeConfig: z.boolean().default(false),
  removeImages: z.boolean().default(false),
  all: z.boolean().default(false),
  force: CommonExtensions.force,
});

type UninstallOptions = z.output<typeof UninstallOptionsSchema>;

async function runUninstall(options: UninstallOptions, ctx: StackContext): Promise<CommandResults> {
  const startTime = Date.now();
  const cleanup = new ResourceCleanupEngine(ctx, new LifecycleOrchestrator(ctx));
  const result = await cleanup.uninstall({
    removeVolumes: options.removeVolumes,
    removeConfig: options.removeConfig,
    removeImages: options.removeImages,
    all: options.all,
    force: options.force,
  });

  const results = removalResults(result.removed, result.failures);
  if (result.configRemoved) {
    results.push({ entity: ctx.paths.homeDir, success: true, status: 'removed', message: 'Stack configuration deleted' });
  }
  if (results.length === 0) {
    results.push({ entity: 'stack', success: true, status: 'clean', message: 'No stack resources found' });
  }

  const warnings = [...result.warnings];
  if (result.volumesDeclined) {
    warnings.push('Volumes were kept; run `modelstack uninstall --remove-volumes --force` to delete them');
  }

  return createCommandResults('uninstall', ctx, startTime, results, { warnings });
}

export const uninstallCommand = defineCommand({
  name: 'uninstall',
  description: 'Remove the stack from this machine',
  schema: UninstallOptionsSchema,
  argSpec: {
    args: {
      ...BASE_ARGS,
      ...FORCE_ARG,
      '--remove-volumes': {
        type: 'boolean',
        description: 'Delete the stack volumes (models and chat data)',
        default: false,
      },
      '--remove-config': {
        type: 'boolean',
        description: 'Delete the configuration home',
        default: false,
      },
      '--remove-images': {
        type: 'boolean',
        description: 'Delete the images used by the stack',
        default: false,
      },
      '--all': {
        type: 'boolean',
        description: 'Same as --remove-volumes --remove-config',
        default: false,
      },
    },
    aliases: {
      ...BASE_ALIASES,
      '-a': '--all',
      '-f': '--force',
    },
  },
  examples: [
    'modelstack uninstall',
    'modelstack uninstall --remove-images',
    'modelstack uninstall --all --force',
  ],
  handler: runUninstall,
});
