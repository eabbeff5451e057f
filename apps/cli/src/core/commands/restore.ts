/**
 * Restore Command
 */

import * as path from 'path';
import { z } from 'zod';
import { BaseOptionsSchema, CommonExtensions } from '../base-options-schema.js';
import { BASE_ALIASES, BASE_ARGS, FORCE_ARG, defineCommand } from '../command-definition.js';
import { createCommandResults, type CommandOutcome, type CommandResult, type CommandResults } from '../command-results.js';
import { LifecycleOrchestrator } from '../lifecycle-orchestrator.js';
import { RestoreOrchestrator, type RestoreResult } from '../restore-orchestrator.js';
import type { StackContext } from '../stack-context.js';

const RestoreOptionsSchema = BaseOptionsSchema.extend({
  path: z.string({ required_error: 'A backup directory is required' }).min(1),
  validateOnly: z.boolean().default(false),
  volumes: z.boolean().default(true),
  force: CommonExtensions.force,
});

type RestoreOptions = z.output<typeof RestoreOptionsSchema>;

export function restoreResultToCommandResults(result: RestoreResult, backupDir: string): CommandResult[] {
  const bundle: CommandResult = {
    entity: path.basename(backupDir),
    success: result.success,
    status: result.status,
    message: `backup ${result.manifest.backup_id} from ${result.manifest.created_at}`,
    metadata: {
      volumes: result.restoredVolumes,
      configFiles: result.restoredConfigFiles,
      extensions: result.restoredExtensions,
    },
  };
  if (result.status === 'invalid') {
    bundle.error = `Backup is incomplete: ${result.missing.join(', ')}`;
  } else if (result.status === 'declined') {
    bundle.success = true;
    bundle.message = 'Restore cancelled; nothing was changed';
  }

  const results = [bundle];
  for (const failure of result.failures) {
    results.push({ entity: failure.target, success: false, status: 'failed', error: failure.error });
  }
  return results;
}

async function runRestore(options: RestoreOptions, ctx: StackContext): Promise<CommandResults> {
  const startTime = Date.now();
  const orchestrator = new RestoreOrchestrator(ctx, new LifecycleOrchestrator(ctx));
  const result = await orchestrator.restore(options.path, {
    validateOnly: options.validateOnly,
    force: options.force,
    includeVolumes: options.volumes,
  });

  const outcome: CommandOutcome = result.status === 'declined' ? 'declined' : 'completed';
  return createCommandResults('restore', ctx, startTime, restoreResultToCommandResults(result, options.path), {
    outcome,
    warnings: result.warnings,
  });
}

export const restoreCommand = defineCommand({
  name: 'restore',
  description: 'Restore volumes, configuration and extensions from a backup',
  schema: RestoreOptionsSchema,
  argSpec: {
    args: {
      ...BASE_ARGS,
      ...FORCE_ARG,
      '--validate-only': {
        type: 'boolean',
        description: 'Check the backup without restoring anything',
        default: false,
      },
      '--no-volumes': {
        type: 'boolean',
        description: 'Restore configuration and extensions only',
      },
    },
    aliases: {
      ...BASE_ALIASES,
      '-f': '--force',
    },
    positional: ['path'],
  },
  examples: [
    'modelstack restore ~/.modelstack/backups/backup-20261019-143005',
    'modelstack restore ./backup --validate-only',
    'modelstack restore ./backup --force --no-volumes',
  ],
  handler: runRestore,
});
