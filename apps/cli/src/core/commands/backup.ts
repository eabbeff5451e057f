/**
 * Backup Command
 *
 * Writes a backup bundle into a new directory, by default
 * `<backupDirectory>/backup-<timestamp>` under the stack home.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { BaseOptionsSchema } from '../base-options-schema.js';
import { BackupOrchestrator, defaultBackupName, type BackupResult } from '../backup-orchestrator.js';
import { BASE_ALIASES, BASE_ARGS, defineCommand } from '../command-definition.js';
import { createCommandResults, type CommandResult, type CommandResults } from '../command-results.js';
import { printInfo } from '../io/cli-logger.js';
import { LifecycleOrchestrator } from '../lifecycle-orchestrator.js';
import type { StackContext } from '../stack-context.js';

const BackupOptionsSchema = BaseOptionsSchema.extend({
  dir: z.string().min(1).optional(),
  outputDir: z.string().min(1).optional(),
  volumes: z.boolean().default(true),
  config: z.boolean().default(true),
  extensions: z.boolean().default(true),
  compress: z.boolean().default(true),
  exclude: z.array(z.string().min(1)).default([]),
  description: z.string().optional(),
});

type BackupOptions = z.output<typeof BackupOptionsSchema>;

async function isNonEmptyDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.readdir(dir)).length > 0;
  } catch {
    return false;
  }
}

export function backupResultToCommandResults(result: BackupResult): CommandResult[] {
  const results: CommandResult[] = [{
    entity: path.basename(result.backupDir),
    success: result.success,
    status: result.success ? 'created' : 'incomplete',
    message: result.backupDir,
    error: result.success ? undefined : `${result.failures.length} step(s) failed`,
    metadata: result.manifest
      ? {
          backupId: result.manifest.backup_id,
          volumes: result.manifest.volumes,
          configFiles: result.manifest.config_files,
          extensions: result.manifest.extensions,
          sizeBytes: result.manifest.size_bytes,
          checksum: result.manifest.checksum,
        }
      : undefined,
  }];

  for (const failure of result.failures) {
    results.push({
      entity: failure.target ? `${failure.step}:${failure.target}` : failure.step,
      success: false,
      status: 'failed',
      error: failure.error,
    });
  }
  return results;
}

async function runBackup(options: BackupOptions, ctx: StackContext): Promise<CommandResults> {
  const startTime = Date.now();
  const target = options.outputDir ?? options.dir ?? path.join(ctx.backupRoot(), defaultBackupName());
  const dir = path.resolve(target);

  if (await isNonEmptyDirectory(dir)) {
    const proceed = await ctx.confirm(`${dir} is not empty. Write the backup into it anyway?`);
    if (!proceed) {
      const declined: CommandResult = { entity: path.basename(dir), success: true, status: 'declined', message: dir };
      return createCommandResults('backup', ctx, startTime, [declined], { outcome: 'declined' });
    }
  }

  printInfo(`Writing backup to ${dir}`);
  const orchestrator = new BackupOrchestrator(ctx, new LifecycleOrchestrator(ctx));
  const result = await orchestrator.createBackup(dir, {
    includeVolumes: options.volumes,
    includeConfig: options.config,
    includeExtensions: options.extensions,
    compression: options.compress,
    excludePatterns: options.exclude,
  }, { description: options.description });

  return createCommandResults('backup', ctx, startTime, backupResultToCommandResults(result), {
    warnings: result.warnings,
  });
}

export const backupCommand = defineCommand({
  name: 'backup',
  description: 'Back up volumes, configuration and extensions',
  schema: BackupOptionsSchema,
  argSpec: {
    args: {
      ...BASE_ARGS,
      '--output-dir': {
        type: 'string',
        description: 'Directory to write the backup into',
      },
      '--no-volumes': {
        type: 'boolean',
        description: 'Leave volume data out of the backup',
      },
      '--no-config': {
        type: 'boolean',
        description: 'Leave configuration files out of the backup',
      },
      '--no-extensions': {
        type: 'boolean',
        description: 'Leave extensions out of the backup',
      },
      '--no-compress': {
        type: 'boolean',
        description: 'Write plain tar archives instead of gzip',
      },
      '--exclude': {
        type: 'array',
        description: 'Glob of configuration files to leave out (repeatable)',
      },
      '--description': {
        type: 'string',
        description: 'Free-form note stored in the manifest',
      },
    },
    aliases: {
      ...BASE_ALIASES,
      '-d': '--output-dir',
    },
    positional: ['dir'],
  },
  examples: [
    'modelstack backup',
    'modelstack backup ./backups/before-upgrade --description "before upgrade"',
    'modelstack backup --no-volumes --exclude "*.yaml"',
  ],
  handler: runBackup,
});
