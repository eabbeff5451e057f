/**
 * Backup Orchestrator
 *
 * Writes a self-describing bundle (see backup-manifest.ts) in ordered steps:
 * volumes, configuration, extensions, state snapshot, digest, manifest,
 * verification. A failing step is recorded and the remaining steps still
 * run, so an operator gets as much of the backup as was possible.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { glob } from 'glob';
import { nanoid } from 'nanoid';
import {
  COMPOSE_PROJECT_LABEL,
  CONFIG_FILE_NAME,
  ENV_FILE_NAME,
  STACK_VERSION,
  StackValidationError,
  type Logger,
} from '@modelstack/core';
import { getVersion } from '../lib/version.js';
import {
  CONFIG_DIR,
  EXTENSIONS_DIR,
  STATE_FILE,
  VOLUMES_DIR,
  computeBundleDigest,
  readManifest,
  validateBundle,
  volumeArchiveName,
  writeManifest,
  type BackupManifest,
} from './backup-manifest.js';
import type { LifecycleOrchestrator } from './lifecycle-orchestrator.js';
import type { StackContext } from './stack-context.js';

export interface BackupConfig {
  includeVolumes: boolean;
  includeConfig: boolean;
  includeExtensions: boolean;
  compression: boolean;
  /** Glob patterns, relative to the stack home, of files left out of the config snapshot */
  excludePatterns: string[];
}

export const DEFAULT_BACKUP_CONFIG: BackupConfig = {
  includeVolumes: true,
  includeConfig: true,
  includeExtensions: true,
  compression: true,
  excludePatterns: [],
};

/** Files of the stack home that make up the configuration snapshot */
const CONFIG_SNAPSHOT_PATTERNS = [CONFIG_FILE_NAME, ENV_FILE_NAME, '*.yml', '*.yaml'];

export type BackupStep = 'volumes' | 'config' | 'extensions' | 'state' | 'manifest' | 'verify';

export interface BackupFailure {
  step: BackupStep;
  target?: string;
  error: string;
}

export interface BackupResult {
  success: boolean;
  backupDir: string;
  manifest?: BackupManifest;
  failures: BackupFailure[];
  warnings: string[];
}

function message(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Directory name for a backup taken at the given time, e.g.
 * backup-20261019-143005
 */
export function defaultBackupName(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, '').replace('T', '-').slice(0, 15);
  return `backup-${stamp}`;
}

export class BackupOrchestrator {
  private readonly logger: Logger;

  constructor(
    private readonly ctx: StackContext,
    private readonly lifecycle: LifecycleOrchestrator
  ) {
    this.logger = ctx.logger.child({ component: 'backup' });
  }

  async createBackup(
    backupDir: string,
    config: BackupConfig = DEFAULT_BACKUP_CONFIG,
    options: { description?: string } = {}
  ): Promise<BackupResult> {
    if (!config.includeVolumes && !config.includeConfig && !config.includeExtensions) {
      throw new StackValidationError(
        'Nothing selected to back up',
        'Include at least one of volumes, configuration or extensions'
      );
    }

    const dir = path.resolve(backupDir);
    await fs.mkdir(dir, { recursive: true });

    const failures: BackupFailure[] = [];
    const warnings: string[] = [];

    const volumes = config.includeVolumes ? await this.backupVolumes(dir, config.compression, failures) : [];
    const configFiles = config.includeConfig ? await this.backupConfig(dir, config.excludePatterns, failures) : [];
    const extensions = config.includeExtensions ? await this.backupExtensions(dir, failures) : [];

    try {
      await this.writeStateSnapshot(dir);
    } catch (error) {
      warnings.push(`Stack state was not captured: ${message(error)}`);
    }

    let manifest: BackupManifest | undefined;
    try {
      const { sizeBytes, checksum } = await computeBundleDigest(dir);
      manifest = {
        backup_id: `${path.basename(dir)}-${nanoid(8)}`,
        created_at: new Date().toISOString(),
        stack_version: STACK_VERSION,
        cli_version: getVersion(),
        platform: this.ctx.platform,
        backup_config: {
          include_volumes: config.includeVolumes,
          include_config: config.includeConfig,
          include_extensions: config.includeExtensions,
          compression: config.compression,
          encryption: false,
          exclude_patterns: config.excludePatterns,
        },
        volumes,
        config_files: configFiles,
        extensions,
        checksum,
        size_bytes: sizeBytes,
        description: options.description,
      };
      await writeManifest(dir, manifest);
    } catch (error) {
      failures.push({ step: 'manifest', error: message(error) });
      return { success: false, backupDir: dir, manifest, failures, warnings };
    }

    try {
      const written = await readManifest(dir);
      const validation = await validateBundle(dir, written);
      if (!validation.valid) {
        failures.push({ step: 'verify', error: `Bundle is incomplete: ${validation.missing.join(', ')}` });
      }
    } catch (error) {
      failures.push({ step: 'verify', error: message(error) });
    }

    this.logger.info('Backup written', { dir, volumes: volumes.length, failures: failures.length });
    return { success: failures.length === 0, backupDir: dir, manifest, failures, warnings };
  }

  private async backupVolumes(dir: string, compress: boolean, failures: BackupFailure[]): Promise<string[]> {
    let names: string[];
    try {
      const volumes = await this.ctx.engine.listVolumes({ key: COMPOSE_PROJECT_LABEL, value: this.ctx.projectName });
      names = volumes.map(volume => volume.name).sort();
    } catch (error) {
      failures.push({ step: 'volumes', error: message(error) });
      return [];
    }

    const volumesDir = path.join(dir, VOLUMES_DIR);
    await fs.mkdir(volumesDir, { recursive: true });

    const archived: string[] = [];
    for (const name of names) {
      try {
        await this.ctx.engine.archiveVolume(name, path.join(volumesDir, volumeArchiveName(name, compress)), { compress });
        archived.push(name);
      } catch (error) {
        failures.push({ step: 'volumes', target: name, error: message(error) });
      }
    }
    return archived;
  }

  private async backupConfig(dir: string, excludePatterns: string[], failures: BackupFailure[]): Promise<string[]> {
    try {
      const files = (await glob(CONFIG_SNAPSHOT_PATTERNS, {
        cwd: this.ctx.paths.homeDir,
        nodir: true,
        dot: true,
        posix: true,
        ignore: excludePatterns,
      })).sort();

      const configDir = path.join(dir, CONFIG_DIR);
      await fs.mkdir(configDir, { recursive: true });
      for (const file of files) {
        await fs.copyFile(path.join(this.ctx.paths.homeDir, file), path.join(configDir, file));
      }
      return files;
    } catch (error) {
      failures.push({ step: 'config', error: message(error) });
      return [];
    }
  }

  /**
   * Records every enabled extension and copies the directories of those
   * installed locally
   */
  private async backupExtensions(dir: string, failures: BackupFailure[]): Promise<string[]> {
    const recorded: string[] = [];
    for (const name of this.ctx.config.extensions.enabled) {
      const source = path.join(this.ctx.paths.extensionsDir, name);
      try {
        const stat = await fs.stat(source).catch(() => undefined);
        if (stat?.isDirectory()) {
          await fs.cp(source, path.join(dir, EXTENSIONS_DIR, name), { recursive: true });
        } else {
          this.logger.debug('Extension has no local directory', { extension: name });
        }
        recorded.push(name);
      } catch (error) {
        failures.push({ step: 'extensions', target: name, error: message(error) });
      }
    }
    return recorded;
  }

  private async writeStateSnapshot(dir: string): Promise<void> {
    const state = {
      captured_at: new Date().toISOString(),
      platform: this.ctx.platform,
      project_name: this.ctx.projectName,
      state: await this.lifecycle.getStackState(),
      services: this.ctx.registry.all().map(service => ({ name: service.name, kind: service.kind })),
    };
    await fs.writeFile(path.join(dir, STATE_FILE), JSON.stringify(state, null, 2) + '\n', 'utf-8');
  }
}
