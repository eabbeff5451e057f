/**
 * Restore Orchestrator
 *
 * Restores a backup bundle in a fixed order: parse and validate the manifest
 * (nothing is touched before both pass), then stop the stack and overwrite
 * configuration only with --force or the operator's consent, then restore
 * configuration, volumes and extensions, and finally confirm the volumes
 * exist again. Manifest entries are plain names; the schema rejects any
 * that would resolve outside the bundle or the stack home.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { COMPOSE_PROJECT_LABEL, StackValidationError, type Logger } from '@modelstack/core';
import {
  CONFIG_DIR,
  EXTENSIONS_DIR,
  findVolumeArchive,
  readManifest,
  validateBundle,
  type BackupManifest,
} from './backup-manifest.js';
import type { LifecycleOrchestrator } from './lifecycle-orchestrator.js';
import type { StackContext } from './stack-context.js';

export interface RestoreOptions {
  validateOnly?: boolean;
  /** Stop a running stack and overwrite configuration without asking */
  force?: boolean;
  /** Restore volume archives (default true) */
  includeVolumes?: boolean;
}

export type RestoreStatus = 'validated' | 'invalid' | 'declined' | 'restored';

export interface RestoreResult {
  status: RestoreStatus;
  success: boolean;
  manifest: BackupManifest;
  missing: string[];
  restoredVolumes: string[];
  restoredConfigFiles: string[];
  restoredExtensions: string[];
  failures: { target: string; error: string }[];
  warnings: string[];
}

function message(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

export class RestoreOrchestrator {
  private readonly logger: Logger;

  constructor(
    private readonly ctx: StackContext,
    private readonly lifecycle: LifecycleOrchestrator
  ) {
    this.logger = ctx.logger.child({ component: 'restore' });
  }

  async restore(backupDir: string, options: RestoreOptions = {}): Promise<RestoreResult> {
    const dir = path.resolve(backupDir);
    const stat = await fs.stat(dir).catch(() => undefined);
    if (!stat) {
      throw new StackValidationError(`Backup directory not found: ${dir}`);
    }
    if (!stat.isDirectory()) {
      throw new StackValidationError(`Backup path is not a directory: ${dir}`);
    }

    const manifest = await readManifest(dir);
    const result: RestoreResult = {
      status: 'validated',
      success: true,
      manifest,
      missing: [],
      restoredVolumes: [],
      restoredConfigFiles: [],
      restoredExtensions: [],
      failures: [],
      warnings: [],
    };

    const validation = await validateBundle(dir, manifest);
    if (!validation.valid) {
      return { ...result, status: 'invalid', success: false, missing: validation.missing };
    }
    if (options.validateOnly) {
      return result;
    }

    if (await this.lifecycle.isStackRunning()) {
      const proceed = options.force
        || await this.ctx.confirm('The stack is running and must be stopped before restoring. Stop it now?');
      if (!proceed) {
        return { ...result, status: 'declined', success: false };
      }
      await this.lifecycle.stop();
    }

    const overwrites = await this.existingConfigFiles(manifest);
    if (overwrites.length > 0 && !options.force) {
      const proceed = await this.ctx.confirm(
        `Restoring will overwrite existing configuration (${overwrites.join(', ')}). Continue?`
      );
      if (!proceed) {
        return { ...result, status: 'declined', success: false };
      }
    }

    result.status = 'restored';
    await this.restoreConfig(dir, manifest, result);

    const includeVolumes = options.includeVolumes ?? true;
    if (includeVolumes) {
      await this.restoreVolumes(dir, manifest, result);
    }

    await this.restoreExtensions(dir, manifest, result);

    if (includeVolumes) {
      await this.verifyVolumes(manifest, result);
    }

    result.success = result.failures.length === 0;
    this.logger.info('Restore finished', { dir, failures: result.failures.length });
    return result;
  }

  private async existingConfigFiles(manifest: BackupManifest): Promise<string[]> {
    const existing: string[] = [];
    for (const file of manifest.config_files) {
      if (await pathExists(path.join(this.ctx.paths.homeDir, file))) {
        existing.push(file);
      }
    }
    return existing;
  }

  private async restoreConfig(dir: string, manifest: BackupManifest, result: RestoreResult): Promise<void> {
    if (manifest.config_files.length === 0) return;

    try {
      await fs.mkdir(this.ctx.paths.homeDir, { recursive: true });
      for (const file of manifest.config_files) {
        await fs.copyFile(path.join(dir, CONFIG_DIR, file), path.join(this.ctx.paths.homeDir, file));
        result.restoredConfigFiles.push(file);
      }
      const reloaded = await this.ctx.reloadConfig();
      if (reloaded.fellBackToDefaults) {
        result.warnings.push(...reloaded.warnings);
      }
    } catch (error) {
      result.failures.push({ target: 'config', error: message(error) });
    }
  }

  private async restoreVolumes(dir: string, manifest: BackupManifest, result: RestoreResult): Promise<void> {
    const labels = { [COMPOSE_PROJECT_LABEL]: this.ctx.projectName };

    for (const volume of manifest.volumes) {
      const archive = await findVolumeArchive(dir, volume);
      if (!archive) {
        result.failures.push({ target: volume, error: 'Archive missing from bundle' });
        continue;
      }
      try {
        await this.ctx.engine.restoreVolume(volume, archive, labels);
        result.restoredVolumes.push(volume);
      } catch (error) {
        result.failures.push({ target: volume, error: message(error) });
      }
    }
  }

  /**
   * Re-enumerate the project's volumes; anything listed in the manifest but
   * absent is reported as a warning
   */
  private async verifyVolumes(manifest: BackupManifest, result: RestoreResult): Promise<void> {
    if (manifest.volumes.length === 0) return;

    try {
      const present = new Set(
        (await this.ctx.engine.listVolumes({ key: COMPOSE_PROJECT_LABEL, value: this.ctx.projectName }))
          .map(volume => volume.name)
      );
      for (const volume of manifest.volumes) {
        if (!present.has(volume)) {
          result.warnings.push(`Volume ${volume} is not present after restore`);
        }
      }
    } catch (error) {
      result.warnings.push(`Could not verify restored volumes: ${message(error)}`);
    }
  }

  private async restoreExtensions(dir: string, manifest: BackupManifest, result: RestoreResult): Promise<void> {
    for (const name of manifest.extensions) {
      const source = path.join(dir, EXTENSIONS_DIR, name);
      if (!(await pathExists(source))) {
        this.logger.debug('Extension was recorded without files', { extension: name });
        continue;
      }
      try {
        await fs.cp(source, path.join(this.ctx.paths.extensionsDir, name), { recursive: true, force: true });
        result.restoredExtensions.push(name);
      } catch (error) {
        result.warnings.push(`Extension ${name} was not restored: ${message(error)}`);
      }
    }
  }
}
