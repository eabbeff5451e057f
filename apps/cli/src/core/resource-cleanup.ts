/**
 * Resource Cleanup Engine
 *
 * Finds the stack's engine resources by label and removes them. Containers
 * carry the component label; volumes and networks are found through the
 * compose project label; images are those the stack's containers run.
 * Removal is idempotent, so running uninstall twice is harmless. Removing
 * the configuration deletes only what the stack wrote under its home.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import {
  COMPONENT_LABEL,
  COMPOSE_PROJECT_LABEL,
  EngineUnavailableError,
  isNotFound,
  resolveFromHome,
  type Logger,
} from '@modelstack/core';
import type { ContainerSummary, NetworkSummary, VolumeSummary } from '../platforms/container/engine.js';
import type { LifecycleOrchestrator } from './lifecycle-orchestrator.js';
import type { StackContext } from './stack-context.js';

/** Networks every engine creates for itself */
const BUILTIN_NETWORKS = new Set(['bridge', 'host', 'none']);

export interface StackResources {
  containers: ContainerSummary[];
  networks: NetworkSummary[];
  volumes: VolumeSummary[];
  images: string[];
}

export interface UninstallOptions {
  removeVolumes?: boolean;
  removeConfig?: boolean;
  removeImages?: boolean;
  /** Implies removeVolumes and removeConfig */
  all?: boolean;
  /** Skip the confirmation before deleting volumes */
  force?: boolean;
}

export interface RemovedResources {
  containers: string[];
  networks: string[];
  images: string[];
  volumes: string[];
}

export interface CleanupFailure {
  resource: string;
  error: string;
}

export interface UninstallResult {
  success: boolean;
  removed: RemovedResources;
  configRemoved: boolean;
  /** The operator declined volume deletion; volumes were kept */
  volumesDeclined: boolean;
  failures: CleanupFailure[];
  warnings: string[];
}

export interface CleanupOptions {
  removeVolumes?: boolean;
  force?: boolean;
}

export interface CleanupResult {
  success: boolean;
  removed: RemovedResources;
  volumesDeclined: boolean;
  failures: CleanupFailure[];
  warnings: string[];
}

function message(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function emptyRemoved(): RemovedResources {
  return { containers: [], networks: [], images: [], volumes: [] };
}

export class ResourceCleanupEngine {
  private readonly logger: Logger;

  constructor(
    private readonly ctx: StackContext,
    private readonly lifecycle: LifecycleOrchestrator
  ) {
    this.logger = ctx.logger.child({ component: 'cleanup' });
  }

  async discover(): Promise<StackResources> {
    const project = { key: COMPOSE_PROJECT_LABEL, value: this.ctx.projectName };
    const containers = await this.ctx.engine.listContainers({ key: COMPONENT_LABEL }, { all: true });
    const networks = (await this.ctx.engine.listNetworks(project))
      .filter(network => !BUILTIN_NETWORKS.has(network.name));
    const volumes = await this.ctx.engine.listVolumes(project);
    const images = [...new Set(containers.map(container => container.image))].sort();

    return { containers, networks, volumes, images };
  }

  async uninstall(options: UninstallOptions = {}): Promise<UninstallResult> {
    const removeVolumes = options.all === true || options.removeVolumes === true;
    const removeConfig = options.all === true || options.removeConfig === true;

    const removed = emptyRemoved();
    const failures: CleanupFailure[] = [];
    const warnings: string[] = [];
    let volumesDeclined = false;

    let resources: StackResources | undefined;
    try {
      resources = await this.discover();
    } catch (error) {
      if (!(error instanceof EngineUnavailableError)) throw error;
      warnings.push(`Container engine unavailable, engine resources were left in place: ${error.message}`);
    }

    if (resources) {
      try {
        if (await this.lifecycle.isStackRunning()) {
          await this.lifecycle.stop();
        }
      } catch (error) {
        warnings.push(`Stopping the stack failed, removing containers anyway: ${message(error)}`);
      }

      await this.removeEach(resources.containers.map(c => c.id), id => this.ctx.engine.removeContainer(id), removed.containers, failures);
      await this.removeEach(resources.networks.map(n => n.name), name => this.ctx.engine.removeNetwork(name), removed.networks, failures);

      if (options.removeImages) {
        await this.removeEach(resources.images, image => this.ctx.engine.removeImage(image), removed.images, failures);
      }

      if (removeVolumes && resources.volumes.length > 0) {
        volumesDeclined = !(await this.confirmVolumeRemoval(resources.volumes, options.force));
        if (!volumesDeclined) {
          await this.removeEach(resources.volumes.map(v => v.name), name => this.ctx.engine.removeVolume(name), removed.volumes, failures);
        }
      }
    }

    let configRemoved = false;
    if (removeConfig) {
      configRemoved = await this.removeStackFiles(failures, warnings);
    }

    this.logger.info('Uninstall finished', { removed, configRemoved, failures: failures.length });
    return { success: failures.length === 0, removed, configRemoved, volumesDeclined, failures, warnings };
  }

  /**
   * Files and directories the stack writes under its home. Configured paths
   * that resolve outside the home are not ours to delete.
   */
  private stackOwnedPaths(): string[] {
    const { paths, config } = this.ctx;
    const candidates = [
      paths.configFile,
      paths.envFile,
      resolveFromHome(paths, config.composeFile),
      resolveFromHome(paths, config.platform.apple.composeFile),
      resolveFromHome(paths, config.platform.nvidia.composeFile),
      paths.extensionsDir,
      paths.logsDir,
      resolveFromHome(paths, config.dataDirectory),
      resolveFromHome(paths, config.backupDirectory),
    ];
    return [...new Set(candidates)].filter(candidate => {
      const relative = path.relative(paths.homeDir, candidate);
      return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
    });
  }

  /**
   * Delete the stack's own files, then the home directory if nothing else
   * is left in it
   */
  private async removeStackFiles(failures: CleanupFailure[], warnings: string[]): Promise<boolean> {
    let removedAll = true;
    for (const target of this.stackOwnedPaths()) {
      try {
        await fs.rm(target, { recursive: true, force: true });
      } catch (error) {
        removedAll = false;
        failures.push({ resource: target, error: message(error) });
      }
    }

    const homeDir = this.ctx.paths.homeDir;
    try {
      await fs.rmdir(homeDir);
    } catch (error) {
      if (isNotFound(error)) return removedAll;
      if (error instanceof Error && 'code' in error && (error.code === 'ENOTEMPTY' || error.code === 'EEXIST')) {
        warnings.push(`Kept ${homeDir}: it holds files modelstack did not create`);
        return removedAll;
      }
      failures.push({ resource: homeDir, error: message(error) });
      return false;
    }
    return removedAll;
  }

  /**
   * Routine cleanup: remove stopped stack containers, and the project's
   * networks and (on request) volumes once nothing is running
   */
  async cleanup(options: CleanupOptions = {}): Promise<CleanupResult> {
    const resources = await this.discover();
    const removed = emptyRemoved();
    const failures: CleanupFailure[] = [];
    const warnings: string[] = [];
    let volumesDeclined = false;

    const stopped = resources.containers.filter(container => !container.running);
    await this.removeEach(stopped.map(c => c.id), id => this.ctx.engine.removeContainer(id), removed.containers, failures);

    const running = resources.containers.some(container => container.running) || await this.lifecycle.isStackRunning();
    if (running) {
      warnings.push('Stack is running; networks and volumes were kept');
    } else {
      await this.removeEach(resources.networks.map(n => n.name), name => this.ctx.engine.removeNetwork(name), removed.networks, failures);

      if (options.removeVolumes && resources.volumes.length > 0) {
        volumesDeclined = !(await this.confirmVolumeRemoval(resources.volumes, options.force));
        if (!volumesDeclined) {
          await this.removeEach(resources.volumes.map(v => v.name), name => this.ctx.engine.removeVolume(name), removed.volumes, failures);
        }
      }
    }

    return { success: failures.length === 0, removed, volumesDeclined, failures, warnings };
  }

  private async confirmVolumeRemoval(volumes: VolumeSummary[], force: boolean | undefined): Promise<boolean> {
    if (force) return true;
    const names = volumes.map(volume => volume.name).join(', ');
    return this.ctx.confirm(
      `Permanently delete ${volumes.length} volume(s) (${names})? All models and chat data in them will be lost.`
    );
  }

  private async removeEach(
    targets: string[],
    remove: (target: string) => Promise<void>,
    removed: string[],
    failures: CleanupFailure[]
  ): Promise<void> {
    for (const target of targets) {
      try {
        await remove(target);
        removed.push(target);
      } catch (error) {
        failures.push({ resource: target, error: message(error) });
      }
    }
  }
}
