/**
 * Stack Context
 *
 * Everything one invocation works with: paths, the loaded configuration,
 * the detected platform, the engine and process collaborators, and the
 * service registry. Built once by createStackContext() and passed to the
 * orchestrators by reference.
 */

import * as path from 'path';
import {
  createLogger,
  loadStackConfig,
  resolveFromHome,
  resolveStackPaths,
  type LoadedStackConfig,
  type Logger,
  type StackConfig,
  type StackEnv,
  type StackPaths,
} from '@modelstack/core';
import { spawnRunner, spawnStreamer, type CommandRunner, type CommandStreamer } from '../lib/command-runner.js';
import { getComposeTemplatesDir } from '../lib/cli-paths.js';
import { detectContainerRuntime } from '../platforms/container/container-runtime.js';
import { DockerEngine } from '../platforms/container/docker-engine.js';
import type { ComposeTarget, ContainerEngine } from '../platforms/container/engine.js';
import {
  PosixProcessController,
  type NativeProcessController,
  type NativeProcessSpec,
} from '../platforms/native/native-process.js';
import { createPromptConfirm, type Confirm } from './confirm.js';
import { HealthChecker, type HealthCheckerOptions } from './health-checker.js';
import { HOST_PLATFORMS, PlatformDetector, type HostInfo, type HostPlatform } from './platform-detector.js';
import { ServiceRegistry } from './service-registry.js';

export interface StackContextDeps {
  paths: StackPaths;
  loaded: LoadedStackConfig;
  platform: HostPlatform;
  engine: ContainerEngine;
  native: NativeProcessController;
  registry: ServiceRegistry;
  health: HealthChecker;
  logger: Logger;
  confirm: Confirm;
  templatesDir: string;
}

export class StackContext {
  readonly paths: StackPaths;
  readonly platform: HostPlatform;
  readonly engine: ContainerEngine;
  readonly native: NativeProcessController;
  readonly registry: ServiceRegistry;
  readonly health: HealthChecker;
  readonly logger: Logger;
  readonly confirm: Confirm;
  readonly templatesDir: string;
  private loaded: LoadedStackConfig;

  constructor(deps: StackContextDeps) {
    this.paths = deps.paths;
    this.loaded = deps.loaded;
    this.platform = deps.platform;
    this.engine = deps.engine;
    this.native = deps.native;
    this.registry = deps.registry;
    this.health = deps.health;
    this.logger = deps.logger;
    this.confirm = deps.confirm;
    this.templatesDir = deps.templatesDir;
  }

  get config(): StackConfig {
    return this.loaded.config;
  }

  get env(): StackEnv {
    return this.loaded.env;
  }

  get projectName(): string {
    return this.loaded.env.projectName;
  }

  /** Outcome of the last configuration load, including fallback warnings */
  get configLoad(): LoadedStackConfig {
    return this.loaded;
  }

  /**
   * Re-read configuration after it changed on disk. Service classification
   * is not recomputed.
   */
  async reloadConfig(): Promise<LoadedStackConfig> {
    this.loaded = await loadStackConfig(this.paths);
    return this.loaded;
  }

  /**
   * Base compose file plus the overlay for this platform, if configured
   */
  composeFiles(): string[] {
    const files = [resolveFromHome(this.paths, this.config.composeFile)];
    switch (this.platform) {
      case HOST_PLATFORMS.APPLE_SILICON:
        files.push(resolveFromHome(this.paths, this.config.platform.apple.composeFile));
        break;
      case HOST_PLATFORMS.GPU:
        files.push(resolveFromHome(this.paths, this.config.platform.nvidia.composeFile));
        break;
      case HOST_PLATFORMS.CPU:
        break;
    }
    return files;
  }

  composeTarget(services?: string[]): ComposeTarget {
    return { files: this.composeFiles(), projectName: this.projectName, services };
  }

  extensionComposeFile(extension: string): string {
    return path.join(this.paths.extensionsDir, extension, 'docker-compose.yml');
  }

  backupRoot(): string {
    return resolveFromHome(this.paths, this.config.backupDirectory);
  }

  /**
   * Host process settings for a service, with its log file made absolute
   */
  nativeSpec(service: string): NativeProcessSpec | undefined {
    const settings = this.config.native[service];
    if (!settings) return undefined;
    return {
      service,
      command: settings.command,
      args: settings.args,
      processPattern: settings.processPattern,
      logFile: resolveFromHome(this.paths, settings.logFile),
    };
  }
}

export interface CreateStackContextOptions {
  verbose?: boolean;
  env?: Record<string, string | undefined>;
  logger?: Logger;
  runner?: CommandRunner;
  streamer?: CommandStreamer;
  engine?: ContainerEngine;
  native?: NativeProcessController;
  confirm?: Confirm;
  host?: HostInfo;
  templatesDir?: string;
  health?: HealthCheckerOptions;
}

/**
 * Load configuration, connect the collaborators and classify services for
 * this host.
 */
export async function createStackContext(options: CreateStackContextOptions = {}): Promise<StackContext> {
  const env = options.env ?? process.env;
  const logger = options.logger ?? createLogger({ level: options.verbose ? 'debug' : undefined });
  const runner = options.runner ?? spawnRunner;
  const streamer = options.streamer ?? spawnStreamer;

  const paths = resolveStackPaths(env);
  const loaded = await loadStackConfig(paths);
  for (const warning of loaded.warnings) {
    logger.debug(warning);
  }

  const engine = options.engine ?? new DockerEngine({
    runtime: await detectContainerRuntime(runner, env),
    runner,
    streamer,
    logger,
  });
  const native = options.native ?? new PosixProcessController({ runner, streamer, logger });

  const platform = await new PlatformDetector(engine, logger, options.host).detect();
  const registry = ServiceRegistry.fromConfig(loaded.config);
  registry.applyPlatform(platform, loaded.config.native);
  logger.debug('Platform detected', { platform });

  return new StackContext({
    paths,
    loaded,
    platform,
    engine,
    native,
    registry,
    health: new HealthChecker(registry, logger, options.health),
    logger,
    confirm: options.confirm ?? createPromptConfirm(),
    templatesDir: options.templatesDir ?? getComposeTemplatesDir(import.meta.url),
  });
}
