/**
 * Lifecycle Orchestrator
 *
 * Start, stop, restart and update the whole stack, plus the read-only
 * status and log queries. Container services move together through the
 * compose project; native services are handled one by one; remote
 * endpoints are never started or stopped.
 *
 * The stack state is recomputed from the engine and the process table on
 * every call and never stored.
 */

import { promises as fs } from 'fs';
import { COMPONENT_LABEL, StackValidationError, type Logger } from '@modelstack/core';
import { LogStream } from '../lib/log-stream.js';
import type { ContainerSummary } from '../platforms/container/engine.js';
import type { StackContext } from './stack-context.js';
import { assertNever, type HealthStatus, type ServiceDescriptor, type ServiceKind } from './service-types.js';

export type StackState = 'stopped' | 'running' | 'partially-running';

export interface ServiceFailure {
  service: string;
  error: string;
}

export interface StartOptions {
  /** Pull newer images before starting */
  update?: boolean;
  /** Wait for every started service to report healthy */
  waitForHealth?: boolean;
  healthTimeoutMs?: number;
}

export interface StartResult {
  success: boolean;
  alreadyRunning: boolean;
  started: string[];
  failures: ServiceFailure[];
  /** Services that did not become healthy in time (only with waitForHealth) */
  unhealthy: string[];
  update?: UpdateResult;
}

export interface StopResult {
  success: boolean;
  stopped: string[];
  failures: ServiceFailure[];
}

export interface RestartResult {
  success: boolean;
  stop: StopResult;
  start: StartResult;
}

export interface UpdateOptions {
  servicesOnly?: boolean;
  extensionsOnly?: boolean;
  /** Allow stopping a running stack to update it */
  forceRestart?: boolean;
  /** Set by start and restart, which manage the running state themselves */
  calledFromStartRestart?: boolean;
}

export interface ExtensionUpdate {
  name: string;
  success: boolean;
  error?: string;
}

export type UpdateResult =
  | { status: 'restart-required'; success: false }
  | {
      status: 'completed';
      success: boolean;
      coreUpdated: boolean;
      extensions: ExtensionUpdate[];
      restarted: boolean;
      failures: ServiceFailure[];
    };

export interface ServiceUsage {
  cpuPercent?: number;
  memoryMb?: number;
}

export interface ServiceStatus {
  name: string;
  kind: ServiceKind;
  isRunning: boolean;
  state: string;
  health: HealthStatus;
  ports: Record<string, number | null>;
  usage: ServiceUsage;
}

export interface LogOptions {
  follow?: boolean;
  tail?: number;
  since?: string;
  until?: string;
}

function message(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class LifecycleOrchestrator {
  private readonly logger: Logger;

  constructor(private readonly ctx: StackContext) {
    this.logger = ctx.logger.child({ component: 'lifecycle' });
  }

  /**
   * True when any stack container is running or any native service is alive
   */
  async isStackRunning(): Promise<boolean> {
    const containers = await this.stackContainers(false);
    if (containers.some(container => container.running)) {
      return true;
    }

    for (const service of this.ctx.registry.byKind('native')) {
      const spec = this.ctx.nativeSpec(service.name);
      if (spec && await this.ctx.native.isRunning(spec)) {
        return true;
      }
    }
    return false;
  }

  /**
   * Running, stopped, or somewhere in between, judged over the services
   * this CLI manages
   */
  async getStackState(): Promise<StackState> {
    const running = new Set(
      (await this.stackContainers(false)).filter(c => c.running).map(c => this.serviceOf(c))
    );

    const managed = this.ctx.registry.all().filter(service => service.kind !== 'remote');
    let runningCount = 0;
    for (const service of managed) {
      if (await this.isServiceRunning(service, running)) runningCount++;
    }

    if (runningCount === 0) return 'stopped';
    return runningCount === managed.length ? 'running' : 'partially-running';
  }

  async start(options: StartOptions = {}): Promise<StartResult> {
    if (await this.isStackRunning()) {
      this.logger.info('Stack is already running');
      return { success: true, alreadyRunning: true, started: [], failures: [], unhealthy: [] };
    }

    const failures: ServiceFailure[] = [];
    const started: string[] = [];

    let update: UpdateResult | undefined;
    if (options.update) {
      update = await this.update({ calledFromStartRestart: true });
      if (update.status === 'completed') {
        failures.push(...update.failures);
      }
    }

    const containers = this.ctx.registry.byKind('container').map(service => service.name);
    if (containers.length > 0) {
      try {
        await this.ctx.engine.composeUp(this.ctx.composeTarget(containers));
        started.push(...containers);
      } catch (error) {
        failures.push(...containers.map(service => ({ service, error: message(error) })));
      }
    }

    for (const service of this.ctx.registry.byKind('native')) {
      const spec = this.ctx.nativeSpec(service.name);
      if (!spec) {
        failures.push({ service: service.name, error: 'No native process settings configured' });
        continue;
      }
      try {
        if (!(await this.ctx.native.isRunning(spec))) {
          await this.ctx.native.start(spec);
        }
        started.push(service.name);
      } catch (error) {
        failures.push({ service: service.name, error: message(error) });
      }
    }

    const unhealthy: string[] = [];
    if (options.waitForHealth) {
      for (const service of started) {
        const healthy = await this.ctx.health.waitUntilHealthy(service, { timeoutMs: options.healthTimeoutMs });
        if (!healthy && this.ctx.registry.require(service).healthCheckUrl) {
          unhealthy.push(service);
        }
      }
    }

    return {
      success: failures.length === 0 && unhealthy.length === 0,
      alreadyRunning: false,
      started,
      failures,
      unhealthy,
      update,
    };
  }

  /**
   * Bring everything down. Safe on a stopped stack.
   */
  async stop(): Promise<StopResult> {
    const failures: ServiceFailure[] = [];
    const stopped: string[] = [];

    const containers = this.ctx.registry.byKind('container').map(service => service.name);
    if (containers.length > 0) {
      await this.ctx.engine.composeDown(this.ctx.composeTarget());
      stopped.push(...containers);
    }

    for (const service of this.ctx.registry.byKind('native')) {
      const spec = this.ctx.nativeSpec(service.name);
      if (!spec || !(await this.ctx.native.isRunning(spec))) continue;

      if (await this.ctx.native.stop(spec)) {
        stopped.push(service.name);
      } else {
        failures.push({ service: service.name, error: 'Process was not found when stopping' });
      }
    }

    return { success: failures.length === 0, stopped, failures };
  }

  /**
   * Stop then start. A stop that throws aborts before anything is started;
   * services the stop could not find are reported and the start goes ahead.
   */
  async restart(options: StartOptions = {}): Promise<RestartResult> {
    const stop = await this.stop();
    const start = await this.start(options);
    return { success: stop.success && start.success, stop, start };
  }

  async update(options: UpdateOptions = {}): Promise<UpdateResult> {
    if (options.servicesOnly && options.extensionsOnly) {
      throw new StackValidationError(
        'Cannot update only services and only extensions at the same time',
        'Pass --services or --extensions, or neither to update everything'
      );
    }

    const running = await this.isStackRunning();
    if (running && !options.forceRestart) {
      return { status: 'restart-required', success: false };
    }

    const restartAround = running && !options.calledFromStartRestart;
    if (restartAround) {
      this.logger.info('Stopping stack for update');
      await this.stop();
    }

    const failures: ServiceFailure[] = [];
    let coreUpdated = false;
    if (!options.extensionsOnly) {
      const containers = this.ctx.registry.byKind('container').map(service => service.name);
      try {
        if (containers.length > 0) {
          await this.ctx.engine.composePull(this.ctx.composeTarget(containers));
        }
        coreUpdated = true;
      } catch (error) {
        failures.push({ service: 'core', error: message(error) });
      }
    }

    const extensions: ExtensionUpdate[] = [];
    if (!options.servicesOnly) {
      for (const name of this.ctx.config.extensions.enabled) {
        extensions.push(await this.updateExtension(name));
      }
    }

    let restarted = false;
    if (restartAround) {
      const start = await this.start();
      restarted = start.success;
      failures.push(...start.failures);
    }

    return {
      status: 'completed',
      success: failures.length === 0 && extensions.every(extension => extension.success),
      coreUpdated,
      extensions,
      restarted,
      failures,
    };
  }

  async status(): Promise<ServiceStatus[]> {
    const containers = new Map<string, ContainerSummary>();
    if (this.ctx.registry.byKind('container').length > 0) {
      for (const container of await this.stackContainers(true)) {
        containers.set(this.serviceOf(container), container);
      }
    }

    const statuses: ServiceStatus[] = [];
    for (const service of this.ctx.registry.all()) {
      statuses.push(await this.serviceStatus(service, containers));
    }
    return statuses;
  }

  /**
   * Log lines for one service, or for every container service when no
   * service is named
   */
  logs(service: string | undefined, options: LogOptions = {}): LogStream {
    if (service === undefined) {
      return this.ctx.engine.composeLogs(this.ctx.composeTarget(), options);
    }

    const descriptor = this.ctx.registry.require(service);
    switch (descriptor.kind) {
      case 'container':
        return this.ctx.engine.composeLogs(this.ctx.composeTarget([service]), options);
      case 'native': {
        const spec = this.ctx.nativeSpec(service);
        if (!spec) {
          return LogStream.fromLines([`${service} has no native process settings; no log file to show`]);
        }
        return this.ctx.native.logs(spec, { follow: options.follow, tail: options.tail });
      }
      case 'remote':
        return LogStream.fromLines([`${service} is a remote endpoint; its logs are not available locally`]);
      default:
        return assertNever(descriptor.kind);
    }
  }

  private async updateExtension(name: string): Promise<ExtensionUpdate> {
    const composeFile = this.ctx.extensionComposeFile(name);
    try {
      await fs.access(composeFile);
    } catch {
      return { name, success: false, error: `Extension is not installed (${composeFile} missing)` };
    }

    try {
      await this.ctx.engine.composePull({ files: [composeFile], projectName: this.ctx.projectName });
      return { name, success: true };
    } catch (error) {
      this.logger.warn('Extension update failed', { extension: name, error: message(error) });
      return { name, success: false, error: message(error) };
    }
  }

  private async serviceStatus(
    service: ServiceDescriptor,
    containers: Map<string, ContainerSummary>
  ): Promise<ServiceStatus> {
    switch (service.kind) {
      case 'container': {
        const container = containers.get(service.name);
        const isRunning = container?.running ?? false;
        const usage = container && isRunning ? await this.ctx.engine.containerUsage(container.id) : undefined;
        return {
          name: service.name,
          kind: service.kind,
          isRunning,
          state: container?.state ?? 'not created',
          health: isRunning ? await this.ctx.health.check(service.name) : 'unknown',
          ports: container?.ports ?? {},
          usage: usage ?? {},
        };
      }
      case 'native': {
        const spec = this.ctx.nativeSpec(service.name);
        const isRunning = spec ? await this.ctx.native.isRunning(spec) : false;
        return {
          name: service.name,
          kind: service.kind,
          isRunning,
          state: isRunning ? 'running' : 'stopped',
          health: isRunning ? await this.ctx.health.check(service.name) : 'unknown',
          ports: Object.fromEntries(service.ports.map(port => [`${port}/tcp`, port])),
          usage: {},
        };
      }
      case 'remote': {
        const health = await this.ctx.health.check(service.name);
        return {
          name: service.name,
          kind: service.kind,
          isRunning: health === 'healthy',
          state: 'remote',
          health,
          ports: {},
          usage: {},
        };
      }
      default:
        return assertNever(service.kind);
    }
  }

  private async isServiceRunning(service: ServiceDescriptor, runningContainers: Set<string>): Promise<boolean> {
    switch (service.kind) {
      case 'container':
        return runningContainers.has(service.name);
      case 'native': {
        const spec = this.ctx.nativeSpec(service.name);
        return spec ? this.ctx.native.isRunning(spec) : false;
      }
      case 'remote':
        return false;
      default:
        return assertNever(service.kind);
    }
  }

  private stackContainers(all: boolean): Promise<ContainerSummary[]> {
    return this.ctx.engine.listContainers({ key: COMPONENT_LABEL }, { all });
  }

  private serviceOf(container: ContainerSummary): string {
    return container.labels[COMPONENT_LABEL] ?? container.name;
  }
}
