/**
 * In-process stand-ins for the container engine and the native process
 * controller, plus a helper that builds a StackContext on a temporary home
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  COMPONENT_LABEL,
  COMPOSE_PROJECT_LABEL,
  EngineUnavailableError,
  createSilentLogger,
} from '@modelstack/core';
import { LogStream } from '../../lib/log-stream.js';
import type {
  ArchiveOptions,
  ComposeLogOptions,
  ComposeTarget,
  ContainerEngine,
  ContainerSummary,
  ContainerUsage,
  EngineInfo,
  LabelFilter,
  NetworkSummary,
  VolumeSummary,
} from '../../platforms/container/engine.js';
import type { NativeLogOptions, NativeProcessController, NativeProcessSpec } from '../../platforms/native/native-process.js';
import { createStaticConfirm, type Confirm } from '../confirm.js';
import type { HostInfo } from '../platform-detector.js';
import { createStackContext, type StackContext } from '../stack-context.js';

export const LINUX_HOST: HostInfo = { os: 'linux', arch: 'x64' };
export const APPLE_HOST: HostInfo = { os: 'darwin', arch: 'arm64' };

function matches(labels: Record<string, string>, filter: LabelFilter): boolean {
  if (!(filter.key in labels)) return false;
  return filter.value === undefined || labels[filter.key] === filter.value;
}

interface FakeVolume {
  labels: Record<string, string>;
  content: string;
}

export class FakeEngine implements ContainerEngine {
  available = true;
  runtimes = ['runc'];
  containers: ContainerSummary[] = [];
  volumes = new Map<string, FakeVolume>();
  networks: NetworkSummary[] = [];
  /** Operation names mapped to the error they throw */
  failures = new Map<string, Error>();
  calls: string[] = [];
  logLines: string[] = [];
  composeServices = ['model-server', 'webui', 'mcp-proxy'];

  private guard(operation: string): void {
    if (!this.available) {
      throw new EngineUnavailableError('Cannot connect to the Docker daemon');
    }
    const failure = this.failures.get(operation);
    if (failure) throw failure;
  }

  addContainer(service: string, projectName: string, running: boolean, image = `${service}:latest`): ContainerSummary {
    const container: ContainerSummary = {
      id: `${service}-id`,
      name: `${projectName}-${service}-1`,
      image,
      state: running ? 'running' : 'exited',
      running,
      labels: { [COMPONENT_LABEL]: service, [COMPOSE_PROJECT_LABEL]: projectName },
      ports: {},
    };
    this.containers.push(container);
    return container;
  }

  addVolume(name: string, projectName: string, content: string): void {
    this.volumes.set(name, { labels: { [COMPOSE_PROJECT_LABEL]: projectName }, content });
  }

  async ping(): Promise<boolean> {
    return this.available;
  }

  async info(): Promise<EngineInfo> {
    this.guard('info');
    return { runtimes: this.runtimes, serverVersion: '27.0.0' };
  }

  async composeUp(target: ComposeTarget): Promise<void> {
    this.guard('composeUp');
    const services = target.services ?? this.composeServices;
    this.calls.push(`up:${services.join(',')}`);
    for (const service of services) {
      this.containers = this.containers.filter(c => c.labels[COMPONENT_LABEL] !== service);
      this.addContainer(service, target.projectName, true);
    }
    if (!this.networks.some(network => network.name === `${target.projectName}_default`)) {
      this.networks.push({ id: 'net-1', name: `${target.projectName}_default` });
    }
  }

  async composeDown(target: ComposeTarget): Promise<void> {
    this.guard('composeDown');
    this.calls.push('down');
    this.containers = this.containers.filter(c => c.labels[COMPOSE_PROJECT_LABEL] !== target.projectName);
  }

  async composePull(target: ComposeTarget): Promise<void> {
    this.guard('composePull');
    const services = target.services ?? [];
    this.calls.push(`pull:${services.length > 0 ? services.join(',') : target.files.map(f => path.basename(path.dirname(f))).join(',')}`);
  }

  async composeValidate(): Promise<boolean> {
    this.guard('composeValidate');
    return true;
  }

  composeLogs(target: ComposeTarget, options: ComposeLogOptions): LogStream {
    this.calls.push(`logs:${(target.services ?? []).join(',')}:${options.follow ? 'follow' : 'once'}`);
    return LogStream.fromLines(this.logLines);
  }

  async listContainers(filter: LabelFilter, options: { all?: boolean } = {}): Promise<ContainerSummary[]> {
    this.guard('listContainers');
    return this.containers.filter(c => matches(c.labels, filter) && (options.all || c.running));
  }

  async listVolumes(filter: LabelFilter): Promise<VolumeSummary[]> {
    this.guard('listVolumes');
    return [...this.volumes.entries()]
      .filter(([, volume]) => matches(volume.labels, filter))
      .map(([name, volume]) => ({ name, labels: volume.labels }));
  }

  async listNetworks(): Promise<NetworkSummary[]> {
    this.guard('listNetworks');
    return [...this.networks, { id: 'bridge-id', name: 'bridge' }];
  }

  async containerUsage(): Promise<ContainerUsage | undefined> {
    return { cpuPercent: 1.5, memoryMb: 256 };
  }

  async removeContainer(id: string): Promise<void> {
    this.guard('removeContainer');
    this.calls.push(`rm-container:${id}`);
    this.containers = this.containers.filter(c => c.id !== id);
  }

  async removeVolume(name: string): Promise<void> {
    this.guard('removeVolume');
    this.calls.push(`rm-volume:${name}`);
    this.volumes.delete(name);
  }

  async removeNetwork(name: string): Promise<void> {
    this.guard('removeNetwork');
    this.calls.push(`rm-network:${name}`);
    this.networks = this.networks.filter(network => network.name !== name);
  }

  async removeImage(reference: string): Promise<void> {
    this.guard('removeImage');
    this.calls.push(`rm-image:${reference}`);
  }

  async archiveVolume(volume: string, archivePath: string, options: ArchiveOptions): Promise<void> {
    this.guard('archiveVolume');
    const stored = this.volumes.get(volume);
    if (!stored) throw new Error(`No such volume: ${volume}`);
    await fs.writeFile(archivePath, `${options.compress ? 'gz' : 'tar'}:${stored.content}`);
  }

  async restoreVolume(volume: string, archivePath: string, labels: Record<string, string>): Promise<void> {
    this.guard('restoreVolume');
    const archived = await fs.readFile(archivePath, 'utf-8');
    this.volumes.set(volume, { labels, content: archived.replace(/^(gz|tar):/, '') });
  }
}

export class FakeNativeController implements NativeProcessController {
  running = new Set<string>();
  installed = true;
  startError: Error | undefined;
  started: string[] = [];
  logLines: string[] = [];

  async isRunning(spec: NativeProcessSpec): Promise<boolean> {
    return this.running.has(spec.service);
  }

  async start(spec: NativeProcessSpec): Promise<void> {
    if (this.startError) throw this.startError;
    this.started.push(spec.service);
    this.running.add(spec.service);
  }

  async stop(spec: NativeProcessSpec): Promise<boolean> {
    return this.running.delete(spec.service);
  }

  logs(spec: NativeProcessSpec, options: NativeLogOptions): LogStream {
    return LogStream.fromLines(this.logLines.slice(-(options.tail ?? this.logLines.length)));
  }

  async isInstalled(): Promise<boolean> {
    return this.installed;
  }
}

export interface TestStackOptions {
  host?: HostInfo;
  confirm?: Confirm;
  /** Answer of every health probe */
  healthy?: boolean;
  templatesDir?: string;
}

export interface TestStack {
  ctx: StackContext;
  engine: FakeEngine;
  native: FakeNativeController;
  home: string;
}

export async function makeTempDir(prefix = 'modelstack-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * StackContext over fakes, rooted at `home` (created when omitted)
 */
export async function createTestStack(options: TestStackOptions = {}, home?: string): Promise<TestStack> {
  const stackHome = home ?? await makeTempDir();
  const engine = new FakeEngine();
  const native = new FakeNativeController();
  const healthy = options.healthy ?? true;

  const ctx = await createStackContext({
    env: { MODELSTACK_HOME: stackHome },
    logger: createSilentLogger(),
    engine,
    native,
    confirm: options.confirm ?? createStaticConfirm(false),
    host: options.host ?? LINUX_HOST,
    templatesDir: options.templatesDir ?? path.join(stackHome, 'no-templates'),
    health: {
      httpProbe: async () => healthy,
      tcpProbe: async () => healthy,
    },
  });

  return { ctx, engine, native, home: stackHome };
}
