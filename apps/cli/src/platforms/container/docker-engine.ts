/**
 * DockerEngine - ContainerEngine backed by the docker (or podman) CLI
 *
 * Commands run through an injected CommandRunner; listings use
 * `--format {{json .}}` and are validated with zod line by line.
 */

import * as path from 'path';
import { z } from 'zod';
import { EngineUnavailableError, type Logger } from '@modelstack/core';
import {
  CommandNotFoundError,
  type CommandOutput,
  type CommandRunner,
  type CommandStreamer,
  type RunOptions,
} from '../../lib/command-runner.js';
import type { LogStream } from '../../lib/log-stream.js';
import type { ContainerRuntime } from './container-runtime.js';
import {
  labelSelector,
  type ArchiveOptions,
  type ComposeLogOptions,
  type ComposeTarget,
  type ContainerEngine,
  type ContainerSummary,
  type ContainerUsage,
  type EngineInfo,
  type LabelFilter,
  type NetworkSummary,
  type VolumeSummary,
} from './engine.js';

/** Image used for throwaway containers that read and write volume archives */
export const ARCHIVE_HELPER_IMAGE = 'alpine:3.20';

const PsLineSchema = z.object({
  ID: z.string(),
  Names: z.string(),
  Image: z.string(),
  State: z.string(),
  Labels: z.string().default(''),
  Ports: z.string().default(''),
});

const VolumeLineSchema = z.object({
  Name: z.string(),
  Labels: z.string().default(''),
});

const NetworkLineSchema = z.object({
  ID: z.string(),
  Name: z.string(),
});

const StatsLineSchema = z.object({
  CPUPerc: z.string(),
  MemUsage: z.string(),
});

const InfoSchema = z.object({
  Runtimes: z.record(z.string(), z.unknown()).optional(),
  ServerVersion: z.string().optional(),
});

const DAEMON_DOWN_PATTERN = /cannot connect to the docker daemon|is the docker daemon running|error during connect|cannot connect to podman/i;
const NOT_FOUND_PATTERN = /no such (container|volume|network|image)|not found/i;

/**
 * Parse a `k=v,k2=v2` label string
 */
export function parseLabels(raw: string): Record<string, string> {
  const labels: Record<string, string> = {};
  if (raw.trim() === '') return labels;

  for (const pair of raw.split(',')) {
    const separator = pair.indexOf('=');
    if (separator <= 0) continue;
    labels[pair.slice(0, separator).trim()] = pair.slice(separator + 1).trim();
  }
  return labels;
}

/**
 * Parse the Ports column of `ps`, e.g.
 * `0.0.0.0:8200->8000/tcp, :::8200->8000/tcp, 9000/tcp`
 * into `{ "8000/tcp": 8200, "9000/tcp": null }`.
 */
export function parsePorts(raw: string): Record<string, number | null> {
  const ports: Record<string, number | null> = {};
  if (raw.trim() === '') return ports;

  for (const entry of raw.split(',').map(part => part.trim()).filter(Boolean)) {
    const arrow = entry.indexOf('->');
    if (arrow === -1) {
      if (!(entry in ports)) ports[entry] = null;
      continue;
    }
    const hostPart = entry.slice(0, arrow);
    const containerPort = entry.slice(arrow + 2);
    const hostPort = Number.parseInt(hostPart.slice(hostPart.lastIndexOf(':') + 1), 10);
    ports[containerPort] = Number.isNaN(hostPort) ? null : hostPort;
  }
  return ports;
}

const MEMORY_UNITS: Record<string, number> = {
  b: 1,
  kb: 1000,
  kib: 1024,
  mb: 1000 ** 2,
  mib: 1024 ** 2,
  gb: 1000 ** 3,
  gib: 1024 ** 3,
};

/**
 * Memory in MiB from a MemUsage value such as `512MiB / 7.6GiB`
 */
export function parseMemoryMb(raw: string): number | undefined {
  const usage = raw.split('/')[0]?.trim() ?? '';
  const match = /^([\d.]+)\s*([a-z]+)$/i.exec(usage);
  if (!match?.[1] || !match[2]) return undefined;

  const factor = MEMORY_UNITS[match[2].toLowerCase()];
  const value = Number.parseFloat(match[1]);
  if (factor === undefined || Number.isNaN(value)) return undefined;

  return Math.round((value * factor / 1024 ** 2) * 10) / 10;
}

export function parsePercent(raw: string): number | undefined {
  const value = Number.parseFloat(raw.replace('%', ''));
  return Number.isNaN(value) ? undefined : value;
}

export interface DockerEngineOptions {
  runtime?: ContainerRuntime;
  runner: CommandRunner;
  streamer: CommandStreamer;
  logger: Logger;
}

export class DockerEngine implements ContainerEngine {
  private readonly runtime: ContainerRuntime;
  private readonly runner: CommandRunner;
  private readonly streamer: CommandStreamer;
  private readonly logger: Logger;

  constructor(options: DockerEngineOptions) {
    this.runtime = options.runtime ?? 'docker';
    this.runner = options.runner;
    this.streamer = options.streamer;
    this.logger = options.logger.child({ component: 'engine', runtime: this.runtime });
  }

  async ping(): Promise<boolean> {
    try {
      const output = await this.exec(['info', '--format', '{{.ServerVersion}}'], { timeoutMs: 10_000 });
      return output.exitCode === 0;
    } catch (error) {
      if (error instanceof EngineUnavailableError) return false;
      throw error;
    }
  }

  async info(): Promise<EngineInfo> {
    const stdout = await this.execOrThrow(['info', '--format', '{{json .}}'], 'info', { timeoutMs: 10_000 });
    const parsed = InfoSchema.safeParse(JSON.parse(stdout));
    if (!parsed.success) {
      throw new Error(`Unexpected ${this.runtime} info output`);
    }
    return {
      runtimes: Object.keys(parsed.data.Runtimes ?? {}),
      serverVersion: parsed.data.ServerVersion,
    };
  }

  async composeUp(target: ComposeTarget): Promise<void> {
    await this.execOrThrow([...this.composeArgs(target), 'up', '-d', ...(target.services ?? [])], 'compose up', {
      timeoutMs: 10 * 60_000,
    });
  }

  async composeDown(target: ComposeTarget): Promise<void> {
    const output = await this.exec([...this.composeArgs(target), 'down'], { timeoutMs: 5 * 60_000 });
    if (output.exitCode === 0) return;
    if (NOT_FOUND_PATTERN.test(output.stderr)) {
      this.logger.debug('Nothing to bring down', { stderr: output.stderr.trim() });
      return;
    }
    throw this.failure('compose down', output);
  }

  async composePull(target: ComposeTarget): Promise<void> {
    await this.execOrThrow([...this.composeArgs(target), 'pull', ...(target.services ?? [])], 'compose pull', {
      timeoutMs: 30 * 60_000,
    });
  }

  async composeValidate(target: ComposeTarget): Promise<boolean> {
    const output = await this.exec([...this.composeArgs(target), 'config', '--quiet']);
    if (output.exitCode !== 0) {
      this.logger.debug('Compose configuration is invalid', { stderr: output.stderr.trim() });
    }
    return output.exitCode === 0;
  }

  composeLogs(target: ComposeTarget, options: ComposeLogOptions): LogStream {
    const args = [...this.composeArgs(target), 'logs', '--no-color'];
    if (options.follow) args.push('--follow');
    if (options.tail !== undefined) args.push('--tail', String(options.tail));
    if (options.since) args.push('--since', options.since);
    if (options.until) args.push('--until', options.until);
    args.push(...(target.services ?? []));
    return this.streamer(this.runtime, args);
  }

  async listContainers(filter: LabelFilter, options: { all?: boolean } = {}): Promise<ContainerSummary[]> {
    const args = ['ps', '--filter', `label=${labelSelector(filter)}`, '--format', '{{json .}}'];
    if (options.all) args.splice(1, 0, '--all');

    const stdout = await this.execOrThrow(args, 'list containers');
    return this.parseLines(stdout, PsLineSchema).map(line => ({
      id: line.ID,
      name: line.Names,
      image: line.Image,
      state: line.State,
      running: line.State === 'running',
      labels: parseLabels(line.Labels),
      ports: parsePorts(line.Ports),
    }));
  }

  async listVolumes(filter: LabelFilter): Promise<VolumeSummary[]> {
    const stdout = await this.execOrThrow(
      ['volume', 'ls', '--filter', `label=${labelSelector(filter)}`, '--format', '{{json .}}'],
      'list volumes'
    );
    return this.parseLines(stdout, VolumeLineSchema).map(line => ({
      name: line.Name,
      labels: parseLabels(line.Labels),
    }));
  }

  async listNetworks(filter: LabelFilter): Promise<NetworkSummary[]> {
    const stdout = await this.execOrThrow(
      ['network', 'ls', '--filter', `label=${labelSelector(filter)}`, '--format', '{{json .}}'],
      'list networks'
    );
    return this.parseLines(stdout, NetworkLineSchema).map(line => ({ id: line.ID, name: line.Name }));
  }

  async containerUsage(containerId: string): Promise<ContainerUsage | undefined> {
    const output = await this.exec(['stats', '--no-stream', '--format', '{{json .}}', containerId], { timeoutMs: 15_000 });
    if (output.exitCode !== 0) {
      this.logger.debug('Stats unavailable', { containerId, stderr: output.stderr.trim() });
      return undefined;
    }
    const [line] = this.parseLines(output.stdout, StatsLineSchema);
    if (!line) return undefined;

    const cpuPercent = parsePercent(line.CPUPerc);
    const memoryMb = parseMemoryMb(line.MemUsage);
    if (cpuPercent === undefined || memoryMb === undefined) return undefined;
    return { cpuPercent, memoryMb };
  }

  async removeContainer(id: string): Promise<void> {
    await this.removeResource(['rm', '--force', id], `remove container ${id}`);
  }

  async removeVolume(name: string): Promise<void> {
    await this.removeResource(['volume', 'rm', name], `remove volume ${name}`);
  }

  async removeNetwork(id: string): Promise<void> {
    await this.removeResource(['network', 'rm', id], `remove network ${id}`);
  }

  async removeImage(reference: string): Promise<void> {
    await this.removeResource(['rmi', reference], `remove image ${reference}`);
  }

  async archiveVolume(volume: string, archivePath: string, options: ArchiveOptions): Promise<void> {
    const dir = path.dirname(path.resolve(archivePath));
    const file = path.basename(archivePath);
    await this.execOrThrow(
      [
        'run', '--rm',
        '-v', `${volume}:/source:ro`,
        '-v', `${dir}:/backup`,
        ARCHIVE_HELPER_IMAGE,
        'tar', options.compress ? 'czf' : 'cf', `/backup/${file}`, '-C', '/source', '.',
      ],
      `archive volume ${volume}`,
      { timeoutMs: 60 * 60_000 }
    );
  }

  async restoreVolume(volume: string, archivePath: string, labels: Record<string, string>): Promise<void> {
    const labelArgs = Object.entries(labels).flatMap(([key, value]) => ['--label', `${key}=${value}`]);
    await this.execOrThrow(['volume', 'create', ...labelArgs, volume], `create volume ${volume}`);

    const dir = path.dirname(path.resolve(archivePath));
    const file = path.basename(archivePath);
    const extract = file.endsWith('.gz') ? 'xzf' : 'xf';
    await this.execOrThrow(
      [
        'run', '--rm',
        '-v', `${volume}:/target`,
        '-v', `${dir}:/backup:ro`,
        ARCHIVE_HELPER_IMAGE,
        'sh', '-c', `find /target -mindepth 1 -delete && tar ${extract} '/backup/${file}' -C /target`,
      ],
      `restore volume ${volume}`,
      { timeoutMs: 60 * 60_000 }
    );
  }

  private composeArgs(target: ComposeTarget): string[] {
    return ['compose', '-p', target.projectName, ...target.files.flatMap(file => ['-f', file])];
  }

  private async removeResource(args: string[], action: string): Promise<void> {
    const output = await this.exec(args);
    if (output.exitCode === 0) return;
    if (NOT_FOUND_PATTERN.test(output.stderr)) {
      this.logger.debug(`Already gone: ${action}`);
      return;
    }
    throw this.failure(action, output);
  }

  private parseLines<T extends z.ZodTypeAny>(stdout: string, schema: T): z.output<T>[] {
    const results: z.output<T>[] = [];
    for (const line of stdout.split('\n').map(l => l.trim()).filter(Boolean)) {
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch {
        this.logger.debug('Skipping non-JSON output line', { line });
        continue;
      }
      const parsed = schema.safeParse(raw);
      if (parsed.success) {
        results.push(parsed.data);
      } else {
        this.logger.debug('Skipping unexpected output line', { line });
      }
    }
    return results;
  }

  private async exec(args: string[], options?: RunOptions): Promise<CommandOutput> {
    this.logger.debug(`${this.runtime} ${args.join(' ')}`);
    try {
      return await this.runner(this.runtime, args, options);
    } catch (error) {
      if (error instanceof CommandNotFoundError) {
        throw new EngineUnavailableError(`The ${this.runtime} CLI is not installed or not on PATH`, error);
      }
      throw error;
    }
  }

  private async execOrThrow(args: string[], action: string, options?: RunOptions): Promise<string> {
    const output = await this.exec(args, options);
    if (output.exitCode !== 0) {
      throw this.failure(action, output);
    }
    return output.stdout;
  }

  private failure(action: string, output: CommandOutput): Error {
    const detail = output.stderr.trim();
    if (DAEMON_DOWN_PATTERN.test(detail)) {
      return new EngineUnavailableError(`Cannot connect to the ${this.runtime} daemon`);
    }
    return new Error(`${this.runtime} ${action} failed: ${detail !== '' ? detail : `exit code ${output.exitCode}`}`);
  }
}
