/**
 * Container engine contract
 *
 * Everything the orchestrators need from Docker (or Podman): compose
 * operations on the stack's project, label-filtered resource discovery and
 * removal, and volume archival. The engine is constructed once per
 * invocation and passed by reference.
 */

import type { LogStream } from '../../lib/log-stream.js';

export interface ComposeTarget {
  /** Base compose file first, platform overlays after */
  files: string[];
  projectName: string;
  /** Restrict the operation to these services; all when omitted */
  services?: string[];
}

export interface LabelFilter {
  key: string;
  value?: string;
}

export interface ContainerSummary {
  id: string;
  name: string;
  image: string;
  /** Raw engine state: running, exited, created, ... */
  state: string;
  running: boolean;
  labels: Record<string, string>;
  /** Container port (e.g. "8080/tcp") to published host port, null when unpublished */
  ports: Record<string, number | null>;
}

export interface VolumeSummary {
  name: string;
  labels: Record<string, string>;
}

export interface NetworkSummary {
  id: string;
  name: string;
}

export interface EngineInfo {
  runtimes: string[];
  serverVersion?: string;
}

export interface ContainerUsage {
  cpuPercent: number;
  memoryMb: number;
}

export interface ComposeLogOptions {
  follow?: boolean;
  tail?: number;
  since?: string;
  until?: string;
}

export interface ArchiveOptions {
  compress: boolean;
}

export interface ContainerEngine {
  /** True when the daemon answers */
  ping(): Promise<boolean>;
  /** Daemon information; throws EngineUnavailableError when unreachable */
  info(): Promise<EngineInfo>;

  composeUp(target: ComposeTarget): Promise<void>;
  /** Succeeds when nothing is running */
  composeDown(target: ComposeTarget): Promise<void>;
  composePull(target: ComposeTarget): Promise<void>;
  /** True when the compose files form a valid project */
  composeValidate(target: ComposeTarget): Promise<boolean>;
  composeLogs(target: ComposeTarget, options: ComposeLogOptions): LogStream;

  listContainers(filter: LabelFilter, options?: { all?: boolean }): Promise<ContainerSummary[]>;
  listVolumes(filter: LabelFilter): Promise<VolumeSummary[]>;
  listNetworks(filter: LabelFilter): Promise<NetworkSummary[]>;
  containerUsage(containerId: string): Promise<ContainerUsage | undefined>;

  /** Removal is idempotent: a resource that is already gone counts as removed */
  removeContainer(id: string): Promise<void>;
  removeVolume(name: string): Promise<void>;
  removeNetwork(id: string): Promise<void>;
  removeImage(reference: string): Promise<void>;

  /** Write the volume's contents to a tar archive on the host */
  archiveVolume(volume: string, archivePath: string, options: ArchiveOptions): Promise<void>;
  /** Create the volume if needed, then replace its contents with the archive */
  restoreVolume(volume: string, archivePath: string, labels: Record<string, string>): Promise<void>;
}

export function labelSelector(filter: LabelFilter): string {
  return filter.value === undefined ? filter.key : `${filter.key}=${filter.value}`;
}
