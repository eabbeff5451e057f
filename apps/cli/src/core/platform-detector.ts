/**
 * Platform Detector
 *
 * Classifies the host once per invocation. Apple Silicon is recognised from
 * the OS and CPU alone; otherwise the container engine is asked whether it
 * offers the NVIDIA runtime. Detection never fails: anything unexpected
 * means a generic CPU host.
 */

import type { Logger } from '@modelstack/core';
import type { ContainerEngine } from '../platforms/container/engine.js';

export const HOST_PLATFORMS = {
  APPLE_SILICON: 'apple',
  GPU: 'nvidia',
  CPU: 'cpu',
} as const;

export type HostPlatform = typeof HOST_PLATFORMS[keyof typeof HOST_PLATFORMS];

export interface HostInfo {
  os: NodeJS.Platform;
  arch: string;
}

export class PlatformDetector {
  constructor(
    private readonly engine: Pick<ContainerEngine, 'info'>,
    private readonly logger: Logger,
    private readonly host: HostInfo = { os: process.platform, arch: process.arch }
  ) {}

  async detect(): Promise<HostPlatform> {
    if (this.host.os === 'darwin' && this.host.arch === 'arm64') {
      return HOST_PLATFORMS.APPLE_SILICON;
    }

    try {
      const info = await this.engine.info();
      if (info.runtimes.includes('nvidia')) {
        return HOST_PLATFORMS.GPU;
      }
    } catch (error) {
      this.logger.debug('Platform detection fell back to CPU', {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    return HOST_PLATFORMS.CPU;
  }
}
