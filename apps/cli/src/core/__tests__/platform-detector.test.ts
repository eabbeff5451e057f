import { describe, expect, it, vi } from 'vitest';
import { EngineUnavailableError, createSilentLogger } from '@modelstack/core';
import { PlatformDetector } from '../platform-detector.js';

const LINUX = { os: 'linux', arch: 'x64' } as const;

describe('PlatformDetector', () => {
  it('recognises Apple Silicon without asking the engine', async () => {
    const info = vi.fn();
    const detector = new PlatformDetector({ info }, createSilentLogger(), { os: 'darwin', arch: 'arm64' });

    expect(await detector.detect()).toBe('apple');
    expect(info).not.toHaveBeenCalled();
  });

  it('treats an Intel Mac as a CPU host', async () => {
    const detector = new PlatformDetector(
      { info: async () => ({ runtimes: ['runc'] }) },
      createSilentLogger(),
      { os: 'darwin', arch: 'x64' }
    );

    expect(await detector.detect()).toBe('cpu');
  });

  it('detects the NVIDIA runtime', async () => {
    const detector = new PlatformDetector(
      { info: async () => ({ runtimes: ['io.containerd.runc.v2', 'nvidia', 'runc'] }) },
      createSilentLogger(),
      LINUX
    );

    expect(await detector.detect()).toBe('nvidia');
  });

  it('falls back to CPU when the engine cannot be reached', async () => {
    const detector = new PlatformDetector(
      { info: async () => { throw new EngineUnavailableError('Cannot connect to the docker daemon'); } },
      createSilentLogger(),
      LINUX
    );

    expect(await detector.detect()).toBe('cpu');
  });
});
