import { describe, expect, it, vi } from 'vitest';
import { createDefaultConfig, createSilentLogger } from '@modelstack/core';
import { HealthChecker, type HttpProbe, type TcpProbe } from '../health-checker.js';
import { ServiceRegistry } from '../service-registry.js';

function checker(httpProbe: HttpProbe, tcpProbe: TcpProbe, registry = ServiceRegistry.fromConfig(createDefaultConfig())) {
  return new HealthChecker(registry, createSilentLogger(), { httpProbe, tcpProbe });
}

describe('HealthChecker', () => {
  it('reports healthy when the HTTP probe passes', async () => {
    const tcpProbe = vi.fn<TcpProbe>();
    const health = checker(async () => true, tcpProbe);

    expect(await health.check('webui')).toBe('healthy');
    expect(tcpProbe).not.toHaveBeenCalled();
  });

  it('falls back to a TCP connect on the URL port', async () => {
    const tcpProbe = vi.fn<TcpProbe>(async () => true);
    const health = checker(async () => false, tcpProbe);

    expect(await health.check('model-server')).toBe('healthy');
    expect(tcpProbe).toHaveBeenCalledWith('localhost', 11434, 2000);
  });

  it('is unhealthy when both probes fail', async () => {
    const health = checker(
      async () => { throw new Error('fetch failed'); },
      async () => false
    );

    expect(await health.check('mcp-proxy')).toBe('unhealthy');
  });

  it('has nothing to say about services without a health URL', async () => {
    const registry = new ServiceRegistry([{ name: 'worker', kind: 'container', ports: [] }]);
    const httpProbe = vi.fn<HttpProbe>();
    const health = checker(httpProbe, async () => true, registry);

    expect(await health.check('worker')).toBe('unknown');
    expect(httpProbe).not.toHaveBeenCalled();
  });

  it('treats an unparseable URL as unhealthy', async () => {
    const tcpProbe = vi.fn<TcpProbe>();
    const health = checker(async () => false, tcpProbe);

    expect(await health.checkUrl('not a url')).toBe('unhealthy');
    expect(tcpProbe).not.toHaveBeenCalled();
  });

  it('polls until the service comes up', async () => {
    const httpProbe = vi.fn<HttpProbe>()
      .mockResolvedValueOnce(false)
      .mockResolvedValueOnce(false)
      .mockResolvedValue(true);
    const health = checker(httpProbe, async () => false);

    expect(await health.waitUntilHealthy('webui', { timeoutMs: 1_000, intervalMs: 1 })).toBe(true);
    expect(httpProbe).toHaveBeenCalledTimes(3);
  });

  it('gives up once the next poll would pass the deadline', async () => {
    const httpProbe = vi.fn<HttpProbe>(async () => false);
    const health = checker(httpProbe, async () => false);

    expect(await health.waitUntilHealthy('webui', { timeoutMs: 0, intervalMs: 50 })).toBe(false);
    expect(httpProbe).toHaveBeenCalledTimes(1);
  });
});
