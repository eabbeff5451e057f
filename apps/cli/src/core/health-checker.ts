/**
 * Health Checker
 *
 * Two-tier probe for a service's health endpoint: an HTTP GET first, and a
 * plain TCP connect when that fails. A service that accepts connections but
 * answers the probe badly is still reported healthy. Each probe is a single
 * attempt with a fixed timeout; polling belongs to the caller.
 */

import type { Logger } from '@modelstack/core';
import { endpointOf, isHostReachable } from '../lib/network-utils.js';
import type { ServiceRegistry } from './service-registry.js';
import type { HealthStatus } from './service-types.js';

export type HttpProbe = (url: string, timeoutMs: number) => Promise<boolean>;
export type TcpProbe = (host: string, port: number, timeoutMs: number) => Promise<boolean>;

export interface HealthCheckerOptions {
  httpTimeoutMs?: number;
  tcpTimeoutMs?: number;
  httpProbe?: HttpProbe;
  tcpProbe?: TcpProbe;
}

/**
 * GET the URL; any 2xx answer passes
 */
export const fetchProbe: HttpProbe = async (url, timeoutMs) => {
  const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
  return response.ok;
};

export class HealthChecker {
  private readonly httpTimeoutMs: number;
  private readonly tcpTimeoutMs: number;
  private readonly httpProbe: HttpProbe;
  private readonly tcpProbe: TcpProbe;
  private readonly logger: Logger;

  constructor(
    private readonly registry: ServiceRegistry,
    logger: Logger,
    options: HealthCheckerOptions = {}
  ) {
    this.httpTimeoutMs = options.httpTimeoutMs ?? 2_500;
    this.tcpTimeoutMs = options.tcpTimeoutMs ?? 2_000;
    this.httpProbe = options.httpProbe ?? fetchProbe;
    this.tcpProbe = options.tcpProbe ?? isHostReachable;
    this.logger = logger.child({ component: 'health' });
  }

  /**
   * Health of a registered service
   */
  async check(serviceName: string): Promise<HealthStatus> {
    const descriptor = this.registry.require(serviceName);
    if (!descriptor.healthCheckUrl) {
      return 'unknown';
    }
    return this.checkUrl(descriptor.healthCheckUrl);
  }

  async checkUrl(url: string): Promise<HealthStatus> {
    try {
      if (await this.httpProbe(url, this.httpTimeoutMs)) {
        return 'healthy';
      }
      this.logger.debug('HTTP probe returned a non-success status', { url });
    } catch (error) {
      this.logger.debug('HTTP probe failed', {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    const endpoint = endpointOf(url);
    if (!endpoint) {
      this.logger.warn('Health check URL is not valid', { url });
      return 'unhealthy';
    }

    return (await this.tcpProbe(endpoint.host, endpoint.port, this.tcpTimeoutMs)) ? 'healthy' : 'unhealthy';
  }

  /**
   * Poll a service until it reports healthy or the timeout passes
   */
  async waitUntilHealthy(
    serviceName: string,
    options: { timeoutMs?: number; intervalMs?: number } = {}
  ): Promise<boolean> {
    const { timeoutMs = 60_000, intervalMs = 2_000 } = options;
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      const status = await this.check(serviceName);
      if (status === 'healthy' || status === 'unknown') {
        return status === 'healthy';
      }
      if (Date.now() + intervalMs > deadline) {
        return false;
      }
      await new Promise(resolve => setTimeout(resolve, intervalMs));
    }
  }
}
