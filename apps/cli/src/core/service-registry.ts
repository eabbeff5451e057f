/**
 * Service Registry
 *
 * The set of services in the stack and how each one runs. Built from the
 * configuration, then adjusted once for the detected host platform; after
 * that the kinds are fixed for the rest of the invocation.
 */

import { StackValidationError, type NativeProcessConfig, type StackConfig } from '@modelstack/core';
import { HOST_PLATFORMS, type HostPlatform } from './platform-detector.js';
import type { ServiceDescriptor, ServiceKind } from './service-types.js';

export class ServiceRegistry {
  private readonly services = new Map<string, ServiceDescriptor>();
  private readonly reclassified = new Set<string>();

  constructor(descriptors: readonly ServiceDescriptor[]) {
    for (const descriptor of descriptors) {
      if (this.services.has(descriptor.name)) {
        throw new StackValidationError(`Duplicate service: ${descriptor.name}`);
      }
      this.services.set(descriptor.name, Object.freeze({ ...descriptor, ports: [...descriptor.ports] }));
    }
  }

  static fromConfig(config: StackConfig): ServiceRegistry {
    return new ServiceRegistry(config.services.map(service => ({
      name: service.name,
      kind: service.kind,
      healthCheckUrl: service.healthCheckUrl,
      ports: service.ports,
    })));
  }

  get(name: string): ServiceDescriptor | undefined {
    return this.services.get(name);
  }

  /**
   * Look up a service, failing with the list of known names
   */
  require(name: string): ServiceDescriptor {
    const descriptor = this.services.get(name);
    if (!descriptor) {
      throw new StackValidationError(
        `Unknown service: ${name}`,
        `Known services: ${this.names().join(', ')}`
      );
    }
    return descriptor;
  }

  all(): ServiceDescriptor[] {
    return [...this.services.values()];
  }

  names(): string[] {
    return [...this.services.keys()];
  }

  byKind(kind: ServiceKind): ServiceDescriptor[] {
    return this.all().filter(service => service.kind === kind);
  }

  /**
   * Change how a service runs. Allowed once per service.
   */
  reclassify(name: string, kind: ServiceKind, healthCheckUrl?: string): ServiceDescriptor {
    const current = this.require(name);
    if (this.reclassified.has(name)) {
      throw new Error(`Service ${name} has already been reclassified`);
    }

    const updated = Object.freeze({
      ...current,
      kind,
      healthCheckUrl: healthCheckUrl ?? current.healthCheckUrl,
    });
    this.services.set(name, updated);
    this.reclassified.add(name);
    return updated;
  }

  /**
   * Apply host-specific classification. On Apple Silicon every service with
   * native process settings runs on the host instead of in a container.
   */
  applyPlatform(platform: HostPlatform, native: Readonly<Record<string, NativeProcessConfig>>): void {
    if (platform !== HOST_PLATFORMS.APPLE_SILICON) return;

    for (const [name, settings] of Object.entries(native)) {
      if (this.services.has(name)) {
        this.reclassify(name, 'native', settings.healthCheckUrl);
      }
    }
  }
}
