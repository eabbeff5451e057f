/**
 * Service Kinds
 *
 * How a service is run, independent of what it does. The orchestrators
 * switch over this closed set; adding a kind is a compile error until every
 * switch handles it.
 */

export const SERVICE_KINDS = {
  CONTAINER: 'container', // Managed through the compose project
  NATIVE: 'native',       // Host process, started and stopped by the CLI
  REMOTE: 'remote',       // Externally managed endpoint, only health-checked
} as const;

export type ServiceKind = typeof SERVICE_KINDS[keyof typeof SERVICE_KINDS];

/**
 * Check if a string is a valid service kind
 */
export function isServiceKind(kind: string): kind is ServiceKind {
  return Object.values(SERVICE_KINDS).some(value => value === kind);
}

export interface ServiceDescriptor {
  readonly name: string;
  readonly kind: ServiceKind;
  readonly healthCheckUrl?: string;
  readonly ports: readonly number[];
}

export type HealthStatus = 'healthy' | 'unhealthy' | 'unknown';

export function assertNever(value: never): never {
  throw new Error(`Unhandled service kind: ${String(value)}`);
}
