/**
 * Stack configuration schema
 *
 * The configuration file is JSON; this zod schema is its single source of
 * truth. Every field has a default, so `{}` parses to a complete config.
 */

import { z } from 'zod';

export const SERVICE_KIND_VALUES = ['container', 'native', 'remote'] as const;

export const ServiceConfigSchema = z.object({
  name: z.string().min(1),
  kind: z.enum(SERVICE_KIND_VALUES).default('container'),
  healthCheckUrl: z.string().url().optional(),
  ports: z.array(z.number().int().min(1).max(65535)).default([]),
});

/**
 * How to run a service as a host process instead of a container
 */
export const NativeProcessConfigSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  /** Pattern matched against full command lines to find the process */
  processPattern: z.string().min(1),
  healthCheckUrl: z.string().url().optional(),
  logFile: z.string().min(1),
});

export const PlatformOverlaySchema = z.object({
  composeFile: z.string().min(1),
});

export const ExtensionsConfigSchema = z.object({
  enabled: z.array(z.string().min(1)).default([]),
  config: z.record(z.string(), z.record(z.string(), z.unknown())).default({}),
});

export const DEFAULT_SERVICES: z.input<typeof ServiceConfigSchema>[] = [
  { name: 'model-server', kind: 'container', healthCheckUrl: 'http://localhost:11434', ports: [11434] },
  { name: 'webui', kind: 'container', healthCheckUrl: 'http://localhost:8080', ports: [8080] },
  { name: 'mcp-proxy', kind: 'container', healthCheckUrl: 'http://localhost:8200', ports: [8200] },
];

export const StackConfigSchema = z.object({
  composeFile: z.string().min(1).default('docker-compose.yml'),
  platform: z.object({
    apple: PlatformOverlaySchema.default({ composeFile: 'docker-compose.apple.yml' }),
    nvidia: PlatformOverlaySchema.default({ composeFile: 'docker-compose.nvidia.yml' }),
  }).default({}),
  services: z.array(ServiceConfigSchema).min(1).default(DEFAULT_SERVICES),
  /** Services that run as host processes on Apple Silicon, keyed by service name */
  native: z.record(z.string(), NativeProcessConfigSchema).default({
    'model-server': {
      command: 'ollama',
      args: ['serve'],
      processPattern: 'ollama serve',
      healthCheckUrl: 'http://localhost:11434',
      logFile: 'logs/model-server.log',
    },
  }),
  extensions: ExtensionsConfigSchema.default({}),
  dataDirectory: z.string().min(1).default('data'),
  backupDirectory: z.string().min(1).default('backups'),
}).superRefine((config, ctx) => {
  const seen = new Set<string>();
  for (const [index, service] of config.services.entries()) {
    if (seen.has(service.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['services', index, 'name'],
        message: `Duplicate service name: ${service.name}`,
      });
    }
    seen.add(service.name);
  }
});

export type ServiceConfig = z.output<typeof ServiceConfigSchema>;
export type NativeProcessConfig = z.output<typeof NativeProcessConfigSchema>;
export type StackConfig = z.output<typeof StackConfigSchema>;
export type StackConfigInput = z.input<typeof StackConfigSchema>;
