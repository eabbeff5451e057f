/**
 * Status Command
 *
 * Per-service state, health, published ports and resource usage, plus the
 * overall stack state.
 */

import type { z } from 'zod';
import { BaseOptionsSchema } from '../base-options-schema.js';
import { BASE_ALIASES, BASE_ARGS, defineCommand } from '../command-definition.js';
import { createCommandResults, type CommandResult, type CommandResults } from '../command-results.js';
import { LifecycleOrchestrator, type ServiceStatus } from '../lifecycle-orchestrator.js';
import type { StackContext } from '../stack-context.js';

const StatusOptionsSchema = BaseOptionsSchema;

type StatusOptions = z.output<typeof StatusOptionsSchema>;

function formatPorts(ports: Record<string, number | null>): string {
  const published = Object.entries(ports)
    .filter((entry): entry is [string, number] => entry[1] !== null)
    .map(([containerPort, hostPort]) => `${hostPort}->${containerPort}`);
  return published.length > 0 ? published.join(', ') : 'none';
}

export function serviceStatusToResult(status: ServiceStatus): CommandResult {
  let state = status.state;
  if (status.isRunning && status.health !== 'unknown') {
    state = status.health;
  } else if (status.isRunning) {
    state = 'running';
  }

  return {
    entity: status.name,
    success: true,
    status: state,
    message: `${status.kind}; ports: ${formatPorts(status.ports)}`,
    metadata: {
      kind: status.kind,
      running: status.isRunning,
      health: status.health,
      ports: status.ports,
      cpuPercent: status.usage.cpuPercent,
      memoryMb: status.usage.memoryMb,
    },
  };
}

async function runStatus(options: StatusOptions, ctx: StackContext): Promise<CommandResults> {
  const startTime = Date.now();
  const lifecycle = new LifecycleOrchestrator(ctx);

  const state = await lifecycle.getStackState();
  const results: CommandResult[] = [{ entity: 'stack', success: true, status: state, message: `platform: ${ctx.platform}` }];
  for (const status of await lifecycle.status()) {
    results.push(serviceStatusToResult(status));
  }

  return createCommandResults('status', ctx, startTime, results);
}

export const statusCommand = defineCommand({
  name: 'status',
  description: 'Show the state and health of every service',
  schema: StatusOptionsSchema,
  argSpec: {
    args: { ...BASE_ARGS },
    aliases: { ...BASE_ALIASES },
  },
  examples: [
    'modelstack status',
    'modelstack status --verbose',
    'modelstack status --output yaml',
  ],
  handler: runStatus,
});
