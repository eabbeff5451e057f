/**
 * Logs Command
 *
 * Streams log lines to stdout. With --follow the stream runs until the
 * operator presses Ctrl-C, which ends the command with outcome
 * 'cancelled'.
 */

import { z } from 'zod';
import { BaseOptionsSchema, CommonExtensions } from '../base-options-schema.js';
import { BASE_ALIASES, BASE_ARGS, defineCommand } from '../command-definition.js';
import { createCommandResults, type CommandResult, type CommandResults } from '../command-results.js';
import { LifecycleOrchestrator } from '../lifecycle-orchestrator.js';
import type { StackContext } from '../stack-context.js';

const LogsOptionsSchema = BaseOptionsSchema.extend({
  service: CommonExtensions.service,
  follow: z.boolean().default(false),
  tail: z.number().int().nonnegative().optional(),
  since: z.string().min(1).optional(),
  until: z.string().min(1).optional(),
});

type LogsOptions = z.output<typeof LogsOptionsSchema>;

export type LineWriter = (line: string) => void;

const writeLine: LineWriter = line => {
  process.stdout.write(`${line}\n`);
};

export async function streamLogs(
  options: LogsOptions,
  ctx: StackContext,
  write: LineWriter = writeLine
): Promise<CommandResults> {
  const startTime = Date.now();
  const entity = options.service ?? 'stack';
  const stream = new LifecycleOrchestrator(ctx).logs(options.service, {
    follow: options.follow,
    tail: options.tail,
    since: options.since,
    until: options.until,
  });

  const onInterrupt = (): void => stream.cancel();
  process.once('SIGINT', onInterrupt);

  let lines = 0;
  let result: CommandResult;
  try {
    for await (const line of stream) {
      write(line);
      lines++;
    }
    result = { entity, success: true, status: stream.outcome ?? 'completed', metadata: { lines } };
  } catch (error) {
    result = {
      entity,
      success: false,
      status: 'failed',
      error: error instanceof Error ? error.message : String(error),
      metadata: { lines },
    };
  } finally {
    process.off('SIGINT', onInterrupt);
  }

  const outcome = stream.outcome === 'cancelled' ? 'cancelled' : 'completed';
  return createCommandResults('logs', ctx, startTime, [result], { outcome });
}

export const logsCommand = defineCommand({
  name: 'logs',
  description: 'Show service logs',
  schema: LogsOptionsSchema,
  argSpec: {
    args: {
      ...BASE_ARGS,
      '--follow': {
        type: 'boolean',
        description: 'Keep streaming new lines until interrupted',
        default: false,
      },
      '--tail': {
        type: 'number',
        description: 'Number of lines to show from the end of the logs',
      },
      '--since': {
        type: 'string',
        description: 'Show logs since a timestamp or relative time (e.g. 10m)',
      },
      '--until': {
        type: 'string',
        description: 'Show logs before a timestamp or relative time',
      },
    },
    aliases: {
      ...BASE_ALIASES,
      '-f': '--follow',
      '-n': '--tail',
    },
    positional: ['service'],
  },
  examples: [
    'modelstack logs',
    'modelstack logs model-server --tail 100',
    'modelstack logs webui -f',
  ],
  handler: (options, ctx) => streamLogs(options, ctx),
});
