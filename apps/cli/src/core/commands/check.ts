/**
 * Check Command
 *
 * Runs the environment checks. With --fix, writes what is missing and pulls
 * images first, then checks again.
 */

import { z } from 'zod';
import { BaseOptionsSchema } from '../base-options-schema.js';
import { BASE_ALIASES, BASE_ARGS, defineCommand } from '../command-definition.js';
import { createCommandResults, type CommandResult, type CommandResults } from '../command-results.js';
import { fixEnvironment, runEnvironmentChecks } from '../environment-checks.js';
import { LifecycleOrchestrator } from '../lifecycle-orchestrator.js';
import type { StackContext } from '../stack-context.js';
import { checkToResult } from './install.js';

const CheckOptionsSchema = BaseOptionsSchema.extend({
  fix: z.boolean().default(false),
});

type CheckOptions = z.output<typeof CheckOptionsSchema>;

async function runCheck(options: CheckOptions, ctx: StackContext): Promise<CommandResults> {
  const startTime = Date.now();
  const results: CommandResult[] = [];
  const warnings: string[] = [];

  if (options.fix) {
    const fix = await fixEnvironment(ctx);
    results.push(...fix.actions.map(action => ({ entity: 'fix', success: true, status: 'ok', message: action })));
    warnings.push(...fix.failures);
  }

  const report = await runEnvironmentChecks(ctx, new LifecycleOrchestrator(ctx));
  results.push(...report.checks.map(checkToResult));

  return createCommandResults('check', ctx, startTime, results, { warnings });
}

export const checkCommand = defineCommand({
  name: 'check',
  description: 'Check that this host can run the stack',
  schema: CheckOptionsSchema,
  argSpec: {
    args: {
      ...BASE_ARGS,
      '--fix': {
        type: 'boolean',
        description: 'Write missing configuration and pull images',
        default: false,
      },
    },
    aliases: { ...BASE_ALIASES },
  },
  examples: [
    'modelstack check',
    'modelstack check --fix',
  ],
  handler: runCheck,
});
