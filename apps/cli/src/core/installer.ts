/**
 * First-time installation of the stack home: configuration, `.env` with a
 * fresh secret key, compose files, and an environment check at the end.
 */

import { promises as fs } from 'fs';
import {
  createDefaultConfig,
  createDefaultEnv,
  resolveFromHome,
  saveEnvFile,
  saveStackConfig,
} from '@modelstack/core';
import { copyComposeTemplates, runEnvironmentChecks, type CheckReport, type PortProbe } from './environment-checks.js';
import type { LifecycleOrchestrator } from './lifecycle-orchestrator.js';
import type { StackContext } from './stack-context.js';

export interface InstallOptions {
  /** Overwrite an existing installation without asking */
  force?: boolean;
  portProbe?: PortProbe;
}

export type InstallResult =
  | { status: 'declined'; configFile: string }
  | { status: 'installed'; configFile: string; envFile: string; written: string[]; checks: CheckReport };

export async function installStack(
  ctx: StackContext,
  lifecycle: LifecycleOrchestrator,
  options: InstallOptions = {}
): Promise<InstallResult> {
  const configExists = await fs.access(ctx.paths.configFile).then(() => true, () => false);
  if (configExists && !options.force) {
    const proceed = await ctx.confirm(
      `Configuration already exists at ${ctx.paths.configFile}. Overwrite it with defaults?`
    );
    if (!proceed) {
      return { status: 'declined', configFile: ctx.paths.configFile };
    }
  }

  const config = createDefaultConfig();
  await saveStackConfig(ctx.paths, config);
  await saveEnvFile(ctx.paths, createDefaultEnv(ctx.projectName));

  const written = [ctx.paths.configFile, ctx.paths.envFile];
  for (const dir of [config.dataDirectory, config.backupDirectory]) {
    await fs.mkdir(resolveFromHome(ctx.paths, dir), { recursive: true });
  }
  written.push(...await copyComposeTemplates(ctx, true));

  await ctx.reloadConfig();
  const checks = await runEnvironmentChecks(ctx, lifecycle, options.portProbe);

  return {
    status: 'installed',
    configFile: ctx.paths.configFile,
    envFile: ctx.paths.envFile,
    written,
    checks,
  };
}
