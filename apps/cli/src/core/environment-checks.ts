/**
 * Environment checks
 *
 * Verifies the host can run the stack: engine reachable, configuration
 * loaded, compose files present and valid, service ports free, and the
 * platform-specific requirement (NVIDIA runtime, or the native binary on
 * Apple Silicon). `fixEnvironment` repairs what it safely can.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import {
  createDefaultEnv,
  isNotFound,
  saveEnvFile,
  saveStackConfig,
} from '@modelstack/core';
import { isPortInUse } from '../lib/network-utils.js';
import type { LifecycleOrchestrator } from './lifecycle-orchestrator.js';
import { HOST_PLATFORMS } from './platform-detector.js';
import type { StackContext } from './stack-context.js';

export interface EnvironmentCheck {
  name: string;
  passed: boolean;
  details?: string;
  suggestion?: string;
}

export interface CheckReport {
  checks: EnvironmentCheck[];
  passed: boolean;
}

export type PortProbe = (port: number) => Promise<boolean>;

async function fileExists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

export async function runEnvironmentChecks(
  ctx: StackContext,
  lifecycle: LifecycleOrchestrator,
  portInUse: PortProbe = isPortInUse
): Promise<CheckReport> {
  const checks: EnvironmentCheck[] = [];

  const engineUp = await ctx.engine.ping();
  checks.push({
    name: 'Container engine',
    passed: engineUp,
    details: engineUp ? 'Daemon is reachable' : 'Daemon is not reachable',
    suggestion: engineUp ? undefined : 'Start Docker Desktop or the docker daemon',
  });

  checks.push(ctx.configLoad.fellBackToDefaults
    ? {
        name: 'Configuration',
        passed: false,
        details: ctx.configLoad.warnings.join('; '),
        suggestion: 'Run `modelstack install` or `modelstack check --fix`',
      }
    : { name: 'Configuration', passed: true, details: ctx.paths.configFile });

  const composeFiles = ctx.composeFiles();
  const missing: string[] = [];
  for (const file of composeFiles) {
    if (!(await fileExists(file))) missing.push(file);
  }
  if (missing.length > 0) {
    checks.push({
      name: 'Compose files',
      passed: false,
      details: `Missing: ${missing.join(', ')}`,
      suggestion: 'Run `modelstack install` to write the compose files',
    });
  } else if (engineUp) {
    const valid = await ctx.engine.composeValidate(ctx.composeTarget());
    checks.push({
      name: 'Compose files',
      passed: valid,
      details: valid ? composeFiles.map(file => path.basename(file)).join(', ') : 'Compose configuration is invalid',
      suggestion: valid ? undefined : `Inspect with: docker compose ${composeFiles.map(f => `-f ${f}`).join(' ')} config`,
    });
  } else {
    checks.push({ name: 'Compose files', passed: true, details: 'Present (not validated without the engine)' });
  }

  const running = engineUp ? await lifecycle.isStackRunning() : false;
  for (const service of ctx.registry.all()) {
    if (service.kind === 'remote') continue;
    for (const port of service.ports) {
      if (running) {
        checks.push({ name: `Port ${port} (${service.name})`, passed: true, details: 'In use by the running stack' });
        continue;
      }
      const busy = await portInUse(port);
      checks.push({
        name: `Port ${port} (${service.name})`,
        passed: !busy,
        details: busy ? 'In use by another process' : 'Available',
        suggestion: busy ? `Free port ${port} or change the published port in the compose file` : undefined,
      });
    }
  }

  if (ctx.platform === HOST_PLATFORMS.GPU && engineUp) {
    const info = await ctx.engine.info();
    const present = info.runtimes.includes('nvidia');
    checks.push({
      name: 'NVIDIA runtime',
      passed: present,
      details: present ? 'nvidia runtime registered' : `Runtimes: ${info.runtimes.join(', ')}`,
      suggestion: present ? undefined : 'Install the NVIDIA Container Toolkit',
    });
  }

  if (ctx.platform === HOST_PLATFORMS.APPLE_SILICON) {
    for (const service of ctx.registry.byKind('native')) {
      const spec = ctx.nativeSpec(service.name);
      if (!spec) continue;
      const installed = await ctx.native.isInstalled(spec);
      checks.push({
        name: `Native ${service.name}`,
        passed: installed,
        details: installed ? `${spec.command} found` : `${spec.command} not found on PATH`,
        suggestion: installed ? undefined : `Install ${spec.command} for macOS`,
      });
    }
  }

  return { checks, passed: checks.every(check => check.passed) };
}

export interface FixResult {
  actions: string[];
  failures: string[];
}

/**
 * Write missing configuration, env file and compose files, then pull images
 */
export async function fixEnvironment(ctx: StackContext): Promise<FixResult> {
  const actions: string[] = [];
  const failures: string[] = [];

  if (ctx.configLoad.configFellBack) {
    await saveStackConfig(ctx.paths, ctx.config);
    actions.push(`Wrote default configuration to ${ctx.paths.configFile}`);
  }
  if (!(await fileExists(ctx.paths.envFile))) {
    await saveEnvFile(ctx.paths, createDefaultEnv(ctx.projectName));
    actions.push(`Wrote ${ctx.paths.envFile} with a new secret key`);
  }
  actions.push(...(await copyComposeTemplates(ctx, false)).map(file => `Wrote ${file}`));
  await ctx.reloadConfig();

  if (await ctx.engine.ping()) {
    try {
      const containers = ctx.registry.byKind('container').map(service => service.name);
      await ctx.engine.composePull(ctx.composeTarget(containers));
      actions.push('Pulled images');
    } catch (error) {
      failures.push(`Image pull failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  } else {
    failures.push('Container engine is not reachable; images were not pulled');
  }

  return { actions, failures };
}

/**
 * Copy the bundled compose files into the stack home, returning the
 * files written
 */
export async function copyComposeTemplates(ctx: StackContext, overwrite: boolean): Promise<string[]> {
  let templates: string[];
  try {
    templates = (await fs.readdir(ctx.templatesDir)).filter(file => file.endsWith('.yml')).sort();
  } catch (error) {
    if (isNotFound(error)) return [];
    throw error;
  }

  await fs.mkdir(ctx.paths.homeDir, { recursive: true });
  const copied: string[] = [];
  for (const template of templates) {
    const target = path.join(ctx.paths.homeDir, template);
    if (!overwrite && await fileExists(target)) continue;
    await fs.copyFile(path.join(ctx.templatesDir, template), target);
    copied.push(target);
  }
  return copied;
}
