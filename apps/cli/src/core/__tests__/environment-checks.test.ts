import { promises as fs } from 'fs';
import * as path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { getComposeTemplatesDir } from '../../lib/cli-paths.js';
import { createStaticConfirm } from '../confirm.js';
import { fixEnvironment, runEnvironmentChecks } from '../environment-checks.js';
import { installStack } from '../installer.js';
import { LifecycleOrchestrator } from '../lifecycle-orchestrator.js';
import { APPLE_HOST, createTestStack, type TestStack, type TestStackOptions } from './_fake-stack.js';

const TEMPLATES = getComposeTemplatesDir(import.meta.url);
const portsFree = async () => false;

describe('environment checks', () => {
  const homes: string[] = [];

  async function stack(options: TestStackOptions = {}): Promise<TestStack & { lifecycle: LifecycleOrchestrator }> {
    const created = await createTestStack({ templatesDir: TEMPLATES, ...options });
    homes.push(created.home);
    return { ...created, lifecycle: new LifecycleOrchestrator(created.ctx) };
  }

  afterEach(async () => {
    await Promise.all(homes.splice(0).map(home => fs.rm(home, { recursive: true, force: true })));
  });

  it('flags a home that was never installed', async () => {
    const { ctx, lifecycle, home } = await stack();
    const report = await runEnvironmentChecks(ctx, lifecycle, portsFree);

    expect(report.passed).toBe(false);
    expect(report.checks.map(check => [check.name, check.passed])).toEqual([
      ['Container engine', true],
      ['Configuration', false],
      ['Compose files', false],
      ['Port 11434 (model-server)', true],
      ['Port 8080 (webui)', true],
      ['Port 8200 (mcp-proxy)', true],
    ]);
    expect(report.checks[2]?.details).toBe(`Missing: ${path.join(home, 'docker-compose.yml')}`);
  });

  it('checks the native binary on Apple Silicon', async () => {
    const { ctx, lifecycle, native } = await stack({ host: APPLE_HOST });
    native.installed = false;

    const report = await runEnvironmentChecks(ctx, lifecycle, portsFree);

    expect(report.checks.at(-1)).toEqual({
      name: 'Native model-server',
      passed: false,
      details: 'ollama not found on PATH',
      suggestion: 'Install ollama for macOS',
    });
  });

  it('reports ports as held by the running stack', async () => {
    const { ctx, lifecycle, engine } = await stack();
    engine.addContainer('webui', ctx.projectName, true);

    const report = await runEnvironmentChecks(ctx, lifecycle, async () => true);

    expect(report.checks.find(check => check.name === 'Port 8080 (webui)')).toEqual({
      name: 'Port 8080 (webui)',
      passed: true,
      details: 'In use by the running stack',
    });
  });

  it('repairs a fresh home', async () => {
    const { ctx, engine, home } = await stack();
    const result = await fixEnvironment(ctx);

    expect(result.failures).toEqual([]);
    expect(result.actions).toEqual([
      `Wrote default configuration to ${path.join(home, '.modelstack.json')}`,
      `Wrote ${path.join(home, '.env')} with a new secret key`,
      `Wrote ${path.join(home, 'docker-compose.apple.yml')}`,
      `Wrote ${path.join(home, 'docker-compose.nvidia.yml')}`,
      `Wrote ${path.join(home, 'docker-compose.yml')}`,
      'Pulled images',
    ]);
    expect(engine.calls).toEqual(['pull:model-server,webui,mcp-proxy']);
    expect(ctx.configLoad.fellBackToDefaults).toBe(false);
  });

  it('skips the image pull when the engine is down', async () => {
    const { ctx, engine } = await stack();
    engine.available = false;

    const result = await fixEnvironment(ctx);

    expect(result.failures).toEqual(['Container engine is not reachable; images were not pulled']);
  });
});

describe('installStack', () => {
  const homes: string[] = [];

  afterEach(async () => {
    await Promise.all(homes.splice(0).map(home => fs.rm(home, { recursive: true, force: true })));
  });

  it('writes configuration, a secret key and the compose files', async () => {
    const { ctx, home } = await createTestStack({ templatesDir: TEMPLATES });
    homes.push(home);

    const result = await installStack(ctx, new LifecycleOrchestrator(ctx), { portProbe: async port => port === 8080 });

    if (result.status !== 'installed') throw new Error(`Unexpected status ${result.status}`);
    expect(result.written).toEqual([
      path.join(home, '.modelstack.json'),
      path.join(home, '.env'),
      path.join(home, 'docker-compose.apple.yml'),
      path.join(home, 'docker-compose.nvidia.yml'),
      path.join(home, 'docker-compose.yml'),
    ]);
    expect(ctx.env.webuiSecretKey).toMatch(/^[0-9a-f]{64}$/);
    expect((await fs.stat(path.join(home, 'backups'))).isDirectory()).toBe(true);
    expect(result.checks.checks.filter(check => !check.passed).map(check => check.name)).toEqual(['Port 8080 (webui)']);
  });

  it('leaves an existing installation alone when declined', async () => {
    const { ctx, home } = await createTestStack({ templatesDir: TEMPLATES, confirm: createStaticConfirm(false) });
    homes.push(home);
    await fs.writeFile(ctx.paths.configFile, '{"dataDirectory":"kept"}');

    const result = await installStack(ctx, new LifecycleOrchestrator(ctx));

    expect(result).toEqual({ status: 'declined', configFile: ctx.paths.configFile });
    expect(await fs.readFile(ctx.paths.configFile, 'utf-8')).toBe('{"dataDirectory":"kept"}');
  });
});
