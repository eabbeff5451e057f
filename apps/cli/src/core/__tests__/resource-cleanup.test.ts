import { promises as fs } from 'fs';
import * as path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { createStaticConfirm } from '../confirm.js';
import { LifecycleOrchestrator } from '../lifecycle-orchestrator.js';
import { ResourceCleanupEngine } from '../resource-cleanup.js';
import { createTestStack, type TestStack } from './_fake-stack.js';

const PROJECT = 'modelstack';

describe('ResourceCleanupEngine', () => {
  const homes: string[] = [];

  async function installedStack(confirmAnswer = false): Promise<TestStack & { cleanup: ResourceCleanupEngine }> {
    const stack = await createTestStack({ confirm: createStaticConfirm(confirmAnswer) });
    homes.push(stack.home);
    await fs.writeFile(stack.ctx.paths.configFile, '{}');

    stack.engine.addContainer('model-server', PROJECT, true, 'ollama/ollama:latest');
    stack.engine.addContainer('webui', PROJECT, true, 'ghcr.io/open-webui/open-webui:main');
    stack.engine.addContainer('mcp-proxy', PROJECT, false, 'ghcr.io/sparfenyuk/mcp-proxy:latest');
    stack.engine.networks.push({ id: 'net-1', name: `${PROJECT}_default` });
    stack.engine.addVolume('modelstack_model_data', PROJECT, 'weights');
    stack.engine.addVolume('modelstack_webui_data', PROJECT, 'chats');
    stack.engine.addVolume('unrelated_data', 'other-project', 'keep');

    const cleanup = new ResourceCleanupEngine(stack.ctx, new LifecycleOrchestrator(stack.ctx));
    return { ...stack, cleanup };
  }

  async function exists(target: string): Promise<boolean> {
    return fs.access(target).then(() => true, () => false);
  }

  afterEach(async () => {
    await Promise.all(homes.splice(0).map(home => fs.rm(home, { recursive: true, force: true })));
  });

  describe('discover', () => {
    it('finds labelled resources and skips built-in networks', async () => {
      const { cleanup } = await installedStack();
      const resources = await cleanup.discover();

      expect(resources.containers.map(c => c.id)).toEqual(['model-server-id', 'webui-id', 'mcp-proxy-id']);
      expect(resources.networks).toEqual([{ id: 'net-1', name: 'modelstack_default' }]);
      expect(resources.volumes.map(v => v.name)).toEqual(['modelstack_model_data', 'modelstack_webui_data']);
      expect(resources.images).toEqual([
        'ghcr.io/open-webui/open-webui:main',
        'ghcr.io/sparfenyuk/mcp-proxy:latest',
        'ollama/ollama:latest',
      ]);
    });
  });

  describe('uninstall', () => {
    it('stops the stack and removes containers and networks only', async () => {
      const { cleanup, engine, ctx } = await installedStack();
      const result = await cleanup.uninstall();

      expect(engine.calls).toEqual([
        'down',
        'rm-container:model-server-id',
        'rm-container:webui-id',
        'rm-container:mcp-proxy-id',
        'rm-network:modelstack_default',
      ]);
      expect(result).toEqual({
        success: true,
        removed: {
          containers: ['model-server-id', 'webui-id', 'mcp-proxy-id'],
          networks: ['modelstack_default'],
          images: [],
          volumes: [],
        },
        configRemoved: false,
        volumesDeclined: false,
        failures: [],
        warnings: [],
      });
      expect(engine.volumes.size).toBe(3);
      expect(await exists(ctx.paths.configFile)).toBe(true);
    });

    it('keeps volumes when the operator declines but still removes the configuration', async () => {
      const { cleanup, engine, ctx } = await installedStack(false);
      const result = await cleanup.uninstall({ all: true });

      expect(result.volumesDeclined).toBe(true);
      expect(result.removed.volumes).toEqual([]);
      expect(engine.volumes.size).toBe(3);
      expect(result.configRemoved).toBe(true);
      expect(await exists(ctx.paths.homeDir)).toBe(false);
    });

    it('removes the project volumes with force', async () => {
      const { cleanup, engine } = await installedStack(false);
      const result = await cleanup.uninstall({ removeVolumes: true, force: true });

      expect(result.removed.volumes).toEqual(['modelstack_model_data', 'modelstack_webui_data']);
      expect([...engine.volumes.keys()]).toEqual(['unrelated_data']);
      expect(result.configRemoved).toBe(false);
    });

    it('removes images on request', async () => {
      const { cleanup, engine } = await installedStack();
      await cleanup.uninstall({ removeImages: true });

      expect(engine.calls.filter(call => call.startsWith('rm-image:'))).toEqual([
        'rm-image:ghcr.io/open-webui/open-webui:main',
        'rm-image:ghcr.io/sparfenyuk/mcp-proxy:latest',
        'rm-image:ollama/ollama:latest',
      ]);
    });

    it('records removal failures and carries on', async () => {
      const { cleanup, engine } = await installedStack();
      engine.failures.set('removeNetwork', new Error('network has active endpoints'));

      const result = await cleanup.uninstall();

      expect(result.success).toBe(false);
      expect(result.failures).toEqual([{ resource: 'modelstack_default', error: 'network has active endpoints' }]);
      expect(result.removed.containers).toHaveLength(3);
    });

    it('removes only the configuration when the engine is down', async () => {
      const { cleanup, engine, ctx } = await installedStack();
      engine.available = false;

      const result = await cleanup.uninstall({ removeConfig: true });

      expect(result.success).toBe(true);
      expect(result.configRemoved).toBe(true);
      expect(result.warnings).toEqual([
        'Container engine unavailable, engine resources were left in place: Cannot connect to the Docker daemon',
      ]);
      expect(await exists(ctx.paths.homeDir)).toBe(false);
    });
  });

  describe('uninstall of the stack home', () => {
    it('keeps files the stack did not write', async () => {
      const { cleanup, ctx, home } = await installedStack();
      await fs.writeFile(ctx.paths.envFile, 'PROJECT_NAME=modelstack\n');
      await fs.writeFile(path.join(home, 'docker-compose.yml'), 'services: {}\n');
      await fs.mkdir(path.join(ctx.paths.extensionsDir, 'rag'), { recursive: true });
      await fs.mkdir(path.join(home, 'backups'));
      await fs.writeFile(path.join(home, 'notes.txt'), 'mine');

      const result = await cleanup.uninstall({ removeConfig: true });

      expect(result.success).toBe(true);
      expect(result.configRemoved).toBe(true);
      expect(result.warnings).toEqual([`Kept ${home}: it holds files modelstack did not create`]);
      expect(await fs.readdir(home)).toEqual(['notes.txt']);
    });

    it('succeeds when run twice', async () => {
      const { cleanup, engine, ctx } = await installedStack();

      const first = await cleanup.uninstall({ all: true, force: true });
      const second = await cleanup.uninstall({ all: true, force: true });

      expect(first.success).toBe(true);
      expect(first.removed.volumes).toEqual(['modelstack_model_data', 'modelstack_webui_data']);
      expect(second).toEqual({
        success: true,
        removed: { containers: [], networks: [], images: [], volumes: [] },
        configRemoved: true,
        volumesDeclined: false,
        failures: [],
        warnings: [],
      });
      expect([...engine.volumes.keys()]).toEqual(['unrelated_data']);
      expect(await exists(ctx.paths.homeDir)).toBe(false);
    });

    it('lets all override explicit false flags', async () => {
      const { cleanup, engine, ctx } = await installedStack();

      const result = await cleanup.uninstall({ all: true, removeVolumes: false, removeConfig: false, force: true });

      expect(result.removed.volumes).toEqual(['modelstack_model_data', 'modelstack_webui_data']);
      expect([...engine.volumes.keys()]).toEqual(['unrelated_data']);
      expect(result.configRemoved).toBe(true);
      expect(await exists(ctx.paths.configFile)).toBe(false);
    });
  });

  describe('cleanup', () => {
    it('removes stopped containers and keeps the rest while the stack runs', async () => {
      const { cleanup, engine } = await installedStack();
      const result = await cleanup.cleanup({ removeVolumes: true, force: true });

      expect(result.removed.containers).toEqual(['mcp-proxy-id']);
      expect(result.removed.networks).toEqual([]);
      expect(result.removed.volumes).toEqual([]);
      expect(result.warnings).toEqual(['Stack is running; networks and volumes were kept']);
      expect(engine.volumes.size).toBe(3);
    });

    it('removes networks and confirmed volumes once the stack is stopped', async () => {
      const { cleanup, engine } = await installedStack(true);
      engine.containers = engine.containers.map(c => ({ ...c, running: false, state: 'exited' }));

      const result = await cleanup.cleanup({ removeVolumes: true });

      expect(result.removed).toEqual({
        containers: ['model-server-id', 'webui-id', 'mcp-proxy-id'],
        networks: ['modelstack_default'],
        images: [],
        volumes: ['modelstack_model_data', 'modelstack_webui_data'],
      });
      expect(result.volumesDeclined).toBe(false);
    });
  });
});
