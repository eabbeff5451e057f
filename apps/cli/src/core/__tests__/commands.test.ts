import chalk from 'chalk';
import { promises as fs } from 'fs';
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { createSilentLogger } from '@modelstack/core';
import { executeCommand, generateGlobalHelp, getAvailableCommands } from '../command-loader.js';
import { createStaticConfirm } from '../confirm.js';
import type { CreateStackContextOptions } from '../stack-context.js';
import { FakeEngine, FakeNativeController, LINUX_HOST, makeTempDir } from './_fake-stack.js';

const PROJECT = 'modelstack';

describe('executeCommand', () => {
  let home: string;
  let engine: FakeEngine;
  let native: FakeNativeController;
  let log: MockInstance<typeof console.log>;
  let errors: MockInstance<typeof console.error>;

  function contextOptions(confirmAnswer = false): CreateStackContextOptions {
    return {
      env: { MODELSTACK_HOME: home },
      logger: createSilentLogger(),
      engine,
      native,
      host: LINUX_HOST,
      confirm: createStaticConfirm(confirmAnswer),
      templatesDir: home,
      health: { httpProbe: async () => true, tcpProbe: async () => true },
    };
  }

  function lastOutput(): string {
    const call = log.mock.calls.at(-1);
    return call === undefined ? '' : String(call[0]);
  }

  function runningStack(): void {
    for (const service of ['model-server', 'webui', 'mcp-proxy']) {
      engine.addContainer(service, PROJECT, true);
    }
  }

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(async () => {
    home = await makeTempDir();
    engine = new FakeEngine();
    native = new FakeNativeController();
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    errors = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(home, { recursive: true, force: true });
  });

  it('prints the preamble and a summary', async () => {
    runningStack();

    const code = await executeCommand('stop', [], contextOptions());

    expect(code).toBe(0);
    expect(log).toHaveBeenCalledTimes(3);
    expect(String(log.mock.calls[0]?.[0])).toMatch(/^modelstack v\S+ \| model server \+ web UI \+ tool proxy$/);
    expect(lastOutput().split('\n').slice(1)).toEqual([
      '[--] model-server: stopped',
      '[--] webui: stopped',
      '[--] mcp-proxy: stopped',
      '',
      'Summary: 3 succeeded, 3 total',
    ]);
    expect(engine.calls).toEqual(['down']);
  });

  it('prints only the document for structured output', async () => {
    engine.addContainer('webui', PROJECT, true);

    const code = await executeCommand('status', ['--output', 'json'], contextOptions());

    expect(code).toBe(0);
    expect(log).toHaveBeenCalledTimes(1);
    const document: unknown = JSON.parse(lastOutput());
    expect(document).toMatchObject({
      command: 'status',
      platform: 'cpu',
      outcome: 'completed',
      results: [
        { entity: 'stack', success: true, status: 'partially-running', message: 'platform: cpu' },
        { entity: 'model-server' },
        { entity: 'webui', status: 'healthy' },
        { entity: 'mcp-proxy' },
      ],
    });
  });

  it('exits cleanly when the operator declines a restart', async () => {
    runningStack();

    const code = await executeCommand('update', ['-o', 'json'], contextOptions(false));

    expect(code).toBe(0);
    expect(JSON.parse(lastOutput())).toMatchObject({
      outcome: 'declined',
      results: [{ entity: 'stack', success: true, status: 'declined' }],
    });
    expect(engine.calls).toEqual([]);
  });

  it('streams log lines and reports how many were shown', async () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    engine.logLines = ['webui-1  | listening on 8080', 'webui-1  | ready'];

    const code = await executeCommand('logs', ['webui', '-o', 'json'], contextOptions());

    expect(code).toBe(0);
    expect(write.mock.calls.map(call => call[0])).toEqual([
      'webui-1  | listening on 8080\n',
      'webui-1  | ready\n',
    ]);
    expect(engine.calls).toEqual(['logs:webui:once']);
    expect(JSON.parse(lastOutput())).toMatchObject({
      results: [{ entity: 'webui', success: true, status: 'completed', metadata: { lines: 2 } }],
    });
  });

  it('exits with 1 when any service fails', async () => {
    engine.failures.set('composeUp', new Error('port is already allocated'));

    const code = await executeCommand('start', ['-o', 'json'], contextOptions());

    expect(code).toBe(1);
  });

  it('reports usage errors on stderr', async () => {
    const code = await executeCommand('restore', [], contextOptions());

    expect(code).toBe(1);
    expect(errors).toHaveBeenCalledWith(
      "✖ Invalid arguments\n   - path: A backup directory is required\n   Suggestion: Run 'modelstack restore --help'"
    );
  });

  it('rejects unknown commands', async () => {
    expect(await executeCommand('deploy', [], contextOptions())).toBe(1);
    expect(errors).toHaveBeenCalledWith('✖ Unknown command: deploy');
  });

  it('prints command help without touching the stack', async () => {
    const code = await executeCommand('status', ['--help'], contextOptions());

    expect(code).toBe(0);
    expect(lastOutput().split('\n')[0]).toBe('status - Show the state and health of every service');
    expect(engine.calls).toEqual([]);
  });
});

describe('generateGlobalHelp', () => {
  it('lists every command under a category', async () => {
    const help = await generateGlobalHelp();

    for (const name of getAvailableCommands()) {
      expect(help).toMatch(new RegExp(`^    ${name} +\\S`, 'm'));
    }
    expect(help.split('\n')).toContain('    status       Show the state and health of every service');
  });
});
