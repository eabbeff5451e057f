import { describe, expect, it, vi } from 'vitest';
import { createSilentLogger } from '@modelstack/core';
import type { CommandOutput, CommandRunner } from '../../../lib/command-runner.js';
import { LogStream } from '../../../lib/log-stream.js';
import { PosixProcessController, type NativeProcessSpec } from '../native-process.js';
import { gracefulStop, isProcessRunning } from '../process-manager.js';

const SPEC: NativeProcessSpec = {
  service: 'model-server',
  command: 'ollama',
  args: ['serve'],
  processPattern: 'ollama serve',
  logFile: '/stack/logs/model-server.log',
};

// Far above any pid_max, so never a live process
const MISSING_PID = 999_999_999;

function output(exitCode: number, stdout = '', stderr = ''): CommandOutput {
  return { stdout, stderr, exitCode };
}

function controller(runner: CommandRunner, streamer = vi.fn(() => LogStream.fromLines([]))) {
  return new PosixProcessController({ runner, streamer, logger: createSilentLogger() });
}

describe('PosixProcessController', () => {
  it('finds processes by their command line', async () => {
    const runner = vi.fn<CommandRunner>(async () => output(0, '4242\n'));

    expect(await controller(runner).isRunning(SPEC)).toBe(true);
    expect(runner).toHaveBeenCalledWith('pgrep', ['-f', 'ollama serve'], { timeoutMs: 5_000 });
  });

  it('ignores its own pid and treats no match as not running', async () => {
    expect(await controller(async () => output(0, `${process.pid}\n`)).isRunning(SPEC)).toBe(false);
    expect(await controller(async () => output(1)).isRunning(SPEC)).toBe(false);
  });

  it('surfaces pgrep errors', async () => {
    await expect(controller(async () => output(2, '', 'pgrep: invalid option')).isRunning(SPEC))
      .rejects.toThrow('pgrep failed: pgrep: invalid option');
  });

  it('reports false when there was nothing to stop', async () => {
    expect(await controller(async () => output(1)).stop(SPEC)).toBe(false);
  });

  it('counts a process that exited before the signal as stopped', async () => {
    expect(await controller(async () => output(0, `${MISSING_PID}\n`)).stop(SPEC)).toBe(true);
  });

  it('tails the log file', () => {
    const streamer = vi.fn(() => LogStream.fromLines([]));

    controller(async () => output(0), streamer).logs(SPEC, { follow: true, tail: 20 });

    expect(streamer).toHaveBeenCalledWith('tail', ['-n', '20', '-F', '/stack/logs/model-server.log']);
  });

  it('looks commands up on PATH', async () => {
    expect(await controller(async () => output(0, '/opt/homebrew/bin/ollama\n')).isInstalled(SPEC)).toBe(true);
    expect(await controller(async () => output(1)).isInstalled(SPEC)).toBe(false);
  });

  it('checks absolute commands on disk', async () => {
    const runner = vi.fn<CommandRunner>();

    expect(await controller(runner).isInstalled({ ...SPEC, command: '/nonexistent/bin/ollama' })).toBe(false);
    expect(runner).not.toHaveBeenCalled();
  });
});

describe('process manager', () => {
  it('sees the current process as running', () => {
    expect(isProcessRunning(process.pid)).toBe(true);
    expect(isProcessRunning(MISSING_PID)).toBe(false);
  });

  it('treats an already exited process as stopped gracefully', async () => {
    expect(await gracefulStop(MISSING_PID, 100, 10)).toBe(true);
  });
});
