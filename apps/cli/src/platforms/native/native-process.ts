/**
 * Native process control for services that run on the host
 *
 * On Apple Silicon the model server runs as a host process so it can use the
 * GPU. Processes are found by matching their full command line, started
 * detached with output appended to a log file, and stopped with SIGTERM.
 */

import { spawn } from 'child_process';
import { promises as fs, constants as fsConstants } from 'fs';
import * as path from 'path';
import type { Logger } from '@modelstack/core';
import type { CommandRunner, CommandStreamer } from '../../lib/command-runner.js';
import type { LogStream } from '../../lib/log-stream.js';
import { gracefulStop } from './process-manager.js';

export interface NativeProcessSpec {
  service: string;
  command: string;
  args: string[];
  /** Pattern matched against full command lines (pgrep -f) */
  processPattern: string;
  /** Absolute path of the file receiving stdout and stderr */
  logFile: string;
}

export interface NativeLogOptions {
  follow?: boolean;
  tail?: number;
}

export interface NativeProcessController {
  isRunning(spec: NativeProcessSpec): Promise<boolean>;
  /** Start the process detached; rejects when it cannot be spawned */
  start(spec: NativeProcessSpec): Promise<void>;
  /** Stop every matching process; false when none was running */
  stop(spec: NativeProcessSpec): Promise<boolean>;
  logs(spec: NativeProcessSpec, options: NativeLogOptions): LogStream;
  /** True when the command is installed on PATH */
  isInstalled(spec: NativeProcessSpec): Promise<boolean>;
}

export interface PosixProcessControllerOptions {
  runner: CommandRunner;
  streamer: CommandStreamer;
  logger: Logger;
  /** Grace period before SIGKILL (ms) */
  stopTimeoutMs?: number;
}

export class PosixProcessController implements NativeProcessController {
  private readonly runner: CommandRunner;
  private readonly streamer: CommandStreamer;
  private readonly logger: Logger;
  private readonly stopTimeoutMs: number;

  constructor(options: PosixProcessControllerOptions) {
    this.runner = options.runner;
    this.streamer = options.streamer;
    this.logger = options.logger.child({ component: 'native' });
    this.stopTimeoutMs = options.stopTimeoutMs ?? 10_000;
  }

  async isRunning(spec: NativeProcessSpec): Promise<boolean> {
    return (await this.findPids(spec)).length > 0;
  }

  async start(spec: NativeProcessSpec): Promise<void> {
    await fs.mkdir(path.dirname(spec.logFile), { recursive: true });
    const log = await fs.open(spec.logFile, 'a');

    try {
      await new Promise<void>((resolve, reject) => {
        const child = spawn(spec.command, spec.args, {
          detached: true,
          stdio: ['ignore', log.fd, log.fd],
        });
        child.once('error', error => {
          reject(new Error(`Failed to start ${spec.service} (${spec.command}): ${error.message}`));
        });
        child.once('spawn', () => {
          this.logger.info('Started native process', { service: spec.service, pid: child.pid });
          child.unref();
          resolve();
        });
      });
    } finally {
      await log.close();
    }
  }

  async stop(spec: NativeProcessSpec): Promise<boolean> {
    const pids = await this.findPids(spec);
    for (const pid of pids) {
      const graceful = await gracefulStop(pid, this.stopTimeoutMs);
      if (!graceful) {
        this.logger.warn('Process needed SIGKILL', { service: spec.service, pid });
      }
    }
    return pids.length > 0;
  }

  logs(spec: NativeProcessSpec, options: NativeLogOptions): LogStream {
    const args = ['-n', String(options.tail ?? 100)];
    if (options.follow) args.push('-F');
    args.push(spec.logFile);
    return this.streamer('tail', args);
  }

  async isInstalled(spec: NativeProcessSpec): Promise<boolean> {
    if (path.isAbsolute(spec.command)) {
      try {
        await fs.access(spec.command, fsConstants.X_OK);
        return true;
      } catch {
        return false;
      }
    }
    const output = await this.runner('which', [spec.command], { timeoutMs: 5_000 });
    return output.exitCode === 0;
  }

  private async findPids(spec: NativeProcessSpec): Promise<number[]> {
    const output = await this.runner('pgrep', ['-f', spec.processPattern], { timeoutMs: 5_000 });
    // pgrep exits 1 when nothing matches
    if (output.exitCode === 1) return [];
    if (output.exitCode !== 0) {
      throw new Error(`pgrep failed: ${output.stderr.trim()}`);
    }
    return output.stdout
      .split('\n')
      .map(line => Number.parseInt(line.trim(), 10))
      .filter(pid => !Number.isNaN(pid) && pid !== process.pid);
  }
}
