/**
 * Command Runner - run host commands and collect their output
 *
 * Every external program the CLI drives (the container engine, pgrep,
 * pkill, tail) goes through a CommandRunner, so tests can substitute a
 * scripted one.
 */

import { spawn } from 'child_process';
import { LogStream } from './log-stream.js';

export interface CommandOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface RunOptions {
  cwd?: string;
  /** Kill the command after this many milliseconds (default 60s) */
  timeoutMs?: number;
}

export type CommandRunner = (command: string, args: readonly string[], options?: RunOptions) => Promise<CommandOutput>;

/**
 * Starts a long-running command whose stdout is consumed as log lines
 */
export type CommandStreamer = (command: string, args: readonly string[]) => LogStream;

/**
 * Thrown when the program itself cannot be started (typically ENOENT)
 */
export class CommandNotFoundError extends Error {
  constructor(public readonly command: string, public override readonly cause?: Error) {
    super(`Command not found: ${command}`);
    this.name = 'CommandNotFoundError';
  }
}

export const spawnRunner: CommandRunner = (command, args, options = {}) => {
  const { cwd, timeoutMs = 60_000 } = options;

  return new Promise((resolve, reject) => {
    const proc = spawn(command, [...args], { cwd, stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';

    const timer = setTimeout(() => {
      proc.kill('SIGKILL');
    }, timeoutMs);

    proc.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });
    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('error', (error: NodeJS.ErrnoException) => {
      clearTimeout(timer);
      reject(error.code === 'ENOENT' ? new CommandNotFoundError(command, error) : error);
    });

    proc.on('close', (code, signal) => {
      clearTimeout(timer);
      resolve({
        stdout,
        stderr: signal === 'SIGKILL' && code === null ? `${stderr}\n${command} timed out after ${timeoutMs}ms` : stderr,
        exitCode: code ?? 1,
      });
    });
  });
};

export const spawnStreamer: CommandStreamer = (command, args) => {
  const proc = spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });
  return LogStream.fromProcess(proc);
};
