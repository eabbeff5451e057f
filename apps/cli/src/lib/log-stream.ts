/**
 * LogStream - lazy, single-use iterator over log lines
 *
 * Wraps any async line source together with the resource behind it
 * (usually a `logs --follow` or `tail -f` subprocess). The resource is
 * released exactly once: when the source ends, when the consumer breaks out
 * of its loop, or when cancel() is called.
 */

import * as readline from 'readline';
import type { ChildProcess } from 'child_process';

export type LogStreamOutcome = 'completed' | 'cancelled' | 'failed';

export class LogStream implements AsyncIterable<string> {
  private consumed = false;
  private cancelled = false;
  private disposed = false;
  private _outcome: LogStreamOutcome | undefined;

  constructor(
    private readonly source: AsyncIterable<string>,
    private readonly dispose: () => void = () => {}
  ) {}

  /**
   * How consumption ended; undefined while the stream is still open
   */
  get outcome(): LogStreamOutcome | undefined {
    return this._outcome;
  }

  /**
   * Stop the stream from outside the consuming loop (e.g. on SIGINT).
   * The pending iteration ends and the outcome becomes 'cancelled'.
   */
  cancel(): void {
    this.cancelled = true;
    this.release();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<string, void, undefined> {
    if (this.consumed) {
      throw new Error('Log stream has already been consumed');
    }
    this.consumed = true;

    try {
      for await (const line of this.source) {
        if (this.cancelled) break;
        yield line;
      }
      this._outcome = this.cancelled ? 'cancelled' : 'completed';
    } catch (error) {
      if (this.cancelled) {
        this._outcome = 'cancelled';
        return;
      }
      this._outcome = 'failed';
      throw error;
    } finally {
      // Consumer left the loop early
      this._outcome ??= 'cancelled';
      this.release();
    }
  }

  private release(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.dispose();
  }

  /**
   * Stream over a fixed set of lines
   */
  static fromLines(lines: readonly string[]): LogStream {
    async function* source(): AsyncGenerator<string> {
      yield* lines;
    }
    return new LogStream(source());
  }

  /**
   * Stream the stdout of a child process line by line. A non-zero exit
   * that was not caused by cancellation fails the stream with its stderr.
   */
  static fromProcess(child: ChildProcess): LogStream {
    const stderr: string[] = [];
    child.stderr?.on('data', (chunk: Buffer) => {
      stderr.push(chunk.toString());
    });

    const exited = new Promise<{ code: number | null; error?: Error }>(resolve => {
      child.once('error', error => resolve({ code: null, error }));
      child.once('close', code => resolve({ code }));
    });

    async function* source(): AsyncGenerator<string> {
      if (child.stdout) {
        const lines = readline.createInterface({ input: child.stdout, crlfDelay: Infinity });
        yield* lines;
      }
      const { code, error } = await exited;
      if (error) throw error;
      if (code !== 0 && code !== null) {
        const detail = stderr.join('').trim();
        throw new Error(detail !== '' ? detail : `log process exited with code ${code}`);
      }
    }

    return new LogStream(source(), () => {
      if (child.exitCode === null && !child.killed) {
        child.kill('SIGTERM');
      }
    });
  }
}
