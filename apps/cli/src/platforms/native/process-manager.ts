/**
 * Check if a process is running
 *
 * @param pid - Process ID to check
 */
export function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Gracefully stop a process with timeout
 *
 * Sends SIGTERM, polls until the process is gone, and falls back to
 * SIGKILL once maxWaitTime has passed.
 *
 * @param maxWaitTime - Maximum time to wait for graceful shutdown (ms)
 * @param checkInterval - Interval to check if process is still running (ms)
 * @returns Whether the process terminated without SIGKILL
 */
export async function gracefulStop(
  pid: number,
  maxWaitTime: number = 10_000,
  checkInterval: number = 250
): Promise<boolean> {
  try {
    process.kill(pid, 'SIGTERM');
  } catch (error) {
    // Already exited between discovery and signal
    if (error instanceof Error && 'code' in error && error.code === 'ESRCH') return true;
    throw error;
  }

  let waitTime = 0;
  while (waitTime < maxWaitTime) {
    await sleep(checkInterval);
    waitTime += checkInterval;
    if (!isProcessRunning(pid)) {
      return true;
    }
  }

  process.kill(pid, 'SIGKILL');
  await sleep(checkInterval);

  if (isProcessRunning(pid)) {
    throw new Error(`Process ${pid} survived SIGKILL`);
  }
  return false;
}
