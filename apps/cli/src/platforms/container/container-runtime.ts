/**
 * Container Runtime - choose between Docker and Podman
 *
 * MODELSTACK_CONTAINER_RUNTIME pins the runtime; otherwise docker is
 * preferred when its CLI answers, then podman.
 */

import { CommandNotFoundError, type CommandRunner } from '../../lib/command-runner.js';

export type ContainerRuntime = 'docker' | 'podman';

const RUNTIMES: readonly ContainerRuntime[] = ['docker', 'podman'];

export function isContainerRuntime(value: string | undefined): value is ContainerRuntime {
  return RUNTIMES.some(runtime => runtime === value);
}

/**
 * Check if a runtime's CLI is installed
 */
async function isRuntimeAvailable(runner: CommandRunner, runtime: ContainerRuntime): Promise<boolean> {
  try {
    const output = await runner(runtime, ['--version'], { timeoutMs: 2_000 });
    return output.exitCode === 0;
  } catch (error) {
    if (error instanceof CommandNotFoundError) return false;
    throw error;
  }
}

/**
 * Detect which container runtime to drive. Falls back to docker when
 * neither answers, so the later engine call reports the real problem.
 */
export async function detectContainerRuntime(
  runner: CommandRunner,
  env: Record<string, string | undefined> = process.env
): Promise<ContainerRuntime> {
  const pinned = env.MODELSTACK_CONTAINER_RUNTIME;
  if (isContainerRuntime(pinned)) {
    return pinned;
  }

  for (const runtime of RUNTIMES) {
    if (await isRuntimeAvailable(runner, runtime)) {
      return runtime;
    }
  }
  return 'docker';
}
