/**
 * Locations of the stack's files on this host
 */

import * as os from 'os';
import * as path from 'path';
import { CONFIG_FILE_NAME, ENV_FILE_NAME, HOME_ENV_VAR } from '../constants.js';

export interface StackPaths {
  /** Directory holding configuration, compose files and extensions */
  homeDir: string;
  configFile: string;
  envFile: string;
  extensionsDir: string;
  logsDir: string;
}

/**
 * Resolve the stack home: MODELSTACK_HOME when set, otherwise ~/.modelstack
 */
export function resolveStackPaths(
  env: Record<string, string | undefined> = process.env,
  userHome: string = os.homedir()
): StackPaths {
  const override = env[HOME_ENV_VAR];
  const homeDir = override && override.trim() !== ''
    ? path.resolve(override)
    : path.join(userHome, '.modelstack');

  return {
    homeDir,
    configFile: path.join(homeDir, CONFIG_FILE_NAME),
    envFile: path.join(homeDir, ENV_FILE_NAME),
    extensionsDir: path.join(homeDir, 'extensions'),
    logsDir: path.join(homeDir, 'logs'),
  };
}

/**
 * Resolve a path from the configuration against the stack home
 */
export function resolveFromHome(paths: StackPaths, target: string): string {
  if (target.startsWith('~/')) {
    return path.join(os.homedir(), target.slice(2));
  }
  return path.resolve(paths.homeDir, target);
}
