/**
 * Filesystem-based wrappers for configuration loading
 *
 * The pure parsers (parseStackConfig, parseEnvFile) stay testable without
 * the filesystem; these functions read and write the real files.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { ConfigurationError } from './configuration-error.js';
import { parseStackConfig, serializeStackConfig } from './config-parser.js';
import {
  createDefaultEnv,
  parseEnvFile,
  serializeEnvFile,
  toStackEnv,
  type EnvEntries,
  type StackEnv,
} from './env-file.js';
import type { StackConfig } from './config-schema.js';
import type { StackPaths } from './paths.js';

export interface LoadedStackConfig {
  config: StackConfig;
  env: StackEnv;
  /** The configuration file was missing or unusable */
  configFellBack: boolean;
  /** `.env` was missing; `env` holds generated, unsaved defaults */
  envFellBack: boolean;
  /** Either file fell back */
  fellBackToDefaults: boolean;
  warnings: string[];
}

async function readOptional(file: string): Promise<string | null> {
  try {
    return await fs.readFile(file, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) return null;
    throw new ConfigurationError(
      `Cannot read ${path.basename(file)}`,
      file,
      'Check the file permissions',
      error instanceof Error ? error : undefined
    );
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Load the configuration and `.env` file from the stack home.
 *
 * A missing or invalid configuration, or a missing `.env`, falls back to
 * in-memory defaults and says so; only unreadable files throw.
 */
export async function loadStackConfig(paths: StackPaths): Promise<LoadedStackConfig> {
  const warnings: string[] = [];

  const parsed = parseStackConfig(await readOptional(paths.configFile));
  if (!parsed.ok) {
    warnings.push(`Using default configuration (${parsed.reason}: ${paths.configFile})`);
  }

  const envContent = await readOptional(paths.envFile);
  if (envContent === null) {
    warnings.push(`Using default environment (file not found: ${paths.envFile})`);
  }

  return {
    config: parsed.config,
    env: toStackEnv(envContent === null ? createDefaultEnv() : parseEnvFile(envContent)),
    configFellBack: !parsed.ok,
    envFellBack: envContent === null,
    fellBackToDefaults: !parsed.ok || envContent === null,
    warnings,
  };
}

export async function saveStackConfig(paths: StackPaths, config: StackConfig): Promise<void> {
  try {
    await fs.mkdir(paths.homeDir, { recursive: true });
    await fs.writeFile(paths.configFile, serializeStackConfig(config), 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      'Failed to save configuration',
      paths.configFile,
      'Check that the stack home directory is writable',
      error instanceof Error ? error : undefined
    );
  }
}

export async function saveEnvFile(paths: StackPaths, entries: EnvEntries): Promise<void> {
  try {
    await fs.mkdir(paths.homeDir, { recursive: true });
    await fs.writeFile(paths.envFile, serializeEnvFile(entries), { encoding: 'utf-8', mode: 0o600 });
  } catch (error) {
    throw new ConfigurationError(
      'Failed to save environment file',
      paths.envFile,
      'Check that the stack home directory is writable',
      error instanceof Error ? error : undefined
    );
  }
}
