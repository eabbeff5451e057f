/**
 * Backup manifest and bundle layout
 *
 * A backup bundle is a directory:
 *
 *   backup_manifest.json   this manifest
 *   volumes/<name>.tar.gz  one archive per volume (.tar when uncompressed)
 *   config/                configuration file snapshot
 *   extensions/<name>/     copies of enabled extension directories
 *   stack_state.json       informational snapshot of the running state
 *
 * The manifest keys are snake_case on the wire so bundles stay readable by
 * other tooling.
 */

import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import * as path from 'path';
import { glob } from 'glob';
import { z } from 'zod';
import { StackValidationError, formatZodIssues, isNotFound } from '@modelstack/core';

export const MANIFEST_FILE = 'backup_manifest.json';
export const STATE_FILE = 'stack_state.json';
export const VOLUMES_DIR = 'volumes';
export const CONFIG_DIR = 'config';
export const EXTENSIONS_DIR = 'extensions';

export const BackupConfigSchema = z.object({
  include_volumes: z.boolean(),
  include_config: z.boolean(),
  include_extensions: z.boolean(),
  compression: z.boolean(),
  encryption: z.boolean(),
  exclude_patterns: z.array(z.string()),
});

/** A bare name inside the bundle; never a path that could leave it */
const EntryName = z.string().min(1).refine(
  name => !path.isAbsolute(name) && !/[\\/]/.test(name) && name !== '.' && name !== '..',
  name => ({ message: `Not a plain file name: ${name}` })
);

export const BackupManifestSchema = z.object({
  backup_id: z.string().min(1),
  created_at: z.string().datetime({ offset: true }),
  stack_version: z.string(),
  cli_version: z.string(),
  platform: z.string(),
  backup_config: BackupConfigSchema,
  volumes: z.array(EntryName),
  config_files: z.array(EntryName),
  extensions: z.array(EntryName),
  checksum: z.string().optional(),
  size_bytes: z.number().int().nonnegative().optional(),
  description: z.string().optional(),
});

export type BackupManifest = z.infer<typeof BackupManifestSchema>;

export interface BundleValidation {
  valid: boolean;
  /** Components the manifest lists but the bundle lacks */
  missing: string[];
  /** Undefined when the manifest carries no checksum */
  checksumMatches?: boolean;
}

/**
 * File name of a volume archive
 */
export function volumeArchiveName(volume: string, compressed: boolean): string {
  return compressed ? `${volume}.tar.gz` : `${volume}.tar`;
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Path of a volume's archive in the bundle, whichever form it was saved in
 */
export async function findVolumeArchive(bundleDir: string, volume: string): Promise<string | undefined> {
  for (const compressed of [true, false]) {
    const candidate = path.join(bundleDir, VOLUMES_DIR, volumeArchiveName(volume, compressed));
    if (await exists(candidate)) return candidate;
  }
  return undefined;
}

/**
 * Read and validate a bundle's manifest
 */
export async function readManifest(bundleDir: string): Promise<BackupManifest> {
  const file = path.join(bundleDir, MANIFEST_FILE);

  let content: string;
  try {
    content = await fs.readFile(file, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      throw new StackValidationError(
        `Backup manifest not found: ${file}`,
        'Point at a directory created by `modelstack backup`'
      );
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new StackValidationError(
      `Backup manifest is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = BackupManifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StackValidationError('Backup manifest is malformed', undefined, formatZodIssues(parsed.error));
  }
  return parsed.data;
}

export async function writeManifest(bundleDir: string, manifest: BackupManifest): Promise<void> {
  await fs.writeFile(path.join(bundleDir, MANIFEST_FILE), JSON.stringify(manifest, null, 2) + '\n', 'utf-8');
}

/**
 * Size and SHA-256 over every bundle file except the manifest. Files are
 * hashed in sorted path order, each prefixed by its relative path.
 */
export async function computeBundleDigest(bundleDir: string): Promise<{ sizeBytes: number; checksum: string }> {
  const files = (await glob('**/*', {
    cwd: bundleDir,
    nodir: true,
    dot: true,
    posix: true,
    ignore: [MANIFEST_FILE],
  })).sort();

  const hash = createHash('sha256');
  let sizeBytes = 0;
  for (const relative of files) {
    const content = await fs.readFile(path.join(bundleDir, relative));
    sizeBytes += content.length;
    hash.update(relative);
    hash.update('\0');
    hash.update(content);
  }

  return { sizeBytes, checksum: hash.digest('hex') };
}

/**
 * Check that every component the manifest names is present, and that the
 * contents still match the recorded checksum
 */
export async function validateBundle(bundleDir: string, manifest: BackupManifest): Promise<BundleValidation> {
  const missing: string[] = [];

  for (const volume of manifest.volumes) {
    if (!(await findVolumeArchive(bundleDir, volume))) {
      missing.push(`volume archive: ${volume}`);
    }
  }

  if (manifest.config_files.length > 0) {
    const configDir = path.join(bundleDir, CONFIG_DIR);
    if (!(await exists(configDir))) {
      missing.push(`config directory: ${CONFIG_DIR}/`);
    } else {
      for (const file of manifest.config_files) {
        if (!(await exists(path.join(configDir, file)))) {
          missing.push(`config file: ${file}`);
        }
      }
    }
  }

  let checksumMatches: boolean | undefined;
  if (manifest.checksum !== undefined && missing.length === 0) {
    checksumMatches = (await computeBundleDigest(bundleDir)).checksum === manifest.checksum;
    if (!checksumMatches) {
      missing.push('checksum: bundle contents do not match the manifest');
    }
  }

  return { valid: missing.length === 0, missing, checksumMatches };
}
