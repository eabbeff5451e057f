import { readFileSync } from 'fs';
import * as path from 'path';
import { getCliRoot } from './cli-paths.js';

const UNKNOWN_VERSION = '0.0.0';

/**
 * Get the CLI version from package.json
 */
export function getVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(path.join(getCliRoot(import.meta.url), 'package.json'), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    return UNKNOWN_VERSION;
  }
  return UNKNOWN_VERSION;
}
