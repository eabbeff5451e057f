/**
 * Shared path resolution utilities for the CLI package
 */

import * as path from 'path';
import { fileURLToPath } from 'url';

/**
 * Get the CLI package root (apps/cli) from any module under apps/cli/src.
 *
 * When running from the compiled tree (dist/apps/cli/src/...), resources
 * such as templates are still read from the source package.
 */
export function getCliRoot(importMetaUrl: string): string {
  const dirname = path.dirname(fileURLToPath(importMetaUrl));
  const marker = `${path.sep}dist${path.sep}apps${path.sep}cli${path.sep}`;
  const distIndex = dirname.indexOf(marker);

  if (distIndex !== -1) {
    return path.join(dirname.slice(0, distIndex), 'apps', 'cli');
  }

  const srcIndex = `${dirname}${path.sep}`.lastIndexOf(`${path.sep}src${path.sep}`);
  return srcIndex === -1 ? path.resolve(dirname, '..') : dirname.slice(0, srcIndex);
}

/**
 * Directory holding the compose files copied by `install`
 */
export function getComposeTemplatesDir(importMetaUrl: string): string {
  return path.join(getCliRoot(importMetaUrl), 'templates', 'compose');
}
