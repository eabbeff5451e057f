/**
 * `.env` file handling
 *
 * The stack's compose files read PROJECT_NAME and WEBUI_SECRET_KEY from this
 * file. Parsing is deliberately small: KEY=VALUE lines, `#` comments and
 * optional surrounding quotes.
 */

import { randomBytes } from 'crypto';
import { DEFAULT_PROJECT_NAME } from '../constants.js';

export type EnvEntries = Record<string, string>;

export interface StackEnv {
  projectName: string;
  webuiSecretKey?: string;
  entries: EnvEntries;
}

const LINE_PATTERN = /^\s*(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*?)\s*$/;

/**
 * Parse `.env` content into key/value pairs. Later keys win.
 */
export function parseEnvFile(content: string): EnvEntries {
  const entries: EnvEntries = {};

  for (const line of content.split(/\r?\n/)) {
    if (line.trim() === '' || line.trim().startsWith('#')) continue;

    const match = LINE_PATTERN.exec(line);
    if (!match) continue;

    const [, key, rawValue] = match;
    if (key === undefined || rawValue === undefined) continue;
    entries[key] = unquote(rawValue);
  }

  return entries;
}

function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    const last = value[value.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      return value.slice(1, -1);
    }
  }
  return value;
}

/**
 * Serialize entries back to `.env` text, one KEY=VALUE per line
 */
export function serializeEnvFile(entries: EnvEntries): string {
  return Object.entries(entries)
    .map(([key, value]) => (/[\s#"']/.test(value) ? `${key}="${value}"` : `${key}=${value}`))
    .join('\n') + '\n';
}

/**
 * Random hex secret for the web UI session key
 */
export function generateSecretKey(bytes: number = 32): string {
  return randomBytes(bytes).toString('hex');
}

export function toStackEnv(entries: EnvEntries): StackEnv {
  const projectName = entries.PROJECT_NAME?.trim();
  return {
    projectName: projectName ? projectName : DEFAULT_PROJECT_NAME,
    webuiSecretKey: entries.WEBUI_SECRET_KEY,
    entries,
  };
}

/**
 * Entries for a fresh installation
 */
export function createDefaultEnv(projectName: string = DEFAULT_PROJECT_NAME): EnvEntries {
  return {
    PROJECT_NAME: projectName,
    WEBUI_SECRET_KEY: generateSecretKey(),
  };
}
