/**
 * Config Parser Module
 *
 * Pure functions that turn configuration file contents into a validated
 * StackConfig. Nothing here touches the filesystem; see config-loader-fs.ts
 * for the wrappers used by application code.
 */

import { ZodError } from 'zod';
import { StackConfigSchema, type StackConfig } from './config-schema.js';

export type ConfigParseResult =
  | { ok: true; config: StackConfig }
  | { ok: false; config: StackConfig; reason: string };

/**
 * Defaults for every field
 */
export function createDefaultConfig(): StackConfig {
  return StackConfigSchema.parse({});
}

/**
 * Format zod issues as `path: message` lines
 */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map(issue => {
    const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${location}: ${issue.message}`;
  });
}

/**
 * Parse configuration file content.
 *
 * Missing content, malformed JSON and schema violations all yield the
 * defaults together with the reason, never an exception.
 */
export function parseStackConfig(content: string | null): ConfigParseResult {
  if (content === null) {
    return { ok: false, config: createDefaultConfig(), reason: 'configuration file not found' };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return { ok: false, config: createDefaultConfig(), reason: `invalid JSON: ${detail}` };
  }

  const parsed = StackConfigSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      config: createDefaultConfig(),
      reason: `invalid configuration: ${formatZodIssues(parsed.error).join('; ')}`,
    };
  }

  return { ok: true, config: parsed.data };
}

export function serializeStackConfig(config: StackConfig): string {
  return JSON.stringify(config, null, 2) + '\n';
}
