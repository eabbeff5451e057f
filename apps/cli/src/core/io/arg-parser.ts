/**
 * Argument Parser - Functional parser generator for CLI arguments
 *
 * Builds an `arg` specification from a command's declarative ArgSpec,
 * normalizes the result to camelCase keys and validates it with the
 * command's zod schema.
 */

import arg from 'arg';
import { ZodError } from 'zod';
import { StackValidationError, formatZodIssues } from '@modelstack/core';
import type { ArgDefinition, ArgSpec, LoadedCommand, PreparedCommand } from '../command-definition.js';

/**
 * Type mapping from our declarative types to arg library types
 */
const ARG_TYPE_MAP: Record<ArgDefinition['type'], arg.Handler | [arg.Handler]> = {
  string: String,
  boolean: Boolean,
  number: Number,
  array: [String],
};

/**
 * Parse argv for a command and validate it. Usage errors become
 * StackValidationError so the CLI prints them without a stack trace.
 */
export function parseCommandArgs(command: LoadedCommand, argv: string[]): PreparedCommand {
  try {
    const rawArgs = arg(buildArgSpec(command.argSpec), { argv, permissive: false });
    return command.prepare(normalizeArgs(rawArgs, command.argSpec));
  } catch (error) {
    if (error instanceof arg.ArgError) {
      throw new StackValidationError(`Invalid arguments: ${error.message}`, `Run 'modelstack ${command.name} --help'`);
    }
    if (error instanceof ZodError) {
      throw new StackValidationError('Invalid arguments', `Run 'modelstack ${command.name} --help'`, formatZodIssues(error));
    }
    throw error;
  }
}

/**
 * Build arg library specification from our declarative format
 */
export function buildArgSpec(spec: ArgSpec): arg.Spec {
  const result: arg.Spec = {};

  for (const [key, def] of Object.entries(spec.args)) {
    result[key] = ARG_TYPE_MAP[def.type];
  }
  if (spec.aliases) {
    Object.assign(result, spec.aliases);
  }

  return result;
}

/**
 * Normalize parsed arguments to match the zod schema's camelCase keys.
 * `--no-foo` flags set `foo` to false.
 */
export function normalizeArgs(rawArgs: Record<string, unknown>, spec: ArgSpec): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};

  const positional = rawArgs._;
  if (spec.positional && Array.isArray(positional)) {
    spec.positional.forEach((name, index) => {
      const value: unknown = positional[index];
      if (value !== undefined) {
        normalized[name] = value;
      }
    });
  }

  for (const [key, value] of Object.entries(rawArgs)) {
    if (key === '_' || value === undefined) continue;

    const name = key.replace(/^--/, '');
    if (name.startsWith('no-') && typeof value === 'boolean') {
      normalized[kebabToCamel(name.slice(3))] = !value;
    } else {
      normalized[kebabToCamel(name)] = value;
    }
  }

  for (const [key, def] of Object.entries(spec.args)) {
    const name = key.replace(/^--/, '');
    if (name.startsWith('no-')) continue;
    const normalizedKey = kebabToCamel(name);
    if (normalized[normalizedKey] === undefined && def.default !== undefined) {
      normalized[normalizedKey] = def.default;
    }
  }

  return normalized;
}

/**
 * Convert kebab-case to camelCase
 */
export function kebabToCamel(str: string): string {
  return str.replace(/-([a-z])/g, (_, letter: string) => letter.toUpperCase());
}

/**
 * Generate help text from command definition
 */
export function generateHelp(command: LoadedCommand): string {
  const lines: string[] = [];

  const usage = ['modelstack', command.name, ...(command.argSpec.positional ?? []).map(name => `<${name}>`), '[options]'];
  lines.push(`${command.name} - ${command.description}`);
  lines.push('');
  lines.push(`USAGE: ${usage.join(' ')}`);
  lines.push('');
  lines.push('OPTIONS:');

  const entries = Object.entries(command.argSpec.args).map(([key, def]) => {
    const aliases = findAliases(key, command.argSpec.aliases);
    return { flags: [...aliases, key].join(', '), def };
  });
  const width = Math.max(...entries.map(entry => entry.flags.length)) + 2;

  for (const { flags, def } of entries) {
    let description = def.description;
    if (def.choices) {
      description += ` (${def.choices.join(', ')})`;
    }
    if (def.default !== undefined && def.default !== false) {
      description += ` [default: ${String(def.default)}]`;
    }
    lines.push(`  ${flags.padEnd(width)} ${description}`);
  }

  if (command.examples.length > 0) {
    lines.push('');
    lines.push('EXAMPLES:');
    for (const example of command.examples) {
      lines.push(`  ${example}`);
    }
  }

  return lines.join('\n');
}

/**
 * Find aliases for a given argument key
 */
function findAliases(key: string, aliases?: Record<string, string>): string[] {
  if (!aliases) return [];

  return Object.entries(aliases)
    .filter(([, target]) => target === key)
    .map(([alias]) => alias);
}
