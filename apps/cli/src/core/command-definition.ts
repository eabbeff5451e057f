/**
 * Command Definition - Unified structure for CLI command metadata
 *
 * Combines the argument specification, the validation schema and the
 * handler of one command.
 */

import type { z } from 'zod';
import type { BaseOptions } from './base-options-schema.js';
import type { CommandResults } from './command-results.js';
import type { StackContext } from './stack-context.js';

/**
 * Declarative argument definition for CLI parsing
 */
export interface ArgDefinition {
  type: 'string' | 'boolean' | 'number' | 'array';
  description: string;
  default?: string | number | boolean;
  choices?: readonly string[];
}

/**
 * Declarative argument specification
 */
export interface ArgSpec {
  args: Record<string, ArgDefinition>;
  aliases?: Record<string, string>;
  /** Names given to positional arguments, in order (e.g. `restore <path>`) */
  positional?: string[];
}

export type CommandHandler<TOptions extends BaseOptions> = (
  options: TOptions,
  ctx: StackContext
) => Promise<CommandResults>;

/**
 * Complete command definition with all metadata
 *
 * @template TOptions - What the handler receives after schema processing
 */
export interface CommandDefinition<TOptions extends BaseOptions> {
  name: string;
  description: string;
  schema: z.ZodType<TOptions, z.ZodTypeDef, unknown>;
  argSpec: ArgSpec;
  examples: string[];
  handler: CommandHandler<TOptions>;
}

/**
 * A command whose options have been validated, ready to run
 */
export interface PreparedCommand {
  options: BaseOptions;
  run(ctx: StackContext): Promise<CommandResults>;
}

/**
 * Command with its option type erased, as the loader handles it
 */
export interface LoadedCommand {
  name: string;
  description: string;
  argSpec: ArgSpec;
  examples: string[];
  /** Validate normalized arguments; throws ZodError */
  prepare(raw: Record<string, unknown>): PreparedCommand;
}

/**
 * Helper function to define a command with type safety
 */
export function defineCommand<TOptions extends BaseOptions>(
  definition: CommandDefinition<TOptions>
): LoadedCommand {
  return {
    name: definition.name,
    description: definition.description,
    argSpec: definition.argSpec,
    examples: definition.examples,
    prepare(raw) {
      const options = definition.schema.parse(raw);
      return {
        options,
        run: ctx => definition.handler(options, ctx),
      };
    },
  };
}

/**
 * Argument definitions shared by every command
 */
export const BASE_ARGS: Record<string, ArgDefinition> = {
  '--verbose': {
    type: 'boolean',
    description: 'Enable verbose output',
    default: false,
  },
  '--quiet': {
    type: 'boolean',
    description: 'Suppress output except errors',
    default: false,
  },
  '--output': {
    type: 'string',
    description: 'Output format',
    choices: ['summary', 'json', 'yaml'],
    default: 'summary',
  },
};

export const BASE_ALIASES: Record<string, string> = {
  '-v': '--verbose',
  '-q': '--quiet',
  '-o': '--output',
};

export const FORCE_ARG: Record<string, ArgDefinition> = {
  '--force': {
    type: 'boolean',
    description: 'Proceed without confirmation',
    default: false,
  },
};
