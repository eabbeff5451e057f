import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { StackValidationError } from '@modelstack/core';
import { BaseOptionsSchema } from '../base-options-schema.js';
import { BASE_ALIASES, BASE_ARGS, defineCommand } from '../command-definition.js';
import { generateHelp, kebabToCamel, normalizeArgs, parseCommandArgs } from '../io/arg-parser.js';

const ArchiveOptionsSchema = BaseOptionsSchema.extend({
  dir: z.string().optional(),
  compress: z.boolean().default(true),
  exclude: z.array(z.string()).default([]),
  timeout: z.number().int().positive().default(120),
});

const archiveCommand = defineCommand({
  name: 'archive',
  description: 'Archive the stack',
  schema: ArchiveOptionsSchema,
  argSpec: {
    args: {
      ...BASE_ARGS,
      '--no-compress': { type: 'boolean', description: 'Store plain tar archives' },
      '--exclude': { type: 'array', description: 'Glob of files to skip' },
      '--timeout': { type: 'number', description: 'Seconds to wait', default: 120 },
    },
    aliases: { ...BASE_ALIASES },
    positional: ['dir'],
  },
  examples: [],
  handler: async () => {
    throw new Error('not run in these tests');
  },
});

function parseError(argv: string[]): StackValidationError {
  try {
    parseCommandArgs(archiveCommand, argv);
  } catch (error) {
    if (error instanceof StackValidationError) return error;
    throw error;
  }
  throw new Error('Expected the arguments to be rejected');
}

describe('parseCommandArgs', () => {
  it('maps flags, negations, arrays and positionals onto the schema', () => {
    const prepared = parseCommandArgs(archiveCommand, [
      '/srv/backups', '--no-compress', '--exclude', '*.log', '--exclude', 'tmp', '-v',
    ]);

    expect(prepared.options).toEqual({
      verbose: true,
      quiet: false,
      output: 'summary',
      dir: '/srv/backups',
      compress: false,
      exclude: ['*.log', 'tmp'],
      timeout: 120,
    });
  });

  it('reads numbers and aliased choices', () => {
    const prepared = parseCommandArgs(archiveCommand, ['--timeout', '30', '-o', 'json']);

    expect(prepared.options).toMatchObject({ timeout: 30, output: 'json', compress: true });
  });

  it('turns unknown flags into a usage error', () => {
    const error = parseError(['--bogus']);

    expect(error.message).toBe('Invalid arguments: unknown or unexpected option: --bogus');
    expect(error.suggestion).toBe("Run 'modelstack archive --help'");
  });

  it('lists schema violations by field', () => {
    const error = parseError(['--output', 'xml']);

    expect(error.message).toBe('Invalid arguments');
    expect(error.details).toHaveLength(1);
    expect(error.details[0]).toMatch(/^output: Invalid enum value/);
  });
});

describe('normalizeArgs', () => {
  it('leaves defaults of negated flags to the schema', () => {
    const normalized = normalizeArgs({ _: [] }, archiveCommand.argSpec);

    expect(normalized).toEqual({ verbose: false, quiet: false, output: 'summary', timeout: 120 });
  });

  it('camel-cases kebab flags', () => {
    expect(kebabToCamel('remove-volumes')).toBe('removeVolumes');
    expect(normalizeArgs({ _: [], '--validate-only': true }, { args: {} })).toEqual({ validateOnly: true });
  });
});

describe('generateHelp', () => {
  it('lists options with aliases, choices and defaults', () => {
    const command = defineCommand({
      name: 'backup',
      description: 'Back up the stack',
      schema: BaseOptionsSchema,
      argSpec: {
        args: {
          '--verbose': { type: 'boolean', description: 'Enable verbose output', default: false },
          '--output': { type: 'string', description: 'Output format', choices: ['summary', 'json', 'yaml'], default: 'summary' },
          '--timeout': { type: 'number', description: 'Seconds to wait', default: 120 },
        },
        aliases: { '-v': '--verbose', '-o': '--output' },
        positional: ['dir'],
      },
      examples: ['modelstack backup /srv/backups'],
      handler: async () => {
        throw new Error('not run in these tests');
      },
    });

    expect(generateHelp(command).split('\n')).toEqual([
      'backup - Back up the stack',
      '',
      'USAGE: modelstack backup <dir> [options]',
      '',
      'OPTIONS:',
      '  -v, --verbose   Enable verbose output',
      '  -o, --output    Output format (summary, json, yaml) [default: summary]',
      '  --timeout       Seconds to wait [default: 120]',
      '',
      'EXAMPLES:',
      '  modelstack backup /srv/backups',
    ]);
  });
});
