/**
 * Base Options Schema - Zod schema for common command options
 *
 * Every command schema extends this one, so the loader can rely on these
 * fields after parsing.
 */

import { z } from 'zod';

export const OUTPUT_FORMATS = ['summary', 'json', 'yaml'] as const;

/**
 * Fields are optional so CLI args can be omitted, but have defaults so
 * they're always defined at runtime
 */
export const BaseOptionsSchema = z.object({
  verbose: z.boolean().optional().default(false),
  quiet: z.boolean().optional().default(false),
  output: z.enum(OUTPUT_FORMATS).optional().default('summary'),
});

export type BaseOptions = z.output<typeof BaseOptionsSchema>;

/**
 * Common schema extensions that commands frequently use
 */
export const CommonExtensions = {
  force: z.boolean().optional().default(false),
  service: z.string().min(1).optional(),
} as const;
