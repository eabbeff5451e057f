/**
 * @modelstack/core
 *
 * Configuration, error types and logging shared by the modelstack CLI.
 */

export * from './constants.js';
export * from './errors.js';
export * from './logger.js';

export { ConfigurationError } from './config/configuration-error.js';
export {
  StackConfigSchema,
  ServiceConfigSchema,
  NativeProcessConfigSchema,
  SERVICE_KIND_VALUES,
  DEFAULT_SERVICES,
} from './config/config-schema.js';
export type {
  StackConfig,
  StackConfigInput,
  ServiceConfig,
  NativeProcessConfig,
} from './config/config-schema.js';
export {
  createDefaultConfig,
  parseStackConfig,
  serializeStackConfig,
  formatZodIssues,
} from './config/config-parser.js';
export type { ConfigParseResult } from './config/config-parser.js';
export {
  parseEnvFile,
  serializeEnvFile,
  generateSecretKey,
  toStackEnv,
  createDefaultEnv,
} from './config/env-file.js';
export type { EnvEntries, StackEnv } from './config/env-file.js';
export {
  loadStackConfig,
  saveStackConfig,
  saveEnvFile,
  isNotFound,
} from './config/config-loader-fs.js';
export type { LoadedStackConfig } from './config/config-loader-fs.js';
export { resolveStackPaths, resolveFromHome } from './config/paths.js';
export type { StackPaths } from './config/paths.js';
