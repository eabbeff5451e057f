/**
 * Logger interface for observability
 *
 * This interface is intentionally framework-agnostic. Orchestrators depend on
 * it rather than on winston directly, so tests can hand in a silent logger.
 *
 * Example usage:
 * ```typescript
 * const logger = createLogger({ level: 'debug' });
 * const health = new HealthChecker(registry, logger.child({ component: 'health' }));
 * ```
 */

import winston from 'winston';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(meta: LogMeta): Logger;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';
export type LogFormat = 'json' | 'simple';

export interface LoggerConfig {
  level: LogLevel;
  format: LogFormat;
  silent: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Resolve logger configuration
 *
 * Priority for the level:
 * 1. Explicit `level` (the CLI passes `debug` under --verbose)
 * 2. MODELSTACK_LOG_LEVEL environment variable
 * 3. Default: 'warn', so diagnostics stay out of operator output
 *
 * MODELSTACK_LOG_FORMAT selects `json` or `simple` (default). Under
 * NODE_ENV=test the logger is silent.
 */
export function getLoggerConfig(
  level?: LogLevel,
  env: Record<string, string | undefined> = process.env
): LoggerConfig {
  const envLevel = env.MODELSTACK_LOG_LEVEL;
  return {
    level: level ?? (isLogLevel(envLevel) ? envLevel : 'warn'),
    format: env.MODELSTACK_LOG_FORMAT === 'json' ? 'json' : 'simple',
    silent: env.NODE_ENV === 'test',
  };
}

function createFormat(config: LoggerConfig): winston.Logform.Format {
  if (config.format === 'json') {
    return winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    );
  }

  return winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ level, message, timestamp, ...meta }) => {
      const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
      return `${String(timestamp)} [${level.toUpperCase()}] ${String(message)}${metaStr}`;
    })
  );
}

/**
 * Adapt a winston logger to the Logger interface
 */
export function fromWinston(instance: winston.Logger): Logger {
  return {
    debug: (message, meta) => { instance.debug(message, meta ?? {}); },
    info: (message, meta) => { instance.info(message, meta ?? {}); },
    warn: (message, meta) => { instance.warn(message, meta ?? {}); },
    error: (message, meta) => { instance.error(message, meta ?? {}); },
    child: (meta) => fromWinston(instance.child(meta)),
  };
}

/**
 * Create the process logger. Everything goes to stderr so that
 * structured command output on stdout stays parseable.
 */
export function createLogger(options: Partial<LoggerConfig> = {}): Logger {
  const defaults = getLoggerConfig(options.level);
  const config: LoggerConfig = {
    level: defaults.level,
    format: options.format ?? defaults.format,
    silent: options.silent ?? defaults.silent,
  };

  const instance = winston.createLogger({
    level: config.level,
    format: createFormat(config),
    silent: config.silent,
    transports: [
      new winston.transports.Console({
        level: config.level,
        stderrLevels: [...LOG_LEVELS],
      }),
    ],
    exitOnError: false,
  });

  return fromWinston(instance);
}

/**
 * Logger that discards everything
 */
export function createSilentLogger(): Logger {
  return createLogger({ silent: true });
}
