/**
 * Logger Configuration
 *
 * Configures pino logger with environment-aware formatting:
 * - Development: debug level, pretty-printed colorized output
 * - Unset NODE_ENV or production: info level; pretty on a terminal, JSON otherwise
 * - Test: silent unless LOG_LEVEL is set
 *
 * All output goes to stderr; stdout is reserved for the CLI's own report.
 *
 * Usage:
 *   import { createComponentLogger } from './logger';
 *   const log = createComponentLogger('generator');
 *   log.warn({ format: 'pdf' }, 'LaTeX compiler not found, skipping PDF');
 */

import pino, { Logger, LoggerOptions } from 'pino';
import { loadAppConfig } from './config';

// =============================================================================
// Configuration
// =============================================================================

const app = loadAppConfig(process.env, Boolean(process.stderr.isTTY));

/**
 * Paths removed from every log entry
 */
export const REDACTED_PATHS = [
  'apiKey',
  'token',
  'secret',
  'authorization',
  '*.apiKey',
  '*.token',
  '*.secret',
  '*.authorization',
  'headers.authorization',
];

const baseOptions: LoggerOptions = {
  level: app.logLevel,
  base: {
    pid: process.pid,
    env: app.nodeEnv,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: REDACTED_PATHS,
    remove: true,
  },
};

const developmentOptions: LoggerOptions = {
  ...baseOptions,
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      destination: 2,
      translateTime: 'SYS:HH:MM:ss.l',
      ignore: 'pid,hostname,env',
      messageFormat: '[{component}] {msg}',
      singleLine: false,
    },
  },
};

const productionOptions: LoggerOptions = {
  ...baseOptions,
  formatters: {
    level: (label) => ({ level: label }),
    bindings: (bindings) => ({
      pid: bindings.pid,
      host: bindings.hostname,
      env: app.nodeEnv,
    }),
  },
};

// =============================================================================
// Logger Instance
// =============================================================================

export const logger: Logger = app.prettyLogs
  ? pino(developmentOptions)
  : pino(productionOptions, pino.destination(2));

// =============================================================================
// Child Logger Factories
// =============================================================================

/**
 * Create a child logger for a specific component
 *
 * @example
 * const log = createComponentLogger('input');
 * log.info({ kind: 'pdf' }, 'Extracted text');
 */
export function createComponentLogger(component: string): Logger {
  return logger.child({ component });
}

export const loggers = {
  cli: createComponentLogger('cli'),
  orchestrator: createComponentLogger('orchestrator'),
  decision: createComponentLogger('decision'),
  input: createComponentLogger('input'),
  modifier: createComponentLogger('modifier'),
  generator: createComponentLogger('generator'),
  llm: createComponentLogger('llm'),
  errors: createComponentLogger('errors'),
};

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Serialize an error for structured logging
 */
export function serializeError(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    const extras: Record<string, unknown> = {};
    for (const key of Object.getOwnPropertyNames(err)) {
      if (!['name', 'message', 'stack'].includes(key)) {
        extras[key] = Reflect.get(err, key);
      }
    }
    return {
      type: err.constructor.name,
      message: err.message,
      stack: app.isDevelopment ? err.stack : undefined,
      ...extras,
    };
  }
  return { message: String(err) };
}

export default logger;
