/**
 * Pino logger with credential redaction
 *
 * Features:
 * - Redaction of passwords, tokens and connection strings
 * - Pretty printing in development
 * - Structured JSON logging in production
 * - Silent by default under test
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

import { createCensor, REDACTION_PATHS } from './redaction.js';

export { REDACTION_PATHS, redactString, maskEmail, createCensor } from './redaction.js';

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Component name, shown on every line */
  name?: string;
  /** Log level (default: LOG_LEVEL, else based on the environment) */
  level?: string;
  /** Deployment environment (default: NODE_ENV) */
  environment?: string;
  /** Service name for log identification */
  serviceName?: string;
  /** Enable pretty printing (default: true in development) */
  pretty?: boolean;
  /** Additional redaction paths */
  additionalRedactionPaths?: string[];
  /** Destination stream, used by tests to capture output */
  destination?: pino.DestinationStream;
}

/**
 * Context that can be attached to log entries
 */
export interface LogContext {
  /** Correlation ID for request tracing */
  correlationId?: string;
  /** Operation being executed */
  operation?: string;
  /** Additional context */
  [key: string]: unknown;
}

/**
 * Log level used when none is configured
 */
export function defaultLogLevel(environment: string | undefined): 'info' | 'silent' | 'debug' {
  switch (environment) {
    case 'production':
      return 'info';
    case 'test':
      return 'silent';
    default:
      return 'debug';
  }
}

function isDevelopment(environment: string | undefined): boolean {
  return environment !== 'production' && environment !== 'test';
}

function resolveEnvironment(config: LoggerConfig): string | undefined {
  return config.environment ?? process.env.NODE_ENV;
}

/**
 * Create the logger configuration
 */
function createLoggerOptions(config: LoggerConfig): LoggerOptions {
  const environment = resolveEnvironment(config);
  const {
    name,
    level = process.env.LOG_LEVEL || defaultLogLevel(environment),
    serviceName = process.env.SERVICE_NAME ?? 'rateboard',
    additionalRedactionPaths = [],
  } = config;

  return {
    level,
    name: name ?? serviceName,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: serviceName,
      env: environment ?? 'development',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    messageKey: 'msg',
    redact: {
      paths: [...REDACTION_PATHS, ...additionalRedactionPaths],
      censor: createCensor,
    },
  };
}

/**
 * Create a logger instance
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const options = createLoggerOptions(config);

  if (config.destination) {
    return pino(options, config.destination);
  }

  const pretty = config.pretty ?? isDevelopment(resolveEnvironment(config));

  if (pretty) {
    const transport = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        singleLine: false,
      },
    }) as pino.DestinationStream;
    return pino(options, transport);
  }

  return pino(options);
}

/**
 * Create a child logger with context
 */
export function createChildLogger(parent: Logger, context: LogContext): Logger {
  return parent.child(context);
}

/**
 * Generate a correlation ID
 */
export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 11)}`;
}

/**
 * Default logger instance
 */
export const logger: Logger = createLogger();

export type { Logger, LoggerOptions } from 'pino';
