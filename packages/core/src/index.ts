export {
  createLogger,
  createChildLogger,
  generateCorrelationId,
  defaultLogLevel,
  logger,
  type Logger,
  type LoggerConfig,
  type LogContext,
} from './logger/index.js';

// Redaction utilities for safe logging
export { maskEmail, redactString, REDACTION_PATHS } from './logger/redaction.js';

export {
  ErrorKind,
  AppError,
  ValidationError,
  // Repository errors (standardized error handling)
  RepositoryError,
  RecordNotFoundError,
  ConflictError,
  OwnershipMismatchError,
  OperationCancelledError,
  DatabaseConfigError,
  isAppError,
  isOperationalError,
  hasErrorKind,
  toSafeErrorResponse,
  toError,
  type SafeErrorDetails,
} from './errors.js';

export {
  loadConfig,
  RatingsEnvSchema,
  type RatingsEnv,
  type RatingsConfig,
  type DatabaseConfig,
  type DatabaseDriver,
  type LogLevel,
  type MySqlConnectionConfig,
  type ReviewEditPolicy,
} from './env.js';

export {
  throwIfAborted,
  raceAbort,
  type QueryOptions,
  type RaceAbortOptions,
} from './cancellation.js';

export {
  createPostgresPool,
  createMySqlPool,
  ping,
  PostgresSqlPool,
  MySqlSqlPool,
  type SqlDialect,
  type SqlRow,
  type QueryResult,
  type SqlClient,
  type SqlPool,
} from './database.js';
